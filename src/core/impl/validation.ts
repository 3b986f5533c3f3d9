import { InvalidInputError } from "../errors.js";

export function requireFinite(path: string, v: number): number {
  if (!Number.isFinite(v)) throw InvalidInputError.field(path, "must be a finite number");
  return v;
}

export function requirePositive(path: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0) throw InvalidInputError.field(path, "must be a positive finite number");
  return v;
}

export function requireNonNegative(path: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) throw InvalidInputError.field(path, "must be a non-negative finite number");
  return v;
}

export function requireCount(path: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) throw InvalidInputError.field(path, "must be a non-negative integer");
  return v;
}

/** Strictly inside (0, 1). */
export function requireOpenUnit(path: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0 || v >= 1) throw InvalidInputError.field(path, "must be strictly between 0 and 1");
  return v;
}

/** Inside [0, 1]. */
export function requireUnit(path: string, v: number): number {
  if (!Number.isFinite(v) || v < 0 || v > 1) throw InvalidInputError.field(path, "must be between 0 and 1");
  return v;
}
