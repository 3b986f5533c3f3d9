import { requireFinite, requirePositive } from "./validation.js";

/**
 * Exponential decay multiplier: 1 at age 0, 0.5 at one half-life, 0.25 at two.
 *
 * Same curve as exp(-ln2 * age / halfLife), computed as a power of one half:
 * half-life multiples are exact. Negative ages (future-dated entries) give a
 * multiplier above 1.
 */
export function decay(age: number, halfLife: number): number {
  requireFinite("age", age);
  requirePositive("halfLife", halfLife);
  return Math.pow(0.5, age / halfLife);
}

export function weightedScore(base: number, age: number, halfLife: number): number {
  return base * decay(age, halfLife);
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Age in days between two instants. The caller supplies `now`; nothing here reads a clock.
 */
export function ageInDays(at: Date | number, now: Date | number): number {
  const from = typeof at === "number" ? at : at.getTime();
  const to = typeof now === "number" ? now : now.getTime();
  return (to - from) / MS_PER_DAY;
}
