export interface FieldError {
  path: string;
  message: string;
}

export type ErrorCode = "INVALID_INPUT";

/**
 * Base error for everything the library throws on purpose.
 */
export class RelevanceError extends Error {
  readonly code: ErrorCode;
  readonly errors: FieldError[];

  constructor(message: string, options: { code: ErrorCode; errors?: FieldError[] }) {
    super(message);
    this.name = "RelevanceError";
    this.code = options.code;
    this.errors = options.errors ?? [];
  }
}

/**
 * A parameter is outside its domain: non-positive half-life, `total < successes`,
 * a confidence level outside (0, 1), and the like. Raised immediately, never corrected.
 */
export class InvalidInputError extends RelevanceError {
  constructor(errors: FieldError[]) {
    super(errors.map((e) => `${e.path} ${e.message}`).join("; "), { code: "INVALID_INPUT", errors });
    this.name = "InvalidInputError";
  }

  static field(path: string, message: string): InvalidInputError {
    return new InvalidInputError([{ path, message }]);
  }
}

export interface Problem {
  type: string;
  title: string;
  detail: string;
  code: string;
  errors?: FieldError[];
}

/** Problem-details view of an error, for collaborators that report failures. */
export function toProblem(error: unknown): Problem {
  if (error instanceof RelevanceError) {
    return {
      type: `urn:relevance-kit:${error.code.toLowerCase().replace(/_/g, "-")}`,
      title: codeToTitle(error.code),
      detail: error.message,
      code: error.code,
      errors: error.errors.length ? error.errors : undefined,
    };
  }
  return {
    type: "urn:relevance-kit:internal",
    title: codeToTitle("INTERNAL"),
    detail: error instanceof Error ? error.message : String(error),
    code: "INTERNAL",
  };
}

function codeToTitle(code: string): string {
  switch (code) {
    case "INVALID_INPUT":
      return "Invalid input";
    default:
      return "Internal error";
  }
}
