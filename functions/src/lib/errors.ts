/**
 * Thrown when the deadline engine receives a value it cannot work with
 * (not a calendar date, a negative buffer, a bad complexity factor).
 * Callers are expected to pass validated dates; this is a programming error,
 * not an extraction miss.
 */
export class DeadlineInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "DeadlineInputError";
    this.field = field;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** A request body that could not be read at all. */
export class RequestBodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestBodyError";
  }
}
