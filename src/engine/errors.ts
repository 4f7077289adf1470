export type CrosswordErrorCode =
  | "INVALID_STRUCTURE"
  | "INVALID_PUZZLE"
  | "UNREADABLE_INPUT"
  | "INVALID_VARIABLE"
  | "UNKNOWN_VARIABLE";

/**
 * Raised when puzzle input breaks the ingestion contract. Unsatisfiable
 * puzzles are reported through solve results, never through this error.
 */
export class CrosswordError extends Error {
  readonly code: CrosswordErrorCode;
  readonly details?: unknown;

  constructor(message: string, code: CrosswordErrorCode, details?: unknown) {
    super(message);
    this.name = "CrosswordError";
    this.code = code;
    this.details = details;
  }
}
