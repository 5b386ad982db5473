/**
 * Error shapes shared across the codec and file helpers.
 *
 * Expected failures are returned as `{ error: StructuredError }` values;
 * only the file helpers throw, wrapping the same structure.
 */

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
}

export type ErrorResult = { error: StructuredError };

/** Narrow a `T | { error }` result to its error branch. */
export function isStructuredError<T extends object>(result: T | ErrorResult): result is ErrorResult {
  return "error" in result;
}

export class DiagramFileError extends Error {
  readonly code: string;
  readonly suggestion: string | undefined;

  constructor(readonly path: string, error: StructuredError) {
    super(`${path}: ${error.message}`);
    this.name = "DiagramFileError";
    this.code = error.code;
    this.suggestion = error.suggestion;
  }
}
