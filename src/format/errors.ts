/**
 * Format engine errors.
 *
 * @module format/errors
 */

export type TemplateErrorCode =
  | "UNCLOSED_GROUP"
  | "MISSING_STYLE"
  | "UNEXPECTED_TOKEN"
  | "EMPTY_VARIABLE"
  | "DANGLING_ESCAPE"
  | "UNKNOWN_VARIABLE"
  | "INVALID_STYLE";

export class TemplateError extends Error {
  constructor(
    public readonly code: TemplateErrorCode,
    message: string,
    /** 1-based column in the format string, when known */
    public readonly column?: number
  ) {
    super(column === undefined ? message : `${message} at column ${column}`);
    this.name = 'TemplateError';
  }

  static is(error: unknown): error is TemplateError {
    return error instanceof TemplateError;
  }
}
