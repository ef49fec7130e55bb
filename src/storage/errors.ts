/**
 * Storage error types.
 */

/**
 * Why a program could not be loaded.
 *
 * - 'not-found': the data file does not exist
 * - 'unreadable': the file exists but could not be read
 * - 'invalid-json': the content is not JSON
 * - 'invalid-document': the JSON does not have the expected shape
 * - 'invariant-violation': the data describes an impossible program
 *   (e.g. a module with four attempts)
 */
export type ProgramLoadErrorKind =
  | 'not-found'
  | 'unreadable'
  | 'invalid-json'
  | 'invalid-document'
  | 'invariant-violation';

/**
 * Raised by a repository when loading fails.
 */
export class ProgramLoadError extends Error {
  /** The kind of failure */
  readonly kind: ProgramLoadErrorKind;

  constructor(message: string, kind: ProgramLoadErrorKind, cause?: unknown) {
    super(message, { cause });
    this.name = 'ProgramLoadError';
    this.kind = kind;
  }
}

/**
 * Raised by a repository when saving fails. The previous file content is
 * left in place.
 */
export class ProgramSaveError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ProgramSaveError';
  }
}
