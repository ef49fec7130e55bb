/**
 * Domain error types.
 */

/**
 * Raised when an entity would be constructed or mutated into a state that
 * violates one of its invariants. The entity is left unchanged.
 */
export class DomainValidationError extends Error {
  /** Name of the offending field, e.g. 'credits' or 'grade' */
  readonly field: string;
  /** The rejected value */
  readonly value: unknown;

  constructor(field: string, value: unknown, message: string) {
    super(message);
    this.name = 'DomainValidationError';
    this.field = field;
    this.value = value;
  }
}
