/**
 * Error types for jsonfields
 *
 * Two families live here. `JsonFieldsError` subclasses signal programming or
 * configuration mistakes and propagate to the caller. `ValidationError` and
 * `StopValidation` are the control flow of a validation chain: fields catch
 * them and record their messages.
 */

/**
 * Base class for configuration and usage errors
 */
export abstract class JsonFieldsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when JSON text handed to a container cannot be parsed
 */
export class InvalidJsonError extends JsonFieldsError {
  /** The text that failed to parse */
  readonly source: string;

  constructor(message: string, source: string) {
    super(message);
    this.source = source;
  }
}

/**
 * Thrown when a field declaration is used in a way the field does not accept
 */
export class FieldConfigurationError extends JsonFieldsError {}

/**
 * Thrown when a list field would grow past its maxEntries
 */
export class EntryLimitError extends JsonFieldsError {
  readonly maxEntries: number;

  constructor(message: string, maxEntries: number) {
    super(message);
    this.maxEntries = maxEntries;
  }
}

/**
 * Thrown when populateObj cannot write a field onto the target
 */
export class PopulateError extends JsonFieldsError {}

/**
 * Raised by a validator when a field's value is invalid.
 * The message is appended to the field's errors and the chain continues.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised by a validator to end the validation chain.
 * A non-empty message is recorded; an empty one stops silently.
 */
export class StopValidation extends Error {
  constructor(message = '') {
    super(message);
    this.name = 'StopValidation';
  }
}
