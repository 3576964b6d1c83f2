// Scalar fields: strings, numbers and booleans

import { ValidationError } from '../errors.js';
import { isBlank } from '../utils.js';
import { Field } from './field.js';
import type { FieldBinding, FieldOptions } from './types.js';

/**
 * Text field. Non-string JSON values become the empty string.
 */
export class StringField extends Field {
  override processJsondata(value: unknown): void {
    this.data = typeof value === 'string' ? value : '';
  }

  override processMissing(): void {
    this.data = '';
  }
}

const INTEGER_PATTERN = /^[-+]?\d+$/;
const FLOAT_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Accept integral numbers and strings of digits with an optional sign
 */
export function parseInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Accept finite numbers and decimal/exponent strings
 */
export function parseFloatValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!FLOAT_PATTERN.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Integer field; numeric strings are coerced.
 */
export class IntegerField extends Field {
  override processJsondata(value: unknown): void {
    const parsed = parseInteger(value);
    if (parsed === null) {
      this.data = null;
      throw new ValidationError(this.gettext('Not a valid integer value'));
    }
    this.data = parsed;
  }
}

/**
 * Floating point field; numeric strings are coerced.
 */
export class FloatField extends Field {
  override processJsondata(value: unknown): void {
    const parsed = parseFloatValue(value);
    if (parsed === null) {
      this.data = null;
      throw new ValidationError(this.gettext('Not a valid float value'));
    }
    this.data = parsed;
  }
}

export interface BooleanFieldOptions extends FieldOptions {
  /** JSON values (besides blank ones) that mean false. Defaults to `['false', '']` */
  falseValues?: readonly unknown[];
}

export class BooleanField extends Field {
  static readonly DEFAULT_FALSE_VALUES: readonly unknown[] = ['false', ''];

  readonly falseValues: readonly unknown[];

  constructor(binding: FieldBinding, options: BooleanFieldOptions = {}) {
    super(binding, options);
    this.falseValues = options.falseValues ?? BooleanField.DEFAULT_FALSE_VALUES;
  }

  override processData(value: unknown): void {
    this.data = !isBlank(value);
  }

  override processJsondata(value: unknown): void {
    this.data = !(isBlank(value) || this.falseValues.includes(value));
  }

  override processMissing(): void {
    this.data = false;
  }
}
