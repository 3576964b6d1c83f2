/**
 * Built-in validators.
 *
 * Default messages are English and go through the field's translations;
 * a custom `message` is used as given. Both may contain `{name}`
 * placeholders for the values listed on each validator.
 */

import { isIPv4, isIPv6 } from 'node:net';
import { domainToASCII } from 'node:url';
import { FieldConfigurationError, StopValidation, ValidationError } from '../errors.js';
import type { Field } from '../fields/field.js';
import type { BaseJson } from '../json/base-json.js';
import { deepEqual, interpolate, isBlank } from '../utils.js';
import type { ValidatorObject } from './types.js';

export interface MessageOptions {
  message?: string;
}

function isEmptyInput(value: unknown, stripWhitespace: boolean): boolean {
  if (value === undefined || value === null || value === '') return true;
  return stripWhitespace && typeof value === 'string' && value.trim() === '';
}

/**
 * Fails when the field's processed data is blank (or a whitespace-only
 * string), clearing earlier errors and stopping the chain.
 */
export class DataRequired implements ValidatorObject {
  readonly fieldFlags = ['required'];
  readonly message?: string;

  constructor(options: MessageOptions = {}) {
    this.message = options.message;
  }

  validate(_json: BaseJson, field: Field): void {
    const data = field.data;
    if (isBlank(data) || (typeof data === 'string' && data.trim() === '')) {
      field.clearErrors();
      throw new StopValidation(this.message ?? field.gettext('This field is required.'));
    }
  }
}

/**
 * Fails when the JSON input has no value for the field. Unlike
 * DataRequired this looks at the raw input, so `0` and `false` pass.
 */
export class InputRequired implements ValidatorObject {
  readonly fieldFlags = ['required'];
  readonly message?: string;

  constructor(options: MessageOptions = {}) {
    this.message = options.message;
  }

  validate(_json: BaseJson, field: Field): void {
    if (isEmptyInput(field.rawData, false)) {
      field.clearErrors();
      throw new StopValidation(this.message ?? field.gettext('This field is required.'));
    }
  }
}

export interface OptionalOptions {
  /** Treat whitespace-only strings as empty. Defaults to true */
  stripWhitespace?: boolean;
}

/**
 * Allows empty input: when there is none, earlier errors are cleared and
 * the remaining validators are skipped.
 */
export class Optional implements ValidatorObject {
  readonly fieldFlags = ['optional'];
  readonly stripWhitespace: boolean;

  constructor(options: OptionalOptions = {}) {
    this.stripWhitespace = options.stripWhitespace ?? true;
  }

  validate(_json: BaseJson, field: Field): void {
    if (isEmptyInput(field.rawData, this.stripWhitespace)) {
      field.clearErrors();
      throw new StopValidation();
    }
  }
}

export interface RangeOptions extends MessageOptions {
  min?: number;
  max?: number;
}

function rangeParams(min: number | undefined, max: number | undefined): Record<string, unknown> {
  return {
    ...(min !== undefined ? { min } : {}),
    ...(max !== undefined ? { max } : {}),
  };
}

function checkRange(name: string, min: number | undefined, max: number | undefined): void {
  if (min === undefined && max === undefined) {
    throw new FieldConfigurationError(`${name} needs at least one of min or max`);
  }
  if (min !== undefined && max !== undefined && max < min) {
    throw new FieldConfigurationError(`${name} max cannot be less than min`);
  }
}

/**
 * Length of a string or array. Placeholders: `{min}`, `{max}`, `{length}`.
 */
export class Length implements ValidatorObject {
  readonly min?: number;
  readonly max?: number;
  readonly message?: string;

  constructor(options: RangeOptions) {
    checkRange('Length', options.min, options.max);
    this.min = options.min;
    this.max = options.max;
    this.message = options.message;
  }

  validate(_json: BaseJson, field: Field): void {
    const data = field.data;
    const length = typeof data === 'string' || Array.isArray(data) ? data.length : 0;
    const { min, max } = this;

    if ((min === undefined || length >= min) && (max === undefined || length <= max)) {
      return;
    }

    let message: string;
    if (this.message !== undefined) {
      message = this.message;
    } else if (max === undefined) {
      message = field.ngettext(
        'Field must be at least {min} character long.',
        'Field must be at least {min} characters long.',
        min ?? 0,
      );
    } else if (min === undefined) {
      message = field.ngettext(
        'Field cannot be longer than {max} character.',
        'Field cannot be longer than {max} characters.',
        max,
      );
    } else if (min === max) {
      message = field.ngettext(
        'Field must be exactly {max} character long.',
        'Field must be exactly {max} characters long.',
        max,
      );
    } else {
      message = field.gettext('Field must be between {min} and {max} characters long.');
    }

    throw new ValidationError(interpolate(message, { ...rangeParams(min, max), length }));
  }
}

/**
 * Numeric data within bounds (inclusive). Non-numeric data fails.
 * Placeholders: `{min}`, `{max}`.
 */
export class NumberRange implements ValidatorObject {
  readonly min?: number;
  readonly max?: number;
  readonly message?: string;

  constructor(options: RangeOptions) {
    checkRange('NumberRange', options.min, options.max);
    this.min = options.min;
    this.max = options.max;
    this.message = options.message;
  }

  validate(_json: BaseJson, field: Field): void {
    const data = field.data;
    const { min, max } = this;

    if (
      typeof data === 'number' &&
      !Number.isNaN(data) &&
      (min === undefined || data >= min) &&
      (max === undefined || data <= max)
    ) {
      return;
    }

    let message: string;
    if (this.message !== undefined) {
      message = this.message;
    } else if (max === undefined) {
      message = field.gettext('Number must be at least {min}.');
    } else if (min === undefined) {
      message = field.gettext('Number must be at most {max}.');
    } else {
      message = field.gettext('Number must be between {min} and {max}.');
    }

    throw new ValidationError(interpolate(message, rangeParams(min, max)));
  }
}

/**
 * Data equal to another field's data in the same container.
 * Placeholders: `{otherName}`.
 */
export class EqualTo implements ValidatorObject {
  readonly fieldName: string;
  readonly message?: string;

  constructor(fieldName: string, options: MessageOptions = {}) {
    this.fieldName = fieldName;
    this.message = options.message;
  }

  validate(json: BaseJson, field: Field): void {
    if (!json.has(this.fieldName)) {
      throw new ValidationError(
        interpolate(field.gettext("Invalid field name '{name}'."), { name: this.fieldName }),
      );
    }

    const other = json.get(this.fieldName);
    if (!deepEqual(field.data, other.data)) {
      const message = this.message ?? field.gettext('Field must be equal to {otherName}.');
      throw new ValidationError(interpolate(message, { otherName: this.fieldName }));
    }
  }
}

export interface RegexpOptions extends MessageOptions {
  flags?: string;
}

/**
 * String data matching a pattern at its start. Non-string data is matched
 * as the empty string.
 */
export class Regexp implements ValidatorObject {
  readonly regex: RegExp;
  readonly message?: string;

  constructor(pattern: string | RegExp, options: RegexpOptions = {}) {
    const source = typeof pattern === 'string' ? pattern : pattern.source;
    const flags = options.flags ?? (typeof pattern === 'string' ? '' : pattern.flags);
    this.regex = new RegExp(source, `${flags.replace(/[gy]/g, '')}y`);
    this.message = options.message;
  }

  validate(_json: BaseJson, field: Field): void {
    const data = typeof field.data === 'string' ? field.data : '';
    this.regex.lastIndex = 0;
    if (!this.regex.test(data)) {
      throw new ValidationError(this.message ?? field.gettext(this.defaultMessage()));
    }
  }

  protected defaultMessage(): string {
    return 'Invalid input.';
  }
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class Email extends Regexp {
  constructor(options: MessageOptions = {}) {
    super(EMAIL_PATTERN, options);
  }

  protected override defaultMessage(): string {
    return 'Invalid email address.';
  }
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Canonical hyphenated UUID, any version */
export class UUID extends Regexp {
  constructor(options: MessageOptions = {}) {
    super(UUID_PATTERN, options);
  }

  protected override defaultMessage(): string {
    return 'Invalid UUID.';
  }
}

export interface IPAddressOptions extends MessageOptions {
  /** Defaults to true */
  ipv4?: boolean;
  /** Defaults to false */
  ipv6?: boolean;
}

export class IPAddress implements ValidatorObject {
  readonly ipv4: boolean;
  readonly ipv6: boolean;
  readonly message?: string;

  constructor(options: IPAddressOptions = {}) {
    this.ipv4 = options.ipv4 ?? true;
    this.ipv6 = options.ipv6 ?? false;
    if (!this.ipv4 && !this.ipv6) {
      throw new FieldConfigurationError('IPAddress needs at least one of ipv4 or ipv6 enabled');
    }
    this.message = options.message;
  }

  validate(_json: BaseJson, field: Field): void {
    const data = typeof field.data === 'string' ? field.data : '';
    const valid = (this.ipv4 && isIPv4(data)) || (this.ipv6 && isIPv6(data));
    if (!valid) {
      throw new ValidationError(this.message ?? field.gettext('Invalid IP address.'));
    }
  }
}

const URL_PATTERN = /^[a-z]+:\/\/(\[[0-9a-f:.]+\]|[^/:?#[\]]+)(:[0-9]+)?([/?#].*)?$/i;
const HOSTNAME_LABEL = /^(xn-|[a-z0-9]+)(-[a-z0-9]+)*$/i;
const TOP_LEVEL_LABEL = /^([a-z]{2,20}|xn--([a-z0-9]+-)*[a-z0-9]+)$/i;

/**
 * Check a host name label by label. IP addresses are accepted as they are.
 */
export function isValidHostname(host: string, requireTld: boolean): boolean {
  if (isIPv4(host) || isIPv6(host)) return true;

  const ascii = domainToASCII(host).replace(/\.$/, '');
  if (!ascii || ascii.length > 253) return false;

  const labels = ascii.split('.');
  for (const label of labels) {
    if (!label || label.length > 63 || !HOSTNAME_LABEL.test(label)) return false;
  }

  if (requireTld) {
    return labels.length >= 2 && TOP_LEVEL_LABEL.test(labels[labels.length - 1]);
  }
  return true;
}

export interface URLOptions extends MessageOptions {
  /** Require a dotted host name with a top-level domain. Defaults to true */
  requireTld?: boolean;
}

/** `scheme://host[:port][/path]` with a valid host */
export class URL implements ValidatorObject {
  readonly requireTld: boolean;
  readonly message?: string;

  constructor(options: URLOptions = {}) {
    this.requireTld = options.requireTld ?? true;
    this.message = options.message;
  }

  validate(_json: BaseJson, field: Field): void {
    const data = typeof field.data === 'string' ? field.data : '';
    const match = URL_PATTERN.exec(data);
    if (!match || !this.isValidHost(match[1])) {
      throw new ValidationError(this.message ?? field.gettext('Invalid URL.'));
    }
  }

  /** Bracketed hosts must be IPv6 literals */
  private isValidHost(host: string): boolean {
    if (host.startsWith('[')) {
      return isIPv6(host.slice(1, -1));
    }
    return isValidHostname(host, this.requireTld);
  }
}

export interface ChoiceOptions extends MessageOptions {
  /** Turns the allowed or forbidden values into text for `{values}`. Defaults to joining with ', ' */
  formatValues?: (values: readonly unknown[]) => string;
}

function joinValues(values: readonly unknown[]): string {
  return values.map((value) => String(value)).join(', ');
}

/** Data must equal one of the values. Placeholders: `{values}` */
export class AnyOf implements ValidatorObject {
  readonly values: readonly unknown[];
  readonly message?: string;
  private readonly formatValues: (values: readonly unknown[]) => string;

  constructor(values: readonly unknown[], options: ChoiceOptions = {}) {
    this.values = values;
    this.message = options.message;
    this.formatValues = options.formatValues ?? joinValues;
  }

  validate(_json: BaseJson, field: Field): void {
    if (!this.values.some((value) => deepEqual(value, field.data))) {
      const message = this.message ?? field.gettext('Invalid value, must be one of: {values}.');
      throw new ValidationError(interpolate(message, { values: this.formatValues(this.values) }));
    }
  }
}

/** Data must not equal any of the values. Placeholders: `{values}` */
export class NoneOf implements ValidatorObject {
  readonly values: readonly unknown[];
  readonly message?: string;
  private readonly formatValues: (values: readonly unknown[]) => string;

  constructor(values: readonly unknown[], options: ChoiceOptions = {}) {
    this.values = values;
    this.message = options.message;
    this.formatValues = options.formatValues ?? joinValues;
  }

  validate(_json: BaseJson, field: Field): void {
    if (this.values.some((value) => deepEqual(value, field.data))) {
      const message = this.message ?? field.gettext("Invalid value, can't be any of: {values}.");
      throw new ValidationError(interpolate(message, { values: this.formatValues(this.values) }));
    }
  }
}
