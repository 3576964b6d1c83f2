import { ValidationError } from '../errors.js';
import {
  formatDateTime,
  parseDateTime,
  toCalendarDate,
  toTimeOfDay,
  type CalendarDate,
  type LocalDateTime,
  type TimeOfDay,
} from '../datetime/index.js';
import { isBlank, isPlainObject } from '../utils.js';
import { Field } from './field.js';
import type { FieldBinding, FieldOptions } from './types.js';

export interface DateTimeFieldOptions extends FieldOptions {
  /** strptime-style format, see `parseDateTime` */
  format?: string;
}

const PART_NAMES = ['year', 'month', 'day', 'hour', 'minute', 'second', 'microsecond'] as const;

function isDateTimeParts(value: unknown): value is Partial<CalendarDate> & Partial<TimeOfDay> {
  if (!isPlainObject(value)) return false;
  const present = PART_NAMES.filter((part) => value[part] !== undefined);
  return present.length > 0 && present.every((part) => typeof value[part] === 'number');
}

/**
 * A string field that stores a `LocalDateTime` matching a format.
 */
export class DateTimeField extends Field {
  readonly format: string;

  constructor(binding: FieldBinding, options: DateTimeFieldOptions = {}) {
    super(binding, options);
    this.format = options.format ?? '%Y-%m-%d %H:%M:%S';
  }

  /** The JSON string when there was one, otherwise the data formatted */
  override value(): string {
    if (typeof this.rawData === 'string' && this.rawData) {
      return this.rawData;
    }
    return isDateTimeParts(this.data) ? formatDateTime(this.data, this.format) : '';
  }

  override processJsondata(value: unknown): void {
    if (isBlank(value)) return;

    if (typeof value === 'string') {
      try {
        this.data = this.convert(parseDateTime(value, this.format));
        return;
      } catch (error) {
        if (!(error instanceof RangeError)) throw error;
      }
    }

    this.data = null;
    throw new ValidationError(this.gettext(this.invalidMessage()));
  }

  protected convert(parsed: LocalDateTime): LocalDateTime | CalendarDate | TimeOfDay {
    return parsed;
  }

  protected invalidMessage(): string {
    return 'Not a valid datetime value';
  }
}

/**
 * Same as DateTimeField, except it stores a `CalendarDate`.
 */
export class DateField extends DateTimeField {
  constructor(binding: FieldBinding, options: DateTimeFieldOptions = {}) {
    super(binding, { ...options, format: options.format ?? '%Y-%m-%d' });
  }

  protected override convert(parsed: LocalDateTime): CalendarDate {
    return toCalendarDate(parsed);
  }

  protected override invalidMessage(): string {
    return 'Not a valid date value';
  }
}

/**
 * Same as DateTimeField, except it stores a `TimeOfDay`.
 */
export class TimeField extends DateTimeField {
  constructor(binding: FieldBinding, options: DateTimeFieldOptions = {}) {
    super(binding, { ...options, format: options.format ?? '%H:%M' });
  }

  protected override convert(parsed: LocalDateTime): TimeOfDay {
    return toTimeOfDay(parsed);
  }

  protected override invalidMessage(): string {
    return 'Not a valid time value';
  }
}
