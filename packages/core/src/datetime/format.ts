/**
 * strptime/strftime-style parsing and formatting for naive dates and times.
 *
 * Supported directives: %Y %y %m %d %H %I %M %S %f %p %b %B %j %%.
 * Whitespace in a format matches one or more whitespace characters.
 * Parsing is case-insensitive and must consume the whole input.
 */

import type { CalendarDate, LocalDateTime, TimeOfDay } from './types.js';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const MONTH_ABBREVIATIONS = MONTH_NAMES.map((name) => name.slice(0, 3));

type Directive = 'Y' | 'y' | 'm' | 'd' | 'H' | 'I' | 'M' | 'S' | 'f' | 'p' | 'b' | 'B' | 'j';

const DIRECTIVE_PATTERNS: Record<Directive, string> = {
  Y: '\\d\\d\\d\\d',
  y: '\\d\\d',
  m: '1[0-2]|0[1-9]|[1-9]',
  d: '3[01]|[12]\\d|0[1-9]|[1-9]| [1-9]',
  H: '2[0-3]|[0-1]\\d|\\d',
  I: '1[0-2]|0[1-9]|[1-9]',
  M: '[0-5]\\d|\\d',
  S: '6[0-1]|[0-5]\\d|\\d',
  f: '[0-9]{1,6}',
  p: 'am|pm',
  b: MONTH_ABBREVIATIONS.join('|'),
  B: MONTH_NAMES.join('|'),
  j: '36[0-6]|3[0-5]\\d|[12]\\d\\d|0[1-9]\\d|00[1-9]|[1-9]\\d|0[1-9]|[1-9]',
};

function isDirective(char: string): char is Directive {
  return char in DIRECTIVE_PATTERNS;
}

interface CompiledFormat {
  regex: RegExp;
  directives: Directive[];
}

const compiledFormats = new Map<string, CompiledFormat>();

function compileFormat(format: string): CompiledFormat {
  const cached = compiledFormats.get(format);
  if (cached) return cached;

  const directives: Directive[] = [];
  let source = '';

  for (let i = 0; i < format.length; i++) {
    const char = format[i];
    if (char === '%') {
      const next = format[i + 1];
      i++;
      if (next === '%') {
        source += '%';
      } else if (next !== undefined && isDirective(next)) {
        if (directives.includes(next)) {
          throw new RangeError(`Directive %${next} appears more than once in format '${format}'`);
        }
        directives.push(next);
        source += `(${DIRECTIVE_PATTERNS[next]})`;
      } else {
        throw new RangeError(`Unsupported directive %${next ?? ''} in format '${format}'`);
      }
    } else if (/\s/.test(char)) {
      source += '\\s+';
      while (i + 1 < format.length && /\s/.test(format[i + 1])) i++;
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    }
  }

  const compiled = { regex: new RegExp(`^${source}$`, 'i'), directives };
  compiledFormats.set(format, compiled);
  return compiled;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function monthIndex(name: string, names: readonly string[]): number {
  const lower = name.toLowerCase();
  return names.findIndex((candidate) => candidate.toLowerCase() === lower) + 1;
}

/**
 * Parse text with a strptime-style format.
 * Parts the format doesn't mention default to 1900-01-01 00:00:00.
 *
 * @throws {RangeError} If the text doesn't match the format or names an impossible date
 *
 * @example
 * ```ts
 * parseDateTime('05/07 2008', '%m/%d %Y')
 * // => { year: 2008, month: 5, day: 7, hour: 0, minute: 0, second: 0, microsecond: 0 }
 * ```
 */
export function parseDateTime(text: string, format: string): LocalDateTime {
  const { regex, directives } = compileFormat(format);
  const match = regex.exec(text);
  if (!match) {
    throw new RangeError(`'${text}' does not match format '${format}'`);
  }

  const result: LocalDateTime = {
    year: 1900,
    month: 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    microsecond: 0,
  };
  let hour12: number | null = null;
  let pm: boolean | null = null;
  let dayOfYear: number | null = null;
  let monthOrDayGiven = false;

  for (let index = 0; index < directives.length; index++) {
    const directive = directives[index];
    const value = match[index + 1];
    switch (directive) {
      case 'Y':
        result.year = Number(value);
        break;
      case 'y': {
        const short = Number(value);
        result.year = short <= 68 ? 2000 + short : 1900 + short;
        break;
      }
      case 'm':
        result.month = Number(value);
        monthOrDayGiven = true;
        break;
      case 'b':
        result.month = monthIndex(value, MONTH_ABBREVIATIONS);
        monthOrDayGiven = true;
        break;
      case 'B':
        result.month = monthIndex(value, MONTH_NAMES);
        monthOrDayGiven = true;
        break;
      case 'd':
        result.day = Number(value.trim());
        monthOrDayGiven = true;
        break;
      case 'H':
        result.hour = Number(value);
        break;
      case 'I':
        hour12 = Number(value);
        break;
      case 'p':
        pm = value.toLowerCase() === 'pm';
        break;
      case 'M':
        result.minute = Number(value);
        break;
      case 'S':
        result.second = Number(value);
        break;
      case 'f':
        result.microsecond = Number(value.padEnd(6, '0'));
        break;
      case 'j':
        dayOfYear = Number(value);
        break;
    }
  }

  if (hour12 !== null) {
    result.hour = hour12 % 12 + (pm ? 12 : 0);
  }

  if (result.second > 59) {
    throw new RangeError(`'${text}' has a leap second, which is not supported`);
  }

  if (dayOfYear !== null && !monthOrDayGiven) {
    const yearLength = isLeapYear(result.year) ? 366 : 365;
    if (dayOfYear > yearLength) {
      throw new RangeError(`Day of year ${dayOfYear} is out of range for ${result.year}`);
    }
    let remaining = dayOfYear;
    let month = 1;
    while (remaining > daysInMonth(result.year, month)) {
      remaining -= daysInMonth(result.year, month);
      month++;
    }
    result.month = month;
    result.day = remaining;
  }

  if (result.day > daysInMonth(result.year, result.month)) {
    throw new RangeError(`Day ${result.day} is out of range for month ${result.month} of ${result.year}`);
  }

  return result;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function dayOfYearOf(year: number, month: number, day: number): number {
  let total = day;
  for (let m = 1; m < month; m++) total += daysInMonth(year, m);
  return total;
}

/**
 * Format a date, time or date-time with a strftime-style format.
 * Parts missing from the value format as 1900-01-01 00:00:00.
 */
export function formatDateTime(
  value: Partial<CalendarDate> & Partial<TimeOfDay>,
  format: string,
): string {
  const year = value.year ?? 1900;
  const month = value.month ?? 1;
  const day = value.day ?? 1;
  const hour = value.hour ?? 0;
  const minute = value.minute ?? 0;
  const second = value.second ?? 0;
  const microsecond = value.microsecond ?? 0;

  let output = '';
  for (let i = 0; i < format.length; i++) {
    const char = format[i];
    if (char !== '%') {
      output += char;
      continue;
    }
    const next = format[++i];
    switch (next) {
      case 'Y':
        output += pad(year, 4);
        break;
      case 'y':
        output += pad(year % 100, 2);
        break;
      case 'm':
        output += pad(month, 2);
        break;
      case 'd':
        output += pad(day, 2);
        break;
      case 'H':
        output += pad(hour, 2);
        break;
      case 'I':
        output += pad(hour % 12 === 0 ? 12 : hour % 12, 2);
        break;
      case 'p':
        output += hour < 12 ? 'AM' : 'PM';
        break;
      case 'M':
        output += pad(minute, 2);
        break;
      case 'S':
        output += pad(second, 2);
        break;
      case 'f':
        output += pad(microsecond, 6);
        break;
      case 'b':
        output += MONTH_ABBREVIATIONS[month - 1];
        break;
      case 'B':
        output += MONTH_NAMES[month - 1];
        break;
      case 'j':
        output += pad(dayOfYearOf(year, month, day), 3);
        break;
      case '%':
        output += '%';
        break;
      default:
        throw new RangeError(`Unsupported directive %${next ?? ''} in format '${format}'`);
    }
  }
  return output;
}

export function toCalendarDate(value: LocalDateTime): CalendarDate {
  return { year: value.year, month: value.month, day: value.day };
}

export function toTimeOfDay(value: LocalDateTime): TimeOfDay {
  return {
    hour: value.hour,
    minute: value.minute,
    second: value.second,
    microsecond: value.microsecond,
  };
}
