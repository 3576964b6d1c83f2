import { describe, expect, it } from 'vitest';
import {
  daysInMonth,
  formatDateTime,
  isLeapYear,
  parseDateTime,
  toCalendarDate,
  toTimeOfDay,
} from '../src/datetime/index.js';

describe('parseDateTime', () => {
  it('should parse a full date and time', () => {
    expect(parseDateTime('2024-03-09 15:04:05.000042', '%Y-%m-%d %H:%M:%S.%f')).toEqual({
      year: 2024,
      month: 3,
      day: 9,
      hour: 15,
      minute: 4,
      second: 5,
      microsecond: 42,
    });
  });

  it('should default the parts the format leaves out', () => {
    expect(parseDateTime('10:30', '%H:%M')).toEqual({
      year: 1900,
      month: 1,
      day: 1,
      hour: 10,
      minute: 30,
      second: 0,
      microsecond: 0,
    });
  });

  it('should pad short fractions', () => {
    expect(parseDateTime('1.5', '%S.%f').microsecond).toBe(500000);
  });

  it('should map two-digit years around 1969', () => {
    expect(parseDateTime('69', '%y').year).toBe(1969);
    expect(parseDateTime('68', '%y').year).toBe(2068);
    expect(parseDateTime('00', '%y').year).toBe(2000);
  });

  it('should combine 12-hour clocks with AM and PM', () => {
    expect(parseDateTime('12:15 AM', '%I:%M %p').hour).toBe(0);
    expect(parseDateTime('12:15 PM', '%I:%M %p').hour).toBe(12);
    expect(parseDateTime('01:00 pm', '%I:%M %p').hour).toBe(13);
    expect(parseDateTime('7', '%I').hour).toBe(7);
  });

  it('should read month names in any case', () => {
    expect(parseDateTime('09 MARCH 2024', '%d %B %Y').month).toBe(3);
    expect(parseDateTime('sep 1 2024', '%b %d %Y').month).toBe(9);
  });

  it('should turn a day of the year into a date', () => {
    expect(toCalendarDate(parseDateTime('060 2024', '%j %Y'))).toEqual({ year: 2024, month: 2, day: 29 });
    expect(toCalendarDate(parseDateTime('060 2023', '%j %Y'))).toEqual({ year: 2023, month: 3, day: 1 });
    expect(() => parseDateTime('366 2023', '%j %Y')).toThrow(RangeError);
  });

  it('should reject impossible dates', () => {
    expect(() => parseDateTime('2023-02-29', '%Y-%m-%d')).toThrow(
      'Day 29 is out of range for month 2 of 2023',
    );
    expect(() => parseDateTime('23:59:60', '%H:%M:%S')).toThrow(RangeError);
    expect(() => parseDateTime('2024-13-01', '%Y-%m-%d')).toThrow(
      "'2024-13-01' does not match format '%Y-%m-%d'",
    );
  });

  it('should let whitespace match any run of whitespace', () => {
    expect(parseDateTime('2024-03-09   10:00', '%Y-%m-%d %H:%M').hour).toBe(10);
    expect(() => parseDateTime('2024-03-0910:00', '%Y-%m-%d %H:%M')).toThrow(RangeError);
  });

  it('should match the whole text', () => {
    expect(() => parseDateTime('2024-03-09x', '%Y-%m-%d')).toThrow(RangeError);
    expect(() => parseDateTime('x2024-03-09', '%Y-%m-%d')).toThrow(RangeError);
  });

  it('should match literal characters', () => {
    expect(parseDateTime('5%', '%d%%').day).toBe(5);
    expect(parseDateTime('(2024)', '(%Y)').year).toBe(2024);
  });

  it('should reject bad formats', () => {
    expect(() => parseDateTime('x', '%Q')).toThrow("Unsupported directive %Q in format '%Q'");
    expect(() => parseDateTime('2024 2024', '%Y %Y')).toThrow(
      "Directive %Y appears more than once in format '%Y %Y'",
    );
  });
});

describe('formatDateTime', () => {
  const value = { year: 2024, month: 3, day: 9, hour: 15, minute: 4, second: 5, microsecond: 42 };

  it('should format numeric directives', () => {
    expect(formatDateTime(value, '%Y-%m-%d %H:%M:%S.%f')).toBe('2024-03-09 15:04:05.000042');
    expect(formatDateTime(value, '%y')).toBe('24');
  });

  it('should format 12-hour clocks', () => {
    expect(formatDateTime(value, '%I %p')).toBe('03 PM');
    expect(formatDateTime({ hour: 0 }, '%I %p')).toBe('12 AM');
  });

  it('should format names and the day of the year', () => {
    expect(formatDateTime(value, '%b %B %j')).toBe('Mar March 069');
  });

  it('should default missing parts', () => {
    expect(formatDateTime({ hour: 9, minute: 30 }, '%Y-%m-%d %H:%M')).toBe('1900-01-01 09:30');
  });

  it('should write a literal percent sign', () => {
    expect(formatDateTime(value, '100%%')).toBe('100%');
  });

  it('should reject unsupported directives', () => {
    expect(() => formatDateTime(value, '%Q')).toThrow(RangeError);
  });
});

describe('calendar helpers', () => {
  it('should know leap years', () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2023)).toBe(false);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
  });

  it('should count days per month', () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2023, 4)).toBe(30);
    expect(daysInMonth(2023, 12)).toBe(31);
  });

  it('should split a date-time', () => {
    const parsed = parseDateTime('2024-03-09 15:04', '%Y-%m-%d %H:%M');
    expect(toCalendarDate(parsed)).toEqual({ year: 2024, month: 3, day: 9 });
    expect(toTimeOfDay(parsed)).toEqual({ hour: 15, minute: 4, second: 0, microsecond: 0 });
  });
});
