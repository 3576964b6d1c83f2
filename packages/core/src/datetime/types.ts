/** A calendar day without a time zone */
export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
}

/** A wall-clock time without a time zone */
export interface TimeOfDay {
  hour: number; // 0-23
  minute: number;
  second: number;
  microsecond: number; // 0-999999
}

/** A calendar day and wall-clock time without a time zone */
export interface LocalDateTime extends CalendarDate, TimeOfDay {}
