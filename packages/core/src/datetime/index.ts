export {
  daysInMonth,
  formatDateTime,
  isLeapYear,
  parseDateTime,
  toCalendarDate,
  toTimeOfDay,
} from './format.js';
export type { CalendarDate, LocalDateTime, TimeOfDay } from './types.js';
