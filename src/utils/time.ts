import dayjs from 'dayjs';
import type { Dayjs } from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';

dayjs.extend(utc);
dayjs.extend(timezone);

export { dayjs };

const pad = (n: number) => String(n).padStart(2, '0');

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Wall-clock time in `zone`. Returns null instead of rolling over when a
 * component is out of range (31 April, 24:00).
 */
export function zonedDateTime(
  zone: string,
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second = 0
): Dayjs | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  return dayjs.tz(
    `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`,
    zone
  );
}

/** Calendar date of `instant` in `zone`, shifted by whole days. */
export function zonedCalendarDate(
  instant: Date,
  zone: string,
  offsetDays = 0
): { year: number; month: number; day: number } {
  const local = dayjs(instant).tz(zone);
  const shifted = new Date(Date.UTC(local.year(), local.month(), local.date() + offsetDays));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

/** Converts a 12-hour clock reading; null for "13 PM" and "0 AM". */
export function to24Hour(hour: number, meridiem: string | undefined): number | null {
  if (!meridiem) return hour;
  if (hour < 1 || hour > 12) return null;
  const pm = /^(pm|午後)$/i.test(meridiem);
  return (hour % 12) + (pm ? 12 : 0);
}
