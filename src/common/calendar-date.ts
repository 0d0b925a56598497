import { InvalidRangeError } from './pipeline-error';

/**
 * A calendar day with no time or zone attached.
 */
export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

const CLI_DATE_PATTERN = /^(\d{2})-(\d{2})-(\d{4})$/;

const pad = (value: number, width = 2): string =>
  String(value).padStart(width, '0');

function toUtcMs(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day);
}

function fromUtcMs(ms: number): CalendarDate {
  const d = new Date(ms);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
  };
}

/**
 * Parse `MM-DD-YYYY`.
 *
 * @throws InvalidRangeError for another shape or an impossible date
 */
export function parseCalendarDate(value: string): CalendarDate {
  const match = CLI_DATE_PATTERN.exec(value.trim());
  if (match) {
    const date = {
      year: Number(match[3]),
      month: Number(match[1]),
      day: Number(match[2]),
    };
    if (isSameDate(fromUtcMs(toUtcMs(date)), date)) {
      return date;
    }
  }
  throw new InvalidRangeError(`Invalid date '${value}', expected MM-DD-YYYY`);
}

/** `MM-DD-YYYY`, the API's and the ledger's date format */
export function formatCalendarDate(date: CalendarDate): string {
  return `${pad(date.month)}-${pad(date.day)}-${pad(date.year, 4)}`;
}

/** `YYYY-MM-DD`, used in file names so they sort */
export function formatIsoDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

export function utcDateOf(instant: Date): CalendarDate {
  return fromUtcMs(instant.getTime());
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtcMs(toUtcMs(date) + days * 86_400_000);
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toUtcMs(a) - toUtcMs(b);
}

export function isSameDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

/**
 * Every date from `start` to `end`, both included. Empty when start > end.
 */
export function datesBetween(
  start: CalendarDate,
  end: CalendarDate,
): CalendarDate[] {
  const dates: CalendarDate[] = [];
  for (let d = start; compareDates(d, end) <= 0; d = addDays(d, 1)) {
    dates.push(d);
  }
  return dates;
}
