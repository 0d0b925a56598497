/**
 * Wall-clock timestamp handling for the furnace API.
 *
 * The API reports `MM/DD/YYYY hh:mm:ss AM|PM` in the plant's local zone.
 * Conversion to UTC goes through Intl so any IANA zone (DST included)
 * works without a date library.
 */

export interface WallClockTime {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  /** 0-23 */
  hour: number;
  minute: number;
  second: number;
}

const TIMELOGGED_PATTERN =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{2}):(\d{2})\s*([AP]M)$/i;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Parse `05/29/2025 01:15:00 PM`. Returns null for any other shape or an
 * impossible calendar value.
 */
export function parseTimelogged(value: string): WallClockTime | null {
  const match = TIMELOGGED_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, mm, dd, yyyy, hh, min, ss, meridiem] = match;
  const month = Number(mm);
  const day = Number(dd);
  const year = Number(yyyy);
  const hour12 = Number(hh);
  const minute = Number(min);
  const second = Number(ss);

  if (hour12 < 1 || hour12 > 12 || minute > 59 || second > 59) return null;

  const isPm = meridiem.toUpperCase() === 'PM';
  const hour = (hour12 % 12) + (isPm ? 12 : 0);

  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day, hour, minute, second };
}

/**
 * Offset of `timeZone` from UTC at `instantMs`, in milliseconds.
 */
function zoneOffsetMs(timeZone: string, instantMs: number): number {
  const parts = formatterFor(timeZone).formatToParts(new Date(instantMs));
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value);

  const asUtc = Date.UTC(
    part('year'),
    part('month') - 1,
    part('day'),
    part('hour'),
    part('minute'),
    part('second'),
  );
  return asUtc - Math.floor(instantMs / 1000) * 1000;
}

/**
 * Interpret a wall-clock time in `timeZone` and return the UTC instant.
 * Wall times inside a DST gap or overlap resolve to an adjacent valid
 * instant.
 */
export function zonedTimeToUtc(wall: WallClockTime, timeZone: string): Date {
  const guess = Date.UTC(
    wall.year,
    wall.month - 1,
    wall.day,
    wall.hour,
    wall.minute,
    wall.second,
  );
  const firstOffset = zoneOffsetMs(timeZone, guess);
  let utc = guess - firstOffset;
  const secondOffset = zoneOffsetMs(timeZone, utc);
  if (secondOffset !== firstOffset) {
    utc = guess - secondOffset;
  }
  return new Date(utc);
}

export function parseLocalTimestamp(
  value: string,
  timeZone: string,
): Date | null {
  const wall = parseTimelogged(value);
  return wall ? zonedTimeToUtc(wall, timeZone) : null;
}

/**
 * Unix seconds, truncated.
 */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
