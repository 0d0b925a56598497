import { CalendarDate } from '../common/calendar-date';

export const PAYLOAD_SOURCE = Symbol('PAYLOAD_SOURCE');

/**
 * Intra-day windows the daily endpoint serves: 1 = 00:00-12:00,
 * 2 = 12:00-24:00.
 */
export const DAY_RANGES = [1, 2] as const;
export type DayRange = (typeof DAY_RANGES)[number];

/**
 * PayloadSource - where raw payload strings come from.
 *
 * Implementations reject with FetchError once their own retries are spent.
 */
export interface PayloadSource {
  fetchLive(): Promise<string>;
  fetchDaily(date: CalendarDate, range: DayRange): Promise<string>;
}
