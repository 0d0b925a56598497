/**
 * Injection tokens for the store-facing collaborators.
 */
export const TIME_SERIES_STORE = Symbol('TIME_SERIES_STORE');
export const EXISTENCE_CHECKER = Symbol('EXISTENCE_CHECKER');

/**
 * TimeSeriesStore - accepts one batch of line protocol per call.
 *
 * A call either commits the whole batch or rejects; retrying is the
 * caller's decision. Writes must be idempotent per
 * (measurement, tags, timestamp): the store replaces values on duplicate
 * timestamps.
 */
export interface TimeSeriesStore {
  writeLines(lines: string[]): Promise<void>;
}

/**
 * ExistenceChecker - duplicate suppression when override mode is off.
 *
 * Returns the stored values of the point at `timestamp` (UTC epoch
 * seconds) for the requested fields; fields with no stored value are
 * absent from the map.
 */
export interface ExistenceChecker {
  storedFields(
    measurement: string,
    tags: Record<string, string>,
    timestamp: number,
    fields: string[],
  ): Promise<Map<string, number>>;
}
