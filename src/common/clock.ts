/**
 * Injection tokens for time. Services never call `Date.now()` or
 * `setTimeout` directly so tests can drive cadence and backoff.
 */
export const CLOCK = Symbol('CLOCK');
export const SLEEP = Symbol('SLEEP');

export interface Clock {
  now(): Date;
}

export type Sleep = (ms: number) => Promise<void>;

export const systemClock: Clock = {
  now: () => new Date(),
};

export const timerSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));
