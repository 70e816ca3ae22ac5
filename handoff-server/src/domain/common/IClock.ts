/**
 * Source of the current time in epoch milliseconds.
 * Injected wherever elapsed time drives behavior (waits, rate limiting).
 */
export interface IClock {
  now(): number;
}
