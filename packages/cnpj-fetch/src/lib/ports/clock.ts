/**
 * Source of wall-clock time for run durations.
 * Swapped for a fixed clock in tests.
 */
export interface Clock {
  /** Current timestamp in milliseconds */
  now(): number;
}
