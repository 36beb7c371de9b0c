/**
 * A single reading of the clock. `mono` is a monotonic millisecond value used
 * for duration math; `wall` is the local wall-clock time taken in the same call
 * and is only used for human-readable timestamps.
 */
export interface Instant {
  mono: number;
  wall: Date;
}

/** Source of instants. Injected everywhere so tests can drive time by hand. */
export interface Clock {
  now(): Instant;
}
