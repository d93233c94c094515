import type { Milliseconds } from "./time"

/**
 * A monotonic time source for measuring elapsed time.
 *
 * @remarks
 * Readings are only meaningful relative to each other. They are not wall-clock
 * timestamps and must never be turned into a `Date`.
 */
export interface MonotonicClock {
  /** Current reading in milliseconds. Never decreases. */
  nowMs(): Milliseconds
}
