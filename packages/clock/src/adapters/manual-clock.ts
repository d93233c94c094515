import type { MonotonicClock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/** Clock that only moves when told to. */
export class ManualClock implements MonotonicClock {
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    if (ms < 0) {
      throw new RangeError(`A monotonic clock cannot move backwards (got ${ms})`)
    }

    this.time = this.time + ms
  }
}
