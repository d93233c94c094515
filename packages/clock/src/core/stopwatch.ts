import type { MonotonicClock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Measures the time between `start` and `stop` against a monotonic clock.
 *
 * @remarks
 * `elapsedMs` reports whole milliseconds (truncated). While running it reports
 * the time elapsed so far; once stopped the reading is frozen.
 */
export class Stopwatch {
  private startedAt: Milliseconds
  private stoppedAt: Milliseconds | null = null

  private constructor(private readonly clock: MonotonicClock) {
    this.startedAt = clock.nowMs()
  }

  static start(clock: MonotonicClock): Stopwatch {
    return new Stopwatch(clock)
  }

  get isRunning(): boolean {
    return this.stoppedAt === null
  }

  stop(): Milliseconds {
    if (this.stoppedAt === null) {
      this.stoppedAt = this.clock.nowMs()
    }

    return this.elapsedMs
  }

  restart(): void {
    this.startedAt = this.clock.nowMs()
    this.stoppedAt = null
  }

  get elapsedMs(): Milliseconds {
    const end = this.stoppedAt ?? this.clock.nowMs()
    return Math.trunc(end - this.startedAt)
  }
}
