import { performance } from "node:perf_hooks"
import type { MonotonicClock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export class SystemClock implements MonotonicClock {
  nowMs(): Milliseconds {
    return performance.now()
  }
}

export const systemClock: MonotonicClock = new SystemClock()
