export { ManualClock } from "./adapters/manual-clock"
export { SystemClock, systemClock } from "./adapters/system-clock"
export { Stopwatch } from "./core/stopwatch"
export type { MonotonicClock } from "./ports/clock"
export type { Milliseconds } from "./ports/time"
