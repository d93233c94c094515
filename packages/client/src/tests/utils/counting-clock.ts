import { ManualClock } from "@ferrum/clock"

/** A manual clock that counts how often it was read. */
export class CountingClock extends ManualClock {
  reads = 0

  override nowMs(): number {
    this.reads++
    return super.nowMs()
  }
}
