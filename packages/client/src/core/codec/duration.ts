const TICKS_PER_MILLISECOND = 10_000n
const TICKS_PER_SECOND = TICKS_PER_MILLISECOND * 1_000n
const TICKS_PER_MINUTE = TICKS_PER_SECOND * 60n
const TICKS_PER_HOUR = TICKS_PER_MINUTE * 60n
const TICKS_PER_DAY = TICKS_PER_HOUR * 24n

export const MIN_TICKS = -(2n ** 63n)
export const MAX_TICKS = 2n ** 63n - 1n

/**
 * A signed time span counted in 100-nanosecond ticks.
 *
 * @remarks
 * This is the unit durations travel in on the wire: a duration is stored as
 * its tick count. The count is a signed 64-bit integer.
 */
export class Duration {
  static readonly zero = new Duration(0n)

  private constructor(readonly ticks: bigint) {}

  static fromTicks(ticks: bigint | number): Duration {
    const value = typeof ticks === "bigint" ? ticks : BigInt(ticks)

    if (value < MIN_TICKS || value > MAX_TICKS) {
      throw new RangeError(`Duration ticks out of range (got ${value})`)
    }

    return value === 0n ? Duration.zero : new Duration(value)
  }

  static fromMilliseconds(ms: number): Duration {
    if (!Number.isFinite(ms)) {
      throw new RangeError(`Duration milliseconds must be finite (got ${ms})`)
    }

    return Duration.fromTicks(BigInt(Math.round(ms * Number(TICKS_PER_MILLISECOND))))
  }

  static fromSeconds(seconds: number): Duration {
    return Duration.fromMilliseconds(seconds * 1_000)
  }

  get totalMilliseconds(): number {
    return Number(this.ticks) / Number(TICKS_PER_MILLISECOND)
  }

  equals(other: Duration): boolean {
    return this.ticks === other.ticks
  }

  /** `[-][d.]hh:mm:ss[.fffffff]` */
  toString(): string {
    const negative = this.ticks < 0n
    let rest = negative ? -this.ticks : this.ticks

    const days = rest / TICKS_PER_DAY
    rest %= TICKS_PER_DAY
    const hours = rest / TICKS_PER_HOUR
    rest %= TICKS_PER_HOUR
    const minutes = rest / TICKS_PER_MINUTE
    rest %= TICKS_PER_MINUTE
    const seconds = rest / TICKS_PER_SECOND
    const fraction = rest % TICKS_PER_SECOND

    const clock = [hours, minutes, seconds].map((part) => pad(part, 2)).join(":")

    return [
      negative ? "-" : "",
      days > 0n ? `${days}.` : "",
      clock,
      fraction > 0n ? `.${pad(fraction, 7)}` : "",
    ].join("")
  }
}

function pad(value: bigint, width: number): string {
  return value.toString().padStart(width, "0")
}
