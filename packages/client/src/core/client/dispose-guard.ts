import type { Logger } from "@ferrum/logger"

/**
 * Runs a release function at most once.
 *
 * @remarks
 * Every caller of `run()` gets the same promise. The promise never rejects:
 * a failed release is logged at `error`.
 */
export class DisposeGuard {
  private pending: Promise<void> | null = null

  constructor(
    private readonly release: () => Promise<void>,
    private readonly logger: Logger,
  ) {}

  get isDisposed(): boolean {
    return this.pending !== null
  }

  run(): Promise<void> {
    this.pending ??= this.releaseOnce()
    return this.pending
  }

  private async releaseOnce(): Promise<void> {
    try {
      await this.release()
      this.logger.debug("client disposed")
    } catch (error) {
      this.logger.error("client dispose failed", { err: error })
    }
  }
}
