import { RecordingLogger } from "../../../tests/utils/recording-logger"
import { DisposeGuard } from "../dispose-guard"

describe("DisposeGuard", () => {
  it("runs the release once and shares its promise", async () => {
    const release = vi.fn(async () => {})
    const guard = new DisposeGuard(release, new RecordingLogger())

    const first = guard.run()
    const second = guard.run()

    expect(second).toBe(first)
    await first
    await guard.run()

    expect(release).toHaveBeenCalledTimes(1)
  })

  it("is disposed as soon as a run starts", () => {
    let finish: (value: void) => void = () => {}
    const guard = new DisposeGuard(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve
        }),
      new RecordingLogger(),
    )

    expect(guard.isDisposed).toBe(false)
    const pending = guard.run()
    expect(guard.isDisposed).toBe(true)

    finish()
    return pending
  })

  it("logs a synchronous throw instead of rejecting", async () => {
    const logger = new RecordingLogger()
    const failure = new Error("boom")
    const guard = new DisposeGuard(() => {
      throw failure
    }, logger)

    await expect(guard.run()).resolves.toBeUndefined()
    expect(logger.at("error")).toEqual([
      { level: "error", message: "client dispose failed", meta: { err: failure } },
    ])
  })
})
