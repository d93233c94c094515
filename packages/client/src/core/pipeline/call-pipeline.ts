import { type MonotonicClock, Stopwatch, systemClock } from "@ferrum/clock"
import type { CallOutcome } from "../../ports/call-outcome"
import type { Command } from "../../ports/command"
import type { InterceptedClient, Interceptor } from "../../ports/interceptor"
import type { CallNotice } from "../../ports/notice"
import type { NoticeSink } from "../notice/notice-sink"
import type { InterceptorRegistry } from "../registry/interceptor-registry"
import { BeforeContext } from "./before-context"
import { renderOutcome } from "./render-outcome"

export const NOT_CONNECTED = "Not connected"

/** Decides whether an interceptor's substitute can stand in for the result. */
export type ResultGuard<T> = (value: unknown) => value is T

export type CallPipelineDeps = {
  /** Handed to interceptors with every call. */
  client: InterceptedClient
  interceptors: InterceptorRegistry
  notices: NoticeSink
  clock?: MonotonicClock
  /** Key prefix applied to every command. */
  prefix?: string | null
}

type Started = {
  interceptor: Interceptor
  stopwatch: Stopwatch
}

/**
 * Wraps every call with prefixing, interceptors and the call notice.
 *
 * @remarks
 * With no interceptor registered and no notice subscriber the call runs
 * directly: no stopwatch is started and the clock is never read.
 *
 * Interceptor hooks and notice listeners that throw are programmer errors;
 * their error propagates out of `run`.
 */
export class CallPipeline {
  private readonly clock: MonotonicClock
  private readonly prefix: string | null

  constructor(private readonly deps: CallPipelineDeps) {
    this.clock = deps.clock ?? systemClock
    this.prefix = deps.prefix ?? null
  }

  async run<T>(command: Command, execute: () => Promise<T>, accepts: ResultGuard<T>): Promise<T> {
    command.prefix(this.prefix)

    const factories = this.deps.interceptors.snapshot()
    const notify = this.deps.notices.hasSubscribers

    if (factories.length === 0 && !notify) return execute()

    const overall = notify ? Stopwatch.start(this.clock) : null
    const started: Started[] = []
    let substitute: { value: T } | null = null

    for (const factory of factories) {
      const stopwatch = Stopwatch.start(this.clock)
      const interceptor = factory()
      started.push({ interceptor, stopwatch })

      const ctx = new BeforeContext(this.deps.client, command)
      await interceptor.before(ctx)

      if (ctx.isValueChanged) {
        const value = ctx.value
        if (value !== null && value !== undefined && accepts(value)) substitute = { value }
      }
    }

    const outcome: CallOutcome<T> = substitute
      ? { ok: true, value: substitute.value }
      : await this.attempt(execute)

    for (const { interceptor, stopwatch } of started) {
      await interceptor.after({
        client: this.deps.client,
        command,
        outcome,
        elapsedMs: stopwatch.stop(),
      })
    }

    if (overall) {
      this.deps.notices.emit(this.buildNotice(command, outcome, overall.stop()))
    }

    if (!outcome.ok) throw outcome.error

    return outcome.value
  }

  private async attempt<T>(execute: () => Promise<T>): Promise<CallOutcome<T>> {
    try {
      const value = await execute()
      return { ok: true, value }
    } catch (error) {
      return { ok: false, error }
    }
  }

  private buildNotice(
    command: Command,
    outcome: CallOutcome<unknown>,
    elapsedMs: number,
  ): CallNotice {
    const host = command.writeHost ?? NOT_CONNECTED
    const text = command.toString()
    const result = renderOutcome(outcome)

    return {
      type: "call",
      host,
      elapsedMs,
      command: text,
      result,
      log: `${host} (${elapsedMs}ms) > ${text}\r\n${result}`,
      ...(outcome.ok ? { value: outcome.value } : { error: outcome.error }),
    }
  }
}
