import type { Milliseconds } from "@ferrum/clock"
import type { UseType } from "./adapter"
import type { CallOutcome } from "./call-outcome"
import type { Command, WireArg } from "./command"
import type { ValueType } from "./value-type"

/** The client a call runs on, as interceptors see it. */
export interface InterceptedClient {
  readonly useType: UseType
  readonly isDisposed: boolean
  encode(value: unknown): WireArg | null
  decode<T>(payload: Uint8Array | null | undefined, type: ValueType<T>): T
}

/**
 * What an interceptor sees before the call runs.
 *
 * @remarks
 * Assigning `value` asks the pipeline to skip the call and use the assigned
 * value instead. The pipeline accepts it only when it is non-null and matches
 * the call's result type. Every interceptor's `before` still runs; the last
 * accepted assignment wins.
 */
export interface InterceptorBeforeContext {
  readonly client: InterceptedClient
  readonly command: Command
  value: unknown
  readonly isValueChanged: boolean
}

export type InterceptorAfterContext = {
  readonly client: InterceptedClient
  readonly command: Command
  readonly outcome: CallOutcome<unknown>
  /** Time since this interceptor was created for the call */
  readonly elapsedMs: Milliseconds
}

/**
 * Per-call hook pair. A fresh instance is created for every call, so
 * instances may keep state between `before` and `after`.
 *
 * @remarks
 * Hooks should not throw. A throwing hook is treated as a programmer error
 * and the error propagates out of the call.
 */
export interface Interceptor {
  before(ctx: InterceptorBeforeContext): void | Promise<void>
  after(ctx: InterceptorAfterContext): void | Promise<void>
}

export type InterceptorFactory = () => Interceptor
