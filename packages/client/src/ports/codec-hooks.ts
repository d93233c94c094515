import type { ValueType } from "./value-type"

/**
 * User extension points for values the built-in rules do not cover.
 *
 * @remarks
 * Precedence is: built-in rule, then hook, then generic conversion. Hooks are
 * fixed at client construction. Errors they throw propagate to the caller.
 */
export type CodecHooks = {
  /** Turns a value with no built-in rule into text. */
  serialize?: (value: unknown) => string

  /**
   * Turns text into a value of `type`. The result must satisfy `type.is`.
   */
  deserialize?: (text: string, type: ValueType<unknown>) => unknown
}
