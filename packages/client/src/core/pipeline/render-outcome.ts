import type { CallOutcome } from "../../ports/call-outcome"

/** Text form of a call's outcome as it appears in a call notice. */
export function renderOutcome(outcome: CallOutcome<unknown>): string {
  if (!outcome.ok) return renderError(outcome.error)

  return renderValue(outcome.value)
}

export function renderValue(value: unknown): string {
  if (value === null || value === undefined) return ""
  if (Array.isArray(value)) return `[${value.map(renderValue).join(", ")}]`
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8")
  if (value instanceof Date) return renderDate(value)

  return String(value)
}

function renderDate(date: Date): string {
  return Number.isNaN(date.getTime()) ? "Invalid Date" : date.toISOString()
}

function renderError(error: unknown): string {
  return error instanceof Error ? error.message : renderValue(error)
}
