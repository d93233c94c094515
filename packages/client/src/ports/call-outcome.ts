/** The single result of one call: a value or the error it failed with. */
export type CallOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown }
