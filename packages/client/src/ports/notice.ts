import type { Milliseconds } from "@ferrum/clock"

export type NoticeType = "call" | "info"

/** Emitted once per completed call while a subscriber exists. */
export type CallNotice = {
  type: "call"
  /** Write host, or `"Not connected"` */
  host: string
  elapsedMs: Milliseconds
  command: string
  /** Rendered result, or the error message for a failed call */
  result: string
  /** Single trace line combining all of the above */
  log: string
  error?: unknown
  value?: unknown
}

/** Adapter-level events such as connects and reconnects. */
export type InfoNotice = {
  type: "info"
  log: string
  error?: unknown
}

export type Notice = CallNotice | InfoNotice

export type NoticeListener = (notice: Notice) => void

export type Unsubscribe = () => void
