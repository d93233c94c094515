import type { Logger } from "@ferrum/logger"
import type { NoticeListener } from "../../ports/notice"

/**
 * Returns a listener that writes notices to `logger`: completed calls at
 * `debug`, failed calls at `warn`, adapter events at `info`.
 */
export function createNoticeLogger(logger: Logger): NoticeListener {
  return (notice) => {
    if (notice.type === "info") {
      logger.info(notice.log, { ...("error" in notice && { err: notice.error }) })
      return
    }

    const meta = { host: notice.host, command: notice.command, durationMs: notice.elapsedMs }

    if ("error" in notice) {
      logger.warn("call failed", { ...meta, err: notice.error })
      return
    }

    logger.debug("call", meta)
  }
}
