import type { Notice, NoticeListener, Unsubscribe } from "../../ports/notice"
import { CopyOnWriteList } from "../registry/copy-on-write-list"

/**
 * Observer list for trace notices.
 *
 * @remarks
 * Dispatch is synchronous and in registration order. A listener that throws
 * stops the dispatch and the error reaches whoever emitted the notice.
 */
export class NoticeSink {
  private readonly listeners = new CopyOnWriteList<NoticeListener>()

  get hasSubscribers(): boolean {
    return this.listeners.size > 0
  }

  subscribe(listener: NoticeListener): Unsubscribe {
    this.listeners.add(listener)

    return () => {
      this.listeners.remove(listener)
    }
  }

  unsubscribe(listener: NoticeListener): boolean {
    return this.listeners.remove(listener)
  }

  /** Returns whether any listener received the notice. */
  emit(notice: Notice): boolean {
    const listeners = this.listeners.snapshot()

    for (const listener of listeners) {
      listener(notice)
    }

    return listeners.length > 0
  }
}
