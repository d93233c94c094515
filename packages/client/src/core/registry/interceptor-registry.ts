import type { Logger } from "@ferrum/logger"
import type { InterceptorFactory } from "../../ports/interceptor"
import { CopyOnWriteList } from "./copy-on-write-list"

export type RemoveInterceptor = () => void

/**
 * Factories of per-call interceptors, in registration order.
 */
export class InterceptorRegistry {
  private readonly factories = new CopyOnWriteList<InterceptorFactory>()

  constructor(private readonly logger?: Logger) {}

  get size(): number {
    return this.factories.size
  }

  /** Registers `factory`. Registering the same factory twice runs it twice. */
  add(factory: InterceptorFactory): RemoveInterceptor {
    this.factories.add(factory)
    this.logger?.debug("interceptor added", { interceptors: this.size })

    return () => {
      this.remove(factory)
    }
  }

  remove(factory: InterceptorFactory): boolean {
    const removed = this.factories.remove(factory)
    if (removed) this.logger?.debug("interceptor removed", { interceptors: this.size })

    return removed
  }

  clear(): void {
    this.factories.clear()
  }

  snapshot(): readonly InterceptorFactory[] {
    return this.factories.snapshot()
  }
}
