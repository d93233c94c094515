import type { Logger } from "@ferrum/logger"
import { mock } from "vitest-mock-extended"
import type { Interceptor, InterceptorFactory } from "../../../ports/interceptor"
import { InterceptorRegistry } from "../interceptor-registry"

const noop: Interceptor = { before: () => {}, after: () => {} }

describe("InterceptorRegistry", () => {
  it("returns a handle that removes the factory", () => {
    const registry = new InterceptorRegistry()
    const factory: InterceptorFactory = () => noop

    const remove = registry.add(factory)
    expect(registry.size).toBe(1)

    remove()

    expect(registry.size).toBe(0)
  })

  it("runs a factory registered twice twice", () => {
    const registry = new InterceptorRegistry()
    const factory: InterceptorFactory = () => noop

    registry.add(factory)
    registry.add(factory)

    expect(registry.snapshot()).toEqual([factory, factory])
  })

  it("keeps registration order", () => {
    const registry = new InterceptorRegistry()
    const first: InterceptorFactory = () => noop
    const second: InterceptorFactory = () => noop

    registry.add(first)
    registry.add(second)

    expect(registry.snapshot()).toEqual([first, second])
  })

  it("clear() drops every factory", () => {
    const registry = new InterceptorRegistry()
    registry.add(() => noop)
    registry.add(() => noop)

    registry.clear()

    expect(registry.size).toBe(0)
  })

  it("logs registration changes at debug", () => {
    const logger = mock<Logger>()
    const registry = new InterceptorRegistry(logger)
    const factory: InterceptorFactory = () => noop

    registry.add(factory)
    registry.remove(factory)
    registry.remove(factory)

    expect(logger.debug).toHaveBeenCalledTimes(2)
    expect(logger.debug).toHaveBeenNthCalledWith(1, "interceptor added", { interceptors: 1 })
    expect(logger.debug).toHaveBeenNthCalledWith(2, "interceptor removed", { interceptors: 0 })
  })
})
