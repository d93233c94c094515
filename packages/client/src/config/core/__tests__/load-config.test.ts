import type { Logger } from "@ferrum/logger"
import { mock } from "vitest-mock-extended"
import { z } from "zod"
import { ConfigError } from "../../../errors/client-errors"
import { ObjectSource } from "../../adapters/object/object-source"
import { loadConfig } from "../load-config"

const schema = z.object({
  PORT: z.coerce.number().default(6379),
  HOST: z.string(),
})

describe("loadConfig", () => {
  it("lets later sources win", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ HOST: "a", PORT: "1" }, "first"),
        new ObjectSource({ HOST: "b" }, "second"),
      ],
    })

    expect(config.value).toEqual({ HOST: "b", PORT: 1 })
    expect(config.explain("HOST")).toBe("second")
    expect(config.explain("PORT")).toBe("first")
  })

  it("ignores undefined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ HOST: "a" }, "first"),
        new ObjectSource({ HOST: undefined }, "second"),
      ],
    })

    expect(config.value.HOST).toBe("a")
    expect(config.sourcesUsed()).toEqual(["first"])
  })

  it("reports schema defaults as default", async () => {
    const config = await loadConfig({ schema, sources: [new ObjectSource({ HOST: "a" })] })

    expect(config.value.PORT).toBe(6379)
    expect(config.explain("PORT")).toBe("default")
  })

  it("lists keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ HOST: "a", HOTS: "typo" })],
    })

    expect(config.unknownKeys()).toEqual(["HOTS"])
    expect(config.sourcesUsed()).toEqual(["object:overrides"])
  })

  it("warns about keys the schema does not know", async () => {
    const logger = mock<Logger>()

    await loadConfig({
      schema,
      sources: [new ObjectSource({ HOST: "a", HOTS: "typo" })],
      logger,
    })

    expect(logger.warn).toHaveBeenCalledWith("unknown config keys", { keys: ["HOTS"] })
  })

  it("freezes the value", async () => {
    const config = await loadConfig({ schema, sources: [new ObjectSource({ HOST: "a" })] })

    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("rejects invalid values with a readable message", async () => {
    const load = loadConfig({ schema, sources: [new ObjectSource({ PORT: "x" })] })

    await expect(load).rejects.toThrow(/^Configuration validation failed:\n/)
    await expect(load).rejects.toThrow("HOST")
  })

  it("lists the failing keys and the sources in the error", async () => {
    const load = loadConfig({ schema, sources: [new ObjectSource({ PORT: "x" }, "overrides")] })

    await expect(load).rejects.toBeInstanceOf(ConfigError)
    await expect(load).rejects.toMatchObject({
      code: "config",
      context: { keys: expect.arrayContaining(["HOST", "PORT"]), sources: ["overrides"] },
    })
  })
})
