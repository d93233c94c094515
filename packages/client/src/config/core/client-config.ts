import { type Logger, logLevelNames } from "@ferrum/logger"
import { z } from "zod"
import { useTypes } from "../../ports/adapter"
import { textEncodings } from "../../ports/value-type"
import type { LoadedConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { loadConfig } from "./load-config"

export const clientConfigSchema = z.object({
  URL: z.url({ protocol: /^rediss?$/ }).default("redis://127.0.0.1:6379"),
  PREFIX: z.string().default(""),
  ENCODING: z.enum(textEncodings).default("utf8"),
  USE_TYPE: z.enum(useTypes).default("pooling"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type ClientConfig = z.infer<typeof clientConfigSchema>

export type LoadClientConfigOptions = {
  /** Defaults to an `EnvSource` reading `FERRUM_`-prefixed variables. */
  sources?: ConfigSource[]
  logger?: Logger
}

export async function loadClientConfig(
  options: LoadClientConfigOptions = {},
): Promise<LoadedConfig<ClientConfig>> {
  const config = await loadConfig({
    schema: clientConfigSchema,
    ...(options.sources && { sources: options.sources }),
    ...(options.logger && { logger: options.logger }),
  })

  options.logger?.debug("client config loaded", {
    url: redactUrl(config.value.URL),
    urlFrom: config.explain("URL"),
    useType: config.value.USE_TYPE,
    sources: config.sourcesUsed(),
  })

  return config
}

/** The connection URL with its password masked, for logs. */
export function redactUrl(url: string): string {
  const parsed = new URL(url)
  if (parsed.password) parsed.password = "***"

  return parsed.toString()
}
