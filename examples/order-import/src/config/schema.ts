import { logLevelNames } from "@lineage/errors/pino"
import { z } from "zod"

export const envSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  IMPORT_MAX_LINES: z.coerce.number().int().positive().default(10_000),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  logging: {
    level: EnvConfig["LOG_LEVEL"]
    prettify: boolean
  }
  import: {
    maxLines: number
  }
}
