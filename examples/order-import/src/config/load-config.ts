import { ErrConfig } from "../domain/import.errors"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    import: {
      maxLines: env.IMPORT_MAX_LINES,
    },
  }
}

/**
 * Validates the environment.
 *
 * Throws an error derived from `ErrConfig` naming the offending keys, with the
 * zod issues as its data.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const result = envSchema.safeParse(env)

  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => issue.path.map(String).join(".")))]

    throw ErrConfig.wrapData(`invalid ${keys.join(", ")}`, result.error.issues)
  }

  return mapEnvToConfig(result.data)
}
