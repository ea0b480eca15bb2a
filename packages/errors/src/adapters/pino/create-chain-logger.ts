import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions as PinoOptions,
} from "pino"
import { serializeChainError } from "./chain-serializer"

export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

export type ChainLoggerOptions = {
  /**
   * Minimum log level to emit.
   * @default "info"
   */
  level?: LogLevelName

  /**
   * Pretty-print through `pino-pretty`.
   *
   * @remarks
   * Intended for local development. Ignored when a `destination` is given.
   */
  prettify?: boolean

  /** Fields added to every entry */
  bindings?: Record<string, unknown>

  destination?: DestinationStream
}

/**
 * Creates a pino logger that renders ErrorChain values logged under `err`.
 *
 * @example
 * ```ts
 * const logger = createChainLogger({ level: "debug", bindings: { service: "billing" } })
 * logger.error({ err }, "charge failed")
 * ```
 */
export function createChainLogger(opts: ChainLoggerOptions = {}): Logger {
  const pinoOpts: PinoOptions = {
    level: opts.level ?? "info",
    serializers: { err: serializeChainError },
    ...(opts.prettify &&
      !opts.destination && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname",
          },
        },
      }),
  }

  const logger = opts.destination ? pino(pinoOpts, opts.destination) : pino(pinoOpts)

  return opts.bindings ? logger.child(opts.bindings) : logger
}
