import { errorText } from "./utils/error-text"

/**
 * A plain error that reads `"<err>: <detail>"` and unwraps to `err`.
 */
export class WrappedError extends Error {
  override readonly cause: Error

  constructor(err: Error, detail: string) {
    super(`${errorText(err)}: ${detail}`, { cause: err })

    this.name = "WrappedError"
    this.cause = err

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  unwrap(): Error {
    return this.cause
  }
}

/**
 * Wraps an error with a message.
 *
 * - Returns `undefined` if `err` is missing.
 * - Returns `err` itself if `message` is empty.
 *
 * @example
 * ```ts
 * wrapMessage(new Error("timeout"), "fetch user").message // "timeout: fetch user"
 * ```
 */
export function wrapMessage(err: Error | null | undefined, message: string): Error | undefined {
  if (err == null) return undefined
  if (message === "") return err

  return new WrappedError(err, message)
}

/**
 * Wraps an error with a message and appends the display text of `cause`.
 *
 * - Returns `undefined` if `err` is missing.
 * - Without a cause, behaves like {@link wrapMessage}.
 * - With an empty message, reads `"<err>: <cause>"`.
 *
 * The result always unwraps to `err`.
 */
export function wrapWithCause(
  err: Error | null | undefined,
  cause: Error | null | undefined,
  message: string,
): Error | undefined {
  if (err == null) return undefined
  if (cause == null) return wrapMessage(err, message)

  const detail = message === "" ? errorText(cause) : `${message}: ${errorText(cause)}`

  return new WrappedError(err, detail)
}
