import { errWithCause } from "pino-std-serializers"
import { ErrorChain } from "../../core/error-chain"
import { errorText } from "../../core/utils/error-text"

export type SerializedChainError = {
  type: string
  message: string
  stack: string
  data?: unknown
  extras?: string[]
  cause?: unknown
}

/**
 * pino `err` serializer.
 *
 * ErrorChain values are logged with their rendered message, their own payload
 * and the rendered text of each extra; the cause is serialized recursively.
 * Other errors go through `errWithCause`, anything else is logged as is.
 */
export function serializeChainError(value: unknown): unknown {
  if (value instanceof ErrorChain) {
    const extras = value.extras()

    return {
      type: value.name,
      message: value.message,
      stack: value.stack ?? "",
      ...(value.data !== undefined && { data: value.data }),
      ...(extras.length > 0 && { extras: extras.map(errorText) }),
      ...(value.cause !== undefined && { cause: serializeChainError(value.cause) }),
    } satisfies SerializedChainError
  }

  if (value instanceof Error) return errWithCause(value)

  return value
}
