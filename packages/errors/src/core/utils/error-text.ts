import { inspect } from "node:util"

/**
 * Display form of any error value: an `Error`'s message, a string as is,
 * anything else inspected.
 */
export function errorText(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === "string") return err

  return inspect(err)
}
