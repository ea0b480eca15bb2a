import type { Matchable } from "../../ports/error-chain"
import { isRecord } from "./is-record"
import { unwrapChain } from "./unwrap-chain"

function isMatchable(v: unknown): v is Matchable {
  return isRecord(v) && typeof v.is === "function"
}

/**
 * Reports whether `target` is `err` or one of the values reached by unwrapping it.
 *
 * Values with their own `is` method (such as `ErrorChain`) are asked as well, which
 * lets a node match its causes. A missing error matches nothing.
 *
 * @example
 * ```ts
 * if (errorIs(err, ErrNotFound)) return undefined
 * ```
 */
export function errorIs(err: unknown, target: unknown): boolean {
  if (err == null) return false

  for (const e of unwrapChain(err)) {
    if (e === target) return true
    if (isMatchable(e) && e.is(target)) return true
  }

  return false
}

/**
 * Returns the first value in the unwrap chain of `err` accepted by `guard`.
 */
export function errorAs<T>(
  err: unknown,
  guard: (value: unknown) => value is T,
): T | undefined {
  return unwrapChain(err).find(guard)
}
