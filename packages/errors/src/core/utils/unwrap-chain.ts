import type { Unwrappable } from "../../ports/error-chain"
import { isRecord } from "./is-record"

function isUnwrappable(v: unknown): v is Unwrappable {
  return isRecord(v) && typeof v.unwrap === "function"
}

function getParent(v: unknown): unknown {
  if (isUnwrappable(v)) return v.unwrap()

  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk an error's ancestry and return all values encountered, starting with `err`.
 *
 * A value exposing `unwrap()` continues with what it returns; any other value
 * continues with its `cause` property.
 *
 * Safety:
 * - maxDepth guardrail (default 50)
 * - cycle detection via WeakSet
 *
 * @example
 * ```ts
 * catch (err) {
 *   for (const e of unwrapChain(err)) {
 *     console.log(errorText(e))
 *   }
 * }
 * ```
 */
export function unwrapChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getParent(current)

    if (next === undefined) break
    current = next
  }

  return chain
}
