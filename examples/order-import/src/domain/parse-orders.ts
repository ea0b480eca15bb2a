import type { ErrorChain } from "@lineage/errors"
import { ErrLine, ErrRejected, ErrTooManyLines } from "./import.errors"
import type { LineFailure, OrderLine } from "./order.model"

export type ParseOptions = {
  maxLines: number
}

const SKU = /^[A-Z0-9-]+$/
const QUANTITY = /^[1-9]\d*$/
const PRICE = /^(\d+)(?:\.(\d{1,2}))?$/

/**
 * Parses one `sku,quantity,unitPrice` line, or returns the error describing it.
 */
export function parseLine(raw: string, line: number): OrderLine | ErrorChain {
  const reject = (detail: string) =>
    ErrLine.wrapDataWithArgs({ line, raw } satisfies LineFailure, line).wrap(detail)

  const fields = raw.split(",").map((f) => f.trim())
  if (fields.length !== 3) return reject(`expected 3 fields, got ${fields.length}`)

  const [sku = "", quantity = "", price = ""] = fields

  if (!SKU.test(sku)) return reject(`invalid sku "${sku}"`)
  if (!QUANTITY.test(quantity)) return reject(`invalid quantity "${quantity}"`)

  const priceMatch = PRICE.exec(price)
  if (!priceMatch) return reject(`invalid unit price "${price}"`)

  const [, whole = "0", fraction = ""] = priceMatch

  return {
    sku,
    quantity: Number(quantity),
    unitPrice: Number(whole) * 100 + Number(fraction.padEnd(2, "0")),
  }
}

/**
 * Parses a whole order file. Blank lines and `#` comments are skipped.
 *
 * Throws an error derived from `ErrRejected` carrying every line error as an
 * extra when any line is rejected.
 */
export function parseOrders(text: string, opts: ParseOptions): OrderLine[] {
  const lines = text.split(/\r?\n/)
  const orders: OrderLine[] = []
  const failures: ErrorChain[] = []
  let counted = 0

  for (const [index, raw] of lines.entries()) {
    const trimmed = raw.trim()
    if (trimmed === "" || trimmed.startsWith("#")) continue

    counted++
    if (counted > opts.maxLines) throw ErrTooManyLines.withArgs(opts.maxLines)

    const result = parseLine(raw, index + 1)
    if (result instanceof Error) failures.push(result)
    else orders.push(result)
  }

  if (failures.length > 0) {
    const err = ErrRejected.withArgs(failures.length, counted)
    for (const failure of failures) err.extra(failure)
    throw err
  }

  return orders
}
