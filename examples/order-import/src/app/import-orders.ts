import { errorIs } from "@lineage/errors"
import type { Logger } from "pino"
import type { AppConfig } from "../config/schema"
import { ErrImport } from "../domain/import.errors"
import type { OrderLine } from "../domain/order.model"
import { parseOrders } from "../domain/parse-orders"

export type ImportDeps = {
  logger: Logger
  config: AppConfig
}

export type ImportResult =
  | { ok: true; orders: OrderLine[] }
  | { ok: false; error: unknown }

/**
 * Parses an order file and logs the outcome.
 *
 * Import failures are logged at `warn` and returned; anything that is not an
 * import failure is rethrown.
 */
export function importOrders(text: string, deps: ImportDeps): ImportResult {
  const log = deps.logger.child({ module: "order-import" })

  try {
    const orders = parseOrders(text, { maxLines: deps.config.import.maxLines })
    const total = orders.reduce((sum, o) => sum + o.quantity * o.unitPrice, 0)

    log.info({ orders: orders.length, totalCents: total }, "orders imported")

    return { ok: true, orders }
  } catch (err) {
    if (!errorIs(err, ErrImport)) throw err

    log.warn({ err }, "order import failed")

    return { ok: false, error: err }
  }
}
