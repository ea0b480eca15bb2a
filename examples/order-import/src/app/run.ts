import { readFile } from "node:fs/promises"
import { createChainLogger } from "@lineage/errors/pino"
import { loadConfig } from "../config/load-config"
import type { AppConfig } from "../config/schema"
import { importOrders } from "./import-orders"

async function main(): Promise<void> {
  const bootLogger = createChainLogger()
  const file = process.argv[2]

  if (!file) {
    bootLogger.error("usage: order-import <file>")
    process.exitCode = 2
    return
  }

  let config: AppConfig
  try {
    config = loadConfig(process.env)
  } catch (err) {
    bootLogger.fatal({ err }, "startup failed")
    process.exitCode = 1
    return
  }

  const logger = createChainLogger({
    level: config.logging.level,
    prettify: config.logging.prettify,
    bindings: { service: "order-import" },
  })

  const text = await readFile(file, "utf8")
  const result = importOrders(text, { logger, config })

  if (!result.ok) process.exitCode = 1
}

main().catch((err: unknown) => {
  createChainLogger().fatal({ err }, "order import crashed")
  process.exitCode = 1
})
