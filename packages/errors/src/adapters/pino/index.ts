export { type SerializedChainError, serializeChainError } from "./chain-serializer"
export {
  type ChainLoggerOptions,
  createChainLogger,
  type LogLevelName,
  logLevelNames,
} from "./create-chain-logger"
