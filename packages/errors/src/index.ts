export { createError, createErrorTemplate, ErrorChain } from "./core/error-chain"
export type { ErrorChainInit } from "./core/error-chain"
export { CAUSE_SEPARATOR, EXTRA_SEPARATOR, renderChain } from "./core/render"
export { errorAs, errorIs } from "./core/utils/error-is"
export { errorText } from "./core/utils/error-text"
export { unwrapChain } from "./core/utils/unwrap-chain"
export { WrappedError, wrapMessage, wrapWithCause } from "./core/wrap"
export type { ChainCause, ChainNode, Matchable, Unwrappable } from "./ports/error-chain"
