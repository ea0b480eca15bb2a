import type { ChainCause, ChainNode } from "../ports/error-chain"
import { errorText } from "./utils/error-text"
import { isRecord } from "./utils/is-record"

export const CAUSE_SEPARATOR = " < "
export const EXTRA_SEPARATOR = " + "

/**
 * Renders a node and its lineage as a single line.
 *
 * The farthest ancestor is set off with `:`, intermediate ancestors are joined
 * with `;` and the node's own text follows a `>`. Causes follow the text they
 * explain after a `<`, extras are appended after a `+`.
 *
 * @example
 * ```
 * store: open; read header > bad magic < fs: read > EOF + cleanup failed
 * ```
 *
 * @remarks
 * A node reached again through its own causes or extras renders as its own text
 * only, so `a.extra(a)` renders `a + a`.
 */
export function renderChain(node: ChainNode): string {
  return renderNode(node, new Set())
}

// `path` holds the nodes currently being rendered, outermost first.
function renderNode(node: ChainNode, path: Set<ChainNode>): string {
  const own = node.isTemplate ? "" : node.text
  if (path.has(node)) return own

  path.add(node)
  try {
    return renderOnPath(node, own, path)
  } finally {
    path.delete(node)
  }
}

function renderOnPath(node: ChainNode, own: string, path: Set<ChainNode>): string {
  let message = own
  if (node.link) message = `${message}${CAUSE_SEPARATOR}${renderCause(node.link, path)}`

  const stack: string[] = []
  for (let parent = node.wrapped; parent; parent = parent.wrapped) {
    if (parent.isTemplate || parent.text === "") continue

    stack.push(
      parent.link
        ? `${parent.text}${CAUSE_SEPARATOR}${renderCause(parent.link, path)}`
        : parent.text,
    )
  }

  let rendered = joinStack(stack, message)
  for (const extra of node.extras()) {
    const text = isChainNode(extra) ? renderNode(extra, path) : errorText(extra)
    rendered += `${EXTRA_SEPARATOR}${text}`
  }

  return rendered
}

function renderCause(cause: ChainCause, path: Set<ChainNode>): string {
  switch (cause.kind) {
    case "chain":
      return renderNode(cause.node, path)
    case "foreign":
      return errorText(cause.error)
  }
}

function isChainNode(v: unknown): v is ChainNode {
  return (
    isRecord(v) &&
    typeof v.text === "string" &&
    typeof v.isTemplate === "boolean" &&
    typeof v.extras === "function" &&
    "wrapped" in v &&
    "link" in v
  )
}

// `ancestors` is nearest-first.
function joinStack(ancestors: readonly string[], message: string): string {
  const [root, ...hops] = [...ancestors].reverse()
  if (root === undefined) return message

  if (hops.length === 0) {
    return message === "" ? root : `${root}: ${message}`
  }

  const prefix = `${root}: ${hops.join("; ")}`

  return message === "" ? prefix : `${prefix} > ${message}`
}
