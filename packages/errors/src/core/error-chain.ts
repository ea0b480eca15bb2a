import type { ChainCause, ChainNode } from "../ports/error-chain"
import { formatTemplate, joinArgs } from "./format"
import { renderChain } from "./render"
import { errorIs } from "./utils/error-is"

export type ErrorChainInit = Readonly<{
  text: string
  wrapped?: ErrorChain | undefined
  cause?: unknown
  data?: unknown
  isTemplate?: boolean | undefined
}>

function toLink(cause: unknown): ChainCause | undefined {
  if (cause == null) return undefined
  if (cause instanceof ErrorChain) return { kind: "chain", node: cause }

  return { kind: "foreign", error: cause }
}

/**
 * An error derived step by step from a base error.
 *
 * Every derivation returns a new node that keeps a reference to the node it came
 * from, so a derived error answers `is()` for each of its ancestors and for the
 * lineage of any cause attached along the way. The `message` is rendered from the
 * whole lineage on every read.
 *
 * @remarks
 * Nodes are immutable except for {@link ErrorChain.extra}, which appends to the
 * node it is called on. Add extras while the node still has a single owner.
 *
 * @example
 * ```ts
 * const ErrStore = createError("store")
 * const ErrOpen = ErrStore.wrapTemplate("open %s")
 *
 * throw ErrOpen.withArgs(path).wrapCause("read header", err)
 * // store: open /tmp/db > read header < EACCES: permission denied
 * ```
 */
export class ErrorChain extends Error implements ChainNode {
  readonly text: string
  readonly isTemplate: boolean
  readonly wrapped: ErrorChain | undefined
  readonly link: ChainCause | undefined
  /** Payload attached to this node only, see {@link ErrorChain.anyData} */
  readonly data: unknown

  private readonly extraErrors: unknown[] = []

  constructor(init: ErrorChainInit) {
    const link = toLink(init.cause)
    super(undefined, link ? { cause: init.cause } : undefined)

    this.name = "ErrorChain"
    this.text = init.text
    this.isTemplate = init.isTemplate ?? false
    this.wrapped = init.wrapped
    this.link = link
    this.data = init.data

    Object.defineProperty(this, "message", {
      configurable: true,
      enumerable: false,
      get: () => this.render(),
    })

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  render(): string {
    return renderChain(this)
  }

  toString(): string {
    return this.render()
  }

  /** Derives a node with literal text. */
  wrap(message: string): ErrorChain {
    return new ErrorChain({ text: message, wrapped: this })
  }

  /**
   * Derives a placeholder node whose text is the template for a later
   * {@link ErrorChain.withArgs}, {@link ErrorChain.wrapCauseWithArgs} or
   * {@link ErrorChain.wrapDataWithArgs}. It renders as nothing but still matches.
   */
  wrapTemplate(format: string): ErrorChain {
    return new ErrorChain({ text: format, wrapped: this, isTemplate: true })
  }

  /** Like {@link ErrorChain.wrapTemplate}, with a payload on the template node. */
  wrapDataTemplate(format: string, data: unknown): ErrorChain {
    return new ErrorChain({ text: format, wrapped: this, isTemplate: true, data })
  }

  /**
   * Derives a node whose text is this node's template filled with `args`.
   *
   * On a node that is not a template the args are concatenated instead.
   */
  withArgs(...args: unknown[]): ErrorChain {
    return new ErrorChain({ text: this.fill(args), wrapped: this })
  }

  /**
   * Derives a node explaining its condition with `cause`.
   *
   * The result matches the ancestors of both this node and the cause:
   *
   * ```ts
   * const err = createError("a").wrap("b").wrapCause("e", createError("c").wrap("d"))
   * err.is(a) // true
   * err.is(c) // true
   * String(err) // a: b > e < c: d
   * ```
   */
  wrapCause(message: string, cause: unknown): ErrorChain {
    return new ErrorChain({ text: message, wrapped: this, cause })
  }

  wrapCauseWithArgs(cause: unknown, ...args: unknown[]): ErrorChain {
    return new ErrorChain({ text: this.fill(args), wrapped: this, cause })
  }

  wrapData(message: string, data: unknown): ErrorChain {
    return new ErrorChain({ text: message, wrapped: this, data })
  }

  wrapDataWithArgs(data: unknown, ...args: unknown[]): ErrorChain {
    return new ErrorChain({ text: this.fill(args), wrapped: this, data })
  }

  /** Appends `err` to this node's extras and returns this node. */
  extra(err: unknown): this {
    this.extraErrors.push(err)
    return this
  }

  extras(): readonly unknown[] {
    return [...this.extraErrors]
  }

  /**
   * Reports whether `target` is this node, one of its ancestors, or matches its
   * cause. Extras are not consulted.
   */
  is(target: unknown): boolean {
    if (this === target) return true
    if (this.wrapped?.is(target)) return true

    const link = this.link
    if (!link) return false

    return link.kind === "chain" ? link.node.is(target) : errorIs(link.error, target)
  }

  unwrap(): ErrorChain | undefined {
    return this.wrapped
  }

  /**
   * First payload found walking from this node towards the root. A `null`
   * payload counts as none.
   */
  anyData(): unknown {
    for (let node: ErrorChain | undefined = this; node; node = node.wrapped) {
      if (node.data != null) return node.data
    }

    return undefined
  }

  private fill(args: readonly unknown[]): string {
    return this.isTemplate ? formatTemplate(this.text, args) : joinArgs(args)
  }
}

/** Creates a root error. */
export function createError(message: string): ErrorChain {
  return new ErrorChain({ text: message })
}

/**
 * Creates a root placeholder error whose text is a template for derived errors.
 * It is skipped when rendering but still matches with `is()`.
 */
export function createErrorTemplate(format: string): ErrorChain {
  return new ErrorChain({ text: format, isTemplate: true })
}
