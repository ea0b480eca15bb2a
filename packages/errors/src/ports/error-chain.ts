/**
 * The cause attached to a chain node.
 *
 * Decided once when the cause is attached: chain causes render and match
 * structurally, anything else is opaque and rendered by its display text.
 */
export type ChainCause =
  | Readonly<{ kind: "chain"; node: ChainNode }>
  | Readonly<{ kind: "foreign"; error: unknown }>

/**
 * Read-only view of one element of a derivation lineage.
 */
export interface ChainNode extends Matchable {
  /** Display text, or a format template when `isTemplate` is set */
  readonly text: string

  /** Placeholder node: skipped when rendering, still part of the identity chain */
  readonly isTemplate: boolean

  /** The node this one was derived from */
  readonly wrapped: ChainNode | undefined

  readonly link: ChainCause | undefined

  /** Errors bundled with this node for reporting, in insertion order */
  extras(): readonly unknown[]
}

/** A value answering identity questions about itself, like `ErrorChain.is`. */
export interface Matchable {
  is(target: unknown): boolean
}

/** A value exposing the single parent it was derived from. */
export interface Unwrappable {
  unwrap(): unknown
}
