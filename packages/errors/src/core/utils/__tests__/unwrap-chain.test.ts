import { createError } from "../../error-chain"
import { WrappedError } from "../../wrap"
import { unwrapChain } from "../unwrap-chain"

describe("unwrapChain", () => {
  describe("basic chains", () => {
    it("returns single element for error without cause", () => {
      const err = new Error("solo")
      const chain = unwrapChain(err)

      expect(chain).toHaveLength(1)
      expect(chain[0]).toBe(err)
    })

    it("follows nested causes", () => {
      const root = new Error("root")
      const middle = new Error("middle", { cause: root })
      const outer = new Error("outer", { cause: middle })

      expect(unwrapChain(outer)).toEqual([outer, middle, root])
    })

    it("follows unwrap() of chain errors instead of their cause", () => {
      const base = createError("base")
      const mid = base.wrap("mid")
      const leaf = mid.wrapCause("leaf", new Error("io"))

      const chain = unwrapChain(leaf)

      expect(chain).toHaveLength(3)
      expect(chain[0]).toBe(leaf)
      expect(chain[1]).toBe(mid)
      expect(chain[2]).toBe(base)
    })

    it("stops at a root chain error", () => {
      const base = createError("base")

      expect(unwrapChain(base)).toEqual([base])
    })

    it("moves from a wrapped error to the error it wraps", () => {
      const inner = createError("inner")
      const outer = new WrappedError(inner, "context")

      expect(unwrapChain(outer)).toEqual([outer, inner])
    })

    it("handles non-Error causes", () => {
      const err = new Error("wrapper", { cause: "string cause" })

      const chain = unwrapChain(err)

      expect(chain).toHaveLength(2)
      expect(chain[0]).toBe(err)
      expect(chain[1]).toBe("string cause")
    })
  })

  describe("safety", () => {
    it("detects cycles", () => {
      const a = { cause: null as unknown, message: "a" }
      const b = { cause: a, message: "b" }
      a.cause = b

      const chain = unwrapChain(a)

      expect(chain).toHaveLength(2)
      expect(chain[0]).toBe(a)
      expect(chain[1]).toBe(b)
    })

    it("respects maxDepth", () => {
      let current = createError("root")
      for (let i = 0; i < 9; i++) {
        current = current.wrap(`level-${i}`)
      }

      expect(unwrapChain(current, 5)).toHaveLength(5)
    })

    it("uses default maxDepth of 50", () => {
      let current: Error = new Error("root")
      for (let i = 0; i < 99; i++) {
        current = new Error(`level-${i}`, { cause: current })
      }

      expect(unwrapChain(current)).toHaveLength(50)
    })
  })

  describe("edge cases", () => {
    it("handles null input", () => {
      expect(unwrapChain(null)).toHaveLength(0)
    })

    it("handles undefined input", () => {
      expect(unwrapChain(undefined)).toHaveLength(0)
    })

    it("handles string input", () => {
      expect(unwrapChain("just a string")).toEqual(["just a string"])
    })
  })
})
