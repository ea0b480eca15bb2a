import { createError } from "../../../core/error-chain"
import { serializeChainError } from "../chain-serializer"

describe("serializeChainError", () => {
  describe("ErrorChain values", () => {
    it("serializes the rendered message", () => {
      const serialized = serializeChainError(createError("a").wrap("b"))

      expect(serialized).toMatchObject({ type: "ErrorChain", message: "a: b" })
    })

    it("includes the stack", () => {
      const serialized = serializeChainError(createError("a"))

      expect(serialized).toHaveProperty("stack", expect.stringContaining("ErrorChain"))
    })

    it("omits data, extras and cause when absent", () => {
      const serialized = serializeChainError(createError("a"))

      expect(serialized).not.toHaveProperty("data")
      expect(serialized).not.toHaveProperty("extras")
      expect(serialized).not.toHaveProperty("cause")
    })

    it("includes the payload and the text of each extra", () => {
      const err = createError("a").wrapData("b", { id: 1 }).extra(new Error("x")).extra("y")

      expect(serializeChainError(err)).toMatchObject({
        message: "a: b + x + y",
        data: { id: 1 },
        extras: ["x", "y"],
      })
    })

    it("serializes a node that is its own extra", () => {
      const err = createError("a")
      err.extra(err)

      expect(serializeChainError(err)).toMatchObject({ message: "a + a", extras: ["a + a"] })
    })

    it("serializes a chain cause recursively", () => {
      const err = createError("a").wrapCause("b", createError("c").wrap("d"))

      expect(serializeChainError(err)).toMatchObject({
        message: "a: b < c: d",
        cause: { type: "ErrorChain", message: "c: d" },
      })
    })

    it("serializes a foreign cause with errWithCause", () => {
      const err = createError("a").wrapCause("b", new RangeError("io"))

      expect(serializeChainError(err)).toMatchObject({
        cause: { type: "RangeError", message: "io" },
      })
    })
  })

  describe("other values", () => {
    it("serializes standard errors", () => {
      expect(serializeChainError(new TypeError("bad"))).toMatchObject({
        type: "TypeError",
        message: "bad",
      })
    })

    it("passes non-errors through", () => {
      const value = { reason: "x" }

      expect(serializeChainError(value)).toBe(value)
      expect(serializeChainError("text")).toBe("text")
    })
  })
})
