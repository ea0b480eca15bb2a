import { formatTemplate, joinArgs } from "../format"

describe("formatTemplate", () => {
  it("fills string and number placeholders", () => {
    expect(formatTemplate("%s failed after %d attempts", ["fetch", 3])).toBe(
      "fetch failed after 3 attempts",
    )
  })

  it("serializes %j placeholders as JSON", () => {
    expect(formatTemplate("payload %j", [{ id: 1 }])).toBe('payload {"id":1}')
  })

  it("leaves placeholders without arguments in place", () => {
    expect(formatTemplate("%s: %s", ["only"])).toBe("only: %s")
  })

  it("falls back to joining the args when formatting throws", () => {
    expect(formatTemplate("v=%j", [10n, "!"])).toBe("10n!")
  })

  it("appends surplus arguments with a space", () => {
    expect(formatTemplate("done", ["late"])).toBe("done late")
  })
})

describe("joinArgs", () => {
  it("concatenates display texts without a separator", () => {
    expect(joinArgs(["a", 1, new Error("e")])).toBe("a1e")
  })

  it("returns an empty string for no args", () => {
    expect(joinArgs([])).toBe("")
  })
})
