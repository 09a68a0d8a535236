import { formatPath } from "../format-path"

describe("formatPath", () => {
  it("renders the root as $", () => {
    expect(formatPath([])).toBe("$")
  })

  it("renders indexes and identifier keys", () => {
    expect(formatPath(["b", 1, "c_2"])).toBe("$.b[1].c_2")
  })

  it("quotes keys that are not identifiers", () => {
    expect(formatPath(["a b", "1x"])).toBe('$["a b"]["1x"]')
  })
})
