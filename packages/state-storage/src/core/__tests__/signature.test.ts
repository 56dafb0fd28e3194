import { compareSignatures, formatSignature, signaturesEqual } from "../signature"

describe("signatures", () => {
  it.each([
    { expected: [1, 7], actual: [1, 7], match: true },
    { expected: [], actual: [], match: true },
    { expected: [1, 7], actual: [1, 8], match: false },
    { expected: [1, 7], actual: [2, 7, 0], match: false },
    { expected: [2, 7, 0], actual: [1, 7], match: false },
  ])("$expected vs $actual matches: $match", ({ expected, actual, match }) => {
    expect(signaturesEqual(expected, actual)).toBe(match)
  })

  it("reports the first differing element", () => {
    expect(compareSignatures([3, 1, 2, 3], [3, 1, 5, 3])).toEqual({
      match: false,
      index: 2,
      expected: 2,
      actual: 5,
    })
  })

  it("reports a length difference at the first missing index", () => {
    expect(compareSignatures([1, 7], [1, 7, 0])).toEqual({
      match: false,
      index: 2,
      expected: undefined,
      actual: 0,
    })
  })

  it("formats signatures for diagnostics", () => {
    expect(formatSignature([2, 1, 3])).toBe("[2, 1, 3]")
  })
})
