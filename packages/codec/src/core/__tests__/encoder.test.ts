import { EncodeError } from "../errors/encode-error"
import { encode, encodeAll, encodedLength, encodeText } from "../encoder"

function bytes(u8: Uint8Array): number[] {
  return [...u8]
}

describe("encode", () => {
  describe("length bands", () => {
    it.each([
      [0x00, [0x00]],
      [0x41, [0x41]],
      [0x7f, [0x7f]],
      [0x80, [0xc2, 0x80]],
      [0xa2, [0xc2, 0xa2]],
      [0x7ff, [0xdf, 0xbf]],
      [0x800, [0xe0, 0xa0, 0x80]],
      [0x20ac, [0xe2, 0x82, 0xac]],
      [0xd55c, [0xed, 0x95, 0x9c]],
      [0xffff, [0xef, 0xbf, 0xbf]],
      [0x10000, [0xf0, 0x90, 0x80, 0x80]],
      [0x10348, [0xf0, 0x90, 0x8d, 0x88]],
      [0x10ffff, [0xf4, 0x8f, 0xbf, 0xbf]],
    ])("encodes %i", (cp, expected) => {
      expect(bytes(encode(cp))).toEqual(expected)
    })

    it("encodes the values next to the surrogate band", () => {
      expect(bytes(encode(0xd7ff))).toEqual([0xed, 0x9f, 0xbf])
      expect(bytes(encode(0xe000))).toEqual([0xee, 0x80, 0x80])
    })
  })

  describe("invalid codepoints", () => {
    it.each([
      [0xd800, "surrogate"],
      [0xdbff, "surrogate"],
      [0xdfff, "surrogate"],
      [0x110000, "out_of_range"],
      [-1, "out_of_range"],
      [1.5, "not_an_integer"],
      [Number.NaN, "not_an_integer"],
    ])("rejects %d as %s", (cp, reason) => {
      try {
        encode(cp)
        expect.unreachable("encode should have thrown")
      } catch (err) {
        expect(err).toBeInstanceOf(EncodeError)
        expect(err).toMatchObject({ code: "invalid_codepoint", reason })
      }
    })

    it("describes the rejected value", () => {
      expect(() => encode(0xd800)).toThrow("Cannot encode 55296: surrogate")
      expect(() => encode(0x110000)).toThrow("Cannot encode 1114112: out of range")
    })

    it("records the codepoint in the context", () => {
      const err = new EncodeError(0x110000, "out_of_range")

      expect(err.context).toEqual({ codepoint: 0x110000, reason: "out_of_range" })
    })
  })
})

describe("encodedLength", () => {
  it("follows the range table", () => {
    expect(encodedLength(0x7f)).toBe(1)
    expect(encodedLength(0x80)).toBe(2)
    expect(encodedLength(0x7ff)).toBe(2)
    expect(encodedLength(0x800)).toBe(3)
    expect(encodedLength(0xffff)).toBe(3)
    expect(encodedLength(0x10000)).toBe(4)
  })

  it("throws for values that are not scalar values", () => {
    expect(() => encodedLength(0xdc00)).toThrow(EncodeError)
  })
})

describe("encodeAll", () => {
  it("concatenates the encodings in order", () => {
    const result = encodeAll([0xa2, 0x20ac, 0xd55c, 0x10348])

    expect(bytes(result.bytes)).toEqual([
      0xc2, 0xa2, 0xe2, 0x82, 0xac, 0xed, 0x95, 0x9c, 0xf0, 0x90, 0x8d, 0x88,
    ])
    expect(result.failures).toEqual([])
  })

  it("keeps the bytes of valid entries when others fail", () => {
    const result = encodeAll([0x41, 0xd800, 0x42, 0x110000])

    expect(bytes(result.bytes)).toEqual([0x41, 0x42])
    expect(result.failures.map((f) => [f.index, f.codepoint, f.error.reason])).toEqual([
      [1, 0xd800, "surrogate"],
      [3, 0x110000, "out_of_range"],
    ])
  })

  it("returns empty output for empty input", () => {
    const result = encodeAll([])

    expect(result.bytes).toHaveLength(0)
    expect(result.failures).toHaveLength(0)
  })

  it("accepts any iterable", () => {
    const result = encodeAll(new Set([0x41, 0x42]))

    expect(bytes(result.bytes)).toEqual([0x41, 0x42])
  })
})

describe("encodeText", () => {
  it("encodes a string by code point", () => {
    expect(bytes(encodeText("¢€한𐍈"))).toEqual([
      0xc2, 0xa2, 0xe2, 0x82, 0xac, 0xed, 0x95, 0x9c, 0xf0, 0x90, 0x8d, 0x88,
    ])
  })

  it("returns no bytes for an empty string", () => {
    expect(encodeText("")).toHaveLength(0)
  })

  it("rejects a lone surrogate", () => {
    expect(() => encodeText("a\ud800b")).toThrow(EncodeError)
  })
})
