/** Marker bits of a two-byte lead: `110x xxxx`. */
export const B2_LEAD = 0xc0
/** Data bits of a two-byte lead. */
export const B2_MASK = 0x1f
/** Marker bits of a three-byte lead: `1110 xxxx`. */
export const B3_LEAD = 0xe0
/** Data bits of a three-byte lead. */
export const B3_MASK = 0x0f
/** Marker bits of a four-byte lead: `1111 0xxx`. */
export const B4_LEAD = 0xf0
/** Data bits of a four-byte lead. */
export const B4_MASK = 0x07
/** Marker bits of a continuation byte: `10xx xxxx`. */
export const MB_LEAD = 0x80
/** Data bits of a continuation byte. */
export const MB_MASK = 0x3f
/** Selects the two marker bits of a continuation byte. */
export const MB_MARKER_MASK = 0xc0

export const CONTINUATION_BITS = 6

/** Largest value each sequence length can carry. */
export const MAX_ONE_BYTE = 0x7f
export const MAX_TWO_BYTE = 0x7ff
export const MAX_THREE_BYTE = 0xffff
export const MAX_CODEPOINT = 0x10ffff

export const SURROGATE_MIN = 0xd800
export const SURROGATE_MAX = 0xdfff

/**
 * Smallest value that may be encoded with a given sequence length.
 * Anything lower is an overlong encoding.
 */
export const MIN_VALUE_FOR_LENGTH = {
  1: 0,
  2: 0x80,
  3: 0x800,
  4: 0x10000,
} as const
