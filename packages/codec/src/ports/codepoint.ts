/** An 8-bit unsigned unit, `0..0xFF`. */
export type Byte = number

/** A Unicode scalar value: `0..0x10FFFF` outside `0xD800..0xDFFF`. */
export type Codepoint = number

/** Number of bytes in one UTF-8 sequence. */
export type SequenceLength = 1 | 2 | 3 | 4

/**
 * Anything the decoders accept as input.
 *
 * @remarks
 * Arrays are validated element by element before decoding starts.
 */
export type ByteSource = Uint8Array | ReadonlyArray<Byte>
