/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and its UTF-8 byte representation.
 *
 * @remarks
 * Codecs are pure, deterministic transforms. Both directions throw a
 * `CodecError` when the input cannot be represented.
 *
 * @example
 * ```ts
 * const bytes = textCodec.encode("¢€")
 * textCodec.decode(bytes) // "¢€"
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
