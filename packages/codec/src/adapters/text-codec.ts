import type { Codec } from "../ports/codec"
import { decodeToString } from "../core/decoder"
import { encodeText } from "../core/encoder"

export const textCodec: Codec<string> = {
  encode: (text) => encodeText(text),
  decode: (bytes) => decodeToString(bytes),
}
