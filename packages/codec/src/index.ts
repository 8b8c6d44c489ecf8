export { codepointCodec } from "./adapters/codepoint-codec"
export { textCodec } from "./adapters/text-codec"
export { decodeAscii } from "./core/ascii"
export { toBytes } from "./core/bytes"
export {
  B2_LEAD,
  B2_MASK,
  B3_LEAD,
  B3_MASK,
  B4_LEAD,
  B4_MASK,
  MAX_CODEPOINT,
  MB_LEAD,
  MB_MASK,
  MIN_VALUE_FOR_LENGTH,
  SURROGATE_MAX,
  SURROGATE_MIN,
} from "./core/constants"
export { ByteCursor, createCursor } from "./core/cursor"
export { decode, decodeToString, nextCodepoint } from "./core/decoder"
export {
  type EncodeBatchResult,
  type EncodeFailure,
  encode,
  encodeAll,
  encodedLength,
  encodeText,
} from "./core/encoder"
export {
  CodecError,
  type CodecErrorOptions,
  type ErrorCode,
  type ErrorContext,
  isCodecError,
  type SerializedCodecError,
} from "./core/errors/codec-error"
export { DecodeError, type DecodeErrorCode } from "./core/errors/decode-error"
export { EncodeError, type InvalidCodepointReason } from "./core/errors/encode-error"
export type { Codec } from "./ports/codec"
export type { Byte, ByteSource, Codepoint, SequenceLength } from "./ports/codepoint"
export type {
  DecodedValue,
  DecodeStep,
  EndOfInput,
  InvalidSequence,
  InvalidSequenceReason,
  TruncatedSequence,
} from "./ports/decode-step"
