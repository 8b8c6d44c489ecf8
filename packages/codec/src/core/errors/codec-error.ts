export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to codec errors (offsets, offending bytes).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type CodecErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

/**
 * JSON-safe shape of a codec error for logs and transport.
 */
export type SerializedCodecError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  stack?: string
}>

export class CodecError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext

  /**
   * `true` for rejected input, `false` for a broken invariant inside the codec.
   * @default true
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: CodecErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedCodecError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      isOperational: this.isOperational,
      timestamp: this.timestamp.toISOString(),
    }
  }
}

/**
 * Type guard for errors raised by this package.
 *
 * @example
 * ```ts
 * try {
 *   decode(bytes)
 * } catch (err) {
 *   if (isCodecError(err)) console.log(err.code, err.context)
 * }
 * ```
 */
export function isCodecError(err: unknown): err is CodecError {
  return err instanceof CodecError
}
