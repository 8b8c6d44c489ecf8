/**
 * Bad command line: unknown command, missing operands, malformed tokens.
 */
export class UsageError extends Error {
  readonly code = "usage_error"

  constructor(message: string) {
    super(message)
    this.name = "UsageError"
  }
}
