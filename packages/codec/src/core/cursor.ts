import type { Byte, ByteSource } from "../ports/codepoint"
import { toBytes } from "./bytes"

/**
 * A read position inside a byte buffer, bounded by `end`.
 *
 * Invariant: `0 <= position <= end <= bytes.length`.
 *
 * A cursor belongs to a single decode call. It is never shared.
 */
export class ByteCursor {
  private pos: number

  constructor(
    private readonly bytes: Uint8Array,
    start: number = 0,
    readonly end: number = bytes.length,
  ) {
    if (!Number.isInteger(end) || end < 0 || end > bytes.length) {
      throw new RangeError(`end must be an integer in 0..${bytes.length} (got ${end})`)
    }

    if (!Number.isInteger(start) || start < 0 || start > end) {
      throw new RangeError(`start must be an integer in 0..${end} (got ${start})`)
    }

    this.pos = start
  }

  get position(): number {
    return this.pos
  }

  /** Bytes between the position and `end`. */
  get remaining(): number {
    return this.end - this.pos
  }

  isAtEnd(): boolean {
    return this.pos >= this.end
  }

  /**
   * Byte at `position + ahead`, or `undefined` at or past `end`.
   */
  peek(ahead: number = 0): Byte | undefined {
    const i = this.pos + ahead
    return i < this.end ? this.bytes[i] : undefined
  }

  advance(count: number): void {
    if (!Number.isInteger(count) || count < 0 || count > this.remaining) {
      throw new RangeError(`cannot advance by ${count} with ${this.remaining} bytes left`)
    }

    this.pos += count
  }
}

export function createCursor(source: ByteSource, start?: number, end?: number): ByteCursor {
  return new ByteCursor(toBytes(source), start, end)
}
