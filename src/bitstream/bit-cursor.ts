import { UnexpectedEndOfInputError } from "./bitstream.errors";

/**
 * Widest field a single read can return as an unsigned number
 */
export const MAX_READ_BITS = 32;

/**
 * MSB-first bit reader over a byte buffer
 *
 * Bit `p` lives in byte `p >> 3` at bit index `7 - (p & 7)`. The position only
 * moves forward; a failed read leaves it wherever the last successful bit put it.
 */
export class BitCursor {
  private bitPosition = 0;

  constructor(private readonly data: Uint8Array) {}

  /**
   * Current position in bits from the start of the buffer
   */
  get position(): number {
    return this.bitPosition;
  }

  /**
   * Number of bits between the position and the end of the buffer
   */
  get remaining(): number {
    return Math.max(0, this.data.length * 8 - this.bitPosition);
  }

  /**
   * Reads a single bit
   * @throws UnexpectedEndOfInputError past the last byte
   */
  readBit(): boolean {
    const byteIndex = this.bitPosition >>> 3;
    if (byteIndex >= this.data.length) {
      throw new UnexpectedEndOfInputError(this.bitPosition);
    }

    const bitIndex = 7 - (this.bitPosition & 7);
    this.bitPosition++;
    return ((this.data[byteIndex] >>> bitIndex) & 1) === 1;
  }

  /**
   * Reads `bitCount` bits as an unsigned big-endian number
   * @param bitCount - Field width, 0 to 32
   * @throws UnexpectedEndOfInputError when the field runs past the buffer
   */
  read(bitCount: number): number {
    if (!Number.isInteger(bitCount) || bitCount < 0 || bitCount > MAX_READ_BITS) {
      throw new RangeError(`Bit count must be an integer in 0..${MAX_READ_BITS}, got ${bitCount}`);
    }

    let result = 0;
    for (let i = 0; i < bitCount; i++) {
      // Multiply instead of shifting so a 32-bit field stays unsigned
      result = result * 2 + (this.readBit() ? 1 : 0);
    }
    return result;
  }

  /**
   * Advances the position without reading
   * Landing exactly on the end of the buffer is allowed; landing past it is not.
   * @throws UnexpectedEndOfInputError when the new position is past the buffer
   */
  skip(bitCount: number): void {
    if (!Number.isInteger(bitCount) || bitCount < 0) {
      throw new RangeError(`Bit count must be a non-negative integer, got ${bitCount}`);
    }

    this.bitPosition += bitCount;
    if (this.bitPosition > this.data.length * 8) {
      throw new UnexpectedEndOfInputError(this.bitPosition);
    }
  }
}
