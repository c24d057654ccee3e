import { BitCursor } from "./bit-cursor";
import { Utf8DecodingError } from "./bitstream.errors";

const CONTINUATION_BIT = 0x80;
const PAYLOAD_MASK = 0x7f;
const GUARD_SHIFT = 36;
const FINAL_BYTE_OVERFLOW_MASK = 0xf8;
/** Shift of the first byte at or past the guard (shifts advance in steps of 7) */
const FINAL_SHIFT = Math.ceil(GUARD_SHIFT / 7) * 7;
/** Exclusive upper bound of a decodable value */
export const FLAC_VARINT_LIMIT = 2 ** (FINAL_SHIFT + 3);

/**
 * Decodes the variable-length frame/sample number carried in FLAC frame headers
 *
 * Each byte contributes its low 7 bits, least significant group first, and a set
 * top bit means another byte follows. Once the shift has reached 36 the next byte
 * may only carry 3 payload bits (its top five bits must be clear), so the seventh
 * byte always terminates and the value stays below 2^45.
 *
 * @throws UnexpectedEndOfInputError when the buffer ends before a terminating byte
 * @throws Utf8DecodingError when a byte past the guard shift has any of its top five bits set
 */
export function readFlacVarInt(cursor: BitCursor): number {
  let value = 0;
  let shift = 0;

  for (;;) {
    const byte = cursor.read(8);
    if (shift >= GUARD_SHIFT && (byte & FINAL_BYTE_OVERFLOW_MASK) !== 0) {
      throw new Utf8DecodingError(byte);
    }

    // Values go past 32 bits, so no bitwise operators on the accumulator
    value += (byte & PAYLOAD_MASK) * 2 ** shift;
    shift += 7;

    if ((byte & CONTINUATION_BIT) === 0) {
      return value;
    }
  }
}

/**
 * Encodes a value in the same scheme {@link readFlacVarInt} decodes
 * Used to build frame headers for STREAMINFO round trips and fixtures.
 * @throws RangeError for negative or fractional values, or values at or past {@link FLAC_VARINT_LIMIT}
 */
export function encodeFlacVarInt(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0 || value >= FLAC_VARINT_LIMIT) {
    throw new RangeError(`Value out of range for the frame number encoding: ${value}`);
  }

  const bytes: number[] = [];
  let rest = value;
  do {
    const group = rest % 128;
    rest = Math.floor(rest / 128);
    bytes.push(rest > 0 ? group | CONTINUATION_BIT : group);
  } while (rest > 0);

  return Uint8Array.from(bytes);
}
