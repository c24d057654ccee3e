import { MP4_CONSTANTS } from "./consts";
import { Mp4Box } from "./types";

/**
 * Reads the four bytes at `offset` as a type code
 */
export function readFourCC(buffer: Uint8Array, offset: number): string {
  return String.fromCharCode(
    buffer[offset],
    buffer[offset + 1],
    buffer[offset + 2],
    buffer[offset + 3],
  );
}

/**
 * Reads the box header at `offset`
 *
 * A size of 1 means a 64-bit size follows the type; a size of 0 means the box
 * runs to the end of the buffer.
 *
 * @returns The box, or null when the header is truncated, the declared size is
 * smaller than the header or the box runs past the buffer
 */
export function nextBox(buffer: Uint8Array, offset: number): Mp4Box | null {
  if (offset + MP4_CONSTANTS.BOX_HEADER_SIZE > buffer.length) {
    return null;
  }

  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  let size = view.getUint32(offset, false);
  const type = readFourCC(buffer, offset + 4);
  let headerSize: number = MP4_CONSTANTS.BOX_HEADER_SIZE;

  if (size === MP4_CONSTANTS.SIZE_LARGE) {
    if (offset + MP4_CONSTANTS.LARGE_BOX_HEADER_SIZE > buffer.length) {
      return null;
    }
    size = Number(view.getBigUint64(offset + 8, false));
    headerSize = MP4_CONSTANTS.LARGE_BOX_HEADER_SIZE;
  } else if (size === MP4_CONSTANTS.SIZE_TO_END) {
    size = buffer.length - offset;
  }

  if (size < headerSize) {
    return null;
  }

  const end = offset + size;
  if (end > buffer.length) {
    return null;
  }

  return { type, content: buffer.subarray(offset + headerSize, end), end };
}

/**
 * Iterates the sibling boxes of a buffer from offset 0
 * Stops at the first box that cannot be read.
 */
export function* iterateBoxes(buffer: Uint8Array): Generator<Mp4Box> {
  let offset = 0;
  let box = nextBox(buffer, offset);
  while (box !== null) {
    yield box;
    offset = box.end;
    box = nextBox(buffer, offset);
  }
}

/**
 * Finds the first sibling box of the given type
 * @returns The box content, or null
 */
export function findChild(buffer: Uint8Array, type: string): Uint8Array | null {
  for (const box of iterateBoxes(buffer)) {
    if (box.type === type) {
      return box.content;
    }
  }
  return null;
}
