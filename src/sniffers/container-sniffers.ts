/**
 * Fixed-pattern container checks
 * Each check looks at magic bytes only and never decodes the container.
 */

const EBML_MAGIC = [0x1a, 0x45, 0xdf, 0xa3] as const;
const ANNEXB_LONG_START_CODE = [0x00, 0x00, 0x00, 0x01] as const;
const ANNEXB_START_CODE = [0x00, 0x00, 0x01] as const;
const DOCTYPE_SEARCH_WINDOW = 64;

function asBuffer(data: Uint8Array): Buffer {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

function startsWith(data: Uint8Array, magic: readonly number[], offset = 0): boolean {
  if (data.length < offset + magic.length) {
    return false;
  }
  return magic.every((byte, i) => data[offset + i] === byte);
}

function hasAscii(data: Uint8Array, text: string, offset: number): boolean {
  return asBuffer(data).toString("latin1", offset, offset + text.length) === text;
}

/**
 * RIFF header with the WAVE form type
 */
export function isWav(data: Uint8Array): boolean {
  return data.length >= 12 && hasAscii(data, "RIFF", 0) && hasAscii(data, "WAVE", 8);
}

/**
 * EBML magic at offset 0 (Matroska family)
 */
export function isEbml(data: Uint8Array): boolean {
  return startsWith(data, EBML_MAGIC);
}

function hasDocType(data: Uint8Array, docType: string): boolean {
  if (!isEbml(data)) {
    return false;
  }
  return asBuffer(data).subarray(0, DOCTYPE_SEARCH_WINDOW).indexOf(docType, 0, "latin1") !== -1;
}

export function isWebm(data: Uint8Array): boolean {
  return hasDocType(data, "webm");
}

export function isMatroska(data: Uint8Array): boolean {
  return hasDocType(data, "matroska");
}

/**
 * Identification header of an Opus stream, found anywhere in the buffer
 */
export function hasOpusHead(data: Uint8Array): boolean {
  return asBuffer(data).indexOf("OpusHead", 0, "latin1") !== -1;
}

/**
 * Ogg page capture pattern at 0 plus an Opus identification header
 */
export function isOggOpus(data: Uint8Array): boolean {
  return data.length >= 4 && hasAscii(data, "OggS", 0) && hasOpusHead(data);
}

/**
 * H.264 Annex-B byte stream: a 3-byte start code anywhere or a 4-byte one at 0
 */
export function isAnnexB(data: Uint8Array): boolean {
  if (startsWith(data, ANNEXB_LONG_START_CODE)) {
    return true;
  }
  return asBuffer(data).indexOf(Uint8Array.from(ANNEXB_START_CODE)) !== -1;
}
