/**
 * Error codes for length-prefixed chunk framing
 * This module is framework-agnostic and does not depend on NestJS or web server context
 */
export enum ChunkFramingErrorCode {
  INCOMPLETE_LENGTH_PREFIX = "INCOMPLETE_LENGTH_PREFIX",
  INCOMPLETE_CHUNK_DATA = "INCOMPLETE_CHUNK_DATA",
}

/**
 * Base error class for chunk framing errors
 * Carries the index the failed record would have had and the byte offset it starts at
 */
export class ChunkFramingError extends Error {
  constructor(
    public readonly code: ChunkFramingErrorCode,
    public readonly index: number,
    public readonly offset: number,
    message: string,
  ) {
    super(message);
    this.name = "ChunkFramingError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ChunkFramingError);
    }
  }
}

/**
 * Error yielded when 1-3 bytes remain where a 4-byte length is expected
 */
export class IncompleteLengthPrefixError extends ChunkFramingError {
  constructor(index: number, offset: number, public readonly remaining: number) {
    super(
      ChunkFramingErrorCode.INCOMPLETE_LENGTH_PREFIX,
      index,
      offset,
      `Incomplete length prefix at offset ${offset}: ${remaining} of 4 bytes`,
    );
    this.name = "IncompleteLengthPrefixError";
  }
}

/**
 * Error yielded when a declared length runs past the end of the buffer
 */
export class IncompleteChunkDataError extends ChunkFramingError {
  constructor(
    index: number,
    offset: number,
    public readonly declaredLength: number,
    public readonly remaining: number,
  ) {
    super(
      ChunkFramingErrorCode.INCOMPLETE_CHUNK_DATA,
      index,
      offset,
      `Chunk ${index} declares ${declaredLength} bytes but only ${remaining} remain`,
    );
    this.name = "IncompleteChunkDataError";
  }
}
