/**
 * Error codes raised while reading a bitstream
 * This module is framework-agnostic and does not depend on NestJS or web server context
 */
export enum BitstreamErrorCode {
  UNEXPECTED_END_OF_INPUT = "UNEXPECTED_END_OF_INPUT",
  UTF8_DECODING_ERROR = "UTF8_DECODING_ERROR",
}

/**
 * Base error class for bitstream errors
 */
export class BitstreamError extends Error {
  constructor(
    public readonly code: BitstreamErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "BitstreamError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BitstreamError);
    }
  }
}

/**
 * Error thrown when a read addresses a byte past the end of the buffer
 */
export class UnexpectedEndOfInputError extends BitstreamError {
  constructor(public readonly bitPosition: number) {
    super(
      BitstreamErrorCode.UNEXPECTED_END_OF_INPUT,
      `Unexpected end of input at bit ${bitPosition}`,
    );
    this.name = "UnexpectedEndOfInputError";
  }
}

/**
 * Error thrown when a variable-length integer would exceed its width ceiling
 */
export class Utf8DecodingError extends BitstreamError {
  constructor(public readonly byte: number) {
    super(
      BitstreamErrorCode.UTF8_DECODING_ERROR,
      `UTF-8 decoding error: continuation byte 0x${byte.toString(16)} overflows the coded number`,
    );
    this.name = "Utf8DecodingError";
  }
}
