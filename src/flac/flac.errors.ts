import { BitstreamError, BitstreamErrorCode } from "../bitstream/bitstream.errors";

/**
 * Error codes for FLAC frame header decoding
 * This module is framework-agnostic and does not depend on NestJS or web server context
 */
export enum FlacDecodeErrorCode {
  INVALID_SYNC_CODE = "INVALID_SYNC_CODE",
  INVALID_CHANNEL_MODE = "INVALID_CHANNEL_MODE",
  INVALID_SAMPLE_SIZE_CODE = "INVALID_SAMPLE_SIZE_CODE",
  INVALID_PADDING = "INVALID_PADDING",
  UTF8_DECODING_ERROR = "UTF8_DECODING_ERROR",
  RESERVED_BLOCKSIZE_CODE = "RESERVED_BLOCKSIZE_CODE",
  ILLEGAL_SAMPLE_RATE_CODE = "ILLEGAL_SAMPLE_RATE_CODE",
  UNEXPECTED_END_OF_INPUT = "UNEXPECTED_END_OF_INPUT",
}

/**
 * Base error class for FLAC frame header decoding
 */
export class FlacDecodeError extends Error {
  constructor(
    public readonly code: FlacDecodeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "FlacDecodeError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FlacDecodeError);
    }
  }

  /**
   * Carries a cursor failure over into the FLAC error set
   */
  static fromBitstream(error: BitstreamError): FlacDecodeError {
    const code =
      error.code === BitstreamErrorCode.UTF8_DECODING_ERROR
        ? FlacDecodeErrorCode.UTF8_DECODING_ERROR
        : FlacDecodeErrorCode.UNEXPECTED_END_OF_INPUT;
    return new FlacDecodeError(code, error.message);
  }
}

/**
 * Error returned when the header does not start with the 15-bit sync code
 */
export class InvalidSyncCodeError extends FlacDecodeError {
  constructor(public readonly syncCode: number) {
    super(
      FlacDecodeErrorCode.INVALID_SYNC_CODE,
      `Invalid sync code: 0x${syncCode.toString(16)}`,
    );
    this.name = "InvalidSyncCodeError";
  }
}

/**
 * Error returned for channel assignment codes 11-15
 */
export class InvalidChannelModeError extends FlacDecodeError {
  constructor(public readonly channelMode: number) {
    super(
      FlacDecodeErrorCode.INVALID_CHANNEL_MODE,
      `Invalid channel mode: ${channelMode}`,
    );
    this.name = "InvalidChannelModeError";
  }
}

/**
 * Error returned for the reserved sample size code
 */
export class InvalidSampleSizeCodeError extends FlacDecodeError {
  constructor(public readonly sampleSizeCode: number) {
    super(
      FlacDecodeErrorCode.INVALID_SAMPLE_SIZE_CODE,
      `Invalid sample size code: ${sampleSizeCode}`,
    );
    this.name = "InvalidSampleSizeCodeError";
  }
}

/**
 * Error returned when the reserved bit after the sample size is set
 */
export class InvalidPaddingError extends FlacDecodeError {
  constructor() {
    super(FlacDecodeErrorCode.INVALID_PADDING, "Invalid padding");
    this.name = "InvalidPaddingError";
  }
}

/**
 * Error returned for block size code 0
 */
export class ReservedBlockSizeCodeError extends FlacDecodeError {
  constructor() {
    super(FlacDecodeErrorCode.RESERVED_BLOCKSIZE_CODE, "Reserved blocksize code");
    this.name = "ReservedBlockSizeCodeError";
  }
}

/**
 * Error returned for sample rate code 15
 */
export class IllegalSampleRateCodeError extends FlacDecodeError {
  constructor(public readonly sampleRateCode: number) {
    super(
      FlacDecodeErrorCode.ILLEGAL_SAMPLE_RATE_CODE,
      `Illegal sample rate code: ${sampleRateCode}`,
    );
    this.name = "IllegalSampleRateCodeError";
  }
}
