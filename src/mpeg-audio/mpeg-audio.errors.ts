/**
 * Error codes for MPEG audio frame header parsing
 * This module is framework-agnostic and does not depend on NestJS or web server context
 */
export enum MpegAudioErrorCode {
  TOO_SHORT = "TOO_SHORT",
  INVALID_SYNC = "INVALID_SYNC",
  RESERVED_VERSION = "RESERVED_VERSION",
  RESERVED_LAYER = "RESERVED_LAYER",
  BAD_BITRATE = "BAD_BITRATE",
  BAD_SAMPLE_RATE = "BAD_SAMPLE_RATE",
  RESERVED_EMPHASIS = "RESERVED_EMPHASIS",
}

/**
 * Error returned when a 4-byte MPEG audio header cannot be decoded
 */
export class MpegAudioError extends Error {
  constructor(
    public readonly code: MpegAudioErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MpegAudioError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MpegAudioError);
    }
  }
}

export class TooShortError extends MpegAudioError {
  constructor(public readonly length: number) {
    super(MpegAudioErrorCode.TOO_SHORT, `Header needs 4 bytes, got ${length}`);
    this.name = "TooShortError";
  }
}

export class InvalidSyncError extends MpegAudioError {
  constructor() {
    super(MpegAudioErrorCode.INVALID_SYNC, "Missing 11-bit frame sync");
    this.name = "InvalidSyncError";
  }
}

export class ReservedVersionError extends MpegAudioError {
  constructor() {
    super(MpegAudioErrorCode.RESERVED_VERSION, "Reserved MPEG version");
    this.name = "ReservedVersionError";
  }
}

export class ReservedLayerError extends MpegAudioError {
  constructor() {
    super(MpegAudioErrorCode.RESERVED_LAYER, "Reserved layer");
    this.name = "ReservedLayerError";
  }
}

export class BadBitrateError extends MpegAudioError {
  constructor(public readonly bitrateIndex: number) {
    super(MpegAudioErrorCode.BAD_BITRATE, `Bad bitrate index: ${bitrateIndex}`);
    this.name = "BadBitrateError";
  }
}

export class BadSampleRateError extends MpegAudioError {
  constructor(public readonly sampleRateIndex: number) {
    super(
      MpegAudioErrorCode.BAD_SAMPLE_RATE,
      `Bad sample rate index: ${sampleRateIndex}`,
    );
    this.name = "BadSampleRateError";
  }
}

export class ReservedEmphasisError extends MpegAudioError {
  constructor() {
    super(MpegAudioErrorCode.RESERVED_EMPHASIS, "Reserved emphasis");
    this.name = "ReservedEmphasisError";
  }
}
