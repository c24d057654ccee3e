/**
 * Inter-channel decorrelation used by a FLAC frame
 */
export enum FlacChannelMode {
  Independent = "independent",
  LeftSide = "left-side",
  RightSide = "right-side",
  MidSide = "mid-side",
}

/**
 * Decorrelation submodes in header order (channel code minus 7)
 */
export const DECORRELATED_CHANNEL_MODES: readonly FlacChannelMode[] = [
  FlacChannelMode.LeftSide,
  FlacChannelMode.RightSide,
  FlacChannelMode.MidSide,
];

/**
 * Fields of one FLAC frame header
 */
export interface FlacFrameInfo {
  /**
   * Blocking strategy bit: the number field counts samples when set, frames when clear
   */
  variableBlockSize: boolean;

  blockSize: number;

  /**
   * Sample rate in Hz, 0 when the stream's STREAMINFO carries it
   */
  sampleRate: number;

  channelMode: FlacChannelMode;

  channels: number;

  /**
   * Bits per sample, 0 when the stream's STREAMINFO carries it
   */
  bitsPerSample: number;

  frameOrSampleNumber: number;

  /**
   * Header CRC-8 as read from the stream; not verified
   */
  crc8: number;
}
