/**
 * MPEG version enum
 */
export enum MpegVersion {
  MPEG1 = "MPEG-1",
  MPEG2 = "MPEG-2",
  MPEG25 = "MPEG-2.5",
}

/**
 * MPEG layer enum
 */
export enum MpegLayer {
  Layer1 = "Layer 1",
  Layer2 = "Layer 2",
  Layer3 = "Layer 3",
}

export enum MpegChannelMode {
  Stereo = "stereo",
  JointStereo = "joint-stereo",
  DualChannel = "dual-channel",
  Mono = "mono",
}

/**
 * Decoded 4-byte MPEG audio frame header
 */
export interface MpegAudioFrameHeader {
  version: MpegVersion;
  layer: MpegLayer;
  /**
   * Bitrate in kbps
   */
  bitrate: number;
  sampleRate: number;
  padding: boolean;
  channelMode: MpegChannelMode;
  samplesPerFrame: number;
  /**
   * Whole frame length in bytes, header included
   */
  frameLength: number;
}

/**
 * A header located by a stream scan
 */
export interface MpegAudioScanMatch {
  offset: number;
  header: MpegAudioFrameHeader;
}
