/**
 * MPEG audio frame header constants
 */
export const MPEG_AUDIO_CONSTANTS = {
  SYNC_BYTE: 0xff,
  SYNC_MASK: 0xe0,
  FRAME_HEADER_SIZE: 4,
  VERSION_RESERVED: 0x01,
  LAYER_RESERVED: 0x00,
  BITRATE_INDEX_FREE: 0x00,
  BITRATE_INDEX_BAD: 0x0f,
  SAMPLE_RATE_INDEX_RESERVED: 0x03,
  EMPHASIS_RESERVED: 0x02,
  LAYER1_PADDING_BYTES: 4,
  PADDING_BYTES: 1,
  MIN_SCAN_FRAME_LENGTH: 16, // shorter frames are sync-like noise
} as const;

// Bitrates in kbps for bitrate indices 1-14
export const MPEG1_LAYER1_BITRATES = [
  32, 64, 96, 128, 160, 192, 224, 256, 288, 320, 352, 384, 416, 448,
] as const;

export const MPEG1_LAYER2_BITRATES = [
  32, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320, 384,
] as const;

export const MPEG1_LAYER3_BITRATES = [
  32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320,
] as const;

// MPEG-2 and MPEG-2.5 share these
export const MPEG2_LAYER1_BITRATES = [
  32, 48, 56, 64, 80, 96, 112, 128, 144, 160, 176, 192, 224, 256,
] as const;

export const MPEG2_LAYER23_BITRATES = [
  8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160,
] as const;

export const MPEG1_SAMPLE_RATES = [44100, 48000, 32000] as const;
export const MPEG2_SAMPLE_RATES = [22050, 24000, 16000] as const;
export const MPEG25_SAMPLE_RATES = [11025, 12000, 8000] as const;
