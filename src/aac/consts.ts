/**
 * ADTS header layout constants
 */
export const ADTS_CONSTANTS = {
  SYNC_BYTE: 0xff,
  SYNC_NIBBLE_MASK: 0xf0,
  LAYER_MASK: 0x06,
  PROTECTION_ABSENT_MASK: 0x01,
  HEADER_SIZE: 7,
  HEADER_SIZE_WITH_CRC: 9,
  RESERVED_PROFILE: 0x03,
  MAX_SAMPLING_INDEX: 11,
  MAX_CHANNEL_CONFIG: 7,
  MAX_FRAME_LENGTH: 0x1fff,
  FRAME_LENGTH_LOW_PADDING: 0x1f, // Low 5 bits of byte 5: top of buffer fullness
  BUFFER_FULLNESS_BYTE: 0xfc,
  FORBIDDEN_SAMPLING_INDEX: 0x0f,
  ASC_PREFIX_SIZE: 2,
} as const;

/**
 * Codec byte codes accepted by header synthesis
 */
export const AAC_PROFILE_CODES = {
  LC: 0x66,
  HE_V1: 0x67,
  HE_V2: 0x68,
} as const;

export type AacProfileCode = (typeof AAC_PROFILE_CODES)[keyof typeof AAC_PROFILE_CODES];

/**
 * Sampling rates indexed by samplingFrequencyIndex (ISO/IEC 14496-3)
 */
export const AAC_SAMPLE_RATES = [
  96000, 88200, 64000, 48000, 44100, 32000, 24000, 22050, 16000, 12000, 11025, 8000, 7350,
] as const;

/**
 * Two-bit ADTS profile written for each codec byte code
 */
export const PROFILE_OBJECT_TYPES: ReadonlyMap<number, number> = new Map([
  [AAC_PROFILE_CODES.LC, 1],
  [AAC_PROFILE_CODES.HE_V1, 2],
  [AAC_PROFILE_CODES.HE_V2, 3],
]);

/**
 * Codec byte code for each AudioSpecificConfig object type
 */
export const AUDIO_OBJECT_TYPE_PROFILES: ReadonlyMap<number, AacProfileCode> = new Map([
  [1, AAC_PROFILE_CODES.LC],
  [2, AAC_PROFILE_CODES.HE_V1],
  [5, AAC_PROFILE_CODES.HE_V2],
]);
