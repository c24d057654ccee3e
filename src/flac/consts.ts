/**
 * FLAC frame header constants
 */
export const FLAC_CONSTANTS = {
  SYNC_CODE: 0x7ffc,
  SYNC_CODE_BITS: 15,
  SYNC_BYTE: 0xff,
  SYNC_SECOND_BYTE_MASK: 0xfc,
  SYNC_SECOND_BYTE: 0xf8,
  MAX_INDEPENDENT_CHANNEL_CODE: 7,
  MAX_DECORRELATED_CHANNEL_CODE: 10,
  RESERVED_SAMPLE_SIZE_CODE: 3,
  RESERVED_BLOCK_SIZE_CODE: 0,
  BLOCK_SIZE_8BIT_CODE: 6,
  BLOCK_SIZE_16BIT_CODE: 7,
  SAMPLE_RATE_KHZ_CODE: 12,
  SAMPLE_RATE_HZ_CODE: 13,
  SAMPLE_RATE_DECAHZ_CODE: 14,
  STREAMINFO_SIZE: 34,
} as const;

/**
 * Bits per sample by 3-bit sample size code; 0 means "from STREAMINFO", code 3 is reserved
 */
export const FLAC_SAMPLE_SIZES = [0, 8, 12, 0, 16, 20, 24, 32] as const;

/**
 * Block size by 4-bit code; codes 6 and 7 read the size from the header instead
 */
export const FLAC_BLOCK_SIZES = [
  0, 192, 576, 1152, 2304, 4608, 0, 0, 256, 512, 1024, 2048, 4096, 8192, 16384, 32768,
] as const;

/**
 * Sample rate by 4-bit code for codes 0-11; 0 means "from STREAMINFO"
 */
export const FLAC_SAMPLE_RATES = [
  0, 88200, 176400, 192000, 8000, 16000, 22050, 24000, 32000, 44100, 48000, 96000,
] as const;
