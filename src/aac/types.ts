/**
 * Decoded ADTS header
 */
export interface AdtsHeader {
  /**
   * True when no CRC follows the fixed header (7-byte header), false for 9 bytes
   */
  protectionAbsent: boolean;

  /**
   * Two-bit profile field (audio object type minus one)
   */
  profile: number;

  samplingFrequencyIndex: number;

  /**
   * Sampling rate in Hz for the index
   */
  sampleRate: number;

  /**
   * Channel configuration, 0 when it is signalled in the payload
   */
  channelConfig: number;

  /**
   * Frame length in bytes including the header
   */
  frameLength: number;

  headerLength: number;
}
