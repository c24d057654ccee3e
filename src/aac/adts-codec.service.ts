import { Injectable } from "@nestjs/common";
import {
  AAC_PROFILE_CODES,
  AAC_SAMPLE_RATES,
  ADTS_CONSTANTS,
  AUDIO_OBJECT_TYPE_PROFILES,
  PROFILE_OBJECT_TYPES,
} from "./consts";
import { AdtsHeader } from "./types";

/**
 * Parses and synthesizes AAC ADTS headers
 * Every method is byte-aligned and works on the first frame of the buffer only.
 */
@Injectable()
export class AdtsCodecService {
  /**
   * Structural plausibility check for an ADTS frame at the start of the buffer
   * Checks sync, layer, profile and sampling index; does not decode the frame.
   * @param data - Candidate bytes
   * @returns true if the first 7 bytes look like an ADTS header
   */
  isAdtsLike(data: Uint8Array): boolean {
    if (data.length < ADTS_CONSTANTS.HEADER_SIZE) {
      return false;
    }

    if (!this.hasSync(data)) {
      return false;
    }

    const layer = (data[1] & ADTS_CONSTANTS.LAYER_MASK) >> 1;
    if (layer !== 0) {
      return false;
    }

    const profile = (data[2] >> 6) & 0x03;
    if (profile === ADTS_CONSTANTS.RESERVED_PROFILE) {
      return false;
    }

    const samplingIndex = (data[2] >> 2) & 0x0f;
    return samplingIndex <= ADTS_CONSTANTS.MAX_SAMPLING_INDEX;
  }

  /**
   * Decodes the header fields of the first ADTS frame
   * @param data - Bytes starting with an ADTS header
   * @returns The header, or null if the bytes are not a plausible ADTS header
   */
  parseHeader(data: Uint8Array): AdtsHeader | null {
    if (!this.isAdtsLike(data)) {
      return null;
    }

    const protectionAbsent = (data[1] & ADTS_CONSTANTS.PROTECTION_ABSENT_MASK) === 1;
    const headerLength = this.headerLength(protectionAbsent);
    if (data.length < headerLength) {
      return null;
    }

    const frameLength = this.readFrameLength(data);
    if (frameLength < headerLength) {
      return null;
    }

    const samplingFrequencyIndex = (data[2] >> 2) & 0x0f;

    return {
      protectionAbsent,
      profile: (data[2] >> 6) & 0x03,
      samplingFrequencyIndex,
      sampleRate: AAC_SAMPLE_RATES[samplingFrequencyIndex],
      channelConfig: ((data[2] & 0x01) << 2) | ((data[3] >> 6) & 0x03),
      frameLength,
      headerLength,
    };
  }

  /**
   * Returns the raw AAC payload of the first ADTS frame
   * @param data - Bytes starting with an ADTS header
   * @returns A view from the end of the header to the end of the frame, or null
   * when the sync is missing or the buffer is shorter than the header or the frame
   */
  extractPayload(data: Uint8Array): Uint8Array | null {
    if (data.length < ADTS_CONSTANTS.HEADER_SIZE || !this.hasSync(data)) {
      return null;
    }

    const protectionAbsent = (data[1] & ADTS_CONSTANTS.PROTECTION_ABSENT_MASK) === 1;
    const headerLength = this.headerLength(protectionAbsent);
    if (data.length < headerLength) {
      return null;
    }

    const frameLength = this.readFrameLength(data);
    if (frameLength < headerLength || data.length < frameLength) {
      return null;
    }

    return data.subarray(headerLength, frameLength);
  }

  /**
   * Makes sure a payload carries an ADTS header
   *
   * Input that does not already parse as ADTS is taken to be a 2-byte
   * AudioSpecificConfig followed by raw AAC data. The config's object type picks
   * the profile (unknown types fall back to AAC-LC), the two config bytes are
   * dropped and a 7-byte header is prepended. This never fails.
   *
   * @param payload - ADTS frame, or config-prefixed raw AAC
   * @param channels - Channel count written to the synthesized header
   * @param sampleRate - Sample rate in Hz written to the synthesized header
   * @returns The payload itself when it already has a header, otherwise a new buffer
   */
  ensureHeader(payload: Uint8Array, channels: number, sampleRate: number): Uint8Array {
    if (this.extractPayload(payload) !== null) {
      return payload;
    }

    // TODO: read the config length from the object type instead of assuming two bytes
    const audioObjectType = payload.length > 0 ? payload[0] >> 3 : 0;
    const profileCode = AUDIO_OBJECT_TYPE_PROFILES.get(audioObjectType) ?? AAC_PROFILE_CODES.LC;
    const body = payload.subarray(Math.min(ADTS_CONSTANTS.ASC_PREFIX_SIZE, payload.length));

    const header = this.buildHeader(profileCode, channels, sampleRate, body.length, false);
    const framed = new Uint8Array(header.length + body.length);
    framed.set(header, 0);
    framed.set(body, header.length);
    return framed;
  }

  /**
   * Builds an ADTS header for one AAC frame
   * @param profileCode - Codec byte code (0x66 LC, 0x67 HE-AACv1, 0x68 HE-AACv2); others map to LC
   * @param channels - Channel count, clamped to 0..7
   * @param sampleRate - Sample rate in Hz; rates outside the standard table are written as index 0xF
   * @param aacFrameLength - Payload length in bytes, excluding the header
   * @param hasCrc - Reserve two zeroed CRC bytes (9-byte header)
   * @returns The 7- or 9-byte header
   */
  buildHeader(
    profileCode: number,
    channels: number,
    sampleRate: number,
    aacFrameLength: number,
    hasCrc: boolean,
  ): Uint8Array {
    const objectType = PROFILE_OBJECT_TYPES.get(profileCode) ?? 1;
    const samplingIndex = this.sampleRateIndex(sampleRate);
    const channelConfig = Math.min(Math.max(Math.trunc(channels), 0), ADTS_CONSTANTS.MAX_CHANNEL_CONFIG);
    const headerLength = this.headerLength(!hasCrc);
    const frameLength = (aacFrameLength + headerLength) & ADTS_CONSTANTS.MAX_FRAME_LENGTH;

    const header = new Uint8Array(headerLength);
    header[0] = ADTS_CONSTANTS.SYNC_BYTE;
    header[1] = ADTS_CONSTANTS.SYNC_NIBBLE_MASK | (hasCrc ? 0 : 1);
    header[2] = ((objectType << 6) | (samplingIndex << 2) | (channelConfig >> 2)) & 0xff;
    header[3] = ((channelConfig & 0x03) << 6) | ((frameLength >> 11) & 0x03);
    header[4] = (frameLength >> 3) & 0xff;
    header[5] = ((frameLength & 0x07) << 5) | ADTS_CONSTANTS.FRAME_LENGTH_LOW_PADDING;
    header[6] = ADTS_CONSTANTS.BUFFER_FULLNESS_BYTE;
    // CRC bytes, when present, stay zero

    return header;
  }

  /**
   * Maps a sample rate to its samplingFrequencyIndex
   * @returns The index, or 0xF for rates outside the table
   */
  sampleRateIndex(sampleRate: number): number {
    const index = AAC_SAMPLE_RATES.findIndex((rate) => rate === sampleRate);
    return index === -1 ? ADTS_CONSTANTS.FORBIDDEN_SAMPLING_INDEX : index;
  }

  private hasSync(data: Uint8Array): boolean {
    return (
      data[0] === ADTS_CONSTANTS.SYNC_BYTE &&
      (data[1] & ADTS_CONSTANTS.SYNC_NIBBLE_MASK) === ADTS_CONSTANTS.SYNC_NIBBLE_MASK
    );
  }

  private headerLength(protectionAbsent: boolean): number {
    return protectionAbsent ? ADTS_CONSTANTS.HEADER_SIZE : ADTS_CONSTANTS.HEADER_SIZE_WITH_CRC;
  }

  /**
   * 13-bit frame length: low 2 bits of byte 3, byte 4, top 3 bits of byte 5
   */
  private readFrameLength(data: Uint8Array): number {
    return ((data[3] & 0x03) << 11) | (data[4] << 3) | ((data[5] >> 5) & 0x07);
  }
}
