import { Injectable } from "@nestjs/common";
import { DecodeResult, fail, ok } from "../common/result";
import {
  MPEG1_LAYER1_BITRATES,
  MPEG1_LAYER2_BITRATES,
  MPEG1_LAYER3_BITRATES,
  MPEG1_SAMPLE_RATES,
  MPEG25_SAMPLE_RATES,
  MPEG2_LAYER1_BITRATES,
  MPEG2_LAYER23_BITRATES,
  MPEG2_SAMPLE_RATES,
  MPEG_AUDIO_CONSTANTS,
} from "./consts";
import {
  BadBitrateError,
  BadSampleRateError,
  InvalidSyncError,
  MpegAudioError,
  ReservedEmphasisError,
  ReservedLayerError,
  ReservedVersionError,
  TooShortError,
} from "./mpeg-audio.errors";
import {
  MpegAudioFrameHeader,
  MpegAudioScanMatch,
  MpegChannelMode,
  MpegLayer,
  MpegVersion,
} from "./types";

const CHANNEL_MODES: readonly MpegChannelMode[] = [
  MpegChannelMode.Stereo,
  MpegChannelMode.JointStereo,
  MpegChannelMode.DualChannel,
  MpegChannelMode.Mono,
];

/**
 * Table-driven parser for MPEG-1/2/2.5 Layer I/II/III frame headers
 */
@Injectable()
export class MpegAudioParserService {
  /**
   * Finds the first offset holding a plausible frame header
   *
   * Best effort: every offset is tried, so a sync-like byte pair inside other
   * data can match. Headers whose frame is shorter than 16 bytes are skipped.
   *
   * @param data - Bytes to search
   * @returns The first match, or null
   */
  scan(data: Uint8Array): MpegAudioScanMatch | null {
    for (
      let offset = 0;
      offset + MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE <= data.length;
      offset++
    ) {
      const result = this.parseHeader(
        data.subarray(offset, offset + MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE),
      );
      if (
        result.ok &&
        result.value.frameLength >= MPEG_AUDIO_CONSTANTS.MIN_SCAN_FRAME_LENGTH
      ) {
        return { offset, header: result.value };
      }
    }
    return null;
  }

  /**
   * Whether a frame header can be found anywhere in the buffer
   */
  isMp3(data: Uint8Array): boolean {
    return this.scan(data) !== null;
  }

  /**
   * Decodes the 4-byte header at the start of the buffer
   * @param data - At least 4 bytes
   * @returns The header, or the first reserved or invalid field found
   */
  parseHeader(data: Uint8Array): DecodeResult<MpegAudioFrameHeader, MpegAudioError> {
    if (data.length < MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE) {
      return fail(new TooShortError(data.length));
    }

    if (
      data[0] !== MPEG_AUDIO_CONSTANTS.SYNC_BYTE ||
      (data[1] & MPEG_AUDIO_CONSTANTS.SYNC_MASK) !== MPEG_AUDIO_CONSTANTS.SYNC_MASK
    ) {
      return fail(new InvalidSyncError());
    }

    const version = this.decodeVersion((data[1] >> 3) & 0x03);
    if (version === null) {
      return fail(new ReservedVersionError());
    }

    const layer = this.decodeLayer((data[1] >> 1) & 0x03);
    if (layer === null) {
      return fail(new ReservedLayerError());
    }

    const bitrateIndex = (data[2] >> 4) & 0x0f;
    if (
      bitrateIndex === MPEG_AUDIO_CONSTANTS.BITRATE_INDEX_FREE ||
      bitrateIndex === MPEG_AUDIO_CONSTANTS.BITRATE_INDEX_BAD
    ) {
      return fail(new BadBitrateError(bitrateIndex));
    }
    const bitrate = this.bitrateTable(version, layer)[bitrateIndex - 1];

    const sampleRateIndex = (data[2] >> 2) & 0x03;
    if (sampleRateIndex === MPEG_AUDIO_CONSTANTS.SAMPLE_RATE_INDEX_RESERVED) {
      return fail(new BadSampleRateError(sampleRateIndex));
    }
    const sampleRate = this.sampleRateTable(version)[sampleRateIndex];

    const padding = ((data[2] >> 1) & 0x01) === 1;
    const channelMode = CHANNEL_MODES[(data[3] >> 6) & 0x03];

    if ((data[3] & 0x03) === MPEG_AUDIO_CONSTANTS.EMPHASIS_RESERVED) {
      return fail(new ReservedEmphasisError());
    }

    const samplesPerFrame = this.samplesPerFrame(version, layer);
    const paddingBytes = !padding
      ? 0
      : layer === MpegLayer.Layer1
        ? MPEG_AUDIO_CONSTANTS.LAYER1_PADDING_BYTES
        : MPEG_AUDIO_CONSTANTS.PADDING_BYTES;
    const frameLength =
      Math.floor((samplesPerFrame * bitrate * 1000) / (8 * sampleRate)) + paddingBytes;

    return ok({
      version,
      layer,
      bitrate,
      sampleRate,
      padding,
      channelMode,
      samplesPerFrame,
      frameLength,
    });
  }

  private decodeVersion(bits: number): MpegVersion | null {
    switch (bits) {
      case 0x00:
        return MpegVersion.MPEG25;
      case 0x02:
        return MpegVersion.MPEG2;
      case 0x03:
        return MpegVersion.MPEG1;
      default:
        return null;
    }
  }

  private decodeLayer(bits: number): MpegLayer | null {
    switch (bits) {
      case 0x01:
        return MpegLayer.Layer3;
      case 0x02:
        return MpegLayer.Layer2;
      case 0x03:
        return MpegLayer.Layer1;
      default:
        return null;
    }
  }

  private bitrateTable(version: MpegVersion, layer: MpegLayer): readonly number[] {
    if (version === MpegVersion.MPEG1) {
      switch (layer) {
        case MpegLayer.Layer1:
          return MPEG1_LAYER1_BITRATES;
        case MpegLayer.Layer2:
          return MPEG1_LAYER2_BITRATES;
        case MpegLayer.Layer3:
          return MPEG1_LAYER3_BITRATES;
      }
    }
    return layer === MpegLayer.Layer1 ? MPEG2_LAYER1_BITRATES : MPEG2_LAYER23_BITRATES;
  }

  private sampleRateTable(version: MpegVersion): readonly number[] {
    switch (version) {
      case MpegVersion.MPEG1:
        return MPEG1_SAMPLE_RATES;
      case MpegVersion.MPEG2:
        return MPEG2_SAMPLE_RATES;
      case MpegVersion.MPEG25:
        return MPEG25_SAMPLE_RATES;
    }
  }

  private samplesPerFrame(version: MpegVersion, layer: MpegLayer): number {
    switch (layer) {
      case MpegLayer.Layer1:
        return 384;
      case MpegLayer.Layer2:
        return 1152;
      case MpegLayer.Layer3:
        return version === MpegVersion.MPEG1 ? 1152 : 576;
    }
  }
}
