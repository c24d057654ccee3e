import { Injectable } from "@nestjs/common";
import { BitCursor } from "../bitstream/bit-cursor";
import { BitstreamError } from "../bitstream/bitstream.errors";
import { readFlacVarInt } from "../bitstream/varint";
import { DecodeResult, fail, ok } from "../common/result";
import {
  FLAC_BLOCK_SIZES,
  FLAC_CONSTANTS,
  FLAC_SAMPLE_RATES,
  FLAC_SAMPLE_SIZES,
} from "./consts";
import {
  FlacDecodeError,
  IllegalSampleRateCodeError,
  InvalidChannelModeError,
  InvalidPaddingError,
  InvalidSampleSizeCodeError,
  InvalidSyncCodeError,
  ReservedBlockSizeCodeError,
} from "./flac.errors";
import { DECORRELATED_CHANNEL_MODES, FlacChannelMode, FlacFrameInfo } from "./types";

/**
 * Decoder for FLAC frame headers plus a sync-based frame boundary finder
 */
@Injectable()
export class FlacFrameDecoderService {
  /**
   * Checks whether the buffer starts with the 15-bit frame sync code
   * @param data - Candidate bytes
   * @returns true if the first 15 bits equal 0x7FFC
   */
  detect(data: Uint8Array): boolean {
    if (data.length * 8 < FLAC_CONSTANTS.SYNC_CODE_BITS) {
      return false;
    }
    return new BitCursor(data).read(FLAC_CONSTANTS.SYNC_CODE_BITS) === FLAC_CONSTANTS.SYNC_CODE;
  }

  /**
   * Decodes the frame header at the start of the buffer
   * The trailing CRC-8 is read but not verified.
   * @param data - Bytes starting at a frame sync code
   * @returns The decoded header, or the first violation found
   */
  decode(data: Uint8Array): DecodeResult<FlacFrameInfo, FlacDecodeError> {
    const cursor = new BitCursor(data);
    try {
      return this.decodeFields(cursor);
    } catch (error) {
      if (error instanceof BitstreamError) {
        return fail(FlacDecodeError.fromBitstream(error));
      }
      throw error;
    }
  }

  /**
   * Splits a buffer into frames at every sync pattern (0xFF followed by 0xF8-0xFB)
   *
   * Best effort: the pattern is not validated by a header decode, so sync-like
   * bytes inside compressed audio also start a frame. Bytes before the first
   * sync are dropped.
   *
   * @param data - FLAC frame data
   * @returns Views into `data`, one per frame, in order
   */
  splitFrames(data: Uint8Array): Uint8Array[] {
    const frames: Uint8Array[] = [];
    let start = this.indexOfSync(data, 0);

    while (start !== -1) {
      const next = this.indexOfSync(data, start + 1);
      const end = next === -1 ? data.length : next;
      frames.push(data.subarray(start, end));
      start = next;
    }

    return frames;
  }

  /**
   * Finds the first sync pattern
   * @param data - FLAC frame data
   * @returns A view from the first sync to the end, or an empty view if there is none
   */
  findFirstFrame(data: Uint8Array): Uint8Array {
    const start = this.indexOfSync(data, 0);
    return start === -1 ? data.subarray(0, 0) : data.subarray(start);
  }

  /**
   * Builds a 34-byte STREAMINFO block body describing the stream a frame belongs to
   * Frame sizes and the MD5 signature are left zero.
   * @param frame - A decoded frame header
   */
  createStreamInfo(frame: FlacFrameInfo): Uint8Array {
    const streamInfo = new Uint8Array(FLAC_CONSTANTS.STREAMINFO_SIZE);
    const view = new DataView(streamInfo.buffer);

    view.setUint16(0, frame.blockSize & 0xffff, false); // min block size
    view.setUint16(2, frame.blockSize & 0xffff, false); // max block size
    // bytes 4-9: min/max frame size (24 bits each), unknown

    const totalSamplesHigh = Math.floor(frame.frameOrSampleNumber / 0x100000000) & 0x0f;
    const packed =
      ((frame.sampleRate & 0xfffff) << 12) |
      (((frame.channels - 1) & 0x07) << 9) |
      (((frame.bitsPerSample - 1) & 0x1f) << 4) |
      totalSamplesHigh;
    view.setUint32(10, packed >>> 0, false);
    view.setUint32(14, frame.frameOrSampleNumber % 0x100000000, false);
    // bytes 18-33: MD5 signature, unknown

    return streamInfo;
  }

  private decodeFields(cursor: BitCursor): DecodeResult<FlacFrameInfo, FlacDecodeError> {
    const syncCode = cursor.read(FLAC_CONSTANTS.SYNC_CODE_BITS);
    if (syncCode !== FLAC_CONSTANTS.SYNC_CODE) {
      return fail(new InvalidSyncCodeError(syncCode));
    }

    const variableBlockSize = cursor.readBit();
    const blockSizeCode = cursor.read(4);
    const sampleRateCode = cursor.read(4);

    const channelCode = cursor.read(4);
    let channelMode: FlacChannelMode;
    let channels: number;
    if (channelCode <= FLAC_CONSTANTS.MAX_INDEPENDENT_CHANNEL_CODE) {
      channelMode = FlacChannelMode.Independent;
      channels = channelCode + 1;
    } else if (channelCode <= FLAC_CONSTANTS.MAX_DECORRELATED_CHANNEL_CODE) {
      channelMode = DECORRELATED_CHANNEL_MODES[channelCode - 8];
      channels = 2;
    } else {
      return fail(new InvalidChannelModeError(channelCode));
    }

    const sampleSizeCode = cursor.read(3);
    if (sampleSizeCode === FLAC_CONSTANTS.RESERVED_SAMPLE_SIZE_CODE) {
      return fail(new InvalidSampleSizeCodeError(sampleSizeCode));
    }
    const bitsPerSample = FLAC_SAMPLE_SIZES[sampleSizeCode];

    if (cursor.readBit()) {
      return fail(new InvalidPaddingError());
    }

    const frameOrSampleNumber = readFlacVarInt(cursor);

    let blockSize: number;
    switch (blockSizeCode) {
      case FLAC_CONSTANTS.RESERVED_BLOCK_SIZE_CODE:
        return fail(new ReservedBlockSizeCodeError());
      case FLAC_CONSTANTS.BLOCK_SIZE_8BIT_CODE:
        blockSize = cursor.read(8) + 1;
        break;
      case FLAC_CONSTANTS.BLOCK_SIZE_16BIT_CODE:
        blockSize = cursor.read(16) + 1;
        break;
      default:
        blockSize = FLAC_BLOCK_SIZES[blockSizeCode];
    }

    let sampleRate: number;
    if (sampleRateCode < FLAC_SAMPLE_RATES.length) {
      sampleRate = FLAC_SAMPLE_RATES[sampleRateCode];
    } else if (sampleRateCode === FLAC_CONSTANTS.SAMPLE_RATE_KHZ_CODE) {
      sampleRate = cursor.read(8) * 1000;
    } else if (sampleRateCode === FLAC_CONSTANTS.SAMPLE_RATE_HZ_CODE) {
      sampleRate = cursor.read(16);
    } else if (sampleRateCode === FLAC_CONSTANTS.SAMPLE_RATE_DECAHZ_CODE) {
      sampleRate = cursor.read(16) * 10;
    } else {
      return fail(new IllegalSampleRateCodeError(sampleRateCode));
    }

    const crc8 = cursor.read(8);

    return ok({
      variableBlockSize,
      blockSize,
      sampleRate,
      channelMode,
      channels,
      bitsPerSample,
      frameOrSampleNumber,
      crc8,
    });
  }

  private indexOfSync(data: Uint8Array, from: number): number {
    for (let i = from; i + 1 < data.length; i++) {
      if (
        data[i] === FLAC_CONSTANTS.SYNC_BYTE &&
        (data[i + 1] & FLAC_CONSTANTS.SYNC_SECOND_BYTE_MASK) === FLAC_CONSTANTS.SYNC_SECOND_BYTE
      ) {
        return i;
      }
    }
    return -1;
  }
}
