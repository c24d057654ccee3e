import { Test, TestingModule } from "@nestjs/testing";
import { encodeFlacVarInt } from "../src/bitstream/varint";
import { FlacFrameDecoderService } from "../src/flac/flac-frame-decoder.service";
import {
  FlacDecodeError,
  FlacDecodeErrorCode,
  IllegalSampleRateCodeError,
  InvalidChannelModeError,
  InvalidPaddingError,
  InvalidSampleSizeCodeError,
  InvalidSyncCodeError,
  ReservedBlockSizeCodeError,
} from "../src/flac/flac.errors";
import { FlacChannelMode, FlacFrameInfo } from "../src/flac/types";
import { BitWriter } from "./helpers/bit-writer";

interface HeaderFields {
  variableBlockSize?: boolean;
  blockSizeCode?: number;
  sampleRateCode?: number;
  channelCode?: number;
  sampleSizeCode?: number;
  reservedBit?: number;
  frameNumber?: Uint8Array;
  trailing?: number[];
  crc?: number;
}

function flacHeader(fields: HeaderFields = {}): Uint8Array {
  return new BitWriter()
    .write(0x7ffc, 15)
    .write(fields.variableBlockSize ? 1 : 0, 1)
    .write(fields.blockSizeCode ?? 12, 4)
    .write(fields.sampleRateCode ?? 9, 4)
    .write(fields.channelCode ?? 1, 4)
    .write(fields.sampleSizeCode ?? 4, 3)
    .write(fields.reservedBit ?? 0, 1)
    .writeBytes(fields.frameNumber ?? encodeFlacVarInt(0))
    .writeBytes(Uint8Array.from(fields.trailing ?? []))
    .write(fields.crc ?? 0xab, 8)
    .toBytes();
}

function expectFailure(result: ReturnType<FlacFrameDecoderService["decode"]>): FlacDecodeError {
  if (result.ok) {
    throw new Error("Expected decode to fail");
  }
  return result.error;
}

function expectSuccess(result: ReturnType<FlacFrameDecoderService["decode"]>): FlacFrameInfo {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

describe("FlacFrameDecoderService", () => {
  let service: FlacFrameDecoderService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [FlacFrameDecoderService],
    }).compile();

    service = module.get<FlacFrameDecoderService>(FlacFrameDecoderService);
  });

  describe("detect", () => {
    it("should accept both blocking strategy bits after the sync code", () => {
      expect(service.detect(Uint8Array.from([0xff, 0xf8]))).toBe(true);
      expect(service.detect(Uint8Array.from([0xff, 0xf9]))).toBe(true);
    });

    it("should reject other patterns and short buffers", () => {
      expect(service.detect(Uint8Array.from([0xff, 0xfa]))).toBe(false);
      expect(service.detect(Uint8Array.from([0xff]))).toBe(false);
      expect(service.detect(new Uint8Array(0))).toBe(false);
    });
  });

  describe("decode", () => {
    it("should decode a fixed-blocksize stereo 16-bit header", () => {
      const header = flacHeader();

      expect([...header.subarray(0, 4)]).toEqual([0xff, 0xf8, 0xc9, 0x18]);
      expect(expectSuccess(service.decode(header))).toEqual({
        variableBlockSize: false,
        blockSize: 4096,
        sampleRate: 44100,
        channelMode: FlacChannelMode.Independent,
        channels: 2,
        bitsPerSample: 16,
        frameOrSampleNumber: 0,
        crc8: 0xab,
      });
    });

    it("should decode a variable-blocksize sample number", () => {
      const info = expectSuccess(
        service.decode(
          flacHeader({ variableBlockSize: true, frameNumber: encodeFlacVarInt(1_000_000) }),
        ),
      );

      expect(info.variableBlockSize).toBe(true);
      expect(info.frameOrSampleNumber).toBe(1_000_000);
    });

    it.each([
      [8, FlacChannelMode.LeftSide],
      [9, FlacChannelMode.RightSide],
      [10, FlacChannelMode.MidSide],
    ])("should map channel code %i to a two-channel %s mode", (channelCode, mode) => {
      const info = expectSuccess(service.decode(flacHeader({ channelCode })));

      expect(info.channelMode).toBe(mode);
      expect(info.channels).toBe(2);
    });

    it("should map independent channel codes to code + 1 channels", () => {
      expect(expectSuccess(service.decode(flacHeader({ channelCode: 7 }))).channels).toBe(8);
    });

    it("should read 8- and 16-bit block sizes after the frame number", () => {
      expect(
        expectSuccess(service.decode(flacHeader({ blockSizeCode: 6, trailing: [0xff] }))).blockSize,
      ).toBe(256);
      expect(
        expectSuccess(service.decode(flacHeader({ blockSizeCode: 7, trailing: [0x01, 0x00] })))
          .blockSize,
      ).toBe(257);
    });

    it("should read explicit sample rates", () => {
      expect(
        expectSuccess(service.decode(flacHeader({ sampleRateCode: 12, trailing: [48] }))).sampleRate,
      ).toBe(48000);
      expect(
        expectSuccess(service.decode(flacHeader({ sampleRateCode: 13, trailing: [0xac, 0x44] })))
          .sampleRate,
      ).toBe(44100);
      expect(
        expectSuccess(service.decode(flacHeader({ sampleRateCode: 14, trailing: [0x11, 0x3a] })))
          .sampleRate,
      ).toBe(44100);
    });

    it("should report 0 bits per sample for the STREAMINFO code", () => {
      expect(expectSuccess(service.decode(flacHeader({ sampleSizeCode: 0 }))).bitsPerSample).toBe(0);
    });

    it("should fail with InvalidSyncCode", () => {
      const error = expectFailure(service.decode(new Uint8Array(8)));

      expect(error).toBeInstanceOf(InvalidSyncCodeError);
      expect(error.code).toBe(FlacDecodeErrorCode.INVALID_SYNC_CODE);
    });

    it("should fail with InvalidChannelMode(11)", () => {
      const error = expectFailure(service.decode(flacHeader({ channelCode: 11 })));

      expect(error).toBeInstanceOf(InvalidChannelModeError);
      expect(error.code).toBe(FlacDecodeErrorCode.INVALID_CHANNEL_MODE);
      expect(error).toMatchObject({ channelMode: 11 });
    });

    it("should fail with InvalidSampleSizeCode(3)", () => {
      const error = expectFailure(service.decode(flacHeader({ sampleSizeCode: 3 })));

      expect(error).toBeInstanceOf(InvalidSampleSizeCodeError);
      expect(error).toMatchObject({ sampleSizeCode: 3 });
    });

    it("should fail with InvalidPadding when the reserved bit is set", () => {
      expect(expectFailure(service.decode(flacHeader({ reservedBit: 1 })))).toBeInstanceOf(
        InvalidPaddingError,
      );
    });

    it("should fail with ReservedBlocksizeCode for block size code 0", () => {
      const error = expectFailure(service.decode(flacHeader({ blockSizeCode: 0 })));

      expect(error).toBeInstanceOf(ReservedBlockSizeCodeError);
      expect(error.code).toBe(FlacDecodeErrorCode.RESERVED_BLOCKSIZE_CODE);
    });

    it("should fail with IllegalSampleRateCode(15)", () => {
      const error = expectFailure(service.decode(flacHeader({ sampleRateCode: 15 })));

      expect(error).toBeInstanceOf(IllegalSampleRateCodeError);
      expect(error).toMatchObject({ sampleRateCode: 15 });
    });

    it("should surface a truncated header as UnexpectedEndOfInput", () => {
      const header = flacHeader();

      const error = expectFailure(service.decode(header.subarray(0, header.length - 1)));

      expect(error.code).toBe(FlacDecodeErrorCode.UNEXPECTED_END_OF_INPUT);
    });

    it("should surface an overlong frame number as a UTF-8 decoding error", () => {
      const error = expectFailure(
        service.decode(
          flacHeader({
            frameNumber: Uint8Array.from([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x08]),
          }),
        ),
      );

      expect(error.code).toBe(FlacDecodeErrorCode.UTF8_DECODING_ERROR);
    });
  });

  describe("splitFrames", () => {
    it("should cut at every sync pattern and drop leading bytes", () => {
      const data = Uint8Array.from([0x00, 0xff, 0xf8, 0x01, 0x02, 0xff, 0xf9, 0x03]);

      const frames = service.splitFrames(data);

      expect(frames.map((frame) => [...frame])).toEqual([
        [0xff, 0xf8, 0x01, 0x02],
        [0xff, 0xf9, 0x03],
      ]);
      expect(frames[0].buffer).toBe(data.buffer);
    });

    it("should return no frames without a sync pattern", () => {
      expect(service.splitFrames(Uint8Array.from([0xff, 0xf0, 0x00]))).toEqual([]);
    });
  });

  describe("findFirstFrame", () => {
    it("should return a view from the first sync", () => {
      const data = Uint8Array.from([0x01, 0x02, 0xff, 0xfb, 0x09]);

      expect([...service.findFirstFrame(data)]).toEqual([0xff, 0xfb, 0x09]);
    });

    it("should return an empty view when there is no sync", () => {
      expect(service.findFirstFrame(Uint8Array.from([0xff])).length).toBe(0);
      expect(service.findFirstFrame(new Uint8Array(0)).length).toBe(0);
    });
  });

  describe("createStreamInfo", () => {
    it("should pack block size, rate, channels, depth and total samples", () => {
      const streamInfo = service.createStreamInfo({
        variableBlockSize: true,
        blockSize: 4096,
        sampleRate: 44100,
        channelMode: FlacChannelMode.Independent,
        channels: 2,
        bitsPerSample: 16,
        frameOrSampleNumber: 0x123456789,
        crc8: 0,
      });

      expect(streamInfo.length).toBe(34);
      expect([...streamInfo.subarray(0, 18)]).toEqual([
        0x10, 0x00, 0x10, 0x00, 0, 0, 0, 0, 0, 0, 0x0a, 0xc4, 0x42, 0xf1, 0x23, 0x45, 0x67, 0x89,
      ]);
      expect(streamInfo.subarray(18).every((byte) => byte === 0)).toBe(true);
    });

    it("should build from a decoded header", () => {
      const info = expectSuccess(service.decode(flacHeader({ channelCode: 0, sampleSizeCode: 6 })));

      const streamInfo = service.createStreamInfo(info);

      // 44100 Hz, 1 channel, 24 bits, 0 samples
      expect([...streamInfo.subarray(10, 14)]).toEqual([0x0a, 0xc4, 0x41, 0x70]);
    });
  });
});
