import { Test, TestingModule } from "@nestjs/testing";
import { MpegAudioParserService } from "../src/mpeg-audio/mpeg-audio-parser.service";
import { MpegAudioErrorCode } from "../src/mpeg-audio/mpeg-audio.errors";
import {
  MpegAudioFrameHeader,
  MpegChannelMode,
  MpegLayer,
  MpegVersion,
} from "../src/mpeg-audio/types";

const MPEG1_LAYER3_128K = [0xff, 0xfb, 0x90, 0x00];

describe("MpegAudioParserService", () => {
  let service: MpegAudioParserService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [MpegAudioParserService],
    }).compile();

    service = module.get<MpegAudioParserService>(MpegAudioParserService);
  });

  const parse = (bytes: number[]): MpegAudioFrameHeader => {
    const result = service.parseHeader(Uint8Array.from(bytes));
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  };

  const parseError = (bytes: number[]): MpegAudioErrorCode => {
    const result = service.parseHeader(Uint8Array.from(bytes));
    if (result.ok) {
      throw new Error("Expected parse to fail");
    }
    return result.error.code;
  };

  describe("parseHeader", () => {
    it("should decode an MPEG-1 Layer 3 128 kbps 44.1 kHz header", () => {
      expect(parse(MPEG1_LAYER3_128K)).toEqual({
        version: MpegVersion.MPEG1,
        layer: MpegLayer.Layer3,
        bitrate: 128,
        sampleRate: 44100,
        padding: false,
        channelMode: MpegChannelMode.Stereo,
        samplesPerFrame: 1152,
        frameLength: 417,
      });
    });

    it("should add four padding bytes for Layer 1", () => {
      expect(parse([0xff, 0xff, 0xc0, 0x00]).frameLength).toBe(417);
      expect(parse([0xff, 0xff, 0xc2, 0x00]).frameLength).toBe(421);
    });

    it("should add one padding byte for Layer 2", () => {
      const header = parse([0xff, 0xfd, 0x92, 0x00]);

      expect(header.layer).toBe(MpegLayer.Layer2);
      expect(header.bitrate).toBe(160);
      expect(header.padding).toBe(true);
      expect(header.frameLength).toBe(523);
    });

    it("should use 576 samples per frame for MPEG-2 Layer 3", () => {
      const header = parse([0xff, 0xf3, 0x80, 0x00]);

      expect(header.version).toBe(MpegVersion.MPEG2);
      expect(header.bitrate).toBe(64);
      expect(header.sampleRate).toBe(22050);
      expect(header.samplesPerFrame).toBe(576);
      expect(header.frameLength).toBe(208);
    });

    it("should use the MPEG-2.5 sample rates", () => {
      const header = parse([0xff, 0xe3, 0x80, 0x00]);

      expect(header.version).toBe(MpegVersion.MPEG25);
      expect(header.sampleRate).toBe(11025);
      expect(header.frameLength).toBe(417);
    });

    it("should use the MPEG-2 Layer 1 bitrate table", () => {
      const header = parse([0xff, 0xf7, 0x10, 0x00]);

      expect(header.bitrate).toBe(32);
      expect(header.frameLength).toBe(69);
    });

    it("should decode the channel mode", () => {
      expect(parse([0xff, 0xfb, 0x90, 0x40]).channelMode).toBe(MpegChannelMode.JointStereo);
      expect(parse([0xff, 0xfb, 0x90, 0x80]).channelMode).toBe(MpegChannelMode.DualChannel);
      expect(parse([0xff, 0xfb, 0x90, 0xc0]).channelMode).toBe(MpegChannelMode.Mono);
    });

    it("should parse every header with non-reserved fields", () => {
      for (const versionBits of [0b00, 0b10, 0b11]) {
        for (const layerBits of [0b01, 0b10, 0b11]) {
          for (let bitrateIndex = 1; bitrateIndex <= 14; bitrateIndex++) {
            for (let sampleRateIndex = 0; sampleRateIndex <= 2; sampleRateIndex++) {
              const header = parse([
                0xff,
                0xe0 | (versionBits << 3) | (layerBits << 1) | 1,
                (bitrateIndex << 4) | (sampleRateIndex << 2),
                0x00,
              ]);
              expect(header.frameLength).toBeGreaterThanOrEqual(4);
            }
          }
        }
      }
    });

    it.each([
      ["TOO_SHORT", [0xff, 0xfb, 0x90]],
      ["INVALID_SYNC", [0xff, 0x0b, 0x90, 0x00]],
      ["RESERVED_VERSION", [0xff, 0xeb, 0x90, 0x00]],
      ["RESERVED_LAYER", [0xff, 0xf9, 0x90, 0x00]],
      ["BAD_BITRATE", [0xff, 0xfb, 0x00, 0x00]],
      ["BAD_BITRATE", [0xff, 0xfb, 0xf0, 0x00]],
      ["BAD_SAMPLE_RATE", [0xff, 0xfb, 0x9c, 0x00]],
      ["RESERVED_EMPHASIS", [0xff, 0xfb, 0x90, 0x02]],
    ])("should fail with %s", (code, bytes) => {
      expect(parseError(bytes)).toBe(code);
    });
  });

  describe("scan", () => {
    it("should skip junk and return the first frame", () => {
      const frame = new Uint8Array(417);
      frame.set(MPEG1_LAYER3_128K, 0);
      const data = new Uint8Array(5 + 2 * 417);
      data.set([0x00, 0x11, 0x22, 0x33, 0x44], 0);
      data.set(frame, 5);
      data.set(frame, 5 + 417);

      const match = service.scan(data);

      expect(match?.offset).toBe(5);
      expect(match?.header.frameLength).toBe(417);
    });

    it("should return null when no header is found", () => {
      expect(service.scan(new Uint8Array(64))).toBeNull();
      expect(service.scan(Uint8Array.from([0xff, 0xfb, 0x90]))).toBeNull();
    });
  });

  describe("isMp3", () => {
    it("should report whether scan finds a header", () => {
      expect(service.isMp3(Uint8Array.from([0x00, ...MPEG1_LAYER3_128K]))).toBe(true);
      expect(service.isMp3(Buffer.from("This is not an MP3 file"))).toBe(false);
    });
  });
});
