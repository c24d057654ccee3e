import { Test, TestingModule } from "@nestjs/testing";
import { AudioType } from "../src/detection/audio-type";
import { Mp4AudioTrackService } from "../src/mp4/mp4-audio-track.service";
import { box, concat, ftyp, mp4File, pad, str, stsd, trak, u32 } from "./helpers/iso-builder";

describe("Mp4AudioTrackService", () => {
  let service: Mp4AudioTrackService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [Mp4AudioTrackService],
    }).compile();

    service = module.get<Mp4AudioTrackService>(Mp4AudioTrackService);
  });

  describe("isMp4", () => {
    it("should be true when the first box is ftyp", () => {
      expect(service.isMp4(ftyp())).toBe(true);
    });

    it("should be false for other first boxes and short buffers", () => {
      expect(service.isMp4(box("free"))).toBe(false);
      expect(service.isMp4(ftyp().subarray(0, 7))).toBe(false);
    });

    it("should be false when the ftyp box runs past the buffer", () => {
      expect(service.isMp4(concat(u32(100), str("ftyp")))).toBe(false);
    });

    it("should be false when the ftyp size is smaller than its header", () => {
      expect(service.isMp4(concat(u32(4), str("ftyp"), str("isom")))).toBe(false);
    });
  });

  describe("detectAudioTrack", () => {
    it.each([
      ["mp4a", AudioType.AAC],
      ["fLaC", AudioType.FLAC],
      ["FLAC", AudioType.FLAC],
      ["Opus", AudioType.Opus],
      ["opus", AudioType.Opus],
      ["mp3 ", AudioType.MP3],
      [".mp3", AudioType.MP3],
    ])("should map sample entry %j to %s", (entry, expected) => {
      expect(service.detectAudioTrack(mp4File(trak("soun", stsd(entry))))).toBe(expected);
    });

    it("should return null for a track whose handler is not soun", () => {
      expect(service.detectAudioTrack(mp4File(trak("vide", stsd("mp4a"))))).toBeNull();
    });

    it("should skip video tracks and unknown entries", () => {
      const data = mp4File(trak("vide", stsd("avc1")), trak("soun", stsd("samr", "Opus")));

      expect(service.detectAudioTrack(data)).toBe(AudioType.Opus);
    });

    it("should return null when no entry is recognized", () => {
      expect(service.detectAudioTrack(mp4File(trak("soun", stsd("samr"))))).toBeNull();
    });

    it("should drop the rest of a table after a malformed entry", () => {
      const malformed = box("stsd", pad(4), u32(2), u32(4), str("mp4a"), box("mp4a", pad(8)));

      expect(service.detectAudioTrack(mp4File(trak("soun", malformed)))).toBeNull();
    });

    it("should move on to the next track after a malformed table", () => {
      const malformed = box("stsd", pad(4), u32(1), u32(400), str("mp4a"));
      const data = mp4File(trak("soun", malformed), trak("soun", stsd("fLaC")));

      expect(service.detectAudioTrack(data)).toBe(AudioType.FLAC);
    });

    it("should return null without ftyp or moov", () => {
      expect(service.detectAudioTrack(box("moov", trak("soun", stsd("mp4a"))))).toBeNull();
      expect(service.detectAudioTrack(concat(ftyp(), box("mdat", pad(16))))).toBeNull();
    });
  });
});
