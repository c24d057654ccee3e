import { Module } from "@nestjs/common";
import { AdtsCodecService } from "../aac/adts-codec.service";
import { FlacFrameDecoderService } from "../flac/flac-frame-decoder.service";
import { Mp4AudioTrackService } from "../mp4/mp4-audio-track.service";
import { MpegAudioParserService } from "../mpeg-audio/mpeg-audio-parser.service";
import { createDefaultDetectors } from "./default-detectors";
import { DetectorRegistryService } from "./detector-registry.service";
import { FormatDetectorService } from "./format-detector.service";
import { ProbeService } from "./probe.service";

@Module({
  providers: [
    AdtsCodecService,
    FlacFrameDecoderService,
    MpegAudioParserService,
    Mp4AudioTrackService,
    FormatDetectorService,
    ProbeService,
    {
      provide: DetectorRegistryService,
      useFactory: (
        mp4: Mp4AudioTrackService,
        flac: FlacFrameDecoderService,
        adts: AdtsCodecService,
        mpegAudio: MpegAudioParserService,
      ) => {
        const registry = new DetectorRegistryService();
        for (const detector of createDefaultDetectors({ mp4, flac, adts, mpegAudio })) {
          registry.registerDetector(detector);
        }
        return registry;
      },
      inject: [Mp4AudioTrackService, FlacFrameDecoderService, AdtsCodecService, MpegAudioParserService],
    },
  ],
  exports: [
    AdtsCodecService,
    FlacFrameDecoderService,
    MpegAudioParserService,
    Mp4AudioTrackService,
    FormatDetectorService,
    ProbeService,
  ],
})
export class MediaProbeModule {}
