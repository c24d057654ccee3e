import { AdtsCodecService } from "../aac/adts-codec.service";
import { FlacFrameDecoderService } from "../flac/flac-frame-decoder.service";
import { Mp4AudioTrackService } from "../mp4/mp4-audio-track.service";
import { MpegAudioParserService } from "../mpeg-audio/mpeg-audio-parser.service";
import {
  hasOpusHead,
  isAnnexB,
  isMatroska,
  isOggOpus,
  isWav,
  isWebm,
} from "../sniffers/container-sniffers";
import { AudioType, ContainerType } from "./audio-type";
import { Detection, IFormatDetector } from "./detector.interface";

const H264_START_CODE_WINDOW = 4;

/**
 * Wraps a boolean check as a detector with a fixed classification
 */
function fixedDetector(
  name: string,
  matches: (data: Uint8Array) => boolean,
  detection: Detection,
): IFormatDetector {
  return {
    name,
    detect: (data) => (matches(data) ? detection : null),
  };
}

export interface DefaultDetectorDeps {
  mp4: Mp4AudioTrackService;
  flac: FlacFrameDecoderService;
  adts: AdtsCodecService;
  mpegAudio: MpegAudioParserService;
}

/**
 * The detection chain in priority order
 *
 * Containers with an explicit structure go first. The MPEG audio scan searches
 * every offset, so only the H.264 start-code check, which needs a start code
 * at the head of a non-MP4 buffer, comes after it.
 */
export function createDefaultDetectors(deps: DefaultDetectorDeps): IFormatDetector[] {
  return [
    {
      name: "mp4-audio-track",
      detect: (data) => {
        const format = deps.mp4.detectAudioTrack(data);
        return format === null ? null : { format, container: ContainerType.MP4 };
      },
    },
    fixedDetector("flac-sync", (data) => deps.flac.detect(data), {
      format: AudioType.FLAC,
      container: ContainerType.Raw,
    }),
    fixedDetector("adts", (data) => deps.adts.isAdtsLike(data), {
      format: AudioType.AAC,
      container: ContainerType.Raw,
    }),
    fixedDetector("webm", isWebm, {
      format: AudioType.WebM,
      container: ContainerType.WebM,
    }),
    fixedDetector("matroska", isMatroska, {
      format: AudioType.Matroska,
      container: ContainerType.Matroska,
    }),
    fixedDetector("ogg-opus", isOggOpus, {
      format: AudioType.Opus,
      container: ContainerType.Ogg,
    }),
    fixedDetector("opus-head", hasOpusHead, {
      format: AudioType.Opus,
      container: ContainerType.Raw,
    }),
    fixedDetector("riff-wave", isWav, {
      format: AudioType.WAV,
      container: ContainerType.RIFF,
    }),
    fixedDetector("mpeg-audio", (data) => deps.mpegAudio.isMp3(data), {
      format: AudioType.MP3,
      container: ContainerType.Raw,
    }),
    fixedDetector(
      "h264-annexb",
      (data) =>
        !deps.mp4.isMp4(data) && isAnnexB(data.subarray(0, H264_START_CODE_WINDOW)),
      { format: AudioType.H264, container: ContainerType.Raw },
    ),
  ];
}
