import { Injectable, Logger } from "@nestjs/common";
import { AdtsCodecService } from "../aac/adts-codec.service";
import { FlacFrameDecoderService } from "../flac/flac-frame-decoder.service";
import { MpegAudioParserService } from "../mpeg-audio/mpeg-audio-parser.service";
import { AudioType, ContainerType } from "./audio-type";
import { Detection } from "./detector.interface";
import { FormatDetectorService, UNKNOWN_DETECTION } from "./format-detector.service";
import { ProbeDetails, ProbeResult } from "./probe.types";

/**
 * Classifies a buffer and attaches the header metadata of the format found
 */
@Injectable()
export class ProbeService {
  private readonly logger = new Logger(ProbeService.name);

  constructor(
    private readonly formatDetector: FormatDetectorService,
    private readonly flacDecoder: FlacFrameDecoderService,
    private readonly mpegAudioParser: MpegAudioParserService,
    private readonly adtsCodec: AdtsCodecService,
  ) {}

  /**
   * @param data - A file prefix, a payload or a single frame
   * @returns The classification; `details` is omitted when the header could not be decoded
   */
  probe(data: Uint8Array): ProbeResult {
    if (data.length === 0) {
      this.logger.debug("Empty buffer, skipping detection");
      return { ...UNKNOWN_DETECTION };
    }

    const detection = this.formatDetector.detect(data);
    const details = this.readDetails(detection, data);
    this.logger.debug(
      `Classified ${data.length} bytes as ${detection.format} in ${detection.container}`,
    );

    return details === null ? { ...detection } : { ...detection, details };
  }

  private readDetails(detection: Detection, data: Uint8Array): ProbeDetails | null {
    if (detection.container === ContainerType.MP4) {
      return { kind: "mp4", audioTrack: detection.format };
    }

    if (detection.container !== ContainerType.Raw) {
      return null;
    }

    switch (detection.format) {
      case AudioType.FLAC: {
        const frame = this.flacDecoder.findFirstFrame(data);
        const result = this.flacDecoder.decode(frame);
        return result.ok
          ? { kind: "flac", offset: data.length - frame.length, frame: result.value }
          : null;
      }
      case AudioType.MP3: {
        const match = this.mpegAudioParser.scan(data);
        return match === null ? null : { kind: "mpeg-audio", ...match };
      }
      case AudioType.AAC: {
        const header = this.adtsCodec.parseHeader(data);
        return header === null ? null : { kind: "adts", header };
      }
      default:
        return null;
    }
  }
}
