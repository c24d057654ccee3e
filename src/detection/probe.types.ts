import { AdtsHeader } from "../aac/types";
import { FlacFrameInfo } from "../flac/types";
import { MpegAudioFrameHeader } from "../mpeg-audio/types";
import { AudioType, ContainerType } from "./audio-type";

export interface FlacProbeDetails {
  kind: "flac";
  /**
   * Byte offset of the decoded frame
   */
  offset: number;
  frame: FlacFrameInfo;
}

export interface MpegAudioProbeDetails {
  kind: "mpeg-audio";
  offset: number;
  header: MpegAudioFrameHeader;
}

export interface AdtsProbeDetails {
  kind: "adts";
  header: AdtsHeader;
}

export interface Mp4ProbeDetails {
  kind: "mp4";
  audioTrack: AudioType;
}

export type ProbeDetails =
  | FlacProbeDetails
  | MpegAudioProbeDetails
  | AdtsProbeDetails
  | Mp4ProbeDetails;

/**
 * Outcome of classifying a buffer
 */
export interface ProbeResult {
  format: AudioType;
  container: ContainerType;
  /**
   * Present only when the format carries decodable header metadata
   */
  details?: ProbeDetails;
}
