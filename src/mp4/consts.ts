import { AudioType } from "../detection/audio-type";

export const MP4_CONSTANTS = {
  BOX_HEADER_SIZE: 8,
  LARGE_BOX_HEADER_SIZE: 16,
  SIZE_TO_END: 0,
  SIZE_LARGE: 1,
  FULL_BOX_PREFIX_SIZE: 4, // version + flags
  STSD_HEADER_SIZE: 8, // version/flags + entry count
  HDLR_MIN_SIZE: 12,
  HDLR_TYPE_OFFSET: 8,
  SOUND_HANDLER: "soun",
} as const;

/**
 * Box path from moov down to the sample description table
 */
export const STSD_PATH = ["minf", "stbl", "stsd"] as const;

/**
 * Audio sample entry codes and the encoding each one carries
 */
export const SAMPLE_ENTRY_AUDIO_TYPES: ReadonlyMap<string, AudioType> = new Map([
  ["mp4a", AudioType.AAC],
  ["fLaC", AudioType.FLAC],
  ["FLAC", AudioType.FLAC],
  ["Opus", AudioType.Opus],
  ["opus", AudioType.Opus],
  ["mp3 ", AudioType.MP3],
  [".mp3", AudioType.MP3],
]);
