/**
 * Encodings the probe can report
 * Matroska and H.264 are reported so callers can tell them from unknown data.
 */
export enum AudioType {
  AAC = "aac",
  FLAC = "flac",
  Opus = "opus",
  MP3 = "mp3",
  WAV = "wav",
  WebM = "webm",
  Matroska = "matroska",
  H264 = "h264",
  Unknown = "unknown",
}

/**
 * Container the encoded audio was found in
 */
export enum ContainerType {
  MP4 = "mp4",
  Ogg = "ogg",
  WebM = "webm",
  Matroska = "matroska",
  RIFF = "riff",
  /**
   * Bare codec frames, no container
   */
  Raw = "raw",
  None = "none",
}
