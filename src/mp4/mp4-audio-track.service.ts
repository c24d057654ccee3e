import { Injectable } from "@nestjs/common";
import { AudioType } from "../detection/audio-type";
import { findChild, iterateBoxes, nextBox, readFourCC } from "./box-walker";
import { MP4_CONSTANTS, SAMPLE_ENTRY_AUDIO_TYPES, STSD_PATH } from "./consts";

/**
 * Identifies the audio codec of an ISO-BMFF file from its sample descriptions
 */
@Injectable()
export class Mp4AudioTrackService {
  /**
   * Whether the buffer starts with a readable ftyp box
   */
  isMp4(data: Uint8Array): boolean {
    return nextBox(data, 0)?.type === "ftyp";
  }

  /**
   * Walks moov/trak/mdia/minf/stbl/stsd of every sound track
   * @param data - A whole MP4 file, or at least its ftyp and moov boxes
   * @returns The first recognized audio sample entry, or null when no sound
   * track carries a known codec
   */
  detectAudioTrack(data: Uint8Array): AudioType | null {
    if (!this.isMp4(data)) {
      return null;
    }

    const moov = findChild(data, "moov");
    if (moov === null) {
      return null;
    }

    for (const box of iterateBoxes(moov)) {
      if (box.type !== "trak") {
        continue;
      }
      const audioType = this.detectTrackAudio(box.content);
      if (audioType !== null) {
        return audioType;
      }
    }

    return null;
  }

  private detectTrackAudio(trak: Uint8Array): AudioType | null {
    const mdia = findChild(trak, "mdia");
    if (mdia === null || !this.isSoundTrack(mdia)) {
      return null;
    }

    let current: Uint8Array | null = mdia;
    for (const type of STSD_PATH) {
      if (current === null) {
        return null;
      }
      current = findChild(current, type);
    }

    return current === null ? null : this.readSampleEntries(current);
  }

  private isSoundTrack(mdia: Uint8Array): boolean {
    const hdlr = findChild(mdia, "hdlr");
    return (
      hdlr !== null &&
      hdlr.length >= MP4_CONSTANTS.HDLR_MIN_SIZE &&
      readFourCC(hdlr, MP4_CONSTANTS.HDLR_TYPE_OFFSET) === MP4_CONSTANTS.SOUND_HANDLER
    );
  }

  /**
   * Reads the entries of an stsd box
   * A malformed entry invalidates the rest of the table.
   */
  private readSampleEntries(stsd: Uint8Array): AudioType | null {
    if (stsd.length < MP4_CONSTANTS.STSD_HEADER_SIZE) {
      return null;
    }

    const view = new DataView(stsd.buffer, stsd.byteOffset, stsd.byteLength);
    const entryCount = view.getUint32(MP4_CONSTANTS.FULL_BOX_PREFIX_SIZE, false);
    let offset: number = MP4_CONSTANTS.STSD_HEADER_SIZE;

    for (let i = 0; i < entryCount; i++) {
      if (offset + MP4_CONSTANTS.BOX_HEADER_SIZE > stsd.length) {
        return null;
      }
      const size = view.getUint32(offset, false);
      if (size < MP4_CONSTANTS.BOX_HEADER_SIZE || offset + size > stsd.length) {
        return null;
      }

      const audioType = SAMPLE_ENTRY_AUDIO_TYPES.get(readFourCC(stsd, offset + 4));
      if (audioType !== undefined) {
        return audioType;
      }
      offset += size;
    }

    return null;
  }
}
