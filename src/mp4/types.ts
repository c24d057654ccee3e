/**
 * One ISO-BMFF box located in a buffer
 */
export interface Mp4Box {
  /**
   * Four-character type code, e.g. "moov"
   */
  type: string;
  /**
   * View of the box payload, header excluded
   */
  content: Uint8Array;
  /**
   * Offset just past the box in the buffer it was read from
   */
  end: number;
}
