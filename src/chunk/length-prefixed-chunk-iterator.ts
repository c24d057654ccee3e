import { DecodeResult, fail, ok } from "../common/result";
import {
  ChunkFramingError,
  IncompleteChunkDataError,
  IncompleteLengthPrefixError,
} from "./chunk.errors";

const LENGTH_PREFIX_SIZE = 4;

/**
 * One framed record
 */
export interface ChunkRecord {
  /**
   * 0-based position in traversal order
   */
  index: number;
  /**
   * View into the source buffer
   */
  payload: Uint8Array;
}

export type ChunkItem = DecodeResult<ChunkRecord, ChunkFramingError>;

/**
 * Splits a buffer into records framed by a 4-byte little-endian length
 *
 * Single pass: once exhausted, or after yielding an error, it stays done.
 *
 * @example
 * for (const item of new LengthPrefixedChunkIterator(data)) {
 *   if (!item.ok) throw item.error;
 *   handle(item.value.payload);
 * }
 */
export class LengthPrefixedChunkIterator implements IterableIterator<ChunkItem> {
  private offset = 0;
  private index = 0;
  private done = false;
  private readonly view: DataView;

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  [Symbol.iterator](): IterableIterator<ChunkItem> {
    return this;
  }

  next(): IteratorResult<ChunkItem> {
    if (this.done) {
      return { done: true, value: undefined };
    }

    const remaining = this.data.length - this.offset;
    if (remaining < LENGTH_PREFIX_SIZE) {
      this.done = true;
      if (remaining === 0) {
        return { done: true, value: undefined };
      }
      return {
        done: false,
        value: fail(new IncompleteLengthPrefixError(this.index, this.offset, remaining)),
      };
    }

    const start = this.offset;
    const length = this.view.getUint32(start, true);
    this.offset += LENGTH_PREFIX_SIZE;

    const available = this.data.length - this.offset;
    if (length > available) {
      this.done = true;
      return {
        done: false,
        value: fail(new IncompleteChunkDataError(this.index, start, length, available)),
      };
    }

    const payload = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    const record = { index: this.index, payload };
    this.index++;
    return { done: false, value: ok(record) };
  }
}
