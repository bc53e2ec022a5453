// Growable byte buffer shared by outgoing requests and incoming replies
// Capacity only grows, in whole chunks; reset() keeps the storage for reuse, release() drops it

import { OutOfMemoryError } from '../errors';
import { debugLog } from '../utils/debug';
import { BUFFER_CHUNK_SIZE } from './constants';

/**
 * Byte buffer with a fill mark (`len`) and a read cursor (`idx`).
 *
 * Invariant: `idx <= len <= capacity`. Bytes in `[0, len)` survive growth.
 */
export class GrowableBuffer {
  private data: Buffer;
  private length = 0;
  private cursor = 0;

  constructor(
    private readonly chunkSize: number = BUFFER_CHUNK_SIZE,
    initialCapacity: number = chunkSize
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError('chunkSize must be a positive integer');
    }
    this.data = GrowableBuffer.allocate(initialCapacity);
  }

  get capacity(): number {
    return this.data.length;
  }

  /** Number of valid bytes */
  get len(): number {
    return this.length;
  }

  /** Read cursor, used while decoding */
  get idx(): number {
    return this.cursor;
  }

  set idx(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > this.length) {
      throw new RangeError(`idx ${value} outside [0, ${this.length}]`);
    }
    this.cursor = value;
  }

  /** Bytes available after `len` without growing */
  get free(): number {
    return this.data.length - this.length;
  }

  /**
   * Guarantee at least `additional` free bytes after `len`.
   * Grows by `floor(additional / chunk) + 1` chunks, never finer.
   */
  ensureCapacity(additional: number): void {
    if (this.free >= additional) {
      return;
    }

    const chunks = Math.floor(additional / this.chunkSize) + 1;
    const total = this.data.length + chunks * this.chunkSize;
    debugLog(`buffer: allocate ${chunks} x ${this.chunkSize}, total ${total} bytes`);

    const grown = GrowableBuffer.allocate(total);
    this.data.copy(grown, 0, 0, this.length);
    this.data = grown;
  }

  /**
   * Drop the storage. The buffer stays usable and grows again on demand.
   */
  release(): void {
    this.data = GrowableBuffer.allocate(0);
    this.length = 0;
    this.cursor = 0;
  }

  append(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.data.set(bytes, this.length);
    this.length += bytes.length;
  }

  appendString(text: string): void {
    const size = Buffer.byteLength(text, 'utf8');
    this.ensureCapacity(size);
    this.length += this.data.write(text, this.length, size, 'utf8');
  }

  /**
   * Mark `count` bytes of the free region as filled, after they were
   * written there through writableRegion()
   */
  commit(count: number): void {
    if (!Number.isInteger(count) || count < 0 || count > this.free) {
      throw new RangeError(`cannot commit ${count} bytes, ${this.free} free`);
    }
    this.length += count;
  }

  /**
   * View over `[0, len)`, valid until the next growth or reset
   */
  contents(): Buffer {
    return this.data.subarray(0, this.length);
  }

  /**
   * View over the free region, valid until the next growth
   */
  writableRegion(): Buffer {
    return this.data.subarray(this.length);
  }

  /**
   * Discard contents, keep capacity
   */
  reset(): void {
    this.length = 0;
    this.cursor = 0;
  }

  /**
   * Offset of the first CRLF at or after `from`, or -1
   */
  indexOfCrlf(from: number): number {
    if (from >= this.length) {
      return -1;
    }
    return this.data.subarray(0, this.length).indexOf('\r\n', from, 'latin1');
  }

  byteAt(offset: number): number {
    if (offset < 0 || offset >= this.length) {
      throw new RangeError(`offset ${offset} outside [0, ${this.length})`);
    }
    return this.data.readUInt8(offset);
  }

  /**
   * Decode `[start, start + length)` into an owned string
   */
  decode(start = 0, length = this.length - start): string {
    return this.data.toString('utf8', start, start + length);
  }

  /**
   * Copy `[start, start + length)` into a fresh Buffer
   */
  copyOut(start = 0, length = this.length - start): Buffer {
    return Buffer.from(this.data.subarray(start, start + length));
  }

  private static allocate(size: number): Buffer {
    try {
      return Buffer.alloc(size);
    } catch (err) {
      if (err instanceof RangeError) {
        throw new OutOfMemoryError(size);
      }
      throw err;
    }
  }
}
