// Record reader over the connection buffer
// The only place where the receive path grows the buffer and reads the socket

import { GrowableBuffer } from './growableBuffer';
import { SocketTransport } from '../transport/transport';
import { TimeoutError } from '../errors';
import { debugLog } from '../utils/debug';
import { BUFFER_CHUNK_SIZE } from './constants';

/**
 * A CRLF-terminated record, as a slice of the buffer (terminator excluded),
 * or end of stream
 */
export type ReadRecordResult =
  | { readonly type: 'record'; readonly start: number; readonly length: number }
  | { readonly type: 'closed' };

/**
 * Delivers successive CRLF-terminated records from the buffer, topping it
 * up from the transport whenever no terminator is present yet.
 */
export class LineReader {
  private readonly lowWaterMark: number;

  constructor(
    private readonly buffer: GrowableBuffer,
    private readonly transport: SocketTransport,
    private readonly timeoutMs: number,
    chunkSize: number = BUFFER_CHUNK_SIZE
  ) {
    // Grow before reading once less than a tenth of a chunk is free
    this.lowWaterMark = Math.max(1, Math.floor(chunkSize / 10));
  }

  /**
   * Read the next record, starting the CRLF search `skip` bytes past the
   * cursor. With `skip = n` a known-length payload is taken as opaque, even
   * when it holds CRLF itself.
   *
   * Advances the cursor past the terminator. Nothing is written into the
   * record bytes.
   *
   * @throws TimeoutError when a socket read waits out the timeout
   * @throws ReceiveError when a socket read fails
   * @throws OutOfMemoryError when the buffer cannot grow
   */
  async readRecord(skip = 0): Promise<ReadRecordResult> {
    const buf = this.buffer;

    if (buf.len === 0 || buf.idx >= buf.len) {
      buf.reset();
    }

    let searchFrom = buf.idx + skip;

    for (;;) {
      const crlf = buf.indexOfCrlf(searchFrom);
      if (crlf >= 0) {
        const start = buf.idx;
        buf.idx = crlf + 2;
        debugLog(`reader: record len=${crlf - start} idx=${buf.idx} buffered=${buf.len}`);
        return { type: 'record', start, length: crlf - start };
      }

      // A terminator may straddle the old and new bytes
      searchFrom = Math.max(buf.idx + skip, buf.len - 1);

      if (buf.free < this.lowWaterMark) {
        debugLog('reader: free buffer space is low, get more memory');
        buf.ensureCapacity(this.lowWaterMark);
      }

      const result = await this.transport.receive(this.timeoutMs, buf.free);
      switch (result.type) {
        case 'data':
          buf.writableRegion().set(result.bytes);
          buf.commit(result.bytes.length);
          break;
        case 'closed':
          debugLog('reader: end of stream');
          return { type: 'closed' };
        case 'timeout':
          throw new TimeoutError(`No data received within ${this.timeoutMs}ms`, this.timeoutMs);
      }
    }
  }
}
