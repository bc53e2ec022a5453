// Reply decoder
// One record in, one typed reply out; the first byte of the record picks the shape

import { GrowableBuffer } from './growableBuffer';
import { LineReader } from './lineReader';
import { ReplyTag, MULTIBULK_CHUNK_SIZE, NULL_LENGTH } from './constants';
import type {
  BulkReply,
  IntegerReply,
  MultiBulkReply,
  Reply,
  ReplyOf,
  ReplyShape,
  StatusReply,
} from '../types';
import { ConnectionClosedError, OutOfMemoryError, ProtocolError, ServerError } from '../errors';
import { debugLog } from '../utils/debug';

/**
 * Largest multi-bulk count the slot table can hold
 */
export const MAX_MULTIBULK_COUNT = 2 ** 32 - MULTIBULK_CHUNK_SIZE;

/**
 * Lenient integer parse: optional leading whitespace and sign, then digits.
 * Trailing content is ignored and a missing number reads as 0.
 * @throws ProtocolError when the number does not fit a safe integer
 */
export function parseIntegerPrefix(text: string): number {
  const match = /^\s*([+-]?\d+)/.exec(text);
  if (match === null || match[1] === undefined) {
    return 0;
  }

  const value = Number(match[1]);
  if (!Number.isSafeInteger(value)) {
    throw new ProtocolError(`Integer ${match[1]} is outside the safe integer range`);
  }
  return value;
}

/**
 * Parse a bulk length or multi-bulk count. Must be a plain decimal of at
 * least -1.
 * @throws ProtocolError otherwise
 */
export function parseLength(text: string): number {
  if (!/^-?\d+$/.test(text)) {
    throw new ProtocolError(`Malformed length '${text}'`);
  }

  const value = Number(text);
  if (value < NULL_LENGTH || !Number.isSafeInteger(value)) {
    throw new ProtocolError(`Invalid length ${text}`);
  }
  return value;
}

/**
 * Reply shape announced by a tag byte, or null for an unknown tag.
 * The error tag has no shape: it is never a valid reply.
 */
export function shapeOfTag(tag: number): ReplyShape | null {
  switch (tag) {
    case ReplyTag.Status:
      return 'status';
    case ReplyTag.Integer:
      return 'integer';
    case ReplyTag.Bulk:
      return 'bulk';
    case ReplyTag.MultiBulk:
      return 'multiBulk';
    default:
      return null;
  }
}

/**
 * Narrow a reply to the shape that was asked for
 * @throws ProtocolError on mismatch
 */
export function expectShape<S extends ReplyShape>(reply: Reply, shape: S): ReplyOf<S> {
  if (isShape(reply, shape)) {
    return reply;
  }
  throw new ProtocolError(`Expected ${shape} reply, got ${reply.type}`);
}

function isShape<S extends ReplyShape>(reply: Reply, shape: S): reply is ReplyOf<S> {
  return reply.type === shape;
}

export function expectStatus(reply: Reply): StatusReply {
  return expectShape(reply, 'status');
}

export function expectInteger(reply: Reply): IntegerReply {
  return expectShape(reply, 'integer');
}

export function expectBulk(reply: Reply): BulkReply {
  return expectShape(reply, 'bulk');
}

export function expectMultiBulk(reply: Reply): MultiBulkReply {
  return expectShape(reply, 'multiBulk');
}

/**
 * Decodes exactly one reply per call from the connection buffer.
 *
 * Owns the multi-bulk slot table: a scratch array reused across replies,
 * grown in multiples of MULTIBULK_CHUNK_SIZE. Decoded replies get their own
 * copy of the values.
 */
export class ReplyDecoder {
  private slots: Array<string | null> = new Array<string | null>(MULTIBULK_CHUNK_SIZE).fill(null);

  constructor(
    private readonly buffer: GrowableBuffer,
    private readonly reader: LineReader
  ) {}

  /** Current size of the multi-bulk slot table */
  get slotCapacity(): number {
    return this.slots.length;
  }

  /**
   * Decode one reply and check it has the `expected` shape.
   * Resets the buffer first: request bytes and stale input are discarded.
   *
   * @throws ServerError for a `-` reply, whatever was expected
   * @throws ProtocolError for a wrong or unknown tag, or a malformed reply
   * @throws ConnectionClosedError when the stream ends mid-reply
   */
  async decode<S extends ReplyShape>(expected: S): Promise<ReplyOf<S>> {
    this.buffer.reset();

    const header = await this.nextRecord();
    if (header.length === 0) {
      throw new ProtocolError('Empty reply record');
    }

    const tag = this.buffer.byteAt(header.start);
    const body = this.buffer.decode(header.start + 1, header.length - 1);
    debugLog(`decoder: tag '${String.fromCharCode(tag)}' body '${body}'`);

    if (tag === ReplyTag.Error) {
      throw new ServerError(body);
    }

    const shape = shapeOfTag(tag);
    if (shape === null) {
      throw new ProtocolError(`Unknown reply tag '${String.fromCharCode(tag)}'`);
    }
    if (shape !== expected) {
      throw new ProtocolError(`Expected ${expected} reply, got ${shape}`);
    }

    return expectShape(await this.decodeBody(shape, body), expected);
  }

  private async decodeBody(shape: ReplyShape, body: string): Promise<Reply> {
    switch (shape) {
      case 'status':
        return { type: 'status', text: body };
      case 'integer':
        return { type: 'integer', value: parseIntegerPrefix(body) };
      case 'bulk':
        return { type: 'bulk', value: await this.readBulkBody(body) };
      case 'multiBulk':
        return { type: 'multiBulk', values: await this.readMultiBulk(body) };
    }
  }

  /**
   * Body of a bulk reply whose `$` header carried `lengthText`
   */
  private async readBulkBody(lengthText: string): Promise<string | null> {
    const length = parseLength(lengthText);
    if (length === NULL_LENGTH) {
      return null;
    }

    const record = await this.nextRecord(length);
    if (record.length !== length) {
      throw new ProtocolError(`Bulk length mismatch: declared ${length}, got ${record.length}`);
    }
    return this.buffer.decode(record.start, record.length);
  }

  private async readMultiBulk(countText: string): Promise<Array<string | null> | null> {
    const count = parseLength(countText);
    if (count === NULL_LENGTH) {
      return null;
    }

    if (count > MAX_MULTIBULK_COUNT) {
      throw new ProtocolError(`Multi-bulk count ${count} exceeds ${MAX_MULTIBULK_COUNT}`);
    }

    try {
      for (let i = 0; i < count; i++) {
        // Grow as elements arrive, not from the announced count
        if (i === this.slots.length) {
          this.ensureSlots(Math.min(count, 2 * this.slots.length));
        }

        const record = await this.nextRecord();
        if (record.length === 0 || this.buffer.byteAt(record.start) !== ReplyTag.Bulk) {
          throw new ProtocolError(`Multi-bulk element ${i + 1} of ${count} is not a bulk reply`);
        }
        this.slots[i] = await this.readBulkBody(this.buffer.decode(record.start + 1, record.length - 1));
      }

      return this.slots.slice(0, count);
    } finally {
      // Drop references held by the scratch table
      this.slots.fill(null, 0, count);
    }
  }

  private ensureSlots(count: number): void {
    if (count <= this.slots.length) {
      return;
    }

    const size = Math.min((Math.floor(count / MULTIBULK_CHUNK_SIZE) + 1) * MULTIBULK_CHUNK_SIZE, 2 ** 32 - 1);
    debugLog(`decoder: grow multi-bulk slots to ${size}`);

    let grown: Array<string | null>;
    try {
      grown = new Array<string | null>(size).fill(null);
    } catch (err) {
      if (err instanceof RangeError) {
        throw new OutOfMemoryError(size);
      }
      throw err;
    }
    for (let i = 0; i < this.slots.length; i++) {
      grown[i] = this.slots[i] ?? null;
    }
    this.slots = grown;
  }

  private async nextRecord(skip = 0): Promise<{ start: number; length: number }> {
    const result = await this.reader.readRecord(skip);
    if (result.type === 'closed') {
      throw new ConnectionClosedError('Connection closed by peer before a full reply arrived');
    }
    return result;
  }
}
