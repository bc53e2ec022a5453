// Connection - request/reply driver over one socket
// Owns the buffer and decoder scratch state; one exchange in flight at a time

import { ConnectionConfig, ConnectionConfigInput, createConfig } from './config';
import { SocketTransport } from './transport/transport';
import { TcpTransport } from './transport/tcpTransport';
import { GrowableBuffer } from './protocol/growableBuffer';
import { LineReader } from './protocol/lineReader';
import { ReplyDecoder } from './protocol/replyDecoder';
import { Argument, formatArgument, inlineRequest } from './protocol/requests';
import { CRLF } from './protocol/constants';
import { Reply, ReplyShape, ReplyOf } from './types';
import {
  ConnectionBusyError,
  ConnectionClosedError,
  ErrorCode,
  RespClientError,
  TimeoutError,
} from './errors';
import { debugLog } from './utils/debug';

/**
 * A connection to one server.
 *
 * Usage:
 * ```typescript
 * const conn = await Connection.connect({ host: '127.0.0.1', port: 6379, timeout: 2000 });
 * const reply = await conn.sendAndReceive('bulk', 'GET k\r\n');
 * console.log(reply.value);
 * await conn.close();
 * ```
 *
 * Not safe for overlapping use: a request issued while another is in flight
 * rejects with ConnectionBusyError.
 *
 * Bytes left unread from an earlier exchange are dropped before each request
 * is sent. A reply that is still in transit at that point cannot be told
 * apart from the new one, so after a TIMED_OUT failure the connection should
 * be closed rather than reused.
 */
export class Connection {
  private readonly buffer: GrowableBuffer;
  private readonly decoder: ReplyDecoder;

  private inFlight = false;
  private closed = false;
  private reply: Reply | null = null;
  private error: ErrorCode | null = null;

  /**
   * @param transport - Connected transport (TcpTransport in production, MockTransport for testing)
   * @param config - Validated configuration; `timeout` applies to every send and receive
   */
  constructor(
    private readonly transport: SocketTransport,
    readonly config: ConnectionConfig
  ) {
    this.buffer = new GrowableBuffer(config.bufferChunkSize);
    const reader = new LineReader(this.buffer, transport, config.timeout, config.bufferChunkSize);
    this.decoder = new ReplyDecoder(this.buffer, reader);
  }

  /**
   * Connect over TCP. Defaults: 127.0.0.1, port 6379, 2000ms timeout.
   *
   * @throws ConnectError when the name does not resolve or the connect fails
   * @throws TimeoutError when the connect does not complete in time
   */
  static async connect(input: ConnectionConfigInput = {}): Promise<Connection> {
    const config = createConfig(input);
    const transport = await TcpTransport.connect(config.host, config.port, config.timeout);
    return new Connection(transport, config);
  }

  get host(): string {
    return this.config.host;
  }

  get port(): number {
    return this.config.port;
  }

  get timeout(): number {
    return this.config.timeout;
  }

  /** Last successfully decoded reply */
  get lastReply(): Reply | null {
    return this.reply;
  }

  /** Code of the last failed exchange; cleared by a successful one */
  get lastError(): ErrorCode | null {
    return this.error;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Current capacity of the shared send/receive buffer */
  get bufferCapacity(): number {
    return this.buffer.capacity;
  }

  /**
   * Send a formatted request and decode one reply of the `expected` shape
   */
  async sendAndReceive<S extends ReplyShape>(expected: S, request: string): Promise<ReplyOf<S>> {
    return this.exchange(expected, () => {
      this.buffer.appendString(request);
    });
  }

  /**
   * Build `VERB arg1 ... argN\r\n` straight into the buffer, send it, and
   * decode one reply of the `expected` shape. For variable-arity commands.
   */
  async sendCommandAndReceive<S extends ReplyShape>(
    expected: S,
    verb: string,
    args: readonly Argument[]
  ): Promise<ReplyOf<S>> {
    // Validate everything before touching the buffer
    const tokens = [formatArgument(verb), ...args.map(formatArgument)];

    return this.exchange(expected, () => {
      tokens.forEach((token, i) => {
        if (i > 0) {
          this.buffer.appendString(' ');
        }
        this.buffer.appendString(token);
      });
      this.buffer.appendString(CRLF);
    });
  }

  /**
   * Send QUIT without waiting for a reply, then close
   */
  async quit(): Promise<void> {
    if (this.closed) {
      return;
    }

    try {
      const request = Buffer.from(inlineRequest('QUIT'), 'utf8');
      await this.transport.send(this.config.timeout, request);
    } finally {
      await this.close();
    }
  }

  /**
   * Close the socket. Further requests reject with ConnectionClosedError.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.buffer.release();
    await this.transport.close();
    debugLog(`connection: closed ${this.config.host}:${this.config.port}`);
  }

  private async exchange<S extends ReplyShape>(expected: S, format: () => void): Promise<ReplyOf<S>> {
    if (this.closed) {
      throw new ConnectionClosedError('Connection is closed');
    }
    if (this.inFlight) {
      throw new ConnectionBusyError();
    }

    this.inFlight = true;
    try {
      const stale = this.transport.discardPending();
      if (stale > 0) {
        debugLog(`connection: dropped ${stale} stale bytes before sending`);
      }
      this.buffer.reset();
      format();

      const request = this.buffer.contents();
      debugLog(`connection: sending ${request.length} bytes`);

      const sent = await this.transport.send(this.config.timeout, request);
      if (sent !== request.length) {
        throw new TimeoutError(
          `Sent ${sent} of ${request.length} bytes within ${this.config.timeout}ms`,
          this.config.timeout
        );
      }

      const reply = await this.decoder.decode(expected);
      this.reply = reply;
      this.error = null;
      return reply;
    } catch (err) {
      if (err instanceof RespClientError) {
        this.error = err.code;
      }
      throw err;
    } finally {
      this.inFlight = false;
    }
  }
}
