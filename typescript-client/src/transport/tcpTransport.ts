// TCP transport implementation for timed socket I/O

import * as net from 'net';
import { SocketTransport, ReceiveResult } from './transport';
import { TimedQueue } from '../utils/timedQueue';
import { ConnectError, ReceiveError, SendError, TimeoutError } from '../errors';
import { debugLog } from '../utils/debug';

/**
 * Largest slice handed to a single socket write
 */
export const DEFAULT_WRITE_CHUNK_SIZE = 64 * 1024;

/**
 * net.Socket transport
 *
 * Incoming chunks are queued as they arrive; the readiness wait of
 * receive() is a timer-bounded wait on that queue. send() writes in slices
 * and waits for 'drain' within the remaining budget.
 */
export class TcpTransport implements SocketTransport {
  private readonly incoming = new TimedQueue<Buffer>();
  private socketError: Error | null = null;
  private closed = false;

  constructor(
    private readonly socket: net.Socket,
    private readonly writeChunkSize: number = DEFAULT_WRITE_CHUNK_SIZE
  ) {
    socket.on('data', (chunk: Buffer) => {
      if (!this.incoming.isClosed()) {
        this.incoming.offer(chunk);
      }
    });

    // Peer sent FIN, or the socket went away
    socket.on('end', () => this.incoming.close());
    socket.on('close', () => this.incoming.close());

    socket.on('error', (err: Error) => {
      debugLog(`tcp: socket error ${err.message}`);
      this.socketError = err;
      this.incoming.fail(new ReceiveError(`Socket read failed: ${err.message}`, err));
    });
  }

  /**
   * Resolve `host`, open a TCP connection within `timeoutMs`, and enable
   * keepalive and no-delay on the socket
   */
  static connect(host: string, port: number, timeoutMs: number): Promise<TcpTransport> {
    const endpoint = `${host}:${port}`;

    return new Promise<TcpTransport>((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const timer = setTimeout(() => {
        socket.off('error', onError);
        socket.destroy();
        reject(new TimeoutError(`Connect to ${endpoint} timed out after ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);

      const onError = (err: Error): void => {
        clearTimeout(timer);
        socket.destroy();
        reject(new ConnectError(`Could not connect to ${endpoint}: ${err.message}`, endpoint, err));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        socket.setKeepAlive(true);
        socket.setNoDelay(true);
        debugLog(`tcp: connected to ${endpoint}`);
        resolve(new TcpTransport(socket));
      });
    });
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  async receive(timeoutMs: number, maxBytes: number): Promise<ReceiveResult> {
    if (!Number.isInteger(maxBytes) || maxBytes < 1) {
      throw new RangeError('maxBytes must be a positive integer');
    }

    const result = await this.incoming.take(timeoutMs);
    if (result.type !== 'item') {
      return result;
    }

    let bytes = result.item;
    if (bytes.length > maxBytes) {
      // Keep the tail for the next read
      this.incoming.pushFront(bytes.subarray(maxBytes));
      bytes = bytes.subarray(0, maxBytes);
    }

    debugLog(`tcp: received ${bytes.length} bytes`);
    return { type: 'data', bytes };
  }

  async send(timeoutMs: number, bytes: Uint8Array): Promise<number> {
    const deadline = Date.now() + timeoutMs;
    let sent = 0;

    while (sent < bytes.length) {
      if (this.socketError !== null) {
        throw new SendError(`Socket write failed: ${this.socketError.message}`, this.socketError);
      }
      if (this.closed || this.socket.destroyed || !this.socket.writable) {
        throw new SendError('Socket is not writable');
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        break;
      }

      if (this.socket.writableNeedDrain) {
        const drained = await this.waitForDrain(remaining);
        if (!drained) {
          break;
        }
        continue;
      }

      const end = Math.min(bytes.length, sent + this.writeChunkSize);
      // Copy: the caller reuses its buffer as soon as send() returns
      this.socket.write(Buffer.from(bytes.subarray(sent, end)));
      sent = end;
    }

    debugLog(`tcp: sent ${sent}/${bytes.length} bytes`);
    return sent;
  }

  discardPending(): number {
    const dropped = this.incoming.clear().reduce((total, chunk) => total + chunk.length, 0);
    if (dropped > 0) {
      debugLog(`tcp: discarded ${dropped} unread bytes`);
    }
    return dropped;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.socket.destroy();
    this.incoming.close();
  }

  /**
   * Resolves true once the socket drained (or failed, which the send loop
   * reports), false when `timeoutMs` elapsed first
   */
  private waitForDrain(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const done = (drained: boolean): void => {
        clearTimeout(timer);
        this.socket.off('drain', onDrain);
        this.socket.off('close', onDrain);
        resolve(drained);
      };
      const onDrain = (): void => done(true);
      const timer = setTimeout(() => done(false), timeoutMs);

      this.socket.once('drain', onDrain);
      this.socket.once('close', onDrain);
    });
  }
}
