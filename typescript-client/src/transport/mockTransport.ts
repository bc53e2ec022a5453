// Mock transport implementation for testing

import { SocketTransport, ReceiveResult } from './transport';
import { ReceiveError, SendError } from '../errors';

/**
 * Mock transport for testing without a real socket
 *
 * Incoming bytes are scripted as chunks; each receive() hands out at most
 * one chunk (split at `maxBytes`). With nothing scripted, receive() reports
 * a timeout right away instead of waiting the budget out.
 */
export class MockTransport implements SocketTransport {
  // In-memory queues
  public sentChunks: Buffer[] = [];
  private incoming: Buffer[] = [];
  private replies: Array<ReadonlyArray<string | Buffer>> = [];
  private remoteClosed = false;
  private closed = false;
  private receiveFailure: Error | null = null;
  private sendFailure: Error | null = null;
  private sendLimit: number | null = null;

  /** Number of receive() calls made, for assertions */
  public receiveCalls = 0;

  /**
   * Inject incoming bytes for testing
   * Each argument is delivered as a separate chunk (a separate socket read)
   */
  injectChunks(...chunks: Array<string | Buffer>): void {
    for (const chunk of chunks) {
      this.incoming.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    }
  }

  /**
   * Script the reply to the next full send(); chunks are injected once the
   * request has been written
   */
  replyWith(...chunks: Array<string | Buffer>): void {
    this.replies.push(chunks);
  }

  /**
   * Simulate the peer closing the connection once queued chunks are read
   */
  closeRemote(): void {
    this.remoteClosed = true;
  }

  /**
   * Make the next receive() with no queued data fail
   */
  failReceive(error: Error = new Error('ECONNRESET')): void {
    this.receiveFailure = error;
  }

  /**
   * Make the next send() fail with a write error
   */
  failSend(error: Error = new Error('EPIPE')): void {
    this.sendFailure = error;
  }

  /**
   * Accept at most `bytes` per send(), simulating a send that ran out of time
   */
  limitSend(bytes: number | null): void {
    this.sendLimit = bytes;
  }

  async receive(_timeoutMs: number, maxBytes: number): Promise<ReceiveResult> {
    this.receiveCalls++;

    const chunk = this.incoming.shift();
    if (chunk !== undefined) {
      if (chunk.length > maxBytes) {
        this.incoming.unshift(chunk.subarray(maxBytes));
        return { type: 'data', bytes: chunk.subarray(0, maxBytes) };
      }
      return { type: 'data', bytes: chunk };
    }

    if (this.receiveFailure !== null) {
      const error = this.receiveFailure;
      this.receiveFailure = null;
      throw new ReceiveError(`Socket read failed: ${error.message}`, error);
    }

    if (this.remoteClosed || this.closed) {
      return { type: 'closed' };
    }

    return { type: 'timeout' };
  }

  async send(_timeoutMs: number, bytes: Uint8Array): Promise<number> {
    if (this.sendFailure !== null) {
      const error = this.sendFailure;
      this.sendFailure = null;
      throw new SendError(`Socket write failed: ${error.message}`, error);
    }

    if (this.closed) {
      throw new SendError('Socket is not writable');
    }

    const accepted = this.sendLimit === null ? bytes.length : Math.min(bytes.length, this.sendLimit);
    this.sentChunks.push(Buffer.from(bytes.subarray(0, accepted)));

    if (accepted === bytes.length) {
      const reply = this.replies.shift();
      if (reply !== undefined) {
        this.injectChunks(...reply);
      }
    }

    return accepted;
  }

  discardPending(): number {
    const dropped = this.incoming.reduce((total, chunk) => total + chunk.length, 0);
    this.incoming = [];
    return dropped;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Everything sent so far, as one string
   */
  sentText(): string {
    return Buffer.concat(this.sentChunks).toString('utf8');
  }

  /**
   * Get all sent requests and clear the record
   */
  takeSent(): string[] {
    const sent = this.sentChunks.map((chunk) => chunk.toString('utf8'));
    this.sentChunks = [];
    return sent;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
