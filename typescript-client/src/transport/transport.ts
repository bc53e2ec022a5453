// Transport layer interface for timed socket I/O

/**
 * Outcome of a bounded receive
 */
export type ReceiveResult =
  | { readonly type: 'data'; readonly bytes: Buffer }
  | { readonly type: 'closed' }
  | { readonly type: 'timeout' };

/**
 * Socket transport with per-call time budgets.
 *
 * Timeouts are reported as values, not errors: a receive that waited out
 * its budget returns `{ type: 'timeout' }`, a send returns a short count.
 * Hard socket failures reject with ReceiveError / SendError.
 */
export interface SocketTransport {
  /**
   * Wait up to `timeoutMs` for readable data, then read at most `maxBytes`
   * @returns 1..maxBytes bytes, `closed` at end of stream, or `timeout`
   */
  receive(timeoutMs: number, maxBytes: number): Promise<ReceiveResult>;

  /**
   * Write `bytes`, waiting for writability within the remaining budget
   * @returns number of bytes written before the deadline
   */
  send(timeoutMs: number, bytes: Uint8Array): Promise<number>;

  /**
   * Drop bytes that arrived but were not read yet
   * @returns number of bytes dropped
   */
  discardPending(): number;

  /**
   * Close the socket. Idempotent.
   */
  close(): Promise<void>;
}
