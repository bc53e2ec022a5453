// Reply types
// Discriminated union over the reply shapes a request can declare

/**
 * Reply shape a caller expects from a request
 */
export type ReplyShape = 'status' | 'integer' | 'bulk' | 'multiBulk';

export interface StatusReply {
  readonly type: 'status';
  readonly text: string;
}

export interface IntegerReply {
  readonly type: 'integer';
  readonly value: number;
}

export interface BulkReply {
  readonly type: 'bulk';
  /** null for the `$-1` absence marker */
  readonly value: string | null;
}

export interface MultiBulkReply {
  readonly type: 'multiBulk';
  /** null for a `*-1` reply; elements are individually nullable */
  readonly values: ReadonlyArray<string | null> | null;
}

/**
 * A decoded reply. Owns its values - nothing here refers back into the
 * connection buffer, so a reply stays valid after later requests.
 */
export type Reply = StatusReply | IntegerReply | BulkReply | MultiBulkReply;

/**
 * Maps a declared shape to the reply it produces
 */
export type ReplyOf<S extends ReplyShape> = Extract<Reply, { type: S }>;

/**
 * Value type stored under a key, as reported by TYPE
 */
export type KeyType = 'none' | 'string' | 'list' | 'set';
