// Public API exports for @respwire/client
// Main entry point for the library

// Main client class
export { RespClient } from './client';

// Request/reply driver (for advanced usage)
export { Connection } from './connection';

// Configuration
export type { ConnectionConfig, ConnectionConfigInput } from './config';
export { createConfig, validateConfig, DEFAULT_HOST, DEFAULT_PORT, DEFAULT_TIMEOUT } from './config';

// Error types
export type { ErrorCode } from './errors';
export {
  RespClientError,
  OutOfMemoryError,
  SendError,
  TimeoutError,
  ReceiveError,
  ConnectionClosedError,
  ProtocolError,
  ServerError,
  ConnectError,
  ConnectionBusyError,
  ValidationError,
} from './errors';

// Reply types
export type {
  Reply,
  ReplyShape,
  ReplyOf,
  StatusReply,
  IntegerReply,
  BulkReply,
  MultiBulkReply,
  KeyType,
} from './types';

// Protocol building blocks (for advanced usage / testing)
export { GrowableBuffer } from './protocol/growableBuffer';
export { LineReader } from './protocol/lineReader';
export type { ReadRecordResult } from './protocol/lineReader';
export {
  ReplyDecoder,
  expectShape,
  expectStatus,
  expectInteger,
  expectBulk,
  expectMultiBulk,
} from './protocol/replyDecoder';
export { inlineRequest, bulkRequest, formatArgument } from './protocol/requests';
export type { Argument } from './protocol/requests';
export { parseInfo } from './protocol/info';
export type { ServerInfo } from './protocol/info';

// Transports
export type { SocketTransport, ReceiveResult } from './transport/transport';
export { TcpTransport } from './transport/tcpTransport';
export { MockTransport } from './transport/mockTransport';

// Debug logging
export { setDebugEnabled, isDebugEnabled } from './utils/debug';
