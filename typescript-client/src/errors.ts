// Error classes for the protocol client
// One class per failure kind, each carrying a stable code

/**
 * Stable error codes, one per failure kind
 */
export type ErrorCode =
  | 'OUT_OF_MEMORY'
  | 'SEND_FAILED'
  | 'TIMED_OUT'
  | 'RECEIVE_FAILED'
  | 'CONNECTION_CLOSED'
  | 'PROTOCOL_VIOLATION'
  | 'SERVER_ERROR'
  | 'CONNECT_FAILED'
  | 'CONNECTION_BUSY'
  | 'VALIDATION';

/**
 * Base error class for all client errors
 */
export class RespClientError extends Error {
  public readonly name: string = 'RespClientError';
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Buffer growth failed
 */
export class OutOfMemoryError extends RespClientError {
  public readonly name: string = 'OutOfMemoryError';
  public readonly requestedBytes: number;

  constructor(requestedBytes: number) {
    super(`Could not grow buffer to ${requestedBytes} bytes`, 'OUT_OF_MEMORY');
    this.requestedBytes = requestedBytes;
  }
}

/**
 * Socket write failed
 */
export class SendError extends RespClientError {
  public readonly name: string = 'SendError';
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'SEND_FAILED');
    this.cause = cause;
  }
}

/**
 * Send or receive exceeded its time budget
 */
export class TimeoutError extends RespClientError {
  public readonly name: string = 'TimeoutError';
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, 'TIMED_OUT');
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Socket read failed for a reason other than timeout or clean close
 */
export class ReceiveError extends RespClientError {
  public readonly name: string = 'ReceiveError';
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'RECEIVE_FAILED');
    this.cause = cause;
  }
}

/**
 * Peer closed the connection before a full reply arrived,
 * or the connection was closed locally
 */
export class ConnectionClosedError extends RespClientError {
  public readonly name: string = 'ConnectionClosedError';

  constructor(message = 'Connection closed') {
    super(message, 'CONNECTION_CLOSED');
  }
}

/**
 * Wire protocol violation: wrong tag, malformed length, short bulk body,
 * truncated multi-bulk
 */
export class ProtocolError extends RespClientError {
  public readonly name: string = 'ProtocolError';

  constructor(message: string) {
    super(`Protocol error: ${message}`, 'PROTOCOL_VIOLATION');
  }
}

/**
 * The server understood the command and rejected it (`-` reply)
 */
export class ServerError extends RespClientError {
  public readonly name: string = 'ServerError';
  public readonly serverMessage: string;

  constructor(serverMessage: string) {
    super(`Server error: ${serverMessage}`, 'SERVER_ERROR');
    this.serverMessage = serverMessage;
  }
}

/**
 * Name resolution or TCP connect failed
 */
export class ConnectError extends RespClientError {
  public readonly name: string = 'ConnectError';
  public readonly endpoint: string;
  public readonly cause?: Error;

  constructor(message: string, endpoint: string, cause?: Error) {
    super(message, 'CONNECT_FAILED');
    this.endpoint = endpoint;
    this.cause = cause;
  }
}

/**
 * A request was issued while another one is still in flight on the same connection
 */
export class ConnectionBusyError extends RespClientError {
  public readonly name: string = 'ConnectionBusyError';

  constructor() {
    super('Another request is in flight on this connection', 'CONNECTION_BUSY');
  }
}

/**
 * Invalid caller input - thrown before anything is written to the socket
 */
export class ValidationError extends RespClientError {
  public readonly name: string = 'ValidationError';

  constructor(message: string) {
    super(message, 'VALIDATION');
  }
}
