// Connection configuration with validation and defaults
// Plain object configuration, NOT builder pattern

import { ValidationError } from './errors';
import { BUFFER_CHUNK_SIZE } from './protocol/constants';

/**
 * Connection configuration
 */
export interface ConnectionConfig {
  readonly host: string;
  readonly port: number;
  readonly timeout: number; // milliseconds, per call
  readonly bufferChunkSize: number; // bytes, growth step of the connection buffer
}

/**
 * Default configuration values
 */
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 6379;
export const DEFAULT_TIMEOUT = 2000; // 2 seconds

/**
 * Partial connection configuration (user-provided)
 * All fields are optional
 */
export interface ConnectionConfigInput {
  readonly host?: string;
  readonly port?: number;
  readonly timeout?: number;
  readonly bufferChunkSize?: number;
}

/**
 * Validate connection configuration
 * Throws synchronous error if invalid
 */
export function validateConfig(config: ConnectionConfig): void {
  if (config.host.length === 0) {
    throw new ValidationError('host cannot be empty');
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new ValidationError(`port must be an integer in 1-65535, got ${config.port}`);
  }

  if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
    throw new ValidationError('timeout must be positive');
  }

  if (!Number.isInteger(config.bufferChunkSize) || config.bufferChunkSize < 1) {
    throw new ValidationError('bufferChunkSize must be a positive integer');
  }
}

/**
 * Create a complete ConnectionConfig from partial input
 * Applies defaults for missing values
 */
export function createConfig(input: ConnectionConfigInput = {}): ConnectionConfig {
  const config: ConnectionConfig = {
    // An empty host falls back to the default, a port of 0 too
    host: input.host || DEFAULT_HOST,
    port: input.port || DEFAULT_PORT,
    timeout: input.timeout ?? DEFAULT_TIMEOUT,
    bufferChunkSize: input.bufferChunkSize ?? BUFFER_CHUNK_SIZE,
  };

  // Validate before returning
  validateConfig(config);

  return config;
}
