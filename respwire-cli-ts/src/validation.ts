/**
 * Input validation functions
 */

import { DEFAULT_HOST, DEFAULT_PORT, DEFAULT_TIMEOUT } from '@respwire/client';
import { ValidationError } from './errors.js';
import { ConnectionOptions, ResolvedConnection } from './types.js';

const MAX_KEY_SIZE = 1024;
const MAX_VALUE_SIZE = 1024 * 1024; // 1MB
const MAX_BENCH_COUNT = 1_000_000;

/**
 * Validates a key: keys travel as inline tokens, so no whitespace
 * @throws ValidationError if key is invalid
 */
export function validateKey(key: string): void {
  if (key.length === 0) {
    throw new ValidationError('key', 'Key cannot be empty');
  }

  if (/\s/.test(key)) {
    throw new ValidationError('key', 'Key cannot contain whitespace');
  }

  const buffer = Buffer.from(key, 'utf8');

  if (buffer.length > MAX_KEY_SIZE) {
    throw new ValidationError('key', `Key exceeds maximum size`, buffer.length, MAX_KEY_SIZE);
  }

  // Verify valid UTF-8 round-trip
  if (buffer.toString('utf8') !== key) {
    throw new ValidationError('key', 'Key contains invalid UTF-8');
  }
}

/**
 * Validates a value. Values travel length-prefixed and may hold anything,
 * the empty string included.
 * @throws ValidationError if value is invalid
 */
export function validateValue(value: string): void {
  const buffer = Buffer.from(value, 'utf8');

  if (buffer.length > MAX_VALUE_SIZE) {
    throw new ValidationError('value', `Value exceeds maximum size`, buffer.length, MAX_VALUE_SIZE);
  }

  // Verify valid UTF-8 round-trip
  if (buffer.toString('utf8') !== value) {
    throw new ValidationError('value', 'Value contains invalid UTF-8');
  }
}

/**
 * @throws ValidationError unless `input` is a port number in 1-65535
 */
export function parsePort(input: string): number {
  const port = /^\d+$/.test(input) ? parseInt(input, 10) : NaN;

  if (!(port >= 1 && port <= 65535)) {
    throw new ValidationError('port', `Invalid port: ${input}. Must be 1-65535`);
  }

  return port;
}

/**
 * @throws ValidationError unless `input` is a positive number of milliseconds
 */
export function parseTimeout(input: string): number {
  const timeout = /^\d+$/.test(input) ? parseInt(input, 10) : NaN;

  if (!(timeout > 0)) {
    throw new ValidationError('timeout', `Invalid timeout: ${input}. Must be a positive number of milliseconds`);
  }

  return timeout;
}

/**
 * @throws ValidationError unless `input` is a whole number, sign allowed
 */
export function parseIncrement(input: string): number {
  const increment = /^[+-]?\d+$/.test(input) ? parseInt(input, 10) : NaN;

  if (!Number.isSafeInteger(increment)) {
    throw new ValidationError('increment', `Invalid increment: ${input}. Must be an integer`);
  }

  return increment;
}

/**
 * @throws ValidationError unless `input` is a request count the benchmark accepts
 */
export function parseCount(input: string): number {
  const count = /^\d+$/.test(input) ? parseInt(input, 10) : NaN;

  if (!(count >= 1 && count <= MAX_BENCH_COUNT)) {
    throw new ValidationError('count', `Invalid count: ${input}. Must be 1-${MAX_BENCH_COUNT}`, input, MAX_BENCH_COUNT);
  }

  return count;
}

/**
 * Resolve connection settings: command-line options first, then the
 * RESPWIRE_HOST and RESPWIRE_PORT environment variables, then defaults
 * @throws ValidationError if any setting is invalid
 */
export function resolveConnection(
  options: ConnectionOptions,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConnection {
  const host = (options.host ?? env['RESPWIRE_HOST'] ?? DEFAULT_HOST).trim();

  if (host.length === 0) {
    throw new ValidationError('host', 'Host cannot be empty');
  }

  return {
    host,
    port: parsePort(options.port ?? env['RESPWIRE_PORT'] ?? String(DEFAULT_PORT)),
    timeout: parseTimeout(options.timeout ?? String(DEFAULT_TIMEOUT)),
  };
}
