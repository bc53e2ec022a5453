/**
 * Unit tests for output formatting
 */

import { describe, it, expect } from 'vitest';
import {
  formatSuccess,
  formatValue,
  formatKeys,
  formatInfo,
  formatBench,
  formatError,
  getExitCode,
} from '../../src/formatting.js';
import { ValidationError } from '../../src/errors.js';
import {
  ConnectError,
  ConnectionClosedError,
  ProtocolError,
  ServerError,
  TimeoutError,
  ValidationError as ClientValidationError,
  parseInfo,
} from '@respwire/client';

describe('Output Formatting', () => {
  it('should format success message as-is', () => {
    expect(formatSuccess('OK')).toBe('OK');
  });

  it('should format present and missing values', () => {
    expect(formatValue('mykey', 'myvalue')).toBe('mykey = myvalue');
    expect(formatValue('mykey', '')).toBe('mykey = ');
    expect(formatValue('nokey', null)).toBe('nokey = <none>');
  });

  it('should list keys one per line, or (empty)', () => {
    expect(formatKeys(['a', 'b'])).toEqual(['a', 'b']);
    expect(formatKeys([])).toEqual(['(empty)']);
  });

  it('should format INFO with a summary and every field', () => {
    const info = parseInfo('redis_version:1.3.0\r\nuptime_in_seconds:5\r\nrole:master\r\n');

    expect(formatInfo(info)).toEqual([
      'version: 1.3.0',
      'role: master',
      'uptime: 5s',
      '',
      'redis_version:1.3.0',
      'uptime_in_seconds:5',
      'role:master',
    ]);
  });

  it('should format a benchmark result', () => {
    expect(formatBench({ count: 1000, elapsedMs: 250, commandsPerSecond: 4000 })).toBe(
      '1000 SET commands in 250 ms (4000 commands/s)'
    );
  });
});

describe('Error Formatting', () => {
  it('should format validation error with actual/expected values', () => {
    const error = new ValidationError('key', 'Key exceeds maximum size', 1100, 1024);

    expect(formatError(error)).toBe('Error: Key exceeds maximum size (actual: 1100, expected: 1024)');
  });

  it('should format validation error without actual/expected', () => {
    expect(formatError(new ValidationError('key', 'Key cannot be empty'))).toBe('Error: Key cannot be empty');
  });

  it('should format a timeout with its budget', () => {
    expect(formatError(new TimeoutError('No data received within 2000ms', 2000))).toBe(
      'Error: Operation timed out after 2000ms'
    );
  });

  it('should format a server error with the server text', () => {
    expect(formatError(new ServerError('ERR no such key'))).toBe('Error: Server replied: ERR no such key');
  });

  it('should format other errors by message', () => {
    expect(formatError(new ProtocolError('Unknown reply tag'))).toBe('Error: Protocol error: Unknown reply tag');
    expect(formatError(new Error('Something went wrong'))).toBe('Error: Something went wrong');
  });

  it('should format non-Error values safely', () => {
    expect(formatError('string error')).toBe('Error: string error');
    expect(formatError(null)).toBe('Error: null');
    expect(formatError(undefined)).toBe('Error: undefined');
  });
});

describe('Exit Codes', () => {
  it('should return 1 for validation errors', () => {
    expect(getExitCode(new ValidationError('port', 'Invalid port'))).toBe(1);
    expect(getExitCode(new ClientValidationError('Argument cannot be empty'))).toBe(1);
  });

  it('should return 2 for network errors', () => {
    expect(getExitCode(new ConnectError('refused', '127.0.0.1:6379'))).toBe(2);
    expect(getExitCode(new TimeoutError('timed out', 10))).toBe(2);
    expect(getExitCode(new ConnectionClosedError())).toBe(2);
  });

  it('should return 3 for server, protocol and unexpected errors', () => {
    expect(getExitCode(new ServerError('ERR'))).toBe(3);
    expect(getExitCode(new ProtocolError('bad tag'))).toBe(3);
    expect(getExitCode(new Error('boom'))).toBe(3);
    expect(getExitCode('boom')).toBe(3);
  });
});
