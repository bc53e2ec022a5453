/**
 * Integration tests for error reporting and exit codes
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FakeServer } from '@respwire/client/testing';
import { runGet } from '../../src/commands/get.js';
import { runSet } from '../../src/commands/set.js';
import { runIncr } from '../../src/commands/incr.js';
import { runPing } from '../../src/commands/ping.js';
import { runBench } from '../../src/commands/bench.js';
import { CapturedOutput } from '../helpers/mocks.js';
import { ConnectionOptions } from '../../src/types.js';

describe('Error Handling', () => {
  let server: FakeServer;
  let options: ConnectionOptions;
  let io: CapturedOutput;

  beforeEach(async () => {
    server = await FakeServer.start();
    options = { host: '127.0.0.1', port: String(server.port), timeout: '1000' };
    io = new CapturedOutput();
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('Validation errors (exit 1)', () => {
    it('should reject an empty key before connecting', async () => {
      const code = await runGet('', options, io);

      expect(code).toBe(1);
      expect(io.stderr).toEqual(['Error: Key cannot be empty']);
      expect(server.requests).toEqual([]);
    });

    it('should report an oversized key with its size', async () => {
      const code = await runSet('k'.repeat(2000), 'v', options, io);

      expect(code).toBe(1);
      expect(io.stderr).toEqual(['Error: Key exceeds maximum size (actual: 2000, expected: 1024)']);
    });

    it('should reject a malformed port', async () => {
      const code = await runPing({ ...options, port: 'abc' }, io);

      expect(code).toBe(1);
      expect(io.stderr).toEqual(['Error: Invalid port: abc. Must be 1-65535']);
    });

    it('should reject a malformed increment', async () => {
      const code = await runIncr('counter', { ...options, by: 'ten' }, io);

      expect(code).toBe(1);
      expect(io.stderr).toEqual(['Error: Invalid increment: ten. Must be an integer']);
    });

    it('should reject an out-of-range bench count', async () => {
      const code = await runBench({ ...options, count: '0' }, io);

      expect(code).toBe(1);
      expect(io.stderr).toEqual(['Error: Invalid count: 0. Must be 1-1000000 (actual: 0, expected: 1000000)']);
    });
  });

  describe('Network errors (exit 2)', () => {
    it('should fail when nothing listens on the port', async () => {
      const closed = await FakeServer.start();
      const port = closed.port;
      await closed.stop();

      const code = await runPing({ ...options, port: String(port) }, io);

      expect(code).toBe(2);
      expect(io.stderr).toHaveLength(1);
      expect(io.stderr[0]).toMatch(new RegExp(`^Error: Could not connect to 127\\.0\\.0\\.1:${port}: `));
    });

    it('should time out when the server never answers', async () => {
      server.mode = 'silent';

      const code = await runGet('mykey', { ...options, timeout: '100' }, io);

      expect(code).toBe(2);
      expect(io.stderr).toEqual(['Error: Operation timed out after 100ms']);
    });

    it('should fail when the server hangs up mid-exchange', async () => {
      server.mode = 'hangup';

      const code = await runGet('mykey', options, io);

      expect(code).toBe(2);
      expect(io.stderr).toHaveLength(1);
    });
  });

  describe('Server errors (exit 3)', () => {
    it('should print the server message', async () => {
      server.store.set('word', 'text');

      const code = await runIncr('word', options, io);

      expect(code).toBe(3);
      expect(io.stdout).toEqual([]);
      expect(io.stderr).toEqual(['Error: Server replied: ERR value is not an integer']);
    });
  });
});
