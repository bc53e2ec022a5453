// Configuration validation unit tests
// Tests ConnectionConfig validation and defaults

import { describe, it, expect } from 'vitest';
import { createConfig, validateConfig, ConnectionConfig } from '../../../src/config';
import { ValidationError } from '../../../src/errors';

describe('Configuration', () => {
  describe('defaults', () => {
    it('should fill every missing field', () => {
      const config = createConfig();

      expect(config.host).toBe('127.0.0.1');
      expect(config.port).toBe(6379);
      expect(config.timeout).toBe(2000);
      expect(config.bufferChunkSize).toBe(4096);
    });

    it('should treat an empty host and port 0 as unset', () => {
      const config = createConfig({ host: '', port: 0 });

      expect(config.host).toBe('127.0.0.1');
      expect(config.port).toBe(6379);
    });

    it('should accept custom values', () => {
      const config = createConfig({ host: 'cache.local', port: 7000, timeout: 150, bufferChunkSize: 16 });

      expect(config).toEqual({ host: 'cache.local', port: 7000, timeout: 150, bufferChunkSize: 16 });
    });
  });

  describe('validation', () => {
    it('should reject an out-of-range port', () => {
      expect(() => createConfig({ port: 70000 })).toThrow('port must be an integer in 1-65535, got 70000');
    });

    it('should reject a non-positive timeout', () => {
      expect(() => createConfig({ timeout: 0 })).toThrow('timeout must be positive');
      expect(() => createConfig({ timeout: -5 })).toThrow(ValidationError);
    });

    it('should reject a fractional chunk size', () => {
      expect(() => createConfig({ bufferChunkSize: 1.5 })).toThrow('bufferChunkSize must be a positive integer');
    });

    it('should reject an empty host in a complete config', () => {
      const config: ConnectionConfig = { host: '', port: 6379, timeout: 10, bufferChunkSize: 64 };

      expect(() => validateConfig(config)).toThrow('host cannot be empty');
    });
  });
});
