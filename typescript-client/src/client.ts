// RespClient - one method per protocol verb
// Thin formatting layer over Connection: build the request, name the reply shape, map the result

import { Connection } from './connection';
import type { ConnectionConfigInput } from './config';
import { bulkRequest, inlineRequest } from './protocol/requests';
import { parseInfo } from './protocol/info';
import type { ServerInfo } from './protocol/info';
import type { KeyType } from './types';
import { ValidationError } from './errors';

/**
 * Client for a Redis-style text protocol server
 *
 * Calls are serialized: concurrent callers of one client queue up behind
 * each other instead of failing with ConnectionBusyError.
 *
 * Usage:
 * ```typescript
 * const client = await RespClient.connect({ host: '127.0.0.1', port: 6379 });
 *
 * await client.set('greeting', 'hello');
 * const value = await client.get('greeting'); // 'hello'
 * await client.close();
 * ```
 */
export class RespClient {
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly connection: Connection) {}

  static async connect(config: ConnectionConfigInput = {}): Promise<RespClient> {
    return new RespClient(await Connection.connect(config));
  }

  // ==========================================================================
  // Connection handling
  // ==========================================================================

  async close(): Promise<void> {
    return this.serialize(() => this.connection.close());
  }

  async quit(): Promise<void> {
    return this.serialize(() => this.connection.quit());
  }

  async auth(password: string): Promise<void> {
    await this.status(inlineRequest('AUTH', password));
  }

  /**
   * @returns the status text, `PONG` from a healthy server
   */
  async ping(): Promise<string> {
    return this.status(inlineRequest('PING'));
  }

  // ==========================================================================
  // String values
  // ==========================================================================

  async set(key: string, value: string): Promise<void> {
    await this.status(bulkRequest('SET', [key], value));
  }

  async get(key: string): Promise<string | null> {
    return this.bulk(inlineRequest('GET', key));
  }

  /**
   * Set a new value and return the old one
   */
  async getset(key: string, value: string): Promise<string | null> {
    return this.bulk(bulkRequest('GETSET', [key], value));
  }

  /**
   * Fetch several keys at once; missing keys come back as null
   */
  async mget(keys: readonly string[]): Promise<Array<string | null>> {
    if (keys.length === 0) {
      throw new ValidationError('MGET needs at least one key');
    }

    const reply = await this.serialize(() => this.connection.sendCommandAndReceive('multiBulk', 'MGET', keys));
    return reply.values === null ? [] : [...reply.values];
  }

  /**
   * @returns false when the key already exists
   */
  async setnx(key: string, value: string): Promise<boolean> {
    return (await this.integer(bulkRequest('SETNX', [key], value))) !== 0;
  }

  async incr(key: string): Promise<number> {
    return this.integer(inlineRequest('INCR', key));
  }

  async incrby(key: string, increment: number): Promise<number> {
    return this.integer(inlineRequest('INCRBY', key, increment));
  }

  async decr(key: string): Promise<number> {
    return this.integer(inlineRequest('DECR', key));
  }

  async decrby(key: string, decrement: number): Promise<number> {
    return this.integer(inlineRequest('DECRBY', key, decrement));
  }

  async exists(key: string): Promise<boolean> {
    return (await this.integer(inlineRequest('EXISTS', key))) !== 0;
  }

  /**
   * @returns false when the key did not exist
   */
  async del(key: string): Promise<boolean> {
    return (await this.integer(inlineRequest('DEL', key))) !== 0;
  }

  async type(key: string): Promise<KeyType> {
    const type = await this.status(inlineRequest('TYPE', key));
    switch (type) {
      case 'string':
      case 'list':
      case 'set':
        return type;
      default:
        return 'none';
    }
  }

  // ==========================================================================
  // Key space
  // ==========================================================================

  async keys(pattern: string): Promise<string[]> {
    const values = await this.multiBulk(inlineRequest('KEYS', pattern));
    return values.filter((value): value is string => value !== null);
  }

  async randomkey(): Promise<string> {
    return this.status(inlineRequest('RANDOMKEY'));
  }

  async rename(key: string, newKey: string): Promise<void> {
    await this.status(inlineRequest('RENAME', key, newKey));
  }

  /**
   * @returns false when `newKey` already exists
   */
  async renamenx(key: string, newKey: string): Promise<boolean> {
    return (await this.integer(inlineRequest('RENAMENX', key, newKey))) !== 0;
  }

  async dbsize(): Promise<number> {
    return this.integer(inlineRequest('DBSIZE'));
  }

  /**
   * @returns false when the timeout was not set: the key is missing or
   * already has one
   */
  async expire(key: string, seconds: number): Promise<boolean> {
    return (await this.integer(inlineRequest('EXPIRE', key, seconds))) !== 0;
  }

  /**
   * @returns seconds to live, or -1 when the key has no expiry
   */
  async ttl(key: string): Promise<number> {
    return this.integer(inlineRequest('TTL', key));
  }

  // ==========================================================================
  // Lists
  // ==========================================================================

  /**
   * @returns length of the list after the push
   */
  async rpush(key: string, element: string): Promise<number> {
    return this.integer(bulkRequest('RPUSH', [key], element));
  }

  async lpush(key: string, element: string): Promise<number> {
    return this.integer(bulkRequest('LPUSH', [key], element));
  }

  async llen(key: string): Promise<number> {
    return this.integer(inlineRequest('LLEN', key));
  }

  async lrange(key: string, start: number, end: number): Promise<Array<string | null>> {
    return this.multiBulk(inlineRequest('LRANGE', key, start, end));
  }

  async lindex(key: string, index: number): Promise<string | null> {
    return this.bulk(inlineRequest('LINDEX', key, index));
  }

  async lset(key: string, index: number, element: string): Promise<void> {
    await this.status(bulkRequest('LSET', [key, index], element));
  }

  /**
   * @returns number of elements removed
   */
  async lrem(key: string, count: number, element: string): Promise<number> {
    return this.integer(bulkRequest('LREM', [key, count], element));
  }

  async lpop(key: string): Promise<string | null> {
    return this.bulk(inlineRequest('LPOP', key));
  }

  async rpop(key: string): Promise<string | null> {
    return this.bulk(inlineRequest('RPOP', key));
  }

  // ==========================================================================
  // Sets
  // ==========================================================================

  /**
   * @returns false when `member` was already in the set
   */
  async sadd(key: string, member: string): Promise<boolean> {
    return (await this.integer(bulkRequest('SADD', [key], member))) !== 0;
  }

  /**
   * @returns false when `member` was not in the set
   */
  async srem(key: string, member: string): Promise<boolean> {
    return (await this.integer(bulkRequest('SREM', [key], member))) !== 0;
  }

  async sismember(key: string, member: string): Promise<boolean> {
    return (await this.integer(bulkRequest('SISMEMBER', [key], member))) !== 0;
  }

  // ==========================================================================
  // Databases
  // ==========================================================================

  async select(index: number): Promise<void> {
    await this.status(inlineRequest('SELECT', index));
  }

  /**
   * @returns false when the key was not moved: present at the target or
   * missing here
   */
  async move(key: string, index: number): Promise<boolean> {
    return (await this.integer(inlineRequest('MOVE', key, index))) !== 0;
  }

  async flushdb(): Promise<void> {
    await this.status(inlineRequest('FLUSHDB'));
  }

  async flushall(): Promise<void> {
    await this.status(inlineRequest('FLUSHALL'));
  }

  // ==========================================================================
  // Sorting
  // ==========================================================================

  /**
   * @param query - key followed by SORT options, e.g. `mylist DESC LIMIT 0 10`
   */
  async sort(query: string): Promise<Array<string | null>> {
    const [key, ...options] = query.trim().split(/\s+/);
    if (key === undefined || key.length === 0) {
      throw new ValidationError('SORT needs a key');
    }
    return this.multiBulk(inlineRequest('SORT', key, ...options));
  }

  // ==========================================================================
  // Persistence and server control
  // ==========================================================================

  async save(): Promise<void> {
    await this.status(inlineRequest('SAVE'));
  }

  async bgsave(): Promise<void> {
    await this.status(inlineRequest('BGSAVE'));
  }

  /**
   * @returns UNIX time of the last successful save
   */
  async lastsave(): Promise<number> {
    return this.integer(inlineRequest('LASTSAVE'));
  }

  async shutdown(): Promise<void> {
    await this.status(inlineRequest('SHUTDOWN'));
  }

  async info(): Promise<ServerInfo> {
    const text = await this.bulk(inlineRequest('INFO'));
    return parseInfo(text ?? '');
  }

  /**
   * Replicate from `host:port`; without arguments, stop replicating
   */
  async slaveof(host?: string, port?: number): Promise<void> {
    if (host === undefined || host.length === 0 || port === undefined || port === 0) {
      await this.status(inlineRequest('SLAVEOF', 'no', 'one'));
      return;
    }
    await this.status(inlineRequest('SLAVEOF', host, port));
  }

  // ==========================================================================
  // Request helpers (Private)
  // ==========================================================================

  private async status(request: string): Promise<string> {
    const reply = await this.serialize(() => this.connection.sendAndReceive('status', request));
    return reply.text;
  }

  private async integer(request: string): Promise<number> {
    const reply = await this.serialize(() => this.connection.sendAndReceive('integer', request));
    return reply.value;
  }

  private async bulk(request: string): Promise<string | null> {
    const reply = await this.serialize(() => this.connection.sendAndReceive('bulk', request));
    return reply.value;
  }

  private async multiBulk(request: string): Promise<Array<string | null>> {
    const reply = await this.serialize(() => this.connection.sendAndReceive('multiBulk', request));
    return reply.values === null ? [] : [...reply.values];
  }

  /**
   * Run `task` after every previously queued task settled
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The chain only orders tasks; each rejection reaches its own caller through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
