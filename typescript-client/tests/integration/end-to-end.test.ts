// End-to-end tests: RespClient and Connection over TCP against FakeServer

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RespClient } from '../../src/client';
import { Connection } from '../../src/connection';
import { FakeServer } from '../../src/testing/FakeServer';
import { ConnectError, ConnectionClosedError, ServerError, TimeoutError } from '../../src/errors';

describe('End to end', () => {
  let server: FakeServer;
  let client: RespClient;

  beforeEach(async () => {
    server = await FakeServer.start();
    client = await RespClient.connect({ host: '127.0.0.1', port: server.port, timeout: 1000 });
  });

  afterEach(async () => {
    await client.close();
    await server.stop();
  });

  it('should set, get, miss and list keys', async () => {
    await client.set('k1', 'hello');

    expect(await client.get('k1')).toBe('hello');
    expect(await client.get('k2')).toBeNull();
    expect(await client.keys('k*')).toEqual(['k1']);
    expect(server.requests).toEqual(['SET k1 5', 'GET k1', 'GET k2', 'KEYS k*']);
  });

  it('should keep an empty value apart from a missing one', async () => {
    await client.set('empty', '');

    expect(await client.get('empty')).toBe('');
    expect(await client.exists('empty')).toBe(true);
  });

  it('should carry values holding CRLF and multi-byte text', async () => {
    const value = 'line one\r\nline two ünïcode';
    await client.set('text', value);

    expect(await client.get('text')).toBe(value);
  });

  it('should round-trip a value larger than the buffer chunk', async () => {
    const value = 'abcdefgh'.repeat(16 * 1024);
    await client.set('big', value);

    expect(await client.get('big')).toBe(value);
    expect(client.connection.bufferCapacity).toBeGreaterThan(value.length);
  });

  it('should fetch many keys in one multi-bulk reply', async () => {
    const keys = Array.from({ length: 100 }, (_, i) => `key${i}`);
    for (const key of keys.slice(0, 50)) {
      await client.set(key, key.toUpperCase());
    }

    const values = await client.mget(keys);

    expect(values).toHaveLength(100);
    expect(values[0]).toBe('KEY0');
    expect(values[49]).toBe('KEY49');
    expect(values[50]).toBeNull();
  });

  it('should record value lengths on the request line', async () => {
    await client.rpush('l', 'abc');
    await client.getset('k', 'hello world');

    expect(server.requests).toEqual(['RPUSH l 3', 'GETSET k 11']);
  });

  it('should count, push and range', async () => {
    expect(await client.incr('n')).toBe(1);
    expect(await client.incrby('n', 41)).toBe(42);
    expect(await client.rpush('l', 'a')).toBe(1);
    expect(await client.rpush('l', 'b')).toBe(2);
    expect(await client.lrange('l', 0, -1)).toEqual(['a', 'b']);
    expect(await client.type('l')).toBe('list');
    expect(await client.dbsize()).toBe(2);
  });

  it('should surface a server error and stay usable', async () => {
    await client.set('s', 'text');

    await expect(client.incr('s')).rejects.toThrow('Server error: ERR value is not an integer');
    expect(client.connection.lastError).toBe('SERVER_ERROR');
    expect(await client.ping()).toBe('PONG');
    expect(client.connection.lastError).toBeNull();
  });

  it('should authenticate', async () => {
    await client.auth('test-secret');
    await expect(client.auth('wrong-secret')).rejects.toThrow(ServerError);
  });

  it('should parse INFO', async () => {
    const info = await client.info();

    expect(info.version).toBe('1.3.0');
    expect(info.connectedClients).toBe(1);
  });

  it('should serialize concurrent calls on one connection', async () => {
    await client.set('a', '1');
    await client.set('b', '2');

    const values = await Promise.all([client.get('a'), client.get('b'), client.incr('c')]);

    expect(values).toEqual(['1', '2', 1]);
  });

  it('should send QUIT and close', async () => {
    await client.quit();

    expect(client.connection.isClosed).toBe(true);
    await expect(client.ping()).rejects.toThrow(ConnectionClosedError);
  });
});

describe('Connection failures', () => {
  let server: FakeServer;

  beforeEach(async () => {
    server = await FakeServer.start();
  });

  afterEach(async () => {
    await server.stop();
  });

  it('should time out when the server never answers', async () => {
    server.mode = 'silent';
    const conn = await Connection.connect({ port: server.port, timeout: 100 });

    await expect(conn.sendAndReceive('status', 'PING\r\n')).rejects.toThrow(TimeoutError);
    expect(conn.lastError).toBe('TIMED_OUT');
    await conn.close();
  });

  it('should report a hang-up as closed, not as a timeout', async () => {
    server.mode = 'hangup';
    const conn = await Connection.connect({ port: server.port, timeout: 1000 });

    await expect(conn.sendAndReceive('status', 'PING\r\n')).rejects.toThrow(ConnectionClosedError);
    expect(conn.lastError).toBe('CONNECTION_CLOSED');
    await conn.close();
  });
});

describe('Connect failures', () => {
  it('should fail with ConnectError once the server is gone', async () => {
    const server = await FakeServer.start();
    const port = server.port;
    await server.stop();

    await expect(Connection.connect({ port, timeout: 1000 })).rejects.toThrow(ConnectError);
  });
});
