/**
 * Shared command plumbing: connection options, client lifetime, error reporting
 */

import { Command } from 'commander';
import { RespClient } from '@respwire/client';
import { resolveConnection } from './validation.js';
import { formatError, getExitCode } from './formatting.js';
import { ConnectionOptions, Output } from './types.js';

/**
 * Output to the terminal: results on stdout, errors on stderr
 */
export const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Add the connection options every command takes
 */
export function addConnectionOptions(cmd: Command): Command {
  return cmd
    .option('-H, --host <host>', 'Server host (env RESPWIRE_HOST, default 127.0.0.1)')
    .option('-p, --port <port>', 'Server port (env RESPWIRE_PORT, default 6379)')
    .option('-t, --timeout <ms>', 'Per-call send/receive timeout in milliseconds (default 2000)');
}

/**
 * Connect, run `fn` with the client, and close the connection whatever
 * `fn` does
 */
export async function withClient<T>(options: ConnectionOptions, fn: (client: RespClient) => Promise<T>): Promise<T> {
  const client = await RespClient.connect(resolveConnection(options));

  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

/**
 * Run a command body and turn its outcome into an exit code.
 * Failures are reported on `io.err`.
 */
export async function runCommand(io: Output, body: () => Promise<void>): Promise<number> {
  try {
    await body();
    return 0;
  } catch (error) {
    io.err(formatError(error));
    return getExitCode(error);
  }
}
