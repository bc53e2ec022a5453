/**
 * Del command implementation
 */

import { Command } from 'commander';
import { validateKey } from '../validation.js';
import { formatSuccess } from '../formatting.js';
import { addConnectionOptions, consoleOutput, runCommand, withClient } from '../session.js';
import { ConnectionOptions, Output } from '../types.js';

/**
 * Delete `key`; prints 1 when it existed, 0 otherwise
 * @returns exit code
 */
export async function runDel(key: string, options: ConnectionOptions, io: Output): Promise<number> {
  return runCommand(io, async () => {
    validateKey(key);

    const removed = await withClient(options, (client) => client.del(key));
    io.out(formatSuccess(removed ? '1' : '0'));
  });
}

/**
 * Create the del command
 */
export function createDelCommand(): Command {
  const cmd = new Command('del');

  addConnectionOptions(cmd)
    .description('Delete a key')
    .argument('<key>', 'Key to delete')
    .action(async (key: string, options: ConnectionOptions) => {
      process.exit(await runDel(key, options, consoleOutput));
    });

  return cmd;
}
