/**
 * Keys command implementation
 */

import { Command } from 'commander';
import { validateKey } from '../validation.js';
import { formatKeys } from '../formatting.js';
import { addConnectionOptions, consoleOutput, runCommand, withClient } from '../session.js';
import { ConnectionOptions, Output } from '../types.js';

/**
 * List keys matching a glob `pattern`, one per line
 * @returns exit code
 */
export async function runKeys(pattern: string, options: ConnectionOptions, io: Output): Promise<number> {
  return runCommand(io, async () => {
    // A pattern travels like a key
    validateKey(pattern);

    const keys = await withClient(options, (client) => client.keys(pattern));
    for (const line of formatKeys(keys)) {
      io.out(line);
    }
  });
}

/**
 * Create the keys command
 */
export function createKeysCommand(): Command {
  const cmd = new Command('keys');

  addConnectionOptions(cmd)
    .description('List keys matching a pattern')
    .argument('[pattern]', 'Glob pattern', '*')
    .action(async (pattern: string, options: ConnectionOptions) => {
      process.exit(await runKeys(pattern, options, consoleOutput));
    });

  return cmd;
}
