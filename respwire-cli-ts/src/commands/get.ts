/**
 * Get command implementation
 */

import { Command } from 'commander';
import { validateKey } from '../validation.js';
import { formatValue } from '../formatting.js';
import { addConnectionOptions, consoleOutput, runCommand, withClient } from '../session.js';
import { ConnectionOptions, Output } from '../types.js';

/**
 * Fetch `key` and print `key = value`, or `key = <none>` when it is missing
 * @returns exit code
 */
export async function runGet(key: string, options: ConnectionOptions, io: Output): Promise<number> {
  return runCommand(io, async () => {
    // Validate before connecting (fast-fail)
    validateKey(key);

    const value = await withClient(options, (client) => client.get(key));
    io.out(formatValue(key, value));
  });
}

/**
 * Create the get command
 */
export function createGetCommand(): Command {
  const cmd = new Command('get');

  addConnectionOptions(cmd)
    .description('Get a value by key')
    .argument('<key>', 'Key to get')
    .action(async (key: string, options: ConnectionOptions) => {
      process.exit(await runGet(key, options, consoleOutput));
    });

  return cmd;
}
