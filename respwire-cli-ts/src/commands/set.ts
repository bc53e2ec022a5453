/**
 * Set command implementation
 */

import { Command } from 'commander';
import { validateKey, validateValue } from '../validation.js';
import { formatSuccess } from '../formatting.js';
import { addConnectionOptions, consoleOutput, runCommand, withClient } from '../session.js';
import { ConnectionOptions, Output } from '../types.js';

/**
 * Store `value` under `key` and print OK
 * @returns exit code
 */
export async function runSet(key: string, value: string, options: ConnectionOptions, io: Output): Promise<number> {
  return runCommand(io, async () => {
    // Validate inputs (fast-fail)
    validateKey(key);
    validateValue(value);

    await withClient(options, (client) => client.set(key, value));
    io.out(formatSuccess('OK'));
  });
}

/**
 * Create the set command
 */
export function createSetCommand(): Command {
  const cmd = new Command('set');

  addConnectionOptions(cmd)
    .description('Set a key-value pair')
    .argument('<key>', 'Key to set')
    .argument('<value>', 'Value to set')
    .action(async (key: string, value: string, options: ConnectionOptions) => {
      process.exit(await runSet(key, value, options, consoleOutput));
    });

  return cmd;
}
