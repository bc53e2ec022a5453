/**
 * Incr command implementation
 */

import { Command } from 'commander';
import { parseIncrement, validateKey } from '../validation.js';
import { addConnectionOptions, consoleOutput, runCommand, withClient } from '../session.js';
import { ConnectionOptions, Output } from '../types.js';

export interface IncrOptions extends ConnectionOptions {
  readonly by?: string;
}

/**
 * Increment the counter at `key` (by one, or by `--by`) and print the new value
 * @returns exit code
 */
export async function runIncr(key: string, options: IncrOptions, io: Output): Promise<number> {
  return runCommand(io, async () => {
    validateKey(key);
    const by = options.by === undefined ? 1 : parseIncrement(options.by);

    const value = await withClient(options, (client) => (by === 1 ? client.incr(key) : client.incrby(key, by)));
    io.out(String(value));
  });
}

/**
 * Create the incr command
 */
export function createIncrCommand(): Command {
  const cmd = new Command('incr');

  addConnectionOptions(cmd)
    .description('Increment an integer value')
    .argument('<key>', 'Counter key')
    .option('-b, --by <n>', 'Amount to add, may be negative')
    .action(async (key: string, options: IncrOptions) => {
      process.exit(await runIncr(key, options, consoleOutput));
    });

  return cmd;
}
