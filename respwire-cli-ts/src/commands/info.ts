/**
 * Info command implementation
 */

import { Command } from 'commander';
import { formatInfo } from '../formatting.js';
import { addConnectionOptions, consoleOutput, runCommand, withClient } from '../session.js';
import { ConnectionOptions, Output } from '../types.js';

/**
 * Print server statistics
 * @returns exit code
 */
export async function runInfo(options: ConnectionOptions, io: Output): Promise<number> {
  return runCommand(io, async () => {
    const info = await withClient(options, (client) => client.info());
    for (const line of formatInfo(info)) {
      io.out(line);
    }
  });
}

/**
 * Create the info command
 */
export function createInfoCommand(): Command {
  const cmd = new Command('info');

  addConnectionOptions(cmd)
    .description('Show server statistics')
    .action(async (options: ConnectionOptions) => {
      process.exit(await runInfo(options, consoleOutput));
    });

  return cmd;
}
