/**
 * Ping command implementation
 */

import { Command } from 'commander';
import { addConnectionOptions, consoleOutput, runCommand, withClient } from '../session.js';
import { ConnectionOptions, Output } from '../types.js';

/**
 * Check the server answers; prints its status reply
 * @returns exit code
 */
export async function runPing(options: ConnectionOptions, io: Output): Promise<number> {
  return runCommand(io, async () => {
    const reply = await withClient(options, (client) => client.ping());
    io.out(reply);
  });
}

/**
 * Create the ping command
 */
export function createPingCommand(): Command {
  const cmd = new Command('ping');

  addConnectionOptions(cmd)
    .description('Check that the server answers')
    .action(async (options: ConnectionOptions) => {
      process.exit(await runPing(options, consoleOutput));
    });

  return cmd;
}
