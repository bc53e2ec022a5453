#!/usr/bin/env -S node --import tsx

/**
 * respwire CLI - Main entry point
 */

import { Command } from 'commander';
import { setDebugEnabled } from '@respwire/client';
import { createPingCommand } from './commands/ping.js';
import { createSetCommand } from './commands/set.js';
import { createGetCommand } from './commands/get.js';
import { createDelCommand } from './commands/del.js';
import { createIncrCommand } from './commands/incr.js';
import { createKeysCommand } from './commands/keys.js';
import { createInfoCommand } from './commands/info.js';
import { createBenchCommand } from './commands/bench.js';

/**
 * Main CLI program
 */
async function main(): Promise<void> {
  const program = new Command();

  program
    .name('respwire')
    .version('0.1.0')
    .description('respwire CLI - talk to a Redis-style line protocol server')
    .option('-d, --debug', 'Log protocol activity to stdout')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ debug?: boolean }>().debug === true) {
        setDebugEnabled(true);
      }
    });

  // Register commands
  program.addCommand(createPingCommand());
  program.addCommand(createSetCommand());
  program.addCommand(createGetCommand());
  program.addCommand(createDelCommand());
  program.addCommand(createIncrCommand());
  program.addCommand(createKeysCommand());
  program.addCommand(createInfoCommand());
  program.addCommand(createBenchCommand());

  // Show help if no command provided
  if (process.argv.slice(2).length === 0) {
    program.outputHelp();
    return;
  }

  // Parse arguments; command actions are async
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(3);
});
