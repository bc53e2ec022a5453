/**
 * Bench command implementation
 */

import { Command } from 'commander';
import type { RespClient } from '@respwire/client';
import { parseCount } from '../validation.js';
import { formatBench } from '../formatting.js';
import { addConnectionOptions, consoleOutput, runCommand, withClient } from '../session.js';
import { BenchResult, ConnectionOptions, Output } from '../types.js';

export interface BenchOptions extends ConnectionOptions {
  readonly count?: string;
}

const DEFAULT_COUNT = 1000;
const KEY_PREFIX = 'respwire:bench:';

/**
 * Issue `count` SETs one after another, then delete the keys again
 */
export async function benchmarkSet(client: RespClient, count: number): Promise<BenchResult> {
  const started = performance.now();

  for (let i = 0; i < count; i++) {
    await client.set(`${KEY_PREFIX}${i}`, `value-${i}`);
  }

  const elapsedMs = Math.max(1, Math.round(performance.now() - started));

  for (let i = 0; i < count; i++) {
    await client.del(`${KEY_PREFIX}${i}`);
  }

  return {
    count,
    elapsedMs,
    commandsPerSecond: Math.round((count * 1000) / elapsedMs),
  };
}

/**
 * Time a run of SET commands and print the rate
 * @returns exit code
 */
export async function runBench(options: BenchOptions, io: Output): Promise<number> {
  return runCommand(io, async () => {
    const count = options.count === undefined ? DEFAULT_COUNT : parseCount(options.count);

    const result = await withClient(options, (client) => benchmarkSet(client, count));
    io.out(formatBench(result));
  });
}

/**
 * Create the bench command
 */
export function createBenchCommand(): Command {
  const cmd = new Command('bench');

  addConnectionOptions(cmd)
    .description('Measure SET throughput on one connection')
    .option('-n, --count <n>', `Number of SET commands (default ${DEFAULT_COUNT})`)
    .action(async (options: BenchOptions) => {
      process.exit(await runBench(options, consoleOutput));
    });

  return cmd;
}
