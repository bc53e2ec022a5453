/**
 * Output formatting utilities
 */

import {
  ConnectError,
  ConnectionClosedError,
  ReceiveError,
  SendError,
  ServerError,
  TimeoutError,
  ValidationError as ClientValidationError,
} from '@respwire/client';
import type { ServerInfo } from '@respwire/client';
import { ValidationError } from './errors.js';
import { BenchResult } from './types.js';

/**
 * Format a success message
 */
export function formatSuccess(message: string): string {
  return message;
}

/**
 * Format a fetched value: `key = value`, or `key = <none>` when absent
 */
export function formatValue(key: string, value: string | null): string {
  return `${key} = ${value ?? '<none>'}`;
}

/**
 * Format a key listing, one key per line
 */
export function formatKeys(keys: readonly string[]): string[] {
  return keys.length === 0 ? ['(empty)'] : [...keys];
}

/**
 * Format INFO output: the typed summary first, then every field verbatim
 */
export function formatInfo(info: ServerInfo): string[] {
  const lines = [`version: ${info.version}`, `role: ${info.role}`];

  if (info.uptimeInSeconds !== undefined) {
    lines.push(`uptime: ${info.uptimeInSeconds}s`);
  }
  if (info.connectedClients !== undefined) {
    lines.push(`clients: ${info.connectedClients}`);
  }

  lines.push('');
  for (const [name, value] of info.fields) {
    lines.push(`${name}:${value}`);
  }
  return lines;
}

/**
 * Format a benchmark outcome
 */
export function formatBench(result: BenchResult): string {
  return `${result.count} SET commands in ${result.elapsedMs} ms (${result.commandsPerSecond} commands/s)`;
}

/**
 * Format an error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    if (error.actual !== undefined && error.expected !== undefined) {
      return `Error: ${error.message} (actual: ${error.actual}, expected: ${error.expected})`;
    }
    return `Error: ${error.message}`;
  }

  if (error instanceof TimeoutError) {
    return `Error: Operation timed out after ${error.timeoutMs}ms`;
  }

  if (error instanceof ServerError) {
    return `Error: Server replied: ${error.serverMessage}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}

/**
 * Get appropriate exit code for error
 *
 * Exit codes follow Unix conventions:
 * - 0: Success (not handled here)
 * - 1: Validation error (bad user input)
 * - 2: Connection/timeout error (network issues)
 * - 3: Operational error (server errors, protocol errors, unexpected failures)
 */
export function getExitCode(error: unknown): number {
  // Exit 1: User validation errors only (bad input)
  if (error instanceof ValidationError || error instanceof ClientValidationError) {
    return 1;
  }

  // Exit 2: Network-related errors
  if (
    error instanceof ConnectError ||
    error instanceof TimeoutError ||
    error instanceof ConnectionClosedError ||
    error instanceof SendError ||
    error instanceof ReceiveError
  ) {
    return 2;
  }

  // Exit 3: Server and protocol errors, and anything unexpected
  return 3;
}
