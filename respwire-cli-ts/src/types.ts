/**
 * Core type definitions for the respwire CLI
 */

/**
 * Connection options as given on the command line (raw strings)
 */
export interface ConnectionOptions {
  readonly host?: string;
  readonly port?: string;
  readonly timeout?: string;
}

/**
 * Validated connection settings
 */
export interface ResolvedConnection {
  readonly host: string;
  readonly port: number;
  readonly timeout: number;
}

/**
 * Where commands write their results and errors
 */
export interface Output {
  out(line: string): void;
  err(line: string): void;
}

/**
 * Benchmark outcome
 */
export interface BenchResult {
  readonly count: number;
  readonly elapsedMs: number;
  readonly commandsPerSecond: number;
}
