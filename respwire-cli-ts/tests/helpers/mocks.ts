/**
 * Test doubles for the CLI
 */

import { Output } from '../../src/types.js';

/**
 * Output that records lines instead of printing them
 */
export class CapturedOutput implements Output {
  public readonly stdout: string[] = [];
  public readonly stderr: string[] = [];

  out(line: string): void {
    this.stdout.push(line);
  }

  err(line: string): void {
    this.stderr.push(line);
  }
}
