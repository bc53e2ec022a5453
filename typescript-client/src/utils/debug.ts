/**
 * Debug logging utility
 *
 * Centralized debug logging that can be easily enabled/disabled.
 * Off by default; set RESPWIRE_DEBUG=1 in the environment or call
 * setDebugEnabled(true) to trace buffer growth, socket I/O and decoding.
 */

let debugEnabled = process.env['RESPWIRE_DEBUG'] === '1';

/**
 * Turn debug output on or off at runtime
 */
export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Log a debug message if debug mode is enabled
 */
export function debugLog(message: string, ...args: unknown[]): void {
  if (debugEnabled) {
    console.log(`[DEBUG] ${message}`, ...args);
  }
}
