/**
 * Error classes for the respwire CLI
 */

/**
 * Validation error - for command-line input rejected before connecting
 */
export class ValidationError extends Error {
  public readonly name = 'ValidationError';

  constructor(
    public readonly field: 'key' | 'value' | 'host' | 'port' | 'timeout' | 'count' | 'increment',
    message: string,
    public readonly actual?: string | number,
    public readonly expected?: string | number
  ) {
    super(message);
  }
}
