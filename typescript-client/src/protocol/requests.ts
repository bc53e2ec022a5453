// Request formatting
// Inline form:      VERB arg1 arg2 ... argN\r\n
// Value-bearing:    VERB arg1 ... argN len\r\nVALUE\r\n

import { ValidationError } from '../errors';
import { CRLF } from './constants';

/**
 * An inline argument: a token without whitespace, or an integer
 */
export type Argument = string | number;

/**
 * Validate one inline argument and render it
 * @throws ValidationError for empty tokens, whitespace or non-integer numbers
 */
export function formatArgument(arg: Argument): string {
  if (typeof arg === 'number') {
    if (!Number.isSafeInteger(arg)) {
      throw new ValidationError(`Numeric argument must be an integer, got ${arg}`);
    }
    return String(arg);
  }

  if (arg.length === 0) {
    throw new ValidationError('Argument cannot be empty');
  }

  if (/\s/.test(arg)) {
    throw new ValidationError(`Argument cannot contain whitespace: ${JSON.stringify(arg)}`);
  }

  return arg;
}

/**
 * Format an inline request: `VERB a b\r\n`
 */
export function inlineRequest(verb: string, ...args: Argument[]): string {
  return [formatArgument(verb), ...args.map(formatArgument)].join(' ') + CRLF;
}

/**
 * Format a value-bearing request: `VERB a b len\r\nVALUE\r\n`, where `len` is
 * the UTF-8 byte length of `value`
 */
export function bulkRequest(verb: string, args: readonly Argument[], value: string): string {
  const head = [formatArgument(verb), ...args.map(formatArgument), String(Buffer.byteLength(value, 'utf8'))];
  return head.join(' ') + CRLF + value + CRLF;
}
