// Wire protocol constants

/**
 * First byte of every reply record
 */
export enum ReplyTag {
  Error = 0x2d, // '-'
  Status = 0x2b, // '+'
  Integer = 0x3a, // ':'
  Bulk = 0x24, // '$'
  MultiBulk = 0x2a, // '*'
}

/**
 * Record terminator
 */
export const CRLF = '\r\n';

/**
 * Growth step of the connection buffer (bytes)
 */
export const BUFFER_CHUNK_SIZE = 4096;

/**
 * Growth step of the multi-bulk slot table (entries)
 */
export const MULTIBULK_CHUNK_SIZE = 64;

/**
 * Length marker of a null bulk or multi-bulk reply
 */
export const NULL_LENGTH = -1;
