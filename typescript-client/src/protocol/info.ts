// INFO reply parsing

import { ProtocolError } from '../errors';

/**
 * Server statistics as reported by INFO
 */
export interface ServerInfo {
  readonly version: string;
  readonly role: 'master' | 'slave';
  readonly uptimeInSeconds?: number;
  readonly uptimeInDays?: number;
  readonly connectedClients?: number;
  readonly connectedSlaves?: number;
  readonly usedMemory?: number;
  readonly changesSinceLastSave?: number;
  readonly bgsaveInProgress?: boolean;
  readonly lastSaveTime?: number;
  readonly totalConnectionsReceived?: number;
  readonly totalCommandsProcessed?: number;
  /** Every `name:value` line, verbatim */
  readonly fields: ReadonlyMap<string, string>;
}

/**
 * Parse the bulk body of an INFO reply.
 * Lines are `name:value`; blank lines and `#` section headers are skipped.
 *
 * @throws ProtocolError when `redis_version` or `role` is missing
 */
export function parseInfo(text: string): ServerInfo {
  const fields = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }

    const colon = line.indexOf(':');
    if (colon <= 0) {
      continue;
    }
    fields.set(line.slice(0, colon), line.slice(colon + 1));
  }

  const version = fields.get('redis_version');
  if (version === undefined) {
    throw new ProtocolError('INFO reply has no redis_version');
  }

  const role = fields.get('role');
  if (role === undefined) {
    throw new ProtocolError('INFO reply has no role');
  }

  const numeric = (name: string): number | undefined => {
    const value = fields.get(name);
    if (value === undefined) {
      return undefined;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  };

  const bgsave = numeric('bgsave_in_progress');

  return {
    version,
    // Anything that is not a master replicates from one
    role: role.startsWith('m') ? 'master' : 'slave',
    uptimeInSeconds: numeric('uptime_in_seconds'),
    uptimeInDays: numeric('uptime_in_days'),
    connectedClients: numeric('connected_clients'),
    connectedSlaves: numeric('connected_slaves'),
    usedMemory: numeric('used_memory'),
    changesSinceLastSave: numeric('changes_since_last_save') ?? numeric('rdb_changes_since_last_save'),
    bgsaveInProgress: bgsave === undefined ? undefined : bgsave !== 0,
    lastSaveTime: numeric('last_save_time') ?? numeric('rdb_last_save_time'),
    totalConnectionsReceived: numeric('total_connections_received'),
    totalCommandsProcessed: numeric('total_commands_processed'),
    fields,
  };
}
