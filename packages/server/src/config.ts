import { ValidationError, isLogLevel, toFieldErrors, type LogLevel } from '@custody/core';
import {
  ADOPTION_POLICY_NAMES,
  DEFAULT_PEER_TIMEOUT_MS,
  DEFAULT_SYNC_INTERVAL_MS,
  isAdoptionPolicyName,
  type AdoptionPolicyName,
} from '@custody/replication';
import { z } from 'zod';

/** Database path that selects the in-memory store. */
export const MEMORY_DB_PATH = ':memory:';

export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = '0.0.0.0';

/**
 * Resolved configuration of one ledger node
 */
export interface NodeConfig {
  nodeId: string;
  port: number;
  host: string;
  /** Base URL peers use to reach this node */
  publicUrl: string;
  /** SQLite file, or `:memory:` for the in-memory store */
  dbPath: string;
  /** Bootstrap peers connected on start */
  peers: string[];
  syncInterval: number;
  peerTimeout: number;
  adoptionPolicy: AdoptionPolicyName;
  logLevel: LogLevel;
}

/**
 * Flags accepted by the node CLI
 */
export type CliFlags = Record<string, string | boolean>;

/**
 * Parse command line arguments
 */
export function parseArgs(args: readonly string[]): CliFlags {
  const result: CliFlags = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!;

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const nextArg = args[i + 1];

      if (nextArg && !nextArg.startsWith('-')) {
        result[key] = nextArg;
        i++;
      } else {
        result[key] = true;
      }
    } else if (arg.startsWith('-')) {
      const key = arg.slice(1);
      const nextArg = args[i + 1];

      if (nextArg && !nextArg.startsWith('-')) {
        result[key] = nextArg;
        i++;
      } else {
        result[key] = true;
      }
    }
  }

  return result;
}

const nodeConfigSchema = z.object({
  nodeId: z.string().trim().min(1, 'Required'),
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  host: z.string().min(1).default(DEFAULT_HOST),
  publicUrl: z.string().optional(),
  dbPath: z.string().min(1).optional(),
  peers: z.string().default(''),
  syncInterval: z.coerce.number().int().positive().default(DEFAULT_SYNC_INTERVAL_MS),
  peerTimeout: z.coerce.number().int().positive().default(DEFAULT_PEER_TIMEOUT_MS),
  adoptionPolicy: z
    .custom<AdoptionPolicyName>(
      (value) => typeof value === 'string' && isAdoptionPolicyName(value),
      `Expected one of: ${ADOPTION_POLICY_NAMES.join(', ')}`,
    )
    .default('trust-longest'),
  logLevel: z
    .custom<LogLevel>(
      (value) => typeof value === 'string' && isLogLevel(value),
      'Expected one of: debug, info, warn, error',
    )
    .default('info'),
});

function flag(flags: CliFlags, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = flags[name];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Resolve node configuration from CLI flags, then `CUSTODY_*` environment
 * variables, then defaults.
 *
 * @throws ValidationError (`LEDGER_V104`) listing every invalid setting
 *
 * @example
 * ```typescript
 * const config = resolveNodeConfig(parseArgs(['--node-id', 'node-a', '--port', '5001']), {});
 * config.dbPath; // 'custody_node-a.db'
 * ```
 */
export function resolveNodeConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): NodeConfig {
  const result = nodeConfigSchema.safeParse({
    nodeId: flag(flags, 'node-id', 'n') ?? env.CUSTODY_NODE_ID,
    port: flag(flags, 'port', 'p') ?? env.CUSTODY_PORT,
    host: flag(flags, 'host', 'h') ?? env.CUSTODY_HOST,
    publicUrl: flag(flags, 'public-url') ?? env.CUSTODY_PUBLIC_URL,
    dbPath: flag(flags, 'db') ?? env.CUSTODY_DB_PATH,
    peers: flag(flags, 'peers') ?? env.CUSTODY_PEERS,
    syncInterval: flag(flags, 'sync-interval') ?? env.CUSTODY_SYNC_INTERVAL_MS,
    peerTimeout: flag(flags, 'peer-timeout') ?? env.CUSTODY_PEER_TIMEOUT_MS,
    adoptionPolicy: flag(flags, 'adoption-policy') ?? env.CUSTODY_ADOPTION_POLICY,
    logLevel: flag(flags, 'log-level') ?? env.CUSTODY_LOG_LEVEL,
  });

  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error), 'LEDGER_V104');
  }

  const { nodeId, port, host, publicUrl, dbPath, peers, syncInterval, peerTimeout, adoptionPolicy, logLevel } =
    result.data;

  const advertisedHost = host === DEFAULT_HOST ? 'localhost' : host;

  return {
    nodeId,
    port,
    host,
    publicUrl: publicUrl ?? `http://${advertisedHost}:${port}`,
    dbPath: dbPath ?? `custody_${nodeId}.db`,
    peers: splitList(peers),
    syncInterval,
    peerTimeout,
    adoptionPolicy,
    logLevel,
  };
}
