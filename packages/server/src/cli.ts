#!/usr/bin/env node
/**
 * CLI for a custody ledger node
 */

import { LedgerError } from '@custody/core';

import { parseArgs, resolveNodeConfig } from './config.js';
import { createCustodyNode } from './custody-node.js';

const VERSION = '0.1.0';

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Custody Ledger Node - replicated chain-of-custody ledger

Usage: custody-node --node-id <id> [options]

Options:
  -n, --node-id <id>          Node identifier (required)
  -p, --port <port>           Port to listen on (default: 5000)
  -h, --host <host>           Host to bind to (default: 0.0.0.0)
  --public-url <url>          URL peers use to reach this node
  --db <path>                 SQLite file, or :memory: (default: custody_<node-id>.db)
  --peers <urls>              Comma-separated bootstrap peers
  --sync-interval <ms>        Reconciliation interval (default: 10000)
  --peer-timeout <ms>         Timeout for peer requests (default: 5000)
  --adoption-policy <name>    trust-longest | validate-before-adopt
  --log-level <level>         debug | info | warn | error
  --help                      Show this help message
  --version                   Show version

Examples:
  custody-node -n node-a
  custody-node -n node-b -p 5001 --peers http://localhost:5000

Environment Variables:
  CUSTODY_NODE_ID, CUSTODY_PORT, CUSTODY_HOST, CUSTODY_PUBLIC_URL,
  CUSTODY_DB_PATH, CUSTODY_PEERS, CUSTODY_SYNC_INTERVAL_MS,
  CUSTODY_PEER_TIMEOUT_MS, CUSTODY_ADOPTION_POLICY, CUSTODY_LOG_LEVEL
`);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return;
  }

  if (args.version) {
    console.log(`custody-node v${VERSION}`);
    return;
  }

  const config = resolveNodeConfig(args);
  const node = await createCustodyNode(config);

  const shutdown = async (): Promise<void> => {
    await node.stop();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  for (const result of await node.start()) {
    console.log(result.message);
  }

  console.log(`
Custody node ${config.nodeId}
  Address:  ${config.publicUrl}
  Store:    ${config.dbPath}
  Policy:   ${config.adoptionPolicy}
  Peers:    ${node.peers.list().join(', ') || '(none)'}

Press Ctrl+C to stop
`);
}

main().catch((error: unknown) => {
  console.error('Failed to start node:', LedgerError.isLedgerError(error) ? error.format() : error);
  process.exit(1);
});
