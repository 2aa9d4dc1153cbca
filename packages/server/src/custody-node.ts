import { createLogger, type LedgerStore, type Logger, type LoggerOptions } from '@custody/core';
import { createLedger, type Ledger } from '@custody/ledger';
import {
  PeerRegistry,
  Replicator,
  createHttpTransport,
  type ConnectResult,
  type PeerTransport,
} from '@custody/replication';
import { createMemoryStore } from '@custody/storage-memory';
import { createSQLiteStore } from '@custody/storage-sqlite';

import { MEMORY_DB_PATH, type NodeConfig } from './config.js';
import { NodeServer } from './node-server.js';
import { LedgerRouter } from './router.js';

/**
 * Overrides for the pieces a node would otherwise build from its config
 */
export interface CustodyNodeOptions {
  store?: LedgerStore;
  transport?: PeerTransport;
  /** Log handler shared by every component */
  logHandler?: LoggerOptions['handler'];
}

/**
 * Select the store for a database path.
 */
export function createStoreForPath(dbPath: string): LedgerStore {
  return dbPath === MEMORY_DB_PATH ? createMemoryStore() : createSQLiteStore({ path: dbPath });
}

/**
 * One ledger node: ledger, peers, replicator and HTTP surface wired together.
 *
 * @example
 * ```typescript
 * const node = await createCustodyNode(resolveNodeConfig(parseArgs(process.argv.slice(2))));
 * await node.start();
 * ```
 */
export class CustodyNode {
  readonly config: NodeConfig;
  readonly ledger: Ledger;
  readonly peers: PeerRegistry;
  readonly replicator: Replicator;
  readonly router: LedgerRouter;
  readonly server: NodeServer;

  private readonly logger: Logger;

  constructor(
    config: NodeConfig,
    parts: {
      ledger: Ledger;
      transport: PeerTransport;
      /** Root logger; each component logs through its own child */
      logger: Logger;
    },
  ) {
    this.config = config;
    this.ledger = parts.ledger;
    this.logger = parts.logger.child('CustodyNode');
    this.peers = new PeerRegistry({
      transport: parts.transport,
      selfUrl: config.publicUrl,
      logger: parts.logger,
    });
    this.replicator = new Replicator({
      ledger: this.ledger,
      peers: this.peers,
      transport: parts.transport,
      adoptionPolicy: config.adoptionPolicy,
      syncInterval: config.syncInterval,
      logger: parts.logger,
    });
    this.router = new LedgerRouter({
      ledger: this.ledger,
      peers: this.peers,
      replicator: this.replicator,
      logger: parts.logger,
    });
    this.server = new NodeServer({
      router: this.router,
      port: config.port,
      host: config.host,
      logger: parts.logger,
    });
  }

  /**
   * Listen, connect the bootstrap peers, and start periodic reconciliation.
   */
  async start(): Promise<ConnectResult[]> {
    await this.server.start();
    const results = await this.connectBootstrapPeers();
    this.replicator.start();
    this.logger.info('Node started', {
      nodeId: this.config.nodeId,
      url: this.config.publicUrl,
      chainLength: this.ledger.getLength(),
      peers: this.peers.size,
    });
    return results;
  }

  /**
   * Connect each configured peer in order.
   */
  async connectBootstrapPeers(): Promise<ConnectResult[]> {
    const results: ConnectResult[] = [];
    for (const peer of this.config.peers) {
      results.push(await this.peers.connect(peer));
    }
    return results;
  }

  /**
   * Stop replication, the HTTP server and the ledger.
   */
  async stop(): Promise<void> {
    await this.replicator.dispose();
    await this.server.stop();
    this.peers.dispose();
    await this.ledger.close();
    this.logger.info('Node stopped', { nodeId: this.config.nodeId });
  }
}

/**
 * Build and initialize a node from its configuration.
 */
export async function createCustodyNode(config: NodeConfig, options: CustodyNodeOptions = {}): Promise<CustodyNode> {
  const logger = createLogger({ level: config.logLevel, module: config.nodeId, handler: options.logHandler });

  const ledger = await createLedger({
    nodeId: config.nodeId,
    store: options.store ?? createStoreForPath(config.dbPath),
    logger,
  });

  return new CustodyNode(config, {
    ledger,
    transport: options.transport ?? createHttpTransport({ timeout: config.peerTimeout }),
    logger,
  });
}
