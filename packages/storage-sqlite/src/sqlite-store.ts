/**
 * SQLite ledger store.
 *
 * ## Table Schema
 *
 * | Table | Contents |
 * |-------|----------|
 * | blocks | One row per block, keyed by `index_num`; payload stored as JSON |
 * | items | Item projection, one row per `item_id` |
 * | transfers | Transfer log, `id` auto-incrementing |
 * | node_info | Chain length last written by each node id |
 *
 * Every write runs inside one BEGIN/COMMIT; any failure rolls the whole
 * unit back and surfaces as a {@link StorageError}.
 *
 * @module storage-sqlite
 *
 * @example
 * ```typescript
 * import { createSQLiteStore } from '@custody/storage-sqlite';
 *
 * const store = createSQLiteStore({ path: 'custody_node-a.db' });
 * const ledger = await createLedger({ nodeId: 'node-a', store });
 * ```
 */

import { writeFileSync } from 'node:fs';

import {
  StorageError,
  blockSchema,
  buildItemHistory,
  isTransactionList,
  parseWith,
  type Block,
  type ItemHistoryEntry,
  type ItemRecord,
  type LedgerStore,
  type StoreStats,
  type TransferRecord,
} from '@custody/core';

import { createSqlJsDriver } from './driver.js';
import {
  blockRowSchema,
  countRowSchema,
  itemRowSchema,
  nodeInfoRowSchema,
  readRow,
  transferRowSchema,
  type BlockRow,
} from './rows.js';
import type { SQLiteDriver, SQLiteRow, SQLiteStoreConfig } from './types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS blocks (
    index_num INTEGER PRIMARY KEY,
    timestamp INTEGER NOT NULL,
    payload TEXT NOT NULL,
    previous_hash TEXT NOT NULL,
    nonce INTEGER NOT NULL DEFAULT 0,
    hash TEXT NOT NULL,
    node_id TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS items (
    item_id TEXT PRIMARY KEY,
    description TEXT NOT NULL,
    item_type TEXT NOT NULL,
    custodian TEXT NOT NULL,
    location TEXT NOT NULL,
    created_by TEXT NOT NULL,
    created_at TEXT NOT NULL,
    last_action TEXT NOT NULL,
    last_updated TEXT NOT NULL,
    block_index INTEGER NOT NULL,
    content_hash TEXT NOT NULL,
    node TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS transfers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    item_id TEXT NOT NULL,
    from_actor TEXT NOT NULL,
    to_actor TEXT NOT NULL,
    reason TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    block_index INTEGER NOT NULL,
    node TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS node_info (
    node_id TEXT PRIMARY KEY,
    chain_length INTEGER NOT NULL,
    last_active INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_items_custodian ON items(custodian);
  CREATE INDEX IF NOT EXISTS idx_transfers_item ON transfers(item_id);
  CREATE INDEX IF NOT EXISTS idx_blocks_hash ON blocks(hash);
`;

function rowToItem(row: SQLiteRow): ItemRecord {
  return readRow(itemRowSchema, row, 'items');
}

function rowToTransfer(row: SQLiteRow): TransferRecord {
  return readRow(transferRowSchema, row, 'transfers');
}

function rowToBlock(row: SQLiteRow): Block {
  return blockFromRow(readRow(blockRowSchema, row, 'blocks'));
}

function blockFromRow(row: BlockRow): Block {
  const payload: unknown = JSON.parse(row.payload);
  return parseWith(
    blockSchema,
    {
      index: row.index_num,
      timestamp: row.timestamp,
      payload,
      previous_hash: row.previous_hash,
      nonce: row.nonce,
      hash: row.hash,
    },
    'LEDGER_V102',
  );
}

/**
 * Ledger store backed by SQLite (sql.js).
 */
export class SQLiteLedgerStore implements LedgerStore {
  readonly name = 'sqlite';

  private driver: SQLiteDriver | null = null;
  private readonly config: SQLiteStoreConfig;

  constructor(config: SQLiteStoreConfig = {}) {
    this.config = config;
  }

  async initialize(): Promise<void> {
    if (this.driver) return;

    const driver = this.config.driver ?? (await createSqlJsDriver(this.config));
    driver.exec(SCHEMA);
    this.driver = driver;
  }

  async appendBlock(block: Block, nodeId: string): Promise<void> {
    const driver = this.requireDriver();

    this.transaction(driver, `Failed to append block ${block.index}`, { index: block.index }, () => {
      const overwrites = driver.prepare('SELECT 1 FROM blocks WHERE index_num = ?').get(block.index) !== undefined;
      this.writeBlockRow(driver, block, nodeId);
      if (overwrites) {
        // Projections must match a scan of the stored chain
        this.rebuildProjection(driver);
      } else {
        this.applyProjection(driver, block);
      }
      this.touchNode(driver, nodeId);
    });
  }

  async replaceChain(blocks: readonly Block[], nodeId: string): Promise<void> {
    const driver = this.requireDriver();

    this.transaction(driver, 'Failed to replace chain', { length: blocks.length }, () => {
      driver.exec('DELETE FROM blocks');
      this.clearProjection(driver);
      for (const block of blocks) {
        this.writeBlockRow(driver, block, nodeId);
        this.applyProjection(driver, block);
      }
      this.touchNode(driver, nodeId);
    });
  }

  async loadChain(): Promise<Block[]> {
    const driver = this.requireDriver();
    return driver
      .prepare('SELECT * FROM blocks ORDER BY index_num ASC')
      .all()
      .map(rowToBlock);
  }

  async queryItem(itemId: string): Promise<ItemRecord | null> {
    const driver = this.requireDriver();
    const row = driver.prepare('SELECT * FROM items WHERE item_id = ?').get(itemId);
    return row ? rowToItem(row) : null;
  }

  async queryItemHistory(itemId: string): Promise<ItemHistoryEntry[]> {
    const item = await this.queryItem(itemId);
    const transfers = await this.queryTransfers(itemId);
    return buildItemHistory(item, transfers);
  }

  async queryAllItems(): Promise<ItemRecord[]> {
    const driver = this.requireDriver();
    return driver
      .prepare('SELECT * FROM items ORDER BY created_at DESC, item_id ASC')
      .all()
      .map(rowToItem);
  }

  async queryTransfers(itemId: string): Promise<TransferRecord[]> {
    const driver = this.requireDriver();
    return driver
      .prepare('SELECT * FROM transfers WHERE item_id = ? ORDER BY id ASC')
      .all(itemId)
      .map(rowToTransfer);
  }

  async getStats(): Promise<StoreStats> {
    const driver = this.requireDriver();
    const count = (table: string): number => {
      const row = driver.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get();
      return row ? readRow(countRowSchema, row, table).count : 0;
    };

    const nodes: Record<string, number> = {};
    for (const row of driver.prepare('SELECT * FROM node_info ORDER BY node_id').all()) {
      const info = readRow(nodeInfoRowSchema, row, 'node_info');
      nodes[info.node_id] = info.chain_length;
    }

    return {
      blocks: count('blocks'),
      items: count('items'),
      transfers: count('transfers'),
      nodes,
      location: this.config.path ?? ':memory:',
    };
  }

  async close(): Promise<void> {
    if (this.driver) {
      this.driver.close();
      this.driver = null;
    }
  }

  private writeBlockRow(driver: SQLiteDriver, block: Block, nodeId: string): void {
    driver
      .prepare(
        `INSERT OR REPLACE INTO blocks (index_num, timestamp, payload, previous_hash, nonce, hash, node_id)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        block.index,
        block.timestamp,
        JSON.stringify(block.payload),
        block.previous_hash,
        block.nonce,
        block.hash,
        nodeId,
      );
  }

  private clearProjection(driver: SQLiteDriver): void {
    driver.exec(`
      DELETE FROM items;
      DELETE FROM transfers;
      DELETE FROM sqlite_sequence WHERE name = 'transfers';
    `);
  }

  private rebuildProjection(driver: SQLiteDriver): void {
    const blocks = driver.prepare('SELECT * FROM blocks ORDER BY index_num ASC').all().map(rowToBlock);
    this.clearProjection(driver);
    for (const block of blocks) {
      this.applyProjection(driver, block);
    }
  }

  /**
   * Same rules as `applyBlock` in @custody/core, one statement per transaction.
   */
  private applyProjection(driver: SQLiteDriver, block: Block): void {
    if (block.index === 0 || !isTransactionList(block.payload)) {
      return;
    }

    for (const tx of block.payload) {
      if (tx.type === 'creation') {
        driver
          .prepare(
            `INSERT OR REPLACE INTO items (
               item_id, description, item_type, custodian, location, created_by,
               created_at, last_action, last_updated, block_index, content_hash, node
             ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            tx.item_id,
            tx.description,
            tx.item_type,
            tx.actor,
            tx.location,
            tx.actor,
            tx.timestamp,
            'Created',
            tx.timestamp,
            block.index,
            tx.content_hash,
            tx.node,
          );
        continue;
      }

      driver
        .prepare(
          `UPDATE items SET custodian = ?, last_action = ?, last_updated = ? WHERE item_id = ?`,
        )
        .run(tx.to_actor, 'Transferred', tx.timestamp, tx.item_id);

      driver
        .prepare(
          `INSERT INTO transfers (item_id, from_actor, to_actor, reason, timestamp, block_index, node)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(tx.item_id, tx.from_actor, tx.to_actor, tx.reason, tx.timestamp, block.index, tx.node);
    }
  }

  private touchNode(driver: SQLiteDriver, nodeId: string): void {
    driver
      .prepare(
        `INSERT OR REPLACE INTO node_info (node_id, chain_length, last_active)
         VALUES (?, (SELECT COUNT(*) FROM blocks), ?)`,
      )
      .run(nodeId, Date.now());
  }

  private transaction(
    driver: SQLiteDriver,
    message: string,
    context: Record<string, unknown>,
    fn: () => void,
  ): void {
    try {
      driver.exec('BEGIN TRANSACTION');
      fn();
      driver.exec('COMMIT');
    } catch (error) {
      const rollbackError = this.rollback(driver);
      throw new StorageError(
        'LEDGER_S300',
        message,
        rollbackError ? { ...context, rollbackError: rollbackError.message } : context,
        error instanceof Error ? error : undefined,
      );
    }
    this.persist(driver);
  }

  /**
   * Roll back the open transaction, returning the failure instead of
   * throwing so the error that caused the rollback stays the cause.
   */
  private rollback(driver: SQLiteDriver): Error | null {
    try {
      driver.exec('ROLLBACK');
      return null;
    } catch (error) {
      return error instanceof Error ? error : new Error(String(error));
    }
  }

  private persist(driver: SQLiteDriver): void {
    const path = this.config.path;
    if (!path || path === ':memory:' || !driver.export) {
      return;
    }
    try {
      writeFileSync(path, driver.export());
    } catch (error) {
      throw new StorageError(
        'LEDGER_S300',
        `Failed to write database file ${path}`,
        { path },
        error instanceof Error ? error : undefined,
      );
    }
  }

  private requireDriver(): SQLiteDriver {
    if (!this.driver) {
      throw new StorageError('LEDGER_S301', 'Store not initialized', { store: this.name });
    }
    return this.driver;
  }
}

/**
 * Creates a SQLite ledger store.
 *
 * @example File-backed node
 * ```typescript
 * const store = createSQLiteStore({ path: './custody_node-a.db' });
 * await store.initialize();
 * ```
 */
export function createSQLiteStore(config?: SQLiteStoreConfig): SQLiteLedgerStore {
  return new SQLiteLedgerStore(config);
}
