/**
 * @custody/storage-sqlite - SQLite store for the custody ledger
 *
 * Persists blocks and the derived item and transfer tables in SQLite
 * through sql.js, writing the database image back to its file after
 * every committed write.
 *
 * ## Features
 *
 * - **ACID Writes**: Each block and its projection rows commit together
 * - **Idempotent Retries**: Re-appending a block replaces it and re-derives the projections
 * - **Node Bookkeeping**: `node_info` records the chain length per node id
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createLedger } from '@custody/ledger';
 * import { createSQLiteStore } from '@custody/storage-sqlite';
 *
 * const ledger = await createLedger({
 *   nodeId: 'node-a',
 *   store: createSQLiteStore({ path: './custody_node-a.db' }),
 * });
 * ```
 *
 * @packageDocumentation
 * @module @custody/storage-sqlite
 *
 * @see {@link createSQLiteStore} for the main factory function
 * @see {@link SQLiteLedgerStore} for the store class
 */

export * from './driver.js';
export * from './sqlite-store.js';
export type * from './types.js';
