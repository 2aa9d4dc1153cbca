/**
 * @packageDocumentation
 *
 * In-memory ledger store.
 *
 * Keeps blocks and the derived item and transfer tables in process memory.
 * Used by tests and by nodes started with `--db :memory:`.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createLedger } from '@custody/ledger';
 * import { createMemoryStore } from '@custody/storage-memory';
 *
 * const ledger = await createLedger({ nodeId: 'node-a', store: createMemoryStore() });
 * ```
 *
 * ## Limitations
 *
 * - Data is lost when the process ends or the store closes
 *
 * @module @custody/storage-memory
 *
 * @see {@link MemoryLedgerStore}
 * @see {@link createMemoryStore}
 */
export * from './memory-store.js';
