/**
 * @custody/ledger - Chain ownership for a custody ledger node
 *
 * The {@link Ledger} seals transactions into blocks, persists them through a
 * `LedgerStore`, validates hash linkage and swaps in replacement chains
 * adopted from peers.
 *
 * @packageDocumentation
 * @module @custody/ledger
 */

export * from './ledger.js';
export * from './mutex.js';
