/**
 * @custody/replication - Peer replication for custody ledger nodes
 *
 * - {@link PeerRegistry} tracks peer base URLs and performs mutual registration
 * - {@link Replicator} broadcasts transactions and reconciles chains
 * - {@link HttpPeerTransport} speaks the HTTP+JSON peer protocol
 *
 * ## Reconciliation
 *
 * Longest chain wins. Ties keep the local chain. A longer chain is adopted
 * only if the configured adoption policy accepts it:
 *
 * | Policy | Accepts |
 * |--------|---------|
 * | `trust-longest` | Any strictly longer chain |
 * | `validate-before-adopt` | Strictly longer chains that are well formed and hash-linked |
 *
 * @packageDocumentation
 * @module @custody/replication
 */

export * from './adoption-policy.js';
export * from './peer-registry.js';
export * from './replicator.js';
export * from './transport/index.js';
