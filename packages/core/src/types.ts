/**
 * Type definitions for the custody ledger data model.
 *
 * Blocks and transactions keep their wire field names (`previous_hash`,
 * `item_id`, ...) because they are hashed and exchanged between nodes as-is.
 *
 * @module @custody/core/types
 */

// ---------------------------------------------------------------------------
// Transactions
// ---------------------------------------------------------------------------

/** Discriminator of a custody transaction. */
export type TransactionType = 'creation' | 'transfer';

/** Action label recorded on a transaction and on the item projection. */
export type CustodyAction = 'Created' | 'Transferred';

/**
 * Records the creation of a tracked item.
 */
export interface CreationTransaction {
  readonly type: 'creation';
  /** Identifier of the tracked item. */
  readonly item_id: string;
  readonly description: string;
  /** Who created the item; becomes the first custodian. */
  readonly actor: string;
  readonly location: string;
  readonly item_type: string;
  /** Fingerprint of the item's content (supplied or derived). */
  readonly content_hash: string;
  readonly action: 'Created';
  /** ISO-8601 time the transaction was built. */
  readonly timestamp: string;
  /** Identifier of the node that originated the transaction. */
  readonly node: string;
}

/**
 * Records a change of custody for a tracked item.
 */
export interface TransferTransaction {
  readonly type: 'transfer';
  readonly item_id: string;
  readonly from_actor: string;
  readonly to_actor: string;
  readonly reason: string;
  readonly action: 'Transferred';
  readonly timestamp: string;
  readonly node: string;
}

/** Union of all custody transactions. */
export type Transaction = CreationTransaction | TransferTransaction;

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

/**
 * Fixed marker carried by the genesis block instead of a transaction list.
 */
export interface GenesisPayload {
  readonly type: 'genesis';
  readonly message: string;
  readonly node: string;
}

/** Block payload: the genesis marker or an ordered list of transactions. */
export type BlockPayload = GenesisPayload | readonly Transaction[];

/**
 * Fields covered by a block's hash.
 */
export interface BlockContent {
  /** Position in the chain; genesis is 0. */
  readonly index: number;
  /** Milliseconds since the epoch when the block was sealed. */
  readonly timestamp: number;
  readonly payload: BlockPayload;
  /** Hash of the block at `index - 1`, or `"0"` for genesis. */
  readonly previous_hash: string;
  /** Always 0; kept for schema compatibility. */
  readonly nonce: number;
}

/**
 * A sealed block. This is the exact wire and persisted representation.
 *
 * @example
 * ```typescript
 * const block: Block = {
 *   index: 1,
 *   timestamp: 1700000000000,
 *   payload: [transaction],
 *   previous_hash: genesis.hash,
 *   nonce: 0,
 *   hash: 'a1b2c3...',
 * };
 * ```
 */
export interface Block extends BlockContent {
  /** SHA-256 hex digest of the canonical {@link BlockContent}. */
  readonly hash: string;
}

/** Hash recorded as the genesis block's `previous_hash`. */
export const GENESIS_PREVIOUS_HASH = '0';

/** Message carried by every genesis marker. */
export const GENESIS_MESSAGE = 'Custody Ledger Genesis Block';

// ---------------------------------------------------------------------------
// Derived projections
// ---------------------------------------------------------------------------

/**
 * Current state of one tracked item, derived from the chain.
 */
export interface ItemRecord {
  readonly item_id: string;
  readonly description: string;
  readonly item_type: string;
  /** Current custodian. */
  readonly custodian: string;
  readonly location: string;
  readonly created_by: string;
  readonly created_at: string;
  readonly last_action: CustodyAction;
  readonly last_updated: string;
  /** Index of the block holding the creation. */
  readonly block_index: number;
  readonly content_hash: string;
  /** Node that originated the creation. */
  readonly node: string;
}

/**
 * One row of the transfer log.
 */
export interface TransferRecord {
  /** Auto-incrementing row id. */
  readonly id: number;
  readonly item_id: string;
  readonly from_actor: string;
  readonly to_actor: string;
  readonly reason: string;
  readonly timestamp: string;
  readonly block_index: number;
  readonly node: string;
}

/**
 * One step in an item's custody history.
 */
export interface ItemHistoryEntry {
  readonly block_index: number;
  readonly timestamp: string;
  readonly action: CustodyAction;
  /** Creator for a creation, receiving custodian for a transfer. */
  readonly actor: string;
  readonly transaction: Transaction;
}

/**
 * Storage statistics reported by a store.
 */
export interface StoreStats {
  readonly blocks: number;
  readonly items: number;
  readonly transfers: number;
  /** Chain length last recorded for each node id that wrote to the store. */
  readonly nodes: Readonly<Record<string, number>>;
  /** Where the data lives (file path or `:memory:`). */
  readonly location: string;
}

// ---------------------------------------------------------------------------
// Persistent store contract
// ---------------------------------------------------------------------------

/**
 * Durable backend for a ledger.
 *
 * Implementations must apply each write (block plus derived rows) as one
 * unit of work and roll the whole unit back on failure.
 */
export interface LedgerStore {
  /** Store name, for diagnostics. */
  readonly name: string;

  /** Prepare the schema or in-memory state. */
  initialize(): Promise<void>;

  /**
   * Write a block and apply its transactions to the projections.
   * Re-applying a block with the same index overwrites it and re-derives
   * the projections from the stored chain.
   */
  appendBlock(block: Block, nodeId: string): Promise<void>;

  /** Replace every block and rebuild the projections from scratch. */
  replaceChain(blocks: readonly Block[], nodeId: string): Promise<void>;

  /** All blocks ordered by index; empty for a fresh store. */
  loadChain(): Promise<Block[]>;

  queryItem(itemId: string): Promise<ItemRecord | null>;

  queryItemHistory(itemId: string): Promise<ItemHistoryEntry[]>;

  queryAllItems(): Promise<ItemRecord[]>;

  queryTransfers(itemId: string): Promise<TransferRecord[]>;

  getStats(): Promise<StoreStats>;

  close(): Promise<void>;
}
