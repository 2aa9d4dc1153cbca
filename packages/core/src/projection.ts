/**
 * Projection rules shared by every store and by the chain scan.
 *
 * The item projection and the transfer log are derived from the chain and
 * must always be re-derivable from it. Stores that keep them in their own
 * tables (SQLite) follow the same rules statement by statement; stores that
 * keep them in memory call {@link applyBlock} directly.
 *
 * @module @custody/core/projection
 */

import { isTransactionList } from './hash.js';
import type {
  Block,
  CreationTransaction,
  ItemHistoryEntry,
  ItemRecord,
  TransferRecord,
  TransferTransaction,
} from './types.js';

/**
 * Mutable projection state.
 */
export interface ProjectionState {
  readonly items: Map<string, ItemRecord>;
  transfers: TransferRecord[];
  nextTransferId: number;
}

/**
 * Create an empty projection state.
 */
export function createProjectionState(): ProjectionState {
  return { items: new Map(), transfers: [], nextTransferId: 1 };
}

/**
 * Copy a projection state so it can be modified without touching the original.
 */
export function cloneProjectionState(state: ProjectionState): ProjectionState {
  return {
    items: new Map(state.items),
    transfers: [...state.transfers],
    nextTransferId: state.nextTransferId,
  };
}

/**
 * Build the item row written for a creation.
 */
export function itemFromCreation(tx: CreationTransaction, blockIndex: number): ItemRecord {
  return {
    item_id: tx.item_id,
    description: tx.description,
    item_type: tx.item_type,
    custodian: tx.actor,
    location: tx.location,
    created_by: tx.actor,
    created_at: tx.timestamp,
    last_action: 'Created',
    last_updated: tx.timestamp,
    block_index: blockIndex,
    content_hash: tx.content_hash,
    node: tx.node,
  };
}

/**
 * Apply one block's transactions to the projection.
 *
 * Only valid for a block that extends the chain the state was built from.
 * A store that overwrites an existing index must re-derive the whole state
 * with {@link projectChain}.
 */
export function applyBlock(state: ProjectionState, block: Block): void {
  if (block.index === 0 || !isTransactionList(block.payload)) {
    return;
  }

  for (const tx of block.payload) {
    if (tx.type === 'creation') {
      state.items.set(tx.item_id, itemFromCreation(tx, block.index));
      continue;
    }

    const existing = state.items.get(tx.item_id);
    if (existing) {
      state.items.set(tx.item_id, {
        ...existing,
        custodian: tx.to_actor,
        last_action: 'Transferred',
        last_updated: tx.timestamp,
      });
    }

    state.transfers.push({
      id: state.nextTransferId++,
      item_id: tx.item_id,
      from_actor: tx.from_actor,
      to_actor: tx.to_actor,
      reason: tx.reason,
      timestamp: tx.timestamp,
      block_index: block.index,
      node: tx.node,
    });
  }
}

/**
 * Derive the projection from a full chain scan.
 */
export function projectChain(blocks: readonly Block[]): ProjectionState {
  const state = createProjectionState();
  for (const block of blocks) {
    applyBlock(state, block);
  }
  return state;
}

/**
 * Order items newest first, ties broken by item id.
 */
export function sortItems(items: Iterable<ItemRecord>): ItemRecord[] {
  return [...items].sort((a, b) => {
    if (a.created_at !== b.created_at) {
      return a.created_at < b.created_at ? 1 : -1;
    }
    if (a.item_id === b.item_id) return 0;
    return a.item_id < b.item_id ? -1 : 1;
  });
}

/**
 * Rebuild the creation transaction recorded in an item row.
 */
export function creationFromItem(item: ItemRecord): CreationTransaction {
  return {
    type: 'creation',
    item_id: item.item_id,
    description: item.description,
    actor: item.created_by,
    location: item.location,
    item_type: item.item_type,
    content_hash: item.content_hash,
    action: 'Created',
    timestamp: item.created_at,
    node: item.node,
  };
}

/**
 * Rebuild the transfer transaction recorded in a transfer row.
 */
export function transferFromRecord(record: TransferRecord): TransferTransaction {
  return {
    type: 'transfer',
    item_id: record.item_id,
    from_actor: record.from_actor,
    to_actor: record.to_actor,
    reason: record.reason,
    action: 'Transferred',
    timestamp: record.timestamp,
    node: record.node,
  };
}

/**
 * Build an item's custody history from its row and its transfer rows.
 * Entries are ordered by block index; within a block the creation comes
 * first, then transfers in log order.
 */
export function buildItemHistory(
  item: ItemRecord | null,
  transfers: readonly TransferRecord[],
): ItemHistoryEntry[] {
  const ranked: { entry: ItemHistoryEntry; rank: number }[] = [];

  if (item) {
    ranked.push({
      rank: 0,
      entry: {
        block_index: item.block_index,
        timestamp: item.created_at,
        action: 'Created',
        actor: item.created_by,
        transaction: creationFromItem(item),
      },
    });
  }

  for (const record of transfers) {
    ranked.push({
      rank: record.id,
      entry: {
        block_index: record.block_index,
        timestamp: record.timestamp,
        action: 'Transferred',
        actor: record.to_actor,
        transaction: transferFromRecord(record),
      },
    });
  }

  return ranked
    .sort((a, b) => a.entry.block_index - b.entry.block_index || a.rank - b.rank)
    .map(({ entry }) => entry);
}
