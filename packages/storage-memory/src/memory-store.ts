import {
  StorageError,
  applyBlock,
  buildItemHistory,
  cloneProjectionState,
  createProjectionState,
  projectChain,
  sortItems,
  type Block,
  type ItemHistoryEntry,
  type ItemRecord,
  type LedgerStore,
  type ProjectionState,
  type StoreStats,
  type TransferRecord,
} from '@custody/core';

/**
 * Location reported by in-memory stores.
 */
export const MEMORY_LOCATION = ':memory:';

function inIndexOrder(blocks: Map<number, Block>): Block[] {
  return Array.from(blocks.values()).sort((a, b) => a.index - b.index);
}

/**
 * In-memory ledger store.
 *
 * Each write is staged on a copy of the current state and swapped in only
 * when every step succeeded, so a failed write leaves nothing behind.
 */
export class MemoryLedgerStore implements LedgerStore {
  readonly name = 'memory';

  private blocks = new Map<number, Block>();
  private projection: ProjectionState = createProjectionState();
  private nodes = new Map<string, number>();
  private initialized = false;

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async appendBlock(block: Block, nodeId: string): Promise<void> {
    this.ensureInitialized();

    const blocks = new Map(this.blocks);
    let projection: ProjectionState;

    try {
      if (blocks.has(block.index)) {
        // Overwriting a block invalidates everything derived from the old one
        blocks.set(block.index, structuredClone(block));
        projection = projectChain(inIndexOrder(blocks));
      } else {
        blocks.set(block.index, structuredClone(block));
        projection = cloneProjectionState(this.projection);
        applyBlock(projection, block);
      }
    } catch (error) {
      throw new StorageError(
        'LEDGER_S300',
        `Failed to append block ${block.index}`,
        { index: block.index },
        error instanceof Error ? error : undefined,
      );
    }

    this.commit(blocks, projection, nodeId);
  }

  async replaceChain(blocks: readonly Block[], nodeId: string): Promise<void> {
    this.ensureInitialized();

    const staged = new Map<number, Block>();
    const projection = createProjectionState();

    try {
      for (const block of blocks) {
        staged.set(block.index, structuredClone(block));
        applyBlock(projection, block);
      }
    } catch (error) {
      throw new StorageError(
        'LEDGER_S300',
        'Failed to replace chain',
        { length: blocks.length },
        error instanceof Error ? error : undefined,
      );
    }

    this.commit(staged, projection, nodeId);
  }

  async loadChain(): Promise<Block[]> {
    this.ensureInitialized();
    return inIndexOrder(this.blocks).map((block) => structuredClone(block));
  }

  async queryItem(itemId: string): Promise<ItemRecord | null> {
    this.ensureInitialized();
    return this.projection.items.get(itemId) ?? null;
  }

  async queryItemHistory(itemId: string): Promise<ItemHistoryEntry[]> {
    this.ensureInitialized();
    return buildItemHistory(this.projection.items.get(itemId) ?? null, this.transfersOf(itemId));
  }

  async queryAllItems(): Promise<ItemRecord[]> {
    this.ensureInitialized();
    return sortItems(this.projection.items.values());
  }

  async queryTransfers(itemId: string): Promise<TransferRecord[]> {
    this.ensureInitialized();
    return this.transfersOf(itemId);
  }

  async getStats(): Promise<StoreStats> {
    this.ensureInitialized();
    return {
      blocks: this.blocks.size,
      items: this.projection.items.size,
      transfers: this.projection.transfers.length,
      nodes: Object.fromEntries(this.nodes),
      location: MEMORY_LOCATION,
    };
  }

  async close(): Promise<void> {
    this.blocks.clear();
    this.projection = createProjectionState();
    this.nodes.clear();
    this.initialized = false;
  }

  private commit(blocks: Map<number, Block>, projection: ProjectionState, nodeId: string): void {
    this.blocks = blocks;
    this.projection = projection;
    this.nodes.set(nodeId, blocks.size);
  }

  private transfersOf(itemId: string): TransferRecord[] {
    return this.projection.transfers
      .filter((t) => t.item_id === itemId)
      .sort((a, b) => a.id - b.id);
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new StorageError('LEDGER_S301', 'Store not initialized', { store: this.name });
    }
  }
}

/**
 * Create an in-memory ledger store.
 *
 * @example
 * ```typescript
 * const ledger = await createLedger({
 *   nodeId: 'node-a',
 *   store: createMemoryStore(),
 * });
 * ```
 */
export function createMemoryStore(): MemoryLedgerStore {
  return new MemoryLedgerStore();
}
