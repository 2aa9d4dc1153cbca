import {
  GENESIS_MESSAGE,
  GENESIS_PREVIOUS_HASH,
  LedgerError,
  StorageError,
  buildItemHistory,
  computeBlockHash,
  createItemInputSchema,
  deriveContentHash,
  parseWith,
  projectChain,
  resolveLogger,
  sealBlock,
  sortItems,
  transactionSchema,
  transferItemInputSchema,
  type Block,
  type CreationTransaction,
  type ItemHistoryEntry,
  type ItemRecord,
  type LedgerStore,
  type Logger,
  type LoggerSetting,
  type StoreStats,
  type Transaction,
  type TransferRecord,
  type TransferTransaction,
} from '@custody/core';
import { BehaviorSubject, Subject, type Observable } from 'rxjs';

import { Mutex } from './mutex.js';

/**
 * Ledger configuration
 */
export interface LedgerConfig {
  /** Identifier of this node, stamped on genesis and on local transactions */
  nodeId: string;
  /** Durable backend */
  store: LedgerStore;
  /** Logger options for structured logging */
  logger?: LoggerSetting;
  /** Clock in milliseconds (default: Date.now) */
  clock?: () => number;
}

/**
 * Result of sealing a transaction into a block
 */
export interface SubmitResult {
  block: Block;
  transaction: Transaction;
}

/**
 * Result of a chain scan
 */
export interface ChainScan {
  items: ItemRecord[];
  transfers: TransferRecord[];
}

/**
 * Owns one node's chain.
 *
 * Every mutation (genesis, submission, replacement) runs under a single
 * lock and is persisted through the store before the in-memory chain
 * changes. Reads see the last committed chain.
 *
 * @example
 * ```typescript
 * const ledger = await createLedger({ nodeId: 'node-a', store: createMemoryStore() });
 *
 * await ledger.createItem({
 *   item_id: 'EV-1',
 *   description: 'Kitchen knife',
 *   actor: 'Officer A',
 *   location: 'Locker 12',
 *   item_type: 'physical',
 * });
 *
 * ledger.length$.subscribe((length) => console.log('length', length));
 * ```
 */
export class Ledger {
  readonly nodeId: string;

  private readonly store: LedgerStore;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly lock = new Mutex();

  private chain: Block[] = [];
  private pending: Transaction[] = [];
  private initialized = false;
  private closed = false;

  private readonly blocksSubject = new Subject<Block>();
  private readonly lengthSubject = new BehaviorSubject<number>(0);
  private readonly replacedSubject = new Subject<number>();

  constructor(config: LedgerConfig) {
    this.nodeId = config.nodeId;
    this.store = config.store;
    this.clock = config.clock ?? Date.now;
    this.logger = resolveLogger(config.logger, 'Ledger');
  }

  /**
   * Emits every block sealed locally
   */
  get blocks$(): Observable<Block> {
    return this.blocksSubject.asObservable();
  }

  /**
   * Emits the chain length after every change
   */
  get length$(): Observable<number> {
    return this.lengthSubject.asObservable();
  }

  /**
   * Emits the new length each time the chain is replaced
   */
  get replaced$(): Observable<number> {
    return this.replacedSubject.asObservable();
  }

  /**
   * Open the store and load the chain, creating genesis when it is empty.
   */
  async initialize(): Promise<void> {
    this.ensureOpen();
    await this.lock.runExclusive(async () => {
      if (this.initialized) return;

      await this.store.initialize();
      this.chain = await this.store.loadChain();

      if (this.chain.length === 0) {
        await this.sealGenesis();
      }

      this.initialized = true;
      this.lengthSubject.next(this.chain.length);
      this.logger.info('Ledger ready', {
        nodeId: this.nodeId,
        store: this.store.name,
        length: this.chain.length,
      });
    });
  }

  /**
   * Create and persist the genesis block when the chain is empty.
   * Returns the existing genesis otherwise.
   */
  async createGenesis(): Promise<Block> {
    this.ensureOpen();
    return this.lock.runExclusive(async () => {
      const existing = this.chain[0];
      if (existing) return existing;

      const genesis = await this.sealGenesis();
      this.lengthSubject.next(this.chain.length);
      return genesis;
    });
  }

  /**
   * Validate a transaction and seal it into exactly one new block.
   *
   * @throws ValidationError if the transaction is malformed; nothing is sealed
   * @throws StorageError if the block cannot be persisted; the chain is unchanged
   */
  async submitTransaction(input: unknown): Promise<SubmitResult> {
    this.ensureReady();
    const transaction = parseWith(transactionSchema, input, 'LEDGER_V101');

    return this.lock.runExclusive(async () => {
      const previousPending = this.pending;
      this.pending = [...this.pending, transaction];

      const latest = this.latestBlock();
      const block = sealBlock({
        index: this.chain.length,
        timestamp: this.clock(),
        payload: this.pending,
        previous_hash: latest.hash,
        nonce: 0,
      });

      try {
        await this.store.appendBlock(block, this.nodeId);
      } catch (error) {
        this.pending = previousPending;
        this.logger.error('Failed to persist block', error instanceof Error ? error : undefined, {
          index: block.index,
        });
        throw this.toStorageError(error, `Failed to persist block ${block.index}`, { index: block.index });
      }

      this.chain = [...this.chain, block];
      this.pending = [];

      this.logger.debug('Block sealed', { index: block.index, hash: block.hash });
      this.blocksSubject.next(block);
      this.lengthSubject.next(this.chain.length);

      return { block, transaction };
    });
  }

  /**
   * Record the creation of an item.
   */
  async createItem(input: unknown): Promise<SubmitResult> {
    const fields = parseWith(createItemInputSchema, input);
    const now = this.clock();

    const transaction: CreationTransaction = {
      type: 'creation',
      item_id: fields.item_id,
      description: fields.description,
      actor: fields.actor,
      location: fields.location,
      item_type: fields.item_type,
      content_hash: fields.content_hash
        ? fields.content_hash
        : deriveContentHash(fields.item_id, fields.description, now),
      action: 'Created',
      timestamp: new Date(now).toISOString(),
      node: this.nodeId,
    };

    return this.submitTransaction(transaction);
  }

  /**
   * Record a change of custody.
   */
  async transferItem(input: unknown): Promise<SubmitResult> {
    const fields = parseWith(transferItemInputSchema, input);

    const transaction: TransferTransaction = {
      type: 'transfer',
      item_id: fields.item_id,
      from_actor: fields.from_actor,
      to_actor: fields.to_actor,
      reason: fields.reason,
      action: 'Transferred',
      timestamp: new Date(this.clock()).toISOString(),
      node: this.nodeId,
    };

    return this.submitTransaction(transaction);
  }

  /**
   * Check hash integrity and linkage of every block after genesis.
   * Never repairs anything.
   */
  validateChain(): boolean {
    return isValidChain(this.chain);
  }

  /**
   * Replace the whole chain and rebuild the store's projections.
   * Hash-chaining is not checked here.
   *
   * @throws StorageError if the store rejects the chain; nothing changes
   */
  async replaceChain(blocks: readonly Block[]): Promise<void> {
    this.ensureReady();

    await this.lock.runExclusive(() => this.swapChain(blocks));
  }

  /**
   * Replace the chain only if `blocks` is strictly longer than the chain
   * at the time the lock is taken. Returns whether it was replaced.
   */
  async adoptChain(blocks: readonly Block[]): Promise<boolean> {
    this.ensureReady();

    return this.lock.runExclusive(async () => {
      if (blocks.length <= this.chain.length) {
        this.logger.debug('Candidate chain no longer longer than local', {
          candidate: blocks.length,
          local: this.chain.length,
        });
        return false;
      }
      await this.swapChain(blocks);
      return true;
    });
  }

  /**
   * Snapshot of the chain
   */
  getChain(): Block[] {
    return [...this.chain];
  }

  getLength(): number {
    return this.chain.length;
  }

  getLatestBlock(): Block {
    this.ensureReady();
    return this.latestBlock();
  }

  async getItem(itemId: string): Promise<ItemRecord | null> {
    this.ensureReady();
    return this.store.queryItem(itemId);
  }

  async getItemHistory(itemId: string): Promise<ItemHistoryEntry[]> {
    this.ensureReady();
    return this.store.queryItemHistory(itemId);
  }

  async getAllItems(): Promise<ItemRecord[]> {
    this.ensureReady();
    return this.store.queryAllItems();
  }

  async getTransfers(itemId: string): Promise<TransferRecord[]> {
    this.ensureReady();
    return this.store.queryTransfers(itemId);
  }

  async getStats(): Promise<StoreStats> {
    this.ensureReady();
    return this.store.getStats();
  }

  /**
   * Derive items and transfers by scanning the chain instead of the store.
   */
  scanChain(): ChainScan {
    const state = projectChain(this.chain);
    return { items: sortItems(state.items.values()), transfers: state.transfers };
  }

  /**
   * All items, derived from the chain
   */
  scanItems(): ItemRecord[] {
    return this.scanChain().items;
  }

  /**
   * An item's history, derived from the chain
   */
  scanItemHistory(itemId: string): ItemHistoryEntry[] {
    const state = projectChain(this.chain);
    return buildItemHistory(
      state.items.get(itemId) ?? null,
      state.transfers.filter((t) => t.item_id === itemId),
    );
  }

  /**
   * Close the store and complete the observables
   */
  async close(): Promise<void> {
    if (this.closed) return;

    await this.lock.runExclusive(async () => {
      this.closed = true;
      await this.store.close();
    });

    this.blocksSubject.complete();
    this.lengthSubject.complete();
    this.replacedSubject.complete();
    this.logger.debug('Ledger closed', { nodeId: this.nodeId });
  }

  private async swapChain(blocks: readonly Block[]): Promise<void> {
    try {
      await this.store.replaceChain(blocks, this.nodeId);
    } catch (error) {
      this.logger.error('Failed to replace chain', error instanceof Error ? error : undefined, {
        length: blocks.length,
      });
      throw this.toStorageError(error, 'Failed to replace chain', { length: blocks.length });
    }

    const previousLength = this.chain.length;
    this.chain = [...blocks];
    this.pending = [];

    this.logger.info('Chain replaced', { previousLength, length: this.chain.length });
    this.replacedSubject.next(this.chain.length);
    this.lengthSubject.next(this.chain.length);
  }

  private async sealGenesis(): Promise<Block> {
    const genesis = sealBlock({
      index: 0,
      timestamp: this.clock(),
      payload: { type: 'genesis', message: GENESIS_MESSAGE, node: this.nodeId },
      previous_hash: GENESIS_PREVIOUS_HASH,
      nonce: 0,
    });

    try {
      await this.store.appendBlock(genesis, this.nodeId);
    } catch (error) {
      throw this.toStorageError(error, 'Failed to persist genesis block', { index: 0 });
    }

    this.chain = [genesis];
    this.logger.info('Genesis block created', { nodeId: this.nodeId, hash: genesis.hash });
    return genesis;
  }

  private latestBlock(): Block {
    const latest = this.chain[this.chain.length - 1];
    if (!latest) {
      throw new LedgerError({ code: 'LEDGER_S301', message: 'Ledger has no genesis block' });
    }
    return latest;
  }

  private toStorageError(
    error: unknown,
    message: string,
    context: Record<string, unknown>,
  ): StorageError {
    if (error instanceof StorageError) {
      return error;
    }
    return new StorageError('LEDGER_S300', message, context, error instanceof Error ? error : undefined);
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw LedgerError.fromCode('LEDGER_X901', { nodeId: this.nodeId });
    }
  }

  private ensureReady(): void {
    this.ensureOpen();
    if (!this.initialized) {
      throw new LedgerError({
        code: 'LEDGER_S301',
        message: 'Ledger not initialized',
        suggestion: 'Call initialize() or use createLedger().',
      });
    }
  }
}

/**
 * Whether every block after genesis carries its own digest and links to its
 * predecessor.
 */
export function isValidChain(blocks: readonly Block[]): boolean {
  for (let i = 1; i < blocks.length; i++) {
    const current = blocks[i]!;
    const previous = blocks[i - 1]!;

    if (current.hash !== computeBlockHash(current)) {
      return false;
    }
    if (current.previous_hash !== previous.hash) {
      return false;
    }
  }
  return true;
}

/**
 * Create and initialize a ledger.
 */
export async function createLedger(config: LedgerConfig): Promise<Ledger> {
  const ledger = new Ledger(config);
  await ledger.initialize();
  return ledger;
}
