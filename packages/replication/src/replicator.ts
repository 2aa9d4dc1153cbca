import {
  resolveLogger,
  type Block,
  type Logger,
  type LoggerSetting,
  type Transaction,
} from '@custody/core';
import type { Ledger, SubmitResult } from '@custody/ledger';
import { Subject, type Observable } from 'rxjs';

import {
  resolveAdoptionPolicy,
  type AdoptionPolicy,
  type AdoptionPolicyName,
} from './adoption-policy.js';
import type { PeerRegistry } from './peer-registry.js';
import type { PeerTransport } from './transport/types.js';

/** Default interval between periodic reconciliations, in milliseconds. */
export const DEFAULT_SYNC_INTERVAL_MS = 10_000;

/**
 * Replicator configuration
 */
export interface ReplicatorConfig {
  ledger: Ledger;
  peers: PeerRegistry;
  transport: PeerTransport;
  /** Policy applied to a longer peer chain (default: 'trust-longest') */
  adoptionPolicy?: AdoptionPolicyName | AdoptionPolicy;
  /** Interval for {@link Replicator.start} in ms */
  syncInterval?: number;
  /** Logger options for structured logging */
  logger?: LoggerSetting;
}

/**
 * Outcome of a reconciliation
 */
export interface ReconcileResult {
  /** Whether the local chain was replaced */
  replaced: boolean;
  /** Local chain length afterwards */
  length: number;
  /** Peer whose chain was adopted or rejected */
  source?: string;
  message: string;
}

/**
 * Outcome of receiving a broadcast transaction
 */
export interface ReceiveResult extends SubmitResult {
  status: string;
}

/**
 * Replication events
 */
export type ReplicationEvent =
  | { type: 'broadcast:sent'; peer: string; itemId: string }
  | { type: 'broadcast:failed'; peer: string; itemId: string; error: string }
  | { type: 'transaction:received'; itemId: string; index: number }
  | { type: 'reconcile:peer-failed'; peer: string; error: string }
  | { type: 'reconcile:adopted'; source: string; previousLength: number; length: number }
  | { type: 'reconcile:rejected'; source: string; length: number }
  | { type: 'reconcile:up-to-date'; length: number };

interface Candidate {
  peer: string;
  chain: Block[];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Replicates one ledger with its peers.
 *
 * Broadcasts are fire-and-forget, one task per peer. Reconciliation fetches
 * every peer's chain concurrently and adopts the longest one that the
 * adoption policy accepts. Neither path holds the ledger lock while waiting
 * on the network.
 *
 * @example
 * ```typescript
 * const replicator = new Replicator({ ledger, peers, transport });
 * replicator.start();
 *
 * const result = await ledger.createItem(input);
 * replicator.broadcast(result.transaction);
 * ```
 */
export class Replicator {
  private readonly ledger: Ledger;
  private readonly peers: PeerRegistry;
  private readonly transport: PeerTransport;
  private readonly policy: AdoptionPolicy;
  private readonly syncInterval: number;
  private readonly logger: Logger;

  private readonly eventsSubject = new Subject<ReplicationEvent>();
  private readonly inFlight = new Set<Promise<void>>();
  private reconciling: Promise<ReconcileResult> | null = null;
  private intervalId: ReturnType<typeof setInterval> | null = null;

  constructor(config: ReplicatorConfig) {
    this.ledger = config.ledger;
    this.peers = config.peers;
    this.transport = config.transport;
    this.policy = resolveAdoptionPolicy(config.adoptionPolicy ?? 'trust-longest');
    this.syncInterval = config.syncInterval ?? DEFAULT_SYNC_INTERVAL_MS;
    this.logger = resolveLogger(config.logger, 'Replicator');
  }

  get events$(): Observable<ReplicationEvent> {
    return this.eventsSubject.asObservable();
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Send a transaction to every registered peer without waiting.
   * Failures are logged and dropped.
   */
  broadcast(transaction: Transaction): void {
    for (const peer of this.peers.list()) {
      const task = this.sendTo(peer, transaction).finally(() => {
        this.inFlight.delete(task);
      });
      this.inFlight.add(task);
    }
  }

  /**
   * Wait for every broadcast started so far to settle.
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /**
   * Seal a transaction broadcast by a peer into a local block.
   */
  async receive(transaction: unknown): Promise<ReceiveResult> {
    const result = await this.ledger.submitTransaction(transaction);

    this.logger.info('Transaction received', {
      itemId: result.transaction.item_id,
      index: result.block.index,
    });
    this.eventsSubject.next({
      type: 'transaction:received',
      itemId: result.transaction.item_id,
      index: result.block.index,
    });

    return { ...result, status: 'Transaction received' };
  }

  /**
   * Adopt the longest acceptable peer chain if it is longer than ours.
   * Concurrent calls share one run.
   */
  reconcile(): Promise<ReconcileResult> {
    if (!this.reconciling) {
      this.reconciling = this.runReconcile().finally(() => {
        this.reconciling = null;
      });
    }
    return this.reconciling;
  }

  /**
   * Reconcile on a fixed interval. Ticks that find a run in progress are skipped.
   */
  start(): void {
    if (this.intervalId) return;

    this.intervalId = setInterval(() => {
      if (this.reconciling) {
        this.logger.debug('Reconciliation still running, skipping tick');
        return;
      }
      this.reconcile().catch((error: unknown) => {
        // Will retry next interval
        this.logger.warn('Periodic reconciliation failed', { error: describeError(error) });
      });
    }, this.syncInterval);

    this.logger.info('Periodic reconciliation started', { interval: this.syncInterval });
  }

  /**
   * Stop periodic reconciliation.
   */
  stop(): void {
    if (!this.intervalId) return;

    clearInterval(this.intervalId);
    this.intervalId = null;
    this.logger.info('Periodic reconciliation stopped');
  }

  /**
   * Stop, wait for in-flight work, and complete the event stream.
   */
  async dispose(): Promise<void> {
    this.stop();
    await this.flush();
    if (this.reconciling) {
      await this.reconciling.catch((error: unknown) => {
        this.logger.warn('Reconciliation failed during shutdown', { error: describeError(error) });
      });
    }
    this.eventsSubject.complete();
  }

  private async sendTo(peer: string, transaction: Transaction): Promise<void> {
    try {
      await this.transport.sendTransaction(peer, transaction);
      this.logger.info('Broadcasted transaction', { peer, itemId: transaction.item_id });
      this.eventsSubject.next({ type: 'broadcast:sent', peer, itemId: transaction.item_id });
    } catch (error) {
      this.logger.warn('Broadcast failed', { peer, itemId: transaction.item_id, error: describeError(error) });
      this.eventsSubject.next({
        type: 'broadcast:failed',
        peer,
        itemId: transaction.item_id,
        error: describeError(error),
      });
    }
  }

  private async fetchCandidate(peer: string): Promise<Candidate | null> {
    try {
      const { chain } = await this.transport.fetchChain(peer);
      return { peer, chain };
    } catch (error) {
      this.logger.warn('Error syncing with peer', { peer, error: describeError(error) });
      this.eventsSubject.next({ type: 'reconcile:peer-failed', peer, error: describeError(error) });
      return null;
    }
  }

  private async runReconcile(): Promise<ReconcileResult> {
    const fetched = await Promise.all(this.peers.list().map((peer) => this.fetchCandidate(peer)));

    const local = this.ledger.getChain();
    const longer = fetched
      .filter((candidate): candidate is Candidate => candidate !== null && candidate.chain.length > local.length)
      // Stable: among equal lengths the first listed peer stays first
      .sort((a, b) => b.chain.length - a.chain.length);

    let rejected: Candidate | null = null;

    for (const candidate of longer) {
      if (!this.policy(candidate.chain, local)) {
        this.logger.warn('Longer chain rejected by adoption policy', {
          peer: candidate.peer,
          length: candidate.chain.length,
        });
        this.eventsSubject.next({
          type: 'reconcile:rejected',
          source: candidate.peer,
          length: candidate.chain.length,
        });
        if (!rejected) rejected = candidate;
        continue;
      }

      const adopted = await this.ledger.adoptChain(candidate.chain);
      if (!adopted) {
        break;
      }

      this.logger.info('Chain synchronized', {
        source: candidate.peer,
        previousLength: local.length,
        length: candidate.chain.length,
      });
      this.eventsSubject.next({
        type: 'reconcile:adopted',
        source: candidate.peer,
        previousLength: local.length,
        length: candidate.chain.length,
      });
      return {
        replaced: true,
        length: candidate.chain.length,
        source: candidate.peer,
        message: 'Chain synchronized',
      };
    }

    const length = this.ledger.getLength();

    if (rejected) {
      return {
        replaced: false,
        length,
        source: rejected.peer,
        message: 'Longer chain rejected by adoption policy',
      };
    }

    this.eventsSubject.next({ type: 'reconcile:up-to-date', length });
    return { replaced: false, length, message: 'Chain is up to date' };
  }
}
