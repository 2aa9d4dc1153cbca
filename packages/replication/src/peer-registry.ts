import {
  ValidationError,
  resolveLogger,
  type Logger,
  type LoggerSetting,
} from '@custody/core';
import { BehaviorSubject, type Observable } from 'rxjs';

import type { PeerTransport } from './transport/types.js';

/**
 * Peer registry configuration
 */
export interface PeerRegistryConfig {
  /** Transport used by {@link PeerRegistry.connect} */
  transport: PeerTransport;
  /** This node's public base URL; never registered as its own peer */
  selfUrl?: string;
  /** Logger options for structured logging */
  logger?: LoggerSetting;
}

/**
 * Outcome of {@link PeerRegistry.connect}
 */
export interface ConnectResult {
  connected: boolean;
  message: string;
  peer: string;
}

function trimPeerUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}

/**
 * Trim a peer URL and drop trailing slashes.
 *
 * @throws ValidationError if the result is not an http(s) URL
 */
export function normalizePeerUrl(url: string): string {
  const trimmed = trimPeerUrl(url);

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch (error) {
    throw new ValidationError([{ path: 'peer_url', message: `Invalid URL: ${url}` }], 'LEDGER_V100', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError([{ path: 'peer_url', message: `Unsupported protocol: ${parsed.protocol}` }]);
  }

  return trimmed;
}

/**
 * Known peer base URLs, in registration order.
 *
 * @example
 * ```typescript
 * const registry = new PeerRegistry({ transport, selfUrl: 'http://10.0.0.1:5000' });
 * await registry.connect('http://10.0.0.2:5000/');
 * registry.list(); // ['http://10.0.0.2:5000']
 * ```
 */
export class PeerRegistry {
  private readonly transport: PeerTransport;
  private readonly selfUrl: string | null;
  private readonly logger: Logger;
  private readonly peersSubject = new BehaviorSubject<string[]>([]);

  constructor(config: PeerRegistryConfig) {
    this.transport = config.transport;
    this.selfUrl = config.selfUrl ? normalizePeerUrl(config.selfUrl) : null;
    this.logger = resolveLogger(config.logger, 'PeerRegistry');
  }

  /**
   * Emits the peer list after every change
   */
  get peers$(): Observable<string[]> {
    return this.peersSubject.asObservable();
  }

  get size(): number {
    return this.peersSubject.getValue().length;
  }

  /**
   * Add a peer. Returns false when it is this node or already known.
   */
  register(url: string): boolean {
    const peer = normalizePeerUrl(url);
    if (peer === this.selfUrl || this.has(peer)) {
      return false;
    }

    this.peersSubject.next([...this.peersSubject.getValue(), peer]);
    this.logger.info('Added peer', { peer });
    return true;
  }

  /**
   * Ping a peer, add it, and register this node with it in return.
   * A failed ping leaves the registry unchanged.
   */
  async connect(url: string): Promise<ConnectResult> {
    const peer = normalizePeerUrl(url);

    if (peer === this.selfUrl) {
      return { connected: false, message: 'Cannot connect to self', peer };
    }

    if (this.has(peer)) {
      this.logger.info('Already connected', { peer });
      return { connected: true, message: `Already connected to ${peer}`, peer };
    }

    let nodeId: string;
    try {
      ({ node_id: nodeId } = await this.transport.ping(peer));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn('Failed to connect to peer', { peer, error: reason });
      return { connected: false, message: `Failed to connect to ${peer}: ${reason}`, peer };
    }

    this.register(peer);

    if (this.selfUrl) {
      try {
        await this.transport.registerWith(peer, this.selfUrl);
      } catch (error) {
        this.logger.warn('Peer did not accept registration', {
          peer,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.logger.info('Connected to peer', { peer, nodeId });
    return { connected: true, message: `Connected to ${nodeId} at ${peer}`, peer };
  }

  list(): string[] {
    return [...this.peersSubject.getValue()];
  }

  has(url: string): boolean {
    return this.peersSubject.getValue().includes(trimPeerUrl(url));
  }

  /**
   * Forget a peer. Returns whether it was known.
   */
  remove(url: string): boolean {
    const peer = normalizePeerUrl(url);
    const peers = this.peersSubject.getValue();
    if (!peers.includes(peer)) {
      return false;
    }

    this.peersSubject.next(peers.filter((p) => p !== peer));
    this.logger.info('Removed peer', { peer });
    return true;
  }

  /**
   * Complete the peer observable
   */
  dispose(): void {
    this.peersSubject.complete();
  }
}
