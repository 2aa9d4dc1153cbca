import { ConnectionError, LedgerError, parseWith, type Transaction } from '@custody/core';
import type { z } from 'zod';

import {
  DEFAULT_PEER_TIMEOUT_MS,
  PEER_PATHS,
  chainResponseSchema,
  peersResponseSchema,
  pingResponseSchema,
  receiveResponseSchema,
  type ChainResponse,
  type PeerTransport,
  type PeerTransportConfig,
  type PeersResponse,
  type PingResponse,
  type ReceiveResponse,
} from './types.js';

/**
 * HTTP+JSON transport between ledger nodes.
 *
 * Each call is a single request bounded by `timeout`; nothing is retried.
 *
 * ## API Endpoints
 *
 * - `GET /ping` - Liveness probe
 * - `GET /chain` - Full chain
 * - `POST /transactions/receive` - Broadcast delivery
 * - `POST /peers` - Peer registration
 *
 * @example
 * ```typescript
 * const transport = createHttpTransport({ timeout: 3000 });
 * const { chain } = await transport.fetchChain('http://10.0.0.2:5000');
 * ```
 */
export class HttpPeerTransport implements PeerTransport {
  private readonly config: Required<PeerTransportConfig>;

  constructor(config: PeerTransportConfig = {}) {
    this.config = {
      timeout: config.timeout ?? DEFAULT_PEER_TIMEOUT_MS,
    };
  }

  ping(peerUrl: string): Promise<PingResponse> {
    return this.request(peerUrl, PEER_PATHS.ping, 'GET', undefined, pingResponseSchema);
  }

  fetchChain(peerUrl: string): Promise<ChainResponse> {
    return this.request(peerUrl, PEER_PATHS.chain, 'GET', undefined, chainResponseSchema);
  }

  sendTransaction(peerUrl: string, transaction: Transaction): Promise<ReceiveResponse> {
    return this.request(peerUrl, PEER_PATHS.receive, 'POST', { transaction }, receiveResponseSchema);
  }

  registerWith(peerUrl: string, selfUrl: string): Promise<PeersResponse> {
    return this.request(peerUrl, PEER_PATHS.peers, 'POST', { peer_url: selfUrl }, peersResponseSchema);
  }

  private async request<T>(
    peerUrl: string,
    path: string,
    method: 'GET' | 'POST',
    body: unknown,
    schema: z.ZodType<T>,
  ): Promise<T> {
    // Plain concatenation keeps a path prefix such as `/node-b` in the peer URL
    const url = `${peerUrl.replace(/\/+$/, '')}${path}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await fetch(url, {
        method,
        headers: { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ConnectionError('LEDGER_C500', `HTTP error: ${response.status}`, {
          transport: 'http',
          statusCode: response.status,
          url,
        });
      }

      const payload: unknown = await response.json();
      return parseWith(schema, payload, 'LEDGER_V102');
    } catch (error) {
      throw this.toConnectionError(error, url);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private toConnectionError(error: unknown, url: string): LedgerError {
    if (LedgerError.isLedgerError(error)) {
      return error;
    }

    if (error instanceof Error && error.name === 'AbortError') {
      return new ConnectionError(
        'LEDGER_C504',
        'Request timeout',
        { transport: 'http', timeout: this.config.timeout, url },
        error,
      );
    }

    return new ConnectionError(
      'LEDGER_C501',
      error instanceof Error ? error.message : String(error),
      { transport: 'http', url },
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Creates an HTTP peer transport.
 */
export function createHttpTransport(config?: PeerTransportConfig): HttpPeerTransport {
  return new HttpPeerTransport(config);
}
