import { ConnectionError, parseWith, type Transaction } from '@custody/core';
import {
  PEER_PATHS,
  chainResponseSchema,
  peersResponseSchema,
  pingResponseSchema,
  receiveResponseSchema,
  type ChainResponse,
  type PeerTransport,
  type PeersResponse,
  type PingResponse,
  type ReceiveResponse,
} from '@custody/replication';
import type { z } from 'zod';

import { parseArgs, resolveNodeConfig } from '../config.js';
import { createCustodyNode, type CustodyNode } from '../custody-node.js';
import type { LedgerRouter } from '../router.js';

/**
 * Peer transport that dispatches into another node's router in the same
 * process, with a JSON round trip on both legs.
 */
export class RouterTransport implements PeerTransport {
  private readonly routers = new Map<string, LedgerRouter>();

  attach(url: string, router: LedgerRouter): void {
    this.routers.set(url, router);
  }

  ping(peerUrl: string): Promise<PingResponse> {
    return this.call(peerUrl, PEER_PATHS.ping, 'GET', undefined, pingResponseSchema);
  }

  fetchChain(peerUrl: string): Promise<ChainResponse> {
    return this.call(peerUrl, PEER_PATHS.chain, 'GET', undefined, chainResponseSchema);
  }

  sendTransaction(peerUrl: string, transaction: Transaction): Promise<ReceiveResponse> {
    return this.call(peerUrl, PEER_PATHS.receive, 'POST', { transaction }, receiveResponseSchema);
  }

  registerWith(peerUrl: string, selfUrl: string): Promise<PeersResponse> {
    return this.call(peerUrl, PEER_PATHS.peers, 'POST', { peer_url: selfUrl }, peersResponseSchema);
  }

  private async call<T>(
    peerUrl: string,
    path: string,
    method: string,
    body: unknown,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const router = this.routers.get(peerUrl);
    if (!router) {
      throw new ConnectionError('LEDGER_C501', `connect ECONNREFUSED ${peerUrl}`, { url: peerUrl });
    }

    const response = await router.handle({ method, path, body: roundTrip(body) });
    if (response.status < 200 || response.status >= 300) {
      throw new ConnectionError('LEDGER_C500', `HTTP error: ${response.status}`, {
        statusCode: response.status,
        url: peerUrl,
      });
    }

    return parseWith(schema, roundTrip(response.body), 'LEDGER_V102');
  }
}

function roundTrip(value: unknown): unknown {
  if (value === undefined) return undefined;
  const parsed: unknown = JSON.parse(JSON.stringify(value));
  return parsed;
}

/**
 * Build an in-memory node reachable through `transport` at `url`.
 */
export async function createTestNode(
  transport: RouterTransport,
  url: string,
  nodeId: string,
): Promise<CustodyNode> {
  const config = resolveNodeConfig(
    parseArgs(['--node-id', nodeId, '--public-url', url, '--db', ':memory:']),
    {},
  );
  const node = await createCustodyNode(config, { transport });
  transport.attach(url, node.router);
  return node;
}

export const creation = {
  item_id: 'EV-1',
  description: 'Kitchen knife',
  actor: 'Officer A',
  location: 'Locker 12',
  item_type: 'physical',
};
