import { ConnectionError, type Transaction } from '@custody/core';
import { createLedger, type Ledger } from '@custody/ledger';
import { createMemoryStore } from '@custody/storage-memory';

import type { AdoptionPolicy, AdoptionPolicyName } from '../adoption-policy.js';
import { PeerRegistry } from '../peer-registry.js';
import { Replicator } from '../replicator.js';
import type {
  ChainResponse,
  PeerTransport,
  PeersResponse,
  PingResponse,
  ReceiveResponse,
} from '../transport/types.js';

export interface TestNode {
  url: string;
  ledger: Ledger;
  peers: PeerRegistry;
  replicator: Replicator;
}

/**
 * Transport that calls straight into other nodes in the same process.
 * URLs that are not attached, or are marked offline, are unreachable.
 */
export class InProcessTransport implements PeerTransport {
  private readonly nodes = new Map<string, TestNode>();
  readonly offline = new Set<string>();

  attach(node: TestNode): void {
    this.nodes.set(node.url, node);
  }

  async ping(peerUrl: string): Promise<PingResponse> {
    const node = this.resolve(peerUrl);
    return { status: 'online', node_id: node.ledger.nodeId };
  }

  async fetchChain(peerUrl: string): Promise<ChainResponse> {
    const chain = structuredClone(this.resolve(peerUrl).ledger.getChain());
    return { length: chain.length, chain };
  }

  async sendTransaction(peerUrl: string, transaction: Transaction): Promise<ReceiveResponse> {
    const { status } = await this.resolve(peerUrl).replicator.receive(structuredClone(transaction));
    return { status };
  }

  async registerWith(peerUrl: string, selfUrl: string): Promise<PeersResponse> {
    const node = this.resolve(peerUrl);
    node.peers.register(selfUrl);
    return { peers: node.peers.list() };
  }

  private resolve(peerUrl: string): TestNode {
    const node = this.nodes.get(peerUrl);
    if (!node || this.offline.has(peerUrl)) {
      throw new ConnectionError('LEDGER_C501', `connect ECONNREFUSED ${peerUrl}`, { url: peerUrl });
    }
    return node;
  }
}

export async function createTestNode(
  transport: InProcessTransport,
  url: string,
  nodeId: string,
  adoptionPolicy?: AdoptionPolicyName | AdoptionPolicy,
): Promise<TestNode> {
  const ledger = await createLedger({ nodeId, store: createMemoryStore() });
  const peers = new PeerRegistry({ transport, selfUrl: url });
  const replicator = new Replicator({ ledger, peers, transport, adoptionPolicy });
  const node = { url, ledger, peers, replicator };
  transport.attach(node);
  return node;
}

/**
 * Grow a node's chain to `length` blocks with one creation per block.
 */
export async function growTo(node: TestNode, length: number): Promise<void> {
  while (node.ledger.getLength() < length) {
    const n = node.ledger.getLength();
    await node.ledger.createItem({
      item_id: `${node.ledger.nodeId}-${n}`,
      description: `item ${n}`,
      actor: 'Officer A',
      location: 'Locker 1',
      item_type: 'physical',
    });
  }
}
