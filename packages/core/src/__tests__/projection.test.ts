import { describe, it, expect } from 'vitest';
import { sealBlock } from '../hash.js';
import {
  applyBlock,
  buildItemHistory,
  cloneProjectionState,
  createProjectionState,
  projectChain,
  sortItems,
} from '../projection.js';
import {
  GENESIS_MESSAGE,
  GENESIS_PREVIOUS_HASH,
  type Block,
  type CreationTransaction,
  type ItemRecord,
  type Transaction,
  type TransferTransaction,
} from '../types.js';

function creation(itemId: string, actor: string, timestamp: string): CreationTransaction {
  return {
    type: 'creation',
    item_id: itemId,
    description: `${itemId} description`,
    actor,
    location: 'Locker 1',
    item_type: 'physical',
    content_hash: `hash-${itemId}`,
    action: 'Created',
    timestamp,
    node: 'node-a',
  };
}

function transfer(itemId: string, from: string, to: string, timestamp: string): TransferTransaction {
  return {
    type: 'transfer',
    item_id: itemId,
    from_actor: from,
    to_actor: to,
    reason: 'analysis',
    action: 'Transferred',
    timestamp,
    node: 'node-a',
  };
}

function chainOf(...payloads: Transaction[][]): Block[] {
  const genesis = sealBlock({
    index: 0,
    timestamp: 1000,
    payload: { type: 'genesis', message: GENESIS_MESSAGE, node: 'node-a' },
    previous_hash: GENESIS_PREVIOUS_HASH,
    nonce: 0,
  });
  const chain = [genesis];
  payloads.forEach((payload, i) => {
    chain.push(
      sealBlock({
        index: i + 1,
        timestamp: 1000 + i + 1,
        payload,
        previous_hash: chain[i]!.hash,
        nonce: 0,
      }),
    );
  });
  return chain;
}

describe('projection', () => {
  it('should follow an item through creation and transfer', () => {
    const chain = chainOf(
      [creation('EV-1', 'A', '2024-01-01T00:00:00.000Z')],
      [transfer('EV-1', 'A', 'B', '2024-01-02T00:00:00.000Z')],
    );

    const state = projectChain(chain);
    const item = state.items.get('EV-1');

    expect(item).toMatchObject({
      custodian: 'B',
      created_by: 'A',
      created_at: '2024-01-01T00:00:00.000Z',
      last_action: 'Transferred',
      last_updated: '2024-01-02T00:00:00.000Z',
      block_index: 1,
      content_hash: 'hash-EV-1',
    });
    expect(state.transfers).toEqual([
      {
        id: 1,
        item_id: 'EV-1',
        from_actor: 'A',
        to_actor: 'B',
        reason: 'analysis',
        timestamp: '2024-01-02T00:00:00.000Z',
        block_index: 2,
        node: 'node-a',
      },
    ]);
  });

  it('should ignore the genesis block', () => {
    const state = projectChain(chainOf());
    expect(state.items.size).toBe(0);
    expect(state.transfers).toHaveLength(0);
  });

  it('should log a transfer of an unknown item without creating it', () => {
    const state = projectChain(chainOf([transfer('GHOST', 'A', 'B', '2024-01-01T00:00:00.000Z')]));
    expect(state.items.has('GHOST')).toBe(false);
    expect(state.transfers).toHaveLength(1);
    expect(state.transfers[0]!.item_id).toBe('GHOST');
  });

  it('should overwrite the item row on a second creation', () => {
    const chain = chainOf(
      [creation('EV-1', 'A', '2024-01-01T00:00:00.000Z')],
      [creation('EV-1', 'C', '2024-01-03T00:00:00.000Z')],
    );
    const item = projectChain(chain).items.get('EV-1');
    expect(item?.custodian).toBe('C');
    expect(item?.block_index).toBe(2);
  });

  it('should leave the original untouched when a clone is modified', () => {
    const chain = chainOf([creation('EV-1', 'A', '2024-01-01T00:00:00.000Z')]);
    const state = createProjectionState();
    const clone = cloneProjectionState(state);
    applyBlock(clone, chain[1]!);

    expect(state.items.size).toBe(0);
    expect(clone.items.size).toBe(1);
  });

  describe('sortItems', () => {
    it('should order newest first with ties broken by item id', () => {
      const state = projectChain(
        chainOf([
          creation('B', 'A', '2024-01-01T00:00:00.000Z'),
          creation('A', 'A', '2024-01-01T00:00:00.000Z'),
          creation('C', 'A', '2024-01-02T00:00:00.000Z'),
        ]),
      );
      expect(sortItems(state.items.values()).map((i: ItemRecord) => i.item_id)).toEqual(['C', 'A', 'B']);
    });
  });

  describe('buildItemHistory', () => {
    it('should list the creation then transfers by block and log order', () => {
      const chain = chainOf(
        [creation('EV-1', 'A', '2024-01-01T00:00:00.000Z')],
        [
          transfer('EV-1', 'A', 'B', '2024-01-02T00:00:00.000Z'),
          transfer('EV-1', 'B', 'C', '2024-01-03T00:00:00.000Z'),
        ],
      );
      const state = projectChain(chain);
      const history = buildItemHistory(
        state.items.get('EV-1') ?? null,
        state.transfers.filter((t) => t.item_id === 'EV-1'),
      );

      expect(history.map((h) => [h.block_index, h.action, h.actor])).toEqual([
        [1, 'Created', 'A'],
        [2, 'Transferred', 'B'],
        [2, 'Transferred', 'C'],
      ]);
      expect(history[0]!.transaction).toEqual(creation('EV-1', 'A', '2024-01-01T00:00:00.000Z'));
      expect(history[2]!.transaction).toEqual(transfer('EV-1', 'B', 'C', '2024-01-03T00:00:00.000Z'));
    });

    it('should return transfers only when the item row is missing', () => {
      const history = buildItemHistory(null, [
        {
          id: 4,
          item_id: 'X',
          from_actor: 'A',
          to_actor: 'B',
          reason: 'r',
          timestamp: 't',
          block_index: 3,
          node: 'n',
        },
      ]);
      expect(history).toHaveLength(1);
      expect(history[0]!.action).toBe('Transferred');
    });
  });
});
