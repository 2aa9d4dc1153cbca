import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { CustodyNode } from '../custody-node.js';
import { errorResponse } from '../router.js';
import { RouterTransport, createTestNode, creation } from './helpers.js';

const A = 'http://node-a:5000';
const B = 'http://node-b:5000';

describe('LedgerRouter', () => {
  let transport: RouterTransport;
  let a: CustodyNode;

  beforeEach(async () => {
    transport = new RouterTransport();
    a = await createTestNode(transport, A, 'node-a');
  });

  afterEach(async () => {
    await a.stop();
  });

  describe('reads', () => {
    it('should answer a ping', async () => {
      expect(await a.router.handle({ method: 'GET', path: '/ping' })).toEqual({
        status: 200,
        body: { status: 'online', node_id: 'node-a' },
      });
    });

    it('should return the chain and its blocks', async () => {
      const chain = await a.router.handle({ method: 'GET', path: '/chain' });
      const blocks = await a.router.handle({ method: 'GET', path: '/blocks' });

      expect(chain.body).toEqual({ length: 1, chain: a.ledger.getChain() });
      expect(blocks.body).toEqual({ blocks: a.ledger.getChain(), count: 1 });
    });

    it('should report a valid chain', async () => {
      expect((await a.router.handle({ method: 'GET', path: '/validate' })).body).toEqual({
        valid: true,
        chain_length: 1,
      });
    });

    it('should report stats', async () => {
      await a.ledger.createItem(creation);

      expect((await a.router.handle({ method: 'GET', path: '/stats' })).body).toEqual({
        node_id: 'node-a',
        chain_length: 2,
        peers: 0,
        blocks: 2,
        items: 1,
        transfers: 0,
        nodes: { 'node-a': 2 },
        location: ':memory:',
      });
    });
  });

  describe('custody writes', () => {
    it('should create an item and expose it', async () => {
      const created = await a.router.handle({ method: 'POST', path: '/items', body: creation });

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ block: { index: 1 }, transaction: { item_id: 'EV-1', node: 'node-a' } });

      const item = await a.router.handle({ method: 'GET', path: '/items/EV-1' });
      expect(item.status).toBe(200);
      expect(item.body).toMatchObject({ item_id: 'EV-1', custodian: 'Officer A', last_action: 'Created' });

      const all = await a.router.handle({ method: 'GET', path: '/items' });
      expect(all.body).toMatchObject({ count: 1 });
    });

    it('should record a transfer with its history', async () => {
      await a.router.handle({ method: 'POST', path: '/items', body: creation });
      const transfer = await a.router.handle({
        method: 'POST',
        path: '/transfers',
        body: { item_id: 'EV-1', from_actor: 'Officer A', to_actor: 'Lab B', reason: 'analysis' },
      });

      expect(transfer.status).toBe(201);
      expect((await a.router.handle({ method: 'GET', path: '/items/EV-1' })).body).toMatchObject({
        custodian: 'Lab B',
        last_action: 'Transferred',
      });

      const history = await a.router.handle({ method: 'GET', path: '/items/EV-1/history' });
      expect(history.body).toMatchObject({
        item_id: 'EV-1',
        history: [{ action: 'Created' }, { action: 'Transferred', actor: 'Lab B' }],
      });

      const transfers = await a.router.handle({ method: 'GET', path: '/items/EV-1/transfers' });
      expect(transfers.body).toMatchObject({
        item_id: 'EV-1',
        transfers: [{ id: 1, from_actor: 'Officer A', to_actor: 'Lab B', block_index: 2 }],
      });
    });

    it('should accept a complete transaction', async () => {
      const submitted = await a.router.handle({
        method: 'POST',
        path: '/transactions',
        body: {
          type: 'transfer',
          item_id: 'EV-9',
          from_actor: 'A',
          to_actor: 'B',
          reason: 'court',
          action: 'Transferred',
          timestamp: '2024-01-01T00:00:00.000Z',
          node: 'node-z',
        },
      });

      expect(submitted.status).toBe(201);
      expect(a.ledger.getLength()).toBe(2);
    });

    it('should return an empty history for an unknown item', async () => {
      expect((await a.router.handle({ method: 'GET', path: '/items/NOPE/history' })).body).toEqual({
        item_id: 'NOPE',
        history: [],
      });
    });

    it('should decode item ids in the path', async () => {
      await a.ledger.createItem({ ...creation, item_id: 'EV 1/2' });

      const item = await a.router.handle({ method: 'GET', path: '/items/EV%201%2F2' });
      expect(item.body).toMatchObject({ item_id: 'EV 1/2' });
    });
  });

  describe('errors', () => {
    it('should reject malformed input without sealing', async () => {
      const response = await a.router.handle({ method: 'POST', path: '/items', body: { item_id: 'EV-1' } });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: { code: 'LEDGER_V100' } });
      expect(a.ledger.getLength()).toBe(1);
    });

    it('should return 404 for an unknown item', async () => {
      expect(await a.router.handle({ method: 'GET', path: '/items/NOPE' })).toEqual({
        status: 404,
        body: { error: { code: 'LEDGER_N401', message: 'Item not found: NOPE' } },
      });
    });

    it('should return 404 for an unknown route', async () => {
      expect(await a.router.handle({ method: 'GET', path: '/nowhere' })).toEqual({
        status: 404,
        body: { error: { code: 'LEDGER_N400', message: 'No route for /nowhere' } },
      });
    });

    it('should return 405 for a wrong method', async () => {
      expect(await a.router.handle({ method: 'DELETE', path: '/chain' })).toEqual({
        status: 405,
        body: { error: { code: 'LEDGER_N405', message: 'Method DELETE not allowed on /chain' } },
      });
    });

    it('should map unexpected errors to 500', () => {
      expect(errorResponse(new Error('disk on fire'))).toEqual({
        status: 500,
        body: { error: { code: 'LEDGER_X900', message: 'disk on fire' } },
      });
    });

    it('should reject a malformed broadcast', async () => {
      const response = await a.router.handle({
        method: 'POST',
        path: '/transactions/receive',
        body: { transaction: { type: 'creation' } },
      });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: { code: 'LEDGER_V101' } });
    });
  });

  describe('peers', () => {
    it('should register and list peers', async () => {
      expect(
        (await a.router.handle({ method: 'POST', path: '/peers', body: { peer_url: `${B}/` } })).body,
      ).toEqual({ peers: [B] });
      expect((await a.router.handle({ method: 'GET', path: '/peers' })).body).toEqual({ peers: [B], count: 1 });
    });

    it('should reject a registration without a URL', async () => {
      const response = await a.router.handle({ method: 'POST', path: '/peers', body: {} });
      expect(response.status).toBe(400);
    });

    it('should report an unreachable peer on connect', async () => {
      expect((await a.router.handle({ method: 'POST', path: '/peers/connect', body: { peer_url: B } })).body).toEqual({
        connected: false,
        message: `Failed to connect to ${B}: connect ECONNREFUSED ${B}`,
        peers: [],
      });
    });
  });

  describe('replication between two nodes', () => {
    let b: CustodyNode;

    beforeEach(async () => {
      b = await createTestNode(transport, B, 'node-b');
    });

    afterEach(async () => {
      await b.stop();
    });

    it('should connect both ways', async () => {
      const response = await a.router.handle({ method: 'POST', path: '/peers/connect', body: { peer_url: B } });

      expect(response.body).toEqual({ connected: true, message: `Connected to node-b at ${B}`, peers: [B] });
      expect(b.peers.list()).toEqual([A]);
    });

    it('should broadcast local writes to peers', async () => {
      await a.router.handle({ method: 'POST', path: '/peers/connect', body: { peer_url: B } });

      await a.router.handle({ method: 'POST', path: '/items', body: creation });
      await a.replicator.flush();

      expect(b.ledger.getLength()).toBe(2);
      expect((await b.router.handle({ method: 'GET', path: '/items/EV-1' })).body).toMatchObject({
        custodian: 'Officer A',
        node: 'node-a',
      });
    });

    it('should not rebroadcast received transactions', async () => {
      await a.router.handle({ method: 'POST', path: '/peers/connect', body: { peer_url: B } });

      await a.router.handle({ method: 'POST', path: '/items', body: creation });
      await a.replicator.flush();
      await b.replicator.flush();

      expect(a.ledger.getLength()).toBe(2);
      expect(b.ledger.getLength()).toBe(2);
    });

    it('should converge on the longer chain through /sync', async () => {
      await a.router.handle({ method: 'POST', path: '/peers/connect', body: { peer_url: B } });
      await b.ledger.createItem({ ...creation, item_id: 'EV-2' });
      await b.ledger.createItem({ ...creation, item_id: 'EV-3' });

      expect((await a.router.handle({ method: 'POST', path: '/sync' })).body).toEqual({
        message: 'Chain synchronized',
        new_length: 3,
      });
      expect(a.ledger.getChain()).toEqual(b.ledger.getChain());
      expect((await a.router.handle({ method: 'GET', path: '/items' })).body).toMatchObject({ count: 2 });

      expect((await b.router.handle({ method: 'POST', path: '/sync' })).body).toEqual({
        message: 'Chain is up to date',
      });
    });
  });
});
