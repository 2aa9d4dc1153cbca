/**
 * Hashing utilities for blocks and item content.
 *
 * Block hashes are SHA-256 over a canonical JSON form: object keys sorted
 * recursively, `undefined` members dropped, arrays kept in order. A block
 * that round-trips through JSON therefore hashes to the same value.
 */

import { createHash } from 'node:crypto';

import type { Block, BlockContent, BlockPayload, GenesisPayload, Transaction } from './types.js';

/**
 * Compute the SHA-256 hex digest of a string.
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Serialize a JSON-compatible value with object keys in sorted order.
 *
 * @example
 * ```typescript
 * canonicalize({ b: 1, a: [true, null] }); // '{"a":[true,null],"b":1}'
 * ```
 */
export function canonicalize(value: unknown): string {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return `[${items.map((item) => (item === undefined ? 'null' : canonicalize(item))).join(',')}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    const members = entries
      .filter(([, member]) => member !== undefined && typeof member !== 'function')
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([key, member]) => `${JSON.stringify(key)}:${canonicalize(member)}`);
    return `{${members.join(',')}}`;
  }

  if (value === undefined || typeof value === 'function') {
    return 'null';
  }

  return JSON.stringify(value);
}

/**
 * Compute a block's hash from the five hashed fields.
 * Any extra property on the argument (including `hash`) is ignored.
 */
export function computeBlockHash(content: BlockContent): string {
  return sha256(
    canonicalize({
      index: content.index,
      timestamp: content.timestamp,
      payload: content.payload,
      previous_hash: content.previous_hash,
      nonce: content.nonce,
    }),
  );
}

/**
 * Seal block content by attaching its hash.
 */
export function sealBlock(content: BlockContent): Block {
  return {
    index: content.index,
    timestamp: content.timestamp,
    payload: content.payload,
    previous_hash: content.previous_hash,
    nonce: content.nonce,
    hash: computeBlockHash(content),
  };
}

/**
 * Whether a block's stored hash matches its recomputed digest.
 */
export function verifyBlockHash(block: Block): boolean {
  return block.hash === computeBlockHash(block);
}

/**
 * Derive an item's content fingerprint when the caller supplies none.
 *
 * @param createdAt - Creation time in milliseconds.
 */
export function deriveContentHash(itemId: string, description: string, createdAt: number): string {
  return sha256(`${itemId}${description}${createdAt}`);
}

/**
 * Whether a payload is a transaction list (every block except genesis).
 */
export function isTransactionList(payload: BlockPayload): payload is readonly Transaction[] {
  return Array.isArray(payload);
}

/**
 * Whether a payload is the genesis marker.
 */
export function isGenesisPayload(payload: BlockPayload): payload is GenesisPayload {
  return !isTransactionList(payload);
}
