import { StorageError } from '@custody/core';
import { z } from 'zod';

import type { SQLiteRow } from './types.js';

export const blockRowSchema = z.object({
  index_num: z.number().int(),
  timestamp: z.number(),
  payload: z.string(),
  previous_hash: z.string(),
  nonce: z.number().int(),
  hash: z.string(),
  node_id: z.string(),
});

export const itemRowSchema = z.object({
  item_id: z.string(),
  description: z.string(),
  item_type: z.string(),
  custodian: z.string(),
  location: z.string(),
  created_by: z.string(),
  created_at: z.string(),
  last_action: z.enum(['Created', 'Transferred']),
  last_updated: z.string(),
  block_index: z.number().int(),
  content_hash: z.string(),
  node: z.string(),
});

export const transferRowSchema = z.object({
  id: z.number().int(),
  item_id: z.string(),
  from_actor: z.string(),
  to_actor: z.string(),
  reason: z.string(),
  timestamp: z.string(),
  block_index: z.number().int(),
  node: z.string(),
});

export const nodeInfoRowSchema = z.object({
  node_id: z.string(),
  chain_length: z.number().int(),
  last_active: z.number(),
});

export const countRowSchema = z.object({ count: z.number().int() });

export type BlockRow = z.infer<typeof blockRowSchema>;
export type ItemRow = z.infer<typeof itemRowSchema>;
export type TransferRow = z.infer<typeof transferRowSchema>;
export type NodeInfoRow = z.infer<typeof nodeInfoRowSchema>;

/**
 * Check a row read back from `table` against its schema.
 */
export function readRow<T>(schema: z.ZodType<T>, row: SQLiteRow, table: string): T {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new StorageError('LEDGER_S300', `Unreadable row in ${table}`, {
      table,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}
