/**
 * Zod schemas for everything that crosses a boundary: caller input,
 * transactions broadcast by peers, and blocks fetched from peers.
 *
 * @module @custody/core/schemas
 */

import { z } from 'zod';

import { ValidationError, type ErrorCode, type FieldValidationError } from './errors/index.js';
import type { Block, GenesisPayload, Transaction } from './types.js';

const requiredText = z.string().min(1, 'Required');

/**
 * Caller fields for creating an item.
 */
export const createItemInputSchema = z.object({
  item_id: requiredText,
  description: requiredText,
  actor: requiredText,
  location: requiredText,
  item_type: requiredText,
  content_hash: z.string().optional(),
});

/**
 * Caller fields for transferring an item.
 */
export const transferItemInputSchema = z.object({
  item_id: requiredText,
  from_actor: requiredText,
  to_actor: requiredText,
  reason: requiredText,
});

export type CreateItemInput = z.infer<typeof createItemInputSchema>;
export type TransferItemInput = z.infer<typeof transferItemInputSchema>;

const creationTransactionSchema = z.object({
  type: z.literal('creation'),
  item_id: requiredText,
  description: requiredText,
  actor: requiredText,
  location: requiredText,
  item_type: requiredText,
  content_hash: z.string(),
  action: z.literal('Created'),
  timestamp: requiredText,
  node: z.string(),
});

const transferTransactionSchema = z.object({
  type: z.literal('transfer'),
  item_id: requiredText,
  from_actor: requiredText,
  to_actor: requiredText,
  reason: requiredText,
  action: z.literal('Transferred'),
  timestamp: requiredText,
  node: z.string(),
});

/**
 * A complete custody transaction.
 */
export const transactionSchema: z.ZodType<Transaction> = z.discriminatedUnion('type', [
  creationTransactionSchema,
  transferTransactionSchema,
]);

const genesisPayloadSchema: z.ZodType<GenesisPayload> = z.object({
  type: z.literal('genesis'),
  message: z.string(),
  node: z.string(),
});

/**
 * A block in its wire representation.
 */
export const blockSchema: z.ZodType<Block> = z.object({
  index: z.number().int().nonnegative(),
  timestamp: z.number(),
  payload: z.union([genesisPayloadSchema, z.array(transactionSchema)]),
  previous_hash: z.string(),
  nonce: z.number().int(),
  hash: z.string(),
});

/**
 * An ordered sequence of blocks.
 */
export const chainSchema = z.array(blockSchema);

/**
 * Convert zod issues into field errors.
 */
export function toFieldErrors(error: z.ZodError): FieldValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse a value or throw a {@link ValidationError} carrying every field issue.
 *
 * @example
 * ```typescript
 * const tx = parseWith(transactionSchema, body.transaction, 'LEDGER_V101');
 * ```
 */
export function parseWith<T>(
  schema: z.ZodType<T>,
  data: unknown,
  code: ErrorCode = 'LEDGER_V100',
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error), code);
  }
  return result.data;
}
