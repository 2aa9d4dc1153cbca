/**
 * Ledger Error System
 *
 * This module provides structured error handling with:
 * - Unique error codes (LEDGER_V101, LEDGER_S300, etc.)
 * - Helpful suggestions for resolution
 * - Error categorization
 * - Proper error chaining
 *
 * @example
 * ```typescript
 * import { LedgerError, StorageError } from '@custody/core';
 *
 * try {
 *   await ledger.createItem(input);
 * } catch (error) {
 *   if (LedgerError.isCode(error, 'LEDGER_V101')) {
 *     console.log('Malformed transaction');
 *   } else if (LedgerError.isCategory(error, 'storage')) {
 *     console.log('Write rolled back:', error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ConnectionError,
  LedgerError,
  NotFoundError,
  StorageError,
  ValidationError,
  ensureLedgerError,
  type FieldValidationError,
  type LedgerErrorOptions,
  type SerializedLedgerError,
} from './ledger-error.js';
