/**
 * Ledger Error Codes
 *
 * Error codes are structured as LEDGER_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - N: Not-found errors (N400-N499)
 * - S: Storage errors (S300-S399)
 * - C: Connection/peer errors (C500-C599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  LEDGER_V100: {
    code: 'LEDGER_V100',
    message: 'Validation failed',
    suggestion: 'Check the field errors for the specific issues.',
  },
  LEDGER_V101: {
    code: 'LEDGER_V101',
    message: 'Malformed transaction',
    suggestion:
      'A creation needs item_id, description, actor, location and item_type; a transfer needs item_id, from_actor, to_actor and reason.',
  },
  LEDGER_V102: {
    code: 'LEDGER_V102',
    message: 'Malformed block',
    suggestion: 'Blocks carry exactly index, timestamp, payload, previous_hash, nonce and hash.',
  },
  LEDGER_V103: {
    code: 'LEDGER_V103',
    message: 'Invalid request body',
    suggestion: 'Send a JSON object body with Content-Type: application/json.',
  },
  LEDGER_V104: {
    code: 'LEDGER_V104',
    message: 'Invalid configuration',
    suggestion: 'Check the CLI flags and CUSTODY_* environment variables.',
  },

  // Storage errors (S300-S399)
  LEDGER_S300: {
    code: 'LEDGER_S300',
    message: 'Storage operation failed',
    suggestion: 'The write was rolled back. Check disk space and database permissions.',
  },
  LEDGER_S301: {
    code: 'LEDGER_S301',
    message: 'Store not initialized',
    suggestion: 'Call initialize() on the store before using it.',
  },
  LEDGER_S302: {
    code: 'LEDGER_S302',
    message: 'Storage driver unavailable',
    suggestion: 'Install sql.js, or run the node with the in-memory store.',
  },

  // Not-found errors (N400-N499)
  LEDGER_N400: {
    code: 'LEDGER_N400',
    message: 'Resource not found',
    suggestion: 'Check the path of the request.',
  },
  LEDGER_N401: {
    code: 'LEDGER_N401',
    message: 'Item not found',
    suggestion: 'The item id has no creation recorded on this node.',
  },
  LEDGER_N405: {
    code: 'LEDGER_N405',
    message: 'Method not allowed',
    suggestion: 'Check the HTTP method for this path.',
  },

  // Connection errors (C500-C599)
  LEDGER_C500: {
    code: 'LEDGER_C500',
    message: 'Peer request failed',
    suggestion: 'The peer answered with an error status.',
  },
  LEDGER_C501: {
    code: 'LEDGER_C501',
    message: 'Peer unreachable',
    suggestion: 'Check the peer URL and that the peer node is running.',
  },
  LEDGER_C504: {
    code: 'LEDGER_C504',
    message: 'Peer request timed out',
    suggestion: 'Increase the peer timeout or check network latency.',
  },

  // Internal errors (X900-X999)
  LEDGER_X900: {
    code: 'LEDGER_X900',
    message: 'Internal error',
    suggestion: 'This is unexpected. Check the node logs.',
  },
  LEDGER_X901: {
    code: 'LEDGER_X901',
    message: 'Ledger closed',
    suggestion: 'The ledger was closed; open a new one.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'validation' | 'not-found' | 'storage' | 'connection' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(7);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'N':
      return 'not-found';
    case 'S':
      return 'storage';
    case 'C':
      return 'connection';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
