/**
 * @custody/server - HTTP+JSON surface of a custody ledger node
 *
 * @example
 * ```typescript
 * import { createCustodyNode, parseArgs, resolveNodeConfig } from '@custody/server';
 *
 * const config = resolveNodeConfig(parseArgs(['--node-id', 'node-a']));
 * const node = await createCustodyNode(config);
 * await node.start();
 * ```
 *
 * @module @custody/server
 */

export * from './config.js';
export * from './custody-node.js';
export * from './node-server.js';
export * from './router.js';
