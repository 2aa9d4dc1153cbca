import {
  LedgerError,
  NotFoundError,
  ensureLedgerError,
  parseWith,
  resolveLogger,
  type Logger,
  type LoggerSetting,
} from '@custody/core';
import type { Ledger, SubmitResult } from '@custody/ledger';
import {
  PEER_PATHS,
  receiveRequestSchema,
  registerPeerRequestSchema,
  type PeerRegistry,
  type Replicator,
} from '@custody/replication';

/**
 * A request after the HTTP layer has parsed it
 */
export interface RouteRequest {
  method: string;
  path: string;
  body?: unknown;
}

/**
 * A JSON response
 */
export interface RouteResponse {
  status: number;
  body: unknown;
}

/**
 * Error response body
 */
export interface ErrorBody {
  error: { code: string; message: string };
}

/**
 * Router configuration
 */
export interface LedgerRouterConfig {
  ledger: Ledger;
  peers: PeerRegistry;
  replicator: Replicator;
  /** Logger options for structured logging */
  logger?: LoggerSetting;
}

interface ParsedRoute {
  pattern: string;
  params: Record<string, string>;
}

const ROUTES = [
  PEER_PATHS.ping,
  PEER_PATHS.chain,
  '/blocks',
  '/items',
  '/items/:id',
  '/items/:id/history',
  '/items/:id/transfers',
  '/transfers',
  '/transactions',
  PEER_PATHS.receive,
  PEER_PATHS.peers,
  '/peers/connect',
  '/sync',
  '/validate',
  '/stats',
] as const;

/**
 * HTTP status for an error.
 */
export function statusForError(error: LedgerError): number {
  if (error.code === 'LEDGER_N405') return 405;
  switch (error.category) {
    case 'validation':
      return 400;
    case 'not-found':
      return 404;
    default:
      return 500;
  }
}

/**
 * Build the `{error: {code, message}}` response for any thrown value.
 */
export function errorResponse(error: unknown): RouteResponse {
  const ledgerError = ensureLedgerError(error);
  const body: ErrorBody = { error: { code: ledgerError.code, message: ledgerError.message } };
  return { status: statusForError(ledgerError), body };
}

function matchPattern(pathname: string, pattern: string): Record<string, string> | null {
  const pathParts = pathname.split('/').filter(Boolean);
  const patternParts = pattern.split('/').filter(Boolean);

  if (pathParts.length !== patternParts.length) {
    return null;
  }

  const params: Record<string, string> = {};

  for (let i = 0; i < patternParts.length; i++) {
    const patternPart = patternParts[i]!;
    const pathPart = pathParts[i]!;

    if (patternPart.startsWith(':')) {
      params[patternPart.slice(1)] = decodeURIComponent(pathPart);
    } else if (patternPart !== pathPart) {
      return null;
    }
  }

  return params;
}

function matchRoute(pathname: string): ParsedRoute | null {
  for (const pattern of ROUTES) {
    const params = matchPattern(pathname, pattern);
    if (params) {
      return { pattern, params };
    }
  }
  return null;
}

function methodNotAllowed(method: string, path: string): NotFoundError {
  return new NotFoundError('LEDGER_N405', `Method ${method} not allowed on ${path}`, { method, path });
}

/**
 * Maps the node's HTTP+JSON surface onto a ledger, its peer registry and
 * its replicator. Independent of `node:http`, so tests and in-process peers
 * can call {@link LedgerRouter.handle} directly.
 *
 * ## Routes
 *
 * | Method | Path | Description |
 * |--------|------|-------------|
 * | GET | /ping | Liveness |
 * | GET | /chain | Full chain |
 * | GET | /blocks | All blocks |
 * | GET | /items | All items |
 * | POST | /items | Create an item |
 * | GET | /items/:id | One item |
 * | GET | /items/:id/history | Custody history |
 * | GET | /items/:id/transfers | Transfer rows |
 * | POST | /transfers | Transfer an item |
 * | POST | /transactions | Submit a complete transaction |
 * | POST | /transactions/receive | Peer broadcast delivery |
 * | GET | /peers | Known peers |
 * | POST | /peers | Register a peer |
 * | POST | /peers/connect | Ping and register a peer |
 * | POST | /sync | Reconcile with peers |
 * | GET | /validate | Chain integrity |
 * | GET | /stats | Store statistics |
 */
export class LedgerRouter {
  private readonly ledger: Ledger;
  private readonly peers: PeerRegistry;
  private readonly replicator: Replicator;
  private readonly logger: Logger;

  constructor(config: LedgerRouterConfig) {
    this.ledger = config.ledger;
    this.peers = config.peers;
    this.replicator = config.replicator;
    this.logger = resolveLogger(config.logger, 'Router');
  }

  /**
   * Handle one request. Never rejects; failures become error responses.
   */
  async handle(request: RouteRequest): Promise<RouteResponse> {
    try {
      return await this.route(request);
    } catch (error) {
      const response = errorResponse(error);
      if (response.status >= 500) {
        this.logger.error(
          'Request failed',
          error instanceof Error ? error : undefined,
          { method: request.method, path: request.path },
        );
      } else {
        this.logger.debug('Request rejected', {
          method: request.method,
          path: request.path,
          status: response.status,
        });
      }
      return response;
    }
  }

  private async route(request: RouteRequest): Promise<RouteResponse> {
    const method = request.method.toUpperCase();
    const route = matchRoute(request.path);
    if (!route) {
      throw new NotFoundError('LEDGER_N400', `No route for ${request.path}`, { path: request.path });
    }

    const itemId = route.params.id ?? '';
    const allow = (allowed: string): void => {
      if (method !== allowed) throw methodNotAllowed(method, request.path);
    };

    switch (route.pattern) {
      case '/ping':
        allow('GET');
        return ok({ status: 'online', node_id: this.ledger.nodeId });

      case '/chain': {
        allow('GET');
        const chain = this.ledger.getChain();
        return ok({ length: chain.length, chain });
      }

      case '/blocks': {
        allow('GET');
        const blocks = this.ledger.getChain();
        return ok({ blocks, count: blocks.length });
      }

      case '/items': {
        if (method === 'POST') {
          return this.localWrite(await this.ledger.createItem(request.body));
        }
        allow('GET');
        const items = await this.ledger.getAllItems();
        return ok({ items, count: items.length });
      }

      case '/items/:id': {
        allow('GET');
        const item = await this.ledger.getItem(itemId);
        if (!item) {
          throw new NotFoundError('LEDGER_N401', `Item not found: ${itemId}`, { itemId });
        }
        return ok(item);
      }

      case '/items/:id/history':
        allow('GET');
        return ok({ item_id: itemId, history: await this.ledger.getItemHistory(itemId) });

      case '/items/:id/transfers':
        allow('GET');
        return ok({ item_id: itemId, transfers: await this.ledger.getTransfers(itemId) });

      case '/transfers':
        allow('POST');
        return this.localWrite(await this.ledger.transferItem(request.body));

      case '/transactions':
        allow('POST');
        return this.localWrite(await this.ledger.submitTransaction(request.body));

      case '/transactions/receive': {
        allow('POST');
        const { transaction } = parseWith(receiveRequestSchema, request.body, 'LEDGER_V101');
        const { status } = await this.replicator.receive(transaction);
        return ok({ status });
      }

      case '/peers': {
        if (method === 'POST') {
          const { peer_url: peerUrl } = parseWith(registerPeerRequestSchema, request.body);
          this.peers.register(peerUrl);
          return ok({ peers: this.peers.list() });
        }
        allow('GET');
        const peers = this.peers.list();
        return ok({ peers, count: peers.length });
      }

      case '/peers/connect': {
        allow('POST');
        const { peer_url: peerUrl } = parseWith(registerPeerRequestSchema, request.body);
        const { connected, message } = await this.peers.connect(peerUrl);
        return ok({ connected, message, peers: this.peers.list() });
      }

      case '/sync': {
        allow('POST');
        const result = await this.replicator.reconcile();
        if (result.replaced) {
          return ok({ message: result.message, new_length: result.length });
        }
        return ok({ message: result.message });
      }

      case '/validate':
        allow('GET');
        return ok({ valid: this.ledger.validateChain(), chain_length: this.ledger.getLength() });

      case '/stats': {
        allow('GET');
        const stats = await this.ledger.getStats();
        return ok({
          node_id: this.ledger.nodeId,
          chain_length: this.ledger.getLength(),
          peers: this.peers.size,
          ...stats,
        });
      }

      default:
        throw new NotFoundError('LEDGER_N400', `No route for ${request.path}`, { path: request.path });
    }
  }

  private localWrite(result: SubmitResult): RouteResponse {
    this.replicator.broadcast(result.transaction);
    return { status: 201, body: result };
  }
}

function ok(body: unknown): RouteResponse {
  return { status: 200, body };
}

/**
 * Creates a router over a node's components.
 */
export function createLedgerRouter(config: LedgerRouterConfig): LedgerRouter {
  return new LedgerRouter(config);
}
