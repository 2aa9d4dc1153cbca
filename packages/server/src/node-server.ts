import * as http from 'node:http';

import { ValidationError, resolveLogger, type Logger, type LoggerSetting } from '@custody/core';

import { errorResponse, type LedgerRouter, type RouteResponse } from './router.js';

/**
 * HTTP server configuration
 */
export interface NodeServerConfig {
  router: LedgerRouter;
  port: number;
  host: string;
  /** Logger options for structured logging */
  logger?: LoggerSetting;
}

/**
 * Serves a {@link LedgerRouter} over `node:http`.
 *
 * @example
 * ```typescript
 * const server = new NodeServer({ router, port: 5000, host: '0.0.0.0' });
 * await server.start();
 * // Later...
 * await server.stop();
 * ```
 */
export class NodeServer {
  private readonly config: NodeServerConfig;
  private readonly logger: Logger;
  private server: http.Server | null = null;

  constructor(config: NodeServerConfig) {
    this.config = config;
    this.logger = resolveLogger(config.logger, 'NodeServer');
  }

  /**
   * Whether the server is currently running.
   */
  get isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Start listening.
   */
  async start(): Promise<void> {
    if (this.server) return;

    return new Promise<void>((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.logger.error('Unhandled request failure', error instanceof Error ? error : undefined);
          if (!res.headersSent) {
            sendJson(res, errorResponse(error));
          }
        });
      });

      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        this.server = server;
        this.logger.info('Listening', { host: this.config.host, port: this.config.port });
        resolve();
      });
    });
  }

  /**
   * Stop listening and close open connections.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
      server.closeAllConnections();
    });
    this.server = null;
    this.logger.info('Stopped');
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    let body: unknown;
    try {
      body = method === 'POST' ? await readBody(req) : undefined;
    } catch (error) {
      sendJson(res, errorResponse(error));
      return;
    }

    const response = await this.config.router.handle({ method, path: url.pathname, body });
    this.logger.debug('Request', { method, path: url.pathname, status: response.status });
    sendJson(res, response);
  }
}

/**
 * Read and parse a JSON request body. An empty body reads as `{}`.
 */
export async function readBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  const raw = Buffer.concat(chunks).toString('utf-8');
  if (raw.length === 0) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ValidationError([{ path: '', message: 'Invalid JSON body' }], 'LEDGER_V103', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function sendJson(res: http.ServerResponse, response: RouteResponse): void {
  res.writeHead(response.status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(response.body));
}

/**
 * Creates an HTTP server for a router.
 */
export function createNodeServer(config: NodeServerConfig): NodeServer {
  return new NodeServer(config);
}
