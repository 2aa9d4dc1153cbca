import { chainSchema, transactionSchema, type Block, type Transaction } from '@custody/core';
import { z } from 'zod';

/**
 * Paths of the peer wire protocol, relative to a node's base URL.
 */
export const PEER_PATHS = {
  ping: '/ping',
  chain: '/chain',
  receive: '/transactions/receive',
  peers: '/peers',
} as const;

/** Default timeout for every outbound peer call, in milliseconds. */
export const DEFAULT_PEER_TIMEOUT_MS = 5000;

/**
 * `GET /ping` response.
 */
export interface PingResponse {
  status: string;
  node_id: string;
}

/**
 * `GET /chain` response.
 */
export interface ChainResponse {
  length: number;
  chain: Block[];
}

/**
 * `POST /transactions/receive` request body.
 */
export interface ReceiveRequest {
  transaction: Transaction;
}

/**
 * `POST /transactions/receive` response.
 */
export interface ReceiveResponse {
  status: string;
}

/**
 * `POST /peers` request body.
 */
export interface RegisterPeerRequest {
  peer_url: string;
}

/**
 * `GET /peers` and `POST /peers` response.
 */
export interface PeersResponse {
  peers: string[];
}

export const pingResponseSchema: z.ZodType<PingResponse> = z.object({
  status: z.string(),
  node_id: z.string(),
});

export const chainResponseSchema: z.ZodType<ChainResponse> = z.object({
  length: z.number().int().nonnegative(),
  chain: chainSchema,
});

export const receiveRequestSchema: z.ZodType<ReceiveRequest> = z.object({
  transaction: transactionSchema,
});

export const receiveResponseSchema: z.ZodType<ReceiveResponse> = z.object({
  status: z.string(),
});

export const registerPeerRequestSchema: z.ZodType<RegisterPeerRequest> = z.object({
  peer_url: z.string().min(1, 'Required'),
});

export const peersResponseSchema: z.ZodType<PeersResponse> = z.object({
  peers: z.array(z.string()),
});

/**
 * Outbound calls one node makes to another.
 *
 * Every call either resolves with a validated response or rejects with a
 * `ConnectionError` (unreachable, timed out, error status) or a
 * `ValidationError` (malformed response body).
 */
export interface PeerTransport {
  /** Liveness probe */
  ping(peerUrl: string): Promise<PingResponse>;

  /** Fetch the peer's full chain */
  fetchChain(peerUrl: string): Promise<ChainResponse>;

  /** Deliver a broadcast transaction */
  sendTransaction(peerUrl: string, transaction: Transaction): Promise<ReceiveResponse>;

  /** Ask the peer to register `selfUrl` as one of its peers */
  registerWith(peerUrl: string, selfUrl: string): Promise<PeersResponse>;
}

/**
 * Transport configuration
 */
export interface PeerTransportConfig {
  /** Timeout per call in milliseconds */
  timeout?: number;
}
