/**
 * Ogmios WebSocket client (JSON-RPC 2.0, Ogmios v6 method names).
 *
 * One socket is opened lazily and shared by every in-flight call; replies
 * are matched to callers by request id. A closed socket fails the calls
 * still waiting on it and is reopened by the next call.
 */
import WebSocket from 'ws';
import type { FastifyBaseLogger } from 'fastify';

import { abortable, throwIfAborted } from '../abort.js';
import {
  ChainCancelledError,
  ChainDecodeError,
  ChainProviderError,
  errorMessage,
  isChainError,
} from '../errors.js';
import type { RequestOptions } from '../http-client.js';
import { parseJson, stringifyJson } from '../json.js';
import { OgmiosResponseSchema } from './kupmios-schemas.js';

export interface OgmiosRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/** A JSON-RPC reply: either a result or the server's error object. */
export type OgmiosOutcome = { ok: true; result: unknown } | { ok: false; error: OgmiosRpcError };

export interface OgmiosTransport {
  call(method: string, params: Record<string, unknown>, options: RequestOptions): Promise<OgmiosOutcome>;
  close(): Promise<void>;
}

export const OGMIOS_REQUEST_TIMEOUT_MS = 30_000;

interface PendingRequest {
  operation: string;
  resolve: (outcome: OgmiosOutcome) => void;
  reject: (error: Error) => void;
}

export class OgmiosClient implements OgmiosTransport {
  private ws: WebSocket | null = null;
  private connecting: Promise<WebSocket> | null = null;
  private requestId = 0;
  private readonly pendingRequests = new Map<number, PendingRequest>();
  private readonly log: FastifyBaseLogger;

  constructor(
    private readonly url: string,
    logger: FastifyBaseLogger,
    private readonly requestTimeoutMs = OGMIOS_REQUEST_TIMEOUT_MS
  ) {
    this.log = logger.child({ backend: 'ogmios' });
  }

  async call(
    method: string,
    params: Record<string, unknown>,
    options: RequestOptions
  ): Promise<OgmiosOutcome> {
    const { operation, key, signal } = options;
    throwIfAborted(signal, operation, key);

    let ws: WebSocket;
    try {
      ws = await abortable(this.connect(), signal, operation, key);
    } catch (error) {
      if (isChainError(error)) {
        throw error;
      }
      throw new ChainProviderError(operation, `ogmios unreachable: ${errorMessage(error)}`);
    }

    const id = ++this.requestId;
    return new Promise<OgmiosOutcome>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ChainCancelledError(operation, key));
        return;
      }
      const onAbort = (): void => {
        this.pendingRequests.delete(id);
        settle();
        reject(new ChainCancelledError(operation, key));
      };
      const timer = setTimeout(() => {
        if (this.pendingRequests.delete(id)) {
          settle();
          reject(new ChainProviderError(operation, `ogmios request timeout: ${method}`));
        }
      }, this.requestTimeoutMs);
      const settle = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      this.pendingRequests.set(id, {
        operation,
        resolve: (outcome) => {
          settle();
          resolve(outcome);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
      });
      signal?.addEventListener('abort', onAbort, { once: true });

      this.log.debug({ method, operation }, 'Ogmios request');
      ws.send(stringifyJson({ jsonrpc: '2.0', method, params, id }), (err) => {
        if (err) {
          const pending = this.pendingRequests.get(id);
          this.pendingRequests.delete(id);
          pending?.reject(new ChainProviderError(operation, `ogmios send failed: ${err.message}`));
        }
      });
    });
  }

  /**
   * Close the socket; calls still waiting fail with ChainProviderError.
   * A socket still opening is closed once it opens.
   */
  async close(): Promise<void> {
    if (this.connecting) {
      // a failed connect was already logged by its error listener
      await this.connecting.then(
        () => undefined,
        () => undefined
      );
    }
    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }
    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      ws.close();
    });
  }

  private connect(): Promise<WebSocket> {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) {
      return Promise.resolve(this.ws);
    }
    if (this.connecting) {
      return this.connecting;
    }

    this.connecting = new Promise<WebSocket>((resolve, reject) => {
      const ws = new WebSocket(this.url);
      let opened = false;

      ws.on('open', () => {
        opened = true;
        this.ws = ws;
        this.connecting = null;
        this.log.info('Connected to Ogmios');
        resolve(ws);
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.onMessage(data);
      });

      ws.on('error', (err) => {
        this.log.error({ err }, 'Ogmios WebSocket error');
        if (!opened) {
          this.connecting = null;
          reject(err);
        }
      });

      ws.on('close', () => {
        if (this.ws === ws) {
          this.ws = null;
        }
        if (!opened) {
          return;
        }
        this.log.warn('Ogmios connection closed');
        for (const [id, pending] of this.pendingRequests) {
          this.pendingRequests.delete(id);
          pending.reject(new ChainProviderError(pending.operation, 'ogmios connection closed'));
        }
      });
    });
    return this.connecting;
  }

  private onMessage(data: WebSocket.RawData): void {
    let payload: unknown;
    try {
      payload = parseJson(data.toString());
    } catch (err) {
      this.log.error({ err }, 'Failed to parse Ogmios message');
      return;
    }
    const parsed = OgmiosResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.log.error({ issues: parsed.error.issues.length }, 'Unexpected Ogmios message');
      const id = readRequestId(payload);
      const pending = id === undefined ? undefined : this.pendingRequests.get(id);
      if (id !== undefined && pending) {
        this.pendingRequests.delete(id);
        pending.reject(new ChainDecodeError(pending.operation, `malformed ogmios reply to request ${id}`));
      }
      return;
    }

    const message = parsed.data;
    const id = typeof message.id === 'number' ? message.id : -1;
    const pending = this.pendingRequests.get(id);
    if (!pending) {
      return;
    }
    this.pendingRequests.delete(id);
    pending.resolve(
      message.error ? { ok: false, error: message.error } : { ok: true, result: message.result }
    );
  }
}

/** The request id of a reply that is otherwise unusable */
function readRequestId(payload: unknown): number | undefined {
  if (typeof payload === 'object' && payload !== null && 'id' in payload && typeof payload.id === 'number') {
    return payload.id;
  }
  return undefined;
}
