// Minimal JSON-over-HTTP client shared by the REST backends

import type { FastifyBaseLogger } from 'fastify';

import {
  ChainCancelledError,
  ChainDecodeError,
  ChainProviderError,
  ChainRateLimitedError,
  errorMessage,
} from './errors.js';
import { parseJson } from './json.js';

export type FetchFn = typeof fetch;

export interface HttpClientOptions {
  baseUrl: string;
  /** Sent with every request (credentials live here; never logged) */
  headers?: Record<string, string>;
  logger: FastifyBaseLogger;
  /** Backend name for log lines */
  backend: string;
  fetchImpl?: FetchFn;
}

export interface RequestOptions {
  operation: string;
  key: string;
  signal?: AbortSignal;
  /** Maps a 4xx rejection (other than 404 and 429) to the operation's own error */
  rejection?: (message: string) => Error;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON when the body is JSON, else the raw text */
  body: unknown;
}

/**
 * Thin fetch wrapper. A 404 is returned to the caller (as `null` from the
 * JSON helpers) because "not found" means different things per endpoint;
 * 429 and every other non-2xx status become chain errors.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly log: FastifyBaseLogger;
  private readonly backend: string;
  private readonly fetchImpl: FetchFn;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.headers = options.headers ?? {};
    this.log = options.logger;
    this.backend = options.backend;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** GET a JSON document; null on 404. */
  async getJson(path: string, options: RequestOptions): Promise<unknown> {
    const response = await this.request('GET', path, undefined, undefined, options);
    return response.status === 404 ? null : response.body;
  }

  /** POST a JSON body; null on 404. */
  async postJson(path: string, body: unknown, options: RequestOptions): Promise<unknown> {
    const response = await this.request(
      'POST',
      path,
      JSON.stringify(body),
      'application/json',
      options
    );
    return response.status === 404 ? null : response.body;
  }

  /** POST raw transaction bytes as application/cbor. */
  async postCbor(path: string, bytes: Uint8Array, options: RequestOptions): Promise<HttpResponse> {
    return this.request('POST', path, bytes, 'application/cbor', options);
  }

  /**
   * Issue a request. `path` may be absolute (custom submit endpoints).
   * Non-2xx statuses other than 404 throw.
   */
  async request(
    method: 'GET' | 'POST',
    path: string,
    body: string | Uint8Array | undefined,
    contentType: string | undefined,
    options: RequestOptions
  ): Promise<HttpResponse> {
    const url = /^https?:\/\//.test(path) ? path : `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { Accept: 'application/json', ...this.headers };
    if (contentType) {
      headers['Content-Type'] = contentType;
    }

    this.log.debug({ backend: this.backend, method, path, operation: options.operation }, 'Backend request');

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method, headers, body, signal: options.signal });
    } catch (error) {
      if (options.signal?.aborted) {
        throw new ChainCancelledError(options.operation, options.key);
      }
      throw new ChainProviderError(options.operation, `${this.backend} unreachable: ${errorMessage(error)}`);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (options.signal?.aborted) {
        throw new ChainCancelledError(options.operation, options.key);
      }
      throw new ChainProviderError(options.operation, errorMessage(error));
    }
    const parsed = parseBody(text, response.headers.get('content-type'));

    if (response.status === 404 || response.ok) {
      if (response.ok && parsed.invalidJson) {
        throw new ChainDecodeError(options.operation, `${this.backend} returned malformed JSON`);
      }
      return { status: response.status, body: parsed.value };
    }
    if (response.status === 429) {
      throw new ChainRateLimitedError(options.operation, this.backend);
    }
    if (options.rejection && response.status >= 400 && response.status < 500) {
      throw options.rejection(describeBody(parsed.value));
    }
    throw new ChainProviderError(
      options.operation,
      `${this.backend} HTTP ${response.status} for ${options.key}: ${describeBody(parsed.value)}`
    );
  }
}

function parseBody(
  text: string,
  contentType: string | null
): { value: unknown; invalidJson: boolean } {
  if (text === '') {
    return { value: null, invalidJson: false };
  }
  const looksJson = contentType?.includes('json') ?? false;
  try {
    return { value: parseJson(text), invalidJson: false };
  } catch {
    return { value: text, invalidJson: looksJson };
  }
}

/** Pull a message out of a provider error body for the error text. */
export function describeBody(body: unknown): string {
  if (typeof body === 'string') {
    return body.slice(0, 500);
  }
  if (body !== null && typeof body === 'object') {
    for (const field of ['message', 'error', 'hint']) {
      if (field in body) {
        const value: unknown = Reflect.get(body, field);
        if (typeof value === 'string') {
          return value;
        }
      }
    }
    return JSON.stringify(body).slice(0, 500);
  }
  return String(body);
}
