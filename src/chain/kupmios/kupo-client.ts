import type { FastifyBaseLogger } from 'fastify';

import { HttpClient } from '../http-client.js';
import type { FetchFn, RequestOptions } from '../http-client.js';

export interface KupoMatchFilter {
  /** Only outputs not yet spent */
  unspent?: boolean;
  policyId?: string;
  /** Only meaningful together with policyId */
  assetName?: string;
}

/**
 * Raw Kupo access. Kupo answers unknown patterns with `[]` and unknown
 * datums or scripts with `null`; a 404 from a proxy in front of it also
 * resolves null.
 */
export interface KupoTransport {
  getMatches(pattern: string, filter: KupoMatchFilter, options: RequestOptions): Promise<unknown>;
  getDatum(datumHash: string, options: RequestOptions): Promise<unknown>;
  getScript(scriptHash: string, options: RequestOptions): Promise<unknown>;
}

interface KupoClientOptions {
  url: string;
  logger: FastifyBaseLogger;
  fetchImpl?: FetchFn;
}

/**
 * Kupo HTTP client. Matches are returned whole; Kupo does not paginate.
 */
export class KupoClient implements KupoTransport {
  private readonly http: HttpClient;

  constructor(options: KupoClientOptions) {
    this.http = new HttpClient({
      baseUrl: options.url,
      logger: options.logger.child({ backend: 'kupo' }),
      backend: 'kupo',
      fetchImpl: options.fetchImpl,
    });
  }

  async getMatches(pattern: string, filter: KupoMatchFilter, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/matches/${pattern}${matchQuery(filter)}`, options);
  }

  async getDatum(datumHash: string, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/datums/${datumHash}`, options);
  }

  async getScript(scriptHash: string, options: RequestOptions): Promise<unknown> {
    return this.http.getJson(`/scripts/${scriptHash}`, options);
  }
}

/** Kupo takes `unspent` as a bare flag. */
export function matchQuery(filter: KupoMatchFilter): string {
  const params: string[] = [];
  if (filter.unspent) {
    params.push('unspent');
  }
  if (filter.policyId) {
    params.push(`policy_id=${filter.policyId}`);
    if (filter.assetName) {
      params.push(`asset_name=${filter.assetName}`);
    }
  }
  return params.length > 0 ? `?${params.join('&')}` : '';
}
