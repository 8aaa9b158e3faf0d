import { scopeSetNode } from '../status/schemas.js';
import type { Logger } from '../utils/logger.js';
import { fetchJson } from './http.js';

export interface ScopeClientOptions {
  baseUrl: string;
  logger?: Logger;
}

/** Unauthenticated client for the authorization service's scope expansion. */
export class ScopeClient {
  private readonly baseUrl: string;
  private readonly logger: Logger | undefined;

  constructor(options: ScopeClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.logger = options.logger;
  }

  async expand(scopes: string[]): Promise<string[]> {
    const url = `${this.baseUrl}/scopes/expand`;
    this.logger?.(`Expanding ${scopes.length} scopes via ${url}`);
    const response = await fetchJson(url, scopeSetNode, {
      method: 'POST',
      body: { scopes },
      label: 'scope set',
    });
    return response.scopes;
  }
}
