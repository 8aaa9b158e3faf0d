import { DecodeError, InvalidUrlError } from '../errors.js';
import { setOwn } from '../jot.js';
import { apiDescriptionNode, manifestNode } from '../status/schemas.js';
import type { ApiDescription, ManifestDocument, ServiceEndpointMap } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { fetchJson } from './http.js';

const PING_ENTRY_NAME = 'ping';

export interface EndpointResolverOptions {
  logger?: Logger;
}

/**
 * Walks the reference manifest to find the ping endpoint of every service.
 * Requests run one at a time, and any failure aborts the whole walk.
 */
export class EndpointResolver {
  private readonly logger: Logger | undefined;

  constructor(options: EndpointResolverOptions = {}) {
    this.logger = options.logger;
  }

  async resolve(manifestUrl: string): Promise<ServiceEndpointMap> {
    this.logger?.(`Scraping ping URLs from ${manifestUrl}`);
    const manifest: ManifestDocument = await fetchJson(manifestUrl, manifestNode, { label: 'manifest' });

    const endpoints: Record<string, string> = {};
    for (const descriptionUrl of Object.values(manifest)) {
      const payload = await fetchJson(descriptionUrl, apiDescriptionNode, { label: 'reference' });
      const description: ApiDescription = {
        baseUrl: payload.baseUrl,
        entries: payload.entries ?? [],
      };

      const found = findPingEndpoint(description);
      if (!found) {
        continue;
      }
      setOwn(endpoints, found.service, found.url);
    }

    this.logger?.(`Found ${Object.keys(endpoints).length} ping URLs`);
    return endpoints;
  }
}

export interface PingEndpoint {
  service: string;
  url: string;
}

/** Returns the first `ping` entry of a description, or null when it has none. */
export function findPingEndpoint(description: ApiDescription): PingEndpoint | null {
  const entry = description.entries.find((candidate) => candidate.name === PING_ENTRY_NAME);
  if (!entry) {
    return null;
  }

  if (description.baseUrl === undefined) {
    throw new DecodeError('reference.baseUrl is required when a ping entry exists', 'reference.baseUrl');
  }
  if (entry.route === undefined) {
    throw new DecodeError('reference ping entry has no route', 'reference.entries.route');
  }

  return {
    service: serviceNameFromBaseUrl(description.baseUrl),
    url: description.baseUrl + entry.route,
  };
}

/** `https://queue.example.com/v1` becomes `queue`. */
export function serviceNameFromBaseUrl(baseUrl: string): string {
  let hostname: string;
  try {
    hostname = new URL(baseUrl).hostname;
  } catch (error) {
    throw new InvalidUrlError(baseUrl, error);
  }

  const [service = ''] = hostname.split('.', 1);
  return service;
}
