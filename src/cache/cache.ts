import type { CacheRecord, ServiceEndpointMap } from '../types/index.js';

export interface EndpointCache {
  load(): Promise<CacheRecord>;
  persist(endpoints: ServiceEndpointMap): Promise<CacheRecord>;
  isStale(record: CacheRecord, thresholdMs?: number): boolean;
  getOrRefresh(manifestUrl: string): Promise<ServiceEndpointMap>;
}

/** Anything that can rebuild the endpoint map from a manifest. */
export interface EndpointSource {
  resolve(manifestUrl: string): Promise<ServiceEndpointMap>;
}
