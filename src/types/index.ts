/** Service name (first hostname label of its base URL) to its ping URL. */
export type ServiceEndpointMap = Readonly<Record<string, string>>;

/** Service name to the URL of its API description, as listed by the manifest. */
export type ManifestDocument = Record<string, string>;

export interface ApiEntry {
  name: string | undefined;
  route: string | undefined;
}

export interface ApiDescription {
  baseUrl: string | undefined;
  entries: ApiEntry[];
}

export interface CacheRecord {
  lastUpdated: Date;
  endpoints: ServiceEndpointMap;
}

export interface LivenessReport {
  alive: boolean;
  uptime: number;
}
