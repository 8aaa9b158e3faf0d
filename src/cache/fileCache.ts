import { promises as fs } from 'node:fs';
import path from 'node:path';
import { CliError, FilesystemError, NotFoundError, describeError, hasErrorCode } from '../errors.js';
import { decodeJson } from '../jot.js';
import { cacheFileNode, type CacheFilePayload } from '../status/schemas.js';
import type { CacheRecord, ServiceEndpointMap } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { DAY_MS, describeAge, parseTimestamp, systemClock, type Clock } from '../utils/time.js';
import type { EndpointCache, EndpointSource } from './cache.js';

export const STALE_AFTER_MS = DAY_MS;

export interface FileEndpointCacheOptions {
  filePath: string;
  source: EndpointSource;
  clock?: Clock;
  staleAfterMs?: number;
  logger?: Logger;
}

/**
 * Keeps the resolved ping URLs in a single JSON file. The file is replaced
 * wholesale on refresh and is not locked, so concurrent runs race with last
 * writer wins.
 */
export class FileEndpointCache implements EndpointCache {
  readonly filePath: string;
  private readonly source: EndpointSource;
  private readonly clock: Clock;
  private readonly staleAfterMs: number;
  private readonly logger: Logger | undefined;

  constructor(options: FileEndpointCacheOptions) {
    this.filePath = options.filePath;
    this.source = options.source;
    this.clock = options.clock ?? systemClock;
    this.staleAfterMs = options.staleAfterMs ?? STALE_AFTER_MS;
    this.logger = options.logger;
  }

  async load(): Promise<CacheRecord> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new NotFoundError(this.filePath);
      }
      throw new FilesystemError(`Unable to read cache file ${this.filePath}: ${describeError(error)}`, this.filePath, error);
    }

    const payload = decodeJson(raw, cacheFileNode, 'cache');
    return {
      lastUpdated: parseTimestamp(payload.lastUpdated, 'cache.lastUpdated'),
      endpoints: payload.pingURLs,
    };
  }

  async persist(endpoints: ServiceEndpointMap): Promise<CacheRecord> {
    this.logger?.(`Writing cache file ${this.filePath}`);
    const record: CacheRecord = {
      lastUpdated: this.clock(),
      endpoints: { ...endpoints },
    };
    const payload: CacheFilePayload = {
      lastUpdated: record.lastUpdated.toISOString(),
      pingURLs: { ...record.endpoints },
    };

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
    } catch (error) {
      throw new FilesystemError(`Unable to write cache file ${this.filePath}: ${describeError(error)}`, this.filePath, error);
    }

    return record;
  }

  /** Exactly `thresholdMs` old is still fresh. */
  isStale(record: CacheRecord, thresholdMs: number = this.staleAfterMs): boolean {
    return this.clock().getTime() - record.lastUpdated.getTime() > thresholdMs;
  }

  async getOrRefresh(manifestUrl: string): Promise<ServiceEndpointMap> {
    let record: CacheRecord;
    try {
      record = await this.load();
    } catch (error) {
      if (!(error instanceof CliError)) {
        throw error;
      }
      if (!(error instanceof NotFoundError)) {
        this.logger?.(`Ignoring unreadable cache: ${error.message}`);
      }
      return this.refresh(manifestUrl);
    }

    if (this.isStale(record)) {
      const age = this.clock().getTime() - record.lastUpdated.getTime();
      this.logger?.(`Cached ping URLs are ${describeAge(age)} old, refreshing`);
      return this.refresh(manifestUrl);
    }

    return record.endpoints;
  }

  private async refresh(manifestUrl: string): Promise<ServiceEndpointMap> {
    const endpoints = await this.source.resolve(manifestUrl);
    const record = await this.persist(endpoints);
    return record.endpoints;
  }
}
