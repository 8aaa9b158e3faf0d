import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileEndpointCache, STALE_AFTER_MS } from '../fileCache.js';
import { DecodeError, FilesystemError, NotFoundError } from '../../errors.js';
import type { EndpointSource } from '../cache.js';
import { jot } from '../../jot.js';

const MANIFEST_URL = 'https://references.example.com/manifest.json';
const NOW = new Date('2024-03-10T12:00:00.000Z');

function createResolve() {
  return vi.fn(async (_manifestUrl: string): Promise<Record<string, string>> => ({
    queue: 'https://queue.example.com/v1/ping',
  }));
}

describe('FileEndpointCache', () => {
  let tmpDir: string;
  let filePath: string;
  let now: Date;
  let resolve: ReturnType<typeof createResolve>;
  let source: EndpointSource;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'svcstat-cache-'));
    filePath = path.join(tmpDir, 'nested', 'status', 'pingURLs.json');
    now = NOW;
    resolve = createResolve();
    source = { resolve };
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function createCache() {
    return new FileEndpointCache({ filePath, source, clock: () => now });
  }

  async function writeCacheFile(contents: string) {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, contents, 'utf8');
  }

  it('persists a map and loads the same map back', async () => {
    const cache = createCache();
    const endpoints = {
      queue: 'https://queue.example.com/v1/ping',
      auth: 'https://auth.example.com/v1/ping',
    };

    const written = await cache.persist(endpoints);
    const loaded = await cache.load();

    expect(written.lastUpdated).toEqual(NOW);
    expect(loaded.lastUpdated).toEqual(NOW);
    expect(loaded.endpoints).toEqual(endpoints);
  });

  it('round-trips a service named __proto__', async () => {
    const cache = createCache();
    const endpoints = jot.record(jot.string()).parse(JSON.parse('{"__proto__":"https://proto.example.com/ping"}'));

    await cache.persist(endpoints);
    const loaded = await cache.load();

    expect(Object.keys(loaded.endpoints)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(loaded.endpoints, '__proto__')?.value).toBe('https://proto.example.com/ping');
  });

  it('writes the pretty-printed file format, creating parent directories', async () => {
    await createCache().persist({ queue: 'https://queue.example.com/v1/ping' });

    const raw = await fs.readFile(filePath, 'utf8');
    expect(raw).toBe(
      [
        '{',
        '  "lastUpdated": "2024-03-10T12:00:00.000Z",',
        '  "pingURLs": {',
        '    "queue": "https://queue.example.com/v1/ping"',
        '  }',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('reports a missing file as NotFoundError', async () => {
    await expect(createCache().load()).rejects.toBeInstanceOf(NotFoundError);
  });

  it('reports malformed JSON as DecodeError', async () => {
    await writeCacheFile('{not json');
    await expect(createCache().load()).rejects.toBeInstanceOf(DecodeError);
  });

  it('reports a schema mismatch as DecodeError naming the field', async () => {
    await writeCacheFile(JSON.stringify({ lastUpdated: '2024-03-10T00:00:00Z', pingURLs: { queue: 7 } }));
    await expect(createCache().load()).rejects.toThrow('cache.pingURLs["queue"] must be a string');
  });

  it('rejects an unparseable timestamp', async () => {
    await writeCacheFile(JSON.stringify({ lastUpdated: 'yesterday-ish', pingURLs: {} }));
    await expect(createCache().load()).rejects.toThrow('cache.lastUpdated is not a valid timestamp: yesterday-ish');
  });

  it('reports a failed write as FilesystemError', async () => {
    await fs.writeFile(path.join(tmpDir, 'nested'), 'a file, not a directory', 'utf8');
    await expect(createCache().persist({})).rejects.toBeInstanceOf(FilesystemError);
  });

  describe('isStale', () => {
    const endpoints = { queue: 'https://queue.example.com/v1/ping' };

    it('is not stale at exactly the threshold', () => {
      const record = { lastUpdated: new Date(NOW.getTime() - STALE_AFTER_MS), endpoints };
      expect(createCache().isStale(record)).toBe(false);
    });

    it('is stale one millisecond past the threshold', () => {
      const record = { lastUpdated: new Date(NOW.getTime() - STALE_AFTER_MS - 1), endpoints };
      expect(createCache().isStale(record)).toBe(true);
    });

    it('honours an explicit threshold', () => {
      const record = { lastUpdated: new Date(NOW.getTime() - 5000), endpoints };
      const cache = createCache();
      expect(cache.isStale(record, 4999)).toBe(true);
      expect(cache.isStale(record, 5000)).toBe(false);
    });

    it('treats a timestamp in the future as fresh', () => {
      const record = { lastUpdated: new Date(NOW.getTime() + 60_000), endpoints };
      expect(createCache().isStale(record)).toBe(false);
    });
  });

  describe('getOrRefresh', () => {
    it('resolves and persists when no cache file exists', async () => {
      const cache = createCache();

      const endpoints = await cache.getOrRefresh(MANIFEST_URL);

      expect(resolve).toHaveBeenCalledWith(MANIFEST_URL);
      expect(endpoints).toEqual({ queue: 'https://queue.example.com/v1/ping' });
      const loaded = await cache.load();
      expect(loaded.endpoints).toEqual(endpoints);
      expect(loaded.lastUpdated).toEqual(NOW);
    });

    it('returns the cached map without resolving when fresh', async () => {
      const cache = createCache();
      now = new Date(NOW.getTime() - 60_000);
      await cache.persist({ auth: 'https://auth.example.com/v1/ping' });
      now = NOW;

      const endpoints = await cache.getOrRefresh(MANIFEST_URL);

      expect(resolve).not.toHaveBeenCalled();
      expect(endpoints).toEqual({ auth: 'https://auth.example.com/v1/ping' });
    });

    it('replaces a stale cache wholesale', async () => {
      const cache = createCache();
      now = new Date(NOW.getTime() - STALE_AFTER_MS - 1);
      await cache.persist({ auth: 'https://auth.example.com/v1/ping' });
      now = NOW;

      const endpoints = await cache.getOrRefresh(MANIFEST_URL);

      expect(resolve).toHaveBeenCalledTimes(1);
      expect(endpoints).toEqual({ queue: 'https://queue.example.com/v1/ping' });
      expect((await cache.load()).endpoints).toEqual({ queue: 'https://queue.example.com/v1/ping' });
    });

    it('refreshes when the cache file cannot be decoded', async () => {
      await writeCacheFile('garbage');

      const endpoints = await createCache().getOrRefresh(MANIFEST_URL);

      expect(resolve).toHaveBeenCalledTimes(1);
      expect(endpoints).toEqual({ queue: 'https://queue.example.com/v1/ping' });
    });

    it('leaves the existing file untouched when resolution fails', async () => {
      const cache = createCache();
      now = new Date(NOW.getTime() - STALE_AFTER_MS - 1);
      await cache.persist({ auth: 'https://auth.example.com/v1/ping' });
      now = NOW;
      resolve.mockRejectedValueOnce(new DecodeError('manifest must be an object', 'manifest'));

      await expect(cache.getOrRefresh(MANIFEST_URL)).rejects.toThrow('manifest must be an object');
      expect((await cache.load()).endpoints).toEqual({ auth: 'https://auth.example.com/v1/ping' });
    });
  });
});
