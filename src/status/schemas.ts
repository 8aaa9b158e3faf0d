import { jot, type InferJot, type JotSchema } from '../jot.js';
import type { ManifestDocument } from '../types/index.js';

export const manifestNode: JotSchema<ManifestDocument> = jot.record(jot.string());

const apiEntryNode = jot.object({
  name: jot.optional(jot.string()),
  route: jot.optional(jot.string()),
});

export const apiDescriptionNode = jot.object({
  baseUrl: jot.optional(jot.string()),
  entries: jot.optional(jot.array(apiEntryNode)),
});

export const livenessNode = jot.object({
  alive: jot.boolean(),
  uptime: jot.number(),
});

export const cacheFileNode = jot.object({
  lastUpdated: jot.string(),
  pingURLs: jot.record(jot.string()),
});

export type CacheFilePayload = InferJot<typeof cacheFileNode>;

export const scopeSetNode = jot.object({
  scopes: jot.array(jot.string()),
});
