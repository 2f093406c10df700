import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { sha256Hex } from '../../shared/crypto';
import { StorageError, errorMessage, hasErrorCode } from '../../shared/errors';
import type { CacheEntry, RenderMode, ResourceType } from '../../shared/types';
import { KeyedLock, type Clock } from '../utils/async';
import { guardPath, listJsonFiles, writeFileAtomic } from './fsUtils';

const RESOURCE_TYPES = ['archive', 'issue', 'sitemap', 'article'] as const satisfies readonly ResourceType[];

const StoredEntrySchema = z.object({
  version: z.literal(1),
  key: z.string().min(1),
  url: z.string().min(1),
  mode: z.enum(['static', 'rendered']),
  resourceType: z.enum(RESOURCE_TYPES),
  fetchedAt: z.string().min(1),
  contentHash: z.string().min(1),
  renderedBy: z.enum(['static', 'rendered']),
  stale: z.boolean(),
  payload: z.string(),
});

type StoredEntry = z.infer<typeof StoredEntrySchema>;

export type IndexedEntry = Omit<StoredEntry, 'payload' | 'version'> & { file: string };

export interface CachePutInput {
  key: string;
  url: string;
  mode: RenderMode;
  resourceType: ResourceType;
  payload: Buffer;
  renderedBy: RenderMode;
}

export interface CacheStore {
  readonly rootDir: string;
  has: (key: string) => boolean;
  lookup: (key: string) => IndexedEntry | undefined;
  get: (key: string) => Promise<CacheEntry | null>;
  put: (input: CachePutInput) => Promise<CacheEntry>;
  invalidate: (key: string) => Promise<boolean>;
  keys: (resourceType?: ResourceType) => string[];
  readonly corruptFiles: readonly string[];
}

const entryPath = (rootDir: string, resourceType: ResourceType, key: string): string => {
  const digest = sha256Hex(key);
  return path.join(rootDir, resourceType, digest.slice(0, 2), `${digest}.json`);
};

const toIndexed = (stored: StoredEntry, file: string): IndexedEntry => {
  const { payload: _payload, version: _version, ...meta } = stored;
  return { ...meta, file };
};

/**
 * Content-addressed response cache on the filesystem. The in-memory index is
 * rebuilt from disk on open, so a restarted run resumes from whatever was
 * durably written before it stopped.
 */
export const openCacheStore = async (rootDir: string, options: { clock?: Clock } = {}): Promise<CacheStore> => {
  const clock = options.clock ?? Date.now;
  const index = new Map<string, IndexedEntry>();
  const corruptFiles: string[] = [];
  const lock = new KeyedLock();

  try {
    await fs.mkdir(rootDir, { recursive: true });
    for (const resourceType of RESOURCE_TYPES) {
      for (const file of await listJsonFiles(path.join(rootDir, resourceType))) {
        try {
          const stored = StoredEntrySchema.parse(JSON.parse(await fs.readFile(file, 'utf-8')));
          index.set(stored.key, toIndexed(stored, file));
        } catch {
          corruptFiles.push(file);
        }
      }
    }
  } catch (error) {
    throw new StorageError(rootDir, `Cache store unavailable: ${errorMessage(error)}`, { cause: error });
  }

  const readStored = async (file: string): Promise<StoredEntry | null> => {
    try {
      return StoredEntrySchema.parse(JSON.parse(await fs.readFile(file, 'utf-8')));
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return null;
      corruptFiles.push(file);
      return null;
    }
  };

  const writeStored = async (stored: StoredEntry, file: string) => {
    guardPath(rootDir, file);
    try {
      await writeFileAtomic(file, JSON.stringify(stored));
    } catch (error) {
      throw new StorageError(file, `Failed to write cache entry: ${errorMessage(error)}`, { cause: error });
    }
  };

  const get = async (key: string): Promise<CacheEntry | null> => {
    const meta = index.get(key);
    if (!meta) return null;
    const stored = await readStored(meta.file);
    if (!stored) {
      index.delete(key);
      return null;
    }
    return {
      key: stored.key,
      url: stored.url,
      mode: stored.mode,
      resourceType: stored.resourceType,
      fetchedAt: stored.fetchedAt,
      status: stored.stale ? 'stale' : 'hit',
      payload: Buffer.from(stored.payload, 'base64'),
      contentHash: stored.contentHash,
      renderedBy: stored.renderedBy,
    };
  };

  const put = (input: CachePutInput): Promise<CacheEntry> =>
    lock.run(input.key, async () => {
      const file = entryPath(rootDir, input.resourceType, input.key);
      const stored: StoredEntry = {
        version: 1,
        key: input.key,
        url: input.url,
        mode: input.mode,
        resourceType: input.resourceType,
        fetchedAt: new Date(clock()).toISOString(),
        contentHash: sha256Hex(input.payload),
        renderedBy: input.renderedBy,
        stale: false,
        payload: input.payload.toString('base64'),
      };
      await writeStored(stored, file);
      const previous = index.get(input.key);
      if (previous && previous.file !== file) {
        await fs.rm(previous.file, { force: true });
      }
      index.set(input.key, toIndexed(stored, file));
      return {
        key: stored.key,
        url: stored.url,
        mode: stored.mode,
        resourceType: stored.resourceType,
        fetchedAt: stored.fetchedAt,
        status: 'miss',
        payload: input.payload,
        contentHash: stored.contentHash,
        renderedBy: stored.renderedBy,
      };
    });

  const invalidate = (key: string): Promise<boolean> =>
    lock.run(key, async () => {
      const meta = index.get(key);
      if (!meta) return false;
      const stored = await readStored(meta.file);
      if (!stored) {
        index.delete(key);
        return false;
      }
      const next = { ...stored, stale: true };
      await writeStored(next, meta.file);
      index.set(key, toIndexed(next, meta.file));
      return true;
    });

  return {
    rootDir,
    has: (key) => {
      const meta = index.get(key);
      return Boolean(meta && !meta.stale);
    },
    lookup: (key) => index.get(key),
    get,
    put,
    invalidate,
    keys: (resourceType) =>
      Array.from(index.values())
        .filter((meta) => !resourceType || meta.resourceType === resourceType)
        .map((meta) => meta.key)
        .sort(),
    corruptFiles,
  };
};
