import fg from 'fast-glob';
import fs from 'fs-extra';
import { createHash } from 'node:crypto';
import path from 'node:path';

import { CacheError } from './errors.js';
import { stableJson } from './io.js';
import { silentLogger, type Logger } from './logger.js';
import type { MappingRules } from './mapping/types.js';
import { decodeSourceMetadata } from './metadata/metadata_schema.js';
import type { SourceMetadata } from './metadata/types.js';

const CACHE_FORMAT_VERSION = 1;

/**
 * `group` identifies the source (or source pair), `version` its freshness.
 * Entries of one group with another version are stale.
 */
export interface CacheKey {
  group: string;
  version: string;
}

export interface CacheStats {
  memoryHits: number;
  diskHits: number;
  computed: number;
  recoveredErrors: number;
}

export function digest(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16);
}

export async function sourceCacheKey(sourcePath: string): Promise<CacheKey> {
  const resolved = path.resolve(sourcePath);
  if (!(await fs.pathExists(resolved))) {
    throw new Error(`Metadata source not found: ${sourcePath}`);
  }
  const stat = await fs.stat(resolved);
  return { group: digest(resolved), version: digest(`${stat.size}:${stat.mtimeMs}`) };
}

function entryId(key: CacheKey): string {
  return `${key.group}-${key.version}`;
}

interface CacheStoreOptions<T> {
  namespace: string;
  /** `null` keeps entries in memory only. */
  directory: string | null;
  decode: (raw: unknown) => T | null;
  logger: Logger;
  stats: CacheStats;
}

export class CacheStore<T> {
  private readonly memory = new Map<string, T>();
  /** Entry id currently held in memory for each group. */
  private readonly versions = new Map<string, string>();
  private readonly pending = new Map<string, Promise<T>>();

  constructor(private readonly options: CacheStoreOptions<T>) {}

  get size(): number {
    return this.memory.size;
  }

  /** Concurrent callers for one key share a single computation. */
  async getOrCompute(key: CacheKey, compute: () => Promise<T>): Promise<T> {
    const id = entryId(key);
    const cached = this.memory.get(id);
    if (cached !== undefined) {
      this.options.stats.memoryHits += 1;
      return cached;
    }

    const inFlight = this.pending.get(id);
    if (inFlight) {
      return inFlight;
    }

    const populate = this.populate(key, compute).finally(() => {
      this.pending.delete(id);
    });
    this.pending.set(id, populate);
    return populate;
  }

  clear(): void {
    this.memory.clear();
    this.versions.clear();
  }

  private remember(key: CacheKey, value: T): void {
    const id = entryId(key);
    const previous = this.versions.get(key.group);
    if (previous !== undefined && previous !== id) {
      this.memory.delete(previous);
    }
    this.versions.set(key.group, id);
    this.memory.set(id, value);
  }

  private entryPath(id: string): string | null {
    const { directory, namespace } = this.options;
    return directory ? path.join(directory, namespace, `${id}.json`) : null;
  }

  private async populate(key: CacheKey, compute: () => Promise<T>): Promise<T> {
    const id = entryId(key);
    const stored = await this.readEntry(id);
    if (stored !== null) {
      this.options.stats.diskHits += 1;
      this.remember(key, stored);
      return stored;
    }

    const value = await compute();
    this.options.stats.computed += 1;
    this.remember(key, value);
    await this.writeEntry(key, value);
    return value;
  }

  private async readEntry(id: string): Promise<T | null> {
    const entryPath = this.entryPath(id);
    if (!entryPath || !(await fs.pathExists(entryPath))) {
      return null;
    }

    try {
      return await this.decodeEntry(entryPath);
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      this.options.stats.recoveredErrors += 1;
      this.options.logger.warn(`Discarding cache entry ${error.entryPath}: ${error.message}`);
      try {
        await fs.remove(entryPath);
      } catch (removeError) {
        const reason = removeError instanceof Error ? removeError.message : String(removeError);
        this.options.logger.warn(`Could not remove cache entry ${entryPath}: ${reason}`);
      }
      return null;
    }
  }

  private async decodeEntry(entryPath: string): Promise<T> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(entryPath, 'utf8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CacheError(`unreadable entry (${reason})`, entryPath);
    }

    if (
      typeof raw !== 'object' ||
      raw === null ||
      !('formatVersion' in raw) ||
      raw.formatVersion !== CACHE_FORMAT_VERSION ||
      !('value' in raw)
    ) {
      throw new CacheError('entry has an unexpected envelope', entryPath);
    }

    const value = this.options.decode(raw.value);
    if (value === null) {
      throw new CacheError('entry does not match the expected shape', entryPath);
    }
    return value;
  }

  private async writeEntry(key: CacheKey, value: T): Promise<void> {
    const id = entryId(key);
    const entryPath = this.entryPath(id);
    if (!entryPath) {
      return;
    }

    const directory = path.dirname(entryPath);
    try {
      await fs.ensureDir(directory);
      await fs.writeFile(
        entryPath,
        stableJson({ formatVersion: CACHE_FORMAT_VERSION, key: id, value }),
        'utf8'
      );

      const siblings = await fg(`${key.group}-*.json`, { cwd: directory, onlyFiles: true });
      for (const sibling of siblings) {
        if (sibling !== `${id}.json`) {
          this.options.logger.debug(`Pruning stale cache entry ${sibling}`);
          await fs.remove(path.join(directory, sibling));
        }
      }
    } catch (error) {
      // the in-memory entry stays valid; only persistence is lost
      const reason = error instanceof Error ? error.message : String(error);
      this.options.logger.warn(`Could not persist cache entry ${entryPath}: ${reason}`);
    }
  }
}

export interface CacheManagerOptions {
  cacheDir: string | null;
  logger?: Logger;
}

/**
 * Owns every cache used by a conversion context. Created and cleared by the
 * converter; components receive it explicitly.
 */
export class CacheManager {
  readonly stats: CacheStats = { memoryHits: 0, diskHits: 0, computed: 0, recoveredErrors: 0 };
  readonly metadata: CacheStore<SourceMetadata>;
  readonly mappings: CacheStore<MappingRules>;
  readonly cacheDir: string | null;

  constructor(options: CacheManagerOptions) {
    const logger = options.logger ?? silentLogger;
    this.cacheDir = options.cacheDir;
    this.metadata = new CacheStore<SourceMetadata>({
      namespace: 'metadata',
      directory: options.cacheDir,
      decode: decodeSourceMetadata,
      logger,
      stats: this.stats
    });
    // mapping rules hold class instances and are rebuilt cheaply from cached metadata
    this.mappings = new CacheStore<MappingRules>({
      namespace: 'mappings',
      directory: null,
      decode: () => null,
      logger,
      stats: this.stats
    });
  }

  clear(): void {
    this.metadata.clear();
    this.mappings.clear();
  }
}
