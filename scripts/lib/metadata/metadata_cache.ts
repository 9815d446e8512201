import fs from 'fs-extra';
import path from 'node:path';

import { sourceCacheKey, type CacheManager } from '../cache_manager.js';
import { silentLogger, type Logger } from '../logger.js';
import { dictionaryFromJson, parseDdlDictionary } from './dictionary_parser.js';
import { parseXsdSchema } from './schema_parser.js';
import type { DictionaryMetadata, SchemaMetadata, SourceMetadata } from './types.js';

export async function parseMetadataSource(sourcePath: string): Promise<SourceMetadata> {
  const extension = path.extname(sourcePath).toLowerCase();
  switch (extension) {
    case '.dic':
    case '.cif':
      return {
        kind: 'dictionary',
        dictionary: parseDdlDictionary(await fs.readFile(sourcePath, 'utf8'))
      };
    case '.json': {
      const raw: unknown = await fs.readJson(sourcePath);
      return { kind: 'dictionary', dictionary: dictionaryFromJson(raw) };
    }
    case '.xsd':
      return { kind: 'schema', schema: parseXsdSchema(await fs.readFile(sourcePath, 'utf8')) };
    default:
      throw new Error(
        `Unsupported metadata source '${sourcePath}'. Expected .dic, .cif, .json or .xsd`
      );
  }
}

/**
 * Parsed dictionary and schema metadata, keyed by source path and
 * freshness. A source is parsed at most once per freshness.
 */
export class MetadataCache {
  private parses = 0;

  constructor(
    private readonly cache: CacheManager,
    private readonly logger: Logger = silentLogger
  ) {}

  get parseCount(): number {
    return this.parses;
  }

  async load(sourcePath: string): Promise<SourceMetadata> {
    const key = await sourceCacheKey(sourcePath);
    return this.cache.metadata.getOrCompute(key, async () => {
      this.parses += 1;
      this.logger.debug(`Parsing metadata source ${sourcePath}`);
      return parseMetadataSource(sourcePath);
    });
  }

  async loadDictionary(sourcePath: string): Promise<DictionaryMetadata> {
    const metadata = await this.load(sourcePath);
    if (metadata.kind !== 'dictionary') {
      throw new Error(`Expected a dictionary source, got a schema: ${sourcePath}`);
    }
    return metadata.dictionary;
  }

  async loadSchema(sourcePath: string): Promise<SchemaMetadata> {
    const metadata = await this.load(sourcePath);
    if (metadata.kind !== 'schema') {
      throw new Error(`Expected an XML schema source, got a dictionary: ${sourcePath}`);
    }
    return metadata.schema;
  }
}
