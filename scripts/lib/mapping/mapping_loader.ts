import { digest, sourceCacheKey, type CacheManager } from '../cache_manager.js';
import { silentLogger, type Logger } from '../logger.js';
import type { MetadataCache } from '../metadata/metadata_cache.js';
import { buildMappingRules } from './mapping_generator.js';
import type { MappingRules } from './types.js';

export interface MappingSources {
  dictionaryPath: string;
  schemaPath: string | null;
}

/** Mapping rules for a dictionary/schema pair, built once per freshness of both. */
export async function loadMappingRules(
  cache: CacheManager,
  metadata: MetadataCache,
  sources: MappingSources,
  logger: Logger = silentLogger
): Promise<MappingRules> {
  const dictionaryKey = await sourceCacheKey(sources.dictionaryPath);
  const schemaKey = sources.schemaPath ? await sourceCacheKey(sources.schemaPath) : null;
  const key = {
    group: digest(`${dictionaryKey.group}+${schemaKey?.group ?? 'none'}`),
    version: digest(`${dictionaryKey.version}+${schemaKey?.version ?? 'none'}`)
  };

  return cache.mappings.getOrCompute(key, async () => {
    const dictionary = await metadata.loadDictionary(sources.dictionaryPath);
    const schema = sources.schemaPath ? await metadata.loadSchema(sources.schemaPath) : null;
    return buildMappingRules(dictionary, schema, logger);
  });
}
