import path from 'node:path';

import { CacheManager } from '../cache_manager.js';
import { createConfiguredLogger, resolveConversionConfig } from '../config.js';
import { getRunOptions, writeJsonFile, type WriteResult } from '../io.js';
import { describeMappingRules } from '../mapping/describe_mapping.js';
import { loadMappingRules } from '../mapping/mapping_loader.js';
import { MetadataCache } from '../metadata/metadata_cache.js';
import { parseCliOptionMap } from './options.js';

export const DEFAULT_MAPPING_OUTPUT = 'mapping_rules.json';

export interface BuildMappingResult extends WriteResult {
  outFile: string;
  check: boolean;
  categories: number;
  warnings: number;
}

export async function runBuildMapping(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<BuildMappingResult> {
  const { check } = getRunOptions(argv);
  const options = parseCliOptionMap(argv, ['--check']);
  const config = resolveConversionConfig(options, env);
  const logger = createConfiguredLogger(config);

  const cache = new CacheManager({ cacheDir: config.cacheDir, logger });
  const metadata = new MetadataCache(cache, logger);
  const rules = await loadMappingRules(cache, metadata, config, logger);
  const artifact = describeMappingRules(rules);

  const outFile = path.resolve(options.get('output') ?? DEFAULT_MAPPING_OUTPUT);
  const result = await writeJsonFile(outFile, artifact, { check });
  cache.clear();

  return {
    ...result,
    outFile,
    check,
    categories: artifact.statistics.categories,
    warnings: artifact.statistics.warnings
  };
}
