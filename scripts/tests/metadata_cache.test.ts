import assert from 'node:assert/strict';
import test from 'node:test';

import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

import { CacheManager, CacheStore, sourceCacheKey, type CacheStats } from '../lib/cache_manager.js';
import { silentLogger } from '../lib/logger.js';
import { loadMappingRules } from '../lib/mapping/mapping_loader.js';
import { MetadataCache } from '../lib/metadata/metadata_cache.js';
import { copyFixture, withTempCwd, writeFixtureFile } from './test_fs.js';
import { createCapturingLogger } from './test_support.js';

test('repeated loads return equal metadata without reparsing', async () => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const dictionaryPath = await copyFixture(root, 'sample.dic');
    const cache = new CacheManager({ cacheDir: null });
    const metadata = new MetadataCache(cache);

    const first = await metadata.load(dictionaryPath);
    const second = await metadata.load(dictionaryPath);

    assert.equal(metadata.parseCount, 1);
    assert.deepEqual(second, first);
    assert.equal(cache.stats.memoryHits, 1);
  });
});

test('concurrent loads of one source share a single parse', async () => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const dictionaryPath = await copyFixture(root, 'sample.dic');
    const metadata = new MetadataCache(new CacheManager({ cacheDir: null }));

    const results = await Promise.all([
      metadata.load(dictionaryPath),
      metadata.load(dictionaryPath),
      metadata.load(dictionaryPath)
    ]);

    assert.equal(metadata.parseCount, 1);
    assert.equal(results[1], results[0]);
    assert.equal(results[2], results[0]);
  });
});

test('a fresh cache manager reads persisted metadata from disk', async () => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const dictionaryPath = await copyFixture(root, 'sample.dic');
    const cacheDir = path.join(root, 'cache');

    const writer = new MetadataCache(new CacheManager({ cacheDir }));
    const original = await writer.loadDictionary(dictionaryPath);

    const readerCache = new CacheManager({ cacheDir });
    const reader = new MetadataCache(readerCache);
    const restored = await reader.loadDictionary(dictionaryPath);

    assert.equal(reader.parseCount, 0);
    assert.equal(readerCache.stats.diskHits, 1);
    assert.deepEqual(restored, original);
  });
});

test('a corrupted disk entry is discarded and the source reparsed', async () => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const dictionaryPath = await copyFixture(root, 'sample.dic');
    const cacheDir = path.join(root, 'cache');
    await new MetadataCache(new CacheManager({ cacheDir })).load(dictionaryPath);

    const key = await sourceCacheKey(dictionaryPath);
    const entryPath = path.join(cacheDir, 'metadata', `${key.group}-${key.version}.json`);
    await fs.writeFile(entryPath, '{"formatVersion": 1, "value": {"kind": "dict', 'utf8');

    const logger = createCapturingLogger();
    const cache = new CacheManager({ cacheDir, logger });
    const metadata = new MetadataCache(cache, logger);
    const reloaded = await metadata.loadDictionary(dictionaryPath);

    assert.equal(metadata.parseCount, 1);
    assert.equal(cache.stats.recoveredErrors, 1);
    assert.deepEqual(Object.keys(reloaded.categories), [
      'entity',
      'entity_poly',
      'entity_poly_seq',
      'struct_asym'
    ]);
    assert.ok(
      logger.entries.some(
        (entry) => entry.level === 'warn' && entry.message.startsWith(`Discarding cache entry ${entryPath}:`)
      )
    );

    const rewritten: unknown = await fs.readJson(entryPath);
    assert.ok(typeof rewritten === 'object' && rewritten !== null && 'value' in rewritten);
  });
});

test('a corrupted entry that cannot be removed is still recomputed', async (t) => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const dictionaryPath = await copyFixture(root, 'sample.dic');
    const cacheDir = path.join(root, 'cache');
    const key = await sourceCacheKey(dictionaryPath);
    const entryPath = await writeFixtureFile(
      cacheDir,
      `metadata/${key.group}-${key.version}.json`,
      'not json'
    );

    const logger = createCapturingLogger();
    const cache = new CacheManager({ cacheDir, logger });
    const metadata = new MetadataCache(cache, logger);
    const remove = t.mock.method(fs, 'remove', async () => {
      throw new Error('read-only cache');
    });
    try {
      await metadata.loadDictionary(dictionaryPath);
    } finally {
      remove.mock.restore();
    }

    assert.equal(metadata.parseCount, 1);
    assert.equal(cache.stats.recoveredErrors, 1);
    assert.ok(
      logger.entries.some(
        (entry) =>
          entry.level === 'warn' &&
          entry.message === `Could not remove cache entry ${entryPath}: read-only cache`
      )
    );
  });
});

test('memory keeps only the newest version of each group', async () => {
  const stats: CacheStats = { memoryHits: 0, diskHits: 0, computed: 0, recoveredErrors: 0 };
  const store = new CacheStore<string>({
    namespace: 'test',
    directory: null,
    decode: () => null,
    logger: silentLogger,
    stats
  });

  await store.getOrCompute({ group: 'g', version: '1' }, async () => 'one');
  await store.getOrCompute({ group: 'g', version: '2' }, async () => 'two');
  await store.getOrCompute({ group: 'h', version: '1' }, async () => 'other');

  assert.equal(store.size, 2);
  assert.equal(await store.getOrCompute({ group: 'g', version: '2' }, async () => 'again'), 'two');
  assert.equal(
    await store.getOrCompute({ group: 'g', version: '1' }, async () => 'one again'),
    'one again'
  );
  assert.equal(store.size, 2);
  assert.deepEqual(stats, { memoryHits: 1, diskHits: 0, computed: 4, recoveredErrors: 0 });
});

test('an entry with the wrong shape is treated as corrupted', async () => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const dictionaryPath = await copyFixture(root, 'sample.dic');
    const cacheDir = path.join(root, 'cache');
    const key = await sourceCacheKey(dictionaryPath);
    await writeFixtureFile(
      cacheDir,
      `metadata/${key.group}-${key.version}.json`,
      JSON.stringify({ formatVersion: 1, value: { kind: 'dictionary', dictionary: { title: 3 } } })
    );

    const cache = new CacheManager({ cacheDir });
    const metadata = new MetadataCache(cache);
    await metadata.load(dictionaryPath);

    assert.equal(metadata.parseCount, 1);
    assert.equal(cache.stats.recoveredErrors, 1);
  });
});

test('editing a source invalidates its entry and prunes the stale one', async () => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const dictionaryPath = await copyFixture(root, 'sample.dic');
    const cacheDir = path.join(root, 'cache');
    const metadata = new MetadataCache(new CacheManager({ cacheDir }));
    await metadata.load(dictionaryPath);

    const original = await fs.readFile(dictionaryPath, 'utf8');
    await fs.writeFile(
      dictionaryPath,
      original.replace('_dictionary.version   1.0', '_dictionary.version   2.0'),
      'utf8'
    );
    await fs.utimes(dictionaryPath, new Date(), new Date(Date.now() + 5000));

    const updated = await metadata.loadDictionary(dictionaryPath);

    assert.equal(updated.version, '2.0');
    assert.equal(metadata.parseCount, 2);
    const entries = await fg('*.json', { cwd: path.join(cacheDir, 'metadata') });
    assert.equal(entries.length, 1);
  });
});

test('loading a missing or unsupported source fails clearly', async () => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const metadata = new MetadataCache(new CacheManager({ cacheDir: null }));
    await assert.rejects(metadata.load(path.join(root, 'absent.dic')), /Metadata source not found/);

    const textPath = await writeFixtureFile(root, 'notes.txt', 'hello');
    await assert.rejects(metadata.load(textPath), /Unsupported metadata source/);
  });
});

test('schema sources cannot be loaded as dictionaries', async () => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const schemaPath = await copyFixture(root, 'sample.xsd');
    const metadata = new MetadataCache(new CacheManager({ cacheDir: null }));
    await assert.rejects(metadata.loadDictionary(schemaPath), /Expected a dictionary source/);
  });
});

test('mapping rules are built once per dictionary and schema pair', async () => {
  await withTempCwd('flatnest-cache-', async (root) => {
    const dictionaryPath = await copyFixture(root, 'sample.dic');
    const schemaPath = await copyFixture(root, 'sample.xsd');
    const cache = new CacheManager({ cacheDir: null });
    const metadata = new MetadataCache(cache);

    const first = await loadMappingRules(cache, metadata, { dictionaryPath, schemaPath });
    const second = await loadMappingRules(cache, metadata, { dictionaryPath, schemaPath });
    const withoutSchema = await loadMappingRules(cache, metadata, {
      dictionaryPath,
      schemaPath: null
    });

    assert.equal(second, first);
    assert.notEqual(withoutSchema, first);
    assert.equal(metadata.parseCount, 2);
    assert.equal(first.categories.has('exptl'), true);
    assert.equal(withoutSchema.categories.has('exptl'), false);
  });
});
