import type { SchemaObject } from 'ajv';

import { CacheManager } from './cache_manager.js';
import { createConfiguredLogger, type ConversionConfig } from './config.js';
import type { ConversionMode, HierarchicalDocument } from './hierarchy/document.js';
import { flattenDocument } from './hierarchy/flattener.js';
import { parseJsonDocument, serializeJsonDocument } from './hierarchy/json_document.js';
import { resolveRelationships } from './hierarchy/relationship_resolver.js';
import { parseXmlDocument, serializeXmlDocument } from './hierarchy/xml_document.js';
import type { Logger } from './logger.js';
import { loadMappingRules } from './mapping/mapping_loader.js';
import type { MappingRules } from './mapping/types.js';
import { MetadataCache } from './metadata/metadata_cache.js';
import type { DataContainer } from './records/record_store.js';
import { buildContentSchema, hierarchicalDocumentSchema } from './validation/document_schemas.js';
import {
  AjvValidationGate,
  assertContent,
  assertStructure,
  type ValidationGate
} from './validation/validation_gate.js';
import type { ValidatorRegistry } from './validation/validator_registry.js';

export interface ConverterOptions {
  config: ConversionConfig;
  logger?: Logger;
  /** Shared cache; when omitted the converter creates and owns one. */
  cache?: CacheManager;
  validators?: ValidatorRegistry;
  gate?: ValidationGate;
}

/**
 * Conversion context for one dictionary/schema pair. Metadata loading is
 * asynchronous; each conversion call is synchronous and all-or-nothing.
 */
export class FlatnestConverter {
  private readonly contentSchema: SchemaObject;

  private constructor(
    readonly rules: MappingRules,
    readonly mode: ConversionMode,
    private readonly cache: CacheManager,
    private readonly ownsCache: boolean,
    private readonly gate: ValidationGate,
    private readonly validators: ValidatorRegistry | null,
    private readonly logger: Logger
  ) {
    this.contentSchema = buildContentSchema(rules);
  }

  static async create(options: ConverterOptions): Promise<FlatnestConverter> {
    const { config } = options;
    const logger = options.logger ?? createConfiguredLogger(config);
    const cache = options.cache ?? new CacheManager({ cacheDir: config.cacheDir, logger });
    const metadata = new MetadataCache(cache, logger);
    const rules = await loadMappingRules(cache, metadata, config, logger);

    return new FlatnestConverter(
      rules,
      config.mode,
      cache,
      options.cache === undefined,
      options.gate ?? new AjvValidationGate(),
      options.validators ?? null,
      logger
    );
  }

  toHierarchy(container: DataContainer): HierarchicalDocument {
    const document = resolveRelationships(container, this.rules, {
      mode: this.mode,
      logger: this.logger
    });
    if (this.mode === 'strict') {
      assertContent(this.gate, document, this.contentSchema, container, this.validators);
    }
    return document;
  }

  fromHierarchy(document: unknown): DataContainer {
    if (this.mode === 'strict') {
      assertStructure(this.gate, document, hierarchicalDocumentSchema);
    }
    return flattenDocument(document, this.rules);
  }

  toJson(container: DataContainer): string {
    return serializeJsonDocument(this.toHierarchy(container), this.rules);
  }

  fromJson(text: string): DataContainer {
    return this.fromHierarchy(parseJsonDocument(text));
  }

  toXml(container: DataContainer): string {
    return serializeXmlDocument(this.toHierarchy(container), this.rules);
  }

  fromXml(xml: string): DataContainer {
    return this.fromHierarchy(parseXmlDocument(xml, this.rules));
  }

  dispose(): void {
    if (this.ownsCache) {
      this.cache.clear();
    }
  }
}
