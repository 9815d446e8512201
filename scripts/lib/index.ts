export { CacheManager, type CacheStats } from './cache_manager.js';
export {
  resolveConversionConfig,
  createConfiguredLogger,
  type ConversionConfig,
  type LogMode
} from './config.js';
export { FlatnestConverter, type ConverterOptions } from './converter.js';
export {
  CacheError,
  ContentValidationError,
  ConversionError,
  RelationshipResolutionError,
  StructuralValidationError
} from './errors.js';
export type {
  ConversionMode,
  DocumentBlock,
  DocumentRow,
  HierarchicalDocument,
  RowGroup
} from './hierarchy/document.js';
export { flattenDocument } from './hierarchy/flattener.js';
export { parseJsonDocument, serializeJsonDocument } from './hierarchy/json_document.js';
export { resolveRelationships } from './hierarchy/relationship_resolver.js';
export { parseXmlDocument, serializeXmlDocument } from './hierarchy/xml_document.js';
export { createLogger, type Logger } from './logger.js';
export { describeMappingRules } from './mapping/describe_mapping.js';
export { FkMap, type ForeignKeyLink, type ParentRelation } from './mapping/fk_map.js';
export { buildMappingRules } from './mapping/mapping_generator.js';
export { loadMappingRules } from './mapping/mapping_loader.js';
export type { CategoryMapping, ItemMapping, MappingRules } from './mapping/types.js';
export { MetadataCache } from './metadata/metadata_cache.js';
export type { DictionaryMetadata, SchemaMetadata, SourceMetadata } from './metadata/types.js';
export { parseFlatRecords } from './records/flat_records.js';
export { isNullToken, INAPPLICABLE_VALUE, UNKNOWN_VALUE } from './records/null_values.js';
export { Category, DataBlock, DataContainer, type FlatRecords, type Row } from './records/record_store.js';
export { AjvValidationGate, type ValidationGate, type ValidationReport } from './validation/validation_gate.js';
export { ValidatorRegistry, type Validator } from './validation/validator_registry.js';
