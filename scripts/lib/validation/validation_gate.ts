import type { SchemaObject, ValidateFunction } from 'ajv';

import { ContentValidationError, StructuralValidationError } from '../errors.js';
import type { DataContainer } from '../records/record_store.js';
import { createAjv, formatAjvErrors, type AjvInstance } from './ajv.js';
import type { ValidatorRegistry } from './validator_registry.js';

export interface ValidationReport {
  valid: boolean;
  errors: string[];
}

export interface ValidationGate {
  validate(document: unknown, schema: SchemaObject): ValidationReport;
}

export class AjvValidationGate implements ValidationGate {
  private readonly ajv: AjvInstance = createAjv();
  private readonly compiled = new WeakMap<SchemaObject, ValidateFunction>();

  validate(document: unknown, schema: SchemaObject): ValidationReport {
    let validator = this.compiled.get(schema);
    if (!validator) {
      validator = this.ajv.compile(schema);
      this.compiled.set(schema, validator);
    }

    const valid = validator(document);
    return { valid, errors: valid ? [] : formatAjvErrors(validator.errors) };
  }
}

export function assertStructure(
  gate: ValidationGate,
  document: unknown,
  schema: SchemaObject
): void {
  const report = gate.validate(document, schema);
  if (!report.valid) {
    throw new StructuralValidationError(
      `Hierarchical input failed structural validation with ${report.errors.length} error(s)`,
      report.errors
    );
  }
}

export function assertContent(
  gate: ValidationGate,
  document: unknown,
  schema: SchemaObject,
  container: DataContainer,
  validators: ValidatorRegistry | null
): void {
  const errors = [...gate.validate(document, schema).errors, ...(validators?.run(container) ?? [])];
  if (errors.length > 0) {
    throw new ContentValidationError(
      `Converted document failed content validation with ${errors.length} error(s)`,
      errors
    );
  }
}
