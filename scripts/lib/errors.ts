export class ConversionError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = new.target.name;
    this.issues = issues;
  }

  format(): string {
    if (this.issues.length === 0) {
      return this.message;
    }

    return [this.message, ...this.issues.map((issue) => `- ${issue}`)].join('\n');
  }
}

/**
 * Hierarchical input whose shape cannot be flattened, or which failed the
 * structural schema.
 */
export class StructuralValidationError extends ConversionError {}

/** Resolver output that breaks dictionary rules (enumerations, types, mandatory items). */
export class ContentValidationError extends ConversionError {}

/** Orphaned records in strict mode, conflicting singletons, or cyclic parent chains. */
export class RelationshipResolutionError extends ConversionError {}

// Raised by the disk cache layer and always recovered inside it.
export class CacheError extends ConversionError {
  readonly entryPath: string;

  constructor(message: string, entryPath: string) {
    super(message);
    this.entryPath = entryPath;
  }
}

export function formatError(error: unknown): string {
  if (error instanceof ConversionError) {
    return error.format();
  }
  return error instanceof Error ? error.message : String(error);
}
