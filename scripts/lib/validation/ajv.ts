import AjvModule, { type ErrorObject } from 'ajv';

const Ajv = AjvModule.default;

export type AjvInstance = InstanceType<typeof Ajv>;

export function createAjv(): AjvInstance {
  return new Ajv({ allErrors: true, strict: false });
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const location = error.instancePath || '/';
    if (error.keyword === 'additionalProperties') {
      const property = error.params.additionalProperty;
      return `${location}: unexpected property '${String(property)}'`;
    }
    if (error.keyword === 'enum') {
      const allowed = error.params.allowedValues;
      return `${location}: ${error.message ?? 'invalid value'} (${Array.isArray(allowed) ? allowed.join(', ') : String(allowed)})`;
    }
    return `${location}: ${error.message ?? 'is invalid'}`;
  });
}
