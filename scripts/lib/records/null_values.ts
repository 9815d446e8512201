export const UNKNOWN_VALUE = '?';
export const INAPPLICABLE_VALUE = '.';

const NULL_TOKENS = new Set<string>([UNKNOWN_VALUE, INAPPLICABLE_VALUE, '', "''", '""']);

export function isNullToken(value: string): boolean {
  return NULL_TOKENS.has(value.trim());
}
