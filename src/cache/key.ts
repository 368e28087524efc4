import { createHash } from 'crypto';

export interface FilterKeyInput {
  templateId?: string;
  endpoint: string;
  method: string;
  sourceId?: string | number | null;
  params?: unknown;
  fields: string[];
}

/**
 * Canonical JSON stringify - ensures deterministic string representation
 * Sorts keys recursively and handles undefined/null consistently
 */
export function canonicalStringify(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj !== 'object') return JSON.stringify(obj);
  if (Array.isArray(obj)) {
    return '[' + obj.map(canonicalStringify).join(',') + ']';
  }

  const record = Object.fromEntries(Object.entries(obj));
  const keys = Object.keys(record).sort();
  const pairs = keys.map(key => `${JSON.stringify(key)}:${canonicalStringify(record[key])}`);
  return '{' + pairs.join(',') + '}';
}

/**
 * Generate deterministic cache key from a filter lookup signature.
 * Field order does not matter; parameter order does.
 */
export function makeFilterCacheKey(input: FilterKeyInput): string {
  const keyData = {
    templateId: input.templateId || null,
    endpoint: input.endpoint,
    method: input.method.toUpperCase(),
    sourceId: input.sourceId ?? null,
    params: input.params ?? null,
    fields: [...new Set(input.fields)].sort(),
  };

  const canonical = canonicalStringify(keyData);
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}
