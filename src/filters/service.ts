import type { Logger } from '../logger.js';
import { FilterCache } from '../cache/filter-cache.js';
import { canonicalStringify, makeFilterCacheKey } from '../cache/key.js';
import { AllowlistValidator } from '../security/allowlist.js';
import { UpstreamClient } from '../upstream/client.js';
import { UpstreamRequestError } from '../errors.js';
import type { FilterValuesRequest } from '../schemas/batch.js';

export interface FilterValues {
  options: Record<string, unknown[]>;
  truncatedFields: string[];
  recordCount: number;
}

export interface FilterValuesResponse {
  options: Record<string, unknown[]>;
  truncated: boolean;
  meta: {
    fields: string[];
    recordCount: number;
    cached: boolean;
    maxValuesPerField: number;
    truncatedFields: string[];
  };
}

export interface FilterValuesDeps {
  allowlist: AllowlistValidator;
  upstream: UpstreamClient;
  cache: FilterCache<FilterValues>;
  logger: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls the record list out of an upstream body: `result.records`,
 * `data.records`, `records`, or the body itself when it is an array.
 */
export function extractRecords(body: unknown): unknown[] {
  if (Array.isArray(body)) return body;
  if (!isRecord(body)) return [];

  for (const container of [body.result, body.data, body]) {
    if (isRecord(container) && Array.isArray(container.records)) {
      return container.records;
    }
  }
  return [];
}

/** Reads `field` from a record; dotted names walk nested objects. */
export function readField(record: unknown, field: string): unknown {
  if (!isRecord(record)) return undefined;
  if (field in record) return record[field];

  let current: unknown = record;
  for (const part of field.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Distinct non-null values per field in first-seen order, capped at
 * `maxValues` per field.
 */
export function collectDistinct(records: unknown[], fields: string[], maxValues: number): FilterValues {
  const options: Record<string, unknown[]> = {};
  const truncated = new Set<string>();

  for (const field of fields) {
    const seen = new Set<string>();
    const values: unknown[] = [];

    for (const record of records) {
      const value = readField(record, field);
      if (value === null || value === undefined) continue;

      const key = canonicalStringify(value);
      if (seen.has(key)) continue;
      if (values.length >= maxValues) {
        truncated.add(field);
        break;
      }
      seen.add(key);
      values.push(value);
    }

    options[field] = values;
  }

  return { options, truncatedFields: [...truncated], recordCount: records.length };
}

/** Distinct values for report filter drop-downs, cached per query. */
export class FilterValuesService {
  private readonly log: Logger;

  constructor(private deps: FilterValuesDeps, private maxValuesPerField: number) {
    this.log = deps.logger.child({ component: 'filters' });
  }

  async resolve(query: FilterValuesRequest): Promise<FilterValuesResponse> {
    const endpoint = await this.deps.allowlist.resolve(query.endpoint);
    const fields = [...new Set(query.fields)];

    const key = makeFilterCacheKey({
      templateId: query.templateId,
      endpoint,
      method: query.method,
      sourceId: query.sourceId,
      params: query.params,
      fields,
    });

    const { value, fromCache } = await this.deps.cache.getOrCompute(key, async () => {
      const started = Date.now();
      const outcome = await this.deps.upstream.call({
        url: endpoint,
        method: query.method,
        params: query.params ?? {},
        sourceId: query.sourceId,
      });

      if (!outcome.ok) {
        this.log.warn({ kind: outcome.error.kind, statusCode: outcome.error.statusCode }, 'filter lookup failed');
        throw new UpstreamRequestError(outcome.error.kind === 'timeout', outcome.error.message, outcome.error.statusCode);
      }

      const values = collectDistinct(extractRecords(outcome.data), fields, this.maxValuesPerField);
      this.log.debug({ records: values.recordCount, fields: fields.length, durationMs: Date.now() - started }, 'filter values computed');
      return values;
    });

    return {
      options: value.options,
      truncated: value.truncatedFields.length > 0,
      meta: {
        fields,
        recordCount: value.recordCount,
        cached: fromCache,
        maxValuesPerField: this.maxValuesPerField,
        truncatedFields: value.truncatedFields,
      },
    };
  }
}
