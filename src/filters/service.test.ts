import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FilterValuesService, FilterValues, collectDistinct, extractRecords, readField } from './service.js';
import { FilterCache } from '../cache/filter-cache.js';
import { AllowlistValidator } from '../security/allowlist.js';
import { UpstreamClient } from '../upstream/client.js';
import { UpstreamRequestError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { createFakeFetch, delay, jsonResponse, type FakeHandler } from '../test-helpers/fetch.js';

describe('extractRecords', () => {
  it('should find records in every supported envelope', () => {
    expect(extractRecords({ result: { records: [1] } })).toEqual([1]);
    expect(extractRecords({ data: { records: [2] } })).toEqual([2]);
    expect(extractRecords({ records: [3] })).toEqual([3]);
    expect(extractRecords([4])).toEqual([4]);
  });

  it('should return nothing for an unexpected shape', () => {
    expect(extractRecords({ result: { rows: [] } })).toEqual([]);
    expect(extractRecords('text')).toEqual([]);
    expect(extractRecords(null)).toEqual([]);
  });
});

describe('readField', () => {
  it('should prefer a literal key over a dotted path', () => {
    expect(readField({ 'a.b': 1, a: { b: 2 } }, 'a.b')).toBe(1);
  });

  it('should walk nested objects', () => {
    expect(readField({ site: { name: 'North' } }, 'site.name')).toBe('North');
    expect(readField({ site: 'flat' }, 'site.name')).toBeUndefined();
  });
});

describe('collectDistinct', () => {
  const records = [
    { region: 'North', year: 2024 },
    { region: 'South', year: 2024 },
    { region: 'North', year: null },
    { region: 'East' },
  ];

  it('should keep first-seen order and skip nulls', () => {
    expect(collectDistinct(records, ['region', 'year'], 10)).toEqual({
      options: { region: ['North', 'South', 'East'], year: [2024] },
      truncatedFields: [],
      recordCount: 4,
    });
  });

  it('should truncate a field at the cap', () => {
    expect(collectDistinct(records, ['region'], 2)).toEqual({
      options: { region: ['North', 'South'] },
      truncatedFields: ['region'],
      recordCount: 4,
    });
  });

  it('should not flag a field that has exactly the cap', () => {
    expect(collectDistinct(records.slice(0, 2), ['region'], 2).truncatedFields).toEqual([]);
  });
});

describe('FilterValuesService', () => {
  let cache: FilterCache<FilterValues>;
  let service: FilterValuesService;

  function useUpstream(handler: FakeHandler) {
    const fake = createFakeFetch(handler);
    vi.stubGlobal('fetch', fake.fetch);
    return fake;
  }

  beforeEach(() => {
    cache = new FilterCache<FilterValues>({ maxEntries: 5, ttlMs: 30_000 });
    service = new FilterValuesService(
      {
        allowlist: new AllowlistValidator({ baseUrl: 'http://example.com', entries: [] }),
        upstream: new UpstreamClient({ timeoutMs: 1000 }),
        cache,
        logger: silentLogger(),
      },
      2,
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const query = {
    endpoint: '/dtj/api/plan',
    method: 'POST' as const,
    sourceId: 1161,
    params: { year: 2024 },
    fields: ['region'],
  };

  it('should return distinct values and cache them', async () => {
    const fake = useUpstream(() => jsonResponse({ result: { records: [{ region: 'North' }, { region: 'South' }, { region: 'North' }] } }));

    const first = await service.resolve(query);
    const second = await service.resolve(query);

    expect(first).toEqual({
      options: { region: ['North', 'South'] },
      truncated: false,
      meta: { fields: ['region'], recordCount: 3, cached: false, maxValuesPerField: 2, truncatedFields: [] },
    });
    expect(second.meta.cached).toBe(true);
    expect(second.options).toEqual(first.options);
    expect(fake.calls).toHaveLength(1);
    expect(fake.calls[0].body).toEqual({ sourceId: 1161, year: 2024 });
  });

  it('should report truncation', async () => {
    useUpstream(() => jsonResponse([{ region: 'A' }, { region: 'B' }, { region: 'C' }]));

    const response = await service.resolve(query);

    expect(response.truncated).toBe(true);
    expect(response.options.region).toEqual(['A', 'B']);
    expect(response.meta.truncatedFields).toEqual(['region']);
  });

  it('should share one upstream call between concurrent misses', async () => {
    const fake = useUpstream(async () => {
      await delay(20);
      return jsonResponse({ records: [{ region: 'North' }] });
    });

    const responses = await Promise.all([service.resolve(query), service.resolve(query), service.resolve(query)]);

    expect(fake.calls).toHaveLength(1);
    expect(responses.map(r => r.options.region)).toEqual([['North'], ['North'], ['North']]);
  });

  it('should not cache an upstream failure', async () => {
    let calls = 0;
    useUpstream(() => {
      calls++;
      return calls === 1 ? jsonResponse({ message: 'down' }, 502) : jsonResponse({ records: [{ region: 'West' }] });
    });

    const error = await service.resolve(query).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamRequestError);
    expect(error).toMatchObject({ code: 'UPSTREAM_ERROR', statusCode: 502, fields: { upstreamStatus: 502 } });
    expect(cache.size).toBe(0);
    expect((await service.resolve(query)).options).toEqual({ region: ['West'] });
  });

  it('should map an upstream timeout to UPSTREAM_TIMEOUT', async () => {
    service = new FilterValuesService(
      {
        allowlist: new AllowlistValidator({ baseUrl: 'http://example.com', entries: [] }),
        upstream: new UpstreamClient({ timeoutMs: 10 }),
        cache,
        logger: silentLogger(),
      },
      2,
    );
    useUpstream(async (request) => {
      await delay(500, request.signal);
      return jsonResponse([]);
    });

    await expect(service.resolve(query)).rejects.toMatchObject({ code: 'UPSTREAM_TIMEOUT', statusCode: 504 });
  });

  it('should reject a denied endpoint before calling upstream', async () => {
    const fake = useUpstream(() => jsonResponse([]));

    await expect(service.resolve({ ...query, endpoint: 'https://other.example.net/x' }))
      .rejects.toMatchObject({ code: 'NO_ALLOWLIST_CONFIGURED' });
    expect(fake.calls).toHaveLength(0);
  });
});
