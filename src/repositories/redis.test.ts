import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RedisJobQueue, RedisJobStore, UpstashClient } from './redis.js';
import { InternalError } from '../errors.js';
import { createFakeUpstash, type FakeUpstash } from '../test-helpers/upstash.js';
import { makeJob } from '../test-helpers/jobs.js';
import type { BatchJob } from '../types/batch.js';

const UPSTASH_URL = 'https://upstash.example.test';

describe('RedisJobStore', () => {
  let clock: number;
  let upstash: FakeUpstash;
  let store: RedisJobStore;

  beforeEach(() => {
    clock = 1_000_000;
    upstash = createFakeUpstash(() => clock);
    vi.stubGlobal('fetch', upstash.fetch);
    store = new RedisJobStore(new UpstashClient(`${UPSTASH_URL}/`, 'test-token'), { ttlSeconds: 1 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should write with SET ... EX and the bearer token', async () => {
    const job = makeJob();
    await store.put(job);

    expect(upstash.calls).toHaveLength(1);
    expect(upstash.calls[0].url.href).toBe(`${UPSTASH_URL}/`);
    expect(upstash.calls[0].headers.get('authorization')).toBe('Bearer test-token');
    expect(upstash.calls[0].body).toEqual(['SET', `job:${job.id}`, JSON.stringify(job), 'EX', '1']);
  });

  it('should round-trip a job including dates and item results', async () => {
    const finishedAt = new Date('2025-01-01T00:00:05.000Z');
    const job = makeJob({
      status: 'completed',
      startedAt: new Date('2025-01-01T00:00:01.000Z'),
      completedAt: finishedAt,
      result: {
        kind: 'inline',
        items: [
          { index: 0, params: { a: 1 }, outcome: 'success', ok: true, statusCode: 200, data: { result: { records: [] } }, finishedAt },
          { index: 1, params: { a: 2 }, outcome: 'error', ok: false, error: { kind: 'http_status', message: 'HTTP 500', statusCode: 500 }, finishedAt },
          { index: 2, params: { a: 3 }, outcome: 'cancelled', ok: false, finishedAt },
        ],
      },
    });

    await store.put(job);

    expect(await store.get(job.id)).toEqual(job);
  });

  it('should return null for an unknown id', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('should return null after the TTL', async () => {
    const job = makeJob();
    await store.put(job);

    clock += 2000;

    expect(await store.get(job.id)).toBeNull();
  });

  it('should delete a job', async () => {
    const job = makeJob();
    await store.put(job);

    expect(await store.delete(job.id)).toBe(true);
    expect(await store.get(job.id)).toBeNull();
  });

  describe('update', () => {
    it('should apply the mutation with a compare-and-set', async () => {
      const job = makeJob({ status: 'running' });
      await store.put(job);

      const updated = await store.update(job.id, current => ({ ...current, cancelRequested: true }));

      expect(updated?.cancelRequested).toBe(true);
      expect((await store.get(job.id))?.cancelRequested).toBe(true);
      expect(upstash.calls.map(call => (Array.isArray(call.body) ? call.body[0] : null))).toEqual(['SET', 'GET', 'EVAL', 'GET']);
    });

    it('should return null for an unknown id', async () => {
      const mutate = vi.fn();

      expect(await store.update('missing', mutate)).toBeNull();
      expect(mutate).not.toHaveBeenCalled();
    });

    it('should never replace a terminal record', async () => {
      const job = makeJob({ status: 'completed', completedAt: new Date('2025-01-01T00:00:05.000Z') });
      await store.put(job);
      const mutate = vi.fn((current: BatchJob) => ({ ...current, status: 'running' as const }));

      expect(await store.update(job.id, mutate)).toEqual(job);
      expect(mutate).not.toHaveBeenCalled();
      expect((await store.get(job.id))?.status).toBe('completed');
    });

    it('should keep a terminal record written between read and write', async () => {
      const job = makeJob({ status: 'running' });
      await store.put(job);
      const completed = makeJob({ ...job, status: 'completed', completedAt: new Date('2025-01-01T00:00:05.000Z') });
      upstash.hooks.beforeCommand = (command) => {
        if (command[0] !== 'EVAL') return;
        upstash.hooks.beforeCommand = undefined;
        upstash.strings.set(`job:${job.id}`, { value: JSON.stringify(completed), expiresAt: null });
      };
      const mutate = vi.fn((current: BatchJob) => ({ ...current, cancelRequested: true }));

      const result = await store.update(job.id, mutate);

      expect(result).toEqual(completed);
      expect(mutate).toHaveBeenCalledTimes(1);
      expect(await store.get(job.id)).toEqual(completed);
    });

    it('should retry on top of a concurrent non-terminal write', async () => {
      const job = makeJob();
      await store.put(job);
      upstash.hooks.beforeCommand = (command) => {
        if (command[0] !== 'EVAL') return;
        upstash.hooks.beforeCommand = undefined;
        upstash.strings.set(`job:${job.id}`, { value: JSON.stringify({ ...job, cancelRequested: true }), expiresAt: null });
      };

      const result = await store.update(job.id, current => ({ ...current, status: 'running' }));

      expect(result).toMatchObject({ status: 'running', cancelRequested: true });
      expect(await store.get(job.id)).toMatchObject({ status: 'running', cancelRequested: true });
    });

    it('should give up when every attempt loses the race', async () => {
      const job = makeJob({ status: 'running' });
      await store.put(job);
      let writes = 0;
      upstash.hooks.beforeCommand = (command) => {
        if (command[0] !== 'EVAL') return;
        writes++;
        const progress = { ...job.progress, succeeded: writes };
        upstash.strings.set(`job:${job.id}`, { value: JSON.stringify({ ...job, progress }), expiresAt: null });
      };

      await expect(store.update(job.id, current => ({ ...current, cancelRequested: true })))
        .rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
      expect(writes).toBe(5);
    });
  });

  it('should raise SERIALIZATION_FAILED for a corrupt record', async () => {
    upstash.strings.set('job:broken', { value: '{"id":"broken"}', expiresAt: null });

    const error = await store.get('broken').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InternalError);
    expect(error).toMatchObject({ code: 'SERIALIZATION_FAILED' });
  });

  it('should raise STORE_UNAVAILABLE when Redis rejects the request', async () => {
    const badStore = new RedisJobStore(new UpstashClient(UPSTASH_URL, 'wrong-token'), { ttlSeconds: 1 });

    await expect(badStore.get('x')).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
  });

  it('should raise STORE_UNAVAILABLE when Redis is unreachable', async () => {
    vi.stubGlobal('fetch', async () => {
      throw new TypeError('fetch failed');
    });

    await expect(store.put(makeJob())).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
  });
});

describe('RedisJobQueue', () => {
  let upstash: FakeUpstash;
  let queue: RedisJobQueue;

  beforeEach(() => {
    upstash = createFakeUpstash();
    vi.stubGlobal('fetch', upstash.fetch);
    queue = new RedisJobQueue(new UpstashClient(UPSTASH_URL, 'test-token'));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should dequeue in FIFO order', async () => {
    await queue.enqueue('a');
    await queue.enqueue('b');

    expect(await queue.size()).toBe(2);
    expect(await queue.dequeue()).toBe('a');
    expect(await queue.dequeue()).toBe('b');
    expect(await queue.dequeue()).toBeNull();
  });

  it('should remove a pending id', async () => {
    await queue.enqueue('a');
    await queue.enqueue('b');

    expect(await queue.remove('a')).toBe(true);
    expect(await queue.size()).toBe(1);
    expect(upstash.lists.get('queue:batch')).toEqual(['b']);
  });
});
