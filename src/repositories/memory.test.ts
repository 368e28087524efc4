import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryJobQueue, InMemoryJobStore } from './memory.js';
import { makeJob } from '../test-helpers/jobs.js';
import type { BatchJob } from '../types/batch.js';

describe('InMemoryJobStore', () => {
  let clock: number;
  let store: InMemoryJobStore;

  beforeEach(() => {
    clock = 1_000_000;
    store = new InMemoryJobStore({ ttlSeconds: 1, now: () => clock });
  });

  describe('get', () => {
    it('should return null for non-existent job', async () => {
      expect(await store.get('non-existent')).toBeNull();
    });

    it('should return a stored job', async () => {
      const job = makeJob();
      await store.put(job);

      expect(await store.get(job.id)).toEqual(job);
    });

    it('should hand out copies, not the stored record', async () => {
      const job = makeJob();
      await store.put(job);

      job.status = 'running';
      const first = await store.get(job.id);
      first!.progress.succeeded = 99;
      const second = await store.get(job.id);

      expect(second!.status).toBe('queued');
      expect(second!.progress.succeeded).toBe(0);
    });
  });

  describe('TTL', () => {
    it('should return null once the TTL has elapsed', async () => {
      const job = makeJob();
      await store.put(job);

      clock += 999;
      expect(await store.get(job.id)).not.toBeNull();

      clock += 1;
      expect(await store.get(job.id)).toBeNull();
      expect(store.size).toBe(0);
    });

    it('should return null two TTLs after completion', async () => {
      const job = makeJob({ status: 'completed', completedAt: new Date(clock) });
      await store.put(job);

      clock += 2000;

      expect(await store.get(job.id)).toBeNull();
    });

    it('should refresh the TTL on every put', async () => {
      const job = makeJob();
      await store.put(job);

      clock += 800;
      await store.put({ ...job, status: 'running' });
      clock += 800;

      expect((await store.get(job.id))?.status).toBe('running');
    });

    it('should purge expired records', async () => {
      await store.put(makeJob());
      clock += 500;
      await store.put(makeJob());
      clock += 600;

      expect(store.purgeExpired()).toBe(1);
      expect(store.size).toBe(1);
    });
  });

  describe('update', () => {
    it('should store the mutated record', async () => {
      const job = makeJob();
      await store.put(job);

      const updated = await store.update(job.id, current => ({ ...current, status: 'running' }));

      expect(updated?.status).toBe('running');
      expect((await store.get(job.id))?.status).toBe('running');
    });

    it('should leave the record alone when the mutation returns null', async () => {
      const job = makeJob();
      await store.put(job);

      expect(await store.update(job.id, () => null)).toEqual(job);
    });

    it('should never replace a terminal record', async () => {
      const job = makeJob({ status: 'cancelled' });
      await store.put(job);
      const mutate = vi.fn((current: BatchJob) => ({ ...current, status: 'running' as const }));

      expect(await store.update(job.id, mutate)).toEqual(job);
      expect(mutate).not.toHaveBeenCalled();
      expect((await store.get(job.id))?.status).toBe('cancelled');
    });

    it('should apply concurrent updates one after the other', async () => {
      const job = makeJob({ status: 'running' });
      await store.put(job);

      await Promise.all([
        store.update(job.id, current => ({ ...current, cancelRequested: true })),
        store.update(job.id, current => ({ ...current, progress: { ...current.progress, succeeded: 1 } })),
      ]);

      expect(await store.get(job.id)).toMatchObject({ cancelRequested: true, progress: { succeeded: 1 } });
    });
  });

  describe('delete', () => {
    it('should remove a job', async () => {
      const job = makeJob();
      await store.put(job);

      expect(await store.delete(job.id)).toBe(true);
      expect(await store.get(job.id)).toBeNull();
      expect(await store.delete(job.id)).toBe(false);
    });
  });
});

describe('InMemoryJobQueue', () => {
  it('should dequeue in FIFO order', async () => {
    const queue = new InMemoryJobQueue();
    await queue.enqueue('a');
    await queue.enqueue('b');
    await queue.enqueue('c');

    expect(await queue.size()).toBe(3);
    expect(await queue.dequeue()).toBe('a');
    expect(await queue.dequeue()).toBe('b');
    expect(await queue.dequeue()).toBe('c');
    expect(await queue.dequeue()).toBeNull();
  });

  it('should remove a pending id', async () => {
    const queue = new InMemoryJobQueue();
    await queue.enqueue('a');
    await queue.enqueue('b');

    expect(await queue.remove('a')).toBe(true);
    expect(await queue.remove('a')).toBe(false);
    expect(await queue.dequeue()).toBe('b');
  });
});
