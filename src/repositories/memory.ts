import { BatchJob, isTerminal } from '../types/batch.js';
import { JobMutation, JobQueue, JobStore } from './base.js';

interface StoredJob {
  job: BatchJob;
  expiresAt: number;
}

export interface InMemoryJobStoreOptions {
  ttlSeconds: number;
  now?: () => number;
}

/**
 * Process-local job table. Only valid when submission and the worker pool
 * share one process. Records are copied on the way in and out so callers
 * never hold a live reference to stored state.
 */
export class InMemoryJobStore implements JobStore {
  readonly kind = 'memory' as const;
  private jobs = new Map<string, StoredJob>();
  private readonly now: () => number;

  constructor(private readonly options: InMemoryJobStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  async put(job: BatchJob): Promise<void> {
    this.write(job);
  }

  async get(id: string): Promise<BatchJob | null> {
    return this.read(id);
  }

  async update(id: string, mutate: JobMutation): Promise<BatchJob | null> {
    // Read, mutate and write in one synchronous step
    const current = this.read(id);
    if (!current || isTerminal(current.status)) return current;

    const next = mutate(current);
    if (!next) return current;
    this.write(next);
    return structuredClone(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }

  purgeExpired(): number {
    const now = this.now();
    let removed = 0;

    for (const [id, stored] of this.jobs) {
      if (stored.expiresAt <= now) {
        this.jobs.delete(id);
        removed++;
      }
    }

    return removed;
  }

  get size(): number {
    return this.jobs.size;
  }

  private read(id: string): BatchJob | null {
    const stored = this.jobs.get(id);
    if (!stored) return null;

    if (stored.expiresAt <= this.now()) {
      this.jobs.delete(id);
      return null;
    }

    return structuredClone(stored.job);
  }

  private write(job: BatchJob): void {
    this.jobs.set(job.id, {
      job: structuredClone(job),
      expiresAt: this.now() + this.options.ttlSeconds * 1000,
    });
  }
}

export class InMemoryJobQueue implements JobQueue {
  private ids: string[] = [];

  async enqueue(id: string): Promise<void> {
    this.ids.push(id);
  }

  async dequeue(): Promise<string | null> {
    return this.ids.shift() ?? null;
  }

  async remove(id: string): Promise<boolean> {
    const before = this.ids.length;
    this.ids = this.ids.filter(queued => queued !== id);
    return this.ids.length < before;
  }

  async size(): Promise<number> {
    return this.ids.length;
  }
}
