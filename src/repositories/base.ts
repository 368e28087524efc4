import { BatchJob } from '../types/batch.js';

export type StoreKind = 'memory' | 'redis';

export type JobMutation = (job: BatchJob) => BatchJob | null;

/**
 * TTL-backed record store for batch jobs. A read after the TTL has elapsed
 * returns `null`, exactly as for an id that never existed.
 */
export interface JobStore {
  readonly kind: StoreKind;
  put(job: BatchJob): Promise<void>;
  get(id: string): Promise<BatchJob | null>;
  /**
   * Atomic read-modify-write. `mutate` gets the current record and returns
   * its replacement, or `null` to leave it as is; it may run more than once
   * when a concurrent writer gets in first. A record in a terminal state is
   * never replaced. Resolves to the record as stored afterwards, `null` when
   * there is none.
   */
  update(id: string, mutate: JobMutation): Promise<BatchJob | null>;
  delete(id: string): Promise<boolean>;
}

/** FIFO of job ids waiting for a worker slot. */
export interface JobQueue {
  enqueue(id: string): Promise<void>;
  dequeue(): Promise<string | null>;
  remove(id: string): Promise<boolean>;
  size(): Promise<number>;
}

export interface JobBackend {
  store: JobStore;
  queue: JobQueue;
}
