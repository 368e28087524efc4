import { z } from 'zod';
import { BatchJob, isTerminal } from '../types/batch.js';
import { BatchJobRecordSchema } from '../schemas/batch.js';
import { InternalError, describeError } from '../errors.js';
import { JobMutation, JobQueue, JobStore } from './base.js';

const UpstashResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z.string().optional(),
});

/**
 * Minimal Upstash Redis REST client: one command per POST, the command as a
 * JSON array of strings.
 */
export class UpstashClient {
  private baseUrl: string;
  private token: string;

  constructor(url: string, token: string) {
    this.baseUrl = url.replace(/\/$/, '');
    this.token = token;
  }

  async command(command: string[]): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(command),
      });
    } catch (error) {
      throw new InternalError('STORE_UNAVAILABLE', describeError(error), error);
    }

    if (!response.ok) {
      throw new InternalError('STORE_UNAVAILABLE', `Redis request failed: ${response.status} ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new InternalError('STORE_UNAVAILABLE', 'Redis response is not JSON', error);
    }

    const parsed = UpstashResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new InternalError('STORE_UNAVAILABLE', 'Unexpected Redis response shape');
    }
    if (parsed.data.error) {
      throw new InternalError('STORE_UNAVAILABLE', `Redis error: ${parsed.data.error}`);
    }

    return parsed.data.result ?? null;
  }
}

function expectString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function expectNumber(value: unknown): number {
  return typeof value === 'number' ? value : Number(value ?? 0);
}

/** Sets KEYS[1] to ARGV[2] (EX ARGV[3]) only while it still holds ARGV[1]. */
export const COMPARE_AND_SET_SCRIPT = [
  "if redis.call('GET', KEYS[1]) ~= ARGV[1] then return 0 end",
  "redis.call('SET', KEYS[1], ARGV[2], 'EX', ARGV[3])",
  'return 1',
].join('\n');

const MAX_UPDATE_ATTEMPTS = 5;

export interface RedisJobStoreOptions {
  ttlSeconds: number;
  keyPrefix?: string;
}

export class RedisJobStore implements JobStore {
  readonly kind = 'redis' as const;

  constructor(private client: UpstashClient, private options: RedisJobStoreOptions) {}

  private jobKey(id: string): string {
    return `${this.options.keyPrefix ?? ''}job:${id}`;
  }

  private serializeJob(job: BatchJob): string {
    try {
      return JSON.stringify(job);
    } catch (error) {
      throw new InternalError('SERIALIZATION_FAILED', describeError(error), error);
    }
  }

  private deserializeJob(data: string): BatchJob {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      throw new InternalError('SERIALIZATION_FAILED', 'Stored job is not valid JSON', error);
    }

    const parsed = BatchJobRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InternalError('SERIALIZATION_FAILED', 'Stored job does not match the record schema', parsed.error);
    }
    return parsed.data;
  }

  async put(job: BatchJob): Promise<void> {
    // SET with EX refreshes the TTL on every write
    await this.client.command(['SET', this.jobKey(job.id), this.serializeJob(job), 'EX', String(this.options.ttlSeconds)]);
  }

  async get(id: string): Promise<BatchJob | null> {
    const data = expectString(await this.client.command(['GET', this.jobKey(id)]));
    return data ? this.deserializeJob(data) : null;
  }

  async update(id: string, mutate: JobMutation): Promise<BatchJob | null> {
    const key = this.jobKey(id);

    for (let attempt = 0; attempt < MAX_UPDATE_ATTEMPTS; attempt++) {
      const raw = expectString(await this.client.command(['GET', key]));
      if (!raw) return null;

      const current = this.deserializeJob(raw);
      if (isTerminal(current.status)) return current;

      const next = mutate(current);
      if (!next) return current;

      const swapped = await this.client.command([
        'EVAL', COMPARE_AND_SET_SCRIPT, '1', key, raw, this.serializeJob(next), String(this.options.ttlSeconds),
      ]);
      if (expectNumber(swapped) === 1) return next;
    }

    throw new InternalError('STORE_UNAVAILABLE', `Job ${id} kept changing during update`);
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.client.command(['DEL', this.jobKey(id)]);
    return expectNumber(removed) > 0;
  }
}

export class RedisJobQueue implements JobQueue {
  constructor(private client: UpstashClient, private keyPrefix = '') {}

  private queueKey(): string {
    return `${this.keyPrefix}queue:batch`;
  }

  async enqueue(id: string): Promise<void> {
    await this.client.command(['LPUSH', this.queueKey(), id]);
  }

  async dequeue(): Promise<string | null> {
    return expectString(await this.client.command(['RPOP', this.queueKey()]));
  }

  async remove(id: string): Promise<boolean> {
    const removed = await this.client.command(['LREM', this.queueKey(), '0', id]);
    return expectNumber(removed) > 0;
  }

  async size(): Promise<number> {
    return expectNumber(await this.client.command(['LLEN', this.queueKey()]));
  }
}
