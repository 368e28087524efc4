import { promises as fsp } from 'node:fs';
import { join as joinPath, resolve } from 'node:path';
import { ulid } from 'ulid';
import { z } from 'zod';
import { BatchItemResult, FileResult } from '../types/batch.js';
import { GoneError, InternalError, NotFoundError, describeError } from '../errors.js';

const REFERENCE = /^[A-Za-z0-9_-]{1,64}\.json$/;
const TEMP_SUFFIX = /\.json\.tmp-[0-9A-Z]+$/;

export interface ResultFileManagerOptions {
  dir: string;
  ttlSeconds: number;
  now?: () => number;
}

export interface SweepReport {
  removed: number;
  kept: number;
}

const StoredResultSchema = z.object({
  jobId: z.string(),
  items: z.array(z.unknown()),
});

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Offloads oversized job results to `<dir>/<jobId>.json`.
 *
 * Files are written under a temporary name and renamed into place, so a
 * reader sees either the whole payload or nothing. Each file expires
 * `ttlSeconds` after it was written, independently of the job record.
 */
export class ResultFileManager {
  readonly dir: string;
  private readonly now: () => number;

  constructor(private readonly options: ResultFileManagerOptions) {
    this.dir = resolve(options.dir);
    this.now = options.now ?? Date.now;
  }

  async init(): Promise<void> {
    await fsp.mkdir(this.dir, { recursive: true });
  }

  referenceFor(jobId: string): string {
    const reference = `${jobId}.json`;
    if (!REFERENCE.test(reference)) {
      throw new InternalError('SERIALIZATION_FAILED', `Job id cannot name a result file: ${jobId}`);
    }
    return reference;
  }

  async put(jobId: string, items: BatchItemResult[]): Promise<FileResult> {
    const reference = this.referenceFor(jobId);

    let serialized: string;
    try {
      serialized = JSON.stringify({ jobId, items });
    } catch (error) {
      throw new InternalError('SERIALIZATION_FAILED', describeError(error), error);
    }

    const target = joinPath(this.dir, reference);
    const temp = `${target}.tmp-${ulid()}`;
    const byteSize = Buffer.byteLength(serialized, 'utf8');

    await this.init();
    try {
      await fsp.writeFile(temp, serialized, 'utf8');
      await fsp.rename(temp, target);
    } catch (error) {
      await fsp.rm(temp, { force: true });
      throw new InternalError('INTERNAL_ERROR', `Could not write result file: ${describeError(error)}`, error);
    }

    // mtime is the start of the TTL clock
    const written = new Date(this.now());
    await fsp.utimes(target, written, written);

    return { kind: 'file', reference, itemCount: items.length, byteSize };
  }

  /**
   * Reads a result file back. Items are returned as stored JSON (dates as
   * ISO strings).
   */
  async get(reference: string): Promise<unknown[]> {
    if (!REFERENCE.test(reference)) {
      throw new NotFoundError('RESULT_NOT_FOUND');
    }
    const target = joinPath(this.dir, reference);

    let mtimeMs: number;
    try {
      mtimeMs = (await fsp.stat(target)).mtimeMs;
    } catch (error) {
      if (isMissing(error)) throw new NotFoundError('RESULT_NOT_FOUND');
      throw error;
    }

    if (this.isExpired(mtimeMs)) {
      await fsp.rm(target, { force: true });
      throw new GoneError();
    }

    let text: string;
    try {
      text = await fsp.readFile(target, 'utf8');
    } catch (error) {
      // Swept between stat and read
      if (isMissing(error)) throw new GoneError();
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new InternalError('SERIALIZATION_FAILED', 'Result file is not valid JSON', error);
    }
    const parsed = StoredResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InternalError('SERIALIZATION_FAILED', 'Result file does not match the expected shape');
    }
    return parsed.data.items;
  }

  async delete(reference: string): Promise<boolean> {
    if (!REFERENCE.test(reference)) return false;
    try {
      await fsp.unlink(joinPath(this.dir, reference));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  /** Deletes every expired result file and every stale temporary file. */
  async sweep(): Promise<SweepReport> {
    let names: string[];
    try {
      names = await fsp.readdir(this.dir);
    } catch (error) {
      if (isMissing(error)) return { removed: 0, kept: 0 };
      throw error;
    }

    const report: SweepReport = { removed: 0, kept: 0 };
    for (const name of names) {
      if (!REFERENCE.test(name) && !TEMP_SUFFIX.test(name)) continue;
      const target = joinPath(this.dir, name);
      try {
        const { mtimeMs } = await fsp.stat(target);
        if (this.isExpired(mtimeMs)) {
          await fsp.rm(target, { force: true });
          report.removed++;
        } else {
          report.kept++;
        }
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
    }
    return report;
  }

  private isExpired(mtimeMs: number): boolean {
    return mtimeMs + this.options.ttlSeconds * 1000 <= this.now();
  }
}
