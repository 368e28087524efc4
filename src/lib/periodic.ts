import type { Logger } from '../logger.js';

export interface PeriodicTaskOptions {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown> | unknown;
  logger?: Logger;
}

/**
 * Runs `run` every `intervalMs` on a setTimeout chain, so runs never
 * overlap. `stop()` cancels the next run and waits for the current one.
 */
export class PeriodicTask {
  private timer?: NodeJS.Timeout;
  private current?: Promise<void>;
  private active = false;
  private runs = 0;

  constructor(private readonly options: PeriodicTaskOptions) {}

  get isActive(): boolean {
    return this.active;
  }

  get runCount(): number {
    return this.runs;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.schedule();
  }

  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.current;
  }

  /** Runs once immediately, outside the schedule. */
  async runNow(): Promise<void> {
    await this.current;
    this.current = this.execute();
    await this.current;
  }

  private schedule(): void {
    if (!this.active) return;

    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.current = this.execute();
      void this.current.finally(() => this.schedule());
    }, this.options.intervalMs);
    this.timer.unref();
  }

  private async execute(): Promise<void> {
    try {
      await this.options.run();
    } catch (error) {
      this.options.logger?.error({ err: error, task: this.options.name }, 'periodic task failed');
    } finally {
      this.runs++;
    }
  }
}
