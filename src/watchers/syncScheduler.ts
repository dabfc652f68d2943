/**
 * Periodic remote sync. A tick that fires while the previous sync is still
 * running is skipped rather than queued.
 */
import type { SyncReport } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('sync');

export type TickResult =
  | { status: 'completed'; report: SyncReport }
  | { status: 'skipped' }
  | { status: 'failed'; error: string };

export class SyncScheduler {
  private timer?: NodeJS.Timeout;
  private running?: Promise<TickResult>;
  private lastResult?: { at: string; result: TickResult };

  constructor(
    private readonly task: () => Promise<SyncReport>,
    private readonly intervalMs: number
  ) {}

  get isRunning(): boolean {
    return this.running !== undefined;
  }

  get last(): { at: string; result: TickResult } | undefined {
    return this.lastResult;
  }

  start(options: { immediate?: boolean } = {}): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    logger.info(`Remote sync every ${Math.round(this.intervalMs / 1000)}s`);
    if (options.immediate) {
      void this.tick();
    }
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.running) {
      await this.running;
    }
  }

  tick(): Promise<TickResult> {
    if (this.running) {
      logger.debug('Previous sync still running; skipping this tick');
      return Promise.resolve({ status: 'skipped' });
    }
    const running = this.runTask();
    this.running = running;
    void running.finally(() => {
      this.running = undefined;
    });
    return running;
  }

  private async runTask(): Promise<TickResult> {
    let result: TickResult;
    try {
      result = { status: 'completed', report: await this.task() };
    } catch (error) {
      logger.error('Remote sync failed:', errorMessage(error));
      result = { status: 'failed', error: errorMessage(error) };
    }
    this.lastResult = { at: new Date().toISOString(), result };
    return result;
  }
}
