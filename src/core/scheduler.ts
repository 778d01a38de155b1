import { createLogger, type Logger } from './logger.js';
import { errorMessage } from './errors.js';
import type { BatchResult } from './acquisition.js';

/**
 * Daily batch trigger: runs the crawl once a day at a fixed local time.
 * A run that is still going when the next one is due is not doubled up.
 */

export interface BatchSchedulerOptions {
  runBatch: () => Promise<BatchResult>;
  hour: number;
  minute: number;
  now?: () => Date;
  logger?: Logger;
}

/** Milliseconds from `now` to the next hh:mm local time (tomorrow if already past) */
export function msUntilNextRun(now: Date, hour: number, minute: number): number {
  const next = new Date(now.getTime());
  next.setHours(hour, minute, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next.getTime() - now.getTime();
}

export class BatchScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<BatchResult | null> | null = null;
  private nextRun: Date | null = null;
  private lastResult: BatchResult | null = null;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly options: BatchSchedulerOptions) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger('scheduler');
  }

  start(): void {
    if (this.timer) return;
    this.scheduleNext();
    this.log.info('Batch scheduler started', {
      at: `${String(this.options.hour).padStart(2, '0')}:${String(this.options.minute).padStart(2, '0')}`,
      nextRun: this.nextRun?.toISOString(),
    });
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.nextRun = null;
      this.log.info('Batch scheduler stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  isBatchInProgress(): boolean {
    return this.inFlight !== null;
  }

  nextRunAt(): Date | null {
    return this.nextRun;
  }

  getLastResult(): BatchResult | null {
    return this.lastResult;
  }

  /**
   * Run the batch immediately. Resolves to null when a run is already in
   * progress or the batch threw.
   */
  async runNow(): Promise<BatchResult | null> {
    if (this.inFlight) {
      this.log.warn('Batch already running, skipping this trigger');
      return null;
    }

    this.inFlight = this.execute();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async execute(): Promise<BatchResult | null> {
    this.log.info('Batch crawl starting');
    try {
      const result = await this.options.runBatch();
      this.lastResult = result;
      return result;
    } catch (err) {
      this.log.error('Batch crawl failed', { error: errorMessage(err) });
      return null;
    }
  }

  private scheduleNext(): void {
    const delay = msUntilNextRun(this.now(), this.options.hour, this.options.minute);
    this.nextRun = new Date(this.now().getTime() + delay);
    this.timer = setTimeout(() => {
      void this.runNow().then(() => {
        if (this.timer) this.scheduleNext();
      });
    }, delay);
  }
}
