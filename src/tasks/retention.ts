import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { EventDatabase } from '../db.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export type RetentionStore = Pick<EventDatabase, 'pruneEventsOlderThan'>;

export interface RetentionTaskOptions {
  enabled?: boolean;
  retentionDays: number;
  intervalMs: number;
  store: RetentionStore;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export type RetentionRunResult =
  | { skipped: true; reason: 'disabled'; removed: 0; cutoff: null }
  | { skipped: false; removed: number; cutoff: number };

export function retentionCutoff(now: number, retentionDays: number): number {
  return now - Math.max(0, retentionDays) * DAY_MS;
}

export async function runRetentionOnce(options: RetentionTaskOptions): Promise<RetentionRunResult> {
  const logger = options.logger ?? loggerModule;
  const metrics = options.metrics ?? metricsModule;

  if (options.enabled === false) {
    return { skipped: true, reason: 'disabled', removed: 0, cutoff: null };
  }

  const cutoff = retentionCutoff(options.now?.() ?? Date.now(), options.retentionDays);
  const removed = await metrics.time('retention.ms', async () => options.store.pruneEventsOlderThan(cutoff));

  metrics.incrementCounter('retention', 'runs');
  metrics.incrementCounter('retention', 'removed', removed);
  logger.info({ removed, cutoff, retentionDays: options.retentionDays }, 'Retention run completed');

  return { skipped: false, removed, cutoff };
}

export class RetentionTask {
  private readonly options: RetentionTaskOptions;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;

  constructor(options: RetentionTaskOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  start() {
    if (this.timer || this.options.enabled === false) {
      return;
    }

    this.stopped = false;
    this.scheduleNext(0);
  }

  stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isScheduled(): boolean {
    return this.timer !== null;
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce();
    }, delayMs);
    this.timer.unref();
  }

  private async runOnce() {
    if (this.running) {
      return;
    }

    this.running = true;
    try {
      await runRetentionOnce({ ...this.options, logger: this.logger, metrics: this.metrics });
    } catch (error) {
      this.metrics.recordError('retention', error instanceof Error ? error.message : String(error));
      this.logger.error({ err: error }, 'Retention task failed');
    } finally {
      this.running = false;
      this.scheduleNext(this.options.intervalMs);
    }
  }
}

export function startRetentionTask(options: RetentionTaskOptions): RetentionTask {
  const task = new RetentionTask(options);
  task.start();
  return task;
}
