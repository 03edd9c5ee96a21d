import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { StoreConfig } from '../config/index.js';
import type { EventRecord } from '../types.js';
import type { EventSink } from './eventStore.js';

const COMPONENT = 'store';

export type ResilientWriterOptions = Pick<
  StoreConfig,
  'maxRetries' | 'retryBaseDelayMs' | 'retryMaxDelayMs' | 'fallbackCapacity'
> & {
  sink: EventSink;
  log?: Logger;
  metrics?: MetricsRegistry;
  sleep?: (ms: number) => Promise<void>;
};

export type DegradedSignal = {
  error: string;
  parked: number;
  since: number;
};

export function computeRetryDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const minDelayMs = Math.max(0, baseDelayMs);
  const cappedMax = Math.max(minDelayMs, maxDelayMs);
  if (attempt <= 1) {
    return minDelayMs;
  }
  return Math.min(cappedMax, Math.round(minDelayMs * 2 ** (attempt - 1)));
}

/**
 * Persists event records without ever rejecting. Writes that exhaust their retries are
 * parked in a bounded buffer and the writer reports degraded mode until a later write
 * succeeds and the buffer drains.
 */
type ResilientWriterEvents = {
  degraded: [DegradedSignal];
  recovered: [{ since: number }];
};

export class ResilientEventWriter extends EventEmitter<ResilientWriterEvents> {
  private readonly options: ResilientWriterOptions;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly parked = new Map<string, EventRecord>();
  private readonly inFlight = new Set<Promise<boolean>>();
  private degradedSince: number | null = null;
  private lastError: string | null = null;

  constructor(options: ResilientWriterOptions) {
    super();
    this.options = options;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.metrics.setGauge(COMPONENT, 'degraded', 0);
  }

  write(record: EventRecord): Promise<boolean> {
    const task = this.persist(record);
    this.inFlight.add(task);
    void task.finally(() => {
      this.inFlight.delete(task);
    });
    return task;
  }

  isDegraded(): boolean {
    return this.degradedSince !== null;
  }

  degradedSignal(): DegradedSignal | null {
    if (this.degradedSince === null) {
      return null;
    }
    return { error: this.lastError ?? 'unknown error', parked: this.parked.size, since: this.degradedSince };
  }

  parkedEvents(cameraId?: string): EventRecord[] {
    const records = Array.from(this.parked.values());
    return cameraId ? records.filter(record => record.cameraId === cameraId) : records;
  }

  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  private async persist(record: EventRecord): Promise<boolean> {
    const { maxRetries, retryBaseDelayMs, retryMaxDelayMs } = this.options;
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
      if (attempt > 0) {
        this.metrics.incrementCounter(COMPONENT, 'retries');
        await this.sleep(computeRetryDelay(attempt, retryBaseDelayMs, retryMaxDelayMs));
      }

      try {
        await this.metrics.time('store.write.ms', () => this.options.sink.putEvent(record));
        this.metrics.incrementCounter(COMPONENT, 'writes');
        this.parked.delete(record.eventId);
        await this.drainParked();
        return true;
      } catch (error) {
        lastError = error;
        this.log.warn(
          { err: error, eventId: record.eventId, attempt: attempt + 1, maxAttempts: maxRetries + 1 },
          'Event store write failed'
        );
      }
    }

    this.metrics.incrementCounter(COMPONENT, 'failures');
    this.park(record, lastError);
    return false;
  }

  private park(record: EventRecord, error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    this.lastError = message;
    this.metrics.recordError(COMPONENT, message);

    if (this.options.fallbackCapacity <= 0) {
      this.log.error({ eventId: record.eventId }, 'Event record dropped; no fallback capacity');
      this.metrics.incrementCounter(COMPONENT, 'dropped');
    } else {
      // re-parking the same key keeps the newest record
      this.parked.delete(record.eventId);
      this.parked.set(record.eventId, record);
      this.metrics.incrementCounter(COMPONENT, 'fallbacks');
      while (this.parked.size > this.options.fallbackCapacity) {
        const oldest = this.parked.keys().next();
        if (oldest.done) {
          break;
        }
        this.parked.delete(oldest.value);
        this.metrics.incrementCounter(COMPONENT, 'dropped');
        this.log.error({ eventId: oldest.value }, 'Parked event record dropped; fallback buffer full');
      }
    }

    this.metrics.setGauge(COMPONENT, 'parked', this.parked.size);

    if (this.degradedSince === null) {
      this.degradedSince = Date.now();
      this.metrics.setGauge(COMPONENT, 'degraded', 1);
      const signal: DegradedSignal = { error: message, parked: this.parked.size, since: this.degradedSince };
      this.log.warn({ parked: signal.parked, error: message }, 'Event store degraded');
      this.emit('degraded', signal);
    }
  }

  private async drainParked() {
    for (const [eventId, parked] of Array.from(this.parked.entries())) {
      try {
        await this.options.sink.putEvent(parked);
        this.parked.delete(eventId);
        this.metrics.incrementCounter(COMPONENT, 'replayed');
      } catch (error) {
        this.log.warn({ err: error, eventId }, 'Parked event replay failed');
        break;
      }
    }
    this.afterDrain();
  }

  private afterDrain() {
    this.metrics.setGauge(COMPONENT, 'parked', this.parked.size);
    if (this.degradedSince !== null && this.parked.size === 0) {
      const since = this.degradedSince;
      this.degradedSince = null;
      this.lastError = null;
      this.metrics.setGauge(COMPONENT, 'degraded', 0);
      this.log.info({ degradedForMs: Date.now() - since }, 'Event store recovered');
      this.emit('recovered', { since });
    }
  }
}
