import { EventEmitter } from 'node:events';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import { computeRetryDelay } from '../store/resilientWriter.js';

const COMPONENT = 'capture';
const DEFAULT_RESTART_DELAY_MS = 1000;
const DEFAULT_RESTART_MAX_DELAY_MS = 30000;

export type SnapshotSourceOptions = {
  cameraId: string;
  url: string;
  intervalMs: number;
  timeoutMs?: number;
  restartDelayMs?: number;
  restartMaxDelayMs?: number;
  fetch?: typeof fetch;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

export type SnapshotFrame = {
  cameraId: string;
  timestamp: number;
  image: Buffer;
};

export type SnapshotError = {
  cameraId: string;
  error: Error;
  attempt: number;
  delayMs: number;
};

type SnapshotSourceEvents = {
  frame: [SnapshotFrame];
  heartbeat: [{ cameraId: string; timestamp: number }];
  error: [SnapshotError];
};

/**
 * Polls a camera's still-image endpoint. Every successful fetch counts as a heartbeat;
 * failures back off exponentially until the next success resets the attempt counter.
 */
export class SnapshotSource extends EventEmitter<SnapshotSourceEvents> {
  private readonly options: SnapshotSourceOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private failures = 0;
  private running = false;

  constructor(options: SnapshotSourceOptions) {
    super();
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? (() => Date.now());
  }

  get cameraId() {
    return this.options.cameraId;
  }

  /** Consecutive failed fetches since the last success. */
  get failureCount() {
    return this.failures;
  }

  start() {
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule(0);
  }

  stop() {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    this.controller = null;
  }

  /** Fetches one snapshot and returns the delay before the next poll. */
  async pollOnce(): Promise<number> {
    const { cameraId } = this.options;
    const controller = new AbortController();
    this.controller = controller;
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs ?? this.options.intervalMs);

    try {
      const res = await this.fetchImpl(this.options.url, { signal: controller.signal });
      if (!res.ok) {
        throw new Error(`Snapshot request failed: ${res.status}`);
      }
      const image = Buffer.from(await res.arrayBuffer());
      if (image.length === 0) {
        throw new Error('Snapshot response was empty');
      }

      const timestamp = this.now();
      this.failures = 0;
      this.metrics.incrementCounter(COMPONENT, 'snapshots');
      this.emit('heartbeat', { cameraId, timestamp });
      this.emit('frame', { cameraId, timestamp, image });
      return this.options.intervalMs;
    } catch (error) {
      if (!this.running && controller.signal.aborted) {
        return this.options.intervalMs;
      }
      this.failures += 1;
      const delayMs = computeRetryDelay(
        this.failures,
        this.options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS,
        this.options.restartMaxDelayMs ?? DEFAULT_RESTART_MAX_DELAY_MS
      );
      const err = error instanceof Error ? error : new Error(String(error));
      this.metrics.incrementCounter(COMPONENT, 'failures');
      this.log.warn({ err, cameraId, attempt: this.failures, delayMs }, 'Snapshot fetch failed');
      if (this.listenerCount('error') > 0) {
        this.emit('error', { cameraId, error: err, attempt: this.failures, delayMs });
      }
      return delayMs;
    } finally {
      clearTimeout(timeout);
      if (this.controller === controller) {
        this.controller = null;
      }
    }
  }

  private schedule(delayMs: number) {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.pollOnce().then(next => this.schedule(next));
    }, delayMs);
  }
}

export type ConnectionCheck = {
  cameraId: string;
  reachable: boolean;
  status: number | null;
  latencyMs: number;
  error?: string;
};

export type ConnectionCheckOptions = {
  timeoutMs?: number;
  fetch?: typeof fetch;
  now?: () => number;
};

/** One snapshot request; reachable only when it answers 2xx with a non-empty body. */
export async function checkSnapshotUrl(
  cameraId: string,
  url: string | undefined,
  options: ConnectionCheckOptions = {}
): Promise<ConnectionCheck> {
  if (!url) {
    return { cameraId, reachable: false, status: null, latencyMs: 0, error: 'Camera has no snapshot URL' };
  }

  const fetchImpl = options.fetch ?? fetch;
  const now = options.now ?? (() => Date.now());
  const startedAt = now();
  try {
    const res = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs ?? 5000) });
    const body = await res.arrayBuffer();
    const latencyMs = now() - startedAt;
    if (!res.ok) {
      return { cameraId, reachable: false, status: res.status, latencyMs, error: `Snapshot request failed: ${res.status}` };
    }
    if (body.byteLength === 0) {
      return { cameraId, reachable: false, status: res.status, latencyMs, error: 'Snapshot response was empty' };
    }
    return { cameraId, reachable: true, status: res.status, latencyMs };
  } catch (error) {
    return {
      cameraId,
      reachable: false,
      status: null,
      latencyMs: now() - startedAt,
      error: error instanceof Error ? error.message : String(error)
    };
  }
}
