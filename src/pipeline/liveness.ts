import { EventEmitter } from 'node:events';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { CameraStateStore } from '../store/eventStore.js';
import type { CameraState, CameraStatus, LivenessTransition } from '../types.js';

const COMPONENT = 'liveness';

export type LivenessMonitorOptions = {
  heartbeatTimeoutMs: number;
  sweepIntervalMs?: number;
  store?: CameraStateStore;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

export type HeartbeatResult = {
  accepted: boolean;
  status: CameraStatus;
  lastHeartbeat: number;
  transition: LivenessTransition | null;
};

type CameraRecord = {
  lastHeartbeat: number;
  reported: 'online' | 'offline';
};

/** Offline only once strictly more than the timeout has elapsed since the last heartbeat. */
export function deriveStatus(lastHeartbeat: number | null, now: number, timeoutMs: number): CameraStatus {
  if (lastHeartbeat === null) {
    return 'unknown';
  }
  return now - lastHeartbeat > timeoutMs ? 'offline' : 'online';
}

type LivenessEvents = {
  transition: [LivenessTransition];
};

export class LivenessMonitor extends EventEmitter<LivenessEvents> {
  private readonly records = new Map<string, CameraRecord>();
  private readonly options: LivenessMonitorOptions;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: LivenessMonitorOptions) {
    super();
    this.options = options;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? (() => Date.now());
  }

  get timeoutMs() {
    return this.options.heartbeatTimeoutMs;
  }

  /** Seeds the watermark from persisted state, e.g. after a restart. */
  restore(states: CameraState[]) {
    for (const state of states) {
      if (state.lastHeartbeat === null) {
        continue;
      }
      const existing = this.records.get(state.cameraId);
      if (existing && existing.lastHeartbeat >= state.lastHeartbeat) {
        continue;
      }
      this.records.set(state.cameraId, {
        lastHeartbeat: state.lastHeartbeat,
        reported: state.status === 'offline' ? 'offline' : 'online'
      });
    }
  }

  heartbeat(cameraId: string, timestamp: number): HeartbeatResult {
    const record = this.records.get(cameraId);

    if (record && timestamp < record.lastHeartbeat) {
      this.metrics.incrementCounter(COMPONENT, 'stale');
      this.log.debug(
        { cameraId, timestamp, lastHeartbeat: record.lastHeartbeat },
        'Ignoring stale heartbeat'
      );
      return {
        accepted: false,
        status: deriveStatus(record.lastHeartbeat, this.now(), this.options.heartbeatTimeoutMs),
        lastHeartbeat: record.lastHeartbeat,
        transition: null
      };
    }

    let from: CameraStatus = 'unknown';
    if (record) {
      const lapsed = timestamp - record.lastHeartbeat > this.options.heartbeatTimeoutMs;
      from = record.reported === 'offline' || lapsed ? 'offline' : 'online';
    }

    this.records.set(cameraId, { lastHeartbeat: timestamp, reported: 'online' });
    this.metrics.incrementCounter(COMPONENT, 'heartbeats');
    this.persist({ cameraId, lastHeartbeat: timestamp, status: 'online' });

    let transition: LivenessTransition | null = null;
    if (from !== 'online') {
      transition = { cameraId, from, to: 'online', at: timestamp, lastHeartbeat: timestamp };
      this.announce(transition);
    }

    return { accepted: true, status: 'online', lastHeartbeat: timestamp, transition };
  }

  status(cameraId: string, now: number): CameraStatus {
    const record = this.records.get(cameraId);
    return deriveStatus(record ? record.lastHeartbeat : null, now, this.options.heartbeatTimeoutMs);
  }

  lastHeartbeat(cameraId: string): number | null {
    return this.records.get(cameraId)?.lastHeartbeat ?? null;
  }

  describe(cameraId: string, now: number): CameraState {
    return { cameraId, lastHeartbeat: this.lastHeartbeat(cameraId), status: this.status(cameraId, now) };
  }

  /** Emits an online to offline transition once per lapse. */
  sweep(now: number): LivenessTransition[] {
    const transitions: LivenessTransition[] = [];
    for (const [cameraId, record] of this.records) {
      if (record.reported !== 'online') {
        continue;
      }
      if (deriveStatus(record.lastHeartbeat, now, this.options.heartbeatTimeoutMs) !== 'offline') {
        continue;
      }
      record.reported = 'offline';
      const transition: LivenessTransition = {
        cameraId,
        from: 'online',
        to: 'offline',
        at: now,
        lastHeartbeat: record.lastHeartbeat
      };
      this.persist({ cameraId, lastHeartbeat: record.lastHeartbeat, status: 'offline' });
      this.announce(transition);
      transitions.push(transition);
    }
    return transitions;
  }

  start() {
    if (this.timer) {
      return;
    }
    const interval = this.options.sweepIntervalMs ?? 5000;
    this.timer = setInterval(() => {
      this.sweep(this.now());
    }, interval);
    this.timer.unref();
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private announce(transition: LivenessTransition) {
    this.metrics.incrementCounter(COMPONENT, `transitions.${transition.to}`);
    const level = transition.to === 'offline' ? 'warn' : 'info';
    this.log[level](
      { cameraId: transition.cameraId, from: transition.from, to: transition.to, lastHeartbeat: transition.lastHeartbeat },
      `Camera ${transition.to}`
    );
    this.emit('transition', transition);
  }

  private persist(state: CameraState) {
    if (!this.options.store) {
      return;
    }
    try {
      this.options.store.putCameraState(state);
    } catch (error) {
      this.metrics.recordError(COMPONENT, error instanceof Error ? error.message : String(error));
      this.log.warn({ err: error, cameraId: state.cameraId }, 'Failed to persist camera state');
    }
  }
}
