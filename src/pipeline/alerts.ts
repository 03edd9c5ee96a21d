import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { EventBus } from '../eventBus.js';
import type { CameraConfig } from '../config/index.js';
import type { AlertPayload, EventRecord, Severity } from '../types.js';

const COMPONENT = 'alerts';

/** Fire-and-forget; delivery is not acknowledged back to the engine. */
export interface AlertSink {
  notify(alert: AlertPayload): void;
}

export type AlertCamera = Pick<CameraConfig, 'id' | 'name' | 'location'>;

export function formatAlertMessage(event: EventRecord, camera: AlertCamera): string {
  const base = `Intruder detected at ${camera.location} (confidence ${event.confidence.toFixed(1)}%)`;
  if (event.degraded) {
    return `${base}; face recognition ${event.degraded === 'timeout' ? 'timed out' : 'unavailable'}`;
  }
  if (event.faceSimilarity !== null) {
    return `${base}; closest face match ${event.faceSimilarity.toFixed(1)}%`;
  }
  return base;
}

export function buildAlert(
  event: EventRecord,
  camera: AlertCamera,
  severity: Exclude<Severity, 'none'>
): AlertPayload {
  return {
    eventId: event.eventId,
    cameraId: event.cameraId,
    cameraName: camera.name,
    location: camera.location,
    severity,
    classification: event.classification,
    confidence: event.confidence,
    similarity: event.faceSimilarity,
    timestamp: event.timestamp,
    message: formatAlertMessage(event, camera)
  };
}

export class BusAlertSink implements AlertSink {
  private readonly bus: EventBus;

  constructor(bus: EventBus) {
    this.bus = bus;
  }

  notify(alert: AlertPayload) {
    this.bus.emitAlert(alert);
  }
}

export type WebhookAlertSinkOptions = {
  url: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  log?: Logger;
  metrics?: MetricsRegistry;
};

export class WebhookAlertSink implements AlertSink {
  private readonly options: WebhookAlertSinkOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly pending = new Set<Promise<void>>();

  constructor(options: WebhookAlertSinkOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
  }

  notify(alert: AlertPayload) {
    const delivery = this.deliver(alert);
    this.pending.add(delivery);
    void delivery.finally(() => {
      this.pending.delete(delivery);
    });
  }

  async flush() {
    await Promise.all(Array.from(this.pending));
  }

  private async deliver(alert: AlertPayload) {
    try {
      const res = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(alert),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 5000)
      });
      if (!res.ok) {
        throw new Error(`Alert webhook failed: ${res.status}`);
      }
      this.metrics.incrementCounter(COMPONENT, 'webhook.delivered');
    } catch (error) {
      this.metrics.incrementCounter(COMPONENT, 'webhook.failed');
      this.metrics.recordError(COMPONENT, error instanceof Error ? error.message : String(error));
      this.log.warn({ err: error, eventId: alert.eventId }, 'Alert webhook delivery failed');
    }
  }
}

export class CompositeAlertSink implements AlertSink {
  private readonly sinks: AlertSink[];
  private readonly log: Logger;

  constructor(sinks: AlertSink[], log: Logger = logger) {
    this.sinks = sinks;
    this.log = log;
  }

  notify(alert: AlertPayload) {
    for (const sink of this.sinks) {
      try {
        sink.notify(alert);
      } catch (error) {
        this.log.warn({ err: error, eventId: alert.eventId }, 'Alert sink threw');
      }
    }
  }
}
