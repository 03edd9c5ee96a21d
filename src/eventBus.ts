import { EventEmitter } from 'node:events';
import logger, { type Logger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import type { AlertPayload, EventRecord, LivenessTransition } from './types.js';

export const EVENT_CHANNEL = 'event';
export const ALERT_CHANNEL = 'alert';
export const CAMERA_CHANNEL = 'camera';

interface EventBusDependencies {
  log: Logger;
  metrics?: MetricsRegistry;
}

type EventBusEvents = {
  [EVENT_CHANNEL]: [EventRecord];
  [ALERT_CHANNEL]: [AlertPayload];
  [CAMERA_CHANNEL]: [LivenessTransition];
};

class EventBus extends EventEmitter<EventBusEvents> {
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: EventBusDependencies = { log: logger }) {
    super();
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;

    this.on(EVENT_CHANNEL, event => {
      this.metrics.recordEvent(event);
      this.log.info(
        {
          eventId: event.eventId,
          cameraId: event.cameraId,
          classification: event.classification,
          severity: event.severity,
          confidence: event.confidence,
          degraded: event.degraded
        },
        `Event ${event.classification}`
      );
    });
  }

  emitEvent(event: EventRecord): boolean {
    return this.emit(EVENT_CHANNEL, event);
  }

  emitAlert(alert: AlertPayload): boolean {
    this.metrics.incrementCounter('alerts', `severity.${alert.severity}`);
    return this.emit(ALERT_CHANNEL, alert);
  }

  emitCameraTransition(transition: LivenessTransition): boolean {
    return this.emit(CAMERA_CHANNEL, transition);
  }
}

const defaultBus = new EventBus();

export default defaultBus;
export { EventBus };
