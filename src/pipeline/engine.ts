import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import defaultBus, { type EventBus } from '../eventBus.js';
import type { CameraConfig, StoreConfig, ThresholdsConfig } from '../config/index.js';
import {
  assertCameraId,
  normalize,
  normalizeTimestamp,
  type EventReader,
  type TimestampInput
} from '../store/eventStore.js';
import type { ResilientEventWriter } from '../store/resilientWriter.js';
import type { RecognitionRequest } from '../recognition/failSafe.js';
import { readFrameAsGrayscale, type GrayscaleFrame } from '../video/utils.js';
import type {
  CameraState,
  Classification,
  EpochMs,
  EventRecord,
  FrameInput,
  RecognitionOutcome
} from '../types.js';
import { evaluateQuality, type QualityRejectReason } from './qualityGate.js';
import { DuplicateSuppressor } from './duplicateSuppressor.js';
import { classify } from './decision.js';
import { severityOf, shouldAlert } from './severity.js';
import { buildAlert, type AlertSink } from './alerts.js';
import type { HeartbeatResult, LivenessMonitor } from './liveness.js';

const COMPONENT = 'pipeline';

export type FrameRejectReason =
  | 'unknown-camera'
  | 'inactive-camera'
  | 'invalid-timestamp'
  | 'out-of-order'
  | 'decode'
  | QualityRejectReason
  | 'duplicate';

export type FrameOutcome =
  | { status: 'rejected'; cameraId: string; reason: FrameRejectReason; detail?: string }
  | { status: 'processed'; event: EventRecord; alerted: boolean }
  | { status: 'abandoned'; cameraId: string; timestamp: number }
  | { status: 'failed'; cameraId: string; timestamp: number; error: string };

export type HeartbeatOutcome =
  | { status: 'rejected'; cameraId: string; reason: 'unknown-camera' | 'invalid-timestamp'; detail?: string }
  | { status: 'recorded'; cameraId: string; result: HeartbeatResult };

export type CameraOverview = CameraState & {
  name: string;
  location: string;
  active: boolean;
  recentEvents: EventRecord[];
};

export type CameraPatch = Partial<Omit<CameraConfig, 'id'>>;

/** Persists cameras registered or changed at run time. */
export interface CameraRegistry {
  putCamera(camera: CameraConfig): void;
  deleteCamera(cameraId: string): boolean;
}

export interface FrameRecognizer {
  recognize(request: RecognitionRequest, signal?: AbortSignal): Promise<RecognitionOutcome>;
}

export type ClassificationEngineOptions = {
  thresholds: ThresholdsConfig;
  cameras: readonly CameraConfig[];
  recognizer: FrameRecognizer;
  writer: ResilientEventWriter;
  alerts: AlertSink;
  liveness: LivenessMonitor;
  reader?: EventReader;
  registry?: CameraRegistry;
  recentEventsLimit?: StoreConfig['recentEventsLimit'];
  bus?: EventBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

type CameraLane = {
  tail: Promise<void>;
  lastTimestamp: number | null;
};

type SettledRecognition =
  | { ok: true; outcome: RecognitionOutcome }
  | { ok: false; error: unknown };

/**
 * Runs each camera's frames through gate, suppressor, recognition and classification.
 * Cameras never wait on each other. Within a camera the cheap checks run at submission,
 * recognition starts immediately, and everything after recognition is replayed in
 * submission order on the camera's lane.
 */
export class ClassificationEngine {
  private readonly options: ClassificationEngineOptions;
  private readonly cameras = new Map<string, CameraConfig>();
  private readonly lanes = new Map<string, CameraLane>();
  private readonly suppressor: DuplicateSuppressor;
  private readonly bus: EventBus;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private controller = new AbortController();

  constructor(options: ClassificationEngineOptions) {
    this.options = options;
    for (const camera of options.cameras) {
      this.cameras.set(camera.id, camera);
    }
    this.suppressor = new DuplicateSuppressor(options.thresholds.duplicateSimilarity);
    this.bus = options.bus ?? defaultBus;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? (() => Date.now());
  }

  submitFrame(frame: FrameInput): Promise<FrameOutcome> {
    const { cameraId } = frame;
    this.metrics.incrementCounter(COMPONENT, 'frames.received');

    const camera = this.cameras.get(cameraId);
    if (!camera) {
      return Promise.resolve(this.reject(cameraId, 'unknown-camera'));
    }
    if (camera.active === false) {
      return Promise.resolve(this.reject(cameraId, 'inactive-camera'));
    }

    let timestamp: EpochMs;
    try {
      timestamp = normalizeTimestamp(frame.timestamp, this.now());
    } catch (error) {
      return Promise.resolve(this.reject(cameraId, 'invalid-timestamp', errorMessage(error)));
    }

    const lane = this.laneFor(cameraId);
    if (lane.lastTimestamp !== null && timestamp < lane.lastTimestamp) {
      return Promise.resolve(this.reject(cameraId, 'out-of-order', `${timestamp} < ${lane.lastTimestamp}`));
    }
    lane.lastTimestamp = timestamp;

    let grayscale: GrayscaleFrame;
    try {
      grayscale = readFrameAsGrayscale(frame.image);
    } catch (error) {
      return Promise.resolve(this.reject(cameraId, 'decode', errorMessage(error)));
    }

    const quality = evaluateQuality(grayscale, this.options.thresholds);
    const [qualityReason] = quality.reasons;
    if (qualityReason) {
      return Promise.resolve(
        this.reject(cameraId, qualityReason, `sharpness=${quality.sharpness.toFixed(1)} brightness=${quality.brightness.toFixed(1)}`)
      );
    }

    if (this.suppressor.isDuplicate(cameraId, grayscale)) {
      return Promise.resolve(this.reject(cameraId, 'duplicate'));
    }

    const signal = this.controller.signal;
    if (signal.aborted) {
      return Promise.resolve({ status: 'abandoned', cameraId, timestamp });
    }

    const recognition: Promise<SettledRecognition> = this.options.recognizer
      .recognize({ cameraId, image: frame.image, detectionConfidence: frame.detectionConfidence }, signal)
      .then(
        outcome => ({ ok: true, outcome }),
        (error: unknown) => ({ ok: false, error })
      );

    const result = lane.tail.then(() =>
      this.complete(camera, timestamp, frame.detectionConfidence, recognition, signal)
    );
    lane.tail = result.then(() => undefined);
    return result;
  }

  submitHeartbeat(cameraId: string, timestamp?: TimestampInput): HeartbeatOutcome {
    if (!this.cameras.has(cameraId)) {
      return { status: 'rejected', cameraId, reason: 'unknown-camera' };
    }

    let normalized: number;
    try {
      normalized = normalizeTimestamp(timestamp, this.now());
    } catch (error) {
      return { status: 'rejected', cameraId, reason: 'invalid-timestamp', detail: errorMessage(error) };
    }

    return { status: 'recorded', cameraId, result: this.options.liveness.heartbeat(cameraId, normalized) };
  }

  hasCamera(cameraId: string): boolean {
    return this.cameras.has(cameraId);
  }

  /** Persisted events merged with records still waiting in the writer's fallback buffer. */
  recentEvents(cameraId: string, limit = this.options.recentEventsLimit ?? 20): EventRecord[] {
    const merged = new Map<string, EventRecord>();
    if (this.options.reader) {
      try {
        for (const event of this.options.reader.recentEvents(cameraId, limit)) {
          merged.set(event.eventId, event);
        }
      } catch (error) {
        this.log.warn({ err: error, cameraId }, 'Failed to read recent events from store');
      }
    }
    for (const event of this.options.writer.parkedEvents(cameraId)) {
      merged.set(event.eventId, event);
    }
    return Array.from(merged.values())
      .sort((a, b) => b.timestamp - a.timestamp)
      .slice(0, limit);
  }

  cameraOverview(now: number = this.now()): CameraOverview[] {
    return Array.from(this.cameras.values()).map(camera => this.describeCamera(camera, now));
  }

  describeCamera(camera: CameraConfig, now: number = this.now()): CameraOverview {
    return {
      ...this.options.liveness.describe(camera.id, now),
      name: camera.name,
      location: camera.location,
      active: camera.active !== false,
      recentEvents: this.recentEvents(camera.id)
    };
  }

  getCamera(cameraId: string): CameraConfig | undefined {
    return this.cameras.get(cameraId);
  }

  listCameras(): CameraConfig[] {
    return Array.from(this.cameras.values());
  }

  registerCamera(camera: CameraConfig): CameraConfig {
    if (this.cameras.has(camera.id)) {
      throw new Error(`Camera "${camera.id}" is already registered`);
    }
    assertCameraId(camera.id);
    if (camera.id.trim() !== camera.id) {
      throw new Error(`Camera id "${camera.id}" must not contain surrounding whitespace`);
    }
    return this.store(camera);
  }

  /** Returns null for an unknown camera. Deactivating a camera stops its frames, not its heartbeats. */
  updateCamera(cameraId: string, patch: CameraPatch): CameraConfig | null {
    const existing = this.cameras.get(cameraId);
    if (!existing) {
      return null;
    }
    return this.store({ ...existing, ...patch, id: cameraId });
  }

  removeCamera(cameraId: string): boolean {
    if (!this.cameras.delete(cameraId)) {
      return false;
    }
    this.suppressor.forget(cameraId);
    const lane = this.lanes.get(cameraId);
    if (lane) {
      lane.lastTimestamp = null;
    }
    this.options.registry?.deleteCamera(cameraId);
    this.log.info({ cameraId }, 'Camera removed');
    return true;
  }

  /** Abandons frames still waiting on recognition; later submissions are abandoned too. */
  stop() {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new Error('engine stopped'));
    }
  }

  async flush() {
    await Promise.all(Array.from(this.lanes.values()).map(lane => lane.tail));
    await this.options.writer.flush();
  }

  private store(camera: CameraConfig): CameraConfig {
    this.options.registry?.putCamera(camera);
    this.cameras.set(camera.id, camera);
    this.log.info({ cameraId: camera.id, active: camera.active !== false }, 'Camera saved');
    return camera;
  }

  private laneFor(cameraId: string): CameraLane {
    const existing = this.lanes.get(cameraId);
    if (existing) {
      return existing;
    }
    const created: CameraLane = { tail: Promise.resolve(), lastTimestamp: null };
    this.lanes.set(cameraId, created);
    return created;
  }

  private reject(cameraId: string, reason: FrameRejectReason, detail?: string): FrameOutcome {
    this.metrics.incrementCounter(COMPONENT, `frames.rejected.${reason}`);
    this.log.debug({ cameraId, reason, detail }, 'Frame rejected');
    return detail === undefined ? { status: 'rejected', cameraId, reason } : { status: 'rejected', cameraId, reason, detail };
  }

  private async complete(
    camera: CameraConfig,
    timestamp: EpochMs,
    detectionConfidence: number | undefined,
    recognition: Promise<SettledRecognition>,
    signal: AbortSignal
  ): Promise<FrameOutcome> {
    const settled = await recognition;
    if (signal.aborted) {
      this.metrics.incrementCounter(COMPONENT, 'frames.abandoned');
      return { status: 'abandoned', cameraId: camera.id, timestamp };
    }

    try {
      const outcome: RecognitionOutcome = settled.ok
        ? settled.outcome
        : {
            confidence: detectionConfidence ?? this.options.thresholds.minDetectionConfidence,
            match: null,
            degraded: 'error'
          };
      if (!settled.ok) {
        this.log.warn({ err: settled.error, cameraId: camera.id }, 'Recognizer rejected; using no-match fallback');
      }

      const classification = classify(outcome, this.options.thresholds);
      const event = this.buildEvent(camera.id, timestamp, classification);
      this.metrics.incrementCounter(COMPONENT, 'frames.processed');

      let alerted = false;
      if (shouldAlert(classification) && event.severity !== 'none') {
        alerted = this.fireAlert(event, camera, event.severity);
      }

      void this.options.writer.write(event);
      this.publish(event);
      return { status: 'processed', event, alerted };
    } catch (error) {
      this.metrics.recordError(COMPONENT, errorMessage(error));
      this.log.error({ err: error, cameraId: camera.id, timestamp }, 'Frame processing failed');
      return { status: 'failed', cameraId: camera.id, timestamp, error: errorMessage(error) };
    }
  }

  private buildEvent(cameraId: string, timestamp: EpochMs, classification: Classification): EventRecord {
    const severity = severityOf(classification, this.options.thresholds);
    const base = {
      cameraId,
      timestamp,
      classification: classification.kind,
      confidence: classification.confidence,
      severity,
      reviewed: false
    };

    switch (classification.kind) {
      case 'no-person':
        return normalize({
          ...base,
          personDetected: false,
          authorized: false,
          faceSimilarity: null,
          personName: null,
          faceId: null,
          degraded: null
        });
      case 'authorized':
        return normalize({
          ...base,
          personDetected: true,
          authorized: true,
          faceSimilarity: classification.similarity,
          personName: classification.identity.name,
          faceId: classification.identity.faceId,
          degraded: null
        });
      case 'intruder':
        return normalize({
          ...base,
          personDetected: true,
          authorized: false,
          faceSimilarity: classification.similarity,
          personName: null,
          faceId: null,
          degraded: classification.degraded
        });
    }
  }

  /** Emitted after the alert and the write; listener errors are logged and counted. */
  private publish(event: EventRecord) {
    try {
      this.bus.emitEvent(event);
    } catch (error) {
      this.metrics.recordError(COMPONENT, errorMessage(error));
      this.log.error({ err: error, eventId: event.eventId }, 'Event listener failed');
    }
  }

  private fireAlert(event: EventRecord, camera: CameraConfig, severity: 'low' | 'medium' | 'high'): boolean {
    try {
      this.options.alerts.notify(buildAlert(event, camera, severity));
      this.metrics.incrementCounter(COMPONENT, 'alerts.fired');
      return true;
    } catch (error) {
      this.metrics.incrementCounter(COMPONENT, 'alerts.failed');
      this.log.error({ err: error, eventId: event.eventId }, 'Alert notification failed');
      return false;
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
