import { afterEach, describe, expect, it, vi } from 'vitest';
import { ClassificationEngine, type FrameRecognizer } from '../src/pipeline/engine.js';
import { LivenessMonitor } from '../src/pipeline/liveness.js';
import { FailSafeRecognizer } from '../src/recognition/failSafe.js';
import { ResilientEventWriter } from '../src/store/resilientWriter.js';
import { epochMs, type EventSink } from '../src/store/eventStore.js';
import { EventDatabase } from '../src/db.js';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { ThresholdsConfig } from '../src/config/index.js';
import type { AlertPayload, EventRecord, RecognitionOutcome } from '../src/types.js';
import { createTestLogger } from './helpers/logger.js';
import { steppedFrame, uniform } from './helpers/frames.js';

const T = 1_700_000_000_000;

const thresholds: ThresholdsConfig = {
  blurThreshold: 100,
  brightnessMin: 30,
  brightnessMax: 220,
  minFaceSize: 40,
  minDetectionConfidence: 70,
  faceMatchThreshold: 80,
  highSeverityConfidence: 90,
  ambiguityMargin: 10,
  duplicateSimilarity: 0.95
};

const cameras = [
  { id: 'entrance', name: 'Front entrance', location: 'Main gate' },
  { id: 'yard', name: 'Back yard', location: 'Rear fence' }
];

const rising = steppedFrame('rising');
const falling = steppedFrame('falling');

const openDatabases: EventDatabase[] = [];

function fixed(outcome: RecognitionOutcome): FrameRecognizer {
  return { recognize: async () => outcome };
}

function matched(confidence: number, similarity: number): RecognitionOutcome {
  return { confidence, match: { similarity, faceId: 'face-1', name: 'Dana' }, degraded: null };
}

function deferred() {
  const pending: Array<(outcome: RecognitionOutcome) => void> = [];
  const recognizer: FrameRecognizer = {
    recognize: () =>
      new Promise<RecognitionOutcome>(resolve => {
        pending.push(resolve);
      })
  };
  return { recognizer, pending };
}

function createHarness(recognizer: FrameRecognizer, sink?: EventSink) {
  const metrics = new MetricsRegistry();
  const log = createTestLogger();
  const database = new EventDatabase(':memory:');
  openDatabases.push(database);
  const writer = new ResilientEventWriter({
    sink: sink ?? database,
    maxRetries: 0,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 0,
    fallbackCapacity: 10,
    log,
    metrics
  });
  const bus = new EventBus({ log, metrics });
  const liveness = new LivenessMonitor({ heartbeatTimeoutMs: 60_000, log, metrics, now: () => T });
  const alerts = { notify: vi.fn<(alert: AlertPayload) => void>() };
  const engine = new ClassificationEngine({
    thresholds,
    cameras,
    recognizer,
    writer,
    alerts,
    liveness,
    reader: database,
    registry: database,
    bus,
    log,
    metrics,
    now: () => T
  });
  const events: EventRecord[] = [];
  bus.on('event', event => {
    events.push(event);
  });
  return { engine, database, writer, bus, alerts, metrics, log, events };
}

afterEach(() => {
  for (const database of openDatabases.splice(0)) {
    database.close();
  }
});

describe('ClassificationEngine', () => {
  it('records an authorized person without alerting', async () => {
    const { engine, database, alerts } = createHarness(fixed(matched(95, 96)));

    const outcome = await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });
    await engine.flush();

    const expected: EventRecord = {
      eventId: 'entrance-1700000000000',
      cameraId: 'entrance',
      timestamp: epochMs(T),
      classification: 'authorized',
      personDetected: true,
      authorized: true,
      confidence: 95,
      faceSimilarity: 96,
      personName: 'Dana',
      faceId: 'face-1',
      severity: 'low',
      degraded: null,
      reviewed: false
    };
    expect(outcome).toEqual({ status: 'processed', event: expected, alerted: false });
    expect(alerts.notify).not.toHaveBeenCalled();
    expect(database.getEvent('entrance-1700000000000')).toEqual(expected);
  });

  it('raises a high severity alert for a confident unmatched person', async () => {
    const { engine, alerts } = createHarness(fixed(matched(95, 40)));

    const outcome = await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });

    expect(outcome).toMatchObject({
      status: 'processed',
      alerted: true,
      event: { classification: 'intruder', severity: 'high', faceSimilarity: 40, personName: null }
    });
    expect(alerts.notify).toHaveBeenCalledTimes(1);
    expect(alerts.notify.mock.calls[0]?.[0]).toEqual({
      eventId: 'entrance-1700000000000',
      cameraId: 'entrance',
      cameraName: 'Front entrance',
      location: 'Main gate',
      severity: 'high',
      classification: 'intruder',
      confidence: 95,
      similarity: 40,
      timestamp: T,
      message: 'Intruder detected at Main gate (confidence 95.0%); closest face match 40.0%'
    });
  });

  it('sends near misses to review at medium severity', async () => {
    const { engine, alerts } = createHarness(fixed(matched(95, 75)));

    const outcome = await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });

    expect(outcome).toMatchObject({ status: 'processed', alerted: true, event: { severity: 'medium' } });
    expect(alerts.notify.mock.calls[0]?.[0]?.severity).toBe('medium');
  });

  it('records frames without a person and stays quiet', async () => {
    const { engine, alerts } = createHarness(fixed(matched(40, 99)));

    const outcome = await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });

    expect(outcome).toMatchObject({
      status: 'processed',
      alerted: false,
      event: { classification: 'no-person', severity: 'none', personDetected: false, faceSimilarity: null }
    });
    expect(alerts.notify).not.toHaveBeenCalled();
  });

  it('classifies as intruder when recognition times out', async () => {
    const recognizer = new FailSafeRecognizer({
      recognizer: { detectAndMatch: () => new Promise(() => {}) },
      timeoutMs: 20,
      fallbackConfidence: 70,
      minFaceSize: 40,
      log: createTestLogger(),
      metrics: new MetricsRegistry()
    });
    const { engine, alerts } = createHarness(recognizer);

    const confident = await engine.submitFrame({
      cameraId: 'entrance',
      timestamp: T,
      image: rising,
      detectionConfidence: 95
    });
    const hesitant = await engine.submitFrame({
      cameraId: 'entrance',
      timestamp: T + 1000,
      image: falling,
      detectionConfidence: 75
    });

    expect(confident).toMatchObject({
      status: 'processed',
      alerted: true,
      event: { classification: 'intruder', severity: 'high', degraded: 'timeout', confidence: 95 }
    });
    expect(hesitant).toMatchObject({ status: 'processed', event: { severity: 'medium', degraded: 'timeout' } });
    expect(alerts.notify).toHaveBeenCalledTimes(2);
  });

  it('falls back to a degraded intruder when the recognizer rejects', async () => {
    const { engine } = createHarness({
      recognize: async () => {
        throw new Error('recognizer crashed');
      }
    });

    const outcome = await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });

    expect(outcome).toMatchObject({
      status: 'processed',
      event: { classification: 'intruder', confidence: 70, severity: 'medium', degraded: 'error' }
    });
  });

  it('keeps the detection hint when the recognizer rejects', async () => {
    const { engine, alerts } = createHarness({
      recognize: async () => {
        throw new Error('recognizer crashed');
      }
    });

    const outcome = await engine.submitFrame({
      cameraId: 'entrance',
      timestamp: T,
      image: rising,
      detectionConfidence: 95
    });

    expect(outcome).toMatchObject({
      status: 'processed',
      alerted: true,
      event: { classification: 'intruder', confidence: 95, severity: 'high', degraded: 'error' }
    });
    expect(alerts.notify).toHaveBeenCalledTimes(1);
  });

  it('alerts and stores even when an event listener throws', async () => {
    const { engine, bus, database, alerts, metrics } = createHarness(fixed(matched(95, 40)));
    bus.on('event', () => {
      throw new Error('listener failed');
    });

    const outcome = await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });
    await engine.flush();

    expect(outcome).toMatchObject({ status: 'processed', alerted: true, event: { severity: 'high' } });
    expect(alerts.notify).toHaveBeenCalledTimes(1);
    expect(database.getEvent('entrance-1700000000000')?.classification).toBe('intruder');
    expect(metrics.getCounter('pipeline', 'errors')).toBe(1);
  });

  it('scales a seconds timestamp exactly once', async () => {
    const { engine, database } = createHarness(fixed(matched(95, 40)));

    const outcome = await engine.submitFrame({ cameraId: 'entrance', timestamp: 1000, image: rising });
    const later = await engine.submitFrame({ cameraId: 'entrance', timestamp: 1_000_500, image: falling });
    await engine.flush();

    expect(outcome).toMatchObject({
      status: 'processed',
      event: { eventId: 'entrance-1000000', timestamp: 1_000_000 }
    });
    expect(later).toMatchObject({ status: 'processed', event: { timestamp: 1_000_500_000 } });
    expect(database.getEvent('entrance-1000000')?.timestamp).toBe(1_000_000);
  });

  it('registers cameras at run time and skips frames from inactive ones', async () => {
    const { engine, database, metrics } = createHarness(fixed(matched(95, 96)));

    engine.registerCamera({ id: 'gate', name: 'Side gate', location: 'Driveway', active: false });
    expect(database.listCameras()).toEqual([{ id: 'gate', name: 'Side gate', location: 'Driveway', active: false }]);
    await expect(engine.submitFrame({ cameraId: 'gate', timestamp: T, image: rising })).resolves.toEqual({
      status: 'rejected',
      cameraId: 'gate',
      reason: 'inactive-camera'
    });
    expect(metrics.getCounter('pipeline', 'frames.rejected.inactive-camera')).toBe(1);
    expect(engine.submitHeartbeat('gate', T)).toMatchObject({ status: 'recorded', cameraId: 'gate' });

    expect(engine.updateCamera('gate', { active: true })).toEqual({
      id: 'gate',
      name: 'Side gate',
      location: 'Driveway',
      active: true
    });
    await expect(engine.submitFrame({ cameraId: 'gate', timestamp: T, image: rising })).resolves.toMatchObject({
      status: 'processed'
    });

    expect(engine.removeCamera('gate')).toBe(true);
    expect(database.listCameras()).toEqual([]);
    await expect(engine.submitFrame({ cameraId: 'gate', timestamp: T + 1000, image: rising })).resolves.toMatchObject({
      status: 'rejected',
      reason: 'unknown-camera'
    });

    engine.registerCamera({ id: 'gate', name: 'Side gate', location: 'Driveway' });
    await expect(engine.submitFrame({ cameraId: 'gate', timestamp: T, image: rising })).resolves.toMatchObject({
      status: 'processed'
    });

    expect(() => engine.registerCamera({ id: 'entrance', name: 'Front entrance', location: 'Main gate' })).toThrow(
      'Camera "entrance" is already registered'
    );
    expect(engine.updateCamera('garage', { active: false })).toBeNull();
    expect(engine.removeCamera('garage')).toBe(false);
  });

  it('suppresses a repeated frame', async () => {
    const { engine, database } = createHarness(fixed(matched(95, 40)));

    await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });
    const repeat = await engine.submitFrame({ cameraId: 'entrance', timestamp: T + 1000, image: rising });
    await engine.flush();

    expect(repeat).toEqual({ status: 'rejected', cameraId: 'entrance', reason: 'duplicate' });
    expect(database.listEvents().total).toBe(1);
  });

  it('emits events in submission order even when recognition finishes out of order', async () => {
    const { recognizer, pending } = deferred();
    const { engine, events } = createHarness(recognizer);

    const first = engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });
    const second = engine.submitFrame({ cameraId: 'entrance', timestamp: T + 1000, image: falling });
    expect(pending).toHaveLength(2);

    pending[1]?.(matched(95, 40));
    pending[0]?.(matched(95, 96));
    await Promise.all([first, second]);

    expect(events.map(event => event.timestamp)).toEqual([T, T + 1000]);
  });

  it('does not hold one camera behind another', async () => {
    const entranceResolvers: Array<(outcome: RecognitionOutcome) => void> = [];
    const { engine } = createHarness({
      recognize: request =>
        request.cameraId === 'entrance'
          ? new Promise<RecognitionOutcome>(resolve => {
              entranceResolvers.push(resolve);
            })
          : Promise.resolve(matched(95, 40))
    });

    const entrance = engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });
    const yard = await engine.submitFrame({ cameraId: 'yard', timestamp: T, image: rising });

    expect(yard).toMatchObject({ status: 'processed', event: { eventId: 'yard-1700000000000' } });

    entranceResolvers[0]?.(matched(95, 96));
    await expect(entrance).resolves.toMatchObject({ status: 'processed', event: { classification: 'authorized' } });
  });

  it('abandons frames in flight when stopped', async () => {
    const { recognizer, pending } = deferred();
    const { engine, metrics, events } = createHarness(recognizer);

    const inFlight = engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });
    engine.stop();
    pending[0]?.(matched(95, 40));

    await expect(inFlight).resolves.toEqual({ status: 'abandoned', cameraId: 'entrance', timestamp: T });
    await expect(
      engine.submitFrame({ cameraId: 'entrance', timestamp: T + 1000, image: falling })
    ).resolves.toEqual({ status: 'abandoned', cameraId: 'entrance', timestamp: T + 1000 });
    expect(events).toEqual([]);
    expect(metrics.getCounter('pipeline', 'frames.abandoned')).toBe(1);
  });

  it('rejects frames that fail the cheap checks', async () => {
    const { engine, metrics } = createHarness(fixed(matched(95, 40)));

    await expect(engine.submitFrame({ cameraId: 'garage', image: rising })).resolves.toEqual({
      status: 'rejected',
      cameraId: 'garage',
      reason: 'unknown-camera'
    });
    await expect(engine.submitFrame({ cameraId: 'entrance', timestamp: 'garbage', image: rising })).resolves.toEqual({
      status: 'rejected',
      cameraId: 'entrance',
      reason: 'invalid-timestamp',
      detail: 'Invalid timestamp: garbage'
    });
    await expect(
      engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: Buffer.from('not a png') })
    ).resolves.toMatchObject({ status: 'rejected', reason: 'decode' });
    await expect(
      engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: uniform(18, 16, 128) })
    ).resolves.toEqual({
      status: 'rejected',
      cameraId: 'entrance',
      reason: 'blur',
      detail: 'sharpness=0.0 brightness=128.0'
    });
    expect(metrics.getCounter('pipeline', 'frames.rejected.blur')).toBe(1);
  });

  it('rejects frames older than the last one submitted for the camera', async () => {
    const { engine } = createHarness(fixed(matched(95, 40)));

    await engine.submitFrame({ cameraId: 'entrance', timestamp: T + 1000, image: rising });
    const late = await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: falling });
    const sameInstant = await engine.submitFrame({ cameraId: 'entrance', timestamp: T + 1000, image: falling });
    const otherCamera = await engine.submitFrame({ cameraId: 'yard', timestamp: T, image: falling });

    expect(late).toEqual({
      status: 'rejected',
      cameraId: 'entrance',
      reason: 'out-of-order',
      detail: '1700000000000 < 1700000001000'
    });
    expect(sameInstant.status).toBe('processed');
    expect(otherCamera.status).toBe('processed');
  });

  it('serves parked events while the store is failing', async () => {
    const failingSink: EventSink = {
      putEvent: () => {
        throw new Error('database locked');
      }
    };
    const { engine, writer } = createHarness(fixed(matched(95, 40)), failingSink);

    await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });
    await engine.flush();

    expect(writer.isDegraded()).toBe(true);
    expect(engine.recentEvents('entrance').map(event => event.eventId)).toEqual(['entrance-1700000000000']);
    expect(engine.recentEvents('yard')).toEqual([]);
  });

  it('records heartbeats and reports camera state', async () => {
    const { engine } = createHarness(fixed(matched(95, 40)));

    expect(engine.submitHeartbeat('entrance', T)).toEqual({
      status: 'recorded',
      cameraId: 'entrance',
      result: {
        accepted: true,
        status: 'online',
        lastHeartbeat: T,
        transition: { cameraId: 'entrance', from: 'unknown', to: 'online', at: T, lastHeartbeat: T }
      }
    });
    expect(engine.submitHeartbeat('garage', T)).toEqual({ status: 'rejected', cameraId: 'garage', reason: 'unknown-camera' });

    await engine.submitFrame({ cameraId: 'entrance', timestamp: T, image: rising });
    await engine.flush();

    const overview = engine.cameraOverview(T + 1000);
    expect(overview.map(camera => [camera.cameraId, camera.status, camera.recentEvents.length])).toEqual([
      ['entrance', 'online', 1],
      ['yard', 'unknown', 0]
    ]);
    expect(overview[0]).toMatchObject({ name: 'Front entrance', location: 'Main gate', lastHeartbeat: T });
  });
});
