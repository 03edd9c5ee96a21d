import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { createApiRouter, type ApiRouter, type RouterResponse } from '../src/server/routes/api.js';
import { ClassificationEngine } from '../src/pipeline/engine.js';
import { LivenessMonitor } from '../src/pipeline/liveness.js';
import { ResilientEventWriter } from '../src/store/resilientWriter.js';
import { epochMs, normalize } from '../src/store/eventStore.js';
import { EventDatabase } from '../src/db.js';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { registerHealthIndicator, resetAppLifecycle, type HealthStatus } from '../src/app.js';
import type { EventRecord, Severity } from '../src/types.js';
import { createTestLogger } from './helpers/logger.js';
import { steppedFrame, uniform } from './helpers/frames.js';

const T = 1_700_000_000_000;

class MockResponse implements RouterResponse {
  statusCode = 200;
  headersSent = false;
  writableEnded = false;
  headers: Record<string, string> = {};
  readonly chunks: string[] = [];
  readonly done: Promise<void>;
  private markDone: () => void = () => {};
  private readonly closeListeners: Array<() => void> = [];

  constructor() {
    this.done = new Promise(resolve => {
      this.markDone = resolve;
    });
  }

  writeHead(statusCode: number, headers: Record<string, string> = {}) {
    this.statusCode = statusCode;
    this.headers = { ...headers };
    this.headersSent = true;
    return this;
  }

  write(chunk: string) {
    this.chunks.push(chunk);
    return true;
  }

  end(chunk?: string) {
    if (chunk) {
      this.chunks.push(chunk);
    }
    this.writableEnded = true;
    this.markDone();
    return this;
  }

  once(_event: 'close', listener: () => void) {
    this.closeListeners.push(listener);
    return this;
  }

  close() {
    for (const listener of this.closeListeners.splice(0)) {
      listener();
    }
  }

  get body() {
    return this.chunks.join('');
  }

  json(): unknown {
    return JSON.parse(this.body);
  }
}

function makeEvent(cameraId: string, timestamp: number, severity: Severity = 'high'): EventRecord {
  return normalize({
    cameraId,
    timestamp: epochMs(timestamp),
    classification: 'intruder',
    personDetected: true,
    authorized: false,
    confidence: 95,
    faceSimilarity: null,
    personName: null,
    faceId: null,
    severity,
    degraded: null,
    reviewed: false
  });
}

describe('HttpApi', () => {
  let database: EventDatabase;
  let bus: EventBus;
  let engine: ClassificationEngine;
  let metrics: MetricsRegistry;
  let log: ReturnType<typeof createTestLogger>;
  let router: ApiRouter;
  let serviceStatus: HealthStatus;
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    metrics = new MetricsRegistry();
    log = createTestLogger();
    database = new EventDatabase(':memory:');
    bus = new EventBus({ log, metrics });
    serviceStatus = 'ok';
    fetchMock = vi.fn<typeof fetch>(async () => new Response(new Uint8Array([137, 80, 78, 71])));
    const writer = new ResilientEventWriter({
      sink: database,
      maxRetries: 0,
      retryBaseDelayMs: 0,
      retryMaxDelayMs: 0,
      fallbackCapacity: 10,
      log,
      metrics
    });
    engine = new ClassificationEngine({
      thresholds: {
        blurThreshold: 100,
        brightnessMin: 30,
        brightnessMax: 220,
        minFaceSize: 40,
        minDetectionConfidence: 70,
        faceMatchThreshold: 80,
        highSeverityConfidence: 90,
        ambiguityMargin: 10,
        duplicateSimilarity: 0.95
      },
      cameras: [
        { id: 'entrance', name: 'Front entrance', location: 'Main gate' },
        { id: 'yard', name: 'Back yard', location: 'Rear fence' }
      ],
      recognizer: {
        recognize: async () => ({ confidence: 95, match: { similarity: 40 }, degraded: null })
      },
      writer,
      alerts: { notify: vi.fn() },
      liveness: new LivenessMonitor({ heartbeatTimeoutMs: 60_000, log, metrics, now: () => T }),
      reader: database,
      registry: database,
      bus,
      log,
      metrics,
      now: () => T
    });
    router = createApiRouter({
      engine,
      database,
      writer,
      bus,
      metrics,
      log,
      fetch: fetchMock,
      serviceState: () => ({ status: serviceStatus, startedAt: T })
    });
  });

  afterEach(() => {
    router.close();
    database.close();
    resetAppLifecycle();
  });

  async function send(method: string, url: string, body?: unknown) {
    const req = Object.assign(Readable.from(body === undefined ? [] : [JSON.stringify(body)]), {
      method,
      url,
      headers: {}
    });
    const res = new MockResponse();
    const handled = router.handle(req, res);
    if (handled) {
      await res.done;
    }
    return { handled, res };
  }

  it('reports health with store and camera summaries', async () => {
    const { res } = await send('GET', '/api/health');

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: 'ok',
      service: { status: 'ok', startedAt: T },
      store: { degraded: false, parked: 0, error: null },
      cameras: { total: 2, online: 0, offline: 0, unknown: 2 },
      checks: []
    });
  });

  it('answers 503 while starting or when a check degrades', async () => {
    serviceStatus = 'starting';
    const starting = await send('GET', '/api/health');
    expect(starting.res.statusCode).toBe(503);
    expect(starting.res.json()).toMatchObject({ status: 'starting' });

    serviceStatus = 'ok';
    registerHealthIndicator('capture', () => ({ status: 'degraded', details: { failing: ['yard'] } }));
    const degraded = await send('GET', '/api/health');
    expect(degraded.res.statusCode).toBe(503);
    expect(degraded.res.json()).toMatchObject({
      status: 'degraded',
      checks: [{ name: 'capture', status: 'degraded', details: { failing: ['yard'] } }]
    });
  });

  it('classifies frames submitted over HTTP', async () => {
    const image = steppedFrame('rising').toString('base64');

    const { res } = await send('POST', '/api/cameras/entrance/frames', { image, timestamp: T });
    await engine.flush();

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      outcome: { status: 'processed', alerted: true, event: { eventId: 'entrance-1700000000000', severity: 'high' } }
    });
    expect(database.listEvents().total).toBe(1);
  });

  it('maps frame rejections to status codes', async () => {
    const blurry = await send('POST', '/api/cameras/entrance/frames', {
      image: uniform(18, 16, 128).toString('base64'),
      timestamp: T
    });
    expect(blurry.res.statusCode).toBe(202);
    expect(blurry.res.json()).toMatchObject({ outcome: { status: 'rejected', reason: 'blur' } });

    const badTimestamp = await send('POST', '/api/cameras/entrance/frames', {
      image: steppedFrame('rising').toString('base64'),
      timestamp: 'garbage'
    });
    expect(badTimestamp.res.statusCode).toBe(400);

    const missing = await send('POST', '/api/cameras/entrance/frames', { timestamp: T });
    expect(missing.res.statusCode).toBe(400);
    expect(missing.res.json()).toEqual({ error: 'Frame image is required' });

    const unknown = await send('POST', '/api/cameras/garage/frames', { image: 'aGk=' });
    expect(unknown.res.statusCode).toBe(404);
    expect(unknown.res.json()).toEqual({ error: 'Not found' });
  });

  it('records heartbeats and reports camera state', async () => {
    const { res } = await send('POST', '/api/cameras/yard/heartbeat', { timestamp: T });
    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ cameraId: 'yard', status: 'online', lastHeartbeat: T, ignored: false });

    const camera = await send('GET', '/api/cameras/yard');
    expect(camera.res.json()).toEqual({
      camera: {
        cameraId: 'yard',
        lastHeartbeat: T,
        status: 'online',
        name: 'Back yard',
        location: 'Rear fence',
        active: true,
        recentEvents: []
      }
    });

    const invalid = await send('POST', '/api/cameras/yard/heartbeat', { timestamp: { at: T } });
    expect(invalid.res.statusCode).toBe(400);
    expect(invalid.res.json()).toEqual({ error: 'timestamp must be a number or string' });

    const unknown = await send('GET', '/api/cameras/garage');
    expect(unknown.res.statusCode).toBe(404);
  });

  it('lists events with filters and paging', async () => {
    database.putEvent(makeEvent('entrance', T));
    database.putEvent(makeEvent('entrance', T + 1000, 'medium'));
    database.putEvent(makeEvent('yard', T + 2000));

    const { res } = await send('GET', '/api/events?camera=entrance&limit=1');
    expect(res.json()).toEqual({
      items: [makeEvent('entrance', T + 1000, 'medium')],
      total: 2,
      limit: 1,
      offset: 0
    });

    const bySeverity = await send('GET', '/api/events?severity=high');
    expect(bySeverity.res.json()).toMatchObject({ total: 2, limit: 25, offset: 0 });

    const badSeverity = await send('GET', '/api/events?severity=bogus');
    expect(badSeverity.res.statusCode).toBe(400);
    expect(badSeverity.res.json()).toEqual({ error: 'Invalid severity: bogus' });

    const badDate = await send('GET', '/api/events?since=garbage');
    expect(badDate.res.json()).toEqual({ error: 'Invalid date: garbage' });
  });

  it('reads date filters given in seconds as epoch seconds', async () => {
    database.putEvent(makeEvent('entrance', T));
    database.putEvent(makeEvent('entrance', T + 1000, 'medium'));
    database.putEvent(makeEvent('yard', T + 2000));

    const sinceSeconds = await send('GET', '/api/events?since=1700000001');
    expect(sinceSeconds.res.statusCode).toBe(200);
    expect(sinceSeconds.res.json()).toMatchObject({ total: 2 });

    const window = await send('GET', '/api/events?since=1700000001&until=1700000001000');
    expect(window.res.json()).toMatchObject({ total: 1, items: [makeEvent('entrance', T + 1000, 'medium')] });

    const isoUntil = await send('GET', '/api/events?until=2023-11-14T22:13:20.000Z');
    expect(isoUntil.res.json()).toMatchObject({ total: 1, items: [makeEvent('entrance', T)] });
  });

  it('reviews and deletes single events', async () => {
    database.putEvent(makeEvent('entrance', T));

    const fetched = await send('GET', '/api/events/entrance-1700000000000');
    expect(fetched.res.json()).toEqual({ event: makeEvent('entrance', T) });

    const reviewed = await send('PATCH', '/api/events/entrance-1700000000000', { reviewed: true });
    expect(reviewed.res.json()).toEqual({ event: { ...makeEvent('entrance', T), reviewed: true } });

    const invalid = await send('PATCH', '/api/events/entrance-1700000000000', { reviewed: 'yes' });
    expect(invalid.res.statusCode).toBe(400);

    const deleted = await send('DELETE', '/api/events/entrance-1700000000000');
    expect(deleted.res.json()).toEqual({ deleted: true });

    const again = await send('DELETE', '/api/events/entrance-1700000000000');
    expect(again.res.statusCode).toBe(404);
    const missing = await send('GET', '/api/events/entrance-1700000000000');
    expect(missing.res.statusCode).toBe(404);
  });

  it('reviews and deletes events in bulk', async () => {
    database.putEvent(makeEvent('entrance', T));
    database.putEvent(makeEvent('yard', T));

    const reviewed = await send('POST', '/api/events/review-bulk', {
      eventIds: ['entrance-1700000000000', 'entrance-1700000000000', 'missing-1']
    });
    expect(reviewed.res.json()).toEqual({ updated: 1, failed: 1 });

    const deleted = await send('POST', '/api/events/delete-bulk', {
      eventIds: ['entrance-1700000000000', 'yard-1700000000000', 'missing-1']
    });
    expect(deleted.res.json()).toEqual({ deleted: 2, failed: 1 });

    const empty = await send('POST', '/api/events/delete-bulk', { eventIds: [] });
    expect(empty.res.statusCode).toBe(400);
    expect(empty.res.json()).toEqual({ error: 'eventIds must be a non-empty array' });
  });

  it('manages the identity directory', async () => {
    const created = await send('POST', '/api/identities', { faceId: 'face-1', name: ' Dana ' });
    expect(created.res.statusCode).toBe(201);
    expect(created.res.json()).toMatchObject({ identity: { faceId: 'face-1', name: 'Dana' } });

    const listed = await send('GET', '/api/identities');
    expect(listed.res.json()).toMatchObject({ identities: [{ faceId: 'face-1', name: 'Dana' }] });

    const invalid = await send('POST', '/api/identities', { faceId: 'face-2' });
    expect(invalid.res.json()).toEqual({ error: 'name is required' });

    const removed = await send('DELETE', '/api/identities/face-1');
    expect(removed.res.json()).toEqual({ deleted: true });
    const again = await send('DELETE', '/api/identities/face-1');
    expect(again.res.statusCode).toBe(404);
  });

  it('streams bus events to subscribers filtered by camera', async () => {
    const req = Object.assign(Readable.from([]), { method: 'GET', url: '/api/events/stream?camera=entrance', headers: {} });
    const res = new MockResponse();

    expect(router.handle(req, res)).toBe(true);
    expect(res.headers['Content-Type']).toBe('text/event-stream');
    expect(res.chunks).toEqual([': connected\n\n']);
    expect(metrics.getGauge('http', 'streamClients')).toBe(1);

    const event = makeEvent('entrance', T);
    bus.emitEvent(makeEvent('yard', T));
    bus.emitEvent(event);

    expect(res.chunks.slice(1)).toEqual([
      'id: entrance-1700000000000\n',
      'event: event\n',
      `data: ${JSON.stringify({ event })}\n\n`
    ]);

    res.close();
    expect(metrics.getGauge('http', 'streamClients')).toBe(0);
  });

  it('registers, deactivates and removes cameras', async () => {
    const created = await send('POST', '/api/cameras', {
      id: 'gate',
      name: 'Side gate',
      location: 'Driveway',
      snapshotUrl: 'http://camera.test/gate.png'
    });
    expect(created.res.statusCode).toBe(201);
    expect(created.res.json()).toEqual({
      camera: {
        cameraId: 'gate',
        lastHeartbeat: null,
        status: 'unknown',
        name: 'Side gate',
        location: 'Driveway',
        active: true,
        recentEvents: []
      }
    });
    expect(database.listCameras()).toEqual([
      { id: 'gate', name: 'Side gate', location: 'Driveway', snapshotUrl: 'http://camera.test/gate.png', active: true }
    ]);

    const duplicate = await send('POST', '/api/cameras', { id: 'gate', name: 'Side gate', location: 'Driveway' });
    expect(duplicate.res.statusCode).toBe(409);
    expect(duplicate.res.json()).toEqual({ error: 'Camera gate already exists' });

    const badId = await send('POST', '/api/cameras', { id: 'side-gate', name: 'Side gate', location: 'Driveway' });
    expect(badId.res.statusCode).toBe(400);
    expect(badId.res.json()).toEqual({ error: 'Camera id "side-gate" must not contain "-"' });

    const unnamed = await send('POST', '/api/cameras', { id: 'porch', location: 'Front door' });
    expect(unnamed.res.statusCode).toBe(400);
    expect(unnamed.res.json()).toEqual({ error: 'name is required' });

    const paused = await send('PATCH', '/api/cameras/gate', { active: false });
    expect(paused.res.statusCode).toBe(200);
    expect(paused.res.json()).toMatchObject({ camera: { cameraId: 'gate', active: false } });
    expect(database.listCameras()).toMatchObject([{ id: 'gate', active: false }]);

    const frame = await send('POST', '/api/cameras/gate/frames', {
      image: steppedFrame('rising').toString('base64'),
      timestamp: T
    });
    expect(frame.res.statusCode).toBe(202);
    expect(frame.res.json()).toEqual({ outcome: { status: 'rejected', cameraId: 'gate', reason: 'inactive-camera' } });

    const heartbeat = await send('POST', '/api/cameras/gate/heartbeat', { timestamp: T });
    expect(heartbeat.res.statusCode).toBe(202);

    const removed = await send('DELETE', '/api/cameras/gate');
    expect(removed.res.json()).toEqual({ deleted: true });
    expect(database.listCameras()).toEqual([]);
    expect((await send('GET', '/api/cameras/gate')).res.statusCode).toBe(404);
    expect((await send('PATCH', '/api/cameras/garage', { name: 'Garage' })).res.statusCode).toBe(404);
  });

  it('checks camera connections and records reachable ones as heartbeats', async () => {
    fetchMock.mockImplementation(async input =>
      String(input).endsWith('/yard.png')
        ? new Response(new Uint8Array([137, 80, 78, 71]))
        : new Response('busy', { status: 503 })
    );
    await send('PATCH', '/api/cameras/entrance', { snapshotUrl: 'http://camera.test/entrance.png' });
    await send('PATCH', '/api/cameras/yard', { snapshotUrl: 'http://camera.test/yard.png' });

    const single = await send('POST', '/api/cameras/yard/check');
    expect(single.res.statusCode).toBe(200);
    expect(single.res.json()).toMatchObject({ check: { cameraId: 'yard', reachable: true, status: 200 } });

    const yard = await send('GET', '/api/cameras/yard');
    expect(yard.res.json()).toMatchObject({ camera: { status: 'online', lastHeartbeat: T } });

    const all = await send('POST', '/api/cameras/check-all');
    expect(all.res.json()).toMatchObject({
      results: [
        { cameraId: 'entrance', reachable: false, status: 503, error: 'Snapshot request failed: 503' },
        { cameraId: 'yard', reachable: true, status: 200 }
      ]
    });
    expect(metrics.getCounter('capture', 'checks.reachable')).toBe(2);
    expect(metrics.getCounter('capture', 'checks.unreachable')).toBe(1);

    const entrance = await send('GET', '/api/cameras/entrance');
    expect(entrance.res.json()).toMatchObject({ camera: { status: 'unknown', lastHeartbeat: null } });
  });

  it('exports metrics in Prometheus format', async () => {
    const { res } = await send('GET', '/api/metrics?format=prometheus');

    expect(res.headers['Content-Type']).toBe('text/plain; version=0.0.4; charset=utf-8');
    expect(res.body.split('\n')[0]).toBe('# TYPE watchpost_events_total counter');
  });

  it('rejects malformed requests and reports unexpected failures', async () => {
    const unmatched = await send('GET', '/api/unknown');
    expect(unmatched.handled).toBe(false);

    const malformed = await send('GET', '/api/events/%E0%A4%A');
    expect(malformed.res.statusCode).toBe(400);
    expect(malformed.res.json()).toEqual({ error: 'Malformed path' });

    const req = Object.assign(Readable.from(['{not json']), { method: 'POST', url: '/api/identities', headers: {} });
    const res = new MockResponse();
    router.handle(req, res);
    await res.done;
    expect(res.json()).toEqual({ error: 'Invalid JSON body' });

    vi.spyOn(database, 'listEvents').mockImplementation(() => {
      throw new Error('disk I/O error');
    });
    const failed = await send('GET', '/api/events');
    expect(failed.res.statusCode).toBe(500);
    expect(failed.res.json()).toEqual({ error: 'Internal server error' });
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ path: '/api/events' }),
      'HTTP request failed'
    );
  });
});
