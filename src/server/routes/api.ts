import type { IncomingHttpHeaders } from 'node:http';
import { URL } from 'node:url';
import logger, { type Logger } from '../../logger.js';
import metricsModule, { type MetricsRegistry } from '../../metrics/index.js';
import { ALERT_CHANNEL, CAMERA_CHANNEL, EVENT_CHANNEL, type EventBus } from '../../eventBus.js';
import {
  collectHealthChecks,
  summarizeHealth,
  type HealthCheckResult,
  type HealthStatus
} from '../../app.js';
import type { EventDatabase, ListEventsOptions } from '../../db.js';
import type { CameraConfig } from '../../config/index.js';
import type { CameraPatch, ClassificationEngine, FrameOutcome } from '../../pipeline/engine.js';
import type { ResilientEventWriter } from '../../store/resilientWriter.js';
import { normalizeTimestamp } from '../../store/eventStore.js';
import { checkSnapshotUrl, type ConnectionCheck } from '../../video/snapshotSource.js';
import type {
  AlertPayload,
  CameraStatus,
  ClassificationKind,
  EventRecord,
  LivenessTransition,
  Severity
} from '../../types.js';

/** The parts of `IncomingMessage` the router reads. */
export interface RouterRequest extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  once(event: 'close', listener: () => void): unknown;
}

/** The parts of `ServerResponse` the router writes. */
export interface RouterResponse {
  statusCode: number;
  readonly headersSent: boolean;
  readonly writableEnded: boolean;
  writeHead(statusCode: number, headers?: Record<string, string>): unknown;
  write(chunk: string): boolean;
  end(chunk?: string): unknown;
  once(event: 'close', listener: () => void): unknown;
}

export type EventQueries = Pick<
  EventDatabase,
  | 'getEvent'
  | 'listEvents'
  | 'deleteEvent'
  | 'deleteEvents'
  | 'markReviewed'
  | 'putIdentity'
  | 'listIdentities'
  | 'deleteIdentity'
>;

export type ServiceState = {
  status: HealthStatus;
  startedAt: number | null;
};

export interface ApiRouterOptions {
  engine: ClassificationEngine;
  database: EventQueries;
  writer: ResilientEventWriter;
  bus: EventBus;
  metrics?: MetricsRegistry;
  log?: Logger;
  serviceState?: () => ServiceState;
  streamHeartbeatMs?: number;
  maxBodyBytes?: number;
  fetch?: typeof fetch;
  checkTimeoutMs?: number;
}

export type HealthPayload = {
  status: HealthStatus;
  timestamp: string;
  service: ServiceState;
  store: {
    degraded: boolean;
    parked: number;
    error: string | null;
  };
  cameras: Record<CameraStatus, number> & { total: number };
  checks: HealthCheckResult[];
};

type RouteContext = {
  req: RouterRequest;
  res: RouterResponse;
  url: URL;
  params: string[];
};

type Route = {
  method: string;
  pattern: RegExp;
  handler: (context: RouteContext) => void | Promise<void>;
};

type StreamClient = {
  keepalive: NodeJS.Timeout;
  camera: string | null;
};

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

const SEVERITIES: readonly Severity[] = ['none', 'low', 'medium', 'high'];
const CLASSIFICATIONS: readonly ClassificationKind[] = ['no-person', 'authorized', 'intruder'];
const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;
const MAX_BULK_IDS = 500;

export class ApiRouter {
  private readonly options: ApiRouterOptions;
  private readonly metrics: MetricsRegistry;
  private readonly log: Logger;
  private readonly routes: Route[];
  private readonly clients = new Map<RouterResponse, StreamClient>();
  private readonly streamHeartbeatMs: number;

  constructor(options: ApiRouterOptions) {
    this.options = options;
    this.metrics = options.metrics ?? metricsModule;
    this.log = options.log ?? logger;
    this.streamHeartbeatMs = options.streamHeartbeatMs ?? 15000;
    this.routes = [
      { method: 'GET', pattern: /^\/api\/health$/, handler: ctx => this.handleHealth(ctx) },
      { method: 'GET', pattern: /^\/api\/metrics$/, handler: ctx => this.handleMetrics(ctx) },
      { method: 'GET', pattern: /^\/api\/cameras$/, handler: ctx => this.handleCameraList(ctx) },
      { method: 'POST', pattern: /^\/api\/cameras$/, handler: ctx => this.handleCameraCreate(ctx) },
      { method: 'POST', pattern: /^\/api\/cameras\/check-all$/, handler: ctx => this.handleCheckAll(ctx) },
      { method: 'GET', pattern: /^\/api\/cameras\/([^/]+)$/, handler: ctx => this.handleCamera(ctx) },
      { method: 'PATCH', pattern: /^\/api\/cameras\/([^/]+)$/, handler: ctx => this.handleCameraUpdate(ctx) },
      { method: 'DELETE', pattern: /^\/api\/cameras\/([^/]+)$/, handler: ctx => this.handleCameraDelete(ctx) },
      { method: 'POST', pattern: /^\/api\/cameras\/([^/]+)\/check$/, handler: ctx => this.handleCameraCheck(ctx) },
      { method: 'POST', pattern: /^\/api\/cameras\/([^/]+)\/heartbeat$/, handler: ctx => this.handleHeartbeat(ctx) },
      { method: 'POST', pattern: /^\/api\/cameras\/([^/]+)\/frames$/, handler: ctx => this.handleFrame(ctx) },
      { method: 'GET', pattern: /^\/api\/events\/stream$/, handler: ctx => this.handleStream(ctx) },
      { method: 'POST', pattern: /^\/api\/events\/review-bulk$/, handler: ctx => this.handleReviewBulk(ctx) },
      { method: 'POST', pattern: /^\/api\/events\/delete-bulk$/, handler: ctx => this.handleDeleteBulk(ctx) },
      { method: 'GET', pattern: /^\/api\/events$/, handler: ctx => this.handleEventList(ctx) },
      { method: 'GET', pattern: /^\/api\/events\/([^/]+)$/, handler: ctx => this.handleEvent(ctx) },
      { method: 'PATCH', pattern: /^\/api\/events\/([^/]+)$/, handler: ctx => this.handleEventReview(ctx) },
      { method: 'DELETE', pattern: /^\/api\/events\/([^/]+)$/, handler: ctx => this.handleEventDelete(ctx) },
      { method: 'GET', pattern: /^\/api\/identities$/, handler: ctx => this.handleIdentityList(ctx) },
      { method: 'POST', pattern: /^\/api\/identities$/, handler: ctx => this.handleIdentityCreate(ctx) },
      { method: 'DELETE', pattern: /^\/api\/identities\/([^/]+)$/, handler: ctx => this.handleIdentityDelete(ctx) }
    ];

    this.options.bus.on(EVENT_CHANNEL, this.handleBusEvent);
    this.options.bus.on(ALERT_CHANNEL, this.handleBusAlert);
    this.options.bus.on(CAMERA_CHANNEL, this.handleBusCamera);
  }

  /** Returns false when no route matches so the server can answer 404. */
  handle(req: RouterRequest, res: RouterResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    const method = (req.method ?? 'GET').toUpperCase();
    for (const route of this.routes) {
      if (route.method !== method) {
        continue;
      }
      const match = route.pattern.exec(url.pathname);
      if (!match) {
        continue;
      }

      let params: string[];
      try {
        params = match.slice(1).map(segment => decodeURIComponent(segment));
      } catch {
        sendJson(res, 400, { error: 'Malformed path' });
        return true;
      }

      this.metrics.incrementCounter('http', 'requests');
      void this.run(route, { req, res, url, params });
      return true;
    }

    return false;
  }

  async buildHealth(): Promise<HealthPayload> {
    const service: ServiceState = this.options.serviceState?.() ?? { status: 'ok', startedAt: null };
    const checks = await collectHealthChecks({ service, metrics: this.metrics.snapshot() });
    const signal = this.options.writer.degradedSignal();
    const cameras: HealthPayload['cameras'] = { total: 0, online: 0, offline: 0, unknown: 0 };
    for (const camera of this.options.engine.cameraOverview()) {
      cameras.total += 1;
      cameras[camera.status] += 1;
    }

    const storeStatus: HealthStatus = signal ? 'degraded' : 'ok';
    return {
      status: summarizeHealth(service.status, [...checks, { name: 'store', status: storeStatus }]),
      timestamp: new Date().toISOString(),
      service,
      store: {
        degraded: signal !== null,
        parked: signal?.parked ?? 0,
        error: signal?.error ?? null
      },
      cameras,
      checks
    };
  }

  close() {
    this.options.bus.off(EVENT_CHANNEL, this.handleBusEvent);
    this.options.bus.off(ALERT_CHANNEL, this.handleBusAlert);
    this.options.bus.off(CAMERA_CHANNEL, this.handleBusCamera);
    for (const [client, state] of this.clients) {
      clearInterval(state.keepalive);
      client.end();
    }
    this.clients.clear();
  }

  private async run(route: Route, context: RouteContext) {
    try {
      await route.handler(context);
    } catch (error) {
      if (error instanceof HttpError) {
        sendJson(context.res, error.status, { error: error.message });
        return;
      }
      this.metrics.recordError('http', error instanceof Error ? error.message : String(error));
      this.log.error({ err: error, path: context.url.pathname }, 'HTTP request failed');
      sendJson(context.res, 500, { error: 'Internal server error' });
    }
  }

  private async handleHealth({ res }: RouteContext) {
    const payload = await this.buildHealth();
    sendJson(res, payload.status === 'ok' ? 200 : 503, payload);
  }

  private handleMetrics({ res, url }: RouteContext) {
    if (url.searchParams.get('format') === 'prometheus') {
      res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4; charset=utf-8' });
      res.end(this.metrics.exportPrometheus());
      return;
    }
    sendJson(res, 200, this.metrics.snapshot());
  }

  private handleCameraList({ res }: RouteContext) {
    sendJson(res, 200, { cameras: this.options.engine.cameraOverview() });
  }

  private handleCamera({ res, params }: RouteContext) {
    const camera = this.options.engine.getCamera(params[0] ?? '');
    if (!camera) {
      throw new HttpError(404, 'Not found');
    }
    sendJson(res, 200, { camera: this.options.engine.describeCamera(camera) });
  }

  private async handleCameraCreate({ req, res }: RouteContext) {
    const body = await this.readBody(req);
    const id = typeof body.id === 'string' ? body.id : '';
    if (!id) {
      throw new HttpError(400, 'id is required');
    }
    if (this.options.engine.hasCamera(id)) {
      throw new HttpError(409, `Camera ${id} already exists`);
    }

    const patch = readCameraPatch(body);
    if (!patch.name) {
      throw new HttpError(400, 'name is required');
    }
    if (!patch.location) {
      throw new HttpError(400, 'location is required');
    }

    let camera: CameraConfig;
    try {
      camera = this.options.engine.registerCamera({ ...patch, id, name: patch.name, location: patch.location });
    } catch (error) {
      throw new HttpError(400, error instanceof Error ? error.message : String(error));
    }
    sendJson(res, 201, { camera: this.options.engine.describeCamera(camera) });
  }

  private async handleCameraUpdate({ req, res, params }: RouteContext) {
    const body = await this.readBody(req);
    if (body.id !== undefined) {
      throw new HttpError(400, 'id cannot be changed');
    }
    const camera = this.options.engine.updateCamera(params[0] ?? '', readCameraPatch(body));
    if (!camera) {
      throw new HttpError(404, 'Not found');
    }
    sendJson(res, 200, { camera: this.options.engine.describeCamera(camera) });
  }

  private handleCameraDelete({ res, params }: RouteContext) {
    if (!this.options.engine.removeCamera(params[0] ?? '')) {
      throw new HttpError(404, 'Not found');
    }
    sendJson(res, 200, { deleted: true });
  }

  private async handleCameraCheck({ res, params }: RouteContext) {
    const camera = this.options.engine.getCamera(params[0] ?? '');
    if (!camera) {
      throw new HttpError(404, 'Not found');
    }
    sendJson(res, 200, { check: await this.checkCamera(camera) });
  }

  private async handleCheckAll({ res }: RouteContext) {
    const results = await Promise.all(this.options.engine.listCameras().map(camera => this.checkCamera(camera)));
    sendJson(res, 200, { results });
  }

  /** A reachable camera also counts as a heartbeat. */
  private async checkCamera(camera: CameraConfig): Promise<ConnectionCheck> {
    const check = await checkSnapshotUrl(camera.id, camera.snapshotUrl, {
      fetch: this.options.fetch,
      timeoutMs: this.options.checkTimeoutMs
    });
    this.metrics.incrementCounter('capture', check.reachable ? 'checks.reachable' : 'checks.unreachable');
    if (check.reachable) {
      this.options.engine.submitHeartbeat(camera.id);
    }
    return check;
  }

  private async handleHeartbeat({ req, res, params }: RouteContext) {
    const cameraId = params[0] ?? '';
    if (!this.options.engine.hasCamera(cameraId)) {
      throw new HttpError(404, 'Not found');
    }

    const body = await this.readBody(req);
    const timestamp = readTimestamp(body.timestamp);
    const outcome = this.options.engine.submitHeartbeat(cameraId, timestamp);
    if (outcome.status === 'rejected') {
      throw new HttpError(outcome.reason === 'unknown-camera' ? 404 : 400, outcome.detail ?? outcome.reason);
    }

    const { result } = outcome;
    sendJson(res, 202, {
      cameraId,
      status: result.status,
      lastHeartbeat: result.lastHeartbeat,
      ignored: !result.accepted
    });
  }

  private async handleFrame({ req, res, params }: RouteContext) {
    const cameraId = params[0] ?? '';
    if (!this.options.engine.hasCamera(cameraId)) {
      throw new HttpError(404, 'Not found');
    }

    const body = await this.readBody(req);
    if (typeof body.image !== 'string' || body.image.length === 0) {
      throw new HttpError(400, 'Frame image is required');
    }
    const image = Buffer.from(body.image, 'base64');
    if (image.length === 0) {
      throw new HttpError(400, 'Frame image must be base64 encoded');
    }

    const { detectionConfidence } = body;
    if (detectionConfidence !== undefined && (typeof detectionConfidence !== 'number' || !Number.isFinite(detectionConfidence))) {
      throw new HttpError(400, 'detectionConfidence must be a number');
    }

    const outcome = await this.options.engine.submitFrame({
      cameraId,
      timestamp: readTimestamp(body.timestamp),
      image,
      detectionConfidence
    });
    sendJson(res, frameStatusCode(outcome), { outcome });
  }

  private handleStream({ req, res, url }: RouteContext) {
    const camera = url.searchParams.get('camera');
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(': connected\n\n');

    const keepalive = setInterval(() => {
      if (res.writableEnded) {
        this.dropClient(res);
        return;
      }
      res.write(': keepalive\n\n');
    }, this.streamHeartbeatMs);
    keepalive.unref();

    this.clients.set(res, { keepalive, camera });
    this.metrics.setGauge('http', 'streamClients', this.clients.size);

    const cleanup = () => {
      this.dropClient(res);
    };
    req.once('close', cleanup);
    res.once('close', cleanup);
  }

  private handleEventList({ res, url }: RouteContext) {
    const result = this.options.database.listEvents(parseListOptions(url.searchParams));
    sendJson(res, 200, { ...result });
  }

  private handleEvent({ res, params }: RouteContext) {
    const eventId = params[0] ?? '';
    const event =
      this.options.database.getEvent(eventId) ??
      this.options.writer.parkedEvents().find(record => record.eventId === eventId) ??
      null;
    if (!event) {
      throw new HttpError(404, 'Not found');
    }
    sendJson(res, 200, { event });
  }

  private async handleEventReview({ req, res, params }: RouteContext) {
    const eventId = params[0] ?? '';
    const body = await this.readBody(req);
    if (typeof body.reviewed !== 'boolean') {
      throw new HttpError(400, 'reviewed must be a boolean');
    }

    if (this.options.database.markReviewed([eventId], body.reviewed) === 0) {
      throw new HttpError(404, 'Not found');
    }
    sendJson(res, 200, { event: this.options.database.getEvent(eventId) });
  }

  private handleEventDelete({ res, params }: RouteContext) {
    if (!this.options.database.deleteEvent(params[0] ?? '')) {
      throw new HttpError(404, 'Not found');
    }
    sendJson(res, 200, { deleted: true });
  }

  private async handleReviewBulk({ req, res }: RouteContext) {
    const body = await this.readBody(req);
    const eventIds = readEventIds(body.eventIds);
    const reviewed = body.reviewed === undefined ? true : body.reviewed;
    if (typeof reviewed !== 'boolean') {
      throw new HttpError(400, 'reviewed must be a boolean');
    }
    const updated = this.options.database.markReviewed(eventIds, reviewed);
    sendJson(res, 200, { updated, failed: eventIds.length - updated });
  }

  private async handleDeleteBulk({ req, res }: RouteContext) {
    const body = await this.readBody(req);
    const result = this.options.database.deleteEvents(readEventIds(body.eventIds));
    sendJson(res, 200, result);
  }

  private handleIdentityList({ res }: RouteContext) {
    sendJson(res, 200, { identities: this.options.database.listIdentities() });
  }

  private async handleIdentityCreate({ req, res }: RouteContext) {
    const body = await this.readBody(req);
    const faceId = typeof body.faceId === 'string' ? body.faceId.trim() : '';
    const name = typeof body.name === 'string' ? body.name.trim() : '';
    if (!faceId) {
      throw new HttpError(400, 'faceId is required');
    }
    if (!name) {
      throw new HttpError(400, 'name is required');
    }
    if (body.personId !== undefined && typeof body.personId !== 'string') {
      throw new HttpError(400, 'personId must be a string');
    }

    const identity = this.options.database.putIdentity(
      body.personId ? { faceId, name, personId: body.personId } : { faceId, name }
    );
    sendJson(res, 201, { identity });
  }

  private handleIdentityDelete({ res, params }: RouteContext) {
    if (!this.options.database.deleteIdentity(params[0] ?? '')) {
      throw new HttpError(404, 'Not found');
    }
    sendJson(res, 200, { deleted: true });
  }

  private async readBody(req: RouterRequest): Promise<Record<string, unknown>> {
    const limit = this.options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      size += buffer.length;
      if (size > limit) {
        throw new HttpError(413, 'Request body too large');
      }
      chunks.push(buffer);
    }

    const raw = Buffer.concat(chunks).toString('utf8').trim();
    if (!raw) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new HttpError(400, 'Invalid JSON body');
    }
    if (!isRecord(parsed)) {
      throw new HttpError(400, 'Request body must be a JSON object');
    }
    return parsed;
  }

  private readonly handleBusEvent = (event: EventRecord) => {
    this.broadcast(EVENT_CHANNEL, event.cameraId, event.eventId, { event });
  };

  private readonly handleBusAlert = (alert: AlertPayload) => {
    this.broadcast(ALERT_CHANNEL, alert.cameraId, alert.eventId, { alert });
  };

  private readonly handleBusCamera = (transition: LivenessTransition) => {
    this.broadcast(CAMERA_CHANNEL, transition.cameraId, null, { transition });
  };

  private broadcast(channel: string, cameraId: string, id: string | null, payload: Record<string, unknown>) {
    const data = JSON.stringify(payload);
    for (const [client, state] of this.clients) {
      if (client.writableEnded) {
        this.dropClient(client);
        continue;
      }
      if (state.camera && state.camera !== cameraId) {
        continue;
      }
      try {
        if (id) {
          client.write(`id: ${id}\n`);
        }
        client.write(`event: ${channel}\n`);
        client.write(`data: ${data}\n\n`);
      } catch (error) {
        this.log.warn({ err: error }, 'Dropping event stream client');
        client.end();
        this.dropClient(client);
      }
    }
  }

  private dropClient(client: RouterResponse) {
    const state = this.clients.get(client);
    if (!state) {
      return;
    }
    clearInterval(state.keepalive);
    this.clients.delete(client);
    this.metrics.setGauge('http', 'streamClients', this.clients.size);
  }
}

export function createApiRouter(options: ApiRouterOptions) {
  return new ApiRouter(options);
}

export function sendJson(res: RouterResponse, status: number, payload: Record<string, unknown>) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function frameStatusCode(outcome: FrameOutcome): number {
  switch (outcome.status) {
    case 'processed':
      return 200;
    case 'rejected':
      return outcome.reason === 'invalid-timestamp' ? 400 : 202;
    case 'abandoned':
      return 202;
    case 'failed':
      return 500;
  }
}

function readTimestamp(value: unknown): number | string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  throw new HttpError(400, 'timestamp must be a number or string');
}

function readText(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new HttpError(400, `${name} must be a non-empty string`);
  }
  return value.trim();
}

function readCameraPatch(body: Record<string, unknown>): CameraPatch {
  const patch: CameraPatch = {};
  if (body.name !== undefined) {
    patch.name = readText(body.name, 'name');
  }
  if (body.location !== undefined) {
    patch.location = readText(body.location, 'location');
  }
  if (body.snapshotUrl !== undefined) {
    const snapshotUrl = readText(body.snapshotUrl, 'snapshotUrl');
    try {
      patch.snapshotUrl = new URL(snapshotUrl).toString();
    } catch {
      throw new HttpError(400, `Invalid snapshotUrl: ${snapshotUrl}`);
    }
  }
  if (body.intervalMs !== undefined) {
    if (typeof body.intervalMs !== 'number' || !Number.isFinite(body.intervalMs) || body.intervalMs < 1) {
      throw new HttpError(400, 'intervalMs must be a positive number');
    }
    patch.intervalMs = body.intervalMs;
  }
  if (body.active !== undefined) {
    if (typeof body.active !== 'boolean') {
      throw new HttpError(400, 'active must be a boolean');
    }
    patch.active = body.active;
  }
  return patch;
}

function readEventIds(value: unknown): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new HttpError(400, 'eventIds must be a non-empty array');
  }
  if (value.length > MAX_BULK_IDS) {
    throw new HttpError(400, `eventIds accepts at most ${MAX_BULK_IDS} ids`);
  }
  const ids: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new HttpError(400, 'eventIds must contain strings');
    }
    ids.push(entry);
  }
  return Array.from(new Set(ids));
}

function pickParam<T extends string>(allowed: readonly T[], value: string | null, name: string): T | undefined {
  if (value === null || value === '') {
    return undefined;
  }
  const found = allowed.find(candidate => candidate === value);
  if (!found) {
    throw new HttpError(400, `Invalid ${name}: ${value}`);
  }
  return found;
}

function resolveDateParam(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  try {
    return normalizeTimestamp(value);
  } catch {
    throw new HttpError(400, `Invalid date: ${value}`);
  }
}

function parseListOptions(params: URLSearchParams): ListEventsOptions {
  const toNumber = (value: string | null) => {
    if (value === null) {
      return undefined;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  };

  const options: ListEventsOptions = {};
  const limit = toNumber(params.get('limit'));
  const offset = toNumber(params.get('offset'));
  if (typeof limit === 'number') {
    options.limit = limit;
  }
  if (typeof offset === 'number') {
    options.offset = offset;
  }

  const camera = params.get('camera');
  if (camera) {
    options.camera = camera;
  }

  const severity = pickParam(SEVERITIES, params.get('severity'), 'severity');
  if (severity) {
    options.severity = severity;
  }

  const classification = pickParam(CLASSIFICATIONS, params.get('classification'), 'classification');
  if (classification) {
    options.classification = classification;
  }

  const reviewed = params.get('reviewed');
  if (reviewed === 'true' || reviewed === 'false') {
    options.reviewed = reviewed === 'true';
  }

  const since = resolveDateParam(params.get('since'));
  const until = resolveDateParam(params.get('until'));
  if (typeof since === 'number') {
    options.since = since;
  }
  if (typeof until === 'number') {
    options.until = until;
  }

  return options;
}
