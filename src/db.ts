import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { CameraConfig } from './config/index.js';
import type {
  CameraState,
  CameraStatus,
  ClassificationKind,
  DegradedReason,
  EventRecord,
  Identity,
  Severity
} from './types.js';
import { epochMs, type CameraStateStore, type EventReader, type EventSink, type IdentityDirectory } from './store/eventStore.js';

const SEVERITIES: readonly Severity[] = ['none', 'low', 'medium', 'high'];
const CLASSIFICATIONS: readonly ClassificationKind[] = ['no-person', 'authorized', 'intruder'];
const CAMERA_STATUSES: readonly CameraStatus[] = ['online', 'offline', 'unknown'];

const EVENT_COLUMNS = `
  event_id AS eventId,
  camera_id AS cameraId,
  ts,
  classification,
  person_detected AS personDetected,
  authorized,
  confidence,
  face_similarity AS faceSimilarity,
  person_name AS personName,
  face_id AS faceId,
  severity,
  degraded,
  reviewed
`;

type EventRow = {
  eventId: string;
  cameraId: string;
  ts: number;
  classification: string;
  personDetected: number;
  authorized: number;
  confidence: number;
  faceSimilarity: number | null;
  personName: string | null;
  faceId: string | null;
  severity: string;
  degraded: string | null;
  reviewed: number;
};

type CameraRow = {
  cameraId: string;
  lastHeartbeat: number | null;
  status: string;
};

type RegistryRow = {
  cameraId: string;
  name: string;
  location: string;
  snapshotUrl: string | null;
  intervalMs: number | null;
  active: number;
};

type IdentityRow = {
  faceId: string;
  name: string;
  personId: string | null;
  createdAt: number;
};

export type IdentityRecord = Identity & { createdAt: number };

export interface ListEventsOptions {
  limit?: number;
  offset?: number;
  camera?: string;
  severity?: Severity;
  classification?: ClassificationKind;
  reviewed?: boolean;
  since?: number;
  until?: number;
}

export interface PaginatedEvents {
  items: EventRecord[];
  total: number;
  limit: number;
  offset: number;
}

export type BulkDeleteResult = {
  deleted: number;
  failed: number;
};

type SqlParams = Record<string, string | number | null>;

export class EventDatabase implements EventSink, EventReader, CameraStateStore, IdentityDirectory {
  readonly path: string;
  private readonly db: Database.Database;
  private readonly upsertEventStatement;
  private readonly getEventStatement;
  private readonly deleteEventStatement;
  private readonly reviewStatement;
  private readonly deleteOlderThanStatement;
  private readonly upsertCameraStatement;
  private readonly getCameraStatement;
  private readonly listCamerasStatement;
  private readonly upsertIdentityStatement;
  private readonly getIdentityStatement;
  private readonly listIdentitiesStatement;
  private readonly deleteIdentityStatement;
  private readonly upsertRegistryStatement;
  private readonly seedRegistryStatement;
  private readonly listRegistryStatement;
  private readonly deleteRegistryStatement;

  constructor(filePath: string) {
    this.path = filePath;
    if (filePath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    this.db = new Database(filePath);
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        event_id TEXT PRIMARY KEY,
        camera_id TEXT NOT NULL,
        ts INTEGER NOT NULL,
        classification TEXT NOT NULL,
        person_detected INTEGER NOT NULL,
        authorized INTEGER NOT NULL,
        confidence REAL NOT NULL,
        face_similarity REAL,
        person_name TEXT,
        face_id TEXT,
        severity TEXT NOT NULL,
        degraded TEXT,
        reviewed INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_events_camera_ts ON events (camera_id, ts);
      CREATE INDEX IF NOT EXISTS idx_events_ts ON events (ts);
      CREATE INDEX IF NOT EXISTS idx_events_severity ON events (severity);

      CREATE TABLE IF NOT EXISTS cameras (
        camera_id TEXT PRIMARY KEY,
        last_heartbeat INTEGER,
        status TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS identities (
        face_id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        person_id TEXT,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS camera_registry (
        camera_id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        location TEXT NOT NULL,
        snapshot_url TEXT,
        interval_ms INTEGER,
        active INTEGER NOT NULL DEFAULT 1,
        updated_at INTEGER NOT NULL
      );
    `);

    this.upsertEventStatement = this.db.prepare<SqlParams>(`
      INSERT INTO events (
        event_id, camera_id, ts, classification, person_detected, authorized, confidence,
        face_similarity, person_name, face_id, severity, degraded, reviewed, created_at
      ) VALUES (
        @eventId, @cameraId, @ts, @classification, @personDetected, @authorized, @confidence,
        @faceSimilarity, @personName, @faceId, @severity, @degraded, @reviewed, @createdAt
      )
      ON CONFLICT(event_id) DO UPDATE SET
        camera_id = excluded.camera_id,
        ts = excluded.ts,
        classification = excluded.classification,
        person_detected = excluded.person_detected,
        authorized = excluded.authorized,
        confidence = excluded.confidence,
        face_similarity = excluded.face_similarity,
        person_name = excluded.person_name,
        face_id = excluded.face_id,
        severity = excluded.severity,
        degraded = excluded.degraded,
        reviewed = excluded.reviewed,
        created_at = excluded.created_at
    `);
    this.getEventStatement = this.db.prepare<{ eventId: string }, EventRow>(
      `SELECT ${EVENT_COLUMNS} FROM events WHERE event_id = @eventId`
    );
    this.deleteEventStatement = this.db.prepare<{ eventId: string }>('DELETE FROM events WHERE event_id = @eventId');
    this.reviewStatement = this.db.prepare<{ eventId: string; reviewed: number }>(
      'UPDATE events SET reviewed = @reviewed WHERE event_id = @eventId'
    );
    this.deleteOlderThanStatement = this.db.prepare<{ cutoff: number }>('DELETE FROM events WHERE ts < @cutoff');
    this.upsertCameraStatement = this.db.prepare<{
      cameraId: string;
      lastHeartbeat: number | null;
      status: string;
      updatedAt: number;
    }>(`
      INSERT INTO cameras (camera_id, last_heartbeat, status, updated_at)
      VALUES (@cameraId, @lastHeartbeat, @status, @updatedAt)
      ON CONFLICT(camera_id) DO UPDATE SET
        last_heartbeat = excluded.last_heartbeat,
        status = excluded.status,
        updated_at = excluded.updated_at
    `);
    this.getCameraStatement = this.db.prepare<{ cameraId: string }, CameraRow>(
      'SELECT camera_id AS cameraId, last_heartbeat AS lastHeartbeat, status FROM cameras WHERE camera_id = @cameraId'
    );
    this.listCamerasStatement = this.db.prepare<[], CameraRow>(
      'SELECT camera_id AS cameraId, last_heartbeat AS lastHeartbeat, status FROM cameras ORDER BY camera_id'
    );
    this.upsertIdentityStatement = this.db.prepare<{
      faceId: string;
      name: string;
      personId: string | null;
      createdAt: number;
    }>(`
      INSERT INTO identities (face_id, name, person_id, created_at)
      VALUES (@faceId, @name, @personId, @createdAt)
      ON CONFLICT(face_id) DO UPDATE SET name = excluded.name, person_id = excluded.person_id
    `);
    this.getIdentityStatement = this.db.prepare<{ faceId: string }, IdentityRow>(
      'SELECT face_id AS faceId, name, person_id AS personId, created_at AS createdAt FROM identities WHERE face_id = @faceId'
    );
    this.listIdentitiesStatement = this.db.prepare<[], IdentityRow>(
      'SELECT face_id AS faceId, name, person_id AS personId, created_at AS createdAt FROM identities ORDER BY name, face_id'
    );
    this.deleteIdentityStatement = this.db.prepare<{ faceId: string }>('DELETE FROM identities WHERE face_id = @faceId');

    const registryValues = `(
        camera_id, name, location, snapshot_url, interval_ms, active, updated_at
      ) VALUES (
        @cameraId, @name, @location, @snapshotUrl, @intervalMs, @active, @updatedAt
      )`;
    this.upsertRegistryStatement = this.db.prepare<SqlParams>(`
      INSERT INTO camera_registry ${registryValues}
      ON CONFLICT(camera_id) DO UPDATE SET
        name = excluded.name,
        location = excluded.location,
        snapshot_url = excluded.snapshot_url,
        interval_ms = excluded.interval_ms,
        active = excluded.active,
        updated_at = excluded.updated_at
    `);
    this.seedRegistryStatement = this.db.prepare<SqlParams>(
      `INSERT OR IGNORE INTO camera_registry ${registryValues}`
    );
    this.listRegistryStatement = this.db.prepare<[], RegistryRow>(`
      SELECT camera_id AS cameraId, name, location, snapshot_url AS snapshotUrl, interval_ms AS intervalMs, active
      FROM camera_registry ORDER BY camera_id
    `);
    this.deleteRegistryStatement = this.db.prepare<{ cameraId: string }>(
      'DELETE FROM camera_registry WHERE camera_id = @cameraId'
    );
  }

  /** Upsert on event_id: a second write for the same camera and millisecond replaces the first. */
  putEvent(record: EventRecord) {
    this.upsertEventStatement.run({
      eventId: record.eventId,
      cameraId: record.cameraId,
      ts: record.timestamp,
      classification: record.classification,
      personDetected: record.personDetected ? 1 : 0,
      authorized: record.authorized ? 1 : 0,
      confidence: record.confidence,
      faceSimilarity: record.faceSimilarity,
      personName: record.personName,
      faceId: record.faceId,
      severity: record.severity,
      degraded: record.degraded,
      reviewed: record.reviewed ? 1 : 0,
      createdAt: Date.now()
    });
  }

  getEvent(eventId: string): EventRecord | null {
    const row = this.getEventStatement.get({ eventId });
    return row ? mapEventRow(row) : null;
  }

  listEvents(options: ListEventsOptions = {}): PaginatedEvents {
    const filters: string[] = [];
    const params: SqlParams = {};

    if (options.camera) {
      filters.push('camera_id = @camera');
      params.camera = options.camera;
    }

    if (options.severity) {
      filters.push('severity = @severity');
      params.severity = options.severity;
    }

    if (options.classification) {
      filters.push('classification = @classification');
      params.classification = options.classification;
    }

    if (typeof options.reviewed === 'boolean') {
      filters.push('reviewed = @reviewed');
      params.reviewed = options.reviewed ? 1 : 0;
    }

    if (typeof options.since === 'number') {
      filters.push('ts >= @since');
      params.since = options.since;
    }

    if (typeof options.until === 'number') {
      filters.push('ts <= @until');
      params.until = options.until;
    }

    const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
    const limit = clampLimit(options.limit);
    const offset = clampOffset(options.offset);

    const rows = this.db
      .prepare<SqlParams, EventRow>(
        `SELECT ${EVENT_COLUMNS} FROM events ${whereClause} ORDER BY ts DESC, event_id DESC LIMIT @limit OFFSET @offset`
      )
      .all({ ...params, limit, offset });
    const totalRow = this.db
      .prepare<SqlParams, { count: number }>(`SELECT COUNT(*) AS count FROM events ${whereClause}`)
      .get(params);

    return {
      items: rows.map(row => mapEventRow(row)),
      total: totalRow?.count ?? 0,
      limit,
      offset
    };
  }

  recentEvents(cameraId: string, limit: number): EventRecord[] {
    return this.listEvents({ camera: cameraId, limit }).items;
  }

  deleteEvent(eventId: string): boolean {
    return this.deleteEventStatement.run({ eventId }).changes > 0;
  }

  deleteEvents(eventIds: string[]): BulkDeleteResult {
    const run = this.db.transaction((ids: string[]) => {
      let deleted = 0;
      for (const eventId of ids) {
        deleted += this.deleteEventStatement.run({ eventId }).changes;
      }
      return deleted;
    });
    const deleted = run(eventIds);
    return { deleted, failed: eventIds.length - deleted };
  }

  markReviewed(eventIds: string[], reviewed = true): number {
    const run = this.db.transaction((ids: string[]) => {
      let updated = 0;
      for (const eventId of ids) {
        updated += this.reviewStatement.run({ eventId, reviewed: reviewed ? 1 : 0 }).changes;
      }
      return updated;
    });
    return run(eventIds);
  }

  pruneEventsOlderThan(cutoffTs: number): number {
    return this.deleteOlderThanStatement.run({ cutoff: cutoffTs }).changes;
  }

  putCameraState(state: CameraState) {
    this.upsertCameraStatement.run({
      cameraId: state.cameraId,
      lastHeartbeat: state.lastHeartbeat,
      status: state.status,
      updatedAt: Date.now()
    });
  }

  getCameraState(cameraId: string): CameraState | null {
    const row = this.getCameraStatement.get({ cameraId });
    return row ? mapCameraRow(row) : null;
  }

  listCameraStates(): CameraState[] {
    return this.listCamerasStatement.all().map(row => mapCameraRow(row));
  }

  putIdentity(identity: Identity, createdAt: number = Date.now()): IdentityRecord {
    this.upsertIdentityStatement.run({
      faceId: identity.faceId,
      name: identity.name,
      personId: identity.personId ?? null,
      createdAt
    });
    const stored = this.getIdentityStatement.get({ faceId: identity.faceId });
    if (!stored) {
      throw new Error(`Failed to store identity ${identity.faceId}`);
    }
    return mapIdentityRow(stored);
  }

  getIdentity(faceId: string): IdentityRecord | null {
    const row = this.getIdentityStatement.get({ faceId });
    return row ? mapIdentityRow(row) : null;
  }

  listIdentities(): IdentityRecord[] {
    return this.listIdentitiesStatement.all().map(row => mapIdentityRow(row));
  }

  deleteIdentity(faceId: string): boolean {
    return this.deleteIdentityStatement.run({ faceId }).changes > 0;
  }

  /** Registered cameras override the configured list they were seeded from. */
  putCamera(camera: CameraConfig) {
    this.upsertRegistryStatement.run(registryParams(camera));
  }

  /** Inserts configured cameras that are not registered yet; returns how many were added. */
  seedCameras(cameras: readonly CameraConfig[]): number {
    const run = this.db.transaction((list: readonly CameraConfig[]) => {
      let added = 0;
      for (const camera of list) {
        added += this.seedRegistryStatement.run(registryParams(camera)).changes;
      }
      return added;
    });
    return run(cameras);
  }

  listCameras(): CameraConfig[] {
    return this.listRegistryStatement.all().map(row => mapRegistryRow(row));
  }

  deleteCamera(cameraId: string): boolean {
    return this.deleteRegistryStatement.run({ cameraId }).changes > 0;
  }

  close() {
    this.db.close();
  }
}

function registryParams(camera: CameraConfig): SqlParams {
  return {
    cameraId: camera.id,
    name: camera.name,
    location: camera.location,
    snapshotUrl: camera.snapshotUrl ?? null,
    intervalMs: camera.intervalMs ?? null,
    active: camera.active === false ? 0 : 1,
    updatedAt: Date.now()
  };
}

function mapRegistryRow(row: RegistryRow): CameraConfig {
  const camera: CameraConfig = {
    id: row.cameraId,
    name: row.name,
    location: row.location,
    active: row.active === 1
  };
  if (row.snapshotUrl) {
    camera.snapshotUrl = row.snapshotUrl;
  }
  if (row.intervalMs !== null) {
    camera.intervalMs = row.intervalMs;
  }
  return camera;
}

function pick<T extends string>(allowed: readonly T[], value: string, fallback: T): T {
  return allowed.find(candidate => candidate === value) ?? fallback;
}

function mapDegraded(value: string | null): DegradedReason | null {
  if (value === 'timeout' || value === 'error') {
    return value;
  }
  return null;
}

function mapEventRow(row: EventRow): EventRecord {
  return {
    eventId: row.eventId,
    cameraId: row.cameraId,
    timestamp: epochMs(row.ts),
    classification: pick(CLASSIFICATIONS, row.classification, 'intruder'),
    personDetected: row.personDetected === 1,
    authorized: row.authorized === 1,
    confidence: row.confidence,
    faceSimilarity: row.faceSimilarity,
    personName: row.personName,
    faceId: row.faceId,
    severity: pick(SEVERITIES, row.severity, 'medium'),
    degraded: mapDegraded(row.degraded),
    reviewed: row.reviewed === 1
  };
}

function mapCameraRow(row: CameraRow): CameraState {
  return {
    cameraId: row.cameraId,
    lastHeartbeat: row.lastHeartbeat,
    status: pick(CAMERA_STATUSES, row.status, 'unknown')
  };
}

function mapIdentityRow(row: IdentityRow): IdentityRecord {
  const identity: IdentityRecord = { faceId: row.faceId, name: row.name, createdAt: row.createdAt };
  if (row.personId) {
    identity.personId = row.personId;
  }
  return identity;
}

function clampLimit(limit?: number) {
  if (typeof limit !== 'number' || Number.isNaN(limit)) {
    return 25;
  }
  return Math.min(Math.max(Math.floor(limit), 1), 100);
}

function clampOffset(offset?: number) {
  if (typeof offset !== 'number' || Number.isNaN(offset)) {
    return 0;
  }
  return Math.max(Math.floor(offset), 0);
}
