import type { CameraState, EpochMs, EventRecord, Identity } from '../types.js';

export const KEY_SEPARATOR = '-';

/** Numeric timestamps below this are epoch seconds (anything before 1973-03-03 in ms). */
export const SECONDS_CUTOFF = 1e11;

export type TimestampInput = number | string | Date;

function isEpochMs(value: number): value is EpochMs {
  return Number.isSafeInteger(value) && value >= 0;
}

/** Marks a value that is already epoch milliseconds. Never rescales. */
export function epochMs(value: number): EpochMs {
  if (!isEpochMs(value)) {
    throw new Error(`Expected integer epoch milliseconds, got ${value}`);
  }
  return value;
}

/**
 * Converts an edge timestamp to integer epoch milliseconds, scaling seconds once.
 * Only ingestion edges call this; everything downstream carries `EpochMs`.
 */
export function normalizeTimestamp(value: TimestampInput | undefined, now: number = Date.now()): EpochMs {
  if (value === undefined) {
    return epochMs(Math.trunc(now));
  }

  if (value instanceof Date) {
    return normalizeNumeric(value.getTime(), 'Date');
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length > 0 && Number.isFinite(Number(trimmed))) {
      return normalizeNumeric(Number(trimmed), value);
    }
    return normalizeNumeric(Date.parse(trimmed), value);
  }

  return normalizeNumeric(value, String(value));
}

function normalizeNumeric(value: number, label: string): EpochMs {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid timestamp: ${label}`);
  }
  const ms = Math.round(value < SECONDS_CUTOFF ? value * 1000 : value);
  if (!isEpochMs(ms)) {
    throw new Error(`Invalid timestamp: ${label}`);
  }
  return ms;
}

export function assertCameraId(cameraId: string) {
  if (cameraId.length === 0) {
    throw new Error('Camera id must not be empty');
  }
  if (cameraId.includes(KEY_SEPARATOR)) {
    throw new Error(`Camera id "${cameraId}" must not contain "${KEY_SEPARATOR}"`);
  }
}

export function buildKey(cameraId: string, timestampMs: number): string {
  assertCameraId(cameraId);
  if (!Number.isSafeInteger(timestampMs) || timestampMs < 0) {
    throw new Error(`Event key timestamp must be integer milliseconds, got ${timestampMs}`);
  }
  return `${cameraId}${KEY_SEPARATOR}${timestampMs}`;
}

export function parseKey(eventId: string): { cameraId: string; timestamp: number } | null {
  const index = eventId.lastIndexOf(KEY_SEPARATOR);
  if (index <= 0) {
    return null;
  }
  const cameraId = eventId.slice(0, index);
  const digits = eventId.slice(index + 1);
  if (cameraId.includes(KEY_SEPARATOR) || !/^\d+$/.test(digits)) {
    return null;
  }
  return { cameraId, timestamp: Number(digits) };
}

export type EventRecordInput = Omit<EventRecord, 'eventId'> & {
  eventId?: string;
};

/** Derives the key from an already-normalized timestamp; applying it twice changes nothing. */
export function normalize(record: EventRecordInput): EventRecord {
  const { timestamp } = record;
  return {
    eventId: buildKey(record.cameraId, timestamp),
    cameraId: record.cameraId,
    timestamp,
    classification: record.classification,
    personDetected: record.personDetected,
    authorized: record.authorized,
    confidence: record.confidence,
    faceSimilarity: record.faceSimilarity,
    personName: record.personName,
    faceId: record.faceId,
    severity: record.severity,
    degraded: record.degraded,
    reviewed: record.reviewed
  };
}

export interface EventSink {
  putEvent(record: EventRecord): void | Promise<void>;
}

export interface EventReader {
  getEvent(eventId: string): EventRecord | null;
  recentEvents(cameraId: string, limit: number): EventRecord[];
}

export interface CameraStateStore {
  putCameraState(state: CameraState): void;
  getCameraState(cameraId: string): CameraState | null;
}

export interface IdentityDirectory {
  getIdentity(faceId: string): Identity | null;
}
