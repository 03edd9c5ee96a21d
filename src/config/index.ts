import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import { KEY_SEPARATOR } from '../store/eventStore.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type ThresholdsConfig = {
  blurThreshold: number;
  brightnessMin: number;
  brightnessMax: number;
  minFaceSize: number;
  minDetectionConfidence: number;
  faceMatchThreshold: number;
  highSeverityConfidence: number;
  ambiguityMargin: number;
  duplicateSimilarity: number;
};

export type RecognitionConfig = {
  endpoint: string;
  timeoutMs: number;
  fallbackConfidence?: number;
  apiKey?: string;
};

export type LivenessConfig = {
  heartbeatTimeoutMs: number;
  sweepIntervalMs: number;
};

export type StoreConfig = {
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  fallbackCapacity: number;
  recentEventsLimit: number;
};

export type AlertsConfig = {
  webhookUrl?: string;
  timeoutMs?: number;
};

export type CaptureConfig = {
  intervalMs: number;
};

export type CameraConfig = {
  id: string;
  name: string;
  location: string;
  snapshotUrl?: string;
  intervalMs?: number;
  active?: boolean;
};

export type ServerConfig = {
  host: string;
  port: number;
};

export type RetentionConfig = {
  enabled: boolean;
  retentionDays: number;
  intervalMinutes: number;
};

export type WatchpostConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  thresholds: ThresholdsConfig;
  recognition: RecognitionConfig;
  liveness: LivenessConfig;
  store: StoreConfig;
  alerts: AlertsConfig;
  capture: CaptureConfig;
  cameras: CameraConfig[];
  server: ServerConfig;
  retention: RetentionConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const percentageSchema: JsonSchema = { type: 'number', minimum: 0, maximum: 100 };

const cameraSchema: JsonSchema = {
  type: 'object',
  required: ['id', 'name', 'location'],
  additionalProperties: false,
  properties: {
    id: { type: 'string' },
    name: { type: 'string' },
    location: { type: 'string' },
    snapshotUrl: { type: 'string' },
    intervalMs: { type: 'number', minimum: 1 },
    active: { type: 'boolean' }
  }
};

const watchpostConfigSchema: JsonSchema = {
  type: 'object',
  required: [
    'app',
    'logging',
    'database',
    'thresholds',
    'recognition',
    'liveness',
    'store',
    'alerts',
    'capture',
    'cameras',
    'server',
    'retention'
  ],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: {
        path: { type: 'string' }
      }
    },
    thresholds: {
      type: 'object',
      required: [
        'blurThreshold',
        'brightnessMin',
        'brightnessMax',
        'minFaceSize',
        'minDetectionConfidence',
        'faceMatchThreshold',
        'highSeverityConfidence',
        'ambiguityMargin',
        'duplicateSimilarity'
      ],
      additionalProperties: false,
      properties: {
        blurThreshold: { type: 'number', minimum: 0 },
        brightnessMin: { type: 'number', minimum: 0, maximum: 255 },
        brightnessMax: { type: 'number', minimum: 0, maximum: 255 },
        minFaceSize: { type: 'number', minimum: 0 },
        minDetectionConfidence: percentageSchema,
        faceMatchThreshold: percentageSchema,
        highSeverityConfidence: percentageSchema,
        ambiguityMargin: percentageSchema,
        duplicateSimilarity: { type: 'number', minimum: 0, maximum: 1 }
      }
    },
    recognition: {
      type: 'object',
      required: ['endpoint', 'timeoutMs'],
      additionalProperties: false,
      properties: {
        endpoint: { type: 'string' },
        timeoutMs: { type: 'number', minimum: 1 },
        fallbackConfidence: percentageSchema,
        apiKey: { type: 'string' }
      }
    },
    liveness: {
      type: 'object',
      required: ['heartbeatTimeoutMs', 'sweepIntervalMs'],
      additionalProperties: false,
      properties: {
        heartbeatTimeoutMs: { type: 'number', minimum: 0 },
        sweepIntervalMs: { type: 'number', minimum: 1 }
      }
    },
    store: {
      type: 'object',
      required: ['maxRetries', 'retryBaseDelayMs', 'retryMaxDelayMs', 'fallbackCapacity', 'recentEventsLimit'],
      additionalProperties: false,
      properties: {
        maxRetries: { type: 'number', minimum: 0 },
        retryBaseDelayMs: { type: 'number', minimum: 0 },
        retryMaxDelayMs: { type: 'number', minimum: 0 },
        fallbackCapacity: { type: 'number', minimum: 0 },
        recentEventsLimit: { type: 'number', minimum: 1 }
      }
    },
    alerts: {
      type: 'object',
      additionalProperties: false,
      properties: {
        webhookUrl: { type: 'string' },
        timeoutMs: { type: 'number', minimum: 1 }
      }
    },
    capture: {
      type: 'object',
      required: ['intervalMs'],
      additionalProperties: false,
      properties: {
        intervalMs: { type: 'number', minimum: 1 }
      }
    },
    cameras: {
      type: 'array',
      items: cameraSchema
    },
    server: {
      type: 'object',
      required: ['host', 'port'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535 }
      }
    },
    retention: {
      type: 'object',
      required: ['enabled', 'retentionDays', 'intervalMinutes'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        retentionDays: { type: 'number', minimum: 0 },
        intervalMinutes: { type: 'number', minimum: 1 }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean' && typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }

  return errors;
}

function collectSchemaErrors(value: unknown, errors: string[]): value is WatchpostConfig {
  errors.push(...validateAgainstSchema(watchpostConfigSchema, value, 'config'));
  return errors.length === 0;
}

export function validateConfig(config: unknown): asserts config is WatchpostConfig {
  const errors: string[] = [];
  if (!collectSchemaErrors(config, errors)) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): WatchpostConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): WatchpostConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: WatchpostConfig) {
  const messages: string[] = [];
  const { thresholds } = config;

  if (thresholds.brightnessMin > thresholds.brightnessMax) {
    messages.push(
      `config.thresholds.brightnessMin (${thresholds.brightnessMin}) must not exceed brightnessMax (${thresholds.brightnessMax})`
    );
  }

  if (thresholds.faceMatchThreshold - thresholds.ambiguityMargin < 0) {
    messages.push('config.thresholds.ambiguityMargin must not exceed faceMatchThreshold');
  }

  if (config.store.retryBaseDelayMs > config.store.retryMaxDelayMs) {
    messages.push('config.store.retryBaseDelayMs must not exceed retryMaxDelayMs');
  }

  if (config.logging.level.trim().length === 0) {
    messages.push('config.logging.level must be a non-empty string');
  }

  if (config.recognition.endpoint.trim().length === 0) {
    messages.push('config.recognition.endpoint must be a non-empty string');
  }

  const cameraIds = new Map<string, number>();
  config.cameras.forEach((camera, index) => {
    const label = camera.id || `#${index}`;
    const trimmed = camera.id.trim();
    if (!trimmed) {
      messages.push(`config.cameras[${label}] must specify a non-empty id`);
      return;
    }

    if (trimmed !== camera.id) {
      messages.push(`config.cameras[${label}] id must not contain surrounding whitespace`);
    }

    if (camera.id.includes(KEY_SEPARATOR)) {
      messages.push(
        `config.cameras[${label}] id must not contain the event key separator "${KEY_SEPARATOR}"`
      );
    }

    const existing = cameraIds.get(camera.id);
    if (existing !== undefined) {
      messages.push(
        `config.cameras[${label}] duplicates camera id "${camera.id}" already used by config.cameras[#${existing}]`
      );
    } else {
      cameraIds.set(camera.id, index);
    }
  });

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Reads the layered configuration (config/default.json plus the NODE_ENV overlay),
 * validates it and returns a frozen copy. Components receive this value explicitly;
 * nothing mutates it after startup.
 */
export function loadRuntimeConfig(): Readonly<WatchpostConfig> {
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return deepFreeze(loaded);
}
