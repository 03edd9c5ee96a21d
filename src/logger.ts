import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'Watchpost';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values).map(level => level.toLowerCase()).concat('silent')
);

const levelEvents = new EventEmitter();

function isLevel(value: string): value is pino.LevelWithSilent {
  return AVAILABLE_LOG_LEVELS.has(value);
}

function extractMessage(args: unknown[]): string | undefined {
  for (const value of args) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (value && typeof value === 'object' && 'message' in value) {
      const candidate = value.message;
      if (typeof candidate === 'string' && candidate.length > 0) {
        return candidate;
      }
    }
  }
  return undefined;
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      metrics.incrementLogLevel(resolvedLevel, { message: extractMessage(inputArgs) });
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;
metrics.recordLogLevelChange(currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel);
});

export type Logger = Pick<pino.Logger, 'info' | 'warn' | 'error' | 'debug'>;

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = nextLevel.trim().toLowerCase();
  if (!isLevel(normalized)) {
    const available = getAvailableLogLevels().join(', ');
    throw new Error(`Unknown log level "${normalized}" (available: ${available})`);
  }

  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel);
  levelEvents.emit('change', currentLevel, previous);
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export function onLogLevelChange(listener: (level: string, previous: string) => void) {
  levelEvents.on('change', listener);
  return () => {
    levelEvents.off('change', listener);
  };
}

export default logger;
