import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger from './logger.js';
import metrics from './metrics/index.js';
import {
  loadConfigFromFile,
  loadRuntimeConfig,
  type ServerConfig,
  type WatchpostConfig
} from './config/index.js';
import type { HealthStatus, ShutdownHookResult } from './app.js';
import type { WatchOptions, WatchRuntime } from './run-watch.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDependencies = {
  fetch?: typeof fetch;
  startWatch?: (options?: WatchOptions) => Promise<Pick<WatchRuntime, 'stop'>>;
  waitForSignal?: () => Promise<NodeJS.Signals>;
  loadConfig?: () => Readonly<WatchpostConfig>;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const HEALTH_EXIT_CODES: Record<HealthStatus, number> = {
  ok: 0,
  degraded: 1,
  starting: 1,
  stopping: 1
};

const HEALTH_UNREACHABLE_EXIT_CODE = 2;
const HEALTH_TIMEOUT_MS = 5000;

const USAGE_LINES = [
  'Watchpost CLI',
  '',
  'Usage:',
  '  watchpost start                 Start the watch daemon (until SIGINT/SIGTERM)',
  '  watchpost check-config [path]   Validate a configuration file, or the active configuration',
  '  watchpost health [--url url]    Query /api/health of a running instance',
  '  watchpost help                  Show this help message'
];

const HEALTH_STATUSES: readonly HealthStatus[] = ['ok', 'starting', 'stopping', 'degraded'];

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  deps: CliDependencies = {}
): Promise<number> {
  const command = argv[0] ?? 'start';

  switch (command) {
    case 'start': {
      return startDaemon(io, deps);
    }
    case 'check-config': {
      return checkConfig(argv.slice(1), io, deps);
    }
    case 'health':
    case '--health': {
      return outputHealth(argv.slice(1), io, deps);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

export function resolveHealthExitCode(status: HealthStatus) {
  return HEALTH_EXIT_CODES[status] ?? 1;
}

export function resolveHealthUrl(server: Pick<ServerConfig, 'host' | 'port'>): string {
  const host = server.host === '0.0.0.0' || server.host === '::' ? '127.0.0.1' : server.host;
  return `http://${host}:${server.port}/api/health`;
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

function checkConfig(args: string[], io: CliIo, deps: CliDependencies): number {
  const [filePath] = args;
  try {
    const loaded = filePath ? loadConfigFromFile(filePath) : (deps.loadConfig ?? loadRuntimeConfig)();
    io.stdout.write(`Configuration valid (${loaded.cameras.length} cameras)\n`);
    return 0;
  } catch (error) {
    io.stderr.write(`Invalid configuration: ${errorMessage(error)}\n`);
    return 1;
  }
}

function parseHealthStatus(payload: unknown): HealthStatus | null {
  if (typeof payload !== 'object' || payload === null || !('status' in payload)) {
    return null;
  }
  const { status } = payload;
  return HEALTH_STATUSES.find(candidate => candidate === status) ?? null;
}

async function outputHealth(args: string[], io: CliIo, deps: CliDependencies): Promise<number> {
  let url: string;
  const urlIndex = args.indexOf('--url');
  if (urlIndex >= 0) {
    const value = args[urlIndex + 1];
    if (!value) {
      io.stderr.write('Missing value for --url\n');
      return 1;
    }
    url = value;
  } else {
    try {
      url = resolveHealthUrl((deps.loadConfig ?? loadRuntimeConfig)().server);
    } catch (error) {
      io.stderr.write(`Invalid configuration: ${errorMessage(error)}\n`);
      return 1;
    }
  }

  const fetchImpl = deps.fetch ?? fetch;
  let payload: unknown;
  try {
    const res = await fetchImpl(url, { signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS) });
    payload = await res.json();
  } catch (error) {
    io.stderr.write(`Watchpost is unreachable at ${url}: ${errorMessage(error)}\n`);
    return HEALTH_UNREACHABLE_EXIT_CODE;
  }

  const status = parseHealthStatus(payload);
  if (!status) {
    io.stderr.write(`Unexpected health payload from ${url}\n`);
    return HEALTH_UNREACHABLE_EXIT_CODE;
  }

  io.stdout.write(`${JSON.stringify(payload)}\n`);
  return resolveHealthExitCode(status);
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
    const handle = (signal: NodeJS.Signals) => {
      for (const candidate of signals) {
        process.off(candidate, handle);
      }
      resolve(signal);
    };
    for (const signal of signals) {
      process.once(signal, handle);
    }
  });
}

async function startDaemon(io: CliIo, deps: CliDependencies): Promise<number> {
  const start = deps.startWatch ?? (await import('./run-watch.js')).startWatch;

  let runtime: Pick<WatchRuntime, 'stop'>;
  try {
    runtime = await metrics.time('watch.startup.ms', () => start());
  } catch (error) {
    logger.error({ err: error }, 'Watchpost failed to start');
    io.stderr.write(`Watchpost failed to start: ${errorMessage(error)}\n`);
    return 1;
  }

  io.stdout.write('Watchpost started\n');
  const signal = await (deps.waitForSignal ?? waitForShutdownSignal)();
  logger.info({ signal }, 'Watchpost shutting down');

  const results: ShutdownHookResult[] = await runtime.stop('signal', signal);
  const failures = results.filter(result => result.status === 'error');
  io.stdout.write(`Shutdown hooks executed: ${results.length - failures.length} ok, ${failures.length} failed\n`);
  for (const failure of failures) {
    io.stderr.write(`Hook ${failure.name} failed: ${failure.error?.message ?? 'unknown error'}\n`);
  }
  return failures.length > 0 ? 1 : 0;
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    (error: unknown) => {
      logger.error({ err: error }, 'Watchpost CLI failed');
      process.exit(1);
    }
  );
}
