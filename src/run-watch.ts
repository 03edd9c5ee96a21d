import defaultLogger, { type Logger } from './logger.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import { EventBus } from './eventBus.js';
import { EventDatabase } from './db.js';
import { loadRuntimeConfig, type WatchpostConfig } from './config/index.js';
import {
  registerHealthIndicator,
  registerShutdownHook,
  runShutdownHooks,
  type HealthStatus,
  type ShutdownHookResult
} from './app.js';
import { ResilientEventWriter } from './store/resilientWriter.js';
import { LivenessMonitor } from './pipeline/liveness.js';
import { HttpRecognizer, type Recognizer } from './recognition/client.js';
import { FailSafeRecognizer } from './recognition/failSafe.js';
import { BusAlertSink, CompositeAlertSink, WebhookAlertSink, type AlertSink } from './pipeline/alerts.js';
import { ClassificationEngine } from './pipeline/engine.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import { SnapshotSource } from './video/snapshotSource.js';
import { startRetentionTask, type RetentionTask } from './tasks/retention.js';

export type WatchOptions = {
  config?: Readonly<WatchpostConfig>;
  database?: EventDatabase;
  recognizer?: Recognizer;
  fetch?: typeof fetch;
  bus?: EventBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  startServer?: boolean;
  startCapture?: boolean;
};

export type WatchRuntime = {
  config: Readonly<WatchpostConfig>;
  database: EventDatabase;
  writer: ResilientEventWriter;
  bus: EventBus;
  liveness: LivenessMonitor;
  engine: ClassificationEngine;
  server: HttpServerRuntime | null;
  sources: SnapshotSource[];
  retention: RetentionTask | null;
  status: () => HealthStatus;
  stop: (reason?: string, signal?: NodeJS.Signals) => Promise<ShutdownHookResult[]>;
};

export async function startWatch(options: WatchOptions = {}): Promise<WatchRuntime> {
  const log = options.log ?? defaultLogger;
  const metrics = options.metrics ?? defaultMetrics;
  const config = options.config ?? loadRuntimeConfig();
  const startedAt = Date.now();
  let status: HealthStatus = 'starting';
  const unregister: Array<() => void> = [];

  const database = options.database ?? new EventDatabase(config.database.path);
  unregister.push(
    registerShutdownHook('database', () => {
      database.close();
    })
  );

  const writer = new ResilientEventWriter({ sink: database, ...config.store, log, metrics });
  unregister.push(registerShutdownHook('store-writer', () => writer.flush()));

  const bus = options.bus ?? new EventBus({ log, metrics });

  const seeded = database.seedCameras(config.cameras);
  const cameras = database.listCameras();
  log.debug({ seeded, registered: cameras.length }, 'Camera registry loaded');

  const liveness = new LivenessMonitor({
    heartbeatTimeoutMs: config.liveness.heartbeatTimeoutMs,
    sweepIntervalMs: config.liveness.sweepIntervalMs,
    store: database,
    log,
    metrics
  });
  liveness.restore(database.listCameraStates());
  liveness.on('transition', transition => {
    bus.emitCameraTransition(transition);
  });

  const recognizer = new FailSafeRecognizer({
    recognizer:
      options.recognizer ??
      new HttpRecognizer({
        endpoint: config.recognition.endpoint,
        apiKey: config.recognition.apiKey,
        fetch: options.fetch
      }),
    timeoutMs: config.recognition.timeoutMs,
    fallbackConfidence: config.recognition.fallbackConfidence ?? config.thresholds.minDetectionConfidence,
    minFaceSize: config.thresholds.minFaceSize,
    identities: database,
    log,
    metrics
  });

  const sinks: AlertSink[] = [new BusAlertSink(bus)];
  const webhookUrl = config.alerts.webhookUrl;
  if (webhookUrl) {
    const webhook = new WebhookAlertSink({
      url: webhookUrl,
      timeoutMs: config.alerts.timeoutMs,
      fetch: options.fetch,
      log,
      metrics
    });
    sinks.push(webhook);
    unregister.push(registerShutdownHook('alert-webhook', () => webhook.flush()));
  }

  const engine = new ClassificationEngine({
    thresholds: config.thresholds,
    cameras,
    registry: database,
    recognizer,
    writer,
    alerts: new CompositeAlertSink(sinks, log),
    liveness,
    reader: database,
    recentEventsLimit: config.store.recentEventsLimit,
    bus,
    log,
    metrics
  });
  unregister.push(
    registerShutdownHook('engine', async () => {
      engine.stop();
      await engine.flush();
    })
  );

  liveness.start();
  unregister.push(
    registerShutdownHook('liveness', () => {
      liveness.stop();
    })
  );

  let retention: RetentionTask | null = null;
  if (config.retention.enabled) {
    const task = startRetentionTask({
      enabled: true,
      retentionDays: config.retention.retentionDays,
      intervalMs: config.retention.intervalMinutes * 60 * 1000,
      store: database,
      logger: log,
      metrics
    });
    retention = task;
    unregister.push(
      registerShutdownHook('retention', () => {
        task.stop();
      })
    );
  }

  const sources: SnapshotSource[] = [];
  if (options.startCapture !== false) {
    for (const camera of cameras) {
      if (!camera.snapshotUrl || camera.active === false) {
        continue;
      }
      const source = new SnapshotSource({
        cameraId: camera.id,
        url: camera.snapshotUrl,
        intervalMs: camera.intervalMs ?? config.capture.intervalMs,
        fetch: options.fetch,
        log,
        metrics
      });
      source.on('heartbeat', ({ cameraId, timestamp }) => {
        engine.submitHeartbeat(cameraId, timestamp);
      });
      source.on('frame', frame => {
        engine.submitFrame(frame).then(
          outcome => {
            log.debug({ cameraId: frame.cameraId, outcome: outcome.status }, 'Snapshot frame handled');
          },
          (error: unknown) => {
            log.error({ err: error, cameraId: frame.cameraId }, 'Snapshot frame failed');
          }
        );
      });
      source.start();
      sources.push(source);
    }
  }
  if (sources.length > 0) {
    unregister.push(
      registerShutdownHook('capture', () => {
        for (const source of sources) {
          source.stop();
        }
      })
    );
    unregister.push(
      registerHealthIndicator('capture', () => {
        const failing = sources.filter(source => source.failureCount > 0).map(source => source.cameraId);
        return {
          status: failing.length > 0 ? 'degraded' : 'ok',
          details: { sources: sources.length, failing }
        };
      })
    );
  }

  let server: HttpServerRuntime | null = null;
  if (options.startServer !== false) {
    const runtime = await startHttpServer({
      engine,
      database,
      writer,
      bus,
      log,
      metrics,
      port: config.server.port,
      host: config.server.host,
      fetch: options.fetch,
      serviceState: () => ({ status, startedAt })
    });
    server = runtime;
    unregister.push(registerShutdownHook('http', () => runtime.close()));
  }

  status = 'ok';
  log.info({ cameras: cameras.length, port: server?.port ?? null }, 'Watchpost started');

  let stopping: Promise<ShutdownHookResult[]> | null = null;
  const stop = (reason = 'shutdown', signal?: NodeJS.Signals) => {
    if (!stopping) {
      status = 'stopping';
      stopping = runShutdownHooks({ reason, signal }).then(results => {
        for (const dispose of unregister) {
          dispose();
        }
        for (const result of results) {
          if (result.status === 'error') {
            log.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
          }
        }
        log.info({ reason, signal }, 'Watchpost stopped');
        return results;
      });
    }
    return stopping;
  };

  return {
    config,
    database,
    writer,
    bus,
    liveness,
    engine,
    server,
    sources,
    retention,
    status: () => status,
    stop
  };
}
