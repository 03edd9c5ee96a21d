import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  SnapshotSource,
  checkSnapshotUrl,
  type SnapshotError,
  type SnapshotFrame
} from '../src/video/snapshotSource.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { createTestLogger } from './helpers/logger.js';

const T = 1_700_000_000_000;
const bytes = new Uint8Array([137, 80, 78, 71]);

function createSource(fetchImpl: typeof fetch) {
  const metrics = new MetricsRegistry();
  const log = createTestLogger();
  const source = new SnapshotSource({
    cameraId: 'yard',
    url: 'http://camera.test/snapshot.png',
    intervalMs: 3000,
    fetch: fetchImpl,
    log,
    metrics,
    now: () => T
  });
  return { source, metrics, log };
}

describe('SnapshotSource', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('emits a heartbeat and a frame for each snapshot', async () => {
    const { source, metrics } = createSource(async () => new Response(bytes));
    const heartbeats: Array<{ cameraId: string; timestamp: number }> = [];
    const frames: SnapshotFrame[] = [];
    source.on('heartbeat', heartbeat => {
      heartbeats.push(heartbeat);
    });
    source.on('frame', frame => {
      frames.push(frame);
    });

    await expect(source.pollOnce()).resolves.toBe(3000);

    expect(heartbeats).toEqual([{ cameraId: 'yard', timestamp: T }]);
    expect(frames).toEqual([{ cameraId: 'yard', timestamp: T, image: Buffer.from(bytes) }]);
    expect(metrics.getCounter('capture', 'snapshots')).toBe(1);
  });

  it('backs off after failures and resets on success', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response(new Uint8Array(0)))
      .mockResolvedValueOnce(new Response(bytes));
    const { source, log } = createSource(fetchMock);
    const errors: SnapshotError[] = [];
    source.on('error', error => {
      errors.push(error);
    });

    await expect(source.pollOnce()).resolves.toBe(1000);
    await expect(source.pollOnce()).resolves.toBe(2000);
    expect(source.failureCount).toBe(2);
    expect(errors.map(error => [error.error.message, error.attempt, error.delayMs])).toEqual([
      ['Snapshot request failed: 503', 1, 1000],
      ['Snapshot response was empty', 2, 2000]
    ]);
    expect(log.warn).toHaveBeenCalledTimes(2);

    await expect(source.pollOnce()).resolves.toBe(3000);
    expect(source.failureCount).toBe(0);
  });

  it('polls on a timer until stopped', async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(bytes));
    const { source } = createSource(fetchMock);

    source.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(fetchMock).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(3000);
    expect(fetchMock).toHaveBeenCalledTimes(2);

    source.stop();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('checks a snapshot URL once without polling', async () => {
    const clock = vi.fn<() => number>().mockReturnValueOnce(T).mockReturnValueOnce(T + 42);
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(bytes));

    await expect(
      checkSnapshotUrl('yard', 'http://camera.test/snapshot.png', { fetch: fetchMock, now: clock })
    ).resolves.toEqual({ cameraId: 'yard', reachable: true, status: 200, latencyMs: 42 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports unreachable cameras with the reason', async () => {
    const now = () => T;

    await expect(
      checkSnapshotUrl('yard', 'http://camera.test/snapshot.png', {
        fetch: async () => new Response('busy', { status: 503 }),
        now
      })
    ).resolves.toEqual({
      cameraId: 'yard',
      reachable: false,
      status: 503,
      latencyMs: 0,
      error: 'Snapshot request failed: 503'
    });

    await expect(
      checkSnapshotUrl('yard', 'http://camera.test/snapshot.png', {
        fetch: async () => {
          throw new Error('connect ECONNREFUSED');
        },
        now
      })
    ).resolves.toEqual({ cameraId: 'yard', reachable: false, status: null, latencyMs: 0, error: 'connect ECONNREFUSED' });

    await expect(checkSnapshotUrl('porch', undefined)).resolves.toEqual({
      cameraId: 'porch',
      reachable: false,
      status: null,
      latencyMs: 0,
      error: 'Camera has no snapshot URL'
    });
  });
});
