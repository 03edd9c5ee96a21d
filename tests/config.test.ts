import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadConfigFromFile, loadRuntimeConfig, parseConfig, validateConfig } from '../src/config/index.js';

const runtime = loadRuntimeConfig();

function baseConfig() {
  return {
    ...runtime,
    thresholds: { ...runtime.thresholds },
    cameras: runtime.cameras.map(camera => ({ ...camera })),
    server: { ...runtime.server }
  };
}

describe('ConfigLoader', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('layers the test overlay on top of the defaults and freezes the result', () => {
    expect(runtime.database.path).toBe(':memory:');
    expect(runtime.logging.level).toBe('silent');
    expect(runtime.thresholds.faceMatchThreshold).toBe(80);
    expect(runtime.store.fallbackCapacity).toBe(100);
    expect(Object.isFrozen(runtime)).toBe(true);
    expect(Object.isFrozen(runtime.thresholds)).toBe(true);
    expect(Object.isFrozen(runtime.cameras[0])).toBe(true);
  });

  it('accepts a complete configuration', () => {
    const parsed = parseConfig(JSON.stringify(baseConfig()));
    expect(parsed.cameras).toHaveLength(2);
  });

  it('reports schema violations with their paths', () => {
    const { thresholds: _thresholds, ...withoutThresholds } = baseConfig();
    expect(() => validateConfig(withoutThresholds)).toThrow('config.thresholds is required');

    expect(() => validateConfig({ ...baseConfig(), extra: true })).toThrow('config.extra is not allowed');

    const badPort = { ...baseConfig(), server: { host: '127.0.0.1', port: 'eighty' } };
    expect(() => validateConfig(badPort)).toThrow('config.server.port must be a number');

    const badThreshold = baseConfig();
    badThreshold.thresholds.faceMatchThreshold = 120;
    expect(() => validateConfig(badThreshold)).toThrow('config.thresholds.faceMatchThreshold must be <= 100');
  });

  it('reports logical conflicts', () => {
    const inverted = baseConfig();
    inverted.thresholds.brightnessMin = 250;
    expect(() => validateConfig(inverted)).toThrow(
      'config.thresholds.brightnessMin (250) must not exceed brightnessMax (220)'
    );

    const separator = baseConfig();
    separator.cameras[0] = { ...separator.cameras[0], id: 'front-door' };
    expect(() => validateConfig(separator)).toThrow(
      'config.cameras[front-door] id must not contain the event key separator "-"'
    );

    const duplicate = baseConfig();
    duplicate.cameras.push({ id: 'yard', name: 'Side yard', location: 'Garden' });
    expect(() => validateConfig(duplicate)).toThrow(
      'config.cameras[yard] duplicates camera id "yard" already used by config.cameras[#1]'
    );
  });

  it('loads and validates a configuration file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'watchpost-config-'));
    tempDirs.push(dir);
    const valid = path.join(dir, 'valid.json');
    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(valid, JSON.stringify(baseConfig()));
    fs.writeFileSync(broken, '{ "app": ');

    expect(loadConfigFromFile(valid).server.host).toBe('127.0.0.1');
    expect(() => loadConfigFromFile(broken)).toThrow(/^Failed to parse configuration: /);
  });
});
