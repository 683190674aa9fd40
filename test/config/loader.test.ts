/**
 * Tests for config/loader.ts: defaults, sources, priority, validation.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EXTERNAL_DEFAULTS,
  loadConfig,
  parseExternalConfig,
  toBenchSettings,
  validateExternalConfig,
} from '../../src/config/loader.js';
import type { ExternalConfig } from '../../src/config/loader.js';
import { ConfigError } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';

const noFiles = { skipProjectConfig: true, skipUserConfig: true };

describe('loadConfig', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'sortbench-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    setLogLevel('silent');
  });

  afterEach(() => {
    setLogLevel('info');
  });

  function writeConfig(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  describe('defaults', () => {
    it('returns the default values when no source exists', () => {
      const config = loadConfig({ skipEnv: true, ...noFiles });

      expect(config.bench).toEqual({
        sizes: [6, 1_000, 10_000, 100_000],
        slowLimit: 10_000,
        skipSlowest: false,
        printThreshold: 20,
        includeLiterals: true,
      });
      expect(config.logging.level).toBe('info');
    });

    it('does not share the defaults object', () => {
      const config = loadConfig({ skipEnv: true, ...noFiles });
      config.bench.slowLimit = 1;
      expect(EXTERNAL_DEFAULTS.bench.slowLimit).toBe(10_000);
    });
  });

  describe('environment variables', () => {
    it('reads the bench settings', () => {
      const config = loadConfig({
        ...noFiles,
        env: {
          SORTBENCH_BENCH_SIZES: '5, 50',
          SORTBENCH_BENCH_SLOW_LIMIT: '40',
          SORTBENCH_BENCH_SKIP_SLOWEST: 'true',
          SORTBENCH_BENCH_SEED: '7',
          SORTBENCH_BENCH_PRINT_THRESHOLD: '3',
          SORTBENCH_BENCH_INCLUDE_LITERALS: 'false',
          SORTBENCH_BENCH_ONLY: 'heapsort,gnome',
        },
      });

      expect(config.bench).toEqual({
        sizes: [5, 50],
        slowLimit: 40,
        skipSlowest: true,
        seed: 7,
        printThreshold: 3,
        includeLiterals: false,
        only: ['heapsort', 'gnome'],
      });
    });

    it('reads the log level', () => {
      const config = loadConfig({ ...noFiles, env: { SORTBENCH_LOG_LEVEL: 'debug' } });
      expect(config.logging.level).toBe('debug');
    });

    it('ignores an unknown log level', () => {
      const config = loadConfig({ ...noFiles, env: { SORTBENCH_LOG_LEVEL: 'loud' } });
      expect(config.logging.level).toBe('info');
    });

    it('skips env vars when skipEnv is true', () => {
      const config = loadConfig({
        ...noFiles,
        skipEnv: true,
        env: { SORTBENCH_BENCH_SEED: '7' },
      });
      expect(config.bench.seed).toBeUndefined();
    });
  });

  describe('config files', () => {
    it('reads the project config', () => {
      const projectConfigPath = writeConfig('project.json', JSON.stringify({ bench: { sizes: [3] } }));
      const config = loadConfig({ skipEnv: true, skipUserConfig: true, projectConfigPath });

      expect(config.bench.sizes).toEqual([3]);
      expect(config.bench.slowLimit).toBe(10_000);
    });

    it('lets the project config override the user config', () => {
      const userConfigPath = writeConfig(
        'user.json',
        JSON.stringify({ bench: { seed: 1, slowLimit: 5 } }),
      );
      const projectConfigPath = writeConfig('project-seed.json', JSON.stringify({ bench: { seed: 2 } }));
      const config = loadConfig({ skipEnv: true, userConfigPath, projectConfigPath });

      expect(config.bench.seed).toBe(2);
      expect(config.bench.slowLimit).toBe(5);
    });

    it('lets env vars override the project config', () => {
      const projectConfigPath = writeConfig('project-env.json', JSON.stringify({ bench: { seed: 2 } }));
      const config = loadConfig({
        skipUserConfig: true,
        projectConfigPath,
        env: { SORTBENCH_BENCH_SEED: '3' },
      });
      expect(config.bench.seed).toBe(3);
    });

    it('handles a missing file gracefully', () => {
      const config = loadConfig({
        skipEnv: true,
        userConfigPath: join(dir, 'missing-user.json'),
        projectConfigPath: join(dir, 'missing-project.json'),
      });
      expect(config.bench.sizes).toEqual([6, 1_000, 10_000, 100_000]);
    });

    it('ignores a file that is not valid JSON', () => {
      const projectConfigPath = writeConfig('broken.json', '{ "bench": ');
      const config = loadConfig({ skipEnv: true, skipUserConfig: true, projectConfigPath });
      expect(config.bench.slowLimit).toBe(10_000);
    });
  });

  describe('CLI overrides', () => {
    it('take precedence over env vars', () => {
      const config = loadConfig({
        ...noFiles,
        env: { SORTBENCH_BENCH_SEED: '3', SORTBENCH_BENCH_SLOW_LIMIT: '9' },
        cliOverrides: { bench: { seed: 4 } },
      });
      expect(config.bench.seed).toBe(4);
      expect(config.bench.slowLimit).toBe(9);
    });

    it('merge with defaults', () => {
      const config = loadConfig({
        skipEnv: true,
        ...noFiles,
        cliOverrides: { bench: { skipSlowest: true } },
      });
      expect(config.bench.skipSlowest).toBe(true);
      expect(config.bench.printThreshold).toBe(20);
      expect(config.logging.level).toBe('info');
    });
  });
});

describe('parseExternalConfig', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  afterEach(() => {
    setLogLevel('info');
  });

  it('keeps well-typed fields', () => {
    const value = { bench: { sizes: [1, 2], only: ['heapsort'] }, logging: { level: 'warn' } };
    expect(parseExternalConfig(value)).toEqual(value);
  });

  it('drops fields of the wrong type', () => {
    const value = { bench: { sizes: 'many', seed: 3, skipSlowest: 'yes' }, logging: { level: 'loud' } };
    expect(parseExternalConfig(value)).toEqual({ bench: { seed: 3 }, logging: {} });
  });

  it('ignores unknown sections', () => {
    expect(parseExternalConfig({ colours: true })).toEqual({});
  });

  it('throws ConfigError for a non-object', () => {
    expect(() => parseExternalConfig([1, 2], 'test.json')).toThrow(ConfigError);
    expect(() => parseExternalConfig(null, 'test.json')).toThrow('test.json must be a JSON object');
  });
});

describe('validateExternalConfig', () => {
  it('returns empty array for a valid config', () => {
    const config: ExternalConfig = {
      bench: { sizes: [0, 10], slowLimit: 0, seed: -4, printThreshold: 5, only: ['gnome'] },
    };
    expect(validateExternalConfig(config)).toEqual([]);
  });

  it('returns empty array for an empty config', () => {
    expect(validateExternalConfig({})).toEqual([]);
  });

  it('reports negative or fractional sizes', () => {
    expect(validateExternalConfig({ bench: { sizes: [10, -1] } })).toEqual([
      'bench.sizes must contain non-negative integers',
    ]);
    expect(validateExternalConfig({ bench: { sizes: [1.5] } })).toEqual([
      'bench.sizes must contain non-negative integers',
    ]);
  });

  it('reports a negative slow limit', () => {
    expect(validateExternalConfig({ bench: { slowLimit: -1 } })).toEqual([
      'bench.slowLimit must be a non-negative integer',
    ]);
  });

  it('reports a fractional seed', () => {
    expect(validateExternalConfig({ bench: { seed: 0.5 } })).toEqual(['bench.seed must be an integer']);
  });

  it('reports a negative print threshold', () => {
    expect(validateExternalConfig({ bench: { printThreshold: -2 } })).toEqual([
      'bench.printThreshold must be a non-negative integer',
    ]);
  });

  it('reports unknown algorithm ids', () => {
    expect(validateExternalConfig({ bench: { only: ['heapsort', 'bogosort'] } })).toEqual([
      'bench.only contains unknown algorithm "bogosort"',
    ]);
  });

  it('reports multiple errors at once', () => {
    const errors = validateExternalConfig({ bench: { slowLimit: -1, seed: 0.5 } });
    expect(errors).toHaveLength(2);
  });
});

describe('toBenchSettings', () => {
  it('fills in defaults and the fallback seed', () => {
    const config = loadConfig({ skipEnv: true, ...noFiles });
    expect(toBenchSettings(config, 123)).toEqual({
      sizes: [6, 1_000, 10_000, 100_000],
      slowLimit: 10_000,
      skipSlowest: false,
      seed: 123,
      printThreshold: 20,
      includeLiterals: true,
      only: undefined,
    });
  });

  it('prefers a configured seed', () => {
    const config = loadConfig({ skipEnv: true, ...noFiles, cliOverrides: { bench: { seed: 5 } } });
    expect(toBenchSettings(config, 123).seed).toBe(5);
  });

  it('keeps the only list', () => {
    const config = loadConfig({
      skipEnv: true,
      ...noFiles,
      cliOverrides: { bench: { only: ['gnome', 'heapsort'] } },
    });
    expect(toBenchSettings(config, 0).only).toEqual(['gnome', 'heapsort']);
  });

  it('treats an empty only list as all algorithms', () => {
    const config = loadConfig({ skipEnv: true, ...noFiles, cliOverrides: { bench: { only: [] } } });
    expect(toBenchSettings(config, 0).only).toBeUndefined();
  });

  it('throws ConfigError for an invalid config', () => {
    const config = loadConfig({ skipEnv: true, ...noFiles, cliOverrides: { bench: { slowLimit: -1 } } });
    expect(() => toBenchSettings(config, 0)).toThrow(ConfigError);
    expect(() => toBenchSettings(config, 0)).toThrow(
      'Invalid configuration: bench.slowLimit must be a non-negative integer',
    );
  });
});
