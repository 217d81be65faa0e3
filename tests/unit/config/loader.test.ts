import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_CONFIG } from '../../../src/config/defaults';
import { loadRouterConfig, loadRouterConfigSync } from '../../../src/config/loader';

const ENV_VARS = ['ORTHO_SHAPE_MARGIN', 'ORTHO_GLOBAL_BOUNDS_MARGIN', 'ORTHO_BEND_PENALTY', 'ORTHO_CACHE_SIZE'];

describe('loadRouterConfig', () => {
  let tempDir: string;

  function writeConfig(name: string, content: string): string {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content, 'utf8');
    return file;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ortho-config-'));
    for (const name of ENV_VARS) vi.stubEnv(name, '');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('returns the defaults when nothing is configured', async () => {
    expect(await loadRouterConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('reads values from a YAML file', async () => {
    const file = writeConfig('router.yaml', 'shapeMargin: 4\nbendPenalty: 2.5\n');
    expect(await loadRouterConfig(undefined, file)).toEqual({
      shapeMargin: 4,
      globalBoundsMargin: 20,
      bendPenalty: 2.5,
      cacheSize: 0,
    });
  });

  it('applies env over file and overrides over env', async () => {
    const file = writeConfig('router.yaml', 'shapeMargin: 4\ncacheSize: 8\n');
    vi.stubEnv('ORTHO_SHAPE_MARGIN', '6');
    vi.stubEnv('ORTHO_CACHE_SIZE', '16');

    const config = await loadRouterConfig({ cacheSize: 32 }, file);
    expect(config.shapeMargin).toBe(6);
    expect(config.cacheSize).toBe(32);
  });

  it('treats an empty file as no settings', async () => {
    const file = writeConfig('empty.yaml', '');
    expect(await loadRouterConfig(undefined, file)).toEqual(DEFAULT_CONFIG);
  });

  it('rejects a file with invalid values', async () => {
    const file = writeConfig('bad.yaml', 'shapeMargin: -3\n');
    await expect(loadRouterConfig(undefined, file)).rejects.toThrow(
      `Invalid router configuration in ${file}: shapeMargin: `,
    );
  });

  it('warns and falls back when the file is missing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const missing = path.join(tempDir, 'nope.yaml');

    expect(await loadRouterConfig(undefined, missing)).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain(`Config file not found: ${missing}`);
  });

  it('warns and falls back when the YAML does not parse', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const file = writeConfig('broken.yaml', 'shapeMargin: [1, 2\n');

    expect(await loadRouterConfig(undefined, file)).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain(`Skipping unreadable config file ${file}: `);
  });

  it('ignores an env var that is not a valid value', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubEnv('ORTHO_CACHE_SIZE', 'lots');
    vi.stubEnv('ORTHO_GLOBAL_BOUNDS_MARGIN', '5');

    const config = await loadRouterConfig();
    expect(config.cacheSize).toBe(DEFAULT_CONFIG.cacheSize);
    expect(config.globalBoundsMargin).toBe(5);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain('Ignoring ORTHO_CACHE_SIZE=lots: ');
  });
});

describe('loadRouterConfigSync', () => {
  beforeEach(() => {
    for (const name of ENV_VARS) vi.stubEnv(name, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('merges env and overrides without reading a file', () => {
    vi.stubEnv('ORTHO_BEND_PENALTY', '12');
    expect(loadRouterConfigSync({ shapeMargin: 0 })).toEqual({
      shapeMargin: 0,
      globalBoundsMargin: 20,
      bendPenalty: 12,
      cacheSize: 0,
    });
  });

  it('throws on invalid overrides', () => {
    expect(() => loadRouterConfigSync({ cacheSize: 1.5 })).toThrow(
      'Invalid router configuration in overrides: cacheSize: ',
    );
  });
});
