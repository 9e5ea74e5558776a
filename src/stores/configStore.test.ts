import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createConfigStore, parseConfig, toDownloadConfig } from './configStore';

let configDir: string;
let dataDir: string;

beforeEach(async () => {
  configDir = await mkdtemp(join(tmpdir(), 'rgx-config-'));
  dataDir = await mkdtemp(join(tmpdir(), 'rgx-data-'));
});

afterEach(async () => {
  await rm(configDir, { recursive: true, force: true });
  await rm(dataDir, { recursive: true, force: true });
});

describe('parseConfig', () => {
  it('keeps known fields and trims strings', () => {
    expect(parseConfig({
      rootDir: dataDir,
      nsidcToken: '  test-secret ',
      aadAccessKey: '',
      maxConcurrentDownloads: 4,
      somethingElse: true,
    })).toEqual({
      rootDir: dataDir,
      nsidcToken: 'test-secret',
      aadAccessKey: null,
      aadSecretKey: null,
      maxConcurrentDownloads: 4,
    });
  });

  it('drops a root directory that does not exist', () => {
    expect(parseConfig({ rootDir: join(dataDir, 'missing') }).rootDir).toBeNull();
  });

  it('falls back to defaults for bad input', () => {
    expect(parseConfig(null)).toEqual({
      rootDir: null,
      nsidcToken: null,
      aadAccessKey: null,
      aadSecretKey: null,
      maxConcurrentDownloads: 2,
    });
    expect(parseConfig({ maxConcurrentDownloads: 0 }).maxConcurrentDownloads).toBe(2);
    expect(parseConfig({ maxConcurrentDownloads: 1.5 }).maxConcurrentDownloads).toBe(2);
  });
});

describe('toDownloadConfig', () => {
  it('maps user settings onto archive credentials', () => {
    expect(toDownloadConfig({
      rootDir: dataDir,
      nsidcToken: 'test-secret',
      aadAccessKey: 'test-access',
      aadSecretKey: 'test-secret',
      maxConcurrentDownloads: 3,
    })).toEqual({
      rootDir: dataDir,
      credentials: { bearerToken: 'test-secret', aadAccessKey: 'test-access', aadSecretKey: 'test-secret' },
      maxConcurrent: 3,
    });
  });
});

describe('createConfigStore', () => {
  it('persists settings across store instances', async () => {
    const first = createConfigStore(configDir);
    first.getState().setRootDir(dataDir);
    first.getState().setNsidcToken('test-secret');
    first.getState().setMaxConcurrentDownloads(3);

    const saved: unknown = JSON.parse(await readFile(join(configDir, 'radargram-explorer-config.json'), 'utf8'));
    expect(saved).toEqual({
      state: {
        rootDir: dataDir,
        nsidcToken: 'test-secret',
        aadAccessKey: null,
        aadSecretKey: null,
        maxConcurrentDownloads: 3,
      },
      version: 1,
    });

    const second = createConfigStore(configDir);
    expect(second.getState().rootDir).toBe(dataDir);
    expect(second.getState().nsidcToken).toBe('test-secret');
    expect(second.getState().maxConcurrentDownloads).toBe(3);
  });

  it('reads settings saved with the old snake_case keys', async () => {
    await writeFile(
      join(configDir, 'radargram-explorer-config.json'),
      JSON.stringify({ state: { rootdir: dataDir, nsidc_token: 'test-secret' }, version: 0 }),
    );
    const store = createConfigStore(configDir);
    expect(store.getState().rootDir).toBe(dataDir);
    expect(store.getState().nsidcToken).toBe('test-secret');
    expect(store.getState().maxConcurrentDownloads).toBe(2);
  });

  it('starts from defaults without a saved file', () => {
    const store = createConfigStore(configDir);
    expect(store.getState().rootDir).toBeNull();
    expect(store.getState().maxConcurrentDownloads).toBe(2);
  });

  it('rejects a concurrency below one', () => {
    const store = createConfigStore(configDir);
    expect(() => store.getState().setMaxConcurrentDownloads(0)).toThrow(RangeError);
  });

  it('clears blank credentials', () => {
    const store = createConfigStore(configDir);
    store.getState().setAadCredentials('test-access', '   ');
    expect(store.getState().aadAccessKey).toBe('test-access');
    expect(store.getState().aadSecretKey).toBeNull();
  });
});
