import { mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createStore } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import type { ArchiveCredentials, DownloadConfig } from '../services/download/types';

export const DEFAULT_MAX_CONCURRENT_DOWNLOADS = 2;

export interface UserConfig {
  /** Root directory downloaded radargrams are saved under */
  rootDir: string | null;
  /** NSIDC Earthdata bearer token */
  nsidcToken: string | null;
  aadAccessKey: string | null;
  aadSecretKey: string | null;
  maxConcurrentDownloads: number;
}

export interface ConfigState extends UserConfig {
  setRootDir: (rootDir: string | null) => void;
  setNsidcToken: (token: string | null) => void;
  setAadCredentials: (accessKey: string | null, secretKey: string | null) => void;
  setMaxConcurrentDownloads: (n: number) => void;
  replace: (config: UserConfig) => void;
}

const DEFAULT_CONFIG: UserConfig = {
  rootDir: null,
  nsidcToken: null,
  aadAccessKey: null,
  aadSecretKey: null,
  maxConcurrentDownloads: DEFAULT_MAX_CONCURRENT_DOWNLOADS,
};

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function nonEmptyString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

/**
 * Build a UserConfig from untrusted key/value input (a saved settings file,
 * host-provided options). Unknown keys are ignored; a root directory that
 * doesn't exist is dropped.
 */
export function parseConfig(raw: unknown): UserConfig {
  if (typeof raw !== 'object' || raw === null) return { ...DEFAULT_CONFIG };
  const entries = new Map<string, unknown>(Object.entries(raw));

  const rootDir = nonEmptyString(entries.get('rootDir'));
  const concurrency = entries.get('maxConcurrentDownloads');

  return {
    rootDir: rootDir && isDirectory(rootDir) ? rootDir : null,
    nsidcToken: nonEmptyString(entries.get('nsidcToken')),
    aadAccessKey: nonEmptyString(entries.get('aadAccessKey')),
    aadSecretKey: nonEmptyString(entries.get('aadSecretKey')),
    maxConcurrentDownloads:
      typeof concurrency === 'number' && Number.isInteger(concurrency) && concurrency >= 1
        ? concurrency
        : DEFAULT_MAX_CONCURRENT_DOWNLOADS,
  };
}

export function rootDirIsValid(config: UserConfig): boolean {
  return config.rootDir !== null && isDirectory(config.rootDir);
}

/** Explicit value handed to the download manager. Throws nothing; validation happens at start(). */
export function toDownloadConfig(config: UserConfig): DownloadConfig {
  const credentials: ArchiveCredentials = {
    bearerToken: config.nsidcToken,
    aadAccessKey: config.aadAccessKey,
    aadSecretKey: config.aadSecretKey,
  };
  return {
    rootDir: config.rootDir,
    credentials,
    maxConcurrent: config.maxConcurrentDownloads,
  };
}

/**
 * zustand StateStorage backed by one JSON file per store name in `dir`.
 * Synchronous so that stores hydrate during creation.
 */
export function fileStateStorage(dir: string): StateStorage {
  const fileFor = (name: string) => join(dir, `${name}.json`);
  return {
    getItem: (name) => {
      try {
        return readFileSync(fileFor(name), 'utf8');
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
        console.warn(`[Config] Could not read ${fileFor(name)}:`, err);
        return null;
      }
    },
    setItem: (name, value) => {
      mkdirSync(dir, { recursive: true });
      writeFileSync(fileFor(name), value, 'utf8');
    },
    removeItem: (name) => {
      rmSync(fileFor(name), { force: true });
    },
  };
}

type PersistedConfig = UserConfig;

export type ConfigStore = ReturnType<typeof createConfigStore>;

/**
 * User configuration, persisted to `<configDir>/radargram-explorer-config.json`.
 */
export function createConfigStore(configDir: string) {
  return createStore<ConfigState>()(
    persist(
      (set) => ({
        ...DEFAULT_CONFIG,

        setRootDir: (rootDir) => set({ rootDir }),
        setNsidcToken: (token) => set({ nsidcToken: nonEmptyString(token) }),
        setAadCredentials: (accessKey, secretKey) => set({
          aadAccessKey: nonEmptyString(accessKey),
          aadSecretKey: nonEmptyString(secretKey),
        }),
        setMaxConcurrentDownloads: (n) => {
          if (!Number.isInteger(n) || n < 1) {
            throw new RangeError(`maxConcurrentDownloads must be a positive integer, got ${n}`);
          }
          set({ maxConcurrentDownloads: n });
        },
        replace: (config) => set({ ...config }),
      }),
      {
        name: 'radargram-explorer-config',
        storage: createJSONStorage(() => fileStateStorage(configDir)),
        version: 1,
        // Only persist the config values, never the action functions
        partialize: (state): PersistedConfig => ({
          rootDir: state.rootDir,
          nsidcToken: state.nsidcToken,
          aadAccessKey: state.aadAccessKey,
          aadSecretKey: state.aadSecretKey,
          maxConcurrentDownloads: state.maxConcurrentDownloads,
        }),
        migrate: (persisted: unknown, version: number): PersistedConfig => {
          if (version === 0 && typeof persisted === 'object' && persisted !== null) {
            // v0 files used snake_case keys
            const old = new Map<string, unknown>(Object.entries(persisted));
            return parseConfig({
              rootDir: old.get('rootdir'),
              nsidcToken: old.get('nsidc_token'),
              aadAccessKey: old.get('aad_access_key'),
              aadSecretKey: old.get('aad_secret_key'),
            });
          }
          return parseConfig(persisted);
        },
      },
    ),
  );
}
