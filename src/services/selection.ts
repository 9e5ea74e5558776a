import { join } from 'node:path';
import { ConfigError } from './errors';
import { authHeaders } from './download/archiveClient';
import type { DownloadConfig } from './download/types';
import { NETCDF_FORMATS } from './radargram/netcdf';
import type { Availability, SegmentRecord } from './index/types';

/** Radargram formats the viewer can open. */
export const SUPPORTED_FORMATS: ReadonlySet<string> = new Set(['rgram', ...NETCDF_FORMATS]);

/** Download methods the download manager can carry out. */
export const SUPPORTED_DOWNLOAD_METHODS: ReadonlySet<string> = new Set(['http', 'nsidc']);

export type SelectionIntent = 'view' | 'download';

export type SelectionPlan =
  /** Pass `dataFormat` on to openRadargram */
  | { kind: 'view'; path: string; dataFormat: string }
  | { kind: 'download' }
  | { kind: 'downloading' }
  | { kind: 'already-downloaded'; path: string }
  | { kind: 'must-download' }
  | { kind: 'unsupported-format'; dataFormat: string }
  | { kind: 'unsupported-download'; url: string | null }
  | { kind: 'unavailable' }
  | { kind: 'needs-config'; missing: 'rootDir' | 'credentials'; message: string };

/**
 * Decide what choosing a candidate leads to, before anything is opened or
 * fetched. Pure apart from reading `config`; never throws for an ordinary
 * segment.
 */
export function planSelection(
  segment: SegmentRecord,
  intent: SelectionIntent,
  availability: Availability,
  config: Pick<DownloadConfig, 'rootDir' | 'credentials'>,
): SelectionPlan {
  const remote = segment.remote;
  if (availability === 'unavailable' || !remote) return { kind: 'unavailable' };

  if (!config.rootDir) {
    return {
      kind: 'needs-config',
      missing: 'rootDir',
      message: 'Set a root data directory before viewing or downloading radargrams',
    };
  }
  const path = join(config.rootDir, remote.relativePath);

  if (availability === 'downloading') return { kind: 'downloading' };

  if (intent === 'view') {
    if (availability === 'available-remote') return { kind: 'must-download' };
    if (!SUPPORTED_FORMATS.has(segment.dataFormat)) {
      return { kind: 'unsupported-format', dataFormat: segment.dataFormat };
    }
    return { kind: 'view', path, dataFormat: segment.dataFormat };
  }

  if (availability === 'available-local') return { kind: 'already-downloaded', path };
  if (!SUPPORTED_DOWNLOAD_METHODS.has(remote.downloadMethod)) {
    return { kind: 'unsupported-download', url: remote.url || null };
  }
  try {
    authHeaders(remote, config.credentials);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    return { kind: 'needs-config', missing: 'credentials', message: err.message };
  }
  return { kind: 'download' };
}
