import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import type { ArchiveCredentials } from './download/types';
import { makeRemote, makeSegment } from '../test/fixtures';
import { planSelection } from './selection';

const noCredentials: ArchiveCredentials = { bearerToken: null, aadAccessKey: null, aadSecretKey: null };
const config = { rootDir: '/data/radar', credentials: noCredentials };
const segment = makeSegment('seg-1', [[0, 0], [1, 0]], { remote: makeRemote() });
const localPath = join('/data/radar', 'ANTARCTIC/TEST/CAMPAIGN1/seg.rgram');

describe('planSelection', () => {
  it('opens local radargrams in a supported format', () => {
    expect(planSelection(segment, 'view', 'available-local', config)).toEqual({
      kind: 'view',
      path: localPath,
      dataFormat: 'rgram',
    });
    const bas = { ...segment, dataFormat: 'bas_netcdf' };
    expect(planSelection(bas, 'view', 'available-local', config)).toEqual({
      kind: 'view',
      path: localPath,
      dataFormat: 'bas_netcdf',
    });
  });

  it('asks for a download before viewing a remote segment', () => {
    expect(planSelection(segment, 'view', 'available-remote', config)).toEqual({ kind: 'must-download' });
  });

  it('reports formats the viewer cannot open', () => {
    const matlab = { ...segment, dataFormat: 'cresis_mat' };
    expect(planSelection(matlab, 'view', 'available-local', config)).toEqual({
      kind: 'unsupported-format',
      dataFormat: 'cresis_mat',
    });
  });

  it('downloads remote segments', () => {
    expect(planSelection(segment, 'download', 'available-remote', config)).toEqual({ kind: 'download' });
  });

  it('points at the existing file when it is already downloaded', () => {
    expect(planSelection(segment, 'download', 'available-local', config)).toEqual({
      kind: 'already-downloaded',
      path: localPath,
    });
  });

  it('reports an in-flight transfer for either intent', () => {
    expect(planSelection(segment, 'view', 'downloading', config)).toEqual({ kind: 'downloading' });
    expect(planSelection(segment, 'download', 'downloading', config)).toEqual({ kind: 'downloading' });
  });

  it('refuses segments that are not public', () => {
    expect(planSelection(segment, 'download', 'unavailable', config)).toEqual({ kind: 'unavailable' });
    const noRemote = makeSegment('seg-2', [[0, 0]]);
    expect(planSelection(noRemote, 'view', 'available-remote', config)).toEqual({ kind: 'unavailable' });
  });

  it('sends manual-only archives to the user', () => {
    const manual = { ...segment, remote: makeRemote({ downloadMethod: 'manual' }) };
    expect(planSelection(manual, 'download', 'available-remote', config)).toEqual({
      kind: 'unsupported-download',
      url: 'https://archive.example.test/data/seg.rgram',
    });
  });

  it('needs a root directory first', () => {
    const plan = planSelection(segment, 'view', 'available-local', { ...config, rootDir: null });
    expect(plan.kind).toBe('needs-config');
    if (plan.kind === 'needs-config') expect(plan.missing).toBe('rootDir');
  });

  it('needs credentials for protected archives', () => {
    const protectedSegment = { ...segment, remote: makeRemote({ downloadMethod: 'nsidc', authClass: 'bearer' }) };
    expect(planSelection(protectedSegment, 'download', 'available-remote', config)).toEqual({
      kind: 'needs-config',
      missing: 'credentials',
      message: 'A bearer token is required to download https://archive.example.test/data/seg.rgram',
    });

    const withToken = { ...config, credentials: { ...noCredentials, bearerToken: 'test-secret' } };
    expect(planSelection(protectedSegment, 'download', 'available-remote', withToken)).toEqual({ kind: 'download' });
  });
});
