import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DownloadManager } from '../services/download/downloadManager';
import { MemoryGeometryIndex } from '../services/index/geometryIndex';
import { fakeArchive, testBytes } from '../test/fakeArchive';
import { makeRemote, makeSegment } from '../test/fixtures';
import { createSegmentStore, getAvailability, refreshLocalAvailability } from './segmentStore';

let rootDir: string;

beforeEach(async () => {
  rootDir = await mkdtemp(join(tmpdir(), 'rgx-root-'));
});

afterEach(async () => {
  await rm(rootDir, { recursive: true, force: true });
});

async function touch(relativePath: string): Promise<void> {
  const path = join(rootDir, relativePath);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, 'x');
}

const local = makeSegment('local', [[0, 0]], { remote: makeRemote({ relativePath: 'A/local.rgram' }) });
const remote = makeSegment('remote', [[0, 0]], { remote: makeRemote({ relativePath: 'A/remote.rgram' }) });
const partial = makeSegment('partial', [[0, 0]], { remote: makeRemote({ relativePath: 'A/partial.rgram' }) });
const restricted = makeSegment('restricted', [[0, 0]], { availability: 'unavailable' });
const index = new MemoryGeometryIndex([local, remote, partial, restricted]);

describe('refreshLocalAvailability', () => {
  it('marks segments whose complete file exists', async () => {
    await touch('A/local.rgram');
    await touch('A/partial.rgram.partial');
    const store = createSegmentStore();

    await refreshLocalAvailability(store, index, rootDir);

    expect(store.getState().availability).toEqual({
      local: 'available-local',
      remote: 'available-remote',
      partial: 'available-remote',
      restricted: 'unavailable',
    });
  });

  it('leaves in-flight transfers alone', async () => {
    await touch('A/local.rgram');
    const store = createSegmentStore();
    store.getState().setAvailability('local', 'downloading');

    await refreshLocalAvailability(store, index, rootDir);

    expect(getAvailability(store, local)).toBe('downloading');
  });

  it('keeps a transfer started while the file checks are running', async () => {
    const store = createSegmentStore();
    const archive = fakeArchive(testBytes(100), { stallAt: 0 });
    const manager = new DownloadManager(
      {
        rootDir,
        credentials: { bearerToken: null, aadAccessKey: null, aadSecretKey: null },
        maxConcurrent: 1,
        fetch: archive.fetch,
      },
      store,
    );

    const refresh = refreshLocalAvailability(store, index, rootDir);
    const handle = manager.start(remote);
    await refresh;

    expect(getAvailability(store, remote)).toBe('downloading');
    expect(getAvailability(store, local)).toBe('available-remote');

    manager.cancel(handle.id);
    expect((await handle.settled).state).toBe('paused-by-cancel');
    expect(getAvailability(store, remote)).toBe('available-remote');
  });

  it('only seeds index availability without a root directory', async () => {
    const store = createSegmentStore();
    await refreshLocalAvailability(store, index, null);
    expect(getAvailability(store, local)).toBe('available-remote');
  });
});

describe('getAvailability', () => {
  it('falls back to the index record', () => {
    expect(getAvailability(createSegmentStore(), restricted)).toBe('unavailable');
  });
});
