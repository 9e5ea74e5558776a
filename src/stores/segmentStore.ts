import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { createStore } from 'zustand/vanilla';
import type { Availability, GeometryIndex, SegmentRecord } from '../services/index/types';

export interface SegmentAvailabilityState {
  /** Availability per segment id; only the download manager mutates it after seeding */
  availability: Record<string, Availability>;

  /** Merge initial values; never overrides a segment that is downloading */
  seed: (entries: Record<string, Availability>) => void;
  setAvailability: (segmentId: string, availability: Availability) => void;
}

export type SegmentStore = ReturnType<typeof createSegmentStore>;

export function createSegmentStore() {
  return createStore<SegmentAvailabilityState>()((set) => ({
    availability: {},

    seed: (entries) => set((state) => {
      const availability = { ...state.availability };
      for (const [segmentId, value] of Object.entries(entries)) {
        if (availability[segmentId] !== 'downloading') availability[segmentId] = value;
      }
      return { availability };
    }),

    setAvailability: (segmentId, availability) => set((state) => ({
      availability: { ...state.availability, [segmentId]: availability },
    })),
  }));
}

/**
 * Current availability for a segment. Falls back to what the index records.
 */
export function getAvailability(store: SegmentStore, segment: SegmentRecord): Availability {
  return store.getState().availability[segment.id] ?? segment.availability;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Seed availability from the index plus what already sits under the root
 * directory: a complete file at `<rootDir>/<relativePath>` marks the segment
 * available-local. Partial files (`.partial`) never count.
 */
export async function refreshLocalAvailability(
  store: SegmentStore,
  index: GeometryIndex,
  rootDir: string | null,
): Promise<void> {
  const entries: Record<string, Availability> = {};
  const checks: Promise<void>[] = [];

  for (const segment of index.all()) {
    // Don't stomp on an in-flight transfer
    if (store.getState().availability[segment.id] === 'downloading') continue;

    entries[segment.id] = segment.availability;
    const remote = segment.remote;
    if (!rootDir || !remote || segment.availability === 'unavailable') continue;

    checks.push(
      fileExists(join(rootDir, remote.relativePath)).then((exists) => {
        if (exists) entries[segment.id] = 'available-local';
      }),
    );
  }

  await Promise.all(checks);
  // A transfer may have started while the file checks ran; seed() leaves it alone
  store.getState().seed(entries);
}
