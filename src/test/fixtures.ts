import type { Position, RemoteResource, SegmentRecord } from '../services/index/types';

/** Build a segment record with sensible defaults for tests. */
export function makeSegment(
  id: string,
  groundtrack: Position[],
  overrides: Partial<SegmentRecord> = {},
): SegmentRecord {
  return {
    id,
    region: 'ANTARCTIC',
    institution: 'TEST',
    campaign: 'CAMPAIGN1',
    granule: '',
    product: 'test-product',
    dataFormat: 'rgram',
    groundtrack,
    availability: 'available-remote',
    remote: null,
    ...overrides,
  };
}

export function makeRemote(overrides: Partial<RemoteResource> = {}): RemoteResource {
  return {
    url: 'https://archive.example.test/data/seg.rgram',
    downloadMethod: 'http',
    authClass: 'none',
    sizeBytes: 0,
    relativePath: 'ANTARCTIC/TEST/CAMPAIGN1/seg.rgram',
    ...overrides,
  };
}
