/** [lon, lat] for geographic indexes, [x, y] for projected ones. */
export type Position = [number, number];

export type Availability = 'available-remote' | 'downloading' | 'available-local' | 'unavailable';

/** How the archive expects to be fetched. `manual` = user must fetch it themselves. */
export type DownloadMethod = 'http' | 'nsidc' | 'manual';

/** Credential class the remote archive requires. */
export type AuthClass = 'none' | 'bearer' | 'aad';

export interface Checksum {
  algorithm: 'sha256' | 'md5';
  /** Lowercase hex digest */
  value: string;
}

export interface RemoteResource {
  url: string;
  downloadMethod: DownloadMethod;
  authClass: AuthClass;
  /** Expected byte size of the downloaded file */
  sizeBytes: number;
  checksum?: Checksum;
  /** Path of the complete file, relative to the configured root directory */
  relativePath: string;
}

export interface SegmentRecord {
  id: string;
  region: string;
  institution: string;
  campaign: string;
  /** Empty when the archive doesn't split segments into granules */
  granule: string;
  product: string;
  /** e.g. 'rgram'; decides whether the viewer can open it */
  dataFormat: string;
  /** Ordered groundtrack polyline */
  groundtrack: Position[];
  /** Availability recorded in the index (never 'downloading'/'available-local') */
  availability: Availability;
  remote: RemoteResource | null;
}

export type IndexCrs = 'geographic' | 'projected';

/** Read-only query interface over the compiled transect index. */
export interface GeometryIndex {
  readonly crs: IndexCrs;
  get(id: string): SegmentRecord | undefined;
  segmentsWithin(visibleIds: Iterable<string>): Iterable<SegmentRecord>;
  all(): Iterable<SegmentRecord>;
}
