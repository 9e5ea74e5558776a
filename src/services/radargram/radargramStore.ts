import { open, type FileHandle } from 'node:fs/promises';
import pako from 'pako';
import { FormatError, describeError } from '../errors';
import {
  HEADER_BYTES,
  decodeSamples,
  isGzip,
  layoutFor,
  parseHeader,
  parseMetadata,
  readFloat64s,
  type RadargramHeader,
  type RadargramLayout,
  type RadargramMetadata,
} from './format';
import { isHdf5, isNetcdfClassic, isNetcdfFormat, openNetcdf, type NetcdfFormat } from './netcdf';
import {
  InMemorySource,
  buildGeolocations,
  checkFastTime,
  checkProduct,
  readExactly,
  type SampleSource,
  type SourceInfo,
  type TraceGeolocation,
} from './source';
import { TileCache } from './tileCache';

export type { TraceGeolocation } from './source';

/** Half-open index range `[start, end)`. */
export type IndexRange = [start: number, end: number];

export type DataFormat = 'rgram' | NetcdfFormat;

export function isDataFormat(value: string): value is DataFormat {
  return value === 'rgram' || isNetcdfFormat(value);
}

export interface RadarWindow {
  traces: IndexRange;
  samples: IndexRange;
  /** Trace-major: value of (t, s) is at `(t - traces[0]) * width + (s - samples[0])` */
  data: Float32Array;
  /** Samples per trace row in `data` */
  width: number;
}

export interface IntensityRange {
  min: number;
  max: number;
}

export interface OpenRadargramOptions {
  /**
   * Files smaller than this are read into memory whole. Also the most a
   * gzip-compressed file may inflate to. Default 8 MiB.
   */
  wholeFileThresholdBytes?: number;
  /** Traces per cached tile. Default 256. */
  tileTraces?: number;
  /** Tiles held in memory at once. Default 8. */
  maxTiles?: number;
  /** Expected data format; NetCDF conventions are detected when absent */
  dataFormat?: string;
  /** Product to display; defaults to the first the file carries */
  product?: string;
}

export interface RadargramStore {
  readonly path: string;
  readonly dataFormat: DataFormat;
  readonly traceCount: number;
  readonly sampleCount: number;
  readonly metadata: RadargramMetadata;
  /** Product whose samples this store reads */
  readonly product: string;
  readonly availableProducts: readonly string[];
  /** Whether samples are read lazily through the tile cache */
  readonly tiled: boolean;

  readWindow(traces: IndexRange, samples: IndexRange): Promise<RadarWindow>;
  traceGeolocation(traceIndex: number): TraceGeolocation;
  geolocations(): readonly TraceGeolocation[];
  fastTime(sampleIndex: number): number;
  /** Quick min/max from a spread of tiles; used as initial display bounds */
  estimateIntensityRange(): Promise<IntensityRange>;
  /** Exact min/max over every sample */
  intensityRange(): Promise<IntensityRange>;
  /** Open the same file again showing another of its products */
  withProduct(product: string): Promise<RadargramStore>;
  close(): Promise<void>;
}

export const DEFAULT_WHOLE_FILE_THRESHOLD = 8 * 1024 * 1024;
export const DEFAULT_TILE_TRACES = 256;
export const DEFAULT_MAX_TILES = 8;

/** Tiles read for the quick intensity estimate, first and last included. */
export const INTENSITY_SAMPLE_TILES = 8;

const INFLATE_CHUNK_BYTES = 64 * 1024;

type ReadOptions = Required<Pick<OpenRadargramOptions, 'wholeFileThresholdBytes' | 'tileTraces' | 'maxTiles'>>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Decode metadata, fast time and geolocation from a buffer that starts at
 * byte 0 of the file and covers at least up to the sample matrix.
 */
function parsePreamble(
  bytes: Uint8Array,
  header: RadargramHeader,
  layout: RadargramLayout,
  requestedProduct: string | undefined,
  path: string,
): SourceInfo {
  const metadata = parseMetadata(
    bytes.subarray(layout.metadataOffset, layout.fastTimeOffset),
    path,
  );

  const fastTime = readFloat64s(bytes, layout.fastTimeOffset, header.sampleCount);
  checkFastTime(fastTime, path);

  const raw = readFloat64s(bytes, layout.geolocationOffset, header.geolocationCount * 3);
  const lats = new Float64Array(header.geolocationCount);
  const lons = new Float64Array(header.geolocationCount);
  for (let i = 0; i < header.geolocationCount; i++) {
    lats[i] = raw[i * 3];
    lons[i] = raw[i * 3 + 1];
  }

  // One product per .rgram file
  const availableProducts = [metadata.product];
  return {
    traceCount: header.traceCount,
    sampleCount: header.sampleCount,
    metadata,
    fastTime,
    geolocations: buildGeolocations(lats, lons, (i) => raw[i * 3 + 2], path),
    product: checkProduct(requestedProduct, availableProducts, path),
    availableProducts,
  };
}

function checkLength(actual: number, layout: RadargramLayout, path: string): void {
  if (actual !== layout.totalBytes) {
    throw new FormatError(
      `${path}: expected ${layout.totalBytes} bytes from the header, found ${actual}`,
      path,
    );
  }
}

/** Samples read from disk on demand, one tile of traces per read. */
class FileTileSource implements SampleSource {
  constructor(
    private handle: FileHandle,
    private header: RadargramHeader,
    private layout: RadargramLayout,
    private tileTraces: number,
    private path: string,
  ) {}

  async loadTile(tileIndex: number): Promise<Float32Array> {
    const firstTrace = tileIndex * this.tileTraces;
    const traces = Math.min(this.tileTraces, this.header.traceCount - firstTrace);
    const buffer = new Uint8Array(traces * this.layout.traceStride);
    const position = this.layout.samplesOffset + firstTrace * this.layout.traceStride;
    await readExactly(this.handle, buffer, position, this.path, `trace tile ${tileIndex}`);
    return decodeSamples(buffer, this.header.sampleType, traces * this.header.sampleCount);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/** `limit` tile indices spread evenly over `count`, or all of them when there are few. */
export function sampledTiles(count: number, limit: number): number[] {
  if (count <= limit) return Array.from({ length: count }, (_, i) => i);
  return Array.from({ length: limit }, (_, i) => Math.round((i * (count - 1)) / (limit - 1)));
}

class Radargram implements RadargramStore {
  readonly traceCount: number;
  readonly sampleCount: number;
  readonly metadata: RadargramMetadata;
  readonly product: string;
  readonly availableProducts: readonly string[];
  private fastTimes: Float64Array;
  private locations: TraceGeolocation[];
  private tiles: TileCache;
  private estimate: Promise<IntensityRange> | null = null;
  private exact: Promise<IntensityRange> | null = null;
  private closed = false;

  constructor(
    readonly path: string,
    readonly dataFormat: DataFormat,
    info: SourceInfo,
    private source: SampleSource,
    private options: ReadOptions,
    readonly tiled: boolean,
  ) {
    this.traceCount = info.traceCount;
    this.sampleCount = info.sampleCount;
    this.metadata = info.metadata;
    this.product = info.product;
    this.availableProducts = info.availableProducts;
    this.fastTimes = info.fastTime;
    this.locations = info.geolocations;
    this.tiles = new TileCache(options.maxTiles);
  }

  private get tileTraces(): number {
    return this.options.tileTraces;
  }

  async readWindow(traces: IndexRange, samples: IndexRange): Promise<RadarWindow> {
    this.assertOpen();
    checkRange('trace', traces, this.traceCount);
    checkRange('sample', samples, this.sampleCount);

    const [t0, t1] = traces;
    const [s0, s1] = samples;
    const width = s1 - s0;
    const data = new Float32Array((t1 - t0) * width);

    const firstTile = Math.floor(t0 / this.tileTraces);
    const lastTile = Math.floor((t1 - 1) / this.tileTraces);
    const tileIndices = Array.from({ length: lastTile - firstTile + 1 }, (_, i) => firstTile + i);
    const tiles = await Promise.all(tileIndices.map((index) => this.tile(index)));

    tiles.forEach((tile, i) => {
      const tileStart = tileIndices[i] * this.tileTraces;
      const from = Math.max(t0, tileStart);
      const to = Math.min(t1, tileStart + this.tileTraces);
      for (let t = from; t < to; t++) {
        const rowStart = (t - tileStart) * this.sampleCount;
        data.set(tile.subarray(rowStart + s0, rowStart + s1), (t - t0) * width);
      }
    });

    return { traces: [t0, t1], samples: [s0, s1], data, width };
  }

  traceGeolocation(traceIndex: number): TraceGeolocation {
    checkIndex('trace', traceIndex, this.traceCount);
    return this.locations[traceIndex];
  }

  geolocations(): readonly TraceGeolocation[] {
    return this.locations;
  }

  fastTime(sampleIndex: number): number {
    checkIndex('sample', sampleIndex, this.sampleCount);
    return this.fastTimes[sampleIndex];
  }

  /**
   * Min/max of the finite samples in up to INTENSITY_SAMPLE_TILES tiles,
   * evenly spread along the file. Exact when the file has no more tiles
   * than that. Cached after the first call.
   */
  estimateIntensityRange(): Promise<IntensityRange> {
    this.assertOpen();
    if (!this.estimate) {
      const scan = this.scanIntensity(sampledTiles(this.tileCount, INTENSITY_SAMPLE_TILES));
      this.estimate = scan;
      scan.catch(() => {
        if (this.estimate === scan) this.estimate = null;
      });
    }
    return this.estimate;
  }

  /** Min/max of every finite sample, one tile at a time. Cached after the first call. */
  intensityRange(): Promise<IntensityRange> {
    this.assertOpen();
    if (!this.exact) {
      const scan = this.scanIntensity(Array.from({ length: this.tileCount }, (_, i) => i));
      this.exact = scan;
      scan.catch(() => {
        if (this.exact === scan) this.exact = null;
      });
    }
    return this.exact;
  }

  withProduct(product: string): Promise<RadargramStore> {
    return openRadargram(this.path, { ...this.options, dataFormat: this.dataFormat, product });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.tiles.clear();
    await this.source.close();
  }

  private get tileCount(): number {
    return Math.ceil(this.traceCount / this.tileTraces);
  }

  private tile(index: number): Promise<Float32Array> {
    return this.tiles.getOrLoad(index, (i) => this.source.loadTile(i));
  }

  private async scanIntensity(tileIndices: number[]): Promise<IntensityRange> {
    let min = Infinity;
    let max = -Infinity;
    for (const index of tileIndices) {
      // Straight from the source so a scan doesn't flush the viewer's tiles
      const tile = this.tiled ? await this.source.loadTile(index) : await this.tile(index);
      for (let i = 0; i < tile.length; i++) {
        const v = tile[i];
        if (!Number.isFinite(v)) continue;
        if (v < min) min = v;
        if (v > max) max = v;
      }
    }
    if (min === Infinity) return { min: 0, max: 1 };
    if (min === max) return { min, max: min + 1 };
    return { min, max };
  }

  private assertOpen(): void {
    if (this.closed) throw new Error(`Radargram ${this.path} is closed`);
  }
}

function checkRange(axis: string, [start, end]: IndexRange, count: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > count || start >= end) {
    throw new RangeError(`Invalid ${axis} window [${start}, ${end}) for ${count} ${axis}s`);
  }
}

function checkIndex(axis: string, index: number, count: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new RangeError(`${axis} index ${index} out of range [0, ${count})`);
  }
}

/**
 * Open a local radargram: an `.rgram` file (optionally gzip-compressed) or
 * an archive NetCDF file.
 *
 * Rejects with FormatError: reason 'missing' when the file doesn't exist,
 * 'corrupt' when it can't be read or fails a structural check. Rejects
 * with RangeError for an unknown data format or product.
 */
export async function openRadargram(path: string, options: OpenRadargramOptions = {}): Promise<RadargramStore> {
  const read: ReadOptions = {
    wholeFileThresholdBytes: options.wholeFileThresholdBytes ?? DEFAULT_WHOLE_FILE_THRESHOLD,
    tileTraces: options.tileTraces ?? DEFAULT_TILE_TRACES,
    maxTiles: options.maxTiles ?? DEFAULT_MAX_TILES,
  };
  if (!Number.isInteger(read.tileTraces) || read.tileTraces < 1) {
    throw new RangeError(`tileTraces must be a positive integer, got ${read.tileTraces}`);
  }
  const dataFormat = options.dataFormat;
  if (dataFormat !== undefined && !isDataFormat(dataFormat)) {
    throw new RangeError(`Unsupported data format ${dataFormat}`);
  }

  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    if (isMissingFile(err)) {
      throw new FormatError(`${path} has not been downloaded`, path, 'missing', { cause: err });
    }
    throw new FormatError(`Could not open ${path}: ${describeError(err)}`, path, 'corrupt', { cause: err });
  }

  let keepHandle = false;
  try {
    const { size } = await handle.stat();
    const leading = new Uint8Array(Math.min(size, HEADER_BYTES));
    await handle.read(leading, 0, leading.length, 0);

    if (isHdf5(leading)) {
      throw new FormatError(`${path}: NetCDF-4/HDF5 radargrams are not supported`, path);
    }
    if (isNetcdfClassic(leading)) {
      if (dataFormat === 'rgram') throw new FormatError(`${path} is a NetCDF file, not an .rgram file`, path);
      const opened = await openNetcdf(handle, size, path, {
        dataFormat,
        product: options.product,
        tileTraces: read.tileTraces,
      });
      keepHandle = true;
      console.info(`[Radargram] Opened ${path} (${opened.info.traceCount} traces, ${opened.dataFormat}, tiled)`);
      return new Radargram(path, opened.dataFormat, opened.info, opened.source, read, true);
    }
    if (dataFormat !== undefined && dataFormat !== 'rgram') {
      throw new FormatError(`${path} is not a NetCDF file`, path);
    }

    if (isGzip(leading)) {
      const bytes = await inflateBounded(handle, size, read.wholeFileThresholdBytes, path);
      return fromBytes(path, bytes, options.product, read);
    }
    if (size < read.wholeFileThresholdBytes) {
      return fromBytes(path, new Uint8Array(await handle.readFile()), options.product, read);
    }

    const header = parseHeader(leading, path);
    const layout = layoutFor(header);
    checkLength(size, layout, path);

    const preambleBytes = new Uint8Array(layout.samplesOffset);
    await readExactly(handle, preambleBytes, 0, path, 'the header');
    const info = parsePreamble(preambleBytes, header, layout, options.product, path);

    const source = new FileTileSource(handle, header, layout, read.tileTraces, path);
    keepHandle = true;
    console.info(`[Radargram] Opened ${path} (${header.traceCount} traces, tiled)`);
    return new Radargram(path, 'rgram', info, source, read, true);
  } catch (err) {
    if (err instanceof FormatError || err instanceof RangeError) throw err;
    throw new FormatError(`Could not read ${path}: ${describeError(err)}`, path, 'corrupt', { cause: err });
  } finally {
    if (!keepHandle) await handle.close();
  }
}

function asBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (chunk instanceof ArrayBuffer) return new Uint8Array(chunk);
  throw new TypeError('Unexpected inflate output');
}

/**
 * Inflate a gzip file chunk by chunk, giving up as soon as the output
 * passes `limit` bytes.
 */
async function inflateBounded(handle: FileHandle, size: number, limit: number, path: string): Promise<Uint8Array> {
  const inflator = new pako.Inflate();
  const chunks: Uint8Array[] = [];
  const progress: { inflated: number; status: number | null } = { inflated: 0, status: null };
  inflator.onData = (chunk) => {
    const bytes = asBytes(chunk);
    chunks.push(bytes);
    progress.inflated += bytes.byteLength;
  };
  inflator.onEnd = (status) => {
    progress.status = status;
  };

  for (let position = 0; position < size; position += INFLATE_CHUNK_BYTES) {
    const chunk = new Uint8Array(Math.min(INFLATE_CHUNK_BYTES, size - position));
    await readExactly(handle, chunk, position, path, 'gzip data');
    inflator.push(chunk, position + chunk.length >= size);
    if (progress.status !== null && progress.status !== 0) break;
    if (progress.inflated > limit) {
      throw new FormatError(
        `${path}: gzip radargram inflates to more than ${limit} bytes; store it uncompressed to read it in tiles`,
        path,
      );
    }
  }
  if (progress.status !== 0) {
    throw new FormatError(`${path}: gzip data is corrupt`, path);
  }

  const bytes = new Uint8Array(progress.inflated);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return bytes;
}

function fromBytes(path: string, bytes: Uint8Array, product: string | undefined, read: ReadOptions): RadargramStore {
  const header = parseHeader(bytes, path);
  const layout = layoutFor(header);
  checkLength(bytes.byteLength, layout, path);
  const info = parsePreamble(bytes, header, layout, product, path);
  const samples = decodeSamples(
    bytes.subarray(layout.samplesOffset),
    header.sampleType,
    header.traceCount * header.sampleCount,
  );
  console.info(`[Radargram] Opened ${path} (${header.traceCount} traces, in memory)`);
  return new Radargram(
    path,
    'rgram',
    info,
    new InMemorySource(samples, read.tileTraces * header.sampleCount),
    read,
    false,
  );
}
