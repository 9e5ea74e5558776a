import type { FileHandle } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { NetCDFReader, type Attribute } from 'netcdfjs';
import { FormatError, describeError } from '../errors';
import {
  buildGeolocations,
  checkFastTime,
  checkProduct,
  readExactly,
  type SampleSource,
  type SourceInfo,
} from './source';

/**
 * Archive NetCDF (classic and 64-bit offset) radargrams.
 *
 * netcdfjs parses the header only; sample and coordinate data are read
 * straight from the file handle, so a file is never loaded whole.
 * NetCDF-4 (HDF5) containers are not readable here.
 */

export type NetcdfFormat = 'awi_netcdf' | 'bas_netcdf' | 'utig_netcdf';

export const NETCDF_FORMATS: readonly NetcdfFormat[] = ['bas_netcdf', 'utig_netcdf', 'awi_netcdf'];

export function isNetcdfFormat(value: string): value is NetcdfFormat {
  return NETCDF_FORMATS.some((format) => format === value);
}

/** "CDF" followed by version 1 (classic) or 2 (64-bit offset). */
export function isNetcdfClassic(bytes: Uint8Array): boolean {
  return bytes.length >= 4 && bytes[0] === 0x43 && bytes[1] === 0x44 && bytes[2] === 0x46 && (bytes[3] === 1 || bytes[3] === 2);
}

export function isHdf5(bytes: Uint8Array): boolean {
  return bytes.length >= 4 && bytes[0] === 0x89 && bytes[1] === 0x48 && bytes[2] === 0x44 && bytes[3] === 0x46;
}

interface Convention {
  institution: string;
  /** Whether rows of the data variable are traces or samples */
  orientation: 'trace-major' | 'sample-major';
  /** Sample rows stored deepest first */
  flipSamples: boolean;
  /** Applied to every sample after fill values are masked */
  transform: (value: number) => number;
  latitude: string[];
  longitude: string[];
  /** Optional; traces get NaN when absent */
  utc: string[];
  /** Two-way travel time, µs */
  fastTime: string[];
  /** Product name and its candidate data variables; the first one present wins */
  products(campaign: string): Array<[product: string, variables: string[]]>;
}

const CONVENTIONS: Record<NetcdfFormat, Convention> = {
  bas_netcdf: {
    institution: 'BAS',
    orientation: 'sample-major',
    flipSamples: false,
    transform: Math.log10,
    latitude: ['latitude_layerData'],
    longitude: ['longitude_layerData'],
    utc: ['UTC_time_layerData'],
    fastTime: ['fast_time'],
    products: (campaign) => {
      let chirp = ['chirp_data'];
      if (campaign === 'IMAFI') chirp = ['chirp_cHG_data'];
      else if (campaign === 'POLARGAP') chirp = ['polarised_chirp_PPVV_data', 'chirp_data'];
      return [['chirp', chirp], ['pulse', ['pulse_data']]];
    },
  },
  utig_netcdf: {
    institution: 'UTIG',
    orientation: 'trace-major',
    flipSamples: false,
    transform: Math.log,
    latitude: ['latitude', 'lat'],
    longitude: ['longitude', 'lon'],
    utc: [],
    fastTime: ['fasttime', 'fast-time'],
    products: () => [
      ['pik1', ['data_hi_gain', 'amplitude_hi_gain', 'amplitude_high_gain']],
      ['pik1_low_gain', ['data_lo_gain', 'amplitude_lo_gain', 'amplitude_low_gain']],
    ],
  },
  awi_netcdf: {
    institution: 'AWI',
    orientation: 'sample-major',
    flipSamples: true,
    transform: (value) => value,
    latitude: ['LATITUDE'],
    longitude: ['LONGITUDE'],
    utc: ['TIME'],
    fastTime: ['TWT'],
    products: () => [['csarp', ['WAVEFORM']]],
  },
};

const TYPE_BYTES = { byte: 1, short: 2, int: 4, float: 4, double: 8 } as const;

type NumericType = keyof typeof TYPE_BYTES;

function isNumericType(type: string): type is NumericType {
  return Object.hasOwn(TYPE_BYTES, type);
}

/** Where a variable's values sit in the file, and how to unpack them. */
interface NcArray {
  name: string;
  type: NumericType;
  shape: number[];
  offset: number;
  /** Bytes between consecutive entries along the first dimension */
  rowStride: number;
  fill: number | null;
  scale: number;
  addOffset: number;
}

/** Header reads start here and double until the header parses. */
const HEADER_READ_BYTES = 64 * 1024;

/** Blocks up to this size are read in one call; larger ones row by row. */
const MAX_SPAN_BYTES = 4 * 1024 * 1024;

function numericAttribute(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (Array.isArray(value) && typeof value[0] === 'number') return value[0];
  return null;
}

async function readHeader(handle: FileHandle, size: number, path: string): Promise<NetCDFReader> {
  let length = Math.min(size, HEADER_READ_BYTES);
  for (;;) {
    const prefix = new Uint8Array(length);
    await readExactly(handle, prefix, 0, path, 'the NetCDF header');
    try {
      return new NetCDFReader(prefix);
    } catch (err) {
      if (length >= size) {
        throw new FormatError(`${path}: unreadable NetCDF header (${describeError(err)})`, path, 'corrupt', { cause: err });
      }
      length = Math.min(size, length * 2);
    }
  }
}

function findArray(reader: NetCDFReader, names: readonly string[], path: string): NcArray | null {
  for (const name of names) {
    const variable = reader.variables.find((v) => v.name === name);
    if (!variable) continue;
    const type = variable.type;
    if (!isNumericType(type)) {
      throw new FormatError(`${path}: variable ${name} has non-numeric type ${type}`, path);
    }
    const shape = variable.dimensions.map((id, axis) =>
      variable.record && axis === 0 ? reader.recordDimension.length : reader.dimensions[id].size,
    );
    const rowLength = shape.slice(1).reduce((a, b) => a * b, 1);
    const attributes: readonly Attribute[] = variable.attributes;
    const attribute = (key: string) => numericAttribute(attributes.find((a) => a.name === key)?.value);
    return {
      name,
      type,
      shape,
      offset: variable.offset,
      rowStride: variable.record ? reader.recordDimension.recordStep ?? 0 : rowLength * TYPE_BYTES[type],
      fill: attribute('_FillValue') ?? attribute('missing_value'),
      scale: attribute('scale_factor') ?? 1,
      addOffset: attribute('add_offset') ?? 0,
    };
  }
  return null;
}

function requireArray(reader: NetCDFReader, names: readonly string[], what: string, path: string): NcArray {
  const array = findArray(reader, names, path);
  if (!array) throw new FormatError(`${path}: no ${what} variable (${names.join(' or ')})`, path);
  return array;
}

function decode(view: DataView, at: number, type: NumericType): number {
  switch (type) {
    case 'byte':
      return view.getInt8(at);
    case 'short':
      return view.getInt16(at, false);
    case 'int':
      return view.getInt32(at, false);
    case 'float':
      return view.getFloat32(at, false);
    case 'double':
      return view.getFloat64(at, false);
  }
}

/**
 * Read `rowCount` × `colCount` values, starting at (`rowStart`, `colStart`),
 * into a row-major array. Fill values become NaN; packed values are scaled.
 */
async function readBlock(
  handle: FileHandle,
  array: NcArray,
  [rowStart, rowCount]: [number, number],
  [colStart, colCount]: [number, number],
  path: string,
): Promise<Float64Array> {
  const bytes = TYPE_BYTES[array.type];
  const out = new Float64Array(rowCount * colCount);
  if (out.length === 0) return out;
  const first = array.offset + rowStart * array.rowStride + colStart * bytes;
  const span = (rowCount - 1) * array.rowStride + colCount * bytes;
  const what = `variable ${array.name}`;

  if (span <= MAX_SPAN_BYTES) {
    const buffer = new Uint8Array(span);
    await readExactly(handle, buffer, first, path, what);
    const view = new DataView(buffer.buffer);
    for (let r = 0; r < rowCount; r++) {
      for (let c = 0; c < colCount; c++) out[r * colCount + c] = decode(view, r * array.rowStride + c * bytes, array.type);
    }
  } else {
    const buffer = new Uint8Array(colCount * bytes);
    const view = new DataView(buffer.buffer);
    for (let r = 0; r < rowCount; r++) {
      await readExactly(handle, buffer, first + r * array.rowStride, path, what);
      for (let c = 0; c < colCount; c++) out[r * colCount + c] = decode(view, c * bytes, array.type);
    }
  }

  for (let i = 0; i < out.length; i++) {
    const raw = out[i];
    out[i] = array.fill !== null && raw === array.fill ? Number.NaN : raw * array.scale + array.addOffset;
  }
  return out;
}

async function readVector(handle: FileHandle, array: NcArray, path: string): Promise<Float64Array> {
  if (array.shape.length !== 1) {
    throw new FormatError(`${path}: variable ${array.name} should be one-dimensional`, path);
  }
  return readBlock(handle, array, [0, array.shape[0]], [0, 1], path);
}

class NetcdfTileSource implements SampleSource {
  constructor(
    private handle: FileHandle,
    private data: NcArray,
    private convention: Convention,
    private traceCount: number,
    private sampleCount: number,
    private tileTraces: number,
    private path: string,
  ) {}

  async loadTile(tileIndex: number): Promise<Float32Array> {
    const first = tileIndex * this.tileTraces;
    const traces = Math.min(this.tileTraces, this.traceCount - first);
    const samples = this.sampleCount;
    const { transform, flipSamples } = this.convention;
    const out = new Float32Array(traces * samples);

    if (this.convention.orientation === 'trace-major') {
      const block = await readBlock(this.handle, this.data, [first, traces], [0, samples], this.path);
      for (let i = 0; i < block.length; i++) out[i] = transform(block[i]);
      return out;
    }

    const block = await readBlock(this.handle, this.data, [0, samples], [first, traces], this.path);
    for (let s = 0; s < samples; s++) {
      const target = flipSamples ? samples - 1 - s : s;
      for (let t = 0; t < traces; t++) out[t * samples + target] = transform(block[s * traces + t]);
    }
    return out;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

function campaignOf(reader: NetCDFReader): string {
  const value: unknown = reader.globalAttributes.find((a) => a.name === 'campaign')?.value;
  return typeof value === 'string' ? value.trim() : '';
}

function productsIn(reader: NetCDFReader, convention: Convention, campaign: string, path: string) {
  const found: Array<{ product: string; data: NcArray }> = [];
  for (const [product, variables] of convention.products(campaign)) {
    const data = findArray(reader, variables, path);
    if (data) found.push({ product, data });
  }
  return found;
}

function detectFormat(reader: NetCDFReader, campaign: string, path: string): NetcdfFormat {
  const format = NETCDF_FORMATS.find((f) => productsIn(reader, CONVENTIONS[f], campaign, path).length > 0);
  if (!format) throw new FormatError(`${path}: no known radargram variables in NetCDF file`, path);
  return format;
}

export interface NetcdfRequest {
  /** Which archive convention to read; detected from the variable names when absent */
  dataFormat?: NetcdfFormat;
  product?: string;
  tileTraces: number;
}

export interface OpenedNetcdf {
  dataFormat: NetcdfFormat;
  info: SourceInfo;
  source: SampleSource;
}

/**
 * Read the header, coordinates and fast time of a NetCDF radargram and
 * return a tile source over its data variable. The caller owns `handle`
 * until this resolves; afterwards the source closes it.
 */
export async function openNetcdf(
  handle: FileHandle,
  size: number,
  path: string,
  request: NetcdfRequest,
): Promise<OpenedNetcdf> {
  const reader = await readHeader(handle, size, path);
  const campaign = campaignOf(reader);
  const dataFormat = request.dataFormat ?? detectFormat(reader, campaign, path);
  const convention = CONVENTIONS[dataFormat];

  const products = productsIn(reader, convention, campaign, path);
  if (products.length === 0) {
    throw new FormatError(`${path}: no ${dataFormat} radargram variables`, path);
  }
  const availableProducts = products.map((p) => p.product);
  const product = checkProduct(request.product, availableProducts, path);
  const data = products[availableProducts.indexOf(product)].data;
  if (data.shape.length !== 2) {
    throw new FormatError(`${path}: variable ${data.name} should be two-dimensional`, path);
  }
  const [rows, columns] = data.shape;
  const traceCount = convention.orientation === 'trace-major' ? rows : columns;
  const sampleCount = convention.orientation === 'trace-major' ? columns : rows;
  if (traceCount === 0 || sampleCount === 0) {
    throw new FormatError(`${path}: empty radargram (${traceCount} × ${sampleCount})`, path);
  }

  const lats = await readVector(handle, requireArray(reader, convention.latitude, 'latitude', path), path);
  const lons = await readVector(handle, requireArray(reader, convention.longitude, 'longitude', path), path);
  if (lats.length !== traceCount || lons.length !== traceCount) {
    throw new FormatError(`${path}: ${lats.length} geolocations for ${traceCount} traces`, path);
  }
  const utcArray = findArray(reader, convention.utc, path);
  const utc = utcArray ? await readVector(handle, utcArray, path) : null;
  if (utc && utc.length !== traceCount) {
    throw new FormatError(`${path}: ${utc.length} timestamps for ${traceCount} traces`, path);
  }

  const fastTime = await readVector(handle, requireArray(reader, convention.fastTime, 'fast time', path), path);
  if (fastTime.length !== sampleCount) {
    throw new FormatError(`${path}: ${fastTime.length} fast-time values for ${sampleCount} samples`, path);
  }
  checkFastTime(fastTime, path);

  return {
    dataFormat,
    info: {
      traceCount,
      sampleCount,
      metadata: {
        institution: convention.institution,
        campaign,
        segment: basename(path, extname(path)),
        product,
      },
      fastTime,
      geolocations: buildGeolocations(lats, lons, (i) => (utc ? utc[i] : Number.NaN), path),
      product,
      availableProducts,
    },
    source: new NetcdfTileSource(handle, data, convention, traceCount, sampleCount, request.tileTraces, path),
  };
}
