import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import pako from 'pako';
import { FormatError } from '../errors';

/**
 * `.rgram` radargram layout (all little endian):
 *
 *   0   char[4]  magic "RGRM"
 *   4   u16      format version (1)
 *   6   u16      sample type code (see SAMPLE_TYPE_CODES)
 *   8   u32      traceCount
 *   12  u32      sampleCount
 *   16  u32      geolocationCount (must equal traceCount)
 *   20  u32      metadata byte length
 *   24  ...      reserved, zero up to byte 64
 *   64           UTF-8 JSON metadata
 *                f64[sampleCount] fast time, µs
 *                f64[geolocationCount * 3] lat, lon, utc per trace
 *                samples[traceCount * sampleCount], trace-major
 */

export const RADARGRAM_MAGIC = 'RGRM';
export const RADARGRAM_VERSION = 1;
export const HEADER_BYTES = 64;

export type SampleType = 'float32' | 'int16' | 'uint16';

const SAMPLE_TYPE_CODES: Record<SampleType, number> = {
  float32: 1,
  int16: 2,
  uint16: 3,
};

export const BYTES_PER_SAMPLE: Record<SampleType, number> = {
  float32: 4,
  int16: 2,
  uint16: 2,
};

const SAMPLE_TYPES: SampleType[] = ['float32', 'int16', 'uint16'];

const SAMPLE_TYPES_BY_CODE = new Map(
  SAMPLE_TYPES.map((type): [number, SampleType] => [SAMPLE_TYPE_CODES[type], type]),
);

export interface RadargramHeader {
  version: number;
  sampleType: SampleType;
  traceCount: number;
  sampleCount: number;
  geolocationCount: number;
  metadataLength: number;
}

export interface RadargramMetadata {
  institution: string;
  campaign: string;
  segment: string;
  product: string;
}

/** Byte offsets of each section, derived from the header. */
export interface RadargramLayout {
  metadataOffset: number;
  fastTimeOffset: number;
  geolocationOffset: number;
  samplesOffset: number;
  /** Bytes per trace in the sample matrix */
  traceStride: number;
  totalBytes: number;
}

export function parseHeader(bytes: Uint8Array, path: string): RadargramHeader {
  if (bytes.byteLength < HEADER_BYTES) {
    throw new FormatError(`${path} is too short to be a radargram (${bytes.byteLength} bytes)`, path);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, HEADER_BYTES);
  const magic = String.fromCharCode(bytes[0], bytes[1], bytes[2], bytes[3]);
  if (magic !== RADARGRAM_MAGIC) {
    throw new FormatError(`${path} is not a radargram file`, path);
  }
  const version = view.getUint16(4, true);
  if (version !== RADARGRAM_VERSION) {
    throw new FormatError(`${path}: unsupported radargram version ${version}`, path);
  }
  const sampleCode = view.getUint16(6, true);
  const sampleType = SAMPLE_TYPES_BY_CODE.get(sampleCode);
  if (!sampleType) {
    throw new FormatError(`${path}: unknown sample type ${sampleCode}`, path);
  }

  const header: RadargramHeader = {
    version,
    sampleType,
    traceCount: view.getUint32(8, true),
    sampleCount: view.getUint32(12, true),
    geolocationCount: view.getUint32(16, true),
    metadataLength: view.getUint32(20, true),
  };
  if (header.traceCount === 0 || header.sampleCount === 0) {
    throw new FormatError(`${path}: empty radargram (${header.traceCount} × ${header.sampleCount})`, path);
  }
  if (header.geolocationCount !== header.traceCount) {
    throw new FormatError(
      `${path}: ${header.geolocationCount} geolocations for ${header.traceCount} traces`,
      path,
    );
  }
  return header;
}

export function layoutFor(header: RadargramHeader): RadargramLayout {
  const metadataOffset = HEADER_BYTES;
  const fastTimeOffset = metadataOffset + header.metadataLength;
  const geolocationOffset = fastTimeOffset + header.sampleCount * 8;
  const samplesOffset = geolocationOffset + header.geolocationCount * 3 * 8;
  const traceStride = header.sampleCount * BYTES_PER_SAMPLE[header.sampleType];
  return {
    metadataOffset,
    fastTimeOffset,
    geolocationOffset,
    samplesOffset,
    traceStride,
    totalBytes: samplesOffset + header.traceCount * traceStride,
  };
}

export function parseMetadata(bytes: Uint8Array, path: string): RadargramMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(bytes));
  } catch (err) {
    throw new FormatError(`${path}: metadata is not valid JSON`, path, 'corrupt', { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new FormatError(`${path}: metadata must be a JSON object`, path);
  }
  const field = (key: string): string => {
    const value: unknown = Reflect.get(parsed, key);
    return typeof value === 'string' ? value : '';
  };
  return {
    institution: field('institution'),
    campaign: field('campaign'),
    segment: field('segment'),
    product: field('product'),
  };
}

/** Read `count` float64 values starting at `offset` within `bytes`. */
export function readFloat64s(bytes: Uint8Array, offset: number, count: number): Float64Array {
  const view = new DataView(bytes.buffer, bytes.byteOffset + offset, count * 8);
  const out = new Float64Array(count);
  for (let i = 0; i < count; i++) out[i] = view.getFloat64(i * 8, true);
  return out;
}

/** Decode packed samples into float32, whatever the on-disk sample type. */
export function decodeSamples(bytes: Uint8Array, sampleType: SampleType, count: number): Float32Array {
  const view = new DataView(bytes.buffer, bytes.byteOffset, count * BYTES_PER_SAMPLE[sampleType]);
  const out = new Float32Array(count);
  switch (sampleType) {
    case 'float32':
      for (let i = 0; i < count; i++) out[i] = view.getFloat32(i * 4, true);
      break;
    case 'int16':
      for (let i = 0; i < count; i++) out[i] = view.getInt16(i * 2, true);
      break;
    case 'uint16':
      for (let i = 0; i < count; i++) out[i] = view.getUint16(i * 2, true);
      break;
  }
  return out;
}

export function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

// ── Writing ──────────────────────────────────────────────────────────

export interface TraceLocation {
  lat: number;
  lon: number;
  /** Seconds since the epoch; NaN when unknown */
  utc: number;
}

export interface RadargramContent {
  sampleType: SampleType;
  sampleCount: number;
  /** Trace-major, `locations.length * sampleCount` values */
  samples: ArrayLike<number>;
  fastTimeUs: ArrayLike<number>;
  locations: TraceLocation[];
  metadata: RadargramMetadata;
}

export function encodeRadargram(content: RadargramContent): Uint8Array {
  const traceCount = content.locations.length;
  const { sampleCount, sampleType } = content;
  if (content.fastTimeUs.length !== sampleCount) {
    throw new RangeError(`Expected ${sampleCount} fast-time values, got ${content.fastTimeUs.length}`);
  }
  if (content.samples.length !== traceCount * sampleCount) {
    throw new RangeError(`Expected ${traceCount * sampleCount} samples, got ${content.samples.length}`);
  }

  const metadata = new TextEncoder().encode(JSON.stringify(content.metadata));
  const header: RadargramHeader = {
    version: RADARGRAM_VERSION,
    sampleType,
    traceCount,
    sampleCount,
    geolocationCount: traceCount,
    metadataLength: metadata.byteLength,
  };
  const layout = layoutFor(header);
  const out = new Uint8Array(layout.totalBytes);
  const view = new DataView(out.buffer);

  for (let i = 0; i < 4; i++) out[i] = RADARGRAM_MAGIC.charCodeAt(i);
  view.setUint16(4, header.version, true);
  view.setUint16(6, SAMPLE_TYPE_CODES[sampleType], true);
  view.setUint32(8, traceCount, true);
  view.setUint32(12, sampleCount, true);
  view.setUint32(16, traceCount, true);
  view.setUint32(20, metadata.byteLength, true);
  out.set(metadata, layout.metadataOffset);

  for (let i = 0; i < sampleCount; i++) {
    view.setFloat64(layout.fastTimeOffset + i * 8, content.fastTimeUs[i], true);
  }
  content.locations.forEach((loc, i) => {
    const base = layout.geolocationOffset + i * 24;
    view.setFloat64(base, loc.lat, true);
    view.setFloat64(base + 8, loc.lon, true);
    view.setFloat64(base + 16, loc.utc, true);
  });

  const width = BYTES_PER_SAMPLE[sampleType];
  for (let i = 0; i < content.samples.length; i++) {
    const at = layout.samplesOffset + i * width;
    const value = content.samples[i];
    if (sampleType === 'float32') view.setFloat32(at, value, true);
    else if (sampleType === 'int16') view.setInt16(at, value, true);
    else view.setUint16(at, value, true);
  }
  return out;
}

/** Write a radargram to disk, optionally gzip-compressed. Creates parent directories. */
export async function writeRadargramFile(
  path: string,
  content: RadargramContent,
  options: { gzip?: boolean } = {},
): Promise<void> {
  const encoded = encodeRadargram(content);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, options.gzip ? pako.gzip(encoded) : encoded);
}
