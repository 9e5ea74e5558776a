import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RemoteResource } from '../index/types';

/** Suffix of an in-progress or cancelled download. Never opened by the viewer. */
export const PARTIAL_SUFFIX = '.partial';
/** Sidecar recording how far a partial file got and what validator it was fetched under. */
export const PARTIAL_META_SUFFIX = '.partial.json';

export interface TransferPaths {
  /** Complete file; only exists after verification */
  final: string;
  partial: string;
  meta: string;
}

export function transferPaths(rootDir: string, resource: RemoteResource): TransferPaths {
  const final = join(rootDir, resource.relativePath);
  return {
    final,
    partial: final + PARTIAL_SUFFIX,
    meta: final + PARTIAL_META_SUFFIX,
  };
}

export interface PartialMeta {
  url: string;
  validator: string | null;
  bytesReceived: number;
  sizeBytes: number;
}

function isPartialMeta(value: unknown): value is PartialMeta {
  return (
    typeof value === 'object' &&
    value !== null &&
    'url' in value && typeof value.url === 'string' &&
    'validator' in value && (value.validator === null || typeof value.validator === 'string') &&
    'bytesReceived' in value && typeof value.bytesReceived === 'number' &&
    'sizeBytes' in value && typeof value.sizeBytes === 'number'
  );
}

/** Read the partial sidecar; null when absent or unreadable. */
export async function readPartialMeta(path: string): Promise<PartialMeta | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isPartialMeta(parsed) ? parsed : null;
  } catch {
    console.warn(`[Download] Ignoring malformed partial sidecar ${path}`);
    return null;
  }
}

export async function writePartialMeta(path: string, meta: PartialMeta): Promise<void> {
  await writeFile(path, JSON.stringify(meta), 'utf8');
}

export async function removePartial(paths: TransferPaths): Promise<void> {
  await rm(paths.partial, { force: true });
  await rm(paths.meta, { force: true });
}
