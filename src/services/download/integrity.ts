import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { IntegrityError } from '../errors';
import type { RemoteResource } from '../index/types';

async function digestFile(path: string, algorithm: 'sha256' | 'md5'): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Check a finished download against the descriptor: byte size always,
 * checksum when the index provides one. Throws IntegrityError on mismatch.
 */
export async function verifyDownload(path: string, resource: RemoteResource): Promise<void> {
  const { size } = await stat(path);
  if (size !== resource.sizeBytes) {
    throw new IntegrityError(
      `Expected ${resource.sizeBytes} bytes but received ${size}`,
      String(resource.sizeBytes),
      String(size),
    );
  }

  const checksum = resource.checksum;
  if (!checksum) return;

  const actual = await digestFile(path, checksum.algorithm);
  if (actual !== checksum.value) {
    throw new IntegrityError(
      `${checksum.algorithm} mismatch: expected ${checksum.value}, got ${actual}`,
      checksum.value,
      actual,
    );
  }
}
