import { ConfigError, NetworkError, isAbortError } from '../errors';
import type { RemoteResource } from '../index/types';
import type { ArchiveCredentials, FetchLike } from './types';

/**
 * Request headers for an archive's credential class.
 * Throws ConfigError when the class needs credentials that aren't configured.
 */
export function authHeaders(resource: RemoteResource, credentials: ArchiveCredentials): Record<string, string> {
  switch (resource.authClass) {
    case 'none':
      return {};
    case 'bearer':
      if (!credentials.bearerToken) {
        throw new ConfigError(`A bearer token is required to download ${resource.url}`);
      }
      return { Authorization: `Bearer ${credentials.bearerToken}` };
    case 'aad': {
      if (!credentials.aadAccessKey || !credentials.aadSecretKey) {
        throw new ConfigError(`AAD access and secret keys are required to download ${resource.url}`);
      }
      const basic = Buffer.from(`${credentials.aadAccessKey}:${credentials.aadSecretKey}`).toString('base64');
      return { Authorization: `Basic ${basic}` };
    }
  }
}

export interface OpenTransferOptions {
  headers: Record<string, string>;
  /** Bytes already on disk; > 0 asks the archive to resume */
  offset: number;
  /** Validator from the earlier response (Last-Modified or ETag) */
  validator: string | null;
  signal: AbortSignal;
  fetch: FetchLike;
}

export interface OpenedTransfer {
  body: ReadableStream<Uint8Array>;
  /** True when the archive honoured the Range request (206) */
  resuming: boolean;
  /** Validator to store for a later resume */
  validator: string | null;
}

/**
 * Issue the GET for a remote resource. Resumes with `Range` + `If-Range` when
 * there's a partial file and a validator; the archive may still answer 200,
 * in which case the caller must start over.
 */
export async function openTransfer(resource: RemoteResource, options: OpenTransferOptions): Promise<OpenedTransfer> {
  const headers: Record<string, string> = { ...options.headers };
  if (options.offset > 0 && options.validator) {
    headers['Range'] = `bytes=${options.offset}-`;
    headers['If-Range'] = options.validator;
  }

  let response: Response;
  try {
    response = await options.fetch(resource.url, { headers, signal: options.signal });
  } catch (err) {
    if (isAbortError(err)) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new NetworkError(`Request to ${resource.url} failed: ${message}`, null, { cause: err });
  }

  if (response.status !== 200 && response.status !== 206) {
    throw new NetworkError(
      `Download failed: ${response.status} ${response.statusText} (${resource.url})`,
      response.status,
    );
  }
  if (!response.body) {
    throw new NetworkError(`Empty response body from ${resource.url}`, response.status);
  }

  const resuming = response.status === 206 && options.offset > 0;
  if (resuming) {
    const range = response.headers.get('Content-Range')?.match(/^bytes (\d+)-/);
    if (range && Number(range[1]) !== options.offset) {
      throw new NetworkError(
        `Archive resumed at byte ${range[1]} but ${options.offset} bytes are on disk (${resource.url})`,
        response.status,
      );
    }
  }

  return {
    body: response.body,
    resuming,
    validator: response.headers.get('ETag') ?? response.headers.get('Last-Modified'),
  };
}
