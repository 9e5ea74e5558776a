import type { FetchLike } from '../services/download/types';

export interface RecordedRequest {
  url: string;
  headers: Headers;
}

export interface FakeArchiveOptions {
  /** Bytes per enqueued chunk */
  chunkSize?: number;
  etag?: string;
  /** Stop sending once this many bytes have been enqueued; only an abort ends the stream */
  stallAt?: number;
  /** Answer every request with this status and an empty body */
  status?: number;
  /** Ignore Range requests and always send the whole file */
  ignoreRange?: boolean;
}

export interface FakeArchive {
  fetch: FetchLike;
  requests: RecordedRequest[];
}

/** Deterministic test payload of `length` bytes. */
export function testBytes(length: number): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i++) out[i] = i % 251;
  return out;
}

/**
 * In-process stand-in for an archive server. Serves `content` for every URL,
 * honours `Range` + `If-Range` against its ETag, and errors the body stream
 * when the request's signal aborts.
 */
export function fakeArchive(content: Uint8Array, options: FakeArchiveOptions = {}): FakeArchive {
  const chunkSize = options.chunkSize ?? 65536;
  const etag = options.etag ?? '"v1"';
  const requests: RecordedRequest[] = [];

  const fetchImpl: FetchLike = async (url, init) => {
    const headers = new Headers(init?.headers);
    requests.push({ url, headers });
    const signal = init?.signal ?? null;
    if (signal?.aborted) throw signal.reason;

    if (options.status !== undefined) {
      return new Response(null, { status: options.status, statusText: 'Test Status' });
    }

    let start = 0;
    const range = headers.get('Range')?.match(/^bytes=(\d+)-$/);
    if (range && !options.ignoreRange && headers.get('If-Range') === etag) {
      start = Number(range[1]);
    }

    let offset = start;
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        if (options.stallAt !== undefined && offset >= options.stallAt) {
          return new Promise<void>((resolve) => {
            if (!signal) return;
            const onAbort = () => {
              controller.error(signal.reason);
              resolve();
            };
            if (signal.aborted) onAbort();
            else signal.addEventListener('abort', onAbort, { once: true });
          });
        }
        if (offset >= content.length) {
          controller.close();
          return;
        }
        const end = Math.min(offset + chunkSize, content.length);
        controller.enqueue(content.slice(offset, end));
        offset = end;
      },
    });

    const responseHeaders = new Headers({ ETag: etag });
    if (start > 0) {
      responseHeaders.set('Content-Range', `bytes ${start}-${content.length - 1}/${content.length}`);
      return new Response(body, { status: 206, headers: responseHeaders });
    }
    return new Response(body, { status: 200, headers: responseHeaders });
  };

  return { fetch: fetchImpl, requests };
}
