/**
 * Download manager for radargram files.
 *
 * - Runs up to `maxConcurrent` transfers; the rest queue as 'pending'
 * - One active transfer per segment: a second start() attaches to it
 * - Streams into `<final>.partial`, resumable through Range/If-Range
 * - Cancellation aborts the fetch; the partial stays marked incomplete
 * - Verifies size (and checksum) and renames into place before the segment
 *   becomes available-local
 *
 * Every state change of a transfer goes through transition(), which is the
 * only place that touches the segment's availability or the active slot.
 */

import { mkdir, open, rename, rm, stat, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  ConfigError,
  IntegrityError,
  NetworkError,
  StorageError,
  UnsupportedDownloadError,
  describeError,
} from '../errors';
import type { RemoteResource, SegmentRecord } from '../index/types';
import { getAvailability, type SegmentStore } from '../../stores/segmentStore';
import { createTransferStore, type TransferStore } from '../../stores/transferStore';
import { authHeaders, openTransfer } from './archiveClient';
import { readPartialMeta, removePartial, transferPaths, writePartialMeta, type TransferPaths } from './fileLayout';
import { verifyDownload } from './integrity';
import { availabilityFor, isActive, isTerminal, nextTransferState, type TransferAction } from './transferMachine';
import type {
  DownloadConfig,
  FetchLike,
  Transfer,
  TransferEvent,
  TransferListener,
  TransferProgress,
} from './types';

export interface TransferHandle {
  readonly id: string;
  readonly segmentId: string;
  /** Resolves with the final snapshot once the transfer reaches a terminal state */
  readonly settled: Promise<Transfer>;
}

export interface CancelOptions {
  /** Delete the partial file instead of keeping it for a later resume */
  discardPartial?: boolean;
}

interface TransferJob {
  handle: TransferHandle;
  transfer: Transfer;
  resource: RemoteResource;
  paths: TransferPaths;
  headers: Record<string, string>;
  abortController: AbortController;
  /** Set once every byte is on disk; from here on cancel() is a no-op */
  committing: boolean;
  discardOnCancel: boolean;
  resolveSettled: (transfer: Transfer) => void;
}

const SUPPORTED_METHODS = new Set(['http', 'nsidc']);

export class DownloadManager {
  readonly store: TransferStore;
  private config: DownloadConfig;
  private segments: SegmentStore;
  private fetchImpl: FetchLike;
  private jobs = new Map<string, TransferJob>();
  private activeBySegment = new Map<string, TransferJob>();
  private jobQueue: TransferJob[] = [];
  private running = new Set<string>();
  private listeners = new Set<TransferListener>();
  private nextSeq = 1;

  constructor(config: DownloadConfig, segments: SegmentStore, store: TransferStore = createTransferStore()) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${config.maxConcurrent}`);
    }
    this.config = config;
    this.segments = segments;
    this.store = store;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Start (or attach to) the transfer for a segment. Returns immediately.
   *
   * Throws synchronously when the segment can't be downloaded at all:
   * UnsupportedDownloadError (not public / manual-only), ConfigError
   * (no root dir or missing credentials).
   */
  start(segment: SegmentRecord): TransferHandle {
    const existing = this.activeBySegment.get(segment.id);
    if (existing) return existing.handle;

    const resource = segment.remote;
    const availability = getAvailability(this.segments, segment);
    if (availability === 'unavailable' || !resource) {
      throw new UnsupportedDownloadError(`${segment.id} is not available for download`, segment.id);
    }
    if (!SUPPORTED_METHODS.has(resource.downloadMethod)) {
      throw new UnsupportedDownloadError(
        `${segment.id} must be downloaded manually from ${resource.url}`,
        segment.id,
      );
    }
    const rootDir = this.config.rootDir;
    if (!rootDir) {
      throw new ConfigError('A root data directory must be configured before downloading');
    }
    const headers = authHeaders(resource, this.config.credentials);
    const paths = transferPaths(rootDir, resource);

    const id = `${segment.id}#${this.nextSeq++}`;
    let resolveSettled: (transfer: Transfer) => void = () => {};
    const settled = new Promise<Transfer>((resolve) => { resolveSettled = resolve; });

    const job: TransferJob = {
      handle: { id, segmentId: segment.id, settled },
      transfer: {
        id,
        segmentId: segment.id,
        bytesReceived: 0,
        bytesTotal: resource.sizeBytes,
        state: 'pending',
        reason: null,
        errorName: null,
        localPath: paths.final,
        resumed: false,
      },
      resource,
      paths,
      headers,
      abortController: new AbortController(),
      committing: false,
      discardOnCancel: false,
      resolveSettled,
    };
    this.jobs.set(id, job);

    if (availability === 'available-local') {
      // Already on disk: nothing to fetch
      job.transfer = { ...job.transfer, state: 'completed', bytesReceived: resource.sizeBytes };
      this.store.getState().upsert(job.transfer);
      resolveSettled(job.transfer);
      return job.handle;
    }

    this.activeBySegment.set(segment.id, job);
    this.segments.getState().setAvailability(segment.id, availabilityFor('pending'));
    this.store.getState().upsert(job.transfer);
    this.jobQueue.push(job);
    this.drainQueue();
    return job.handle;
  }

  /**
   * Request cancellation. Returns false when there is nothing to cancel
   * (unknown id, already terminal, or already committing: completion wins).
   * A running transfer settles once the in-flight read observes the abort.
   */
  cancel(transferId: string, options: CancelOptions = {}): boolean {
    const job = this.jobs.get(transferId);
    if (!job || !isActive(job.transfer.state) || job.committing) return false;

    job.discardOnCancel = options.discardPartial ?? false;

    if (job.transfer.state === 'pending') {
      this.jobQueue = this.jobQueue.filter((queued) => queued !== job);
      this.transition(job, 'cancel');
      if (job.discardOnCancel) {
        removePartial(job.paths).catch((err: unknown) => {
          console.warn(`[Download] Could not remove partial for ${job.transfer.segmentId}:`, describeError(err));
        });
      }
      return true;
    }

    console.info(`[Download] Cancelling ${job.transfer.segmentId}`);
    job.abortController.abort();
    return true;
  }

  /** Cancel every pending and running transfer. */
  cancelAll(options: CancelOptions = {}): void {
    for (const job of [...this.activeBySegment.values()]) {
      this.cancel(job.transfer.id, options);
    }
  }

  progress(transferId: string): TransferProgress | null {
    const job = this.jobs.get(transferId);
    if (!job) return null;
    return { bytesReceived: job.transfer.bytesReceived, bytesTotal: job.transfer.bytesTotal };
  }

  get(transferId: string): Transfer | undefined {
    return this.jobs.get(transferId)?.transfer;
  }

  /** Active transfer for a segment, if any. */
  activeFor(segmentId: string): Transfer | undefined {
    return this.activeBySegment.get(segmentId)?.transfer;
  }

  list(): Transfer[] {
    return [...this.jobs.values()].map((job) => job.transfer);
  }

  /**
   * Drop a finished transfer from the manager and the store. Returns false for
   * unknown ids and for transfers that are still pending or running.
   */
  forget(transferId: string): boolean {
    const job = this.jobs.get(transferId);
    if (!job || !isTerminal(job.transfer.state)) return false;
    this.jobs.delete(transferId);
    this.store.getState().remove(transferId);
    return true;
  }

  /** Forget every terminal transfer. */
  clearFinished(): void {
    for (const job of [...this.jobs.values()]) {
      if (isTerminal(job.transfer.state)) this.jobs.delete(job.transfer.id);
    }
    this.store.getState().clearFinished();
  }

  whenSettled(transferId: string): Promise<Transfer> {
    const job = this.jobs.get(transferId);
    if (!job) return Promise.reject(new Error(`Unknown transfer ${transferId}`));
    return job.handle.settled;
  }

  /** Listen for progress and state events. Returns an unsubscribe function. */
  subscribe(listener: TransferListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get queueSize(): number {
    return this.jobQueue.length;
  }

  get runningCount(): number {
    return this.running.size;
  }

  // ── Private ────────────────────────────────────────────────────────

  private emit(event: TransferEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error('[Download] Transfer listener threw:', err);
      }
    }
  }

  /**
   * Apply a state-machine action. Keeps the active-slot map, the segment's
   * availability and the snapshot store consistent with the transfer state.
   */
  private transition(job: TransferJob, action: TransferAction, error?: unknown): boolean {
    const previous = job.transfer.state;
    const next = nextTransferState(previous, action);
    if (!next) return false;

    job.transfer = {
      ...job.transfer,
      state: next,
      reason: action === 'fail' ? describeError(error) : job.transfer.reason,
      errorName: action === 'fail' && error instanceof Error ? error.name : job.transfer.errorName,
    };

    const segmentId = job.transfer.segmentId;
    this.segments.getState().setAvailability(segmentId, availabilityFor(next));
    this.store.getState().upsert(job.transfer);

    if (!isActive(next)) {
      if (this.activeBySegment.get(segmentId) === job) this.activeBySegment.delete(segmentId);
      job.resolveSettled(job.transfer);
    }

    this.emit({ type: 'state', transfer: job.transfer, previous });
    return true;
  }

  private setProgress(job: TransferJob, bytesReceived: number): void {
    // Progress never goes backwards within one transfer
    if (bytesReceived <= job.transfer.bytesReceived) return;
    job.transfer = { ...job.transfer, bytesReceived };
    this.store.getState().upsert(job.transfer);
    this.emit({ type: 'progress', transfer: job.transfer });
  }

  /**
   * Start queued transfers up to the concurrency limit. Called after queue
   * changes and after each transfer finishes.
   */
  private drainQueue(): void {
    while (this.running.size < this.config.maxConcurrent && this.jobQueue.length > 0) {
      const job = this.jobQueue.shift();
      if (!job || job.transfer.state !== 'pending') continue;

      this.running.add(job.transfer.id);
      this.run(job)
        .catch((err: unknown) => {
          // run() settles the transfer itself; this only catches bugs in that path
          console.error(`[Download] Unexpected error in ${job.transfer.segmentId}:`, err);
          this.transition(job, 'fail', err);
        })
        .finally(() => {
          this.running.delete(job.transfer.id);
          this.drainQueue();
        });
    }
  }

  private async run(job: TransferJob): Promise<void> {
    if (!this.transition(job, 'run')) return;
    const { resource, paths } = job;
    const signal = job.abortController.signal;
    let received = 0;

    try {
      await storage(`create ${dirname(paths.final)}`, () => mkdir(dirname(paths.final), { recursive: true }));

      const resumeFrom = await this.resumableOffset(job);
      const opened = await openTransfer(resource, {
        headers: job.headers,
        offset: resumeFrom.offset,
        validator: resumeFrom.validator,
        signal,
        fetch: this.fetchImpl,
      });

      received = opened.resuming ? resumeFrom.offset : 0;
      job.transfer = { ...job.transfer, resumed: opened.resuming };
      console.info(
        opened.resuming
          ? `[Download] Resuming ${job.transfer.segmentId} at ${received} / ${resource.sizeBytes} bytes`
          : `[Download] Starting ${job.transfer.segmentId} (${resource.sizeBytes} bytes)`,
      );
      this.setProgress(job, received);

      const file = await storage(`open ${paths.partial}`, () => open(paths.partial, opened.resuming ? 'a' : 'w'));
      try {
        await storage(`write ${paths.meta}`, () => writePartialMeta(paths.meta, {
          url: resource.url,
          validator: opened.validator,
          bytesReceived: received,
          sizeBytes: resource.sizeBytes,
        }));

        received = await this.pump(job, opened.body, file, received, opened.validator);

        // Stream finished: from here completion wins over cancel
        job.committing = true;
        await storage(`flush ${paths.partial}`, () => file.sync());
      } finally {
        await file.close();
      }

      await verifyDownload(paths.partial, resource);
      await storage(`move into ${paths.final}`, () => rename(paths.partial, paths.final));
      await rm(paths.meta, { force: true });

      this.transition(job, 'commit');
      console.info(`[Download] Finished ${job.transfer.segmentId} → ${paths.final}`);
    } catch (err) {
      if (signal.aborted && !job.committing) {
        await this.settleCancelled(job);
        return;
      }
      await this.settleFailed(job, err);
    }
  }

  /**
   * Copy the response body into the partial file, reporting progress per chunk.
   * Returns the total bytes now on disk.
   */
  private async pump(
    job: TransferJob,
    body: ReadableStream<Uint8Array>,
    file: FileHandle,
    startAt: number,
    validator: string | null,
  ): Promise<number> {
    const signal = job.abortController.signal;
    const reader = body.getReader();
    let received = startAt;

    try {
      for (;;) {
        signal.throwIfAborted();
        let chunk: ReadableStreamReadResult<Uint8Array>;
        try {
          chunk = await reader.read();
        } catch (err) {
          signal.throwIfAborted();
          throw new NetworkError(`Connection lost after ${received} bytes: ${describeError(err)}`, null, { cause: err });
        }
        if (chunk.done) break;
        signal.throwIfAborted();

        await storage(`write ${job.paths.partial}`, () => file.write(chunk.value));
        received += chunk.value.byteLength;
        if (received > job.resource.sizeBytes) {
          throw new IntegrityError(
            `Archive sent more than the expected ${job.resource.sizeBytes} bytes`,
            String(job.resource.sizeBytes),
            String(received),
          );
        }
        // Every expected byte is on disk: completion wins over cancel from here on
        if (received === job.resource.sizeBytes) job.committing = true;
        this.setProgress(job, received);
        if (job.committing) break;
      }
      if (job.committing) await reader.cancel();
    } catch (err) {
      await reader.cancel().catch(() => undefined);
      // Record how far we got so a retry can resume
      await writePartialMeta(job.paths.meta, {
        url: job.resource.url,
        validator,
        bytesReceived: received,
        sizeBytes: job.resource.sizeBytes,
      }).catch((metaErr: unknown) => {
        console.warn(`[Download] Could not update ${job.paths.meta}:`, describeError(metaErr));
      });
      throw err;
    }
    return received;
  }

  /** Offset and validator to resume from, if a matching partial exists. */
  private async resumableOffset(job: TransferJob): Promise<{ offset: number; validator: string | null }> {
    const meta = await readPartialMeta(job.paths.meta);
    if (!meta || meta.url !== job.resource.url || meta.sizeBytes !== job.resource.sizeBytes || !meta.validator) {
      return { offset: 0, validator: null };
    }
    try {
      const { size } = await stat(job.paths.partial);
      if (size === 0 || size >= job.resource.sizeBytes) return { offset: 0, validator: null };
      return { offset: size, validator: meta.validator };
    } catch {
      return { offset: 0, validator: null };
    }
  }

  private async settleCancelled(job: TransferJob): Promise<void> {
    if (job.discardOnCancel) {
      await removePartial(job.paths).catch((err: unknown) => {
        console.warn(`[Download] Could not remove partial for ${job.transfer.segmentId}:`, describeError(err));
      });
    }
    console.info(`[Download] Cancelled ${job.transfer.segmentId} at ${job.transfer.bytesReceived} bytes`);
    this.transition(job, 'cancel');
  }

  private async settleFailed(job: TransferJob, err: unknown): Promise<void> {
    if (err instanceof IntegrityError) {
      // A partial with the wrong content is useless for resuming
      await removePartial(job.paths).catch((rmErr: unknown) => {
        console.warn(`[Download] Could not remove partial for ${job.transfer.segmentId}:`, describeError(rmErr));
      });
    }
    console.warn(`[Download] Failed ${job.transfer.segmentId} after ${job.transfer.bytesReceived} bytes:`, describeError(err));
    this.transition(job, 'fail', err);
  }
}

/** Run a filesystem operation, reporting failures as StorageError. */
async function storage<T>(what: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    throw new StorageError(`Could not ${what}: ${describeError(err)}`, { cause: err });
  }
}
