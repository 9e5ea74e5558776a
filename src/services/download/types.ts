export type TransferState = 'pending' | 'running' | 'paused-by-cancel' | 'completed' | 'failed';

export interface Transfer {
  id: string;
  segmentId: string;
  bytesReceived: number;
  bytesTotal: number;
  state: TransferState;
  /** Why the transfer failed; null unless state is 'failed' */
  reason: string | null;
  /** Error class name behind `reason` (NetworkError, IntegrityError, ...) */
  errorName: string | null;
  /** Complete file path once state is 'completed' */
  localPath: string;
  /** Whether this run continued from a partial file */
  resumed: boolean;
}

export interface TransferProgress {
  bytesReceived: number;
  bytesTotal: number;
}

export interface ArchiveCredentials {
  /** Sent as `Authorization: Bearer …` for bearer-class archives */
  bearerToken: string | null;
  aadAccessKey: string | null;
  aadSecretKey: string | null;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DownloadConfig {
  rootDir: string | null;
  credentials: ArchiveCredentials;
  /** Max transfers running at once; the rest wait as 'pending' */
  maxConcurrent: number;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
}

export type TransferEvent =
  | { type: 'progress'; transfer: Transfer }
  | { type: 'state'; transfer: Transfer; previous: TransferState };

export type TransferListener = (event: TransferEvent) => void;
