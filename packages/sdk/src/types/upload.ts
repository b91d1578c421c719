import type { Region } from '../config.ts';
import type { LinkSet } from './file.ts';

export const CONFLICT_MODES = ['abort', 'rename', 'replace'] as const;
export type ConflictMode = (typeof CONFLICT_MODES)[number];

export const SHARE_MODES = ['public', 'skip'] as const;
export type ShareMode = (typeof SHARE_MODES)[number];

export const LINK_MODES = ['direct', 'preview', 'both'] as const;
export type LinkMode = (typeof LINK_MODES)[number];

/** Options shared by every file of a batch. */
export interface RunOptions {
  conflict: ConflictMode;
  share: ShareMode;
  link: LinkMode;
  /** Attempts per network call, including the first. */
  maxRetries: number;
  /** Fixed delay between attempts. */
  retryDelay: number;
  /** Only valid when the batch holds a single path. */
  remoteName?: string;
  /** End the batch at the first failing file instead of carrying on. */
  stopOnError?: boolean;
}

/** Per-file policy, built by the orchestrator from the run options. */
export interface UploadRequest {
  localPath: string;
  remoteName?: string;
  conflict: ConflictMode;
  share: ShareMode;
  link: LinkMode;
  /** Data centre whose hosts the client's HTTP instances were built for. */
  region: Region;
}

/** The part of a request that governs sharing and reported links. */
export type LinkPolicy = Pick<UploadRequest, 'share' | 'link'>;

export type FileStatus = 'success' | 'error';

export interface FileResult {
  sourcePath: string;
  remoteName: string;
  resourceId?: string;
  links: LinkSet;
  status: FileStatus;
  error?: {
    name: string;
    message: string;
  };
}

export interface BatchResult {
  results: FileResult[];
  succeeded: number;
  failed: number;
  /** True when `stopOnError` cut the batch short. */
  aborted: boolean;
  // First file's values, for consumers that only read a single upload
  remoteName?: string;
  resourceId?: string;
  directUrl?: string;
  previewUrl?: string;
  html?: string;
}

/**
 * State threaded through every step of one run.
 */
export interface RunContext {
  readonly accessToken: string;
  readonly folderId: string;
  readonly region: Region;
  readonly options: Readonly<RunOptions>;
  readonly results: FileResult[];
}
