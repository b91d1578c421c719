import path from 'node:path';
import { TokenProvider } from '../api/auth.api.ts';
import type { Region } from '../config.ts';
import { ConfigError, WorkDriveError, isFatalError } from '../errors.ts';
import { logger as defaultLogger } from '../logger.ts';
import type { Logger } from '../logger.ts';
import type { BatchResult, FileResult, RunContext, RunOptions, UploadRequest } from '../types/upload.ts';
import { retryPolicy } from '../utils/retry.ts';
import { ConflictResolver } from './conflict.resolver.ts';
import { LinkResolver } from './link.resolver.ts';
import { Uploader } from './upload.manager.ts';

export interface BatchTarget {
  folderId: string;
  region: Region;
}

/**
 * Rejects contradictory options before anything touches the network.
 * @throws {ConfigError}
 */
export function validateRunOptions(paths: readonly string[], options: RunOptions): void {
  if (paths.length === 0) {
    throw new ConfigError('No files to upload');
  }
  if (options.remoteName !== undefined && paths.length > 1) {
    throw new ConfigError(`--remote-name can only be used with a single file (got ${paths.length})`);
  }
  if (options.remoteName !== undefined && options.remoteName.trim() === '') {
    throw new ConfigError('--remote-name must not be empty');
  }
  if (!Number.isInteger(options.maxRetries) || options.maxRetries < 1) {
    throw new ConfigError(`--max-retries must be an integer >= 1 (got ${options.maxRetries})`);
  }
  if (!Number.isFinite(options.retryDelay) || options.retryDelay < 0) {
    throw new ConfigError(`--retry-delay must be >= 0 seconds (got ${options.retryDelay})`);
  }
}

export function summarizeBatch(results: FileResult[], aborted: boolean): BatchResult {
  const first = results[0];
  return {
    results,
    succeeded: results.filter(result => result.status === 'success').length,
    failed: results.filter(result => result.status === 'error').length,
    aborted,
    remoteName: first?.remoteName,
    resourceId: first?.resourceId,
    directUrl: first?.links.directUrl,
    previewUrl: first?.links.previewUrl,
    html: first?.links.html,
  };
}

/**
 * Drives conflict resolution, upload and link resolution over an ordered
 * list of files, one at a time. Files already uploaded are never rolled back.
 */
export class BatchUploader {
  private readonly tokenProvider: TokenProvider;
  private readonly conflictResolver: ConflictResolver;
  private readonly uploader: Uploader;
  private readonly linkResolver: LinkResolver;
  private readonly target: BatchTarget;
  private readonly logger: Logger;

  constructor(
    tokenProvider: TokenProvider,
    conflictResolver: ConflictResolver,
    uploader: Uploader,
    linkResolver: LinkResolver,
    target: BatchTarget,
    logger: Logger = defaultLogger
  ) {
    this.tokenProvider = tokenProvider;
    this.conflictResolver = conflictResolver;
    this.uploader = uploader;
    this.linkResolver = linkResolver;
    this.target = target;
    this.logger = logger;
  }

  /**
   * Uploads every path in order and collects one result per file.
   *
   * @throws {ConfigError} On invalid options, before any network call.
   * @throws {AuthError} If the access token cannot be obtained.
   */
  async run(paths: readonly string[], options: RunOptions): Promise<BatchResult> {
    validateRunOptions(paths, options);

    const accessToken = await this.tokenProvider.getAccessToken(
      retryPolicy(options, this.logger, 'Token refresh')
    );
    const ctx: RunContext = {
      accessToken,
      folderId: this.target.folderId,
      region: this.target.region,
      options,
      results: [],
    };

    for (const [index, localPath] of paths.entries()) {
      this.logger.info(`[${index + 1}/${paths.length}] ${localPath}`);
      const result = await this.processFile(ctx, {
        localPath,
        remoteName: options.remoteName,
        conflict: options.conflict,
        share: options.share,
        link: options.link,
        region: ctx.region,
      });
      ctx.results.push(result);

      if (result.status === 'error' && options.stopOnError) {
        const skipped = paths.length - index - 1;
        if (skipped > 0) {
          this.logger.warn(`Stopping after failure; ${skipped} file(s) not processed`);
        }
        return summarizeBatch(ctx.results, skipped > 0);
      }
    }

    return summarizeBatch(ctx.results, false);
  }

  private async processFile(ctx: RunContext, request: UploadRequest): Promise<FileResult> {
    let remoteName = request.remoteName ?? path.basename(request.localPath);
    let resourceId: string | undefined;
    try {
      remoteName = await this.conflictResolver.resolve(ctx, remoteName, request.conflict);
      const resource = await this.uploader.upload(ctx, request, remoteName);
      remoteName = resource.name;
      resourceId = resource.resourceId;
      const links = await this.linkResolver.resolve(ctx, resource, request);
      return {
        sourcePath: request.localPath,
        remoteName,
        resourceId,
        links,
        status: 'success',
      };
    } catch (error) {
      if (!(error instanceof WorkDriveError) || isFatalError(error)) {
        throw error;
      }
      this.logger.error(`${request.localPath}: ${error.message}`);
      return {
        sourcePath: request.localPath,
        remoteName,
        // Set when the upload went through but sharing failed
        resourceId,
        links: {},
        status: 'error',
        error: { name: error.name, message: error.message },
      };
    }
  }
}
