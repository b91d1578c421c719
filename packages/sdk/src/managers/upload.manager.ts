import { stat } from 'node:fs/promises';
import { FileApi } from '../api/file.api.ts';
import { APIError, ConflictError, NotFoundError, UploadError, describeError } from '../errors.ts';
import { logger as defaultLogger } from '../logger.ts';
import type { Logger } from '../logger.ts';
import type { ResourceDescriptor } from '../types/file.ts';
import type { RunContext, UploadRequest } from '../types/upload.ts';
import { retryPolicy, withRetry } from '../utils/retry.ts';

export class Uploader {
  private readonly fileApi: FileApi;
  private readonly logger: Logger;

  constructor(fileApi: FileApi, logger: Logger = defaultLogger) {
    this.fileApi = fileApi;
    this.logger = logger;
  }

  /**
   * Uploads one local file into the run's target folder.
   *
   * @param remoteName Name resolved by the conflict resolver.
   * @throws {NotFoundError} If the local file is gone.
   * @throws {ConflictError} If the name was taken after the existence check.
   * @throws {UploadError} If the service rejects the upload or retries run out.
   */
  async upload(
    ctx: RunContext,
    request: Pick<UploadRequest, 'localPath' | 'region'>,
    remoteName: string
  ): Promise<ResourceDescriptor> {
    const { localPath, region } = request;
    await this.ensureFile(localPath);

    try {
      const descriptor = await withRetry(
        () => this.fileApi.upload(ctx.accessToken, ctx.folderId, remoteName, localPath),
        retryPolicy(ctx.options, this.logger, `Upload of ${remoteName}`)
      );
      this.logger.info(`Uploaded ${localPath} as ${descriptor.name} (resource_id=${descriptor.resourceId}, region=${region})`);
      return descriptor;
    } catch (error) {
      if (error instanceof APIError && error.statusCode === 409) {
        throw new ConflictError(`File already exists in the target folder: ${remoteName}`, remoteName, { cause: error });
      }
      throw new UploadError(`Upload failed for ${localPath}: ${describeError(error)}`, { cause: error });
    }
  }

  private async ensureFile(localPath: string): Promise<void> {
    try {
      const info = await stat(localPath);
      if (info.isFile()) {
        return;
      }
    } catch (error) {
      throw new NotFoundError(`File not found: ${localPath}`, localPath, { cause: error });
    }
    throw new NotFoundError(`Not a regular file: ${localPath}`, localPath);
  }
}
