import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { DEFAULT_TIMEOUT, regionEndpoints } from './config.ts';
import type { Region, WorkDriveClientConfig } from './config.ts';
import { TokenProvider } from './api/auth.api.ts';
import { FileApi } from './api/file.api.ts';
import { PermissionApi } from './api/permission.api.ts';
import { BatchUploader } from './managers/batch.manager.ts';
import { ConflictResolver } from './managers/conflict.resolver.ts';
import { LinkResolver } from './managers/link.resolver.ts';
import { Uploader } from './managers/upload.manager.ts';
import { setLoggerTransports, setLoggerLevel } from './logger.ts';
import type { BatchResult, RunOptions } from './types/upload.ts';

export class WorkDriveClient {
  private readonly apiClient: AxiosInstance;
  private readonly accountsClient: AxiosInstance;
  readonly tokens: TokenProvider;
  readonly files: FileApi;
  readonly permissions: PermissionApi;
  readonly batch: BatchUploader;
  readonly region: Region;
  readonly config: WorkDriveClientConfig;

  constructor(config: WorkDriveClientConfig) {
    this.config = config;

    // Configure logger if logger config is provided
    if (config.logger) {
      if (config.logger.level) {
        setLoggerLevel(config.logger.level);
      }
      if (config.logger.transports && config.logger.transports.length > 0) {
        setLoggerTransports(config.logger.transports);
      }
    }

    this.region = config.region ?? 'us';
    const endpoints = regionEndpoints(this.region);
    const timeout = config.timeout ?? DEFAULT_TIMEOUT;

    this.apiClient = axios.create({
      baseURL: config.apiBaseURL ?? endpoints.apiUrl,
      timeout,
      maxBodyLength: Infinity,
    });
    this.accountsClient = axios.create({
      baseURL: config.accountsBaseURL ?? endpoints.accountsUrl,
      timeout,
    });

    this.tokens = new TokenProvider(this.accountsClient, config.credentials);
    this.files = new FileApi(this.apiClient);
    this.permissions = new PermissionApi(this.apiClient);

    this.batch = new BatchUploader(
      this.tokens,
      new ConflictResolver(this.files),
      new Uploader(this.files),
      new LinkResolver(this.permissions),
      { folderId: config.credentials.folderId, region: this.region }
    );
  }

  /** Uploads `paths` in order into the configured folder. */
  async upload(paths: readonly string[], options: RunOptions): Promise<BatchResult> {
    return this.batch.run(paths, options);
  }
}
