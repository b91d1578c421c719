// Export the main client
export { WorkDriveClient } from './client.ts';

// Configuration
export {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_SECONDS,
  DEFAULT_TIMEOUT,
  REGIONS,
  isRegion,
  regionEndpoints,
} from './config.ts';
export type { Credentials, Region, RegionEndpoints, WorkDriveClientConfig } from './config.ts';

// Export custom error classes
export * from './errors.ts';

// Types users of the SDK might need
export * from './types/upload.ts';
export type { LinkSet, ResourceDescriptor, FolderEntry } from './types/file.ts';

// API clients and managers, for callers wiring their own HTTP instances
export { Client } from './api/http-client.ts';
export { TokenProvider } from './api/auth.api.ts';
export { FileApi } from './api/file.api.ts';
export { PermissionApi } from './api/permission.api.ts';
export { BatchUploader, summarizeBatch, validateRunOptions } from './managers/batch.manager.ts';
export type { BatchTarget } from './managers/batch.manager.ts';
export { ConflictResolver, formatTimestamp, timestampedName } from './managers/conflict.resolver.ts';
export { LinkResolver, buildHtmlSnippet, filterLinks, toDirectUrl } from './managers/link.resolver.ts';
export { Uploader } from './managers/upload.manager.ts';
export { withRetry, isRetryableError, retryPolicy } from './utils/retry.ts';
export type { RetryOptions } from './utils/retry.ts';

// Logger, for transports and levels
export { logger, setLoggerLevel, setLoggerTransports } from './logger.ts';
export type { Logger } from './logger.ts';
