import { FileApi } from '../api/file.api.ts';
import { ConflictError } from '../errors.ts';
import { logger as defaultLogger } from '../logger.ts';
import type { Logger } from '../logger.ts';
import type { ConflictMode, RunContext } from '../types/upload.ts';
import { retryPolicy, withRetry } from '../utils/retry.ts';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** UTC `YYYYMMDD-HHMMSS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Inserts a timestamp before the extension: `report.zip` → `report-20240102-030405.zip`.
 * Names without an extension (including dotfiles) get it appended.
 */
export function timestampedName(name: string, date: Date): string {
  const dot = name.lastIndexOf('.');
  const stem = dot > 0 ? name.slice(0, dot) : name;
  const ext = dot > 0 ? name.slice(dot) : '';
  return `${stem}-${formatTimestamp(date)}${ext}`;
}

function assertNever(mode: never): never {
  throw new Error(`Unhandled conflict mode: ${String(mode)}`);
}

export class ConflictResolver {
  private readonly fileApi: FileApi;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(fileApi: FileApi, logger: Logger = defaultLogger, now: () => Date = () => new Date()) {
    this.fileApi = fileApi;
    this.logger = logger;
    this.now = now;
  }

  /**
   * Decides the remote name for an upload, trashing the existing file first
   * when the mode is `replace`.
   *
   * A renamed file is not checked again, so two renames within the same
   * second can still collide.
   *
   * @throws {ConflictError} If the name is taken and the mode is `abort`.
   */
  async resolve(ctx: RunContext, desiredName: string, mode: ConflictMode): Promise<string> {
    const existing = await withRetry(
      () => this.fileApi.findByName(ctx.accessToken, ctx.folderId, desiredName),
      retryPolicy(ctx.options, this.logger, 'Existence check')
    );
    if (!existing) {
      return desiredName;
    }

    switch (mode) {
      case 'abort':
        throw new ConflictError(
          `File already exists in the target folder: ${desiredName} (use conflict mode "rename" or "replace")`,
          desiredName
        );
      case 'rename': {
        const renamed = timestampedName(desiredName, this.now());
        this.logger.info(`${desiredName} already exists; uploading as ${renamed}`);
        return renamed;
      }
      case 'replace':
        this.logger.info(`${desiredName} already exists; moving ${existing.id} to trash`);
        await withRetry(
          () => this.fileApi.trash(ctx.accessToken, existing.id),
          retryPolicy(ctx.options, this.logger, 'Trash')
        );
        return desiredName;
      default:
        return assertNever(mode);
    }
  }
}
