import { appendFile } from 'node:fs/promises';
import type { BatchResult, FileResult } from '@workdrive-upload/sdk';

export const STDOUT_MODES = ['full', 'direct', 'json'] as const;
export type StdoutMode = (typeof STDOUT_MODES)[number];

export const DEFAULT_OUTPUT_KEY = 'zoho_direct_url';
const OUTPUT_PREFIX = 'zoho';

/** Machine-readable shape of one file, as printed in JSON mode and GITHUB_OUTPUT. */
export interface FileRecord {
  source_path: string;
  remote_name: string;
  resource_id: string | null;
  direct_url: string | null;
  preview_url: string | null;
  html: string | null;
  status: FileResult['status'];
  error: string | null;
}

export function toRecord(result: FileResult): FileRecord {
  return {
    source_path: result.sourcePath,
    remote_name: result.remoteName,
    resource_id: result.resourceId ?? null,
    direct_url: result.links.directUrl ?? null,
    preview_url: result.links.previewUrl ?? null,
    html: result.links.html ?? null,
    status: result.status,
    error: result.error ? `${result.error.name}: ${result.error.message}` : null,
  };
}

function renderFull(batch: BatchResult): string[] {
  const lines: string[] = [];
  for (const result of batch.results) {
    if (result.status === 'error') {
      lines.push(`✗ ${result.sourcePath}: ${result.error?.name ?? 'Error'}: ${result.error?.message ?? 'unknown error'}`);
      continue;
    }
    lines.push(`✓ Uploaded ${result.sourcePath} as ${result.remoteName} (resource_id = ${result.resourceId ?? '?'})`);
    if (result.links.directUrl) lines.push(`  Direct URL:  ${result.links.directUrl}`);
    if (result.links.previewUrl) lines.push(`  Preview URL: ${result.links.previewUrl}`);
    if (result.links.html) lines.push(`  HTML:        ${result.links.html}`);
  }
  lines.push(
    `${batch.succeeded} uploaded, ${batch.failed} failed` +
      (batch.aborted ? ', remaining files skipped' : '')
  );
  return lines;
}

/**
 * Renders the summary for stdout. JSON mode prints an object for a single
 * file and an array otherwise; direct mode prints one URL per uploaded file,
 * the preview URL standing in where no direct URL exists.
 */
export function renderStdout(batch: BatchResult, mode: StdoutMode): string {
  switch (mode) {
    case 'json': {
      const records = batch.results.map(toRecord);
      return JSON.stringify(records.length === 1 ? records[0] : records);
    }
    case 'direct':
      return batch.results
        .filter(result => result.status === 'success')
        .flatMap(result => {
          const url = result.links.directUrl ?? result.links.previewUrl;
          return url ? [url] : [];
        })
        .join('\n');
    case 'full':
      return renderFull(batch).join('\n');
  }
}

/**
 * `key=value` lines for GITHUB_OUTPUT. The first file uses the plain keys,
 * file N (N >= 2) the same keys suffixed with `_N`.
 */
export function githubOutputLines(batch: BatchResult, outputKey: string = DEFAULT_OUTPUT_KEY): string[] {
  const lines: string[] = [];
  batch.results.forEach((result, index) => {
    const suffix = index === 0 ? '' : `_${index + 1}`;
    const record = toRecord(result);
    lines.push(
      `${outputKey}${suffix}=${record.direct_url ?? ''}`,
      `${OUTPUT_PREFIX}_preview_url${suffix}=${record.preview_url ?? ''}`,
      `${OUTPUT_PREFIX}_html${suffix}=${record.html ?? ''}`,
      `${OUTPUT_PREFIX}_resource_id${suffix}=${record.resource_id ?? ''}`,
      `${OUTPUT_PREFIX}_remote_name${suffix}=${record.remote_name}`
    );
  });
  lines.push(
    `${OUTPUT_PREFIX}_file_count=${batch.results.length}`,
    `${OUTPUT_PREFIX}_results_json=${JSON.stringify(batch.results.map(toRecord))}`
  );
  return lines;
}

export async function writeGithubOutput(filePath: string, lines: string[]): Promise<void> {
  await appendFile(filePath, lines.map(line => `${line}\n`).join(''), 'utf-8');
}
