import { PermissionApi } from '../api/permission.api.ts';
import { ShareError, describeError } from '../errors.ts';
import { logger as defaultLogger } from '../logger.ts';
import type { Logger } from '../logger.ts';
import type { LinkSet, ResourceDescriptor } from '../types/file.ts';
import type { LinkMode, LinkPolicy, RunContext } from '../types/upload.ts';
import { retryPolicy, withRetry } from '../utils/retry.ts';

const PREVIEW_SEGMENTS = new Set(['preview', 'view']);
const DOWNLOAD_SEGMENT = 'download';

/**
 * Derives the direct-download URL from a public preview URL. The trailing
 * `preview`/`view` segment becomes `download`; a permalink without a mode
 * segment gets `download` appended. Origin, resource id and query stay put.
 */
export function toDirectUrl(previewUrl: string): string {
  const url = new URL(previewUrl);
  const segments = url.pathname.split('/');
  while (segments.length > 1 && segments[segments.length - 1] === '') {
    segments.pop();
  }
  const last = segments[segments.length - 1];
  if (last !== undefined && PREVIEW_SEGMENTS.has(last)) {
    segments[segments.length - 1] = DOWNLOAD_SEGMENT;
  } else {
    segments.push(DOWNLOAD_SEGMENT);
  }
  url.pathname = segments.join('/');
  return url.toString();
}

function escapeHtml(str: string): string {
  const htmlEscapes: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
  };
  return str.replace(/[&<>"']/g, (char) => htmlEscapes[char] || char);
}

export function buildHtmlSnippet(directUrl: string, alt: string): string {
  return `<img src="${escapeHtml(directUrl)}" alt="${escapeHtml(alt)}" />`;
}

/** Keeps only the URL kinds the link mode asks for. */
export function filterLinks(
  link: LinkMode,
  urls: { directUrl?: string; previewUrl?: string },
  alt: string
): LinkSet {
  const directUrl = link === 'preview' ? undefined : urls.directUrl;
  const previewUrl = link === 'direct' ? undefined : urls.previewUrl;
  return {
    directUrl,
    previewUrl,
    html: directUrl ? buildHtmlSnippet(directUrl, alt) : undefined,
  };
}

export class LinkResolver {
  private readonly permissionApi: PermissionApi;
  private readonly logger: Logger;

  constructor(permissionApi: PermissionApi, logger: Logger = defaultLogger) {
    this.permissionApi = permissionApi;
    this.logger = logger;
  }

  /**
   * Applies the share mode to an uploaded resource and derives its URLs.
   * @throws {ShareError} If the public grant is rejected or yields no permalink.
   */
  async resolve(ctx: RunContext, resource: ResourceDescriptor, policy: LinkPolicy): Promise<LinkSet> {
    if (policy.share === 'skip') {
      // Only the internal permalink exists without a public grant
      return filterLinks(policy.link, { previewUrl: resource.permalink }, resource.name);
    }

    let permalink: string | undefined;
    try {
      permalink = await withRetry(
        () => this.permissionApi.shareWithEveryone(ctx.accessToken, resource.resourceId),
        retryPolicy(ctx.options, this.logger, `Sharing ${resource.name}`)
      );
    } catch (error) {
      throw new ShareError(`Share everyone failed for ${resource.name}: ${describeError(error)}`, { cause: error });
    }

    const previewUrl = permalink ?? resource.permalink;
    if (!previewUrl) {
      throw new ShareError(`No permalink returned for ${resource.name} (resource_id=${resource.resourceId})`);
    }

    let directUrl: string;
    try {
      directUrl = toDirectUrl(previewUrl);
    } catch (error) {
      throw new ShareError(`Cannot derive a download URL from ${previewUrl}: ${describeError(error)}`, { cause: error });
    }
    this.logger.debug(`Public link for ${resource.name}: ${previewUrl}`);

    return filterLinks(policy.link, { directUrl, previewUrl }, resource.name);
  }
}
