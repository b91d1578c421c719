import { describe, it, expect } from 'vitest';
import { PermissionApi } from '../../src/api/permission.api.ts';
import { ShareError } from '../../src/errors.ts';
import { LinkResolver, buildHtmlSnippet, filterLinks, toDirectUrl } from '../../src/managers/link.resolver.ts';
import type { ResourceDescriptor } from '../../src/types/file.ts';
import { fakeHttp } from '../helpers/fake-http.ts';
import type { FakeHandler } from '../helpers/fake-http.ts';
import { quietLogger, runContext } from '../helpers/context.ts';

const resource: ResourceDescriptor = {
  resourceId: 'res-1',
  name: 'logo.png',
  parentId: 'folder-1',
  permalink: 'https://workdrive.test/file/res-1',
};

function resolverFor(handler: FakeHandler) {
  const { http, calls } = fakeHttp(handler);
  return { resolver: new LinkResolver(new PermissionApi(http, false), quietLogger), calls };
}

const publicBoth = { share: 'public', link: 'both' } as const;

const granted: FakeHandler = () => ({
  status: 200,
  data: { data: { attributes: { permalink: 'https://public.test/file/res-1/preview' } } },
});

describe('toDirectUrl', () => {
  it('swaps a trailing preview segment for download', () => {
    expect(toDirectUrl('https://public.test/file/res-1/preview')).toBe('https://public.test/file/res-1/download');
  });

  it('swaps a trailing view segment and keeps the query', () => {
    expect(toDirectUrl('https://public.test/file/res-1/view?lang=en')).toBe(
      'https://public.test/file/res-1/download?lang=en'
    );
  });

  it('appends download to a permalink without a mode segment', () => {
    expect(toDirectUrl('https://public.test/file/res-1/')).toBe('https://public.test/file/res-1/download');
  });

  it('keeps host and resource id, changing only the mode segment', () => {
    const preview = new URL('https://public.test/file/res-42/preview');
    const direct = new URL(toDirectUrl(preview.toString()));

    expect(direct.host).toBe(preview.host);
    const previewSegments = preview.pathname.split('/');
    const directSegments = direct.pathname.split('/');
    expect(directSegments.slice(0, -1)).toEqual(previewSegments.slice(0, -1));
    expect(directSegments).toContain('res-42');
    expect(directSegments.at(-1)).toBe('download');
  });
});

describe('filterLinks', () => {
  const urls = { directUrl: 'https://d.test/x/download', previewUrl: 'https://d.test/x' };

  it('keeps only the direct URL and its snippet in direct mode', () => {
    expect(filterLinks('direct', urls, 'x.png')).toEqual({
      directUrl: 'https://d.test/x/download',
      previewUrl: undefined,
      html: '<img src="https://d.test/x/download" alt="x.png" />',
    });
  });

  it('keeps only the preview URL in preview mode', () => {
    expect(filterLinks('preview', urls, 'x.png')).toEqual({
      directUrl: undefined,
      previewUrl: 'https://d.test/x',
      html: undefined,
    });
  });

  it('does not fall back to preview when no direct URL exists', () => {
    expect(filterLinks('both', { previewUrl: 'https://d.test/x' }, 'x.png')).toEqual({
      directUrl: undefined,
      previewUrl: 'https://d.test/x',
      html: undefined,
    });
  });
});

describe('buildHtmlSnippet', () => {
  it('escapes attribute values', () => {
    expect(buildHtmlSnippet('https://d.test/a?x=1&y=2', 'a "b".png')).toBe(
      '<img src="https://d.test/a?x=1&amp;y=2" alt="a &quot;b&quot;.png" />'
    );
  });
});

describe('LinkResolver', () => {
  it('publishes the resource and derives both URLs', async () => {
    const { resolver, calls } = resolverFor(granted);

    const links = await resolver.resolve(runContext(), resource, { share: 'public', link: 'both' });

    expect(calls).toHaveLength(1);
    expect(links).toEqual({
      previewUrl: 'https://public.test/file/res-1/preview',
      directUrl: 'https://public.test/file/res-1/download',
      html: '<img src="https://public.test/file/res-1/download" alt="logo.png" />',
    });
  });

  it('falls back to the upload permalink when the grant returns none', async () => {
    const { resolver } = resolverFor(() => ({ status: 200, data: { data: {} } }));

    const links = await resolver.resolve(runContext(), resource, { share: 'public', link: 'both' });

    expect(links.previewUrl).toBe('https://workdrive.test/file/res-1');
    expect(links.directUrl).toBe('https://workdrive.test/file/res-1/download');
  });

  it('makes no permission call when sharing is skipped', async () => {
    const { resolver, calls } = resolverFor(granted);

    const links = await resolver.resolve(runContext(), resource, { share: 'skip', link: 'both' });

    expect(calls).toHaveLength(0);
    expect(links.directUrl).toBeUndefined();
    expect(links.html).toBeUndefined();
    expect(links.previewUrl).toBe('https://workdrive.test/file/res-1');
  });

  it('follows the per-file policy rather than the run defaults', async () => {
    const { resolver, calls } = resolverFor(granted);

    const links = await resolver.resolve(runContext({ share: 'public', link: 'both' }), resource, {
      share: 'skip',
      link: 'preview',
    });

    expect(calls).toHaveLength(0);
    expect(links).toEqual({ directUrl: undefined, previewUrl: 'https://workdrive.test/file/res-1', html: undefined });
  });

  it('fails with ShareError when the grant is rejected', async () => {
    const { resolver, calls } = resolverFor(() => ({ status: 403, data: { errors: [{ title: 'forbidden' }] } }));

    await expect(resolver.resolve(runContext(), resource, publicBoth)).rejects.toBeInstanceOf(ShareError);
    expect(calls).toHaveLength(1);
  });

  it('fails with ShareError when no permalink is known at all', async () => {
    const { resolver } = resolverFor(() => ({ status: 200, data: { data: {} } }));

    await expect(
      resolver.resolve(runContext(), { ...resource, permalink: undefined }, publicBoth)
    ).rejects.toThrow('No permalink returned for logo.png (resource_id=res-1)');
  });
});
