import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { FileApi } from '../../src/api/file.api.ts';
import { PermissionApi } from '../../src/api/permission.api.ts';
import { APIError } from '../../src/errors.ts';
import { fakeHttp, formField, jsonBody, listingReply, uploadReply } from '../helpers/fake-http.ts';

describe('FileApi', () => {
  let workdir: string;
  let samplePath: string;

  beforeAll(async () => {
    workdir = await mkdtemp(path.join(tmpdir(), 'file-api-'));
    samplePath = path.join(workdir, 'sample.txt');
    await writeFile(samplePath, 'content');
  });

  afterAll(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  describe('findByName', () => {
    it('returns the entry with the exact name', async () => {
      const { http, calls } = fakeHttp(() => listingReply(['notes.md', 'report.zip']));
      const api = new FileApi(http, false);

      const entry = await api.findByName('test-token', 'folder-1', 'report.zip');

      expect(entry).toEqual({ id: 'existing-2', attributes: { name: 'report.zip', type: 'file' } });
      expect(calls[0].url).toBe('/files/folder-1/files');
      expect(calls[0].params).toEqual({ 'page[limit]': 50, 'page[offset]': 0 });
      expect(calls[0].headers['Authorization']).toBe('Zoho-oauthtoken test-token');
    });

    it('returns null when no entry matches', async () => {
      const { http } = fakeHttp(() => listingReply(['Report.zip']));
      const api = new FileApi(http, false);

      await expect(api.findByName('test-token', 'folder-1', 'report.zip')).resolves.toBeNull();
    });

    it('skips a subfolder carrying the same name', async () => {
      const { http } = fakeHttp(() => ({
        status: 200,
        data: {
          data: [
            { id: 'folder-9', attributes: { name: 'report.zip', type: 'folder' } },
            { id: 'file-3', attributes: { name: 'report.zip', type: 'zip' } },
          ],
        },
      }));
      const api = new FileApi(http, false);

      const entry = await api.findByName('test-token', 'folder-1', 'report.zip');

      expect(entry?.id).toBe('file-3');
    });

    it('follows pagination until a short page', async () => {
      const fullPage = Array.from({ length: 50 }, (_, i) => `file-${i}.txt`);
      const { http, calls } = fakeHttp(call =>
        call.params['page[offset]'] === 0 ? listingReply(fullPage) : listingReply(['late.txt'])
      );
      const api = new FileApi(http, false);

      const entries = await api.listFolder('test-token', 'folder-1');

      expect(entries).toHaveLength(51);
      expect(calls.map(call => call.params['page[offset]'])).toEqual([0, 50]);
    });

    it('treats an empty listing as no entries', async () => {
      const { http } = fakeHttp(() => ({ status: 200, data: {} }));
      const api = new FileApi(http, false);

      await expect(api.listFolder('test-token', 'folder-1')).resolves.toEqual([]);
    });
  });

  describe('trash', () => {
    it('patches the resource status to trashed', async () => {
      const { http, calls } = fakeHttp(() => ({ status: 200, data: { data: {} } }));
      const api = new FileApi(http, false);

      await api.trash('test-token', 'res-9');

      expect(calls[0].method).toBe('PATCH');
      expect(calls[0].url).toBe('/files/res-9');
      expect(jsonBody(calls[0])).toEqual({ data: { attributes: { status: '51' }, type: 'files' } });
    });
  });

  describe('upload', () => {
    it('posts a multipart body and maps the response', async () => {
      const { http, calls } = fakeHttp(() => uploadReply('res-1', 'artifact.txt'));
      const api = new FileApi(http, false);

      const descriptor = await api.upload('test-token', 'folder-1', 'artifact.txt', samplePath);

      expect(descriptor).toEqual({
        resourceId: 'res-1',
        name: 'artifact.txt',
        parentId: 'folder-1',
        permalink: 'https://workdrive.test/file/res-1',
      });
      expect(calls[0].method).toBe('POST');
      expect(calls[0].url).toBe('/upload');
      expect(formField(calls[0], 'filename')).toBe('artifact.txt');
      expect(formField(calls[0], 'parent_id')).toBe('folder-1');
      expect(formField(calls[0], 'override-name-exist')).toBe('false');
    });

    it('falls back to the entry id when resource_id is missing', async () => {
      const { http } = fakeHttp(() => ({
        status: 200,
        data: { data: [{ id: 'res-500', attributes: { Permalink: 'https://p' } }] },
      }));
      const api = new FileApi(http, false);

      const descriptor = await api.upload('test-token', 'folder-1', 'artifact.txt', samplePath);

      expect(descriptor).toEqual({
        resourceId: 'res-500',
        name: 'artifact.txt',
        parentId: 'folder-1',
        permalink: 'https://p',
      });
    });

    it('rejects a response without any entry', async () => {
      const { http } = fakeHttp(() => ({ status: 200, data: { data: [] } }));
      const api = new FileApi(http, false);

      await expect(api.upload('test-token', 'folder-1', 'artifact.txt', samplePath)).rejects.toBeInstanceOf(APIError);
    });

    it('maps HTTP failures to APIError with the status', async () => {
      const { http } = fakeHttp(() => ({ status: 413, data: { errors: [{ title: 'quota' }] } }));
      const api = new FileApi(http, false);

      await expect(api.upload('test-token', 'folder-1', 'artifact.txt', samplePath)).rejects.toMatchObject({
        name: 'APIError',
        statusCode: 413,
      });
    });
  });
});

describe('PermissionApi', () => {
  it('grants everyone view access and returns the permalink', async () => {
    const { http, calls } = fakeHttp(() => ({
      status: 201,
      data: { data: { id: 'perm-1', attributes: { permalink: 'https://workdrive.test/file/res-1' } } },
    }));
    const api = new PermissionApi(http, false);

    const permalink = await api.shareWithEveryone('test-token', 'res-1');

    expect(permalink).toBe('https://workdrive.test/file/res-1');
    expect(calls[0].url).toBe('/permissions');
    expect(calls[0].headers['Accept']).toBe('application/vnd.api+json');
    expect(jsonBody(calls[0])).toEqual({
      data: {
        type: 'permissions',
        attributes: { resource_id: 'res-1', shared_type: 'everyone', role_id: '34' },
      },
    });
  });

  it('returns undefined when the grant carries no permalink', async () => {
    const { http } = fakeHttp(() => ({ status: 200, data: { data: { id: 'perm-1' } } }));
    const api = new PermissionApi(http, false);

    await expect(api.shareWithEveryone('test-token', 'res-1')).resolves.toBeUndefined();
  });
});
