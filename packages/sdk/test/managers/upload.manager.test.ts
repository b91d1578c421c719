import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { FileApi } from '../../src/api/file.api.ts';
import { APIError, ConflictError, NotFoundError, UploadError } from '../../src/errors.ts';
import { Uploader } from '../../src/managers/upload.manager.ts';
import { fakeHttp, formField, uploadReply } from '../helpers/fake-http.ts';
import type { FakeHandler } from '../helpers/fake-http.ts';
import type { UploadRequest } from '../../src/types/upload.ts';
import { quietLogger, runContext } from '../helpers/context.ts';

function uploaderFor(handler: FakeHandler) {
  const { http, calls } = fakeHttp(handler);
  return { uploader: new Uploader(new FileApi(http, false), quietLogger), calls };
}

function requestFor(localPath: string): Pick<UploadRequest, 'localPath' | 'region'> {
  return { localPath, region: 'us' };
}

describe('Uploader', () => {
  let workdir: string;
  let samplePath: string;

  beforeAll(async () => {
    workdir = await mkdtemp(path.join(tmpdir(), 'uploader-'));
    samplePath = path.join(workdir, 'sample.txt');
    await writeFile(samplePath, 'content');
  });

  afterAll(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  it('returns the descriptor of the stored file', async () => {
    const { uploader, calls } = uploaderFor(call => uploadReply('res-1', formField(call, 'filename') ?? ''));

    const descriptor = await uploader.upload(runContext(), requestFor(samplePath), 'stored.txt');

    expect(descriptor).toEqual({
      resourceId: 'res-1',
      name: 'stored.txt',
      parentId: 'folder-1',
      permalink: 'https://workdrive.test/file/res-1',
    });
    expect(calls).toHaveLength(1);
  });

  it('turns a 409 into ConflictError without retrying', async () => {
    const { uploader, calls } = uploaderFor(() => ({ status: 409, data: { errors: [{ title: 'exists' }] } }));

    const failure = uploader.upload(runContext({ maxRetries: 3 }), requestFor(samplePath), 'sample.txt');

    await expect(failure).rejects.toBeInstanceOf(ConflictError);
    await expect(failure).rejects.toThrow('File already exists in the target folder: sample.txt');
    expect(calls).toHaveLength(1);
  });

  it('retries a server error until the attempts run out, then fails with UploadError', async () => {
    const { uploader, calls } = uploaderFor(() => ({ status: 503 }));

    const error: unknown = await uploader
      .upload(runContext({ maxRetries: 2 }), requestFor(samplePath), 'sample.txt')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UploadError);
    expect(error instanceof UploadError && error.cause).toBeInstanceOf(APIError);
    expect(calls).toHaveLength(2);
  });

  it('rejects a directory with NotFoundError before any request', async () => {
    const { uploader, calls } = uploaderFor(() => uploadReply('res-1', 'x'));

    const failure = uploader.upload(runContext(), requestFor(workdir), 'dir');

    await expect(failure).rejects.toBeInstanceOf(NotFoundError);
    await expect(failure).rejects.toThrow(`Not a regular file: ${workdir}`);
    expect(calls).toHaveLength(0);
  });

  it('rejects a missing file with NotFoundError before any request', async () => {
    const { uploader, calls } = uploaderFor(() => uploadReply('res-1', 'x'));
    const missing = path.join(workdir, 'gone.txt');

    await expect(uploader.upload(runContext(), requestFor(missing), 'gone.txt')).rejects.toThrow(
      `File not found: ${missing}`
    );
    expect(calls).toHaveLength(0);
  });
});
