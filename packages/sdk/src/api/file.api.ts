import { openAsBlob } from 'node:fs';
import { Client, JSON_API_HEADERS } from './http-client.ts';
import {
  anyResponseSchema,
  folderListingSchema,
  uploadResponseSchema,
} from '../types/file.ts';
import type { FolderEntry, ResourceDescriptor } from '../types/file.ts';
import { APIError } from '../errors.ts';

const PAGE_LIMIT = 50;

// Status code WorkDrive uses for items moved to trash
const TRASHED_STATUS = '51';

const FOLDER_TYPE = 'folder';

export class FileApi extends Client {
  /**
   * List the children of a folder, following pagination.
   * Maps to GET /files/{folderId}/files
   */
  async listFolder(accessToken: string, folderId: string): Promise<FolderEntry[]> {
    const entries: FolderEntry[] = [];
    for (let offset = 0; ; offset += PAGE_LIMIT) {
      const page = await super.get(
        `/files/${encodeURIComponent(folderId)}/files`,
        folderListingSchema,
        { 'page[limit]': PAGE_LIMIT, 'page[offset]': offset },
        { ...this.authHeaders(accessToken), Accept: JSON_API_HEADERS.Accept }
      );
      entries.push(...page.data);
      if (page.data.length < PAGE_LIMIT) {
        return entries;
      }
    }
  }

  /**
   * Find a file of the folder by exact name. Subfolders never match.
   * @returns The matching entry, or null when no file has that name.
   */
  async findByName(accessToken: string, folderId: string, name: string): Promise<FolderEntry | null> {
    const entries = await this.listFolder(accessToken, folderId);
    return entries.find(entry => entry.attributes.name === name && entry.attributes.type !== FOLDER_TYPE) ?? null;
  }

  /**
   * Move a file to the trash (soft delete).
   * Maps to PATCH /files/{id} with status=51
   */
  async trash(accessToken: string, resourceId: string): Promise<void> {
    await super.patch(
      `/files/${encodeURIComponent(resourceId)}`,
      anyResponseSchema,
      { data: { attributes: { status: TRASHED_STATUS }, type: 'files' } },
      { ...this.authHeaders(accessToken), ...JSON_API_HEADERS }
    );
  }

  /**
   * Upload a local file into a folder under the given name.
   * Maps to POST /upload (multipart)
   */
  async upload(
    accessToken: string,
    folderId: string,
    remoteName: string,
    localPath: string
  ): Promise<ResourceDescriptor> {
    // A fresh file-backed blob per call, so a retried upload re-reads from the start
    const content = await openAsBlob(localPath);
    const form = new FormData();
    form.append('filename', remoteName);
    form.append('parent_id', folderId);
    form.append('override-name-exist', 'false');
    form.append('content', content, remoteName);

    const response = await super.post('/upload', uploadResponseSchema, form, this.authHeaders(accessToken));
    const { id, attributes } = response.data[0];
    const resourceId = attributes.resource_id ?? id;
    if (!resourceId) {
      throw new APIError('Upload response carries no resource id', 200, response);
    }

    return {
      resourceId,
      name: attributes.FileName ?? remoteName,
      parentId: attributes.parent_id ?? folderId,
      permalink: attributes.Permalink,
    };
  }
}
