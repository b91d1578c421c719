import { z } from 'zod';

// --- Wire formats (WorkDrive speaks JSON:API) ---

export const tokenResponseSchema = z.object({
  access_token: z.string().optional(),
  expires_in: z.number().optional(),
  error: z.string().optional(),
});
export type TokenResponse = z.infer<typeof tokenResponseSchema>;

// Child entries of GET /files/{folderId}/files
export const folderEntrySchema = z.object({
  id: z.string(),
  attributes: z.object({
    name: z.string(),
    type: z.string().optional(),
  }),
});
export type FolderEntry = z.infer<typeof folderEntrySchema>;

export const folderListingSchema = z.object({
  data: z.array(folderEntrySchema).default([]),
});

// POST /upload answers with one entry per uploaded file
export const uploadResponseSchema = z.object({
  data: z
    .array(
      z.object({
        id: z.string().optional(),
        attributes: z.object({
          resource_id: z.string().optional(),
          parent_id: z.string().optional(),
          FileName: z.string().optional(),
          Permalink: z.string().optional(),
        }),
      })
    )
    .min(1),
});
export type UploadResponse = z.infer<typeof uploadResponseSchema>;

export const permissionResponseSchema = z.object({
  data: z.object({
    id: z.string().optional(),
    attributes: z
      .object({
        permalink: z.string().optional(),
        resource_id: z.string().optional(),
      })
      .default({}),
  }),
});
export type PermissionResponse = z.infer<typeof permissionResponseSchema>;

// PATCH /files/{id} body is not needed beyond its status code
export const anyResponseSchema = z.unknown();

// --- Domain types ---

/** What the service reports back about a stored file. */
export interface ResourceDescriptor {
  resourceId: string;
  name: string;
  parentId: string;
  /** Internal share URL, visible to authenticated members of the org. */
  permalink?: string;
}

export interface LinkSet {
  directUrl?: string;
  previewUrl?: string;
  html?: string;
}
