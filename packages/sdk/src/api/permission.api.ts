import { Client, JSON_API_HEADERS } from './http-client.ts';
import { permissionResponseSchema } from '../types/file.ts';

// "View" role for files
const VIEWER_ROLE_ID = '34';

export class PermissionApi extends Client {
  /**
   * Grant "everyone on the internet" view access to a resource.
   * Maps to POST /permissions
   * @returns The permalink reported for the new permission, if any.
   */
  async shareWithEveryone(accessToken: string, resourceId: string): Promise<string | undefined> {
    const response = await super.post(
      '/permissions',
      permissionResponseSchema,
      {
        data: {
          type: 'permissions',
          attributes: {
            resource_id: resourceId,
            shared_type: 'everyone',
            role_id: VIEWER_ROLE_ID,
          },
        },
      },
      { ...this.authHeaders(accessToken), ...JSON_API_HEADERS }
    );
    return response.data.attributes.permalink;
  }
}
