import type { AxiosInstance } from 'axios';
import { Client } from './http-client.ts';
import { tokenResponseSchema } from '../types/file.ts';
import type { TokenResponse } from '../types/file.ts';
import type { Credentials } from '../config.ts';
import { AuthError, describeError } from '../errors.ts';
import type { Logger } from '../logger.ts';
import { withRetry } from '../utils/retry.ts';
import type { RetryOptions } from '../utils/retry.ts';

const TOKEN_PATH = '/oauth/v2/token';

/**
 * Exchanges the long-lived refresh token for an access token.
 * The token is fetched once and reused for the rest of the run.
 */
export class TokenProvider extends Client {
  private readonly credentials: Credentials;
  private accessToken?: string;

  constructor(httpClient: AxiosInstance, credentials: Credentials, logger?: Logger | false) {
    super(httpClient, logger);
    this.credentials = credentials;
  }

  /**
   * Returns the cached token or performs the refresh-token exchange.
   * @throws {AuthError} When the exchange is rejected or yields no token.
   */
  async getAccessToken(retry: Omit<RetryOptions, 'retryIf'>): Promise<string> {
    if (this.accessToken) {
      return this.accessToken;
    }

    const body = new URLSearchParams({
      refresh_token: this.credentials.refreshToken,
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      grant_type: 'refresh_token',
    });

    let response: TokenResponse;
    try {
      response = await withRetry(() => super.post(TOKEN_PATH, tokenResponseSchema, body), retry);
    } catch (error) {
      throw new AuthError(`Token refresh failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.access_token) {
      throw new AuthError(`No access_token in refresh response${response.error ? `: ${response.error}` : ''}`);
    }

    this.logger.debug('Access token obtained');
    this.accessToken = response.access_token;
    return this.accessToken;
  }
}
