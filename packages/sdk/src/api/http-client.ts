import axios from 'axios'; // Default import for runtime value
import type { AxiosInstance, AxiosResponse, Method } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import { APIError, WorkDriveError } from '../errors.ts';
import { logger as defaultLogger, noOpLogger } from '../logger.ts';
import type { Logger } from '../logger.ts';

// Schemas may transform or default their input; only the parsed output matters here.
type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export const JSON_API_HEADERS = {
  Accept: 'application/vnd.api+json',
  'Content-Type': 'application/json',
} as const;

interface RequestConfig<T> {
  method: Method;
  url: string;
  schema: Schema<T>;
  data?: unknown;
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
}

export class Client {
  protected httpClient: AxiosInstance;
  protected logger: Logger;

  constructor(httpClient: AxiosInstance, logger?: Logger | false) {
    this.httpClient = httpClient;
    // Set logger based on input or default
    if (logger === false) {
      this.logger = noOpLogger;
    } else {
      this.logger = logger || defaultLogger;
    }
  }

  /** Authorization header understood by every Zoho API. */
  protected authHeaders(accessToken: string): Record<string, string> {
    return { Authorization: `Zoho-oauthtoken ${accessToken}` };
  }

  // Centralized error mapping: every failure leaves the client as a WorkDriveError
  private toError(error: unknown): WorkDriveError {
    if (error instanceof WorkDriveError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      const statusCode = error.response?.status;
      const responseData: unknown = error.response?.data;
      const message = statusCode
        ? `Request failed with status ${statusCode}: ${summarize(responseData) || error.message}`
        : `Request failed (${error.code ?? 'network error'}): ${error.message}`;

      if (statusCode && statusCode < 500) {
        this.logger.warn(message);
      } else {
        this.logger.error(message);
      }
      return new APIError(message, statusCode, responseData, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Unexpected non-Axios error: ${message}`);
    return new WorkDriveError(`An unexpected error occurred: ${message}`, { cause: error });
  }

  protected async request<T>(config: RequestConfig<T>): Promise<T> {
    const { schema, ...requestConfig } = config;
    this.logger.debug(`Requesting: ${config.method.toUpperCase()} ${config.url}`);
    let response: AxiosResponse<unknown>;
    try {
      response = await this.httpClient.request<unknown>({ ...requestConfig, responseType: 'json' });
    } catch (error) {
      throw this.toError(error);
    }
    this.logger.debug(`Response: ${response.status} ${response.statusText}`);

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new APIError(
        `Unexpected response from ${config.url}: ${summarize(response.data)}`,
        response.status,
        response.data
      );
    }
    return parsed.data;
  }

  // --- Public Helper Methods ---

  async get<T>(path: string, schema: Schema<T>, params?: Record<string, string | number>, headers?: Record<string, string>): Promise<T> {
    return this.request({ method: 'get', url: path, schema, params, headers });
  }

  async post<T>(path: string, schema: Schema<T>, data?: unknown, headers?: Record<string, string>): Promise<T> {
    return this.request({ method: 'post', url: path, schema, data, headers });
  }

  async patch<T>(path: string, schema: Schema<T>, data?: unknown, headers?: Record<string, string>): Promise<T> {
    return this.request({ method: 'patch', url: path, schema, data, headers });
  }
}

function summarize(data: unknown): string {
  if (data === undefined || data === null || data === '') return '';
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return text.length > 300 ? `${text.slice(0, 300)}...` : text;
}
