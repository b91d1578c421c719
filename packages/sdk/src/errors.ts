// Base error class for all WorkDrive upload errors
export class WorkDriveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkDriveError';
    // Maintain proper stack trace (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

// Error for API related issues (e.g., network error, non-2xx response)
export class APIError extends WorkDriveError {
  public readonly statusCode?: number;
  public readonly responseData?: unknown;

  constructor(message: string, statusCode?: number, responseData?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'APIError';
    this.statusCode = statusCode;
    this.responseData = responseData;
  }

  /** Network failures, timeouts and 5xx responses are worth another attempt. */
  get retryable(): boolean {
    return this.statusCode === undefined || this.statusCode >= 500;
  }
}

// Invalid or contradictory options, raised before any network call
export class ConfigError extends WorkDriveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

// Credential exchange failed; fatal for the whole run
export class AuthError extends WorkDriveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
  }
}

// Remote name already taken while the conflict mode is "abort"
export class ConflictError extends WorkDriveError {
  public readonly remoteName: string;

  constructor(message: string, remoteName: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConflictError';
    this.remoteName = remoteName;
  }
}

// Local file missing, unreadable or outside the allowed root
export class NotFoundError extends WorkDriveError {
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

export class UploadError extends WorkDriveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UploadError';
  }
}

export class ShareError extends WorkDriveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ShareError';
  }
}

/**
 * Errors that end the whole run instead of a single file's upload.
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof AuthError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
