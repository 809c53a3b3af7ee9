/**
 * Error taxonomy for crawling, storage and notification
 */

export enum ErrorCode {
  RENDER_FAILED = 'RENDER_FAILED',
  INVALID_COMPONENT_SPEC = 'INVALID_COMPONENT_SPEC',
  JOB_FAILED = 'JOB_FAILED',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  NOTIFY_FAILED = 'NOTIFY_FAILED',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  RUN_IN_PROGRESS = 'RUN_IN_PROGRESS',
  NOT_FOUND = 'NOT_FOUND',
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Navigation, timeout or content failure for a single page
 */
export class RenderError extends AppError {
  constructor(
    public readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(ErrorCode.RENDER_FAILED, message, { url }, options);
    this.name = 'RenderError';
  }
}

export class MatchError extends AppError {
  constructor(component: string, message: string) {
    super(ErrorCode.INVALID_COMPONENT_SPEC, message, { component });
    this.name = 'MatchError';
  }
}

export class JobError extends AppError {
  constructor(target: string, message: string, options?: { cause?: unknown }) {
    super(ErrorCode.JOB_FAILED, message, { target }, options);
    this.name = 'JobError';
  }
}

export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.STORAGE_UNAVAILABLE, message, undefined, options);
    this.name = 'StorageError';
  }
}

/**
 * Webhook transport failure or non-2xx response
 */
export class NotifyError extends AppError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(ErrorCode.NOTIFY_FAILED, message, statusCode === undefined ? undefined : { statusCode }, options);
    this.name = 'NotifyError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(ErrorCode.CONFIGURATION_ERROR, message);
    this.name = 'ConfigError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(ErrorCode.RUN_IN_PROGRESS, message);
    this.name = 'ConflictError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(ErrorCode.NOT_FOUND, message);
    this.name = 'NotFoundError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
