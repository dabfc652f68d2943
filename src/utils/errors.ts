/**
 * Error classes with HTTP status codes for structured API responses,
 * plus the startup configuration error.
 */

export interface ErrorResponse {
  error: string;
  details?: string;
}

/** Base application error with HTTP status code and machine-readable code. */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }

  toJSON(): ErrorResponse {
    return { error: this.message };
  }
}

/** 400 Bad Request -- invalid input or failed validation. */
export class ValidationError extends AppError {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.details = details;
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/** 404 Not Found -- no record or source file for the filename. */
export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** 413 Payload Too Large -- upload exceeds MAX_FILE_SIZE_MB. */
export class PayloadTooLargeError extends AppError {
  constructor(message = 'Payload too large') {
    super(message, 413, 'PAYLOAD_TOO_LARGE');
    this.name = 'PayloadTooLargeError';
  }
}

/** 409 Conflict -- the operation is already running. */
export class ConflictError extends AppError {
  constructor(message = 'Conflict') {
    super(message, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

/** 502 Bad Gateway -- a remote dependency failed. */
export class UpstreamError extends AppError {
  constructor(message = 'Upstream service failed') {
    super(message, 502, 'UPSTREAM_ERROR');
    this.name = 'UpstreamError';
  }
}

/** 500 Internal Server Error -- store read/write failure. */
export class StorageError extends AppError {
  constructor(message = 'Storage operation failed') {
    super(message, 500, 'STORAGE_ERROR');
    this.name = 'StorageError';
  }
}

/** 503 Service Unavailable -- a component is disabled or not configured. */
export class ServiceUnavailableError extends AppError {
  constructor(message = 'Service unavailable') {
    super(message, 503, 'SERVICE_UNAVAILABLE');
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Raised once at startup with every configuration problem found.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
