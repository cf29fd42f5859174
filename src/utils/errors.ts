/**
 * Error types and codes for content-safety-kit.
 * All errors raised by the toolkit extend ContentSafetyError.
 */

/**
 * Base error class for all toolkit errors.
 */
export class ContentSafetyError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ContentSafetyError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, missing credentials).
 */
export class ConfigError extends ContentSafetyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Caller supplied a request the service would reject.
 */
export class InputError extends ContentSafetyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InputError';
  }
}

/**
 * Failure reported by, or while talking to, the content safety service.
 */
export class ServiceError extends ContentSafetyError {
  readonly status?: number;
  readonly serviceCode?: string;
  readonly endpoint?: string;

  constructor(
    code: string,
    message: string,
    details: Record<string, unknown> & { status?: number; serviceCode?: string; endpoint?: string } = {}
  ) {
    super(code, message, details);
    this.name = 'ServiceError';
    this.status = details.status;
    this.serviceCode = details.serviceCode;
    this.endpoint = details.endpoint;
  }

  /** 429 and 5xx are worth retrying against another endpoint. */
  get retryable(): boolean {
    return this.status === undefined || this.status === 429 || this.status >= 500;
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends ContentSafetyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  MISSING_CREDENTIAL: 'MISSING_CREDENTIAL',
  NO_ENDPOINT: 'NO_ENDPOINT',

  // Input validation
  INVALID_INPUT: 'INVALID_INPUT',
  TEXT_TOO_LONG: 'TEXT_TOO_LONG',
  IMAGE_TOO_LARGE: 'IMAGE_TOO_LARGE',
  BLOCKLIST_ITEM_TOO_LONG: 'BLOCKLIST_ITEM_TOO_LONG',

  // Service
  SERVICE_ERROR: 'SERVICE_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INVALID_RESPONSE: 'INVALID_RESPONSE',

  // System
  PARSE_ERROR: 'PARSE_ERROR',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
