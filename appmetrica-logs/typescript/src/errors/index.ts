/**
 * AppMetrica error types.
 *
 * Client errors cover everything that goes wrong on this side of the wire
 * (bad input, unknown resources, connection failures, undecodable bodies).
 * API errors carry the raw body returned by the Logs API. Timeouts and
 * cancellations end the polling loop.
 */

/**
 * Error codes for AppMetrica errors.
 */
export enum AppMetricaErrorCode {
  // Client-side
  ClientError = 'CLIENT_ERROR',
  ValidationError = 'VALIDATION_ERROR',
  ConfigurationError = 'CONFIGURATION_ERROR',
  ResourceNotExportable = 'RESOURCE_NOT_EXPORTABLE',
  MissingDateRange = 'MISSING_DATE_RANGE',
  NetworkError = 'NETWORK_ERROR',
  ResponseParseError = 'RESPONSE_PARSE_ERROR',

  // Server-side
  ApiError = 'API_ERROR',

  // Polling
  ExportTimeout = 'EXPORT_TIMEOUT',
  ExportCancelled = 'EXPORT_CANCELLED',
}

/**
 * Options accepted by every AppMetrica error.
 */
export interface AppMetricaErrorOptions {
  code: AppMetricaErrorCode;
  message: string;
  /** HTTP status code (if applicable) */
  statusCode?: number;
  /** Additional error details */
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base AppMetrica error class.
 */
export class AppMetricaError extends Error {
  /** Error code */
  readonly code: AppMetricaErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: AppMetricaErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = 'AppMetricaError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

// ============================================================================
// Client Errors
// ============================================================================

/**
 * Local problem: bad input, unsupported resource or a failed connection.
 * Never retried.
 */
export class ClientError extends AppMetricaError {
  constructor(
    message: string,
    options: Partial<Omit<AppMetricaErrorOptions, 'message'>> = {}
  ) {
    super({
      code: options.code ?? AppMetricaErrorCode.ClientError,
      message,
      statusCode: options.statusCode,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'ClientError';
  }
}

/**
 * Export arguments failed validation.
 */
export class ValidationError extends ClientError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Validation failed: ${errors.join(', ')}`, {
      code: AppMetricaErrorCode.ValidationError,
      details: { errors },
    });
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * Client configuration is invalid.
 */
export class ConfigurationError extends ClientError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, {
      code: AppMetricaErrorCode.ConfigurationError,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * No fields were given and the resource has no known field schema.
 */
export class ResourceNotExportableError extends ClientError {
  readonly resource: string;

  constructor(resource: string) {
    super(
      `Resource "${resource}" is not exportable without an explicit field list`,
      {
        code: AppMetricaErrorCode.ResourceNotExportable,
        details: { resource },
      }
    );
    this.name = 'ResourceNotExportableError';
    this.resource = resource;
  }
}

/**
 * A date-scoped resource was exported without dateFrom and dateTo.
 */
export class MissingDateRangeError extends ClientError {
  readonly resource: string;
  readonly missing: string[];

  constructor(resource: string, missing: string[]) {
    super(
      `Resource "${resource}" requires a date range: missing ${missing.join(' and ')}`,
      {
        code: AppMetricaErrorCode.MissingDateRange,
        details: { resource, missing },
      }
    );
    this.name = 'MissingDateRangeError';
    this.resource = resource;
    this.missing = missing;
  }
}

/**
 * The request never produced an HTTP response (DNS, refused, reset, timeout).
 */
export class NetworkError extends ClientError {
  constructor(message: string, cause?: Error) {
    super(`Network error: ${message}`, {
      code: AppMetricaErrorCode.NetworkError,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * A JSON export body could not be parsed.
 */
export class ResponseParseError extends ClientError {
  constructor(message: string, cause?: Error) {
    super(`Failed to parse export response: ${message}`, {
      code: AppMetricaErrorCode.ResponseParseError,
      cause,
    });
    this.name = 'ResponseParseError';
  }
}

// ============================================================================
// API Errors
// ============================================================================

/**
 * The Logs API answered with a status other than 200, 201 or 202.
 */
export class ApiError extends AppMetricaError {
  /** Raw response body */
  readonly body: string;

  constructor(statusCode: number, body: string) {
    super({
      code: AppMetricaErrorCode.ApiError,
      message: body ? `HTTP ${statusCode}: ${body}` : `HTTP ${statusCode}`,
      statusCode,
      details: { body },
    });
    this.name = 'ApiError';
    this.body = body;
  }
}

// ============================================================================
// Polling Errors
// ============================================================================

/**
 * The export stayed in the preparing state past the retry or time budget.
 */
export class ExportTimeoutError extends AppMetricaError {
  constructor(retries: number, elapsedMs: number, reason: 'max_retries' | 'deadline') {
    super({
      code: AppMetricaErrorCode.ExportTimeout,
      message:
        reason === 'max_retries'
          ? `Export not ready after ${retries} retries (${elapsedMs}ms)`
          : `Export not ready before deadline (${elapsedMs}ms, ${retries} retries)`,
      details: { retries, elapsedMs, reason },
    });
    this.name = 'ExportTimeoutError';
  }
}

/**
 * The caller aborted the export between polls.
 */
export class ExportCancelledError extends AppMetricaError {
  constructor(retries: number, cause?: Error) {
    super({
      code: AppMetricaErrorCode.ExportCancelled,
      message: `Export cancelled after ${retries} retries`,
      details: { retries },
      cause,
    });
    this.name = 'ExportCancelledError';
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Checks if an error is an AppMetrica error.
 */
export function isAppMetricaError(error: unknown): error is AppMetricaError {
  return error instanceof AppMetricaError;
}

/**
 * Checks if an error is a client-side error.
 */
export function isClientError(error: unknown): error is ClientError {
  return error instanceof ClientError;
}
