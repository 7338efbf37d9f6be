/**
 * Tests for error types.
 */

import { describe, it, expect } from 'vitest';
import {
  AppMetricaError,
  AppMetricaErrorCode,
  ApiError,
  ClientError,
  ConfigurationError,
  ExportCancelledError,
  ExportTimeoutError,
  MissingDateRangeError,
  NetworkError,
  ResourceNotExportableError,
  ResponseParseError,
  ValidationError,
  isAppMetricaError,
  isClientError,
} from '../index.js';

describe('client errors', () => {
  it('should share the ClientError base', () => {
    const errors = [
      new ValidationError(['applicationId: is required']),
      new ConfigurationError('OAuth token is required'),
      new ResourceNotExportableError('page_views'),
      new MissingDateRangeError('events', ['dateFrom']),
      new NetworkError('fetch failed'),
      new ResponseParseError('Unexpected end of JSON input'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(ClientError);
      expect(isClientError(error)).toBe(true);
      expect(isAppMetricaError(error)).toBe(true);
    }
  });

  it('should list every validation failure', () => {
    const error = new ValidationError(['applicationId: is required', 'fields: must not be empty']);

    expect(error.message).toBe(
      'Validation failed: applicationId: is required, fields: must not be empty'
    );
    expect(error.code).toBe(AppMetricaErrorCode.ValidationError);
    expect(error.errors).toHaveLength(2);
  });

  it('should name the resource that cannot be exported', () => {
    const error = new ResourceNotExportableError('page_views');

    expect(error.message).toBe(
      'Resource "page_views" is not exportable without an explicit field list'
    );
    expect(error.resource).toBe('page_views');
  });

  it('should name every missing date parameter', () => {
    const error = new MissingDateRangeError('events', ['dateFrom', 'dateTo']);

    expect(error.message).toBe(
      'Resource "events" requires a date range: missing dateFrom and dateTo'
    );
    expect(error.missing).toEqual(['dateFrom', 'dateTo']);
  });

  it('should keep the cause of a network error', () => {
    const cause = new TypeError('fetch failed');
    const error = new NetworkError('fetch failed', cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe(AppMetricaErrorCode.NetworkError);
  });
});

describe('ApiError', () => {
  it('should carry the status and raw body', () => {
    const error = new ApiError(400, 'Unknown field: foo');

    expect(error.message).toBe('HTTP 400: Unknown field: foo');
    expect(error.statusCode).toBe(400);
    expect(error.body).toBe('Unknown field: foo');
    expect(isClientError(error)).toBe(false);
    expect(isAppMetricaError(error)).toBe(true);
  });

  it('should omit an empty body from the message', () => {
    expect(new ApiError(500, '').message).toBe('HTTP 500');
  });

  it('should serialize to JSON', () => {
    expect(new ApiError(403, 'forbidden').toJSON()).toEqual({
      name: 'ApiError',
      code: 'API_ERROR',
      message: 'HTTP 403: forbidden',
      statusCode: 403,
      details: { body: 'forbidden' },
    });
  });
});

describe('polling errors', () => {
  it('should describe an exhausted retry budget', () => {
    const error = new ExportTimeoutError(30, 1200, 'max_retries');

    expect(error.message).toBe('Export not ready after 30 retries (1200ms)');
    expect(error.details).toEqual({ retries: 30, elapsedMs: 1200, reason: 'max_retries' });
  });

  it('should describe a passed deadline', () => {
    expect(new ExportTimeoutError(4, 90000, 'deadline').message).toBe(
      'Export not ready before deadline (90000ms, 4 retries)'
    );
  });

  it('should report cancellation', () => {
    const reason = new Error('shutting down');
    const error = new ExportCancelledError(3, reason);

    expect(error).toBeInstanceOf(AppMetricaError);
    expect(error.message).toBe('Export cancelled after 3 retries');
    expect(error.code).toBe(AppMetricaErrorCode.ExportCancelled);
    expect(error.cause).toBe(reason);
  });
});

describe('type guards', () => {
  it('should reject foreign errors', () => {
    expect(isAppMetricaError(new Error('boom'))).toBe(false);
    expect(isClientError('boom')).toBe(false);
  });
});
