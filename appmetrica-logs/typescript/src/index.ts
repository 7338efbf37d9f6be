/**
 * AppMetrica Logs Export Module
 *
 * Client for the AppMetrica Logs API export endpoint.
 *
 * ## Features
 *
 * - Field defaulting from the built-in `events` and `installations` schemas
 * - Date range handling for date-scoped resources
 * - CSV (raw text) and JSON (parsed) payloads
 * - Polling with exponential backoff while an export is being prepared
 * - Retry budget, deadline and AbortSignal cancellation
 *
 * ## Quick Start
 *
 * ```typescript
 * import { AppMetricaClient } from 'appmetrica-logs-export';
 *
 * const client = new AppMetricaClient(process.env.APPMETRICA_TOKEN ?? '');
 *
 * const csv = await client.export(
 *   'events',
 *   '1234567',
 *   ['event_name', 'event_datetime'],
 *   new Date('2024-01-01T00:00:00'),
 *   new Date('2024-01-31T23:59:59'),
 *   { acceptEncoding: 'gzip' }
 * );
 * ```
 *
 * @module appmetrica-logs-export
 */

// Client
export {
  AppMetricaClient,
  formatExportDate,
  type AppMetricaClientOptions,
  type DateInput,
  type ExportFormat,
  type ExportOptions,
  type PreparedExport,
  type QueryValue,
} from './client/index.js';

// Configuration
export {
  APPMETRICA_EXPORT_BASE_URL,
  DEFAULT_POLLING_CONFIG,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  AppMetricaConfigBuilder,
  SecretString,
  validateConfig,
  type AppMetricaConfig,
  type PollingConfig,
} from './config/index.js';

// Errors
export {
  AppMetricaErrorCode,
  AppMetricaError,
  ClientError,
  ValidationError,
  ConfigurationError,
  ResourceNotExportableError,
  MissingDateRangeError,
  NetworkError,
  ResponseParseError,
  ApiError,
  ExportTimeoutError,
  ExportCancelledError,
  isAppMetricaError,
  isClientError,
  type AppMetricaErrorOptions,
} from './errors/index.js';

// Observability
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  redactSensitive,
  type LogContext,
  type LogEntry,
  type Logger,
  type MetricsCollector,
} from './observability/index.js';

// Resilience
export {
  PREPARING_STATUSES,
  PollingExecutor,
  calculateBackoffDelay,
  createPollingExecutor,
  sleep,
  type PollingHooks,
} from './resilience/index.js';

// Resource registry
export {
  ExportResource,
  EXPORTABLE_RESOURCES,
  DATE_RANGE_EXEMPT_RESOURCES,
  getResourceFields,
  hasResourceSchema,
  isExportableResource,
  listSchemaResources,
  requiresDateRange,
} from './schemas/index.js';

// Transport
export {
  HttpTransport,
  buildUrl,
  type ExportHttpRequest,
  type ExportHttpResponse,
  type HttpTransportConfig,
  type QueryParams,
} from './transport/index.js';
