/**
 * AppMetrica Logs API export client.
 *
 * Builds export requests, drives the prepare-then-download polling loop and
 * decodes the payload.
 */

import { z } from 'zod';
import { type AppMetricaConfig, AppMetricaConfigBuilder } from '../config/index.js';
import {
  AppMetricaError,
  MissingDateRangeError,
  ResourceNotExportableError,
  ResponseParseError,
  ValidationError,
} from '../errors/index.js';
import {
  type Logger,
  MetricNames,
  type MetricsCollector,
  NoopLogger,
  NoopMetricsCollector,
} from '../observability/index.js';
import { PollingExecutor } from '../resilience/polling.js';
import {
  getResourceFields,
  isExportableResource,
  requiresDateRange,
} from '../schemas/index.js';
import {
  type ExportHttpRequest,
  HttpTransport,
  type QueryParams,
  buildUrl,
} from '../transport/index.js';

// ============================================================================
// Parameter Types
// ============================================================================

/**
 * Payload format, selected by the URL suffix.
 */
export type ExportFormat = 'csv' | 'json';

/**
 * A date boundary: a Date (formatted in local time) or a string already in
 * `yyyy-MM-dd HH:mm:ss` form.
 */
export type DateInput = Date | string;

/**
 * Value of an extra query parameter. `undefined` drops the parameter.
 */
export type QueryValue = string | number | boolean | undefined;

/**
 * Export options. Keys other than the ones listed are forwarded verbatim as
 * query parameters (e.g. `date_dimension`, `use_utf8_bom`).
 */
export interface ExportOptions {
  /** Payload format. Default: csv */
  exportFormat?: ExportFormat;
  /** Forwarded as Cache-Control; `no-cache` asks for a freshly built file */
  cacheControl?: string;
  /** Forwarded as Accept-Encoding, e.g. `gzip` */
  acceptEncoding?: string;
  /** Aborts the export between polls */
  signal?: AbortSignal;
  [param: string]: QueryValue | AbortSignal;
}

/**
 * A fully assembled export request, before dispatch.
 */
export interface PreparedExport extends ExportHttpRequest {
  resource: string;
  format: ExportFormat;
}

/**
 * Client options.
 */
export interface AppMetricaClientOptions {
  /** Logger instance */
  logger?: Logger;
  /** Metrics collector instance */
  metrics?: MetricsCollector;
}

// ============================================================================
// Validation
// ============================================================================

const RESERVED_OPTIONS = new Set(['exportFormat', 'cacheControl', 'acceptEncoding', 'signal']);

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

const exportArgsSchema = z.object({
  resource: z.string().regex(/^[a-z_]+$/, 'must be a lowercase resource name'),
  applicationId: z.string().trim().min(1, 'is required'),
  fields: z
    .array(z.string().trim().min(1, 'must not contain empty names'))
    .min(1, 'must not be empty')
    .optional(),
  exportFormat: z.enum(['csv', 'json']).default('csv'),
  cacheControl: z.string().min(1).optional(),
  acceptEncoding: z.string().min(1).optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * Whether the captured parts name a real calendar date and time of day.
 * Checked arithmetically: the string is a wall-clock time, not an instant.
 */
function isValidDateParts(parts: number[]): boolean {
  const [year, month, day, hours, minutes, seconds] = parts;
  if (month < 1 || month > 12) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day >= 1 && day <= daysInMonth && hours <= 23 && minutes <= 59 && seconds <= 59;
}

/**
 * Formats a date boundary as `yyyy-MM-dd HH:mm:ss`.
 * @throws ValidationError on an invalid Date, a malformed string or a string
 *   naming a day or time that does not exist
 */
export function formatExportDate(value: DateInput, name: string): string {
  if (typeof value === 'string') {
    const match = DATE_PATTERN.exec(value);
    if (!match) {
      throw new ValidationError([`${name}: must match yyyy-MM-dd HH:mm:ss`]);
    }
    if (!isValidDateParts(match.slice(1).map(Number))) {
      throw new ValidationError([`${name}: ${value} is not a valid date`]);
    }
    return value;
  }

  if (Number.isNaN(value.getTime())) {
    throw new ValidationError([`${name}: invalid date`]);
  }

  return (
    `${pad(value.getFullYear(), 4)}-${pad(value.getMonth() + 1)}-${pad(value.getDate())} ` +
    `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`
  );
}

// ============================================================================
// AppMetrica Client
// ============================================================================

/**
 * Logs API export client.
 *
 * Holds only immutable state, so one instance can run any number of exports
 * concurrently; each export runs its own polling loop.
 */
export class AppMetricaClient {
  private readonly config: AppMetricaConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(tokenOrConfig: string | AppMetricaConfig, options: AppMetricaClientOptions = {}) {
    this.config =
      typeof tokenOrConfig === 'string'
        ? new AppMetricaConfigBuilder().withToken(tokenOrConfig).build()
        : tokenOrConfig;
    this.transport = new HttpTransport({
      timeoutMs: this.config.requestTimeoutMs,
      fetch: this.config.fetch,
    });
    this.logger = (options.logger ?? new NoopLogger()).child({ component: 'appmetrica' });
    this.metrics = options.metrics ?? new NoopMetricsCollector();
  }

  /**
   * Creates a client configured from APPMETRICA_* environment variables.
   */
  static fromEnv(options: AppMetricaClientOptions = {}): AppMetricaClient {
    return new AppMetricaClient(AppMetricaConfigBuilder.fromEnv().build(), options);
  }

  /**
   * Gets the configuration.
   */
  get configuration(): AppMetricaConfig {
    return this.config;
  }

  /**
   * Exports a resource.
   *
   * @param resource - Resource name, e.g. `events`
   * @param applicationId - AppMetrica application ID
   * @param fields - Fields to select; defaults to every known field of the resource
   * @param dateFrom - Start of the interval (required unless profiles/push_tokens)
   * @param dateTo - End of the interval (required unless profiles/push_tokens)
   * @param options - Format, headers, cancellation and extra query parameters
   * @returns CSV text, or the parsed document for `exportFormat: 'json'`
   */
  export(
    resource: string,
    applicationId: string,
    fields?: readonly string[],
    dateFrom?: DateInput,
    dateTo?: DateInput,
    options?: ExportOptions & { exportFormat?: 'csv' }
  ): Promise<string>;
  export(
    resource: string,
    applicationId: string,
    fields: readonly string[] | undefined,
    dateFrom: DateInput | undefined,
    dateTo: DateInput | undefined,
    options: ExportOptions & { exportFormat: 'json' }
  ): Promise<unknown>;
  export(
    resource: string,
    applicationId: string,
    fields?: readonly string[],
    dateFrom?: DateInput,
    dateTo?: DateInput,
    options?: ExportOptions
  ): Promise<unknown>;
  async export(
    resource: string,
    applicationId: string,
    fields?: readonly string[],
    dateFrom?: DateInput,
    dateTo?: DateInput,
    options: ExportOptions = {}
  ): Promise<unknown> {
    const prepared = this.buildExportRequest(resource, applicationId, fields, dateFrom, dateTo, options);
    const log = this.logger.child({ resource: prepared.resource, applicationId });
    const labels = { resource: prepared.resource, format: prepared.format };
    const startTime = Date.now();

    log.debug('Dispatching export', {
      url: buildUrl(prepared.url, prepared.query),
      cacheControl: options.cacheControl,
      acceptEncoding: options.acceptEncoding,
    });
    this.metrics.incrementCounter(MetricNames.EXPORTS_TOTAL, 1, labels);

    const executor = new PollingExecutor(this.config.polling, {
      onPending: (retry, status, delayMs) => {
        this.metrics.incrementCounter(MetricNames.EXPORT_POLLS, 1, labels);
        log.info('Export is being prepared', { retry, status, delayMs });
      },
    });

    try {
      const response = await executor.execute(() => this.transport.get(prepared), options.signal);
      const result = this.decode(response.body, prepared.format);
      const durationMs = Date.now() - startTime;

      this.metrics.incrementCounter(MetricNames.EXPORTS_SUCCESS, 1, labels);
      this.metrics.recordHistogram(MetricNames.EXPORT_LATENCY, durationMs / 1000, labels);
      log.info('Export ready', { bytes: Buffer.byteLength(response.body), durationMs });

      return result;
    } catch (error) {
      const durationMs = Date.now() - startTime;
      this.metrics.incrementCounter(MetricNames.EXPORTS_FAILED, 1, labels);
      this.metrics.recordHistogram(MetricNames.EXPORT_LATENCY, durationMs / 1000, labels);
      log.error('Export failed', {
        code: error instanceof AppMetricaError ? error.code : 'unknown',
        error: error instanceof Error ? error.message : String(error),
        durationMs,
      });
      throw error;
    }
  }

  /**
   * Validates the arguments and assembles the request without sending it.
   *
   * @throws ValidationError on malformed arguments
   * @throws ResourceNotExportableError when no fields are given and the
   *   resource has no known schema
   * @throws MissingDateRangeError when a date-scoped resource lacks a bound
   */
  buildExportRequest(
    resource: string,
    applicationId: string,
    fields?: readonly string[],
    dateFrom?: DateInput,
    dateTo?: DateInput,
    options: ExportOptions = {}
  ): PreparedExport {
    const parsed = exportArgsSchema.safeParse({
      resource,
      applicationId,
      fields,
      exportFormat: options.exportFormat,
      cacheControl: options.cacheControl,
      acceptEncoding: options.acceptEncoding,
    });
    if (!parsed.success) {
      throw new ValidationError(formatIssues(parsed.error));
    }
    const args = parsed.data;

    const url = `${this.config.baseUrl}/${args.resource}.${args.exportFormat}`;

    const fieldList = args.fields ?? getResourceFields(args.resource);
    if (!fieldList) {
      throw new ResourceNotExportableError(args.resource);
    }
    if (args.fields && !isExportableResource(args.resource)) {
      this.logger.warn('Resource is not a known export resource', { resource: args.resource });
    }

    const headers: Record<string, string> = {
      Authorization: `OAuth ${this.config.token.expose()}`,
      'User-Agent': this.config.userAgent,
    };
    if (args.cacheControl) {
      headers['Cache-Control'] = args.cacheControl;
    }
    if (args.acceptEncoding) {
      headers['Accept-Encoding'] = args.acceptEncoding;
    }

    const query: QueryParams = {
      application_id: args.applicationId,
      fields: fieldList.join(','),
      ...this.passThroughParams(options),
    };

    const dates = this.resolveDateRange(args.resource, dateFrom, dateTo);
    if (dates.since !== undefined) {
      query.date_since = dates.since;
    }
    if (dates.until !== undefined) {
      query.date_until = dates.until;
    }

    return { resource: args.resource, format: args.exportFormat, url, query, headers };
  }

  /**
   * Collects the options that are not consumed as format, headers or signal.
   */
  private passThroughParams(options: ExportOptions): QueryParams {
    const params: QueryParams = {};
    const invalid: string[] = [];

    for (const [key, value] of Object.entries(options)) {
      if (RESERVED_OPTIONS.has(key) || value === undefined) {
        continue;
      }
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        params[key] = String(value);
      } else {
        invalid.push(`${key}: must be a string, number or boolean`);
      }
    }

    if (invalid.length > 0) {
      throw new ValidationError(invalid);
    }
    return params;
  }

  /**
   * Formats the date bounds of a date-scoped resource. Snapshot resources
   * never carry date_since/date_until, so any bounds given are dropped.
   */
  private resolveDateRange(
    resource: string,
    dateFrom?: DateInput,
    dateTo?: DateInput
  ): { since?: string; until?: string } {
    if (!requiresDateRange(resource)) {
      return {};
    }

    if (dateFrom === undefined || dateTo === undefined) {
      const missing: string[] = [];
      if (dateFrom === undefined) missing.push('dateFrom');
      if (dateTo === undefined) missing.push('dateTo');
      throw new MissingDateRangeError(resource, missing);
    }

    const since = formatExportDate(dateFrom, 'dateFrom');
    const until = formatExportDate(dateTo, 'dateTo');
    // Fixed-width format, so string order is chronological order.
    if (since > until) {
      throw new ValidationError([`dateFrom: ${since} is after dateTo ${until}`]);
    }
    return { since, until };
  }

  private decode(body: string, format: ExportFormat): unknown {
    if (format === 'csv') {
      return body;
    }
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (error) {
      throw new ResponseParseError(
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }
  }
}
