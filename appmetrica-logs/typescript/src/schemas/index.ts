/**
 * Resource registry for the Logs API export endpoint.
 *
 * Two concerns are kept apart: which resources the API exports at all, and
 * which of them have a known field schema for field defaulting.
 */

import { z } from 'zod';
import resourceData from './resources.json' with { type: 'json' };

/**
 * Resource names accepted by the export endpoint.
 */
export const ExportResource = {
  Clicks: 'clicks',
  Postbacks: 'postbacks',
  Installations: 'installations',
  Events: 'events',
  SessionsStarts: 'sessions_starts',
  Crashes: 'crashes',
  Errors: 'errors',
  Deeplinks: 'deeplinks',
  Profiles: 'profiles',
  PushTokens: 'push_tokens',
  RevenueEvents: 'revenue_events',
  EcommerceEvents: 'ecommerce_events',
  AdRevenueEvents: 'ad_revenue_events',
} as const;

export type ExportResource = (typeof ExportResource)[keyof typeof ExportResource];

/**
 * Every resource the endpoint is known to export.
 */
export const EXPORTABLE_RESOURCES: ReadonlySet<string> = new Set(Object.values(ExportResource));

/**
 * Resources exported as a snapshot, without date_since/date_until.
 */
export const DATE_RANGE_EXEMPT_RESOURCES: ReadonlySet<string> = new Set<string>([
  ExportResource.Profiles,
  ExportResource.PushTokens,
]);

const resourceSchemaFile = z.record(
  z.string().regex(/^[a-z_]+$/),
  z.array(z.string().regex(/^[a-z0-9_]+$/)).nonempty()
);

const RESOURCE_SCHEMAS: ReadonlyMap<string, readonly string[]> = new Map(
  Object.entries(resourceSchemaFile.parse(resourceData)).map(
    ([resource, fields]) => [resource, Object.freeze([...fields])] as const
  )
);

/**
 * Returns the ordered field names for a resource, or undefined when the
 * resource has no known schema.
 */
export function getResourceFields(resource: string): readonly string[] | undefined {
  return RESOURCE_SCHEMAS.get(resource);
}

export function hasResourceSchema(resource: string): boolean {
  return RESOURCE_SCHEMAS.has(resource);
}

/**
 * Resources with a known field schema, in file order.
 */
export function listSchemaResources(): string[] {
  return [...RESOURCE_SCHEMAS.keys()];
}

export function isExportableResource(resource: string): boolean {
  return EXPORTABLE_RESOURCES.has(resource);
}

/**
 * Whether exporting the resource needs both date_since and date_until.
 */
export function requiresDateRange(resource: string): boolean {
  return !DATE_RANGE_EXEMPT_RESOURCES.has(resource);
}
