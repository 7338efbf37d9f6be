/**
 * Tests for the resource registry.
 */

import { describe, it, expect } from 'vitest';
import {
  DATE_RANGE_EXEMPT_RESOURCES,
  EXPORTABLE_RESOURCES,
  ExportResource,
  getResourceFields,
  hasResourceSchema,
  isExportableResource,
  listSchemaResources,
  requiresDateRange,
} from '../index.js';

describe('resource registry', () => {
  it('should ship schemas for events and installations', () => {
    expect(listSchemaResources()).toEqual(['events', 'installations']);
    expect(hasResourceSchema('events')).toBe(true);
    expect(hasResourceSchema('clicks')).toBe(false);
  });

  it('should keep the events field order', () => {
    const fields = getResourceFields('events');

    expect(fields).toHaveLength(32);
    expect(fields?.slice(0, 3)).toEqual(['event_datetime', 'event_json', 'event_name']);
    expect(fields?.[fields.length - 1]).toBe('application_id');
  });

  it('should keep the installations field order', () => {
    const fields = getResourceFields('installations');

    expect(fields).toHaveLength(40);
    expect(fields?.slice(0, 3)).toEqual(['application_id', 'click_datetime', 'click_id']);
    expect(fields?.[fields.length - 1]).toBe('app_version_name');
  });

  it('should not contain duplicate fields', () => {
    for (const resource of listSchemaResources()) {
      const fields = getResourceFields(resource) ?? [];
      expect(new Set(fields).size).toBe(fields.length);
    }
  });

  it('should return frozen field lists', () => {
    expect(Object.isFrozen(getResourceFields('events'))).toBe(true);
  });

  it('should return undefined for resources without a schema', () => {
    expect(getResourceFields('crashes')).toBeUndefined();
    expect(getResourceFields('unknown')).toBeUndefined();
  });

  it('should treat every named resource as exportable', () => {
    expect(EXPORTABLE_RESOURCES.size).toBe(Object.keys(ExportResource).length);
    expect(isExportableResource(ExportResource.SessionsStarts)).toBe(true);
    expect(isExportableResource('page_views')).toBe(false);
  });

  it('should exempt only snapshot resources from the date range', () => {
    expect([...DATE_RANGE_EXEMPT_RESOURCES]).toEqual(['profiles', 'push_tokens']);
    expect(requiresDateRange('events')).toBe(true);
    expect(requiresDateRange('profiles')).toBe(false);
    expect(requiresDateRange('push_tokens')).toBe(false);
    expect(requiresDateRange('unknown')).toBe(true);
  });
});
