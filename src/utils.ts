/**
 * Common utility functions for sync engine internals and consumers.
 */

import { randomUUID } from 'node:crypto';
import type { Coordinate, EntityFields, FieldValue } from './types';

/**
 * Generate a UUID v4 (random UUID).
 */
export function generateId(): string {
  return randomUUID();
}

/** Later of two ISO timestamps; a null side loses. */
export function maxIso(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return Date.parse(a) >= Date.parse(b) ? a : b;
}

/**
 * Split `items` into chunks of at most `size` elements.
 */
export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// =============================================================================
// Field Value Guards
// =============================================================================

export function isStringArray(value: FieldValue | undefined): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

export function isCoordinate(value: FieldValue | undefined): value is Coordinate {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'latitude' in value &&
    'longitude' in value &&
    typeof value.latitude === 'number' &&
    typeof value.longitude === 'number'
  );
}

export function isNumericMap(value: FieldValue | undefined): value is Record<string, number> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !isCoordinate(value) &&
    Object.values(value).every((v) => typeof v === 'number')
  );
}

/** Structural equality for field values (order-sensitive for arrays). */
export function fieldValuesEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => v === b[i]);
  }
  if (isCoordinate(a) && isCoordinate(b)) {
    return a.latitude === b.latitude && a.longitude === b.longitude;
  }
  if (isNumericMap(a) && isNumericMap(b)) {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    for (const key of keys) {
      if (a[key] !== b[key]) return false;
    }
    return true;
  }
  return false;
}

export function cloneFields(fields: EntityFields): EntityFields {
  return structuredClone(fields);
}

// =============================================================================
// Calendar Helpers
// =============================================================================

/**
 * The next occurrence of `hour:00` local time strictly after `from`.
 */
export function nextLocalHour(from: Date, hour: number): Date {
  const next = new Date(from.getTime());
  next.setHours(hour, 0, 0, 0);
  if (next.getTime() <= from.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next;
}
