/**
 * @fileoverview Remote Record Store Contract
 *
 * The engine never talks to a backend directly. It consumes a
 * {@link RemoteRecordStore}: an opaque record store with save / fetch /
 * query / delete / subscribe operations and an eventually-consistent change
 * feed. `supabase/recordStore.ts` implements it over PostgREST.
 *
 * Adapters report failures by throwing {@link SyncError}s (see `errors.ts`);
 * per-record save failures are returned, not thrown.
 */

import type { SyncError } from './errors';
import type { FieldValue, RemoteRecord, SyncEntity } from './types';
import { fieldValuesEqual } from './utils';

export type AccountStatus = 'available' | 'noAccount' | 'restricted' | 'unknown';

/**
 * `changedKeysOnly` writes only the fields present in the outgoing record's
 * `changedKeys`, leaving fields the client never touched as the server has
 * them.
 */
export type SavePolicy = 'changedKeysOnly' | 'allKeys';

/** Outgoing record. `recordID` is null for records the server has not seen. */
export interface OutgoingRecord {
  recordID: string | null;
  uuid: string;
  entityType: string;
  fields: RemoteRecord['fields'];
  fieldModifiedAt: Record<string, string>;
  lastModified: string;
  /** Change tag the client last saw; a mismatch is a `serverRecordChanged` failure. */
  changeTag: string | null;
  /** Field names changed locally since the last sync. */
  changedKeys: string[];
}

export type SaveOutcome =
  | { uuid: string; ok: true; record: RemoteRecord }
  | { uuid: string; ok: false; error: SyncError };

export interface RecordQuery {
  /** Return only records with `lastModified` strictly after this ISO time. */
  modifiedAfter: string;
  entityTypes?: string[];
}

export interface QueryPage {
  records: RemoteRecord[];
  /** Opaque continuation token, null when there are no further pages. */
  nextCursor: string | null;
}

export interface SubscriptionHandle {
  unsubscribe(): Promise<void>;
}

export interface RemoteRecordStore {
  /** Stable identifier, used to key the download watermark. */
  readonly id: string;
  accountStatus(): Promise<AccountStatus>;
  saveRecords(batch: OutgoingRecord[], savePolicy: SavePolicy): Promise<SaveOutcome[]>;
  queryRecords(query: RecordQuery, cursor: string | null, limit: number): Promise<QueryPage>;
  /** Throws `SyncError('unknownItem')` when the record does not exist. */
  fetchRecord(recordID: string): Promise<RemoteRecord>;
  deleteRecords(recordIDs: string[]): Promise<void>;
  subscribe(query: Omit<RecordQuery, 'modifiedAfter'>, onChange: (record: RemoteRecord) => void): Promise<SubscriptionHandle>;
  /** Recreate a deleted zone/container. Optional. */
  createZone?(): Promise<void>;
}

// =============================================================================
// Entity ⇄ Record Conversion
// =============================================================================

/** String arrays only ever hold set fields, so they compare without order. */
function sameValue(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    const members = new Set(b);
    return new Set(a).size === members.size && a.every((v) => members.has(v));
  }
  return fieldValuesEqual(a, b);
}

/**
 * Fields changed locally relative to the last agreed snapshot, including
 * fields the base has and the entity no longer does. Without a base every
 * field counts as changed.
 */
export function changedKeysOf(entity: SyncEntity): string[] {
  if (!entity.base) return Object.keys(entity.fields);
  const base = entity.base;
  const keys = new Set([...Object.keys(entity.fields), ...Object.keys(base)]);
  return [...keys].filter((key) => !sameValue(entity.fields[key], base[key]));
}

export function toOutgoingRecord(entity: SyncEntity): OutgoingRecord {
  return {
    recordID: entity.recordID,
    uuid: entity.uuid,
    entityType: entity.entityType,
    fields: entity.fields,
    fieldModifiedAt: entity.fieldModifiedAt,
    lastModified: entity.lastModified,
    changeTag: entity.changeTag,
    changedKeys: changedKeysOf(entity)
  };
}

/** View a remote record as an entity, without touching local state. */
export function recordToEntity(record: RemoteRecord): SyncEntity {
  return {
    uuid: record.uuid,
    entityType: record.entityType,
    recordID: record.recordID,
    fields: record.fields,
    fieldModifiedAt: record.fieldModifiedAt,
    base: record.fields,
    syncStatus: 'synced',
    lastModified: record.lastModified,
    changeTag: record.changeTag,
    conflictResolutionNeeded: false,
    lastError: null
  };
}
