/**
 * @fileoverview Supabase Remote Record Store
 *
 * {@link RemoteRecordStore} over a single PostgREST table. Every synced
 * entity is one row:
 *
 * ```sql
 * create table sync_records (
 *   record_id         uuid primary key default gen_random_uuid(),
 *   uuid              uuid unique not null,
 *   entity_type       text not null,
 *   fields            jsonb not null,
 *   field_modified_at jsonb not null default '{}',
 *   last_modified     timestamptz not null,
 *   change_tag        uuid not null,
 *   deleted           boolean not null default false
 * );
 * ```
 *
 * Optimistic concurrency is a compare-and-swap on `change_tag`: every write
 * sets a fresh tag and is filtered on the tag the client last saw. A write
 * that matches no row means somebody else got there first and surfaces as
 * `serverRecordChanged`.
 *
 * Every query uses `.select()` so that a write silently blocked by RLS (no
 * error, zero rows) is detected instead of being treated as success.
 */

import { randomUUID } from 'node:crypto';
import type { RealtimeChannel, SupabaseClient } from '@supabase/supabase-js';
import { debugLog, debugWarn } from '../debug';
import { SyncError, toSyncError } from '../errors';
import type {
  AccountStatus,
  OutgoingRecord,
  QueryPage,
  RecordQuery,
  RemoteRecordStore,
  SaveOutcome,
  SavePolicy,
  SubscriptionHandle
} from '../remote';
import type { EntityFields, FieldValue, RemoteRecord } from '../types';

export interface SupabaseRecordStoreOptions {
  client: SupabaseClient;
  /** Table holding the records. Default: `'sync_records'`. */
  table?: string;
  /** Watermark key for this store. Default: `'supabase:<table>'`. */
  id?: string;
}

interface PostgrestFailure {
  message: string;
  details?: string | null;
  hint?: string | null;
  code?: string;
}

/** Re-shape a PostgREST error so {@link toSyncError} can see the HTTP status. */
function failure(error: PostgrestFailure, status: number, uuid?: string): SyncError {
  return toSyncError(
    { message: error.message, details: error.details, hint: error.hint, code: error.code, status },
    uuid
  );
}

// =============================================================================
// Row Parsing
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFieldValue(value: unknown): value is FieldValue {
  if (value === null || typeof value === 'string' || typeof value === 'number') return true;
  if (Array.isArray(value)) return value.every((v) => typeof v === 'string');
  // Coordinates and numeric maps are both plain objects of numbers
  return isObject(value) && Object.values(value).every((v) => typeof v === 'number');
}

function parseFields(value: unknown): EntityFields | null {
  if (!isObject(value)) return null;
  const fields: EntityFields = {};
  for (const [key, v] of Object.entries(value)) {
    if (!isFieldValue(v)) return null;
    fields[key] = v;
  }
  return fields;
}

function parseStringMap(value: unknown): Record<string, string> {
  if (!isObject(value)) return {};
  const out: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v === 'string') out[key] = v;
  }
  return out;
}

/** Convert a `sync_records` row to a {@link RemoteRecord}, or throw on a malformed row. */
export function rowToRecord(row: unknown): RemoteRecord {
  if (
    isObject(row) &&
    typeof row.record_id === 'string' &&
    typeof row.uuid === 'string' &&
    typeof row.entity_type === 'string' &&
    typeof row.last_modified === 'string'
  ) {
    const fields = parseFields(row.fields);
    if (fields) {
      return {
        recordID: row.record_id,
        uuid: row.uuid,
        entityType: row.entity_type,
        fields,
        fieldModifiedAt: parseStringMap(row.field_modified_at),
        lastModified: new Date(row.last_modified).toISOString(),
        changeTag: typeof row.change_tag === 'string' ? row.change_tag : null
      };
    }
  }
  throw new SyncError('serverRejectedRequest', 'Malformed record returned by the server');
}

function pickFields(fields: EntityFields, keys: string[]): EntityFields {
  const out: EntityFields = {};
  for (const key of keys) {
    if (key in fields) out[key] = fields[key];
  }
  return out;
}

// =============================================================================
// Store
// =============================================================================

export class SupabaseRecordStore implements RemoteRecordStore {
  readonly id: string;
  private readonly client: SupabaseClient;
  private readonly table: string;

  constructor(options: SupabaseRecordStoreOptions) {
    this.client = options.client;
    this.table = options.table ?? 'sync_records';
    this.id = options.id ?? `supabase:${this.table}`;
  }

  async accountStatus(): Promise<AccountStatus> {
    const { data, error } = await this.client.auth.getSession();
    if (error) {
      debugWarn('[REMOTE] getSession failed:', error.message);
      return 'unknown';
    }
    if (!data.session) return 'noAccount';
    const expiresAt = data.session.expires_at;
    if (expiresAt !== undefined && expiresAt * 1000 < Date.now()) return 'restricted';
    return 'available';
  }

  async saveRecords(batch: OutgoingRecord[], savePolicy: SavePolicy): Promise<SaveOutcome[]> {
    const outcomes: SaveOutcome[] = [];
    for (const record of batch) {
      try {
        const saved = record.recordID === null ? await this.insert(record) : await this.update(record, savePolicy);
        outcomes.push({ uuid: record.uuid, ok: true, record: saved });
      } catch (e) {
        outcomes.push({ uuid: record.uuid, ok: false, error: toSyncError(e, record.uuid) });
      }
    }

    // Nothing committed and every failure is transient: let the caller retry the whole batch
    const failures = outcomes.flatMap((o) => (o.ok ? [] : [o.error]));
    if (failures.length > 0 && failures.length === outcomes.length && failures.every((e) => e.retryable)) {
      throw failures[0];
    }
    return outcomes;
  }

  private async insert(record: OutgoingRecord): Promise<RemoteRecord> {
    const { data, error, status } = await this.client
      .from(this.table)
      .insert({
        uuid: record.uuid,
        entity_type: record.entityType,
        fields: record.fields,
        field_modified_at: record.fieldModifiedAt,
        last_modified: record.lastModified,
        change_tag: randomUUID(),
        deleted: false
      })
      .select('*')
      .maybeSingle();
    if (error) throw failure(error, status, record.uuid);
    if (!data) throw new SyncError('permissionFailure', 'Insert blocked by RLS', { entityUUID: record.uuid });
    return rowToRecord(data);
  }

  private async update(record: OutgoingRecord, savePolicy: SavePolicy): Promise<RemoteRecord> {
    const recordID = record.recordID ?? '';
    let fields = record.fields;
    let fieldModifiedAt = record.fieldModifiedAt;

    if (savePolicy === 'changedKeysOnly') {
      const current = await this.fetchRecord(recordID);
      if (current.changeTag !== record.changeTag) {
        throw new SyncError('serverRecordChanged', undefined, { entityUUID: record.uuid });
      }
      fields = { ...current.fields, ...pickFields(record.fields, record.changedKeys) };
      fieldModifiedAt = { ...current.fieldModifiedAt, ...record.fieldModifiedAt };
    }

    let query = this.client
      .from(this.table)
      .update({
        fields,
        field_modified_at: fieldModifiedAt,
        last_modified: record.lastModified,
        change_tag: randomUUID()
      })
      .eq('record_id', recordID);
    if (record.changeTag !== null) query = query.eq('change_tag', record.changeTag);

    const { data, error, status } = await query.select('*').maybeSingle();
    if (error) throw failure(error, status, record.uuid);
    // Zero rows: the change tag moved underneath us
    if (!data) throw new SyncError('serverRecordChanged', undefined, { entityUUID: record.uuid });
    return rowToRecord(data);
  }

  async queryRecords(query: RecordQuery, cursor: string | null, limit: number): Promise<QueryPage> {
    const offset = cursor === null ? 0 : Number(cursor);
    if (!Number.isInteger(offset) || offset < 0) {
      throw new SyncError('changeTokenExpired', `Invalid query cursor: ${cursor}`);
    }

    let request = this.client
      .from(this.table)
      .select('*')
      .gt('last_modified', query.modifiedAfter)
      .eq('deleted', false);
    if (query.entityTypes && query.entityTypes.length > 0) {
      request = request.in('entity_type', query.entityTypes);
    }

    const { data, error, status } = await request
      .order('last_modified', { ascending: true })
      .order('record_id', { ascending: true })
      .range(offset, offset + limit - 1);
    // Range past the end of a result set that shrank since the cursor was issued
    if (status === 416) throw new SyncError('changeTokenExpired');
    if (error) throw failure(error, status);

    const rows: unknown[] = data ?? [];
    const records = rows.map(rowToRecord);
    debugLog(`[REMOTE] Fetched ${records.length} record(s) after ${query.modifiedAfter}`);
    return { records, nextCursor: records.length === limit ? String(offset + limit) : null };
  }

  async fetchRecord(recordID: string): Promise<RemoteRecord> {
    const { data, error, status } = await this.client
      .from(this.table)
      .select('*')
      .eq('record_id', recordID)
      .eq('deleted', false)
      .maybeSingle();
    if (error) throw failure(error, status);
    if (!data) throw new SyncError('unknownItem', `Record not found: ${recordID}`);
    return rowToRecord(data);
  }

  async deleteRecords(recordIDs: string[]): Promise<void> {
    if (recordIDs.length === 0) return;
    const { error, status } = await this.client
      .from(this.table)
      .update({ deleted: true, last_modified: new Date().toISOString(), change_tag: randomUUID() })
      .in('record_id', recordIDs)
      .select('record_id');
    if (error) throw failure(error, status);
  }

  async subscribe(
    query: Omit<RecordQuery, 'modifiedAfter'>,
    onChange: (record: RemoteRecord) => void
  ): Promise<SubscriptionHandle> {
    const types = query.entityTypes ? new Set(query.entityTypes) : null;
    const channel: RealtimeChannel = this.client
      .channel(`${this.table}_changes`)
      .on('postgres_changes', { event: '*', schema: 'public', table: this.table }, (payload) => {
        try {
          const record = rowToRecord(payload.new);
          if (!types || types.has(record.entityType)) onChange(record);
        } catch (e) {
          debugWarn('[REMOTE] Ignoring malformed change payload:', e);
        }
      })
      .subscribe();

    return {
      unsubscribe: async () => {
        await this.client.removeChannel(channel);
      }
    };
  }
}
