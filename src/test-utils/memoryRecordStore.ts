/**
 * In-process {@link RemoteRecordStore} for tests. Behaves like the Supabase
 * adapter (change-tag compare-and-swap, changed-keys-only saves, offset
 * cursors) and lets a test inject failures and simulate other devices.
 */

import { SyncError } from '../errors';
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
import type { EntityFields, RemoteRecord } from '../types';

type Method = 'accountStatus' | 'saveRecords' | 'queryRecords' | 'fetchRecord';

export interface ServerWrite {
  uuid: string;
  entityType?: string;
  fields: EntityFields;
  lastModified: string;
  fieldModifiedAt?: Record<string, string>;
}

export class MemoryRecordStore implements RemoteRecordStore {
  readonly id: string;
  status: AccountStatus = 'available';
  zoneDeleted = false;

  readonly calls: Record<Method | 'createZone', number> = {
    accountStatus: 0,
    saveRecords: 0,
    queryRecords: 0,
    fetchRecord: 0,
    createZone: 0
  };
  /** Every batch passed to `saveRecords`, in call order. */
  readonly savedBatches: OutgoingRecord[][] = [];
  /** Every query passed to `queryRecords`, with its cursor. */
  readonly queries: Array<{ query: RecordQuery; cursor: string | null }> = [];

  private readonly records = new Map<string, RemoteRecord>();
  private readonly failures: Array<{ method: Method; error: SyncError }> = [];
  private readonly recordFailures = new Map<string, SyncError>();
  private readonly subscribers = new Set<(record: RemoteRecord) => void>();
  private expireNextQuery = false;
  private nextId = 0;
  private nextTag = 0;
  /** Runs inside `saveRecords` after the batch is committed, e.g. to cancel a cycle. */
  afterSave: ((batch: OutgoingRecord[]) => void) | null = null;

  constructor(id = 'memory') {
    this.id = id;
  }

  // ===========================================================================
  // Test controls
  // ===========================================================================

  /** Make the next `times` calls of `method` throw `error`. */
  failNext(method: Method, error: SyncError, times = 1): void {
    for (let i = 0; i < times; i++) this.failures.push({ method, error });
  }

  /** Make the next save of `uuid` fail with `error` while the rest of its batch commits. */
  failRecord(uuid: string, error: SyncError): void {
    this.recordFailures.set(uuid, error);
  }

  expireCursor(): void {
    this.expireNextQuery = true;
  }

  /** Write as another device would: creates or overwrites by uuid with a new change tag. */
  serverWrite(write: ServerWrite): RemoteRecord {
    const existing = this.findByUUID(write.uuid);
    const record: RemoteRecord = {
      recordID: existing?.recordID ?? this.newRecordID(),
      uuid: write.uuid,
      entityType: write.entityType ?? existing?.entityType ?? 'report',
      fields: structuredClone(write.fields),
      fieldModifiedAt:
        write.fieldModifiedAt ?? Object.fromEntries(Object.keys(write.fields).map((k) => [k, write.lastModified])),
      lastModified: write.lastModified,
      changeTag: this.newTag()
    };
    this.records.set(record.recordID, record);
    for (const subscriber of this.subscribers) subscriber(structuredClone(record));
    return structuredClone(record);
  }

  removeByUUID(uuid: string): void {
    const record = this.findByUUID(uuid);
    if (record) this.records.delete(record.recordID);
  }

  findByUUID(uuid: string): RemoteRecord | undefined {
    for (const record of this.records.values()) {
      if (record.uuid === uuid) return structuredClone(record);
    }
    return undefined;
  }

  get size(): number {
    return this.records.size;
  }

  private takeFailure(method: Method): void {
    const index = this.failures.findIndex((f) => f.method === method);
    if (index >= 0) {
      const [failure] = this.failures.splice(index, 1);
      throw failure.error;
    }
  }

  private newRecordID(): string {
    this.nextId++;
    return `rec-${this.nextId}`;
  }

  private newTag(): string {
    this.nextTag++;
    return `tag-${this.nextTag}`;
  }

  // ===========================================================================
  // RemoteRecordStore
  // ===========================================================================

  async accountStatus(): Promise<AccountStatus> {
    this.calls.accountStatus++;
    this.takeFailure('accountStatus');
    return this.status;
  }

  async saveRecords(batch: OutgoingRecord[], savePolicy: SavePolicy): Promise<SaveOutcome[]> {
    this.calls.saveRecords++;
    this.takeFailure('saveRecords');
    if (this.zoneDeleted) throw new SyncError('zoneNotFound');
    this.savedBatches.push(structuredClone(batch));

    const outcomes = batch.map((record) => this.saveOne(record, savePolicy));
    this.afterSave?.(batch);
    return outcomes;
  }

  private saveOne(record: OutgoingRecord, savePolicy: SavePolicy): SaveOutcome {
    const injected = this.recordFailures.get(record.uuid);
    if (injected) {
      this.recordFailures.delete(record.uuid);
      return { uuid: record.uuid, ok: false, error: injected };
    }

    if (record.recordID === null) {
      if (this.findByUUID(record.uuid)) {
        return { uuid: record.uuid, ok: false, error: new SyncError('serverRecordChanged', undefined, { entityUUID: record.uuid }) };
      }
      const created: RemoteRecord = {
        recordID: this.newRecordID(),
        uuid: record.uuid,
        entityType: record.entityType,
        fields: structuredClone(record.fields),
        fieldModifiedAt: { ...record.fieldModifiedAt },
        lastModified: record.lastModified,
        changeTag: this.newTag()
      };
      this.records.set(created.recordID, created);
      return { uuid: record.uuid, ok: true, record: structuredClone(created) };
    }

    const existing = this.records.get(record.recordID);
    if (!existing) {
      return { uuid: record.uuid, ok: false, error: new SyncError('unknownItem', undefined, { entityUUID: record.uuid }) };
    }
    if (existing.changeTag !== record.changeTag) {
      return { uuid: record.uuid, ok: false, error: new SyncError('serverRecordChanged', undefined, { entityUUID: record.uuid }) };
    }

    const fields: EntityFields =
      savePolicy === 'changedKeysOnly'
        ? {
            ...existing.fields,
            ...Object.fromEntries(record.changedKeys.filter((k) => k in record.fields).map((k) => [k, record.fields[k]]))
          }
        : record.fields;
    const updated: RemoteRecord = {
      ...existing,
      fields: structuredClone(fields),
      fieldModifiedAt: { ...existing.fieldModifiedAt, ...record.fieldModifiedAt },
      lastModified: record.lastModified,
      changeTag: this.newTag()
    };
    this.records.set(updated.recordID, updated);
    return { uuid: record.uuid, ok: true, record: structuredClone(updated) };
  }

  async queryRecords(query: RecordQuery, cursor: string | null, limit: number): Promise<QueryPage> {
    this.calls.queryRecords++;
    this.queries.push({ query: { ...query }, cursor });
    this.takeFailure('queryRecords');
    if (this.expireNextQuery) {
      this.expireNextQuery = false;
      throw new SyncError('changeTokenExpired');
    }

    const after = Date.parse(query.modifiedAfter);
    const matching = [...this.records.values()]
      .filter((r) => Date.parse(r.lastModified) > after)
      .filter((r) => !query.entityTypes || query.entityTypes.includes(r.entityType))
      .sort((a, b) => Date.parse(a.lastModified) - Date.parse(b.lastModified) || a.recordID.localeCompare(b.recordID));

    const offset = cursor === null ? 0 : Number(cursor);
    const records = matching.slice(offset, offset + limit).map((r) => structuredClone(r));
    const nextOffset = offset + records.length;
    return { records, nextCursor: nextOffset < matching.length ? String(nextOffset) : null };
  }

  async fetchRecord(recordID: string): Promise<RemoteRecord> {
    this.calls.fetchRecord++;
    this.takeFailure('fetchRecord');
    const record = this.records.get(recordID);
    if (!record) throw new SyncError('unknownItem', `Record not found: ${recordID}`);
    return structuredClone(record);
  }

  async deleteRecords(recordIDs: string[]): Promise<void> {
    for (const id of recordIDs) this.records.delete(id);
  }

  async subscribe(
    query: Omit<RecordQuery, 'modifiedAfter'>,
    onChange: (record: RemoteRecord) => void
  ): Promise<SubscriptionHandle> {
    const listener = (record: RemoteRecord) => {
      if (!query.entityTypes || query.entityTypes.includes(record.entityType)) onChange(record);
    };
    this.subscribers.add(listener);
    return {
      unsubscribe: async () => {
        this.subscribers.delete(listener);
      }
    };
  }

  async createZone(): Promise<void> {
    this.calls.createZone++;
    this.zoneDeleted = false;
    this.records.clear();
  }
}
