/**
 * @fileoverview Entity Store
 *
 * Durable CRUD for syncable entities plus the sync-status queries the
 * orchestrator needs. Backed by the Dexie `entities` table.
 *
 * ## Single-writer discipline
 *
 * Every mutation is funneled through one serial executor per store instance
 * and runs inside a Dexie `rw` transaction. Reads are not serialized. The
 * store never merges concurrent writes on its own; callers that need a merge
 * (remote application, conflict resolution) compute it explicitly first and
 * then write the result.
 *
 * ## Status transitions
 *
 * - local create / edit            → `pendingUpload`
 * - upload acknowledged            → `synced` (base snapshot refreshed)
 * - remote record applied cleanly  → `synced`
 * - remote changed under local edit→ `conflict` + `conflictResolutionNeeded`
 * - non-retryable upload failure   → `error`
 */

import type Dexie from 'dexie';
import type { Table } from 'dexie';
import type { ResolvedConfig } from './config';
import { entitiesTable } from './database';
import { debugLog } from './debug';
import { ConflictResolutionError } from './errors';
import { recordToEntity } from './remote';
import type { EntityFields, RemoteRecord, SyncEntity } from './types';
import { cloneFields, fieldValuesEqual, generateId, maxIso } from './utils';

export type ApplyRemoteOutcome = 'created' | 'updated' | 'unchanged' | 'conflict';

export class EntityNotFoundError extends Error {
  constructor(public readonly uuid: string) {
    super(`Entity not found: ${uuid}`);
    this.name = 'EntityNotFoundError';
  }
}

export class EntityStore {
  private readonly table: Table<SyncEntity, string>;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly db: Dexie,
    private readonly config: Pick<ResolvedConfig, 'entityTypes'>,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.table = entitiesTable(db);
  }

  // ===========================================================================
  // Serial execution
  // ===========================================================================

  /**
   * Run `task` after every previously scheduled mutation has settled, inside
   * a read-write transaction on the entities table.
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.db.transaction('rw', this.table, task));
    // The chain must keep going after a failed task; the caller still sees the rejection via `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private nowIso(): string {
    return this.clock().toISOString();
  }

  private async require(uuid: string): Promise<SyncEntity> {
    const entity = await this.table.get(uuid);
    if (!entity) throw new EntityNotFoundError(uuid);
    return entity;
  }

  // ===========================================================================
  // CRUD
  // ===========================================================================

  async create(entityType: string, fields: EntityFields, uuid: string = generateId()): Promise<SyncEntity> {
    if (!this.config.entityTypes.has(entityType)) {
      throw new Error(`Unknown entity type: ${entityType}`);
    }
    return this.serialize(async () => {
      const ts = this.nowIso();
      const entity: SyncEntity = {
        uuid,
        entityType,
        recordID: null,
        fields: cloneFields(fields),
        fieldModifiedAt: Object.fromEntries(Object.keys(fields).map((key) => [key, ts])),
        base: null,
        syncStatus: 'pendingUpload',
        lastModified: ts,
        changeTag: null,
        conflictResolutionNeeded: false,
        lastError: null
      };
      await this.table.add(entity);
      return entity;
    });
  }

  get(uuid: string): Promise<SyncEntity | undefined> {
    return this.table.get(uuid);
  }

  async getMany(uuids: string[]): Promise<SyncEntity[]> {
    const rows = await this.table.bulkGet(uuids);
    return rows.filter((row): row is SyncEntity => row !== undefined);
  }

  getByRecordID(recordID: string): Promise<SyncEntity | undefined> {
    return this.table.where('recordID').equals(recordID).first();
  }

  all(entityType?: string): Promise<SyncEntity[]> {
    if (entityType) return this.table.where('entityType').equals(entityType).toArray();
    return this.table.toArray();
  }

  /**
   * Apply a local edit. Only fields whose value actually changes are
   * stamped in `fieldModifiedAt`; a no-op patch leaves the entity untouched.
   */
  update(uuid: string, patch: EntityFields): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const changed = Object.keys(patch).filter((key) => !fieldValuesEqual(entity.fields[key], patch[key]));
      if (changed.length === 0) return entity;

      const ts = this.nowIso();
      const updated: SyncEntity = {
        ...entity,
        fields: { ...entity.fields, ...cloneFields(patch) },
        fieldModifiedAt: { ...entity.fieldModifiedAt, ...Object.fromEntries(changed.map((key) => [key, ts])) },
        syncStatus: entity.conflictResolutionNeeded ? 'conflict' : 'pendingUpload',
        lastModified: ts,
        lastError: null
      };
      await this.table.put(updated);
      return updated;
    });
  }

  /**
   * Remove an entity locally. Refused while a conflict is pending so the
   * unreconciled state survives until resolution.
   */
  delete(uuid: string): Promise<boolean> {
    return this.serialize(async () => {
      const entity = await this.table.get(uuid);
      if (!entity) return false;
      if (entity.conflictResolutionNeeded) {
        throw new ConflictResolutionError(
          'manualResolutionRequired',
          `Entity ${uuid} has an unresolved conflict and cannot be deleted`
        );
      }
      await this.table.delete(uuid);
      return true;
    });
  }

  // ===========================================================================
  // Sync queries
  // ===========================================================================

  /** Entities not yet in sync, oldest edit first. */
  fetchPendingSync(): Promise<SyncEntity[]> {
    return this.table
      .orderBy('lastModified')
      .filter((e) => e.syncStatus !== 'synced')
      .toArray();
  }

  /** Entities eligible for upload: pending and not waiting on a conflict. */
  fetchUploadable(): Promise<SyncEntity[]> {
    return this.table
      .orderBy('lastModified')
      .filter((e) => e.syncStatus === 'pendingUpload' && !e.conflictResolutionNeeded)
      .toArray();
  }

  fetchConflicts(): Promise<SyncEntity[]> {
    return this.table.filter((e) => e.conflictResolutionNeeded).toArray();
  }

  /**
   * Entities whose timestamp field falls within `[from, to]`, newest first.
   */
  async fetchByDateRange(from: Date, to: Date, entityType?: string): Promise<SyncEntity[]> {
    const lo = from.getTime();
    const hi = to.getTime();
    const candidates = await this.all(entityType);
    const stamp = (e: SyncEntity): number | null => {
      const field = this.config.entityTypes.get(e.entityType)?.timestampField ?? 'timestamp';
      const value = e.fields[field];
      return typeof value === 'string' ? Date.parse(value) : null;
    };
    return candidates
      .filter((e) => {
        const t = stamp(e);
        return t !== null && t >= lo && t <= hi;
      })
      .sort((a, b) => (stamp(b) ?? 0) - (stamp(a) ?? 0));
  }

  countPending(): Promise<number> {
    return this.table.filter((e) => e.syncStatus !== 'synced').count();
  }

  // ===========================================================================
  // Status transitions
  // ===========================================================================

  /** Mark for upload and bump `lastModified`. Never touches `changeTag`. */
  markForSync(uuid: string): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const updated: SyncEntity = { ...entity, syncStatus: 'pendingUpload', lastModified: this.nowIso(), lastError: null };
      await this.table.put(updated);
      return updated;
    });
  }

  /**
   * Acknowledge a successful upload of the snapshot taken at
   * `uploadedLastModified`. If the entity was edited again meanwhile it stays
   * pending; the server's identity and change tag are recorded either way.
   */
  markSynced(uuid: string, record: RemoteRecord, uploadedLastModified: string, uploadedFields: EntityFields): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const editedSince = entity.lastModified !== uploadedLastModified;
      const updated: SyncEntity = {
        ...entity,
        recordID: record.recordID,
        changeTag: record.changeTag,
        base: cloneFields(uploadedFields),
        syncStatus: editedSince ? 'pendingUpload' : 'synced',
        lastError: null
      };
      await this.table.put(updated);
      if (editedSince) debugLog(`[STORE] ${uuid} edited during upload, staying pending`);
      return updated;
    });
  }

  markError(uuid: string, message: string): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const updated: SyncEntity = { ...entity, syncStatus: 'error', lastError: message };
      await this.table.put(updated);
      return updated;
    });
  }

  markAsConflict(uuid: string): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const updated: SyncEntity = { ...entity, syncStatus: 'conflict', conflictResolutionNeeded: true };
      await this.table.put(updated);
      return updated;
    });
  }

  /** Clear the conflict flag; a `conflict` status falls back to `synced`. */
  clearConflict(uuid: string): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const updated: SyncEntity = {
        ...entity,
        conflictResolutionNeeded: false,
        syncStatus: entity.syncStatus === 'conflict' ? 'synced' : entity.syncStatus
      };
      await this.table.put(updated);
      return updated;
    });
  }

  // ===========================================================================
  // Remote application
  // ===========================================================================

  /**
   * Update-from-remote path used by the download phase.
   *
   * - absent locally                       → materialized as `synced`
   * - flagged for conflict                 → left alone (resolver handles it)
   * - same change tag, same fields         → no change
   * - local has unsynced edits and the
   *   remote moved past our change tag     → flagged as conflict
   * - otherwise                            → overwritten with remote
   */
  applyRemote(record: RemoteRecord): Promise<ApplyRemoteOutcome> {
    return this.serialize(async () => {
      const local = await this.table.get(record.uuid);
      if (!local) {
        await this.table.add(recordToEntity(record));
        return 'created';
      }
      if (local.conflictResolutionNeeded) {
        // Learn the server identity of a record that was created on both sides
        if (local.recordID === null) await this.table.put({ ...local, recordID: record.recordID });
        return 'conflict';
      }

      const sameTag = local.changeTag !== null && local.changeTag === record.changeTag;
      const hasLocalEdits = local.syncStatus === 'pendingUpload' || local.syncStatus === 'error';

      if (hasLocalEdits) {
        if (sameTag) return 'unchanged';
        await this.table.put({ ...local, recordID: local.recordID ?? record.recordID, syncStatus: 'conflict', conflictResolutionNeeded: true });
        return 'conflict';
      }

      if (sameTag && fieldsEqual(local.fields, record.fields)) return 'unchanged';

      await this.table.put(this.withRemote(local, record));
      return 'updated';
    });
  }

  /** Replace local content with the remote version and clear any conflict. */
  overwriteWithRemote(uuid: string, record: RemoteRecord): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const updated = this.withRemote(entity, record);
      await this.table.put(updated);
      return updated;
    });
  }

  /**
   * Keep local content, adopt the remote change tag and base so the next
   * upload supersedes the remote version, and re-queue for upload.
   */
  keepLocalOver(uuid: string, record: RemoteRecord): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const updated: SyncEntity = {
        ...entity,
        recordID: record.recordID,
        changeTag: record.changeTag,
        base: cloneFields(record.fields),
        conflictResolutionNeeded: false,
        syncStatus: 'pendingUpload',
        lastModified: this.nowIso()
      };
      await this.table.put(updated);
      return updated;
    });
  }

  /**
   * Store a merge result. The merged content differs from both the server
   * and the prior local copy, so it is re-queued for upload.
   */
  applyMerged(uuid: string, merged: EntityFields, record: RemoteRecord | null): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const ts = this.nowIso();
      const fieldModifiedAt: Record<string, string> = {};
      for (const key of Object.keys(merged)) {
        const fromLocal = fieldValuesEqual(entity.fields[key], merged[key]);
        const fromRemote = record !== null && fieldValuesEqual(record.fields[key], merged[key]);
        // A value neither side had (set union, fallback) counts as a fresh local edit.
        const stamp = fromLocal || fromRemote
          ? maxIso(entity.fieldModifiedAt[key] ?? null, record?.fieldModifiedAt[key] ?? null)
          : ts;
        fieldModifiedAt[key] = stamp ?? ts;
      }
      const updated: SyncEntity = {
        ...entity,
        fields: cloneFields(merged),
        fieldModifiedAt,
        recordID: record?.recordID ?? entity.recordID,
        changeTag: record?.changeTag ?? entity.changeTag,
        base: record ? cloneFields(record.fields) : entity.base,
        conflictResolutionNeeded: false,
        syncStatus: 'pendingUpload',
        lastModified: ts,
        lastError: null
      };
      await this.table.put(updated);
      return updated;
    });
  }

  /**
   * The remote record is gone: forget the server identity so the next upload
   * recreates it, and clear any conflict.
   */
  detachFromRemote(uuid: string): Promise<SyncEntity> {
    return this.serialize(async () => {
      const entity = await this.require(uuid);
      const updated: SyncEntity = {
        ...entity,
        recordID: null,
        changeTag: null,
        base: null,
        conflictResolutionNeeded: false,
        syncStatus: 'pendingUpload',
        lastModified: this.nowIso()
      };
      await this.table.put(updated);
      return updated;
    });
  }

  private withRemote(entity: SyncEntity, record: RemoteRecord): SyncEntity {
    return {
      ...entity,
      recordID: record.recordID,
      fields: cloneFields(record.fields),
      fieldModifiedAt: { ...record.fieldModifiedAt },
      base: cloneFields(record.fields),
      syncStatus: 'synced',
      lastModified: record.lastModified,
      changeTag: record.changeTag,
      conflictResolutionNeeded: false,
      lastError: null
    };
  }
}

function fieldsEqual(a: EntityFields, b: EntityFields): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if (!fieldValuesEqual(a[key], b[key])) return false;
  }
  return true;
}
