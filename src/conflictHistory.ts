/**
 * @fileoverview Conflict History Persistence
 *
 * Audit trail of detected conflicts, stored in the `conflictHistory` Dexie
 * table. One row per conflict:
 *
 *   - opened when the conflict is detected (`resolvedAt = null`)
 *   - closed exactly once when a resolution is recorded
 *   - never deleted on resolution; old resolved rows are purged by
 *     {@link ConflictHistory.cleanup} after the retention window
 *
 * At most one open row exists per entity. Re-detecting a conflict that is
 * still open returns the existing row instead of adding another.
 */

import type Dexie from 'dexie';
import type { Table } from 'dexie';
import { conflictHistoryTable } from './database';
import { debugLog } from './debug';
import type {
  ConflictHistoryEntry,
  ConflictResolutionStrategy,
  EntityFields,
  ResolutionType
} from './types';

export interface HistoryClosure {
  resolutionType: ResolutionType;
  merged: EntityFields | null;
  unresolvedFields?: string[];
  notes?: string | null;
}

/** Wall-clock time between detection and resolution, or null while open. */
export function resolutionDurationMs(entry: ConflictHistoryEntry): number | null {
  if (entry.resolvedAt === null) return null;
  return Date.parse(entry.resolvedAt) - Date.parse(entry.occurredAt);
}

export class ConflictHistory {
  private readonly table: Table<ConflictHistoryEntry, number>;

  constructor(
    private readonly db: Dexie,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.table = conflictHistoryTable(db);
  }

  /**
   * Open a history row for `entityUUID`, or return the row that is already
   * open for it. A reused row takes the strategy now being applied.
   */
  open(
    entityUUID: string,
    strategy: ConflictResolutionStrategy,
    local: EntityFields,
    remote: EntityFields
  ): Promise<ConflictHistoryEntry> {
    return this.db.transaction('rw', this.table, async () => {
      const existing = await this.findOpen(entityUUID);
      if (existing) {
        if (existing.id !== undefined && existing.resolutionStrategy !== strategy) {
          await this.table.update(existing.id, { resolutionStrategy: strategy });
          return { ...existing, resolutionStrategy: strategy };
        }
        return existing;
      }

      const entry: ConflictHistoryEntry = {
        entityUUID,
        occurredAt: this.clock().toISOString(),
        resolvedAt: null,
        resolutionStrategy: strategy,
        resolutionType: 'manual',
        localVersion: JSON.stringify(local),
        remoteVersion: JSON.stringify(remote),
        mergedVersion: null,
        unresolvedFields: [],
        notes: null
      };
      const id = await this.table.add(entry);
      return { ...entry, id };
    });
  }

  /**
   * Record the resolution on an open row. Returns false when the row does not
   * exist or was already closed.
   */
  close(id: number, closure: HistoryClosure): Promise<boolean> {
    return this.db.transaction('rw', this.table, async () => {
      const entry = await this.table.get(id);
      if (!entry || entry.resolvedAt !== null) return false;
      await this.table.put({
        ...entry,
        resolvedAt: this.clock().toISOString(),
        resolutionType: closure.resolutionType,
        mergedVersion: closure.merged ? JSON.stringify(closure.merged) : null,
        unresolvedFields: closure.unresolvedFields ?? [],
        notes: closure.notes ?? null
      });
      return true;
    });
  }

  findOpen(entityUUID: string): Promise<ConflictHistoryEntry | undefined> {
    return this.table
      .where('entityUUID')
      .equals(entityUUID)
      .filter((e) => e.resolvedAt === null)
      .first();
  }

  /** All rows for one entity, newest first. */
  forEntity(entityUUID: string): Promise<ConflictHistoryEntry[]> {
    return this.table.where('entityUUID').equals(entityUUID).reverse().sortBy('occurredAt');
  }

  unresolved(): Promise<ConflictHistoryEntry[]> {
    return this.table.filter((e) => e.resolvedAt === null).toArray();
  }

  byStrategy(strategy: ConflictResolutionStrategy): Promise<ConflictHistoryEntry[]> {
    return this.table.where('resolutionStrategy').equals(strategy).toArray();
  }

  /**
   * Delete resolved rows whose resolution is older than `retentionDays`.
   * Open rows are kept regardless of age.
   *
   * @returns The number of rows deleted.
   */
  async cleanup(retentionDays: number): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - retentionDays * 24 * 60 * 60 * 1000).toISOString();
    const count = await this.table.filter((e) => e.resolvedAt !== null && e.resolvedAt < cutoff).delete();
    if (count > 0) {
      debugLog(`[CONFLICT] Cleaned up ${count} old conflict history entries`);
    }
    return count;
  }
}
