/**
 * @fileoverview IndexedDB Database Management via Dexie
 *
 * Manages the lifecycle of the Dexie (IndexedDB) database used by the sync
 * engine. The engine creates and owns the Dexie instance via
 * {@link createDatabase}. Besides the `entities` table it declares two system
 * tables:
 *   - `conflictHistory`: audit trail of detected and resolved conflicts
 *   - `syncSettings`:    key/value scalars (watermarks, scheduler settings)
 *
 * The IndexedDB implementation is injectable so the engine also runs in
 * Node hosts that supply one (e.g. `fake-indexeddb` in tests).
 *
 * Recovery strategy:
 *   If the database fails to open (corrupted schema, blocked upgrade), it is
 *   deleted and recreated from scratch. Watermarks live in the same database,
 *   so the next sync cycle re-downloads everything from the remote store.
 */

import Dexie, { type Table } from 'dexie';
import type { ConflictHistoryEntry, SyncEntity } from './types';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/** Minimal shape of an `IDBFactory` accepted by Dexie. */
export interface IndexedDBFactory {
  open(name: string, version?: number): unknown;
}

/** Minimal shape of the `IDBKeyRange` constructor accepted by Dexie. */
export interface IndexedDBKeyRange {
  bound(...args: never[]): unknown;
  lowerBound(...args: never[]): unknown;
  upperBound(...args: never[]): unknown;
}

export interface DatabaseConfig {
  /** IndexedDB database name (should be unique per app). */
  name: string;
  /** IndexedDB implementation. Defaults to the host's global `indexedDB`. */
  indexedDB?: IndexedDBFactory;
  /** Matching `IDBKeyRange`. Required together with `indexedDB`. */
  IDBKeyRange?: IndexedDBKeyRange;
}

/** A persisted scalar setting. */
export interface SettingRow {
  key: string;
  value: string | number | boolean | null;
}

// =============================================================================
// Schema
// =============================================================================

/**
 * Current schema. `conflictResolutionNeeded` is not indexed: IndexedDB
 * cannot index booleans, so conflict queries filter in memory.
 */
const SCHEMA_V1: Record<string, string> = {
  entities: 'uuid, entityType, syncStatus, lastModified, recordID',
  conflictHistory: '++id, entityUUID, occurredAt, resolvedAt, resolutionStrategy',
  syncSettings: 'key'
};

// =============================================================================
// Database Creation
// =============================================================================

/**
 * Create and open the sync database.
 *
 * Opens eagerly so version upgrades run immediately (not lazily on first
 * table access). If opening fails, the database is deleted and rebuilt.
 */
export async function createDatabase(config: DatabaseConfig): Promise<Dexie> {
  let db = buildDexie(config);

  try {
    await db.open();
  } catch (e) {
    console.error('[DB] Failed to open database, deleting and recreating:', e);
    db.close();
    await db.delete();
    db = buildDexie(config);
    await db.open();
  }

  return db;
}

function buildDexie(config: DatabaseConfig): Dexie {
  const db =
    config.indexedDB && config.IDBKeyRange
      ? new Dexie(config.name, { indexedDB: config.indexedDB, IDBKeyRange: config.IDBKeyRange })
      : new Dexie(config.name);

  db.version(1).stores(SCHEMA_V1);
  return db;
}

// =============================================================================
// Typed Table Accessors
// =============================================================================

export function entitiesTable(db: Dexie): Table<SyncEntity, string> {
  return db.table<SyncEntity, string>('entities');
}

export function conflictHistoryTable(db: Dexie): Table<ConflictHistoryEntry, number> {
  return db.table<ConflictHistoryEntry, number>('conflictHistory');
}

export function settingsTable(db: Dexie): Table<SettingRow, string> {
  return db.table<SettingRow, string>('syncSettings');
}

// =============================================================================
// Recovery
// =============================================================================

/**
 * Delete the database entirely. The caller must create a new engine
 * afterwards; the next sync re-downloads all remote data.
 *
 * @returns The name of the deleted database.
 */
export async function resetDatabase(db: Dexie): Promise<string> {
  const name = db.name;
  db.close();
  await db.delete();
  return name;
}
