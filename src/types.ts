/**
 * Sync Entity & Resolution Types
 *
 * Shared shapes for the offline-first sync engine. Entities are stored as a
 * flat field map plus sync metadata so that the conflict resolver can compare
 * them field by field without knowing anything about the domain.
 */

// ============================================================
// FIELD VALUES
// ============================================================

/** A WGS84 coordinate pair. */
export interface Coordinate {
  latitude: number;
  longitude: number;
}

/**
 * How a field is compared and merged:
 * - 'set': unordered list of strings (tags, species)
 * - 'scalar': categorical string (e.g. intensity)
 * - 'coordinate': lat/lng pair compared with a ~10m tolerance
 * - 'text': free text
 * - 'numericMap': string-keyed numeric measurements
 * - 'timestamp': ISO timestamp compared with a 60s tolerance
 */
export type FieldKind = 'set' | 'scalar' | 'coordinate' | 'text' | 'numericMap' | 'timestamp';

export type FieldValue = string | number | null | string[] | Coordinate | Record<string, number>;

export type EntityFields = Record<string, FieldValue>;

// ============================================================
// ENTITY
// ============================================================

export type SyncStatus = 'synced' | 'pendingUpload' | 'conflict' | 'error';

export interface SyncEntity {
  uuid: string; // Client-generated stable identity
  entityType: string; // Key into the engine's entity type registry
  recordID: string | null; // Remote record id, null until first upload
  fields: EntityFields;
  fieldModifiedAt: Record<string, string>; // ISO time of the last local edit per field
  base: EntityFields | null; // Fields as last agreed with the remote store
  syncStatus: SyncStatus;
  lastModified: string; // ISO timestamp, local clock
  changeTag: string | null; // Remote optimistic-concurrency token
  conflictResolutionNeeded: boolean;
  lastError: string | null;
}

// ============================================================
// REMOTE RECORDS
// ============================================================

/**
 * Wire-level record exchanged with the remote store. `recordID` and
 * `changeTag` are assigned by the remote side.
 */
export interface RemoteRecord {
  recordID: string;
  uuid: string;
  entityType: string;
  fields: EntityFields;
  fieldModifiedAt: Record<string, string>;
  lastModified: string;
  changeTag: string | null;
}

// ============================================================
// PRIORITY
// ============================================================

export type SyncPriority = 'userInitiated' | 'high' | 'normal' | 'low';

// ============================================================
// CONFLICT RESOLUTION
// ============================================================

export type ConflictResolutionStrategy =
  | 'serverWins'
  | 'clientWins'
  | 'mostRecent'
  | 'fieldLevelMerge'
  | 'threeWayMerge'
  | 'manual';

export type ConflictResolution =
  | { kind: 'useLocal' }
  | { kind: 'useRemote' }
  | { kind: 'merge'; merged: EntityFields; lastModified: string; unresolvedFields: string[] }
  | { kind: 'manual' };

/** Outcome label persisted on history entries. */
export type ResolutionType = 'use_local' | 'use_remote' | 'merge' | 'manual';

/**
 * Conflict history entry (stored in IndexedDB).
 * One row per detected conflict; `resolvedAt` stays null until a resolution
 * is recorded, after which the row is never touched again.
 */
export interface ConflictHistoryEntry {
  id?: number;
  entityUUID: string;
  occurredAt: string;
  resolvedAt: string | null;
  resolutionStrategy: ConflictResolutionStrategy;
  resolutionType: ResolutionType;
  localVersion: string; // JSON snapshot
  remoteVersion: string; // JSON snapshot
  mergedVersion: string | null; // JSON snapshot
  unresolvedFields: string[];
  notes: string | null;
}

// ============================================================
// SYNC CYCLE
// ============================================================

export type SyncDirection = 'upload' | 'download' | 'bidirectional';

export type SyncPhase =
  | 'idle'
  | 'verifyingRemoteAvailability'
  | 'uploading'
  | 'downloading'
  | 'resolvingConflicts';

export interface SyncResult {
  uploaded: number;
  downloaded: number;
  conflicts: number;
  errors: Error[];
  cancelled: boolean;
}

export type SyncState =
  | { kind: 'idle' }
  | { kind: 'syncing' }
  | { kind: 'success'; result: SyncResult }
  | { kind: 'partialSuccess'; result: SyncResult }
  | { kind: 'failed'; error: Error };

export interface SyncProgress {
  completed: number;
  total: number;
}

// ============================================================
// DEVICE CONDITIONS
// ============================================================

export type NetworkType = 'none' | 'wifi' | 'cellular' | 'wired' | 'unknown';

export interface DeviceConditions {
  batteryLevel: number; // 0..1
  isCharging: boolean;
  network: NetworkType;
  isExpensive: boolean; // Metered connection
}
