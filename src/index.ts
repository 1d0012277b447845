/**
 * @fileoverview Main entry point: `tidesync`
 *
 * Primary barrel export. Covers:
 *
 * - **Engine**: {@link createSyncEngine} wires every component from one
 *   configuration object.
 * - **Entity Store**: durable entities with sync status.
 * - **Priority Queue**: tiered queue of entities awaiting upload.
 * - **Conflicts**: detection, resolution strategies and history.
 * - **Orchestrator**: the sync cycle itself.
 * - **Scheduler**: background windows, gating and host triggers.
 * - **Remote**: the record store contract and the Supabase adapter.
 * - **Reactive Stores**: Svelte-compatible sync status and device
 *   conditions.
 * - **Errors, Retry, Debug**: error taxonomy, back-off and logging.
 */

// =============================================================================
//  Engine
// =============================================================================

export { createSyncEngine } from './syncEngine';
export type { SyncEngine, SyncEngineOptions } from './syncEngine';

export { resolveConfig, REPORT_ENTITY, REPORT_FIELDS, DEFAULT_SCHEDULER_CONFIG } from './config';
export type {
  EntityTypeConfig,
  ResolvedConfig,
  ResolvedSchedulerConfig,
  SchedulerConfig,
  SyncEngineConfig
} from './config';

// =============================================================================
//  Database & Settings
// =============================================================================

export { createDatabase, resetDatabase } from './database';
export type { DatabaseConfig, IndexedDBFactory, IndexedDBKeyRange } from './database';

export { SyncSettings, EPOCH } from './settings';

// =============================================================================
//  Entity Store & Queue
// =============================================================================

export { EntityStore, EntityNotFoundError } from './entityStore';
export type { ApplyRemoteOutcome } from './entityStore';

export { SyncPriorityQueue } from './priorityQueue';
export type { QueuedItem } from './priorityQueue';

// =============================================================================
//  Conflicts
// =============================================================================

export {
  ConflictResolver,
  compareFields,
  detectConflict,
  fieldLevelMerge,
  threeWayMerge,
  valuesConflict,
  COORDINATE_TOLERANCE_DEG,
  TIMESTAMP_TOLERANCE_MS
} from './conflicts';
export type { EntityVersion, FieldSchema, ManualChoice, MergeResult } from './conflicts';

export { ConflictHistory, resolutionDurationMs } from './conflictHistory';

// =============================================================================
//  Orchestrator & Scheduler
// =============================================================================

export { SyncOrchestrator } from './engine';
export type { OrchestratorDeps, SyncEvent, SyncOptions } from './engine';

export { BackgroundScheduler, TimerTrigger, shouldSync } from './scheduler';
export type {
  SchedulerDeps,
  SyncRequest,
  SyncRunner,
  SyncTrigger,
  SyncWindowKind,
  SyncWindowRun,
  TimerTriggerOptions
} from './scheduler';

// =============================================================================
//  Remote Record Store
// =============================================================================

export { changedKeysOf, recordToEntity, toOutgoingRecord } from './remote';
export type {
  AccountStatus,
  OutgoingRecord,
  QueryPage,
  RecordQuery,
  RemoteRecordStore,
  SaveOutcome,
  SavePolicy,
  SubscriptionHandle
} from './remote';

export { SupabaseRecordStore, rowToRecord } from './supabase/recordStore';
export type { SupabaseRecordStoreOptions } from './supabase/recordStore';

// =============================================================================
//  Reactive Stores
// =============================================================================

export { createSyncStatusStore } from './stores/sync';
export type { SyncErrorRecord, SyncStatusState, SyncStatusStore } from './stores/sync';

export { createDeviceConditionsStore } from './stores/network';
export type { DeviceConditionsStore } from './stores/network';

// =============================================================================
//  Errors, Retry & Debug
// =============================================================================

export { SyncError, ConflictResolutionError, toSyncError, extractErrorMessage, isTransientCode } from './errors';
export type {
  ConflictResolutionErrorCode,
  PermanentErrorCode,
  SyncErrorCode,
  SyncErrorOptions,
  TransientErrorCode
} from './errors';

export { withRetry, computeRetryDelay, backoffCeiling, DEFAULT_RETRY_POLICY } from './retry';
export type { RetryHooks, RetryPolicy } from './retry';

export { debug, debugLog, debugWarn, debugError, isDebugMode, setDebugMode } from './debug';

// =============================================================================
//  Types
// =============================================================================

export type {
  ConflictHistoryEntry,
  ConflictResolution,
  ConflictResolutionStrategy,
  Coordinate,
  DeviceConditions,
  EntityFields,
  FieldKind,
  FieldValue,
  NetworkType,
  RemoteRecord,
  ResolutionType,
  SyncDirection,
  SyncEntity,
  SyncPhase,
  SyncPriority,
  SyncProgress,
  SyncResult,
  SyncState,
  SyncStatus
} from './types';
