/**
 * @fileoverview Engine Configuration
 *
 * Central configuration for the sync engine. {@link createSyncEngine} takes a
 * {@link SyncEngineConfig} describing:
 *   - Which entity types are synced and how each field is compared/merged
 *   - The local database (name, IndexedDB implementation)
 *   - The remote record store adapter
 *   - Sync timing, batching and retry parameters
 *
 * Unlike a module-level singleton, the resolved config is passed explicitly
 * into every component that needs it; the composition root owns the one
 * process-wide engine instance.
 *
 * @see {@link engine.ts} for the sync cycle that consumes this config
 * @see {@link scheduler.ts} for the scheduling parameters
 */

import type { ConflictResolutionStrategy, FieldKind } from './types';
import type { RetryPolicy } from './retry';
import { DEFAULT_RETRY_POLICY } from './retry';
import type { DatabaseConfig } from './database';
import type { RemoteRecordStore } from './remote';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * Per-entity-type configuration.
 *
 * @example
 * {
 *   name: 'report',
 *   fields: REPORT_FIELDS,
 *   timestampField: 'timestamp',
 * }
 */
export interface EntityTypeConfig {
  /** Entity type name, stored on every entity and remote record. */
  name: string;
  /** Field name → comparison/merge kind. Unlisted fields are compared and merged as scalars. */
  fields: Record<string, FieldKind>;
  /** Timestamp field used by date range queries. Default: `'timestamp'`. */
  timestampField?: string;
}

export interface SchedulerConfig {
  /** Interval between lightweight periodic syncs. Default: 6 hours. */
  intervalMs?: number;
  /** Battery fraction under which sync is skipped unless charging. Default: 0.2. */
  lowBatteryThreshold?: number;
  /** Pending count that must be exceeded before a bulk window is requested. Default: 50. */
  bulkThreshold?: number;
  /** Pending count above which the bulk window requires external power. Default: 200. */
  externalPowerThreshold?: number;
  /** Max high-priority items handled by a lightweight window. Default: 20. */
  lightweightLimit?: number;
  /** Max items handled by a bulk window. Default: 500. */
  bulkLimit?: number;
  /** Items dequeued per bulk batch. Default: 50. */
  bulkBatchSize?: number;
  /** Local hour of the low-usage window for bulk sync. Default: 2 (02:00). */
  lowUsageHour?: number;
  /** Delay for an overdue sync found by `evaluateSyncNeed`. Default: 60s. */
  overdueDelayMs?: number;
  /** Interval of the foreground auto-sync while it is enabled. Default: 5 minutes. */
  autoSyncIntervalMs?: number;
}

export interface SyncEngineConfig {
  /** Entity types to sync (required, at least one). */
  entityTypes: EntityTypeConfig[];
  /** Remote record store adapter (required). */
  remote: RemoteRecordStore;
  /** Local database configuration. */
  database: DatabaseConfig;
  /** Application prefix, used for the debug flag and settings keys. Default: `'tidesync'`. */
  prefix?: string;
  /** Records per upload chunk and download page. Default: 50. */
  batchSize?: number;
  /** Initial conflict resolution strategy. Default: `'mostRecent'`. */
  strategy?: ConflictResolutionStrategy;
  retry?: Partial<RetryPolicy>;
  scheduler?: SchedulerConfig;
  /** Days to keep resolved conflict history. Default: 30. */
  historyRetentionDays?: number;
}

export interface ResolvedSchedulerConfig {
  intervalMs: number;
  lowBatteryThreshold: number;
  bulkThreshold: number;
  externalPowerThreshold: number;
  lightweightLimit: number;
  bulkLimit: number;
  bulkBatchSize: number;
  lowUsageHour: number;
  overdueDelayMs: number;
  autoSyncIntervalMs: number;
}

export interface ResolvedConfig {
  prefix: string;
  entityTypes: Map<string, EntityTypeConfig>;
  batchSize: number;
  strategy: ConflictResolutionStrategy;
  retry: RetryPolicy;
  scheduler: ResolvedSchedulerConfig;
  historyRetentionDays: number;
}

// =============================================================================
// Built-in Schemas
// =============================================================================

/**
 * Field schema of the marine event report: observed species, activity
 * intensity, location, notes, environmental measurements and the
 * observation time.
 */
export const REPORT_FIELDS: Record<string, FieldKind> = {
  species: 'set',
  intensity: 'scalar',
  location: 'coordinate',
  notes: 'text',
  environmentalConditions: 'numericMap',
  timestamp: 'timestamp'
};

export const REPORT_ENTITY: EntityTypeConfig = {
  name: 'report',
  fields: REPORT_FIELDS,
  timestampField: 'timestamp'
};

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_SCHEDULER_CONFIG: ResolvedSchedulerConfig = {
  intervalMs: 6 * 60 * 60 * 1000,
  lowBatteryThreshold: 0.2,
  bulkThreshold: 50,
  externalPowerThreshold: 200,
  lightweightLimit: 20,
  bulkLimit: 500,
  bulkBatchSize: 50,
  lowUsageHour: 2,
  overdueDelayMs: 60_000,
  autoSyncIntervalMs: 5 * 60 * 1000
};

const DEFAULT_BATCH_SIZE = 50;
const DEFAULT_HISTORY_RETENTION_DAYS = 30;

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid sync config: ${name} must be a positive integer (got ${value})`);
  }
}

/**
 * Fill defaults and validate. Throws on values the engine cannot work with.
 */
export function resolveConfig(
  config: Pick<
    SyncEngineConfig,
    'entityTypes' | 'prefix' | 'batchSize' | 'strategy' | 'retry' | 'scheduler' | 'historyRetentionDays'
  >
): ResolvedConfig {
  if (config.entityTypes.length === 0) {
    throw new Error('Invalid sync config: at least one entity type is required');
  }

  const entityTypes = new Map<string, EntityTypeConfig>();
  for (const type of config.entityTypes) {
    if (entityTypes.has(type.name)) {
      throw new Error(`Invalid sync config: duplicate entity type "${type.name}"`);
    }
    entityTypes.set(type.name, type);
  }

  const batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
  assertPositiveInt('batchSize', batchSize);

  const retry: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...config.retry };
  assertPositiveInt('retry.maxAttempts', retry.maxAttempts);
  if (retry.baseDelayMs < 0 || retry.maxDelayMs < retry.baseDelayMs) {
    throw new Error('Invalid sync config: retry delays must satisfy 0 <= baseDelayMs <= maxDelayMs');
  }

  const scheduler: ResolvedSchedulerConfig = { ...DEFAULT_SCHEDULER_CONFIG, ...config.scheduler };
  assertPositiveInt('scheduler.intervalMs', scheduler.intervalMs);
  assertPositiveInt('scheduler.autoSyncIntervalMs', scheduler.autoSyncIntervalMs);
  assertPositiveInt('scheduler.lightweightLimit', scheduler.lightweightLimit);
  assertPositiveInt('scheduler.bulkLimit', scheduler.bulkLimit);
  assertPositiveInt('scheduler.bulkBatchSize', scheduler.bulkBatchSize);
  if (scheduler.lowBatteryThreshold < 0 || scheduler.lowBatteryThreshold > 1) {
    throw new Error('Invalid sync config: scheduler.lowBatteryThreshold must be within [0, 1]');
  }
  if (!Number.isInteger(scheduler.lowUsageHour) || scheduler.lowUsageHour < 0 || scheduler.lowUsageHour > 23) {
    throw new Error('Invalid sync config: scheduler.lowUsageHour must be an hour 0-23');
  }

  const historyRetentionDays = config.historyRetentionDays ?? DEFAULT_HISTORY_RETENTION_DAYS;
  assertPositiveInt('historyRetentionDays', historyRetentionDays);

  return {
    prefix: config.prefix ?? 'tidesync',
    entityTypes,
    batchSize,
    strategy: config.strategy ?? 'mostRecent',
    retry,
    scheduler,
    historyRetentionDays
  };
}
