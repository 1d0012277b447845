/**
 * @fileoverview Engine Composition Root
 *
 * {@link createSyncEngine} wires every component from one
 * {@link SyncEngineConfig}: database, entity store, priority queue, conflict
 * resolver, settings, orchestrator, scheduler and the reactive stores. There
 * are no module-level singletons; an application creates one engine and
 * passes it where it is needed.
 *
 * The returned engine also exposes the write path used by the UI: local
 * creates and edits go through {@link SyncEngine.create} /
 * {@link SyncEngine.update}, which persist the change as `pendingUpload` and
 * enqueue the entity for the next window.
 */

import type Dexie from 'dexie';
import { resolveConfig, type ResolvedConfig, type SyncEngineConfig } from './config';
import { ConflictHistory } from './conflictHistory';
import { ConflictResolver } from './conflicts';
import { createDatabase } from './database';
import { _setDebugPrefix, debugLog } from './debug';
import { SyncOrchestrator } from './engine';
import { EntityStore } from './entityStore';
import { SyncPriorityQueue } from './priorityQueue';
import type { RetryHooks } from './retry';
import { BackgroundScheduler, TimerTrigger, type SyncTrigger } from './scheduler';
import { SyncSettings } from './settings';
import { createDeviceConditionsStore, type DeviceConditionsStore } from './stores/network';
import { createSyncStatusStore, type SyncStatusStore } from './stores/sync';
import type { EntityFields, SyncEntity, SyncPriority } from './types';

export interface SyncEngineOptions {
  /** Host trigger for background windows. Default: a {@link TimerTrigger}. */
  trigger?: SyncTrigger;
  /** Device conditions fed by the host. Default: unknown network, full battery. */
  conditions?: DeviceConditionsStore;
  clock?: () => Date;
  retryHooks?: Pick<RetryHooks, 'random' | 'sleep'>;
}

export interface SyncEngine {
  readonly config: ResolvedConfig;
  readonly db: Dexie;
  readonly store: EntityStore;
  readonly queue: SyncPriorityQueue;
  readonly resolver: ConflictResolver;
  readonly settings: SyncSettings;
  readonly orchestrator: SyncOrchestrator;
  readonly scheduler: BackgroundScheduler;
  readonly status: SyncStatusStore;
  readonly conditions: DeviceConditionsStore;
  readonly trigger: SyncTrigger;

  create(entityType: string, fields: EntityFields, priority?: SyncPriority): Promise<SyncEntity>;
  update(uuid: string, patch: EntityFields, priority?: SyncPriority): Promise<SyncEntity>;
  delete(uuid: string): Promise<boolean>;
  /** Stop the scheduler and close the database. */
  close(): void;
}

export async function createSyncEngine(config: SyncEngineConfig, options: SyncEngineOptions = {}): Promise<SyncEngine> {
  const resolved = resolveConfig(config);
  _setDebugPrefix(resolved.prefix);

  const clock = options.clock ?? (() => new Date());
  const db = await createDatabase(config.database);

  const store = new EntityStore(db, resolved, clock);
  const queue = new SyncPriorityQueue();
  const resolver = new ConflictResolver(resolved, new ConflictHistory(db, clock));
  const settings = new SyncSettings(db, resolved.scheduler.intervalMs);
  const status = createSyncStatusStore();
  const conditions = options.conditions ?? createDeviceConditionsStore();
  const trigger = options.trigger ?? new TimerTrigger({ now: clock });

  const orchestrator = new SyncOrchestrator({
    config: resolved,
    store,
    queue,
    resolver,
    settings,
    remote: config.remote,
    status,
    retryHooks: options.retryHooks,
    clock
  });
  const scheduler = new BackgroundScheduler({
    config: resolved.scheduler,
    runner: orchestrator,
    queue,
    store,
    settings,
    conditions,
    trigger,
    clock
  });

  // The queue is in-memory only; rebuild it from whatever is still unsynced
  queue.rebuildFrom(await store.fetchPendingSync());
  status.setPendingCount(await store.countPending());
  debugLog(`[SYNC] Engine ready (${resolved.entityTypes.size} entity type(s), ${queue.size} queued)`);

  return {
    config: resolved,
    db,
    store,
    queue,
    resolver,
    settings,
    orchestrator,
    scheduler,
    status,
    conditions,
    trigger,

    async create(entityType, fields, priority = 'normal') {
      const entity = await store.create(entityType, fields);
      queue.enqueue(entity.uuid, priority);
      status.setPendingCount(await store.countPending());
      return entity;
    },

    async update(uuid, patch, priority = 'normal') {
      const entity = await store.update(uuid, patch);
      if (entity.syncStatus === 'pendingUpload') queue.enqueue(uuid, priority);
      status.setPendingCount(await store.countPending());
      return entity;
    },

    async delete(uuid) {
      const deleted = await store.delete(uuid);
      queue.remove(uuid);
      status.setPendingCount(await store.countPending());
      return deleted;
    },

    close() {
      scheduler.stop();
      if (trigger instanceof TimerTrigger) trigger.dispose();
      db.close();
    }
  };
}
