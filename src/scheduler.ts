/**
 * @fileoverview Background Sync Scheduler
 *
 * Decides *whether* and *when* a sync cycle may run; the orchestrator decides
 * *how*. The host only supplies a {@link SyncTrigger}: something that fires
 * a callback no earlier than a requested time (an OS background task API, a
 * cron-like timer, a daemon loop). {@link TimerTrigger} is the in-process
 * implementation for long-running Node hosts.
 *
 * ## Gating
 *
 * {@link shouldSync} refuses to run when the battery is low and not
 * charging, when there is no network, or when the connection is metered and
 * cellular sync has not been allowed. All three checks must pass.
 *
 * ## Windows
 *
 * - **periodic**: lightweight; handles at most `lightweightLimit` high-priority
 *   items plus the download. Re-armed for `now + interval` on every attempt,
 *   whatever its outcome.
 * - **bulk**: requested only when more than `bulkThreshold` entities are
 *   pending, never earlier than the next `lowUsageHour:00` local time, and
 *   on external power when more than `externalPowerThreshold` are pending.
 *   Drains the queue in batches of `bulkBatchSize`, up to `bulkLimit` items.
 *
 * - **foreground**: the auto-sync timer of a running app. While
 *   `autoSyncEnabled` is set it fires every `autoSyncIntervalMs` and syncs
 *   everything pending, provided there is a usable network. Battery level is
 *   not checked. A reconnect triggers the same check immediately.
 *
 * ## Expiration
 *
 * When the host's execution budget runs out it calls
 * {@link BackgroundScheduler.expire} (or aborts the signal it handed to the
 * run callback). The running cycle is cancelled cooperatively and the next
 * periodic attempt is re-armed straight away.
 */

import type { ResolvedSchedulerConfig } from './config';
import { debugError, debugLog, debugWarn } from './debug';
import type { SyncOptions } from './engine';
import type { EntityStore } from './entityStore';
import { toSyncError } from './errors';
import type { QueuedItem, SyncPriorityQueue } from './priorityQueue';
import type { SyncSettings } from './settings';
import type { DeviceConditionsStore } from './stores/network';
import type { DeviceConditions, SyncPriority, SyncResult } from './types';
import { nextLocalHour } from './utils';

// =============================================================================
// Trigger Interface
// =============================================================================

export type SyncWindowKind = 'periodic' | 'bulk' | 'foreground';

export interface SyncRequest {
  kind: SyncWindowKind;
  /** The window must not open before this time. */
  earliestBegin: Date;
  requiresNetwork: boolean;
  requiresExternalPower: boolean;
}

/** Work handed to a trigger; `signal` aborts when the host's budget expires. */
export type SyncWindowRun = (signal: AbortSignal) => Promise<void>;

export interface SyncTrigger {
  /** Request a window, replacing any pending request of the same kind. */
  schedule(request: SyncRequest, run: SyncWindowRun): void;
  /** Drop a pending request of `kind`. Runs already in progress are unaffected. */
  cancel(kind: SyncWindowKind): void;
  /** Abort every run in progress. */
  expireRunning(): void;
}

interface ScheduledTimer {
  request: SyncRequest;
  timer: ReturnType<typeof setTimeout>;
}

export interface TimerTriggerOptions {
  now?: () => Date;
  /** Abort a run after this long. Default: no budget. */
  budgetMs?: number;
}

/**
 * {@link SyncTrigger} backed by `setTimeout`, for hosts that stay alive.
 */
export class TimerTrigger implements SyncTrigger {
  private readonly scheduled = new Map<SyncWindowKind, ScheduledTimer>();
  private readonly running = new Set<AbortController>();
  private readonly now: () => Date;
  private readonly budgetMs: number | null;

  constructor(options: TimerTriggerOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.budgetMs = options.budgetMs ?? null;
  }

  schedule(request: SyncRequest, run: SyncWindowRun): void {
    this.cancel(request.kind);
    const delay = Math.max(0, request.earliestBegin.getTime() - this.now().getTime());
    const timer = setTimeout(() => {
      this.scheduled.delete(request.kind);
      void this.fire(request, run);
    }, delay);
    this.scheduled.set(request.kind, { request, timer });
  }

  cancel(kind: SyncWindowKind): void {
    const entry = this.scheduled.get(kind);
    if (entry) {
      clearTimeout(entry.timer);
      this.scheduled.delete(kind);
    }
  }

  expireRunning(): void {
    for (const controller of this.running) controller.abort();
  }

  /** The pending request of `kind`, if any. */
  pending(kind: SyncWindowKind): SyncRequest | undefined {
    return this.scheduled.get(kind)?.request;
  }

  /** Cancel everything, pending and running. */
  dispose(): void {
    for (const kind of [...this.scheduled.keys()]) this.cancel(kind);
    this.expireRunning();
  }

  private async fire(request: SyncRequest, run: SyncWindowRun): Promise<void> {
    const controller = new AbortController();
    this.running.add(controller);
    const budget = this.budgetMs !== null ? setTimeout(() => controller.abort(), this.budgetMs) : null;
    try {
      await run(controller.signal);
    } catch (e) {
      debugError(`[SCHEDULER] ${request.kind} window failed:`, e);
    } finally {
      if (budget) clearTimeout(budget);
      this.running.delete(controller);
    }
  }
}

// =============================================================================
// Gating
// =============================================================================

/**
 * Whether device conditions permit a sync right now.
 */
export function shouldSync(conditions: DeviceConditions, allowCellular: boolean, lowBatteryThreshold = 0.2): boolean {
  if (conditions.batteryLevel < lowBatteryThreshold && !conditions.isCharging) return false;
  if (conditions.network === 'none') return false;
  if ((conditions.network === 'cellular' || conditions.isExpensive) && !allowCellular) return false;
  return true;
}

// =============================================================================
// Scheduler
// =============================================================================

/** The slice of the orchestrator the scheduler drives. */
export interface SyncRunner {
  syncPendingChanges(options?: SyncOptions): Promise<SyncResult>;
  cancelPendingSync(): void;
}

export interface SchedulerDeps {
  config: ResolvedSchedulerConfig;
  runner: SyncRunner;
  queue: SyncPriorityQueue;
  store: Pick<EntityStore, 'countPending' | 'getMany'>;
  settings: SyncSettings;
  conditions: DeviceConditionsStore;
  trigger: SyncTrigger;
  clock?: () => Date;
}

export class BackgroundScheduler {
  private readonly deps: SchedulerDeps;
  private readonly clock: () => Date;
  private unsubscribeReconnect: (() => void) | null = null;

  constructor(deps: SchedulerDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Arm the periodic window and the auto-sync timer (each when enabled) and
   * start listening for reconnects.
   */
  async start(): Promise<void> {
    if (!this.unsubscribeReconnect) {
      this.unsubscribeReconnect = this.deps.conditions.onReconnect(async () => {
        await this.evaluateSyncNeed();
        if (await this.deps.settings.isAutoSyncEnabled()) await this.syncIfNeeded();
      });
    }
    if (await this.deps.settings.isBackgroundSyncEnabled()) {
      await this.schedulePeriodic();
      await this.scheduleBulkIfNeeded();
    }
    await this.startAutoSync();
  }

  stop(): void {
    this.unsubscribeReconnect?.();
    this.unsubscribeReconnect = null;
    this.deps.trigger.cancel('periodic');
    this.deps.trigger.cancel('bulk');
    this.deps.trigger.cancel('foreground');
  }

  /** Gate on the latest reported device conditions and the cellular preference. */
  async canSync(): Promise<boolean> {
    const allowCellular = await this.deps.settings.isCellularSyncAllowed();
    return shouldSync(this.deps.conditions.current(), allowCellular, this.deps.config.lowBatteryThreshold);
  }

  // ===========================================================================
  // Requests
  // ===========================================================================

  /**
   * Request the next periodic window, `delayMs` from now (default: the
   * configured interval).
   */
  async schedulePeriodic(delayMs?: number): Promise<SyncRequest> {
    const interval = delayMs ?? (await this.deps.settings.getSyncIntervalMs());
    const request: SyncRequest = {
      kind: 'periodic',
      earliestBegin: new Date(this.clock().getTime() + interval),
      requiresNetwork: true,
      requiresExternalPower: false
    };
    this.deps.trigger.schedule(request, (signal) => this.runPeriodic(signal));
    debugLog(`[SCHEDULER] Periodic sync requested for ${request.earliestBegin.toISOString()}`);
    return request;
  }

  /**
   * Request a bulk window if enough work is pending.
   *
   * @returns The request, or null when the pending count is at or below the
   *          bulk threshold.
   */
  async scheduleBulkIfNeeded(): Promise<SyncRequest | null> {
    const { config, store, trigger } = this.deps;
    const pending = await store.countPending();
    if (pending <= config.bulkThreshold) return null;

    const request: SyncRequest = {
      kind: 'bulk',
      earliestBegin: nextLocalHour(this.clock(), config.lowUsageHour),
      requiresNetwork: true,
      requiresExternalPower: pending > config.externalPowerThreshold
    };
    trigger.schedule(request, (signal) => this.runBulk(request, signal));
    debugLog(
      `[SCHEDULER] Bulk sync requested for ${request.earliestBegin.toISOString()} (${pending} pending${request.requiresExternalPower ? ', external power' : ''})`
    );
    return request;
  }

  /**
   * Request a periodic run shortly if the last background sync is older than
   * the interval.
   *
   * @returns Whether a run was requested.
   */
  async evaluateSyncNeed(): Promise<boolean> {
    const { settings, config } = this.deps;
    if (!(await settings.isBackgroundSyncEnabled())) return false;

    const last = await settings.getLastBackgroundSyncDate();
    const interval = await settings.getSyncIntervalMs();
    const overdue = last === null || this.clock().getTime() - Date.parse(last) > interval;
    if (!overdue) return false;

    debugLog('[SCHEDULER] Background sync overdue');
    await this.schedulePeriodic(config.overdueDelayMs);
    return true;
  }

  // ===========================================================================
  // Auto-Sync
  // ===========================================================================

  /**
   * Arm the auto-sync timer if auto-sync is enabled.
   *
   * @returns The request, or null when auto-sync is off.
   */
  async startAutoSync(): Promise<SyncRequest | null> {
    if (!(await this.deps.settings.isAutoSyncEnabled())) return null;
    const request: SyncRequest = {
      kind: 'foreground',
      earliestBegin: new Date(this.clock().getTime() + this.deps.config.autoSyncIntervalMs),
      requiresNetwork: true,
      requiresExternalPower: false
    };
    this.deps.trigger.schedule(request, (signal) => this.runForeground(signal));
    return request;
  }

  stopAutoSync(): void {
    this.deps.trigger.cancel('foreground');
  }

  async setAutoSyncEnabled(enabled: boolean): Promise<void> {
    await this.deps.settings.setAutoSyncEnabled(enabled);
    debugLog(`[SCHEDULER] Auto-sync ${enabled ? 'enabled' : 'disabled'}`);
    if (enabled) {
      await this.startAutoSync();
    } else {
      this.stopAutoSync();
    }
  }

  /**
   * Sync everything pending when there is something to upload and a usable
   * network. A cycle already in progress counts as done.
   *
   * @returns The cycle's result, or null when nothing ran.
   */
  async syncIfNeeded(signal?: AbortSignal): Promise<SyncResult | null> {
    const { store, settings, conditions, runner } = this.deps;
    if ((await store.countPending()) === 0) return null;

    const allowCellular = await settings.isCellularSyncAllowed();
    if (!shouldSync(conditions.current(), allowCellular, 0)) {
      debugLog('[SCHEDULER] No usable network, skipping auto-sync');
      return null;
    }

    try {
      return await runner.syncPendingChanges({ signal });
    } catch (e) {
      const error = toSyncError(e);
      if (error.code === 'alreadySyncing') {
        debugLog('[SCHEDULER] Sync already in progress, skipping auto-sync');
      } else {
        debugError(`[SCHEDULER] Auto-sync failed (${error.code}):`, error.message);
      }
      return null;
    }
  }

  /**
   * The host's budget ran out: cancel the running cycle and re-arm the next
   * periodic attempt.
   */
  async expire(): Promise<void> {
    debugWarn('[SCHEDULER] Execution window expired, cancelling sync');
    this.deps.trigger.expireRunning();
    this.deps.runner.cancelPendingSync();
    await this.schedulePeriodic();
  }

  // ===========================================================================
  // Settings
  // ===========================================================================

  async setEnabled(enabled: boolean): Promise<void> {
    await this.deps.settings.setBackgroundSyncEnabled(enabled);
    if (enabled) {
      await this.schedulePeriodic();
      await this.scheduleBulkIfNeeded();
    } else {
      this.deps.trigger.cancel('periodic');
      this.deps.trigger.cancel('bulk');
    }
  }

  async setInterval(ms: number): Promise<void> {
    await this.deps.settings.setSyncIntervalMs(ms);
    if (await this.deps.settings.isBackgroundSyncEnabled()) await this.schedulePeriodic();
  }

  setAllowCellular(allowed: boolean): Promise<void> {
    return this.deps.settings.setCellularSyncAllowed(allowed);
  }

  /** Queue entities for the next window and request a bulk window if warranted. */
  async addToSyncQueue(uuids: string[], priority: SyncPriority = 'normal'): Promise<void> {
    this.deps.queue.enqueueAll(uuids, priority);
    if (await this.deps.settings.isBackgroundSyncEnabled()) await this.scheduleBulkIfNeeded();
  }

  // ===========================================================================
  // Windows
  // ===========================================================================

  private async runPeriodic(signal: AbortSignal): Promise<void> {
    try {
      if (!(await this.deps.settings.isBackgroundSyncEnabled())) return;
      if (!(await this.canSync())) {
        debugLog('[SCHEDULER] Conditions not met, skipping periodic sync');
        return;
      }
      const items = this.deps.queue
        .dequeue(this.deps.config.lightweightLimit, 'high')
        .map((uuid): QueuedItem => ({ uuid, priority: 'high' }));
      await this.runWindow(items, signal);
      await this.scheduleBulkIfNeeded();
    } finally {
      await this.schedulePeriodic();
    }
  }

  private async runForeground(signal: AbortSignal): Promise<void> {
    try {
      if (await this.deps.settings.isAutoSyncEnabled()) await this.syncIfNeeded(signal);
    } finally {
      await this.startAutoSync();
    }
  }

  private async runBulk(request: SyncRequest, signal: AbortSignal): Promise<void> {
    const { config, queue } = this.deps;
    if (!(await this.canSync())) {
      debugLog('[SCHEDULER] Conditions not met, skipping bulk sync');
      return;
    }
    if (request.requiresExternalPower && !this.deps.conditions.current().isCharging) {
      debugLog('[SCHEDULER] Bulk sync needs external power, deferring');
      await this.scheduleBulkIfNeeded();
      return;
    }

    const items: QueuedItem[] = [];
    while (items.length < config.bulkLimit && queue.size > 0) {
      items.push(...queue.dequeueItems(Math.min(config.bulkBatchSize, config.bulkLimit - items.length)));
    }
    await this.runWindow(items, signal);
  }

  /**
   * Run one cycle restricted to `items`, then put back whatever is still
   * waiting to be uploaded at the priority it was queued with.
   */
  private async runWindow(items: QueuedItem[], signal: AbortSignal): Promise<void> {
    const { runner, settings, queue, store } = this.deps;
    const uuids = items.map((item) => item.uuid);
    const priorities = new Map(items.map((item) => [item.uuid, item.priority]));
    debugLog(`[SCHEDULER] Running window with ${items.length} queued item(s)`);
    try {
      const result = await runner.syncPendingChanges({ only: uuids, signal });
      if (!result.cancelled) await settings.setLastBackgroundSyncDate(this.clock());
    } catch (e) {
      const error = toSyncError(e);
      debugError(`[SCHEDULER] Background sync failed (${error.code}):`, error.message);
    } finally {
      const leftovers = await store.getMany(uuids);
      for (const entity of leftovers) {
        if (entity.syncStatus === 'pendingUpload' && !entity.conflictResolutionNeeded) {
          queue.enqueue(entity.uuid, priorities.get(entity.uuid) ?? 'normal');
        }
      }
    }
  }
}
