/**
 * @fileoverview Sync Orchestrator
 *
 * Drives one complete sync cycle between the local entity store and the
 * remote record store:
 *
 * ```
 * idle → verifyingRemoteAvailability → uploading → downloading → resolvingConflicts → idle
 *                    └──────────────────── any error ─────────────────────────────→ idle (failed)
 * ```
 *
 * ## Phases
 *
 * - **Verify**: ask the remote for the account status. `noAccount` fails with
 *   `authenticationRequired`; `restricted` / `unknown` with
 *   `networkUnavailable`. Nothing is uploaded or downloaded on failure.
 * - **Upload**: pending, unflagged entities go out in chunks of `batchSize`,
 *   one `saveRecords(chunk, 'changedKeysOnly')` per chunk, retried on
 *   transient failure. Per record: success → `synced` with the new change
 *   tag; stale change tag → flagged as conflict; record gone from the
 *   server → detached and re-queued; transient failure → stays pending and
 *   is re-queued; anything else → `error` status.
 * - **Download**: pages of records modified after the watermark. Each page is
 *   applied and persisted, then the watermark advances to the page's latest
 *   `lastModified`. An expired cursor resets the watermark and restarts the
 *   download once from scratch.
 * - **Resolve**: every flagged entity is compared against the current remote
 *   version and either cleared (no real conflict) or run through the active
 *   resolution strategy.
 *
 * ## Cancellation
 *
 * {@link SyncOrchestrator.cancelPendingSync} aborts the cycle's signal. The
 * signal is checked between phases, chunks, pages and conflicts, and during
 * retry back-off. Work already committed stays committed; the result carries
 * `cancelled: true`.
 *
 * ## Mutual exclusion
 *
 * At most one cycle runs per orchestrator. A second call while a cycle is in
 * flight fails immediately with `alreadySyncing`.
 */

import type { ResolvedConfig } from './config';
import type { ConflictResolver, ManualChoice } from './conflicts';
import { debugError, debugLog, debugWarn } from './debug';
import type { EntityStore } from './entityStore';
import { SyncError, toSyncError } from './errors';
import type { SyncPriorityQueue } from './priorityQueue';
import type { QueryPage, RemoteRecordStore } from './remote';
import { toOutgoingRecord } from './remote';
import type { RetryHooks } from './retry';
import { withRetry } from './retry';
import type { SyncSettings } from './settings';
import { EPOCH } from './settings';
import type { SyncStatusStore } from './stores/sync';
import type {
  ConflictHistoryEntry,
  ConflictResolution,
  RemoteRecord,
  SyncDirection,
  SyncEntity,
  SyncPhase,
  SyncProgress,
  SyncResult
} from './types';
import { chunk, maxIso } from './utils';

// =============================================================================
// Types
// =============================================================================

export interface SyncOptions {
  /** Default: `'bidirectional'`. */
  direction?: SyncDirection;
  /** Restrict the upload phase to these entities. */
  only?: Iterable<string>;
  /** External cancellation, e.g. a host's execution budget. */
  signal?: AbortSignal;
  /** Forget the download watermark before downloading. */
  fullResync?: boolean;
}

export type SyncEvent =
  | { type: 'start'; direction: SyncDirection }
  | { type: 'phase'; phase: SyncPhase }
  | { type: 'progress'; progress: SyncProgress }
  | { type: 'conflictDetected'; entityUUID: string }
  | { type: 'complete'; result: SyncResult }
  | { type: 'fail'; error: SyncError };

export interface OrchestratorDeps {
  config: ResolvedConfig;
  store: EntityStore;
  queue: SyncPriorityQueue;
  resolver: ConflictResolver;
  settings: SyncSettings;
  remote: RemoteRecordStore;
  status: SyncStatusStore;
  /** Back-off overrides (random source, sleep). */
  retryHooks?: Pick<RetryHooks, 'random' | 'sleep'>;
  clock?: () => Date;
}

/** Mutable bookkeeping for one cycle. */
interface Cycle {
  signal: AbortSignal;
  result: SyncResult;
  progress: SyncProgress;
}

const CYCLE_FATAL_CODES = new Set(['authenticationRequired', 'zoneNotFound', 'permissionFailure', 'quotaExceeded']);

// =============================================================================
// Orchestrator
// =============================================================================

export class SyncOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly clock: () => Date;
  private running: AbortController | null = null;
  private readonly syncCompleteCallbacks: Set<(result: SyncResult) => void> = new Set();
  private readonly eventCallbacks: Set<(event: SyncEvent) => void> = new Set();

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  get isSyncing(): boolean {
    return this.running !== null;
  }

  // ===========================================================================
  // Callbacks
  // ===========================================================================

  /**
   * Register a callback run after every cycle that was not cancelled or
   * failed. Returns an unsubscribe function.
   */
  onSyncComplete(callback: (result: SyncResult) => void): () => void {
    this.syncCompleteCallbacks.add(callback);
    return () => {
      this.syncCompleteCallbacks.delete(callback);
    };
  }

  onSyncEvent(callback: (event: SyncEvent) => void): () => void {
    this.eventCallbacks.add(callback);
    return () => {
      this.eventCallbacks.delete(callback);
    };
  }

  private emit(event: SyncEvent): void {
    for (const callback of this.eventCallbacks) {
      try {
        callback(event);
      } catch (e) {
        debugError('[SYNC] Event callback error:', e);
      }
    }
  }

  private notifySyncComplete(result: SyncResult): void {
    debugLog(`[SYNC] Notifying ${this.syncCompleteCallbacks.size} sync complete callback(s)`);
    for (const callback of this.syncCompleteCallbacks) {
      try {
        callback(result);
      } catch (e) {
        debugError('[SYNC] Sync complete callback error:', e);
      }
    }
  }

  // ===========================================================================
  // Cycle
  // ===========================================================================

  /**
   * Run one sync cycle.
   *
   * @throws {SyncError} `alreadySyncing` when a cycle is in flight; any
   *         cycle-level failure (verification, exhausted retries, a deleted
   *         zone) with its own code.
   */
  async syncPendingChanges(options: SyncOptions = {}): Promise<SyncResult> {
    if (this.running) {
      throw new SyncError('alreadySyncing');
    }
    const controller = new AbortController();
    this.running = controller;

    const external = options.signal;
    const forwardAbort = () => controller.abort();
    if (external?.aborted) controller.abort();
    external?.addEventListener('abort', forwardAbort, { once: true });

    const direction = options.direction ?? 'bidirectional';
    const cycle: Cycle = {
      signal: controller.signal,
      result: { uploaded: 0, downloaded: 0, conflicts: 0, errors: [], cancelled: false },
      progress: { completed: 0, total: 0 }
    };
    const { status } = this.deps;

    debugLog(`[SYNC] Cycle started (${direction})`);
    status.startCycle();
    this.emit({ type: 'start', direction });

    try {
      this.setPhase('verifyingRemoteAvailability');
      await this.verifyRemoteAvailability(cycle);

      if (direction !== 'download') {
        this.throwIfCancelled(cycle);
        this.setPhase('uploading');
        await this.upload(cycle, options.only ? new Set(options.only) : null);
      }
      if (direction !== 'upload') {
        this.throwIfCancelled(cycle);
        this.setPhase('downloading');
        if (options.fullResync) await this.resetWatermark();
        await this.download(cycle);

        this.throwIfCancelled(cycle);
        this.setPhase('resolvingConflicts');
        await this.resolveConflicts(cycle);
      }

      await this.finish(cycle);
      const result = cycle.result;
      status.finishCycle(result.errors.length > 0 ? { kind: 'partialSuccess', result } : { kind: 'success', result });
      this.emit({ type: 'complete', result });
      this.notifySyncComplete(result);
      debugLog(
        `[SYNC] Cycle complete: ${result.uploaded} up, ${result.downloaded} down, ${result.conflicts} conflict(s), ${result.errors.length} error(s)`
      );
      return result;
    } catch (e) {
      const error = toSyncError(e);
      if (error.code === 'cancelled') {
        cycle.result.cancelled = true;
        debugWarn('[SYNC] Cycle cancelled');
        status.finishCycle({ kind: 'partialSuccess', result: cycle.result });
        this.emit({ type: 'complete', result: cycle.result });
        return cycle.result;
      }
      debugError(`[SYNC] Cycle failed (${error.code}):`, error.message);
      status.finishCycle({ kind: 'failed', error });
      this.emit({ type: 'fail', error });
      throw error;
    } finally {
      external?.removeEventListener('abort', forwardAbort);
      this.running = null;
      status.setPhase('idle');
      await this.refreshPendingCount();
    }
  }

  /** Signal the running cycle, if any, to stop at its next checkpoint. */
  cancelPendingSync(): void {
    if (this.running) {
      debugLog('[SYNC] Cancellation requested');
      this.running.abort();
    }
  }

  private setPhase(phase: SyncPhase): void {
    this.deps.status.setPhase(phase);
    this.emit({ type: 'phase', phase });
  }

  private throwIfCancelled(cycle: Cycle): void {
    if (cycle.signal.aborted) throw new SyncError('cancelled');
  }

  private advance(cycle: Cycle, completed: number, total = 0): void {
    cycle.progress = { completed: cycle.progress.completed + completed, total: cycle.progress.total + total };
    this.deps.status.setProgress(cycle.progress);
    this.emit({ type: 'progress', progress: cycle.progress });
  }

  private retry<T>(cycle: Cycle, label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, this.deps.config.retry, { ...this.deps.retryHooks, signal: cycle.signal, label });
  }

  private async finish(cycle: Cycle): Promise<void> {
    await this.deps.settings.setLastSyncDate(this.clock());
    if (cycle.result.errors.length === 0) {
      await this.deps.resolver.cleanupConflictHistory();
    }
  }

  private async refreshPendingCount(): Promise<void> {
    try {
      this.deps.status.setPendingCount(await this.deps.store.countPending());
    } catch (e) {
      debugWarn('[SYNC] Could not refresh pending count:', e);
    }
  }

  private recordEntityError(cycle: Cycle, error: SyncError): void {
    cycle.result.errors.push(error);
    this.deps.status.addSyncError({
      entityUUID: error.entityUUID,
      code: error.code,
      message: error.message,
      timestamp: this.clock().toISOString()
    });
  }

  // ===========================================================================
  // Verify
  // ===========================================================================

  private async verifyRemoteAvailability(cycle: Cycle): Promise<void> {
    const accountStatus = await this.retry(cycle, 'accountStatus', () => this.deps.remote.accountStatus());
    switch (accountStatus) {
      case 'available':
        return;
      case 'noAccount':
        throw new SyncError('authenticationRequired');
      case 'restricted':
      case 'unknown':
        throw new SyncError('networkUnavailable', `Remote account is ${accountStatus}`);
    }
  }

  // ===========================================================================
  // Upload
  // ===========================================================================

  private async upload(cycle: Cycle, only: Set<string> | null): Promise<void> {
    const { store, queue, remote, config } = this.deps;
    const uploadable = await store.fetchUploadable();
    const pending = only ? uploadable.filter((e) => only.has(e.uuid)) : uploadable;
    if (pending.length === 0) return;

    debugLog(`[SYNC] Uploading ${pending.length} entit${pending.length === 1 ? 'y' : 'ies'}`);
    this.advance(cycle, 0, pending.length);

    for (const batch of chunk(pending, config.batchSize)) {
      this.throwIfCancelled(cycle);
      const records = batch.map(toOutgoingRecord);
      try {
        const outcomes = await this.retry(cycle, 'saveRecords', () => remote.saveRecords(records, 'changedKeysOnly'));
        const byUUID = new Map(batch.map((e) => [e.uuid, e]));
        for (const outcome of outcomes) {
          const entity = byUUID.get(outcome.uuid);
          if (!entity) continue;
          if (outcome.ok) {
            await store.markSynced(entity.uuid, outcome.record, entity.lastModified, entity.fields);
            queue.remove(entity.uuid);
            cycle.result.uploaded++;
          } else {
            await this.handleRecordFailure(cycle, entity, outcome.error);
          }
        }
      } catch (e) {
        const error = toSyncError(e);
        if (error.code === 'cancelled' || error.retryable || CYCLE_FATAL_CODES.has(error.code)) {
          queue.enqueueAll(batch.map((entity) => entity.uuid));
          throw error;
        }
        debugError(`[SYNC] Batch of ${batch.length} rejected (${error.code}):`, error.message);
        for (const entity of batch) {
          await store.markError(entity.uuid, error.message);
          queue.remove(entity.uuid);
          this.recordEntityError(cycle, new SyncError(error.code, error.message, { entityUUID: entity.uuid, cause: error }));
        }
      }
      this.advance(cycle, batch.length);
    }
  }

  private async handleRecordFailure(cycle: Cycle, entity: SyncEntity, error: SyncError): Promise<void> {
    const { store, queue } = this.deps;
    if (error.code === 'serverRecordChanged') {
      debugLog(`[SYNC] ${entity.uuid} changed on the server, flagging conflict`);
      await store.markAsConflict(entity.uuid);
      queue.remove(entity.uuid);
      this.emit({ type: 'conflictDetected', entityUUID: entity.uuid });
      return;
    }
    if (error.code === 'unknownItem' && entity.recordID !== null) {
      debugLog(`[SYNC] ${entity.uuid} no longer exists on the server, recreating it`);
      await store.detachFromRemote(entity.uuid);
      queue.enqueue(entity.uuid, 'high');
      return;
    }
    if (error.retryable) {
      queue.enqueue(entity.uuid, 'normal');
    } else {
      await store.markError(entity.uuid, error.message);
      queue.remove(entity.uuid);
    }
    this.recordEntityError(cycle, error);
  }

  // ===========================================================================
  // Download
  // ===========================================================================

  private async download(cycle: Cycle): Promise<void> {
    const { store, settings, remote, config } = this.deps;
    const entityTypes = [...config.entityTypes.keys()];
    let modifiedAfter = await settings.getWatermark(remote.id);
    let cursor: string | null = null;
    let restarted = false;

    for (;;) {
      this.throwIfCancelled(cycle);

      let page: QueryPage;
      try {
        const query = { modifiedAfter, entityTypes };
        page = await this.retry(cycle, 'queryRecords', () => remote.queryRecords(query, cursor, config.batchSize));
      } catch (e) {
        const error = toSyncError(e);
        if (error.code === 'changeTokenExpired' && !restarted) {
          debugWarn('[SYNC] Change token expired, restarting download from a full resync');
          restarted = true;
          await settings.resetWatermark(remote.id);
          modifiedAfter = EPOCH;
          cursor = null;
          continue;
        }
        throw error;
      }

      this.advance(cycle, 0, page.records.length);
      let pageMax: string | null = null;
      for (const record of page.records) {
        const outcome = await store.applyRemote(record);
        if (outcome === 'created' || outcome === 'updated') cycle.result.downloaded++;
        if (outcome === 'conflict') this.emit({ type: 'conflictDetected', entityUUID: record.uuid });
        pageMax = maxIso(pageMax, record.lastModified);
        this.advance(cycle, 1);
      }

      // The page is fully persisted; only now may the watermark move
      if (pageMax) await settings.advanceWatermark(remote.id, pageMax);

      if (!page.nextCursor) break;
      cursor = page.nextCursor;
    }
  }

  // ===========================================================================
  // Resolve
  // ===========================================================================

  private async resolveConflicts(cycle: Cycle): Promise<void> {
    const { store, queue, resolver, remote } = this.deps;
    const flagged = await store.fetchConflicts();
    if (flagged.length === 0) return;

    debugLog(`[SYNC] Resolving ${flagged.length} flagged entit${flagged.length === 1 ? 'y' : 'ies'}`);
    this.advance(cycle, 0, flagged.length);

    for (const entity of flagged) {
      this.throwIfCancelled(cycle);
      const recordID = entity.recordID;
      if (recordID === null) {
        debugWarn(`[SYNC] ${entity.uuid} is flagged but has no server identity yet, leaving it flagged`);
        this.advance(cycle, 1);
        continue;
      }

      let remoteRecord: RemoteRecord;
      try {
        remoteRecord = await this.retry(cycle, 'fetchRecord', () => remote.fetchRecord(recordID));
      } catch (e) {
        const error = toSyncError(e, entity.uuid);
        if (error.code === 'unknownItem') {
          // Nothing left to conflict with: the local version wins
          await store.detachFromRemote(entity.uuid);
          queue.enqueue(entity.uuid, 'high');
          this.advance(cycle, 1);
          continue;
        }
        if (error.code === 'cancelled' || error.retryable) throw error;
        this.recordEntityError(cycle, error);
        this.advance(cycle, 1);
        continue;
      }

      if (!resolver.detectConflict(entity, remoteRecord)) {
        debugLog(`[SYNC] ${entity.uuid} matches the server within tolerance, clearing flag`);
        await store.overwriteWithRemote(entity.uuid, remoteRecord);
        queue.remove(entity.uuid);
        await resolver.closeConverged(entity.uuid, remoteRecord.fields);
        this.advance(cycle, 1);
        continue;
      }

      cycle.result.conflicts++;
      const resolution = await resolver.resolveConflict(entity, entity, remoteRecord);
      await this.applyResolution(entity, remoteRecord, resolution);
      this.advance(cycle, 1);
    }
  }

  private async applyResolution(entity: SyncEntity, remoteRecord: RemoteRecord, resolution: ConflictResolution): Promise<void> {
    const { store, queue } = this.deps;
    switch (resolution.kind) {
      case 'useLocal':
        await store.keepLocalOver(entity.uuid, remoteRecord);
        queue.enqueue(entity.uuid, 'high');
        return;
      case 'useRemote':
        await store.overwriteWithRemote(entity.uuid, remoteRecord);
        queue.remove(entity.uuid);
        return;
      case 'merge':
        await store.applyMerged(entity.uuid, resolution.merged, remoteRecord);
        queue.enqueue(entity.uuid, 'high');
        return;
      case 'manual':
        this.emit({ type: 'conflictDetected', entityUUID: entity.uuid });
        return;
    }
  }

  // ===========================================================================
  // Conflicts API
  // ===========================================================================

  getPendingConflicts(): Promise<SyncEntity[]> {
    return this.deps.store.fetchConflicts();
  }

  /**
   * Run the active strategy on two versions of `entity` and record the
   * outcome in the conflict history. Automatic outcomes leave local state
   * alone. A `manual` outcome flags the stored entity and pulls it from the
   * upload queue until {@link resolveManually} settles it.
   */
  async resolveConflict(
    entity: SyncEntity,
    local: SyncEntity | RemoteRecord,
    remote: SyncEntity | RemoteRecord
  ): Promise<ConflictResolution> {
    const { resolver, store, queue } = this.deps;
    const resolution = await resolver.resolveConflict(entity, local, remote);
    if (resolution.kind === 'manual' && (await store.get(entity.uuid))) {
      await store.markAsConflict(entity.uuid);
      queue.remove(entity.uuid);
      this.emit({ type: 'conflictDetected', entityUUID: entity.uuid });
    }
    return resolution;
  }

  /**
   * Apply a user's decision on a conflict deferred by the `manual` strategy
   * and close its history entry.
   */
  async resolveManually(entityUUID: string, choice: ManualChoice, notes: string | null = null): Promise<ConflictHistoryEntry> {
    const { store, queue, remote, resolver } = this.deps;
    const entity = await store.get(entityUUID);
    if (!entity || !entity.conflictResolutionNeeded) {
      throw new SyncError('invalidArguments', `No pending conflict for ${entityUUID}`, { entityUUID });
    }

    let remoteRecord: RemoteRecord | null = null;
    if (entity.recordID !== null) {
      const recordID = entity.recordID;
      try {
        remoteRecord = await withRetry(() => remote.fetchRecord(recordID), this.deps.config.retry, {
          ...this.deps.retryHooks,
          label: 'fetchRecord'
        });
      } catch (e) {
        const error = toSyncError(e, entityUUID);
        if (error.code !== 'unknownItem') throw error;
      }
    }

    if (remoteRecord === null) {
      await store.detachFromRemote(entityUUID);
      if (choice.kind === 'merge') await store.applyMerged(entityUUID, choice.fields, null);
      queue.enqueue(entityUUID, 'high');
    } else if (choice.kind === 'useLocal') {
      await store.keepLocalOver(entityUUID, remoteRecord);
      queue.enqueue(entityUUID, 'high');
    } else if (choice.kind === 'useRemote') {
      await store.overwriteWithRemote(entityUUID, remoteRecord);
      queue.remove(entityUUID);
    } else {
      await store.applyMerged(entityUUID, choice.fields, remoteRecord);
      queue.enqueue(entityUUID, 'high');
    }

    return resolver.resolveManually(entityUUID, choice, notes);
  }

  // ===========================================================================
  // Watermark & Recovery
  // ===========================================================================

  lastSyncDate(): Promise<string | null> {
    return this.deps.settings.getLastSyncDate();
  }

  /** Forget the download watermark; the next download starts from scratch. */
  resetWatermark(): Promise<void> {
    return this.deps.settings.resetWatermark(this.deps.remote.id);
  }

  /**
   * Run a download-only cycle from an empty watermark. The reset happens
   * inside the cycle, so it fails with `alreadySyncing` without touching the
   * watermark while another cycle runs.
   */
  forceFullSync(): Promise<SyncResult> {
    return this.syncPendingChanges({ direction: 'download', fullResync: true });
  }

  /**
   * Recreate a remote zone reported as deleted (`zoneNotFound`), then reset
   * the watermark and re-queue every local entity so the next cycle
   * re-uploads them.
   */
  async recreateRemoteZone(): Promise<void> {
    const { remote, store, queue } = this.deps;
    if (!remote.createZone) {
      throw new SyncError('invalidArguments', `Remote store ${remote.id} cannot recreate its zone`);
    }
    try {
      await remote.createZone();
    } catch (e) {
      throw toSyncError(e);
    }
    await this.resetWatermark();
    for (const entity of await store.all()) {
      await store.detachFromRemote(entity.uuid);
      queue.enqueue(entity.uuid, 'normal');
    }
    debugLog('[SYNC] Remote zone recreated, all entities queued for re-upload');
  }
}
