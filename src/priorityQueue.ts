/**
 * @fileoverview Sync Priority Queue
 *
 * In-memory, tiered queue of entity uuids waiting to be synced. Three tiers
 * are drained strictly in order:
 *
 *   1. `userInitiated` / `high`
 *   2. `normal`
 *   3. `low`
 *
 * Each uuid appears at most once across all tiers. Enqueueing a uuid that is
 * already queued promotes it to the higher of the two tiers.
 *
 * All operations are synchronous. In a single-threaded runtime that is the
 * whole locking story: nothing awaits while queue state is being mutated, so
 * UI-side enqueues and scheduler-side dequeues cannot interleave mid-update.
 *
 * The queue is not persisted. After a restart it is rebuilt from the entity
 * store with {@link SyncPriorityQueue.rebuildFrom}.
 */

import { debugLog } from './debug';
import type { SyncEntity, SyncPriority } from './types';

type Tier = 0 | 1 | 2;

function tierOf(priority: SyncPriority): Tier {
  switch (priority) {
    case 'userInitiated':
    case 'high':
      return 0;
    case 'normal':
      return 1;
    case 'low':
      return 2;
  }
}

const TIER_PRIORITY: Record<Tier, SyncPriority> = { 0: 'high', 1: 'normal', 2: 'low' };

export interface QueuedItem {
  uuid: string;
  priority: SyncPriority;
}

export class SyncPriorityQueue {
  /** Insertion-ordered per tier; a `Set` gives O(1) append, membership and removal. */
  private readonly tiers: [Set<string>, Set<string>, Set<string>] = [new Set(), new Set(), new Set()];
  private readonly location = new Map<string, Tier>();

  /**
   * Append `uuid` to its tier. An already-queued uuid is moved up if the new
   * priority is higher, otherwise left where it is.
   */
  enqueue(uuid: string, priority: SyncPriority = 'normal'): void {
    const tier = tierOf(priority);
    const current = this.location.get(uuid);
    if (current !== undefined) {
      if (tier >= current) return;
      this.tiers[current].delete(uuid);
    }
    this.tiers[tier].add(uuid);
    this.location.set(uuid, tier);
  }

  enqueueAll(uuids: Iterable<string>, priority: SyncPriority = 'normal'): void {
    for (const uuid of uuids) this.enqueue(uuid, priority);
  }

  /**
   * Remove and return up to `count` uuids, exhausting higher tiers first.
   */
  dequeueBatch(count: number): string[] {
    return this.dequeueItems(count).map((item) => item.uuid);
  }

  /** {@link dequeueBatch}, keeping the priority each item was queued at. */
  dequeueItems(count: number): QueuedItem[] {
    const batch: QueuedItem[] = [];
    for (const tier of [0, 1, 2] as const) {
      if (batch.length >= count) break;
      this.drainTier(tier, count - batch.length, batch);
    }
    if (batch.length > 0) debugLog(`[QUEUE] Dequeued ${batch.length} item(s), ${this.size} remaining`);
    return batch;
  }

  /** Remove and return up to `count` uuids from the tier of `priority` only. */
  dequeue(count: number, priority: SyncPriority): string[] {
    const batch: QueuedItem[] = [];
    this.drainTier(tierOf(priority), count, batch);
    return batch.map((item) => item.uuid);
  }

  /** The item `dequeueBatch(1)` would return, without removing it. */
  peek(): QueuedItem | null {
    for (const tier of [0, 1, 2] as const) {
      for (const uuid of this.tiers[tier]) {
        return { uuid, priority: TIER_PRIORITY[tier] };
      }
    }
    return null;
  }

  has(uuid: string): boolean {
    return this.location.has(uuid);
  }

  remove(uuid: string): boolean {
    const tier = this.location.get(uuid);
    if (tier === undefined) return false;
    this.tiers[tier].delete(uuid);
    this.location.delete(uuid);
    return true;
  }

  get size(): number {
    return this.location.size;
  }

  sizeOf(priority: SyncPriority): number {
    return this.tiers[tierOf(priority)].size;
  }

  clear(): void {
    for (const tier of this.tiers) tier.clear();
    this.location.clear();
  }

  /**
   * Reset the queue to exactly the entities that still need syncing.
   * Entities in conflict are left out; they wait for resolution instead.
   */
  rebuildFrom(entities: SyncEntity[], priorityOf: (entity: SyncEntity) => SyncPriority = () => 'normal'): void {
    this.clear();
    for (const entity of entities) {
      if (entity.syncStatus === 'synced' || entity.conflictResolutionNeeded) continue;
      this.enqueue(entity.uuid, priorityOf(entity));
    }
    debugLog(`[QUEUE] Rebuilt with ${this.size} item(s)`);
  }

  private drainTier(tier: Tier, limit: number, into: QueuedItem[]): void {
    const set = this.tiers[tier];
    for (const uuid of set) {
      if (limit <= 0) break;
      set.delete(uuid);
      this.location.delete(uuid);
      into.push({ uuid, priority: TIER_PRIORITY[tier] });
      limit--;
    }
  }
}
