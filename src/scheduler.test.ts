import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type Dexie from 'dexie';
import { DEFAULT_SCHEDULER_CONFIG, type ResolvedSchedulerConfig } from './config';
import { createDatabase } from './database';
import type { SyncOptions } from './engine';
import { SyncError } from './errors';
import { SyncPriorityQueue } from './priorityQueue';
import { BackgroundScheduler, TimerTrigger, shouldSync, type SyncRequest } from './scheduler';
import { SyncSettings } from './settings';
import { createDeviceConditionsStore, type DeviceConditionsStore } from './stores/network';
import { ManualTrigger, testDatabase } from './test-utils/harness';
import type { DeviceConditions, SyncEntity, SyncResult, SyncStatus } from './types';

const HOUR = 60 * 60 * 1000;
// 22:30 local time, so the next low-usage window is tomorrow at 02:00
const NOW = new Date(2024, 5, 1, 22, 30);

const GOOD_CONDITIONS: DeviceConditions = { batteryLevel: 0.8, isCharging: false, network: 'wifi', isExpensive: false };

function okResult(overrides: Partial<SyncResult> = {}): SyncResult {
  return { uploaded: 0, downloaded: 0, conflicts: 0, errors: [], cancelled: false, ...overrides };
}

function entity(uuid: string, syncStatus: SyncStatus): SyncEntity {
  return {
    uuid,
    entityType: 'report',
    recordID: null,
    fields: {},
    fieldModifiedAt: {},
    base: null,
    syncStatus,
    lastModified: NOW.toISOString(),
    changeTag: null,
    conflictResolutionNeeded: false,
    lastError: null
  };
}

describe('shouldSync', () => {
  it('skips on low battery unless charging', () => {
    expect(shouldSync({ ...GOOD_CONDITIONS, batteryLevel: 0.15 }, false)).toBe(false);
    expect(shouldSync({ ...GOOD_CONDITIONS, batteryLevel: 0.15, isCharging: true }, false)).toBe(true);
    expect(shouldSync({ ...GOOD_CONDITIONS, batteryLevel: 0.2 }, false)).toBe(true);
  });

  it('skips when offline', () => {
    expect(shouldSync({ ...GOOD_CONDITIONS, network: 'none' }, true)).toBe(false);
  });

  it('skips cellular and metered connections unless allowed', () => {
    expect(shouldSync({ ...GOOD_CONDITIONS, network: 'cellular' }, false)).toBe(false);
    expect(shouldSync({ ...GOOD_CONDITIONS, network: 'cellular' }, true)).toBe(true);
    expect(shouldSync({ ...GOOD_CONDITIONS, isExpensive: true }, false)).toBe(false);
  });
});

describe('BackgroundScheduler', () => {
  let db: Dexie;
  let settings: SyncSettings;
  let queue: SyncPriorityQueue;
  let trigger: ManualTrigger;
  let conditions: DeviceConditionsStore;
  let pendingCount: number;
  let entities: Map<string, SyncEntity>;
  let runner: {
    syncPendingChanges: Mock<(options?: SyncOptions) => Promise<SyncResult>>;
    cancelPendingSync: Mock<() => void>;
  };

  function createScheduler(config: Partial<ResolvedSchedulerConfig> = {}): BackgroundScheduler {
    return new BackgroundScheduler({
      config: { ...DEFAULT_SCHEDULER_CONFIG, ...config },
      runner,
      queue,
      store: {
        countPending: async () => pendingCount,
        getMany: async (uuids: string[]) => uuids.flatMap((uuid) => entities.get(uuid) ?? [])
      },
      settings,
      conditions,
      trigger,
      clock: () => new Date(NOW.getTime())
    });
  }

  function onlyOf(call: number): string[] {
    const options = runner.syncPendingChanges.mock.calls[call]?.[0];
    return [...(options?.only ?? [])];
  }

  beforeEach(async () => {
    db = await createDatabase(testDatabase());
    settings = new SyncSettings(db, DEFAULT_SCHEDULER_CONFIG.intervalMs);
    queue = new SyncPriorityQueue();
    trigger = new ManualTrigger();
    conditions = createDeviceConditionsStore(GOOD_CONDITIONS);
    pendingCount = 0;
    entities = new Map();
    runner = {
      syncPendingChanges: vi.fn(async (_options?: SyncOptions) => okResult()),
      cancelPendingSync: vi.fn(() => {})
    };
  });

  afterEach(() => {
    db.close();
  });

  // ===========================================================================
  // Requests
  // ===========================================================================

  describe('requests', () => {
    it('arms the periodic window one interval out', async () => {
      const scheduler = createScheduler();
      await scheduler.start();

      expect(trigger.pending('periodic')).toEqual({
        kind: 'periodic',
        earliestBegin: new Date(NOW.getTime() + 6 * HOUR),
        requiresNetwork: true,
        requiresExternalPower: false
      });
      expect(trigger.pending('bulk')).toBeUndefined();
    });

    it('requests a bulk window only above the threshold, at the next 02:00', async () => {
      const scheduler = createScheduler();

      pendingCount = 50;
      expect(await scheduler.scheduleBulkIfNeeded()).toBeNull();

      pendingCount = 51;
      const request = await scheduler.scheduleBulkIfNeeded();
      expect(request).toEqual({
        kind: 'bulk',
        earliestBegin: new Date(2024, 5, 2, 2, 0),
        requiresNetwork: true,
        requiresExternalPower: false
      });
    });

    it('requires external power above 200 pending', async () => {
      pendingCount = 201;
      const request = await createScheduler().scheduleBulkIfNeeded();
      expect(request?.requiresExternalPower).toBe(true);
    });

    it('does nothing while background sync is disabled', async () => {
      const scheduler = createScheduler();
      await scheduler.start();
      await scheduler.setEnabled(false);

      expect(trigger.pending('periodic')).toBeUndefined();
      expect(await scheduler.evaluateSyncNeed()).toBe(false);

      await scheduler.setEnabled(true);
      expect(trigger.pending('periodic')).toBeDefined();
    });

    it('re-arms with a new interval', async () => {
      const scheduler = createScheduler();
      await scheduler.setInterval(2 * HOUR);

      expect(await settings.getSyncIntervalMs()).toBe(2 * HOUR);
      expect(trigger.pending('periodic')?.earliestBegin).toEqual(new Date(NOW.getTime() + 2 * HOUR));
    });

    it('persists the cellular preference', async () => {
      const scheduler = createScheduler();
      await conditions.report({ network: 'cellular' });
      expect(await scheduler.canSync()).toBe(false);

      await scheduler.setAllowCellular(true);
      expect(await scheduler.canSync()).toBe(true);
    });

    it('queues entities and asks for a bulk window when warranted', async () => {
      const scheduler = createScheduler();
      pendingCount = 80;

      await scheduler.addToSyncQueue(['a', 'b'], 'low');

      expect(queue.sizeOf('low')).toBe(2);
      expect(trigger.pending('bulk')?.requiresExternalPower).toBe(false);
    });
  });

  describe('evaluateSyncNeed', () => {
    it('requests a run 60s out when no background sync ever ran', async () => {
      const scheduler = createScheduler();
      expect(await scheduler.evaluateSyncNeed()).toBe(true);
      expect(trigger.pending('periodic')?.earliestBegin).toEqual(new Date(NOW.getTime() + 60_000));
    });

    it('leaves a recent sync alone', async () => {
      await settings.setLastBackgroundSyncDate(new Date(NOW.getTime() - HOUR));
      expect(await createScheduler().evaluateSyncNeed()).toBe(false);
      expect(trigger.pending('periodic')).toBeUndefined();
    });

    it('runs on reconnect', async () => {
      const scheduler = createScheduler();
      await scheduler.start();
      await settings.setLastBackgroundSyncDate(new Date(NOW.getTime() - 7 * HOUR));

      await conditions.report({ network: 'none' });
      await conditions.report({ network: 'wifi' });

      expect(trigger.pending('periodic')?.earliestBegin).toEqual(new Date(NOW.getTime() + 60_000));

      scheduler.stop();
      expect(trigger.pending('periodic')).toBeUndefined();
    });
  });

  // ===========================================================================
  // Windows
  // ===========================================================================

  describe('periodic window', () => {
    it('syncs at most 20 high-priority items and re-queues what is still pending', async () => {
      const scheduler = createScheduler();
      const high = Array.from({ length: 25 }, (_, i) => `h${i}`);
      queue.enqueueAll(high, 'high');
      queue.enqueueAll(['n0', 'n1'], 'normal');
      entities.set('h0', entity('h0', 'pendingUpload'));
      entities.set('h1', entity('h1', 'synced'));
      await scheduler.schedulePeriodic();

      await trigger.fire('periodic');

      expect(onlyOf(0)).toEqual(high.slice(0, 20));
      expect(queue.sizeOf('high')).toBe(6);
      expect(queue.has('h0')).toBe(true);
      expect(queue.has('h1')).toBe(false);
      expect(queue.sizeOf('normal')).toBe(2);
      expect(await settings.getLastBackgroundSyncDate()).toBe(NOW.toISOString());
      expect(trigger.pending('periodic')).toBeDefined();
    });

    it('skips when conditions are poor but still re-arms', async () => {
      const scheduler = createScheduler();
      await conditions.report({ batteryLevel: 0.15, isCharging: false });
      await scheduler.schedulePeriodic();

      await trigger.fire('periodic');

      expect(runner.syncPendingChanges).not.toHaveBeenCalled();
      expect(trigger.pending('periodic')).toBeDefined();
    });

    it('re-arms after a failed cycle', async () => {
      runner.syncPendingChanges.mockRejectedValueOnce(new Error('Failed to fetch'));
      const scheduler = createScheduler();
      await scheduler.schedulePeriodic();

      await trigger.fire('periodic');

      expect(await settings.getLastBackgroundSyncDate()).toBeNull();
      expect(trigger.pending('periodic')).toBeDefined();
    });
  });

  describe('bulk window', () => {
    it('drains up to 500 items in one cycle', async () => {
      const scheduler = createScheduler();
      queue.enqueueAll(Array.from({ length: 600 }, (_, i) => `e${i}`));
      pendingCount = 600;
      await conditions.report({ isCharging: true });
      await scheduler.scheduleBulkIfNeeded();

      await trigger.fire('bulk');

      expect(onlyOf(0)).toHaveLength(500);
      expect(onlyOf(0)[499]).toBe('e499');
      expect(queue.size).toBe(100);
    });

    it('puts leftovers back at the tier they were queued at', async () => {
      const scheduler = createScheduler({ bulkThreshold: 1 });
      queue.enqueueAll(['h0', 'h1'], 'high');
      queue.enqueue('n0', 'normal');
      queue.enqueue('l0', 'low');
      for (const uuid of ['h0', 'h1', 'n0', 'l0']) entities.set(uuid, entity(uuid, 'pendingUpload'));
      pendingCount = 4;
      await scheduler.scheduleBulkIfNeeded();

      await trigger.fire('bulk');

      expect(onlyOf(0)).toEqual(['h0', 'h1', 'n0', 'l0']);
      expect(queue.sizeOf('high')).toBe(2);
      expect(queue.sizeOf('normal')).toBe(1);
      expect(queue.sizeOf('low')).toBe(1);
      expect(queue.peek()).toEqual({ uuid: 'h0', priority: 'high' });
    });

    it('defers when external power is required but missing', async () => {
      const scheduler = createScheduler();
      pendingCount = 250;
      await scheduler.scheduleBulkIfNeeded();
      const countBefore = trigger.requests.length;

      await trigger.fire('bulk');

      expect(runner.syncPendingChanges).not.toHaveBeenCalled();
      expect(trigger.requests).toHaveLength(countBefore + 1);
      expect(trigger.pending('bulk')?.requiresExternalPower).toBe(true);
    });
  });

  describe('auto-sync', () => {
    it('arms the foreground timer on start and follows the setting', async () => {
      const scheduler = createScheduler();
      await scheduler.start();
      expect(trigger.pending('foreground')).toEqual({
        kind: 'foreground',
        earliestBegin: new Date(NOW.getTime() + 5 * 60 * 1000),
        requiresNetwork: true,
        requiresExternalPower: false
      });

      await scheduler.setAutoSyncEnabled(false);
      expect(trigger.pending('foreground')).toBeUndefined();
      expect(await settings.isAutoSyncEnabled()).toBe(false);

      await scheduler.setAutoSyncEnabled(true);
      expect(trigger.pending('foreground')).toBeDefined();

      scheduler.stop();
      expect(trigger.pending('foreground')).toBeUndefined();
    });

    it('syncs everything pending when the timer fires, then re-arms', async () => {
      const scheduler = createScheduler();
      pendingCount = 3;
      await scheduler.startAutoSync();

      await trigger.fire('foreground');

      expect(runner.syncPendingChanges).toHaveBeenCalledTimes(1);
      expect(onlyOf(0)).toEqual([]);
      expect(runner.syncPendingChanges.mock.calls[0]?.[0]?.signal).toBeInstanceOf(AbortSignal);
      expect(trigger.pending('foreground')).toBeDefined();
    });

    it('neither syncs nor re-arms once disabled', async () => {
      const scheduler = createScheduler();
      pendingCount = 3;
      await scheduler.startAutoSync();
      await settings.setAutoSyncEnabled(false);

      await trigger.fire('foreground');

      expect(runner.syncPendingChanges).not.toHaveBeenCalled();
      expect(trigger.pending('foreground')).toBeUndefined();
    });

    it('needs pending changes and a usable network, but not battery', async () => {
      const scheduler = createScheduler();
      expect(await scheduler.syncIfNeeded()).toBeNull();

      pendingCount = 2;
      await conditions.report({ network: 'cellular' });
      expect(await scheduler.syncIfNeeded()).toBeNull();
      expect(runner.syncPendingChanges).not.toHaveBeenCalled();

      await conditions.report({ network: 'wifi', batteryLevel: 0.05 });
      expect(await scheduler.syncIfNeeded()).toEqual(okResult());
      expect(runner.syncPendingChanges).toHaveBeenCalledTimes(1);
    });

    it('treats a cycle already in progress as done', async () => {
      runner.syncPendingChanges.mockRejectedValueOnce(new SyncError('alreadySyncing'));
      pendingCount = 1;
      expect(await createScheduler().syncIfNeeded()).toBeNull();
    });

    it('syncs on reconnect only while enabled', async () => {
      const scheduler = createScheduler();
      pendingCount = 1;
      await settings.setLastBackgroundSyncDate(NOW);
      await scheduler.start();

      await conditions.report({ network: 'none' });
      await conditions.report({ network: 'wifi' });
      expect(runner.syncPendingChanges).toHaveBeenCalledTimes(1);

      await scheduler.setAutoSyncEnabled(false);
      await conditions.report({ network: 'none' });
      await conditions.report({ network: 'wifi' });
      expect(runner.syncPendingChanges).toHaveBeenCalledTimes(1);
      scheduler.stop();
    });
  });

  describe('expiration', () => {
    it('cancels the running cycle and re-arms the periodic window', async () => {
      const signals: AbortSignal[] = [];
      runner.syncPendingChanges.mockImplementation(
        (options?: SyncOptions) =>
          new Promise<SyncResult>((resolve) => {
            const signal = options?.signal;
            if (!signal) {
              resolve(okResult());
              return;
            }
            signals.push(signal);
            if (signal.aborted) resolve(okResult({ cancelled: true }));
            else signal.addEventListener('abort', () => resolve(okResult({ cancelled: true })));
          })
      );
      const scheduler = createScheduler();
      await scheduler.schedulePeriodic();

      const firing = trigger.fire('periodic');
      await scheduler.expire();
      await firing;

      expect(runner.cancelPendingSync).toHaveBeenCalledTimes(1);
      expect(signals[0]?.aborted).toBe(true);
      expect(await settings.getLastBackgroundSyncDate()).toBeNull();
      const rearmed: SyncRequest | undefined = trigger.pending('periodic');
      expect(rearmed?.earliestBegin).toEqual(new Date(NOW.getTime() + 6 * HOUR));
    });
  });
});

describe('TimerTrigger', () => {
  const start = new Date('2024-06-01T12:00:00.000Z');

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function request(delayMs: number): SyncRequest {
    return {
      kind: 'periodic',
      earliestBegin: new Date(start.getTime() + delayMs),
      requiresNetwork: true,
      requiresExternalPower: false
    };
  }

  it('fires no earlier than the requested time', async () => {
    const trigger = new TimerTrigger({ now: () => start });
    const run = vi.fn(async (_signal: AbortSignal) => {});

    trigger.schedule(request(1000), run);
    expect(trigger.pending('periodic')).toBeDefined();

    await vi.advanceTimersByTimeAsync(999);
    expect(run).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(run).toHaveBeenCalledTimes(1);
    expect(trigger.pending('periodic')).toBeUndefined();
  });

  it('replaces and cancels pending requests', async () => {
    const trigger = new TimerTrigger({ now: () => start });
    const first = vi.fn(async (_signal: AbortSignal) => {});
    const second = vi.fn(async (_signal: AbortSignal) => {});

    trigger.schedule(request(1000), first);
    trigger.schedule(request(2000), second);
    await vi.advanceTimersByTimeAsync(2000);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);

    trigger.schedule(request(1000), first);
    trigger.cancel('periodic');
    await vi.advanceTimersByTimeAsync(5000);
    expect(first).not.toHaveBeenCalled();
  });

  it('aborts a run that exceeds its budget', async () => {
    const trigger = new TimerTrigger({ now: () => start, budgetMs: 500 });
    const signals: AbortSignal[] = [];
    trigger.schedule(request(0), (signal) => {
      signals.push(signal);
      return new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve()));
    });

    await vi.advanceTimersByTimeAsync(0);
    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(false);
    await vi.advanceTimersByTimeAsync(500);
    expect(signals[0]?.aborted).toBe(true);
  });

  it('aborts running windows on expireRunning and dispose', async () => {
    const trigger = new TimerTrigger({ now: () => start });
    const signals: AbortSignal[] = [];
    trigger.schedule(request(0), (signal) => {
      signals.push(signal);
      return new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve()));
    });
    await vi.advanceTimersByTimeAsync(0);

    trigger.expireRunning();
    expect(signals[0]?.aborted).toBe(true);

    trigger.schedule(request(1000), async () => {});
    trigger.dispose();
    expect(trigger.pending('periodic')).toBeUndefined();
  });
});
