/**
 * Shared test setup: a fresh fake-indexeddb per engine, a manual trigger and
 * a deterministic clock.
 */

import { IDBFactory, IDBKeyRange } from 'fake-indexeddb';
import { REPORT_ENTITY, type SyncEngineConfig } from '../config';
import type { DatabaseConfig } from '../database';
import type { SyncRequest, SyncTrigger, SyncWindowKind, SyncWindowRun } from '../scheduler';
import { createSyncEngine, type SyncEngine } from '../syncEngine';
import type { EntityFields } from '../types';
import { MemoryRecordStore } from './memoryRecordStore';

let dbCounter = 0;

export function testDatabase(): DatabaseConfig {
  dbCounter++;
  return { name: `tidesync-test-${dbCounter}`, indexedDB: new IDBFactory(), IDBKeyRange };
}

/**
 * A clock that advances `stepMs` on every read, so successive writes get
 * distinct, ordered timestamps.
 */
export function tickingClock(start = '2024-06-01T12:00:00.000Z', stepMs = 1000) {
  let current = Date.parse(start);
  const clock = () => {
    const now = new Date(current);
    current += stepMs;
    return now;
  };
  clock.advance = (ms: number) => {
    current += ms;
  };
  clock.peek = () => new Date(current);
  return clock;
}

/** Trigger that records requests and only fires when the test says so. */
export class ManualTrigger implements SyncTrigger {
  readonly requests: SyncRequest[] = [];
  private readonly pendingRuns = new Map<SyncWindowKind, { request: SyncRequest; run: SyncWindowRun }>();
  private readonly running = new Set<AbortController>();

  schedule(request: SyncRequest, run: SyncWindowRun): void {
    this.requests.push(request);
    this.pendingRuns.set(request.kind, { request, run });
  }

  cancel(kind: SyncWindowKind): void {
    this.pendingRuns.delete(kind);
  }

  expireRunning(): void {
    for (const controller of this.running) controller.abort();
  }

  pending(kind: SyncWindowKind): SyncRequest | undefined {
    return this.pendingRuns.get(kind)?.request;
  }

  /** Run the pending window of `kind` to completion. */
  async fire(kind: SyncWindowKind): Promise<void> {
    const entry = this.pendingRuns.get(kind);
    if (!entry) throw new Error(`No ${kind} window scheduled`);
    this.pendingRuns.delete(kind);
    const controller = new AbortController();
    this.running.add(controller);
    try {
      await entry.run(controller.signal);
    } finally {
      this.running.delete(controller);
    }
  }
}

export interface TestEngine {
  engine: SyncEngine;
  remote: MemoryRecordStore;
  trigger: ManualTrigger;
  clock: ReturnType<typeof tickingClock>;
}

export async function createTestEngine(
  overrides: Partial<Omit<SyncEngineConfig, 'database' | 'remote'>> = {},
  remote: MemoryRecordStore = new MemoryRecordStore()
): Promise<TestEngine> {
  const trigger = new ManualTrigger();
  const clock = tickingClock();
  const engine = await createSyncEngine(
    { entityTypes: [REPORT_ENTITY], ...overrides, remote, database: testDatabase() },
    { trigger, clock, retryHooks: { sleep: async () => {}, random: () => 0 } }
  );
  return { engine, remote, trigger, clock };
}

/** A report with every field populated. */
export function reportFields(overrides: EntityFields = {}): EntityFields {
  return {
    species: ['crab', 'flounder'],
    intensity: 'Minor',
    location: { latitude: 30.6954, longitude: -88.0399 },
    notes: 'Observed near the pier',
    environmentalConditions: { waterTemperature: 27.5, salinity: 18 },
    timestamp: '2024-06-01T05:30:00.000Z',
    ...overrides
  };
}
