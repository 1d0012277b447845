import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Dexie from 'dexie';
import { createDatabase } from './database';
import { EPOCH, SyncSettings } from './settings';
import { testDatabase } from './test-utils/harness';

describe('SyncSettings', () => {
  let db: Dexie;
  let settings: SyncSettings;

  beforeEach(async () => {
    db = await createDatabase(testDatabase());
    settings = new SyncSettings(db, 6 * 60 * 60 * 1000);
  });

  afterEach(() => {
    db.close();
  });

  it('starts every watermark at the epoch', async () => {
    expect(await settings.getWatermark('memory')).toBe(EPOCH);
    expect(EPOCH).toBe('1970-01-01T00:00:00.000Z');
  });

  it('only moves the watermark forward', async () => {
    expect(await settings.advanceWatermark('memory', '2024-06-01T12:00:00.000Z')).toBe('2024-06-01T12:00:00.000Z');
    expect(await settings.advanceWatermark('memory', '2024-06-01T11:00:00.000Z')).toBe('2024-06-01T12:00:00.000Z');
    expect(await settings.getWatermark('memory')).toBe('2024-06-01T12:00:00.000Z');
  });

  it('keeps watermarks per remote store and resets one at a time', async () => {
    await settings.advanceWatermark('a', '2024-06-01T12:00:00.000Z');
    await settings.advanceWatermark('b', '2024-06-02T12:00:00.000Z');
    await settings.resetWatermark('a');

    expect(await settings.getWatermark('a')).toBe(EPOCH);
    expect(await settings.getWatermark('b')).toBe('2024-06-02T12:00:00.000Z');
  });

  it('stores sync dates', async () => {
    expect(await settings.getLastSyncDate()).toBeNull();
    await settings.setLastSyncDate(new Date('2024-06-01T12:00:00.000Z'));
    await settings.setLastBackgroundSyncDate(new Date('2024-06-01T13:00:00.000Z'));
    expect(await settings.getLastSyncDate()).toBe('2024-06-01T12:00:00.000Z');
    expect(await settings.getLastBackgroundSyncDate()).toBe('2024-06-01T13:00:00.000Z');
  });

  it('has defaults for every preference', async () => {
    expect(await settings.isBackgroundSyncEnabled()).toBe(true);
    expect(await settings.isCellularSyncAllowed()).toBe(false);
    expect(await settings.isAutoSyncEnabled()).toBe(true);
    expect(await settings.getSyncIntervalMs()).toBe(6 * 60 * 60 * 1000);
  });

  it('persists preference changes', async () => {
    await settings.setBackgroundSyncEnabled(false);
    await settings.setCellularSyncAllowed(true);
    await settings.setAutoSyncEnabled(false);
    await settings.setSyncIntervalMs(15 * 60 * 1000);

    expect(await settings.isBackgroundSyncEnabled()).toBe(false);
    expect(await settings.isCellularSyncAllowed()).toBe(true);
    expect(await settings.isAutoSyncEnabled()).toBe(false);
    expect(await settings.getSyncIntervalMs()).toBe(15 * 60 * 1000);
  });

  it('rejects a non-positive interval', async () => {
    await expect(settings.setSyncIntervalMs(0)).rejects.toThrow('Sync interval must be a positive number');
  });
});
