/**
 * @fileoverview Persisted Sync Settings
 *
 * Simple key/value scalars kept in the `syncSettings` Dexie table: the
 * per-remote download watermark, last sync dates and the user's background
 * sync preferences.
 *
 * The watermark is monotonic. {@link SyncSettings.advanceWatermark} ignores
 * values that would move it backwards; only {@link SyncSettings.resetWatermark}
 * (cursor expiry, forced full resync) can lower it.
 */

import type Dexie from 'dexie';
import type { Table } from 'dexie';
import type { SettingRow } from './database';
import { settingsTable } from './database';
import { debugLog } from './debug';

/** Watermark of a store that has never been downloaded from. */
export const EPOCH = new Date(0).toISOString();

const KEYS = {
  lastSyncDate: 'lastSyncDate',
  lastBackgroundSyncDate: 'lastBackgroundSyncDate',
  backgroundSyncEnabled: 'backgroundSyncEnabled',
  syncIntervalMs: 'syncIntervalMs',
  allowCellularSync: 'allowCellularSync',
  autoSyncEnabled: 'autoSyncEnabled'
} as const;

function watermarkKey(remoteId: string): string {
  return `watermark:${remoteId}`;
}

export class SyncSettings {
  private readonly table: Table<SettingRow, string>;

  constructor(
    private readonly db: Dexie,
    private readonly defaultIntervalMs: number
  ) {
    this.table = settingsTable(db);
  }

  // ===========================================================================
  // Raw access
  // ===========================================================================

  private async read(key: string): Promise<SettingRow['value'] | undefined> {
    const row = await this.table.get(key);
    return row?.value;
  }

  private async write(key: string, value: SettingRow['value']): Promise<void> {
    await this.table.put({ key, value });
  }

  private async readString(key: string): Promise<string | null> {
    const value = await this.read(key);
    return typeof value === 'string' ? value : null;
  }

  private async readBoolean(key: string, fallback: boolean): Promise<boolean> {
    const value = await this.read(key);
    return typeof value === 'boolean' ? value : fallback;
  }

  // ===========================================================================
  // Watermark
  // ===========================================================================

  async getWatermark(remoteId: string): Promise<string> {
    return (await this.readString(watermarkKey(remoteId))) ?? EPOCH;
  }

  /**
   * Move the watermark forward to `to`. A value at or below the current
   * watermark is ignored.
   *
   * @returns The watermark after the call.
   */
  advanceWatermark(remoteId: string, to: string): Promise<string> {
    const key = watermarkKey(remoteId);
    return this.db.transaction('rw', this.table, async () => {
      const current = (await this.readString(key)) ?? EPOCH;
      if (Date.parse(to) <= Date.parse(current)) return current;
      await this.write(key, to);
      return to;
    });
  }

  async resetWatermark(remoteId: string): Promise<void> {
    await this.table.delete(watermarkKey(remoteId));
    debugLog(`[SYNC] Watermark reset for ${remoteId}`);
  }

  // ===========================================================================
  // Dates
  // ===========================================================================

  getLastSyncDate(): Promise<string | null> {
    return this.readString(KEYS.lastSyncDate);
  }

  setLastSyncDate(date: Date): Promise<void> {
    return this.write(KEYS.lastSyncDate, date.toISOString());
  }

  getLastBackgroundSyncDate(): Promise<string | null> {
    return this.readString(KEYS.lastBackgroundSyncDate);
  }

  setLastBackgroundSyncDate(date: Date): Promise<void> {
    return this.write(KEYS.lastBackgroundSyncDate, date.toISOString());
  }

  // ===========================================================================
  // Preferences
  // ===========================================================================

  isBackgroundSyncEnabled(): Promise<boolean> {
    return this.readBoolean(KEYS.backgroundSyncEnabled, true);
  }

  setBackgroundSyncEnabled(enabled: boolean): Promise<void> {
    return this.write(KEYS.backgroundSyncEnabled, enabled);
  }

  async getSyncIntervalMs(): Promise<number> {
    const value = await this.read(KEYS.syncIntervalMs);
    return typeof value === 'number' && value > 0 ? value : this.defaultIntervalMs;
  }

  setSyncIntervalMs(ms: number): Promise<void> {
    if (!Number.isFinite(ms) || ms <= 0) {
      return Promise.reject(new Error(`Sync interval must be a positive number of milliseconds (got ${ms})`));
    }
    return this.write(KEYS.syncIntervalMs, ms);
  }

  isCellularSyncAllowed(): Promise<boolean> {
    return this.readBoolean(KEYS.allowCellularSync, false);
  }

  setCellularSyncAllowed(allowed: boolean): Promise<void> {
    return this.write(KEYS.allowCellularSync, allowed);
  }

  isAutoSyncEnabled(): Promise<boolean> {
    return this.readBoolean(KEYS.autoSyncEnabled, true);
  }

  setAutoSyncEnabled(enabled: boolean): Promise<void> {
    return this.write(KEYS.autoSyncEnabled, enabled);
  }
}
