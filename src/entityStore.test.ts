import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Dexie from 'dexie';
import { REPORT_ENTITY, resolveConfig } from './config';
import { createDatabase } from './database';
import { EntityNotFoundError, EntityStore } from './entityStore';
import { reportFields, testDatabase, tickingClock } from './test-utils/harness';
import type { EntityFields, RemoteRecord } from './types';

function remoteRecord(uuid: string, fields: EntityFields, changeTag: string, lastModified = '2024-06-01T13:00:00.000Z'): RemoteRecord {
  return {
    recordID: `rec-${uuid}`,
    uuid,
    entityType: 'report',
    fields,
    fieldModifiedAt: Object.fromEntries(Object.keys(fields).map((k) => [k, lastModified])),
    lastModified,
    changeTag
  };
}

describe('EntityStore', () => {
  let db: Dexie;
  let store: EntityStore;

  beforeEach(async () => {
    db = await createDatabase(testDatabase());
    store = new EntityStore(db, resolveConfig({ entityTypes: [REPORT_ENTITY] }), tickingClock());
  });

  afterEach(() => {
    db.close();
  });

  // ===========================================================================
  // CRUD
  // ===========================================================================

  describe('create / update / delete', () => {
    it('creates a pending entity with every field stamped', async () => {
      const entity = await store.create('report', reportFields(), 'report-1');
      expect(entity).toMatchObject({
        uuid: 'report-1',
        recordID: null,
        changeTag: null,
        base: null,
        syncStatus: 'pendingUpload',
        conflictResolutionNeeded: false,
        lastModified: '2024-06-01T12:00:00.000Z'
      });
      expect(new Set(Object.values(entity.fieldModifiedAt))).toEqual(new Set(['2024-06-01T12:00:00.000Z']));
      expect(await store.get('report-1')).toEqual(entity);
    });

    it('rejects unknown entity types', async () => {
      await expect(store.create('sighting', {})).rejects.toThrow('Unknown entity type: sighting');
    });

    it('stamps only fields whose value changed', async () => {
      await store.create('report', reportFields(), 'report-1');
      const updated = await store.update('report-1', { intensity: 'Major', notes: 'Observed near the pier' });

      expect(updated.fields.intensity).toBe('Major');
      expect(updated.fieldModifiedAt.intensity).toBe('2024-06-01T12:00:01.000Z');
      expect(updated.fieldModifiedAt.notes).toBe('2024-06-01T12:00:00.000Z');
      expect(updated.lastModified).toBe('2024-06-01T12:00:01.000Z');
    });

    it('leaves the entity untouched on a no-op patch', async () => {
      const created = await store.create('report', reportFields(), 'report-1');
      expect(await store.update('report-1', { intensity: 'Minor' })).toEqual(created);
    });

    it('fails on a missing entity', async () => {
      await expect(store.update('missing', { notes: 'x' })).rejects.toBeInstanceOf(EntityNotFoundError);
    });

    it('deletes, but not while a conflict is pending', async () => {
      await store.create('report', reportFields(), 'report-1');
      await store.create('report', reportFields(), 'report-2');
      await store.markAsConflict('report-2');

      expect(await store.delete('report-1')).toBe(true);
      expect(await store.delete('report-1')).toBe(false);
      await expect(store.delete('report-2')).rejects.toMatchObject({ code: 'manualResolutionRequired' });
      expect(await store.get('report-2')).toBeDefined();
    });
  });

  // ===========================================================================
  // Queries
  // ===========================================================================

  describe('queries', () => {
    it('returns reports in a date range, newest first', async () => {
      await store.create('report', reportFields({ timestamp: '2024-06-01T01:00:00.000Z' }), 'early');
      await store.create('report', reportFields({ timestamp: '2024-06-01T03:00:00.000Z' }), 'middle');
      await store.create('report', reportFields({ timestamp: '2024-06-01T05:00:00.000Z' }), 'late');

      const found = await store.fetchByDateRange(new Date('2024-06-01T02:00:00.000Z'), new Date('2024-06-01T06:00:00.000Z'));
      expect(found.map((e) => e.uuid)).toEqual(['late', 'middle']);
    });

    it('separates uploadable, conflicting and synced entities', async () => {
      await store.create('report', reportFields(), 'pending');
      await store.create('report', reportFields(), 'flagged');
      await store.markAsConflict('flagged');
      await store.applyRemote(remoteRecord('synced', reportFields(), 'tag-1'));

      expect((await store.fetchUploadable()).map((e) => e.uuid)).toEqual(['pending']);
      expect((await store.fetchConflicts()).map((e) => e.uuid)).toEqual(['flagged']);
      expect((await store.fetchPendingSync()).map((e) => e.uuid).sort()).toEqual(['flagged', 'pending']);
      expect(await store.countPending()).toBe(2);
      expect((await store.getByRecordID('rec-synced'))?.uuid).toBe('synced');
    });
  });

  // ===========================================================================
  // Sync transitions
  // ===========================================================================

  describe('applyRemote', () => {
    it('is idempotent', async () => {
      const record = remoteRecord('report-1', reportFields(), 'tag-1');

      expect(await store.applyRemote(record)).toBe('created');
      const first = await store.get('report-1');
      expect(await store.applyRemote(record)).toBe('unchanged');
      expect(await store.get('report-1')).toEqual(first);
      expect(first).toMatchObject({ syncStatus: 'synced', changeTag: 'tag-1', base: reportFields() });
    });

    it('overwrites a synced entity with a newer remote version', async () => {
      await store.applyRemote(remoteRecord('report-1', reportFields(), 'tag-1'));
      const outcome = await store.applyRemote(remoteRecord('report-1', reportFields({ intensity: 'Major' }), 'tag-2'));

      expect(outcome).toBe('updated');
      expect(await store.get('report-1')).toMatchObject({
        syncStatus: 'synced',
        changeTag: 'tag-2',
        fields: reportFields({ intensity: 'Major' }),
        base: reportFields({ intensity: 'Major' })
      });
    });

    it('flags a conflict when the remote moved under a local edit', async () => {
      await store.applyRemote(remoteRecord('report-1', reportFields(), 'tag-1'));
      await store.update('report-1', { notes: 'local edit' });

      expect(await store.applyRemote(remoteRecord('report-1', reportFields(), 'tag-1'))).toBe('unchanged');
      expect(await store.applyRemote(remoteRecord('report-1', reportFields({ intensity: 'Major' }), 'tag-2'))).toBe('conflict');

      const entity = await store.get('report-1');
      expect(entity).toMatchObject({ syncStatus: 'conflict', conflictResolutionNeeded: true, changeTag: 'tag-1' });
      expect(entity?.fields.notes).toBe('local edit');
    });

    it('learns the record id of an entity created on both sides', async () => {
      await store.create('report', reportFields(), 'report-1');
      await store.markAsConflict('report-1');

      expect(await store.applyRemote(remoteRecord('report-1', reportFields(), 'tag-9'))).toBe('conflict');
      expect((await store.get('report-1'))?.recordID).toBe('rec-report-1');
    });

    it('keeps a flagged entity flagged through local edits', async () => {
      await store.create('report', reportFields(), 'report-1');
      await store.markAsConflict('report-1');
      expect((await store.update('report-1', { notes: 'edited' })).syncStatus).toBe('conflict');
    });
  });

  describe('markSynced', () => {
    it('records the server identity and refreshes the base', async () => {
      const entity = await store.create('report', reportFields(), 'report-1');
      const synced = await store.markSynced(
        'report-1',
        remoteRecord('report-1', entity.fields, 'tag-1'),
        entity.lastModified,
        entity.fields
      );
      expect(synced).toMatchObject({ syncStatus: 'synced', recordID: 'rec-report-1', changeTag: 'tag-1', base: reportFields() });
    });

    it('stays pending when the entity was edited during the upload', async () => {
      const entity = await store.create('report', reportFields(), 'report-1');
      await store.update('report-1', { notes: 'edited mid-upload' });

      const result = await store.markSynced(
        'report-1',
        remoteRecord('report-1', entity.fields, 'tag-1'),
        entity.lastModified,
        entity.fields
      );
      expect(result.syncStatus).toBe('pendingUpload');
      expect(result.changeTag).toBe('tag-1');
      expect(result.fields.notes).toBe('edited mid-upload');
    });
  });

  describe('resolution writes', () => {
    it('keepLocalOver adopts the remote tag and re-queues local content', async () => {
      await store.create('report', reportFields({ intensity: 'Major' }), 'report-1');
      await store.markAsConflict('report-1');

      const kept = await store.keepLocalOver('report-1', remoteRecord('report-1', reportFields(), 'tag-5'));
      expect(kept).toMatchObject({
        syncStatus: 'pendingUpload',
        conflictResolutionNeeded: false,
        changeTag: 'tag-5',
        recordID: 'rec-report-1',
        base: reportFields()
      });
      expect(kept.fields.intensity).toBe('Major');
    });

    it('applyMerged keeps per-field edit times of values taken from either side', async () => {
      await store.create('report', reportFields(), 'report-1');
      const record = remoteRecord('report-1', reportFields({ intensity: 'Major' }), 'tag-2');
      const merged = reportFields({ intensity: 'Major', species: ['crab', 'flounder', 'eel'] });

      const result = await store.applyMerged('report-1', merged, record);
      expect(result.fieldModifiedAt.intensity).toBe('2024-06-01T13:00:00.000Z');
      expect(result.fieldModifiedAt.species).toBe('2024-06-01T12:00:01.000Z');
      expect(result.fieldModifiedAt.location).toBe('2024-06-01T13:00:00.000Z');
      expect(result).toMatchObject({ syncStatus: 'pendingUpload', changeTag: 'tag-2', base: record.fields });
    });

    it('detachFromRemote forgets the server identity', async () => {
      await store.applyRemote(remoteRecord('report-1', reportFields(), 'tag-1'));
      await store.markAsConflict('report-1');

      const detached = await store.detachFromRemote('report-1');
      expect(detached).toMatchObject({
        recordID: null,
        changeTag: null,
        base: null,
        syncStatus: 'pendingUpload',
        conflictResolutionNeeded: false
      });
    });

    it('clearConflict returns a conflict status to synced', async () => {
      await store.applyRemote(remoteRecord('report-1', reportFields(), 'tag-1'));
      await store.markAsConflict('report-1');
      expect((await store.clearConflict('report-1')).syncStatus).toBe('synced');
    });

    it('markForSync re-queues without touching the change tag', async () => {
      expect(await store.applyRemote(remoteRecord('report-1', reportFields(), 'tag-1'))).toBe('created');

      const marked = await store.markForSync('report-1');
      expect(marked).toMatchObject({
        syncStatus: 'pendingUpload',
        changeTag: 'tag-1',
        recordID: 'rec-report-1',
        lastModified: '2024-06-01T12:00:00.000Z'
      });
    });

    it('markError records the message', async () => {
      await store.create('report', reportFields(), 'report-1');
      expect(await store.markError('report-1', 'rejected')).toMatchObject({ syncStatus: 'error', lastError: 'rejected' });
    });
  });
});
