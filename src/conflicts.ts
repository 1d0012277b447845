/**
 * @fileoverview Conflict Detection & Resolution
 *
 * Given a local and a remote version of the same entity (matched by `uuid`),
 * decides whether they conflict and, if so, produces a resolution with the
 * active strategy.
 *
 * ## Detection
 *
 * Fields are compared by their declared {@link FieldKind}:
 *
 * | kind         | conflict when                                          |
 * |--------------|--------------------------------------------------------|
 * | `set`        | the two sets differ (order ignored)                    |
 * | `scalar`     | values differ                                          |
 * | `text`       | strings differ                                         |
 * | `coordinate` | either axis differs by more than 0.0001° (~10 m)       |
 * | `numericMap` | any key's value differs                                |
 * | `timestamp`  | values differ by more than 60 s; a missing side is ok  |
 *
 * Sync metadata (`changeTag`, `syncStatus`, `lastModified`) never counts.
 *
 * ## Strategies
 *
 * - **serverWins** / **clientWins**: take one side wholesale.
 * - **mostRecent**: later `lastModified` wins wholesale; ties go to remote.
 * - **fieldLevelMerge**: per field, the side with the newer
 *   `fieldModifiedAt[field]` (falling back to `lastModified`) wins; ties go
 *   to local. Timestamp fields take the later of both values. Disjoint edits
 *   on the two sides are therefore both preserved.
 * - **threeWayMerge**: merge each side's changes relative to a common base.
 *   Sets apply both sides' additions and removals; scalars take the side that
 *   changed, and fall back to base (recorded as unresolved) when both changed
 *   to different values; numeric maps merge key by key with the scalar rule;
 *   coordinates changed on both sides take the more recently edited side.
 *   Without a base the local version stands in as base, which degrades the
 *   merge to taking the remote value wherever the two sides differ.
 * - **manual**: no automatic outcome; the entity stays flagged until
 *   {@link ConflictResolver.resolveManually} is called.
 *
 * Every resolution, automatic or deferred, is recorded in the conflict
 * history (see `conflictHistory.ts`).
 */

import type { ConflictHistory } from './conflictHistory';
import type { ResolvedConfig } from './config';
import { debugLog } from './debug';
import { ConflictResolutionError } from './errors';
import type {
  ConflictHistoryEntry,
  ConflictResolution,
  ConflictResolutionStrategy,
  EntityFields,
  FieldKind,
  FieldValue,
  ResolutionType,
  SyncEntity
} from './types';
import { fieldValuesEqual, isCoordinate, isNumericMap, isStringArray, maxIso } from './utils';

export const COORDINATE_TOLERANCE_DEG = 0.0001;
export const TIMESTAMP_TOLERANCE_MS = 60_000;

/** The parts of an entity or remote record the resolver looks at. */
export interface EntityVersion {
  uuid: string;
  entityType: string;
  fields: EntityFields;
  fieldModifiedAt: Record<string, string>;
  lastModified: string;
}

export type FieldSchema = Record<string, FieldKind>;

// =============================================================================
// Field Comparison
// =============================================================================

function asSet(value: FieldValue | undefined): Set<string> {
  return new Set(isStringArray(value) ? value : []);
}

function setsEqual(a: Set<string>, b: Set<string>): boolean {
  if (a.size !== b.size) return false;
  for (const v of a) if (!b.has(v)) return false;
  return true;
}

/** Whether two values of one field conflict under the tolerance of `kind`. */
export function valuesConflict(kind: FieldKind, a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  switch (kind) {
    case 'set':
      return !setsEqual(asSet(a), asSet(b));
    case 'coordinate': {
      const ca = isCoordinate(a) ? a : null;
      const cb = isCoordinate(b) ? b : null;
      if (ca === null || cb === null) return ca !== cb;
      return (
        Math.abs(ca.latitude - cb.latitude) > COORDINATE_TOLERANCE_DEG ||
        Math.abs(ca.longitude - cb.longitude) > COORDINATE_TOLERANCE_DEG
      );
    }
    case 'timestamp': {
      const ta = typeof a === 'string' ? Date.parse(a) : NaN;
      const tb = typeof b === 'string' ? Date.parse(b) : NaN;
      if (Number.isNaN(ta) || Number.isNaN(tb)) return false;
      return Math.abs(ta - tb) > TIMESTAMP_TOLERANCE_MS;
    }
    case 'numericMap':
    case 'scalar':
    case 'text':
      return !fieldValuesEqual(a ?? null, b ?? null);
  }
}

function fieldNames(schema: FieldSchema, ...sides: EntityFields[]): string[] {
  const names = new Set(Object.keys(schema));
  for (const side of sides) for (const key of Object.keys(side)) names.add(key);
  return [...names];
}

/** Names of the fields on which `local` and `remote` conflict. */
export function compareFields(local: EntityVersion, remote: EntityVersion, schema: FieldSchema): string[] {
  return fieldNames(schema, local.fields, remote.fields).filter((name) =>
    valuesConflict(schema[name] ?? 'scalar', local.fields[name], remote.fields[name])
  );
}

export function detectConflict(local: EntityVersion, remote: EntityVersion, schema: FieldSchema): boolean {
  if (local.uuid !== remote.uuid) return false;
  return compareFields(local, remote, schema).length > 0;
}

// =============================================================================
// Merge Strategies
// =============================================================================

export interface MergeResult {
  merged: EntityFields;
  lastModified: string;
  unresolvedFields: string[];
}

function fieldTime(version: EntityVersion, field: string): number {
  return Date.parse(version.fieldModifiedAt[field] ?? version.lastModified);
}

function laterLastModified(local: EntityVersion, remote: EntityVersion): string {
  return maxIso(local.lastModified, remote.lastModified) ?? local.lastModified;
}

export function fieldLevelMerge(local: EntityVersion, remote: EntityVersion, schema: FieldSchema): MergeResult {
  const merged: EntityFields = {};
  for (const name of fieldNames(schema, local.fields, remote.fields)) {
    const l = local.fields[name];
    const r = remote.fields[name];
    if (l === undefined && r === undefined) continue;

    if ((schema[name] ?? 'scalar') === 'timestamp') {
      merged[name] = maxIso(typeof l === 'string' ? l : null, typeof r === 'string' ? r : null);
      continue;
    }
    if (r === undefined) {
      merged[name] = l ?? null;
    } else if (l === undefined) {
      merged[name] = r;
    } else {
      merged[name] = fieldTime(remote, name) > fieldTime(local, name) ? r : l;
    }
  }
  return { merged, lastModified: laterLastModified(local, remote), unresolvedFields: [] };
}

type Pick3 = { value: FieldValue | undefined; ambiguous: boolean };

/** Changed-from-base rule shared by scalars and numeric map entries. */
function pickChanged<T>(
  base: T | undefined,
  local: T | undefined,
  remote: T | undefined,
  equal: (a: T | undefined, b: T | undefined) => boolean
): { value: T | undefined; ambiguous: boolean } {
  const localChanged = !equal(base, local);
  const remoteChanged = !equal(base, remote);
  if (localChanged && remoteChanged) {
    if (equal(local, remote)) return { value: local, ambiguous: false };
    return { value: base, ambiguous: true };
  }
  if (localChanged) return { value: local, ambiguous: false };
  if (remoteChanged) return { value: remote, ambiguous: false };
  return { value: base, ambiguous: false };
}

function mergeSet(base: FieldValue | undefined, local: FieldValue | undefined, remote: FieldValue | undefined): string[] {
  const b = asSet(base);
  const l = asSet(local);
  const r = asSet(remote);
  const result = new Set<string>(b);
  for (const v of l) if (!b.has(v)) result.add(v);
  for (const v of r) if (!b.has(v)) result.add(v);
  return [...result];
}

function mergeNumericMap(
  name: string,
  base: FieldValue | undefined,
  local: FieldValue | undefined,
  remote: FieldValue | undefined,
  unresolved: string[]
): Record<string, number> {
  const b = isNumericMap(base) ? base : {};
  const l = isNumericMap(local) ? local : {};
  const r = isNumericMap(remote) ? remote : {};
  const result: Record<string, number> = {};
  for (const key of new Set([...Object.keys(b), ...Object.keys(l), ...Object.keys(r)])) {
    const pick = pickChanged<number>(b[key], l[key], r[key], (x, y) => x === y);
    if (pick.ambiguous) unresolved.push(`${name}.${key}`);
    if (pick.value !== undefined) result[key] = pick.value;
  }
  return result;
}

export function threeWayMerge(
  local: EntityVersion,
  remote: EntityVersion,
  base: EntityFields | null,
  schema: FieldSchema
): MergeResult {
  const ancestor = base ?? local.fields;
  const merged: EntityFields = {};
  const unresolved: string[] = [];

  for (const name of fieldNames(schema, ancestor, local.fields, remote.fields)) {
    const b = ancestor[name];
    const l = local.fields[name];
    const r = remote.fields[name];
    const kind = schema[name] ?? 'scalar';

    switch (kind) {
      case 'set':
        merged[name] = mergeSet(b, l, r);
        break;
      case 'numericMap':
        merged[name] = mergeNumericMap(name, b, l, r, unresolved);
        break;
      case 'coordinate': {
        const pick: Pick3 = pickChanged(b, l, r, (x, y) => !valuesConflict('coordinate', x ?? null, y ?? null));
        merged[name] = (pick.ambiguous ? (fieldTime(remote, name) > fieldTime(local, name) ? r : l) : pick.value) ?? null;
        break;
      }
      case 'timestamp': {
        const pick: Pick3 = pickChanged(b, l, r, (x, y) => fieldValuesEqual(x ?? null, y ?? null));
        merged[name] = pick.ambiguous
          ? maxIso(typeof l === 'string' ? l : null, typeof r === 'string' ? r : null)
          : (pick.value ?? null);
        break;
      }
      case 'scalar':
      case 'text': {
        const pick: Pick3 = pickChanged(b, l, r, (x, y) => fieldValuesEqual(x ?? null, y ?? null));
        if (pick.ambiguous) unresolved.push(name);
        merged[name] = pick.value ?? null;
        break;
      }
    }
  }

  return { merged, lastModified: laterLastModified(local, remote), unresolvedFields: unresolved };
}

// =============================================================================
// Resolver
// =============================================================================

function resolutionTypeOf(resolution: ConflictResolution): ResolutionType {
  switch (resolution.kind) {
    case 'useLocal':
      return 'use_local';
    case 'useRemote':
      return 'use_remote';
    case 'merge':
      return 'merge';
    case 'manual':
      return 'manual';
  }
}

/** A user's decision on a conflict deferred by the `manual` strategy. */
export type ManualChoice =
  | { kind: 'useLocal' }
  | { kind: 'useRemote' }
  | { kind: 'merge'; fields: EntityFields };

export class ConflictResolver {
  private activeStrategy: ConflictResolutionStrategy;

  constructor(
    private readonly config: Pick<ResolvedConfig, 'entityTypes' | 'strategy' | 'historyRetentionDays'>,
    readonly history: ConflictHistory
  ) {
    this.activeStrategy = config.strategy;
  }

  get strategy(): ConflictResolutionStrategy {
    return this.activeStrategy;
  }

  setStrategy(strategy: ConflictResolutionStrategy): void {
    debugLog(`[CONFLICT] Strategy changed: ${this.activeStrategy} -> ${strategy}`);
    this.activeStrategy = strategy;
  }

  private schemaFor(entityType: string): FieldSchema {
    const type = this.config.entityTypes.get(entityType);
    if (!type) {
      throw new ConflictResolutionError('invalidEntityType', `Unknown entity type: ${entityType}`);
    }
    return type.fields;
  }

  detectConflict(local: EntityVersion, remote: EntityVersion): boolean {
    if (local.uuid !== remote.uuid) return false;
    return detectConflict(local, remote, this.schemaFor(local.entityType));
  }

  compareFields(local: EntityVersion, remote: EntityVersion): string[] {
    return compareFields(local, remote, this.schemaFor(local.entityType));
  }

  /**
   * Compute the outcome of the active strategy without side effects.
   */
  resolve(local: EntityVersion, remote: EntityVersion, base: EntityFields | null = null): ConflictResolution {
    const schema = this.schemaFor(local.entityType);
    switch (this.activeStrategy) {
      case 'serverWins':
        return { kind: 'useRemote' };
      case 'clientWins':
        return { kind: 'useLocal' };
      case 'mostRecent':
        return Date.parse(local.lastModified) > Date.parse(remote.lastModified)
          ? { kind: 'useLocal' }
          : { kind: 'useRemote' };
      case 'fieldLevelMerge':
        return { kind: 'merge', ...fieldLevelMerge(local, remote, schema) };
      case 'threeWayMerge':
        return { kind: 'merge', ...threeWayMerge(local, remote, base, schema) };
      case 'manual':
        return { kind: 'manual' };
    }
  }

  /**
   * Resolve a conflict on `entity` and record it in the history. Automatic
   * outcomes close the history row immediately; `manual` leaves it open.
   *
   * @throws {ConflictResolutionError} `invalidEntityType` when the versions do
   *         not belong to a registered type matching `entity`.
   */
  async resolveConflict(
    entity: SyncEntity,
    local: EntityVersion,
    remote: EntityVersion,
    base: EntityFields | null = entity.base
  ): Promise<ConflictResolution> {
    if (local.entityType !== entity.entityType || remote.entityType !== entity.entityType) {
      throw new ConflictResolutionError(
        'invalidEntityType',
        `Expected ${entity.entityType}, got local=${local.entityType} remote=${remote.entityType}`
      );
    }
    this.schemaFor(entity.entityType);

    const strategy = this.activeStrategy;
    const entry = await this.history.open(entity.uuid, strategy, local.fields, remote.fields);
    const resolution = this.resolve(local, remote, base);
    debugLog(`[CONFLICT] ${entity.uuid} resolved with ${strategy}: ${resolution.kind}`);

    if (resolution.kind !== 'manual' && entry.id !== undefined) {
      await this.history.close(entry.id, {
        resolutionType: resolutionTypeOf(resolution),
        merged: resolution.kind === 'merge' ? resolution.merged : null,
        unresolvedFields: resolution.kind === 'merge' ? resolution.unresolvedFields : [],
        notes: resolution.kind === 'merge' && resolution.unresolvedFields.length > 0 ? 'Fell back to base for ambiguous fields' : null
      });
    }
    return resolution;
  }

  /**
   * Close the open history row of a deferred conflict with the user's choice.
   *
   * @throws {ConflictResolutionError} `resolutionFailed` when no conflict is
   *         open for `entityUUID`.
   */
  async resolveManually(entityUUID: string, choice: ManualChoice, notes: string | null = null): Promise<ConflictHistoryEntry> {
    const entry = await this.history.findOpen(entityUUID);
    if (!entry || entry.id === undefined) {
      throw new ConflictResolutionError('resolutionFailed', `No open conflict for ${entityUUID}`);
    }
    await this.history.close(entry.id, {
      resolutionType: choice.kind === 'useLocal' ? 'use_local' : choice.kind === 'useRemote' ? 'use_remote' : 'merge',
      merged: choice.kind === 'merge' ? choice.fields : null,
      notes: notes ?? 'Resolved by user'
    });
    const closed = await this.history.forEntity(entityUUID);
    return closed.find((e) => e.id === entry.id) ?? entry;
  }

  /**
   * Close the open history row of `entityUUID`, if any, once the two versions
   * agree again without a resolution. Recorded as taking the remote version,
   * since local state is overwritten with it.
   */
  async closeConverged(entityUUID: string, fields: EntityFields): Promise<boolean> {
    const entry = await this.history.findOpen(entityUUID);
    if (!entry || entry.id === undefined) return false;
    debugLog(`[CONFLICT] ${entityUUID} converged with the server, closing history entry ${entry.id}`);
    return this.history.close(entry.id, { resolutionType: 'use_remote', merged: fields, notes: 'Versions converged' });
  }

  getConflictHistory(entityUUID: string): Promise<ConflictHistoryEntry[]> {
    return this.history.forEntity(entityUUID);
  }

  getUnresolvedHistory(): Promise<ConflictHistoryEntry[]> {
    return this.history.unresolved();
  }

  getHistoryByStrategy(strategy: ConflictResolutionStrategy): Promise<ConflictHistoryEntry[]> {
    return this.history.byStrategy(strategy);
  }

  cleanupConflictHistory(): Promise<number> {
    return this.history.cleanup(this.config.historyRetentionDays);
  }
}
