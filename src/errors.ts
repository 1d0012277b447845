/**
 * @fileoverview Sync Error Taxonomy
 *
 * Every failure the engine surfaces is a {@link SyncError} carrying a
 * discriminating {@link SyncErrorCode}. The code decides the policy:
 *
 * - **Transient** (`networkUnavailable`, `networkFailure`, `serviceUnavailable`,
 *   `rateLimited`, `zoneBusy`): retried with backoff (see `retry.ts`).
 * - **Non-retryable** (`internalError`, `serverRejectedRequest`,
 *   `invalidArguments`, `unknownItem`, `permissionFailure`, `quotaExceeded`):
 *   surfaced immediately, affected entities go to `error` status.
 * - **Special**: `partialFailure` (batch with mixed outcomes),
 *   `serverRecordChanged` (stale change tag, routed to the resolver),
 *   `changeTokenExpired` (watermark reset + full resync), `zoneNotFound`
 *   (zone must be recreated before retrying), `authenticationRequired`,
 *   `alreadySyncing`, `cancelled`.
 *
 * Remote adapters should throw `SyncError`s directly; anything else that
 * escapes them is classified by {@link toSyncError}.
 */

export type TransientErrorCode =
  | 'networkUnavailable'
  | 'networkFailure'
  | 'serviceUnavailable'
  | 'rateLimited'
  | 'zoneBusy';

export type PermanentErrorCode =
  | 'internalError'
  | 'serverRejectedRequest'
  | 'invalidArguments'
  | 'unknownItem'
  | 'permissionFailure'
  | 'quotaExceeded';

export type SyncErrorCode =
  | TransientErrorCode
  | PermanentErrorCode
  | 'partialFailure'
  | 'serverRecordChanged'
  | 'changeTokenExpired'
  | 'zoneNotFound'
  | 'authenticationRequired'
  | 'alreadySyncing'
  | 'cancelled';

const TRANSIENT_CODES: ReadonlySet<SyncErrorCode> = new Set<SyncErrorCode>([
  'networkUnavailable',
  'networkFailure',
  'serviceUnavailable',
  'rateLimited',
  'zoneBusy'
]);

const DEFAULT_MESSAGES: Record<SyncErrorCode, string> = {
  networkUnavailable: 'Network connection is unavailable',
  networkFailure: 'Network request failed',
  serviceUnavailable: 'Remote service is temporarily unavailable',
  rateLimited: 'Too many requests',
  zoneBusy: 'Remote zone is busy',
  internalError: 'Remote store internal error',
  serverRejectedRequest: 'Server rejected the request',
  invalidArguments: 'Invalid arguments',
  unknownItem: 'Record not found',
  permissionFailure: 'Permission denied',
  quotaExceeded: 'Storage quota exceeded',
  partialFailure: 'Some records failed to save',
  serverRecordChanged: 'Record was changed on the server',
  changeTokenExpired: 'Change token expired',
  zoneNotFound: 'Remote zone was deleted',
  authenticationRequired: 'Authentication is required',
  alreadySyncing: 'Sync is already in progress',
  cancelled: 'Sync was cancelled'
};

export interface SyncErrorOptions {
  cause?: unknown;
  /** Server-provided hint for how long to wait before retrying. */
  retryAfterMs?: number;
  /** Entity the error applies to, when it is record-scoped. */
  entityUUID?: string;
}

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly retryAfterMs: number | null;
  readonly entityUUID: string | null;

  constructor(code: SyncErrorCode, message?: string, options: SyncErrorOptions = {}) {
    super(message ?? DEFAULT_MESSAGES[code], options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SyncError';
    this.code = code;
    this.retryAfterMs = options.retryAfterMs ?? null;
    this.entityUUID = options.entityUUID ?? null;
  }

  /** Whether this error is worth retrying with backoff. */
  get retryable(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }
}

export type ConflictResolutionErrorCode =
  | 'invalidEntityType'
  | 'resolutionFailed'
  | 'manualResolutionRequired';

export class ConflictResolutionError extends Error {
  constructor(
    public readonly code: ConflictResolutionErrorCode,
    message?: string
  ) {
    super(
      message ??
        {
          invalidEntityType: 'Invalid entity type for conflict resolution',
          resolutionFailed: 'Conflict resolution failed',
          manualResolutionRequired: 'Manual resolution required for this conflict'
        }[code]
    );
    this.name = 'ConflictResolutionError';
  }
}

export function isTransientCode(code: SyncErrorCode): boolean {
  return TRANSIENT_CODES.has(code);
}

// =============================================================================
// Classification
// =============================================================================

function readStringProp(value: object, key: string): string | undefined {
  if (key in value) {
    const prop: unknown = Reflect.get(value, key);
    if (typeof prop === 'string') return prop;
    if (typeof prop === 'number') return String(prop);
  }
  return undefined;
}

function readNumberProp(value: object, key: string): number | undefined {
  if (key in value) {
    const prop: unknown = Reflect.get(value, key);
    if (typeof prop === 'number') return prop;
  }
  return undefined;
}

/**
 * Pull a readable message out of an arbitrary thrown value. Handles
 * PostgREST-style `{ message, details, hint }` objects.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;

  if (error && typeof error === 'object') {
    const message = readStringProp(error, 'message');
    if (message) {
      let msg = message;
      const details = readStringProp(error, 'details');
      const hint = readStringProp(error, 'hint');
      if (details) msg += ` - ${details}`;
      if (hint) msg += ` (${hint})`;
      return msg;
    }
    const nested = readStringProp(error, 'error') ?? readStringProp(error, 'description');
    if (nested) return nested;
    try {
      return JSON.stringify(error);
    } catch {
      return '[Unable to parse error]';
    }
  }

  return String(error);
}

function codeFromStatus(status: number): SyncErrorCode | null {
  if (status === 401) return 'authenticationRequired';
  if (status === 403) return 'permissionFailure';
  if (status === 404) return 'unknownItem';
  if (status === 409 || status === 412) return 'serverRecordChanged';
  if (status === 410) return 'changeTokenExpired';
  if (status === 413 || status === 507) return 'quotaExceeded';
  if (status === 429) return 'rateLimited';
  if (status === 503 || status === 502 || status === 504) return 'serviceUnavailable';
  if (status >= 500) return 'internalError';
  if (status >= 400) return 'invalidArguments';
  return null;
}

/**
 * Classify an arbitrary thrown value into a {@link SyncError}.
 *
 * Order: existing `SyncError` → HTTP status → PostgREST/Postgres code →
 * message heuristics → `internalError`.
 */
export function toSyncError(error: unknown, entityUUID?: string): SyncError {
  if (error instanceof SyncError) return error;
  if (error instanceof DOMException && error.name === 'AbortError') {
    return new SyncError('cancelled', undefined, { cause: error, entityUUID });
  }

  const message = extractErrorMessage(error);
  const options: SyncErrorOptions = { cause: error, entityUUID };

  if (error && typeof error === 'object') {
    const status = readNumberProp(error, 'status');
    const retryAfter = readNumberProp(error, 'retryAfterMs');
    if (retryAfter !== undefined) options.retryAfterMs = retryAfter;
    if (status !== undefined) {
      const fromStatus = codeFromStatus(status);
      if (fromStatus) return new SyncError(fromStatus, message, options);
    }

    const code = readStringProp(error, 'code');
    switch (code) {
      case '42501':
      case 'PGRST301':
        return new SyncError('permissionFailure', message, options);
      case '42P01':
        return new SyncError('zoneNotFound', message, options);
      case 'PGRST116':
        return new SyncError('unknownItem', message, options);
      case '23505':
      case 'PGRST409':
        return new SyncError('serverRecordChanged', message, options);
      case '22P02':
      case '23502':
      case '23514':
        return new SyncError('invalidArguments', message, options);
      case '53100':
      case '54000':
        return new SyncError('quotaExceeded', message, options);
      case '55P03':
      case '40001':
        return new SyncError('zoneBusy', message, options);
    }
  }

  const msg = message.toLowerCase();
  if (msg.includes('offline') || msg.includes('network is unreachable')) {
    return new SyncError('networkUnavailable', message, options);
  }
  if (msg.includes('fetch') || msg.includes('network') || msg.includes('timed out') || msg.includes('timeout')) {
    return new SyncError('networkFailure', message, options);
  }
  if (msg.includes('rate limit') || msg.includes('too many')) {
    return new SyncError('rateLimited', message, options);
  }
  if (msg.includes('unavailable') || msg.includes('temporarily')) {
    return new SyncError('serviceUnavailable', message, options);
  }
  if (msg.includes('jwt') || msg.includes('unauthorized')) {
    return new SyncError('authenticationRequired', message, options);
  }

  return new SyncError('internalError', message, options);
}
