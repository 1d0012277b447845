import { writable } from 'svelte/store';
import type { SyncPhase, SyncProgress, SyncState } from '../types';

// Entity-level error surfaced to the UI
export interface SyncErrorRecord {
  entityUUID: string | null;
  code: string;
  message: string;
  timestamp: string;
}

export interface SyncStatusState {
  phase: SyncPhase;
  state: SyncState;
  progress: SyncProgress;
  pendingCount: number;
  lastError: string | null; // Message of the last cycle-level failure
  syncErrors: SyncErrorRecord[]; // Recent entity-level errors
  lastSyncTime: string | null;
  syncMessage: string | null; // Human-readable status message
}

// Max errors to keep in history
const MAX_ERROR_HISTORY = 10;

function initialState(): SyncStatusState {
  return {
    phase: 'idle',
    state: { kind: 'idle' },
    progress: { completed: 0, total: 0 },
    pendingCount: 0,
    lastError: null,
    syncErrors: [],
    lastSyncTime: null,
    syncMessage: null
  };
}

const PHASE_MESSAGES: Record<SyncPhase, string | null> = {
  idle: null,
  verifyingRemoteAvailability: 'Checking connection...',
  uploading: 'Uploading changes...',
  downloading: 'Downloading changes...',
  resolvingConflicts: 'Resolving conflicts...'
};

export function createSyncStatusStore() {
  const { subscribe, set, update } = writable<SyncStatusState>(initialState());

  let currentPhase: SyncPhase = 'idle';

  return {
    subscribe,
    setPhase: (phase: SyncPhase) => {
      // Ignore redundant phase updates to prevent unnecessary re-renders
      if (phase === currentPhase) return;
      currentPhase = phase;
      update((state) => ({ ...state, phase, syncMessage: PHASE_MESSAGES[phase] }));
    },
    startCycle: () =>
      update((state) => ({
        ...state,
        state: { kind: 'syncing' },
        progress: { completed: 0, total: 0 },
        lastError: null,
        syncErrors: []
      })),
    finishCycle: (result: SyncState) => {
      currentPhase = 'idle';
      update((state) => ({
        ...state,
        phase: 'idle',
        state: result,
        syncMessage: null,
        lastError: result.kind === 'failed' ? result.error.message : null,
        lastSyncTime: result.kind === 'failed' ? state.lastSyncTime : new Date().toISOString()
      }));
    },
    // Progress only moves forward within a cycle
    setProgress: (progress: SyncProgress) =>
      update((state) => ({
        ...state,
        progress: {
          completed: Math.max(state.progress.completed, progress.completed),
          total: Math.max(state.progress.total, progress.total)
        }
      })),
    setPendingCount: (count: number) => update((state) => ({ ...state, pendingCount: count })),
    addSyncError: (error: SyncErrorRecord) =>
      update((state) => ({
        ...state,
        syncErrors: [...state.syncErrors, error].slice(-MAX_ERROR_HISTORY)
      })),
    clearSyncErrors: () => update((state) => ({ ...state, syncErrors: [] })),
    reset: () => {
      currentPhase = 'idle';
      set(initialState());
    }
  };
}

export type SyncStatusStore = ReturnType<typeof createSyncStatusStore>;
