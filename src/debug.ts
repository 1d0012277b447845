/**
 * @fileoverview Debug Logging Utilities
 *
 * Opt-in debug logging gated by an environment flag. When debug mode is
 * enabled (`<PREFIX>_DEBUG_MODE=true` in the environment, or
 * {@link setDebugMode}), debug calls forward to the console. When disabled,
 * they are dropped.
 *
 * The prefix is configurable via {@link _setDebugPrefix} (set by
 * {@link createSyncEngine}) so several engines in one process can be toggled
 * independently.
 *
 * @example
 * // Enable from the shell:
 * //   TIDESYNC_DEBUG_MODE=true node app.js
 *
 * // Or programmatically:
 * import { setDebugMode } from 'tidesync';
 * setDebugMode(true);
 */

// =============================================================================
// Internal State
// =============================================================================

/** Cached result of the environment check (avoids repeated reads). */
let debugEnabled: boolean | null = null;

/** Configurable prefix for the environment flag (default: `'tidesync'`). */
let debugPrefix = 'tidesync';

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Set the prefix used for the debug environment flag.
 *
 * Called internally by {@link createSyncEngine}. Resets the cached flag so
 * the next log call re-reads the environment under the new prefix.
 *
 * @internal
 */
export function _setDebugPrefix(prefix: string) {
  if (prefix !== debugPrefix) {
    debugPrefix = prefix;
    debugEnabled = null;
  }
}

function envFlagName(): string {
  return `${debugPrefix.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_DEBUG_MODE`;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check whether debug mode is currently enabled.
 *
 * Reads the environment on the first call and caches the result.
 */
export function isDebugMode(): boolean {
  if (debugEnabled !== null) return debugEnabled;
  debugEnabled = typeof process !== 'undefined' && process.env[envFlagName()] === 'true';
  return debugEnabled;
}

/**
 * Enable or disable debug mode at runtime. Overrides the environment flag
 * for the rest of the process lifetime.
 */
export function setDebugMode(enabled: boolean) {
  debugEnabled = enabled;
}

export function debugLog(...args: unknown[]) {
  if (isDebugMode()) console.log(...args);
}

export function debugWarn(...args: unknown[]) {
  if (isDebugMode()) console.warn(...args);
}

export function debugError(...args: unknown[]) {
  if (isDebugMode()) console.error(...args);
}

/**
 * Unified debug logging function with configurable severity level.
 *
 * @example
 * debug('log', '[SYNC] Starting upload...');
 * debug('error', '[SYNC] Upload failed:', error);
 */
export function debug(level: 'log' | 'warn' | 'error', ...args: unknown[]): void {
  if (!isDebugMode()) return;
  switch (level) {
    case 'log':
      console.log(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}
