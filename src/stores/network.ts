import { writable, type Readable } from 'svelte/store';
import { debugError } from '../debug';
import type { DeviceConditions } from '../types';

// Callbacks can be sync or async
type ConditionsCallback = (conditions: DeviceConditions) => void | Promise<void>;

const UNKNOWN_CONDITIONS: DeviceConditions = {
  batteryLevel: 1,
  isCharging: false,
  network: 'unknown',
  isExpensive: false
};

function isConnected(conditions: DeviceConditions): boolean {
  return conditions.network !== 'none';
}

export type DeviceConditionsStore = Readable<DeviceConditions> & {
  /** Latest reported conditions. */
  current: () => DeviceConditions;
  /**
   * Feed new conditions from the host (battery monitor, network probe).
   * Resolves once any reconnect/disconnect callbacks have run.
   */
  report: (conditions: Partial<DeviceConditions>) => Promise<void>;
  onReconnect: (callback: ConditionsCallback) => () => void;
  onDisconnect: (callback: ConditionsCallback) => () => void;
};

export function createDeviceConditionsStore(initial: DeviceConditions = UNKNOWN_CONDITIONS): DeviceConditionsStore {
  const { subscribe, set } = writable<DeviceConditions>(initial);
  const reconnectCallbacks: Set<ConditionsCallback> = new Set();
  const disconnectCallbacks: Set<ConditionsCallback> = new Set();
  let currentValue = initial;

  // Run callbacks sequentially, properly awaiting async ones
  async function runCallbacksSequentially(
    callbacks: Set<ConditionsCallback>,
    conditions: DeviceConditions,
    label: string
  ): Promise<void> {
    for (const callback of callbacks) {
      try {
        await callback(conditions);
      } catch (e) {
        debugError(`[Network] ${label} callback error:`, e);
      }
    }
  }

  async function report(partial: Partial<DeviceConditions>): Promise<void> {
    const previous = currentValue;
    const next: DeviceConditions = { ...previous, ...partial };
    currentValue = next;
    set(next);

    const wasOnline = isConnected(previous);
    const nowOnline = isConnected(next);
    if (wasOnline && !nowOnline) {
      await runCallbacksSequentially(disconnectCallbacks, next, 'Disconnect');
    } else if (!wasOnline && nowOnline) {
      await runCallbacksSequentially(reconnectCallbacks, next, 'Reconnect');
    }
  }

  function onReconnect(callback: ConditionsCallback): () => void {
    reconnectCallbacks.add(callback);
    return () => reconnectCallbacks.delete(callback);
  }

  function onDisconnect(callback: ConditionsCallback): () => void {
    disconnectCallbacks.add(callback);
    return () => disconnectCallbacks.delete(callback);
  }

  return {
    subscribe,
    current: () => currentValue,
    report,
    onReconnect,
    onDisconnect
  };
}
