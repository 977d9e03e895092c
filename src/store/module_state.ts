/**
 * Session-scoped module state store.
 *
 * Holds the driver's single {@link ModuleState} and publishes every change
 * to subscribers. Created with `channel_mode = 'unknown'`: the device-side
 * interpreter flag survives resets, so nothing about it is assumed.
 *
 * @module store/module_state
 */

import type { ModuleState } from '../protocol/types';

/** Why the module restarted. */
export type RestartKind = 'reset' | 'defaults';

export const INITIAL_MODULE_STATE: Readonly<ModuleState> = {
  channel_mode: 'unknown',
  mode_stale: false,
  connection: 'disconnected',
  peer_address: null,
  pending_restart: false,
  low_power: false
};

const MODULE_STATE_KEYS: readonly (keyof ModuleState)[] = [
  'channel_mode',
  'mode_stale',
  'connection',
  'peer_address',
  'pending_restart',
  'low_power'
];

export class ModuleStateStore {
  private state: ModuleState = { ...INITIAL_MODULE_STATE };
  private subscribers: Set<(state: ModuleState) => void> = new Set();
  private restart_listeners: Set<(kind: RestartKind) => void> = new Set();

  /**
   * Register a callback that fires whenever the state changes.
   *
   * @returns An unsubscribe function.
   */
  subscribe(callback: (state: ModuleState) => void): () => void {
    this.subscribers.add(callback);
    return () => { this.subscribers.delete(callback); };
  }

  /**
   * Register a callback that fires after the module has restarted.
   *
   * @returns An unsubscribe function.
   */
  on_restart(callback: (kind: RestartKind) => void): () => void {
    this.restart_listeners.add(callback);
    return () => { this.restart_listeners.delete(callback); };
  }

  /** Copy of the current state. */
  get_snapshot(): ModuleState {
    return { ...this.state };
  }

  /**
   * Apply a partial update. Subscribers are only notified when a field
   * actually changed.
   */
  update(patch: Partial<ModuleState>): void {
    let changed = false;
    for (const key of MODULE_STATE_KEYS) {
      if (patch[key] !== undefined && patch[key] !== this.state[key]) {
        changed = true;
      }
    }
    if (!changed) return;

    this.state = { ...this.state, ...patch };
    this._notify();
  }

  /** Record a completed restart: pending settings are now active. */
  mark_restarted(kind: RestartKind): void {
    this.update({ pending_restart: false });
    for (const listener of this.restart_listeners) {
      listener(kind);
    }
  }

  private _notify(): void {
    const snapshot = this.get_snapshot();
    for (const subscriber of this.subscribers) {
      subscriber(snapshot);
    }
  }
}
