/**
 * Connection state tracker.
 *
 * Maintains the observed BLE link state from unsolicited notifications and
 * transport lifecycle signals, and publishes each change both to callback
 * subscribers and to async-iterator consumers.
 *
 * State transitions:
 *   * --> CONNECTED       on `OK+CONN` / `OK+CONN<addr>`
 *   * --> ADVERTISING     on session start or module restart
 *   * --> DISCONNECTED    on transport close
 *
 * @module store/connection_tracker
 */

import type { ConnectionState, UnsolicitedEvent } from '../protocol/types';
import type { ModuleStateStore } from './module_state';

/** One observed change of link state. */
export interface ConnectionChange {
  previous: ConnectionState;
  current: ConnectionState;
  peer_address: string | null;
  at_ms: number;
}

/** Read-only view of the link. */
export interface ConnectionSnapshot {
  state: ConnectionState;
  peer_address: string | null;
  since_ms: number;
}

export class ConnectionTracker {
  private store: ModuleStateStore;
  private since_ms: number = Date.now();
  private subscribers: Set<(change: ConnectionChange) => void> = new Set();
  private closers: Set<() => void> = new Set();

  constructor(store: ModuleStateStore) {
    this.store = store;
    // A restarted module drops its peer and advertises again.
    store.on_restart(() => this.mark_advertising());
  }

  /** Current link state. */
  current(): ConnectionSnapshot {
    const s = this.store.get_snapshot();
    return { state: s.connection, peer_address: s.peer_address, since_ms: this.since_ms };
  }

  /** Feed an unsolicited notification from the classifier. */
  on_unsolicited(event: UnsolicitedEvent): void {
    switch (event.type) {
      case 'connect':
        this._set('connected', event.peer_address);
        break;
    }
  }

  /** The module is up with no peer (session start, after a restart). */
  mark_advertising(): void {
    this._set('advertising', null);
  }

  /** The transport collaborator reported the channel closed. */
  on_transport_closed(): void {
    this._set('disconnected', null);
  }

  /**
   * Register a callback for link changes.
   *
   * @returns An unsubscribe function.
   */
  subscribe(callback: (change: ConnectionChange) => void): () => void {
    this.subscribers.add(callback);
    return () => { this.subscribers.delete(callback); };
  }

  /**
   * Live feed of link changes.
   *
   * Only changes after the call are delivered. The feed never ends on its
   * own; it finishes when the consumer stops iterating or the tracker is
   * disposed. It cannot be restarted.
   */
  changes(): AsyncIterableIterator<ConnectionChange> {
    const buffered: ConnectionChange[] = [];
    const waiting: ((result: IteratorResult<ConnectionChange>) => void)[] = [];
    let done = false;

    const finish = (): void => {
      if (done) return;
      done = true;
      unsubscribe();
      this.closers.delete(finish);
      buffered.length = 0;
      for (const resolve of waiting.splice(0)) {
        resolve({ value: undefined, done: true });
      }
    };

    const unsubscribe = this.subscribe((change) => {
      const resolve = waiting.shift();
      if (resolve) {
        resolve({ value: change, done: false });
      } else {
        buffered.push(change);
      }
    });
    this.closers.add(finish);

    const iterator: AsyncIterableIterator<ConnectionChange> = {
      next: () => {
        const change = buffered.shift();
        if (change) {
          return Promise.resolve({ value: change, done: false });
        }
        if (done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => { waiting.push(resolve); });
      },
      return: () => {
        finish();
        return Promise.resolve({ value: undefined, done: true });
      },
      [Symbol.asyncIterator]: () => iterator
    };
    return iterator;
  }

  /** End every open feed. */
  dispose(): void {
    for (const close of [...this.closers]) {
      close();
    }
    this.subscribers.clear();
  }

  private _set(next: ConnectionState, peer_address: string | null): void {
    const previous = this.store.get_snapshot();
    if (previous.connection === next && previous.peer_address === peer_address) {
      return;
    }

    this.since_ms = Date.now();
    this.store.update({ connection: next, peer_address });

    const change: ConnectionChange = {
      previous: previous.connection,
      current: next,
      peer_address,
      at_ms: this.since_ms
    };
    for (const subscriber of this.subscribers) {
      subscriber(change);
    }
  }
}
