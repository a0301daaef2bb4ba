// events.ts — typed event emitters
//
// Every listener returns an IDisposable for cleanup. The view tree's
// global focus-change notification and the engine's own notifications
// (redraw requests, navigation outcomes) are all Emitters.

import { IDisposable, toDisposable } from './lifecycle.js';

// ─── Event Type ──────────────────────────────────────────────────────────────

/**
 * A function that represents an event that can be subscribed to.
 * Returns an IDisposable that unsubscribes the listener.
 */
export type Event<T> = (listener: (e: T) => void) => IDisposable;

// ─── Emitter ─────────────────────────────────────────────────────────────────

/**
 * A typed event emitter. Exposes an `event` property for subscription
 * and a `fire` method for dispatching.
 *
 * Listeners run synchronously, in subscription order, on the calling
 * stack. A listener added or removed while firing does not affect the
 * current dispatch.
 */
export class Emitter<T> implements IDisposable {
  private _listeners = new Set<(e: T) => void>();
  private _disposed = false;
  private _event: Event<T> | undefined;

  /**
   * The event function that listeners subscribe to.
   */
  get event(): Event<T> {
    if (!this._event) {
      this._event = (listener: (e: T) => void): IDisposable => {
        if (this._disposed) {
          return toDisposable(() => {});
        }
        this._listeners.add(listener);
        return toDisposable(() => {
          this._listeners.delete(listener);
        });
      };
    }
    return this._event;
  }

  /**
   * Fire the event, notifying all listeners.
   */
  fire(event: T): void {
    if (this._disposed) {
      return;
    }
    for (const listener of [...this._listeners]) {
      listener(event);
    }
  }

  dispose(): void {
    this._disposed = true;
    this._listeners.clear();
    this._event = undefined;
  }
}
