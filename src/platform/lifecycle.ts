// lifecycle.ts — IDisposable pattern and ownership helpers
//
// Every listener the focus engine installs (focus-change subscriptions,
// window-focus subscriptions, emitters) is owned by a disposable so that
// detaching a view or tearing down a window releases it.

// ─── IDisposable ─────────────────────────────────────────────────────────────

/**
 * An object that can release resources when no longer needed.
 */
export interface IDisposable {
  dispose(): void;
}

// ─── Simple Helpers ──────────────────────────────────────────────────────────

/**
 * Wraps a cleanup function into an IDisposable. The function runs at most once.
 */
export function toDisposable(fn: () => void): IDisposable {
  let disposed = false;
  return {
    dispose() {
      if (!disposed) {
        disposed = true;
        fn();
      }
    },
  };
}

// ─── DisposableStore ─────────────────────────────────────────────────────────

/**
 * Manages a collection of disposables and disposes them all at once.
 * Adding to a disposed store immediately disposes the added item.
 */
export class DisposableStore implements IDisposable {
  private readonly _disposables = new Set<IDisposable>();
  private _isDisposed = false;

  /**
   * Add a disposable to the store. Returns the disposable for chaining.
   */
  add<T extends IDisposable>(disposable: T): T {
    if (this._isDisposed) {
      disposable.dispose();
      return disposable;
    }
    this._disposables.add(disposable);
    return disposable;
  }

  /**
   * Dispose all items and mark the store as disposed.
   */
  dispose(): void {
    if (this._isDisposed) {
      return;
    }
    this._isDisposed = true;
    const errors: unknown[] = [];
    for (const d of this._disposables) {
      try {
        d.dispose();
      } catch (e) {
        errors.push(e);
      }
    }
    this._disposables.clear();
    if (errors.length > 0) {
      console.error(`[DisposableStore] ${errors.length} error(s) during dispose:`, errors);
    }
  }
}

// ─── MutableDisposable ───────────────────────────────────────────────────────

/**
 * Holds a single disposable value that can be replaced.
 * Setting a new value disposes the old one.
 */
export class MutableDisposable<T extends IDisposable> implements IDisposable {
  private _value: T | undefined;
  private _isDisposed = false;

  get value(): T | undefined {
    return this._isDisposed ? undefined : this._value;
  }

  set value(value: T | undefined) {
    if (this._isDisposed) {
      value?.dispose();
      return;
    }
    if (this._value !== value) {
      this._value?.dispose();
      this._value = value;
    }
  }

  /**
   * Dispose the current value without marking the holder as disposed.
   */
  clear(): void {
    this.value = undefined;
  }

  dispose(): void {
    this._isDisposed = true;
    this._value?.dispose();
    this._value = undefined;
  }
}

// ─── Disposable Base Class ───────────────────────────────────────────────────

/**
 * Base class for objects that own other disposables.
 * Subclasses register them via `_register()`; they are disposed together
 * with the owner.
 */
export abstract class Disposable implements IDisposable {
  private readonly _store = new DisposableStore();
  private _isDisposed = false;

  protected _register<T extends IDisposable>(disposable: T): T {
    return this._store.add(disposable);
  }

  dispose(): void {
    if (this._isDisposed) {
      return;
    }
    this._isDisposed = true;
    this._store.dispose();
  }
}
