// viewWindow.ts — owner of focus, touch mode and window focus for one view tree
//
// The window is the single source of truth for which view is focused. Every
// focus move goes through `_setFocus` and is announced once on
// `onDidChangeFocus`, after the new focus is in place.
//
// When the focused view loses its ability to hold focus (removed, detached,
// disabled, hidden) the window re-validates: it offers focus to the tree in
// order, reporting the lost view as the old focus of whatever move results.

import { Emitter, Event } from '../platform/events.js';
import { Disposable } from '../platform/lifecycle.js';
import { IClock, systemClock } from '../platform/clock.js';
import type { View } from './view.js';
import { ViewGroup } from './viewGroup.js';
import { EMPTY_RECT, FocusChangeEvent, Rect } from './viewTypes.js';

export interface ViewWindowOptions {
  readonly id?: string;
  readonly clock?: IClock;
  readonly bounds?: Rect;
  readonly inTouchMode?: boolean;
  readonly hasWindowFocus?: boolean;
}

let windowCounter = 0;

export class ViewWindow extends Disposable {
  readonly id: string;
  readonly clock: IClock;
  readonly root: ViewGroup;

  private _focused: View | undefined;
  /** The view that just lost focus during re-validation, until a new focus consumes it. */
  private _lostFocus: View | undefined;
  private _revalidating = false;
  private _inTouchMode: boolean;
  private _hasWindowFocus: boolean;

  private readonly _onDidChangeFocus = this._register(new Emitter<FocusChangeEvent>());
  /** Global focus-change notification for this window. */
  readonly onDidChangeFocus: Event<FocusChangeEvent> = this._onDidChangeFocus.event;

  private readonly _onDidChangeWindowFocus = this._register(new Emitter<boolean>());
  readonly onDidChangeWindowFocus: Event<boolean> = this._onDidChangeWindowFocus.event;

  private readonly _onDidChangeTouchMode = this._register(new Emitter<boolean>());
  readonly onDidChangeTouchMode: Event<boolean> = this._onDidChangeTouchMode.event;

  constructor(options: ViewWindowOptions = {}) {
    super();
    this.id = options.id ?? `window-${++windowCounter}`;
    this.clock = options.clock ?? systemClock;
    this._inTouchMode = options.inTouchMode ?? false;
    this._hasWindowFocus = options.hasWindowFocus ?? true;

    this.root = this._register(new ViewGroup({ id: `${this.id}.root`, bounds: options.bounds ?? EMPTY_RECT }));
    this.root._setHostWindow(this);
    this.root._dispatchAttachedToWindow(this);
  }

  // ─── State ─────────────────────────────────────────────────────────────

  get focusedView(): View | undefined {
    return this._focused;
  }

  get isInTouchMode(): boolean {
    return this._inTouchMode;
  }

  get hasWindowFocus(): boolean {
    return this._hasWindowFocus;
  }

  /** Shorthand for `root.addView`. */
  addView(view: View, index?: number): void {
    this.root.addView(view, index);
  }

  findViewById(id: string): View | undefined {
    return this.root.findViewById(id);
  }

  // ─── Mode Changes ──────────────────────────────────────────────────────

  /**
   * Enter or leave touch mode. Entering it drops focus from a view that is
   * not focusable in touch mode; nothing is focused in its place.
   */
  setTouchMode(inTouchMode: boolean): void {
    if (this._inTouchMode === inTouchMode) return;
    this._inTouchMode = inTouchMode;

    const focused = this._focused;
    if (inTouchMode && focused && !focused.focusableInTouchMode) {
      this._focused = undefined;
      this._onDidChangeFocus.fire({ oldFocus: focused, newFocus: undefined });
    }
    this._onDidChangeTouchMode.fire(inTouchMode);
  }

  /**
   * The window gained or lost input focus (moved to background, covered by
   * another window). Views hear about it before listeners of this window.
   */
  setWindowFocus(hasWindowFocus: boolean): void {
    if (this._hasWindowFocus === hasWindowFocus) return;
    this._hasWindowFocus = hasWindowFocus;
    this.root._dispatchWindowFocusChanged(hasWindowFocus);
    this._onDidChangeWindowFocus.fire(hasWindowFocus);
  }

  // ─── Focus ─────────────────────────────────────────────────────────────

  restoreDefaultFocus(): boolean {
    return this.root.restoreDefaultFocus();
  }

  clearFocus(): void {
    const focused = this._focused;
    if (!focused) return;
    this._focused = undefined;
    this._onDidChangeFocus.fire({ oldFocus: focused, newFocus: undefined });
  }

  /** Move focus to `view`. Called by views that passed their own checks. */
  _setFocus(view: View): void {
    if (this._focused === view) return;
    const oldFocus = this._focused ?? this._lostFocus;
    this._lostFocus = undefined;
    this._focused = view;
    this._onDidChangeFocus.fire({ oldFocus, newFocus: view });
  }

  /**
   * Called after any tree or attribute change that may leave the focused
   * view unable to hold focus.
   */
  _revalidateFocus(): void {
    const focused = this._focused;
    if (!focused || this._revalidating) return;
    if (focused.window === this && focused.canKeepFocus()) return;

    this._revalidating = true;
    try {
      this._focused = undefined;
      this._lostFocus = focused;
      this.root.requestFocus();
      if (this._lostFocus === focused) {
        this._lostFocus = undefined;
        this._onDidChangeFocus.fire({ oldFocus: focused, newFocus: undefined });
      }
    } finally {
      this._revalidating = false;
    }
  }
}
