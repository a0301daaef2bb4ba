// view.ts — a node of the in-memory view tree
//
// Views carry just enough state for focus navigation: focusability,
// enablement, visibility, bounds and the rotary role markers. Focus itself
// is owned by the ViewWindow; a view only asks for it.

import { Disposable } from '../platform/lifecycle.js';
import { RotaryAction, RotaryActionArguments } from '../rotary/rotaryConstants.js';
import {
  EMPTY_RECT,
  LayoutDirection,
  Rect,
  RotaryRole,
  ViewOptions,
  Visibility,
  rectHeight,
  rectWidth,
} from './viewTypes.js';
import type { ViewGroup } from './viewGroup.js';
import type { ViewWindow } from './viewWindow.js';

export class View extends Disposable {
  readonly id: string;

  private _parent: ViewGroup | undefined;
  private _hostWindow: ViewWindow | undefined;
  /** Detached from the window but still parented (a recycled row scrolled off-screen). */
  private _detached = false;

  private _focusable: boolean;
  private _focusableInTouchMode: boolean;
  private _focusedByDefault: boolean;
  private _enabled: boolean;
  private _visibility: Visibility;
  private _bounds: Rect;
  private _role: RotaryRole | undefined;
  private _layoutDirection: LayoutDirection;

  constructor(options: ViewOptions) {
    super();
    this.id = options.id;
    this._focusable = options.focusable ?? false;
    this._focusableInTouchMode = options.focusableInTouchMode ?? false;
    this._focusedByDefault = options.focusedByDefault ?? false;
    this._enabled = options.enabled ?? true;
    this._visibility = options.visibility ?? Visibility.Visible;
    this._bounds = options.bounds ?? EMPTY_RECT;
    this._role = options.role;
    this._layoutDirection = options.layoutDirection ?? LayoutDirection.Ltr;
  }

  // ─── Kind ──────────────────────────────────────────────────────────────

  /** True for FocusRegion. Lets tree code recognize regions without importing them. */
  get isFocusRegion(): boolean { return false; }

  /** True for FocusSink. */
  get isFocusSink(): boolean { return false; }

  // ─── Attributes ────────────────────────────────────────────────────────

  get parent(): ViewGroup | undefined { return this._parent; }
  get role(): RotaryRole | undefined { return this._role; }
  get bounds(): Rect { return this._bounds; }
  get width(): number { return rectWidth(this._bounds); }
  get height(): number { return rectHeight(this._bounds); }
  get focusable(): boolean { return this._focusable; }
  get focusableInTouchMode(): boolean { return this._focusableInTouchMode; }
  get focusedByDefault(): boolean { return this._focusedByDefault; }
  get enabled(): boolean { return this._enabled; }
  get visibility(): Visibility { return this._visibility; }
  get layoutDirection(): LayoutDirection { return this._layoutDirection; }
  get isDetachedFromParent(): boolean { return this._detached; }

  setBounds(bounds: Rect): void {
    this._bounds = bounds;
  }

  setRole(role: RotaryRole | undefined): void {
    this._role = role;
  }

  setFocusedByDefault(focusedByDefault: boolean): void {
    this._focusedByDefault = focusedByDefault;
  }

  setFocusable(focusable: boolean): void {
    if (this._focusable === focusable) return;
    this._focusable = focusable;
    this.window?._revalidateFocus();
  }

  setEnabled(enabled: boolean): void {
    if (this._enabled === enabled) return;
    this._enabled = enabled;
    this.window?._revalidateFocus();
  }

  setVisibility(visibility: Visibility): void {
    if (this._visibility === visibility) return;
    this._visibility = visibility;
    this.window?._revalidateFocus();
  }

  setLayoutDirection(direction: LayoutDirection): void {
    if (this._layoutDirection === direction) return;
    this._layoutDirection = direction;
    this.onLayoutDirectionChanged();
  }

  // ─── Tree Queries ──────────────────────────────────────────────────────

  /** The topmost ancestor, following detached links too. */
  get rootView(): View {
    let current: View = this;
    while (current._parent) {
      current = current._parent;
    }
    return current;
  }

  /** The window this view is attached to, if any. */
  get window(): ViewWindow | undefined {
    let current: View = this;
    for (;;) {
      if (current._detached) return undefined;
      if (!current._parent) return current._hostWindow;
      current = current._parent;
    }
  }

  get isAttachedToWindow(): boolean {
    return this.window !== undefined;
  }

  /**
   * Whether this view and all its ancestors are visible and the view is
   * attached to a window.
   */
  isShown(): boolean {
    let current: View = this;
    for (;;) {
      if (current._visibility !== Visibility.Visible || current._detached) return false;
      if (!current._parent) return current._hostWindow !== undefined;
      current = current._parent;
    }
  }

  /** Whether `other` is this view or one of its descendants. */
  contains(other: View | undefined): boolean {
    let current = other;
    while (current) {
      if (current === this) return true;
      current = current._parent;
    }
    return false;
  }

  isFocused(): boolean {
    const window = this.window;
    return window !== undefined && window.focusedView === this;
  }

  /** Whether this view or one of its descendants is focused. */
  hasFocus(): boolean {
    return this.contains(this.window?.focusedView);
  }

  // ─── Focus ─────────────────────────────────────────────────────────────

  /**
   * Whether this view may keep focus it already holds.
   */
  canKeepFocus(): boolean {
    return this._focusable && this._enabled && this.isShown();
  }

  /**
   * Whether a focus request on this view itself would succeed right now.
   */
  canRequestFocus(): boolean {
    const window = this.window;
    if (!window || !this.canKeepFocus()) return false;
    return !window.isInTouchMode || this._focusableInTouchMode;
  }

  requestFocus(): boolean {
    return this._requestFocusSelf();
  }

  /**
   * Asks the view to take its default focus. Plain views just request focus.
   */
  restoreDefaultFocus(): boolean {
    return this.requestFocus();
  }

  /**
   * Perform a rotary action. Plain views understand FOCUS only: it leaves
   * touch mode and requests focus when the view doesn't hold it already.
   */
  performAction(action: RotaryAction, _args?: RotaryActionArguments): boolean {
    if (action === RotaryAction.Focus) {
      if (this.hasFocus()) return false;
      this.window?.setTouchMode(false);
      return this.requestFocus();
    }
    return false;
  }

  protected _requestFocusSelf(): boolean {
    const window = this.window;
    if (!window || !this.canRequestFocus()) return false;
    window._setFocus(this);
    return true;
  }

  // ─── Hooks ─────────────────────────────────────────────────────────────

  protected onAttachedToWindow(_window: ViewWindow): void {}

  protected onDetachedFromWindow(): void {}

  protected onWindowFocusChanged(_hasWindowFocus: boolean): void {}

  protected onLayoutDirectionChanged(): void {}

  // ─── Tree Plumbing (used by ViewGroup and ViewWindow) ──────────────────

  _setParent(parent: ViewGroup | undefined): void {
    this._parent = parent;
  }

  _setHostWindow(window: ViewWindow | undefined): void {
    this._hostWindow = window;
  }

  _setDetached(detached: boolean): void {
    this._detached = detached;
  }

  _dispatchAttachedToWindow(window: ViewWindow): void {
    this.onAttachedToWindow(window);
  }

  _dispatchDetachedFromWindow(): void {
    this.onDetachedFromWindow();
  }

  _dispatchWindowFocusChanged(hasWindowFocus: boolean): void {
    this.onWindowFocusChanged(hasWindowFocus);
  }

  toString(): string {
    return `${this.constructor.name}(${this.id})`;
  }
}
