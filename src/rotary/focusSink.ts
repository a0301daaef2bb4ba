// focusSink.ts — per-window fallback that always has somewhere to put focus
//
// The sink is a 1×1 view the input router parks focus on to clear the
// highlight, and the place the window's own focus requests land when nothing
// else wants them. It tracks the focused view so that, when that view
// disappears, focus can be restored near where it was.

import { IDisposable, MutableDisposable } from '../platform/lifecycle.js';
import { View } from '../view/view.js';
import type { ViewGroup } from '../view/viewGroup.js';
import type { ViewWindow } from '../view/viewWindow.js';
import { FocusChangeEvent, Visibility } from '../view/viewTypes.js';
import { RotaryAction, RotaryActionArguments } from './rotaryConstants.js';
import { FocusLevel, adjustFocus, getAncestorScrollableContainer } from './focusUtils.js';

/**
 * Hides the soft keyboard of the window the sink belongs to.
 */
export interface IInputMethodController {
  hideSoftInput(): boolean;
}

export interface FocusSinkOptions {
  readonly id?: string;
  /**
   * When false the sink takes focus itself instead of restoring it
   * elsewhere. Meant for a sink inside an embedded window whose host
   * manages focus. Defaults to true.
   */
  readonly shouldRestoreFocus?: boolean;
  readonly inputMethod?: IInputMethodController;
}

export class FocusSink extends View {
  private _shouldRestoreFocus: boolean;
  private readonly _inputMethod: IInputMethodController | undefined;

  /** Focused view of the window, unless that is the sink. Never owned. */
  private _focusedView: WeakRef<View> | undefined;
  private _scrollableContainer: WeakRef<ViewGroup> | undefined;

  private readonly _focusListener = this._register(new MutableDisposable<IDisposable>());

  constructor(options: FocusSinkOptions = {}) {
    super({
      id: options.id ?? 'focusSink',
      focusable: true,
      focusableInTouchMode: true,
      enabled: true,
      visibility: Visibility.Visible,
      bounds: { left: 0, top: 0, right: 1, bottom: 1 },
    });
    this._shouldRestoreFocus = options.shouldRestoreFocus ?? true;
    this._inputMethod = options.inputMethod;
  }

  override get isFocusSink(): boolean {
    return true;
  }

  get shouldRestoreFocus(): boolean {
    return this._shouldRestoreFocus;
  }

  setShouldRestoreFocus(shouldRestoreFocus: boolean): void {
    this._shouldRestoreFocus = shouldRestoreFocus;
  }

  /** The last focused view the sink knows of, if it is still around. */
  get lastFocusedView(): View | undefined {
    return this._focusedView?.deref();
  }

  get lastScrollableContainer(): ViewGroup | undefined {
    return this._scrollableContainer?.deref();
  }

  // ─── Actions ───────────────────────────────────────────────────────────

  override performAction(action: RotaryAction, args?: RotaryActionArguments): boolean {
    switch (action) {
      case RotaryAction.RestoreDefaultFocus:
        return this.restoreFocus(false);
      case RotaryAction.HideIme:
        return this._inputMethod?.hideSoftInput() ?? false;
      case RotaryAction.Focus:
        // Parks without leaving touch mode.
        return this.hasFocus() ? false : this._requestFocusSelf();
      default:
        return super.performAction(action, args);
    }
  }

  /**
   * Requests to focus the sink itself restore focus elsewhere instead,
   * unless `shouldRestoreFocus` is off.
   */
  override requestFocus(): boolean {
    if (!this._shouldRestoreFocus) {
      return this._requestFocusSelf();
    }
    return this.restoreFocus(true);
  }

  override restoreDefaultFocus(): boolean {
    if (!this._shouldRestoreFocus) {
      return this._requestFocusSelf();
    }
    return this.restoreFocus(true);
  }

  /**
   * Put focus somewhere sensible: the scrollable container the lost view
   * scrolled out of, else the best candidate in the window, else the sink.
   * Fails only when `checkTouchMode` is set and the window is in touch mode.
   */
  restoreFocus(checkTouchMode: boolean): boolean {
    const window = this.window;
    if (checkTouchMode && window?.isInTouchMode) {
      return false;
    }
    if (this._maybeFocusOnScrollableContainer()) {
      return true;
    }
    if (adjustFocus(this.rootView, FocusLevel.NoFocus)) {
      return true;
    }
    return this._requestFocusSelf();
  }

  // ─── Window ────────────────────────────────────────────────────────────

  protected override onAttachedToWindow(window: ViewWindow): void {
    this._track(window.focusedView);
    this._focusListener.value = window.onDidChangeFocus(e => this._onGlobalFocusChange(e));
  }

  protected override onDetachedFromWindow(): void {
    this._focusListener.clear();
    this._track(undefined);
  }

  protected override onWindowFocusChanged(hasWindowFocus: boolean): void {
    if (!hasWindowFocus) {
      // Park so that a background window shows no highlight.
      this._requestFocusSelf();
      this._track(undefined);
    } else if (this.isFocused()) {
      this.restoreFocus(true);
    }
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private _onGlobalFocusChange(e: FocusChangeEvent): void {
    this._track(e.newFocus);
  }

  private _track(view: View | undefined): void {
    const focused = view?.isFocusSink ? undefined : view;
    const container = getAncestorScrollableContainer(focused);
    this._focusedView = focused ? new WeakRef(focused) : undefined;
    this._scrollableContainer = container ? new WeakRef(container) : undefined;
  }

  /**
   * A view scrolled off-screen is detached but keeps its parent; a removed
   * view has no parent. Only the former sends focus to its container.
   */
  private _maybeFocusOnScrollableContainer(): boolean {
    const focused = this.lastFocusedView;
    const container = this.lastScrollableContainer;
    if (!focused || focused.isAttachedToWindow || !focused.parent) return false;
    if (!container || !container.isAttachedToWindow || !container.isShown()) return false;
    return container.requestFocus();
  }
}
