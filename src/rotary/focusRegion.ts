// focusRegion.ts — a navigable container of focusable views
//
// A FocusRegion is the unit the rotary controller nudges between. It keeps
// two pieces of history in its RotaryCache: the view that was focused in it
// last, and the region reached from it per nudge direction. Both are updated
// from the window's global focus-change notification.
//
// Actions delivered by the input router:
//   FOCUS                    → focusWithinRegion(), recording reverse history
//   NUDGE_SHORTCUT           → nudgeToShortcut(direction)
//   NUDGE_TO_ANOTHER_REGION  → nudgeToAnotherRegion(direction)
//
// Regions must not be nested; ViewGroup.addView rejects it.

import { Emitter, Event } from '../platform/events.js';
import { IDisposable, MutableDisposable } from '../platform/lifecycle.js';
import { systemClock } from '../platform/clock.js';
import type { View } from '../view/view.js';
import { ViewGroup } from '../view/viewGroup.js';
import type { ViewWindow } from '../view/viewWindow.js';
import { FocusChangeEvent, Insets, LayoutDirection, Rect, ViewOptions } from '../view/viewTypes.js';
import {
  Direction,
  NUDGE_DIRECTIONS,
  REGION_BOTTOM_BOUND_OFFSET,
  REGION_LEFT_BOUND_OFFSET,
  REGION_RIGHT_BOUND_OFFSET,
  REGION_TOP_BOUND_OFFSET,
  RotaryAction,
  RotaryActionArguments,
  getNudgeDirection,
  getOppositeDirection,
  parseDirection,
} from './rotaryConstants.js';
import { RotaryCache } from './rotaryCache.js';
import { RotaryConfigurationError } from './rotaryErrors.js';
import { DEFAULT_ROTARY_SETTINGS, RotarySettings } from './rotarySettings.js';
import { FocusLevel, adjustFocus, getAncestorFocusRegion, isFocusRegion, requestFocusOn } from './focusUtils.js';

// ─── Options ─────────────────────────────────────────────────────────────────

/**
 * Edge distances given in layout terms. `start`/`end` follow the layout
 * direction; `horizontal`/`vertical` fill in whichever side is not given.
 */
export interface RelativeInsets {
  readonly start?: number;
  readonly end?: number;
  readonly horizontal?: number;
  readonly top?: number;
  readonly bottom?: number;
  readonly vertical?: number;
}

export interface NudgeShortcut {
  /** Id of a view inside the region. */
  readonly viewId: string;
  readonly direction: Direction;
}

export interface FocusRegionOptions extends ViewOptions {
  readonly settings?: RotarySettings;
  /** Id of the default focus view inside the region. */
  readonly defaultFocusId?: string;
  /** Overrides `settings.defaultFocusOverridesHistory`. */
  readonly defaultFocusOverridesHistory?: boolean;
  /** Overrides `settings.clearRegionHistoryWhenRotating`. */
  readonly clearRegionHistoryWhenRotating?: boolean;
  /** Id of a view inside the region focused by nudging `nudgeShortcutDirection`. */
  readonly nudgeShortcutId?: string;
  readonly nudgeShortcutDirection?: Direction;
  /** Explicit nudge targets, as region ids resolved against the window. */
  readonly nudgeTargets?: Partial<Record<Direction, string>>;
  readonly highlightPadding?: RelativeInsets;
  /** Defaults to the highlight padding. */
  readonly boundsOffset?: RelativeInsets;
}

// ─── FocusRegion ─────────────────────────────────────────────────────────────

export class FocusRegion extends ViewGroup {
  private _rotaryCache: RotaryCache;
  private _defaultFocusOverridesHistory: boolean;
  private _clearRegionHistoryWhenRotating: boolean;
  private readonly _foregroundHighlight: boolean;
  private readonly _backgroundHighlight: boolean;

  private readonly _defaultFocusId: string | undefined;
  private _defaultFocusView: View | undefined;
  private readonly _nudgeShortcut: NudgeShortcut | undefined;
  private readonly _nudgeTargetIds = new Map<Direction, string>();
  /** Target ids already reported as unresolved. */
  private readonly _unresolvedNudgeTargetIds = new Set<string>();

  private _rtl: boolean;
  private _padding: Insets;
  private _offset: Insets;

  /** Whether a descendant held focus as of the last focus-change notification. */
  private _hasFocus = false;
  /** The focused descendant, while there is one. */
  private _focusedView: View | undefined;
  /** The region focus came from, when this region just gained it. */
  private _previousRegion: FocusRegion | undefined;

  private readonly _focusListener = this._register(new MutableDisposable<IDisposable>());

  private readonly _onDidRequestRedraw = this._register(new Emitter<void>());
  /** Fires when the region's highlight needs repainting. */
  readonly onDidRequestRedraw: Event<void> = this._onDidRequestRedraw.event;

  constructor(options: FocusRegionOptions) {
    super(options);
    const settings = options.settings ?? DEFAULT_ROTARY_SETTINGS;

    this._rotaryCache = new RotaryCache(settings.focusHistory, settings.regionHistory);
    this._defaultFocusOverridesHistory = options.defaultFocusOverridesHistory ?? settings.defaultFocusOverridesHistory;
    this._clearRegionHistoryWhenRotating = options.clearRegionHistoryWhenRotating ?? settings.clearRegionHistoryWhenRotating;
    this._foregroundHighlight = settings.foregroundHighlight;
    this._backgroundHighlight = settings.backgroundHighlight;

    this._defaultFocusId = options.defaultFocusId;
    this._nudgeShortcut = resolveNudgeShortcut(this, options.nudgeShortcutId, options.nudgeShortcutDirection);
    for (const direction of NUDGE_DIRECTIONS) {
      const id = options.nudgeTargets?.[direction];
      if (id !== undefined) {
        this._nudgeTargetIds.set(direction, id);
      }
    }

    // Padding and offsets resolve start/end against the initial layout
    // direction; later direction changes mirror them.
    this._rtl = this.layoutDirection === LayoutDirection.Rtl;
    const padding = options.highlightPadding ?? {};
    const paddingStart = padding.start ?? padding.horizontal ?? 0;
    const paddingEnd = padding.end ?? padding.horizontal ?? 0;
    const paddingTop = padding.top ?? padding.vertical ?? 0;
    const paddingBottom = padding.bottom ?? padding.vertical ?? 0;
    this._padding = this._resolveInsets(paddingStart, paddingEnd, paddingTop, paddingBottom);

    const offset = options.boundsOffset ?? {};
    this._offset = this._resolveInsets(
      offset.start ?? offset.horizontal ?? paddingStart,
      offset.end ?? offset.horizontal ?? paddingEnd,
      offset.top ?? offset.vertical ?? paddingTop,
      offset.bottom ?? offset.vertical ?? paddingBottom,
    );
  }

  override get isFocusRegion(): boolean {
    return true;
  }

  // ─── Accessors ─────────────────────────────────────────────────────────

  get rotaryCache(): RotaryCache {
    return this._rotaryCache;
  }

  get defaultFocusOverridesHistory(): boolean {
    return this._defaultFocusOverridesHistory;
  }

  get clearRegionHistoryWhenRotating(): boolean {
    return this._clearRegionHistoryWhenRotating;
  }

  get nudgeShortcut(): NudgeShortcut | undefined {
    return this._nudgeShortcut;
  }

  /** The region focus came from when this region last gained it, if any. */
  get previousRegion(): FocusRegion | undefined {
    return this._previousRegion;
  }

  /**
   * The default focus view: the one set through `setDefaultFocus`, else the
   * descendant matching `defaultFocusId`.
   */
  getDefaultFocusView(): View | undefined {
    if (this._defaultFocusView) return this._defaultFocusView;
    if (this._defaultFocusId === undefined) return undefined;
    const view = this.findViewById(this._defaultFocusId);
    return view !== this ? view : undefined;
  }

  getNudgeShortcutView(): View | undefined {
    if (!this._nudgeShortcut) return undefined;
    const view = this.findViewById(this._nudgeShortcut.viewId);
    return view !== this ? view : undefined;
  }

  /**
   * The explicitly configured target for `direction`, if its id resolves to
   * a region in the same window.
   */
  getSpecifiedNudgeTarget(direction: Direction): FocusRegion | undefined {
    const id = this._nudgeTargetIds.get(direction);
    if (id === undefined) return undefined;
    const view = this.window?.findViewById(id);
    if (isFocusRegion(view)) return view;
    if (!this._unresolvedNudgeTargetIds.has(id)) {
      this._unresolvedNudgeTargetIds.add(id);
      console.warn(`[FocusRegion] Nudge target "${id}" of ${this} is not a focus region in this window`);
    }
    return undefined;
  }

  // ─── Setters ───────────────────────────────────────────────────────────

  setDefaultFocus(view: View | undefined): void {
    this._defaultFocusView = view;
  }

  setRotaryCache(cache: RotaryCache): void {
    this._rotaryCache = cache;
  }

  setDefaultFocusOverridesHistory(overrides: boolean): void {
    this._defaultFocusOverridesHistory = overrides;
  }

  setClearRegionHistoryWhenRotating(clear: boolean): void {
    this._clearRegionHistoryWhenRotating = clear;
  }

  setNudgeTarget(direction: Direction, regionId: string | undefined): void {
    if (regionId === undefined) {
      this._nudgeTargetIds.delete(direction);
    } else {
      this._nudgeTargetIds.set(direction, regionId);
    }
  }

  // ─── Bounds ────────────────────────────────────────────────────────────

  get highlightPadding(): Insets {
    return this._padding;
  }

  get boundsOffset(): Insets {
    return this._offset;
  }

  /** Padding of the highlight, in absolute edges. Requests a redraw when it changes. */
  setHighlightPadding(padding: Insets): void {
    if (insetsEqual(this._padding, padding)) return;
    this._padding = padding;
    this._onDidRequestRedraw.fire();
  }

  /**
   * Offsets applied to the region's bounds when the input router looks for
   * a nudge target. They do not move the region or its highlight.
   */
  setBoundsOffset(offset: Insets): void {
    this._offset = offset;
  }

  /** The bounds the input router should compare against other regions. */
  getAdjustedBounds(): Rect {
    const bounds = this.bounds;
    return {
      left: bounds.left + this._offset.left,
      top: bounds.top + this._offset.top,
      right: bounds.right - this._offset.right,
      bottom: bounds.bottom - this._offset.bottom,
    };
  }

  /** Metadata published to the input router. */
  getNodeExtras(): Readonly<Record<string, number>> {
    return {
      [REGION_LEFT_BOUND_OFFSET]: this._offset.left,
      [REGION_RIGHT_BOUND_OFFSET]: this._offset.right,
      [REGION_TOP_BOUND_OFFSET]: this._offset.top,
      [REGION_BOTTOM_BOUND_OFFSET]: this._offset.bottom,
    };
  }

  protected override onLayoutDirectionChanged(): void {
    const rtl = this.layoutDirection === LayoutDirection.Rtl;
    if (rtl === this._rtl) return;
    this._rtl = rtl;
    this._padding = mirror(this._padding);
    this._offset = mirror(this._offset);
  }

  // ─── Highlight ─────────────────────────────────────────────────────────

  /** Whether the region's highlight would be drawn right now. */
  isHighlighted(): boolean {
    if (!this._foregroundHighlight && !this._backgroundHighlight) return false;
    const window = this.window;
    return this._hasFocus && window !== undefined && !window.isInTouchMode;
  }

  // ─── Actions ───────────────────────────────────────────────────────────

  override performAction(action: RotaryAction, args?: RotaryActionArguments): boolean {
    switch (action) {
      case RotaryAction.Focus: {
        const success = this.focusWithinRegion();
        const previous = this._previousRegion;
        const direction = getNudgeDirection(args);
        if (success && previous && direction) {
          saveRegionHistory(direction, previous, this, this._now());
        }
        return success;
      }
      case RotaryAction.NudgeShortcut:
        return this.nudgeToShortcut(getNudgeDirection(args));
      case RotaryAction.NudgeToAnotherRegion:
        return this.nudgeToAnotherRegion(getNudgeDirection(args));
      default:
        return super.performAction(action, args);
    }
  }

  /**
   * Focus a descendant: the remembered view, the default focus, or the first
   * focusable view. With `defaultFocusOverridesHistory` the default comes
   * before the remembered view.
   */
  focusWithinRegion(): boolean {
    if (this._defaultFocusOverridesHistory) {
      if (this._focusOnDefaultFocusView() || this._focusOnLastFocusedView()) return true;
    } else {
      if (this._focusOnLastFocusedView() || this._focusOnDefaultFocusView()) return true;
    }
    return this._focusOnFirstFocusableView();
  }

  /**
   * Focus the shortcut view when nudging in its direction. Fails when the
   * shortcut view already has focus so that a second nudge can leave the
   * region.
   */
  nudgeToShortcut(direction: Direction | undefined): boolean {
    const shortcut = this._nudgeShortcut;
    if (!shortcut || direction !== shortcut.direction) return false;
    const view = this.getNudgeShortcutView();
    if (!view || view.isFocused()) return false;
    return requestFocusOn(view);
  }

  /**
   * Move focus to the region configured for `direction`, or failing that to
   * the region this one was last reached from in the opposite direction.
   */
  nudgeToAnotherRegion(direction: Direction | undefined): boolean {
    if (!direction) return false;
    const now = this._now();

    const specified = this.getSpecifiedNudgeTarget(direction);
    if (specified?.focusWithinRegion()) return true;

    const cached = this._rotaryCache.getCachedRegion(direction, now);
    return cached?.focusWithinRegion() ?? false;
  }

  // ─── Focus ─────────────────────────────────────────────────────────────

  override restoreDefaultFocus(): boolean {
    return this._maybeAdjustFocus();
  }

  protected override _requestFocusInDescendants(): boolean {
    if (this.window?.isInTouchMode) {
      return super._requestFocusInDescendants();
    }
    return this._maybeAdjustFocus();
  }

  protected override onWindowFocusChanged(hasWindowFocus: boolean): void {
    const window = this.window;
    if (hasWindowFocus && window && !window.isInTouchMode) {
      this._maybeAdjustFocus();
    }
  }

  protected override onAttachedToWindow(window: ViewWindow): void {
    this._hasFocus = this.hasFocus();
    this._focusedView = this._hasFocus ? window.focusedView : undefined;
    this._focusListener.value = window.onDidChangeFocus(e => this._onGlobalFocusChange(e));
  }

  protected override onDetachedFromWindow(): void {
    this._focusListener.clear();
    this._hasFocus = false;
    this._focusedView = undefined;
    this._previousRegion = undefined;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private _now(): number {
    return (this.window?.clock ?? systemClock).now();
  }

  private _focusOnDefaultFocusView(): boolean {
    return adjustFocus(this, FocusLevel.Regular);
  }

  private _focusOnLastFocusedView(): boolean {
    return requestFocusOn(this._rotaryCache.getFocusedView(this._now()));
  }

  private _focusOnFirstFocusableView(): boolean {
    return adjustFocus(this, FocusLevel.NoFocus);
  }

  /** Focus a better candidate anywhere in the window, if there is one. */
  private _maybeAdjustFocus(): boolean {
    return adjustFocus(this.rootView, this.window?.focusedView);
  }

  private _onGlobalFocusChange(e: FocusChangeEvent): void {
    const hasFocus = this.hasFocus();
    this._updateFocusHistory(hasFocus);
    this._updatePreviousRegion(hasFocus, e.oldFocus);
    this._maybeClearRegionHistory(hasFocus, e.oldFocus);
    this._maybeRequestRedraw(hasFocus);
    this._hasFocus = hasFocus;
  }

  private _updateFocusHistory(hasFocus: boolean): void {
    if (hasFocus) {
      this._focusedView = this.window?.focusedView;
      return;
    }
    if (this._hasFocus && this._focusedView) {
      this._rotaryCache.saveFocusedView(this._focusedView, this._now());
    }
    this._focusedView = undefined;
  }

  private _updatePreviousRegion(hasFocus: boolean, oldFocus: View | undefined): void {
    if (this._hasFocus || !hasFocus || !oldFocus || oldFocus.isFocusSink) {
      this._previousRegion = undefined;
      return;
    }
    this._previousRegion = getAncestorFocusRegion(oldFocus);
    if (!this._previousRegion) {
      console.warn(`[FocusRegion] ${this} gained focus from ${oldFocus}, which is not in a focus region`);
    }
  }

  /** Rotating within the region drops its region history. */
  private _maybeClearRegionHistory(hasFocus: boolean, oldFocus: View | undefined): void {
    if (!this._clearRegionHistoryWhenRotating || !hasFocus || !oldFocus) return;
    if (getAncestorFocusRegion(oldFocus) !== this) return;
    this._rotaryCache.clearRegionHistory();
  }

  private _maybeRequestRedraw(hasFocus: boolean): void {
    if (!this._foregroundHighlight && !this._backgroundHighlight) return;
    if (this._hasFocus !== hasFocus) {
      this._onDidRequestRedraw.fire();
    }
  }

  private _resolveInsets(start: number, end: number, top: number, bottom: number): Insets {
    return {
      left: this._rtl ? end : start,
      top,
      right: this._rtl ? start : end,
      bottom,
    };
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Record that `target` can be left in the opposite of `direction` to get back
 * to `source`. Skipped when `source` already remembers a region in
 * `direction`, so history only ever points one way.
 */
function saveRegionHistory(direction: Direction, source: FocusRegion, target: FocusRegion, now: number): void {
  if (source.rotaryCache.getCachedRegion(direction, now)) return;
  target.rotaryCache.saveRegion(getOppositeDirection(direction), source, now);
}

/**
 * @throws RotaryConfigurationError unless id and direction are given together
 * and the direction is valid.
 */
function resolveNudgeShortcut(
  region: FocusRegion,
  viewId: string | undefined,
  direction: Direction | undefined,
): NudgeShortcut | undefined {
  if (viewId === undefined && direction === undefined) return undefined;
  if (viewId === undefined || direction === undefined) {
    throw new RotaryConfigurationError(
      `${region}: nudgeShortcutId and nudgeShortcutDirection must be specified together`,
    );
  }
  if (parseDirection(direction) === undefined) {
    throw new RotaryConfigurationError(
      `${region}: nudgeShortcutDirection must be left, right, up or down, got "${String(direction)}"`,
    );
  }
  return { viewId, direction };
}

function mirror(insets: Insets): Insets {
  return { left: insets.right, top: insets.top, right: insets.left, bottom: insets.bottom };
}

function insetsEqual(a: Insets, b: Insets): boolean {
  return a.left === b.left && a.top === b.top && a.right === b.right && a.bottom === b.bottom;
}
