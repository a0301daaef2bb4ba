// viewGroup.ts — a view with ordered children

import { RotaryConfigurationError } from '../rotary/rotaryErrors.js';
import { View } from './view.js';
import { Visibility } from './viewTypes.js';
import type { ViewWindow } from './viewWindow.js';

export class ViewGroup extends View {
  private readonly _children: View[] = [];

  get children(): readonly View[] {
    return this._children;
  }

  get childCount(): number {
    return this._children.length;
  }

  getChildAt(index: number): View | undefined {
    return this._children[index];
  }

  // ─── Mutation ──────────────────────────────────────────────────────────

  /**
   * Add `child` at `index` (default: last).
   *
   * @throws RotaryConfigurationError if the child already has a parent, if
   * adding it would create a cycle, or if it would nest a FocusRegion
   * inside another FocusRegion.
   */
  addView(child: View, index: number = this._children.length): void {
    if (child.parent) {
      throw new RotaryConfigurationError(`${child} already has a parent (${child.parent})`);
    }
    if (child.contains(this)) {
      throw new RotaryConfigurationError(`Adding ${child} to ${this} would create a cycle`);
    }
    this._assertNoNestedRegion(child);

    this._children.splice(index, 0, child);
    child._setParent(this);

    const window = this.window;
    if (window && !child.isDetachedFromParent) {
      child._dispatchAttachedToWindow(window);
    }
  }

  /**
   * Remove `child` from this group. If focus was inside it, the window
   * re-validates focus.
   */
  removeView(child: View): boolean {
    const index = this._children.indexOf(child);
    if (index < 0) return false;

    const window = this.window;
    const wasAttached = child.isAttachedToWindow;
    this._children.splice(index, 1);
    child._setParent(undefined);
    child._setDetached(false);
    if (wasAttached) {
      child._dispatchDetachedFromWindow();
    }
    window?._revalidateFocus();
    return true;
  }

  removeAllViews(): void {
    for (const child of [...this._children]) {
      this.removeView(child);
    }
  }

  /**
   * Take `child` out of the window while keeping it parented, the way a
   * recycling list treats a row that scrolled off-screen.
   */
  detachView(child: View): boolean {
    if (child.parent !== this || child.isDetachedFromParent) return false;

    const window = this.window;
    const wasAttached = child.isAttachedToWindow;
    child._setDetached(true);
    if (wasAttached) {
      child._dispatchDetachedFromWindow();
    }
    window?._revalidateFocus();
    return true;
  }

  /**
   * Bring a detached child back into the window.
   */
  attachView(child: View): boolean {
    if (child.parent !== this || !child.isDetachedFromParent) return false;

    child._setDetached(false);
    const window = this.window;
    if (window) {
      child._dispatchAttachedToWindow(window);
    }
    return true;
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  /**
   * Depth-first search of this group and its attached descendants.
   */
  findViewById(id: string): View | undefined {
    if (this.id === id) return this;
    for (const child of this._children) {
      if (child.isDetachedFromParent) continue;
      if (child instanceof ViewGroup) {
        const found = child.findViewById(id);
        if (found) return found;
      } else if (child.id === id) {
        return child;
      }
    }
    return undefined;
  }

  /** The focused view, if it is this group or one of its descendants. */
  findFocus(): View | undefined {
    const focused = this.window?.focusedView;
    return this.contains(focused) ? focused : undefined;
  }

  // ─── Focus ─────────────────────────────────────────────────────────────

  /**
   * Try the group itself, then its descendants.
   */
  override requestFocus(): boolean {
    if (this._requestFocusSelf()) return true;
    return this._requestFocusInDescendants();
  }

  /**
   * Offer focus to each visible child in order until one accepts.
   */
  protected _requestFocusInDescendants(): boolean {
    for (const child of this._children) {
      if (child.isDetachedFromParent || child.visibility !== Visibility.Visible) continue;
      if (child.requestFocus()) return true;
    }
    return false;
  }

  // ─── Dispatch ──────────────────────────────────────────────────────────

  override _dispatchAttachedToWindow(window: ViewWindow): void {
    super._dispatchAttachedToWindow(window);
    for (const child of this._children) {
      if (!child.isDetachedFromParent) {
        child._dispatchAttachedToWindow(window);
      }
    }
  }

  override _dispatchDetachedFromWindow(): void {
    for (const child of this._children) {
      if (!child.isDetachedFromParent) {
        child._dispatchDetachedFromWindow();
      }
    }
    super._dispatchDetachedFromWindow();
  }

  override _dispatchWindowFocusChanged(hasWindowFocus: boolean): void {
    super._dispatchWindowFocusChanged(hasWindowFocus);
    for (const child of [...this._children]) {
      if (!child.isDetachedFromParent) {
        child._dispatchWindowFocusChanged(hasWindowFocus);
      }
    }
  }

  // ─── Disposal ──────────────────────────────────────────────────────────

  override dispose(): void {
    for (const child of this._children) {
      child.dispose();
    }
    super.dispose();
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private _assertNoNestedRegion(child: View): void {
    const enclosing = this._closestRegionInclusive();
    if (!enclosing) return;
    const nested = findRegionInSubtree(child);
    if (nested) {
      throw new RotaryConfigurationError(
        `${nested} cannot be nested inside ${enclosing}: focus regions must not contain other focus regions`,
      );
    }
  }

  private _closestRegionInclusive(): View | undefined {
    let current: View | undefined = this;
    while (current) {
      if (current.isFocusRegion) return current;
      current = current.parent;
    }
    return undefined;
  }
}

function findRegionInSubtree(view: View): View | undefined {
  if (view.isFocusRegion) return view;
  if (view instanceof ViewGroup) {
    for (const child of view.children) {
      const found = findRegionInSubtree(child);
      if (found) return found;
    }
  }
  return undefined;
}
