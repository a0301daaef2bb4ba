// focusUtils.ts — tree searches and focus levels for rotary navigation
//
// When focus has to be (re)assigned without a direction, the engine picks the
// candidate with the highest focus level, from a view flagged
// focused-by-default down to a bare scrollable container.

import type { View } from '../view/view.js';
import { ViewGroup } from '../view/viewGroup.js';
import { RotaryRole } from '../view/viewTypes.js';
import { RotaryAction } from './rotaryConstants.js';
import type { FocusRegion } from './focusRegion.js';
import type { FocusSink } from './focusSink.js';

// ─── Focus Levels ────────────────────────────────────────────────────────────

/**
 * How good a focus target a view is. Higher wins.
 */
export enum FocusLevel {
  /** Nothing is focused, the focused view is hidden, or the sink holds focus. */
  NoFocus = 1,
  ScrollableContainer = 2,
  /** Any other focusable view. */
  Regular = 3,
  /** The first focusable view in a rotary container. */
  ImplicitDefault = 4,
  /** A region's declared default focus. */
  Default = 5,
  /** A view flagged focused-by-default. */
  FocusedByDefault = 6,
}

// ─── Kinds ───────────────────────────────────────────────────────────────────

export function isFocusRegion(view: View | undefined): view is FocusRegion {
  return view !== undefined && view.isFocusRegion;
}

export function isFocusSink(view: View | undefined): view is FocusSink {
  return view !== undefined && view.isFocusSink;
}

export function isRotaryContainer(view: View): boolean {
  return view.role === RotaryRole.Container || isScrollableContainer(view);
}

export function isScrollableContainer(view: View): boolean {
  return view.role === RotaryRole.VerticallyScrollable || view.role === RotaryRole.HorizontallyScrollable;
}

export function isFocusDelegatingContainer(view: View): boolean {
  return view.role === RotaryRole.FocusDelegating;
}

// ─── Searches ────────────────────────────────────────────────────────────────

/**
 * Depth-first search from `view` (inclusive). Subtrees whose root matches
 * `skip` are not entered. Detached children are never visited.
 */
export function depthFirstSearch(
  view: View,
  target: (v: View) => boolean,
  skip?: (v: View) => boolean,
): View | undefined {
  if (skip?.(view)) return undefined;
  if (target(view)) return view;
  if (view instanceof ViewGroup) {
    for (const child of view.children) {
      if (child.isDetachedFromParent) continue;
      const found = depthFirstSearch(child, target, skip);
      if (found) return found;
    }
  }
  return undefined;
}

const isHidden = (v: View): boolean => !v.isShown();

export function getAncestorFocusRegion(view: View): FocusRegion | undefined {
  let parent = view.parent;
  while (parent) {
    if (isFocusRegion(parent)) return parent;
    parent = parent.parent;
  }
  return undefined;
}

/**
 * The nearest scrollable container above `view`. A scrollable container
 * never contains a region, so the walk stops at the first region.
 */
export function getAncestorScrollableContainer(view: View | undefined): ViewGroup | undefined {
  let parent = view?.parent;
  while (parent && !isFocusRegion(parent)) {
    if (isScrollableContainer(parent)) return parent;
    parent = parent.parent;
  }
  return undefined;
}

export function findFirstFocusableDescendant(view: View): View | undefined {
  return depthFirstSearch(view, v => v !== view && canTakeFocus(v), isHidden);
}

export function findFocusedByDefaultView(view: View): View | undefined {
  return depthFirstSearch(view, v => v.focusedByDefault && canTakeFocus(v), isHidden);
}

/**
 * The first region default focus under `view` that can take focus.
 */
export function findDefaultFocusView(view: View): View | undefined {
  if (!view.isShown()) return undefined;
  if (isFocusRegion(view)) {
    const defaultFocus = view.getDefaultFocusView();
    return defaultFocus && canTakeFocus(defaultFocus) ? defaultFocus : undefined;
  }
  if (view instanceof ViewGroup) {
    for (const child of view.children) {
      if (child.isDetachedFromParent) continue;
      const found = findDefaultFocusView(child);
      if (found) return found;
    }
  }
  return undefined;
}

/** The first focusable view in the first shown rotary container. */
export function findImplicitDefaultFocusView(view: View): View | undefined {
  const container = depthFirstSearch(view, isRotaryContainer, isHidden);
  return container ? findFirstFocusableDescendant(container) : undefined;
}

export function findFocusSink(root: View): FocusSink | undefined {
  const found = depthFirstSearch(root, v => v.isFocusSink);
  return isFocusSink(found) ? found : undefined;
}

/** Every region under `root`, shown or not, in tree order. */
export function collectFocusRegions(root: View): FocusRegion[] {
  const regions: FocusRegion[] = [];
  depthFirstSearch(root, v => {
    if (isFocusRegion(v)) regions.push(v);
    return false;
  });
  return regions;
}

/** Every view under `root` (exclusive) that can take focus, in tree order. */
export function collectFocusableDescendants(root: View): View[] {
  const views: View[] = [];
  depthFirstSearch(root, v => {
    if (v !== root && canTakeFocus(v)) views.push(v);
    return false;
  }, isHidden);
  return views;
}

// ─── Focus ───────────────────────────────────────────────────────────────────

/**
 * Whether `view` is a candidate for rotary focus. A scrollable container
 * qualifies only when it has nothing focusable inside, so that rotation
 * can still scroll it.
 */
export function canTakeFocus(view: View): boolean {
  const focusable = view.focusable || isFocusDelegatingContainer(view);
  return focusable
    && view.enabled
    && view.isShown()
    && view.width > 0
    && view.height > 0
    && view.isAttachedToWindow
    && !view.isFocusSink
    && (!isScrollableContainer(view) || findFirstFocusableDescendant(view) === undefined);
}

/**
 * Focus `view` if it can take focus, leaving touch mode if needed.
 * Returns true if it is focused afterwards.
 */
export function requestFocusOn(view: View | undefined): boolean {
  if (!view || !canTakeFocus(view)) return false;
  if (view.isFocused()) return true;
  return view.performAction(RotaryAction.Focus);
}

export function getFocusLevel(view: View | undefined): FocusLevel {
  if (!view || view.isFocusSink || !view.isShown()) return FocusLevel.NoFocus;
  if (view.focusedByDefault) return FocusLevel.FocusedByDefault;
  if (isDefaultFocus(view)) return FocusLevel.Default;
  if (isImplicitDefaultFocusView(view)) return FocusLevel.ImplicitDefault;
  if (isScrollableContainer(view)) return FocusLevel.ScrollableContainer;
  return FocusLevel.Regular;
}

/**
 * Focus the best candidate under `root` whose level is higher than
 * `current` (a view or a level). Returns whether anything was focused.
 */
export function adjustFocus(root: View, current: View | FocusLevel | undefined): boolean {
  const level = typeof current === 'number' ? current : getFocusLevel(current);

  if (level < FocusLevel.FocusedByDefault && requestFocusOn(findFocusedByDefaultView(root))) {
    return true;
  }
  if (level < FocusLevel.Default && requestFocusOn(findDefaultFocusView(root))) {
    return true;
  }
  if (level < FocusLevel.ImplicitDefault && requestFocusOn(findImplicitDefaultFocusView(root))) {
    return true;
  }
  if (level < FocusLevel.Regular) {
    const focused = depthFirstSearch(
      root,
      v => !isScrollableContainer(v) && canTakeFocus(v) && requestFocusOn(v),
      isHidden,
    );
    if (focused) return true;
  }
  if (level < FocusLevel.ScrollableContainer) {
    return requestFocusOn(depthFirstSearch(root, v => isScrollableContainer(v) && canTakeFocus(v), isHidden));
  }
  return false;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function isDefaultFocus(view: View): boolean {
  const region = getAncestorFocusRegion(view);
  return region !== undefined && region.getDefaultFocusView() === view;
}

function isImplicitDefaultFocusView(view: View): boolean {
  let parent = view.parent;
  while (parent && !isRotaryContainer(parent)) {
    parent = parent.parent;
  }
  return parent !== undefined && findFirstFocusableDescendant(parent) === view;
}
