// viewTypes.ts — shared types for the in-memory view tree

import type { View } from './view.js';

// ─── Geometry ────────────────────────────────────────────────────────────────

/**
 * An axis-aligned rectangle in window coordinates.
 */
export interface Rect {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

export const EMPTY_RECT: Rect = { left: 0, top: 0, right: 0, bottom: 0 };

export function rectWidth(rect: Rect): number {
  return rect.right - rect.left;
}

export function rectHeight(rect: Rect): number {
  return rect.bottom - rect.top;
}

/**
 * Per-edge distances, e.g. a highlight padding or a bounds offset.
 */
export interface Insets {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

// ─── Enums ───────────────────────────────────────────────────────────────────

export enum Visibility {
  Visible = 'visible',
  Invisible = 'invisible',
  Gone = 'gone',
}

export enum LayoutDirection {
  Ltr = 'ltr',
  Rtl = 'rtl',
}

/**
 * Markers that tell the rotary engine how to treat a view.
 */
export enum RotaryRole {
  /** Contains focusable items; its first item is an implicit default focus. */
  Container = 'container',
  /** A rotary container that can be scrolled vertically by rotation. */
  VerticallyScrollable = 'verticallyScrollable',
  /** A rotary container that can be scrolled horizontally by rotation. */
  HorizontallyScrollable = 'horizontallyScrollable',
  /** Not focusable itself, but delegates focus to a descendant. */
  FocusDelegating = 'focusDelegating',
}

// ─── Construction ────────────────────────────────────────────────────────────

export interface ViewOptions {
  readonly id: string;
  readonly focusable?: boolean;
  readonly focusableInTouchMode?: boolean;
  readonly focusedByDefault?: boolean;
  readonly enabled?: boolean;
  readonly visibility?: Visibility;
  readonly bounds?: Rect;
  readonly role?: RotaryRole;
  readonly layoutDirection?: LayoutDirection;
}

// ─── Events ──────────────────────────────────────────────────────────────────

/**
 * Fired after focus has moved. Either side may be absent: nothing was
 * focused before, or nothing could take focus after.
 */
export interface FocusChangeEvent {
  readonly oldFocus: View | undefined;
  readonly newFocus: View | undefined;
}
