// focusFinder.ts — nearest-region search for nudges
//
// Used when neither a shortcut, an explicit target nor region history
// decides where a nudge goes. Regions are compared by their adjusted bounds
// (bounds minus the offsets they publish in their node extras).

import { Rect, rectHeight, rectWidth } from '../view/viewTypes.js';
import { Direction } from './rotaryConstants.js';
import type { FocusRegion } from './focusRegion.js';

/**
 * Finds the region a nudge from `source` in `direction` should land in.
 */
export interface IFocusFinder {
  findNudgeTarget(source: FocusRegion, direction: Direction, candidates: readonly FocusRegion[]): FocusRegion | undefined;
}

/**
 * Picks the candidate whose centre lies in `direction`, preferring overlap
 * on the perpendicular axis, then the smallest edge-to-edge distance.
 */
export class BoundsFocusFinder implements IFocusFinder {

  findNudgeTarget(source: FocusRegion, direction: Direction, candidates: readonly FocusRegion[]): FocusRegion | undefined {
    const from = source.getAdjustedBounds();
    let best: FocusRegion | undefined;
    let bestOverlap = -Infinity;
    let bestDistance = Infinity;

    for (const candidate of candidates) {
      if (candidate === source) continue;
      const to = candidate.getAdjustedBounds();
      if (rectWidth(to) <= 0 || rectHeight(to) <= 0) continue;
      if (!isInDirection(from, to, direction)) continue;

      // Overlap decides; distance only breaks ties.
      const candidateOverlap = overlap(from, to, direction);
      const candidateDistance = distance(from, to, direction);
      if (candidateOverlap > bestOverlap || (candidateOverlap === bestOverlap && candidateDistance < bestDistance)) {
        bestOverlap = candidateOverlap;
        bestDistance = candidateDistance;
        best = candidate;
      }
    }
    return best;
  }
}

// ─── Geometry ────────────────────────────────────────────────────────────────

function centerX(rect: Rect): number {
  return rect.left + rectWidth(rect) / 2;
}

function centerY(rect: Rect): number {
  return rect.top + rectHeight(rect) / 2;
}

export function isInDirection(from: Rect, to: Rect, direction: Direction): boolean {
  switch (direction) {
    case Direction.Up: return centerY(to) < centerY(from);
    case Direction.Down: return centerY(to) > centerY(from);
    case Direction.Left: return centerX(to) < centerX(from);
    case Direction.Right: return centerX(to) > centerX(from);
  }
}

/**
 * Overlap on the axis perpendicular to `direction`, as a fraction of the
 * smaller extent.
 */
export function overlap(from: Rect, to: Rect, direction: Direction): number {
  if (direction === Direction.Up || direction === Direction.Down) {
    const shared = Math.max(0, Math.min(from.right, to.right) - Math.max(from.left, to.left));
    const extent = Math.min(rectWidth(from), rectWidth(to));
    return extent > 0 ? shared / extent : 0;
  }
  const shared = Math.max(0, Math.min(from.bottom, to.bottom) - Math.max(from.top, to.top));
  const extent = Math.min(rectHeight(from), rectHeight(to));
  return extent > 0 ? shared / extent : 0;
}

/** Edge-to-edge distance along `direction`; negative when the rects overlap. */
export function distance(from: Rect, to: Rect, direction: Direction): number {
  switch (direction) {
    case Direction.Up: return from.top - to.bottom;
    case Direction.Down: return to.top - from.bottom;
    case Direction.Left: return from.left - to.right;
    case Direction.Right: return to.left - from.right;
  }
}
