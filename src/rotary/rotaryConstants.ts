// rotaryConstants.ts — protocol shared with the input-routing service
//
// Directions, action names, argument keys and the node-extras keys under
// which a region publishes its bound offsets.

import { RotaryConfigurationError } from './rotaryErrors.js';

// ─── Direction ───────────────────────────────────────────────────────────────

/**
 * A nudge direction.
 */
export enum Direction {
  Left = 'left',
  Right = 'right',
  Up = 'up',
  Down = 'down',
}

export const NUDGE_DIRECTIONS: readonly Direction[] = [
  Direction.Left,
  Direction.Right,
  Direction.Up,
  Direction.Down,
];

/**
 * Returns the direction opposite `direction`. Self-inverse.
 *
 * @throws RotaryConfigurationError for anything that is not a Direction.
 */
export function getOppositeDirection(direction: Direction): Direction {
  switch (direction) {
    case Direction.Left: return Direction.Right;
    case Direction.Right: return Direction.Left;
    case Direction.Up: return Direction.Down;
    case Direction.Down: return Direction.Up;
  }
  throw new RotaryConfigurationError(
    `direction must be left, right, up or down, got "${String(direction)}"`,
  );
}

/**
 * Narrow an untyped action argument to a Direction.
 */
export function parseDirection(value: unknown): Direction | undefined {
  return NUDGE_DIRECTIONS.find(d => d === value);
}

// ─── Actions ─────────────────────────────────────────────────────────────────

/**
 * Actions the input-routing service performs on regions and sinks.
 */
export enum RotaryAction {
  /** Region: focus a descendant. Sink: park focus on the sink. */
  Focus = 'rotary.action.focus',
  /** Region: move focus to the shortcut target. */
  NudgeShortcut = 'rotary.action.nudgeShortcut',
  /** Region: move focus to an explicit or remembered neighbour region. */
  NudgeToAnotherRegion = 'rotary.action.nudgeToAnotherRegion',
  /** Sink: restore focus somewhere sensible in the window. */
  RestoreDefaultFocus = 'rotary.action.restoreDefaultFocus',
  /** Sink: hide the soft keyboard. */
  HideIme = 'rotary.action.hideIme',
}

/**
 * The generic argument bundle carried with an action.
 */
export type RotaryActionArguments = Readonly<Record<string, unknown>>;

/** Argument key carrying the nudge Direction. */
export const NUDGE_DIRECTION = 'rotary.nudgeDirection';

/**
 * Build the argument bundle for a directional action.
 */
export function nudgeArguments(direction: Direction): RotaryActionArguments {
  return { [NUDGE_DIRECTION]: direction };
}

/**
 * Read the nudge direction from an argument bundle, if present and valid.
 */
export function getNudgeDirection(args: RotaryActionArguments | undefined): Direction | undefined {
  return args ? parseDirection(args[NUDGE_DIRECTION]) : undefined;
}

// ─── Node Extras ─────────────────────────────────────────────────────────────

/** Extras key for the offset of a region's left bound. */
export const REGION_LEFT_BOUND_OFFSET = 'rotary.region.leftBoundOffset';
/** Extras key for the offset of a region's right bound. */
export const REGION_RIGHT_BOUND_OFFSET = 'rotary.region.rightBoundOffset';
/** Extras key for the offset of a region's top bound. */
export const REGION_TOP_BOUND_OFFSET = 'rotary.region.topBoundOffset';
/** Extras key for the offset of a region's bottom bound. */
export const REGION_BOTTOM_BOUND_OFFSET = 'rotary.region.bottomBoundOffset';
