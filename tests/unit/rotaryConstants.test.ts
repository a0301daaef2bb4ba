/**
 * Unit tests for the rotary protocol constants — opposite directions and
 * reading the nudge direction out of an action argument bundle.
 */

import { describe, expect, it } from 'vitest';
import {
  Direction,
  NUDGE_DIRECTION,
  NUDGE_DIRECTIONS,
  getNudgeDirection,
  getOppositeDirection,
  nudgeArguments,
  parseDirection,
} from '../../src/rotary/rotaryConstants.js';
import { RotaryConfigurationError } from '../../src/rotary/rotaryErrors.js';

describe('getOppositeDirection', () => {
  it('pairs left with right and up with down', () => {
    expect(getOppositeDirection(Direction.Left)).toBe(Direction.Right);
    expect(getOppositeDirection(Direction.Right)).toBe(Direction.Left);
    expect(getOppositeDirection(Direction.Up)).toBe(Direction.Down);
    expect(getOppositeDirection(Direction.Down)).toBe(Direction.Up);
  });

  it('is its own inverse', () => {
    for (const direction of NUDGE_DIRECTIONS) {
      expect(getOppositeDirection(getOppositeDirection(direction))).toBe(direction);
    }
  });

  it('throws for a value that is not a direction', () => {
    const fromJson: Direction = JSON.parse('"forward"');
    expect(() => getOppositeDirection(fromJson)).toThrow(RotaryConfigurationError);
  });
});

describe('nudge arguments', () => {
  it('round-trips a direction through the argument bundle', () => {
    expect(nudgeArguments(Direction.Up)).toEqual({ [NUDGE_DIRECTION]: 'up' });
    expect(getNudgeDirection(nudgeArguments(Direction.Up))).toBe(Direction.Up);
  });

  it('returns undefined for missing or unknown directions', () => {
    expect(getNudgeDirection(undefined)).toBeUndefined();
    expect(getNudgeDirection({})).toBeUndefined();
    expect(getNudgeDirection({ [NUDGE_DIRECTION]: 'sideways' })).toBeUndefined();
    expect(getNudgeDirection({ [NUDGE_DIRECTION]: 3 })).toBeUndefined();
  });

  it('parseDirection accepts the string values of the enum', () => {
    expect(parseDirection('left')).toBe(Direction.Left);
    expect(parseDirection('LEFT')).toBeUndefined();
  });
});
