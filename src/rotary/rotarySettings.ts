// rotarySettings.ts — resolved engine settings shared by every focus region

import { CachePolicy, expireAfter } from './rotaryCache.js';

/**
 * Settings a FocusRegion is built with. Usually resolved from the
 * `rotary.*` configuration section; see `readRotarySettings`.
 */
export interface RotarySettings {
  readonly focusHistory: CachePolicy;
  readonly regionHistory: CachePolicy;
  readonly defaultFocusOverridesHistory: boolean;
  readonly clearRegionHistoryWhenRotating: boolean;
  readonly foregroundHighlight: boolean;
  readonly backgroundHighlight: boolean;
}

export const DEFAULT_FOCUS_HISTORY_TIMEOUT_MS = 300_000;
export const DEFAULT_REGION_HISTORY_TIMEOUT_MS = 5_000;

export const DEFAULT_ROTARY_SETTINGS: RotarySettings = {
  focusHistory: expireAfter(DEFAULT_FOCUS_HISTORY_TIMEOUT_MS),
  regionHistory: expireAfter(DEFAULT_REGION_HISTORY_TIMEOUT_MS),
  defaultFocusOverridesHistory: false,
  clearRegionHistoryWhenRotating: true,
  foregroundHighlight: true,
  backgroundHighlight: false,
};
