// rotaryConfiguration.ts — the `rotary.*` configuration section
//
// Registers the engine's settings with the configuration service and
// resolves them into the RotarySettings focus regions are built with.

import type { IDisposable } from '../platform/lifecycle.js';
import {
  CachePolicy,
  CacheType,
  DISABLED_CACHE,
  NEVER_EXPIRE_CACHE,
  expireAfter,
  validateCachePolicy,
} from '../rotary/rotaryCache.js';
import { RotaryConfigurationError } from '../rotary/rotaryErrors.js';
import {
  DEFAULT_FOCUS_HISTORY_TIMEOUT_MS,
  DEFAULT_REGION_HISTORY_TIMEOUT_MS,
  DEFAULT_ROTARY_SETTINGS,
  RotarySettings,
} from '../rotary/rotarySettings.js';
import type {
  IConfigurationPropertyDescriptor,
  IConfigurationServiceShape,
  IScopedConfiguration,
} from './configurationTypes.js';

export const ROTARY_SECTION = 'rotary';

const CACHE_TYPES: readonly string[] = [CacheType.Disabled, CacheType.NeverExpire, CacheType.ExpireAfterTimeout];

// ─── Schema ──────────────────────────────────────────────────────────────────

export const ROTARY_CONFIGURATION_PROPERTIES: Record<string, IConfigurationPropertyDescriptor> = {
  'rotary.focusHistory.cacheType': {
    type: 'string',
    enum: CACHE_TYPES,
    default: CacheType.ExpireAfterTimeout,
    description: 'How long a region remembers the view that was focused in it last.',
  },
  'rotary.focusHistory.expirationPeriodMs': {
    type: 'number',
    minimum: 1,
    default: DEFAULT_FOCUS_HISTORY_TIMEOUT_MS,
    description: 'Lifetime of focus history when the cache type is expireAfterTimeout.',
  },
  'rotary.regionHistory.cacheType': {
    type: 'string',
    enum: CACHE_TYPES,
    default: CacheType.ExpireAfterTimeout,
    description: 'How long a region remembers where it was nudged to from.',
  },
  'rotary.regionHistory.expirationPeriodMs': {
    type: 'number',
    minimum: 1,
    default: DEFAULT_REGION_HISTORY_TIMEOUT_MS,
    description: 'Lifetime of region history when the cache type is expireAfterTimeout.',
  },
  'rotary.defaultFocusOverridesHistory': {
    type: 'boolean',
    default: DEFAULT_ROTARY_SETTINGS.defaultFocusOverridesHistory,
    description: 'Focus the default focus view of a region before its remembered view.',
  },
  'rotary.clearRegionHistoryWhenRotating': {
    type: 'boolean',
    default: DEFAULT_ROTARY_SETTINGS.clearRegionHistoryWhenRotating,
    description: 'Forget region history when focus moves within a region.',
  },
  'rotary.highlight.foreground': {
    type: 'boolean',
    default: DEFAULT_ROTARY_SETTINGS.foregroundHighlight,
    description: 'Draw a highlight over the focused region and its content.',
  },
  'rotary.highlight.background': {
    type: 'boolean',
    default: DEFAULT_ROTARY_SETTINGS.backgroundHighlight,
    description: 'Draw a highlight behind the content of the focused region.',
  },
};

/**
 * Register the `rotary.*` properties. Dispose to unregister.
 */
export function registerRotaryConfiguration(service: IConfigurationServiceShape): IDisposable {
  return service.registerSchema(ROTARY_SECTION, 'Rotary Navigation', ROTARY_CONFIGURATION_PROPERTIES);
}

// ─── Resolution ──────────────────────────────────────────────────────────────

/**
 * Resolve the `rotary.*` section into RotarySettings.
 *
 * @throws RotaryConfigurationError when a value has the wrong type or
 * describes an invalid cache policy.
 */
export function readRotarySettings(service: IConfigurationServiceShape): RotarySettings {
  const config = service.getConfiguration(ROTARY_SECTION);
  return {
    focusHistory: readCachePolicy(config, 'focusHistory'),
    regionHistory: readCachePolicy(config, 'regionHistory'),
    defaultFocusOverridesHistory: readBoolean(config, 'defaultFocusOverridesHistory', DEFAULT_ROTARY_SETTINGS.defaultFocusOverridesHistory),
    clearRegionHistoryWhenRotating: readBoolean(config, 'clearRegionHistoryWhenRotating', DEFAULT_ROTARY_SETTINGS.clearRegionHistoryWhenRotating),
    foregroundHighlight: readBoolean(config, 'highlight.foreground', DEFAULT_ROTARY_SETTINGS.foregroundHighlight),
    backgroundHighlight: readBoolean(config, 'highlight.background', DEFAULT_ROTARY_SETTINGS.backgroundHighlight),
  };
}

function readCachePolicy(config: IScopedConfiguration, cache: 'focusHistory' | 'regionHistory'): CachePolicy {
  const type = config.get(`${cache}.cacheType`, CacheType.ExpireAfterTimeout);
  switch (type) {
    case CacheType.Disabled:
      return DISABLED_CACHE;
    case CacheType.NeverExpire:
      return NEVER_EXPIRE_CACHE;
    case CacheType.ExpireAfterTimeout: {
      const fallback = cache === 'focusHistory' ? DEFAULT_FOCUS_HISTORY_TIMEOUT_MS : DEFAULT_REGION_HISTORY_TIMEOUT_MS;
      const timeout = config.get(`${cache}.expirationPeriodMs`, fallback);
      if (typeof timeout !== 'number') {
        throw new RotaryConfigurationError(
          `${ROTARY_SECTION}.${cache}.expirationPeriodMs must be a number, got ${typeof timeout}`,
        );
      }
      const policy = expireAfter(timeout);
      validateCachePolicy(policy);
      return policy;
    }
    default:
      throw new RotaryConfigurationError(
        `${ROTARY_SECTION}.${cache}.cacheType must be one of [${CACHE_TYPES.join(', ')}], got "${String(type)}"`,
      );
  }
}

function readBoolean(config: IScopedConfiguration, key: string, fallback: boolean): boolean {
  const value = config.get(key, fallback);
  if (typeof value !== 'boolean') {
    throw new RotaryConfigurationError(`${ROTARY_SECTION}.${key} must be a boolean, got ${typeof value}`);
  }
  return value;
}
