/**
 * Unit tests for ExpiringCache and RotaryCache — policies, the expiry
 * boundary, overwrite-on-save and bulk clearing of region history.
 */

import { describe, expect, it } from 'vitest';
import {
  CacheType,
  DISABLED_CACHE,
  ExpiringCache,
  NEVER_EXPIRE_CACHE,
  RotaryCache,
  expireAfter,
} from '../../src/rotary/rotaryCache.js';
import type { CachePolicy, CacheRef } from '../../src/rotary/rotaryCache.js';
import { Direction } from '../../src/rotary/rotaryConstants.js';
import { RotaryConfigurationError } from '../../src/rotary/rotaryErrors.js';
import { FocusRegion } from '../../src/rotary/focusRegion.js';
import { createButton } from './rotaryTestUtils.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

/** A reference the test can drop, standing in for a collected WeakRef. */
class ReleasableRef<V> implements CacheRef<V> {
  constructor(private _value: V | undefined) {}

  deref(): V | undefined {
    return this._value;
  }

  release(): void {
    this._value = undefined;
  }
}

function createReleasableCache(policy: CachePolicy) {
  const refs: ReleasableRef<object>[] = [];
  const cache = new ExpiringCache<string, object>(policy, value => {
    const ref = new ReleasableRef(value);
    refs.push(ref);
    return ref;
  });
  return { cache, refs };
}

// ── ExpiringCache ───────────────────────────────────────────────────────────

describe('ExpiringCache', () => {
  const value = { name: 'entry' };

  describe('expireAfterTimeout', () => {
    it('hits one millisecond before the timeout', () => {
      const cache = new ExpiringCache<string, object>(expireAfter(100));
      cache.save('key', value, 1000);
      expect(cache.get('key', 1099)).toBe(value);
    });

    it('misses exactly at the timeout', () => {
      const cache = new ExpiringCache<string, object>(expireAfter(100));
      cache.save('key', value, 1000);
      expect(cache.lookup('key', 1100)).toEqual({ status: 'expired' });
      expect(cache.get('key', 1100)).toBeUndefined();
    });

    it('misses one millisecond after the timeout', () => {
      const cache = new ExpiringCache<string, object>(expireAfter(100));
      cache.save('key', value, 1000);
      expect(cache.get('key', 1101)).toBeUndefined();
    });

    it('restarts the timeout when a key is saved again', () => {
      const newer = { name: 'newer' };
      const cache = new ExpiringCache<string, object>(expireAfter(100));
      cache.save('key', value, 1000);
      cache.save('key', newer, 1050);
      expect(cache.get('key', 1120)).toBe(newer);
    });

    it('rejects a non-positive timeout', () => {
      expect(() => new ExpiringCache(expireAfter(0))).toThrow(RotaryConfigurationError);
      expect(() => new ExpiringCache(expireAfter(-5))).toThrow(RotaryConfigurationError);
    });
  });

  describe('neverExpire', () => {
    it('returns an entry however old', () => {
      const cache = new ExpiringCache<string, object>(NEVER_EXPIRE_CACHE);
      cache.save('key', value, 0);
      expect(cache.get('key', Number.MAX_SAFE_INTEGER)).toBe(value);
    });

    it('reports a key never saved as absent', () => {
      const cache = new ExpiringCache<string, object>(NEVER_EXPIRE_CACHE);
      expect(cache.lookup('key', 0)).toEqual({ status: 'absent' });
    });
  });

  describe('disabled', () => {
    it('never stores anything', () => {
      const cache = new ExpiringCache<string, object>(DISABLED_CACHE);
      cache.save('key', value, 0);
      expect(cache.size).toBe(0);
      expect(cache.lookup('key', 0)).toEqual({ status: 'disabled' });
    });
  });

  describe('collected values', () => {
    it('reads a collected value as absent', () => {
      const { cache, refs } = createReleasableCache(NEVER_EXPIRE_CACHE);
      cache.save('key', value, 0);
      expect(cache.get('key', 0)).toBe(value);

      refs[0].release();
      expect(cache.lookup('key', 0)).toEqual({ status: 'absent' });
      expect(cache.get('key', 0)).toBeUndefined();
    });

    it('reports absent rather than expired once the value is gone', () => {
      const { cache, refs } = createReleasableCache(expireAfter(100));
      cache.save('key', value, 1000);
      refs[0].release();

      expect(cache.lookup('key', 1050)).toEqual({ status: 'absent' });
      expect(cache.lookup('key', 1200)).toEqual({ status: 'absent' });
    });

    it('holds a fresh reference after the key is saved again', () => {
      const { cache, refs } = createReleasableCache(NEVER_EXPIRE_CACHE);
      cache.save('key', value, 0);
      refs[0].release();
      cache.save('key', value, 10);

      expect(refs).toHaveLength(2);
      expect(cache.get('key', 10)).toBe(value);
    });
  });

  it('clear() drops every entry', () => {
    const cache = new ExpiringCache<string, object>(NEVER_EXPIRE_CACHE);
    cache.save('a', value, 0);
    cache.save('b', value, 0);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.get('a', 0)).toBeUndefined();
  });
});

// ── RotaryCache ─────────────────────────────────────────────────────────────

describe('RotaryCache', () => {
  it('keeps one focused view per region', () => {
    const cache = new RotaryCache(NEVER_EXPIRE_CACHE, NEVER_EXPIRE_CACHE);
    const first = createButton('first');
    const second = createButton('second');

    cache.saveFocusedView(first, 0);
    cache.saveFocusedView(second, 10);

    expect(cache.getFocusedView(20)).toBe(second);
  });

  it('keeps one region per direction', () => {
    const cache = new RotaryCache(NEVER_EXPIRE_CACHE, NEVER_EXPIRE_CACHE);
    const up = new FocusRegion({ id: 'up' });
    const left = new FocusRegion({ id: 'left' });

    cache.saveRegion(Direction.Up, up, 0);
    cache.saveRegion(Direction.Left, left, 0);

    expect(cache.getCachedRegion(Direction.Up, 0)).toBe(up);
    expect(cache.getCachedRegion(Direction.Left, 0)).toBe(left);
    expect(cache.getCachedRegion(Direction.Down, 0)).toBeUndefined();
  });

  it('applies each policy to its own cache', () => {
    const cache = new RotaryCache(expireAfter(50), DISABLED_CACHE);
    const view = createButton('view');
    const region = new FocusRegion({ id: 'region' });

    cache.saveFocusedView(view, 0);
    cache.saveRegion(Direction.Right, region, 0);

    expect(cache.getFocusedView(49)).toBe(view);
    expect(cache.getFocusedView(50)).toBeUndefined();
    expect(cache.lookupRegion(Direction.Right, 0)).toEqual({ status: 'disabled' });
    expect(cache.focusHistoryPolicy).toEqual({ type: CacheType.ExpireAfterTimeout, timeoutMs: 50 });
  });

  it('clearRegionHistory() leaves focus history alone', () => {
    const cache = new RotaryCache(NEVER_EXPIRE_CACHE, NEVER_EXPIRE_CACHE);
    const view = createButton('view');
    const region = new FocusRegion({ id: 'region' });

    cache.saveFocusedView(view, 0);
    cache.saveRegion(Direction.Down, region, 0);
    cache.clearRegionHistory();

    expect(cache.getCachedRegion(Direction.Down, 0)).toBeUndefined();
    expect(cache.getFocusedView(0)).toBe(view);
  });
});
