// rotaryCache.ts — expiring navigation history for a focus region
//
// Two caches with independent policies: the last focused view inside the
// region, and the last region reached from it per nudge direction. Values
// are held weakly; the view tree owns them.

import type { View } from '../view/view.js';
import { Direction } from './rotaryConstants.js';
import { RotaryConfigurationError } from './rotaryErrors.js';
import type { FocusRegion } from './focusRegion.js';

// ─── Policy ──────────────────────────────────────────────────────────────────

export enum CacheType {
  /** Never stores, never returns. */
  Disabled = 'disabled',
  /** Returns whatever was saved last, however old. */
  NeverExpire = 'neverExpire',
  /** Returns an entry only while `now - savedAt < timeoutMs`. */
  ExpireAfterTimeout = 'expireAfterTimeout',
}

export type CachePolicy =
  | { readonly type: CacheType.Disabled }
  | { readonly type: CacheType.NeverExpire }
  | { readonly type: CacheType.ExpireAfterTimeout; readonly timeoutMs: number };

export const DISABLED_CACHE: CachePolicy = { type: CacheType.Disabled };
export const NEVER_EXPIRE_CACHE: CachePolicy = { type: CacheType.NeverExpire };

export function expireAfter(timeoutMs: number): CachePolicy {
  return { type: CacheType.ExpireAfterTimeout, timeoutMs };
}

/**
 * @throws RotaryConfigurationError for a non-positive or non-finite timeout.
 */
export function validateCachePolicy(policy: CachePolicy): void {
  if (policy.type === CacheType.ExpireAfterTimeout) {
    if (!Number.isFinite(policy.timeoutMs) || policy.timeoutMs <= 0) {
      throw new RotaryConfigurationError(
        `cache timeout must be a positive number of milliseconds, got ${policy.timeoutMs}`,
      );
    }
  }
}

// ─── ExpiringCache ───────────────────────────────────────────────────────────

export type CacheLookup<V> =
  | { readonly status: 'hit'; readonly value: V }
  | { readonly status: 'expired' | 'disabled' | 'absent' };

/** A non-owning handle on a cached value. `WeakRef` is the default. */
export interface CacheRef<V> {
  deref(): V | undefined;
}

interface CacheEntry<V extends object> {
  readonly ref: CacheRef<V>;
  readonly savedAt: number;
}

export class ExpiringCache<K, V extends object> {
  private readonly _entries = new Map<K, CacheEntry<V>>();

  constructor(
    readonly policy: CachePolicy,
    private readonly _createRef: (value: V) => CacheRef<V> = value => new WeakRef(value),
  ) {
    validateCachePolicy(policy);
  }

  get size(): number {
    return this._entries.size;
  }

  /** Overwrite the slot for `key`. No-op when the cache is disabled. */
  save(key: K, value: V, now: number): void {
    if (this.policy.type === CacheType.Disabled) return;
    this._entries.set(key, { ref: this._createRef(value), savedAt: now });
  }

  lookup(key: K, now: number): CacheLookup<V> {
    if (this.policy.type === CacheType.Disabled) {
      return { status: 'disabled' };
    }
    const entry = this._entries.get(key);
    const value = entry?.ref.deref();
    if (!entry || !value) {
      return { status: 'absent' };
    }
    if (this.policy.type === CacheType.ExpireAfterTimeout && now - entry.savedAt >= this.policy.timeoutMs) {
      return { status: 'expired' };
    }
    return { status: 'hit', value };
  }

  get(key: K, now: number): V | undefined {
    const result = this.lookup(key, now);
    return result.status === 'hit' ? result.value : undefined;
  }

  delete(key: K): void {
    this._entries.delete(key);
  }

  clear(): void {
    this._entries.clear();
  }
}

// ─── RotaryCache ─────────────────────────────────────────────────────────────

const FOCUSED_VIEW_SLOT = 'focusedView';

/**
 * History owned by one FocusRegion.
 */
export class RotaryCache {
  private readonly _focusHistory: ExpiringCache<typeof FOCUSED_VIEW_SLOT, View>;
  private readonly _regionHistory: ExpiringCache<Direction, FocusRegion>;

  constructor(focusHistoryPolicy: CachePolicy, regionHistoryPolicy: CachePolicy) {
    this._focusHistory = new ExpiringCache(focusHistoryPolicy);
    this._regionHistory = new ExpiringCache(regionHistoryPolicy);
  }

  get focusHistoryPolicy(): CachePolicy {
    return this._focusHistory.policy;
  }

  get regionHistoryPolicy(): CachePolicy {
    return this._regionHistory.policy;
  }

  // ─── Focused view ──────────────────────────────────────────────────────

  getFocusedView(now: number): View | undefined {
    return this._focusHistory.get(FOCUSED_VIEW_SLOT, now);
  }

  lookupFocusedView(now: number): CacheLookup<View> {
    return this._focusHistory.lookup(FOCUSED_VIEW_SLOT, now);
  }

  saveFocusedView(view: View, now: number): void {
    this._focusHistory.save(FOCUSED_VIEW_SLOT, view, now);
  }

  // ─── Region history ────────────────────────────────────────────────────

  /** The region last reached from the owning region by nudging `direction`. */
  getCachedRegion(direction: Direction, now: number): FocusRegion | undefined {
    return this._regionHistory.get(direction, now);
  }

  lookupRegion(direction: Direction, now: number): CacheLookup<FocusRegion> {
    return this._regionHistory.lookup(direction, now);
  }

  saveRegion(direction: Direction, region: FocusRegion, now: number): void {
    this._regionHistory.save(direction, region, now);
  }

  clearRegionHistory(): void {
    this._regionHistory.clear();
  }
}
