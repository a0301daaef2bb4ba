// clock.ts — monotonic time source
//
// History entries are stamped with `now()` and compared against it later,
// so the source must never go backwards. Wall-clock time (Date.now) can.

import { performance } from 'node:perf_hooks';

/**
 * A monotonic millisecond clock.
 */
export interface IClock {
  now(): number;
}

/**
 * The process-wide monotonic clock.
 */
export const systemClock: IClock = {
  now: () => performance.now(),
};
