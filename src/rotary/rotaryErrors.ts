// rotaryErrors.ts — configuration errors raised by the focus engine
//
// Only author mistakes throw. A navigation attempt that finds nothing to
// focus is reported as `false` / `undefined`, never as an error.

/**
 * Thrown when a region, sink, cache or view hierarchy is configured in a
 * way the engine cannot navigate: a shortcut without a direction, an
 * unknown direction, a region nested in another region, a non-positive
 * cache timeout.
 */
export class RotaryConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RotaryConfigurationError';
  }
}
