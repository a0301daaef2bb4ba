// configurationService.ts — configuration read/write/events
//
// The ConfigurationService is the runtime API for reading and writing
// configuration values. It delegates schema registration to the
// ConfigurationRegistry and keeps explicit values in memory for the
// lifetime of the process.
//
// Engine code reads through `getConfiguration('rotary').get(key)`.

import { Disposable, IDisposable } from '../platform/lifecycle.js';
import { Emitter, Event } from '../platform/events.js';
import { ConfigurationRegistry } from './configurationRegistry.js';
import type {
  ConfigurationValueType,
  IConfigurationChangeEvent,
  IConfigurationPropertyDescriptor,
  IConfigurationPropertySchema,
  IConfigurationServiceShape,
  IRegisteredConfigurationSection,
  IScopedConfiguration,
} from './configurationTypes.js';

// ─── ConfigurationService ────────────────────────────────────────────────────

/**
 * Runtime configuration service.
 *
 * Responsibilities:
 * - Reads configuration values (explicit or default from registry)
 * - Writes configuration values, warning about ones the schema rejects
 * - Fires change events when values are updated
 * - Delegates schema management to ConfigurationRegistry
 */
export class ConfigurationService extends Disposable implements IConfigurationServiceShape {
  /** Explicit (non-default) configuration values. */
  private readonly _values = new Map<string, unknown>();

  private readonly _onDidChangeConfiguration = this._register(new Emitter<IConfigurationChangeEvent>());
  /** Fires when any configuration value changes. */
  readonly onDidChangeConfiguration: Event<IConfigurationChangeEvent> = this._onDidChangeConfiguration.event;

  constructor(
    private readonly _registry: ConfigurationRegistry = new ConfigurationRegistry(),
  ) {
    super();
    this._register(this._registry);

    // New schemas bring new defaults; report them as configuration changes.
    this._register(this._registry.onDidChangeSchema((e) => {
      this._onDidChangeConfiguration.fire({
        affectsConfiguration: (section: string) => e.affectedKeys.some(k => affects(k, section)),
        affectedKeys: e.affectedKeys,
      });
    }));
  }

  // ── IConfigurationServiceShape ───────────────────────────────────────

  /**
   * Get a scoped configuration object.
   *
   * If `section` is provided, keys are relative to that section:
   * `getConfiguration('rotary').get('defaultFocusOverridesHistory')` reads
   * `rotary.defaultFocusOverridesHistory`. Without it, keys are absolute.
   */
  getConfiguration(section?: string): IScopedConfiguration {
    return new ScopedConfiguration(this, section);
  }

  registerSchema(
    contributorId: string,
    title: string,
    properties: Record<string, IConfigurationPropertyDescriptor>,
  ): IDisposable {
    return this._registry.registerProperties(contributorId, title, properties);
  }

  unregisterContributor(contributorId: string): void {
    this._registry.unregisterContributor(contributorId);
  }

  getDefault(key: string): unknown {
    return this._registry.getDefault(key);
  }

  hasSchema(key: string): boolean {
    return this._registry.hasSchema(key);
  }

  getAllSchemas(): readonly IConfigurationPropertySchema[] {
    return this._registry.getAllSchemas();
  }

  getAllSections(): readonly IRegisteredConfigurationSection[] {
    return this._registry.getAllSections();
  }

  // ── Internal Read/Write ──────────────────────────────────────────────

  /**
   * Read a configuration value. Falls back to the registered default, then
   * to `defaultValue`.
   */
  _getValue(key: string, defaultValue?: unknown): unknown {
    if (this._values.has(key)) {
      return this._values.get(key);
    }
    const registeredDefault = this._registry.getDefault(key);
    if (registeredDefault !== undefined) {
      return registeredDefault;
    }
    return defaultValue;
  }

  /**
   * Check if a key has an explicit value or a registered schema.
   */
  _hasValue(key: string): boolean {
    return this._values.has(key) || this._registry.hasSchema(key);
  }

  _updateValue(key: string, value: ConfigurationValueType): void {
    const validationResult = this._registry.validateValue(key, value);
    if (validationResult !== true) {
      // Warn, don't block; readers validate what they consume.
      console.warn(`[ConfigurationService] ${validationResult}`);
    }

    if (value === undefined || value === null) {
      this._values.delete(key);
    } else {
      this._values.set(key, value);
    }

    this._onDidChangeConfiguration.fire({
      affectsConfiguration: (section: string) => affects(key, section),
      affectedKeys: [key],
    });
  }

  // ── Disposal ─────────────────────────────────────────────────────────

  override dispose(): void {
    this._values.clear();
    super.dispose();
  }
}

function affects(key: string, section: string): boolean {
  return key === section || key.startsWith(section + '.') || section.startsWith(key + '.');
}

// ─── ScopedConfiguration ─────────────────────────────────────────────────────

/**
 * A section-scoped view into the configuration service.
 * Returned by `getConfiguration(section)`.
 */
class ScopedConfiguration implements IScopedConfiguration {
  constructor(
    private readonly _service: ConfigurationService,
    private readonly _section: string | undefined,
  ) {}

  get(key: string, defaultValue?: unknown): unknown {
    return this._service._getValue(this._fullKey(key), defaultValue);
  }

  update(key: string, value: ConfigurationValueType): void {
    this._service._updateValue(this._fullKey(key), value);
  }

  has(key: string): boolean {
    return this._service._hasValue(this._fullKey(key));
  }

  private _fullKey(key: string): string {
    return this._section ? `${this._section}.${key}` : key;
  }
}
