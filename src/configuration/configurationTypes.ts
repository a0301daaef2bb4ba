// configurationTypes.ts — shared types for the configuration system
//
// Defines the interfaces for configuration read/write, change events,
// and schema registration used by the ConfigurationService and
// ConfigurationRegistry.

import type { Event } from '../platform/events.js';
import type { IDisposable } from '../platform/lifecycle.js';

// ─── Configuration Values ────────────────────────────────────────────────────

/**
 * Allowed configuration value types (JSON-serializable).
 */
export type ConfigurationValueType = string | number | boolean | null | undefined | object | unknown[];

/**
 * A read/write configuration object returned by `getConfiguration(section?)`.
 */
export interface IScopedConfiguration {
  /** Read a setting value, falling back to the registered default. */
  get(key: string, defaultValue?: unknown): unknown;

  /** Write a setting value. `undefined` or `null` resets it to the default. */
  update(key: string, value: ConfigurationValueType): void;

  /** Check if a setting exists (explicit value or registered default). */
  has(key: string): boolean;
}

// ─── Configuration Change Event ──────────────────────────────────────────────

/**
 * Fired when one or more configuration values change.
 */
export interface IConfigurationChangeEvent {
  /** Check whether a given section/key was affected by the change. */
  affectsConfiguration(section: string): boolean;

  /** The specific keys that changed. */
  readonly affectedKeys: readonly string[];
}

// ─── Configuration Schema ────────────────────────────────────────────────────

export type ConfigurationPropertyType = 'string' | 'number' | 'boolean' | 'object' | 'array';

/**
 * A property as a contributor declares it.
 */
export interface IConfigurationPropertyDescriptor {
  readonly type: ConfigurationPropertyType;
  readonly default?: unknown;
  readonly description?: string;
  /** Allowed values (for string properties). */
  readonly enum?: readonly string[];
  /** Inclusive lower bound (for number properties). */
  readonly minimum?: number;
}

/**
 * A single registered configuration property schema.
 */
export interface IConfigurationPropertySchema {
  /** The full dot-separated key (e.g., `'rotary.regionHistory.cacheType'`). */
  readonly key: string;

  readonly type: ConfigurationPropertyType;

  /** Default value used when no explicit value is set. */
  readonly defaultValue: unknown;

  readonly description: string;

  readonly enum?: readonly string[];

  readonly minimum?: number;

  /** The contributor that registered this property. */
  readonly contributorId: string;

  /** The section title given at registration. */
  readonly sectionTitle: string;
}

/**
 * A registered configuration section.
 */
export interface IRegisteredConfigurationSection {
  readonly contributorId: string;
  readonly title: string;
  readonly properties: readonly IConfigurationPropertySchema[];
}

// ─── Configuration Service Interface ─────────────────────────────────────────

export interface IConfigurationServiceShape extends IDisposable {
  /** Get a scoped configuration object for a section. */
  getConfiguration(section?: string): IScopedConfiguration;

  /** Fires when any configuration value changes. */
  readonly onDidChangeConfiguration: Event<IConfigurationChangeEvent>;

  /** Register configuration properties for a contributor. */
  registerSchema(contributorId: string, title: string, properties: Record<string, IConfigurationPropertyDescriptor>): IDisposable;

  /** Unregister all configuration schemas for a contributor. */
  unregisterContributor(contributorId: string): void;

  /** Get the registered default value for a key. */
  getDefault(key: string): unknown;

  /** Check if a key has a registered schema. */
  hasSchema(key: string): boolean;

  getAllSchemas(): readonly IConfigurationPropertySchema[];

  getAllSections(): readonly IRegisteredConfigurationSection[];
}
