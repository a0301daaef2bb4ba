// configurationRegistry.ts — configuration schema registration
//
// Maintains a registry of all configuration property schemas. The registry
// is the single source of truth for registered defaults, types and
// descriptions.

import { IDisposable, toDisposable } from '../platform/lifecycle.js';
import { Emitter, Event } from '../platform/events.js';
import type {
  IConfigurationPropertyDescriptor,
  IConfigurationPropertySchema,
  IRegisteredConfigurationSection,
} from './configurationTypes.js';

// ─── Events ──────────────────────────────────────────────────────────────────

export interface ConfigurationSchemaChangeEvent {
  /** The contributor whose schemas changed. */
  readonly contributorId: string;
  /** The property keys that were added or removed. */
  readonly affectedKeys: readonly string[];
}

// ─── ConfigurationRegistry ───────────────────────────────────────────────────

/**
 * Central registry for configuration schemas.
 *
 * The ConfigurationService uses this registry to resolve defaults and
 * validate written values.
 */
export class ConfigurationRegistry implements IDisposable {
  /** All registered property schemas, keyed by full property key. */
  private readonly _properties = new Map<string, IConfigurationPropertySchema>();

  /** Sections grouped by contributor. */
  private readonly _sectionsByContributor = new Map<string, IRegisteredConfigurationSection[]>();

  private readonly _onDidChangeSchema = new Emitter<ConfigurationSchemaChangeEvent>();
  /** Fires when schemas are added or removed. */
  readonly onDidChangeSchema: Event<ConfigurationSchemaChangeEvent> = this._onDidChangeSchema.event;

  // ── Registration ─────────────────────────────────────────────────────

  /**
   * Register a section of properties.
   *
   * @returns A disposable that unregisters all schemas of the contributor.
   */
  registerProperties(
    contributorId: string,
    title: string,
    properties: Record<string, IConfigurationPropertyDescriptor>,
  ): IDisposable {
    const registeredKeys: string[] = [];
    const schemas: IConfigurationPropertySchema[] = [];

    for (const [key, prop] of Object.entries(properties)) {
      const schema: IConfigurationPropertySchema = {
        key,
        type: prop.type,
        defaultValue: prop.default,
        description: prop.description ?? '',
        enum: prop.enum,
        minimum: prop.minimum,
        contributorId,
        sectionTitle: title,
      };

      if (this._properties.has(key)) {
        console.warn(
          `[ConfigurationRegistry] Duplicate configuration key "${key}" ` +
          `(contributor: ${contributorId}). Overwriting previous registration.`,
        );
      }

      this._properties.set(key, schema);
      schemas.push(schema);
      registeredKeys.push(key);
    }

    const existing = this._sectionsByContributor.get(contributorId) ?? [];
    existing.push({ contributorId, title, properties: schemas });
    this._sectionsByContributor.set(contributorId, existing);

    if (registeredKeys.length > 0) {
      this._onDidChangeSchema.fire({ contributorId, affectedKeys: registeredKeys });
    }

    return toDisposable(() => {
      this.unregisterContributor(contributorId);
    });
  }

  /**
   * Unregister all configuration schemas of a contributor.
   */
  unregisterContributor(contributorId: string): void {
    const sections = this._sectionsByContributor.get(contributorId);
    if (!sections) return;

    const removedKeys: string[] = [];
    for (const section of sections) {
      for (const prop of section.properties) {
        this._properties.delete(prop.key);
        removedKeys.push(prop.key);
      }
    }
    this._sectionsByContributor.delete(contributorId);

    if (removedKeys.length > 0) {
      this._onDidChangeSchema.fire({ contributorId, affectedKeys: removedKeys });
    }
  }

  // ── Queries ──────────────────────────────────────────────────────────

  getPropertySchema(key: string): IConfigurationPropertySchema | undefined {
    return this._properties.get(key);
  }

  getDefault(key: string): unknown {
    return this._properties.get(key)?.defaultValue;
  }

  hasSchema(key: string): boolean {
    return this._properties.has(key);
  }

  getAllSchemas(): readonly IConfigurationPropertySchema[] {
    return [...this._properties.values()];
  }

  getAllSections(): readonly IRegisteredConfigurationSection[] {
    const result: IRegisteredConfigurationSection[] = [];
    for (const sections of this._sectionsByContributor.values()) {
      result.push(...sections);
    }
    return result;
  }

  /**
   * Validate a value against its registered schema.
   * Returns `true` if valid, or a string error message if invalid.
   */
  validateValue(key: string, value: unknown): true | string {
    const schema = this._properties.get(key);
    if (!schema) {
      return true; // unknown keys are allowed
    }
    return _validateType(key, value, schema);
  }

  // ── Disposal ─────────────────────────────────────────────────────────

  dispose(): void {
    this._properties.clear();
    this._sectionsByContributor.clear();
    this._onDidChangeSchema.dispose();
  }
}

// ─── Validation Helpers ──────────────────────────────────────────────────────

function _validateType(
  key: string,
  value: unknown,
  schema: IConfigurationPropertySchema,
): true | string {
  if (value === null || value === undefined) {
    return true; // resets to default
  }

  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') {
        return `Configuration "${key}" expects a string, got ${typeof value}`;
      }
      if (schema.enum && schema.enum.length > 0 && !schema.enum.includes(value)) {
        return `Configuration "${key}" must be one of [${schema.enum.join(', ')}], got "${value}"`;
      }
      return true;

    case 'number':
      if (typeof value !== 'number' || Number.isNaN(value)) {
        return `Configuration "${key}" expects a number, got ${typeof value}`;
      }
      if (schema.minimum !== undefined && value < schema.minimum) {
        return `Configuration "${key}" must be at least ${schema.minimum}, got ${value}`;
      }
      return true;

    case 'boolean':
      if (typeof value !== 'boolean') {
        return `Configuration "${key}" expects a boolean, got ${typeof value}`;
      }
      return true;

    case 'object':
      if (typeof value !== 'object' || Array.isArray(value)) {
        return `Configuration "${key}" expects an object, got ${Array.isArray(value) ? 'array' : typeof value}`;
      }
      return true;

    case 'array':
      if (!Array.isArray(value)) {
        return `Configuration "${key}" expects an array, got ${typeof value}`;
      }
      return true;
  }
}
