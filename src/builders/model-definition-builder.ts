/**
 * model-definition-builder.ts
 * Builds a model definition (name, settings, typed properties) from the
 * model-spec and property-spec entries of a class, filling inferred
 * property types from their design-time type names.
 *
 * Properties keep declaration order. Symbol-keyed properties are skipped.
 */

import type { ClassTarget } from '../models/declaration-site.js';
import type { SchemaObject, SchemaOrReference } from '../models/openapi.js';
import type { PropertySpec } from '../models/payloads.js';
import { isInferenceRequested } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import type { SchemaResolver } from './schema-resolver.js';
import { defaultSchemaResolver } from './schema-resolver.js';

export interface PropertyDefinition {
  type: string;
  required: boolean;
  id: boolean;
  description?: string;
  default?: unknown;
}

export interface ModelDefinition {
  name: string;
  settings: Record<string, unknown>;
  properties: Record<string, PropertyDefinition>;
}

/** Type used when neither an explicit type nor a design-time type exists. */
export const UNKNOWN_PROPERTY_TYPE = 'any';

export class ModelDefinitionBuilder {
  private readonly _registry: MetadataRegistry;
  private readonly _log: Logger;
  private readonly _resolver: SchemaResolver;

  constructor(registry: MetadataRegistry, logger?: Logger, resolver?: SchemaResolver) {
    this._registry = registry;
    this._log = logger ?? new SilentLogger();
    this._resolver = resolver ?? defaultSchemaResolver;
  }

  /** Returns null when the class carries no model-spec. */
  build(model: ClassTarget): ModelDefinition | null {
    const [modelEntry] = this._registry.entriesOfKind(model, 'model-spec');
    if (modelEntry === undefined) {
      this._log.warn('Skipping class without model-spec', { class: model.name });
      return null;
    }

    const properties: Record<string, PropertyDefinition> = {};
    for (const entry of this._registry.entriesOfKind(model, 'property-spec')) {
      const { member } = entry.site;
      if (typeof member !== 'string') continue;
      properties[member] = this._propertyDefinition(entry.payload);
    }

    this._log.debug('Model defined', {
      model: modelEntry.payload.name,
      properties: Object.keys(properties).length,
    });

    return {
      name: modelEntry.payload.name,
      settings: { ...modelEntry.payload.settings },
      properties,
    };
  }

  /** JSON schema of a model definition, as placed under components.schemas. */
  toJsonSchema(definition: ModelDefinition): SchemaObject {
    const properties: Record<string, SchemaOrReference> = {};
    const required: string[] = [];

    for (const [name, property] of Object.entries(definition.properties)) {
      const schema: SchemaOrReference = { ...this._resolver(property.type) };
      if (!('$ref' in schema)) {
        if (property.description !== undefined) schema.description = property.description;
        if (property.default !== undefined) schema.default = property.default;
      }
      properties[name] = schema;
      if (property.required) required.push(name);
    }

    const schema: SchemaObject = { title: definition.name, type: 'object', properties };
    if (required.length > 0) schema.required = required;
    return schema;
  }

  private _propertyDefinition(spec: PropertySpec): PropertyDefinition {
    const type = isInferenceRequested(spec.type)
      ? spec.type.declaredType ?? UNKNOWN_PROPERTY_TYPE
      : spec.type;

    const definition: PropertyDefinition = {
      type,
      required: spec.required ?? false,
      id: spec.id ?? false,
    };
    if (spec.description !== undefined) definition.description = spec.description;
    if (spec.default !== undefined) definition.default = spec.default;
    return definition;
  }
}
