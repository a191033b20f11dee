/**
 * schema-resolver.ts
 * Fills InferenceRequested sentinels: design-time type name → schema.
 *
 *   string/number/boolean/integer → primitive schema
 *   date                  → string, format date-time
 *   buffer                → string, format binary
 *   array                 → untyped array
 *   object / unknown      → {}
 *   anything else         → $ref to components.schemas.<Name>
 */

import type { SchemaOrReference } from '../models/openapi.js';

export type SchemaResolver = (declaredType: string | null) => SchemaOrReference;

export const SCHEMA_REF_PREFIX = '#/components/schemas/';

export const defaultSchemaResolver: SchemaResolver = (declaredType) => {
  switch (declaredType) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'integer':
      return { type: declaredType };
    case 'date':
      return { type: 'string', format: 'date-time' };
    case 'buffer':
      return { type: 'string', format: 'binary' };
    case 'array':
      return { type: 'array' };
    case null:
    case 'object':
    case 'any':
      return {};
    default:
      return { $ref: `${SCHEMA_REF_PREFIX}${declaredType}` };
  }
};
