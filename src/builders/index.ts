/**
 * builders/index.ts
 * Barrel export for the downstream builders and the declaration report builder.
 */

export { OpenApiSpecBuilder, joinPath } from './openapi-spec-builder.js';
export type { OpenApiBuildOptions } from './openapi-spec-builder.js';
export { ModelDefinitionBuilder, UNKNOWN_PROPERTY_TYPE } from './model-definition-builder.js';
export type { ModelDefinition, PropertyDefinition } from './model-definition-builder.js';
export { InjectionPlanBuilder } from './injection-plan-builder.js';
export type {
  ConstructorArgumentPlan,
  InjectionBinding,
  InjectionPlan,
  MethodArgumentPlan,
  PropertyPlan,
} from './injection-plan-builder.js';
export { AuthenticationMapBuilder } from './authentication-map-builder.js';
export type { AuthenticationMap } from './authentication-map-builder.js';
export { SCHEMA_REF_PREFIX, defaultSchemaResolver } from './schema-resolver.js';
export type { SchemaResolver } from './schema-resolver.js';
export { DeclarationReportBuilder } from './declaration-report-builder.js';
export type { DeclarationReportOptions } from './declaration-report-builder.js';
