/**
 * payloads.ts
 * Payload shapes, one per metadata kind.
 *
 * Payloads are stored in canonical form: shortcut annotations have already
 * been expanded, and omitted schemas/types are represented by the
 * InferenceRequested sentinel rather than filled in.
 */

import type {
  ContentObject,
  HttpVerb,
  OperationObject,
  ParameterLocation,
  PathsObject,
  SchemaOrReference,
} from './openapi.js';

// ---------------------------------------------------------------------------
// Inference sentinel
// ---------------------------------------------------------------------------

/**
 * Marks a schema or type that the declarer left out. A downstream builder
 * derives the value from `declaredType`, the design-time type name emitted
 * for the decorated parameter or property (null when none was emitted).
 */
export interface InferenceRequested {
  readonly inference: 'requested';
  readonly declaredType: string | null;
}

export function inferenceRequested(declaredType: string | null): InferenceRequested {
  return { inference: 'requested', declaredType };
}

export function isInferenceRequested(value: unknown): value is InferenceRequested {
  return (
    typeof value === 'object' &&
    value !== null &&
    'inference' in value &&
    value.inference === 'requested'
  );
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

/** Method-level route: one operation bound to the decorated method. */
export interface OperationRouteSpec {
  readonly scope: 'operation';
  readonly verb: HttpVerb;
  readonly path: string;
  readonly spec: OperationObject;
}

/** Class-level route: the aggregate "api spec" of a controller. */
export interface ControllerRouteSpec {
  readonly scope: 'controller';
  readonly basePath?: string;
  readonly paths: PathsObject;
}

export type RouteSpec = OperationRouteSpec | ControllerRouteSpec;

/** Leading slash, no trailing slash; the empty path is "/". */
export function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  if (trimmed === '') return '/';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Operation key shared by class-level and method-level route entries.
 * Paths are normalized, so "{id}", "/{id}" and "/{id}/" give the same key.
 */
export function operationKey(verb: HttpVerb, path: string): string {
  return `${verb} ${normalizePath(path)}`;
}

// ---------------------------------------------------------------------------
// Parameters and request bodies
// ---------------------------------------------------------------------------

export interface ParameterSpec {
  readonly name: string;
  readonly in: ParameterLocation;
  readonly description?: string;
  readonly required: boolean;
  readonly schema: SchemaOrReference;
}

export interface RequestBodySpec {
  /** Index of the decorated method parameter. */
  readonly index: number;
  readonly description?: string;
  readonly required?: boolean;
  readonly content: ContentObject | InferenceRequested;
}

// ---------------------------------------------------------------------------
// Dependency injection
// ---------------------------------------------------------------------------

export interface TagPattern {
  readonly source: string;
  readonly flags: string;
}

export type InjectionSpec =
  | { readonly variant: 'key'; readonly bindingKey: string; readonly optional: boolean }
  | { readonly variant: 'getter'; readonly bindingKey: string }
  | { readonly variant: 'setter'; readonly bindingKey: string }
  | { readonly variant: 'tag'; readonly tag: string | TagPattern }
  | { readonly variant: 'context' };

// ---------------------------------------------------------------------------
// Authentication
// ---------------------------------------------------------------------------

export interface AuthenticationSpec {
  readonly strategy: string;
  /** Opaque to the registry; interpreted by the authentication strategy. */
  readonly options: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Models and repositories
// ---------------------------------------------------------------------------

export interface ModelSpec {
  readonly name: string;
  readonly settings: Readonly<Record<string, unknown>>;
}

export interface PropertySpec {
  readonly type: string | InferenceRequested;
  readonly required?: boolean;
  readonly id?: boolean;
  readonly description?: string;
  readonly default?: unknown;
}

export type RepositorySpec =
  | {
      readonly form: 'repository';
      readonly repositoryName: string;
      readonly bindingKey: string;
    }
  | {
      readonly form: 'model';
      readonly modelName: string;
      readonly dataSourceName: string;
      readonly bindingKey: string;
    };

export type RelationType =
  | 'belongsTo'
  | 'hasOne'
  | 'hasMany'
  | 'embedsOne'
  | 'embedsMany'
  | 'referencesOne'
  | 'referencesMany';

export interface RelationSpec {
  readonly relationType: RelationType;
  readonly target: string;
  readonly keyFrom?: string;
  readonly keyTo?: string;
}
