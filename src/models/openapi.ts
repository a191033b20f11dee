/**
 * openapi.ts
 * The subset of OpenAPI 3.0 object shapes carried by route, parameter and
 * request-body metadata. Unknown vendor fields (`x-*`) pass through as-is.
 */

export type HttpVerb = 'get' | 'post' | 'put' | 'patch' | 'delete' | 'head' | 'options';

export const HTTP_VERBS: readonly HttpVerb[] = [
  'get',
  'post',
  'put',
  'patch',
  'delete',
  'head',
  'options',
];

export function isHttpVerb(value: string): value is HttpVerb {
  return HTTP_VERBS.some((verb) => verb === value);
}

export interface ReferenceObject {
  $ref: string;
}

export interface SchemaObject {
  type?: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  format?: string;
  title?: string;
  description?: string;
  items?: SchemaObject | ReferenceObject;
  properties?: Record<string, SchemaObject | ReferenceObject>;
  required?: string[];
  enum?: unknown[];
  default?: unknown;
  [extension: `x-${string}`]: unknown;
}

export type SchemaOrReference = SchemaObject | ReferenceObject;

export interface MediaTypeObject {
  schema?: SchemaOrReference;
  example?: unknown;
}

/** Media type (e.g. "application/json") → media type object. */
export type ContentObject = Record<string, MediaTypeObject>;

export type ParameterLocation = 'query' | 'header' | 'path' | 'cookie';

export interface ParameterObject {
  name: string;
  in: ParameterLocation;
  description?: string;
  required?: boolean;
  schema?: SchemaOrReference;
}

export interface RequestBodyObject {
  description?: string;
  required?: boolean;
  content: ContentObject;
}

export interface ResponseObject {
  description: string;
  content?: ContentObject;
}

export interface OperationObject {
  operationId?: string;
  summary?: string;
  description?: string;
  tags?: string[];
  parameters?: ParameterObject[];
  requestBody?: RequestBodyObject;
  responses?: Record<string, ResponseObject>;
  deprecated?: boolean;
  'x-operation-name'?: string;
  [extension: `x-${string}`]: unknown;
}

export type PathItemObject = Partial<Record<HttpVerb, OperationObject>>;

export type PathsObject = Record<string, PathItemObject>;

export interface OpenApiDocument {
  openapi: '3.0.0';
  info: { title: string; version: string };
  paths: PathsObject;
  components?: { schemas: Record<string, SchemaObject> };
}
