/**
 * openapi-spec-builder.ts
 * Assembles an OpenAPI 3.0 document from the aggregated route-spec,
 * parameter-spec and request-body-spec entries of controller classes.
 *
 * Pipeline per controller:
 *   1. Effective controller-level operations (api spec), under basePath.
 *   2. Method-level operations under basePath, with their parameters
 *      (ordered by index) and request body.
 *   3. Inferred request-body schemas filled by the SchemaResolver.
 * Then components.schemas from the configured models.
 *
 * Paths are emitted sorted; a later operation on an already-emitted
 * (path, verb) replaces the earlier one and is logged.
 */

import type { ClassTarget } from '../models/declaration-site.js';
import { describeSite, sameMember } from '../models/declaration-site.js';
import type { MetadataEntry } from '../models/metadata-entry.js';
import { isEntryOfKind } from '../models/metadata-entry.js';
import type {
  ContentObject,
  HttpVerb,
  OpenApiDocument,
  OperationObject,
  ParameterObject,
  PathsObject,
  RequestBodyObject,
  SchemaObject,
} from '../models/openapi.js';
import { HTTP_VERBS } from '../models/openapi.js';
import type { ParameterSpec, RequestBodySpec } from '../models/payloads.js';
import { isInferenceRequested } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import { ModelDefinitionBuilder } from './model-definition-builder.js';
import type { SchemaResolver } from './schema-resolver.js';
import { defaultSchemaResolver } from './schema-resolver.js';

export interface OpenApiBuildOptions {
  title: string;
  version: string;
  /** Model classes emitted under components.schemas. */
  models?: ClassTarget[];
  /** Fills inferred request-body schemas. Defaults to defaultSchemaResolver. */
  schemaResolver?: SchemaResolver;
  /** Media type used for inferred request bodies. Defaults to application/json. */
  defaultMediaType?: string;
}

/** basePath + path, with a single slash between them and no trailing slash. */
export function joinPath(basePath: string, path: string): string {
  const base = basePath.replace(/\/+$/, '');
  const rest = path === '' || path === '/' ? '' : path.startsWith('/') ? path : `/${path}`;
  const joined = base + rest;
  return joined === '' ? '/' : joined;
}

export class OpenApiSpecBuilder {
  private readonly _registry: MetadataRegistry;
  private readonly _options: OpenApiBuildOptions;
  private readonly _log: Logger;
  private readonly _resolver: SchemaResolver;

  constructor(registry: MetadataRegistry, options: OpenApiBuildOptions, logger?: Logger) {
    this._registry = registry;
    this._options = options;
    this._log = logger ?? new SilentLogger();
    this._resolver = options.schemaResolver ?? defaultSchemaResolver;
  }

  build(controllers: readonly ClassTarget[]): OpenApiDocument {
    const paths: PathsObject = {};

    for (const controller of controllers) {
      const entries = this._registry.resolveAggregate(controller);
      const before = this._countOperations(paths);
      this._addControllerOperations(paths, entries);
      this._addMethodOperations(paths, entries);
      this._log.debug('Controller routes collected', {
        controller: controller.name,
        operations: this._countOperations(paths) - before,
      });
    }

    const sortedPaths: PathsObject = {};
    for (const key of Object.keys(paths).sort()) {
      const item = paths[key];
      if (item !== undefined) sortedPaths[key] = item;
    }

    const document: OpenApiDocument = {
      openapi: '3.0.0',
      info: { title: this._options.title, version: this._options.version },
      paths: sortedPaths,
    };

    const schemas = this._componentSchemas();
    if (Object.keys(schemas).length > 0) document.components = { schemas };
    return document;
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  private _addControllerOperations(paths: PathsObject, entries: readonly MetadataEntry[]): void {
    for (const entry of entries) {
      if (!isEntryOfKind(entry, 'route-spec') || entry.payload.scope !== 'controller') continue;
      const basePath = entry.payload.basePath ?? '';
      for (const [path, item] of Object.entries(entry.payload.paths)) {
        for (const verb of HTTP_VERBS) {
          const op = item[verb];
          if (op === undefined) continue;
          this._put(paths, joinPath(basePath, path), verb, { ...op }, describeSite(entry.site));
        }
      }
    }
  }

  private _addMethodOperations(paths: PathsObject, entries: readonly MetadataEntry[]): void {
    const basePath = this._basePath(entries);

    for (const entry of entries) {
      if (!isEntryOfKind(entry, 'route-spec') || entry.payload.scope !== 'operation') continue;
      const { verb, path, spec } = entry.payload;
      const op: OperationObject = { ...spec };

      const parameters = this._parametersOf(entries, entry);
      if (parameters.length > 0) op.parameters = [...(spec.parameters ?? []), ...parameters];

      const body = this._requestBodyOf(entries, entry);
      if (body !== undefined) op.requestBody = body;

      this._put(paths, joinPath(basePath, path), verb, op, describeSite(entry.site));
    }
  }

  private _put(
    paths: PathsObject,
    fullPath: string,
    verb: HttpVerb,
    op: OperationObject,
    source: string,
  ): void {
    const item = paths[fullPath] ?? {};
    if (item[verb] !== undefined) {
      this._log.warn('Operation declared twice, later declaration wins', {
        path: fullPath,
        verb,
        source,
      });
    }
    item[verb] = op;
    paths[fullPath] = item;
  }

  private _basePath(entries: readonly MetadataEntry[]): string {
    for (const entry of entries) {
      if (isEntryOfKind(entry, 'route-spec') && entry.payload.scope === 'controller') {
        return entry.payload.basePath ?? '';
      }
    }
    return '';
  }

  private _countOperations(paths: PathsObject): number {
    let count = 0;
    for (const item of Object.values(paths)) count += Object.keys(item).length;
    return count;
  }

  // ---------------------------------------------------------------------------
  // Parameters and request bodies
  // ---------------------------------------------------------------------------

  private _parametersOf(entries: readonly MetadataEntry[], route: MetadataEntry): ParameterObject[] {
    const params: Array<{ index: number; spec: ParameterSpec }> = [];
    for (const entry of entries) {
      if (!isEntryOfKind(entry, 'parameter-spec') || !sameMember(entry.site, route.site)) continue;
      params.push({ index: entry.site.index ?? 0, spec: entry.payload });
    }
    params.sort((a, b) => a.index - b.index);
    return params.map(({ spec }) => this._parameterObject(spec));
  }

  private _parameterObject(spec: ParameterSpec): ParameterObject {
    const param: ParameterObject = { name: spec.name, in: spec.in };
    if (spec.description !== undefined) param.description = spec.description;
    param.required = spec.required;
    param.schema = spec.schema;
    return param;
  }

  private _requestBodyOf(
    entries: readonly MetadataEntry[],
    route: MetadataEntry,
  ): RequestBodyObject | undefined {
    for (const entry of entries) {
      if (isEntryOfKind(entry, 'request-body-spec') && sameMember(entry.site, route.site)) {
        return this._requestBodyObject(entry.payload);
      }
    }
    return undefined;
  }

  private _requestBodyObject(spec: RequestBodySpec): RequestBodyObject {
    const mediaType = this._options.defaultMediaType ?? 'application/json';
    const content: ContentObject = isInferenceRequested(spec.content)
      ? { [mediaType]: { schema: this._resolver(spec.content.declaredType) } }
      : { ...spec.content };

    const body: RequestBodyObject = { content };
    if (spec.description !== undefined) body.description = spec.description;
    if (spec.required !== undefined) body.required = spec.required;
    return body;
  }

  // ---------------------------------------------------------------------------
  // Components
  // ---------------------------------------------------------------------------

  private _componentSchemas(): Record<string, SchemaObject> {
    const models = this._options.models ?? [];
    const builder = new ModelDefinitionBuilder(this._registry, this._log, this._resolver);
    const schemas: Record<string, SchemaObject> = {};
    for (const model of models) {
      const definition = builder.build(model);
      if (definition !== null) schemas[definition.name] = builder.toJsonSchema(definition);
    }
    return schemas;
  }
}
