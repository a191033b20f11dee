/**
 * annotations.ts
 * Every decorator factory bound to one explicit registry.
 *
 * Usage:
 *   const registry = new MetadataRegistry();
 *   const { get, param, requestBody, model, property } = createAnnotations(registry);
 */

import type { MetadataRegistry } from '../registry/metadata-registry.js';
import type { AuthenticateDecorator } from './authentication-decorator.js';
import { createAuthenticateDecorator } from './authentication-decorator.js';
import type { InjectDecorator } from './injection-decorators.js';
import { createInjectDecorator } from './injection-decorators.js';
import type { ModelDecorators } from './model-decorators.js';
import { createModelDecorators } from './model-decorators.js';
import type { ParamDecorator } from './parameter-decorators.js';
import { createParamDecorator } from './parameter-decorators.js';
import type { RelationDecorators } from './relation-decorators.js';
import { createRelationDecorators } from './relation-decorators.js';
import type { RepositoryDecorator } from './repository-decorator.js';
import { createRepositoryDecorator } from './repository-decorator.js';
import type { RequestBodyDecorator } from './request-body-decorator.js';
import { createRequestBodyDecorator } from './request-body-decorator.js';
import type { RouteDecorators } from './route-decorators.js';
import { createRouteDecorators } from './route-decorators.js';

export interface Annotations extends RouteDecorators, ModelDecorators, RelationDecorators {
  param: ParamDecorator;
  requestBody: RequestBodyDecorator;
  inject: InjectDecorator;
  authenticate: AuthenticateDecorator;
  repository: RepositoryDecorator;
}

export function createAnnotations(registry: MetadataRegistry): Annotations {
  return {
    ...createRouteDecorators(registry),
    ...createModelDecorators(registry),
    ...createRelationDecorators(registry),
    param: createParamDecorator(registry),
    requestBody: createRequestBodyDecorator(registry),
    inject: createInjectDecorator(registry),
    authenticate: createAuthenticateDecorator(registry),
    repository: createRepositoryDecorator(registry),
  };
}
