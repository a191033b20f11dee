/**
 * route-decorators.ts
 * Class-level api spec and method-level operations.
 *
 * Method-level operations record `x-operation-name` (the method name) unless
 * the spec already names one; builders use it to bind operations to handlers.
 */

import type { HttpVerb, OperationObject, PathsObject } from '../models/openapi.js';
import { memberName } from '../models/declaration-site.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import type { ClassAnnotation, MethodAnnotation } from './sites.js';
import { memberSite } from './sites.js';

export interface ControllerSpecInput {
  /** Prefix applied to every path of the controller. */
  basePath?: string;
  paths?: PathsObject;
}

export type VerbDecorator = (path: string, spec?: OperationObject) => MethodAnnotation;

export interface RouteDecorators {
  api(spec: ControllerSpecInput): ClassAnnotation;
  operation(verb: HttpVerb, path: string, spec?: OperationObject): MethodAnnotation;
  get: VerbDecorator;
  post: VerbDecorator;
  put: VerbDecorator;
  patch: VerbDecorator;
  del: VerbDecorator;
}

export function createRouteDecorators(registry: MetadataRegistry): RouteDecorators {
  const api = (spec: ControllerSpecInput): ClassAnnotation => (target) => {
    const paths = spec.paths ?? {};
    registry.annotate(
      { target },
      'route-spec',
      spec.basePath !== undefined
        ? { scope: 'controller', basePath: spec.basePath, paths }
        : { scope: 'controller', paths },
    );
  };

  const operation =
    (verb: HttpVerb, path: string, spec: OperationObject = {}): MethodAnnotation =>
    (target, member) => {
      const named: OperationObject =
        spec['x-operation-name'] !== undefined
          ? spec
          : { ...spec, 'x-operation-name': memberName(member) };
      registry.annotate(memberSite(target, member), 'route-spec', {
        scope: 'operation',
        verb,
        path,
        spec: named,
      });
    };

  const verbDecorator =
    (verb: HttpVerb): VerbDecorator =>
    (path, spec) =>
      operation(verb, path, spec);

  return {
    api,
    operation,
    get: verbDecorator('get'),
    post: verbDecorator('post'),
    put: verbDecorator('put'),
    patch: verbDecorator('patch'),
    del: verbDecorator('delete'),
  };
}
