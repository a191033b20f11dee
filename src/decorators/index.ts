/**
 * decorators/index.ts
 * Barrel export for the decorator surface.
 */

export { createAnnotations } from './annotations.js';
export type { Annotations } from './annotations.js';
export { createRouteDecorators } from './route-decorators.js';
export type { ControllerSpecInput, RouteDecorators, VerbDecorator } from './route-decorators.js';
export { createParamDecorator, canonicalParameter, SHORTCUT_SCHEMAS } from './parameter-decorators.js';
export type {
  ParamDecorator,
  ParameterInput,
  ParameterShortcut,
  LocationShortcuts,
  ShortcutType,
} from './parameter-decorators.js';
export { createRequestBodyDecorator } from './request-body-decorator.js';
export type { RequestBodyDecorator, RequestBodyInput } from './request-body-decorator.js';
export { createInjectDecorator } from './injection-decorators.js';
export type { InjectDecorator, InjectOptions } from './injection-decorators.js';
export { createAuthenticateDecorator } from './authentication-decorator.js';
export type { AuthenticateDecorator } from './authentication-decorator.js';
export { createModelDecorators } from './model-decorators.js';
export type { ModelDecorators, ModelInput, PropertyInput } from './model-decorators.js';
export { createRepositoryDecorator, repositorySpec } from './repository-decorator.js';
export type { RepositoryDecorator } from './repository-decorator.js';
export { createRelationDecorators } from './relation-decorators.js';
export type { RelationDecorators, RelationInput, RelationShortcut } from './relation-decorators.js';
export { declaredParameterType, declaredPropertyType, typeName } from './type-inference.js';
export type {
  ClassAnnotation,
  MethodAnnotation,
  PropertyAnnotation,
  ParameterAnnotation,
  InjectionAnnotation,
} from './sites.js';
