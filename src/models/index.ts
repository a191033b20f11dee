/**
 * models/index.ts
 * Barrel export for the model package.
 */

export type { Origin } from './origin.js';

export type { ClassTarget, DeclarationSite, SiteShape } from './declaration-site.js';
export { describeSite, memberName, sameMember, sameSite, siteShape } from './declaration-site.js';

export type {
  ContentObject,
  HttpVerb,
  MediaTypeObject,
  OpenApiDocument,
  OperationObject,
  ParameterLocation,
  ParameterObject,
  PathItemObject,
  PathsObject,
  ReferenceObject,
  RequestBodyObject,
  ResponseObject,
  SchemaObject,
  SchemaOrReference,
} from './openapi.js';
export { HTTP_VERBS, isHttpVerb } from './openapi.js';

export type {
  AuthenticationSpec,
  ControllerRouteSpec,
  InferenceRequested,
  InjectionSpec,
  ModelSpec,
  OperationRouteSpec,
  ParameterSpec,
  PropertySpec,
  RelationSpec,
  RelationType,
  RepositorySpec,
  RequestBodySpec,
  RouteSpec,
  TagPattern,
} from './payloads.js';
export {
  inferenceRequested,
  isInferenceRequested,
  normalizePath,
  operationKey,
} from './payloads.js';

export type { MetadataEntry, MetadataKind, PayloadByKind } from './metadata-entry.js';
export { METADATA_KINDS, isEntryOfKind } from './metadata-entry.js';

export type { ScannerConfig } from './scanner-config.js';

export type {
  DeclarationReport,
  DiagnosticCode,
  ScanDiagnostic,
  ScannedClass,
  ScannedEntry,
  ScannedSite,
} from './declaration-report.js';
