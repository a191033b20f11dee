/**
 * metadata-entry.ts
 * The (site, kind, payload) triple stored by the registry.
 */

import type { DeclarationSite } from './declaration-site.js';
import type {
  AuthenticationSpec,
  InjectionSpec,
  ModelSpec,
  ParameterSpec,
  PropertySpec,
  RelationSpec,
  RepositorySpec,
  RequestBodySpec,
  RouteSpec,
} from './payloads.js';

export interface PayloadByKind {
  'route-spec': RouteSpec;
  'parameter-spec': ParameterSpec;
  'request-body-spec': RequestBodySpec;
  'injection-spec': InjectionSpec;
  'authentication-spec': AuthenticationSpec;
  'model-spec': ModelSpec;
  'property-spec': PropertySpec;
  'repository-spec': RepositorySpec;
  'relation-spec': RelationSpec;
}

export type MetadataKind = keyof PayloadByKind;

export const METADATA_KINDS: readonly MetadataKind[] = [
  'route-spec',
  'parameter-spec',
  'request-body-spec',
  'injection-spec',
  'authentication-spec',
  'model-spec',
  'property-spec',
  'repository-spec',
  'relation-spec',
];

export interface MetadataEntry<K extends MetadataKind = MetadataKind> {
  readonly site: DeclarationSite;
  readonly kind: K;
  readonly payload: PayloadByKind[K];
  /** Registry-wide annotation order; fixed when the entry is first created. */
  readonly sequence: number;
}

export function isEntryOfKind<K extends MetadataKind>(
  entry: MetadataEntry,
  kind: K,
): entry is MetadataEntry<K> {
  return entry.kind === kind;
}
