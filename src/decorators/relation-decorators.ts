/**
 * relation-decorators.ts
 * Relation decorators. Unsupported by default: the registry throws
 * UnsupportedFeatureError unless it was created with `allowRelations`.
 */

import type { ClassTarget } from '../models/declaration-site.js';
import type { RelationSpec, RelationType } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import type { PropertyAnnotation } from './sites.js';
import { memberSite } from './sites.js';

export interface RelationInput {
  keyFrom?: string;
  keyTo?: string;
}

export type RelationShortcut = (target: ClassTarget | string, input?: RelationInput) => PropertyAnnotation;

export interface RelationDecorators {
  relation(relationType: RelationType, target: ClassTarget | string, input?: RelationInput): PropertyAnnotation;
  belongsTo: RelationShortcut;
  hasOne: RelationShortcut;
  hasMany: RelationShortcut;
  embedsOne: RelationShortcut;
  embedsMany: RelationShortcut;
  referencesOne: RelationShortcut;
  referencesMany: RelationShortcut;
}

export function createRelationDecorators(registry: MetadataRegistry): RelationDecorators {
  const relation = (
    relationType: RelationType,
    target: ClassTarget | string,
    input: RelationInput = {},
  ): PropertyAnnotation => {
    const spec: RelationSpec = {
      relationType,
      target: typeof target === 'string' ? target : target.name,
      ...input,
    };
    return (owner, member) => {
      registry.annotate(memberSite(owner, member), 'relation-spec', spec);
    };
  };

  const shortcut =
    (relationType: RelationType): RelationShortcut =>
    (target, input) =>
      relation(relationType, target, input);

  return {
    relation,
    belongsTo: shortcut('belongsTo'),
    hasOne: shortcut('hasOne'),
    hasMany: shortcut('hasMany'),
    embedsOne: shortcut('embedsOne'),
    embedsMany: shortcut('embedsMany'),
    referencesOne: shortcut('referencesOne'),
    referencesMany: shortcut('referencesMany'),
  };
}
