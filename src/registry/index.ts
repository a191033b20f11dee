/**
 * registry/index.ts
 * Barrel export for the metadata registry.
 */

export { MetadataRegistry } from './metadata-registry.js';
export type { RegistryOptions } from './metadata-registry.js';
export {
  AnnotationError,
  DuplicateEntryError,
  RegistryFrozenError,
  UnsupportedFeatureError,
} from './errors.js';
export { applyRouteOverrides, cloneFrozen, mergeEntries } from './merge.js';
