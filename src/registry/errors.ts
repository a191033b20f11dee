/**
 * errors.ts
 * Errors raised to the declarer at annotation time.
 */

import type { DeclarationSite } from '../models/declaration-site.js';
import { describeSite } from '../models/declaration-site.js';
import type { MetadataKind } from '../models/metadata-entry.js';

export class AnnotationError extends Error {
  /** Label of the offending declaration site, when one is known. */
  readonly site: string | undefined;

  constructor(message: string, site?: DeclarationSite) {
    super(site !== undefined ? `${describeSite(site)}: ${message}` : message);
    this.name = 'AnnotationError';
    this.site = site !== undefined ? describeSite(site) : undefined;
  }
}

/**
 * A second entry where at most one may exist: another request body on the
 * same method, or another parameter annotation on the same parameter index.
 */
export class DuplicateEntryError extends AnnotationError {
  readonly kind: MetadataKind;

  constructor(kind: MetadataKind, site: DeclarationSite, detail: string) {
    super(`duplicate ${kind}: ${detail}`, site);
    this.name = 'DuplicateEntryError';
    this.kind = kind;
  }
}

/** Relations while disabled, and the `cookie` parameter location. */
export class UnsupportedFeatureError extends AnnotationError {
  readonly feature: string;

  constructor(feature: string, site?: DeclarationSite) {
    super(`${feature} is not supported`, site);
    this.name = 'UnsupportedFeatureError';
    this.feature = feature;
  }
}

export class RegistryFrozenError extends AnnotationError {
  constructor(kind: MetadataKind, site: DeclarationSite) {
    super(`cannot annotate ${kind} after the registry was frozen`, site);
    this.name = 'RegistryFrozenError';
  }
}
