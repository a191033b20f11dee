/**
 * metadata-registry.ts
 * Write-once store of typed metadata entries keyed by declaration site.
 *
 * Lifecycle: annotate() at class-definition time, then resolve() and
 * resolveAggregate() from readers. freeze() closes the registry for writes.
 * Classes are held weakly; entries live as long as their class.
 *
 * Aggregate order is annotation order, i.e. decorator evaluation order:
 * member and parameter decorators run before the class decorator, so
 * `@model() class C { @property() name }` aggregates as
 * [property-spec, model-spec]. The static scanner reports source order.
 *
 * Rules enforced at annotate():
 *   1. At most one request-body-spec per method.
 *   2. A parameter index holds at most one parameter-spec or request-body-spec.
 *   3. relation-spec is rejected unless `allowRelations` is set.
 *   4. parameter-spec with in: 'cookie' is rejected.
 *   5. Re-annotating an existing (site, kind) merges with override (merge.ts).
 */

import type { ClassTarget, DeclarationSite } from '../models/declaration-site.js';
import { describeSite, sameMember, sameSite, siteShape } from '../models/declaration-site.js';
import type { MetadataEntry, MetadataKind, PayloadByKind } from '../models/metadata-entry.js';
import { isEntryOfKind } from '../models/metadata-entry.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import {
  DuplicateEntryError,
  RegistryFrozenError,
  UnsupportedFeatureError,
} from './errors.js';
import { applyRouteOverrides, cloneFrozen, mergeEntries } from './merge.js';

export interface RegistryOptions {
  logger?: Logger;
  /**
   * Accept relation-spec entries. Relation metadata is not consumed by any
   * builder yet, so it is rejected by default. Defaults to false.
   */
  allowRelations?: boolean;
}

export class MetadataRegistry {
  private readonly _log: Logger;
  private readonly _allowRelations: boolean;
  private readonly _entries = new WeakMap<ClassTarget, MetadataEntry[]>();
  private _sequence = 0;
  private _frozen = false;

  constructor(options: RegistryOptions = {}) {
    this._log = options.logger ?? new SilentLogger();
    this._allowRelations = options.allowRelations ?? false;
  }

  get isFrozen(): boolean {
    return this._frozen;
  }

  get allowsRelations(): boolean {
    return this._allowRelations;
  }

  /** Close the registry for writes. Reads are unaffected. */
  freeze(): void {
    this._frozen = true;
  }

  // ---------------------------------------------------------------------------
  // Write
  // ---------------------------------------------------------------------------

  annotate<K extends MetadataKind>(
    site: DeclarationSite,
    kind: K,
    payload: PayloadByKind[K],
  ): MetadataEntry<K> {
    if (this._frozen) throw new RegistryFrozenError(kind, site);

    const frozenSite: DeclarationSite = Object.freeze({ ...site });
    const candidate: MetadataEntry<K> = Object.freeze({
      site: frozenSite,
      kind,
      payload: cloneFrozen(payload),
      sequence: this._sequence,
    });

    this._checkSupported(candidate);

    const entries = this._entries.get(site.target) ?? [];
    this._checkCollisions(entries, candidate);

    const existingIndex = entries.findIndex(
      (entry) => entry.kind === kind && sameSite(entry.site, site),
    );

    if (existingIndex === -1) {
      this._sequence++;
      entries.push(candidate);
      this._entries.set(site.target, entries);
      this._log.debug('Annotated', { site: describeSite(site), kind, sequence: candidate.sequence });
      return candidate;
    }

    const existing = entries[existingIndex];
    if (existing === undefined) throw new Error(`Registry entry ${existingIndex} vanished`);
    const merged = Object.freeze(mergeEntries(existing, candidate));
    entries[existingIndex] = merged;
    this._log.warn('Re-annotation merged into existing entry', {
      site: describeSite(site),
      kind,
      sequence: merged.sequence,
    });

    if (!isEntryOfKind(merged, kind)) {
      throw new Error(`Merged entry changed kind from ${kind} to ${merged.kind}`);
    }
    return merged;
  }

  // ---------------------------------------------------------------------------
  // Read
  // ---------------------------------------------------------------------------

  /** Effective payload stored for (site, kind), or undefined. */
  resolve<K extends MetadataKind>(site: DeclarationSite, kind: K): PayloadByKind[K] | undefined {
    for (const entry of this.resolveAggregate(site.target)) {
      if (isEntryOfKind(entry, kind) && sameSite(entry.site, site)) return entry.payload;
    }
    return undefined;
  }

  /**
   * All entries of a class in annotation order, with method-level routes
   * overriding the class-level api spec. Returns a new frozen array per call.
   */
  resolveAggregate(target: ClassTarget): readonly MetadataEntry[] {
    const entries = this._entries.get(target);
    if (entries === undefined) return Object.freeze([]);
    return Object.freeze(applyRouteOverrides(entries));
  }

  /** The aggregate of a class restricted to one kind. */
  entriesOfKind<K extends MetadataKind>(target: ClassTarget, kind: K): MetadataEntry<K>[] {
    const result: MetadataEntry<K>[] = [];
    for (const entry of this.resolveAggregate(target)) {
      if (isEntryOfKind(entry, kind)) result.push(entry);
    }
    return result;
  }

  has(target: ClassTarget): boolean {
    return (this._entries.get(target)?.length ?? 0) > 0;
  }

  // ---------------------------------------------------------------------------
  // Rules
  // ---------------------------------------------------------------------------

  private _checkSupported(candidate: MetadataEntry): void {
    if (isEntryOfKind(candidate, 'relation-spec') && !this._allowRelations) {
      throw new UnsupportedFeatureError(
        `relation "${candidate.payload.relationType}"`,
        candidate.site,
      );
    }
    if (isEntryOfKind(candidate, 'parameter-spec') && candidate.payload.in === 'cookie') {
      throw new UnsupportedFeatureError('parameter location "cookie"', candidate.site);
    }
  }

  private _checkCollisions(entries: readonly MetadataEntry[], candidate: MetadataEntry): void {
    const { site, kind } = candidate;

    if (kind === 'request-body-spec') {
      const previous = entries.find(
        (entry) => entry.kind === 'request-body-spec' && sameMember(entry.site, site),
      );
      if (previous !== undefined) {
        throw new DuplicateEntryError(
          kind,
          site,
          `method already has a request body at ${describeSite(previous.site)}`,
        );
      }
    }

    if (
      (kind === 'parameter-spec' || kind === 'request-body-spec') &&
      siteShape(site) === 'method-parameter'
    ) {
      const previous = entries.find(
        (entry) =>
          (entry.kind === 'parameter-spec' || entry.kind === 'request-body-spec') &&
          sameSite(entry.site, site),
      );
      if (previous !== undefined) {
        throw new DuplicateEntryError(
          kind,
          site,
          `parameter index ${site.index ?? -1} already carries a ${previous.kind}`,
        );
      }
    }
  }
}
