/**
 * merge.ts
 * Kind-specific merge rules for re-annotation, and the read-time rule that
 * lets method-level routes override the controller-level api spec.
 *
 * Nothing here mutates its inputs; every result is a fresh frozen value.
 */

import type { MetadataEntry } from '../models/metadata-entry.js';
import { isEntryOfKind } from '../models/metadata-entry.js';
import type { OperationObject, PathItemObject, PathsObject } from '../models/openapi.js';
import { HTTP_VERBS } from '../models/openapi.js';
import type {
  ControllerRouteSpec,
  OperationRouteSpec,
  RouteSpec,
} from '../models/payloads.js';
import { operationKey } from '../models/payloads.js';

// ---------------------------------------------------------------------------
// Freezing
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copy plain objects and arrays recursively and freeze the copies.
 * Other values (class instances, functions, dates) are kept by reference.
 */
export function cloneFrozen<T>(value: T): T;
export function cloneFrozen(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item: unknown) => cloneFrozen(item)));
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) copy[key] = cloneFrozen(item);
    return Object.freeze(copy);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Re-annotation
// ---------------------------------------------------------------------------

function mergePaths(previous: PathsObject, next: PathsObject): PathsObject {
  const merged: PathsObject = {};
  for (const [path, item] of Object.entries(previous)) merged[path] = { ...item };
  for (const [path, item] of Object.entries(next)) {
    merged[path] = { ...(merged[path] ?? {}), ...item };
  }
  return merged;
}

function mergeRouteSpecs(previous: RouteSpec, next: RouteSpec): RouteSpec {
  if (previous.scope === 'controller' && next.scope === 'controller') {
    const basePath = next.basePath ?? previous.basePath;
    const paths = mergePaths(previous.paths, next.paths);
    return basePath !== undefined
      ? { scope: 'controller', basePath, paths }
      : { scope: 'controller', paths };
  }
  if (previous.scope === 'operation' && next.scope === 'operation') {
    return {
      scope: 'operation',
      verb: next.verb,
      path: next.path,
      spec: { ...previous.spec, ...next.spec },
    };
  }
  return next;
}

/**
 * Merge a re-annotation of the same (site, kind) into the existing entry.
 * The result keeps the existing entry's site and sequence.
 */
export function mergeEntries(previous: MetadataEntry, next: MetadataEntry): MetadataEntry {
  if (isEntryOfKind(previous, 'route-spec') && isEntryOfKind(next, 'route-spec')) {
    return { ...previous, payload: cloneFrozen(mergeRouteSpecs(previous.payload, next.payload)) };
  }
  if (isEntryOfKind(previous, 'model-spec') && isEntryOfKind(next, 'model-spec')) {
    return {
      ...previous,
      payload: cloneFrozen({
        name: next.payload.name,
        settings: { ...previous.payload.settings, ...next.payload.settings },
      }),
    };
  }
  if (isEntryOfKind(previous, 'property-spec') && isEntryOfKind(next, 'property-spec')) {
    return { ...previous, payload: cloneFrozen({ ...previous.payload, ...next.payload }) };
  }
  if (
    isEntryOfKind(previous, 'authentication-spec') &&
    isEntryOfKind(next, 'authentication-spec')
  ) {
    return {
      ...previous,
      payload: cloneFrozen({
        strategy: next.payload.strategy,
        options: { ...previous.payload.options, ...next.payload.options },
      }),
    };
  }
  // injection-spec, repository-spec, relation-spec: the later payload replaces.
  return { ...next, site: previous.site, sequence: previous.sequence };
}

// ---------------------------------------------------------------------------
// Controller / method override
// ---------------------------------------------------------------------------

function isControllerEntry(
  entry: MetadataEntry,
): entry is MetadataEntry<'route-spec'> & { payload: ControllerRouteSpec } {
  return (
    isEntryOfKind(entry, 'route-spec') &&
    entry.payload.scope === 'controller' &&
    entry.site.member === undefined
  );
}

function isOperationEntry(
  entry: MetadataEntry,
): entry is MetadataEntry<'route-spec'> & { payload: OperationRouteSpec } {
  return isEntryOfKind(entry, 'route-spec') && entry.payload.scope === 'operation';
}

function withoutShadowed(spec: ControllerRouteSpec, shadowed: ReadonlySet<string>): ControllerRouteSpec {
  const paths: PathsObject = {};
  for (const [path, item] of Object.entries(spec.paths)) {
    const kept: PathItemObject = {};
    let count = 0;
    for (const verb of HTTP_VERBS) {
      const op = item[verb];
      if (op === undefined || shadowed.has(operationKey(verb, path))) continue;
      kept[verb] = op;
      count++;
    }
    if (count > 0) paths[path] = kept;
  }
  return spec.basePath !== undefined
    ? { scope: 'controller', basePath: spec.basePath, paths }
    : { scope: 'controller', paths };
}

/**
 * Apply the override rule to the entries of one class.
 *
 * When the controller-level api spec and a method-level route share an
 * operation key, the method's effective spec is the class-level operation
 * shallow-merged with the method spec (method fields win), and the operation
 * is dropped from the effective controller spec. Order is preserved.
 * Keys compare normalized paths, so "{id}" on a method matches "/{id}/".
 */
export function applyRouteOverrides(entries: readonly MetadataEntry[]): MetadataEntry[] {
  const controller = entries.find(isControllerEntry);
  if (controller === undefined) return [...entries];

  const classOps = new Map<string, OperationObject>();
  for (const [path, item] of Object.entries(controller.payload.paths)) {
    for (const verb of HTTP_VERBS) {
      const op = item[verb];
      if (op !== undefined) classOps.set(operationKey(verb, path), op);
    }
  }

  const shadowed = new Set<string>();
  const mergedBySequence = new Map<number, MetadataEntry>();

  for (const entry of entries) {
    if (!isOperationEntry(entry)) continue;
    if (entry.site.target !== controller.site.target) continue;
    const { verb, path, spec } = entry.payload;
    const key = operationKey(verb, path);
    const classOp = classOps.get(key);
    if (classOp === undefined) continue;

    shadowed.add(key);
    const payload: OperationRouteSpec = { scope: 'operation', verb, path, spec: { ...classOp, ...spec } };
    mergedBySequence.set(entry.sequence, Object.freeze({ ...entry, payload: cloneFrozen(payload) }));
  }

  if (shadowed.size === 0) return [...entries];

  return entries.map((entry) => {
    if (entry === controller) {
      return Object.freeze({
        ...controller,
        payload: cloneFrozen(withoutShadowed(controller.payload, shadowed)),
      });
    }
    return mergedBySequence.get(entry.sequence) ?? entry;
  });
}
