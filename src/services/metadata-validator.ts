/**
 * metadata-validator.ts
 * Cross-entry checks over the aggregated metadata of a set of classes.
 * Throws a descriptive error on the first violation found.
 *
 * Validation rules enforced:
 *   1. Every `{name}` variable in an operation path has a path
 *      parameter-spec of that name on the same method.
 *   2. Every path parameter-spec names a variable of its method's path.
 *   3. A class with property-spec entries carries a model-spec.
 */

import { joinPath } from '../builders/openapi-spec-builder.js';
import type { ClassTarget } from '../models/declaration-site.js';
import { describeSite, memberName, sameMember } from '../models/declaration-site.js';
import type { MetadataEntry } from '../models/metadata-entry.js';
import { isEntryOfKind } from '../models/metadata-entry.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';

const TEMPLATE_VARIABLE = /\{([^{}/]+)\}/g;

/** Variable names of a path template, in order of appearance. */
export function templateVariables(path: string): string[] {
  return [...path.matchAll(TEMPLATE_VARIABLE)].map((match) => match[1] ?? '');
}

export class MetadataValidator {
  /**
   * Validate the aggregates of `classes`.
   * Throws `ValidationError` on the first violation.
   */
  static validate(registry: MetadataRegistry, classes: readonly ClassTarget[]): void {
    for (const target of classes) {
      const entries = registry.resolveAggregate(target);
      MetadataValidator._validatePathParameters(entries);
      MetadataValidator._validateModelProperties(target, entries);
    }
  }

  // ---------------------------------------------------------------------------
  // Rules 1 and 2: path template variables ↔ path parameters
  // ---------------------------------------------------------------------------

  private static _validatePathParameters(entries: readonly MetadataEntry[]): void {
    let basePath = '';
    for (const entry of entries) {
      if (isEntryOfKind(entry, 'route-spec') && entry.payload.scope === 'controller') {
        basePath = entry.payload.basePath ?? '';
      }
    }

    const routed: MetadataEntry[] = [];
    for (const route of entries) {
      if (!isEntryOfKind(route, 'route-spec') || route.payload.scope !== 'operation') continue;
      routed.push(route);

      const fullPath = joinPath(basePath, route.payload.path);
      const variables = new Set(templateVariables(fullPath));
      const declared = new Set<string>();
      for (const entry of entries) {
        if (
          isEntryOfKind(entry, 'parameter-spec') &&
          entry.payload.in === 'path' &&
          sameMember(entry.site, route.site)
        ) {
          declared.add(entry.payload.name);
          if (!variables.has(entry.payload.name)) {
            throw new ValidationError(
              `Rule 2 violation: path parameter "${entry.payload.name}" at ` +
              `${describeSite(entry.site)} does not appear in "${fullPath}".`,
            );
          }
        }
      }

      for (const variable of variables) {
        if (!declared.has(variable)) {
          throw new ValidationError(
            `Rule 1 violation: "${fullPath}" of ${describeSite(route.site)} has no ` +
            `path parameter named "${variable}".`,
          );
        }
      }
    }

    for (const entry of entries) {
      if (!isEntryOfKind(entry, 'parameter-spec') || entry.payload.in !== 'path') continue;
      if (routed.some((route) => sameMember(route.site, entry.site))) continue;
      const method = entry.site.member !== undefined ? memberName(entry.site.member) : '<constructor>';
      throw new ValidationError(
        `Rule 2 violation: path parameter "${entry.payload.name}" at ` +
        `${describeSite(entry.site)} belongs to "${method}", which declares no route.`,
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 3: property-spec requires model-spec
  // ---------------------------------------------------------------------------

  private static _validateModelProperties(
    target: ClassTarget,
    entries: readonly MetadataEntry[],
  ): void {
    const property = entries.find((entry) => entry.kind === 'property-spec');
    if (property === undefined) return;
    if (entries.some((entry) => entry.kind === 'model-spec')) return;
    throw new ValidationError(
      `Rule 3 violation: ${target.name} declares property ${describeSite(property.site)} ` +
      'but carries no model-spec.',
    );
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
