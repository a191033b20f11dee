/**
 * injection-plan-builder.ts
 * Flattens injection-spec and repository-spec entries of a class into an
 * injection plan: what a container would have to supply for each constructor
 * argument, property and method argument. Nothing is resolved here.
 */

import type { ClassTarget } from '../models/declaration-site.js';
import { memberName } from '../models/declaration-site.js';
import type { MetadataEntry } from '../models/metadata-entry.js';
import { isEntryOfKind } from '../models/metadata-entry.js';
import type { InjectionSpec, RepositorySpec } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export type InjectionBinding =
  | { source: 'inject'; spec: InjectionSpec }
  | { source: 'repository'; spec: RepositorySpec };

export interface ConstructorArgumentPlan {
  index: number;
  binding: InjectionBinding;
}

export interface PropertyPlan {
  name: string;
  isStatic: boolean;
  binding: InjectionBinding;
}

export interface MethodArgumentPlan {
  method: string;
  index: number;
  binding: InjectionBinding;
}

export interface InjectionPlan {
  className: string;
  /** Sorted by index. */
  constructorArgs: ConstructorArgumentPlan[];
  /** Sorted by name. */
  properties: PropertyPlan[];
  /** Sorted by method name, then index. */
  methodArgs: MethodArgumentPlan[];
  /** Constructor parameter indices below `Class.length` with no binding. */
  unboundConstructorArgs: number[];
}

function bindingOf(entry: MetadataEntry): InjectionBinding | null {
  if (isEntryOfKind(entry, 'injection-spec')) return { source: 'inject', spec: entry.payload };
  if (isEntryOfKind(entry, 'repository-spec')) return { source: 'repository', spec: entry.payload };
  return null;
}

export class InjectionPlanBuilder {
  private readonly _registry: MetadataRegistry;
  private readonly _log: Logger;

  constructor(registry: MetadataRegistry, logger?: Logger) {
    this._registry = registry;
    this._log = logger ?? new SilentLogger();
  }

  build(target: ClassTarget): InjectionPlan {
    const constructorArgs: ConstructorArgumentPlan[] = [];
    const properties: PropertyPlan[] = [];
    const methodArgs: MethodArgumentPlan[] = [];

    for (const entry of this._registry.resolveAggregate(target)) {
      const binding = bindingOf(entry);
      if (binding === null) continue;

      const { site } = entry;
      if (site.member === undefined) {
        if (site.index === undefined) {
          this._log.warn('Injection metadata on a class site ignored', { className: target.name });
        } else {
          constructorArgs.push({ index: site.index, binding });
        }
      } else if (site.index === undefined) {
        properties.push({ name: memberName(site.member), isStatic: site.isStatic ?? false, binding });
      } else {
        methodArgs.push({ method: memberName(site.member), index: site.index, binding });
      }
    }

    constructorArgs.sort((a, b) => a.index - b.index);
    properties.sort((a, b) => a.name.localeCompare(b.name));
    methodArgs.sort((a, b) => a.method.localeCompare(b.method) || a.index - b.index);

    const bound = new Set(constructorArgs.map((arg) => arg.index));
    const unboundConstructorArgs: number[] = [];
    for (let index = 0; index < target.length; index++) {
      if (!bound.has(index)) unboundConstructorArgs.push(index);
    }
    if (unboundConstructorArgs.length > 0) {
      this._log.warn('Constructor parameters without injection metadata', {
        className: target.name,
        indices: unboundConstructorArgs,
      });
    }

    return {
      className: target.name,
      constructorArgs,
      properties,
      methodArgs,
      unboundConstructorArgs,
    };
  }
}
