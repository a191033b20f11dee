/**
 * sites.ts
 * Decorator arguments → DeclarationSite, plus the decorator signatures
 * accepted under `experimentalDecorators`.
 */

import type { ClassTarget, DeclarationSite } from '../models/declaration-site.js';
import { AnnotationError } from '../registry/errors.js';

export type ClassAnnotation = (target: ClassTarget) => void;

export type MethodAnnotation = (
  target: object,
  member: string | symbol,
  descriptor: PropertyDescriptor,
) => void;

export type PropertyAnnotation = (target: object, member: string | symbol) => void;

export type ParameterAnnotation = (
  target: object,
  member: string | symbol | undefined,
  index: number,
) => void;

/**
 * Usable on constructor parameters, method parameters and properties. For a
 * property the third argument is undefined (or a descriptor for accessors).
 */
export type InjectionAnnotation = (
  target: object,
  member: string | symbol | undefined,
  indexOrDescriptor?: number | PropertyDescriptor,
) => void;

/** Instance members receive the prototype; static members the constructor. */
export function memberSite(target: object, member: string | symbol): DeclarationSite {
  if (target instanceof Function) return { target, member, isStatic: true };
  return { target: target.constructor, member };
}

export function parameterSite(
  target: object,
  member: string | symbol | undefined,
  index: number,
): DeclarationSite {
  if (member !== undefined) return { ...memberSite(target, member), index };
  if (target instanceof Function) return { target, index };
  return { target: target.constructor, index };
}

/** Site for decorators that accept both parameters and properties. */
export function injectionSite(
  target: object,
  member: string | symbol | undefined,
  indexOrDescriptor: number | PropertyDescriptor | undefined,
  decoratorName: string,
): DeclarationSite {
  if (typeof indexOrDescriptor === 'number') return parameterSite(target, member, indexOrDescriptor);
  if (member === undefined) {
    const classTarget = target instanceof Function ? target : target.constructor;
    throw new AnnotationError(
      `${decoratorName}() decorates constructor parameters, method parameters and properties`,
      { target: classTarget },
    );
  }
  return memberSite(target, member);
}

/** Method-parameter site; rejects constructor parameters. */
export function methodParameterSite(
  target: object,
  member: string | symbol | undefined,
  index: number,
  decoratorName: string,
): DeclarationSite {
  const site = parameterSite(target, member, index);
  if (member === undefined) {
    throw new AnnotationError(`${decoratorName}() decorates method parameters only`, site);
  }
  return site;
}
