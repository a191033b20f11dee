/**
 * type-inference.ts
 * Reads design-time type names emitted under `emitDecoratorMetadata`.
 * The names feed InferenceRequested sentinels; nothing is inferred here.
 */

import 'reflect-metadata';

const BUILTIN_TYPE_NAMES: Record<string, string> = {
  String: 'string',
  Number: 'number',
  Boolean: 'boolean',
  Date: 'date',
  Array: 'array',
  Object: 'object',
  Buffer: 'buffer',
};

/** Constructor → type name; built-ins map to lower-case names. */
export function typeName(value: unknown): string | null {
  if (typeof value !== 'function' || value.name === '') return null;
  return BUILTIN_TYPE_NAMES[value.name] ?? value.name;
}

export function declaredParameterType(
  target: object,
  member: string | symbol | undefined,
  index: number,
): string | null {
  const types: unknown =
    member === undefined
      ? Reflect.getMetadata('design:paramtypes', target)
      : Reflect.getMetadata('design:paramtypes', target, member);
  if (!Array.isArray(types)) return null;
  return typeName(types[index]);
}

export function declaredPropertyType(target: object, member: string | symbol): string | null {
  return typeName(Reflect.getMetadata('design:type', target, member));
}
