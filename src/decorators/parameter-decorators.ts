/**
 * parameter-decorators.ts
 * `param()` and its shortcuts.
 *
 * Shortcuts (`param.path.string('id')`, `param.array(...)`) expand to the same
 * canonical payload as the full form: keys in the order
 * name, in, description, required, schema; path parameters always required,
 * other locations default to not required.
 */

import type {
  ParameterLocation,
  SchemaObject,
  SchemaOrReference,
} from '../models/openapi.js';
import type { ParameterSpec } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import type { ParameterAnnotation } from './sites.js';
import { methodParameterSite } from './sites.js';

export interface ParameterInput {
  name: string;
  in: ParameterLocation;
  description?: string;
  required?: boolean;
  schema?: SchemaOrReference;
}

export const SHORTCUT_SCHEMAS = {
  string: { type: 'string' },
  number: { type: 'number' },
  integer: { type: 'integer', format: 'int32' },
  long: { type: 'integer', format: 'int64' },
  float: { type: 'number', format: 'float' },
  double: { type: 'number', format: 'double' },
  byte: { type: 'string', format: 'byte' },
  binary: { type: 'string', format: 'binary' },
  boolean: { type: 'boolean' },
  date: { type: 'string', format: 'date' },
  dateTime: { type: 'string', format: 'date-time' },
  password: { type: 'string', format: 'password' },
} as const satisfies Record<string, SchemaObject>;

export type ShortcutType = keyof typeof SHORTCUT_SCHEMAS;

export type ParameterShortcut = (name: string, description?: string) => ParameterAnnotation;

export type LocationShortcuts = Record<ShortcutType, ParameterShortcut>;

export type ParamDecorator = ((input: ParameterInput) => ParameterAnnotation) & {
  query: LocationShortcuts;
  header: LocationShortcuts;
  path: LocationShortcuts;
  /** Present for symmetry; the registry rejects the cookie location. */
  cookie: LocationShortcuts;
  array(
    name: string,
    location: ParameterLocation,
    items: SchemaOrReference,
    description?: string,
  ): ParameterAnnotation;
};

/** Canonical parameter payload shared by the full form and every shortcut. */
export function canonicalParameter(input: ParameterInput): ParameterSpec {
  const required = input.in === 'path' ? true : input.required ?? false;
  const schema: SchemaOrReference = { ...(input.schema ?? {}) };
  if (input.description !== undefined) {
    return { name: input.name, in: input.in, description: input.description, required, schema };
  }
  return { name: input.name, in: input.in, required, schema };
}

export function createParamDecorator(registry: MetadataRegistry): ParamDecorator {
  const param = (input: ParameterInput): ParameterAnnotation => {
    const spec = canonicalParameter(input);
    return (target, member, index) => {
      registry.annotate(methodParameterSite(target, member, index, 'param'), 'parameter-spec', spec);
    };
  };

  const withDescription = (input: ParameterInput, description: string | undefined): ParameterInput =>
    description !== undefined ? { ...input, description } : input;

  const shortcutsFor = (location: ParameterLocation): LocationShortcuts => {
    const make =
      (type: ShortcutType): ParameterShortcut =>
      (name, description) =>
        param(withDescription({ name, in: location, schema: SHORTCUT_SCHEMAS[type] }, description));
    return {
      string: make('string'),
      number: make('number'),
      integer: make('integer'),
      long: make('long'),
      float: make('float'),
      double: make('double'),
      byte: make('byte'),
      binary: make('binary'),
      boolean: make('boolean'),
      date: make('date'),
      dateTime: make('dateTime'),
      password: make('password'),
    };
  };

  const array = (
    name: string,
    location: ParameterLocation,
    items: SchemaOrReference,
    description?: string,
  ): ParameterAnnotation =>
    param(withDescription({ name, in: location, schema: { type: 'array', items } }, description));

  return Object.assign(param, {
    query: shortcutsFor('query'),
    header: shortcutsFor('header'),
    path: shortcutsFor('path'),
    cookie: shortcutsFor('cookie'),
    array,
  });
}
