/**
 * decorator-parser.ts
 * Recognises annotation decorators in source text and maps them to the
 * metadata kind they would record at run time.
 *
 * Matching is by root identifier: the first segment of the decorator's
 * dotted name that is a known root (or a configured alias). Leading
 * namespace segments are skipped, so `@rest.get('/x')` and `@get('/x')` both
 * resolve to route-spec with name "get".
 */

import type { Decorator } from 'ts-morph';
import type { MetadataKind } from '../../models/metadata-entry.js';
import type { ParameterLocation } from '../../models/openapi.js';
import type { Origin } from '../../models/origin.js';
import { TsAstUtils } from '../ts/ts-ast-utils.js';

export const DECORATOR_ROOTS: Readonly<Record<string, MetadataKind>> = {
  api: 'route-spec',
  operation: 'route-spec',
  get: 'route-spec',
  post: 'route-spec',
  put: 'route-spec',
  patch: 'route-spec',
  del: 'route-spec',
  param: 'parameter-spec',
  requestBody: 'request-body-spec',
  inject: 'injection-spec',
  authenticate: 'authentication-spec',
  model: 'model-spec',
  property: 'property-spec',
  repository: 'repository-spec',
  relation: 'relation-spec',
  belongsTo: 'relation-spec',
  hasOne: 'relation-spec',
  hasMany: 'relation-spec',
  embedsOne: 'relation-spec',
  embedsMany: 'relation-spec',
  referencesOne: 'relation-spec',
  referencesMany: 'relation-spec',
};

export interface ParsedDecorator {
  kind: MetadataKind;
  /** Matched dotted name starting at the root, e.g. "param.path.string". */
  name: string;
  root: string;
  args: string[];
  /** Parameter location for parameter-spec decorators, when statically known. */
  location: ParameterLocation | null;
  origin: Origin;
}

const LOCATIONS: readonly ParameterLocation[] = ['query', 'header', 'path', 'cookie'];

function asLocation(value: string | null | undefined): ParameterLocation | null {
  return LOCATIONS.find((location) => location === value) ?? null;
}

export class DecoratorParser {
  private readonly _roots: ReadonlyMap<string, MetadataKind>;
  private readonly _maxArgLength: number;

  constructor(aliases: Readonly<Record<string, MetadataKind>> = {}, maxArgLength = 200) {
    this._roots = new Map(Object.entries({ ...DECORATOR_ROOTS, ...aliases }));
    this._maxArgLength = maxArgLength;
  }

  /** Kind for a dotted decorator name, or null when it is not an annotation. */
  match(fullName: string): { kind: MetadataKind; name: string; root: string } | null {
    const segments = fullName.split('.');
    for (let i = 0; i < segments.length; i++) {
      const root = segments[i] ?? '';
      const kind = this._roots.get(root);
      if (kind !== undefined) return { kind, name: segments.slice(i).join('.'), root };
    }
    return null;
  }

  /**
   * Parse one decorator. Returns null for decorators that are not
   * annotations (framework decorators, bare references without a call).
   */
  parse(decorator: Decorator, symbol: string, projectRoot?: string): ParsedDecorator | null {
    if (!decorator.isDecoratorFactory()) return null;
    const matched = this.match(TsAstUtils.getDecoratorFullName(decorator));
    if (matched === null) return null;

    return {
      ...matched,
      args: TsAstUtils.getDecoratorArgs(decorator, this._maxArgLength),
      location: matched.kind === 'parameter-spec' ? this._location(decorator, matched.name) : null,
      origin: TsAstUtils.getOrigin(decorator, symbol, projectRoot),
    };
  }

  /**
   * param.<location>.<type>(...) → location from the name;
   * param.array(name, location, ...) → second argument;
   * param({ in: ... }) → the `in` property.
   */
  private _location(decorator: Decorator, name: string): ParameterLocation | null {
    const segments = name.split('.');
    const fromName = asLocation(segments[1]);
    if (fromName !== null) return fromName;

    const args = decorator.getArguments();
    if (segments[1] === 'array') {
      const second = args[1];
      return second !== undefined ? asLocation(TsAstUtils.getStringLiteralValue(second)) : null;
    }
    const first = args[0];
    return first !== undefined ? asLocation(TsAstUtils.getObjectStringProperty(first, 'in')) : null;
  }
}
