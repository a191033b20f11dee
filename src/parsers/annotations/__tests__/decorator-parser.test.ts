/**
 * decorator-parser.test.ts
 *
 * Tests for DecoratorParser: root matching, aliases, argument capture and
 * parameter locations, on an in-memory ts-morph project.
 */

import { DecoratorParser } from '../decorator-parser.js';
import { TsProjectFactory } from '../../ts/ts-project-factory.js';

const SOURCE = [
  "@rest.api({ basePath: '/items' })",
  '@Injectable()',
  'export class ItemController {',
  "  list(@param.query.integer('limit') limit: number, @param.array('ids', 'header', { type: 'string' }) ids: string[]) {",
  '    return [limit, ids];',
  '  }',
  "  find(@param({ name: 'id', in: 'path', required: true }) id: string) {",
  '    return id;',
  '  }',
  '  @Get',
  '  plain() {}',
  '}',
].join('\n');

function loadDecorators() {
  const project = TsProjectFactory.createInMemory({ '/src/item.controller.ts': SOURCE });
  const classDecl = project.getSourceFileOrThrow('/src/item.controller.ts').getClassOrThrow('ItemController');
  return {
    decorators: classDecl.getDecorators(),
    list: classDecl.getMethodOrThrow('list').getParameters().map((p) => p.getDecorators()),
    find: classDecl.getMethodOrThrow('find').getParameters().map((p) => p.getDecorators()),
    plain: classDecl.getMethodOrThrow('plain').getDecorators(),
  };
}

describe('DecoratorParser', () => {
  describe('match', () => {
    const parser = new DecoratorParser();

    it('maps root identifiers to metadata kinds', () => {
      expect(parser.match('get')).toEqual({ kind: 'route-spec', name: 'get', root: 'get' });
      expect(parser.match('param.path.string')).toEqual({
        kind: 'parameter-spec',
        name: 'param.path.string',
        root: 'param',
      });
      expect(parser.match('inject.getter')).toEqual({
        kind: 'injection-spec',
        name: 'inject.getter',
        root: 'inject',
      });
      expect(parser.match('hasMany')?.kind).toBe('relation-spec');
    });

    it('skips leading namespace segments', () => {
      expect(parser.match('rest.get')).toEqual({ kind: 'route-spec', name: 'get', root: 'get' });
    });

    it('returns null for unknown decorators', () => {
      expect(parser.match('Component')).toBeNull();
      expect(parser.match('Injectable')).toBeNull();
    });

    it('accepts configured aliases', () => {
      const aliased = new DecoratorParser({ Get: 'route-spec', Body: 'request-body-spec' });
      expect(aliased.match('Get')).toEqual({ kind: 'route-spec', name: 'Get', root: 'Get' });
      expect(aliased.match('Body')?.kind).toBe('request-body-spec');
    });
  });

  describe('parse', () => {
    const parser = new DecoratorParser();
    const { decorators: classDecorators, list, find, plain } = loadDecorators();

    it('parses class decorators with their arguments and origin', () => {
      const [api, injectable] = classDecorators;
      if (api === undefined || injectable === undefined) throw new Error('decorators missing');

      expect(parser.parse(api, 'ItemController', '/')).toEqual({
        kind: 'route-spec',
        name: 'api',
        root: 'api',
        args: ["{ basePath: '/items' }"],
        location: null,
        origin: { file: 'src/item.controller.ts', startLine: 1, startCol: 1, endLine: 1, symbol: 'ItemController' },
      });
      expect(parser.parse(injectable, 'ItemController')).toBeNull();
    });

    it('reads parameter locations from names, array arguments and object literals', () => {
      const limit = list[0]?.[0];
      const ids = list[1]?.[0];
      const id = find[0]?.[0];
      if (limit === undefined || ids === undefined || id === undefined) throw new Error('decorators missing');

      expect(parser.parse(limit, 'ItemController.list[0]')?.location).toBe('query');
      expect(parser.parse(ids, 'ItemController.list[1]')?.location).toBe('header');
      expect(parser.parse(ids, 'ItemController.list[1]')?.args).toEqual(["'ids'", "'header'", "{ type: 'string' }"]);
      expect(parser.parse(id, 'ItemController.find[0]')?.location).toBe('path');
    });

    it('ignores decorators used without a call', () => {
      const aliased = new DecoratorParser({ Get: 'route-spec' });
      const [get] = plain;
      if (get === undefined) throw new Error('decorator missing');
      expect(aliased.parse(get, 'ItemController.plain')).toBeNull();
    });
  });
});
