/**
 * annotations.test.ts
 *
 * Tests for the decorator surface bound by createAnnotations():
 *   1. Parameter shortcuts store the canonical payload
 *   2. Routes, request bodies and design-type inference
 *   3. Models and properties
 *   4. Injection, repositories, authentication, relations
 *   5. Misplaced and unsupported decorators
 */

import { createAnnotations } from '../annotations.js';
import { MetadataRegistry } from '../../registry/metadata-registry.js';
import { AnnotationError, UnsupportedFeatureError } from '../../registry/errors.js';

class Todo {
  title = '';
}

interface TodoPatch {
  title?: string;
}

class TodoRepository {}

let registry: MetadataRegistry;
let annotations: ReturnType<typeof createAnnotations>;

beforeEach(() => {
  registry = new MetadataRegistry();
  annotations = createAnnotations(registry);
});

describe('createAnnotations', () => {
  describe('parameters', () => {
    it('stores byte-identical payloads for the shortcut and the full form', () => {
      const { param } = annotations;
      class ShortForm {
        find(@param.path.string('id') id: string): string {
          return id;
        }
      }
      class FullForm {
        find(@param({ name: 'id', in: 'path', required: true, schema: { type: 'string' } }) id: string): string {
          return id;
        }
      }

      const short = registry.resolve({ target: ShortForm, member: 'find', index: 0 }, 'parameter-spec');
      const full = registry.resolve({ target: FullForm, member: 'find', index: 0 }, 'parameter-spec');
      expect(JSON.stringify(short)).toBe(JSON.stringify(full));
      expect(JSON.stringify(short)).toBe('{"name":"id","in":"path","required":true,"schema":{"type":"string"}}');
    });

    it('adds the description and format of typed query shortcuts', () => {
      const { param } = annotations;
      class Listing {
        list(@param.query.integer('limit', 'Page size') limit: number): number {
          return limit;
        }
      }

      const payload = registry.resolve({ target: Listing, member: 'list', index: 0 }, 'parameter-spec');
      expect(JSON.stringify(payload)).toBe(
        '{"name":"limit","in":"query","description":"Page size","required":false,' +
          '"schema":{"type":"integer","format":"int32"}}',
      );
    });

    it('expands param.array to an array schema', () => {
      const { param } = annotations;
      class Search {
        find(@param.array('tags', 'query', { type: 'string' }) tags: string[]): string[] {
          return tags;
        }
      }

      expect(registry.resolve({ target: Search, member: 'find', index: 0 }, 'parameter-spec')).toEqual({
        name: 'tags',
        in: 'query',
        required: false,
        schema: { type: 'array', items: { type: 'string' } },
      });
    });

    it('rejects cookie parameters', () => {
      const { param } = annotations;
      expect(() => {
        class Session {
          check(@param.cookie.string('sid') sid: string): string {
            return sid;
          }
        }
        return Session;
      }).toThrow(UnsupportedFeatureError);
    });

    it('rejects param() on a constructor parameter', () => {
      const { param } = annotations;
      expect(() => {
        class Misplaced {
          constructor(@param.query.string('q') readonly q: string) {}
        }
        return Misplaced;
      }).toThrow(AnnotationError);
      expect(() => {
        class Misplaced {
          constructor(@param.query.string('q') readonly q: string) {}
        }
        return Misplaced;
      }).toThrow('Misplaced.constructor[0]: param() decorates method parameters only');
    });
  });

  describe('routes and request bodies', () => {
    it('records parameters, operations and the api spec in decorator application order', () => {
      const { api, get, post, param, requestBody } = annotations;

      @api({ basePath: '/todos' })
      class TodoController {
        @get('/{id}', { summary: 'Find a todo' })
        findById(@param.path.string('id') id: string): string {
          return id;
        }

        @post('/')
        create(@requestBody() body: Todo): Todo {
          return body;
        }
      }

      const aggregate = registry.resolveAggregate(TodoController);
      expect(aggregate.map((e) => [e.kind, e.site.member, e.site.index])).toEqual([
        ['parameter-spec', 'findById', 0],
        ['route-spec', 'findById', undefined],
        ['request-body-spec', 'create', 0],
        ['route-spec', 'create', undefined],
        ['route-spec', undefined, undefined],
      ]);
      expect(registry.resolve({ target: TodoController, member: 'findById' }, 'route-spec')).toEqual({
        scope: 'operation',
        verb: 'get',
        path: '/{id}',
        spec: { summary: 'Find a todo', 'x-operation-name': 'findById' },
      });
      expect(registry.resolve({ target: TodoController }, 'route-spec')).toEqual({
        scope: 'controller',
        basePath: '/todos',
        paths: {},
      });
    });

    it('requests inference from the declared parameter type', () => {
      const { patch, del, requestBody } = annotations;

      class TodoController {
        @patch('/{id}')
        update(@requestBody({ description: 'Changes' }) changes: TodoPatch): TodoPatch {
          return changes;
        }

        @del('/', { 'x-operation-name': 'purge' })
        clear(@requestBody({ required: true }) reason: string): string {
          return reason;
        }
      }

      expect(registry.resolve({ target: TodoController, member: 'update', index: 0 }, 'request-body-spec')).toEqual({
        index: 0,
        content: { inference: 'requested', declaredType: 'object' },
        description: 'Changes',
      });
      expect(registry.resolve({ target: TodoController, member: 'clear', index: 0 }, 'request-body-spec')).toEqual({
        index: 0,
        content: { inference: 'requested', declaredType: 'string' },
        required: true,
      });
      expect(registry.resolve({ target: TodoController, member: 'clear' }, 'route-spec')).toEqual({
        scope: 'operation',
        verb: 'delete',
        path: '/',
        spec: { 'x-operation-name': 'purge' },
      });
    });

    it('keeps the declared class name for class-typed bodies', () => {
      const { post, requestBody } = annotations;
      class TodoController {
        @post('/')
        create(@requestBody() body: Todo): Todo {
          return body;
        }
      }
      const payload = registry.resolve({ target: TodoController, member: 'create', index: 0 }, 'request-body-spec');
      expect(payload?.content).toEqual({ inference: 'requested', declaredType: 'Todo' });
    });

    it('rejects two request bodies on one method', () => {
      const { post, requestBody } = annotations;
      expect(() => {
        class TodoController {
          @post('/')
          create(@requestBody() a: Todo, @requestBody() b: Todo): Todo[] {
            return [a, b];
          }
        }
        return TodoController;
      }).toThrow('TodoController.prototype.create[0]: duplicate request-body-spec');
    });

    it('marks static operations', () => {
      const { get } = annotations;
      class Health {
        @get('/health')
        static check(): string {
          return 'ok';
        }
      }
      const [entry] = registry.resolveAggregate(Health);
      expect(entry?.site).toEqual({ target: Health, member: 'check', isStatic: true });
    });
  });

  describe('models', () => {
    it('records property types, then the model', () => {
      const { model, property } = annotations;

      @model({ settings: { strict: true } })
      class Note {
        @property({ id: true }) id!: number;
        @property() title!: string;
        @property({ type: 'string', required: true }) body!: string;
      }

      const aggregate = registry.resolveAggregate(Note);
      expect(aggregate.map((e) => e.payload)).toEqual([
        { type: { inference: 'requested', declaredType: 'number' }, id: true },
        { type: { inference: 'requested', declaredType: 'string' } },
        { type: 'string', required: true },
        { name: 'Note', settings: { strict: true } },
      ]);
    });

    it('rejects relations unless the registry allows them', () => {
      const { belongsTo } = annotations;
      expect(() => {
        class Note {
          @belongsTo('User') ownerId!: string;
        }
        return Note;
      }).toThrow('Note.prototype.ownerId: relation "belongsTo" is not supported');

      const permissive = new MetadataRegistry({ allowRelations: true });
      const { hasMany } = createAnnotations(permissive);
      class Folder {
        @hasMany(Todo, { keyTo: 'folderId' }) todos!: Todo[];
      }
      expect(permissive.resolve({ target: Folder, member: 'todos' }, 'relation-spec')).toEqual({
        relationType: 'hasMany',
        target: 'Todo',
        keyTo: 'folderId',
      });
    });
  });

  describe('injection and authentication', () => {
    it('records constructor, property and method injections', () => {
      const { inject, repository } = annotations;

      class TodoService {
        @inject.tag(/^plugins\./i) plugins!: unknown[];
        @inject.context() static ctx: unknown;

        constructor(
          @inject('datasources.db', { optional: true }) readonly db: unknown,
          @repository(TodoRepository) readonly repo: TodoRepository,
          @repository(Todo, 'db') readonly todos: unknown,
        ) {}

        refresh(@inject.setter('cache.stamp') setStamp: (value: number) => void): void {
          setStamp(1);
        }
      }

      expect(registry.resolveAggregate(TodoService).map((e) => e.payload)).toEqual([
        { variant: 'tag', tag: { source: '^plugins\\.', flags: 'i' } },
        { variant: 'setter', bindingKey: 'cache.stamp' },
        { variant: 'context' },
        { form: 'model', modelName: 'Todo', dataSourceName: 'db', bindingKey: 'datasources.db' },
        { form: 'repository', repositoryName: 'TodoRepository', bindingKey: 'repositories.TodoRepository' },
        { variant: 'key', bindingKey: 'datasources.db', optional: true },
      ]);
    });

    it('records the authentication strategy of a method', () => {
      const { authenticate, get } = annotations;
      class Admin {
        @authenticate('jwt', { scopes: ['admin'] })
        @get('/stats')
        stats(): number {
          return 0;
        }
      }
      expect(registry.resolve({ target: Admin, member: 'stats' }, 'authentication-spec')).toEqual({
        strategy: 'jwt',
        options: { scopes: ['admin'] },
      });
    });
  });
});
