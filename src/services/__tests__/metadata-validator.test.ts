/**
 * metadata-validator.test.ts
 *
 * Tests for MetadataValidator rules:
 *   1. Every path template variable has a path parameter
 *   2. Every path parameter appears in its method's path
 *   3. property-spec requires model-spec
 */

import { MetadataValidator, ValidationError, templateVariables } from '../metadata-validator.js';
import { createAnnotations } from '../../decorators/annotations.js';
import { MetadataRegistry } from '../../registry/metadata-registry.js';

let registry: MetadataRegistry;
let annotations: ReturnType<typeof createAnnotations>;

beforeEach(() => {
  registry = new MetadataRegistry();
  annotations = createAnnotations(registry);
});

describe('templateVariables', () => {
  it('lists variables in order of appearance', () => {
    expect(templateVariables('/orgs/{org}/members/{id}')).toEqual(['org', 'id']);
    expect(templateVariables('/plain')).toEqual([]);
  });
});

describe('MetadataValidator', () => {
  it('accepts matching templates and parameters, including the base path', () => {
    const { api, get, param, model, property } = annotations;

    @model()
    class Member {
      @property() name!: string;
    }

    @api({ basePath: '/orgs/{org}' })
    class MemberController {
      @get('/members/{id}')
      find(@param.path.string('org') org: string, @param.path.string('id') id: string): Member {
        const member = new Member();
        member.name = `${org}/${id}`;
        return member;
      }
    }

    expect(() => MetadataValidator.validate(registry, [Member, MemberController])).not.toThrow();
  });

  it('rule 1: rejects a template variable without a path parameter', () => {
    const { get } = annotations;
    class Broken {
      @get('/{id}')
      find(): string {
        return '';
      }
    }

    expect(() => MetadataValidator.validate(registry, [Broken])).toThrow(
      new ValidationError('Rule 1 violation: "/{id}" of Broken.prototype.find has no path parameter named "id".'),
    );
  });

  it('rule 2: rejects a path parameter missing from the template', () => {
    const { get, param } = annotations;
    class Broken {
      @get('/')
      find(@param.path.string('id') id: string): string {
        return id;
      }
    }

    expect(() => MetadataValidator.validate(registry, [Broken])).toThrow(
      'Rule 2 violation: path parameter "id" at Broken.prototype.find[0] does not appear in "/".',
    );
  });

  it('rule 2: rejects a path parameter on a method without a route', () => {
    const { param } = annotations;
    class Broken {
      find(@param.path.string('id') id: string): string {
        return id;
      }
    }

    expect(() => MetadataValidator.validate(registry, [Broken])).toThrow(
      'Rule 2 violation: path parameter "id" at Broken.prototype.find[0] belongs to "find", ' +
        'which declares no route.',
    );
  });

  it('rule 3: rejects properties on a class without model-spec', () => {
    const { property } = annotations;
    class Loose {
      @property() name!: string;
    }

    let caught: unknown;
    try {
      MetadataValidator.validate(registry, [Loose]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      name: 'ValidationError',
      message: 'Rule 3 violation: Loose declares property Loose.prototype.name but carries no model-spec.',
    });
  });
});
