/**
 * model-definition-builder.test.ts
 *
 * Tests for ModelDefinitionBuilder: inferred property types, settings,
 * JSON schema output and classes without a model-spec.
 */

import { ModelDefinitionBuilder, UNKNOWN_PROPERTY_TYPE } from '../model-definition-builder.js';
import { createAnnotations } from '../../decorators/annotations.js';
import { MetadataRegistry } from '../../registry/metadata-registry.js';
import { FileLogger } from '../../services/logger.js';

const registry = new MetadataRegistry();
const { model, property } = createAnnotations(registry);

@model({ name: 'Address' })
class PostalAddress {
  @property({ required: true }) street!: string;
}

@model({ settings: { strict: false } })
class Customer {
  @property({ id: true, type: 'integer' }) id!: number;
  @property({ default: 'anonymous' }) name!: string;
  @property() address!: PostalAddress;
  @property() createdAt!: Date;
  @property() extra!: unknown;
}

class Plain {
  label = '';
}

describe('ModelDefinitionBuilder', () => {
  it('resolves inferred types from design-time type names', () => {
    const definition = new ModelDefinitionBuilder(registry).build(Customer);

    expect(definition).toEqual({
      name: 'Customer',
      settings: { strict: false },
      properties: {
        id: { type: 'integer', required: false, id: true },
        name: { type: 'string', required: false, id: false, default: 'anonymous' },
        address: { type: 'PostalAddress', required: false, id: false },
        createdAt: { type: 'date', required: false, id: false },
        extra: { type: 'object', required: false, id: false },
      },
    });
  });

  it('uses the model name from the model-spec', () => {
    const definition = new ModelDefinitionBuilder(registry).build(PostalAddress);
    expect(definition?.name).toBe('Address');
    expect(definition?.properties).toEqual({ street: { type: 'string', required: true, id: false } });
  });

  it('converts a definition to a JSON schema', () => {
    const builder = new ModelDefinitionBuilder(registry);
    const definition = builder.build(Customer);
    if (definition === null) throw new Error('expected a definition');

    expect(builder.toJsonSchema(definition)).toEqual({
      title: 'Customer',
      type: 'object',
      properties: {
        id: { type: 'integer' },
        name: { type: 'string', default: 'anonymous' },
        address: { $ref: '#/components/schemas/PostalAddress' },
        createdAt: { type: 'string', format: 'date-time' },
        extra: {},
      },
    });
  });

  it('returns null and warns for a class without model-spec', () => {
    const logger = new FileLogger('warn');
    expect(new ModelDefinitionBuilder(registry, logger).build(Plain)).toBeNull();
    expect(logger.lines[0]?.slice(13)).toBe(
      '[annotations] [WARN ] Skipping class without model-spec  {"class":"Plain"}',
    );
  });

  it('falls back to the unknown type when no design type was emitted', () => {
    const local = new MetadataRegistry();
    class Loose {}
    local.annotate({ target: Loose }, 'model-spec', { name: 'Loose', settings: {} });
    local.annotate({ target: Loose, member: 'value' }, 'property-spec', {
      type: { inference: 'requested', declaredType: null },
    });

    const definition = new ModelDefinitionBuilder(local).build(Loose);
    expect(definition?.properties['value']?.type).toBe(UNKNOWN_PROPERTY_TYPE);
  });
});
