/**
 * model-decorators.ts
 * `model()` on a class and `property()` on its fields.
 *
 * An omitted property type is stored as InferenceRequested with the field's
 * design-time type name.
 */

import type { PropertySpec } from '../models/payloads.js';
import { inferenceRequested } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import type { ClassAnnotation, PropertyAnnotation } from './sites.js';
import { memberSite } from './sites.js';
import { declaredPropertyType } from './type-inference.js';

export interface ModelInput {
  /** Defaults to the class name. */
  name?: string;
  settings?: Record<string, unknown>;
}

export interface PropertyInput {
  type?: string;
  required?: boolean;
  id?: boolean;
  description?: string;
  default?: unknown;
}

export interface ModelDecorators {
  model(input?: ModelInput): ClassAnnotation;
  property(input?: PropertyInput): PropertyAnnotation;
}

export function createModelDecorators(registry: MetadataRegistry): ModelDecorators {
  return {
    model: (input = {}) => (target) => {
      registry.annotate({ target }, 'model-spec', {
        name: input.name ?? target.name,
        settings: input.settings ?? {},
      });
    },

    property: (input = {}) => (target, member) => {
      const { type, ...rest } = input;
      const spec: PropertySpec = {
        type: type ?? inferenceRequested(declaredPropertyType(target, member)),
        ...rest,
      };
      registry.annotate(memberSite(target, member), 'property-spec', spec);
    },
  };
}
