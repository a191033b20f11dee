/**
 * request-body-decorator.ts
 * `requestBody()` on a method parameter. One per method; the registry
 * rejects a second one with DuplicateEntryError.
 */

import type { ContentObject } from '../models/openapi.js';
import type { RequestBodySpec } from '../models/payloads.js';
import { inferenceRequested } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import type { ParameterAnnotation } from './sites.js';
import { methodParameterSite } from './sites.js';
import { declaredParameterType } from './type-inference.js';

export interface RequestBodyInput {
  description?: string;
  required?: boolean;
  /** Omit to request schema inference from the parameter's declared type. */
  content?: ContentObject;
}

export type RequestBodyDecorator = (input?: RequestBodyInput) => ParameterAnnotation;

export function createRequestBodyDecorator(registry: MetadataRegistry): RequestBodyDecorator {
  return (input = {}) =>
    (target, member, index) => {
      const site = methodParameterSite(target, member, index, 'requestBody');
      const content = input.content ?? inferenceRequested(declaredParameterType(target, member, index));

      let spec: RequestBodySpec = { index, content };
      if (input.description !== undefined) spec = { ...spec, description: input.description };
      if (input.required !== undefined) spec = { ...spec, required: input.required };

      registry.annotate(site, 'request-body-spec', spec);
    };
}
