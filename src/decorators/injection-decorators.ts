/**
 * injection-decorators.ts
 * Dependency-injection hints: `inject(key)` and its getter, setter, tag and
 * context variants. The registry stores only the key or pattern and the
 * variant; resolution belongs to the container.
 */

import type { InjectionSpec } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import type { InjectionAnnotation } from './sites.js';
import { injectionSite } from './sites.js';

export interface InjectOptions {
  /** Leave the target undefined instead of failing when the key is unbound. */
  optional?: boolean;
}

export type InjectDecorator = ((bindingKey: string, options?: InjectOptions) => InjectionAnnotation) & {
  getter(bindingKey: string): InjectionAnnotation;
  setter(bindingKey: string): InjectionAnnotation;
  tag(tag: string | RegExp): InjectionAnnotation;
  context(): InjectionAnnotation;
};

export function createInjectDecorator(registry: MetadataRegistry): InjectDecorator {
  const annotation =
    (decoratorName: string, spec: InjectionSpec): InjectionAnnotation =>
    (target, member, indexOrDescriptor) => {
      registry.annotate(
        injectionSite(target, member, indexOrDescriptor, decoratorName),
        'injection-spec',
        spec,
      );
    };

  const inject = (bindingKey: string, options: InjectOptions = {}): InjectionAnnotation =>
    annotation('inject', { variant: 'key', bindingKey, optional: options.optional ?? false });

  return Object.assign(inject, {
    getter: (bindingKey: string) => annotation('inject.getter', { variant: 'getter', bindingKey }),
    setter: (bindingKey: string) => annotation('inject.setter', { variant: 'setter', bindingKey }),
    tag: (tag: string | RegExp) =>
      annotation('inject.tag', {
        variant: 'tag',
        tag: tag instanceof RegExp ? { source: tag.source, flags: tag.flags } : tag,
      }),
    context: () => annotation('inject.context', { variant: 'context' }),
  });
}
