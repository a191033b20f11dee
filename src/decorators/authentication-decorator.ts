/**
 * authentication-decorator.ts
 * `authenticate(strategy, options)` on a controller method.
 */

import type { MetadataRegistry } from '../registry/metadata-registry.js';
import type { MethodAnnotation } from './sites.js';
import { memberSite } from './sites.js';

export type AuthenticateDecorator = (
  strategy: string,
  options?: Record<string, unknown>,
) => MethodAnnotation;

export function createAuthenticateDecorator(registry: MetadataRegistry): AuthenticateDecorator {
  return (strategy, options = {}) =>
    (target, member) => {
      registry.annotate(memberSite(target, member), 'authentication-spec', { strategy, options });
    };
}
