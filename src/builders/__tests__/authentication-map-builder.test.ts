/**
 * authentication-map-builder.test.ts
 */

import { AuthenticationMapBuilder } from '../authentication-map-builder.js';
import { createAnnotations } from '../../decorators/annotations.js';
import { MetadataRegistry } from '../../registry/metadata-registry.js';

const registry = new MetadataRegistry();
const { authenticate, get, del } = createAnnotations(registry);

class AccountController {
  @get('/me')
  @authenticate('jwt')
  me(): string {
    return 'me';
  }

  @del('/{id}')
  @authenticate('basic', { realm: 'admin' })
  remove(): void {}

  @get('/public')
  open(): string {
    return 'open';
  }
}

describe('AuthenticationMapBuilder', () => {
  it('maps authenticated methods to their strategy', () => {
    expect(new AuthenticationMapBuilder(registry).build(AccountController)).toEqual({
      me: { strategy: 'jwt', options: {} },
      remove: { strategy: 'basic', options: { realm: 'admin' } },
    });
  });

  it('ignores authentication-spec entries without a method', () => {
    const local = new MetadataRegistry();
    class Odd {}
    local.annotate({ target: Odd }, 'authentication-spec', { strategy: 'jwt', options: {} });
    expect(new AuthenticationMapBuilder(local).build(Odd)).toEqual({});
  });
});
