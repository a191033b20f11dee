/**
 * authentication-map-builder.ts
 * Method name → authentication requirement, for one controller.
 */

import type { ClassTarget } from '../models/declaration-site.js';
import { memberName } from '../models/declaration-site.js';
import type { AuthenticationSpec } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export type AuthenticationMap = Record<string, AuthenticationSpec>;

export class AuthenticationMapBuilder {
  private readonly _registry: MetadataRegistry;
  private readonly _log: Logger;

  constructor(registry: MetadataRegistry, logger?: Logger) {
    this._registry = registry;
    this._log = logger ?? new SilentLogger();
  }

  build(target: ClassTarget): AuthenticationMap {
    const map: AuthenticationMap = {};
    for (const entry of this._registry.entriesOfKind(target, 'authentication-spec')) {
      if (entry.site.member === undefined) {
        this._log.warn('authentication-spec without a method ignored', { className: target.name });
        continue;
      }
      map[memberName(entry.site.member)] = entry.payload;
    }
    this._log.debug('Authentication map built', {
      className: target.name,
      methods: Object.keys(map).length,
    });
    return map;
  }
}
