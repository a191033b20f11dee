/**
 * repository-decorator.ts
 * `repository()` wires a constructor parameter or property to a repository:
 *   repository(TodoRepository)      → binding "repositories.TodoRepository"
 *   repository('TodoRepository')    → same, by name
 *   repository(Todo, 'db')          → a repository for model Todo on "datasources.db"
 */

import type { ClassTarget } from '../models/declaration-site.js';
import type { RepositorySpec } from '../models/payloads.js';
import type { MetadataRegistry } from '../registry/metadata-registry.js';
import type { InjectionAnnotation } from './sites.js';
import { injectionSite } from './sites.js';

export type RepositoryDecorator = (
  repositoryOrModel: ClassTarget | string,
  dataSourceName?: string,
) => InjectionAnnotation;

export function repositorySpec(
  repositoryOrModel: ClassTarget | string,
  dataSourceName?: string,
): RepositorySpec {
  const name = typeof repositoryOrModel === 'string' ? repositoryOrModel : repositoryOrModel.name;
  if (dataSourceName === undefined) {
    return { form: 'repository', repositoryName: name, bindingKey: `repositories.${name}` };
  }
  return {
    form: 'model',
    modelName: name,
    dataSourceName,
    bindingKey: `datasources.${dataSourceName}`,
  };
}

export function createRepositoryDecorator(registry: MetadataRegistry): RepositoryDecorator {
  return (repositoryOrModel, dataSourceName) => {
    const spec = repositorySpec(repositoryOrModel, dataSourceName);
    return (target, member, indexOrDescriptor) => {
      registry.annotate(
        injectionSite(target, member, indexOrDescriptor, 'repository'),
        'repository-spec',
        spec,
      );
    };
  };
}
