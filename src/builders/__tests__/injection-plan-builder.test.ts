/**
 * injection-plan-builder.test.ts
 *
 * Tests for InjectionPlanBuilder: constructor arguments by index, properties
 * by name, method arguments, and unbound constructor parameters.
 */

import { InjectionPlanBuilder } from '../injection-plan-builder.js';
import { createAnnotations } from '../../decorators/annotations.js';
import { MetadataRegistry } from '../../registry/metadata-registry.js';
import { FileLogger } from '../../services/logger.js';

const registry = new MetadataRegistry();
const { inject, repository } = createAnnotations(registry);

class OrderRepository {}

class OrderService {
  @inject('config.pageSize') pageSize!: number;
  @inject.getter('auth.currentUser') currentUser!: () => string;

  constructor(
    @repository(OrderRepository) readonly orders: OrderRepository,
    readonly clock: () => number,
    @inject('services.mailer', { optional: true }) readonly mailer: unknown,
  ) {}

  notify(@inject.context() ctx: unknown, @inject.tag('notifier') notifiers: unknown[]): number {
    return [ctx, notifiers].length;
  }
}

describe('InjectionPlanBuilder', () => {
  it('collects every binding of a class', () => {
    const logger = new FileLogger('warn');
    const plan = new InjectionPlanBuilder(registry, logger).build(OrderService);

    expect(plan).toEqual({
      className: 'OrderService',
      constructorArgs: [
        {
          index: 0,
          binding: {
            source: 'repository',
            spec: { form: 'repository', repositoryName: 'OrderRepository', bindingKey: 'repositories.OrderRepository' },
          },
        },
        {
          index: 2,
          binding: { source: 'inject', spec: { variant: 'key', bindingKey: 'services.mailer', optional: true } },
        },
      ],
      properties: [
        {
          name: 'currentUser',
          isStatic: false,
          binding: { source: 'inject', spec: { variant: 'getter', bindingKey: 'auth.currentUser' } },
        },
        {
          name: 'pageSize',
          isStatic: false,
          binding: { source: 'inject', spec: { variant: 'key', bindingKey: 'config.pageSize', optional: false } },
        },
      ],
      methodArgs: [
        { method: 'notify', index: 0, binding: { source: 'inject', spec: { variant: 'context' } } },
        { method: 'notify', index: 1, binding: { source: 'inject', spec: { variant: 'tag', tag: 'notifier' } } },
      ],
      unboundConstructorArgs: [1],
    });
    expect(logger.lines[0]?.slice(13)).toBe(
      '[annotations] [WARN ] Constructor parameters without injection metadata  ' +
        '{"className":"OrderService","indices":[1]}',
    );
  });

  it('returns an empty plan for a class without injections', () => {
    class Bare {}
    expect(new InjectionPlanBuilder(registry).build(Bare)).toEqual({
      className: 'Bare',
      constructorArgs: [],
      properties: [],
      methodArgs: [],
      unboundConstructorArgs: [],
    });
  });
});
