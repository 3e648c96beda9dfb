/**
 * Decorator Pipeline
 *
 * Onion composition: the first decorator registered is outermost, so its
 * "before" runs first and its "after" runs last. An empty pipeline invokes the
 * terminal call directly.
 */

import type { InvocationScope } from '../../types/CommonTypes';
import type {
  ExperimentDecorator,
  ExperimentDecoratorFactory,
  InvocationContext,
} from '../../types/ExperimentTypes';

export class DecoratorPipeline {
  constructor(private readonly decorators: readonly ExperimentDecorator[]) {}

  /**
   * Fresh decorator instances for one call
   */
  static fromFactories(factories: readonly ExperimentDecoratorFactory[], scope: InvocationScope): DecoratorPipeline {
    return new DecoratorPipeline(factories.map((f) => f.create(scope)));
  }

  get length(): number {
    return this.decorators.length;
  }

  invoke<R>(context: InvocationContext, terminal: () => Promise<R>): Promise<R> {
    const dispatch = (index: number): Promise<R> => {
      if (index >= this.decorators.length) {
        return terminal();
      }
      return this.decorators[index].invoke(context, () => dispatch(index + 1));
    };
    return dispatch(0);
  }
}

/**
 * Factory that hands out the same decorator to every call (for stateless decorators)
 */
export function singletonDecorator(decorator: ExperimentDecorator): ExperimentDecoratorFactory {
  return { create: () => decorator };
}

/**
 * Factory from a plain function
 */
export function decoratorFactory(create: (scope: InvocationScope) => ExperimentDecorator): ExperimentDecoratorFactory {
  return { create };
}
