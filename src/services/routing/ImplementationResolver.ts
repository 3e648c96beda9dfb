import type { InvocationScope } from '../../types/CommonTypes';
import type { ImplementationResolver, TrialDescriptor } from '../../types/ExperimentTypes';
import { TrialResolutionError } from '../../types/ExperimentErrors';

/**
 * Resolves instances from a registration's trial descriptors. Unknown keys and
 * failing factories raise TrialResolutionError (with the factory error as cause).
 */
export class DescriptorImplementationResolver<TService> implements ImplementationResolver<TService> {
  constructor(private readonly trials: ReadonlyMap<string, TrialDescriptor<TService>>) {}

  async resolve(serviceType: string, trialKey: string, scope: InvocationScope): Promise<TService> {
    const descriptor = this.trials.get(trialKey);
    if (!descriptor) {
      throw new TrialResolutionError(serviceType, trialKey);
    }
    try {
      return await descriptor.create(scope);
    } catch (error) {
      throw new TrialResolutionError(serviceType, trialKey, error);
    }
  }
}

/**
 * Trial whose factory always returns the same instance
 */
export function instanceTrial<TService>(key: string, instance: TService, implementationName?: string): TrialDescriptor<TService> {
  return { key, create: () => instance, implementationName };
}

/**
 * Trial whose factory builds a new instance per call
 */
export function factoryTrial<TService>(
  key: string,
  create: (scope: InvocationScope) => TService | Promise<TService>,
  implementationName?: string
): TrialDescriptor<TService> {
  return { key, create, implementationName };
}
