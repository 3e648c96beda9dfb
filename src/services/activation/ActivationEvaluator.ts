/**
 * Activation Evaluator
 *
 * A registration is live when now is inside [startTime, endTime] (both ends
 * inclusive, either end optional) and its activation predicate, if any,
 * returns true. A predicate that throws makes the registration inactive.
 */

import { Logger, errorMessage } from '../core/Logger';
import type { Clock, InvocationScope } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import type { Registration } from '../../types/ExperimentTypes';

const EMPTY_SCOPE: InvocationScope = Object.freeze({
  correlationId: 'activation-check',
  attributes: Object.freeze({}),
});

type ActivationFields = Pick<Registration<unknown>, 'serviceType' | 'startTime' | 'endTime' | 'activationPredicate'>;

export class ActivationEvaluator {
  constructor(
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  isActive(registration: ActivationFields, scope: InvocationScope = EMPTY_SCOPE): boolean {
    return this.isActiveForTime(registration) && this.isActiveForPredicate(registration, scope);
  }

  private isActiveForTime(registration: ActivationFields): boolean {
    const now = this.clock.now();
    if (registration.startTime && now < registration.startTime.getTime()) {
      return false;
    }
    if (registration.endTime && now > registration.endTime.getTime()) {
      return false;
    }
    return true;
  }

  private isActiveForPredicate(registration: ActivationFields, scope: InvocationScope): boolean {
    const predicate = registration.activationPredicate;
    if (!predicate) {
      return true;
    }
    try {
      return predicate(scope) === true;
    } catch (error) {
      this.logger.warn('Activation predicate threw; treating experiment as inactive', {
        serviceType: registration.serviceType,
        correlationId: scope.correlationId,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
