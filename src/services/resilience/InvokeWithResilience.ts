/**
 * Resilience Wrapper
 *
 * Single choke point for one candidate attempt. Order: trial kill switch,
 * circuit breaker, timeout, decorator pipeline, implementation call. Returns
 * an outcome instead of throwing; `terminal` tells the router to stop the
 * cascade and surface this outcome as is.
 *
 * Redirects:
 * - circuit open with FallbackToDefault / FallbackToSpecificTrial invokes that
 *   trial directly; the breaker records nothing for it
 * - timeout with FallbackToDefault / FallbackToSpecificTrial invokes that trial
 *   once (timeout and decorators still apply); remaining candidates are skipped
 * A redirect target disabled by the kill switch is not invoked; the attempt
 * fails terminally with TrialDisabledError.
 */

import { Logger, errorMessage } from '../core/Logger';
import type { InvocationScope } from '../../types/CommonTypes';
import type {
  ImplementationResolver,
  Registration,
  TrialCall,
} from '../../types/ExperimentTypes';
import {
  CircuitOpenError,
  TrialDisabledError,
  TrialTimeoutError,
  toError,
} from '../../types/ExperimentErrors';
import { DecoratorPipeline } from '../decorators/DecoratorPipeline';
import type { KillSwitchService } from './KillSwitchService';
import { withTimeout } from './withTimeout';

export type AttemptOutcome<R> =
  | { kind: 'success'; value: R; candidateKey: string; trialKey: string }
  | { kind: 'failure'; error: Error; candidateKey: string; trialKey: string; terminal: boolean };

export interface AttemptRequest<TService, R> {
  registration: Registration<TService>;
  methodName: string;
  args: readonly unknown[];
  call: TrialCall<TService, R>;
  scope: InvocationScope;
  pipeline: DecoratorPipeline;
}

export interface AttemptDeps<TService> {
  resolver: ImplementationResolver<TService>;
  killSwitch: KillSwitchService;
  logger: Logger;
}

/**
 * Key actually invoked for a candidate: keys without a registered trial fall
 * back to the default implementation.
 */
export function effectiveTrialKey(registration: Pick<Registration<unknown>, 'trials' | 'defaultKey'>, candidateKey: string): string {
  return registration.trials.has(candidateKey) ? candidateKey : registration.defaultKey;
}

export async function invokeWithResilience<TService, R>(
  candidateKey: string,
  request: AttemptRequest<TService, R>,
  deps: AttemptDeps<TService>
): Promise<AttemptOutcome<R>> {
  const { registration, scope } = request;
  const { logger } = deps;
  const serviceType = registration.serviceType;
  const trialKey = effectiveTrialKey(registration, candidateKey);

  if (trialKey !== candidateKey) {
    logger.debug('Candidate has no registered trial; using default implementation', {
      serviceType,
      candidateKey,
      trialKey,
      correlationId: scope.correlationId,
    });
  }

  if (await deps.killSwitch.isTrialDisabled(serviceType, trialKey, registration.killSwitch)) {
    logger.info('Trial disabled by kill switch; skipping candidate', {
      serviceType,
      trialKey,
      correlationId: scope.correlationId,
    });
    return failure(new TrialDisabledError(serviceType, trialKey), candidateKey, trialKey, false);
  }

  const breaker = registration.circuitBreaker;
  let probe = false;
  if (breaker) {
    const allow = breaker.allowRequest();
    if (!allow.allowed) {
      const action = breaker.options.onCircuitOpen;
      logger.info('Circuit open; attempt rejected', {
        serviceType,
        trialKey,
        action,
        retryAfterMs: allow.retryAfterMs,
        correlationId: scope.correlationId,
      });
      if (action === 'ThrowException') {
        return failure(new CircuitOpenError(serviceType, trialKey, allow.retryAfterMs), candidateKey, trialKey, true);
      }
      const target =
        action === 'FallbackToSpecificTrial' && breaker.options.fallbackTrialKey
          ? effectiveTrialKey(registration, breaker.options.fallbackTrialKey)
          : registration.defaultKey;
      return redirect(target, candidateKey, request, deps);
    }
    probe = allow.probe === true;
  }

  const outcome = await execute(trialKey, request, deps);

  if (breaker) {
    if (outcome.kind === 'success') {
      breaker.recordSuccess(probe);
    } else if (!isCallerAbort(scope, outcome.error) || probe) {
      breaker.recordFailure(probe);
    }
  }

  if (outcome.kind === 'success') {
    return { ...outcome, candidateKey };
  }
  if (isCallerAbort(scope, outcome.error)) {
    return { ...outcome, candidateKey, terminal: true };
  }

  const timeout = registration.timeout;
  if (outcome.error instanceof TrialTimeoutError && timeout && timeout.action !== 'ThrowException') {
    const target =
      timeout.action === 'FallbackToSpecificTrial' && timeout.fallbackTrialKey
        ? effectiveTrialKey(registration, timeout.fallbackTrialKey)
        : registration.defaultKey;
    if (target === trialKey) {
      return { ...outcome, candidateKey, terminal: true };
    }
    logger.warn('Trial timed out; redirecting to fallback trial', {
      serviceType,
      trialKey,
      fallbackTrialKey: target,
      timeoutMs: timeout.timeoutMs,
      correlationId: scope.correlationId,
    });
    return redirect(target, candidateKey, request, deps);
  }

  return { ...outcome, candidateKey, terminal: false };
}

async function redirect<TService, R>(
  target: string,
  candidateKey: string,
  request: AttemptRequest<TService, R>,
  deps: AttemptDeps<TService>
): Promise<AttemptOutcome<R>> {
  const { registration, scope } = request;
  if (await deps.killSwitch.isTrialDisabled(registration.serviceType, target, registration.killSwitch)) {
    deps.logger.info('Fallback trial disabled by kill switch; not redirecting', {
      serviceType: registration.serviceType,
      fallbackTrialKey: target,
      correlationId: scope.correlationId,
    });
    return failure(new TrialDisabledError(registration.serviceType, target), candidateKey, target, true);
  }
  return terminal(await execute(target, request, deps), candidateKey);
}

type ExecuteOutcome<R> = { kind: 'success'; value: R; trialKey: string } | { kind: 'failure'; error: Error; trialKey: string };

/**
 * Resolve and call one trial under the registration's timeout, through the decorator pipeline
 */
async function execute<TService, R>(
  trialKey: string,
  request: AttemptRequest<TService, R>,
  deps: AttemptDeps<TService>
): Promise<ExecuteOutcome<R>> {
  const { registration, scope, methodName } = request;
  const timeoutMs = registration.timeout?.timeoutMs;

  try {
    const value = await withTimeout(
      async (signal) => {
        const instance = await deps.resolver.resolve(registration.serviceType, trialKey, scope);
        return request.pipeline.invoke(
          {
            serviceType: registration.serviceType,
            methodName,
            trialKey,
            args: request.args,
            scope,
            signal,
          },
          async () => request.call(instance, signal)
        );
      },
      timeoutMs,
      () => new TrialTimeoutError(registration.serviceType, methodName, trialKey, timeoutMs ?? 0),
      scope.signal
    );
    return { kind: 'success', value, trialKey };
  } catch (error) {
    const err = toError(error);
    deps.logger.warn('Trial attempt failed', {
      serviceType: registration.serviceType,
      methodName,
      trialKey,
      correlationId: scope.correlationId,
      errorName: err.name,
      error: errorMessage(err),
    });
    return { kind: 'failure', error: err, trialKey };
  }
}

function failure<R>(error: Error, candidateKey: string, trialKey: string, isTerminal: boolean): AttemptOutcome<R> {
  return { kind: 'failure', error, candidateKey, trialKey, terminal: isTerminal };
}

function terminal<R>(outcome: ExecuteOutcome<R>, candidateKey: string): AttemptOutcome<R> {
  return outcome.kind === 'success'
    ? { ...outcome, candidateKey }
    : { ...outcome, candidateKey, terminal: true };
}

function isCallerAbort(scope: InvocationScope, error: Error): boolean {
  return scope.signal?.aborted === true && !(error instanceof TrialTimeoutError);
}
