/**
 * Registration data model and per-call invocation types
 */

import { z } from 'zod';
import type { InvocationScope, MaybePromise } from './CommonTypes';
import type { CircuitBreaker } from './CircuitBreakerTypes';
import type { KillSwitchProvider } from './KillSwitchTypes';
import type { ExperimentMetrics } from './MetricsTypes';
import type { SelectionMode } from './SelectionTypes';

/**
 * Rule for expanding a preferred key into an ordered candidate list
 */
export type ErrorPolicy =
  | { kind: 'Throw' }
  | { kind: 'RedirectDefault' }
  | { kind: 'RedirectAny' }
  | { kind: 'RedirectSpecific'; fallbackKey: string }
  | { kind: 'RedirectOrdered'; orderedKeys: readonly string[] };

export type ErrorPolicyKind = ErrorPolicy['kind'];

export type TimeoutAction = 'ThrowException' | 'FallbackToDefault' | 'FallbackToSpecificTrial';

export const TimeoutPolicySchema = z
  .object({
    timeoutMs: z.number().int().positive(),
    action: z.enum(['ThrowException', 'FallbackToDefault', 'FallbackToSpecificTrial']).default('ThrowException'),
    fallbackTrialKey: z.string().min(1).optional(),
  })
  .refine((p) => p.action !== 'FallbackToSpecificTrial' || p.fallbackTrialKey !== undefined, {
    message: 'fallbackTrialKey is required when action is FallbackToSpecificTrial',
    path: ['fallbackTrialKey'],
  });

export type TimeoutPolicyInput = z.input<typeof TimeoutPolicySchema>;
export type TimeoutPolicy = z.output<typeof TimeoutPolicySchema>;

export type ActivationPredicate = (scope: InvocationScope) => boolean;

/**
 * One named candidate implementation of a service
 */
export interface TrialDescriptor<TService> {
  readonly key: string;
  readonly create: (scope: InvocationScope) => MaybePromise<TService>;
  readonly implementationName?: string;
}

/**
 * Resolves the instance to invoke for (serviceType, trialKey). Must fail loudly
 * for keys it cannot resolve.
 */
export interface ImplementationResolver<TService> {
  resolve(serviceType: string, trialKey: string, scope: InvocationScope): MaybePromise<TService>;
}

/**
 * Per-attempt context passed unchanged through the decorator chain
 */
export interface InvocationContext {
  readonly serviceType: string;
  readonly methodName: string;
  readonly trialKey: string;
  readonly args: readonly unknown[];
  readonly scope: InvocationScope;
  /** Aborted when the attempt times out or the caller cancels. */
  readonly signal: AbortSignal;
}

export interface ExperimentDecorator {
  invoke<R>(context: InvocationContext, next: () => Promise<R>): Promise<R>;
}

export interface ExperimentDecoratorFactory {
  create(scope: InvocationScope): ExperimentDecorator;
}

/**
 * The terminal call made against a resolved implementation
 */
export type TrialCall<TService, R> = (instance: TService, signal: AbortSignal) => MaybePromise<R>;

/**
 * Immutable registration for one service type (frozen by RegistrationBuilder.build)
 */
export interface Registration<TService> {
  readonly serviceType: string;
  readonly experimentName?: string;
  readonly trials: ReadonlyMap<string, TrialDescriptor<TService>>;
  readonly defaultKey: string;
  readonly selectionMode: SelectionMode;
  readonly modeIdentifier: string;
  /** Empty means the provider derives its default name at call time. */
  readonly selectorName: string;
  readonly errorPolicy: ErrorPolicy;
  readonly startTime?: Date;
  readonly endTime?: Date;
  readonly activationPredicate?: ActivationPredicate;
  readonly timeout?: TimeoutPolicy;
  readonly circuitBreaker?: CircuitBreaker;
  readonly killSwitch?: KillSwitchProvider;
  readonly metricsSink?: ExperimentMetrics;
  readonly decoratorFactories: readonly ExperimentDecoratorFactory[];
}
