/**
 * Common types used across the engine
 */

export interface LogContext {
  correlationId?: string;
  serviceType?: string;
  experimentName?: string;
}

/**
 * Source of the current time (epoch milliseconds). Injected so tests can pin time.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Per-call resources handed to selection providers, activation predicates,
 * decorator factories and implementation factories. Built fresh for every call.
 */
export interface InvocationScope {
  readonly correlationId: string;
  readonly identity?: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly signal?: AbortSignal;
}

/**
 * Options a caller may pass with a single invocation.
 */
export interface InvokeOptions {
  identity?: string;
  attributes?: Record<string, string>;
  signal?: AbortSignal;
  correlationId?: string;
}

export type MaybePromise<T> = T | Promise<T>;
