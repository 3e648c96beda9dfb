/**
 * Circuit breaker state and options.
 *
 * One breaker per registration, shared by every call routed through it.
 * Failure ratio over a sliding sampling window, gated by a minimum throughput.
 */

import { z } from 'zod';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export type CircuitBreakerAction = 'ThrowException' | 'FallbackToDefault' | 'FallbackToSpecificTrial';

export const CircuitBreakerOptionsSchema = z
  .object({
    failureRatio: z.number().gt(0).lte(1).default(0.5),
    minimumThroughput: z.number().int().min(1).default(10),
    samplingDurationMs: z.number().int().positive().default(10_000),
    breakDurationMs: z.number().int().positive().default(30_000),
    onCircuitOpen: z
      .enum(['ThrowException', 'FallbackToDefault', 'FallbackToSpecificTrial'])
      .default('ThrowException'),
    fallbackTrialKey: z.string().min(1).optional(),
  })
  .refine((o) => o.onCircuitOpen !== 'FallbackToSpecificTrial' || o.fallbackTrialKey !== undefined, {
    message: 'fallbackTrialKey is required when onCircuitOpen is FallbackToSpecificTrial',
    path: ['fallbackTrialKey'],
  });

export type CircuitBreakerOptionsInput = z.input<typeof CircuitBreakerOptionsSchema>;
export type CircuitBreakerOptions = z.output<typeof CircuitBreakerOptionsSchema>;

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS: CircuitBreakerOptions = CircuitBreakerOptionsSchema.parse({});

export interface AllowRequestResult {
  allowed: boolean;
  state: CircuitState;
  /** True when this caller holds the single half-open probe slot. */
  probe?: boolean;
  retryAfterMs?: number;
}

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  samples: number;
  failures: number;
  openedAt?: number;
  openUntil?: number;
}

/**
 * Contract the router relies on. CircuitBreakerService is the shipped implementation.
 */
export interface CircuitBreaker {
  readonly options: CircuitBreakerOptions;
  allowRequest(): AllowRequestResult;
  recordSuccess(probe?: boolean): void;
  recordFailure(probe?: boolean): void;
  getState(): CircuitState;
  snapshot(): CircuitBreakerSnapshot;
}
