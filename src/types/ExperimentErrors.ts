/**
 * Experiment Errors - typed errors raised by the routing engine
 *
 * Every engine error carries error_class, error_code and a retryable flag so
 * callers can tell configuration defects apart from per-attempt failures.
 * Errors thrown by trial implementations are never wrapped.
 */

import type { TrialConflict } from './ConflictTypes';

export type ExperimentErrorClass =
  | 'CONFIGURATION'
  | 'DISABLED'
  | 'CIRCUIT_OPEN'
  | 'TIMEOUT'
  | 'RESOLUTION';

/**
 * Base engine error
 */
export class ExperimentError extends Error {
  constructor(
    message: string,
    public readonly error_class: ExperimentErrorClass,
    public readonly error_code: string,
    public readonly retryable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Configuration defects (fatal, surfaced before any call is served)
 */
export class RegistrationError extends ExperimentError {
  constructor(serviceType: string, message: string) {
    super(`Invalid registration for ${serviceType}: ${message}`, 'CONFIGURATION', 'INVALID_REGISTRATION', false);
  }
}

export class StickyRoutingError extends ExperimentError {
  constructor(message: string) {
    super(message, 'CONFIGURATION', 'NO_TRIAL_KEYS', false);
  }
}

export class TrialConflictError extends ExperimentError {
  constructor(public readonly conflicts: readonly TrialConflict[]) {
    super(
      `Detected ${conflicts.length} trial conflict(s):\n` +
        conflicts.map((c) => `  - [${c.type}] ${c.description}`).join('\n'),
      'CONFIGURATION',
      'TRIAL_CONFLICT',
      false
    );
  }
}

/**
 * Kill switch errors
 */
export class ExperimentDisabledError extends ExperimentError {
  constructor(public readonly serviceType: string) {
    super(`Experiment for ${serviceType} is disabled by kill switch`, 'DISABLED', 'EXPERIMENT_DISABLED', false);
  }
}

export class TrialDisabledError extends ExperimentError {
  constructor(public readonly serviceType: string, public readonly trialKey: string) {
    super(
      `Trial '${trialKey}' for ${serviceType} is disabled by kill switch`,
      'DISABLED',
      'TRIAL_DISABLED',
      true
    );
  }
}

/**
 * Circuit breaker rejected the attempt
 */
export class CircuitOpenError extends ExperimentError {
  constructor(
    public readonly serviceType: string,
    public readonly trialKey: string,
    public readonly retryAfterMs?: number
  ) {
    super(
      `Circuit breaker is open for trial '${trialKey}' of ${serviceType}` +
        (retryAfterMs !== undefined ? `; retry after ${retryAfterMs}ms` : ''),
      'CIRCUIT_OPEN',
      'CIRCUIT_OPEN',
      true
    );
  }
}

/**
 * Attempt exceeded its deadline (retryable per error policy)
 */
export class TrialTimeoutError extends ExperimentError {
  constructor(
    public readonly serviceType: string,
    public readonly methodName: string,
    public readonly trialKey: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Trial '${trialKey}' for ${serviceType}.${methodName} exceeded timeout of ${timeoutMs}ms`,
      'TIMEOUT',
      'TIMEOUT',
      true
    );
  }
}

/**
 * Implementation could not be resolved for a trial key
 */
export class TrialResolutionError extends ExperimentError {
  constructor(serviceType: string, trialKey: string, originalError?: unknown) {
    super(
      `Unable to resolve implementation for trial '${trialKey}' of ${serviceType}`,
      'RESOLUTION',
      'UNRESOLVABLE_TRIAL',
      false,
      originalError !== undefined ? { cause: originalError } : undefined
    );
  }
}

export function isExperimentError(error: unknown): error is ExperimentError {
  return error instanceof ExperimentError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
