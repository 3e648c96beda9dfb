/**
 * Trial Conflict Detector
 *
 * Pre-flight checks over a whole set of registrations. Collects every
 * conflict instead of stopping at the first:
 * - OverlappingTimeWindows: two time-bounded registrations for one service type overlap
 * - DuplicateServiceRegistration: more than one unbounded registration for a service type
 * - InvalidFallbackKey: an error-policy, timeout or circuit-breaker fallback key is not a trial
 */

import type { Registration } from '../../types/ExperimentTypes';
import type { TrialConflict } from '../../types/ConflictTypes';
import { TrialConflictError } from '../../types/ExperimentErrors';

type ConflictFields = Pick<
  Registration<unknown>,
  'serviceType' | 'experimentName' | 'trials' | 'errorPolicy' | 'startTime' | 'endTime' | 'timeout' | 'circuitBreaker'
>;

export class TrialConflictDetector {
  detectConflicts(registrations: Iterable<ConflictFields>): TrialConflict[] {
    const list = Array.from(registrations);
    const conflicts: TrialConflict[] = [];

    const byServiceType = new Map<string, ConflictFields[]>();
    for (const registration of list) {
      const group = byServiceType.get(registration.serviceType) ?? [];
      group.push(registration);
      byServiceType.set(registration.serviceType, group);
    }

    for (const [serviceType, group] of byServiceType) {
      if (group.length > 1) {
        conflicts.push(...this.validateGroup(serviceType, group));
      }
    }

    for (const registration of list) {
      conflicts.push(...this.validateFallbackKeys(registration));
    }

    return conflicts;
  }

  validateOrThrow(registrations: Iterable<ConflictFields>): void {
    const conflicts = this.detectConflicts(registrations);
    if (conflicts.length > 0) {
      throw new TrialConflictError(conflicts);
    }
  }

  private validateGroup(serviceType: string, group: ConflictFields[]): TrialConflict[] {
    const conflicts: TrialConflict[] = [];

    const bounded = group.filter((r) => r.startTime !== undefined || r.endTime !== undefined);
    for (let i = 0; i < bounded.length; i++) {
      for (let j = i + 1; j < bounded.length; j++) {
        if (windowsOverlap(bounded[i], bounded[j])) {
          conflicts.push({
            type: 'OverlappingTimeWindows',
            serviceType,
            description:
              `Registrations for ${serviceType} have overlapping time windows: ` +
              `${formatWindow(bounded[i])} and ${formatWindow(bounded[j])}.`,
            experimentNames: experimentNames([bounded[i], bounded[j]]),
          });
        }
      }
    }

    const unbounded = group.filter((r) => r.startTime === undefined && r.endTime === undefined);
    if (unbounded.length > 1) {
      conflicts.push({
        type: 'DuplicateServiceRegistration',
        serviceType,
        description: `Multiple registrations for ${serviceType} without time bounds to differentiate them.`,
        experimentNames: experimentNames(unbounded) ?? [],
      });
    }

    return conflicts;
  }

  private validateFallbackKeys(registration: ConflictFields): TrialConflict[] {
    const { serviceType, trials, errorPolicy } = registration;
    const missing: { key: string; source: string }[] = [];

    if (errorPolicy.kind === 'RedirectSpecific' && errorPolicy.fallbackKey && !trials.has(errorPolicy.fallbackKey)) {
      missing.push({ key: errorPolicy.fallbackKey, source: 'fallback key' });
    }
    if (errorPolicy.kind === 'RedirectOrdered') {
      for (const key of errorPolicy.orderedKeys) {
        if (!trials.has(key)) {
          missing.push({ key, source: 'ordered fallback key' });
        }
      }
    }
    const timeoutKey = registration.timeout?.fallbackTrialKey;
    if (registration.timeout?.action === 'FallbackToSpecificTrial' && timeoutKey && !trials.has(timeoutKey)) {
      missing.push({ key: timeoutKey, source: 'timeout fallback key' });
    }
    const breakerOptions = registration.circuitBreaker?.options;
    if (
      breakerOptions?.onCircuitOpen === 'FallbackToSpecificTrial' &&
      breakerOptions.fallbackTrialKey &&
      !trials.has(breakerOptions.fallbackTrialKey)
    ) {
      missing.push({ key: breakerOptions.fallbackTrialKey, source: 'circuit breaker fallback key' });
    }

    return missing.map(({ key, source }): TrialConflict => ({
      type: 'InvalidFallbackKey',
      serviceType,
      description: `Registration for ${serviceType} references ${source} '${key}' which is not a registered trial.`,
      experimentNames: registration.experimentName ? [registration.experimentName] : undefined,
    }));
  }
}

function windowsOverlap(a: ConflictFields, b: ConflictFields): boolean {
  const aStart = a.startTime?.getTime() ?? Number.NEGATIVE_INFINITY;
  const aEnd = a.endTime?.getTime() ?? Number.POSITIVE_INFINITY;
  const bStart = b.startTime?.getTime() ?? Number.NEGATIVE_INFINITY;
  const bEnd = b.endTime?.getTime() ?? Number.POSITIVE_INFINITY;
  return aStart < bEnd && bStart < aEnd;
}

function formatWindow(registration: ConflictFields): string {
  const start = registration.startTime?.toISOString() ?? 'unbounded';
  const end = registration.endTime?.toISOString() ?? 'unbounded';
  const name = registration.experimentName ? `'${registration.experimentName}' ` : '';
  return `${name}[${start} to ${end}]`;
}

function experimentNames(registrations: ConflictFields[]): string[] | undefined {
  const names = registrations.flatMap((r) => (r.experimentName ? [r.experimentName] : []));
  return names.length > 0 ? names : undefined;
}
