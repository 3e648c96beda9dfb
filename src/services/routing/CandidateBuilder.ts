/**
 * Error-policy cascade.
 *
 * Expands the preferred key into the ordered list of keys a call may try.
 * Pure: no I/O, no state. The result is never empty, always starts with the
 * preferred key and never repeats a key.
 */

import type { Registration } from '../../types/ExperimentTypes';

type CascadeFields = Pick<Registration<unknown>, 'errorPolicy' | 'defaultKey' | 'trials'>;

export function buildCandidates(preferredKey: string, registration: CascadeFields): string[] {
  const policy = registration.errorPolicy;

  switch (policy.kind) {
    case 'Throw':
      return [preferredKey];

    case 'RedirectDefault':
      return dedupe([preferredKey, registration.defaultKey]);

    case 'RedirectAny': {
      const others = Array.from(registration.trials.keys())
        .filter((k) => k !== preferredKey)
        .sort(compareOrdinal);
      return dedupe([preferredKey, ...others]);
    }

    case 'RedirectSpecific':
      return dedupe([preferredKey, policy.fallbackKey]);

    case 'RedirectOrdered':
      return dedupe([preferredKey, ...policy.orderedKeys.filter((k) => k !== preferredKey)]);
  }
}

function dedupe(keys: readonly string[]): string[] {
  return Array.from(new Set(keys));
}

export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
