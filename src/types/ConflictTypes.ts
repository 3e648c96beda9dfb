/**
 * Conflicts reported by TrialConflictDetector
 */

export type TrialConflictType =
  | 'InvalidFallbackKey'
  | 'DuplicateServiceRegistration'
  | 'OverlappingTimeWindows';

export interface TrialConflict {
  type: TrialConflictType;
  serviceType: string;
  description: string;
  experimentNames?: string[];
}
