/**
 * Sticky Trial Router
 *
 * Deterministic identity -> trial assignment. The hash covers identity and
 * experiment name together, so one identity can land on different trials in
 * different experiments. Keys are sorted before indexing so registration order
 * never changes an assignment.
 *
 * Hash: first 8 bytes of SHA-256(identity + "\u0001" + experimentName), big-endian.
 */

import { createHash } from 'crypto';
import { StickyRoutingError } from '../../types/ExperimentErrors';

const SEPARATOR = '\u0001';

export function stableHash64(identity: string, experimentName: string): bigint {
  const digest = createHash('sha256').update(`${identity}${SEPARATOR}${experimentName}`, 'utf8').digest();
  return digest.readBigUInt64BE(0);
}

/**
 * Bucket in [0, buckets) for an identity within an experiment
 */
export function stableBucket(identity: string, experimentName: string, buckets: number): number {
  return Number(stableHash64(identity, experimentName) % BigInt(buckets));
}

export function selectTrial(identity: string, experimentName: string, trialKeys: readonly string[]): string {
  if (trialKeys.length === 0) {
    throw new StickyRoutingError(`No trial keys available for sticky routing of '${experimentName}'`);
  }
  if (trialKeys.length === 1) {
    return trialKeys[0];
  }

  const sorted = [...trialKeys].sort();
  return sorted[stableBucket(identity, experimentName, sorted.length)];
}
