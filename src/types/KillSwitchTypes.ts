/**
 * Kill switch contract.
 *
 * Two independent sets: disabled experiments (by service type) and disabled
 * (service type, trial key) pairs. Written out-of-band, read by the router on
 * every call. Last write wins.
 */

import type { MaybePromise } from './CommonTypes';

export interface KillSwitchProvider {
  isExperimentDisabled(serviceType: string): MaybePromise<boolean>;
  isTrialDisabled(serviceType: string, trialKey: string): MaybePromise<boolean>;
  disableExperiment(serviceType: string): MaybePromise<void>;
  enableExperiment(serviceType: string): MaybePromise<void>;
  disableTrial(serviceType: string, trialKey: string): MaybePromise<void>;
  enableTrial(serviceType: string, trialKey: string): MaybePromise<void>;
}
