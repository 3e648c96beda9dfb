/**
 * Kill Switch Service
 *
 * Out-of-band overrides read by the router on every call: the process-wide
 * emergency stop (EXPERIMENTS_GLOBAL_STOP), then the registration's provider.
 * A provider that cannot answer is treated as "not disabled" and logged.
 */

import { Logger, errorMessage } from '../core/Logger';
import { isGlobalStopEngaged } from '../../config/engineConfig';
import type { KillSwitchProvider } from '../../types/KillSwitchTypes';

/**
 * Process-local sets. Last write wins.
 */
export class InMemoryKillSwitchProvider implements KillSwitchProvider {
  private readonly disabledExperiments = new Set<string>();
  private readonly disabledTrials = new Map<string, Set<string>>();

  isExperimentDisabled(serviceType: string): boolean {
    return this.disabledExperiments.has(serviceType);
  }

  isTrialDisabled(serviceType: string, trialKey: string): boolean {
    return this.disabledTrials.get(serviceType)?.has(trialKey) ?? false;
  }

  disableExperiment(serviceType: string): void {
    this.disabledExperiments.add(serviceType);
  }

  enableExperiment(serviceType: string): void {
    this.disabledExperiments.delete(serviceType);
  }

  disableTrial(serviceType: string, trialKey: string): void {
    let keys = this.disabledTrials.get(serviceType);
    if (!keys) {
      keys = new Set<string>();
      this.disabledTrials.set(serviceType, keys);
    }
    keys.add(trialKey);
  }

  enableTrial(serviceType: string, trialKey: string): void {
    const keys = this.disabledTrials.get(serviceType);
    if (!keys) return;
    keys.delete(trialKey);
    if (keys.size === 0) {
      this.disabledTrials.delete(serviceType);
    }
  }
}

/**
 * Never disables anything; mutators are ignored
 */
export class NoopKillSwitchProvider implements KillSwitchProvider {
  isExperimentDisabled(): boolean {
    return false;
  }

  isTrialDisabled(): boolean {
    return false;
  }

  disableExperiment(): void {}

  enableExperiment(): void {}

  disableTrial(): void {}

  enableTrial(): void {}
}

export class KillSwitchService {
  constructor(
    private readonly logger: Logger,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * True when the experiment must not serve this call at all
   */
  async isExperimentDisabled(serviceType: string, provider?: KillSwitchProvider): Promise<boolean> {
    if (isGlobalStopEngaged(this.env)) {
      return true;
    }
    if (!provider) {
      return false;
    }
    try {
      return await provider.isExperimentDisabled(serviceType);
    } catch (error) {
      this.logger.warn('Kill switch lookup failed; treating experiment as enabled', {
        serviceType,
        error: errorMessage(error),
      });
      return false;
    }
  }

  async isTrialDisabled(serviceType: string, trialKey: string, provider?: KillSwitchProvider): Promise<boolean> {
    if (!provider) {
      return false;
    }
    try {
      return await provider.isTrialDisabled(serviceType, trialKey);
    } catch (error) {
      this.logger.warn('Kill switch lookup failed; treating trial as enabled', {
        serviceType,
        trialKey,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
