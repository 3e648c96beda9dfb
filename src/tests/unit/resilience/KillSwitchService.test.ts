import { Logger } from '../../../services/core/Logger';
import {
  InMemoryKillSwitchProvider,
  KillSwitchService,
  NoopKillSwitchProvider,
} from '../../../services/resilience/KillSwitchService';
import type { KillSwitchProvider } from '../../../types/KillSwitchTypes';

describe('InMemoryKillSwitchProvider', () => {
  let provider: InMemoryKillSwitchProvider;

  beforeEach(() => {
    provider = new InMemoryKillSwitchProvider();
  });

  it('should disable and re-enable an experiment', () => {
    provider.disableExperiment('IGreeter');
    expect(provider.isExperimentDisabled('IGreeter')).toBe(true);
    expect(provider.isExperimentDisabled('ISearchService')).toBe(false);

    provider.enableExperiment('IGreeter');
    expect(provider.isExperimentDisabled('IGreeter')).toBe(false);
  });

  it('should track disabled trials per service type', () => {
    provider.disableTrial('IGreeter', 'casual');

    expect(provider.isTrialDisabled('IGreeter', 'casual')).toBe(true);
    expect(provider.isTrialDisabled('IGreeter', 'formal')).toBe(false);
    expect(provider.isTrialDisabled('ISearchService', 'casual')).toBe(false);

    provider.enableTrial('IGreeter', 'casual');
    expect(provider.isTrialDisabled('IGreeter', 'casual')).toBe(false);
  });

  it('should keep experiment and trial switches independent', () => {
    provider.disableExperiment('IGreeter');

    expect(provider.isTrialDisabled('IGreeter', 'casual')).toBe(false);
  });
});

describe('NoopKillSwitchProvider', () => {
  it('should never report anything disabled', () => {
    const provider = new NoopKillSwitchProvider();
    provider.disableExperiment();
    provider.disableTrial();

    expect(provider.isExperimentDisabled()).toBe(false);
    expect(provider.isTrialDisabled()).toBe(false);
  });
});

describe('KillSwitchService', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger('KillSwitchServiceTest');
  });

  const failing: KillSwitchProvider = {
    isExperimentDisabled: async () => {
      throw new Error('table not found');
    },
    isTrialDisabled: async () => {
      throw new Error('table not found');
    },
    disableExperiment: () => undefined,
    enableExperiment: () => undefined,
    disableTrial: () => undefined,
    enableTrial: () => undefined,
  };

  it('should report everything enabled without a provider', async () => {
    const service = new KillSwitchService(logger, {});

    expect(await service.isExperimentDisabled('IGreeter')).toBe(false);
    expect(await service.isTrialDisabled('IGreeter', 'casual')).toBe(false);
  });

  it('should honour the global stop before asking the provider', async () => {
    const provider = new InMemoryKillSwitchProvider();
    const spy = jest.spyOn(provider, 'isExperimentDisabled');
    const service = new KillSwitchService(logger, { EXPERIMENTS_GLOBAL_STOP: 'true' });

    expect(await service.isExperimentDisabled('IGreeter', provider)).toBe(true);
    expect(spy).not.toHaveBeenCalled();
  });

  it('should ignore global stop values other than "true"', async () => {
    const service = new KillSwitchService(logger, { EXPERIMENTS_GLOBAL_STOP: 'yes' });

    expect(await service.isExperimentDisabled('IGreeter')).toBe(false);
  });

  it('should answer from the provider', async () => {
    const provider = new InMemoryKillSwitchProvider();
    provider.disableExperiment('IGreeter');
    provider.disableTrial('ISearchService', 'semantic');
    const service = new KillSwitchService(logger, {});

    expect(await service.isExperimentDisabled('IGreeter', provider)).toBe(true);
    expect(await service.isTrialDisabled('ISearchService', 'semantic', provider)).toBe(true);
  });

  it('should treat a failing provider as enabled and warn', async () => {
    const warnSpy = jest.spyOn(logger, 'warn');
    const service = new KillSwitchService(logger, {});

    expect(await service.isExperimentDisabled('IGreeter', failing)).toBe(false);
    expect(await service.isTrialDisabled('IGreeter', 'casual', failing)).toBe(false);
    expect(warnSpy).toHaveBeenCalledWith('Kill switch lookup failed; treating experiment as enabled', {
      serviceType: 'IGreeter',
      error: 'table not found',
    });
    expect(warnSpy).toHaveBeenCalledWith('Kill switch lookup failed; treating trial as enabled', {
      serviceType: 'IGreeter',
      trialKey: 'casual',
      error: 'table not found',
    });
  });
});
