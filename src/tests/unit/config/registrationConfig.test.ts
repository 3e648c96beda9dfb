import { registrationFromConfig, parseRegistrationConfig } from '../../../config/registrationConfig';
import { RegistrationError } from '../../../types/ExperimentErrors';
import { InMemoryKillSwitchProvider } from '../../../services/resilience/KillSwitchService';
import searchRegistration from '../../fixtures/config/search-registration.json';

interface SearchService {
  search(query: string): string[];
}

const implementations = {
  KeywordSearch: (): SearchService => ({ search: (q) => [`keyword:${q}`] }),
  SemanticSearch: (): SearchService => ({ search: (q) => [`semantic:${q}`] }),
  HybridSearch: (): SearchService => ({ search: (q) => [`hybrid:${q}`] }),
};

describe('registrationConfig', () => {
  describe('registrationFromConfig', () => {
    it('should build a frozen registration from the JSON fixture', () => {
      const registration = registrationFromConfig<SearchService>(searchRegistration, implementations);

      expect(Object.isFrozen(registration)).toBe(true);
      expect(registration.serviceType).toBe('ISearchService');
      expect(registration.experimentName).toBe('search-ranking');
      expect(Array.from(registration.trials.keys())).toEqual(['baseline', 'semantic', 'hybrid']);
      expect(registration.trials.get('semantic')?.implementationName).toBe('SemanticSearch');
      expect(registration.defaultKey).toBe('baseline');
      expect(registration.selectionMode).toBe('ConfigurationValue');
      expect(registration.modeIdentifier).toBe('ConfigurationValue');
      expect(registration.selectorName).toBe('Experiments:Search');
      expect(registration.errorPolicy).toEqual({ kind: 'RedirectOrdered', orderedKeys: ['hybrid', 'baseline'] });
      expect(registration.startTime?.toISOString()).toBe('2025-01-01T00:00:00.000Z');
      expect(registration.endTime?.toISOString()).toBe('2025-06-30T23:59:59.000Z');
      expect(registration.timeout).toEqual({ timeoutMs: 250, action: 'FallbackToDefault' });
      expect(registration.circuitBreaker?.options).toEqual({
        failureRatio: 0.25,
        minimumThroughput: 4,
        samplingDurationMs: 10_000,
        breakDurationMs: 30_000,
        onCircuitOpen: 'ThrowException',
      });
    });

    it('should create working trial factories', async () => {
      const registration = registrationFromConfig<SearchService>(searchRegistration, implementations);
      const descriptor = registration.trials.get('hybrid');

      const instance = await descriptor?.create({ correlationId: 'call-test', attributes: {} });

      expect(instance?.search('shoes')).toEqual(['hybrid:shoes']);
    });

    it('should apply defaults for a minimal config', () => {
      const registration = registrationFromConfig(
        { serviceType: 'IGreeter', trials: [{ key: 'formal', implementation: 'Formal' }] },
        { Formal: () => 'hello' }
      );

      expect(registration.defaultKey).toBe('formal');
      expect(registration.selectionMode).toBe('BooleanFeatureFlag');
      expect(registration.selectorName).toBe('');
      expect(registration.errorPolicy).toEqual({ kind: 'Throw' });
      expect(registration.timeout).toBeUndefined();
      expect(registration.circuitBreaker).toBeUndefined();
    });

    it('should attach runtime collaborators passed as options', () => {
      const killSwitch = new InMemoryKillSwitchProvider();

      const registration = registrationFromConfig(
        { serviceType: 'IGreeter', trials: [{ key: 'formal', implementation: 'Formal' }] },
        { Formal: () => 'hello' },
        { killSwitch }
      );

      expect(registration.killSwitch).toBe(killSwitch);
    });

    it('should map a custom selection mode', () => {
      const registration = registrationFromConfig(
        {
          serviceType: 'IGreeter',
          trials: [{ key: 'formal', implementation: 'Formal' }],
          selection: { mode: 'Custom', modeIdentifier: 'Rollout' },
        },
        { Formal: () => 'hello' }
      );

      expect(registration.selectionMode).toBe('Custom');
      expect(registration.modeIdentifier).toBe('Rollout');
    });

    it('should reject an implementation name with no factory', () => {
      expect(() =>
        registrationFromConfig(
          { serviceType: 'IGreeter', trials: [{ key: 'casual', implementation: 'Casual' }] },
          { Formal: () => 'hello' }
        )
      ).toThrow("Invalid registration for IGreeter: unknown implementation 'Casual' for trial 'casual'");
    });

    it('should reject a control key that is not a trial', () => {
      expect(() =>
        registrationFromConfig(
          { serviceType: 'IGreeter', control: 'missing', trials: [{ key: 'formal', implementation: 'Formal' }] },
          { Formal: () => 'hello' }
        )
      ).toThrow("Invalid registration for IGreeter: control 'missing' is not a configured trial");
    });
  });

  describe('parseRegistrationConfig', () => {
    it('should raise RegistrationError naming the failing path', () => {
      const parse = () => parseRegistrationConfig({ serviceType: 'IGreeter', trials: [] });

      expect(parse).toThrow(RegistrationError);
      expect(parse).toThrow(/^Invalid registration for IGreeter: trials: /);
    });

    it('should require a mode identifier for custom selection', () => {
      expect(() =>
        parseRegistrationConfig({
          serviceType: 'IGreeter',
          trials: [{ key: 'a', implementation: 'A' }],
          selection: { mode: 'Custom' },
        })
      ).toThrow('selection.modeIdentifier: modeIdentifier is required for Custom mode');
    });

    it('should name an unnamed config in the error', () => {
      expect(() => parseRegistrationConfig(null)).toThrow(/^Invalid registration for <unnamed>: /);
    });

    it('should require a fallback trial for FallbackToSpecificTrial timeouts', () => {
      expect(() =>
        parseRegistrationConfig({
          serviceType: 'IGreeter',
          trials: [{ key: 'a', implementation: 'A' }],
          timeout: { timeoutMs: 100, action: 'FallbackToSpecificTrial' },
        })
      ).toThrow('timeout.fallbackTrialKey: fallbackTrialKey is required when action is FallbackToSpecificTrial');
    });
  });
});
