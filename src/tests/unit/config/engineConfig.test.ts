import { isGlobalStopEngaged, loadEngineConfig } from '../../../config/engineConfig';

describe('engineConfig', () => {
  describe('loadEngineConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadEngineConfig({});

      expect(config).toEqual({
        globalStop: false,
        region: undefined,
        killSwitchTableName: undefined,
        auditTableName: undefined,
        metricsNamespace: 'Trialswitch/Experiments',
        killSwitchCacheMs: 5000,
      });
    });

    it('should read every supported variable', () => {
      const config = loadEngineConfig({
        EXPERIMENTS_GLOBAL_STOP: 'true',
        AWS_REGION: 'eu-west-1',
        EXPERIMENT_KILL_SWITCH_TABLE: 'kill-switches',
        EXPERIMENT_AUDIT_TABLE: 'experiment-audit',
        EXPERIMENT_METRICS_NAMESPACE: 'Search/Experiments',
        EXPERIMENT_KILL_SWITCH_CACHE_MS: '250',
      });

      expect(config).toEqual({
        globalStop: true,
        region: 'eu-west-1',
        killSwitchTableName: 'kill-switches',
        auditTableName: 'experiment-audit',
        metricsNamespace: 'Search/Experiments',
        killSwitchCacheMs: 250,
      });
    });

    it('should treat any value other than "true" as no global stop', () => {
      expect(loadEngineConfig({ EXPERIMENTS_GLOBAL_STOP: 'yes' }).globalStop).toBe(false);
    });

    it('should reject a cache duration that is not a number', () => {
      expect(() => loadEngineConfig({ EXPERIMENT_KILL_SWITCH_CACHE_MS: 'soon' })).toThrow(
        /^Invalid engine configuration: EXPERIMENT_KILL_SWITCH_CACHE_MS: /
      );
    });

    it('should reject a negative cache duration', () => {
      expect(() => loadEngineConfig({ EXPERIMENT_KILL_SWITCH_CACHE_MS: '-1' })).toThrow(
        /EXPERIMENT_KILL_SWITCH_CACHE_MS/
      );
    });
  });

  describe('isGlobalStopEngaged', () => {
    it('should only engage on the exact string "true"', () => {
      expect(isGlobalStopEngaged({ EXPERIMENTS_GLOBAL_STOP: 'true' })).toBe(true);
      expect(isGlobalStopEngaged({ EXPERIMENTS_GLOBAL_STOP: 'TRUE' })).toBe(false);
      expect(isGlobalStopEngaged({})).toBe(false);
    });
  });
});
