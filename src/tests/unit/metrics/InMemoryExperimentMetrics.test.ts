import { InMemoryExperimentMetrics } from '../../../services/metrics/InMemoryExperimentMetrics';
import { NoopExperimentMetrics } from '../../../services/metrics/NoopExperimentMetrics';
import { ManualClock } from '../../helpers/fakes';

describe('InMemoryExperimentMetrics', () => {
  let clock: ManualClock;
  let metrics: InMemoryExperimentMetrics;

  beforeEach(() => {
    clock = new ManualClock();
    metrics = new InMemoryExperimentMetrics(clock);
  });

  it('should sum counters across matching tags', () => {
    metrics.incrementCounter('experiment_invocations_total', 1, { trial_key: 'casual', method: 'greet' });
    metrics.incrementCounter('experiment_invocations_total', 2, { trial_key: 'casual', method: 'wave' });
    metrics.incrementCounter('experiment_invocations_total', 1, { trial_key: 'formal', method: 'greet' });

    expect(metrics.counter('experiment_invocations_total')).toBe(4);
    expect(metrics.counter('experiment_invocations_total', { trial_key: 'casual' })).toBe(3);
    expect(metrics.counter('experiment_invocations_total', { trial_key: 'casual', method: 'greet' })).toBe(1);
  });

  it('should default a counter increment to one', () => {
    metrics.incrementCounter('experiment_success_total');

    expect(metrics.counter('experiment_success_total')).toBe(1);
  });

  it('should keep the last gauge value', () => {
    metrics.setGauge('experiment_circuit_state', 2, { service: 'IGreeter' });
    metrics.setGauge('experiment_circuit_state', 0, { service: 'IGreeter' });

    expect(metrics.gauge('experiment_circuit_state', { service: 'IGreeter' })).toBe(0);
    expect(metrics.gauge('experiment_circuit_state', { service: 'ISearchService' })).toBeUndefined();
  });

  it('should keep every histogram and summary value in order', () => {
    metrics.recordHistogram('experiment_duration_ms', 12);
    metrics.recordHistogram('experiment_duration_ms', 30);
    metrics.recordSummary('payload_bytes', 512);

    expect(metrics.values('histogram', 'experiment_duration_ms')).toEqual([12, 30]);
    expect(metrics.values('summary', 'payload_bytes')).toEqual([512]);
  });

  it('should timestamp points and copy their tags', () => {
    const tags: Record<string, string> = { service: 'IGreeter' };
    metrics.incrementCounter('experiment_invocations_total', 1, tags);
    tags.service = 'changed';

    expect(metrics.dataPoints).toEqual([
      {
        kind: 'counter',
        name: 'experiment_invocations_total',
        value: 1,
        tags: { service: 'IGreeter' },
        timestamp: Date.parse('2025-01-01T00:00:00.000Z'),
      },
    ]);
  });

  it('should drop everything on clear', () => {
    metrics.incrementCounter('experiment_invocations_total');
    metrics.clear();

    expect(metrics.dataPoints).toHaveLength(0);
  });
});

describe('NoopExperimentMetrics', () => {
  it('should accept every kind of point', () => {
    const metrics = NoopExperimentMetrics.instance;

    expect(() => {
      metrics.incrementCounter('a');
      metrics.recordHistogram('b', 1);
      metrics.setGauge('c', 1);
      metrics.recordSummary('d', 1);
    }).not.toThrow();
  });
});
