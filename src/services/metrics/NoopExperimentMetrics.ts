import type { ExperimentMetrics } from '../../types/MetricsTypes';

export class NoopExperimentMetrics implements ExperimentMetrics {
  static readonly instance: ExperimentMetrics = new NoopExperimentMetrics();

  incrementCounter(): void {}

  recordHistogram(): void {}

  setGauge(): void {}

  recordSummary(): void {}
}
