import type { Clock } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import type { ExperimentMetrics, MetricDataPoint, MetricKind, MetricTags } from '../../types/MetricsTypes';

/**
 * Keeps every data point in memory. Counters are summed and gauges keep their
 * last value per (name, tags).
 */
export class InMemoryExperimentMetrics implements ExperimentMetrics {
  private readonly points: MetricDataPoint[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  incrementCounter(name: string, value = 1, tags: MetricTags = {}): void {
    this.push('counter', name, value, tags);
  }

  recordHistogram(name: string, value: number, tags: MetricTags = {}): void {
    this.push('histogram', name, value, tags);
  }

  setGauge(name: string, value: number, tags: MetricTags = {}): void {
    this.push('gauge', name, value, tags);
  }

  recordSummary(name: string, value: number, tags: MetricTags = {}): void {
    this.push('summary', name, value, tags);
  }

  get dataPoints(): readonly MetricDataPoint[] {
    return this.points;
  }

  counter(name: string, tags?: MetricTags): number {
    return this.matching('counter', name, tags).reduce((sum, p) => sum + p.value, 0);
  }

  gauge(name: string, tags?: MetricTags): number | undefined {
    const matches = this.matching('gauge', name, tags);
    return matches.length > 0 ? matches[matches.length - 1].value : undefined;
  }

  values(kind: MetricKind, name: string, tags?: MetricTags): number[] {
    return this.matching(kind, name, tags).map((p) => p.value);
  }

  clear(): void {
    this.points.length = 0;
  }

  private push(kind: MetricKind, name: string, value: number, tags: MetricTags): void {
    this.points.push({ kind, name, value, tags: { ...tags }, timestamp: this.clock.now() });
  }

  /** Points whose tags include every pair in `tags`. */
  private matching(kind: MetricKind, name: string, tags?: MetricTags): MetricDataPoint[] {
    return this.points.filter(
      (p) =>
        p.kind === kind &&
        p.name === name &&
        Object.entries(tags ?? {}).every(([k, v]) => p.tags[k] === v)
    );
  }
}
