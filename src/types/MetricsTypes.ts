/**
 * Metrics sink contract. Tags are an unordered set of string key/value pairs.
 */

export type MetricTags = Readonly<Record<string, string>>;

export interface ExperimentMetrics {
  incrementCounter(name: string, value?: number, tags?: MetricTags): void;
  recordHistogram(name: string, value: number, tags?: MetricTags): void;
  setGauge(name: string, value: number, tags?: MetricTags): void;
  recordSummary(name: string, value: number, tags?: MetricTags): void;
}

export type MetricKind = 'counter' | 'histogram' | 'gauge' | 'summary';

export interface MetricDataPoint {
  kind: MetricKind;
  name: string;
  value: number;
  tags: MetricTags;
  timestamp: number;
}
