/**
 * CloudWatch metrics sink.
 *
 * Recording is synchronous and only buffers; flush() sends the buffer with
 * PutMetricDataCommand in batches. A failed send is logged and its batch is
 * dropped. Tags become dimensions (CloudWatch allows at most 30).
 */

import {
  CloudWatchClient,
  PutMetricDataCommand,
  StandardUnit,
  type MetricDatum,
} from '@aws-sdk/client-cloudwatch';
import { Logger, errorMessage } from '../core/Logger';
import type { Clock } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import type { ExperimentMetrics, MetricDataPoint, MetricKind, MetricTags } from '../../types/MetricsTypes';
import { getAWSClientConfig } from '../../utils/aws-client-config';
import type { EngineConfig } from '../../config/engineConfig';

const MAX_DATUMS_PER_REQUEST = 1000;
const MAX_DIMENSIONS = 30;

export interface CloudWatchMetricsOptions {
  namespace: string;
  region?: string;
  /** Flush automatically once this many points are buffered. */
  maxBufferSize?: number;
  clock?: Clock;
}

export class CloudWatchExperimentMetrics implements ExperimentMetrics {
  private readonly client: CloudWatchClient;
  private readonly namespace: string;
  private readonly maxBufferSize: number;
  private readonly clock: Clock;
  private buffer: MetricDataPoint[] = [];
  private inFlight: Promise<void> = Promise.resolve();

  static fromConfig(
    logger: Logger,
    config: EngineConfig,
    options: Omit<CloudWatchMetricsOptions, 'namespace' | 'region'> = {}
  ): CloudWatchExperimentMetrics {
    return new CloudWatchExperimentMetrics(logger, {
      ...options,
      namespace: config.metricsNamespace,
      region: config.region,
    });
  }

  constructor(
    private readonly logger: Logger,
    options: CloudWatchMetricsOptions
  ) {
    this.namespace = options.namespace;
    this.maxBufferSize = options.maxBufferSize ?? 500;
    this.clock = options.clock ?? systemClock;
    this.client = new CloudWatchClient(getAWSClientConfig(options.region));
  }

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

  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Send everything buffered so far. Never rejects.
   */
  flush(): Promise<void> {
    const batch = this.buffer;
    this.buffer = [];
    this.inFlight = this.inFlight.then(() => this.send(batch));
    return this.inFlight;
  }

  private push(kind: MetricKind, name: string, value: number, tags: MetricTags): void {
    this.buffer.push({ kind, name, value, tags: { ...tags }, timestamp: this.clock.now() });
    if (this.buffer.length >= this.maxBufferSize) {
      this.flush().catch((error: unknown) =>
        this.logger.warn('Background metrics flush failed', { error: errorMessage(error) })
      );
    }
  }

  private async send(points: MetricDataPoint[]): Promise<void> {
    for (let i = 0; i < points.length; i += MAX_DATUMS_PER_REQUEST) {
      const chunk = points.slice(i, i + MAX_DATUMS_PER_REQUEST);
      try {
        await this.client.send(
          new PutMetricDataCommand({
            Namespace: this.namespace,
            MetricData: chunk.map(toDatum),
          })
        );
      } catch (e) {
        this.logger.warn('Failed to emit experiment metrics', {
          namespace: this.namespace,
          dropped: chunk.length,
          error: errorMessage(e),
        });
      }
    }
  }
}

function toDatum(point: MetricDataPoint): MetricDatum {
  const dimensions = Object.entries(point.tags)
    .slice(0, MAX_DIMENSIONS)
    .map(([Name, Value]) => ({ Name, Value }));
  return {
    MetricName: point.name,
    Value: point.value,
    Unit: unitFor(point),
    Timestamp: new Date(point.timestamp),
    Dimensions: dimensions,
  };
}

function unitFor(point: MetricDataPoint): StandardUnit {
  if (point.kind === 'counter') return StandardUnit.Count;
  if (point.name.endsWith('_ms')) return StandardUnit.Milliseconds;
  return StandardUnit.None;
}
