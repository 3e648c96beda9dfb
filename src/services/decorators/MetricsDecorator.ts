/**
 * Per-attempt metrics:
 * experiment_invocations_total, experiment_success_total, experiment_errors_total
 * (counters) and experiment_duration_ms (histogram), tagged service/method/trial_key.
 * Sink failures are logged and never change the attempt's outcome.
 */

import { Logger, errorMessage } from '../core/Logger';
import type { Clock } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import type { ExperimentMetrics, MetricTags } from '../../types/MetricsTypes';
import type {
  ExperimentDecorator,
  ExperimentDecoratorFactory,
  InvocationContext,
} from '../../types/ExperimentTypes';

export const METRIC_INVOCATIONS = 'experiment_invocations_total';
export const METRIC_SUCCESS = 'experiment_success_total';
export const METRIC_ERRORS = 'experiment_errors_total';
export const METRIC_DURATION = 'experiment_duration_ms';

export class MetricsDecorator implements ExperimentDecorator {
  constructor(
    private readonly metrics: ExperimentMetrics,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  async invoke<R>(context: InvocationContext, next: () => Promise<R>): Promise<R> {
    const tags: MetricTags = {
      service: context.serviceType,
      method: context.methodName,
      trial_key: context.trialKey,
    };
    const start = this.clock.now();
    this.emit(context, () => this.metrics.incrementCounter(METRIC_INVOCATIONS, 1, tags));

    try {
      const result = await next();
      if (!context.signal.aborted) {
        this.emit(context, () => {
          this.metrics.incrementCounter(METRIC_SUCCESS, 1, tags);
          this.metrics.recordHistogram(METRIC_DURATION, this.clock.now() - start, tags);
        });
      }
      return result;
    } catch (error) {
      if (!context.signal.aborted) {
        this.emit(context, () => {
          this.metrics.incrementCounter(METRIC_ERRORS, 1, {
            ...tags,
            error_type: error instanceof Error ? error.name : 'unknown',
          });
          this.metrics.recordHistogram(METRIC_DURATION, this.clock.now() - start, tags);
        });
      }
      throw error;
    }
  }

  private emit(context: InvocationContext, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.warn('Failed to record experiment metrics', {
        serviceType: context.serviceType,
        trialKey: context.trialKey,
        error: errorMessage(error),
      });
    }
  }
}

export class MetricsDecoratorFactory implements ExperimentDecoratorFactory {
  constructor(
    private readonly metrics: ExperimentMetrics,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  create(): ExperimentDecorator {
    return new MetricsDecorator(this.metrics, this.logger, this.clock);
  }
}
