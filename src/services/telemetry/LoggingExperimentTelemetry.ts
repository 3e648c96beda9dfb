import { Logger } from '../core/Logger';
import type { Clock } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import type { ExperimentTelemetry, TelemetryScope } from '../../types/TelemetryTypes';

type Outcome = 'success' | 'failure' | 'unknown';

/**
 * One summary log line per invocation, written on the first dispose()
 */
class LoggingTelemetryScope implements TelemetryScope {
  private outcome: Outcome = 'unknown';
  private errorText?: string;
  private fallbackKey?: string;
  private variant?: { name: string; source: string };
  private disposed = false;
  private readonly startedAt: number;

  constructor(
    private readonly logger: Logger,
    private readonly clock: Clock,
    private readonly fields: {
      serviceType: string;
      methodName: string;
      selectorName: string;
      preferredKey: string;
      candidateKeys: readonly string[];
    }
  ) {
    this.startedAt = clock.now();
  }

  recordSuccess(): void {
    this.outcome = 'success';
  }

  recordFailure(error: Error): void {
    this.outcome = 'failure';
    this.errorText = `${error.name}: ${error.message}`;
  }

  recordFallback(usedKey: string): void {
    this.fallbackKey = usedKey;
  }

  recordVariant(variant: string, source: string): void {
    this.variant = { name: variant, source };
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const meta = {
      serviceType: this.fields.serviceType,
      methodName: this.fields.methodName,
      selectorName: this.fields.selectorName,
      preferredKey: this.fields.preferredKey,
      candidateKeys: [...this.fields.candidateKeys],
      outcome: this.outcome,
      durationMs: this.clock.now() - this.startedAt,
      ...(this.fallbackKey !== undefined ? { fallbackKey: this.fallbackKey } : {}),
      ...(this.variant ? { variant: this.variant.name, variantSource: this.variant.source } : {}),
      ...(this.errorText ? { error: this.errorText } : {}),
    };

    if (this.outcome === 'failure') {
      this.logger.warn('Experiment invocation failed', meta);
    } else {
      this.logger.info('Experiment invocation completed', meta);
    }
  }
}

export class LoggingExperimentTelemetry implements ExperimentTelemetry {
  constructor(
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  startInvocation(
    serviceType: string,
    methodName: string,
    selectorName: string,
    preferredKey: string,
    candidateKeys: readonly string[]
  ): TelemetryScope {
    return new LoggingTelemetryScope(this.logger, this.clock, {
      serviceType,
      methodName,
      selectorName,
      preferredKey,
      candidateKeys,
    });
  }
}
