import { Logger } from '../core/Logger';
import type { Clock } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import type {
  ExperimentDecorator,
  ExperimentDecoratorFactory,
  InvocationContext,
} from '../../types/ExperimentTypes';

export interface TimingRecord {
  serviceType: string;
  methodName: string;
  trialKey: string;
  elapsedMs: number;
  success: boolean;
}

export type TimingReporter = (record: TimingRecord) => void;

/**
 * Measures each attempt and hands the elapsed time to a reporter (debug log by default).
 * Abandoned attempts are not reported.
 */
export class TimingDecorator implements ExperimentDecorator {
  constructor(
    private readonly report: TimingReporter,
    private readonly clock: Clock = systemClock
  ) {}

  async invoke<R>(context: InvocationContext, next: () => Promise<R>): Promise<R> {
    const start = this.clock.now();
    let success = false;
    try {
      const result = await next();
      success = true;
      return result;
    } finally {
      if (!context.signal.aborted) {
        this.report({
          serviceType: context.serviceType,
          methodName: context.methodName,
          trialKey: context.trialKey,
          elapsedMs: this.clock.now() - start,
          success,
        });
      }
    }
  }
}

export class TimingDecoratorFactory implements ExperimentDecoratorFactory {
  private readonly report: TimingReporter;

  constructor(reporterOrLogger: TimingReporter | Logger, private readonly clock: Clock = systemClock) {
    if (reporterOrLogger instanceof Logger) {
      const logger = reporterOrLogger;
      this.report = (record) => logger.debug('Trial invocation timed', { ...record });
    } else {
      this.report = reporterOrLogger;
    }
  }

  create(): ExperimentDecorator {
    return new TimingDecorator(this.report, this.clock);
  }
}
