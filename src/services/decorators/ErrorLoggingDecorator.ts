import { Logger, errorMessage } from '../core/Logger';
import type {
  ExperimentDecorator,
  ExperimentDecoratorFactory,
  InvocationContext,
} from '../../types/ExperimentTypes';

/**
 * Logs a failed attempt and rethrows the same error
 */
export class ErrorLoggingDecorator implements ExperimentDecorator {
  constructor(private readonly logger: Logger) {}

  async invoke<R>(context: InvocationContext, next: () => Promise<R>): Promise<R> {
    try {
      return await next();
    } catch (error) {
      this.logger.error('Trial invocation failed', {
        serviceType: context.serviceType,
        methodName: context.methodName,
        trialKey: context.trialKey,
        correlationId: context.scope.correlationId,
        errorName: error instanceof Error ? error.name : typeof error,
        error: errorMessage(error),
      });
      throw error;
    }
  }
}

export class ErrorLoggingDecoratorFactory implements ExperimentDecoratorFactory {
  constructor(private readonly logger: Logger) {}

  create(): ExperimentDecorator {
    return new ErrorLoggingDecorator(this.logger);
  }
}
