/**
 * Invocation Router
 *
 * Per call: experiment kill switch, activation, preferred-key selection,
 * candidate cascade, then one resilient attempt per candidate until one
 * succeeds. Telemetry, audit and metrics are reported around the loop; their
 * failures are logged and never change the outcome of the call.
 */

import { Logger, errorMessage } from '../core/Logger';
import { TraceService } from '../core/TraceService';
import type { Clock, InvocationScope, InvokeOptions } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import { AuditEventType, type AuditEvent, type AuditSink } from '../../types/AuditTypes';
import { ExperimentDisabledError, toError } from '../../types/ExperimentErrors';
import type {
  ExperimentDecoratorFactory,
  ImplementationResolver,
  Registration,
  TrialCall,
} from '../../types/ExperimentTypes';
import type { ExperimentTelemetry, TelemetryScope } from '../../types/TelemetryTypes';
import { ActivationEvaluator } from '../activation/ActivationEvaluator';
import { DecoratorPipeline } from '../decorators/DecoratorPipeline';
import { MetricsDecoratorFactory } from '../decorators/MetricsDecorator';
import { invokeWithResilience, type AttemptDeps, type AttemptRequest } from '../resilience/InvokeWithResilience';
import { KillSwitchService } from '../resilience/KillSwitchService';
import { SelectionModeRegistry } from '../selection/SelectionModeRegistry';
import { NoopExperimentTelemetry } from '../telemetry/NoopExperimentTelemetry';
import { buildCandidates } from './CandidateBuilder';
import { DescriptorImplementationResolver } from './ImplementationResolver';

export interface InvocationRouterDeps<TService> {
  logger: Logger;
  selectionRegistry: SelectionModeRegistry;
  resolver?: ImplementationResolver<TService>;
  telemetry?: ExperimentTelemetry;
  auditSink?: AuditSink;
  activationEvaluator?: ActivationEvaluator;
  killSwitchService?: KillSwitchService;
  traceService?: TraceService;
  clock?: Clock;
}

export class InvocationRouter<TService> {
  private readonly logger: Logger;
  private readonly selectionRegistry: SelectionModeRegistry;
  private readonly resolver: ImplementationResolver<TService>;
  private readonly telemetry: ExperimentTelemetry;
  private readonly auditSink?: AuditSink;
  private readonly activation: ActivationEvaluator;
  private readonly killSwitch: KillSwitchService;
  private readonly trace: TraceService;
  private readonly clock: Clock;
  private readonly decoratorFactories: readonly ExperimentDecoratorFactory[];

  constructor(
    readonly registration: Registration<TService>,
    deps: InvocationRouterDeps<TService>
  ) {
    this.logger = deps.logger;
    this.selectionRegistry = deps.selectionRegistry;
    this.resolver = deps.resolver ?? new DescriptorImplementationResolver(registration.trials);
    this.telemetry = deps.telemetry ?? NoopExperimentTelemetry.instance;
    this.auditSink = deps.auditSink;
    this.clock = deps.clock ?? systemClock;
    this.activation = deps.activationEvaluator ?? new ActivationEvaluator(this.logger, this.clock);
    this.killSwitch = deps.killSwitchService ?? new KillSwitchService(this.logger);
    this.trace = deps.traceService ?? new TraceService();

    this.decoratorFactories = registration.metricsSink
      ? [new MetricsDecoratorFactory(registration.metricsSink, this.logger, this.clock), ...registration.decoratorFactories]
      : registration.decoratorFactories;
  }

  get serviceType(): string {
    return this.registration.serviceType;
  }

  /**
   * Route one call. `call` receives the resolved instance and a signal that
   * aborts when the attempt times out or the caller cancels.
   */
  async invoke<R>(
    methodName: string,
    args: readonly unknown[],
    call: TrialCall<TService, R>,
    options: InvokeOptions = {}
  ): Promise<R> {
    const registration = this.registration;
    const scope = this.trace.createScope(options);
    scope.signal?.throwIfAborted();

    if (await this.killSwitch.isExperimentDisabled(registration.serviceType, registration.killSwitch)) {
      this.logger.warn('Experiment disabled by kill switch; refusing call', {
        serviceType: registration.serviceType,
        methodName,
        correlationId: scope.correlationId,
      });
      await this.audit(AuditEventType.EXPERIMENT_DISABLED, scope, { methodName });
      throw new ExperimentDisabledError(registration.serviceType);
    }

    const pipeline = DecoratorPipeline.fromFactories(this.decoratorFactories, scope);
    const request: AttemptRequest<TService, R> = { registration, methodName, args, call, scope, pipeline };
    const deps: AttemptDeps<TService> = { resolver: this.resolver, killSwitch: this.killSwitch, logger: this.logger };

    if (!this.activation.isActive(registration, scope)) {
      this.logger.debug('Experiment inactive; invoking default trial', {
        serviceType: registration.serviceType,
        methodName,
        correlationId: scope.correlationId,
      });
      const outcome = await invokeWithResilience(registration.defaultKey, request, deps);
      if (outcome.kind === 'success') {
        return outcome.value;
      }
      throw outcome.error;
    }

    const selection = await this.selectionRegistry.selectPreferredKey(registration, scope);
    const preferredKey = selection.preferredKey;
    const candidates = buildCandidates(preferredKey, registration);

    const telemetry = this.startTelemetry(methodName, selection.selectorName, preferredKey, candidates);
    this.safely('recordVariant', () =>
      telemetry.recordVariant(preferredKey, selection.source === 'provider' ? registration.modeIdentifier : 'default')
    );
    await this.audit(AuditEventType.VARIANT_SELECTED, scope, {
      methodName,
      selectedTrialKey: preferredKey,
      details: { selectorName: selection.selectorName, source: selection.source, candidates },
    });

    let lastError: Error | undefined;
    try {
      for (const candidateKey of candidates) {
        if (scope.signal?.aborted) {
          lastError = toError(scope.signal.reason);
          break;
        }

        const outcome = await invokeWithResilience(candidateKey, request, deps);
        if (outcome.kind === 'success') {
          this.safely('recordSuccess', () => telemetry.recordSuccess());
          if (outcome.trialKey !== preferredKey) {
            this.safely('recordFallback', () => telemetry.recordFallback(outcome.trialKey));
            await this.audit(AuditEventType.FALLBACK_TRIGGERED, scope, {
              methodName,
              selectedTrialKey: outcome.trialKey,
              details: { preferredKey, candidateKey },
            });
          }
          return outcome.value;
        }

        lastError = outcome.error;
        if (outcome.terminal || registration.errorPolicy.kind === 'Throw') {
          break;
        }
        this.logger.info('Candidate failed; trying next candidate', {
          serviceType: registration.serviceType,
          methodName,
          candidateKey,
          correlationId: scope.correlationId,
        });
      }

      const error = lastError ?? new Error(`No candidate succeeded for ${registration.serviceType}.${methodName}`);
      this.safely('recordFailure', () => telemetry.recordFailure(error));
      await this.audit(AuditEventType.INVOCATION_FAILED, scope, {
        methodName,
        selectedTrialKey: preferredKey,
        details: { errorName: error.name, error: error.message },
      });
      throw error;
    } finally {
      this.safely('dispose', () => telemetry.dispose());
    }
  }

  private startTelemetry(
    methodName: string,
    selectorName: string,
    preferredKey: string,
    candidates: readonly string[]
  ): TelemetryScope {
    try {
      return this.telemetry.startInvocation(
        this.registration.serviceType,
        methodName,
        selectorName,
        preferredKey,
        candidates
      );
    } catch (error) {
      this.logger.warn('Telemetry startInvocation failed', {
        serviceType: this.registration.serviceType,
        error: errorMessage(error),
      });
      return NoopExperimentTelemetry.instance.startInvocation();
    }
  }

  private safely(operation: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.warn('Telemetry call failed', {
        serviceType: this.registration.serviceType,
        operation,
        error: errorMessage(error),
      });
    }
  }

  private async audit(
    eventType: AuditEventType,
    scope: InvocationScope,
    fields: { methodName: string; selectedTrialKey?: string; details?: Record<string, unknown> }
  ): Promise<void> {
    if (!this.auditSink) return;
    const event: AuditEvent = {
      eventId: this.trace.generateEventId(),
      timestamp: new Date(this.clock.now()).toISOString(),
      eventType,
      experimentName: this.registration.experimentName ?? this.registration.serviceType,
      serviceType: this.registration.serviceType,
      selectedTrialKey: fields.selectedTrialKey,
      correlationId: scope.correlationId,
      details: { methodName: fields.methodName, ...fields.details },
    };
    try {
      await this.auditSink.record(event, scope.signal);
    } catch (error) {
      this.logger.warn('Failed to record audit event', {
        serviceType: this.registration.serviceType,
        eventType,
        correlationId: scope.correlationId,
        error: errorMessage(error),
      });
    }
  }
}
