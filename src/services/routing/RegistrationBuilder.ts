/**
 * Registration Builder
 *
 * Fluent, mutable while building; build() validates everything and returns a
 * frozen Registration. The circuit breaker instance is created here, so it
 * lives exactly as long as the registration.
 */

import { Logger } from '../core/Logger';
import type { Clock, InvocationScope, MaybePromise } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import {
  CircuitBreakerOptionsSchema,
  type CircuitBreakerOptionsInput,
} from '../../types/CircuitBreakerTypes';
import { RegistrationError } from '../../types/ExperimentErrors';
import {
  TimeoutPolicySchema,
  type ActivationPredicate,
  type ErrorPolicy,
  type ExperimentDecorator,
  type ExperimentDecoratorFactory,
  type Registration,
  type TimeoutAction,
  type TimeoutPolicy,
  type TrialDescriptor,
} from '../../types/ExperimentTypes';
import type { KillSwitchProvider } from '../../types/KillSwitchTypes';
import type { ExperimentMetrics } from '../../types/MetricsTypes';
import { SelectionModes, type SelectionMode } from '../../types/SelectionTypes';
import { CircuitBreakerService } from '../resilience/CircuitBreakerService';

export type TrialFactory<TService> = (scope: InvocationScope) => MaybePromise<TService>;

export interface RegistrationBuilderOptions {
  logger?: Logger;
  clock?: Clock;
}

export class RegistrationBuilder<TService> {
  private readonly trials = new Map<string, TrialDescriptor<TService>>();
  private defaultKey?: string;
  private experimentName?: string;
  private selectionMode: SelectionMode = 'BooleanFeatureFlag';
  private modeIdentifier: string = SelectionModes.BooleanFeatureFlag;
  private selectorName = '';
  private errorPolicy: ErrorPolicy = { kind: 'Throw' };
  private startTime?: Date;
  private endTime?: Date;
  private activationPredicate?: ActivationPredicate;
  private timeoutInput?: { timeoutMs: number; action?: TimeoutAction; fallbackTrialKey?: string };
  private circuitBreakerInput?: CircuitBreakerOptionsInput;
  private killSwitch?: KillSwitchProvider;
  private metricsSink?: ExperimentMetrics;
  private readonly decoratorFactories: ExperimentDecoratorFactory[] = [];
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly serviceType: string,
    options: RegistrationBuilderOptions = {}
  ) {
    this.logger = options.logger ?? new Logger('RegistrationBuilder');
    this.clock = options.clock ?? systemClock;
  }

  static for<TService>(serviceType: string, options?: RegistrationBuilderOptions): RegistrationBuilder<TService> {
    return new RegistrationBuilder<TService>(serviceType, options);
  }

  /**
   * Add the control trial; it becomes the default key
   */
  addControl(key: string, create: TrialFactory<TService>, implementationName?: string): this {
    this.addTrial(key, create, implementationName);
    this.defaultKey = key;
    return this;
  }

  addTrial(key: string, create: TrialFactory<TService>, implementationName?: string): this {
    if (!key) {
      throw new RegistrationError(this.serviceType, 'trial key must be non-empty');
    }
    if (this.trials.has(key)) {
      throw new RegistrationError(this.serviceType, `duplicate trial key '${key}'`);
    }
    this.trials.set(key, Object.freeze({ key, create, implementationName }));
    return this;
  }

  named(experimentName: string): this {
    this.experimentName = experimentName;
    return this;
  }

  usingFeatureFlag(flagName = ''): this {
    return this.usingMode('BooleanFeatureFlag', SelectionModes.BooleanFeatureFlag, flagName);
  }

  usingConfigurationKey(configurationKey = ''): this {
    return this.usingMode('ConfigurationValue', SelectionModes.ConfigurationValue, configurationKey);
  }

  usingStickyRouting(selectorName = ''): this {
    return this.usingMode('StickyRouting', SelectionModes.StickyRouting, selectorName);
  }

  usingCustomMode(modeIdentifier: string, selectorName = ''): this {
    if (!modeIdentifier) {
      throw new RegistrationError(this.serviceType, 'custom mode identifier must be non-empty');
    }
    return this.usingMode('Custom', modeIdentifier, selectorName);
  }

  onErrorThrow(): this {
    this.errorPolicy = { kind: 'Throw' };
    return this;
  }

  onErrorRedirectDefault(): this {
    this.errorPolicy = { kind: 'RedirectDefault' };
    return this;
  }

  onErrorRedirectAny(): this {
    this.errorPolicy = { kind: 'RedirectAny' };
    return this;
  }

  onErrorRedirectTo(fallbackKey: string): this {
    this.errorPolicy = { kind: 'RedirectSpecific', fallbackKey };
    return this;
  }

  onErrorTryInOrder(...orderedKeys: string[]): this {
    if (orderedKeys.length === 0) {
      throw new RegistrationError(this.serviceType, 'onErrorTryInOrder requires at least one key');
    }
    this.errorPolicy = { kind: 'RedirectOrdered', orderedKeys: Object.freeze([...orderedKeys]) };
    return this;
  }

  activeFrom(start: Date): this {
    this.startTime = start;
    return this;
  }

  activeUntil(end: Date): this {
    this.endTime = end;
    return this;
  }

  activeDuring(start: Date, end: Date): this {
    return this.activeFrom(start).activeUntil(end);
  }

  activeWhen(predicate: ActivationPredicate): this {
    this.activationPredicate = predicate;
    return this;
  }

  withTimeout(timeoutMs: number, action: TimeoutAction = 'ThrowException', fallbackTrialKey?: string): this {
    this.timeoutInput = { timeoutMs, action, fallbackTrialKey };
    return this;
  }

  withCircuitBreaker(options: CircuitBreakerOptionsInput = {}): this {
    this.circuitBreakerInput = options;
    return this;
  }

  withKillSwitch(provider: KillSwitchProvider): this {
    this.killSwitch = provider;
    return this;
  }

  withMetrics(sink: ExperimentMetrics): this {
    this.metricsSink = sink;
    return this;
  }

  addDecorator(factory: ExperimentDecoratorFactory | ((scope: InvocationScope) => ExperimentDecorator)): this {
    this.decoratorFactories.push(typeof factory === 'function' ? { create: factory } : factory);
    return this;
  }

  build(): Registration<TService> {
    if (this.trials.size === 0) {
      throw new RegistrationError(this.serviceType, 'at least one trial is required');
    }
    const first = this.trials.keys().next();
    const defaultKey = this.defaultKey ?? (first.done ? '' : first.value);
    if (!this.trials.has(defaultKey)) {
      throw new RegistrationError(this.serviceType, `default key '${defaultKey}' is not a registered trial`);
    }
    if (this.startTime && this.endTime && this.startTime.getTime() > this.endTime.getTime()) {
      throw new RegistrationError(this.serviceType, 'startTime must not be after endTime');
    }

    const timeout = this.parseTimeout();
    const circuitBreaker = this.createCircuitBreaker();

    const registration: Registration<TService> = {
      serviceType: this.serviceType,
      experimentName: this.experimentName,
      trials: new FrozenMap(this.trials),
      defaultKey,
      selectionMode: this.selectionMode,
      modeIdentifier: this.modeIdentifier,
      selectorName: this.selectorName,
      errorPolicy: Object.freeze({ ...this.errorPolicy }),
      startTime: this.startTime ? new Date(this.startTime.getTime()) : undefined,
      endTime: this.endTime ? new Date(this.endTime.getTime()) : undefined,
      activationPredicate: this.activationPredicate,
      timeout,
      circuitBreaker,
      killSwitch: this.killSwitch,
      metricsSink: this.metricsSink,
      decoratorFactories: Object.freeze([...this.decoratorFactories]),
    };
    return Object.freeze(registration);
  }

  private usingMode(mode: SelectionMode, modeIdentifier: string, selectorName: string): this {
    this.selectionMode = mode;
    this.modeIdentifier = modeIdentifier;
    this.selectorName = selectorName;
    return this;
  }

  private parseTimeout(): TimeoutPolicy | undefined {
    if (!this.timeoutInput) return undefined;
    const parsed = TimeoutPolicySchema.safeParse(this.timeoutInput);
    if (!parsed.success) {
      throw new RegistrationError(this.serviceType, `invalid timeout: ${formatIssues(parsed.error.issues)}`);
    }
    return Object.freeze(parsed.data);
  }

  private createCircuitBreaker(): CircuitBreakerService | undefined {
    if (!this.circuitBreakerInput) return undefined;
    const parsed = CircuitBreakerOptionsSchema.safeParse(this.circuitBreakerInput);
    if (!parsed.success) {
      throw new RegistrationError(this.serviceType, `invalid circuit breaker options: ${formatIssues(parsed.error.issues)}`);
    }
    return new CircuitBreakerService(
      this.serviceType,
      parsed.data,
      this.logger.child('CircuitBreakerService', { serviceType: this.serviceType }),
      this.clock,
      this.metricsSink
    );
  }
}

/**
 * Read-only map: mutators throw
 */
class FrozenMap<K, V> extends Map<K, V> {
  private sealed = false;

  constructor(entries: Iterable<readonly [K, V]>) {
    super(entries);
    this.sealed = true;
  }

  override set(key: K, value: V): this {
    if (this.sealed) throw new TypeError('Registration trials are read-only');
    return super.set(key, value);
  }

  override delete(): boolean {
    throw new TypeError('Registration trials are read-only');
  }

  override clear(): void {
    throw new TypeError('Registration trials are read-only');
  }
}

function formatIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}
