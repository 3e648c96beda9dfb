import { RegistrationBuilder } from '../../../services/routing/RegistrationBuilder';
import { CircuitBreakerService } from '../../../services/resilience/CircuitBreakerService';
import { InMemoryKillSwitchProvider } from '../../../services/resilience/KillSwitchService';
import { InMemoryExperimentMetrics } from '../../../services/metrics/InMemoryExperimentMetrics';
import { RegistrationError } from '../../../types/ExperimentErrors';
import type { ExperimentDecorator } from '../../../types/ExperimentTypes';

interface IGreeter {
  greet(name: string): string;
}

const formal: IGreeter = { greet: (name) => `Good day, ${name}.` };
const casual: IGreeter = { greet: (name) => `Hey ${name}!` };

describe('RegistrationBuilder', () => {
  function builder(): RegistrationBuilder<IGreeter> {
    return RegistrationBuilder.for<IGreeter>('IGreeter');
  }

  it('should build with the control as default and boolean flag selection', () => {
    const registration = builder().addTrial('casual', () => casual).addControl('formal', () => formal).build();

    expect(registration.defaultKey).toBe('formal');
    expect(Array.from(registration.trials.keys())).toEqual(['casual', 'formal']);
    expect(registration.selectionMode).toBe('BooleanFeatureFlag');
    expect(registration.modeIdentifier).toBe('BooleanFeatureFlag');
    expect(registration.selectorName).toBe('');
    expect(registration.errorPolicy).toEqual({ kind: 'Throw' });
  });

  it('should use the first trial as default when no control is added', () => {
    const registration = builder().addTrial('casual', () => casual).addTrial('formal', () => formal).build();

    expect(registration.defaultKey).toBe('casual');
  });

  it('should reject a build without trials', () => {
    expect(() => builder().build()).toThrow('Invalid registration for IGreeter: at least one trial is required');
  });

  it('should reject duplicate and empty trial keys', () => {
    expect(() => builder().addTrial('formal', () => formal).addTrial('formal', () => casual)).toThrow(
      "duplicate trial key 'formal'"
    );
    expect(() => builder().addTrial('', () => formal)).toThrow(RegistrationError);
  });

  it('should reject an inverted time window', () => {
    const start = new Date('2025-06-01T00:00:00.000Z');
    const end = new Date('2025-05-01T00:00:00.000Z');

    expect(() => builder().addControl('formal', () => formal).activeDuring(start, end).build()).toThrow(
      'startTime must not be after endTime'
    );
  });

  it('should copy the time window so later edits to the dates have no effect', () => {
    const start = new Date('2025-01-01T00:00:00.000Z');
    const registration = builder().addControl('formal', () => formal).activeFrom(start).build();

    start.setUTCFullYear(2030);

    expect(registration.startTime?.toISOString()).toBe('2025-01-01T00:00:00.000Z');
  });

  it('should record each selection mode with its selector name', () => {
    const base = () => builder().addControl('formal', () => formal);

    expect(base().usingConfigurationKey('Greeter:Style').build()).toMatchObject({
      selectionMode: 'ConfigurationValue',
      modeIdentifier: 'ConfigurationValue',
      selectorName: 'Greeter:Style',
    });
    expect(base().usingStickyRouting().build()).toMatchObject({
      selectionMode: 'StickyRouting',
      modeIdentifier: 'StickyRouting',
      selectorName: '',
    });
    expect(base().usingCustomMode('Tenant', 'tenants').build()).toMatchObject({
      selectionMode: 'Custom',
      modeIdentifier: 'Tenant',
      selectorName: 'tenants',
    });
  });

  it('should reject an empty custom mode identifier', () => {
    expect(() => builder().usingCustomMode('')).toThrow('custom mode identifier must be non-empty');
  });

  it('should record error policies', () => {
    const base = () => builder().addControl('formal', () => formal).addTrial('casual', () => casual);

    expect(base().onErrorRedirectDefault().build().errorPolicy).toEqual({ kind: 'RedirectDefault' });
    expect(base().onErrorRedirectAny().build().errorPolicy).toEqual({ kind: 'RedirectAny' });
    expect(base().onErrorRedirectTo('formal').build().errorPolicy).toEqual({
      kind: 'RedirectSpecific',
      fallbackKey: 'formal',
    });
    expect(base().onErrorTryInOrder('casual', 'formal').build().errorPolicy).toEqual({
      kind: 'RedirectOrdered',
      orderedKeys: ['casual', 'formal'],
    });
  });

  it('should require at least one ordered key', () => {
    expect(() => builder().onErrorTryInOrder()).toThrow('onErrorTryInOrder requires at least one key');
  });

  it('should validate the timeout policy', () => {
    const registration = builder().addControl('formal', () => formal).withTimeout(250).build();

    expect(registration.timeout).toEqual({ timeoutMs: 250, action: 'ThrowException' });
    expect(() => builder().addControl('formal', () => formal).withTimeout(0).build()).toThrow('invalid timeout');
    expect(() =>
      builder().addControl('formal', () => formal).withTimeout(100, 'FallbackToSpecificTrial').build()
    ).toThrow('fallbackTrialKey is required when action is FallbackToSpecificTrial');
  });

  it('should create a circuit breaker with defaults filled in', () => {
    const registration = builder()
      .addControl('formal', () => formal)
      .withCircuitBreaker({ minimumThroughput: 4 })
      .build();

    expect(registration.circuitBreaker).toBeInstanceOf(CircuitBreakerService);
    expect(registration.circuitBreaker?.options).toEqual({
      failureRatio: 0.5,
      minimumThroughput: 4,
      samplingDurationMs: 10_000,
      breakDurationMs: 30_000,
      onCircuitOpen: 'ThrowException',
    });
    expect(registration.circuitBreaker?.getState()).toBe('CLOSED');
  });

  it('should reject invalid circuit breaker options', () => {
    expect(() =>
      builder().addControl('formal', () => formal).withCircuitBreaker({ failureRatio: 1.5 }).build()
    ).toThrow('invalid circuit breaker options: failureRatio');
  });

  it('should give each built registration its own circuit breaker', () => {
    const b = builder().addControl('formal', () => formal).withCircuitBreaker();

    expect(b.build().circuitBreaker).not.toBe(b.build().circuitBreaker);
  });

  it('should carry the kill switch, metrics sink and decorators', () => {
    const killSwitch = new InMemoryKillSwitchProvider();
    const metrics = new InMemoryExperimentMetrics();
    const decorator: ExperimentDecorator = { invoke: (_context, next) => next() };

    const registration = builder()
      .addControl('formal', () => formal)
      .named('greeting-tone')
      .withKillSwitch(killSwitch)
      .withMetrics(metrics)
      .addDecorator(() => decorator)
      .build();

    expect(registration.experimentName).toBe('greeting-tone');
    expect(registration.killSwitch).toBe(killSwitch);
    expect(registration.metricsSink).toBe(metrics);
    expect(registration.decoratorFactories).toHaveLength(1);
    expect(registration.decoratorFactories[0].create({ correlationId: 'call-test', attributes: {} })).toBe(decorator);
  });

  it('should freeze the registration and its trials', () => {
    const registration = builder().addControl('formal', () => formal).build();

    expect(Object.isFrozen(registration)).toBe(true);
    const trials = registration.trials;
    expect(trials instanceof Map).toBe(true);
    if (trials instanceof Map) {
      expect(() => trials.set('casual', { key: 'casual', create: () => casual })).toThrow(
        'Registration trials are read-only'
      );
      expect(() => trials.delete('formal')).toThrow('Registration trials are read-only');
    }
  });
});
