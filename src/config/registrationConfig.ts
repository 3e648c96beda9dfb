/**
 * Declarative registration config.
 *
 * A registration described as plain data (already parsed from JSON/YAML by the
 * caller). Trials name implementations; the caller supplies a factory per name.
 */

import { z } from 'zod';
import { CircuitBreakerOptionsSchema } from '../types/CircuitBreakerTypes';
import { RegistrationError } from '../types/ExperimentErrors';
import { TimeoutPolicySchema, type ExperimentDecoratorFactory, type Registration } from '../types/ExperimentTypes';
import type { KillSwitchProvider } from '../types/KillSwitchTypes';
import type { ExperimentMetrics } from '../types/MetricsTypes';
import {
  RegistrationBuilder,
  type RegistrationBuilderOptions,
  type TrialFactory,
} from '../services/routing/RegistrationBuilder';

const ErrorPolicyConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Throw') }),
  z.object({ type: z.literal('RedirectDefault') }),
  z.object({ type: z.literal('RedirectAny') }),
  z.object({ type: z.literal('RedirectSpecific'), fallbackKey: z.string().min(1) }),
  z.object({ type: z.literal('RedirectOrdered'), orderedKeys: z.array(z.string().min(1)).min(1) }),
]);

const SelectionConfigSchema = z
  .object({
    mode: z.enum(['BooleanFeatureFlag', 'ConfigurationValue', 'StickyRouting', 'Custom']).default('BooleanFeatureFlag'),
    modeIdentifier: z.string().min(1).optional(),
    selectorName: z.string().optional(),
  })
  .refine((s) => s.mode !== 'Custom' || s.modeIdentifier !== undefined, {
    message: 'modeIdentifier is required for Custom mode',
    path: ['modeIdentifier'],
  });

export const RegistrationConfigSchema = z.object({
  serviceType: z.string().min(1),
  name: z.string().min(1).optional(),
  trials: z
    .array(
      z.object({
        key: z.string().min(1),
        implementation: z.string().min(1),
      })
    )
    .min(1),
  /** Default key; the first trial when omitted. */
  control: z.string().min(1).optional(),
  selection: SelectionConfigSchema.default({}),
  errorPolicy: ErrorPolicyConfigSchema.default({ type: 'Throw' }),
  activeFrom: z.string().datetime({ offset: true }).optional(),
  activeUntil: z.string().datetime({ offset: true }).optional(),
  timeout: TimeoutPolicySchema.optional(),
  circuitBreaker: CircuitBreakerOptionsSchema.optional(),
});

export type RegistrationConfigInput = z.input<typeof RegistrationConfigSchema>;
export type RegistrationConfig = z.output<typeof RegistrationConfigSchema>;

export interface RegistrationFromConfigOptions extends RegistrationBuilderOptions {
  killSwitch?: KillSwitchProvider;
  metricsSink?: ExperimentMetrics;
  decorators?: readonly ExperimentDecoratorFactory[];
}

export function parseRegistrationConfig(input: unknown): RegistrationConfig {
  const parsed = RegistrationConfigSchema.safeParse(input);
  if (!parsed.success) {
    const serviceType = serviceTypeOf(input);
    const issues = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new RegistrationError(serviceType, issues);
  }
  return parsed.data;
}

export function registrationFromConfig<TService>(
  input: unknown,
  implementations: Readonly<Record<string, TrialFactory<TService>>>,
  options: RegistrationFromConfigOptions = {}
): Registration<TService> {
  const config = parseRegistrationConfig(input);
  const builder = RegistrationBuilder.for<TService>(config.serviceType, options);

  for (const trial of config.trials) {
    const factory = implementations[trial.implementation];
    if (!factory) {
      throw new RegistrationError(
        config.serviceType,
        `unknown implementation '${trial.implementation}' for trial '${trial.key}'`
      );
    }
    if (trial.key === config.control) {
      builder.addControl(trial.key, factory, trial.implementation);
    } else {
      builder.addTrial(trial.key, factory, trial.implementation);
    }
  }
  if (config.control !== undefined && !config.trials.some((t) => t.key === config.control)) {
    throw new RegistrationError(config.serviceType, `control '${config.control}' is not a configured trial`);
  }

  if (config.name) builder.named(config.name);

  const selectorName = config.selection.selectorName ?? '';
  switch (config.selection.mode) {
    case 'BooleanFeatureFlag':
      builder.usingFeatureFlag(selectorName);
      break;
    case 'ConfigurationValue':
      builder.usingConfigurationKey(selectorName);
      break;
    case 'StickyRouting':
      builder.usingStickyRouting(selectorName);
      break;
    case 'Custom':
      builder.usingCustomMode(config.selection.modeIdentifier ?? '', selectorName);
      break;
  }

  const policy = config.errorPolicy;
  switch (policy.type) {
    case 'Throw':
      builder.onErrorThrow();
      break;
    case 'RedirectDefault':
      builder.onErrorRedirectDefault();
      break;
    case 'RedirectAny':
      builder.onErrorRedirectAny();
      break;
    case 'RedirectSpecific':
      builder.onErrorRedirectTo(policy.fallbackKey);
      break;
    case 'RedirectOrdered':
      builder.onErrorTryInOrder(...policy.orderedKeys);
      break;
  }

  if (config.activeFrom) builder.activeFrom(new Date(config.activeFrom));
  if (config.activeUntil) builder.activeUntil(new Date(config.activeUntil));
  if (config.timeout) {
    builder.withTimeout(config.timeout.timeoutMs, config.timeout.action, config.timeout.fallbackTrialKey);
  }
  if (config.circuitBreaker) builder.withCircuitBreaker(config.circuitBreaker);
  if (options.killSwitch) builder.withKillSwitch(options.killSwitch);
  if (options.metricsSink) builder.withMetrics(options.metricsSink);
  for (const decorator of options.decorators ?? []) {
    builder.addDecorator(decorator);
  }

  return builder.build();
}

function serviceTypeOf(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'serviceType' in input && typeof input.serviceType === 'string') {
    return input.serviceType;
  }
  return '<unnamed>';
}
