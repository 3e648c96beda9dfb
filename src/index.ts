/**
 * trialswitch
 *
 * Per-call routing between registered trial implementations of one service,
 * with fallback cascades, timeouts, circuit breaking and kill switches.
 */

export * from './types/CommonTypes';
export * from './types/ExperimentTypes';
export * from './types/ExperimentErrors';
export * from './types/SelectionTypes';
export * from './types/CircuitBreakerTypes';
export * from './types/KillSwitchTypes';
export * from './types/MetricsTypes';
export * from './types/AuditTypes';
export * from './types/TelemetryTypes';
export * from './types/ConflictTypes';

export { loadEngineConfig, isGlobalStopEngaged, EngineConfigSchema, type EngineConfig } from './config/engineConfig';
export * from './config/registrationConfig';

export { Logger, errorMessage, type LogMeta } from './services/core/Logger';
export { TraceService } from './services/core/TraceService';

export { ActivationEvaluator } from './services/activation/ActivationEvaluator';

export { DefaultNamingConvention } from './services/selection/NamingConvention';
export { selectTrial, stableBucket, stableHash64 } from './services/selection/StickyTrialRouter';
export * from './services/selection/SelectionModeRegistry';
export * from './services/selection/providers/BooleanFeatureFlagProvider';
export * from './services/selection/providers/ConfigurationValueProvider';
export * from './services/selection/providers/StickyRoutingProvider';
export * from './services/selection/providers/RolloutProvider';

export { buildCandidates } from './services/routing/CandidateBuilder';
export * from './services/routing/RegistrationBuilder';
export * from './services/routing/ImplementationResolver';
export * from './services/routing/InvocationRouter';

export { CircuitBreakerService, CIRCUIT_STATE_GAUGE } from './services/resilience/CircuitBreakerService';
export * from './services/resilience/KillSwitchService';
export * from './services/resilience/DynamoKillSwitchProvider';
export { withTimeout, type TimedWork } from './services/resilience/withTimeout';
export { effectiveTrialKey, type AttemptOutcome } from './services/resilience/InvokeWithResilience';

export * from './services/decorators/DecoratorPipeline';
export * from './services/decorators/TimingDecorator';
export * from './services/decorators/ErrorLoggingDecorator';
export * from './services/decorators/MetricsDecorator';

export { NoopExperimentMetrics } from './services/metrics/NoopExperimentMetrics';
export { InMemoryExperimentMetrics } from './services/metrics/InMemoryExperimentMetrics';
export * from './services/metrics/CloudWatchExperimentMetrics';

export { LoggingAuditSink } from './services/audit/LoggingAuditSink';
export { CompositeAuditSink } from './services/audit/CompositeAuditSink';
export { DynamoAuditSink } from './services/audit/DynamoAuditSink';

export { NoopExperimentTelemetry } from './services/telemetry/NoopExperimentTelemetry';
export { LoggingExperimentTelemetry } from './services/telemetry/LoggingExperimentTelemetry';

export { TrialConflictDetector } from './services/validation/TrialConflictDetector';
