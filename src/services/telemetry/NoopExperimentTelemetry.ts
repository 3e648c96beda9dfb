import type { ExperimentTelemetry, TelemetryScope } from '../../types/TelemetryTypes';

const NOOP_SCOPE: TelemetryScope = Object.freeze({
  recordSuccess: () => undefined,
  recordFailure: () => undefined,
  recordFallback: () => undefined,
  recordVariant: () => undefined,
  dispose: () => undefined,
});

export class NoopExperimentTelemetry implements ExperimentTelemetry {
  static readonly instance = new NoopExperimentTelemetry();

  startInvocation(): TelemetryScope {
    return NOOP_SCOPE;
  }
}
