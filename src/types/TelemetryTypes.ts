/**
 * Telemetry scope wrapped around each routed invocation.
 */

export interface TelemetryScope {
  recordSuccess(): void;
  recordFailure(error: Error): void;
  recordFallback(usedKey: string): void;
  recordVariant(variant: string, source: string): void;
  /** Safe to call more than once. */
  dispose(): void;
}

export interface ExperimentTelemetry {
  startInvocation(
    serviceType: string,
    methodName: string,
    selectorName: string,
    preferredKey: string,
    candidateKeys: readonly string[]
  ): TelemetryScope;
}
