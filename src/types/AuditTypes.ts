/**
 * Audit event types:
 * - VARIANT_SELECTED = preferred trial key chosen for a live experiment
 * - FALLBACK_TRIGGERED = a call succeeded on a key other than the preferred one
 * - INVOCATION_FAILED = a call surfaced an error to its caller
 * - EXPERIMENT_DISABLED = a call was refused by the experiment kill switch
 */
export enum AuditEventType {
  VARIANT_SELECTED = 'VARIANT_SELECTED',
  FALLBACK_TRIGGERED = 'FALLBACK_TRIGGERED',
  INVOCATION_FAILED = 'INVOCATION_FAILED',
  EXPERIMENT_DISABLED = 'EXPERIMENT_DISABLED',
}

export interface AuditEvent {
  eventId: string;
  timestamp: string;
  eventType: AuditEventType;
  experimentName?: string;
  serviceType?: string;
  actor?: string;
  selectedTrialKey?: string;
  details?: Record<string, unknown>;
  correlationId?: string;
}

/**
 * Audit sink interface
 */
export interface AuditSink {
  record(event: AuditEvent, signal?: AbortSignal): Promise<void>;
}
