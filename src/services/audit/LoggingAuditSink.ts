import { Logger } from '../core/Logger';
import type { AuditEvent, AuditSink } from '../../types/AuditTypes';

/**
 * Writes each audit event as one info line
 */
export class LoggingAuditSink implements AuditSink {
  constructor(private readonly logger: Logger) {}

  async record(event: AuditEvent): Promise<void> {
    this.logger.info(`Experiment audit: ${event.eventType}`, {
      eventId: event.eventId,
      timestamp: event.timestamp,
      experimentName: event.experimentName,
      serviceType: event.serviceType,
      selectedTrialKey: event.selectedTrialKey,
      correlationId: event.correlationId,
      ...(event.details ? { details: event.details } : {}),
    });
  }
}
