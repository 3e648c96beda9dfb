import { DynamoDBDocumentClient, PutCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { Logger, errorMessage } from '../core/Logger';
import type { AuditEvent, AuditSink } from '../../types/AuditTypes';
import { getAWSClientConfig } from '../../utils/aws-client-config';
import type { EngineConfig } from '../../config/engineConfig';

/**
 * DynamoAuditSink - append-only audit trail
 *
 * Key: pk EXPERIMENT#<experimentName or serviceType>, sk EVENT#<timestamp>#<eventId>.
 * gsi1 indexes events by correlation id. Existing events are never overwritten.
 */
export class DynamoAuditSink implements AuditSink {
  private readonly dynamoClient: DynamoDBDocumentClient;

  static fromConfig(logger: Logger, config: EngineConfig): DynamoAuditSink {
    if (!config.auditTableName) {
      throw new Error('EXPERIMENT_AUDIT_TABLE environment variable is required');
    }
    return new DynamoAuditSink(logger, config.auditTableName, config.region);
  }

  constructor(
    private readonly logger: Logger,
    private readonly tableName: string,
    region?: string
  ) {
    const client = new DynamoDBClient(getAWSClientConfig(region));
    this.dynamoClient = DynamoDBDocumentClient.from(client, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });
  }

  async record(event: AuditEvent, signal?: AbortSignal): Promise<void> {
    const partition = event.experimentName ?? event.serviceType ?? 'unknown';
    try {
      await this.dynamoClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            ...event,
            pk: `EXPERIMENT#${partition}`,
            sk: `EVENT#${event.timestamp}#${event.eventId}`,
            ...(event.correlationId
              ? { gsi1pk: `CORRELATION#${event.correlationId}`, gsi1sk: event.timestamp }
              : {}),
          },
          ConditionExpression: 'attribute_not_exists(eventId)',
        }),
        { abortSignal: signal }
      );
      this.logger.debug('Audit event stored', { eventId: event.eventId, eventType: event.eventType });
    } catch (error) {
      this.logger.error('Failed to store audit event', {
        eventId: event.eventId,
        eventType: event.eventType,
        error: errorMessage(error),
      });
      throw error;
    }
  }
}
