/**
 * DynamoDB-backed kill switch.
 *
 * One item per service type: pk EXPERIMENT#<serviceType>, sk KILL_SWITCH,
 * attributes experiment_disabled (bool) and disabled_trial_keys (string set).
 * Reads are cached in-process for cacheTtlMs; a failed read is logged and
 * treated as "nothing disabled". Writes invalidate the local cache entry and
 * propagate their errors.
 */

import { DynamoDBDocumentClient, GetCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { z } from 'zod';
import { Logger, errorMessage } from '../core/Logger';
import type { Clock } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import type { KillSwitchProvider } from '../../types/KillSwitchTypes';
import { getAWSClientConfig } from '../../utils/aws-client-config';
import type { EngineConfig } from '../../config/engineConfig';

const KillSwitchItemSchema = z.object({
  experiment_disabled: z.boolean().optional(),
  disabled_trial_keys: z.union([z.set(z.string()), z.array(z.string())]).optional(),
});

export interface KillSwitchRecord {
  experimentDisabled: boolean;
  disabledTrialKeys: ReadonlySet<string>;
}

export interface DynamoKillSwitchOptions {
  region?: string;
  /** 0 disables caching. */
  cacheTtlMs?: number;
  clock?: Clock;
}

const EMPTY_RECORD: KillSwitchRecord = Object.freeze({
  experimentDisabled: false,
  disabledTrialKeys: new Set<string>(),
});

export class DynamoKillSwitchProvider implements KillSwitchProvider {
  private readonly pkPrefix = 'EXPERIMENT#';
  private readonly skKillSwitch = 'KILL_SWITCH';
  private readonly dynamoClient: DynamoDBDocumentClient;
  private readonly cacheTtlMs: number;
  private readonly clock: Clock;
  private readonly cache = new Map<string, { record: KillSwitchRecord; expiresAt: number }>();

  static fromConfig(logger: Logger, config: EngineConfig, clock?: Clock): DynamoKillSwitchProvider {
    if (!config.killSwitchTableName) {
      throw new Error('EXPERIMENT_KILL_SWITCH_TABLE environment variable is required');
    }
    return new DynamoKillSwitchProvider(logger, config.killSwitchTableName, {
      region: config.region,
      cacheTtlMs: config.killSwitchCacheMs,
      clock,
    });
  }

  constructor(
    private readonly logger: Logger,
    private readonly tableName: string,
    options: DynamoKillSwitchOptions = {}
  ) {
    this.cacheTtlMs = options.cacheTtlMs ?? 5000;
    this.clock = options.clock ?? systemClock;
    const client = new DynamoDBClient(getAWSClientConfig(options.region));
    this.dynamoClient = DynamoDBDocumentClient.from(client, {
      marshallOptions: { removeUndefinedValues: true },
    });
  }

  async isExperimentDisabled(serviceType: string): Promise<boolean> {
    const record = await this.readOrEmpty(serviceType);
    return record.experimentDisabled;
  }

  async isTrialDisabled(serviceType: string, trialKey: string): Promise<boolean> {
    const record = await this.readOrEmpty(serviceType);
    return record.disabledTrialKeys.has(trialKey);
  }

  async disableExperiment(serviceType: string): Promise<void> {
    await this.setExperimentDisabled(serviceType, true);
  }

  async enableExperiment(serviceType: string): Promise<void> {
    await this.setExperimentDisabled(serviceType, false);
  }

  async disableTrial(serviceType: string, trialKey: string): Promise<void> {
    await this.update(serviceType, 'ADD disabled_trial_keys :keys SET updated_at = :now', {
      ':keys': new Set([trialKey]),
    });
    this.logger.info('Trial disabled by kill switch', { serviceType, trialKey });
  }

  async enableTrial(serviceType: string, trialKey: string): Promise<void> {
    await this.update(serviceType, 'DELETE disabled_trial_keys :keys SET updated_at = :now', {
      ':keys': new Set([trialKey]),
    });
    this.logger.info('Trial re-enabled', { serviceType, trialKey });
  }

  /**
   * Current record for a service type, bypassing the cache
   */
  async getRecord(serviceType: string): Promise<KillSwitchRecord> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: this.pkPrefix + serviceType, sk: this.skKillSwitch },
      })
    );
    if (!result.Item) {
      return EMPTY_RECORD;
    }

    const parsed = KillSwitchItemSchema.safeParse(result.Item);
    if (!parsed.success) {
      this.logger.warn('Malformed kill switch item; ignoring', {
        serviceType,
        error: parsed.error.message,
      });
      return EMPTY_RECORD;
    }
    return {
      experimentDisabled: parsed.data.experiment_disabled ?? false,
      disabledTrialKeys: new Set(parsed.data.disabled_trial_keys ?? []),
    };
  }

  invalidate(serviceType?: string): void {
    if (serviceType === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(serviceType);
    }
  }

  private async readOrEmpty(serviceType: string): Promise<KillSwitchRecord> {
    const now = this.clock.now();
    const cached = this.cache.get(serviceType);
    if (cached && cached.expiresAt > now) {
      return cached.record;
    }

    try {
      const record = await this.getRecord(serviceType);
      if (this.cacheTtlMs > 0) {
        this.cache.set(serviceType, { record, expiresAt: now + this.cacheTtlMs });
      }
      return record;
    } catch (error) {
      this.logger.warn('Failed to read kill switch state; treating as enabled', {
        serviceType,
        error: errorMessage(error),
      });
      return EMPTY_RECORD;
    }
  }

  private async setExperimentDisabled(serviceType: string, disabled: boolean): Promise<void> {
    await this.update(serviceType, 'SET experiment_disabled = :disabled, updated_at = :now', {
      ':disabled': disabled,
    });
    this.logger.info(disabled ? 'Experiment disabled by kill switch' : 'Experiment re-enabled', { serviceType });
  }

  private async update(serviceType: string, updateExpression: string, values: Record<string, unknown>): Promise<void> {
    this.invalidate(serviceType);
    try {
      await this.dynamoClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { pk: this.pkPrefix + serviceType, sk: this.skKillSwitch },
          UpdateExpression: updateExpression,
          ExpressionAttributeValues: { ...values, ':now': new Date().toISOString() },
        })
      );
    } catch (error) {
      this.logger.error('Failed to update kill switch', {
        serviceType,
        error: errorMessage(error),
      });
      throw error;
    } finally {
      this.invalidate(serviceType);
    }
  }
}
