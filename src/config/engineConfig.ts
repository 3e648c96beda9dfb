/**
 * Engine configuration from environment variables.
 *
 * The emergency stop is read on every call (isGlobalStopEngaged) so it can be
 * flipped without restarting the process. The rest feeds the fromConfig
 * factories of the DynamoDB and CloudWatch backed components. LOG_LEVEL is
 * read by Logger itself.
 */

import { z } from 'zod';

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => v === 'true');

export const EngineConfigSchema = z.object({
  EXPERIMENTS_GLOBAL_STOP: booleanFlag,
  AWS_REGION: z.string().optional(),
  EXPERIMENT_KILL_SWITCH_TABLE: z.string().min(1).optional(),
  EXPERIMENT_AUDIT_TABLE: z.string().min(1).optional(),
  EXPERIMENT_METRICS_NAMESPACE: z.string().min(1).default('Trialswitch/Experiments'),
  EXPERIMENT_KILL_SWITCH_CACHE_MS: z.coerce.number().int().min(0).default(5000),
});

export interface EngineConfig {
  globalStop: boolean;
  region?: string;
  killSwitchTableName?: string;
  auditTableName?: string;
  metricsNamespace: string;
  killSwitchCacheMs: number;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid engine configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    globalStop: e.EXPERIMENTS_GLOBAL_STOP,
    region: e.AWS_REGION,
    killSwitchTableName: e.EXPERIMENT_KILL_SWITCH_TABLE,
    auditTableName: e.EXPERIMENT_AUDIT_TABLE,
    metricsNamespace: e.EXPERIMENT_METRICS_NAMESPACE,
    killSwitchCacheMs: e.EXPERIMENT_KILL_SWITCH_CACHE_MS,
  };
}

export function isGlobalStopEngaged(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.EXPERIMENTS_GLOBAL_STOP === 'true';
}
