import { z } from 'zod';
import {
  SelectionModes,
  type IdentityProvider,
  type NamingConvention,
  type SelectionContext,
  type SelectionModeProvider,
} from '../../../types/SelectionTypes';
import { stableBucket } from '../StickyTrialRouter';
import { ScopeIdentityProvider } from './StickyRoutingProvider';

export const RolloutOptionsSchema = z.object({
  percentage: z.number().min(0).max(100),
  includedKey: z.string().min(1).default('true'),
  /** Key for identities outside the rollout; absent means the default trial. */
  excludedKey: z.string().min(1).optional(),
  /** Changing the seed reshuffles which identities are included. */
  seed: z.string().optional(),
});

export type RolloutOptionsInput = z.input<typeof RolloutOptionsSchema>;
export type RolloutOptions = z.output<typeof RolloutOptionsSchema>;

const BUCKETS = 100;

export function isIncludedInRollout(identity: string, selectorName: string, percentage: number, seed?: string): boolean {
  if (percentage <= 0) return false;
  if (percentage >= 100) return true;
  const salt = seed ? `${selectorName}:${seed}` : selectorName;
  return stableBucket(identity, salt, BUCKETS) < percentage;
}

/**
 * Percentage rollout, registered as the custom mode "Rollout"
 */
export class RolloutProvider implements SelectionModeProvider {
  readonly modeIdentifier = SelectionModes.Rollout;
  readonly options: RolloutOptions;

  constructor(
    options: RolloutOptionsInput,
    private readonly identityProvider: IdentityProvider = new ScopeIdentityProvider()
  ) {
    this.options = RolloutOptionsSchema.parse(options);
  }

  async selectTrialKey(context: SelectionContext): Promise<string | null> {
    const identity = await this.identityProvider.getIdentity(context.scope);
    if (!identity) {
      return this.options.excludedKey ?? null;
    }
    const included = isIncludedInRollout(identity, context.selectorName, this.options.percentage, this.options.seed);
    return included ? this.options.includedKey : this.options.excludedKey ?? null;
  }

  defaultSelectorName(serviceType: string, convention: NamingConvention): string {
    return `Rollout:${convention.featureFlagNameFor(serviceType)}`;
  }
}
