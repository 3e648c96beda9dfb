import type { InvocationScope } from '../../../types/CommonTypes';
import {
  SelectionModes,
  type FeatureFlagSource,
  type NamingConvention,
  type SelectionContext,
  type SelectionModeProvider,
} from '../../../types/SelectionTypes';

/**
 * Maps an on/off flag to the trial keys "true" / "false"
 */
export class BooleanFeatureFlagProvider implements SelectionModeProvider {
  readonly modeIdentifier = SelectionModes.BooleanFeatureFlag;

  constructor(private readonly source: FeatureFlagSource) {}

  async selectTrialKey(context: SelectionContext): Promise<string> {
    const enabled = await this.source.isEnabled(context.selectorName, context.scope);
    return enabled ? 'true' : 'false';
  }

  defaultSelectorName(serviceType: string, convention: NamingConvention): string {
    return convention.featureFlagNameFor(serviceType);
  }
}

/**
 * Flag source backed by a map; unknown flags are off
 */
export class InMemoryFeatureFlagSource implements FeatureFlagSource {
  private readonly flags = new Map<string, boolean>();

  constructor(initial: Record<string, boolean> = {}) {
    for (const [name, enabled] of Object.entries(initial)) {
      this.flags.set(name, enabled);
    }
  }

  set(flagName: string, enabled: boolean): void {
    this.flags.set(flagName, enabled);
  }

  isEnabled(flagName: string, _scope?: InvocationScope): boolean {
    return this.flags.get(flagName) ?? false;
  }
}
