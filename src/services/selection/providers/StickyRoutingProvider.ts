import type { InvocationScope } from '../../../types/CommonTypes';
import {
  SelectionModes,
  type IdentityProvider,
  type NamingConvention,
  type SelectionContext,
  type SelectionModeProvider,
} from '../../../types/SelectionTypes';
import { selectTrial } from '../StickyTrialRouter';

/**
 * Identity taken from the per-call `identity` option
 */
export class ScopeIdentityProvider implements IdentityProvider {
  getIdentity(scope: InvocationScope): string | undefined {
    return scope.identity;
  }
}

/**
 * Identity taken from a named per-call attribute (e.g. "user-id")
 */
export class AttributeIdentityProvider implements IdentityProvider {
  private readonly attribute: string;

  constructor(attribute: string) {
    this.attribute = attribute.toLowerCase();
  }

  getIdentity(scope: InvocationScope): string | undefined {
    return scope.attributes[this.attribute];
  }
}

/**
 * Hash-based assignment: the same identity keeps its trial across calls.
 * No identity means no preference.
 */
export class StickyRoutingProvider implements SelectionModeProvider {
  readonly modeIdentifier = SelectionModes.StickyRouting;

  constructor(private readonly identityProvider: IdentityProvider = new ScopeIdentityProvider()) {}

  async selectTrialKey(context: SelectionContext): Promise<string | null> {
    const identity = await this.identityProvider.getIdentity(context.scope);
    if (!identity) {
      return null;
    }
    return selectTrial(identity, context.selectorName, context.trialKeys);
  }

  defaultSelectorName(serviceType: string, convention: NamingConvention): string {
    return convention.featureFlagNameFor(serviceType);
  }
}
