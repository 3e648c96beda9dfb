/**
 * Selection mode contracts.
 *
 * A provider returns the preferred trial key for one call. Empty, missing or
 * failed results all mean "use the default key".
 */

import type { InvocationScope, MaybePromise } from './CommonTypes';

/**
 * Identifiers of the shipped providers. Rollout is registered as a custom mode.
 */
export const SelectionModes = {
  BooleanFeatureFlag: 'BooleanFeatureFlag',
  ConfigurationValue: 'ConfigurationValue',
  StickyRouting: 'StickyRouting',
  Rollout: 'Rollout',
} as const;

export type SelectionMode = 'BooleanFeatureFlag' | 'ConfigurationValue' | 'StickyRouting' | 'Custom';

/**
 * Immutable per-call input to a selection provider
 */
export interface SelectionContext {
  readonly serviceType: string;
  readonly selectorName: string;
  readonly defaultKey: string;
  readonly trialKeys: readonly string[];
  readonly scope: InvocationScope;
}

export interface SelectionModeProvider {
  readonly modeIdentifier: string;
  selectTrialKey(context: SelectionContext): MaybePromise<string | null | undefined>;
  defaultSelectorName(serviceType: string, convention: NamingConvention): string;
}

export interface NamingConvention {
  featureFlagNameFor(serviceType: string): string;
  configurationKeyFor(serviceType: string): string;
  kebabNameFor(serviceType: string): string;
}

/**
 * External on/off flag backend
 */
export interface FeatureFlagSource {
  isEnabled(flagName: string, scope: InvocationScope): MaybePromise<boolean>;
}

/**
 * External string configuration backend
 */
export interface ConfigurationSource {
  get(key: string): MaybePromise<string | undefined>;
}

/**
 * Supplies the stable user/session identity used for sticky routing
 */
export interface IdentityProvider {
  getIdentity(scope: InvocationScope): MaybePromise<string | undefined>;
}
