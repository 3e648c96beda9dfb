/**
 * Selection Mode Registry
 *
 * Providers keyed by mode identifier (case-insensitive). The router asks the
 * registry for the preferred key of a call; every empty, missing or failed
 * selection collapses to the registration's default key here, before the
 * candidate cascade is built.
 */

import { Logger, errorMessage } from '../core/Logger';
import type { InvocationScope } from '../../types/CommonTypes';
import type { Registration } from '../../types/ExperimentTypes';
import type {
  ConfigurationSource,
  FeatureFlagSource,
  IdentityProvider,
  NamingConvention,
  SelectionModeProvider,
} from '../../types/SelectionTypes';
import { DefaultNamingConvention } from './NamingConvention';
import { BooleanFeatureFlagProvider } from './providers/BooleanFeatureFlagProvider';
import { ConfigurationValueProvider, EnvConfigurationSource } from './providers/ConfigurationValueProvider';
import { StickyRoutingProvider } from './providers/StickyRoutingProvider';

export interface BuiltInProviderSources {
  featureFlags?: FeatureFlagSource;
  configuration?: ConfigurationSource;
  identity?: IdentityProvider;
  namingConvention?: NamingConvention;
}

export type PreferredKeySource = 'provider' | 'default';

export interface PreferredKeySelection {
  preferredKey: string;
  selectorName: string;
  source: PreferredKeySource;
}

type SelectionFields = Pick<
  Registration<unknown>,
  'serviceType' | 'modeIdentifier' | 'selectorName' | 'defaultKey' | 'trials'
>;

export class SelectionModeRegistry {
  private readonly providers = new Map<string, SelectionModeProvider>();

  constructor(
    private readonly logger: Logger,
    private readonly namingConvention: NamingConvention = DefaultNamingConvention.instance
  ) {}

  /**
   * Registry with the sticky and configuration providers, plus the boolean
   * flag provider when a flag source is given. Configuration defaults to env vars.
   */
  static withBuiltIns(logger: Logger, sources: BuiltInProviderSources = {}): SelectionModeRegistry {
    const registry = new SelectionModeRegistry(logger, sources.namingConvention);
    registry.register(new ConfigurationValueProvider(sources.configuration ?? new EnvConfigurationSource()));
    registry.register(new StickyRoutingProvider(sources.identity));
    if (sources.featureFlags) {
      registry.register(new BooleanFeatureFlagProvider(sources.featureFlags));
    }
    return registry;
  }

  register(provider: SelectionModeProvider): this {
    this.providers.set(provider.modeIdentifier.toLowerCase(), provider);
    return this;
  }

  get(modeIdentifier: string): SelectionModeProvider | undefined {
    return this.providers.get(modeIdentifier.toLowerCase());
  }

  has(modeIdentifier: string): boolean {
    return this.providers.has(modeIdentifier.toLowerCase());
  }

  get modeIdentifiers(): string[] {
    return Array.from(this.providers.values(), (p) => p.modeIdentifier);
  }

  /**
   * Selector name for a registration: explicit name, else the provider's
   * convention-derived default, else the service type.
   */
  resolveSelectorName(registration: SelectionFields, provider?: SelectionModeProvider): string {
    if (registration.selectorName) {
      return registration.selectorName;
    }
    if (provider) {
      return provider.defaultSelectorName(registration.serviceType, this.namingConvention);
    }
    return registration.serviceType;
  }

  async selectPreferredKey(registration: SelectionFields, scope: InvocationScope): Promise<PreferredKeySelection> {
    const provider = this.get(registration.modeIdentifier);
    const selectorName = this.resolveSelectorName(registration, provider);
    const fallback: PreferredKeySelection = { preferredKey: registration.defaultKey, selectorName, source: 'default' };

    if (!provider) {
      this.logger.warn('No selection provider registered for mode; using default trial', {
        serviceType: registration.serviceType,
        modeIdentifier: registration.modeIdentifier,
        correlationId: scope.correlationId,
      });
      return fallback;
    }

    try {
      const key = await provider.selectTrialKey({
        serviceType: registration.serviceType,
        selectorName,
        defaultKey: registration.defaultKey,
        trialKeys: Object.freeze(Array.from(registration.trials.keys())),
        scope,
      });
      if (key === null || key === undefined || key === '') {
        this.logger.debug('Selection provider returned no key; using default trial', {
          serviceType: registration.serviceType,
          selectorName,
          correlationId: scope.correlationId,
        });
        return fallback;
      }
      return { preferredKey: key, selectorName, source: 'provider' };
    } catch (error) {
      this.logger.warn('Selection provider failed; using default trial', {
        serviceType: registration.serviceType,
        selectorName,
        correlationId: scope.correlationId,
        error: errorMessage(error),
      });
      return fallback;
    }
  }
}
