import {
  SelectionModes,
  type ConfigurationSource,
  type NamingConvention,
  type SelectionContext,
  type SelectionModeProvider,
} from '../../../types/SelectionTypes';

/**
 * Uses a configuration string as the trial key. Blank or missing means no preference.
 */
export class ConfigurationValueProvider implements SelectionModeProvider {
  readonly modeIdentifier = SelectionModes.ConfigurationValue;

  constructor(private readonly source: ConfigurationSource) {}

  async selectTrialKey(context: SelectionContext): Promise<string | null> {
    const value = await this.source.get(context.selectorName);
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  }

  defaultSelectorName(serviceType: string, convention: NamingConvention): string {
    return convention.configurationKeyFor(serviceType);
  }
}

export class InMemoryConfigurationSource implements ConfigurationSource {
  private readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  delete(key: string): void {
    this.values.delete(key);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }
}

/**
 * Reads configuration keys from environment variables.
 * `Experiments:SearchService` is looked up as `Experiments__SearchService`,
 * then as `EXPERIMENTS__SEARCHSERVICE`.
 */
export class EnvConfigurationSource implements ConfigurationSource {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  static toEnvName(key: string): string {
    return key.replace(/:/g, '__');
  }

  get(key: string): string | undefined {
    const name = EnvConfigurationSource.toEnvName(key);
    return this.env[name] ?? this.env[name.toUpperCase()];
  }
}
