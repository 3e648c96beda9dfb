import type { NamingConvention } from '../../types/SelectionTypes';

/**
 * Default selector naming.
 * Feature flag: service type as-is. Configuration key: `Experiments:<serviceType>`.
 * Kebab name: leading interface `I` dropped, word boundaries hyphenated
 * (ISearchService -> search-service, HTTPClient -> http-client).
 */
export class DefaultNamingConvention implements NamingConvention {
  static readonly instance = new DefaultNamingConvention();

  featureFlagNameFor(serviceType: string): string {
    return serviceType;
  }

  configurationKeyFor(serviceType: string): string {
    return `Experiments:${serviceType}`;
  }

  kebabNameFor(serviceType: string): string {
    let name = serviceType;
    if (name.length > 1 && name[0] === 'I' && isUpper(name[1])) {
      name = name.slice(1);
    }

    let out = '';
    for (let i = 0; i < name.length; i++) {
      const c = name[i];
      if (isUpper(c)) {
        if (out.length > 0) {
          const prevIsLower = i > 0 && isLower(name[i - 1]);
          const nextIsLower = i + 1 < name.length && isLower(name[i + 1]);
          if (prevIsLower || nextIsLower) {
            out += '-';
          }
        }
        out += c.toLowerCase();
      } else {
        out += c;
      }
    }
    return out;
  }
}

function isUpper(c: string): boolean {
  return c !== c.toLowerCase() && c === c.toUpperCase();
}

function isLower(c: string): boolean {
  return c !== c.toUpperCase() && c === c.toLowerCase();
}
