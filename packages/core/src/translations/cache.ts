/**
 * In-memory translation cache
 *
 * Keyed by (locale, group). Lives as long as its owner (one LocaleService);
 * there is no eviction beyond forget/flush since the key space is bounded by
 * configured locales × groups.
 *
 * @example
 * ```typescript
 * const cache = new TranslationCache();
 * cache.put('fr', 'auth', { login: 'Connexion' });
 * cache.get('fr', 'auth'); // { login: 'Connexion' }
 * ```
 */

import type { TranslationGroup } from '@parlance/schemas';

export class TranslationCache {
  private readonly cache = new Map<string, Map<string, TranslationGroup>>();

  has(locale: string, group: string): boolean {
    return this.cache.get(locale)?.has(group) ?? false;
  }

  /**
   * Returns null when the group is not cached
   */
  get(locale: string, group: string): TranslationGroup | null {
    return this.cache.get(locale)?.get(group) ?? null;
  }

  /**
   * Store a group, replacing any previous value
   */
  put(locale: string, group: string, translations: TranslationGroup): void {
    let groups = this.cache.get(locale);
    if (!groups) {
      groups = new Map();
      this.cache.set(locale, groups);
    }
    groups.set(group, translations);
  }

  /**
   * All cached groups for a locale
   */
  getAllForLocale(locale: string): Record<string, TranslationGroup> {
    const groups = this.cache.get(locale);
    return groups ? Object.fromEntries(groups) : {};
  }

  forget(locale: string, group: string): void {
    this.cache.get(locale)?.delete(group);
  }

  flush(): void {
    this.cache.clear();
  }

  flushLocale(locale: string): void {
    this.cache.delete(locale);
  }
}
