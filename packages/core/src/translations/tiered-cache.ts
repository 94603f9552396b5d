/**
 * Two-tier translation cache
 *
 * Memory first, then the optional persistent store, behind one facade so
 * callers never branch on tier.
 *
 * @invariant INV-CACHE-001: The memory tier is checked before the persistent tier
 * @invariant INV-CACHE-002: A persistent hit is promoted into the memory tier
 * @invariant INV-CACHE-003: Cached groups are deep-frozen; a reload replaces them
 */

import { TranslationGroupSchema, type TranslationCacheConfig, type TranslationGroup } from '@parlance/schemas';

import { logger } from '../utils/logger.js';
import { deepFreeze } from '../utils/object-utils.js';
import { TranslationCache } from './cache.js';
import type { PersistentStore } from './persistent-store.js';

export interface TieredCacheOptions {
  config: TranslationCacheConfig;

  /** Persistent tier; ignored unless config.enabled is set */
  store?: PersistentStore;

  memory?: TranslationCache;
}

export class TieredTranslationCache {
  readonly memory: TranslationCache;
  private readonly store: PersistentStore | undefined;
  private readonly config: TranslationCacheConfig;

  constructor(options: TieredCacheOptions) {
    this.config = options.config;
    this.memory = options.memory ?? new TranslationCache();
    this.store = options.config.enabled ? options.store : undefined;
  }

  /**
   * Whether a persistent tier is active
   */
  hasPersistentTier(): boolean {
    return this.store !== undefined;
  }

  /**
   * Persistent tier key for a (locale, group) pair
   */
  key(locale: string, group: string): string {
    return `${this.config.prefix}.${locale}.${group}`;
  }

  get(locale: string, group: string): TranslationGroup | null {
    const cached = this.memory.get(locale, group);
    if (cached !== null) {
      return cached;
    }

    if (!this.store) {
      return null;
    }

    const stored = this.store.get(this.key(locale, group));
    if (stored === undefined || stored === null) {
      return null;
    }

    const parsed = TranslationGroupSchema.safeParse(stored);
    if (!parsed.success) {
      logger.warn('Ignoring malformed persistent cache entry', { locale, group });
      return null;
    }

    logger.debug('Translation group served from persistent cache', { locale, group });
    deepFreeze(parsed.data);
    this.memory.put(locale, group, parsed.data);
    return parsed.data;
  }

  put(locale: string, group: string, translations: TranslationGroup): void {
    deepFreeze(translations);
    this.memory.put(locale, group, translations);
    this.store?.put(this.key(locale, group), translations, this.config.ttl);
  }

  forget(locale: string, group: string): void {
    this.memory.forget(locale, group);
    this.store?.forget(this.key(locale, group));
  }

  /**
   * Drop a locale from memory and forget the listed groups from the persistent tier
   */
  flushLocale(locale: string, groups: Iterable<string>): void {
    this.memory.flushLocale(locale);
    if (!this.store) {
      return;
    }
    for (const group of groups) {
      this.store.forget(this.key(locale, group));
    }
  }
}
