/**
 * Locale Service - facade over resolution, validation and translation loading
 *
 * The service owns one translation cache; hosts that keep an instance alive
 * across requests share its memory tier between those requests.
 *
 * ## Usage
 *
 * ```typescript
 * import { LocaleService, MemorySessionStore } from '@parlance/core';
 *
 * const service = new LocaleService({
 *   config: { locales: ['en', 'fr'], resolution_order: ['query', 'session'] },
 *   session: new MemorySessionStore(),
 * });
 *
 * const locale = service.getLocale({ path: '/', query: { locale: 'fr' } }); // 'fr'
 * const auth = service.translationGroup('auth');
 * ```
 *
 * ## Invariants
 *
 * - INV-LOCALE-001: Every locale the service stores or returns is normalized
 * - INV-LOCALE-004: getLocale() returns a supported locale or the default
 * - INV-LOCALE-006: setLocale() writes nothing when validation fails
 * - INV-TRANS-001: Current-locale values win over default-locale values
 *
 * @packageDocumentation
 */

import { resolve } from 'path';
import {
  CookieResolverSettingsSchema,
  DEFAULT_SESSION_KEY,
  type ParlanceConfig,
  type ParlanceConfigInput,
  type ResolverSlot,
  type TranslationGroup,
} from '@parlance/schemas';

import { UnsupportedLocaleError } from '../locale/errors.js';
import { baseLanguage, normalizeLocale } from '../locale/normalizer.js';
import { LocaleResolverManager } from '../locale/resolver-manager.js';
import { AppLocaleHolder, MemorySessionStore } from '../locale/stores.js';
import type {
  AppLocale,
  CookieJar,
  LocaleRequest,
  ResolverFactory,
  SessionStore,
} from '../locale/types.js';
import { TranslationLoader } from '../translations/loader.js';
import { getByPath, mergeWithFallback } from '../translations/merge.js';
import {
  PageGroupResolver,
  type CustomPageGroupResolver,
} from '../translations/page-group-resolver.js';
import type { PersistentStore } from '../translations/persistent-store.js';
import { TieredTranslationCache } from '../translations/tiered-cache.js';
import { LocalizedUrlGenerator } from '../url/localized-url-generator.js';
import { resolveConfig } from '../utils/config-loader.js';
import { logger } from '../utils/logger.js';

export type TextDirection = 'ltr' | 'rtl';

/**
 * Translation payload: group name → group for the groups driver, or one flat
 * mapping for the json driver
 */
export type TranslationPayload = Record<string, TranslationGroup> | TranslationGroup;

export interface LocaleServiceOptions {
  /** Raw or already-parsed configuration */
  config?: ParlanceConfigInput;

  /** Defaults to an in-process session */
  session?: SessionStore;

  /** Needed only when resolvers.cookie.persist_on_set is on */
  cookies?: CookieJar;

  /** Host application locale; defaults to a holder seeded with app_locale */
  app?: AppLocale;

  /** Persistent cache tier; used when cache.enabled is on */
  store?: PersistentStore;

  /** Resolver factories addressable by resolver name or `factory` setting */
  resolverFactories?: Readonly<Record<string, ResolverFactory>>;

  /** Page resolvers addressable by lazy_loading.page_group_resolver */
  pageResolvers?: Readonly<Record<string, CustomPageGroupResolver>>;

  /** Page resolver override; takes precedence over the configured name */
  pageGroupResolver?: CustomPageGroupResolver;

  /** Directory a relative lang_path is resolved against (default: cwd) */
  basePath?: string;
}

/** Resolution order used when the config does not set one */
const DEFAULT_RESOLUTION_ORDER: readonly string[] = ['session', 'cookie'];

function unique(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}

export class LocaleService {
  private readonly config: Readonly<ParlanceConfig>;
  private readonly session: SessionStore;
  private readonly cookies: CookieJar | undefined;
  private readonly app: AppLocale;
  private readonly manager: LocaleResolverManager;
  private readonly loader: TranslationLoader;
  private readonly cache: TieredTranslationCache;
  private readonly pageResolver: PageGroupResolver;
  private readonly normalizedSupported: ReadonlySet<string>;

  constructor(options: LocaleServiceOptions = {}) {
    this.config = resolveConfig(options.config);
    this.session = options.session ?? new MemorySessionStore();
    this.cookies = options.cookies;
    this.app = options.app ?? new AppLocaleHolder(this.config.app_locale);
    this.normalizedSupported = new Set(this.config.locales.map(normalizeLocale));

    this.manager = new LocaleResolverManager({
      resolutionOrder: this.config.resolution_order ?? DEFAULT_RESOLUTION_ORDER,
      resolvers: this.resolverSettings(),
      factories: options.resolverFactories,
      session: this.session,
    });

    // Build enabled resolvers now so bad resolver settings fail at startup
    for (const name of this.manager.getEnabledResolvers()) {
      this.manager.createResolver(name);
    }

    this.loader = new TranslationLoader(resolve(options.basePath ?? process.cwd(), this.config.lang_path));
    this.cache = new TieredTranslationCache({ config: this.config.cache, store: options.store });
    this.pageResolver = new PageGroupResolver(this.pickPageResolver(options));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Locale
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Current locale.
   *
   * With a request, the resolver chain decides; without one, only the session
   * is read. Either way an unsupported or missing value yields the default.
   */
  getLocale(request?: Readonly<LocaleRequest>): string {
    if (request) {
      const resolved = this.manager.resolve(
        request,
        (locale) => this.normalizedSupported.has(locale),
        normalizeLocale
      );
      return resolved ?? this.defaultLocale();
    }

    const stored = this.session.get(this.sessionKey());
    if (typeof stored === 'string' && stored !== '') {
      const normalized = normalizeLocale(stored);
      if (this.normalizedSupported.has(normalized)) {
        return normalized;
      }
    }

    return this.defaultLocale();
  }

  /**
   * Validate and persist a locale to the session, the app locale and,
   * when configured, a cookie
   *
   * @throws UnsupportedLocaleError when the locale is not supported
   */
  setLocale(locale: string): void {
    const normalized = this.validateLocale(locale);

    this.session.put(this.sessionKey(), normalized);
    this.app.setLocale(normalized);

    const cookie = CookieResolverSettingsSchema.parse(this.config.resolvers.cookie ?? {});
    if (cookie.persist_on_set) {
      if (this.cookies) {
        this.cookies.queue(cookie.key, normalized, cookie.minutes);
      } else {
        logger.warn('Cookie persistence is on but no cookie jar was provided', { locale: normalized });
      }
    }

    logger.debug('Locale set', { locale: normalized });
  }

  /**
   * Normalize a locale and check it against the supported set
   *
   * @returns The normalized locale
   * @throws UnsupportedLocaleError when the locale is not supported
   */
  validateLocale(locale: string): string {
    const normalized = normalizeLocale(locale);
    if (!this.normalizedSupported.has(normalized)) {
      throw new UnsupportedLocaleError(normalized, this.supportedLocales());
    }
    return normalized;
  }

  isLocaleSupported(locale: string): boolean {
    return this.normalizedSupported.has(normalizeLocale(locale));
  }

  normalizeLocale(locale: string): string {
    return normalizeLocale(locale);
  }

  /**
   * Supported locales as configured
   */
  supportedLocales(): string[] {
    return [...this.config.locales];
  }

  /**
   * The configured default, else the application locale, normalized
   */
  defaultLocale(): string {
    return normalizeLocale(this.config.default ?? this.config.app_locale);
  }

  /**
   * Session key the locale is stored under.
   *
   * The legacy `session_key` only wins when it was customized while
   * `resolvers.session.key` was left unset or at its default.
   */
  sessionKey(): string {
    const legacy = this.config.session_key;
    const configured = this.config.resolvers.session?.key;
    const structured = typeof configured === 'string' && configured !== '' ? configured : undefined;

    if (legacy !== DEFAULT_SESSION_KEY && (structured === undefined || structured === DEFAULT_SESSION_KEY)) {
      return legacy;
    }

    return structured ?? DEFAULT_SESSION_KEY;
  }

  getResolverManager(): LocaleResolverManager {
    return this.manager;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Direction
  // ═══════════════════════════════════════════════════════════════════════════

  getRtlLocales(): string[] {
    return [...this.config.rtl_locales];
  }

  /**
   * Whether a locale (default: the current one) is written right to left
   */
  isRtl(locale?: string, request?: Readonly<LocaleRequest>): boolean {
    const base = baseLanguage(locale ?? this.getLocale(request));
    return this.config.rtl_locales.some((rtl) => rtl.toLowerCase() === base);
  }

  getDirection(locale?: string, request?: Readonly<LocaleRequest>): TextDirection {
    return this.isRtl(locale, request) ? 'rtl' : 'ltr';
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Translations
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * All translations for the current locale, merged over the default locale.
   *
   * json driver: the locale's flat file. groups driver: every group, or only
   * the default groups when lazy loading is on.
   */
  translations(request?: Readonly<LocaleRequest>): TranslationPayload {
    const locale = this.getLocale(request);

    if (this.config.translation_driver === 'json') {
      return this.jsonTranslations(locale);
    }

    if (this.config.lazy_loading.enabled) {
      return this.groupsForLocale(locale, this.config.lazy_loading.default_groups);
    }

    const fallback = this.defaultLocale();
    const names = new Set(this.loader.listGroups(locale));
    if (locale !== fallback) {
      for (const name of this.loader.listGroups(fallback)) {
        names.add(name);
      }
    }

    const translations: Record<string, TranslationGroup> = {};
    for (const name of Array.from(names).sort()) {
      translations[name] = this.groupForLocale(locale, name);
    }
    return translations;
  }

  /**
   * One group for the current locale, merged over the default locale's group
   */
  translationGroup(group: string, request?: Readonly<LocaleRequest>): TranslationGroup {
    return this.groupForLocale(this.getLocale(request), group);
  }

  /**
   * Several groups for the current locale; groups empty in both locales are omitted
   */
  translationsFor(groups: readonly string[], request?: Readonly<LocaleRequest>): Record<string, TranslationGroup> {
    return this.groupsForLocale(this.getLocale(request), groups);
  }

  /**
   * Group names available for the current locale, sorted
   */
  availableGroups(request?: Readonly<LocaleRequest>): string[] {
    return this.loader.listGroups(this.getLocale(request));
  }

  /**
   * Default groups plus the groups the page maps to, without duplicates
   */
  getGroupsForPage(pageId: string): string[] {
    return unique([...this.config.lazy_loading.default_groups, ...this.pageResolver.resolve(pageId)]);
  }

  translationsForPage(pageId: string, request?: Readonly<LocaleRequest>): Record<string, TranslationGroup> {
    return this.translationsFor(this.getGroupsForPage(pageId), request);
  }

  /**
   * Look up `group.nested.key` for the current locale.
   *
   * With the json driver the whole key is looked up in the flat file.
   * `:name` placeholders are replaced from `replacements`. A missing or
   * non-string entry returns the key itself.
   */
  translate(
    key: string,
    replacements: Readonly<Record<string, string | number>> = {},
    request?: Readonly<LocaleRequest>
  ): string {
    const locale = this.getLocale(request);
    let value: unknown;

    if (this.config.translation_driver === 'json') {
      const flat = this.jsonTranslations(locale);
      value = Object.hasOwn(flat, key) ? flat[key] : undefined;
    } else {
      const separator = key.indexOf('.');
      if (separator > 0) {
        value = getByPath(this.groupForLocale(locale, key.slice(0, separator)), key.slice(separator + 1));
      }
    }

    if (typeof value !== 'string') {
      return key;
    }

    // Longest names first so :count does not eat :count_total
    const names = Object.keys(replacements).sort((a, b) => b.length - a.length);
    return names.reduce(
      (text, name) => text.split(`:${name}`).join(String(replacements[name])),
      value
    );
  }

  /**
   * Clear cached translations for one locale, or every supported locale
   */
  clearTranslationCache(locale?: string): void {
    const locales = locale !== undefined ? [normalizeLocale(locale)] : Array.from(this.normalizedSupported);

    for (const target of locales) {
      const groups = unique([
        ...Object.keys(this.cache.memory.getAllForLocale(target)),
        ...this.loader.listGroups(target),
      ]);
      this.cache.flushLocale(target, groups);
    }

    logger.debug('Translation cache cleared', { locales });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // URLs
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * URL generator whose implicit locale is resolved from the given request
   */
  urlGenerator(request?: Readonly<LocaleRequest>): LocalizedUrlGenerator {
    return new LocalizedUrlGenerator(this.config.url, () => this.getLocale(request));
  }

  localizedUrl(url: string, locale?: string, request?: Readonly<LocaleRequest>): string {
    return this.urlGenerator(request).localizedUrl(url, locale);
  }

  /**
   * Read-only configuration in effect
   */
  getConfig(): Readonly<ParlanceConfig> {
    return this.config;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════════

  private groupsForLocale(locale: string, groups: readonly string[]): Record<string, TranslationGroup> {
    const translations: Record<string, TranslationGroup> = {};

    for (const group of unique(groups)) {
      const data = this.groupForLocale(locale, group);
      if (Object.keys(data).length > 0) {
        translations[group] = data;
      }
    }

    return translations;
  }

  private groupForLocale(locale: string, group: string): TranslationGroup {
    const current = this.loadGroup(locale, group);
    const fallback = this.defaultLocale();

    if (locale === fallback) {
      return current;
    }

    return mergeWithFallback(this.loadGroup(fallback, group), current);
  }

  /**
   * Memory tier, then persistent tier, then the filesystem
   */
  private loadGroup(locale: string, group: string): TranslationGroup {
    const cached = this.cache.get(locale, group);
    if (cached !== null) {
      return cached;
    }

    const loaded = this.loader.loadGroup(locale, group);
    this.cache.put(locale, group, loaded);
    return loaded;
  }

  private jsonTranslations(locale: string): TranslationGroup {
    const current = this.loader.loadJson(locale);
    const fallback = this.defaultLocale();

    if (locale === fallback) {
      return current;
    }

    return mergeWithFallback(this.loader.loadJson(fallback), current);
  }

  /**
   * Resolver settings with the session slot pointed at the effective key
   */
  private resolverSettings(): Record<string, ResolverSlot> {
    const settings: Record<string, ResolverSlot> = { ...this.config.resolvers };
    settings.session = { ...this.config.resolvers.session, key: this.sessionKey() };
    return settings;
  }

  private pickPageResolver(options: LocaleServiceOptions): CustomPageGroupResolver | undefined {
    if (options.pageGroupResolver) {
      return options.pageGroupResolver;
    }

    const name = this.config.lazy_loading.page_group_resolver;
    if (name === null) {
      return undefined;
    }

    const named = options.pageResolvers && Object.hasOwn(options.pageResolvers, name)
      ? options.pageResolvers[name]
      : undefined;
    if (named) {
      return named;
    }

    logger.warn('Page group resolver is not registered; pages resolve to no groups', { resolver: name });
    return () => [];
  }
}
