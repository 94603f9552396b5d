/**
 * Locale Configuration Schemas - Public API
 *
 * @packageDocumentation
 */

export {
  // Defaults
  DEFAULT_LOCALE_PATTERN,
  DEFAULT_SESSION_KEY,
  DEFAULT_COOKIE_KEY,
  DEFAULT_COOKIE_MINUTES,
  DEFAULT_RTL_LOCALES,

  // Resolvers
  ResolverSlotSchema,
  SessionResolverSettingsSchema,
  CookieResolverSettingsSchema,
  QueryResolverSettingsSchema,
  HeaderResolverSettingsSchema,
  UrlSegmentResolverSettingsSchema,
  UrlPrefixResolverSettingsSchema,
  DomainStrategySchema,
  DomainResolverSettingsSchema,
  type ResolverSlot,
  type SessionResolverSettings,
  type CookieResolverSettings,
  type QueryResolverSettings,
  type HeaderResolverSettings,
  type UrlSegmentResolverSettings,
  type UrlPrefixResolverSettings,
  type DomainStrategy,
  type DomainResolverSettings,

  // Translations
  TranslationDriverSchema,
  TranslationValueSchema,
  TranslationGroupSchema,
  LazyLoadingConfigSchema,
  TranslationCacheConfigSchema,
  type TranslationDriver,
  type TranslationValue,
  type TranslationGroup,
  type LazyLoadingConfig,
  type TranslationCacheConfig,

  // URL localization
  UrlStrategySchema,
  UrlConfigSchema,
  type UrlStrategy,
  type UrlConfig,
  type UrlConfigInput,

  // Root
  ParlanceConfigSchema,
  type ParlanceConfig,
  type ParlanceConfigInput,

  // Validators
  validateParlanceConfig,
  safeParseParlanceConfig,
} from './schemas.js';
