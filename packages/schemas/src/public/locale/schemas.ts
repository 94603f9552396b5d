/**
 * Locale Configuration Schemas
 *
 * Zod schemas for the locale resolution and translation configuration.
 * These are the source of truth for configuration types; keys mirror the
 * snake_case YAML files the config loader reads.
 *
 * @invariant INV-LOCALE-001: Every stored locale code is in canonical form
 * @invariant INV-LOCALE-002: Configuration is read-only once parsed
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// =============================================================================
// Shared Defaults
// =============================================================================

/**
 * Pattern a URL segment or subdomain label must match to be taken as a locale
 */
export const DEFAULT_LOCALE_PATTERN = '^[a-z]{2}([_-][A-Za-z]{2})?$';

export const DEFAULT_SESSION_KEY = 'parlance.locale';

export const DEFAULT_COOKIE_KEY = 'parlance_locale';

/** One year, in minutes */
export const DEFAULT_COOKIE_MINUTES = 525600;

export const DEFAULT_RTL_LOCALES = [
  'ar',
  'he',
  'fa',
  'ur',
  'ps',
  'sd',
  'ku',
  'ug',
  'yi',
  'prs',
  'dv',
] as const;

// =============================================================================
// Resolver Settings
// =============================================================================

/**
 * Settings the resolver manager reads for every resolver slot.
 * Resolver-specific keys live alongside and are validated by each resolver.
 */
export const ResolverSlotSchema = z
  .object({
    /** Defaults to enabled when unspecified */
    enabled: z.boolean().optional(),

    /** Name of a registered resolver factory that replaces the built-in */
    factory: z.string().min(1).optional(),
  })
  .passthrough();

export type ResolverSlot = z.infer<typeof ResolverSlotSchema>;

export const SessionResolverSettingsSchema = z.object({
  key: z.string().min(1).default(DEFAULT_SESSION_KEY),
});

export type SessionResolverSettings = z.infer<typeof SessionResolverSettingsSchema>;

export const CookieResolverSettingsSchema = z.object({
  key: z.string().min(1).default(DEFAULT_COOKIE_KEY),

  /** Queue a cookie whenever the locale is explicitly set */
  persist_on_set: z.boolean().default(false),

  /** Cookie lifetime in minutes */
  minutes: z.number().int().positive().default(DEFAULT_COOKIE_MINUTES),
});

export type CookieResolverSettings = z.infer<typeof CookieResolverSettingsSchema>;

export const QueryResolverSettingsSchema = z.object({
  key: z.string().min(1).default('locale'),
});

export type QueryResolverSettings = z.infer<typeof QueryResolverSettingsSchema>;

export const HeaderResolverSettingsSchema = z.object({
  /** Sort candidates by their q-value instead of header order */
  use_quality: z.boolean().default(true),
});

export type HeaderResolverSettings = z.infer<typeof HeaderResolverSettingsSchema>;

export const UrlSegmentResolverSettingsSchema = z.object({
  /** 1-based path segment position */
  position: z.number().int().default(1),
});

export type UrlSegmentResolverSettings = z.infer<typeof UrlSegmentResolverSettingsSchema>;

export const UrlPrefixResolverSettingsSchema = z.object({
  /** 1-based path segment position */
  segment: z.number().int().default(1),
  patterns: z.array(z.string()).default([DEFAULT_LOCALE_PATTERN]),
});

export type UrlPrefixResolverSettings = z.infer<typeof UrlPrefixResolverSettingsSchema>;

export const DomainStrategySchema = z.enum(['full', 'subdomain']);

export type DomainStrategy = z.infer<typeof DomainStrategySchema>;

export const DomainResolverSettingsSchema = z.object({
  /** Unknown strategy names are ignored at evaluation time */
  order: z.array(z.string()).default(['full', 'subdomain']),

  /** Exact host to locale map, e.g. { 'example.de': 'de' } */
  full_map: z.record(z.string(), z.string()).default({}),

  subdomain: z
    .object({
      enabled: z.boolean().default(true),

      /** 1-based label position from the left */
      label: z.number().int().default(1),

      /** Empty means any base domain is accepted */
      base_domains: z.array(z.string()).default([]),

      patterns: z.array(z.string()).default([DEFAULT_LOCALE_PATTERN]),
    })
    .default({}),
});

export type DomainResolverSettings = z.infer<typeof DomainResolverSettingsSchema>;

// =============================================================================
// Translations
// =============================================================================

/**
 * groups: one mapping file per group under <lang_path>/<locale>/
 * json:   one flat mapping file per locale at <lang_path>/<locale>.json
 */
export const TranslationDriverSchema = z.enum(['groups', 'json']);

export type TranslationDriver = z.infer<typeof TranslationDriverSchema>;

/**
 * A loaded translation value: a string leaf or a nested mapping, with the
 * other JSON scalars and lists allowed as leaves
 */
export type TranslationValue =
  | string
  | number
  | boolean
  | null
  | TranslationValue[]
  | { [key: string]: TranslationValue };

export const TranslationValueSchema: z.ZodType<TranslationValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(TranslationValueSchema),
    z.record(z.string(), TranslationValueSchema),
  ])
);

/**
 * One (locale, group) mapping of key to translation
 */
export const TranslationGroupSchema = z.record(z.string(), TranslationValueSchema);

export type TranslationGroup = z.infer<typeof TranslationGroupSchema>;

export const LazyLoadingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  auto_detect_page: z.boolean().default(false),

  /** Groups loaded on every request when lazy loading is on */
  default_groups: z.array(z.string().min(1)).default([]),

  /** Name of a registered custom page resolver */
  page_group_resolver: z.string().min(1).nullable().default(null),
});

export type LazyLoadingConfig = z.infer<typeof LazyLoadingConfigSchema>;

export const TranslationCacheConfigSchema = z.object({
  /** Enables the persistent tier; the in-memory tier is always on */
  enabled: z.boolean().default(false),

  /** Persistent tier lifetime in seconds */
  ttl: z.number().int().positive().default(3600),

  prefix: z.string().min(1).default('parlance.translations'),
});

export type TranslationCacheConfig = z.infer<typeof TranslationCacheConfigSchema>;

// =============================================================================
// URL Localization
// =============================================================================

export const UrlStrategySchema = z.enum(['prefix', 'domain']);

export type UrlStrategy = z.infer<typeof UrlStrategySchema>;

export const UrlConfigSchema = z.object({
  strategy: UrlStrategySchema.nullable().default(null),
  prefix: z
    .object({
      segment: z.number().int().positive().default(1),
    })
    .default({}),
  domain: z
    .object({
      hosts: z.record(z.string(), z.string()).default({}),
    })
    .default({}),
});

export type UrlConfig = z.infer<typeof UrlConfigSchema>;

export type UrlConfigInput = z.input<typeof UrlConfigSchema>;

// =============================================================================
// Root Configuration
// =============================================================================

export const ParlanceConfigSchema = z.object({
  /** May be empty; resolution then always yields the default locale */
  locales: z.array(z.string().min(1)).default(['en']),

  /** Null means use app_locale */
  default: z.string().min(1).nullable().default(null),

  /** Ambient application locale of the host */
  app_locale: z.string().min(1).default('en'),

  /** Legacy session key; prefer resolvers.session.key */
  session_key: z.string().min(1).default(DEFAULT_SESSION_KEY),

  /** Unset means the caller picks its own default order */
  resolution_order: z.array(z.string()).optional(),

  resolvers: z.record(z.string(), ResolverSlotSchema).default({}),

  translation_driver: TranslationDriverSchema.default('groups'),

  /** Root directory of translation files */
  lang_path: z.string().min(1).default('lang'),

  lazy_loading: LazyLoadingConfigSchema.default({}),

  cache: TranslationCacheConfigSchema.default({}),

  rtl_locales: z.array(z.string()).default([...DEFAULT_RTL_LOCALES]),

  url: UrlConfigSchema.default({}),
});

export type ParlanceConfig = z.infer<typeof ParlanceConfigSchema>;

/** Config as written by a user, before defaults are applied */
export type ParlanceConfigInput = z.input<typeof ParlanceConfigSchema>;

// =============================================================================
// Validators
// =============================================================================

export function validateParlanceConfig(input: unknown): ParlanceConfig {
  return ParlanceConfigSchema.parse(input);
}

export function safeParseParlanceConfig(input: unknown) {
  return ParlanceConfigSchema.safeParse(input);
}
