/**
 * Locale Resolution
 *
 * Normalization, the resolver chain and its host-facing contracts.
 *
 * @packageDocumentation
 */

export type {
  RequestValue,
  LocaleRequest,
  SessionStore,
  CookieJar,
  AppLocale,
  LocaleResolver,
  ResolverDependencies,
  ResolverFactory,
} from './types.js';

export { normalizeLocale, baseLanguage } from './normalizer.js';
export { UnsupportedLocaleError } from './errors.js';
export { LocaleResolverManager, type ResolverManagerOptions } from './resolver-manager.js';
export {
  MemorySessionStore,
  MemoryCookieJar,
  AppLocaleHolder,
  type QueuedCookie,
} from './stores.js';
export * from './resolvers/index.js';
