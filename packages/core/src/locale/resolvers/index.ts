/**
 * Locale Resolvers - Public Exports
 *
 * @packageDocumentation
 */

import type { ResolverFactory } from '../types.js';
import { createCookieResolver } from './cookie.js';
import { createDomainResolver } from './domain.js';
import { createHeaderResolver } from './header.js';
import { createQueryResolver } from './query.js';
import { createSessionResolver } from './session.js';
import { createUrlPrefixResolver } from './url-prefix.js';
import { createUrlSegmentResolver } from './url-segment.js';

// Base utilities
export {
  firstValue,
  getHeader,
  pathSegments,
  segmentAt,
  compilePatterns,
  matchesAnyPattern,
} from './base.js';

// Resolver implementations
export { SessionResolver, createSessionResolver } from './session.js';
export { CookieResolver, createCookieResolver } from './cookie.js';
export { QueryResolver, createQueryResolver } from './query.js';
export { HeaderResolver, createHeaderResolver, parseAcceptLanguage, type WeightedLocale } from './header.js';
export { UrlSegmentResolver, createUrlSegmentResolver } from './url-segment.js';
export { UrlPrefixResolver, createUrlPrefixResolver } from './url-prefix.js';
export { DomainResolver, createDomainResolver } from './domain.js';

/**
 * Built-in resolvers by configuration name
 */
export const BUILTIN_RESOLVERS: Readonly<Record<string, ResolverFactory>> = Object.freeze({
  session: createSessionResolver,
  cookie: createCookieResolver,
  query: createQueryResolver,
  header: createHeaderResolver,
  url_segment: createUrlSegmentResolver,
  url_prefix: createUrlPrefixResolver,
  domain: createDomainResolver,
});
