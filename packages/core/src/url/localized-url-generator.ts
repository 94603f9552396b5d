/**
 * Localized URL generation
 *
 * Supports two strategies:
 * - prefix: insert or replace the locale segment in the path (/fr/dashboard)
 * - domain: replace the host from a locale → host map (fr.example.com)
 *
 * Unparsable URLs, unmapped locales and an unset strategy all return the
 * input unchanged.
 */

import { DEFAULT_LOCALE_PATTERN, type UrlConfig } from '@parlance/schemas';

import { buildUrl, parseUrl } from './parse-url.js';

const LOCALE_SEGMENT = new RegExp(DEFAULT_LOCALE_PATTERN);

/**
 * Whether a path segment looks like a locale code (en, en-US, en_US)
 */
export function looksLikeLocale(segment: string): boolean {
  return LOCALE_SEGMENT.test(segment);
}

export class LocalizedUrlGenerator {
  /**
   * @param currentLocale - Supplies the locale when a call does not name one
   */
  constructor(
    private readonly config: UrlConfig,
    private readonly currentLocale: () => string
  ) {}

  getStrategy(): UrlConfig['strategy'] {
    return this.config.strategy;
  }

  /**
   * Localize a URL for a locale (defaults to the current locale)
   */
  localizedUrl(url: string, locale?: string): string {
    const target = locale ?? this.currentLocale();

    switch (this.config.strategy) {
      case 'prefix':
        return this.applyPrefixStrategy(url, target);
      case 'domain':
        return this.applyDomainStrategy(url, target);
      default:
        return url;
    }
  }

  /**
   * URL that shows the current page in another locale
   */
  switchLocaleUrl(locale: string, currentUrl: string): string {
    return this.localizedUrl(currentUrl, locale);
  }

  private applyPrefixStrategy(url: string, locale: string): string {
    const parts = parseUrl(url);
    if (!parts) {
      return url;
    }

    const segments = parts.path.split('/').filter((segment) => segment !== '');
    const index = this.config.prefix.segment - 1;

    const existing = segments[index];
    if (existing !== undefined && looksLikeLocale(existing)) {
      segments[index] = locale;
    } else {
      // Past the end appends, like a splice
      segments.splice(index, 0, locale);
    }

    return buildUrl({ ...parts, path: `/${segments.join('/')}` });
  }

  private applyDomainStrategy(url: string, locale: string): string {
    const hosts = this.config.domain.hosts;
    if (!Object.hasOwn(hosts, locale)) {
      return url;
    }

    const parts = parseUrl(url);
    if (!parts) {
      return url;
    }

    const host = hosts[locale];
    if (host === undefined || host === '') {
      return url;
    }

    return buildUrl({ ...parts, host, path: parts.path === '' ? '/' : parts.path });
  }
}
