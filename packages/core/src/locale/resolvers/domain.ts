/**
 * Domain Resolver
 *
 * Supports:
 * - Full domain mapping (example.de → de)
 * - Subdomain extraction (fr.example.com → fr)
 * - Configurable evaluation order (full map first vs subdomain first)
 */

import {
  DomainResolverSettingsSchema,
  type DomainResolverSettings,
} from '@parlance/schemas';

import type { LocaleRequest, LocaleResolver, ResolverFactory } from '../types.js';
import { compilePatterns, matchesAnyPattern, toCandidates } from './base.js';

export class DomainResolver implements LocaleResolver {
  private readonly patterns: RegExp[];

  constructor(private readonly settings: DomainResolverSettings) {
    this.patterns = compilePatterns(settings.subdomain.patterns);
  }

  resolve(request: Readonly<LocaleRequest>): string | null {
    const host = request.host;
    if (!host) {
      return null;
    }

    for (const strategy of this.settings.order) {
      let locale: string | null = null;
      if (strategy === 'full') {
        locale = this.resolveFromFullMap(host);
      } else if (strategy === 'subdomain') {
        locale = this.resolveFromSubdomain(host);
      }

      if (locale !== null) {
        return locale;
      }
    }

    return null;
  }

  resolveAll(request: Readonly<LocaleRequest>): string[] {
    return toCandidates(this.resolve(request));
  }

  private resolveFromFullMap(host: string): string | null {
    return Object.hasOwn(this.settings.full_map, host) ? this.settings.full_map[host] ?? null : null;
  }

  private resolveFromSubdomain(host: string): string | null {
    const { enabled, label } = this.settings.subdomain;
    if (!enabled) {
      return null;
    }

    const parts = host.split('.');

    // subdomain.domain.tld at minimum
    if (parts.length < 3) {
      return null;
    }

    const subdomain = label >= 1 ? parts[label - 1] : undefined;
    if (subdomain === undefined) {
      return null;
    }

    if (!this.isAllowedBaseDomain(host)) {
      return null;
    }

    return matchesAnyPattern(subdomain, this.patterns) ? subdomain : null;
  }

  private isAllowedBaseDomain(host: string): boolean {
    const baseDomains = this.settings.subdomain.base_domains;
    if (baseDomains.length === 0) {
      return true;
    }
    return baseDomains.some((base) => host === base || host.endsWith(`.${base}`));
  }
}

export const createDomainResolver: ResolverFactory = (settings) =>
  new DomainResolver(DomainResolverSettingsSchema.parse(settings));
