import { CookieResolverSettingsSchema, type CookieResolverSettings } from '@parlance/schemas';

import type { LocaleRequest, LocaleResolver, ResolverFactory } from '../types.js';
import { nonEmpty, toCandidates } from './base.js';

/**
 * Reads the locale from a request cookie; an empty cookie counts as absent
 */
export class CookieResolver implements LocaleResolver {
  constructor(private readonly settings: CookieResolverSettings) {}

  resolve(request: Readonly<LocaleRequest>): string | null {
    return nonEmpty(request.cookies?.[this.settings.key]);
  }

  resolveAll(request: Readonly<LocaleRequest>): string[] {
    return toCandidates(this.resolve(request));
  }
}

export const createCookieResolver: ResolverFactory = (settings) =>
  new CookieResolver(CookieResolverSettingsSchema.parse(settings));
