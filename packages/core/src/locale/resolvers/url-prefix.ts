import {
  UrlPrefixResolverSettingsSchema,
  type UrlPrefixResolverSettings,
} from '@parlance/schemas';

import type { LocaleRequest, LocaleResolver, ResolverFactory } from '../types.js';
import { compilePatterns, matchesAnyPattern, segmentAt, toCandidates } from './base.js';

/**
 * URL path prefix resolver with pattern validation.
 *
 * The segment only counts when it matches one of the configured patterns,
 * so `/dashboard` is not mistaken for a locale.
 */
export class UrlPrefixResolver implements LocaleResolver {
  private readonly patterns: RegExp[];

  constructor(private readonly settings: UrlPrefixResolverSettings) {
    this.patterns = compilePatterns(settings.patterns);
  }

  resolve(request: Readonly<LocaleRequest>): string | null {
    const segment = segmentAt(request.path, this.settings.segment);
    if (segment === null || !matchesAnyPattern(segment, this.patterns)) {
      return null;
    }
    return segment;
  }

  resolveAll(request: Readonly<LocaleRequest>): string[] {
    return toCandidates(this.resolve(request));
  }
}

export const createUrlPrefixResolver: ResolverFactory = (settings) =>
  new UrlPrefixResolver(UrlPrefixResolverSettingsSchema.parse(settings));
