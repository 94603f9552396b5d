import {
  UrlSegmentResolverSettingsSchema,
  type UrlSegmentResolverSettings,
} from '@parlance/schemas';

import type { LocaleRequest, LocaleResolver, ResolverFactory } from '../types.js';
import { segmentAt, toCandidates } from './base.js';

/**
 * Returns the path segment at the configured position verbatim.
 * No format check is made; see UrlPrefixResolver for the validating variant.
 */
export class UrlSegmentResolver implements LocaleResolver {
  constructor(private readonly settings: UrlSegmentResolverSettings) {}

  resolve(request: Readonly<LocaleRequest>): string | null {
    return segmentAt(request.path, this.settings.position);
  }

  resolveAll(request: Readonly<LocaleRequest>): string[] {
    return toCandidates(this.resolve(request));
  }
}

export const createUrlSegmentResolver: ResolverFactory = (settings) =>
  new UrlSegmentResolver(UrlSegmentResolverSettingsSchema.parse(settings));
