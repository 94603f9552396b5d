import { QueryResolverSettingsSchema, type QueryResolverSettings } from '@parlance/schemas';

import type { LocaleRequest, LocaleResolver, ResolverFactory } from '../types.js';
import { firstValue, nonEmpty, toCandidates } from './base.js';

/**
 * Reads the locale from a query parameter, e.g. `?locale=fr`
 */
export class QueryResolver implements LocaleResolver {
  constructor(private readonly settings: QueryResolverSettings) {}

  resolve(request: Readonly<LocaleRequest>): string | null {
    return nonEmpty(firstValue(request.query?.[this.settings.key]));
  }

  resolveAll(request: Readonly<LocaleRequest>): string[] {
    return toCandidates(this.resolve(request));
  }
}

export const createQueryResolver: ResolverFactory = (settings) =>
  new QueryResolver(QueryResolverSettingsSchema.parse(settings));
