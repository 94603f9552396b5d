/**
 * Accept-Language Resolver
 *
 * Two modes:
 * - quality (default): candidates sorted by q-value, highest first; equal
 *   values keep header order
 * - simple: header order, `;q=` parameters stripped
 *
 * Quality values default to 1.0, are clamped to [0, 1], and parse to 0.0
 * when unreadable or not finite. Blank entries never become candidates.
 */

import { HeaderResolverSettingsSchema, type HeaderResolverSettings } from '@parlance/schemas';

import type { LocaleRequest, LocaleResolver, ResolverFactory } from '../types.js';
import { getHeader } from './base.js';

export interface WeightedLocale {
  tag: string;
  quality: number;
}

/**
 * Read a q-value the way a lenient float cast does: leading numeric prefix,
 * anything unreadable is 0
 */
function parseQuality(raw: string): number {
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

/**
 * Parse an Accept-Language header into (tag, quality) pairs in header order.
 * A tag listed twice keeps its first position and its last quality.
 */
export function parseAcceptLanguage(header: string): WeightedLocale[] {
  const entries = new Map<string, number>();

  for (const part of header.split(',')) {
    const trimmed = part.trim();
    if (trimmed === '') {
      continue;
    }

    const [rawTag = '', rawParam] = trimmed.split(';');
    const tag = rawTag.trim();
    if (tag === '') {
      continue;
    }

    let quality = 1;
    if (rawParam !== undefined) {
      const param = rawParam.trim();
      if (param.startsWith('q=')) {
        quality = parseQuality(param.slice(2));
      }
    }

    entries.set(tag, quality);
  }

  return Array.from(entries, ([tag, quality]) => ({ tag, quality }));
}

export class HeaderResolver implements LocaleResolver {
  constructor(private readonly settings: HeaderResolverSettings) {}

  resolve(request: Readonly<LocaleRequest>): string | null {
    return this.resolveAll(request)[0] ?? null;
  }

  resolveAll(request: Readonly<LocaleRequest>): string[] {
    const header = getHeader(request, 'accept-language');
    if (header === undefined || header === '') {
      return [];
    }

    return this.settings.use_quality ? this.parseWithQuality(header) : this.parseSimple(header);
  }

  private parseWithQuality(header: string): string[] {
    // Array.prototype.sort is stable, so equal qualities keep header order
    return parseAcceptLanguage(header)
      .sort((a, b) => b.quality - a.quality)
      .map((entry) => entry.tag);
  }

  private parseSimple(header: string): string[] {
    const locales: string[] = [];

    for (const part of header.split(',')) {
      const tag = (part.split(';', 1)[0] ?? '').trim();
      if (tag !== '') {
        locales.push(tag);
      }
    }

    return locales;
  }
}

export const createHeaderResolver: ResolverFactory = (settings) =>
  new HeaderResolver(HeaderResolverSettingsSchema.parse(settings));
