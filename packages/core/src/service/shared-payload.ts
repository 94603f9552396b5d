/**
 * Shared payload handed to front-end views on every request
 */

import type { TranslationGroup } from '@parlance/schemas';

import type { LocaleRequest } from '../locale/types.js';
import type { LocaleService, TextDirection, TranslationPayload } from './locale-service.js';

export interface SharedPayload {
  locale: string;
  locales: string[];
  translations: TranslationPayload | Record<string, TranslationGroup>;
  direction: TextDirection;
  isRtl: boolean;
}

export interface SharedPayloadOptions {
  /** Load exactly these groups */
  groups?: readonly string[];

  /** Load the groups this page maps to (with lazy_loading.auto_detect_page on) */
  pageId?: string;
}

/**
 * Build the per-request payload.
 *
 * Translation selection, first match wins: explicit groups, then the page's
 * groups when auto-detection is on, then the service's default selection.
 */
export function buildSharedPayload(
  service: LocaleService,
  request: Readonly<LocaleRequest>,
  options: SharedPayloadOptions = {}
): SharedPayload {
  const locale = service.getLocale(request);
  const lazy = service.getConfig().lazy_loading;

  let translations: SharedPayload['translations'];
  if (options.groups) {
    translations = service.translationsFor(options.groups, request);
  } else if (options.pageId !== undefined && lazy.enabled && lazy.auto_detect_page) {
    translations = service.translationsForPage(options.pageId, request);
  } else {
    translations = service.translations(request);
  }

  const isRtl = service.isRtl(locale);

  return {
    locale,
    locales: service.supportedLocales(),
    translations,
    direction: isRtl ? 'rtl' : 'ltr',
    isRtl,
  };
}
