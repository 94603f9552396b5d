/**
 * Locale normalization
 *
 * Canonical form is `language` or `language_REGION`:
 * - surrounding whitespace trimmed
 * - hyphens become underscores (en-US → en_US)
 * - language lowercased, everything after the first separator uppercased
 *
 * The region part is never split again, so `zh-hant-tw` becomes `zh_HANT_TW`.
 * The result is not guaranteed to be a real locale; callers validate it
 * against the supported set.
 */
export function normalizeLocale(raw: string): string {
  const locale = raw.trim().replace(/-/g, '_');

  const separator = locale.indexOf('_');
  if (separator === -1) {
    return locale.toLowerCase();
  }

  const language = locale.slice(0, separator).toLowerCase();
  const region = locale.slice(separator + 1).toUpperCase();

  return `${language}_${region}`;
}

/**
 * Base language of a locale code (the part before any region separator),
 * after normalization
 */
export function baseLanguage(raw: string): string {
  const normalized = normalizeLocale(raw);
  const separator = normalized.indexOf('_');
  return separator === -1 ? normalized : normalized.slice(0, separator);
}
