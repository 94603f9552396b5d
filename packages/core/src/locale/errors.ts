/**
 * Locale errors
 */

/**
 * Thrown when a locale is set or validated that is not in the supported set
 */
export class UnsupportedLocaleError extends Error {
  constructor(
    public readonly locale: string,
    public readonly supportedLocales: readonly string[]
  ) {
    super(`Locale "${locale}" is not supported. Supported locales: ${supportedLocales.join(', ')}`);
    this.name = 'UnsupportedLocaleError';
  }
}
