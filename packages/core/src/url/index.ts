export { LocalizedUrlGenerator, looksLikeLocale } from './localized-url-generator.js';
export { parseUrl, buildUrl, type UrlParts } from './parse-url.js';
