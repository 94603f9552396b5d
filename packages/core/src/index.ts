/**
 * @parlance/core
 *
 * Request locale resolution, translation loading with default-locale
 * fallback, and locale-aware URLs.
 *
 * @packageDocumentation
 */

// Service
export {
  LocaleService,
  type LocaleServiceOptions,
  type TextDirection,
  type TranslationPayload,
} from './service/locale-service.js';
export {
  buildSharedPayload,
  type SharedPayload,
  type SharedPayloadOptions,
} from './service/shared-payload.js';

// Locale resolution
export * from './locale/index.js';

// Translations
export * from './translations/index.js';

// URLs
export * from './url/index.js';

// Configuration
export {
  loadParlanceConfig,
  resolveConfig,
  getDefaultConfigPath,
  clearConfigCache,
} from './utils/config-loader.js';

// Logging
export { Logger, LogLevel, getLogger, logger, type LogContext } from './utils/logger.js';

// Errors
export { extractErrorMessage } from './utils/error-handler.js';
