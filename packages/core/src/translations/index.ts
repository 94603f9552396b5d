/**
 * Translations - loading, merging and caching
 *
 * @packageDocumentation
 */

export { TranslationCache } from './cache.js';
export { MemoryStore, type PersistentStore } from './persistent-store.js';
export { TieredTranslationCache, type TieredCacheOptions } from './tiered-cache.js';
export { mergeWithFallback, getByPath } from './merge.js';
export {
  TranslationLoader,
  GROUP_FILE_EXTENSIONS,
  isValidGroupName,
} from './loader.js';
export {
  PageGroupResolver,
  toGroupName,
  type CustomPageGroupResolver,
  type PageGroupResolverFn,
  type PageGroupResolverLike,
} from './page-group-resolver.js';
