/**
 * Fallback merging of translation data
 */

import type { TranslationGroup, TranslationValue } from '@parlance/schemas';

import { isPlainObject } from '../utils/object-utils.js';

function isMapping(value: TranslationValue | undefined): value is { [key: string]: TranslationValue } {
  return isPlainObject(value);
}

/**
 * Merge default-locale data under current-locale data.
 *
 * Current values win on conflict; keys missing from current are filled from
 * fallback; nested mappings merge recursively. Lists and scalars are leaves.
 */
export function mergeWithFallback(fallback: TranslationGroup, current: TranslationGroup): TranslationGroup {
  const merged: TranslationGroup = { ...fallback };

  for (const [key, value] of Object.entries(current)) {
    if (key === '__proto__') {
      continue;
    }
    const base = Object.hasOwn(merged, key) ? merged[key] : undefined;
    merged[key] = isMapping(base) && isMapping(value) ? mergeWithFallback(base, value) : value;
  }

  return merged;
}

/**
 * Read a dotted path (`nested.title`) out of a group
 */
export function getByPath(group: TranslationGroup, path: string): TranslationValue | undefined {
  let node: TranslationValue | undefined = group;

  for (const part of path.split('.')) {
    if (!isMapping(node) || !Object.hasOwn(node, part)) {
      return undefined;
    }
    node = node[part];
  }

  return node;
}
