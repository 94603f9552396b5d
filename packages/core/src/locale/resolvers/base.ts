/**
 * Resolver Utilities
 *
 * Request accessors and pattern helpers shared by the built-in resolvers.
 *
 * @packageDocumentation
 */

import { logger } from '../../utils/logger.js';
import type { LocaleRequest, RequestValue } from '../types.js';

/**
 * First string of a header/query value; arrays yield their first element
 */
export function firstValue(value: RequestValue): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Case-insensitive header lookup
 */
export function getHeader(request: Readonly<LocaleRequest>, name: string): string | undefined {
  const headers = request.headers;
  if (!headers) {
    return undefined;
  }

  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return firstValue(value);
    }
  }
  return undefined;
}

/**
 * Non-empty path segments, percent-decoded where possible
 */
export function pathSegments(path: string): string[] {
  const pathname = path.split(/[?#]/, 1)[0] ?? '';

  return pathname
    .split('/')
    .filter((segment) => segment !== '')
    .map((segment) => {
      try {
        return decodeURIComponent(segment);
      } catch {
        // Malformed escapes stay as written
        return segment;
      }
    });
}

/**
 * The segment at a 1-based position, or null when out of range
 */
export function segmentAt(path: string, position: number): string | null {
  const index = position - 1;
  if (index < 0) {
    return null;
  }
  return pathSegments(path)[index] ?? null;
}

/**
 * Compile configured regex sources; invalid ones are dropped with a warning
 */
export function compilePatterns(patterns: readonly string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern));
    } catch (error) {
      logger.warnWithError('Ignoring invalid locale pattern', error, { pattern });
    }
  }
  return compiled;
}

/**
 * Test a string against a list of patterns
 */
export function matchesAnyPattern(value: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(value));
}

/**
 * Wrap an optional single candidate as a candidate list
 */
export function toCandidates(candidate: string | null): string[] {
  return candidate !== null ? [candidate] : [];
}

/**
 * A non-empty string, or null
 */
export function nonEmpty(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}
