/**
 * Translation file loader
 *
 * Layout under the configured lang path:
 * - groups driver: `<lang>/<locale>/<group>.json|.yaml|.yml`, one mapping per file
 * - json driver:   `<lang>/<locale>.json`, one flat mapping per locale
 *
 * Missing sources load as `{}`. Sources that fail to parse, or parse to
 * something other than a mapping, also load as `{}` and are logged.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { extname, join, resolve } from 'path';
import yaml from 'js-yaml';
import { TranslationGroupSchema, type TranslationGroup } from '@parlance/schemas';

import { extractErrorMessage, safeJsonParse } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

/**
 * Group file extensions, in lookup order
 */
export const GROUP_FILE_EXTENSIONS = ['.json', '.yaml', '.yml'] as const;

const GROUP_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Group names are used as file names, so anything beyond letters, digits,
 * `_` and `-` is refused
 */
export function isValidGroupName(group: string): boolean {
  return GROUP_NAME_PATTERN.test(group);
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

export class TranslationLoader {
  private readonly langPath: string;

  constructor(langPath: string) {
    this.langPath = resolve(langPath);
  }

  getLangPath(): string {
    return this.langPath;
  }

  /**
   * Directory holding a locale's group files
   */
  localePath(locale: string): string {
    return join(this.langPath, locale);
  }

  /**
   * Group names available for a locale, sorted lexically
   */
  listGroups(locale: string): string[] {
    if (!isValidGroupName(locale)) {
      return [];
    }

    const dir = this.localePath(locale);
    if (!isDirectory(dir)) {
      return [];
    }

    const groups = new Set<string>();
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      if (!entry.isFile()) {
        continue;
      }

      const ext = extname(entry.name);
      const isGroupFile = GROUP_FILE_EXTENSIONS.some((candidate) => candidate === ext);
      const name = entry.name.slice(0, entry.name.length - ext.length);

      if (isGroupFile && isValidGroupName(name)) {
        groups.add(name);
      }
    }

    return Array.from(groups).sort();
  }

  /**
   * Load one group for a locale (groups driver)
   */
  loadGroup(locale: string, group: string): TranslationGroup {
    if (!isValidGroupName(locale) || !isValidGroupName(group)) {
      return {};
    }

    for (const ext of GROUP_FILE_EXTENSIONS) {
      const file = join(this.localePath(locale), `${group}${ext}`);
      if (isFile(file)) {
        return this.readMapping(file);
      }
    }

    return {};
  }

  /**
   * Load every group for a locale, keyed by group name (groups driver)
   */
  loadAllGroups(locale: string): Record<string, TranslationGroup> {
    const translations: Record<string, TranslationGroup> = {};
    for (const group of this.listGroups(locale)) {
      translations[group] = this.loadGroup(locale, group);
    }
    return translations;
  }

  /**
   * Load the single flat file for a locale (json driver)
   */
  loadJson(locale: string): TranslationGroup {
    if (!isValidGroupName(locale)) {
      return {};
    }

    const file = join(this.langPath, `${locale}.json`);
    return isFile(file) ? this.readMapping(file) : {};
  }

  private readMapping(file: string): TranslationGroup {
    let content: string;
    try {
      content = readFileSync(file, 'utf8');
    } catch (error) {
      logger.warnWithError('Could not read translation file', error, { file });
      return {};
    }

    let data: unknown;
    if (extname(file) === '.json') {
      const parsed = safeJsonParse(content);
      if (!parsed.success) {
        logger.warn('Translation file is not valid JSON', { file, error: parsed.error });
        return {};
      }
      data = parsed.data;
    } else {
      try {
        data = yaml.load(content, { schema: yaml.JSON_SCHEMA });
      } catch (error) {
        logger.warn('Translation file is not valid YAML', { file, error: extractErrorMessage(error) });
        return {};
      }
    }

    // An empty YAML document is an empty group, not a malformed one
    if (data === undefined || data === null) {
      return {};
    }

    const result = TranslationGroupSchema.safeParse(data);
    if (!result.success) {
      logger.warn('Translation file does not contain a mapping', { file });
      return {};
    }

    return result.data;
  }
}
