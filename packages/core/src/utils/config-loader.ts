/**
 * YAML Configuration Loader
 * Loads and caches parlance configuration from YAML files with Zod validation
 */

import { readFileSync } from 'fs';
import { dirname, extname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import {
  ParlanceConfigSchema,
  type ParlanceConfig,
  type ParlanceConfigInput,
} from '@parlance/schemas';

import { extractErrorMessage } from './error-handler.js';
import { deepFreeze } from './object-utils.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Cache for loaded configurations, keyed by absolute path
const configCache = new Map<string, Readonly<ParlanceConfig>>();

/**
 * Path of the packaged default configuration
 */
export function getDefaultConfigPath(): string {
  // src/utils -> ../../config-defaults
  return join(__dirname, '../../config-defaults/parlance.yaml');
}

/**
 * Validate an in-code configuration, filling defaults. The result is frozen.
 */
export function resolveConfig(input: ParlanceConfigInput = {}): Readonly<ParlanceConfig> {
  const result = ParlanceConfigSchema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid parlance configuration: ${result.error.message}`);
  }
  return deepFreeze(result.data);
}

/**
 * Load a YAML configuration file (defaults to the packaged one)
 */
export function loadParlanceConfig(filename: string = getDefaultConfigPath()): Readonly<ParlanceConfig> {
  const configPath = resolve(filename);

  const cached = configCache.get(configPath);
  if (cached) {
    return cached;
  }

  try {
    const ext = extname(configPath).toLowerCase();
    if (ext !== '.yaml' && ext !== '.yml') {
      throw new Error('Only .yaml/.yml files are allowed.');
    }

    const fileContents = readFileSync(configPath, 'utf8');

    // Empty files mean "all defaults"
    const raw: unknown = yaml.load(fileContents) ?? {};

    const result = ParlanceConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(`Validation failed: ${result.error.message}`);
    }

    const config = deepFreeze(result.data);
    configCache.set(configPath, config);
    return config;
  } catch (error) {
    throw new Error(`Failed to load config file ${filename}: ${extractErrorMessage(error)}`);
  }
}

/**
 * Clear the configuration cache
 * Useful for testing or reloading configs
 */
export function clearConfigCache(): void {
  configCache.clear();
}
