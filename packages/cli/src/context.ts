/**
 * Shared command context: global options, output sinks and service construction
 */

import { dirname, resolve } from 'path';
import {
  LocaleService,
  MemorySessionStore,
  MemoryStore,
  extractErrorMessage,
  loadParlanceConfig,
  type SessionStore,
} from '@parlance/core';
import chalk from 'chalk';

export interface GlobalOptions {
  config?: string;
  langPath?: string;
}

/**
 * Where commands write. Tests swap these for collectors.
 */
export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Build a service from the global options.
 *
 * A relative lang_path is taken relative to the config file when one is
 * given, else to the working directory. With `locale`, the session is seeded
 * so calls without a request see that locale.
 *
 * @throws UnsupportedLocaleError when `locale` is not supported
 */
export function createService(
  options: GlobalOptions,
  locale?: string,
  session: SessionStore = new MemorySessionStore()
): LocaleService {
  const loaded = options.config ? loadParlanceConfig(options.config) : loadParlanceConfig();
  const basePath = options.config ? dirname(resolve(options.config)) : process.cwd();

  const service = new LocaleService({
    config: options.langPath ? { ...loaded, lang_path: resolve(options.langPath) } : loaded,
    session,
    store: new MemoryStore(),
    basePath,
  });

  if (locale !== undefined) {
    service.setLocale(locale);
  }

  return service;
}

/**
 * Collect a repeatable option into a list
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Turn `name=value` pairs into a record; a pair without `=` maps to ''
 */
export function parsePairs(pairs: readonly string[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator === -1) {
      record[pair] = '';
    } else {
      record[pair.slice(0, separator)] = pair.slice(separator + 1);
    }
  }
  return record;
}

/**
 * Run a command body, reporting a failure as one error line and exit code 1
 */
export function runCommand(output: CliOutput, body: () => void): void {
  try {
    body();
  } catch (error: unknown) {
    output.err(chalk.red(`Error: ${extractErrorMessage(error)}`));
    process.exitCode = 1;
  }
}
