import { Command } from 'commander';
import chalk from 'chalk';

import {
  collect,
  createService,
  runCommand,
  type CliOutput,
  type GlobalOptions,
} from '../context.js';

interface TranslationsOptions extends GlobalOptions {
  locale?: string;
  group: string[];
  page?: string;
  json?: boolean;
}

/**
 * Flatten nested translations into `dotted.key → leaf` lines
 */
export function flattenTranslations(value: unknown, prefix = ''): Array<[string, string]> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.entries(value).flatMap(([key, nested]) =>
      flattenTranslations(nested, prefix === '' ? key : `${prefix}.${key}`)
    );
  }

  return [[prefix, typeof value === 'string' ? value : JSON.stringify(value)]];
}

function handleTranslations(options: TranslationsOptions, output: CliOutput): void {
  const service = createService(options, options.locale);

  let translations: unknown;
  if (options.group.length > 0) {
    translations = service.translationsFor(options.group);
  } else if (options.page !== undefined) {
    translations = service.translationsForPage(options.page);
  } else {
    translations = service.translations();
  }

  if (options.json) {
    output.out(JSON.stringify(translations, null, 2));
    return;
  }

  const lines = flattenTranslations(translations);
  if (lines.length === 0) {
    output.err(chalk.yellow('No translations found'));
    return;
  }

  for (const [key, text] of lines) {
    output.out(`${chalk.cyan(key)} ${text}`);
  }
}

export function createTranslationsCommand(output: CliOutput): Command {
  return new Command('translations')
    .description('Show merged translations for a locale')
    .option('-l, --locale <code>', 'Locale (default: the configured default)')
    .option('-g, --group <name>', 'Only this group (repeatable)', collect, [])
    .option('-p, --page <id>', 'Only the groups a page maps to')
    .option('--json', 'Output as JSON')
    .action((_options: unknown, command: Command) => {
      runCommand(output, () => handleTranslations(command.optsWithGlobals<TranslationsOptions>(), output));
    });
}
