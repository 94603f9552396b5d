/**
 * parlance - locale resolution and translation diagnostics
 *
 * @packageDocumentation
 */

import { createRequire } from 'module';
import { Command } from 'commander';
import { LogLevel, logger } from '@parlance/core';

import { consoleOutput, type CliOutput } from './context.js';
import { createDirectionCommand } from './commands/direction.js';
import { createGroupsCommand } from './commands/groups.js';
import { createResolveCommand } from './commands/resolve.js';
import { createTranslationsCommand } from './commands/translations.js';
import { createUrlCommand } from './commands/url.js';

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../package.json');
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Build the CLI program. Output goes through `output` so it can be captured.
 */
export function createProgram(output: CliOutput = consoleOutput): Command {
  const program = new Command('parlance')
    .description('Inspect locale resolution, translations and localized URLs')
    .version(readVersion())
    .option('-c, --config <file>', 'YAML configuration file (default: packaged defaults)')
    .option('--lang-path <dir>', 'Translation root, overriding lang_path')
    .option('--debug', 'Log resolver decisions')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ debug?: boolean }>().debug) {
        logger.setLevel(LogLevel.DEBUG);
      }
    });

  program.addCommand(createResolveCommand(output));
  program.addCommand(createGroupsCommand(output));
  program.addCommand(createTranslationsCommand(output));
  program.addCommand(createDirectionCommand(output));
  program.addCommand(createUrlCommand(output));

  return program;
}

export { consoleOutput, type CliOutput, type GlobalOptions } from './context.js';
