import { Command } from 'commander';
import chalk from 'chalk';

import { createService, runCommand, type CliOutput, type GlobalOptions } from '../context.js';

interface GroupsOptions extends GlobalOptions {
  locale?: string;
}

export function createGroupsCommand(output: CliOutput): Command {
  return new Command('groups')
    .description('List translation groups available for a locale')
    .option('-l, --locale <code>', 'Locale (default: the configured default)')
    .action((_options: unknown, command: Command) => {
      runCommand(output, () => {
        const options = command.optsWithGlobals<GroupsOptions>();
        const service = createService(options, options.locale);
        const groups = service.availableGroups();

        if (groups.length === 0) {
          output.err(chalk.yellow(`No translation groups found for ${service.getLocale()}`));
          return;
        }

        for (const group of groups) {
          output.out(group);
        }
      });
    });
}
