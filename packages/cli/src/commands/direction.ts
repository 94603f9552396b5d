import { Command } from 'commander';

import { createService, runCommand, type CliOutput, type GlobalOptions } from '../context.js';

export function createDirectionCommand(output: CliOutput): Command {
  return new Command('direction')
    .description('Print the text direction (ltr or rtl) of a locale')
    .argument('<locale>', 'Locale code')
    .action((locale: string, _options: unknown, command: Command) => {
      runCommand(output, () => {
        const service = createService(command.optsWithGlobals<GlobalOptions>());
        output.out(service.getDirection(locale));
      });
    });
}
