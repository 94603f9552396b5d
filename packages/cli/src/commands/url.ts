import { Command } from 'commander';

import { createService, runCommand, type CliOutput, type GlobalOptions } from '../context.js';

interface UrlOptions extends GlobalOptions {
  locale: string;
}

export function createUrlCommand(output: CliOutput): Command {
  return new Command('url')
    .description('Localize a URL with the configured url strategy')
    .argument('<url>', 'URL or path to localize')
    .requiredOption('-l, --locale <code>', 'Target locale')
    .action((url: string, _options: unknown, command: Command) => {
      runCommand(output, () => {
        const options = command.optsWithGlobals<UrlOptions>();
        const service = createService(options);
        output.out(service.localizedUrl(url, service.validateLocale(options.locale)));
      });
    });
}
