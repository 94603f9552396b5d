import { Command } from 'commander';
import { MemorySessionStore, type LocaleRequest } from '@parlance/core';

import {
  collect,
  createService,
  parsePairs,
  runCommand,
  type CliOutput,
  type GlobalOptions,
} from '../context.js';

interface ResolveOptions extends GlobalOptions {
  path: string;
  host?: string;
  query: string[];
  header: string[];
  cookie: string[];
  session?: string;
}

/**
 * Handle 'resolve': run the resolver chain against a described request
 */
function handleResolve(options: ResolveOptions, output: CliOutput): void {
  const session = new MemorySessionStore();
  const service = createService(options, undefined, session);

  if (options.session !== undefined) {
    session.put(service.sessionKey(), options.session);
  }

  const request: LocaleRequest = {
    path: options.path,
    host: options.host,
    query: parsePairs(options.query),
    headers: parsePairs(options.header),
    cookies: parsePairs(options.cookie),
  };

  output.out(service.getLocale(request));
}

export function createResolveCommand(output: CliOutput): Command {
  return new Command('resolve')
    .description('Resolve the locale for a request described by flags')
    .option('--path <path>', 'Request path', '/')
    .option('--host <host>', 'Request host')
    .option('--query <name=value>', 'Query parameter (repeatable)', collect, [])
    .option('--header <name=value>', 'Request header (repeatable)', collect, [])
    .option('--cookie <name=value>', 'Cookie (repeatable)', collect, [])
    .option('--session <locale>', 'Locale stored in the session')
    .action((_options: unknown, command: Command) => {
      runCommand(output, () => handleResolve(command.optsWithGlobals<ResolveOptions>(), output));
    });
}
