import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LogLevel, clearConfigCache, logger } from '@parlance/core';

import { flattenTranslations } from '../commands/translations.js';
import { parsePairs } from '../context.js';
import { createProgram, type CliOutput } from '../program.js';

const CONFIG = `
locales: [en, fr, ar]
resolution_order: [query, header, session]
resolvers:
  query:
    key: lang
url:
  strategy: prefix
`;

describe('parlance CLI', () => {
  let dir: string;
  let configPath: string;
  let out: string[];
  let err: string[];

  const output: CliOutput = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  };

  function run(...args: string[]): void {
    const program = createProgram(output);
    program.exitOverride();
    program.parse(['--config', configPath, ...args], { from: 'user' });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'parlance-cli-'));
    configPath = join(dir, 'parlance.yaml');
    writeFileSync(configPath, CONFIG);
    mkdirSync(join(dir, 'lang', 'en'), { recursive: true });
    mkdirSync(join(dir, 'lang', 'fr'), { recursive: true });
    writeFileSync(join(dir, 'lang', 'en', 'auth.json'), '{"login": "Login", "logout": "Logout"}');
    writeFileSync(join(dir, 'lang', 'fr', 'auth.json'), '{"login": "Connexion"}');
    writeFileSync(join(dir, 'lang', 'fr', 'users.json'), '{"title": "Utilisateurs"}');
    out = [];
    err = [];
    clearConfigCache();
    logger.setLevel(LogLevel.SILENT);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    clearConfigCache();
    logger.setLevel(LogLevel.INFO);
    process.exitCode = undefined;
  });

  describe('resolve', () => {
    it('should print the locale from the query string', () => {
      run('resolve', '--query', 'lang=fr');

      expect(out).toEqual(['fr']);
    });

    it('should fall through to the Accept-Language header', () => {
      run('resolve', '--query', 'lang=xx', '--header', 'Accept-Language=de,ar;q=0.5');

      expect(out).toEqual(['ar']);
    });

    it('should read a seeded session', () => {
      run('resolve', '--session', 'fr');

      expect(out).toEqual(['fr']);
    });

    it('should print the default locale when nothing matches', () => {
      run('resolve', '--path', '/fr/about');

      expect(out).toEqual(['en']);
    });
  });

  describe('groups', () => {
    it('should list the groups for a locale', () => {
      run('groups', '--locale', 'fr');

      expect(out).toEqual(['auth', 'users']);
    });

    it('should report an unsupported locale and set the exit code', () => {
      run('groups', '--locale', 'xx');

      expect(out).toEqual([]);
      expect(err).toHaveLength(1);
      expect(err[0]).toContain('Error: Locale "xx" is not supported. Supported locales: en, fr, ar');
      expect(process.exitCode).toBe(1);
    });

    it('should report a locale without groups', () => {
      run('groups', '--locale', 'ar');

      expect(out).toEqual([]);
      expect(err[0]).toContain('No translation groups found for ar');
    });
  });

  describe('translations', () => {
    it('should print merged groups as JSON', () => {
      run('translations', '--locale', 'fr', '--json');

      expect(JSON.parse(out.join('\n'))).toEqual({
        auth: { login: 'Connexion', logout: 'Logout' },
        users: { title: 'Utilisateurs' },
      });
    });

    it('should limit output to the requested groups', () => {
      run('translations', '--locale', 'fr', '--group', 'users', '--json');

      expect(out).toEqual([JSON.stringify({ users: { title: 'Utilisateurs' } }, null, 2)]);
    });

    it('should print one line per key without --json', () => {
      run('translations', '--locale', 'fr', '--group', 'auth');

      expect(out).toHaveLength(2);
      expect(out[0]).toContain('auth.login');
      expect(out[0]).toContain('Connexion');
      expect(out[1]).toContain('auth.logout');
      expect(out[1]).toContain('Logout');
    });
  });

  describe('direction', () => {
    it('should print the direction of a locale', () => {
      run('direction', 'ar-EG');
      run('direction', 'fr');

      expect(out).toEqual(['rtl', 'ltr']);
    });
  });

  describe('url', () => {
    it('should localize a URL', () => {
      run('url', '/en/about?x=1', '--locale', 'fr');

      expect(out).toEqual(['/fr/about?x=1']);
    });

    it('should reject an unsupported locale', () => {
      run('url', '/about', '--locale', 'de');

      expect(out).toEqual([]);
      expect(err[0]).toContain('Locale "de" is not supported');
    });
  });

  it('should report a missing config file', () => {
    configPath = join(dir, 'missing.yaml');

    run('direction', 'en');

    expect(err[0]).toContain(`Failed to load config file ${configPath}`);
    expect(process.exitCode).toBe(1);
  });
});

describe('flattenTranslations', () => {
  it('should flatten nested groups into dotted keys', () => {
    expect(flattenTranslations({ auth: { login: 'Login', nested: { a: 'A' } }, list: ['x'] })).toEqual([
      ['auth.login', 'Login'],
      ['auth.nested.a', 'A'],
      ['list', '["x"]'],
    ]);
  });
});

describe('parsePairs', () => {
  it('should split name=value pairs on the first equals sign', () => {
    expect(parsePairs(['a=1', 'b=x=y', 'flag'])).toEqual({ a: '1', b: 'x=y', flag: '' });
  });
});
