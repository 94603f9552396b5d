import { mkdirSync, mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

/**
 * Write a translation tree into a fresh temp directory and return its path
 */
export function createLangDir(files: Record<string, string | object>): string {
  const root = mkdtempSync(join(tmpdir(), 'parlance-lang-'));
  writeLangFiles(root, files);
  return root;
}

export function writeLangFiles(root: string, files: Record<string, string | object>): void {
  for (const [relative, content] of Object.entries(files)) {
    const file = join(root, relative);
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
  }
}

export const GROUP_FILES: Record<string, string | object> = {
  'en/auth.json': {
    login: 'Login',
    logout: 'Logout',
    welcome: 'Welcome, :name',
    nested: { title: 'Title', subtitle: 'Subtitle' },
  },
  'en/menu.yaml': 'home: Home\nabout: About\n',
  'fr/auth.json': { login: 'Connexion', nested: { title: 'Titre' } },
  'fr/users.json': { title: 'Utilisateurs' },
  'ar/auth.json': { login: 'Dukhul' },
};
