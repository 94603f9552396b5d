import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { LogLevel, logger } from '../../utils/logger.js';
import { TranslationCache } from '../cache.js';
import { MemoryStore } from '../persistent-store.js';
import { TieredTranslationCache } from '../tiered-cache.js';

const CACHE_CONFIG = { enabled: true, ttl: 60, prefix: 'test.translations' };

describe('TranslationCache', () => {
  let cache: TranslationCache;

  beforeEach(() => {
    cache = new TranslationCache();
  });

  it('should return null on a miss', () => {
    expect(cache.has('fr', 'auth')).toBe(false);
    expect(cache.get('fr', 'auth')).toBeNull();
  });

  it('should return what was put', () => {
    cache.put('fr', 'auth', { login: 'Connexion' });

    expect(cache.has('fr', 'auth')).toBe(true);
    expect(cache.get('fr', 'auth')).toEqual({ login: 'Connexion' });
  });

  it('should list every group of a locale', () => {
    cache.put('fr', 'auth', { login: 'Connexion' });
    cache.put('fr', 'menu', { home: 'Accueil' });
    cache.put('de', 'auth', { login: 'Anmelden' });

    expect(cache.getAllForLocale('fr')).toEqual({
      auth: { login: 'Connexion' },
      menu: { home: 'Accueil' },
    });
    expect(cache.getAllForLocale('es')).toEqual({});
  });

  it('should forget single groups and whole locales', () => {
    cache.put('fr', 'auth', { login: 'Connexion' });
    cache.put('fr', 'menu', { home: 'Accueil' });
    cache.put('de', 'auth', { login: 'Anmelden' });

    cache.forget('fr', 'auth');
    expect(cache.has('fr', 'auth')).toBe(false);
    expect(cache.has('fr', 'menu')).toBe(true);

    cache.flushLocale('fr');
    expect(cache.has('fr', 'menu')).toBe(false);
    expect(cache.has('de', 'auth')).toBe(true);

    cache.flush();
    expect(cache.has('de', 'auth')).toBe(false);
  });
});

describe('MemoryStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should expire entries after their ttl', () => {
    const now = vi.spyOn(Date, 'now').mockReturnValue(1_000_000);
    const store = new MemoryStore();

    store.put('key', { a: 'b' }, 10);
    now.mockReturnValue(1_009_999);
    expect(store.get('key')).toEqual({ a: 'b' });

    now.mockReturnValue(1_010_000);
    expect(store.get('key')).toBeUndefined();
    expect(store.keys()).toEqual([]);
  });

  it('should forget and clear entries', () => {
    const store = new MemoryStore();
    store.put('a', 1, 60);
    store.put('b', 2, 60);

    store.forget('a');
    expect(store.has('a')).toBe(false);
    expect(store.has('b')).toBe(true);

    store.clear();
    expect(store.keys()).toEqual([]);
  });
});

describe('TieredTranslationCache', () => {
  beforeEach(() => {
    logger.setLevel(LogLevel.SILENT);
  });

  afterEach(() => {
    logger.setLevel(LogLevel.INFO);
  });

  it('should build persistent keys from prefix, locale and group', () => {
    const tiered = new TieredTranslationCache({ config: CACHE_CONFIG, store: new MemoryStore() });

    expect(tiered.key('fr', 'auth')).toBe('test.translations.fr.auth');
  });

  it('should write both tiers', () => {
    const store = new MemoryStore();
    const tiered = new TieredTranslationCache({ config: CACHE_CONFIG, store });

    tiered.put('fr', 'auth', { login: 'Connexion' });

    expect(tiered.memory.get('fr', 'auth')).toEqual({ login: 'Connexion' });
    expect(store.get('test.translations.fr.auth')).toEqual({ login: 'Connexion' });
  });

  it('should promote a persistent hit into memory', () => {
    const store = new MemoryStore();
    store.put('test.translations.fr.auth', { login: 'Connexion' }, 60);
    const tiered = new TieredTranslationCache({ config: CACHE_CONFIG, store });

    expect(tiered.get('fr', 'auth')).toEqual({ login: 'Connexion' });
    expect(tiered.memory.get('fr', 'auth')).toEqual({ login: 'Connexion' });
  });

  it('should check memory before the persistent tier', () => {
    const store = new MemoryStore();
    const get = vi.spyOn(store, 'get');
    const tiered = new TieredTranslationCache({ config: CACHE_CONFIG, store });
    tiered.memory.put('fr', 'auth', { login: 'Connexion' });

    expect(tiered.get('fr', 'auth')).toEqual({ login: 'Connexion' });
    expect(get).not.toHaveBeenCalled();
  });

  it('should treat a malformed persistent value as a miss', () => {
    const store = new MemoryStore();
    store.put('test.translations.fr.auth', 'not a mapping', 60);
    const tiered = new TieredTranslationCache({ config: CACHE_CONFIG, store });

    expect(tiered.get('fr', 'auth')).toBeNull();
    expect(tiered.memory.has('fr', 'auth')).toBe(false);
  });

  it('should ignore the store when the persistent tier is disabled', () => {
    const store = new MemoryStore();
    const tiered = new TieredTranslationCache({ config: { ...CACHE_CONFIG, enabled: false }, store });

    tiered.put('fr', 'auth', { login: 'Connexion' });

    expect(tiered.hasPersistentTier()).toBe(false);
    expect(store.keys()).toEqual([]);
    expect(tiered.get('fr', 'auth')).toEqual({ login: 'Connexion' });
  });

  it('should flush a locale from both tiers', () => {
    const store = new MemoryStore();
    const tiered = new TieredTranslationCache({ config: CACHE_CONFIG, store });
    tiered.put('fr', 'auth', { login: 'Connexion' });
    tiered.put('fr', 'menu', { home: 'Accueil' });
    tiered.put('de', 'auth', { login: 'Anmelden' });

    tiered.flushLocale('fr', ['auth', 'menu']);

    expect(tiered.get('fr', 'auth')).toBeNull();
    expect(tiered.get('fr', 'menu')).toBeNull();
    expect(store.keys()).toEqual(['test.translations.de.auth']);
  });
});
