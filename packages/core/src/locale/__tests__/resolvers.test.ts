import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { LogLevel, logger } from '../../utils/logger.js';
import { MemorySessionStore } from '../stores.js';
import {
  CookieResolver,
  DomainResolver,
  HeaderResolver,
  QueryResolver,
  SessionResolver,
  UrlPrefixResolver,
  UrlSegmentResolver,
  createDomainResolver,
  createHeaderResolver,
  createSessionResolver,
  getHeader,
  parseAcceptLanguage,
  pathSegments,
  segmentAt,
} from '../resolvers/index.js';
import type { LocaleRequest } from '../types.js';

function request(overrides: Partial<LocaleRequest> = {}): LocaleRequest {
  return { path: '/', ...overrides };
}

describe('resolver utilities', () => {
  it('should look up headers case-insensitively', () => {
    const req = request({ headers: { 'Accept-Language': 'fr' } });
    expect(getHeader(req, 'accept-language')).toBe('fr');
  });

  it('should take the first value of a repeated header', () => {
    const req = request({ headers: { 'accept-language': ['de', 'fr'] } });
    expect(getHeader(req, 'Accept-Language')).toBe('de');
  });

  it('should split a path into decoded segments without query or fragment', () => {
    expect(pathSegments('//fr/caf%C3%A9/?x=1#top')).toEqual(['fr', 'café']);
  });

  it('should keep malformed escapes as written', () => {
    expect(pathSegments('/%E0%A4%A/x')).toEqual(['%E0%A4%A', 'x']);
  });

  it('should return null for out-of-range segment positions', () => {
    expect(segmentAt('/fr/about', 2)).toBe('about');
    expect(segmentAt('/fr/about', 3)).toBeNull();
    expect(segmentAt('/fr/about', 0)).toBeNull();
  });
});

describe('SessionResolver', () => {
  it('should read the locale under the configured key', () => {
    const session = new MemorySessionStore({ 'app.locale': 'fr' });
    const resolver = new SessionResolver({ key: 'app.locale' }, session);

    expect(resolver.resolve(request())).toBe('fr');
    expect(resolver.resolveAll(request())).toEqual(['fr']);
  });

  it('should treat an empty value as absent', () => {
    const session = new MemorySessionStore({ 'parlance.locale': '' });
    const resolver = createSessionResolver({}, { session });

    expect(resolver.resolve(request())).toBeNull();
    expect(resolver.resolveAll(request())).toEqual([]);
  });

  it('should read the session at resolve time', () => {
    const session = new MemorySessionStore();
    const resolver = createSessionResolver({}, { session });

    session.put('parlance.locale', 'de');
    expect(resolver.resolve(request())).toBe('de');
  });
});

describe('CookieResolver', () => {
  it('should read the configured cookie', () => {
    const resolver = new CookieResolver({ key: 'lang', persist_on_set: false, minutes: 10 });
    expect(resolver.resolve(request({ cookies: { lang: 'es' } }))).toBe('es');
  });

  it('should ignore an empty cookie', () => {
    const resolver = new CookieResolver({ key: 'lang', persist_on_set: false, minutes: 10 });
    expect(resolver.resolveAll(request({ cookies: { lang: '' } }))).toEqual([]);
  });
});

describe('QueryResolver', () => {
  it('should read the configured parameter', () => {
    const resolver = new QueryResolver({ key: 'lang' });
    expect(resolver.resolve(request({ query: { lang: 'it' } }))).toBe('it');
  });

  it('should take the first of repeated parameters', () => {
    const resolver = new QueryResolver({ key: 'locale' });
    expect(resolver.resolve(request({ query: { locale: ['nl', 'fr'] } }))).toBe('nl');
  });

  it('should return null when the parameter is missing', () => {
    const resolver = new QueryResolver({ key: 'locale' });
    expect(resolver.resolve(request({ query: {} }))).toBeNull();
  });
});

describe('HeaderResolver', () => {
  it('should order candidates by quality', () => {
    const resolver = new HeaderResolver({ use_quality: true });
    const req = request({ headers: { 'accept-language': 'en;q=0.5,fr;q=0.9,de;q=0.7' } });

    expect(resolver.resolveAll(req)).toEqual(['fr', 'de', 'en']);
    expect(resolver.resolve(req)).toBe('fr');
  });

  it('should keep header order for equal qualities', () => {
    const resolver = createHeaderResolver({}, { session: new MemorySessionStore() });
    const req = request({ headers: { 'accept-language': 'de, fr;q=1.0, es;q=0.8, it' } });

    expect(resolver.resolveAll(req)).toEqual(['de', 'fr', 'it', 'es']);
  });

  it('should use header order and strip parameters in simple mode', () => {
    const resolver = new HeaderResolver({ use_quality: false });
    const req = request({ headers: { 'Accept-Language': 'en;q=0.5, fr;q=0.9,,de' } });

    expect(resolver.resolveAll(req)).toEqual(['en', 'fr', 'de']);
  });

  it('should return nothing for a missing or empty header', () => {
    const resolver = new HeaderResolver({ use_quality: true });

    expect(resolver.resolveAll(request())).toEqual([]);
    expect(resolver.resolve(request({ headers: { 'accept-language': '' } }))).toBeNull();
  });

  it('should parse unreadable and out-of-range qualities', () => {
    expect(parseAcceptLanguage('en;q=abc, fr;q=2, de;q=-1, es;q=0.3')).toEqual([
      { tag: 'en', quality: 0 },
      { tag: 'fr', quality: 1 },
      { tag: 'de', quality: 0 },
      { tag: 'es', quality: 0.3 },
    ]);
  });

  it('should treat a non-finite quality as zero', () => {
    const resolver = new HeaderResolver({ use_quality: true });
    const req = request({ headers: { 'accept-language': 'en;q=0.9,fr;q=Infinity,de;q=1e5' } });

    expect(parseAcceptLanguage('fr;q=Infinity')).toEqual([{ tag: 'fr', quality: 0 }]);
    expect(resolver.resolveAll(req)).toEqual(['de', 'en', 'fr']);
  });

  it('should skip blank entries', () => {
    expect(parseAcceptLanguage(' , ;q=0.5, fr')).toEqual([{ tag: 'fr', quality: 1 }]);
  });
});

describe('UrlSegmentResolver', () => {
  it('should return the segment at the configured position verbatim', () => {
    const resolver = new UrlSegmentResolver({ position: 1 });

    expect(resolver.resolve(request({ path: '/fr/about' }))).toBe('fr');
    expect(resolver.resolve(request({ path: '/dashboard' }))).toBe('dashboard');
  });

  it('should return null when the path is too short', () => {
    const resolver = new UrlSegmentResolver({ position: 2 });
    expect(resolver.resolveAll(request({ path: '/fr' }))).toEqual([]);
  });
});

describe('UrlPrefixResolver', () => {
  beforeEach(() => {
    logger.setLevel(LogLevel.SILENT);
  });

  afterEach(() => {
    logger.setLevel(LogLevel.INFO);
  });

  it('should accept a segment that matches the locale pattern', () => {
    const resolver = new UrlPrefixResolver({ segment: 1, patterns: ['^[a-z]{2}([_-][A-Za-z]{2})?$'] });

    expect(resolver.resolve(request({ path: '/pt-BR/home' }))).toBe('pt-BR');
  });

  it('should reject a segment that does not look like a locale', () => {
    const resolver = new UrlPrefixResolver({ segment: 1, patterns: ['^[a-z]{2}$'] });

    expect(resolver.resolve(request({ path: '/dashboard' }))).toBeNull();
  });

  it('should ignore invalid patterns', () => {
    const resolver = new UrlPrefixResolver({ segment: 2, patterns: ['(', '^[a-z]{2}$'] });

    expect(resolver.resolve(request({ path: '/app/de/page' }))).toBe('de');
  });
});

describe('DomainResolver', () => {
  const deps = { session: new MemorySessionStore() };

  it('should map full hosts', () => {
    const resolver = createDomainResolver({ full_map: { 'example.de': 'de' } }, deps);

    expect(resolver.resolve(request({ host: 'example.de' }))).toBe('de');
  });

  it('should extract the locale from a subdomain', () => {
    const resolver = createDomainResolver({}, deps);

    expect(resolver.resolve(request({ host: 'fr.example.com' }))).toBe('fr');
    expect(resolver.resolve(request({ host: 'example.com' }))).toBeNull();
    expect(resolver.resolve(request({ host: 'www.example.com' }))).toBeNull();
  });

  it('should honour the configured evaluation order', () => {
    const settings = { order: ['subdomain', 'full'], full_map: { 'fr.example.com': 'de' } };
    const resolver = createDomainResolver(settings, deps);

    expect(resolver.resolve(request({ host: 'fr.example.com' }))).toBe('fr');
  });

  it('should ignore unknown strategy names', () => {
    const resolver = createDomainResolver({ order: ['bogus', 'full'], full_map: { 'a.test': 'it' } }, deps);

    expect(resolver.resolve(request({ host: 'a.test' }))).toBe('it');
  });

  it('should restrict subdomains to the configured base domains', () => {
    const resolver = createDomainResolver({ subdomain: { base_domains: ['example.com'] } }, deps);

    expect(resolver.resolve(request({ host: 'fr.example.com' }))).toBe('fr');
    expect(resolver.resolve(request({ host: 'fr.other.com' }))).toBeNull();
  });

  it('should read the configured label position', () => {
    const resolver = createDomainResolver({ subdomain: { label: 2 } }, deps);

    expect(resolver.resolve(request({ host: 'app.es.example.com' }))).toBe('es');
  });

  it('should return null without a host or when subdomains are disabled', () => {
    const resolver = new DomainResolver({
      order: ['full', 'subdomain'],
      full_map: {},
      subdomain: { enabled: false, label: 1, base_domains: [], patterns: ['^[a-z]{2}$'] },
    });

    expect(resolver.resolve(request())).toBeNull();
    expect(resolver.resolve(request({ host: 'fr.example.com' }))).toBeNull();
  });
});
