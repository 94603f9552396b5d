/**
 * Locale Resolution Types
 *
 * Host-facing contracts for the locale resolution chain. The HTTP request,
 * session and cookie mechanisms belong to the host application; parlance
 * only reads and writes them through these interfaces.
 *
 * @packageDocumentation
 */

/**
 * Header, query and cookie values as most Node HTTP stacks expose them
 */
export type RequestValue = string | string[] | undefined;

/**
 * Request-like context a resolver reads from
 *
 * @invariant INV-LOCALE-003: Resolvers MUST NOT modify the request
 */
export interface LocaleRequest {
  /** URL path, e.g. `/fr/dashboard` */
  path: string;

  /** Host name without port, e.g. `fr.example.com` */
  host?: string;

  /** Parsed query string */
  query?: Readonly<Record<string, RequestValue>>;

  /** Request headers; names are matched case-insensitively */
  headers?: Readonly<Record<string, RequestValue>>;

  /** Request cookies */
  cookies?: Readonly<Record<string, string | undefined>>;
}

/**
 * Session key/value storage owned by the host
 */
export interface SessionStore {
  get(key: string): unknown;
  put(key: string, value: string): void;
}

/**
 * Outgoing cookie mechanism owned by the host
 */
export interface CookieJar {
  /** Queue a cookie for the response */
  queue(name: string, value: string, minutes: number): void;
}

/**
 * The host application's ambient locale
 */
export interface AppLocale {
  getLocale(): string;
  setLocale(locale: string): void;
}

/**
 * A strategy that extracts locale candidates from one signal source
 *
 * @invariant INV-LOCALE-003: resolve() and resolveAll() MUST NOT modify the request
 */
export interface LocaleResolver {
  /** First candidate, or null */
  resolve(request: Readonly<LocaleRequest>): string | null;

  /** All candidates in the resolver's own preference order */
  resolveAll(request: Readonly<LocaleRequest>): string[];
}

/**
 * Shared collaborators handed to every resolver factory
 */
export interface ResolverDependencies {
  session: SessionStore;
}

/**
 * Builds a resolver from its configuration slice. The settings object is the
 * raw `resolvers.<name>` record; each factory validates the keys it needs.
 */
export type ResolverFactory = (
  settings: Readonly<Record<string, unknown>>,
  deps: ResolverDependencies
) => LocaleResolver;
