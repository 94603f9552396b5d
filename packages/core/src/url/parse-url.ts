/**
 * Minimal URL component parser for absolute and relative URLs.
 *
 * The WHATWG URL class needs an absolute URL and normalizes what it touches,
 * so localized URLs are rebuilt from these components instead.
 */

export interface UrlParts {
  scheme?: string;
  user?: string;
  pass?: string;
  host?: string;
  port?: string;
  path: string;
  query?: string;
  fragment?: string;
}

// RFC 3986, appendix B
const URL_PATTERN = /^(?:([A-Za-z][A-Za-z0-9+.-]*):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;

const AUTHORITY_PATTERN = /^(?:([^:@]*)(?::([^@]*))?@)?(\[[^\]]*\]|[^:]*)(?::(\d*))?$/;

/**
 * Split a URL into components; null when it cannot be parsed
 */
export function parseUrl(url: string): UrlParts | null {
  const match = URL_PATTERN.exec(url);
  if (!match) {
    return null;
  }

  const [, scheme, authority, path = '', query, fragment] = match;
  const parts: UrlParts = { path };

  if (scheme !== undefined) {
    parts.scheme = scheme;
  }
  if (query !== undefined) {
    parts.query = query;
  }
  if (fragment !== undefined) {
    parts.fragment = fragment;
  }

  if (authority !== undefined) {
    const auth = AUTHORITY_PATTERN.exec(authority);
    if (!auth) {
      return null;
    }

    const [, user, pass, host = '', port] = auth;
    if (host === '') {
      return null;
    }

    parts.host = host;
    if (user !== undefined) {
      parts.user = user;
    }
    if (pass !== undefined) {
      parts.pass = pass;
    }
    if (port !== undefined && port !== '') {
      parts.port = port;
    }
  } else if (scheme !== undefined && path === '') {
    // "mailto:" and similar carry nothing to localize
    return null;
  }

  return parts;
}

/**
 * Reassemble a URL from its components
 */
export function buildUrl(parts: UrlParts): string {
  let url = '';

  if (parts.scheme !== undefined) {
    url += `${parts.scheme}:`;
  }

  if (parts.host !== undefined) {
    url += '//';
    if (parts.user !== undefined) {
      url += parts.user;
      if (parts.pass !== undefined) {
        url += `:${parts.pass}`;
      }
      url += '@';
    }
    url += parts.host;
    if (parts.port !== undefined) {
      url += `:${parts.port}`;
    }
  }

  url += parts.path;

  if (parts.query !== undefined) {
    url += `?${parts.query}`;
  }
  if (parts.fragment !== undefined) {
    url += `#${parts.fragment}`;
  }

  return url;
}
