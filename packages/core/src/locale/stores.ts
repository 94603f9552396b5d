/**
 * In-process implementations of the host contracts, for tests, the CLI and
 * hosts without a session layer of their own
 */

import type { AppLocale, CookieJar, SessionStore } from './types.js';

export class MemorySessionStore implements SessionStore {
  private readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  put(key: string, value: string): void {
    this.values.set(key, value);
  }

  all(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

export interface QueuedCookie {
  name: string;
  value: string;
  minutes: number;
}

export class MemoryCookieJar implements CookieJar {
  readonly queued: QueuedCookie[] = [];

  queue(name: string, value: string, minutes: number): void {
    this.queued.push({ name, value, minutes });
  }
}

/**
 * Holds the ambient application locale when the host does not provide one
 */
export class AppLocaleHolder implements AppLocale {
  constructor(private locale: string) {}

  getLocale(): string {
    return this.locale;
  }

  setLocale(locale: string): void {
    this.locale = locale;
  }
}
