import {
  SessionResolverSettingsSchema,
  type SessionResolverSettings,
} from '@parlance/schemas';

import type { LocaleRequest, LocaleResolver, ResolverFactory, SessionStore } from '../types.js';
import { nonEmpty, toCandidates } from './base.js';

/**
 * Reads the locale stored in the session under the configured key
 */
export class SessionResolver implements LocaleResolver {
  constructor(
    private readonly settings: SessionResolverSettings,
    private readonly session: SessionStore
  ) {}

  resolve(_request: Readonly<LocaleRequest>): string | null {
    return nonEmpty(this.session.get(this.settings.key));
  }

  resolveAll(request: Readonly<LocaleRequest>): string[] {
    return toCandidates(this.resolve(request));
  }
}

export const createSessionResolver: ResolverFactory = (settings, deps) =>
  new SessionResolver(SessionResolverSettingsSchema.parse(settings), deps.session);
