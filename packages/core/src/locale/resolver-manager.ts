/**
 * Locale Resolver Manager
 *
 * Walks the configured resolution order and returns the first normalized
 * candidate that is supported.
 *
 * @invariant INV-LOCALE-004: The result is a member of the supported set, or null
 * @invariant INV-LOCALE-005: An earlier resolver with a supported candidate always wins
 *
 * @packageDocumentation
 */

import { ResolverSlotSchema, type ResolverSlot } from '@parlance/schemas';

import { logger } from '../utils/logger.js';
import { BUILTIN_RESOLVERS } from './resolvers/index.js';
import type {
  LocaleRequest,
  LocaleResolver,
  ResolverFactory,
  SessionStore,
} from './types.js';

export interface ResolverManagerOptions {
  /** Resolver names in priority order (defaults to session only) */
  resolutionOrder?: readonly string[];

  /** Per-resolver settings keyed by resolver name */
  resolvers?: Readonly<Record<string, ResolverSlot>>;

  /** Extra factories, addressable as resolver names or via a `factory` setting */
  factories?: Readonly<Record<string, ResolverFactory>>;

  session: SessionStore;
}

const DEFAULT_RESOLUTION_ORDER: readonly string[] = ['session'];

export class LocaleResolverManager {
  private readonly factories = new Map<string, ResolverFactory>();
  private readonly instances = new Map<string, LocaleResolver | null>();
  private readonly order: readonly string[];
  private readonly resolvers: Readonly<Record<string, ResolverSlot>>;
  private readonly session: SessionStore;

  constructor(options: ResolverManagerOptions) {
    this.order = options.resolutionOrder ?? DEFAULT_RESOLUTION_ORDER;
    this.resolvers = options.resolvers ?? {};
    this.session = options.session;

    for (const [name, factory] of Object.entries(BUILTIN_RESOLVERS)) {
      this.factories.set(name, factory);
    }
    for (const [name, factory] of Object.entries(options.factories ?? {})) {
      this.factories.set(name, factory);
    }
  }

  /**
   * Register a resolver factory under a name
   */
  registerFactory(name: string, factory: ResolverFactory): void {
    this.factories.set(name, factory);
    this.instances.clear();
  }

  /**
   * Resolve the locale from the request using the configured resolution order.
   *
   * @param isSupported - Checks a normalized candidate against the supported set
   * @param normalize - Canonicalizes a raw candidate
   */
  resolve(
    request: Readonly<LocaleRequest>,
    isSupported: (locale: string) => boolean,
    normalize: (locale: string) => string
  ): string | null {
    for (const name of this.order) {
      const resolver = this.createResolver(name);
      if (!resolver) {
        continue;
      }

      for (const candidate of resolver.resolveAll(request)) {
        if (candidate === '') {
          continue;
        }

        const normalized = normalize(candidate);
        if (isSupported(normalized)) {
          logger.debug('Locale resolved', { resolver: name, candidate, locale: normalized });
          return normalized;
        }
      }
    }

    return null;
  }

  getResolutionOrder(): string[] {
    return [...this.order];
  }

  /**
   * Defaults to true when the resolver has no `enabled` setting
   */
  isResolverEnabled(name: string): boolean {
    return this.getSlot(name).enabled ?? true;
  }

  /**
   * Create (or reuse) a resolver instance by name.
   *
   * Returns null if the resolver is disabled, unknown, or names a factory
   * that is not registered.
   */
  createResolver(name: string): LocaleResolver | null {
    if (!this.isResolverEnabled(name)) {
      return null;
    }

    const cached = this.instances.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const slot = this.getSlot(name);
    const factoryName = slot.factory ?? name;
    const factory = this.factories.get(factoryName);

    if (!factory) {
      if (slot.factory !== undefined) {
        logger.warn('Resolver factory is not registered; skipping resolver', {
          resolver: name,
          factory: slot.factory,
        });
      }
      this.instances.set(name, null);
      return null;
    }

    const resolver = factory(slot, { session: this.session });
    this.instances.set(name, resolver);
    return resolver;
  }

  /**
   * Names of the built-in and registered resolvers
   */
  getAvailableResolvers(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Enabled resolver names, in resolution order
   */
  getEnabledResolvers(): string[] {
    return this.order.filter((name) => this.isResolverEnabled(name));
  }

  private getSlot(name: string): ResolverSlot {
    const slot = Object.hasOwn(this.resolvers, name) ? this.resolvers[name] : undefined;
    return slot ?? ResolverSlotSchema.parse({});
  }
}
