/**
 * Page → translation group resolution
 *
 * Maps a page/view identifier to the translation groups it needs, so lazy
 * loading works without listing groups per route.
 *
 * Examples:
 * - 'Dashboard'          => ['dashboard']
 * - 'Pages/Dashboard'    => ['dashboard']
 * - 'Pages/Users/Index'  => ['users']
 * - 'Pages/Users/Edit'   => ['users']
 * - 'Admin/Dashboard'    => ['admin']
 * - 'Admin/Users/Index'  => ['admin-users']
 * - 'Settings/Profile'   => ['settings']
 */

/**
 * A custom resolver: either a function or an object with a resolve method
 */
export type PageGroupResolverFn = (pageId: string) => unknown;

export interface PageGroupResolverLike {
  resolve(pageId: string): unknown;
}

export type CustomPageGroupResolver = PageGroupResolverFn | PageGroupResolverLike;

/**
 * PascalCase/camelCase segment to kebab-case
 */
export function toGroupName(segment: string): string {
  return segment.replace(/([a-z])([A-Z])/g, '$1-$2').toLowerCase();
}

function stripPagesPrefix(pageId: string): string {
  return /^pages\//i.test(pageId) ? pageId.slice('pages/'.length) : pageId;
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string' && item !== '');
}

export class PageGroupResolver {
  constructor(private readonly custom?: CustomPageGroupResolver) {}

  /**
   * Translation groups for a page, in load order
   */
  resolve(pageId: string): string[] {
    if (this.custom) {
      const result =
        typeof this.custom === 'function' ? this.custom(pageId) : this.custom.resolve(pageId);
      return toStringList(result);
    }

    const group = this.extractGroupName(pageId);
    return group === '' ? [] : [group];
  }

  /**
   * The built-in group name for a page, or '' when there is none
   */
  extractGroupName(pageId: string): string {
    const normalized = stripPagesPrefix(pageId.replace(/\\/g, '/'));
    const segments = normalized.split('/').filter((segment) => segment !== '');

    if (segments.length === 0) {
      return '';
    }

    if (segments.length === 1) {
      return toGroupName(segments[0] ?? '');
    }

    // A trailing view name (Index, Show, Edit, Create, Form, List) and a
    // trailing sub-page (Settings/Profile) both belong to the parent path
    return segments.slice(0, -1).map(toGroupName).join('-');
  }
}
