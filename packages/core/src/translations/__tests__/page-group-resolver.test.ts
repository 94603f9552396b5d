import { describe, it, expect } from 'vitest';

import { PageGroupResolver, toGroupName } from '../page-group-resolver.js';

describe('PageGroupResolver', () => {
  const resolver = new PageGroupResolver();

  it.each([
    ['Dashboard', ['dashboard']],
    ['Pages/Dashboard', ['dashboard']],
    ['Pages/Users/Index', ['users']],
    ['Pages/Users/Edit', ['users']],
    ['Users/Show', ['users']],
    ['Admin/Dashboard', ['admin']],
    ['Admin/Users/Index', ['admin-users']],
    ['Settings/Profile', ['settings']],
    ['UserProfile/Edit', ['user-profile']],
    ['pages\\Orders\\List', ['orders']],
    ['', []],
    ['Pages/', []],
  ])('should map %j to %j', (pageId, groups) => {
    expect(resolver.resolve(pageId)).toEqual(groups);
  });

  it('should extract a single group name', () => {
    expect(resolver.extractGroupName('Admin/Users/Index')).toBe('admin-users');
    expect(resolver.extractGroupName('')).toBe('');
  });

  it('should delegate entirely to a custom function', () => {
    const custom = new PageGroupResolver((pageId) => [`page-${pageId.toLowerCase()}`, 'common']);

    expect(custom.resolve('Home')).toEqual(['page-home', 'common']);
  });

  it('should delegate to an object with a resolve method', () => {
    const custom = new PageGroupResolver({ resolve: () => ['shared'] });

    expect(custom.resolve('Anything/Index')).toEqual(['shared']);
  });

  it('should turn a non-list custom result into no groups', () => {
    const custom = new PageGroupResolver(() => 'users');

    expect(custom.resolve('Users/Index')).toEqual([]);
  });

  it('should drop non-string entries from a custom result', () => {
    const custom = new PageGroupResolver(() => ['users', 42, '', null, 'roles']);

    expect(custom.resolve('Users/Index')).toEqual(['users', 'roles']);
  });
});

describe('toGroupName', () => {
  it('should kebab-case camel and Pascal case boundaries', () => {
    expect(toGroupName('UserProfile')).toBe('user-profile');
    expect(toGroupName('apiKeys')).toBe('api-keys');
    expect(toGroupName('HTML')).toBe('html');
  });
});
