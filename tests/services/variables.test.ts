import { describe, it, expect } from 'vitest';
import { getVariable, mergeTables, resolveVariables } from '../../src/services/variables.js';
import { createDefaultConfig } from '../../src/services/config.js';
import type { ConfigTree, Package, Profile } from '../../src/types/index.js';

function makePackage(overrides: Partial<Package> = {}): Package {
  return {
    name: 'f_gitconfig',
    src: 'dotfiles/f_gitconfig',
    dest: '~/.gitconfig',
    dependencies: [],
    variables: {},
    prompts: {},
    preActions: [],
    postActions: [],
    targets: {},
    skip: false,
    ignore: [],
    ...overrides,
  };
}

function makeConfig(overrides: Partial<ConfigTree> = {}): ConfigTree {
  return { ...createDefaultConfig(), ...overrides };
}

describe('mergeTables', () => {
  it('merges nested tables key by key', () => {
    const merged = mergeTables(
      { git: { name: 'Alice', email: 'alice@example.com' } },
      { git: { email: 'work@example.com' } }
    );
    expect(merged).toEqual({ git: { name: 'Alice', email: 'work@example.com' } });
  });

  it('replaces arrays wholesale', () => {
    const merged = mergeTables({ paths: ['a', 'b', 'c'] }, { paths: ['d'] });
    expect(merged).toEqual({ paths: ['d'] });
  });

  it('replaces a table with a scalar and a scalar with a table', () => {
    expect(mergeTables({ editor: { name: 'vim' } }, { editor: 'nano' })).toEqual({ editor: 'nano' });
    expect(mergeTables({ editor: 'nano' }, { editor: { name: 'vim' } })).toEqual({ editor: { name: 'vim' } });
  });

  it('does not modify its inputs', () => {
    const lower = { git: { name: 'Alice' } };
    const higher = { git: { email: 'alice@example.com' } };
    mergeTables(lower, higher);
    expect(lower).toEqual({ git: { name: 'Alice' } });
    expect(higher).toEqual({ git: { email: 'alice@example.com' } });
  });
});

describe('resolveVariables', () => {
  const profile: Profile = {
    name: 'work',
    dependencies: [],
    variables: { EMAIL: 'profile@example.com', shell: 'zsh' },
    prompts: {},
  };

  it('applies env < config < package < profile < user variables', () => {
    const context = resolveVariables({
      config: makeConfig({ variables: { EMAIL: 'config@example.com', HOME_HOST: 'config', theme: 'dark' } }),
      package: makePackage({ variables: { EMAIL: 'package@example.com', theme: 'light' } }),
      profile,
      userVariables: { shell: 'fish' },
      env: { EMAIL: 'env@example.com', HOME_HOST: 'env', ONLY_ENV: '1' },
    });

    expect(context).toEqual({
      EMAIL: 'profile@example.com',
      HOME_HOST: 'config',
      ONLY_ENV: '1',
      theme: 'light',
      shell: 'fish',
    });
  });

  it('ignores the package and profile layers when absent', () => {
    const context = resolveVariables({
      config: makeConfig({ variables: { name: 'config' } }),
      userVariables: {},
      env: {},
    });
    expect(context).toEqual({ name: 'config' });
  });

  it('returns a frozen context', () => {
    const context = resolveVariables({
      config: makeConfig({ variables: { git: { name: 'Alice' } } }),
      userVariables: {},
      env: {},
    });
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.git)).toBe(true);
  });

  it('skips environment entries without a value', () => {
    const context = resolveVariables({
      config: makeConfig(),
      userVariables: {},
      env: { SET: 'yes', UNSET: undefined },
    });
    expect(context).toEqual({ SET: 'yes' });
  });
});

describe('getVariable', () => {
  it('follows dotted keys through tables', () => {
    const context = { git: { user: { email: 'alice@example.com' } }, list: ['a'] };
    expect(getVariable(context, 'git.user.email')).toBe('alice@example.com');
    expect(getVariable(context, 'git.missing')).toBeUndefined();
    expect(getVariable(context, 'list.0')).toBeUndefined();
  });
});
