import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { activeProfileName, openSession } from '../../src/services/session.js';
import { UnknownPackageError, UnknownProfileError } from '../../src/errors.js';
import type { LineReader } from '../../src/services/uservariables.js';
import { createFixture, type Fixture } from '../helpers.js';

describe('activeProfileName', () => {
  it('prefers the flag, then the environment, then user variables', () => {
    expect(activeProfileName('cli', { DOTR_PROFILE: 'env' }, { DOTR_PROFILE: 'user' })).toBe('cli');
    expect(activeProfileName(undefined, { DOTR_PROFILE: 'env' }, { DOTR_PROFILE: 'user' })).toBe('env');
    expect(activeProfileName(undefined, {}, { DOTR_PROFILE: 'user' })).toBe('user');
    expect(activeProfileName(undefined, { DOTR_PROFILE: '' }, {})).toBeUndefined();
  });

  it('ignores a non-string user variable', () => {
    expect(activeProfileName(undefined, {}, { DOTR_PROFILE: true })).toBeUndefined();
  });
});

describe('openSession', () => {
  let fixture: Fixture;

  beforeEach(() => {
    fixture = createFixture(`
[prompts]
EMAIL = "Email"

[packages.a]
src = "files/a"
dest = "~/.a"
prompts = { TOKEN = "API token" }

[packages.b]
src = "files/b"
dest = "~/.b"
skip = true
prompts = { OTHER = "Never asked" }

[profiles.work]
dependencies = ["b"]
variables = { EMAIL = "work@example.com" }
`);
    fixture.repoFile('files/a', 'a\n');
    fixture.repoFile('files/b', 'b\n');
  });

  afterEach(() => {
    fixture.cleanup();
  });

  it('asks only the prompts of selected packages', async () => {
    const readLine = vi.fn<LineReader>(async key => `${key.toLowerCase()}-answer`);
    const session = await openSession(fixture.ctx, { env: {} }, readLine);

    expect(session.packages.map(pkg => pkg.name)).toEqual(['a']);
    expect(session.profile).toBeUndefined();
    expect(readLine.mock.calls).toEqual([
      ['EMAIL', 'Email'],
      ['TOKEN', 'API token'],
    ]);
    expect(session.userVariables).toEqual({ EMAIL: 'email-answer', TOKEN: 'token-answer' });
    expect(session.units.map(unit => unit.relativePath)).toEqual(['']);
  });

  it('resolves the profile stored in user variables', async () => {
    fixture.repoFile('.uservariables.toml', 'DOTR_PROFILE = "work"\nEMAIL = "me@example.com"\nTOKEN = "t"\nOTHER = "o"\n');
    const session = await openSession(fixture.ctx, { env: {} }, vi.fn<LineReader>());

    expect(session.profile?.name).toBe('work');
    expect(session.packages.map(pkg => pkg.name)).toEqual(['a', 'b']);
    expect(session.units.map(unit => unit.profile)).toEqual(['work', 'work']);
  });

  it('fails on an unknown profile before asking anything', async () => {
    const readLine = vi.fn<LineReader>();
    await expect(openSession(fixture.ctx, { profile: 'home', env: {} }, readLine)).rejects.toBeInstanceOf(
      UnknownProfileError
    );
    expect(readLine).not.toHaveBeenCalled();
  });

  it('fails on an unknown package before asking anything', async () => {
    const readLine = vi.fn<LineReader>();
    await expect(openSession(fixture.ctx, { packages: ['zzz'], env: {} }, readLine)).rejects.toBeInstanceOf(
      UnknownPackageError
    );
    expect(readLine).not.toHaveBeenCalled();
  });
});
