import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { importPath } from '../../src/services/importer.js';
import { loadConfig } from '../../src/services/config.js';
import { openSession } from '../../src/services/session.js';
import { deploy } from '../../src/services/deployer.js';
import { InvalidConfigError, IoError } from '../../src/errors.js';
import { createFixture, type Fixture } from '../helpers.js';

describe('importPath', () => {
  let fixture: Fixture;

  beforeEach(() => {
    fixture = createFixture('banner = false\n');
    fixture.homeFile('.bashrc', 'alias ll="ls -la"\n');
  });

  afterEach(() => {
    fixture.cleanup();
  });

  it('copies a file into the store and registers it', async () => {
    const result = await importPath(fixture.ctx, path.join(fixture.ctx.homeDir, '.bashrc'));

    expect(result.package.name).toBe('f_bashrc');
    expect(result.package.src).toBe('dotfiles/f_bashrc');
    expect(result.package.dest).toBe('~/.bashrc');
    expect(result.package.skip).toBe(false);
    expect(result.storePath).toBe(path.join(fixture.ctx.workingDir, 'dotfiles', 'f_bashrc'));
    expect(fixture.read(result.storePath)).toBe('alias ll="ls -la"\n');

    const config = await loadConfig(fixture.ctx.workingDir);
    expect(config.packages.f_bashrc.dest).toBe('~/.bashrc');
    expect(config.banner).toBe(false);
  });

  it('keeps a ~ target as written', async () => {
    const result = await importPath(fixture.ctx, '~/.bashrc', { name: 'shell' });
    expect(result.package.name).toBe('shell');
    expect(result.package.dest).toBe('~/.bashrc');
  });

  it('imports directories without managed artifacts', async () => {
    fixture.homeFile('.config/nvim/init.lua', 'print("hi")\n');
    fixture.homeFile('.config/nvim/init.lua.dotrbak', 'old\n');

    const result = await importPath(fixture.ctx, '~/.config/nvim');
    expect(result.package.name).toBe('d_nvim');
    expect(result.package.dest).toBe('~/.config/nvim');
    expect(fs.readdirSync(result.storePath)).toEqual(['init.lua']);
  });

  it('keeps paths outside home absolute', async () => {
    const outside = path.join(fixture.root, 'etc', 'motd');
    fs.mkdirSync(path.dirname(outside), { recursive: true });
    fs.writeFileSync(outside, 'welcome\n');

    const result = await importPath(fixture.ctx, outside);
    expect(result.package.dest).toBe(outside);
  });

  it('adds the package to a profile and skips it otherwise', async () => {
    fixture.homeFile('.gitconfig', '[user]\n');

    const first = await importPath(fixture.ctx, '~/.bashrc', { profile: 'work' });
    const second = await importPath(fixture.ctx, '~/.gitconfig', { profile: 'work' });
    expect(first.profileCreated).toBe(true);
    expect(second.profileCreated).toBe(false);

    const config = await loadConfig(fixture.ctx.workingDir);
    expect(config.packages.f_bashrc.skip).toBe(true);
    expect(config.profiles.work.dependencies).toEqual(['f_bashrc', 'f_gitconfig']);
  });

  it('rejects a duplicate package name', async () => {
    await importPath(fixture.ctx, '~/.bashrc');
    await expect(importPath(fixture.ctx, '~/.bashrc')).rejects.toThrow(InvalidConfigError);
    await expect(importPath(fixture.ctx, '~/.bashrc')).rejects.toThrow("Package 'f_bashrc' already exists");
  });

  it('rejects a missing path', async () => {
    await expect(importPath(fixture.ctx, '~/.zshrc')).rejects.toBeInstanceOf(IoError);
  });

  it('imports content that deploys back unchanged', async () => {
    await importPath(fixture.ctx, '~/.bashrc');
    const session = await openSession(fixture.ctx, { env: {} }, async () => '');
    const summary = await deploy(session);
    expect(summary.outcomes.map(outcome => outcome.status)).toEqual(['unchanged']);
  });
});
