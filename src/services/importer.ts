/**
 * Importer Service
 * Brings an existing file or directory under management as a new package
 */

import fs from 'fs-extra';
import path from 'path';
import { DOTFILES_DIR } from '../constants.js';
import { IoError, InvalidConfigError } from '../errors.js';
import { loadConfig, saveConfig } from './config.js';
import { derivePackageName, isManagedArtifact } from './packages.js';
import { normalizeHomePath, resolvePath } from '../utils/paths.js';
import type { Package, RunContext } from '../types/index.js';

export interface ImportOptions {
  /** Package name; derived from the path when omitted */
  name?: string;
  /** Deploy only with this profile: the package is skipped otherwise */
  profile?: string;
}

export interface ImportResult {
  package: Package;
  /** Absolute path the content was copied into */
  storePath: string;
  profileCreated: boolean;
}

/**
 * Copy `target` into dotfiles/<name>, register the package and save config.toml
 */
export async function importPath(
  ctx: RunContext,
  target: string,
  options: ImportOptions = {}
): Promise<ImportResult> {
  const config = await loadConfig(ctx.workingDir);

  const absolute = resolvePath(target, ctx.workingDir, ctx.homeDir);
  if (!(await fs.pathExists(absolute))) {
    throw new IoError(`Path '${absolute}' does not exist`, absolute);
  }
  const isDirectory = (await fs.stat(absolute)).isDirectory();

  const name = options.name ?? derivePackageName(absolute, isDirectory);
  if (config.packages[name]) {
    throw new InvalidConfigError(`Package '${name}' already exists`, {
      suggestion: 'Pass --name to import under a different package name',
      context: { name },
    });
  }

  const src = `${DOTFILES_DIR}/${name}`;
  const storePath = path.join(ctx.workingDir, DOTFILES_DIR, name);
  await fs.copy(absolute, storePath, {
    overwrite: true,
    filter: file => !isManagedArtifact(path.basename(file)),
  });

  const pkg: Package = {
    name,
    src,
    dest: target.startsWith('~') ? target : normalizeHomePath(absolute, ctx.homeDir),
    dependencies: [],
    variables: {},
    prompts: {},
    preActions: [],
    postActions: [],
    targets: {},
    skip: options.profile !== undefined,
    ignore: [],
  };
  config.packages[name] = pkg;

  let profileCreated = false;
  if (options.profile !== undefined) {
    const existing = config.profiles[options.profile];
    if (existing) {
      if (!existing.dependencies.includes(name)) {
        existing.dependencies.push(name);
      }
    } else {
      config.profiles[options.profile] = {
        name: options.profile,
        dependencies: [name],
        variables: {},
        prompts: {},
      };
      profileCreated = true;
    }
  }

  await saveConfig(ctx.workingDir, config);
  return { package: pkg, storePath, profileCreated };
}
