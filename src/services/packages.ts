/**
 * Package Service
 * Expands a package selection into ordered deployment units
 */

import fs from 'fs-extra';
import path from 'path';
import { minimatch } from 'minimatch';
import { BACKUP_EXT, TEMP_EXT } from '../constants.js';
import { UnknownPackageError, UnknownProfileError } from '../errors.js';
import { detectTemplate } from './template.js';
import { resolvePath } from '../utils/paths.js';
import type {
  ConfigTree,
  DeploymentUnit,
  Package,
  Profile,
  RunContext,
} from '../types/index.js';

export interface UnitRequest {
  /** Explicit selection; all non-skipped packages when absent or empty */
  packages?: string[];
  profile?: string;
  includeDestinationOnly?: boolean;
}

/**
 * Look up a profile by name
 */
export function getProfile(config: ConfigTree, name: string): Profile {
  const profile = config.profiles[name];
  if (!profile) {
    throw new UnknownProfileError(name, Object.keys(config.profiles));
  }
  return profile;
}

export function getPackage(config: ConfigTree, name: string, requiredBy?: string): Package {
  const pkg = config.packages[name];
  if (!pkg) {
    throw new UnknownPackageError(name, requiredBy);
  }
  return pkg;
}

/**
 * Select packages in processing order: explicit selection (or every non-skipped
 * package), then profile dependencies, each followed by its own dependencies.
 * First occurrence wins.
 */
export function selectPackages(config: ConfigTree, request: UnitRequest): Package[] {
  const profile = request.profile !== undefined ? getProfile(config, request.profile) : undefined;

  const roots: Array<{ name: string; requiredBy?: string }> = [];
  if (request.packages && request.packages.length > 0) {
    roots.push(...request.packages.map(name => ({ name })));
  } else {
    roots.push(
      ...Object.values(config.packages)
        .filter(pkg => !pkg.skip)
        .map(pkg => ({ name: pkg.name }))
    );
  }
  if (profile) {
    roots.push(...profile.dependencies.map(name => ({ name, requiredBy: `profile ${profile.name}` })));
  }

  const selected: Package[] = [];
  const seen = new Set<string>();

  const visit = (name: string, requiredBy?: string): void => {
    if (seen.has(name)) {
      return;
    }
    const pkg = getPackage(config, name, requiredBy);
    seen.add(name);
    selected.push(pkg);
    for (const dependency of pkg.dependencies) {
      visit(dependency, name);
    }
  };

  for (const root of roots) {
    visit(root.name, root.requiredBy);
  }
  return selected;
}

/**
 * Destination of a package, with the profile's target override applied
 */
export function resolveDestination(pkg: Package, ctx: RunContext, profile?: string): string {
  const override = profile !== undefined ? pkg.targets[profile] : undefined;
  return resolvePath(override ?? pkg.dest, ctx.workingDir, ctx.homeDir);
}

export function resolveSource(pkg: Package, ctx: RunContext): string {
  return resolvePath(pkg.src, ctx.workingDir, ctx.homeDir);
}

/**
 * Files dotr creates next to deployed files and never treats as content
 */
export function isManagedArtifact(fileName: string): boolean {
  return fileName.endsWith(`.${BACKUP_EXT}`) || fileName.endsWith(`.${TEMP_EXT}`);
}

export function isIgnored(relativePath: string, patterns: string[]): boolean {
  const posixPath = relativePath.split(path.sep).join('/');
  return patterns.some(pattern => minimatch(posixPath, pattern, { dot: true, matchBase: true }));
}

/**
 * Recursively list files below a directory as sorted relative paths
 */
export async function listFiles(root: string, ignore: string[] = []): Promise<string[]> {
  const files: string[] = [];

  const walk = async (relativeDir: string): Promise<void> => {
    const entries = await fs.readdir(path.join(root, relativeDir), { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const relative = relativeDir === '' ? entry.name : path.join(relativeDir, entry.name);
      if (entry.isDirectory()) {
        if (!isIgnored(relative, ignore)) {
          await walk(relative);
        }
      } else if (!isManagedArtifact(entry.name) && !isIgnored(relative, ignore)) {
        files.push(relative);
      }
    }
  };

  await walk('');
  return files;
}

async function probeTemplate(filePath: string): Promise<boolean> {
  // unreadable sources fail later, when the unit is processed
  const content = await fs.readFile(filePath).catch(() => undefined);
  return content !== undefined && detectTemplate(content);
}

async function isDirectoryPath(filePath: string): Promise<boolean> {
  const stats = await fs.stat(filePath).catch(() => undefined);
  return stats?.isDirectory() ?? false;
}

/**
 * Expand one package into file-level units. With `includeDestinationOnly`,
 * files present only under a directory package's destination are appended.
 */
export async function expandPackage(
  pkg: Package,
  ctx: RunContext,
  profile?: string,
  includeDestinationOnly = false
): Promise<DeploymentUnit[]> {
  const sourceRoot = resolveSource(pkg, ctx);
  const destRoot = resolveDestination(pkg, ctx, profile);

  const sourceIsDirectory = await isDirectoryPath(sourceRoot);
  const destIsDirectory = includeDestinationOnly && await isDirectoryPath(destRoot);
  const sourceExists = await fs.pathExists(sourceRoot);

  // a missing source still yields a unit; processing reports it as missing
  if (!sourceIsDirectory && !(destIsDirectory && !sourceExists)) {
    return [{
      packageName: pkg.name,
      profile,
      sourcePath: sourceRoot,
      destPath: destRoot,
      relativePath: '',
      isTemplate: await probeTemplate(sourceRoot),
    }];
  }

  const sourceFiles = sourceIsDirectory ? await listFiles(sourceRoot, pkg.ignore) : [];
  const known = new Set(sourceFiles);
  const destOnly = destIsDirectory
    ? (await listFiles(destRoot, pkg.ignore)).filter(relativePath => !known.has(relativePath))
    : [];

  const units: DeploymentUnit[] = [];
  for (const relativePath of [...sourceFiles, ...destOnly]) {
    const sourcePath = path.join(sourceRoot, relativePath);
    units.push({
      packageName: pkg.name,
      profile,
      sourcePath,
      destPath: path.join(destRoot, relativePath),
      relativePath,
      isTemplate: known.has(relativePath) && await probeTemplate(sourcePath),
    });
  }
  return units;
}

/**
 * Resolve the ordered deployment units for a request.
 * Unknown packages and profiles are thrown before any unit is built.
 * Pass `packages` when the selection was already made for this request.
 */
export async function resolveUnits(
  config: ConfigTree,
  ctx: RunContext,
  request: UnitRequest = {},
  packages: Package[] = selectPackages(config, request)
): Promise<DeploymentUnit[]> {
  const units: DeploymentUnit[] = [];
  for (const pkg of packages) {
    units.push(...(await expandPackage(pkg, ctx, request.profile, request.includeDestinationOnly)));
  }
  return units;
}

/**
 * Derive a package name from an imported path: leading dots stripped,
 * a trailing `-suffix` dropped, `-` and `.` replaced by `_`, and an
 * `f_` or `d_` prefix for files and directories.
 */
export function derivePackageName(targetPath: string, isDirectory: boolean): string {
  let base = path.basename(path.resolve(targetPath)).replace(/^\.+/, '');
  const dash = base.lastIndexOf('-');
  if (dash > 0) {
    base = base.slice(0, dash);
  }
  const prefix = isDirectory ? 'd_' : 'f_';
  return `${prefix}${base}`.replace(/[-.]/g, '_');
}
