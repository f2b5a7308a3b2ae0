/**
 * Config Service
 * Loads, validates and saves the repository's config.toml
 */

import fs from 'fs-extra';
import path from 'path';
import { parse, stringify } from 'smol-toml';
import { CONFIG_FILE, DOTFILES_DIR, USER_VARIABLES_FILE, TEMP_EXT } from '../constants.js';
import { ConfigNotFoundError, InvalidConfigError, errorMessage } from '../errors.js';
import type {
  ConfigTree,
  Package,
  Profile,
  PromptMap,
  VariableTable,
  VariableValue,
} from '../types/index.js';

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Convert a parsed TOML value into a variable value.
 * Dates become their TOML text, large integers become numbers.
 */
export function toVariableValue(value: unknown, where: string): VariableValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toVariableValue(item, `${where}[${index}]`));
  }
  if (isTable(value)) {
    return toVariableTable(value, where);
  }
  throw new InvalidConfigError(`${where} has an unsupported value`);
}

export function toVariableTable(value: unknown, where: string): VariableTable {
  if (value === undefined) {
    return {};
  }
  if (!isTable(value)) {
    throw new InvalidConfigError(`${where} must be a table`);
  }
  const table: VariableTable = {};
  for (const [key, item] of Object.entries(value)) {
    table[key] = toVariableValue(item, `${where}.${key}`);
  }
  return table;
}

function stringArray(value: unknown, where: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidConfigError(`${where} must be an array of strings`);
  }
  return [...value];
}

function stringMap(value: unknown, where: string): Record<string, string> {
  if (value === undefined) {
    return {};
  }
  if (!isTable(value)) {
    throw new InvalidConfigError(`${where} must be a table`);
  }
  const map: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'string') {
      throw new InvalidConfigError(`${where}.${key} must be a string`);
    }
    map[key] = item;
  }
  return map;
}

function requiredString(table: Table, key: string, where: string): string {
  const value = table[key];
  if (value === undefined) {
    throw new InvalidConfigError(`${where} is missing required field '${key}'`);
  }
  if (typeof value !== 'string') {
    throw new InvalidConfigError(`${where} field '${key}' must be a string`);
  }
  return value;
}

function optionalBoolean(value: unknown, where: string): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new InvalidConfigError(`${where} must be a boolean`);
  }
  return value;
}

export function parsePackage(name: string, value: unknown): Package {
  const where = `Package '${name}'`;
  if (!isTable(value)) {
    throw new InvalidConfigError(`${where} must be a table`);
  }
  return {
    name,
    src: requiredString(value, 'src', where),
    dest: requiredString(value, 'dest', where),
    dependencies: stringArray(value.dependencies, `${where} field 'dependencies'`),
    variables: toVariableTable(value.variables, `${where} field 'variables'`),
    prompts: stringMap(value.prompts, `${where} field 'prompts'`),
    preActions: stringArray(value.pre_actions, `${where} field 'pre_actions'`),
    postActions: stringArray(value.post_actions, `${where} field 'post_actions'`),
    targets: stringMap(value.targets, `${where} field 'targets'`),
    skip: optionalBoolean(value.skip, `${where} field 'skip'`),
    ignore: stringArray(value.ignore, `${where} field 'ignore'`),
  };
}

export function parseProfile(name: string, value: unknown): Profile {
  const where = `Profile '${name}'`;
  if (!isTable(value)) {
    throw new InvalidConfigError(`${where} must be a table`);
  }
  return {
    name,
    dependencies: stringArray(value.dependencies, `${where} field 'dependencies'`),
    variables: toVariableTable(value.variables, `${where} field 'variables'`),
    prompts: stringMap(value.prompts, `${where} field 'prompts'`),
  };
}

/**
 * Build a ConfigTree from an already-parsed TOML document
 */
export function parseConfigTree(document: Table): ConfigTree {
  const packages: Record<string, Package> = {};
  const packagesTable = document.packages;
  if (packagesTable !== undefined) {
    if (!isTable(packagesTable)) {
      throw new InvalidConfigError("The 'packages' section must be a table");
    }
    for (const [name, value] of Object.entries(packagesTable)) {
      packages[name] = parsePackage(name, value);
    }
  }

  const profiles: Record<string, Profile> = {};
  const profilesTable = document.profiles;
  if (profilesTable !== undefined) {
    if (!isTable(profilesTable)) {
      throw new InvalidConfigError("The 'profiles' section must be a table");
    }
    for (const [name, value] of Object.entries(profilesTable)) {
      profiles[name] = parseProfile(name, value);
    }
  }

  return {
    banner: optionalBoolean(document.banner, "Field 'banner'"),
    variables: toVariableTable(document.variables, "Section 'variables'"),
    prompts: stringMap(document.prompts, "Section 'prompts'"),
    packages,
    profiles,
  };
}

export function createDefaultConfig(): ConfigTree {
  return {
    banner: true,
    variables: {},
    prompts: {},
    packages: {},
    profiles: {},
  };
}

export function getConfigPath(workingDir: string): string {
  return path.join(workingDir, CONFIG_FILE);
}

/**
 * Check if the working directory holds a dotr repository
 */
export async function isConfigured(workingDir: string): Promise<boolean> {
  return fs.pathExists(getConfigPath(workingDir));
}

/**
 * Read and validate config.toml
 */
export async function loadConfig(workingDir: string): Promise<ConfigTree> {
  const configPath = getConfigPath(workingDir);
  if (!(await fs.pathExists(configPath))) {
    throw new ConfigNotFoundError(configPath);
  }

  const content = await fs.readFile(configPath, 'utf-8');
  let document: Table;
  try {
    document = parse(content);
  } catch (err) {
    throw new InvalidConfigError(`Failed to parse ${CONFIG_FILE}: ${errorMessage(err)}`, { cause: err });
  }
  return parseConfigTree(document);
}

function packageToTable(pkg: Package): Table {
  const table: Table = { src: pkg.src, dest: pkg.dest };
  if (pkg.dependencies.length > 0) table.dependencies = pkg.dependencies;
  if (Object.keys(pkg.variables).length > 0) table.variables = pkg.variables;
  if (Object.keys(pkg.prompts).length > 0) table.prompts = pkg.prompts;
  if (pkg.preActions.length > 0) table.pre_actions = pkg.preActions;
  if (pkg.postActions.length > 0) table.post_actions = pkg.postActions;
  if (Object.keys(pkg.targets).length > 0) table.targets = pkg.targets;
  if (pkg.skip) table.skip = true;
  if (pkg.ignore.length > 0) table.ignore = pkg.ignore;
  return table;
}

function profileToTable(profile: Profile): Table {
  const table: Table = { dependencies: profile.dependencies };
  if (Object.keys(profile.variables).length > 0) table.variables = profile.variables;
  if (Object.keys(profile.prompts).length > 0) table.prompts = profile.prompts;
  return table;
}

/**
 * Serialize a ConfigTree back into TOML
 */
export function serializeConfig(config: ConfigTree): string {
  const document: Table = {
    banner: config.banner,
    variables: config.variables,
    prompts: config.prompts,
  };

  const packages: Table = {};
  for (const [name, pkg] of Object.entries(config.packages)) {
    packages[name] = packageToTable(pkg);
  }
  document.packages = packages;

  const profiles: Table = {};
  for (const [name, profile] of Object.entries(config.profiles)) {
    profiles[name] = profileToTable(profile);
  }
  document.profiles = profiles;

  return stringify(document) + '\n';
}

/**
 * Save configuration. User variables never pass through here.
 */
export async function saveConfig(workingDir: string, config: ConfigTree): Promise<void> {
  const configPath = getConfigPath(workingDir);
  const staging = `${configPath}.${TEMP_EXT}`;
  await fs.writeFile(staging, serializeConfig(config));
  await fs.rename(staging, configPath);
}

/**
 * Create config.toml, the dotfiles directory and .gitignore.
 * Returns false when a config already exists and nothing was written.
 */
export async function initRepositoryFiles(workingDir: string): Promise<boolean> {
  if (await isConfigured(workingDir)) {
    return false;
  }

  await fs.ensureDir(workingDir);
  await saveConfig(workingDir, createDefaultConfig());
  await fs.ensureDir(path.join(workingDir, DOTFILES_DIR));

  const gitignorePath = path.join(workingDir, '.gitignore');
  const existing = (await fs.pathExists(gitignorePath))
    ? await fs.readFile(gitignorePath, 'utf-8')
    : '';
  const lines = existing.split('\n').map(line => line.trim());
  if (!lines.includes(USER_VARIABLES_FILE)) {
    const prefix = existing === '' || existing.endsWith('\n') ? existing : existing + '\n';
    await fs.writeFile(gitignorePath, `${prefix}${USER_VARIABLES_FILE}\n`);
  }

  return true;
}
