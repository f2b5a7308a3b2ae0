/**
 * User Variables Service
 * Answers to prompts, persisted in .uservariables.toml and asked for at most once
 */

import fs from 'fs-extra';
import path from 'path';
import { parse, stringify } from 'smol-toml';
import { USER_VARIABLES_FILE, TEMP_EXT } from '../constants.js';
import { InvalidConfigError, errorMessage } from '../errors.js';
import { toVariableTable } from './config.js';
import type { ConfigTree, Package, Profile, PromptMap, VariableTable } from '../types/index.js';

/**
 * Reads one line of input for a prompt
 */
export type LineReader = (key: string, message: string) => Promise<string>;

export function getUserVariablesPath(workingDir: string): string {
  return path.join(workingDir, USER_VARIABLES_FILE);
}

/**
 * Load previously answered prompts. A missing file is an empty store.
 */
export async function loadUserVariables(workingDir: string): Promise<VariableTable> {
  const filePath = getUserVariablesPath(workingDir);
  if (!(await fs.pathExists(filePath))) {
    return {};
  }

  const content = await fs.readFile(filePath, 'utf-8');
  let document: Record<string, unknown>;
  try {
    document = parse(content);
  } catch (err) {
    throw new InvalidConfigError(`Failed to parse ${USER_VARIABLES_FILE}: ${errorMessage(err)}`, { cause: err });
  }
  return toVariableTable(document, USER_VARIABLES_FILE);
}

/**
 * Persist one answer: re-read the store, set the key and replace the file
 */
export async function saveUserVariable(workingDir: string, key: string, value: string): Promise<void> {
  const current = await loadUserVariables(workingDir);
  current[key] = value;

  const filePath = getUserVariablesPath(workingDir);
  const staging = `${filePath}.${TEMP_EXT}`;
  await fs.writeFile(staging, stringify(current) + '\n');
  await fs.rename(staging, filePath);
}

/**
 * Merge prompt maps from the config, the packages being processed and the
 * active profile. Keys accumulate; a later scope only replaces the text.
 */
export function collectPrompts(config: ConfigTree, packages: Package[], profile?: Profile): PromptMap {
  const prompts: PromptMap = { ...config.prompts };
  for (const pkg of packages) {
    Object.assign(prompts, pkg.prompts);
  }
  if (profile) {
    Object.assign(prompts, profile.prompts);
  }
  return prompts;
}

/**
 * Ask for every prompt key not yet answered, saving each answer as soon as it
 * is given. Keys already present are never asked again.
 */
export async function ensurePrompts(
  workingDir: string,
  prompts: PromptMap,
  userVariables: VariableTable,
  readLine: LineReader
): Promise<VariableTable> {
  const updated: VariableTable = { ...userVariables };

  for (const [key, message] of Object.entries(prompts)) {
    if (Object.hasOwn(updated, key)) {
      continue;
    }
    const answer = await readLine(key, message);
    updated[key] = answer;
    await saveUserVariable(workingDir, key, answer);
  }

  return updated;
}
