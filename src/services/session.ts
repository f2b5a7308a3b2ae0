/**
 * Session Service
 * Everything a command resolves before the first file is touched
 */

import { PROFILE_ENV_VAR } from '../constants.js';
import { loadConfig } from './config.js';
import { getProfile, selectPackages, resolveUnits } from './packages.js';
import { collectPrompts, ensurePrompts, loadUserVariables, type LineReader } from './uservariables.js';
import type {
  ConfigTree,
  DeploymentUnit,
  Package,
  Profile,
  RunContext,
  VariableTable,
} from '../types/index.js';

export interface SessionRequest {
  packages?: string[];
  /** Explicit profile; falls back to DOTR_PROFILE in the environment, then in user variables */
  profile?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Also yield units for files that exist only at a directory package's destination */
  includeDestinationOnly?: boolean;
}

export interface Session {
  config: ConfigTree;
  ctx: RunContext;
  profile?: Profile;
  packages: Package[];
  units: DeploymentUnit[];
  userVariables: VariableTable;
  env: NodeJS.ProcessEnv;
}

/**
 * Pick the active profile name: flag, then environment, then user variables
 */
export function activeProfileName(
  requested: string | undefined,
  env: NodeJS.ProcessEnv,
  userVariables: VariableTable
): string | undefined {
  if (requested) {
    return requested;
  }
  const fromEnv = env[PROFILE_ENV_VAR];
  if (fromEnv) {
    return fromEnv;
  }
  const fromUser = userVariables[PROFILE_ENV_VAR];
  return typeof fromUser === 'string' && fromUser !== '' ? fromUser : undefined;
}

/**
 * Load config and user variables, pick the profile and the packages, ask any
 * outstanding prompts, then expand the packages into units
 */
export async function openSession(
  ctx: RunContext,
  request: SessionRequest,
  readLine: LineReader
): Promise<Session> {
  const env = request.env ?? process.env;
  const config = await loadConfig(ctx.workingDir);
  const storedVariables = await loadUserVariables(ctx.workingDir);

  const profileName = activeProfileName(request.profile, env, storedVariables);
  const profile = profileName !== undefined ? getProfile(config, profileName) : undefined;
  const packages = selectPackages(config, { packages: request.packages, profile: profileName });

  const prompts = collectPrompts(config, packages, profile);
  const userVariables = await ensurePrompts(ctx.workingDir, prompts, storedVariables, readLine);

  const units = await resolveUnits(
    config,
    ctx,
    { packages: request.packages, profile: profileName, includeDestinationOnly: request.includeDestinationOnly },
    packages
  );

  return { config, ctx, profile, packages, units, userVariables, env };
}
