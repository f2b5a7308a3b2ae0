/**
 * Print Vars Command
 * Show the variables templates would see
 */

import { loadConfig } from '../services/config.js';
import { getProfile } from '../services/packages.js';
import { activeProfileName } from '../services/session.js';
import { loadUserVariables } from '../services/uservariables.js';
import { resolveVariables } from '../services/variables.js';
import { colors, dim, formatVariable } from '../utils/display.js';
import { getRunContext, reportFatal, showBanner, type CommonOptions } from './shared.js';

export async function printVarsCommand(
  options: CommonOptions & {
    profile?: string;
    /** Include process environment variables */
    env?: boolean;
  } = {}
): Promise<boolean> {
  try {
    const ctx = await getRunContext(options);
    await showBanner(ctx);

    const config = await loadConfig(ctx.workingDir);
    const userVariables = await loadUserVariables(ctx.workingDir);
    const profileName = activeProfileName(options.profile, process.env, userVariables);
    const profile = profileName !== undefined ? getProfile(config, profileName) : undefined;

    const context = resolveVariables({
      config,
      profile,
      userVariables,
      env: options.env ? process.env : {},
    });

    console.log(colors.muted('Variables') + (profile ? colors.muted(' (profile ') + colors.secondary(profile.name) + colors.muted(')') : '') + ':');
    const entries = Object.entries(context);
    if (entries.length === 0) {
      dim('  (none)');
    }
    for (const [key, value] of entries) {
      formatVariable(key, value).forEach(line => console.log(line));
    }
    return true;
  } catch (err) {
    reportFatal(err);
    return false;
  }
}
