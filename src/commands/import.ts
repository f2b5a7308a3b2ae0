/**
 * Import Command
 * Copy an existing dotfile or directory into the repository as a package
 */

import ora from 'ora';
import { importPath } from '../services/importer.js';
import { success, colors } from '../utils/display.js';
import { getRunContext, reportFatal, showBanner, type CommonOptions } from './shared.js';

export async function importCommand(
  sourcePath: string,
  options: CommonOptions & {
    name?: string;
    profile?: string;
  } = {}
): Promise<boolean> {
  let spinner: ReturnType<typeof ora> | undefined;
  try {
    const ctx = await getRunContext(options);
    await showBanner(ctx);

    spinner = ora(`Importing ${sourcePath}...`).start();
    const result = await importPath(ctx, sourcePath, {
      name: options.name,
      profile: options.profile,
    });
    spinner.succeed('Copied into repository');

    console.log();
    success(`Package '${result.package.name}' imported successfully!`);
    console.log();
    console.log('  Source:      ' + colors.primary(result.package.src));
    console.log('  Destination: ' + result.package.dest);
    if (options.profile) {
      console.log('  Profile:     ' + colors.secondary(options.profile)
        + (result.profileCreated ? colors.muted(' (created)') : ''));
      console.log(colors.muted('  Skipped unless the profile is active'));
    }
    console.log();
    return true;
  } catch (err) {
    spinner?.fail('Import failed');
    reportFatal(err);
    return false;
  }
}
