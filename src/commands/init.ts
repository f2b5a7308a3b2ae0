/**
 * Init Command
 * Create config.toml, the dotfiles directory and .gitignore
 */

import ora from 'ora';
import { initRepositoryFiles } from '../services/config.js';
import { initRepository } from '../services/git.js';
import { success, info, colors } from '../utils/display.js';
import { errorMessage } from '../errors.js';
import { CONFIG_FILE, DOTFILES_DIR } from '../constants.js';
import { getRunContext, reportFatal, type CommonOptions } from './shared.js';

export async function initCommand(options: CommonOptions & { git?: boolean }): Promise<boolean> {
  try {
    const ctx = await getRunContext(options);

    const created = await initRepositoryFiles(ctx.workingDir);
    if (!created) {
      info(`${CONFIG_FILE} already exists. Initialization skipped.`);
      return true;
    }

    if (options.git !== false) {
      const spinner = ora('Initializing git repository...').start();
      try {
        const initialized = await initRepository(ctx.workingDir);
        if (initialized) {
          spinner.succeed('Git repository initialized');
        } else {
          spinner.info('Already inside a git repository');
        }
      } catch (err) {
        spinner.warn(`Could not initialize git: ${errorMessage(err)}`);
      }
    }

    console.log();
    success('Repository initialized!');
    console.log();
    console.log(colors.muted('Next steps:'));
    console.log('  • Import a dotfile:   ' + colors.primary('dotr import ~/.bashrc'));
    console.log('  • Deploy everything:  ' + colors.primary('dotr deploy'));
    console.log(colors.muted(`  Package sources live in ${DOTFILES_DIR}/`));
    return true;
  } catch (err) {
    reportFatal(err);
    return false;
  }
}
