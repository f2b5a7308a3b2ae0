/**
 * Helpers shared by the repository commands
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { DotrError, IoError, errorMessage } from '../errors.js';
import { loadConfig } from '../services/config.js';
import { printBanner, printError, error } from '../utils/display.js';
import type { RunContext } from '../types/index.js';

export interface CommonOptions {
  workingDir?: string;
}

/**
 * Resolve the repository root and home directory for a command
 */
export async function getRunContext(options: CommonOptions): Promise<RunContext> {
  const workingDir = path.resolve(options.workingDir ?? process.cwd());
  if (!(await fs.pathExists(workingDir))) {
    throw new IoError(`Working directory does not exist: ${workingDir}`, workingDir);
  }
  return { workingDir, homeDir: os.homedir() };
}

/**
 * Print the banner when the repository's config asks for it
 */
export async function showBanner(ctx: RunContext): Promise<void> {
  const config = await loadConfig(ctx.workingDir);
  if (config.banner) {
    printBanner();
  }
}

/**
 * Report an error that aborted a command
 */
export function reportFatal(err: unknown): void {
  if (err instanceof DotrError) {
    printError(err);
  } else {
    error(errorMessage(err));
  }
}
