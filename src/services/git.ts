/**
 * Git Service
 * Puts a freshly initialized dotfiles repository under version control
 */

import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';

function getGit(baseDir: string): SimpleGit {
  const options: Partial<SimpleGitOptions> = {
    baseDir,
    binary: 'git',
    maxConcurrentProcesses: 1,
    trimmed: false,
  };
  return simpleGit(options);
}

/**
 * Run `git init` unless the directory is already a repository.
 * Returns true when a repository was created.
 */
export async function initRepository(baseDir: string): Promise<boolean> {
  const git = getGit(baseDir);
  if (await git.checkIsRepo()) {
    return false;
  }
  await git.init();
  return true;
}
