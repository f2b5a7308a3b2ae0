/**
 * Temporary repository fixtures shared by the tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { RunContext } from '../src/types/index.js';

export interface Fixture {
  root: string;
  ctx: RunContext;
  /** Write a file relative to the repository */
  repoFile(relative: string, content: string | Buffer): string;
  /** Write a file relative to the fake home directory */
  homeFile(relative: string, content: string | Buffer): string;
  read(absolute: string): string;
  cleanup(): void;
}

function writeFile(absolute: string, content: string | Buffer): string {
  fs.mkdirSync(path.dirname(absolute), { recursive: true });
  fs.writeFileSync(absolute, content);
  return absolute;
}

/**
 * Create a repository directory and a separate home directory under one temp root
 */
export function createFixture(config?: string): Fixture {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'dotr-test-'));
  const workingDir = path.join(root, 'repo');
  const homeDir = path.join(root, 'home');
  fs.mkdirSync(workingDir, { recursive: true });
  fs.mkdirSync(homeDir, { recursive: true });
  if (config !== undefined) {
    writeFile(path.join(workingDir, 'config.toml'), config);
  }

  return {
    root,
    ctx: { workingDir, homeDir },
    repoFile: (relative, content) => writeFile(path.join(workingDir, relative), content),
    homeFile: (relative, content) => writeFile(path.join(homeDir, relative), content),
    read: absolute => fs.readFileSync(absolute, 'utf-8'),
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}
