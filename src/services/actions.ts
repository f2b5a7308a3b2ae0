/**
 * Actions Service
 * Runs package pre/post actions as shell commands
 */

import { exec } from 'child_process';
import { promisify } from 'util';
import { ActionError } from '../errors.js';
import { renderString } from './template.js';
import type { VariableContext } from '../types/index.js';

const execAsync = promisify(exec);

export interface ActionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Executes one already-interpolated command in a directory
 */
export type ActionRunner = (command: string, cwd: string) => Promise<ActionResult>;

function exitCodeOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

function outputOf(err: unknown, stream: 'stdout' | 'stderr'): string {
  if (typeof err === 'object' && err !== null && stream in err) {
    const value: unknown = Reflect.get(err, stream);
    return typeof value === 'string' ? value : '';
  }
  return '';
}

/**
 * Run through $SHELL -c, falling back to /bin/sh
 */
export const shellRunner: ActionRunner = async (command, cwd) => {
  const shell = process.env.SHELL || '/bin/sh';
  try {
    const { stdout, stderr } = await execAsync(command, { cwd, shell });
    return { exitCode: 0, stdout, stderr };
  } catch (err) {
    const exitCode = exitCodeOf(err);
    if (exitCode === undefined) {
      throw err;
    }
    return { exitCode, stdout: outputOf(err, 'stdout'), stderr: outputOf(err, 'stderr') };
  }
};

/**
 * Interpolate and run actions in order, stopping at the first failure.
 * Returns the output of every action that ran.
 */
export async function runActions(
  actions: string[],
  context: VariableContext,
  cwd: string,
  runner: ActionRunner = shellRunner
): Promise<ActionResult[]> {
  const results: ActionResult[] = [];
  for (const action of actions) {
    const command = renderString(action, context);
    const result = await runner(command, cwd);
    results.push(result);
    if (result.exitCode !== 0) {
      throw new ActionError(command, result.exitCode, result.stderr || result.stdout);
    }
  }
  return results;
}
