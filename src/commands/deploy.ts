/**
 * Deploy, Update and Diff Commands
 * Move dotfiles between the repository and their destinations
 */

import { openSession } from '../services/session.js';
import { runPipeline, type PipelineOptions } from '../services/deployer.js';
import type { LineReader } from '../services/uservariables.js';
import type { ActionRunner } from '../services/actions.js';
import { promptLine } from '../utils/prompts.js';
import {
  success,
  error,
  info,
  warning,
  dim,
  colors,
  formatUnit,
  printChange,
} from '../utils/display.js';
import { getRunContext, reportFatal, showBanner, type CommonOptions } from './shared.js';
import type { Direction, PipelineSummary, UnitOutcome } from '../types/index.js';

export interface TransferOptions extends CommonOptions {
  packages?: string[];
  profile?: string;
  verbose?: boolean;
  dryRun?: boolean;
  /** Replaces the terminal prompt */
  readLine?: LineReader;
  /** Replaces the shell used for actions */
  runner?: ActionRunner;
}

function reportOutcome(outcome: UnitOutcome, verbose: boolean): void {
  const label = formatUnit(outcome);
  const { destPath, sourcePath } = outcome.unit;

  switch (outcome.status) {
    case 'written':
      if (outcome.direction === 'update') {
        success(`Updated ${label} ${colors.muted(`← ${destPath}`)}`);
      } else {
        success(`Deployed ${label} ${colors.muted(`→ ${destPath}`)}`);
        if (outcome.backupPath) {
          dim(`  backup: ${outcome.backupPath}`);
        }
      }
      break;
    case 'pending':
      if (outcome.direction === 'diff') {
        printChange(outcome);
      } else {
        info(`Would deploy ${label} ${colors.muted(`→ ${destPath}`)}`);
      }
      break;
    case 'unchanged':
      if (verbose) {
        dim(`Unchanged ${outcome.unit.packageName} ${destPath}`);
      }
      break;
    case 'skipped':
      if (verbose) {
        dim(`Skipped ${outcome.unit.packageName} ${sourcePath} (${outcome.reason ?? 'no change'})`);
      }
      break;
    case 'failed':
      error(`${label} ${colors.muted(sourcePath)}: ${outcome.error?.message ?? outcome.reason ?? 'failed'}`);
      if (outcome.reason) {
        dim(`  ${outcome.reason}`);
      }
      break;
  }
}

function reportSummary(direction: Direction, summary: PipelineSummary): void {
  for (const { packageName, error: err } of summary.packageErrors) {
    error(`${packageName}: ${err.message}`);
  }

  const count = (status: UnitOutcome['status']): number =>
    summary.outcomes.filter(outcome => outcome.status === status).length;
  const failed = count('failed') + summary.packageErrors.length;

  console.log();
  if (direction === 'diff') {
    const pending = count('pending');
    if (pending === 0 && failed === 0) {
      success('No differences');
    } else {
      info(`${pending} file(s) differ`);
    }
  } else {
    const verb = direction === 'deploy' ? 'deployed' : 'updated';
    info(`${count('written')} ${verb}, ${count('unchanged')} unchanged, ${count('skipped')} skipped`);
  }
  if (failed > 0) {
    warning(`${failed} failure(s)`);
  }
}

/**
 * Resolve the session, run one direction and report every unit.
 * Returns false when the command aborted or any unit failed.
 */
export async function transferCommand(direction: Direction, options: TransferOptions): Promise<boolean> {
  let summary: PipelineSummary;
  try {
    const ctx = await getRunContext(options);
    await showBanner(ctx);

    const session = await openSession(
      ctx,
      {
        packages: options.packages,
        profile: options.profile,
        includeDestinationOnly: direction === 'update',
      },
      options.readLine ?? promptLine
    );

    if (session.units.length === 0) {
      info('No packages to process.');
      return true;
    }

    const pipelineOptions: PipelineOptions = {
      dryRun: options.dryRun,
      runner: options.runner,
      onOutcome: outcome => reportOutcome(outcome, options.verbose ?? false),
      onActionOutput: (_packageName, result) => {
        const output = result.stdout.trimEnd();
        if (output) {
          dim(output);
        }
      },
    };
    summary = await runPipeline(direction, session, pipelineOptions);
  } catch (err) {
    reportFatal(err);
    return false;
  }

  reportSummary(direction, summary);
  return !summary.failed;
}

export async function deployCommand(options: TransferOptions): Promise<boolean> {
  return transferCommand('deploy', options);
}

export async function updateCommand(options: TransferOptions): Promise<boolean> {
  return transferCommand('update', options);
}

export async function diffCommand(options: TransferOptions): Promise<boolean> {
  return transferCommand('diff', options);
}
