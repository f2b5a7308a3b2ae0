/**
 * Deployer Service
 * Runs resolved units in one direction: deploy (store → filesystem),
 * update (filesystem → store) or diff (report only)
 */

import fs from 'fs-extra';
import path from 'path';
import { BACKUP_EXT, TEMP_EXT } from '../constants.js';
import { DotrError, IoError, toIoError } from '../errors.js';
import { runActions, shellRunner, type ActionResult, type ActionRunner } from './actions.js';
import { computeChange, needsWrite } from './diff.js';
import { decodeText, render } from './template.js';
import { resolveVariables } from './variables.js';
import { siblingPath } from '../utils/paths.js';
import type { Session } from './session.js';
import type {
  ChangeResult,
  DeploymentUnit,
  Direction,
  PipelineSummary,
  UnitOutcome,
  VariableContext,
} from '../types/index.js';

export interface PipelineOptions {
  /** Report what deploy would write without writing, backing up or running actions */
  dryRun?: boolean;
  runner?: ActionRunner;
  onOutcome?: (outcome: UnitOutcome) => void;
  onActionOutput?: (packageName: string, result: ActionResult) => void;
}

type Effective =
  | { ok: true; content: Buffer | undefined }
  | { ok: false; error: DotrError };

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read a file, or undefined when it does not exist
 */
export async function readOptional(filePath: string): Promise<Buffer | undefined> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (isNotFound(err)) {
      return undefined;
    }
    throw toIoError(err, filePath, 'read');
  }
}

/**
 * Permission bits of a file, or undefined when it does not exist
 */
export async function fileMode(filePath: string): Promise<number | undefined> {
  try {
    return (await fs.stat(filePath)).mode & 0o7777;
  } catch (err) {
    if (isNotFound(err)) {
      return undefined;
    }
    throw toIoError(err, filePath, 'stat');
  }
}

/**
 * Replace a file's content in one step: write a sibling, then rename it over the target.
 * The target keeps its permission bits; a new file gets `modeIfNew` when given.
 */
export async function writeWhole(filePath: string, content: Buffer, modeIfNew?: number): Promise<void> {
  const staging = siblingPath(filePath, TEMP_EXT);
  try {
    await fs.ensureDir(path.dirname(filePath));
    const mode = (await fileMode(filePath)) ?? modeIfNew;
    await fs.writeFile(staging, content);
    if (mode !== undefined) {
      await fs.chmod(staging, mode);
    }
    await fs.rename(staging, filePath);
  } catch (err) {
    await fs.remove(staging);
    throw toIoError(err, filePath, 'write');
  }
}

/**
 * Copy the current destination to `<dest>.dotrbak`, replacing any earlier backup
 */
export async function backupFile(filePath: string): Promise<string> {
  const backupPath = siblingPath(filePath, BACKUP_EXT);
  try {
    await fs.copy(filePath, backupPath, { overwrite: true });
  } catch (err) {
    throw toIoError(err, backupPath, 'back up to');
  }
  return backupPath;
}

/**
 * Source content as it would be deployed: rendered for templates, raw bytes otherwise
 */
async function effectiveSource(unit: DeploymentUnit, context: VariableContext): Promise<Effective> {
  const raw = await readOptional(unit.sourcePath);
  if (raw === undefined || !unit.isTemplate) {
    return { ok: true, content: raw };
  }
  const text = decodeText(raw);
  if (text === undefined) {
    return { ok: true, content: raw };
  }
  const rendered = render(text, context);
  if (!rendered.ok) {
    return { ok: false, error: rendered.error };
  }
  return { ok: true, content: Buffer.from(rendered.text, 'utf-8') };
}

function sourceMissing(unit: DeploymentUnit): IoError {
  return new IoError(`Source not found: ${unit.sourcePath}`, unit.sourcePath);
}

/**
 * Split units into runs of the same package, keeping order
 */
function groupByPackage(units: DeploymentUnit[]): Array<{ packageName: string; units: DeploymentUnit[] }> {
  const groups: Array<{ packageName: string; units: DeploymentUnit[] }> = [];
  for (const unit of units) {
    const last = groups[groups.length - 1];
    if (last && last.packageName === unit.packageName) {
      last.units.push(unit);
    } else {
      groups.push({ packageName: unit.packageName, units: [unit] });
    }
  }
  return groups;
}

function contextFor(session: Session, packageName: string): VariableContext {
  return resolveVariables({
    config: session.config,
    package: session.config.packages[packageName],
    profile: session.profile,
    userVariables: session.userVariables,
    env: session.env,
  });
}

class Recorder {
  readonly summary: PipelineSummary = { outcomes: [], packageErrors: [], failed: false };

  constructor(private readonly onOutcome?: (outcome: UnitOutcome) => void) {}

  unit(outcome: UnitOutcome): UnitOutcome {
    this.summary.outcomes.push(outcome);
    if (outcome.status === 'failed') {
      this.summary.failed = true;
    }
    this.onOutcome?.(outcome);
    return outcome;
  }

  packageError(packageName: string, error: DotrError): void {
    this.summary.packageErrors.push({ packageName, error });
    this.summary.failed = true;
  }
}

function asDotrError(err: unknown, unit: DeploymentUnit): DotrError {
  return toIoError(err, unit.destPath, 'process');
}

// =============================================================================
// Deploy
// =============================================================================

async function deployUnit(
  unit: DeploymentUnit,
  context: VariableContext,
  options: PipelineOptions,
  beforeWrite: () => Promise<void>
): Promise<UnitOutcome> {
  const direction: Direction = 'deploy';
  const source = await effectiveSource(unit, context);
  if (!source.ok) {
    return { unit, direction, status: 'failed', error: source.error };
  }

  const change = computeChange(source.content, await readOptional(unit.destPath));
  if (change.kind === 'source-missing') {
    return { unit, direction, status: 'failed', change, error: sourceMissing(unit) };
  }
  if (!needsWrite(change) || source.content === undefined) {
    return { unit, direction, status: 'unchanged', change };
  }
  if (options.dryRun) {
    return { unit, direction, status: 'pending', change };
  }

  await beforeWrite();
  const backupPath = change.kind === 'changed' ? await backupFile(unit.destPath) : undefined;
  await writeWhole(unit.destPath, source.content, await fileMode(unit.sourcePath));
  return { unit, direction, status: 'written', change, backupPath };
}

/**
 * Deploy every unit. Pre-actions run once before a package's first write,
 * post-actions once after its last unit, and neither runs for a package
 * whose units were all unchanged.
 */
export async function deploy(session: Session, options: PipelineOptions = {}): Promise<PipelineSummary> {
  const recorder = new Recorder(options.onOutcome);
  const runner = options.runner ?? shellRunner;
  const cwd = session.ctx.workingDir;

  for (const group of groupByPackage(session.units)) {
    const pkg = session.config.packages[group.packageName];
    const context = contextFor(session, group.packageName);
    const preActions: { ran: boolean; error?: DotrError } = { ran: false };
    let wrote = false;

    const beforeWrite = async (): Promise<void> => {
      if (preActions.ran) {
        return;
      }
      preActions.ran = true;
      try {
        const results = await runActions(pkg?.preActions ?? [], context, cwd, runner);
        results.forEach(result => options.onActionOutput?.(group.packageName, result));
      } catch (err) {
        preActions.error = toIoError(err, cwd, 'run pre-actions in');
        throw preActions.error;
      }
    };

    for (const unit of group.units) {
      if (preActions.error) {
        recorder.unit({ unit, direction: 'deploy', status: 'failed', reason: 'pre-actions failed', error: preActions.error });
        continue;
      }
      try {
        const outcome = await deployUnit(unit, context, options, beforeWrite);
        wrote = wrote || outcome.status === 'written';
        recorder.unit(outcome);
      } catch (err) {
        const error = asDotrError(err, unit);
        const reason = error === preActions.error ? 'pre-actions failed' : undefined;
        recorder.unit({ unit, direction: 'deploy', status: 'failed', reason, error });
      }
    }

    if (wrote && pkg && pkg.postActions.length > 0) {
      try {
        const results = await runActions(pkg.postActions, context, cwd, runner);
        results.forEach(result => options.onActionOutput?.(group.packageName, result));
      } catch (err) {
        recorder.packageError(group.packageName, toIoError(err, cwd, 'run post-actions in'));
      }
    }
  }

  return recorder.summary;
}

// =============================================================================
// Update
// =============================================================================

async function updateUnit(unit: DeploymentUnit): Promise<UnitOutcome> {
  const direction: Direction = 'update';
  if (unit.isTemplate) {
    return { unit, direction, status: 'skipped', reason: 'templated source' };
  }

  const current = await readOptional(unit.destPath);
  if (current === undefined) {
    return { unit, direction, status: 'skipped', reason: 'destination missing' };
  }

  const change = computeChange(await readOptional(unit.sourcePath), current);
  if (change.kind === 'identical') {
    return { unit, direction, status: 'unchanged', change };
  }

  await writeWhole(unit.sourcePath, current, await fileMode(unit.destPath));
  return { unit, direction, status: 'written', change };
}

/**
 * Copy changed destinations back into the store. Templated units are never touched.
 */
export async function update(session: Session, options: PipelineOptions = {}): Promise<PipelineSummary> {
  const recorder = new Recorder(options.onOutcome);
  for (const unit of session.units) {
    try {
      recorder.unit(await updateUnit(unit));
    } catch (err) {
      recorder.unit({ unit, direction: 'update', status: 'failed', error: asDotrError(err, unit) });
    }
  }
  return recorder.summary;
}

// =============================================================================
// Diff
// =============================================================================

async function diffUnit(unit: DeploymentUnit, context: VariableContext): Promise<UnitOutcome> {
  const direction: Direction = 'diff';
  const source = await effectiveSource(unit, context);
  if (!source.ok) {
    return { unit, direction, status: 'failed', error: source.error };
  }

  const change: ChangeResult = computeChange(source.content, await readOptional(unit.destPath));
  switch (change.kind) {
    case 'identical':
      return { unit, direction, status: 'unchanged', change };
    case 'source-missing':
      return { unit, direction, status: 'failed', change, error: sourceMissing(unit) };
    case 'changed':
    case 'dest-missing':
      return { unit, direction, status: 'pending', change };
  }
}

/**
 * Compare every unit against its destination without writing anything
 */
export async function diff(session: Session, options: PipelineOptions = {}): Promise<PipelineSummary> {
  const recorder = new Recorder(options.onOutcome);
  for (const group of groupByPackage(session.units)) {
    const context = contextFor(session, group.packageName);
    for (const unit of group.units) {
      try {
        recorder.unit(await diffUnit(unit, context));
      } catch (err) {
        recorder.unit({ unit, direction: 'diff', status: 'failed', error: asDotrError(err, unit) });
      }
    }
  }
  return recorder.summary;
}

/**
 * Dispatch a direction once for the whole run
 */
export async function runPipeline(
  direction: Direction,
  session: Session,
  options: PipelineOptions = {}
): Promise<PipelineSummary> {
  switch (direction) {
    case 'deploy':
      return deploy(session, options);
    case 'update':
      return update(session, options);
    case 'diff':
      return diff(session, options);
  }
}
