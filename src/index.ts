/**
 * Dotr
 * Granular dotfiles deployment
 *
 * This module exports the core functionality for programmatic usage.
 */

// Types
export type {
  VariableValue,
  VariableTable,
  VariableContext,
  Package,
  Profile,
  ConfigTree,
  RunContext,
  DeploymentUnit,
  Hunk,
  ChangeResult,
  Direction,
  UnitOutcome,
  PipelineSummary,
} from './types/index.js';

// Errors
export * from './errors.js';

// Constants
export { CONFIG_FILE, USER_VARIABLES_FILE, DOTFILES_DIR, VERSION } from './constants.js';

// Config management
export {
  loadConfig,
  saveConfig,
  parseConfigTree,
  serializeConfig,
  isConfigured,
  initRepositoryFiles,
} from './services/config.js';

// Variables
export { resolveVariables, mergeTables, getVariable } from './services/variables.js';

// Templates
export { render, renderString, isTemplated, detectTemplate } from './services/template.js';

// Packages
export { selectPackages, expandPackage, resolveUnits, derivePackageName } from './services/packages.js';

// Prompts
export {
  loadUserVariables,
  saveUserVariable,
  collectPrompts,
  ensurePrompts,
  type LineReader,
} from './services/uservariables.js';

// Diffing
export { computeChange, computeHunks } from './services/diff.js';

// Actions
export { runActions, type ActionRunner, type ActionResult } from './services/actions.js';

// Pipeline
export { openSession, type Session, type SessionRequest } from './services/session.js';
export { deploy, update, diff, runPipeline, type PipelineOptions } from './services/deployer.js';
export { importPath, type ImportOptions, type ImportResult } from './services/importer.js';
