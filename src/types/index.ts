/**
 * Dotr Type Definitions
 */

import type { DotrError } from '../errors.js';

/** A value held in a variable table: TOML scalars, arrays and nested tables */
export type VariableValue = string | number | boolean | VariableValue[] | VariableTable;

export interface VariableTable {
  [key: string]: VariableValue;
}

/** Merged, read-only variables handed to the template engine */
export type VariableContext = Readonly<VariableTable>;

/** Prompt key → text shown to the user */
export type PromptMap = Record<string, string>;

export interface Package {
  /** Unique key under [packages] */
  name: string;
  /** Source path, relative to the repository root */
  src: string;
  /** Target path: absolute, `~`-relative or repository-relative */
  dest: string;
  /** Packages always deployed alongside this one */
  dependencies: string[];
  variables: VariableTable;
  prompts: PromptMap;
  preActions: string[];
  postActions: string[];
  /** Profile name → destination overriding `dest` */
  targets: Record<string, string>;
  /** Excluded from "all packages" unless selected or pulled in by a profile */
  skip: boolean;
  /** Glob patterns of files, relative to `src`, never deployed or updated */
  ignore: string[];
}

export interface Profile {
  name: string;
  dependencies: string[];
  variables: VariableTable;
  prompts: PromptMap;
}

export interface ConfigTree {
  banner: boolean;
  variables: VariableTable;
  prompts: PromptMap;
  /** Insertion order is declaration order in config.toml */
  packages: Record<string, Package>;
  profiles: Record<string, Profile>;
}

/** Where a command runs: the repository root and the home directory `~` expands to */
export interface RunContext {
  workingDir: string;
  homeDir: string;
}

export interface DeploymentUnit {
  packageName: string;
  profile?: string;
  /** Absolute path of the file in the store */
  sourcePath: string;
  /** Absolute path of the deployed file, target override applied */
  destPath: string;
  /** Path below the package root; empty for single-file packages */
  relativePath: string;
  isTemplate: boolean;
}

export type DiffLineKind = 'added' | 'removed' | 'context';

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
}

export interface Hunk {
  /** 1-based start line and length in the destination */
  destStart: number;
  destLines: number;
  /** 1-based start line and length in the effective source */
  sourceStart: number;
  sourceLines: number;
  lines: DiffLine[];
}

export type ChangeResult =
  | { kind: 'identical' }
  | { kind: 'changed'; hunks: Hunk[]; binary: boolean }
  | { kind: 'dest-missing' }
  | { kind: 'source-missing' };

export type Direction = 'deploy' | 'update' | 'diff';

export type UnitStatus =
  /** deploy wrote the destination, update wrote the store */
  | 'written'
  | 'unchanged'
  /** diff found (or a dry run would make) a change */
  | 'pending'
  | 'skipped'
  | 'failed';

export interface UnitOutcome {
  unit: DeploymentUnit;
  direction: Direction;
  status: UnitStatus;
  change?: ChangeResult;
  /** Set when deploy copied the previous destination aside */
  backupPath?: string;
  reason?: string;
  error?: DotrError;
}

export interface PipelineSummary {
  outcomes: UnitOutcome[];
  /** Package-level failures that are not tied to one unit (post-actions) */
  packageErrors: Array<{ packageName: string; error: DotrError }>;
  failed: boolean;
}
