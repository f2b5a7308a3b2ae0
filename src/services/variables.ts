/**
 * Variable Resolver
 * Merges every variable source into one context per (package, profile)
 */

import type {
  ConfigTree,
  Package,
  Profile,
  VariableContext,
  VariableTable,
  VariableValue,
} from '../types/index.js';

export interface ResolveOptions {
  config: ConfigTree;
  package?: Package;
  profile?: Profile;
  userVariables: VariableTable;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

function isPlainTable(value: VariableValue | undefined): value is VariableTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneValue(value: VariableValue): VariableValue {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isPlainTable(value)) {
    return mergeTables({}, value);
  }
  return value;
}

/**
 * Merge `higher` over `lower` without touching either.
 * Tables merge key by key; arrays and scalars are replaced wholesale.
 */
export function mergeTables(lower: VariableTable, higher: VariableTable): VariableTable {
  const merged: VariableTable = {};
  for (const [key, value] of Object.entries(lower)) {
    merged[key] = cloneValue(value);
  }
  for (const [key, value] of Object.entries(higher)) {
    const current = merged[key];
    merged[key] = isPlainTable(current) && isPlainTable(value)
      ? mergeTables(current, value)
      : cloneValue(value);
  }
  return merged;
}

export function environmentTable(env: NodeJS.ProcessEnv): VariableTable {
  const table: VariableTable = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string') {
      table[key] = value;
    }
  }
  return table;
}

function deepFreeze<T extends VariableValue>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Ordered variable layers, lowest precedence first
 */
export function variableLayers(options: ResolveOptions): VariableTable[] {
  const layers: VariableTable[] = [
    environmentTable(options.env ?? process.env),
    options.config.variables,
  ];
  if (options.package) {
    layers.push(options.package.variables);
  }
  if (options.profile) {
    layers.push(options.profile.variables);
  }
  layers.push(options.userVariables);
  return layers;
}

/**
 * Resolve the evaluation context: environment < config < package < profile < user variables
 */
export function resolveVariables(options: ResolveOptions): VariableContext {
  const merged = variableLayers(options).reduce<VariableTable>(
    (acc, layer) => mergeTables(acc, layer),
    {}
  );
  return deepFreeze(merged);
}

/**
 * Look up a dotted key such as `git.email`
 */
export function getVariable(context: VariableContext, dottedKey: string): VariableValue | undefined {
  let current: VariableValue | undefined = context;
  for (const segment of dottedKey.split('.')) {
    if (!isPlainTable(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}
