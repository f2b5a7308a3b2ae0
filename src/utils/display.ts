/**
 * Display Utilities
 * Console styling and formatting for CLI output
 */

import chalk from 'chalk';
import { BANNER, BRAND } from '../constants.js';
import type { DotrError } from '../errors.js';
import type { Hunk, UnitOutcome, VariableValue } from '../types/index.js';

/**
 * Brand colors
 */
export const colors = {
  primary: chalk.hex('#7C3AED'),    // Purple
  secondary: chalk.hex('#10B981'),  // Emerald
  accent: chalk.hex('#F59E0B'),     // Amber
  muted: chalk.gray,
  error: chalk.hex('#EF4444'),
  success: chalk.hex('#10B981'),
  warning: chalk.hex('#F59E0B'),
  info: chalk.hex('#3B82F6'),
  added: chalk.green,
  removed: chalk.red,
};

/**
 * Print the ASCII banner shown when `banner = true`
 */
export function printBanner(): void {
  console.log(colors.primary(BANNER));
  console.log(colors.muted(`    ${BRAND.tagline}`));
  console.log();
}

export function success(message: string): void {
  console.log(colors.success(`${BRAND.prefix} ${message}`));
}

export function error(message: string): void {
  console.log(colors.error(`✖ ${message}`));
}

export function warning(message: string): void {
  console.log(colors.warning(`⚠ ${message}`));
}

export function info(message: string): void {
  console.log(colors.info(`ℹ ${message}`));
}

/**
 * Print a dimmed/muted message
 */
export function dim(message: string): void {
  console.log(colors.muted(message));
}

/**
 * Print a typed error with its suggestion
 */
export function printError(err: DotrError): void {
  error(err.message);
  if (err.suggestion) {
    dim(`  ${err.suggestion}`);
  }
}

/**
 * Identify a unit as package[/relative path]
 */
export function formatUnit(outcome: UnitOutcome): string {
  const { packageName, relativePath } = outcome.unit;
  return relativePath
    ? `${colors.primary(packageName)}${colors.muted('/')}${relativePath}`
    : colors.primary(packageName);
}

/**
 * Format one hunk in unified diff style
 */
export function formatHunk(hunk: Hunk): string[] {
  const header = colors.info(`@@ -${hunk.destStart},${hunk.destLines} +${hunk.sourceStart},${hunk.sourceLines} @@`);
  const body = hunk.lines.map(line => {
    switch (line.kind) {
      case 'added':
        return colors.added(`+${line.text}`);
      case 'removed':
        return colors.removed(`-${line.text}`);
      case 'context':
        return colors.muted(` ${line.text}`);
    }
  });
  return [header, ...body];
}

/**
 * Print the change a diff found for one unit
 */
export function printChange(outcome: UnitOutcome): void {
  const change = outcome.change;
  if (!change) {
    return;
  }
  const { sourcePath, destPath } = outcome.unit;

  switch (change.kind) {
    case 'dest-missing':
      console.log(`${formatUnit(outcome)} ${colors.accent('not deployed')} ${colors.muted(destPath)}`);
      break;
    case 'changed':
      console.log(chalk.bold(`--- ${destPath}`));
      console.log(chalk.bold(`+++ ${sourcePath}`));
      if (change.binary) {
        dim('Binary files differ');
      }
      for (const hunk of change.hunks) {
        formatHunk(hunk).forEach(line => console.log(line));
      }
      console.log();
      break;
    default:
      break;
  }
}

/**
 * Render a variable tree as indented `key = value` lines
 */
export function formatVariable(key: string, value: VariableValue, level = 1): string[] {
  const indent = '  '.repeat(level);
  if (Array.isArray(value)) {
    const items = value.flatMap(item =>
      typeof item === 'object'
        ? [`${'  '.repeat(level + 1)}-`, ...formatNested(item, level + 2)]
        : [`${'  '.repeat(level + 1)}- ${String(item)}`]
    );
    return [`${indent}${key} = [`, ...items, `${indent}]`];
  }
  if (typeof value === 'object') {
    return [`${indent}${key} =`, ...formatNested(value, level + 1)];
  }
  return [`${indent}${key} = ${String(value)}`];
}

function formatNested(value: VariableValue, level: number): string[] {
  if (Array.isArray(value)) {
    return value.flatMap((item, index) => formatVariable(String(index), item, level));
  }
  if (typeof value === 'object') {
    return Object.entries(value).flatMap(([key, item]) => formatVariable(key, item, level));
  }
  return [`${'  '.repeat(level)}${String(value)}`];
}
