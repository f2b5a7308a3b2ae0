/**
 * Template Service
 * Detects and renders Jinja-style templates through nunjucks
 */

import nunjucks from 'nunjucks';
import { RenderError, errorMessage } from '../errors.js';
import type { VariableContext } from '../types/index.js';

// {{ }} expressions, {% %} statements and {# #} comments, with optional whitespace control
const TEMPLATE_PATTERN = /(\{\{-?|-?\}\}|\{%-?|-?%\}|\{#-?|-?#\})/;

// Output is written verbatim into config files, so nothing is escaped.
// Undefined variables fail the render instead of producing empty text.
const environment = new nunjucks.Environment(null, {
  autoescape: false,
  throwOnUndefined: true,
});

const utf8 = new TextDecoder('utf-8', { fatal: true });

export type RenderResult =
  | { ok: true; text: string }
  | { ok: false; error: RenderError };

/**
 * Check whether text contains template delimiters
 */
export function isTemplated(text: string): boolean {
  return TEMPLATE_PATTERN.test(text);
}

/**
 * Decode file bytes as UTF-8, or undefined when the file is binary
 */
export function decodeText(content: Buffer): string | undefined {
  try {
    return utf8.decode(content);
  } catch {
    return undefined;
  }
}

/**
 * Probe raw file content. Binary content is never a template.
 */
export function detectTemplate(content: Buffer): boolean {
  const text = decodeText(content);
  return text !== undefined && isTemplated(text);
}

export function render(template: string, context: VariableContext): RenderResult {
  try {
    return { ok: true, text: environment.renderString(template, { ...context }) };
  } catch (err) {
    return { ok: false, error: new RenderError(errorMessage(err), { cause: err }) };
  }
}

/**
 * Render a short string such as an action command, throwing on failure
 */
export function renderString(template: string, context: VariableContext): string {
  const result = render(template, context);
  if (!result.ok) {
    throw result.error;
  }
  return result.text;
}
