import type { Locator, Step } from '../types/index.js';

export type StepAction = 'click' | 'type' | 'select';

export interface ParsedStep {
  action: StepAction;
  locator: Locator;
  /** Text after `with`, for `type` and `select`. */
  value?: string;
}

/**
 * `<action> "<locator>"<rest>`. The locator runs to the first unescaped quote
 * that is followed by whitespace or the end of the step, so recorded steps like
 * `click "[data-testid="x"]"` parse as written. `\"` and `\\` inside the
 * locator stand for `"` and `\`.
 */
const STEP_PATTERN = /^(\s*)(click|type|select)(\s+)"((?:\\.|[^\\])+?)"(?=\s|$)(.*)$/i;
const VALUE_PATTERN = /^\s+with\s+"(.*)"\s*$/i;

export function parseStep(step: Step): ParsedStep | null {
  const match = step.match(STEP_PATTERN);
  if (!match) return null;

  const action = toAction(match[2]);
  const locator = unescapeLocator(match[4]);
  const value = match[5].match(VALUE_PATTERN)?.[1];
  return value === undefined ? { action, locator } : { action, locator, value };
}

export function extractLocator(step: Step): Locator | null {
  return parseStep(step)?.locator ?? null;
}

/** Swap the step's locator for `locator`, leaving everything else as written. */
export function replaceLocator(step: Step, locator: Locator): Step {
  const match = step.match(STEP_PATTERN);
  if (!match) return step;
  const [, indent, keyword, gap, , rest] = match;
  return `${indent}${keyword}${gap}"${escapeLocator(locator)}"${rest}`;
}

function escapeLocator(locator: Locator): string {
  return locator.replace(/["\\]/g, '\\$&');
}

function unescapeLocator(quoted: string): Locator {
  return quoted.replace(/\\(["\\])/g, '$1');
}

function toAction(keyword: string): StepAction {
  const lower = keyword.toLowerCase();
  if (lower === 'type' || lower === 'select') return lower;
  return 'click';
}
