import type { Locator } from '../types/index.js';

const ID_SUFFIX = /#([\w-]+)$/;
const ATTRIBUTE_SELECTOR = /\[(?:id|data-testid|data-test-id|data-test|name)=["']?([^"'\]]+)["']?\]$/;
const TEXT_PREFIX = /^text=/;
const CSS_IDENTIFIER = /^[A-Za-z_][\w-]*$/;

/** Identifier a locator refers to by id, test id or name, if any. */
export function identifierToken(locator: Locator): string | null {
  const trimmed = locator.trim();
  const attribute = trimmed.match(ATTRIBUTE_SELECTOR);
  if (attribute) return attribute[1];
  const id = trimmed.match(ID_SUFFIX);
  return id ? id[1] : null;
}

export function normalizeIdentifier(identifier: string): string {
  return identifier.toLowerCase().replace(/[-_]/g, '');
}

/**
 * Words a locator most plausibly names, lower-cased:
 * `#old-btn` -> `old btn`, `[data-testid="submitOrder"]` -> `submit order`.
 */
export function humanizeLocator(locator: Locator): string {
  const trimmed = locator.trim();
  if (TEXT_PREFIX.test(trimmed)) {
    return collapse(trimmed.replace(TEXT_PREFIX, '')).toLowerCase();
  }

  const token = identifierToken(trimmed) ?? lastSegment(trimmed);
  return collapse(
    token
      .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
      .replace(/[-_]+/g, ' ')
      .replace(/[^\w\s]+/g, ' '),
  ).toLowerCase();
}

export function textLocator(text: string): Locator {
  return `text=${text}`;
}

export function idLocator(id: string): Locator {
  return CSS_IDENTIFIER.test(id) ? `#${id}` : `[id="${id.replace(/"/g, '\\"')}"]`;
}

/** Trimmed, whitespace-collapsed, non-empty texts in first-seen order. */
export function uniqueTexts(texts: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const text of texts) {
    const cleaned = collapse(text);
    if (cleaned) seen.add(cleaned);
  }
  return [...seen];
}

function lastSegment(locator: string): string {
  const segments = locator.split(/[\s>+~/]+/).filter(Boolean);
  const last = segments[segments.length - 1] ?? '';
  const parts = last.split(/[#.]/).filter(Boolean);
  return parts[parts.length - 1] ?? '';
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
