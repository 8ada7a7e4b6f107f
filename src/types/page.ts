import type { Locator } from './locator.js';

export interface FindOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Whatever the page layer hands back for a located element. The core never inspects it. */
export type ElementHandle = unknown;

/**
 * Live document the engine resolves against. Implementations perform I/O and
 * should reject promptly once `signal` aborts.
 */
export interface PageHandle {
  find(locator: Locator, options: FindOptions): Promise<ElementHandle | null>;
  allText(signal?: AbortSignal): Promise<string[]>;
  allIdentifiers(signal?: AbortSignal): Promise<string[]>;
  structuralSiblings(locator: Locator, signal?: AbortSignal): Promise<Locator[]>;
}

/** Black-box locator proposal, typically backed by a remote model. */
export interface ModelSuggester {
  suggest(locator: Locator, page: PageHandle, signal: AbortSignal): Promise<Locator | null>;
}
