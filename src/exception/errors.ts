import type { StrategyName } from '../types/index.js';

export class StrategyTimeoutError extends Error {
  constructor(
    public strategy: StrategyName,
    public timeoutMs: number,
  ) {
    super(`Strategy ${strategy} timed out after ${timeoutMs}ms`);
    this.name = 'StrategyTimeoutError';
  }
}

/** The caller abandoned a resolution; in-flight strategy work has been aborted. */
export class ResolutionCancelledError extends Error {
  constructor(public locator: string) {
    super(`Resolution of ${locator} was cancelled`);
    this.name = 'ResolutionCancelledError';
  }
}

/** Malformed healing history state. Fatal: never absorbed by the engine. */
export class HealingHistoryError extends Error {
  constructor(message: string, public filePath?: string) {
    super(message);
    this.name = 'HealingHistoryError';
  }
}

export class ReviewNotFoundError extends Error {
  constructor(public reviewId: string) {
    super(`Review ${reviewId} not found`);
    this.name = 'ReviewNotFoundError';
  }
}
