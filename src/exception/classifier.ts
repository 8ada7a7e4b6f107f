import type { FailureKind } from '../types/index.js';
import { StrategyTimeoutError } from './errors.js';

/**
 * - ResolutionMiss: no strategy produced a locator (an outcome value, never thrown)
 * - ExtractionMiss: a step matched no action pattern (passed through)
 * - StrategyTimeout / UpstreamFailure: absorbed per strategy as "no match"
 */
export type HealingErrorType = 'ResolutionMiss' | 'ExtractionMiss' | FailureKind;

export interface StrategyFailureClassification {
  kind: FailureKind;
  message: string;
  /** The page itself is gone; later strategies would fail the same way. */
  pageLost: boolean;
}

export function classifyStrategyFailure(error: unknown): StrategyFailureClassification {
  const message = extractMessage(error);
  const text = message.toLowerCase();

  if (isTimeout(error, text)) {
    return { kind: 'StrategyTimeout', message, pageLost: false };
  }

  return { kind: 'UpstreamFailure', message, pageLost: isPageLost(text) };
}

export function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function isTimeout(error: unknown, text: string): boolean {
  if (error instanceof StrategyTimeoutError) return true;
  if (error instanceof Error && error.name === 'TimeoutError') return true;
  return text.includes('timeout') || text.includes('timed out');
}

function isPageLost(text: string): boolean {
  const patterns = [
    'target closed',
    'target page, context or browser has been closed',
    'browser has been closed',
    'page has been closed',
    'context has been closed',
    'connection closed',
    'connection refused',
    'econnrefused',
    'econnreset',
    'websocket is not open',
  ];
  return patterns.some((p) => text.includes(p));
}
