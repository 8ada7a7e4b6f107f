export * from './types/index.js';
export * from './schemas/index.js';

export { similarityRatio, bestMatch, DEFAULT_SIMILARITY_CUTOFF } from './healing/similarity.js';
export type { SimilarityMatch } from './healing/similarity.js';
export {
  identifierToken,
  normalizeIdentifier,
  humanizeLocator,
  textLocator,
  idLocator,
  uniqueTexts,
} from './healing/locator-text.js';
export * from './healing/strategies/index.js';
export { withDeadline } from './healing/deadline.js';
export { LocatorResolutionEngine } from './healing/resolution-engine.js';
export type { ResolutionEngineOptions, ResolveOptions } from './healing/resolution-engine.js';

export { HealingHistory } from './memory/healing-history.js';
export { HealingOrchestrator } from './runner/healing-orchestrator.js';
export type { LocatorResolver } from './runner/healing-orchestrator.js';
export { runWithHealing } from './runner/heal-and-retry.js';
export type { HealAndRetryOptions } from './runner/heal-and-retry.js';
export { parseStep, extractLocator, replaceLocator } from './runner/step-parser.js';
export type { ParsedStep, StepAction } from './runner/step-parser.js';
export { BudgetGuard } from './runner/budget-guard.js';

export { PlaywrightPageHandle, parentSelector } from './engines/playwright-page.js';
export type { PlaywrightPage, PlaywrightLocator } from './engines/playwright-page.js';
export { PlaywrightTestRunner } from './engines/playwright-runner.js';

export { HttpClient, HttpClientError } from './suggestion-client/http-client.js';
export { HttpModelSuggester, suggestLocator } from './suggestion-client/suggest-locator.js';

export { ReviewQueue } from './review/review-queue.js';
export type { ReviewDecision, ReviewStats, ReviewEntry } from './review/review-queue.js';
export { FeedbackCollector } from './feedback/feedback-collector.js';
export type { Feedback, FeedbackRecord, FeedbackSummary } from './feedback/feedback-collector.js';

export { MetricsCollector } from './metrics/collector.js';
export type { ResolutionMetrics } from './metrics/collector.js';
export { RunLogger } from './logging/run-logger.js';
export type { LogEntry } from './logging/run-logger.js';
export { writeSummary, buildSummaryMarkdown } from './logging/summary-writer.js';

export { DEFAULT_HEALING_CONFIG, resolveHealingConfig, loadHealingConfig } from './config/healing-config.js';
export {
  StrategyTimeoutError,
  ResolutionCancelledError,
  HealingHistoryError,
  ReviewNotFoundError,
} from './exception/errors.js';
export { classifyStrategyFailure, extractMessage } from './exception/classifier.js';
export type { HealingErrorType, StrategyFailureClassification } from './exception/classifier.js';
