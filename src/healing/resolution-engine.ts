import type {
  HealingConfig,
  Locator,
  PageHandle,
  ResolutionOutcome,
  ResolutionSource,
  StrategyFailure,
  StrategyName,
} from '../types/index.js';
import type { HealingHistory } from '../memory/healing-history.js';
import type { MetricsCollector } from '../metrics/collector.js';
import type { RunLogger } from '../logging/run-logger.js';
import type { ResolutionStrategy } from './strategies/index.js';
import { resolveHealingConfig } from '../config/healing-config.js';
import { classifyStrategyFailure } from '../exception/classifier.js';
import { ResolutionCancelledError } from '../exception/errors.js';
import { withDeadline } from './deadline.js';

export interface ResolutionEngineOptions {
  history: HealingHistory;
  strategies: ResolutionStrategy[];
  config?: Partial<HealingConfig>;
  metrics?: MetricsCollector;
  logger?: RunLogger;
}

export interface ResolveOptions {
  signal?: AbortSignal;
}

interface ChainResult {
  healed: Locator | null;
  strategyIndex: number | null;
  strategy: StrategyName | null;
  source: ResolutionSource;
}

/**
 * Finds a working locator for one that may have broken.
 *
 * The healing history is consulted first; a hit returns immediately without
 * touching the page. Otherwise the strategies run in order and the first one
 * to produce a (verified) locator wins. Strategy errors and timeouts count as
 * "no match". Only caller cancellation and malformed history state escape.
 */
export class LocatorResolutionEngine {
  readonly config: HealingConfig;
  private history: HealingHistory;
  private strategies: readonly ResolutionStrategy[];
  private metrics?: MetricsCollector;
  private logger?: RunLogger;
  private inFlight = new Map<Locator, Promise<ResolutionOutcome>>();

  constructor(options: ResolutionEngineOptions) {
    this.history = options.history;
    this.strategies = [...options.strategies];
    this.config = resolveHealingConfig(options.config);
    this.metrics = options.metrics;
    this.logger = options.logger;
  }

  async resolve(
    locator: Locator,
    page: PageHandle,
    options: ResolveOptions = {},
  ): Promise<ResolutionOutcome> {
    const { signal } = options;
    const start = Date.now();

    for (;;) {
      if (signal?.aborted) throw new ResolutionCancelledError(locator);

      const cached = this.history.get(locator);
      if (cached !== undefined) {
        return this.finish(
          locator,
          { healed: cached, strategyIndex: null, strategy: null, source: 'cache' },
          [],
          start,
        );
      }

      // Another caller is already resolving this locator: share its outcome.
      const pending = this.inFlight.get(locator);
      if (!pending) break;
      try {
        return await untilAborted(pending, locator, signal);
      } catch (error) {
        // The first caller gave up; take over unless we did too.
        if (error instanceof ResolutionCancelledError && !signal?.aborted) {
          if (this.inFlight.get(locator) === pending) this.inFlight.delete(locator);
          continue;
        }
        throw error;
      }
    }

    const run = this.runChain(locator, page, start, signal);
    this.inFlight.set(locator, run);
    try {
      return await run;
    } finally {
      if (this.inFlight.get(locator) === run) {
        this.inFlight.delete(locator);
      }
    }
  }

  private async runChain(
    locator: Locator,
    page: PageHandle,
    start: number,
    signal?: AbortSignal,
  ): Promise<ResolutionOutcome> {
    const failures: StrategyFailure[] = [];

    for (let index = 0; index < this.strategies.length; index++) {
      const strategy = this.strategies[index];
      let candidate: Locator | null;

      try {
        candidate = await withDeadline(
          (strategySignal) => this.attempt(strategy, locator, page, strategySignal),
          { strategy: strategy.name, timeoutMs: this.timeoutFor(strategy), signal },
        );
      } catch (error) {
        if (signal?.aborted) throw new ResolutionCancelledError(locator);

        const failure = classifyStrategyFailure(error);
        failures.push({ strategy: strategy.name, kind: failure.kind, message: failure.message });
        // Every later strategy needs the same page; stop instead of failing N more times.
        if (failure.pageLost) break;
        continue;
      }

      if (candidate === null) continue;

      if (candidate === locator) {
        return this.finish(
          locator,
          { healed: locator, strategyIndex: index, strategy: strategy.name, source: 'original' },
          failures,
          start,
        );
      }

      this.history.set(locator, candidate);
      return this.finish(
        locator,
        { healed: candidate, strategyIndex: index, strategy: strategy.name, source: 'strategy' },
        failures,
        start,
      );
    }

    return this.finish(
      locator,
      { healed: null, strategyIndex: null, strategy: null, source: 'unresolved' },
      failures,
      start,
    );
  }

  /** Run one strategy and, when enabled, confirm its proposal exists on the page. */
  private async attempt(
    strategy: ResolutionStrategy,
    locator: Locator,
    page: PageHandle,
    signal: AbortSignal,
  ): Promise<Locator | null> {
    const candidate = await strategy.attempt(locator, page, { signal, config: this.config });
    // Only the exact check may vouch for the locator it was given.
    if (candidate === locator) return strategy.name === 'exact_check' ? candidate : null;
    if (candidate === null || !this.config.verifyCandidates) return candidate;

    const element = await page.find(candidate, {
      timeoutMs: this.config.exactCheckTimeoutMs,
      signal,
    });
    return element ? candidate : null;
  }

  private timeoutFor(strategy: ResolutionStrategy): number {
    return strategy.name === 'model_assisted'
      ? this.config.modelTimeoutMs
      : this.config.strategyTimeoutMs;
  }

  private async finish(
    original: Locator,
    result: ChainResult,
    failures: StrategyFailure[],
    start: number,
  ): Promise<ResolutionOutcome> {
    const outcome: ResolutionOutcome = Object.freeze({
      original,
      ...result,
      elapsedMs: Date.now() - start,
      failures: Object.freeze([...failures]),
    });

    this.metrics?.recordOutcome(outcome);
    await this.logger?.logResolution(outcome);
    return outcome;
  }
}

function untilAborted<T>(promise: Promise<T>, locator: Locator, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ResolutionCancelledError(locator));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
