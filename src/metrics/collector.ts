import type { FailureKind, ResolutionOutcome, StrategyName } from '../types/index.js';

export interface ResolutionMetrics {
  resolutions: number;
  original: number;
  healed: number;
  cacheHits: number;
  unresolved: number;
  cacheHitRate: number;
  avgElapsedMs: number;
  strategyWins: Partial<Record<StrategyName, number>>;
  failures: Record<FailureKind, number>;
}

export class MetricsCollector {
  private resolutions = 0;
  private original = 0;
  private healed = 0;
  private cacheHits = 0;
  private unresolved = 0;
  private totalElapsedMs = 0;
  private strategyWins: Partial<Record<StrategyName, number>> = {};
  private failures: Record<FailureKind, number> = { StrategyTimeout: 0, UpstreamFailure: 0 };

  recordOutcome(outcome: ResolutionOutcome): void {
    this.resolutions++;
    this.totalElapsedMs += outcome.elapsedMs;

    switch (outcome.source) {
      case 'original':
        this.original++;
        break;
      case 'cache':
        this.cacheHits++;
        break;
      case 'strategy':
        this.healed++;
        break;
      case 'unresolved':
        this.unresolved++;
        break;
    }

    if (outcome.source === 'strategy' && outcome.strategy) {
      this.strategyWins[outcome.strategy] = (this.strategyWins[outcome.strategy] ?? 0) + 1;
    }

    for (const failure of outcome.failures) {
      this.failures[failure.kind]++;
    }
  }

  snapshot(): ResolutionMetrics {
    return {
      resolutions: this.resolutions,
      original: this.original,
      healed: this.healed,
      cacheHits: this.cacheHits,
      unresolved: this.unresolved,
      cacheHitRate: this.resolutions > 0 ? this.cacheHits / this.resolutions : 0,
      avgElapsedMs: this.resolutions > 0 ? this.totalElapsedMs / this.resolutions : 0,
      strategyWins: { ...this.strategyWins },
      failures: { ...this.failures },
    };
  }

  reset(): void {
    this.resolutions = 0;
    this.original = 0;
    this.healed = 0;
    this.cacheHits = 0;
    this.unresolved = 0;
    this.totalElapsedMs = 0;
    this.strategyWins = {};
    this.failures = { StrategyTimeout: 0, UpstreamFailure: 0 };
  }
}
