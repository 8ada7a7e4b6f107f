/** Opaque element descriptor. Two locators are equal only when their strings are. */
export type Locator = string;

export type StrategyName =
  | 'exact_check'
  | 'id_variation'
  | 'text_similarity'
  | 'structural_relative'
  | 'model_assisted';

export type ResolutionSource = 'original' | 'strategy' | 'cache' | 'unresolved';

export type FailureKind = 'StrategyTimeout' | 'UpstreamFailure';

export interface StrategyFailure {
  strategy: StrategyName;
  kind: FailureKind;
  message: string;
}

export interface ResolutionOutcome {
  original: Locator;
  healed: Locator | null;
  /** Position in the chain that produced `healed`; null for cache hits and misses. */
  strategyIndex: number | null;
  strategy: StrategyName | null;
  source: ResolutionSource;
  elapsedMs: number;
  failures: readonly StrategyFailure[];
}
