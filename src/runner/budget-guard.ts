export interface BudgetConfig {
  maxModelCallsPerRun: number;
}

export interface BudgetUsage {
  modelCalls: number;
}

/** Caps the number of paid model suggestions a single run may request. */
export class BudgetGuard {
  private usage: BudgetUsage;

  constructor(private config: BudgetConfig) {
    this.usage = { modelCalls: 0 };
  }

  get currentUsage(): BudgetUsage {
    return { ...this.usage };
  }

  canCallModel(): boolean {
    return this.usage.modelCalls < this.config.maxModelCallsPerRun;
  }

  recordModelCall(): void {
    this.usage.modelCalls++;
  }

  isOverBudget(): boolean {
    return this.usage.modelCalls >= this.config.maxModelCallsPerRun;
  }

  /**
   * Reset usage counters (for a new run).
   */
  reset(): void {
    this.usage = { modelCalls: 0 };
  }
}
