import { describe, it, expect, beforeEach } from 'vitest';
import { BudgetGuard } from '../../src/runner/budget-guard.js';

describe('BudgetGuard', () => {
  let guard: BudgetGuard;

  beforeEach(() => {
    guard = new BudgetGuard({ maxModelCallsPerRun: 2 });
  });

  describe('canCallModel', () => {
    it('returns true when under budget', () => {
      expect(guard.canCallModel()).toBe(true);
    });

    it('returns false when at limit', () => {
      guard.recordModelCall();
      guard.recordModelCall();
      expect(guard.canCallModel()).toBe(false);
      expect(guard.isOverBudget()).toBe(true);
    });

    it('never allows calls with a zero budget', () => {
      expect(new BudgetGuard({ maxModelCallsPerRun: 0 }).canCallModel()).toBe(false);
    });
  });

  describe('currentUsage', () => {
    it('returns a copy of the usage counters', () => {
      guard.recordModelCall();
      const usage = guard.currentUsage;
      guard.recordModelCall();
      expect(usage).toEqual({ modelCalls: 1 });
      expect(guard.currentUsage).toEqual({ modelCalls: 2 });
    });
  });

  describe('reset', () => {
    it('clears usage for a new run', () => {
      guard.recordModelCall();
      guard.recordModelCall();
      guard.reset();
      expect(guard.canCallModel()).toBe(true);
      expect(guard.currentUsage).toEqual({ modelCalls: 0 });
    });
  });
});
