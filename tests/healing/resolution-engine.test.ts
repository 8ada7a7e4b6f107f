import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { LocatorResolutionEngine } from '../../src/healing/resolution-engine.js';
import type { ResolutionStrategy } from '../../src/healing/strategies/index.js';
import { HealingHistory } from '../../src/memory/healing-history.js';
import { MetricsCollector } from '../../src/metrics/collector.js';
import { RunLogger } from '../../src/logging/run-logger.js';
import { ResolutionCancelledError } from '../../src/exception/errors.js';
import type { HealingConfig, Locator, StrategyName } from '../../src/types/index.js';
import { FakePage } from '../helpers/fake-page.js';

type Attempt = ResolutionStrategy['attempt'];

function stub(name: StrategyName, attempt: Attempt) {
  return { name, attempt: vi.fn<Attempt>(attempt) };
}

function returning(name: StrategyName, result: Locator | null) {
  return stub(name, async () => result);
}

function deferred<T>() {
  let settle: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

const unverified: Partial<HealingConfig> = { verifyCandidates: false };

describe('LocatorResolutionEngine', () => {
  let history: HealingHistory;
  let page: FakePage;

  beforeEach(() => {
    history = new HealingHistory();
    page = new FakePage();
  });

  describe('strategy chain', () => {
    it('returns the first strategy that produces a locator', async () => {
      const exact = returning('exact_check', null);
      const id = returning('id_variation', '#buy-now');
      const text = returning('text_similarity', 'text=Buy');
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [exact, id, text],
        config: unverified,
      });

      const outcome = await engine.resolve('#buy', page);

      expect(outcome).toMatchObject({
        original: '#buy',
        healed: '#buy-now',
        strategyIndex: 1,
        strategy: 'id_variation',
        source: 'strategy',
        failures: [],
      });
      expect(text.attempt).not.toHaveBeenCalled();
      expect(history.get('#buy')).toBe('#buy-now');
    });

    it('reports a working original locator without caching it', async () => {
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [returning('exact_check', '#buy'), returning('id_variation', '#other')],
      });

      const outcome = await engine.resolve('#buy', page);

      expect(outcome.source).toBe('original');
      expect(outcome.healed).toBe('#buy');
      expect(outcome.strategyIndex).toBe(0);
      expect(history.size).toBe(0);
    });

    it('reports unresolved when every strategy comes up empty', async () => {
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [returning('exact_check', null), returning('id_variation', null)],
      });

      const outcome = await engine.resolve('#gone', page);

      expect(outcome).toMatchObject({
        healed: null,
        strategyIndex: null,
        strategy: null,
        source: 'unresolved',
      });
      expect(history.size).toBe(0);
    });

    it('returns frozen outcomes', async () => {
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [returning('exact_check', null)],
      });

      const outcome = await engine.resolve('#gone', page);

      expect(Object.isFrozen(outcome)).toBe(true);
      expect(Object.isFrozen(outcome.failures)).toBe(true);
    });
  });

  describe('healing history', () => {
    it('answers from history without calling any strategy', async () => {
      history.set('#submit-btn', 'text=Place Order');
      const strategies = [returning('exact_check', '#submit-btn'), returning('id_variation', '#x')];
      const engine = new LocatorResolutionEngine({ history, strategies });

      const outcome = await engine.resolve('#submit-btn', page);

      expect(outcome).toMatchObject({
        original: '#submit-btn',
        healed: 'text=Place Order',
        strategyIndex: null,
        strategy: null,
        source: 'cache',
      });
      for (const strategy of strategies) {
        expect(strategy.attempt).not.toHaveBeenCalled();
      }
    });

    it('serves a repeated resolution from history', async () => {
      const id = returning('id_variation', '#buy-now');
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [returning('exact_check', null), id],
        config: unverified,
      });

      const first = await engine.resolve('#buy', page);
      const second = await engine.resolve('#buy', page);

      expect(second.healed).toBe(first.healed);
      expect(second.source).toBe('cache');
      expect(id.attempt).toHaveBeenCalledTimes(1);
    });
  });

  describe('candidate verification', () => {
    it('rejects a candidate the page cannot find and moves on', async () => {
      page = new FakePage({ texts: ['Old Button'] });
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [
          returning('exact_check', null),
          returning('id_variation', '#ghost'),
          returning('text_similarity', 'text=Old Button'),
        ],
      });

      const outcome = await engine.resolve('#old-btn', page);

      expect(outcome.healed).toBe('text=Old Button');
      expect(outcome.strategyIndex).toBe(2);
      expect(page.found).toEqual(['#ghost', 'text=Old Button']);
      expect(history.has('#old-btn')).toBe(true);
      expect(history.toJSON()).toEqual({ '#old-btn': 'text=Old Button' });
    });

    it('accepts candidates as proposed when verification is off', async () => {
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [returning('id_variation', '#ghost')],
        config: unverified,
      });

      const outcome = await engine.resolve('#old-btn', page);

      expect(outcome.healed).toBe('#ghost');
      expect(page.found).toEqual([]);
    });

    it('treats a fallback that echoes the original locator as no match', async () => {
      const model = returning('model_assisted', '#gone');
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [returning('exact_check', null), model],
      });

      const outcome = await engine.resolve('#gone', page);

      expect(model.attempt).toHaveBeenCalledTimes(1);
      expect(outcome).toMatchObject({
        healed: null,
        strategyIndex: null,
        strategy: null,
        source: 'unresolved',
      });
      expect(history.size).toBe(0);
    });

    it('ignores an echoed locator even with verification off', async () => {
      const text = returning('text_similarity', 'text=Buy');
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [returning('exact_check', null), returning('id_variation', '#buy'), text],
        config: unverified,
      });

      const outcome = await engine.resolve('#buy', page);

      expect(outcome.source).toBe('strategy');
      expect(outcome.strategy).toBe('text_similarity');
      expect(outcome.healed).toBe('text=Buy');
      expect(history.get('#buy')).toBe('text=Buy');
    });
  });

  describe('absorbed failures', () => {
    it('treats a strategy that overruns its deadline as no match', async () => {
      const signals: AbortSignal[] = [];
      const slow = stub('id_variation', (_locator, _page, { signal }) => {
        signals.push(signal);
        return new Promise<Locator | null>(() => {});
      });
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [slow, returning('text_similarity', 'text=Buy')],
        config: { strategyTimeoutMs: 20, verifyCandidates: false },
      });

      const outcome = await engine.resolve('#buy', page);

      expect(outcome.healed).toBe('text=Buy');
      expect(outcome.failures).toEqual([
        {
          strategy: 'id_variation',
          kind: 'StrategyTimeout',
          message: 'Strategy id_variation timed out after 20ms',
        },
      ]);
      expect(signals[0].aborted).toBe(true);
    });

    it('gives model_assisted its own, longer deadline', async () => {
      const model = stub(
        'model_assisted',
        () => new Promise<Locator | null>((resolve) => setTimeout(() => resolve('#suggested'), 30)),
      );
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [model],
        config: { strategyTimeoutMs: 10, modelTimeoutMs: 500, verifyCandidates: false },
      });

      const outcome = await engine.resolve('#buy', page);

      expect(outcome.healed).toBe('#suggested');
      expect(outcome.strategy).toBe('model_assisted');
    });

    it('absorbs upstream errors and tries the next strategy', async () => {
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [
          stub('id_variation', async () => {
            throw new Error('selector engine crashed');
          }),
          returning('text_similarity', 'text=Buy'),
        ],
        config: unverified,
      });

      const outcome = await engine.resolve('#buy', page);

      expect(outcome.healed).toBe('text=Buy');
      expect(outcome.failures).toEqual([
        { strategy: 'id_variation', kind: 'UpstreamFailure', message: 'selector engine crashed' },
      ]);
    });

    it('stops the chain once the page is gone', async () => {
      const later = returning('text_similarity', 'text=Buy');
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [
          stub('exact_check', async () => {
            throw new Error('Target page, context or browser has been closed');
          }),
          later,
        ],
      });

      const outcome = await engine.resolve('#buy', page);

      expect(outcome.source).toBe('unresolved');
      expect(outcome.failures).toHaveLength(1);
      expect(outcome.failures[0].kind).toBe('UpstreamFailure');
      expect(later.attempt).not.toHaveBeenCalled();
    });
  });

  describe('cancellation', () => {
    it('rejects without running strategies when already cancelled', async () => {
      const exact = returning('exact_check', '#buy');
      const engine = new LocatorResolutionEngine({ history, strategies: [exact] });
      const controller = new AbortController();
      controller.abort();

      await expect(engine.resolve('#buy', page, { signal: controller.signal })).rejects.toBeInstanceOf(
        ResolutionCancelledError,
      );
      expect(exact.attempt).not.toHaveBeenCalled();
    });

    it('aborts the running strategy and caches nothing', async () => {
      const controller = new AbortController();
      const signals: AbortSignal[] = [];
      const later = returning('text_similarity', 'text=Buy');
      const hanging = stub('id_variation', (_locator, _page, { signal }) => {
        signals.push(signal);
        controller.abort();
        return new Promise<Locator | null>(() => {});
      });
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [hanging, later],
        config: unverified,
      });

      await expect(engine.resolve('#buy', page, { signal: controller.signal })).rejects.toThrow(
        'Resolution of #buy was cancelled',
      );
      expect(signals[0].aborted).toBe(true);
      expect(later.attempt).not.toHaveBeenCalled();
      expect(history.size).toBe(0);
    });
  });

  describe('concurrent resolution', () => {
    it('shares one in-flight resolution per locator', async () => {
      const gate = deferred<Locator | null>();
      const id = stub('id_variation', () => gate.promise);
      const engine = new LocatorResolutionEngine({ history, strategies: [id], config: unverified });

      const first = engine.resolve('#buy', page);
      const second = engine.resolve('#buy', page);
      gate.resolve('#buy-now');

      const [a, b] = await Promise.all([first, second]);
      expect(a).toBe(b);
      expect(a.healed).toBe('#buy-now');
      expect(id.attempt).toHaveBeenCalledTimes(1);
    });

    it('does not make different locators wait on each other', async () => {
      const gate = deferred<Locator | null>();
      const id = stub('id_variation', async (locator) =>
        locator === '#slow' ? gate.promise : '#fast-healed',
      );
      const engine = new LocatorResolutionEngine({ history, strategies: [id], config: unverified });

      const slow = engine.resolve('#slow', page);
      const fast = await engine.resolve('#fast', page);

      expect(fast.healed).toBe('#fast-healed');
      gate.resolve('#slow-healed');
      expect((await slow).healed).toBe('#slow-healed');
    });

    it('takes over when the caller it was waiting on cancels', async () => {
      const controller = new AbortController();
      const id = stub('id_variation', async () => '#buy-now');
      id.attempt.mockImplementationOnce(() => new Promise<Locator | null>(() => {}));
      const engine = new LocatorResolutionEngine({ history, strategies: [id], config: unverified });

      const cancelled = engine.resolve('#buy', page, { signal: controller.signal });
      const waiting = engine.resolve('#buy', page);
      controller.abort();

      await expect(cancelled).rejects.toBeInstanceOf(ResolutionCancelledError);
      const outcome = await waiting;
      expect(outcome.healed).toBe('#buy-now');
      expect(id.attempt).toHaveBeenCalledTimes(2);
    });
  });

  describe('observability', () => {
    let runDir: string;

    beforeEach(() => {
      runDir = join(tmpdir(), `resolution-engine-test-${randomUUID()}`);
    });

    afterEach(async () => {
      await rm(runDir, { recursive: true, force: true });
    });

    it('records every outcome in metrics and the run log', async () => {
      const metrics = new MetricsCollector();
      const logger = new RunLogger(runDir);
      history.set('#cached', '#cached-new');
      const engine = new LocatorResolutionEngine({
        history,
        strategies: [returning('exact_check', null), returning('id_variation', '#buy-now')],
        config: unverified,
        metrics,
        logger,
      });

      await engine.resolve('#cached', page);
      await engine.resolve('#buy', page);

      const snapshot = metrics.snapshot();
      expect(snapshot.resolutions).toBe(2);
      expect(snapshot.cacheHits).toBe(1);
      expect(snapshot.healed).toBe(1);
      expect(snapshot.strategyWins).toEqual({ id_variation: 1 });

      const lines = (await readFile(logger.getLogPath(), 'utf-8')).trim().split('\n');
      expect(lines.map((line) => JSON.parse(line).source)).toEqual(['cache', 'strategy']);
    });
  });
});
