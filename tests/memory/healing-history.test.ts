import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { HealingHistory } from '../../src/memory/healing-history.js';
import { HealingHistoryError } from '../../src/exception/errors.js';

describe('HealingHistory', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `healing-history-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
    filePath = join(dir, 'healing-history.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('in memory', () => {
    it('stores and returns healed locators', () => {
      const history = new HealingHistory();
      history.set('#old-btn', 'text=Old Button');

      expect(history.get('#old-btn')).toBe('text=Old Button');
      expect(history.has('#old-btn')).toBe(true);
      expect(history.get('#missing')).toBeUndefined();
      expect(history.size).toBe(1);
    });

    it('overwrites an earlier heal for the same locator', () => {
      const history = new HealingHistory();
      history.set('#old-btn', '#first');
      history.set('#old-btn', '#second');

      expect(history.list()).toEqual([['#old-btn', '#second']]);
    });

    it('refuses empty locators', () => {
      const history = new HealingHistory();
      expect(() => history.set('', '#x')).toThrow(HealingHistoryError);
      expect(() => history.set('#x', '')).toThrow(HealingHistoryError);
    });

    it('deletes and clears entries', () => {
      const history = new HealingHistory();
      history.set('#a', '#b');
      history.set('#c', '#d');

      expect(history.delete('#a')).toBe(true);
      expect(history.delete('#a')).toBe(false);
      history.clear();
      expect(history.size).toBe(0);
    });
  });

  describe('persistence', () => {
    it('starts empty when the file does not exist', async () => {
      const history = await HealingHistory.open(filePath);
      expect(history.size).toBe(0);
    });

    it('saves a flat JSON object and loads it back', async () => {
      const history = await HealingHistory.open(filePath);
      history.set('#submit-btn', 'text=Place Order');
      await history.save();

      const raw = JSON.parse(await readFile(filePath, 'utf-8'));
      expect(raw).toEqual({ '#submit-btn': 'text=Place Order' });

      const reloaded = await HealingHistory.open(filePath);
      expect(reloaded.get('#submit-btn')).toBe('text=Place Order');
    });

    it('creates missing directories on save', async () => {
      const nested = join(dir, 'cache', 'history.json');
      const history = new HealingHistory(nested);
      history.set('#a', '#b');
      await history.save();

      expect(JSON.parse(await readFile(nested, 'utf-8'))).toEqual({ '#a': '#b' });
    });

    it('rejects a file that is not JSON', async () => {
      await writeFile(filePath, '{ not json', 'utf-8');
      await expect(HealingHistory.open(filePath)).rejects.toBeInstanceOf(HealingHistoryError);
    });

    it('rejects a file with the wrong shape', async () => {
      await writeFile(filePath, JSON.stringify({ '#a': 42 }), 'utf-8');
      await expect(HealingHistory.open(filePath)).rejects.toThrow(/Malformed healing history/);
    });

    it('does nothing on save without a file path', async () => {
      const history = new HealingHistory();
      history.set('#a', '#b');
      await expect(history.save()).resolves.toBeUndefined();
    });
  });
});
