import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CoverageService } from '../src/services/coverage.js';
import { CoverageInvariantError } from '../src/utils/errors.js';
import { ONE_DAY } from '../src/types/index.js';
import { ExclusionViolation, MemoryStore } from './helpers/memory-store.js';
import type { RawDataRecord } from '../src/types/index.js';

const jan = (d: number) => Date.UTC(2024, 0, d);
const dec = (d: number) => Date.UTC(2023, 11, d);
const FAR_FUTURE = Date.UTC(2030, 0, 1);

function bar(symbol: string, start: number): RawDataRecord {
  return {
    datasetId: 1,
    symbol,
    start,
    end: start + ONE_DAY,
    payload: { open: 1, high: 2, low: 0.5, close: 1.5, volume: 100, raw: {} },
  };
}

describe('CoverageService', () => {
  let store: MemoryStore;
  let coverage: CoverageService;

  beforeEach(() => {
    store = new MemoryStore();
    coverage = new CoverageService(store, { now: () => FAR_FUTURE });
  });

  describe('recordCoverage', () => {
    it('merges a window with adjacent stored coverage', async () => {
      store.seedCoverage(1, 'A', { start: dec(28), end: jan(1) });

      await coverage.recordCoverage(1, ['A'], { start: jan(1), end: jan(5) }, 0);

      expect(store.coverageOf(1, 'A')).toEqual([{ start: dec(28), end: jan(5) }]);
      expect(store.coverageRows).toHaveLength(1);
    });

    it('inserts the window as-is when nothing overlaps or touches', async () => {
      store.seedCoverage(1, 'A', { start: dec(1), end: dec(5) });

      const recorded = await coverage.recordCoverage(1, ['A'], { start: jan(1), end: jan(5) }, 0);

      expect(recorded).toEqual({ start: jan(1), end: jan(5) });
      expect(store.coverageOf(1, 'A')).toEqual([
        { start: dec(1), end: dec(5) },
        { start: jan(1), end: jan(5) },
      ]);
    });

    it('bridges two stored intervals into one', async () => {
      store.seedCoverage(1, 'A', { start: jan(1), end: jan(3) });
      store.seedCoverage(1, 'A', { start: jan(6), end: jan(8) });

      await coverage.recordCoverage(1, ['A'], { start: jan(3), end: jan(6) }, 0);

      expect(store.coverageOf(1, 'A')).toEqual([{ start: jan(1), end: jan(8) }]);
    });

    it('leaves a covering interval unchanged', async () => {
      store.seedCoverage(1, 'A', { start: jan(1), end: jan(5) });

      await coverage.recordCoverage(1, ['A'], { start: jan(3), end: jan(4) }, 0);

      expect(store.coverageOf(1, 'A')).toEqual([{ start: jan(1), end: jan(5) }]);
    });

    it('records every symbol of the batch', async () => {
      await coverage.recordCoverage(1, ['A', 'B'], { start: jan(1), end: jan(2) }, 0);

      expect(store.coverageOf(1, 'A')).toEqual([{ start: jan(1), end: jan(2) }]);
      expect(store.coverageOf(1, 'B')).toEqual([{ start: jan(1), end: jan(2) }]);
    });

    it('caps the recorded end at now - delay', async () => {
      const now = jan(4) + 12 * 3_600_000;
      const capped = new CoverageService(store, { now: () => now });

      const recorded = await capped.recordCoverage(1, ['A'], { start: jan(1), end: jan(5) }, ONE_DAY);

      expect(recorded).toEqual({ start: jan(1), end: jan(3) + 12 * 3_600_000 });
      expect(store.coverageOf(1, 'A')).toEqual([recorded]);
    });

    it('records nothing when the cap falls before the window', async () => {
      const capped = new CoverageService(store, { now: () => jan(1) });

      const recorded = await capped.recordCoverage(1, ['A'], { start: jan(1), end: jan(5) }, ONE_DAY);

      expect(recorded).toBeNull();
      expect(store.coverageRows).toEqual([]);
    });

    it('merges concurrent adjacent writes on the same symbol', async () => {
      await Promise.all([
        coverage.recordCoverage(1, ['A'], { start: jan(1), end: jan(5) }, 0),
        coverage.recordCoverage(1, ['A'], { start: jan(5), end: jan(10) }, 0),
      ]);

      expect(store.coverageOf(1, 'A')).toEqual([{ start: jan(1), end: jan(10) }]);
    });
  });

  describe('persist', () => {
    it('inserts raw rows once and counts only new ones', async () => {
      const window = { start: jan(1), end: jan(3) };
      const records = [bar('A', jan(1)), bar('A', jan(2))];

      const first = await coverage.persist(1, ['A'], window, 0, records);
      const second = await coverage.persist(1, ['A'], window, 0, records);

      expect(first).toEqual({ inserted: 2, recorded: window });
      expect(second.inserted).toBe(0);
      expect(store.rawRows).toHaveLength(2);
      expect(store.coverageOf(1, 'A')).toEqual([window]);
    });

    it('turns an exclusion violation into CoverageInvariantError and rolls back', async () => {
      store.failNextTransaction = new ExclusionViolation('conflicting key value');

      await expect(
        coverage.persist(1, ['A'], { start: jan(1), end: jan(2) }, 0, [bar('A', jan(1))])
      ).rejects.toBeInstanceOf(CoverageInvariantError);

      expect(store.rawRows).toEqual([]);
      expect(store.coverageRows).toEqual([]);
    });

    it('rethrows other storage errors unchanged', async () => {
      const failure = new Error('connection terminated');
      store.failNextTransaction = failure;

      await expect(
        coverage.persist(1, ['A'], { start: jan(1), end: jan(2) }, 0, [bar('A', jan(1))])
      ).rejects.toBe(failure);
      expect(store.rawRows).toEqual([]);
    });
  });

  describe('loadCoverage', () => {
    it('returns overlapping intervals only, and every requested symbol', async () => {
      store.seedCoverage(1, 'A', { start: dec(28), end: jan(1) });
      store.seedCoverage(1, 'A', { start: jan(3), end: jan(4) });
      store.seedCoverage(1, 'A', { start: jan(1), end: jan(2) });

      const result = await coverage.loadCoverage(1, ['A', 'B'], { start: jan(1), end: jan(5) });

      expect(result.get('A')).toEqual([
        { start: jan(1), end: jan(2) },
        { start: jan(3), end: jan(4) },
      ]);
      expect(result.get('B')).toEqual([]);
    });

    it('queries at most 100 symbols at a time', async () => {
      const spy = vi.spyOn(store, 'selectCoverage');
      const symbols = Array.from({ length: 250 }, (_, i) => `S${i}`);

      const result = await coverage.loadCoverage(1, symbols, { start: jan(1), end: jan(2) });

      expect(spy).toHaveBeenCalledTimes(3);
      expect(spy.mock.calls.map(([, chunk]) => chunk.length)).toEqual([100, 100, 50]);
      expect(result.size).toBe(250);
    });
  });
});
