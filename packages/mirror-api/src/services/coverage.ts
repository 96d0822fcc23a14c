/**
 * Coverage Store Adapter
 * Reads and records which [start, end) ranges have been fetched per (dataset, symbol).
 *
 * Writes go through a per-(dataset, symbol) lock and one transaction, so the
 * read-merge-replace of stored intervals cannot interleave with another writer
 * in this process. Across processes the exclusion constraint is the backstop.
 */

import { merge } from './intervals.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { CoverageInvariantError, isExclusionViolation } from '../utils/errors.js';
import type { MirrorStore, StoreSession } from './store.js';
import type { Duration, Interval, RawDataRecord, Timestamp } from '../types/index.js';

const SYMBOLS_PER_QUERY = 100;

export interface CoverageServiceOptions {
  now?: () => Timestamp;
  lock?: KeyedLock;
}

export interface PersistResult {
  inserted: number;
  /** Window actually recorded, or null when capping left nothing */
  recorded: Interval | null;
}

export class CoverageService {
  private readonly now: () => Timestamp;
  private readonly lock: KeyedLock;

  constructor(private readonly store: MirrorStore, options: CoverageServiceOptions = {}) {
    this.now = options.now ?? Date.now;
    this.lock = options.lock ?? new KeyedLock();
  }

  /**
   * Stored intervals overlapping window, per symbol. Every requested symbol is
   * present in the result, with an empty list when nothing is stored.
   */
  async loadCoverage(
    datasetId: number,
    symbols: readonly string[],
    window: Interval
  ): Promise<Map<string, Interval[]>> {
    const unique = [...new Set(symbols)];
    const coverage = new Map<string, Interval[]>(unique.map((s) => [s, []]));

    for (let i = 0; i < unique.length; i += SYMBOLS_PER_QUERY) {
      const chunk = unique.slice(i, i + SYMBOLS_PER_QUERY);
      const rows = await this.store.selectCoverage(datasetId, chunk, window);
      for (const row of rows) {
        coverage.get(row.symbol)?.push({ start: row.start, end: row.end });
      }
    }

    for (const intervals of coverage.values()) {
      intervals.sort((a, b) => a.start - b.start);
    }
    return coverage;
  }

  /**
   * Mark window as fetched for every symbol, capped at now - delay
   */
  async recordCoverage(
    datasetId: number,
    symbols: readonly string[],
    window: Interval,
    delay: Duration
  ): Promise<Interval | null> {
    const result = await this.persist(datasetId, symbols, window, delay, []);
    return result.recorded;
  }

  /**
   * Insert raw rows and record coverage for one batch in a single transaction
   */
  async persist(
    datasetId: number,
    symbols: readonly string[],
    window: Interval,
    delay: Duration,
    records: readonly RawDataRecord[]
  ): Promise<PersistResult> {
    const capped = this.capWindow(window, delay);
    const keys = symbols.map((symbol) => `${datasetId}:${symbol}`);

    try {
      return await this.lock.withLock(keys, () =>
        this.store.transaction(async (session) => {
          const inserted = records.length > 0 ? await session.insertRawData(records) : 0;
          if (capped) {
            await this.applyCoverage(session, datasetId, symbols, capped);
          }
          return { inserted, recorded: capped };
        })
      );
    } catch (err) {
      if (isExclusionViolation(err)) {
        throw new CoverageInvariantError('Coverage intervals would overlap or touch', {
          datasetId,
          symbols: symbols.slice(0, 5),
          start: capped?.start,
          end: capped?.end,
        });
      }
      throw err;
    }
  }

  capWindow(window: Interval, delay: Duration): Interval | null {
    const end = Math.min(window.end, this.now() - delay);
    return end > window.start ? { start: window.start, end } : null;
  }

  /**
   * Replace every stored interval that overlaps or touches window with their union
   */
  private async applyCoverage(
    session: StoreSession,
    datasetId: number,
    symbols: readonly string[],
    window: Interval
  ): Promise<void> {
    const unique = [...new Set(symbols)];
    const unions = new Map<string, Interval>(unique.map((s) => [s, window]));
    const stale: number[] = [];

    for (let i = 0; i < unique.length; i += SYMBOLS_PER_QUERY) {
      const chunk = unique.slice(i, i + SYMBOLS_PER_QUERY);
      const rows = await session.selectCoverage(datasetId, chunk, window, { includeAdjacent: true });
      for (const row of rows) {
        const current = unions.get(row.symbol) ?? window;
        unions.set(row.symbol, merge(current, row));
        stale.push(row.id);
      }
    }

    await session.deleteCoverage(stale);
    for (const [symbol, interval] of unions) {
      await session.insertCoverage(datasetId, symbol, interval);
    }
  }
}
