/**
 * Read-back of mirrored data: stored bars and coverage reports.
 * Reads never call a provider, so they need no credentials.
 */

import { computeMissing } from './gaps.js';
import { CoverageService } from './coverage.js';
import { canonicalizerFor } from '../providers/index.js';
import type { ProviderDataset } from '../providers/index.js';
import type { MirrorStore } from './store.js';
import type { Interval, MissingRange, StoredBar } from '../types/index.js';

export interface CoverageReport {
  dataset: string;
  window: Interval;
  symbols: Array<{ symbol: string; covered: Interval[]; missing: Interval[] }>;
}

export class BarsService {
  private readonly coverage: CoverageService;

  constructor(private readonly store: MirrorStore) {
    this.coverage = new CoverageService(store);
  }

  async readBars(dataset: ProviderDataset, symbol: string, window: Interval, limit?: number): Promise<StoredBar[]> {
    const stored = await this.store.findDataset(dataset.descriptor);
    if (!stored) return [];
    const canonical = canonicalizerFor(dataset)(symbol);
    return this.store.selectBars(stored.id, canonical, window, limit);
  }

  async coverageReport(dataset: ProviderDataset, symbols: readonly string[], window: Interval): Promise<CoverageReport> {
    const canonicalize = canonicalizerFor(dataset);
    const canonical = [...new Set(symbols.map((s) => canonicalize(s)))];

    const stored = await this.store.findDataset(dataset.descriptor);
    const coverage = stored
      ? await this.coverage.loadCoverage(stored.id, canonical, window)
      : new Map<string, Interval[]>();
    const missing = computeMissing(window, canonical, coverage);

    const missingBySymbol = new Map<string, MissingRange[]>();
    for (const range of missing) {
      const list = missingBySymbol.get(range.symbol) ?? [];
      list.push(range);
      missingBySymbol.set(range.symbol, list);
    }

    return {
      dataset: dataset.key,
      window,
      symbols: canonical.map((symbol) => ({
        symbol,
        covered: coverage.get(symbol) ?? [],
        missing: (missingBySymbol.get(symbol) ?? []).map(({ start, end }) => ({ start, end })),
      })),
    };
  }
}
