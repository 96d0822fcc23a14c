/**
 * Query Merger
 * Groups per-symbol missing ranges into as few provider requests as the
 * provider's limits allow.
 *
 * The size of a batch is the number of rows it is expected to return:
 *   #symbols × ceil((end - start) / timeGranularity)
 * and must never exceed profile.maxRowsPerRequest.
 *
 * - mergeBySymbol: split the span into granularity-sized chunks and put every
 *   symbol missing in a chunk into that chunk's batches. Batches never span chunks.
 * - mergeByTime: one symbol per batch, extending forward in time.
 * - hybrid: run both, keep the shorter list (ties go to mergeBySymbol).
 */

import { ConfigurationError } from '../utils/errors.js';
import { BATCH_AXES } from '../types/index.js';
import type {
  BatchAxis,
  BatchedQuery,
  Duration,
  MissingRange,
  ProviderCapabilityProfile,
  Timestamp,
} from '../types/index.js';

export type MergeStrategy = (
  profile: ProviderCapabilityProfile,
  missing: readonly MissingRange[]
) => BatchedQuery[];

export function granulesIn(start: Timestamp, end: Timestamp, granularity: Duration): number {
  return Math.ceil((end - start) / granularity);
}

export function estimatedSize(batch: BatchedQuery, granularity: Duration): number {
  return batch.symbols.length * granulesIn(batch.start, batch.end, granularity);
}

/**
 * Reject profiles the merger cannot honour. Called once when a provider is built.
 */
export function validateProfile(profile: ProviderCapabilityProfile): void {
  if (!BATCH_AXES.includes(profile.preferredBatchAxis)) {
    throw new ConfigurationError(`Unsupported batching axis: ${String(profile.preferredBatchAxis)}`);
  }
  if (!Number.isInteger(profile.maxRowsPerRequest) || profile.maxRowsPerRequest < 1) {
    throw new ConfigurationError(`maxRowsPerRequest must be a positive integer, got ${profile.maxRowsPerRequest}`);
  }
  if (!(profile.timeGranularity > 0)) {
    throw new ConfigurationError(`timeGranularity must be positive, got ${profile.timeGranularity}`);
  }
  if (!(profile.requestsPerSecond > 0)) {
    throw new ConfigurationError(`requestsPerSecond must be positive, got ${profile.requestsPerSecond}`);
  }
}

export const mergeBySymbol: MergeStrategy = (profile, missing) => {
  if (missing.length === 0) return [];

  const granularity = profile.timeGranularity;
  const spanStart = missing.reduce((min, m) => Math.min(min, m.start), Infinity);
  const spanEnd = missing.reduce((max, m) => Math.max(max, m.end), -Infinity);

  // chunk index -> symbols missing somewhere inside that chunk
  const chunks = new Map<number, Set<string>>();
  for (const range of missing) {
    const first = Math.floor((range.start - spanStart) / granularity);
    const last = Math.ceil((range.end - spanStart) / granularity) - 1;
    for (let index = first; index <= last; index++) {
      let symbols = chunks.get(index);
      if (!symbols) {
        symbols = new Set();
        chunks.set(index, symbols);
      }
      symbols.add(range.symbol);
    }
  }

  const batches: BatchedQuery[] = [];
  const indexes = [...chunks.keys()].sort((a, b) => a - b);

  for (const index of indexes) {
    const start = spanStart + index * granularity;
    const end = Math.min(start + granularity, spanEnd);
    const perSymbol = granulesIn(start, end, granularity);
    const symbols = [...(chunks.get(index) ?? [])].sort();

    let current: BatchedQuery | null = null;
    for (const symbol of symbols) {
      if (current && (current.symbols.length + 1) * perSymbol <= profile.maxRowsPerRequest) {
        current.symbols.push(symbol);
      } else {
        current = { symbols: [symbol], start, end };
        batches.push(current);
      }
    }
  }

  return batches;
};

/**
 * Cut ranges longer than the per-request limit into limit-sized pieces
 */
function splitOversized(range: MissingRange, maxSpan: Duration): MissingRange[] {
  const pieces: MissingRange[] = [];
  for (let start = range.start; start < range.end; start += maxSpan) {
    pieces.push({ symbol: range.symbol, start, end: Math.min(start + maxSpan, range.end) });
  }
  return pieces;
}

export const mergeByTime: MergeStrategy = (profile, missing) => {
  const granularity = profile.timeGranularity;
  const maxSpan = profile.maxRowsPerRequest * granularity;

  const sorted = missing
    .flatMap((range) => splitOversized(range, maxSpan))
    .sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : a.start - b.start));

  const batches: BatchedQuery[] = [];
  let current: BatchedQuery | null = null;

  for (const range of sorted) {
    if (current && current.symbols[0] === range.symbol) {
      const end = Math.max(current.end, range.end);
      if (granulesIn(current.start, end, granularity) <= profile.maxRowsPerRequest) {
        current.end = end;
        continue;
      }
    }
    current = { symbols: [range.symbol], start: range.start, end: range.end };
    batches.push(current);
  }

  return batches;
};

export const mergeHybrid: MergeStrategy = (profile, missing) => {
  const bySymbol = mergeBySymbol(profile, missing);
  const byTime = mergeByTime(profile, missing);
  return bySymbol.length <= byTime.length ? bySymbol : byTime;
};

const STRATEGIES: Record<BatchAxis, MergeStrategy> = {
  symbol: mergeBySymbol,
  time: mergeByTime,
  hybrid: mergeHybrid,
};

export function selectMergeStrategy(axis: BatchAxis): MergeStrategy {
  const strategy = STRATEGIES[axis];
  if (!strategy) {
    throw new ConfigurationError(`Unsupported batching axis: ${String(axis)}`);
  }
  return strategy;
}

/**
 * Batches for the given missing ranges using the provider's preferred axis
 */
export function mergeMissingRanges(
  profile: ProviderCapabilityProfile,
  missing: readonly MissingRange[]
): BatchedQuery[] {
  return selectMergeStrategy(profile.preferredBatchAxis)(profile, missing);
}
