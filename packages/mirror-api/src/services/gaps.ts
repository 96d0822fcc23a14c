/**
 * Gap Calculator
 * Subtracts stored coverage from a requested window, per symbol.
 */

import { normalize, subtract } from './intervals.js';
import { startOfLocalDay } from '../utils/time.js';
import type { Duration, Interval, MissingRange, Timestamp } from '../types/index.js';

/**
 * Returns true for a granule (starting at the given timestamp) that should never be fetched
 */
export type CalendarPredicate = (granuleStart: Timestamp) => boolean;

export interface CalendarFilter {
  granularity: Duration;
  /** Granules are aligned to midnight at this offset */
  utcOffsetMinutes: number;
  isExcluded: CalendarPredicate;
}

/**
 * Excludes Saturdays and Sundays in the market's local time
 */
export function weekendCalendar(utcOffsetMinutes: number): CalendarPredicate {
  return (granuleStart) => {
    const day = new Date(granuleStart + utcOffsetMinutes * 60_000).getUTCDay();
    return day === 0 || day === 6;
  };
}

/**
 * Drop excluded granules from a gap. Granules are aligned to market-local
 * midnight and judged by that aligned start; the first and last are clipped
 * to the gap. Consecutive kept granules stay in one range.
 */
export function trimExcluded(gap: Interval, calendar: CalendarFilter): Interval[] {
  const kept: Interval[] = [];
  let runStart: Timestamp | null = null;

  for (
    let cursor = startOfLocalDay(gap.start, calendar.utcOffsetMinutes);
    cursor < gap.end;
    cursor += calendar.granularity
  ) {
    const from = Math.max(cursor, gap.start);
    if (calendar.isExcluded(cursor)) {
      if (runStart !== null) {
        kept.push({ start: runStart, end: from });
        runStart = null;
      }
    } else if (runStart === null) {
      runStart = from;
    }
  }

  if (runStart !== null) {
    kept.push({ start: runStart, end: gap.end });
  }
  return kept;
}

/**
 * Missing (symbol, start, end) ranges of window not present in coverage.
 * Symbols absent from the coverage map are treated as having no coverage.
 */
export function computeMissing(
  window: Interval,
  symbols: readonly string[],
  coverage: ReadonlyMap<string, readonly Interval[]>,
  calendar?: CalendarFilter
): MissingRange[] {
  const missing: MissingRange[] = [];

  for (const symbol of symbols) {
    let gaps = subtract(window, coverage.get(symbol) ?? []);
    if (calendar) {
      gaps = gaps.flatMap((gap) => trimExcluded(gap, calendar));
    }
    for (const gap of gaps) {
      missing.push({ symbol, start: gap.start, end: gap.end });
    }
  }

  return missing;
}

/**
 * Join same-symbol ranges separated by at most minimumGap, trading a little
 * refetching of covered data for fewer requests
 */
export function coalesceMissing(missing: readonly MissingRange[], minimumGap: Duration): MissingRange[] {
  if (minimumGap <= 0) return [...missing];

  const bySymbol = new Map<string, Interval[]>();
  for (const range of missing) {
    const list = bySymbol.get(range.symbol) ?? [];
    list.push(range);
    bySymbol.set(range.symbol, list);
  }

  const result: MissingRange[] = [];
  for (const [symbol, ranges] of bySymbol) {
    for (const interval of normalize(ranges, minimumGap)) {
      result.push({ symbol, start: interval.start, end: interval.end });
    }
  }
  return result;
}
