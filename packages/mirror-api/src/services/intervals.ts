/**
 * Interval Algebra
 * Half-open [start, end) ranges over epoch milliseconds.
 *
 * Half-open ranges tile without ambiguity: [a, b) and [b, c) touch but never overlap.
 */

import { ValidationError } from '../utils/errors.js';
import type { Duration, Interval, Timestamp } from '../types/index.js';

export class IntervalError extends ValidationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'IntervalError';
  }
}

/**
 * Build an interval, rejecting empty, inverted and non-finite bounds
 */
export function createInterval(start: Timestamp, end: Timestamp): Interval {
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new IntervalError(`Interval bounds must be finite: [${start}, ${end})`);
  }
  if (start >= end) {
    throw new IntervalError(
      `Interval start must precede end: [${formatTimestamp(start)}, ${formatTimestamp(end)})`
    );
  }
  return { start, end };
}

export function overlaps(a: Interval, b: Interval): boolean {
  return a.start < b.end && b.start < a.end;
}

export function adjacent(a: Interval, b: Interval): boolean {
  return a.end === b.start || b.end === a.start;
}

/**
 * True when a and b overlap or are separated by at most minimumGap
 */
export function withinGap(a: Interval, b: Interval, minimumGap: Duration = 0): boolean {
  const gap = Math.max(a.start, b.start) - Math.min(a.end, b.end);
  return gap <= minimumGap;
}

/**
 * Union of two intervals that overlap, touch, or sit within minimumGap of each other
 */
export function merge(a: Interval, b: Interval, minimumGap: Duration = 0): Interval {
  if (!withinGap(a, b, minimumGap)) {
    throw new IntervalError(
      `Cannot merge disjoint intervals ${formatInterval(a)} and ${formatInterval(b)}`
    );
  }
  return { start: Math.min(a.start, b.start), end: Math.max(a.end, b.end) };
}

export function contains(interval: Interval, t: Timestamp): boolean {
  return interval.start <= t && t < interval.end;
}

export function covers(outer: Interval, inner: Interval): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

/**
 * Intersection of interval and window, or null when they do not overlap
 */
export function clip(interval: Interval, window: Interval): Interval | null {
  const start = Math.max(interval.start, window.start);
  const end = Math.min(interval.end, window.end);
  return start < end ? { start, end } : null;
}

/**
 * Sort by start and coalesce overlapping, adjacent, or near (≤ minimumGap) intervals
 */
export function normalize(intervals: readonly Interval[], minimumGap: Duration = 0): Interval[] {
  const sorted = [...intervals].sort((a, b) => a.start - b.start || a.end - b.end);
  const result: Interval[] = [];

  for (const interval of sorted) {
    const last = result[result.length - 1];
    if (last && withinGap(last, interval, minimumGap)) {
      result[result.length - 1] = merge(last, interval, minimumGap);
    } else {
      result.push({ start: interval.start, end: interval.end });
    }
  }

  return result;
}

/**
 * Sub-intervals of window not covered by any interval in covered.
 *
 * covered must be sorted by start and pairwise disjoint; members partly or fully
 * outside the window are fine.
 */
export function subtract(window: Interval, covered: readonly Interval[]): Interval[] {
  const gaps: Interval[] = [];
  let cursor = window.start;

  for (const interval of covered) {
    if (interval.end <= cursor) continue;
    if (interval.start >= window.end) break;

    if (interval.start > cursor) {
      gaps.push({ start: cursor, end: interval.start });
    }
    cursor = Math.max(cursor, interval.end);
    if (cursor >= window.end) break;
  }

  if (cursor < window.end) {
    gaps.push({ start: cursor, end: window.end });
  }

  return gaps;
}

export function formatTimestamp(t: Timestamp): string {
  return Number.isFinite(t) ? new Date(t).toISOString() : String(t);
}

export function formatInterval(interval: Interval): string {
  return `[${formatTimestamp(interval.start)}, ${formatTimestamp(interval.end)})`;
}
