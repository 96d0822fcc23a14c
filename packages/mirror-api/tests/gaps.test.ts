import { describe, expect, it } from 'vitest';
import { coalesceMissing, computeMissing, trimExcluded, weekendCalendar } from '../src/services/gaps.js';
import { ONE_DAY } from '../src/types/index.js';

const day = (month: number, date: number) => Date.UTC(2024, month - 1, date);

describe('computeMissing', () => {
  it('returns only the uncovered tail of a partly covered window', () => {
    const coverage = new Map([['A', [{ start: day(1, 1), end: day(1, 10) }]]]);
    const missing = computeMissing({ start: day(1, 5), end: day(1, 15) }, ['A'], coverage);
    expect(missing).toEqual([{ symbol: 'A', start: day(1, 10), end: day(1, 15) }]);
  });

  it('treats each symbol independently', () => {
    const coverage = new Map([
      ['A', [{ start: day(1, 1), end: day(1, 5) }]],
      ['B', []],
    ]);
    const missing = computeMissing({ start: day(1, 1), end: day(1, 5) }, ['A', 'B'], coverage);
    expect(missing).toEqual([{ symbol: 'B', start: day(1, 1), end: day(1, 5) }]);
  });

  it('treats a symbol absent from the map as uncovered', () => {
    const missing = computeMissing({ start: day(1, 1), end: day(1, 2) }, ['C'], new Map());
    expect(missing).toEqual([{ symbol: 'C', start: day(1, 1), end: day(1, 2) }]);
  });

  it('drops weekend granules when a calendar is given', () => {
    // 2024-01-05 is a Friday; the 6th and 7th are the weekend
    const calendar = { granularity: ONE_DAY, utcOffsetMinutes: 0, isExcluded: weekendCalendar(0) };
    const missing = computeMissing({ start: day(1, 5), end: day(1, 9) }, ['A'], new Map(), calendar);
    expect(missing).toEqual([
      { symbol: 'A', start: day(1, 5), end: day(1, 6) },
      { symbol: 'A', start: day(1, 8), end: day(1, 9) },
    ]);
  });
});

describe('weekendCalendar', () => {
  it('uses market-local days', () => {
    // Friday 2024-01-05 20:00 UTC is Saturday 04:00 at +08:00
    const fridayEvening = Date.UTC(2024, 0, 5, 20);
    expect(weekendCalendar(0)(fridayEvening)).toBe(false);
    expect(weekendCalendar(480)(fridayEvening)).toBe(true);
  });
});

describe('trimExcluded', () => {
  it('returns nothing for a gap made only of excluded granules', () => {
    const calendar = { granularity: ONE_DAY, utcOffsetMinutes: 0, isExcluded: weekendCalendar(0) };
    expect(trimExcluded({ start: day(1, 6), end: day(1, 8) }, calendar)).toEqual([]);
  });

  it('aligns granules to local midnight when the gap starts mid-day', () => {
    // Thursday 18:00 up to Wednesday; Monday the 8th must stay
    const calendar = { granularity: ONE_DAY, utcOffsetMinutes: 0, isExcluded: weekendCalendar(0) };
    const gap = { start: day(1, 4) + 18 * 3_600_000, end: day(1, 10) };
    expect(trimExcluded(gap, calendar)).toEqual([
      { start: day(1, 4) + 18 * 3_600_000, end: day(1, 6) },
      { start: day(1, 8), end: day(1, 10) },
    ]);
  });

  it('aligns to midnight at the market offset', () => {
    // +08:00: Friday local midnight is Thursday 16:00 UTC
    const calendar = { granularity: ONE_DAY, utcOffsetMinutes: 480, isExcluded: weekendCalendar(480) };
    const gap = { start: Date.UTC(2024, 0, 5, 2), end: Date.UTC(2024, 0, 8, 16) };
    expect(trimExcluded(gap, calendar)).toEqual([
      { start: Date.UTC(2024, 0, 5, 2), end: Date.UTC(2024, 0, 5, 16) },
      { start: Date.UTC(2024, 0, 7, 16), end: Date.UTC(2024, 0, 8, 16) },
    ]);
  });

  it('keeps a partial final granule', () => {
    const calendar = { granularity: ONE_DAY, utcOffsetMinutes: 0, isExcluded: () => false };
    const gap = { start: day(1, 1), end: day(1, 2) + 3_600_000 };
    expect(trimExcluded(gap, calendar)).toEqual([gap]);
  });
});

describe('coalesceMissing', () => {
  const missing = [
    { symbol: 'A', start: day(1, 1), end: day(1, 3) },
    { symbol: 'A', start: day(1, 4), end: day(1, 5) },
    { symbol: 'B', start: day(1, 1), end: day(1, 2) },
    { symbol: 'A', start: day(1, 10), end: day(1, 11) },
  ];

  it('is a copy when minimumGap is zero', () => {
    expect(coalesceMissing(missing, 0)).toEqual(missing);
  });

  it('joins same-symbol ranges within the gap', () => {
    expect(coalesceMissing(missing, ONE_DAY)).toEqual([
      { symbol: 'A', start: day(1, 1), end: day(1, 5) },
      { symbol: 'A', start: day(1, 10), end: day(1, 11) },
      { symbol: 'B', start: day(1, 1), end: day(1, 2) },
    ]);
  });
});
