import { describe, expect, it } from 'vitest';
import { parseDataRequest, serializeDataRequest } from '../src/services/requests.js';
import { ValidationError } from '../src/utils/errors.js';

const jan = (d: number) => Date.UTC(2024, 0, d) - 8 * 3_600_000;

describe('parseDataRequest', () => {
  it('reads a window over specific symbols in market-local time', () => {
    expect(
      parseDataRequest({
        dataset: 'tushare/stock/daily',
        time: { start: '2024-01-02', end: '2024-01-05' },
        symbols: ['000001.SZ'],
      })
    ).toEqual({
      dataset: 'tushare/stock/daily',
      time: { kind: 'window', start: jan(2), end: jan(5) },
      scope: { kind: 'symbols', symbols: ['000001.SZ'] },
    });
  });

  it('reads a timestamp over all symbols', () => {
    expect(
      parseDataRequest({
        dataset: 'tushare/index/daily',
        time: { at: '2024-01-03' },
        symbols: 'all',
        skipWeekends: true,
      })
    ).toEqual({
      dataset: 'tushare/index/daily',
      time: { kind: 'timestamp', at: jan(3) },
      scope: { kind: 'all' },
      skipWeekends: true,
    });
  });

  it('rejects a selector mixing window and timestamp', () => {
    expect(() =>
      parseDataRequest({
        dataset: 'tushare/stock/daily',
        time: { start: '2024-01-02', end: '2024-01-05', at: '2024-01-03' },
        symbols: 'all',
      })
    ).toThrow(ValidationError);
  });

  it('rejects an empty symbol list and missing fields', () => {
    expect(() =>
      parseDataRequest({ dataset: 'tushare/stock/daily', time: { at: '2024-01-03' }, symbols: [] })
    ).toThrow(/^Invalid data request: symbols/);
    expect(() => parseDataRequest({ dataset: 'tushare/stock/daily' })).toThrow(ValidationError);
    expect(() => parseDataRequest('tushare/stock/daily')).toThrow(ValidationError);
  });

  it('rejects unknown datasets and bad dates', () => {
    expect(() => parseDataRequest({ dataset: 'x/y/z', time: { at: 1 }, symbols: 'all' })).toThrow(
      'Unknown dataset: x/y/z'
    );
    expect(() =>
      parseDataRequest({ dataset: 'tushare/stock/daily', time: { at: 'someday' }, symbols: 'all' })
    ).toThrow(ValidationError);
  });
});

describe('serializeDataRequest', () => {
  it('produces input that parses back to the same request', () => {
    const request = parseDataRequest({
      dataset: 'alpaca/stock/daily',
      time: { start: '2024-01-02', end: '2024-01-05' },
      symbols: ['AAPL', 'MSFT'],
    });

    const serialized = serializeDataRequest(request);

    expect(serialized).toEqual({
      dataset: 'alpaca/stock/daily',
      time: { start: Date.UTC(2024, 0, 2, 5), end: Date.UTC(2024, 0, 5, 5) },
      symbols: ['AAPL', 'MSFT'],
    });
    expect(parseDataRequest(serialized)).toEqual(request);
  });
});
