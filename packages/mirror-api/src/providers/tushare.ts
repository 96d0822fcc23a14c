/**
 * Tushare Pro client
 * China A-share, index and fund data over Tushare's single JSON-RPC style endpoint:
 *   POST { api_name, token, params, fields } -> { code, msg, data: { fields, items, has_more } }
 *
 * Symbols are stored as Tushare ts_codes (000001.SZ, 600000.SH).
 * trade_date is a market-local (+08:00) calendar day.
 */

import { z } from 'zod';
import { requestJson } from './http.js';
import { formatYmd, parseYmd } from '../utils/time.js';
import { PermanentFetchError, TransientFetchError, ValidationError } from '../utils/errors.js';
import { ONE_DAY } from '../types/index.js';
import type { ProviderClient, ProviderDataset } from './types.js';
import type { Instrument, Interval, OhlcvRow, ProviderCapabilityProfile } from '../types/index.js';

export const TUSHARE_UTC_OFFSET_MINUTES = 8 * 60;

// 1989-01-01 00:00 +08:00
const TUSHARE_EARLIEST = Date.UTC(1989, 0, 1) - TUSHARE_UTC_OFFSET_MINUTES * 60_000;

// Tushare's "too many requests" response code
const RATE_LIMIT_CODE = 40203;

// Above this many symbols, query the whole market for the window and filter locally
const TS_CODE_LIST_LIMIT = 100;

const MARKET_TO_SUFFIX: Record<string, string> = {
  'CN.SSE': 'SH',
  'CN.SZSE': 'SZ',
  'CN.BJE': 'BJ',
};

const SUFFIX_TO_MARKET: Record<string, string> = Object.fromEntries(
  Object.entries(MARKET_TO_SUFFIX).map(([market, suffix]) => [suffix, market])
);

export function toTsCode(market: string, symbol: string): string {
  const suffix = MARKET_TO_SUFFIX[market];
  if (!suffix) {
    throw new ValidationError(`Unsupported market for Tushare: ${market}`);
  }
  return `${symbol}.${suffix}`;
}

export function parseTsCode(tsCode: string): { market: string; symbol: string } {
  const parts = tsCode.split('.');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ValidationError(`Invalid ts_code format: ${tsCode}`);
  }
  const market = SUFFIX_TO_MARKET[parts[1]];
  if (!market) {
    throw new ValidationError(`Unsupported exchange code: ${parts[1]}`);
  }
  return { market, symbol: parts[0] };
}

/**
 * Stored symbol form: an upper-case ts_code. Also accepts "CN.SZSE:000001".
 */
export function canonicalTushareSymbol(symbol: string): string {
  const trimmed = symbol.trim().toUpperCase();
  const colon = trimmed.lastIndexOf(':');
  if (colon > 0) {
    return toTsCode(trimmed.slice(0, colon), trimmed.slice(colon + 1));
  }
  if (!/^[0-9A-Z]+\.[A-Z]+$/.test(trimmed)) {
    throw new ValidationError(`Invalid Tushare symbol: ${symbol} (expected a ts_code such as 000001.SZ)`);
  }
  return trimmed;
}

// ============================================
// Datasets
// ============================================

interface TushareDataset extends ProviderDataset {
  apiName: string;
  fields: string[];
}

function tushareProfile(overrides: Partial<ProviderCapabilityProfile>): ProviderCapabilityProfile {
  return {
    preferredBatchAxis: 'hybrid',
    maxRowsPerRequest: 6000,
    timeGranularity: ONE_DAY,
    requestsPerSecond: 10,
    earliestDate: TUSHARE_EARLIEST,
    coverageDelay: ONE_DAY,
    utcOffsetMinutes: TUSHARE_UTC_OFFSET_MINUTES,
    ...overrides,
  };
}

function dataset(
  assetClass: string,
  name: string,
  apiName: string,
  description: string,
  profile: Partial<ProviderCapabilityProfile> = {}
): TushareDataset {
  return {
    key: `tushare/${assetClass}/${name}`,
    descriptor: { provider: 'tushare', market: 'CN', assetClass, name },
    description,
    profile: tushareProfile(profile),
    apiName,
    fields: ['ts_code', 'trade_date', 'open', 'high', 'low', 'close', 'vol', 'amount'],
  };
}

export const TUSHARE_DATASETS: readonly TushareDataset[] = [
  dataset('stock', 'daily', 'daily', 'A-share daily bars (unadjusted)'),
  dataset('stock', 'weekly', 'weekly', 'A-share weekly bars', {
    timeGranularity: 7 * ONE_DAY,
    coverageDelay: 7 * ONE_DAY,
    maxRowsPerRequest: 4500,
  }),
  // index_daily requires a single ts_code per call
  dataset('index', 'daily', 'index_daily', 'Index daily bars', {
    preferredBatchAxis: 'time',
    maxRowsPerRequest: 8000,
  }),
  dataset('fund', 'daily', 'fund_daily', 'Exchange-traded fund daily bars', {
    maxRowsPerRequest: 2000,
  }),
];

const INSTRUMENT_APIS: Record<string, { apiName: string; params: Record<string, string>; fields: string[] }> = {
  stock: { apiName: 'stock_basic', params: { list_status: 'L' }, fields: ['ts_code', 'name', 'exchange', 'list_date'] },
  index: { apiName: 'index_basic', params: {}, fields: ['ts_code', 'name', 'market', 'list_date'] },
  fund: { apiName: 'fund_basic', params: { market: 'E' }, fields: ['ts_code', 'name', 'market', 'list_date'] },
};

// ============================================
// Wire format
// ============================================

const TushareResponseSchema = z.object({
  code: z.number(),
  msg: z.string().nullable().optional(),
  data: z
    .object({
      fields: z.array(z.string()),
      items: z.array(z.array(z.unknown())),
      has_more: z.boolean().optional(),
    })
    .nullable()
    .optional(),
});

type TushareRow = Record<string, unknown>;

function toRows(fields: readonly string[], items: readonly unknown[][]): TushareRow[] {
  return items.map((item) => {
    const row: TushareRow = {};
    fields.forEach((field, i) => {
      row[field] = item[i];
    });
    return row;
  });
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return NaN;
}

function toText(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

export interface TushareClientOptions {
  token: string;
  baseUrl: string;
  timeoutMs: number;
}

export class TushareClient implements ProviderClient {
  readonly name = 'tushare';
  readonly dataset: TushareDataset;

  constructor(dataset: TushareDataset, private readonly options: TushareClientOptions) {
    this.dataset = dataset;
  }

  get profile(): ProviderCapabilityProfile {
    return this.dataset.profile;
  }

  canonicalSymbol(symbol: string): string {
    return canonicalTushareSymbol(symbol);
  }

  async fetchBySymbol(symbol: string, window: Interval): Promise<OhlcvRow[]> {
    return this.fetchBars({ ts_code: symbol, ...this.dateParams(window) });
  }

  async fetchByTime(symbols: readonly string[], window: Interval): Promise<OhlcvRow[]> {
    if (symbols.length > TS_CODE_LIST_LIMIT) {
      return this.fetchBars(this.dateParams(window));
    }
    return this.fetchBars({ ts_code: symbols.join(','), ...this.dateParams(window) });
  }

  async listInstruments(): Promise<Instrument[]> {
    const assetClass = this.dataset.descriptor.assetClass;
    const api = INSTRUMENT_APIS[assetClass];
    if (!api) {
      throw new PermanentFetchError(`Tushare has no instrument list for asset class ${assetClass}`);
    }

    const rows = await this.queryAll(api.apiName, api.params, api.fields);
    const instruments: Instrument[] = [];
    for (const row of rows) {
      const tsCode = toText(row.ts_code);
      if (!tsCode) continue;
      instruments.push({
        provider: this.name,
        assetClass,
        symbol: tsCode.toUpperCase(),
        name: toText(row.name),
        exchange: toText(row.exchange) ?? toText(row.market),
        listedAt: toText(row.list_date),
      });
    }

    console.log(`[Tushare] Listed ${instruments.length} ${assetClass} instruments`);
    return instruments;
  }

  /**
   * Tushare dates are inclusive calendar days, so the last day is the one containing end - 1ms
   */
  private dateParams(window: Interval): Record<string, string> {
    const offset = this.profile.utcOffsetMinutes;
    return {
      start_date: formatYmd(window.start, offset),
      end_date: formatYmd(window.end - 1, offset),
    };
  }

  private async fetchBars(params: Record<string, string>): Promise<OhlcvRow[]> {
    const rows = await this.queryAll(this.dataset.apiName, params, this.dataset.fields);
    const offset = this.profile.utcOffsetMinutes;

    return rows.map((row) => {
      const tsCode = toText(row.ts_code);
      const tradeDate = toText(row.trade_date);
      let timestamp = NaN;
      if (tradeDate) {
        try {
          timestamp = parseYmd(tradeDate, offset);
        } catch (err) {
          console.warn(`[Tushare] Unparseable trade_date ${tradeDate}:`, err instanceof Error ? err.message : err);
        }
      }

      return {
        symbol: tsCode ? tsCode.toUpperCase() : '',
        timestamp,
        open: toNumber(row.open),
        high: toNumber(row.high),
        low: toNumber(row.low),
        close: toNumber(row.close),
        volume: toNumber(row.vol),
        raw: row,
      };
    });
  }

  /**
   * Run one API call, following has_more with limit/offset paging
   */
  private async queryAll(
    apiName: string,
    params: Record<string, string>,
    fields: readonly string[]
  ): Promise<TushareRow[]> {
    const limit = this.profile.maxRowsPerRequest;
    const rows: TushareRow[] = [];
    let offset = 0;

    for (;;) {
      const page = await this.call(apiName, { ...params, limit: String(limit), offset: String(offset) }, fields);
      rows.push(...toRows(page.fields, page.items));
      if (!page.hasMore || page.items.length === 0) break;
      offset += page.items.length;
    }

    return rows;
  }

  private async call(
    apiName: string,
    params: Record<string, string>,
    fields: readonly string[]
  ): Promise<{ fields: string[]; items: unknown[][]; hasMore: boolean }> {
    const body = await requestJson(
      'Tushare',
      this.options.baseUrl,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ api_name: apiName, token: this.options.token, params, fields: fields.join(',') }),
      },
      this.options.timeoutMs
    );

    const parsed = TushareResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PermanentFetchError(`Tushare returned an unexpected response for ${apiName}`, {
        issues: parsed.error.issues.slice(0, 3).map((i) => i.message),
      });
    }

    const { code, msg, data } = parsed.data;
    if (code === RATE_LIMIT_CODE) {
      throw new TransientFetchError(`Tushare rate limit: ${msg ?? ''}`, { apiName, code });
    }
    if (code !== 0) {
      throw new PermanentFetchError(`Tushare error ${code}: ${msg ?? ''}`, { apiName, code });
    }

    return {
      fields: data?.fields ?? [],
      items: data?.items ?? [],
      hasMore: data?.has_more ?? false,
    };
  }
}
