/**
 * Alpaca Market Data client
 * US equities daily bars (Market Data API v2) and the tradable asset list (Trading API).
 * Documentation: https://docs.alpaca.markets/reference/stockbars
 */

import { requestJson } from './http.js';
import { PermanentFetchError, ValidationError } from '../utils/errors.js';
import { startOfLocalDay } from '../utils/time.js';
import { ONE_DAY, ONE_HOUR } from '../types/index.js';
import type { ProviderClient, ProviderDataset } from './types.js';
import type { Instrument, Interval, OhlcvRow, ProviderCapabilityProfile } from '../types/index.js';

/**
 * Alpaca bar format
 */
interface AlpacaBar {
  t: string;  // Timestamp (RFC-3339)
  o: number;  // Open
  h: number;  // High
  l: number;  // Low
  c: number;  // Close
  v: number;  // Volume
  n?: number; // Number of trades
  vw?: number; // Volume weighted average price
}

interface AlpacaAsset {
  symbol: string;
  name?: string;
  exchange?: string;
  tradable?: boolean;
}

// US Eastern standard time; bars are stamped at local midnight
const ALPACA_UTC_OFFSET_MINUTES = -5 * 60;

export const ALPACA_DATASETS: readonly ProviderDataset[] = [
  {
    key: 'alpaca/stock/daily',
    descriptor: { provider: 'alpaca', market: 'US', assetClass: 'stock', name: 'daily' },
    description: 'US equity daily bars (split and dividend adjusted)',
    profile: {
      preferredBatchAxis: 'hybrid',
      maxRowsPerRequest: 10000,
      timeGranularity: ONE_DAY,
      requestsPerSecond: 3, // 200 req/min
      earliestDate: Date.UTC(2016, 0, 1),
      coverageDelay: ONE_DAY,
      utcOffsetMinutes: ALPACA_UTC_OFFSET_MINUTES,
    },
  },
];

/**
 * Daily bars are stamped at New York midnight, which is 04:00Z under daylight
 * saving time. Snap them to the fixed -05:00 day the dataset's windows use.
 */
export function alpacaBarDay(t: string): number {
  const parsed = Date.parse(t);
  return Number.isFinite(parsed) ? startOfLocalDay(parsed + ONE_HOUR, ALPACA_UTC_OFFSET_MINUTES) : parsed;
}

export function canonicalAlpacaSymbol(symbol: string): string {
  const trimmed = symbol.trim().toUpperCase();
  if (!/^[A-Z][A-Z0-9.]*$/.test(trimmed)) {
    throw new ValidationError(`Invalid Alpaca symbol: ${symbol}`);
  }
  return trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBar(value: unknown): value is AlpacaBar {
  return isRecord(value) && typeof value.t === 'string';
}

export interface AlpacaClientOptions {
  apiKey: string;
  apiSecret: string;
  dataUrl: string;
  tradingUrl: string;
  timeoutMs: number;
}

export class AlpacaClient implements ProviderClient {
  readonly name = 'alpaca';

  constructor(readonly dataset: ProviderDataset, private readonly options: AlpacaClientOptions) {}

  get profile(): ProviderCapabilityProfile {
    return this.dataset.profile;
  }

  canonicalSymbol(symbol: string): string {
    return canonicalAlpacaSymbol(symbol);
  }

  async fetchBySymbol(symbol: string, window: Interval): Promise<OhlcvRow[]> {
    const url = new URL(`/v2/stocks/${encodeURIComponent(symbol)}/bars`, this.options.dataUrl);
    const rows: OhlcvRow[] = [];

    await this.paginate(url, window, (body) => {
      const bars = Array.isArray(body.bars) ? body.bars : [];
      for (const bar of bars) {
        if (isBar(bar)) rows.push(this.toRow(symbol, bar));
      }
    });

    console.log(`[Alpaca] Fetched ${rows.length} bars for ${symbol}`);
    return rows;
  }

  async fetchByTime(symbols: readonly string[], window: Interval): Promise<OhlcvRow[]> {
    const url = new URL('/v2/stocks/bars', this.options.dataUrl);
    url.searchParams.set('symbols', symbols.join(','));
    const rows: OhlcvRow[] = [];

    // Multi-symbol responses key bars by symbol
    await this.paginate(url, window, (body) => {
      const bySymbol = isRecord(body.bars) ? body.bars : {};
      for (const [symbol, bars] of Object.entries(bySymbol)) {
        if (!Array.isArray(bars)) continue;
        for (const bar of bars) {
          if (isBar(bar)) rows.push(this.toRow(symbol, bar));
        }
      }
    });

    console.log(`[Alpaca] Fetched ${rows.length} bars for ${symbols.length} symbols`);
    return rows;
  }

  async listInstruments(): Promise<Instrument[]> {
    const url = new URL('/v2/assets', this.options.tradingUrl);
    url.searchParams.set('status', 'active');
    url.searchParams.set('asset_class', 'us_equity');

    const body = await requestJson('Alpaca', url.toString(), { headers: this.headers() }, this.options.timeoutMs);
    if (!Array.isArray(body)) {
      throw new PermanentFetchError('Alpaca returned an unexpected asset list');
    }

    const instruments: Instrument[] = [];
    for (const item of body) {
      if (!isRecord(item) || typeof item.symbol !== 'string') continue;
      const asset: AlpacaAsset = {
        symbol: item.symbol,
        name: typeof item.name === 'string' ? item.name : undefined,
        exchange: typeof item.exchange === 'string' ? item.exchange : undefined,
        tradable: item.tradable === true,
      };
      if (!asset.tradable) continue;
      instruments.push({
        provider: this.name,
        assetClass: this.dataset.descriptor.assetClass,
        symbol: asset.symbol,
        name: asset.name ?? null,
        exchange: asset.exchange ?? null,
        listedAt: null,
      });
    }

    console.log(`[Alpaca] Listed ${instruments.length} tradable assets`);
    return instruments;
  }

  private headers(): Record<string, string> {
    return {
      'APCA-API-KEY-ID': this.options.apiKey,
      'APCA-API-SECRET-KEY': this.options.apiSecret,
    };
  }

  private toRow(symbol: string, bar: AlpacaBar): OhlcvRow {
    return {
      symbol,
      timestamp: alpacaBarDay(bar.t),
      open: bar.o,
      high: bar.h,
      low: bar.l,
      close: bar.c,
      volume: bar.v,
      raw: { ...bar },
    };
  }

  /**
   * Paginate through all results
   */
  private async paginate(
    base: URL,
    window: Interval,
    onPage: (body: Record<string, unknown>) => void
  ): Promise<void> {
    let pageToken: string | undefined;

    do {
      const url = new URL(base);
      url.searchParams.set('timeframe', '1Day');
      // an hour early so a daylight-saving bar (04:00Z) on the first day is included
      url.searchParams.set('start', new Date(window.start - ONE_HOUR).toISOString());
      // end is inclusive upstream
      url.searchParams.set('end', new Date(window.end - 1).toISOString());
      url.searchParams.set('limit', String(this.profile.maxRowsPerRequest));
      url.searchParams.set('adjustment', 'all');
      if (pageToken) {
        url.searchParams.set('page_token', pageToken);
      }

      const body = await requestJson('Alpaca', url.toString(), { headers: this.headers() }, this.options.timeoutMs);
      if (!isRecord(body)) {
        throw new PermanentFetchError('Alpaca returned an unexpected bars response');
      }
      onPage(body);

      pageToken = typeof body.next_page_token === 'string' && body.next_page_token !== '' ? body.next_page_token : undefined;
    } while (pageToken);
  }
}
