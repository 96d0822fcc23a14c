/**
 * Scriptable provider for orchestrator tests. Produces one daily bar per
 * symbol per granule in the requested window unless a call is scripted to fail.
 */

import { ONE_DAY } from '../../src/types/index.js';
import type { ProviderClient, ProviderDataset } from '../../src/providers/index.js';
import type { Instrument, Interval, OhlcvRow, ProviderCapabilityProfile } from '../../src/types/index.js';

export interface FakeCall {
  shape: 'symbol' | 'time';
  symbols: string[];
  window: Interval;
}

export function fakeProfile(overrides: Partial<ProviderCapabilityProfile> = {}): ProviderCapabilityProfile {
  return {
    preferredBatchAxis: 'hybrid',
    maxRowsPerRequest: 100,
    timeGranularity: ONE_DAY,
    requestsPerSecond: 1000,
    earliestDate: Date.UTC(2000, 0, 1),
    coverageDelay: 0,
    utcOffsetMinutes: 0,
    ...overrides,
  };
}

export function fakeDataset(profile: ProviderCapabilityProfile = fakeProfile()): ProviderDataset {
  return {
    key: 'fake/stock/daily',
    descriptor: { provider: 'fake', market: 'XX', assetClass: 'stock', name: 'daily' },
    description: 'test bars',
    profile,
  };
}

export class FakeProvider implements ProviderClient {
  readonly name = 'fake';
  readonly dataset: ProviderDataset;
  readonly calls: FakeCall[] = [];
  instruments: Instrument[] = [];
  /** Return an error to make that call throw it */
  failWith: (call: FakeCall, attempt: number) => Error | undefined = () => undefined;
  /** Stamp bars at UTC midnight of every weekday the window touches, like an exchange's daily series */
  tradingDays = false;
  private attempts = new Map<string, number>();

  constructor(profile: ProviderCapabilityProfile = fakeProfile()) {
    this.dataset = fakeDataset(profile);
  }

  get profile(): ProviderCapabilityProfile {
    return this.dataset.profile;
  }

  canonicalSymbol(symbol: string): string {
    return symbol.trim().toUpperCase();
  }

  async fetchBySymbol(symbol: string, window: Interval): Promise<OhlcvRow[]> {
    return this.respond({ shape: 'symbol', symbols: [symbol], window: { start: window.start, end: window.end } });
  }

  async fetchByTime(symbols: readonly string[], window: Interval): Promise<OhlcvRow[]> {
    return this.respond({ shape: 'time', symbols: [...symbols], window: { start: window.start, end: window.end } });
  }

  async listInstruments(): Promise<Instrument[]> {
    return this.instruments;
  }

  private respond(call: FakeCall): OhlcvRow[] {
    this.calls.push(call);
    const key = `${call.symbols.join(',')}@${call.window.start}`;
    const attempt = (this.attempts.get(key) ?? 0) + 1;
    this.attempts.set(key, attempt);

    const error = this.failWith(call, attempt);
    if (error) throw error;

    const rows: OhlcvRow[] = [];
    const bar = (symbol: string, t: number): OhlcvRow => ({
      symbol,
      timestamp: t,
      open: 10,
      high: 11,
      low: 9,
      close: 10.5,
      volume: 1000,
      raw: { t },
    });
    for (const symbol of call.symbols) {
      if (this.tradingDays) {
        for (let t = Math.floor(call.window.start / ONE_DAY) * ONE_DAY; t < call.window.end; t += ONE_DAY) {
          const weekday = new Date(t).getUTCDay();
          if (weekday !== 0 && weekday !== 6) rows.push(bar(symbol, t));
        }
        continue;
      }
      for (let t = call.window.start; t < call.window.end; t += this.profile.timeGranularity) {
        rows.push(bar(symbol, t));
      }
    }
    return rows;
  }
}
