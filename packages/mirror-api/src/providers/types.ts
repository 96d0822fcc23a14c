import type {
  DatasetDescriptor,
  Instrument,
  Interval,
  OhlcvRow,
  ProviderCapabilityProfile,
} from '../types/index.js';

/**
 * One dataset a provider can serve
 */
export interface ProviderDataset {
  /** provider/assetClass/name */
  key: string;
  descriptor: DatasetDescriptor;
  description: string;
  profile: ProviderCapabilityProfile;
}

/**
 * Narrow surface the orchestrator needs from an upstream data source.
 *
 * Implementations throw TransientFetchError for failures worth retrying
 * (network, timeout, rate limit, 5xx) and PermanentFetchError otherwise.
 */
export interface ProviderClient {
  readonly name: string;
  readonly dataset: ProviderDataset;
  readonly profile: ProviderCapabilityProfile;

  fetchBySymbol(symbol: string, window: Interval): Promise<OhlcvRow[]>;
  fetchByTime(symbols: readonly string[], window: Interval): Promise<OhlcvRow[]>;
  listInstruments(): Promise<Instrument[]>;
  /** Normalize a user- or provider-supplied symbol to the stored form */
  canonicalSymbol(symbol: string): string;
}
