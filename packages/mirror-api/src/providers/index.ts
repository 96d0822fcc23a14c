/**
 * Provider registry
 * Maps dataset keys (provider/assetClass/name) to configured clients.
 */

import { AlpacaClient, ALPACA_DATASETS, canonicalAlpacaSymbol } from './alpaca.js';
import { TushareClient, TUSHARE_DATASETS, canonicalTushareSymbol } from './tushare.js';
import { validateProfile } from '../services/query-merger.js';
import { ConfigurationError } from '../utils/errors.js';
import type { MirrorConfig } from '../config.js';
import type { ProviderClient, ProviderDataset } from './types.js';

export type { ProviderClient, ProviderDataset } from './types.js';

export function listDatasets(): ProviderDataset[] {
  return [...TUSHARE_DATASETS, ...ALPACA_DATASETS];
}

export function findDataset(key: string): ProviderDataset | undefined {
  return listDatasets().find((d) => d.key === key);
}

const CANONICALIZERS: Record<string, (symbol: string) => string> = {
  tushare: canonicalTushareSymbol,
  alpaca: canonicalAlpacaSymbol,
};

/**
 * Symbol normalizer for a dataset, usable without provider credentials
 */
export function canonicalizerFor(dataset: ProviderDataset): (symbol: string) => string {
  const canonicalize = CANONICALIZERS[dataset.descriptor.provider];
  if (!canonicalize) {
    throw new ConfigurationError(`No symbol rules for provider ${dataset.descriptor.provider}`);
  }
  return canonicalize;
}

/**
 * Build a client for a dataset key. Throws ConfigurationError for unknown
 * datasets, missing credentials and invalid capability profiles.
 */
export function createProvider(key: string, config: MirrorConfig): ProviderClient {
  const tushare = TUSHARE_DATASETS.find((d) => d.key === key);
  if (tushare) {
    if (!config.TUSHARE_TOKEN) {
      throw new ConfigurationError('TUSHARE_TOKEN is required for Tushare datasets', { dataset: key });
    }
    validateProfile(tushare.profile);
    return new TushareClient(tushare, {
      token: config.TUSHARE_TOKEN,
      baseUrl: config.TUSHARE_API_URL,
      timeoutMs: config.PROVIDER_TIMEOUT_MS,
    });
  }

  const alpaca = ALPACA_DATASETS.find((d) => d.key === key);
  if (alpaca) {
    if (!config.ALPACA_API_KEY || !config.ALPACA_API_SECRET) {
      throw new ConfigurationError('ALPACA_API_KEY and ALPACA_API_SECRET are required for Alpaca datasets', {
        dataset: key,
      });
    }
    validateProfile(alpaca.profile);
    return new AlpacaClient(alpaca, {
      apiKey: config.ALPACA_API_KEY,
      apiSecret: config.ALPACA_API_SECRET,
      dataUrl: config.ALPACA_DATA_URL,
      tradingUrl: config.ALPACA_TRADING_URL,
      timeoutMs: config.PROVIDER_TIMEOUT_MS,
    });
  }

  throw new ConfigurationError(`Unknown dataset: ${key}`, {
    known: listDatasets().map((d) => d.key),
  });
}
