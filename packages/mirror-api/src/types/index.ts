// Shared types for the market mirror service
// Row types match the schema in sql/schema.sql (camelCased by the database helpers)

/** Epoch milliseconds */
export type Timestamp = number;

/** Milliseconds */
export type Duration = number;

export const ONE_DAY: Duration = 24 * 60 * 60 * 1000;
export const ONE_HOUR: Duration = 60 * 60 * 1000;

/**
 * Half-open time range [start, end)
 */
export interface Interval {
  readonly start: Timestamp;
  readonly end: Timestamp;
}

// ============================================
// Datasets
// ============================================

/**
 * Natural key of a dataset: one logical series from one provider
 */
export interface DatasetDescriptor {
  provider: string;
  market: string;
  assetClass: string;
  name: string;
}

/**
 * Dataset - stored in datasets table
 */
export interface Dataset extends DatasetDescriptor {
  id: number;
  description: string | null;
  lastUpdatedAt: Date | null;
  createdAt: Date;
}

// ============================================
// Planning
// ============================================

/**
 * A sub-range of a requested window that has no coverage for one symbol
 */
export interface MissingRange {
  symbol: string;
  start: Timestamp;
  end: Timestamp;
}

/**
 * One provider call's worth of symbols and time range
 */
export interface BatchedQuery {
  symbols: string[];
  start: Timestamp;
  end: Timestamp;
}

export type BatchAxis = 'symbol' | 'time' | 'hybrid';

export const BATCH_AXES: readonly BatchAxis[] = ['symbol', 'time', 'hybrid'];

/**
 * Static per-provider descriptor of request limits
 */
export interface ProviderCapabilityProfile {
  preferredBatchAxis: BatchAxis;
  maxRowsPerRequest: number;
  timeGranularity: Duration;
  requestsPerSecond: number;
  /** Requests are clamped to start no earlier than this */
  earliestDate: Timestamp;
  /** Coverage is never recorded past now - coverageDelay */
  coverageDelay: Duration;
  /** Offset of the market's local day boundaries from UTC */
  utcOffsetMinutes: number;
}

// ============================================
// Data
// ============================================

/**
 * OHLCV observation as parsed by a provider adapter
 */
export interface OhlcvRow {
  symbol: string;
  timestamp: Timestamp;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  raw: Record<string, unknown>;
}

export interface RawDataPayload {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  raw: Record<string, unknown>;
}

export interface RawDataRecord {
  datasetId: number;
  symbol: string;
  start: Timestamp;
  end: Timestamp;
  payload: RawDataPayload;
}

/**
 * Stored coverage interval - coverage table
 */
export interface CoverageRow {
  id: number;
  datasetId: number;
  symbol: string;
  start: Timestamp;
  end: Timestamp;
}

/**
 * Tradable instrument - instruments table
 */
export interface Instrument {
  provider: string;
  assetClass: string;
  symbol: string;
  name: string | null;
  exchange: string | null;
  listedAt: string | null;
}

/**
 * Bar read back from raw_data
 */
export interface StoredBar {
  symbol: string;
  start: Timestamp;
  end: Timestamp;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// ============================================
// Requests
// ============================================

export type TimeSelector =
  | { kind: 'window'; start: Timestamp; end: Timestamp }
  | { kind: 'timestamp'; at: Timestamp };

export type SymbolScope =
  | { kind: 'all' }
  | { kind: 'symbols'; symbols: string[] };

/**
 * A data need, validated once at the boundary (HTTP body, CLI args, job payload)
 */
export interface DataRequest {
  /** provider/assetClass/name, e.g. tushare/stock/daily */
  dataset: string;
  time: TimeSelector;
  scope: SymbolScope;
  /** Drop weekend granules (market-local) from the computed gaps */
  skipWeekends?: boolean;
}

export type FetchMode = 'strict' | 'best-effort';

export interface BatchFailure {
  batch: BatchedQuery;
  error: string;
}

/**
 * Outcome of one orchestrator invocation
 */
export interface FetchSummary {
  runId: string;
  dataset: string;
  mode: FetchMode;
  window: Interval | null;
  missingRanges: number;
  batches: number;
  succeeded: number;
  failed: BatchFailure[];
  recordsFetched: number;
  recordsInserted: number;
  rowsRejected: number;
  rowsIgnored: number;
  cancelled: boolean;
}
