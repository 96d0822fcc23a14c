/**
 * Provider rows -> raw data records
 */

import type { BatchedQuery, Duration, OhlcvRow, RawDataRecord } from '../types/index.js';

// Volumes this close to an integer are stored as that integer
const VOLUME_TOLERANCE = 1e-6;

export interface TransformContext {
  datasetId: number;
  batch: BatchedQuery;
  granularity: Duration;
  canonicalSymbol: (symbol: string) => string;
}

export interface TransformResult {
  records: RawDataRecord[];
  /** Malformed rows, logged and skipped */
  rejected: number;
  /** Well-formed rows outside the batch's symbols or window */
  ignored: number;
}

/**
 * Returns a reason when the row cannot be stored
 */
export function validateRow(row: OhlcvRow): string | null {
  if (!Number.isFinite(row.timestamp)) return 'unparseable timestamp';
  for (const field of ['open', 'high', 'low', 'close'] as const) {
    if (!Number.isFinite(row[field]) || row[field] < 0) return `invalid ${field}: ${row[field]}`;
  }
  if (row.high < row.low) return `high ${row.high} below low ${row.low}`;
  if (!Number.isFinite(row.volume) || row.volume < 0) return `invalid volume: ${row.volume}`;
  if (Math.abs(row.volume - Math.round(row.volume)) > VOLUME_TOLERANCE) return `fractional volume: ${row.volume}`;
  return null;
}

export function toRawRecords(rows: readonly OhlcvRow[], context: TransformContext): TransformResult {
  const { batch, datasetId, granularity } = context;
  const wanted = new Set(batch.symbols);
  const records: RawDataRecord[] = [];
  let rejected = 0;
  let ignored = 0;

  for (const row of rows) {
    let symbol: string;
    try {
      symbol = context.canonicalSymbol(row.symbol);
    } catch (err) {
      console.warn(`[Transform] Rejected row with symbol "${row.symbol}":`, err instanceof Error ? err.message : err);
      rejected++;
      continue;
    }

    const reason = validateRow(row);
    if (reason) {
      console.warn(`[Transform] Rejected row for ${symbol}: ${reason}`);
      rejected++;
      continue;
    }

    if (!wanted.has(symbol) || row.timestamp < batch.start || row.timestamp >= batch.end) {
      ignored++;
      continue;
    }

    records.push({
      datasetId,
      symbol,
      start: row.timestamp,
      end: row.timestamp + granularity,
      payload: {
        open: row.open,
        high: row.high,
        low: row.low,
        close: row.close,
        volume: Math.round(row.volume),
        raw: row.raw,
      },
    });
  }

  return { records, rejected, ignored };
}
