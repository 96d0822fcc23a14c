/**
 * Mirror Store
 * Persistence for datasets, coverage, raw rows and instruments.
 *
 * Coverage lives in a tstzrange column guarded by GiST exclusion constraints
 * (no overlap, no adjacency per dataset/symbol). Raw rows are insert-only:
 * a duplicate (dataset_id, symbol, start_at) is ignored.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { poolExecutor, transaction } from './database.js';
import type { Executor } from './database.js';
import type {
  CoverageRow,
  Dataset,
  DatasetDescriptor,
  Instrument,
  Interval,
  RawDataPayload,
  RawDataRecord,
  StoredBar,
} from '../types/index.js';

/**
 * Operations that must be able to run inside one transaction
 */
export interface StoreSession {
  /**
   * Stored coverage for the symbols that overlaps window
   * (or, with includeAdjacent, touches it), ordered by symbol then start
   */
  selectCoverage(
    datasetId: number,
    symbols: readonly string[],
    window: Interval,
    options?: { includeAdjacent?: boolean }
  ): Promise<CoverageRow[]>;
  deleteCoverage(ids: readonly number[]): Promise<void>;
  insertCoverage(datasetId: number, symbol: string, interval: Interval): Promise<void>;
  /** Returns the number of rows actually inserted */
  insertRawData(records: readonly RawDataRecord[]): Promise<number>;
}

export interface MirrorStore extends StoreSession {
  ensureDataset(descriptor: DatasetDescriptor, description?: string): Promise<Dataset>;
  findDataset(descriptor: DatasetDescriptor): Promise<Dataset | null>;
  markDatasetUpdated(datasetId: number): Promise<void>;
  transaction<T>(callback: (session: StoreSession) => Promise<T>): Promise<T>;

  listInstruments(provider: string, assetClass: string): Promise<Instrument[]>;
  upsertInstruments(instruments: readonly Instrument[]): Promise<number>;

  selectBars(datasetId: number, symbol: string, window: Interval, limit?: number): Promise<StoredBar[]>;
}

const INSERT_BATCH_SIZE = 500;

interface CoverageDbRow {
  id: number;
  datasetId: number;
  symbol: string;
  startAt: Date;
  endAt: Date;
}

interface BarDbRow {
  symbol: string;
  startAt: Date;
  endAt: Date;
  payload: RawDataPayload;
}

/**
 * Build "($1, $2), ($3, $4)" placeholder groups for a multi-row insert
 */
function placeholders(rows: number, columns: number, casts: readonly string[] = []): string {
  const groups: string[] = [];
  let paramIndex = 1;
  for (let r = 0; r < rows; r++) {
    const cells: string[] = [];
    for (let c = 0; c < columns; c++) {
      cells.push(`$${paramIndex}${casts[c] ?? ''}`);
      paramIndex++;
    }
    groups.push(`(${cells.join(', ')})`);
  }
  return groups.join(', ');
}

function toCoverageRow(row: CoverageDbRow): CoverageRow {
  return {
    id: row.id,
    datasetId: row.datasetId,
    symbol: row.symbol,
    start: row.startAt.getTime(),
    end: row.endAt.getTime(),
  };
}

class PostgresSession implements StoreSession {
  constructor(protected readonly db: Executor) {}

  async selectCoverage(
    datasetId: number,
    symbols: readonly string[],
    window: Interval,
    options: { includeAdjacent?: boolean } = {}
  ): Promise<CoverageRow[]> {
    if (symbols.length === 0) return [];

    const condition = options.includeAdjacent
      ? `(period && tstzrange($3, $4, '[)') OR period -|- tstzrange($3, $4, '[)'))`
      : `period && tstzrange($3, $4, '[)')`;

    const rows = await this.db.query<CoverageDbRow>(
      `SELECT id, dataset_id, symbol, lower(period) AS start_at, upper(period) AS end_at
       FROM coverage
       WHERE dataset_id = $1 AND symbol = ANY($2::text[]) AND ${condition}
       ORDER BY symbol, lower(period)`,
      [datasetId, [...symbols], new Date(window.start), new Date(window.end)]
    );
    return rows.map(toCoverageRow);
  }

  async deleteCoverage(ids: readonly number[]): Promise<void> {
    if (ids.length === 0) return;
    await this.db.execute('DELETE FROM coverage WHERE id = ANY($1::int[])', [[...ids]]);
  }

  async insertCoverage(datasetId: number, symbol: string, interval: Interval): Promise<void> {
    await this.db.execute(
      `INSERT INTO coverage (dataset_id, symbol, period)
       VALUES ($1, $2, tstzrange($3, $4, '[)'))`,
      [datasetId, symbol, new Date(interval.start), new Date(interval.end)]
    );
  }

  async insertRawData(records: readonly RawDataRecord[]): Promise<number> {
    let inserted = 0;

    for (let i = 0; i < records.length; i += INSERT_BATCH_SIZE) {
      const batch = records.slice(i, i + INSERT_BATCH_SIZE);
      const values: unknown[] = [];
      for (const record of batch) {
        values.push(
          record.datasetId,
          record.symbol,
          new Date(record.start),
          new Date(record.end),
          JSON.stringify(record.payload)
        );
      }

      inserted += await this.db.execute(
        `INSERT INTO raw_data (dataset_id, symbol, start_at, end_at, payload)
         VALUES ${placeholders(batch.length, 5, ['', '', '', '', '::jsonb'])}
         ON CONFLICT (dataset_id, symbol, start_at) DO NOTHING`,
        values
      );
    }

    return inserted;
  }
}

export class PostgresStore extends PostgresSession implements MirrorStore {
  constructor() {
    super(poolExecutor);
  }

  async findDataset(descriptor: DatasetDescriptor): Promise<Dataset | null> {
    const rows = await this.db.query<Dataset>(
      `SELECT * FROM datasets
       WHERE provider = $1 AND market = $2 AND asset_class = $3 AND name = $4`,
      [descriptor.provider, descriptor.market, descriptor.assetClass, descriptor.name]
    );
    return rows[0] ?? null;
  }

  async ensureDataset(descriptor: DatasetDescriptor, description?: string): Promise<Dataset> {
    // DO UPDATE (not DO NOTHING) so RETURNING yields the existing row
    const rows = await this.db.query<Dataset>(
      `INSERT INTO datasets (provider, market, asset_class, name, description)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (provider, market, asset_class, name)
       DO UPDATE SET description = COALESCE(EXCLUDED.description, datasets.description)
       RETURNING *`,
      [descriptor.provider, descriptor.market, descriptor.assetClass, descriptor.name, description ?? null]
    );
    const dataset = rows[0];
    if (!dataset) {
      throw new Error(`Failed to create dataset ${descriptor.provider}/${descriptor.assetClass}/${descriptor.name}`);
    }
    return dataset;
  }

  async markDatasetUpdated(datasetId: number): Promise<void> {
    await this.db.execute('UPDATE datasets SET last_updated_at = NOW() WHERE id = $1', [datasetId]);
  }

  transaction<T>(callback: (session: StoreSession) => Promise<T>): Promise<T> {
    return transaction((executor) => callback(new PostgresSession(executor)));
  }

  async listInstruments(provider: string, assetClass: string): Promise<Instrument[]> {
    return this.db.query<Instrument>(
      `SELECT provider, asset_class, symbol, name, exchange, listed_at
       FROM instruments
       WHERE provider = $1 AND asset_class = $2
       ORDER BY symbol`,
      [provider, assetClass]
    );
  }

  async upsertInstruments(instruments: readonly Instrument[]): Promise<number> {
    let written = 0;

    for (let i = 0; i < instruments.length; i += INSERT_BATCH_SIZE) {
      const batch = instruments.slice(i, i + INSERT_BATCH_SIZE);
      const values: unknown[] = [];
      for (const instrument of batch) {
        values.push(
          instrument.provider,
          instrument.assetClass,
          instrument.symbol,
          instrument.name,
          instrument.exchange,
          instrument.listedAt
        );
      }

      written += await this.db.execute(
        `INSERT INTO instruments (provider, asset_class, symbol, name, exchange, listed_at)
         VALUES ${placeholders(batch.length, 6)}
         ON CONFLICT (provider, asset_class, symbol)
         DO UPDATE SET
           name = EXCLUDED.name,
           exchange = EXCLUDED.exchange,
           listed_at = EXCLUDED.listed_at,
           updated_at = NOW()`,
        values
      );
    }

    return written;
  }

  async selectBars(datasetId: number, symbol: string, window: Interval, limit = 10000): Promise<StoredBar[]> {
    const rows = await this.db.query<BarDbRow>(
      `SELECT symbol, start_at, end_at, payload
       FROM raw_data
       WHERE dataset_id = $1 AND symbol = $2 AND start_at >= $3 AND start_at < $4
       ORDER BY start_at
       LIMIT $5`,
      [datasetId, symbol, new Date(window.start), new Date(window.end), limit]
    );

    return rows.map((row) => ({
      symbol: row.symbol,
      start: row.startAt.getTime(),
      end: row.endAt.getTime(),
      open: row.payload.open,
      high: row.payload.high,
      low: row.payload.low,
      close: row.payload.close,
      volume: row.payload.volume,
    }));
  }
}

/**
 * Locate sql/schema.sql from either the source tree or the compiled dist/ tree
 */
export function findSchemaFile(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    for (const candidate of [
      path.join(dir, 'sql', 'schema.sql'),
      path.join(dir, 'packages', 'mirror-api', 'sql', 'schema.sql'),
    ]) {
      if (fs.existsSync(candidate)) return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error('sql/schema.sql not found');
    }
    dir = parent;
  }
}

/**
 * Drop and recreate every table. Destroys all mirrored data.
 */
export async function applySchema(): Promise<void> {
  const sql = fs.readFileSync(findSchemaFile(), 'utf8');
  await poolExecutor.execute(sql);
  console.log('[Store] Schema applied');
}
