/**
 * Fetch-Store Orchestrator
 *
 * One run:
 *   ANALYZING   clamp the window, load coverage, compute missing ranges
 *   BATCHING    merge missing ranges into provider-sized batches
 *   FETCHING    call the provider per batch (rate-gated, retried)
 *   PERSISTING  insert raw rows and record coverage in one transaction
 *   DONE
 *
 * Nothing about a run is kept outside the coverage table; re-running after a
 * crash re-analyzes and picks up where coverage stops.
 *
 * Modes:
 * - strict (download): the first failed batch stops the run with BatchFailureError
 * - best-effort (update): failed batches are logged and skipped
 * A CoverageInvariantError or a storage failure stops the run in either mode.
 */

import { v4 as uuidv4 } from 'uuid';
import { CoverageService } from './coverage.js';
import { coalesceMissing, computeMissing, weekendCalendar } from './gaps.js';
import { mergeMissingRanges } from './query-merger.js';
import { InstrumentService } from './instruments.js';
import { noopProgress } from './progress.js';
import { RateLimiter, getRateLimiter } from './rate-limit.js';
import { toRawRecords } from './transform.js';
import { formatInterval } from './intervals.js';
import { DEFAULT_RETRY, withRetry } from '../utils/retry.js';
import {
  BatchFailureError,
  ConfigurationError,
  formatErrorForResponse,
  logError,
} from '../utils/errors.js';
import type { CalendarFilter } from './gaps.js';
import type { BatchDoneEvent, BatchEvent, ProgressReporter } from './progress.js';
import type { MirrorStore } from './store.js';
import type { ProviderClient } from '../providers/index.js';
import type { RetryOptions } from '../utils/retry.js';
import type {
  BatchedQuery,
  DataRequest,
  Dataset,
  Duration,
  FetchMode,
  FetchSummary,
  Interval,
  MissingRange,
  OhlcvRow,
  SymbolScope,
  TimeSelector,
  Timestamp,
} from '../types/index.js';

export interface OrchestratorDeps {
  store: MirrorStore;
  provider: ProviderClient;
  coverage?: CoverageService;
  instruments?: InstrumentService;
  rateLimiter?: RateLimiter;
  now?: () => Timestamp;
}

export interface RunOptions {
  progress?: ProgressReporter;
  /** Checked between batches; a batch in flight always completes */
  signal?: AbortSignal;
  /** Batches in flight at once (default 1) */
  concurrency?: number;
  retry?: RetryOptions;
  /** Join same-symbol gaps at most this far apart before batching */
  minimumGap?: Duration;
  runId?: string;
}

export interface FetchPlan {
  /** Clamped window, or null when nothing can be fetched */
  window: Interval | null;
  dataset: Dataset | null;
  symbols: string[];
  missing: MissingRange[];
  batches: BatchedQuery[];
}

export class FetchOrchestrator {
  readonly store: MirrorStore;
  readonly provider: ProviderClient;
  readonly coverage: CoverageService;
  readonly instruments: InstrumentService;
  private readonly rateLimiter: RateLimiter;
  private readonly now: () => Timestamp;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.provider = deps.provider;
    this.now = deps.now ?? Date.now;
    this.coverage = deps.coverage ?? new CoverageService(deps.store, { now: this.now });
    this.instruments = deps.instruments ?? new InstrumentService(deps.store);
    this.rateLimiter =
      deps.rateLimiter ?? getRateLimiter(deps.provider.name, deps.provider.profile.requestsPerSecond);
  }

  /**
   * Fetch everything missing; the first failed batch aborts the run
   */
  download(request: DataRequest, options: RunOptions = {}): Promise<FetchSummary> {
    return this.run(request, 'strict', options);
  }

  /**
   * Fetch everything missing; failed batches are skipped and reported in the summary
   */
  update(request: DataRequest, options: RunOptions = {}): Promise<FetchSummary> {
    return this.run(request, 'best-effort', options);
  }

  /**
   * Clamp the requested time to [earliestDate, min(end, now)]
   */
  resolveWindow(time: TimeSelector): Interval | null {
    const { earliestDate, timeGranularity } = this.provider.profile;
    const requested =
      time.kind === 'timestamp' ? { start: time.at, end: time.at + timeGranularity } : time;

    const start = Math.max(requested.start, earliestDate);
    const end = Math.min(requested.end, this.now());
    return end > start ? { start, end } : null;
  }

  async resolveSymbols(scope: SymbolScope): Promise<string[]> {
    const symbols =
      scope.kind === 'all'
        ? await this.instruments.allSymbols(this.provider)
        : scope.symbols.map((s) => this.provider.canonicalSymbol(s));
    return [...new Set(symbols)].sort();
  }

  /**
   * ANALYZING and BATCHING without fetching anything
   */
  async plan(request: DataRequest, minimumGap: Duration = 0): Promise<FetchPlan> {
    this.assertDataset(request);
    const { profile, dataset } = this.provider;

    const window = this.resolveWindow(request.time);
    if (!window) {
      return { window: null, dataset: null, symbols: [], missing: [], batches: [] };
    }

    const symbols = await this.resolveSymbols(request.scope);
    const stored = await this.store.ensureDataset(dataset.descriptor, dataset.description);
    if (symbols.length === 0) {
      return { window, dataset: stored, symbols, missing: [], batches: [] };
    }

    const calendar: CalendarFilter | undefined = request.skipWeekends
      ? {
          granularity: profile.timeGranularity,
          utcOffsetMinutes: profile.utcOffsetMinutes,
          isExcluded: weekendCalendar(profile.utcOffsetMinutes),
        }
      : undefined;

    const coverage = await this.coverage.loadCoverage(stored.id, symbols, window);
    const missing = coalesceMissing(computeMissing(window, symbols, coverage, calendar), minimumGap);
    const batches = mergeMissingRanges(profile, missing);

    return { window, dataset: stored, symbols, missing, batches };
  }

  async run(request: DataRequest, mode: FetchMode, options: RunOptions = {}): Promise<FetchSummary> {
    const runId = options.runId ?? uuidv4();
    const progress = options.progress ?? noopProgress;
    const concurrency = Math.max(1, options.concurrency ?? 1);
    const retry = options.retry ?? DEFAULT_RETRY;

    const summary: FetchSummary = {
      runId,
      dataset: request.dataset,
      mode,
      window: null,
      missingRanges: 0,
      batches: 0,
      succeeded: 0,
      failed: [],
      recordsFetched: 0,
      recordsInserted: 0,
      rowsRejected: 0,
      rowsIgnored: 0,
      cancelled: false,
    };

    console.log(`[Orchestrator] ${runId} ${mode} ${request.dataset}: analyzing`);
    const plan = await this.plan(request, options.minimumGap);
    summary.window = plan.window;
    summary.missingRanges = plan.missing.length;
    summary.batches = plan.batches.length;

    const { window, dataset } = plan;
    if (!window || !dataset || plan.batches.length === 0) {
      const reason = window ? 'everything already covered' : 'empty window after clamping';
      console.log(`[Orchestrator] ${runId} nothing to fetch (${reason})`);
      return summary;
    }

    console.log(
      `[Orchestrator] ${runId} ${plan.missing.length} missing ranges for ${plan.symbols.length} symbols ` +
        `in ${formatInterval(window)} -> ${plan.batches.length} batches`
    );

    const batches = plan.batches;
    const total = batches.length;
    let next = 0;
    // Set by the first error that stops the run
    const state: { fatal: { error: unknown } | null } = { fatal: null };

    const report = (fn: () => void) => {
      try {
        fn();
      } catch (err) {
        logError('Orchestrator.progress', err, { runId });
      }
    };

    const worker = async (): Promise<void> => {
      while (state.fatal === null) {
        if (options.signal?.aborted) {
          summary.cancelled = true;
          return;
        }
        const index = next++;
        if (index >= total) return;

        const batch = batches[index];
        const event: BatchEvent = { runId, index, total, batch };
        report(() => progress.batchStarted(event));

        // FETCHING
        let rows: OhlcvRow[];
        try {
          rows = await this.fetchBatch(batch, retry);
        } catch (err) {
          const message = formatErrorForResponse(err);
          logError('Orchestrator.fetch', err, { runId, batch: index, symbols: batch.symbols.slice(0, 5) });
          summary.failed.push({ batch, error: message });
          report(() => progress.batchDone({ ...event, status: 'failed', inserted: 0, error: message }));
          if (mode === 'strict') {
            state.fatal = { error: new BatchFailureError(batch, err) };
          }
          continue;
        }

        // PERSISTING
        try {
          const transformed = toRawRecords(rows, {
            datasetId: dataset.id,
            batch,
            granularity: this.provider.profile.timeGranularity,
            canonicalSymbol: (s) => this.provider.canonicalSymbol(s),
          });
          const { inserted } = await this.coverage.persist(
            dataset.id,
            batch.symbols,
            batch,
            this.provider.profile.coverageDelay,
            transformed.records
          );

          summary.succeeded++;
          summary.recordsFetched += rows.length;
          summary.recordsInserted += inserted;
          summary.rowsRejected += transformed.rejected;
          summary.rowsIgnored += transformed.ignored;

          const done: BatchDoneEvent = { ...event, status: 'succeeded', inserted };
          report(() => progress.batchDone(done));
        } catch (err) {
          report(() =>
            progress.batchDone({ ...event, status: 'failed', inserted: 0, error: formatErrorForResponse(err) })
          );
          state.fatal = { error: err };
          return;
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, total) }, () => worker()));

    if (summary.succeeded > 0) {
      await this.store.markDatasetUpdated(dataset.id);
    }

    console.log(
      `[Orchestrator] ${runId} done: ${summary.succeeded}/${total} batches, ` +
        `${summary.recordsInserted} inserted, ${summary.failed.length} failed` +
        (summary.cancelled ? ', cancelled' : '')
    );

    if (state.fatal !== null) {
      throw state.fatal.error;
    }
    return summary;
  }

  private fetchBatch(batch: BatchedQuery, retry: RetryOptions): Promise<OhlcvRow[]> {
    return withRetry(
      async () => {
        await this.rateLimiter.acquire();
        // Call shape follows the batch's shape, not the strategy that built it
        return batch.symbols.length === 1
          ? this.provider.fetchBySymbol(batch.symbols[0], batch)
          : this.provider.fetchByTime(batch.symbols, batch);
      },
      {
        ...retry,
        onRetry: (err, attempt, delayMs) => {
          console.warn(
            `[Orchestrator] ${this.provider.name} attempt ${attempt} failed, retrying in ${delayMs}ms: ` +
              formatErrorForResponse(err)
          );
        },
      }
    );
  }

  private assertDataset(request: DataRequest): void {
    if (request.dataset !== this.provider.dataset.key) {
      throw new ConfigurationError(
        `Request for ${request.dataset} sent to the ${this.provider.dataset.key} orchestrator`
      );
    }
  }
}
