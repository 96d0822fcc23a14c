/**
 * Progress reporting for fetch runs. Observational only: a reporter never
 * changes what the orchestrator does.
 */

import { formatInterval } from './intervals.js';
import type { BatchedQuery } from '../types/index.js';

export interface BatchEvent {
  runId: string;
  /** 0-based position in the run's batch list */
  index: number;
  total: number;
  batch: BatchedQuery;
}

export interface BatchDoneEvent extends BatchEvent {
  status: 'succeeded' | 'failed';
  inserted: number;
  error?: string;
}

export interface ProgressReporter {
  batchStarted(event: BatchEvent): void;
  batchDone(event: BatchDoneEvent): void;
}

export const noopProgress: ProgressReporter = {
  batchStarted: () => undefined,
  batchDone: () => undefined,
};

function describe(batch: BatchedQuery): string {
  const symbols = batch.symbols.length === 1 ? batch.symbols[0] : `${batch.symbols.length} symbols`;
  return `${symbols} ${formatInterval(batch)}`;
}

export const consoleProgress: ProgressReporter = {
  batchStarted(event) {
    console.log(`[Progress] ${event.index + 1}/${event.total} started: ${describe(event.batch)}`);
  },
  batchDone(event) {
    if (event.status === 'failed') {
      console.warn(`[Progress] ${event.index + 1}/${event.total} failed: ${event.error ?? 'unknown error'}`);
    } else {
      console.log(`[Progress] ${event.index + 1}/${event.total} done: ${event.inserted} rows inserted`);
    }
  },
};

/**
 * Fan events out to several reporters
 */
export function combineReporters(...reporters: ProgressReporter[]): ProgressReporter {
  return {
    batchStarted: (event) => reporters.forEach((r) => r.batchStarted(event)),
    batchDone: (event) => reporters.forEach((r) => r.batchDone(event)),
  };
}
