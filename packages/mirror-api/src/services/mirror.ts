/**
 * Wiring: builds orchestrators and read services from configuration.
 * Routes, workers and the CLI all go through here.
 */

import { getConfig } from '../config.js';
import { createProvider, findDataset } from '../providers/index.js';
import { FetchOrchestrator } from './orchestrator.js';
import { PostgresStore } from './store.js';
import { ONE_DAY } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import type { MirrorConfig } from '../config.js';
import type { ProviderDataset } from '../providers/index.js';
import type { RunOptions } from './orchestrator.js';
import type { MirrorStore } from './store.js';
import type { TimeSelector, Timestamp } from '../types/index.js';

let store: MirrorStore | null = null;

export function getStore(): MirrorStore {
  if (!store) {
    store = new PostgresStore();
  }
  return store;
}

/**
 * Swap the store (tests use an in-memory one)
 */
export function setStore(next: MirrorStore | null): void {
  store = next;
}

export function requireDataset(key: string): ProviderDataset {
  const dataset = findDataset(key);
  if (!dataset) {
    throw new ValidationError(`Unknown dataset: ${key}`);
  }
  return dataset;
}

export function createOrchestrator(datasetKey: string, config: MirrorConfig = getConfig()): FetchOrchestrator {
  return new FetchOrchestrator({
    store: getStore(),
    provider: createProvider(datasetKey, config),
  });
}

export function defaultRunOptions(config: MirrorConfig = getConfig()): RunOptions {
  return {
    concurrency: Math.max(1, config.FETCH_CONCURRENCY),
    retry: {
      attempts: Math.max(1, config.RETRY_ATTEMPTS),
      baseDelayMs: 4000,
      maxDelayMs: 60000,
    },
  };
}

/**
 * Window used by updates that name no time: the last UPDATE_LOOKBACK_DAYS days
 */
export function defaultUpdateWindow(config: MirrorConfig = getConfig(), now: Timestamp = Date.now()): TimeSelector {
  return { kind: 'window', start: now - config.UPDATE_LOOKBACK_DAYS * ONE_DAY, end: now };
}
