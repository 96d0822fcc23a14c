/**
 * Dataset Routes
 * GET /api/v1/datasets
 * GET /api/v1/datasets/:provider/:assetClass/:name/coverage?symbols=A,B&start=&end=
 * GET /api/v1/datasets/:provider/:assetClass/:name/bars?symbol=&start=&end=&limit=
 */

import { Router, type IRouter, type Request } from 'express';
import { listDatasets } from '../providers/index.js';
import { BarsService } from '../services/bars.js';
import { getStore, requireDataset } from '../services/mirror.js';
import { formatInterval, createInterval } from '../services/intervals.js';
import { parseDateInput } from '../utils/time.js';
import {
  ValidationError,
  formatErrorForResponse,
  getErrorStatusCode,
  logError,
} from '../utils/errors.js';
import type { ProviderDataset } from '../providers/index.js';
import type { Interval } from '../types/index.js';

const router: IRouter = Router();

function datasetKey(req: Request): string {
  return `${req.params.provider}/${req.params.assetClass}/${req.params.name}`;
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function requireQuery(req: Request, name: string): string {
  const value = queryString(req, name);
  if (!value) {
    throw new ValidationError(`${name} is required`);
  }
  return value;
}

function windowFromQuery(req: Request, dataset: ProviderDataset): Interval {
  const offset = dataset.profile.utcOffsetMinutes;
  const start = parseDateInput(requireQuery(req, 'start'), offset);
  const end = parseDateInput(requireQuery(req, 'end'), offset);
  return createInterval(start, end);
}

/**
 * GET /datasets - catalog of supported datasets
 */
router.get('/', (req, res) => {
  res.json({
    success: true,
    datasets: listDatasets().map((d) => ({
      key: d.key,
      ...d.descriptor,
      description: d.description,
      profile: d.profile,
    })),
    errors: [],
  });
});

/**
 * GET /datasets/:provider/:assetClass/:name/coverage
 */
router.get('/:provider/:assetClass/:name/coverage', async (req, res) => {
  const context = { endpoint: 'datasets/coverage', dataset: datasetKey(req), query: req.query };

  try {
    const dataset = requireDataset(datasetKey(req));
    const symbols = requireQuery(req, 'symbols')
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '');
    if (symbols.length === 0) {
      throw new ValidationError('symbols must name at least one symbol');
    }
    const window = windowFromQuery(req, dataset);

    const report = await new BarsService(getStore()).coverageReport(dataset, symbols, window);
    res.json({ success: true, coverage: report, errors: [] });
  } catch (error) {
    logError('datasets/coverage', error, context);
    res.status(getErrorStatusCode(error)).json({
      success: false,
      errors: [formatErrorForResponse(error)],
    });
  }
});

/**
 * GET /datasets/:provider/:assetClass/:name/bars
 */
router.get('/:provider/:assetClass/:name/bars', async (req, res) => {
  const context = { endpoint: 'datasets/bars', dataset: datasetKey(req), query: req.query };

  try {
    const dataset = requireDataset(datasetKey(req));
    const symbol = requireQuery(req, 'symbol');
    const window = windowFromQuery(req, dataset);
    const limitText = queryString(req, 'limit');
    const limit = limitText === undefined ? undefined : Number(limitText);
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new ValidationError('limit must be a positive integer');
    }

    const bars = await new BarsService(getStore()).readBars(dataset, symbol, window, limit);
    console.log(`[Datasets] ${bars.length} bars for ${symbol} in ${formatInterval(window)}`);
    res.json({ success: true, bars, errors: [] });
  } catch (error) {
    logError('datasets/bars', error, context);
    res.status(getErrorStatusCode(error)).json({
      success: false,
      bars: [],
      errors: [formatErrorForResponse(error)],
    });
  }
});

export default router;
