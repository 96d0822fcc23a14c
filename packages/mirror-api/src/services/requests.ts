/**
 * DataRequest parsing
 * HTTP bodies, CLI flags and queued job payloads all pass through here once;
 * everything downstream works with the validated DataRequest.
 */

import { z } from 'zod';
import { findDataset } from '../providers/index.js';
import { parseDateInput } from '../utils/time.js';
import { ValidationError } from '../utils/errors.js';
import type { DataRequest, SymbolScope, TimeSelector } from '../types/index.js';

const instant = z.union([z.number(), z.string().min(1)]);

const TimeSelectorInput = z.union([
  z.object({ start: instant, end: instant }).strict(),
  z.object({ at: instant }).strict(),
]);

export const DataRequestInput = z.object({
  dataset: z.string().min(1),
  time: TimeSelectorInput,
  /** "all", or a non-empty symbol list */
  symbols: z.union([z.literal('all'), z.array(z.string().min(1)).min(1)]),
  skipWeekends: z.boolean().optional(),
});

export type DataRequestInputType = z.input<typeof DataRequestInput>;

/**
 * Validate raw input and resolve it against the dataset catalog.
 * Calendar dates are read as market-local midnights.
 */
export function parseDataRequest(input: unknown): DataRequest {
  const parsed = DataRequestInput.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'request'}: ${i.message}`);
    throw new ValidationError(`Invalid data request: ${issues.join('; ')}`);
  }

  const { dataset: key, time, symbols, skipWeekends } = parsed.data;
  const dataset = findDataset(key);
  if (!dataset) {
    throw new ValidationError(`Unknown dataset: ${key}`);
  }
  const offset = dataset.profile.utcOffsetMinutes;

  const selector: TimeSelector =
    'at' in time
      ? { kind: 'timestamp', at: parseDateInput(time.at, offset) }
      : { kind: 'window', start: parseDateInput(time.start, offset), end: parseDateInput(time.end, offset) };

  const scope: SymbolScope = symbols === 'all' ? { kind: 'all' } : { kind: 'symbols', symbols };

  return { dataset: key, time: selector, scope, skipWeekends };
}

/**
 * Inverse of parseDataRequest, for queue payloads
 */
export function serializeDataRequest(request: DataRequest): DataRequestInputType {
  return {
    dataset: request.dataset,
    time:
      request.time.kind === 'timestamp'
        ? { at: request.time.at }
        : { start: request.time.start, end: request.time.end },
    symbols: request.scope.kind === 'all' ? 'all' : request.scope.symbols,
    skipWeekends: request.skipWeekends,
  };
}
