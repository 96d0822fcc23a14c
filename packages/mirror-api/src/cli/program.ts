/**
 * market-mirror command line
 * Thin wrappers over the orchestrator, the read services and the env file.
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  CONFIG_KEYS,
  ENV_FILE,
  maskValue,
  readEnvFile,
  resetConfig,
  writeEnvValue,
} from '../config.js';
import { listDatasets } from '../providers/index.js';
import { BarsService } from '../services/bars.js';
import { formatInterval, formatTimestamp } from '../services/intervals.js';
import { InstrumentService } from '../services/instruments.js';
import {
  createOrchestrator,
  defaultRunOptions,
  defaultUpdateWindow,
  getStore,
  requireDataset,
} from '../services/mirror.js';
import { consoleProgress } from '../services/progress.js';
import { parseDataRequest } from '../services/requests.js';
import { applySchema } from '../services/store.js';
import { ONE_DAY } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { parseDateInput } from '../utils/time.js';
import type { DataRequestInputType } from '../services/requests.js';
import type { FetchSummary, Interval } from '../types/index.js';

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return n;
}

function symbolList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '');
}

interface FetchFlags {
  symbols?: string[];
  all?: boolean;
  start?: string;
  end?: string;
  at?: string;
  skipWeekends?: boolean;
}

/**
 * Turn CLI flags into the same input shape the HTTP API takes
 */
export function requestInputFromFlags(dataset: string, flags: FetchFlags, defaultTime?: Interval): DataRequestInputType {
  if (flags.all && flags.symbols) {
    throw new ValidationError('Use either --symbols or --all, not both');
  }
  if (!flags.all && !flags.symbols) {
    throw new ValidationError('One of --symbols or --all is required');
  }
  if (flags.at && (flags.start || flags.end)) {
    throw new ValidationError('Use either --at or --start/--end, not both');
  }

  let time: DataRequestInputType['time'];
  if (flags.at) {
    time = { at: flags.at };
  } else if (flags.start && flags.end) {
    time = { start: flags.start, end: flags.end };
  } else if (!flags.start && !flags.end && defaultTime) {
    time = { start: defaultTime.start, end: defaultTime.end };
  } else {
    throw new ValidationError('--start and --end are required (or --at)');
  }

  return {
    dataset,
    time,
    symbols: flags.all ? 'all' : flags.symbols ?? [],
    skipWeekends: flags.skipWeekends,
  };
}

export function formatSummary(summary: FetchSummary): string {
  const lines = [
    `Run ${summary.runId} (${summary.mode}) for ${summary.dataset}`,
    `  Window:   ${summary.window ? formatInterval(summary.window) : '(empty)'}`,
    `  Missing:  ${summary.missingRanges} ranges in ${summary.batches} batches`,
    `  Batches:  ${summary.succeeded} succeeded, ${summary.failed.length} failed${summary.cancelled ? ' (cancelled)' : ''}`,
    `  Rows:     ${summary.recordsFetched} fetched, ${summary.recordsInserted} inserted, ` +
      `${summary.rowsRejected} rejected, ${summary.rowsIgnored} outside batch`,
  ];
  for (const failure of summary.failed) {
    lines.push(`  Failed:   ${failure.batch.symbols.join(',')} ${formatInterval(failure.batch)}: ${failure.error}`);
  }
  return lines.join('\n');
}

function addFetchOptions(command: Command): Command {
  return command
    .option('-s, --symbols <list>', 'comma-separated symbols', symbolList)
    .option('-a, --all', 'every instrument the provider lists')
    .option('--start <date>', 'window start (YYYY-MM-DD, ISO timestamp or epoch ms)')
    .option('--end <date>', 'window end, exclusive')
    .option('--at <date>', 'a single granule starting at this instant')
    .option('--skip-weekends', 'never fetch Saturday/Sunday granules (market-local)')
    .option('--minimum-gap-days <n>', 'join gaps at most this many days apart', positiveInt)
    .option('-c, --concurrency <n>', 'batches in flight at once', positiveInt);
}

interface RunFlags extends FetchFlags {
  minimumGapDays?: number;
  concurrency?: number;
  dryRun?: boolean;
}

async function runFetch(dataset: string, flags: RunFlags, mode: 'download' | 'update'): Promise<void> {
  const input = requestInputFromFlags(
    dataset,
    flags,
    mode === 'update' ? toInterval(defaultUpdateWindow()) : undefined
  );
  const request = parseDataRequest(input);
  const orchestrator = createOrchestrator(request.dataset);
  const minimumGap = (flags.minimumGapDays ?? 0) * ONE_DAY;

  if (flags.dryRun) {
    const plan = await orchestrator.plan(request, minimumGap);
    console.log(`Window:  ${plan.window ? formatInterval(plan.window) : '(empty)'}`);
    console.log(`Symbols: ${plan.symbols.length}`);
    console.log(`Missing: ${plan.missing.length} ranges`);
    for (const batch of plan.batches) {
      console.log(`  ${batch.symbols.join(',')} ${formatInterval(batch)}`);
    }
    return;
  }

  const options = {
    ...defaultRunOptions(),
    progress: consoleProgress,
    minimumGap,
    ...(flags.concurrency ? { concurrency: flags.concurrency } : {}),
  };

  // Ctrl-C stops after the batch in flight
  const controller = new AbortController();
  const onSigint = () => {
    console.log('\nStopping after the current batch...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const summary =
      mode === 'download'
        ? await orchestrator.download(request, { ...options, signal: controller.signal })
        : await orchestrator.update(request, { ...options, signal: controller.signal });
    console.log(formatSummary(summary));
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

function toInterval(time: ReturnType<typeof defaultUpdateWindow>): Interval | undefined {
  return time.kind === 'window' ? { start: time.start, end: time.end } : undefined;
}

function windowFromFlags(flags: { start?: string; end?: string }, utcOffsetMinutes: number): Interval {
  if (!flags.start || !flags.end) {
    throw new ValidationError('--start and --end are required');
  }
  return {
    start: parseDateInput(flags.start, utcOffsetMinutes),
    end: parseDateInput(flags.end, utcOffsetMinutes),
  };
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('market-mirror')
    .description('Incrementally mirror market data into PostgreSQL')
    .version('0.1.0');

  program
    .command('datasets')
    .description('list supported datasets')
    .action(() => {
      for (const dataset of listDatasets()) {
        console.log(`${dataset.key.padEnd(24)} ${dataset.description}`);
      }
    });

  addFetchOptions(
    program
      .command('download')
      .description('fetch everything missing in a window; stops at the first failed batch')
      .argument('<dataset>', 'dataset key, e.g. tushare/stock/daily')
      .option('--dry-run', 'print the planned batches without fetching')
  ).action((dataset: string, flags: RunFlags) => runFetch(dataset, flags, 'download'));

  addFetchOptions(
    program
      .command('update')
      .description('fetch recent missing data, skipping batches that fail (defaults to --all over the lookback window)')
      .argument('<dataset>', 'dataset key, e.g. tushare/stock/daily')
      .option('--dry-run', 'print the planned batches without fetching')
  ).action((dataset: string, flags: RunFlags) =>
    runFetch(dataset, { ...flags, all: flags.all ?? !flags.symbols }, 'update')
  );

  program
    .command('instruments')
    .description('list (or refresh) the instruments behind a dataset')
    .argument('<dataset>', 'dataset key')
    .option('--refresh', 'pull the list from the provider first')
    .action(async (key: string, flags: { refresh?: boolean }) => {
      const dataset = requireDataset(key);
      const service = new InstrumentService(getStore());
      if (flags.refresh) {
        await service.refresh(createOrchestrator(key).provider);
      }
      const instruments = await service.list(dataset.descriptor.provider, dataset.descriptor.assetClass);
      for (const i of instruments) {
        console.log(`${i.symbol.padEnd(12)} ${(i.exchange ?? '').padEnd(8)} ${i.name ?? ''}`);
      }
      console.log(`${instruments.length} instruments`);
    });

  program
    .command('coverage')
    .description('show stored and missing ranges per symbol')
    .argument('<dataset>', 'dataset key')
    .requiredOption('-s, --symbols <list>', 'comma-separated symbols', symbolList)
    .option('--start <date>', 'window start')
    .option('--end <date>', 'window end, exclusive')
    .action(async (key: string, flags: { symbols: string[]; start?: string; end?: string }) => {
      const dataset = requireDataset(key);
      const window = windowFromFlags(flags, dataset.profile.utcOffsetMinutes);
      const report = await new BarsService(getStore()).coverageReport(dataset, flags.symbols, window);
      for (const entry of report.symbols) {
        console.log(entry.symbol);
        for (const interval of entry.covered) console.log(`  covered ${formatInterval(interval)}`);
        for (const interval of entry.missing) console.log(`  missing ${formatInterval(interval)}`);
      }
    });

  program
    .command('show')
    .description('print stored bars for one symbol')
    .argument('<dataset>', 'dataset key')
    .argument('<symbol>', 'symbol')
    .option('--start <date>', 'window start')
    .option('--end <date>', 'window end, exclusive')
    .option('-n, --limit <n>', 'maximum rows', positiveInt, 100)
    .action(async (key: string, symbol: string, flags: { start?: string; end?: string; limit: number }) => {
      const dataset = requireDataset(key);
      const window = windowFromFlags(flags, dataset.profile.utcOffsetMinutes);
      const bars = await new BarsService(getStore()).readBars(dataset, symbol, window, flags.limit);
      for (const bar of bars) {
        console.log(
          [formatTimestamp(bar.start), bar.open, bar.high, bar.low, bar.close, bar.volume].join('\t')
        );
      }
      console.log(`${bars.length} bars`);
    });

  const config = program.command('config').description('read and write settings in the env file');

  config
    .command('list')
    .description('show every setting (secrets masked)')
    .option('-f, --file <path>', 'env file', ENV_FILE)
    .action((flags: { file: string }) => {
      const values = readEnvFile(flags.file);
      for (const key of CONFIG_KEYS) {
        console.log(`${key}=${maskValue(key, values[key])}`);
      }
    });

  config
    .command('get')
    .argument('<key>', 'setting name')
    .option('-f, --file <path>', 'env file', ENV_FILE)
    .action((key: string, flags: { file: string }) => {
      const value = readEnvFile(flags.file)[key];
      console.log(value === undefined ? '(not set)' : value);
    });

  config
    .command('set')
    .argument('<key>', 'setting name')
    .argument('<value>', 'new value')
    .option('-f, --file <path>', 'env file', ENV_FILE)
    .action((key: string, value: string, flags: { file: string }) => {
      writeEnvValue(key, value, flags.file);
      resetConfig();
      console.log(`${key}=${maskValue(key, value)}`);
    });

  program
    .command('reset')
    .description('drop and recreate every table (destroys all mirrored data)')
    .option('--yes', 'confirm')
    .action(async (flags: { yes?: boolean }) => {
      if (!flags.yes) {
        throw new ValidationError('reset destroys all mirrored data; pass --yes to confirm');
      }
      await applySchema();
      console.log('Database reset');
    });

  return program;
}
