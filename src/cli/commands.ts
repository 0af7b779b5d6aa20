import { Command, InvalidArgumentError } from 'commander';
import { resolveChunkOptions, type ChunkOptions } from '../analysis/chunker.js';
import type { AnalysisProvider } from '../analysis/provider.js';
import { loadConfig, type AppConfig } from '../config/config.js';
import { runBatch, type BatchResult } from '../control-plane/batch.js';
import type { CompanyRequest } from '../control-plane/types.js';
import { ConfigError, errorMessage } from '../core/errors.js';
import type { AggregationRule } from '../core/types.js';
import { buildLedger } from '../ledger/ledger.js';
import { LexicalAnalysisProvider } from '../providers/lexical.js';
import { OpenAIAnalysisProvider, OpenAICompletionClient } from '../providers/openai.js';
import type { OutputFormat, RunReport } from '../report/types.js';
import { FileReportWriter } from '../report/writer.js';
import { FileStageCache } from '../tools/cache.js';
import { EdgarRetriever } from '../tools/fetcher.js';
import { generateRunId } from '../utils/id.js';
import { logger } from '../utils/logger.js';

interface SharedFlags {
  years?: number[];
  format: OutputFormat;
  out: string;
  cache: boolean;
  aggregation?: AggregationRule;
  maxChunk?: number;
  overlap?: number;
  concurrency?: number;
  model?: string;
  dryRun?: boolean;
}

interface CompareFlags extends SharedFlags {
  ticker: string;
}

interface BatchFlags extends SharedFlags {
  tickers: string[];
  batchConcurrency?: number;
}

export function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export function parseYears(value: string): number[] {
  const years = value.split(',').map((s) => s.trim()).filter(Boolean).map(Number);
  if (years.some((y) => !Number.isInteger(y) || y < 1993 || y > 2100)) {
    throw new InvalidArgumentError('Years must be four-digit fiscal years, e.g. 2022,2023.');
  }
  const unique = [...new Set(years)].sort((a, b) => a - b);
  if (unique.length < 2) {
    throw new InvalidArgumentError('At least two distinct years are required.');
  }
  return unique;
}

export function parseTickers(value: string): string[] {
  const tickers = [...new Set(value.split(',').map((s) => s.trim().toUpperCase()).filter(Boolean))];
  if (tickers.length === 0) throw new InvalidArgumentError('At least one ticker is required.');
  return tickers;
}

function parseFormat(value: string): OutputFormat {
  if (value !== 'json' && value !== 'md') throw new InvalidArgumentError('Format must be json or md.');
  return value;
}

function parseAggregation(value: string): AggregationRule {
  if (value !== 'weighted-mean' && value !== 'max-severity') {
    throw new InvalidArgumentError('Aggregation must be weighted-mean or max-severity.');
  }
  return value;
}

/**
 * The `count` most recent fiscal years. A fiscal year's 10-K is filed in the
 * following calendar year, so the latest one considered is last year.
 */
export function defaultYears(count: number, now: Date = new Date()): number[] {
  const latest = now.getUTCFullYear() - 1;
  return Array.from({ length: count }, (_, i) => latest - count + 1 + i);
}

/** Consecutive year pairs for every company: 2021,2022,2023 gives 2021→2022 and 2022→2023. */
export function buildRequests(companies: readonly string[], years: readonly number[]): CompanyRequest[] {
  const requests: CompanyRequest[] = [];
  for (const company of companies) {
    for (let i = 1; i < years.length; i++) {
      requests.push({ company, priorYear: years[i - 1], currentYear: years[i] });
    }
  }
  return requests;
}

function buildProvider(config: AppConfig, flags: SharedFlags): AnalysisProvider {
  if (flags.dryRun) return new LexicalAnalysisProvider();

  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new ConfigError('OPENAI_API_KEY is not set. Set it in .env or pass --dry-run.');
  }
  return new OpenAIAnalysisProvider(
    new OpenAICompletionClient({
      apiKey,
      model: flags.model ?? config.openai.model,
      temperature: config.openai.temperature,
      timeoutMs: config.openai.timeoutMs,
    })
  );
}

function chunkOptions(config: AppConfig, flags: SharedFlags): ChunkOptions {
  const options = {
    maxChars: flags.maxChunk ?? config.chunk.maxChars,
    overlapChars: flags.overlap ?? config.chunk.overlapChars,
  };
  try {
    resolveChunkOptions(options);
  } catch (err) {
    throw new ConfigError(`Invalid chunk settings: ${errorMessage(err)}`);
  }
  return options;
}

function printSummary(result: BatchResult, paths: string[]): void {
  const { summary } = result;
  console.log(
    `\n[riskdrift] run=${result.runId} total=${summary.total} complete=${summary.success} partial=${summary.partial} skipped=${summary.skipped} failed=${summary.failed}`
  );
  for (const f of summary.failures) {
    console.log(`  [${f.status}] ${f.company}: ${f.reason}`);
  }
  for (const path of paths) {
    console.log(`[riskdrift] wrote ${path}`);
  }
}

export async function runAnalysis(
  companies: readonly string[],
  flags: SharedFlags,
  batchConcurrency?: number
): Promise<BatchResult> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const provider = buildProvider(config, flags);
  const chunk = chunkOptions(config, flags);
  const aggregation = flags.aggregation ?? config.aggregation;
  const analysisConcurrency = flags.concurrency ?? config.analysisConcurrency;
  const poolSize = batchConcurrency ?? config.batchConcurrency;
  if (analysisConcurrency < 1 || poolSize < 1) {
    throw new ConfigError('Concurrency limits must be at least 1.');
  }

  const years = flags.years ?? defaultYears(config.compareYears);
  const requests = buildRequests(companies, years);
  const runId = generateRunId();

  console.log(`\n[riskdrift] run=${runId} provider=${provider.name} aggregation=${aggregation}`);
  console.log(`[riskdrift] companies=${companies.join(',')} years=${years.join(',')} pairs=${requests.length}\n`);

  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error('[riskdrift] interrupt received, cancelling pending work');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  let result: BatchResult;
  try {
    result = await runBatch(
      requests,
      {
        retriever: new EdgarRetriever({
          userAgent: config.sec.userAgent,
          rateLimitMs: config.sec.rateLimitMs,
          timeoutMs: config.sec.timeoutMs,
        }),
        provider,
        cache: flags.cache ? new FileStageCache(config.cacheDir) : undefined,
      },
      {
        runId,
        chunk,
        aggregation,
        analysisConcurrency,
        batchConcurrency: poolSize,
        retryAttempts: config.retry.attempts,
        retryDelayMs: config.retry.delayMs,
        signal: controller.signal,
      }
    );
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  const report: RunReport = {
    runId: result.runId,
    generatedAt: result.finishedAt,
    summary: result.summary,
    outcomes: result.outcomes.map((o) => ({
      company: o.company,
      priorYear: o.priorYear,
      currentYear: o.currentYear,
      status: o.status,
      ...(o.status === 'success' ? {} : { reason: o.reason }),
    })),
    records: result.records,
    ledger: buildLedger(result, {
      provider: provider.name,
      aggregation,
      maxChars: chunk.maxChars,
      overlapChars: chunk.overlapChars,
      analysisConcurrency,
      batchConcurrency: poolSize,
      cache: flags.cache,
    }),
  };

  const paths = await new FileReportWriter(flags.out, flags.format).consume(report);
  printSummary(result, paths);
  return result;
}

function addSharedOptions(command: Command): Command {
  return command
    .option(
      '--years <list>',
      'Fiscal years to compare, comma-separated (default: the latest COMPARE_YEARS years)',
      parseYears
    )
    .option('--format <format>', 'Report format: json or md', parseFormat, 'json')
    .option('--out <path>', 'Output directory', './out')
    .option('--no-cache', 'Disable the normalized/section cache')
    .option('--aggregation <rule>', 'Severity aggregation: weighted-mean or max-severity', parseAggregation)
    .option('--max-chunk <n>', 'Maximum chunk length in characters', parseCount)
    .option('--overlap <n>', 'Characters repeated between consecutive chunks', parseCount)
    .option('--concurrency <n>', 'Concurrent analysis calls per company', parseCount)
    .option('--model <model>', 'OpenAI model (overrides OPENAI_MODEL)')
    .option('--dry-run', 'Use the local lexical judge instead of OpenAI');
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('riskdrift')
    .description(
      'Year-over-year drift in 10-K "Item 1A. Risk Factors" sections.\n\n' +
        'Fetches filings from SEC EDGAR, isolates the risk factor section, and scores how\n' +
        'the disclosed risk profile changed between fiscal years.'
    )
    .version('0.1.0');

  addSharedOptions(
    program
      .command('compare')
      .description('Compare risk factors for one company')
      .requiredOption('--ticker <string>', 'Company ticker or CIK (e.g. AAPL)')
  ).action(async (opts: CompareFlags) => {
    await runAnalysis([opts.ticker.toUpperCase()], opts);
  });

  addSharedOptions(
    program
      .command('batch')
      .description('Compare risk factors for many companies')
      .requiredOption('--tickers <list>', 'Comma-separated tickers or CIKs', parseTickers)
      .option('--batch-concurrency <n>', 'Companies processed in parallel', parseCount)
  ).action(async (opts: BatchFlags) => {
    await runAnalysis(opts.tickers, opts, opts.batchConcurrency);
  });

  return program;
}
