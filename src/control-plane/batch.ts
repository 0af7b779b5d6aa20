import { setTimeout as sleep } from 'node:timers/promises';
import pLimit from 'p-limit';
import type { ChangeRecord } from '../core/types.js';
import { generateRunId } from '../utils/id.js';
import { createChildLogger } from '../utils/logger.js';
import { runCompany } from './orchestrator.js';
import type {
  CompanyOutcome,
  CompanyRequest,
  OutcomeStatus,
  PipelineDeps,
  PipelineOptions,
} from './types.js';

export interface BatchOptions extends PipelineOptions {
  batchConcurrency: number;
  /** Extra attempts for retryable retrieval failures. */
  retryAttempts: number;
  /** Base backoff; attempt n waits `retryDelayMs * n`. */
  retryDelayMs: number;
  runId?: string;
}

export type BatchOutcome = CompanyOutcome & { attempts: number };

export interface BatchSummary {
  total: number;
  success: number;
  partial: number;
  skipped: number;
  failed: number;
  byStatus: Record<OutcomeStatus, number>;
  failures: Array<{ company: string; status: OutcomeStatus; reason: string }>;
}

export interface BatchResult {
  runId: string;
  startedAt: string;
  finishedAt: string;
  outcomes: BatchOutcome[];
  records: ChangeRecord[];
  summary: BatchSummary;
}

const log = createChildLogger('batch');

async function runWithRetry(
  request: CompanyRequest,
  deps: PipelineDeps,
  options: BatchOptions
): Promise<BatchOutcome> {
  const { signal } = options;
  for (let attempt = 1; ; attempt++) {
    const outcome = await runCompany(request, deps, options);
    const retry =
      outcome.status === 'skipped-retrieval' &&
      outcome.retryable &&
      attempt <= options.retryAttempts &&
      !signal?.aborted;
    if (!retry) return { ...outcome, attempts: attempt };

    const delay = options.retryDelayMs * attempt;
    log.info({ company: request.company, attempt, delay, reason: outcome.reason }, 'retrying after retrieval failure');
    try {
      await sleep(delay, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) return { ...outcome, attempts: attempt };
      throw err;
    }
  }
}

function cancelledOutcome(request: CompanyRequest): BatchOutcome {
  return {
    company: request.company,
    priorYear: request.priorYear,
    currentYear: request.currentYear,
    stages: [],
    durationMs: 0,
    status: 'failed-error',
    reason: 'Batch cancelled before this company started',
    attempts: 0,
  };
}

/**
 * Runs every request through the pipeline under a bounded pool. Individual
 * failures never reject the batch; they show up in the outcomes and summary.
 */
export async function runBatch(
  requests: readonly CompanyRequest[],
  deps: PipelineDeps,
  options: BatchOptions
): Promise<BatchResult> {
  const runId = options.runId ?? generateRunId();
  const startedAt = new Date().toISOString();
  const limit = pLimit(Math.max(1, options.batchConcurrency));

  log.info({ runId, companies: requests.length, concurrency: options.batchConcurrency }, 'batch started');

  const outcomes = await Promise.all(
    requests.map((request) =>
      limit(async () => {
        if (options.signal?.aborted) return cancelledOutcome(request);
        return runWithRetry(request, deps, options);
      })
    )
  );

  const records = outcomes.flatMap((o) => (o.status === 'success' ? [o.record] : []));
  const summary = summarizeOutcomes(outcomes);
  log.info({ runId, ...summary, failures: summary.failures.length }, 'batch finished');

  return { runId, startedAt, finishedAt: new Date().toISOString(), outcomes, records, summary };
}

export function summarizeOutcomes(outcomes: readonly CompanyOutcome[]): BatchSummary {
  const byStatus: Record<OutcomeStatus, number> = {
    success: 0,
    'skipped-no-section': 0,
    'skipped-retrieval': 0,
    'failed-malformed': 0,
    'failed-error': 0,
  };
  const summary: BatchSummary = {
    total: outcomes.length,
    success: 0,
    partial: 0,
    skipped: 0,
    failed: 0,
    byStatus,
    failures: [],
  };

  for (const outcome of outcomes) {
    byStatus[outcome.status]++;
    switch (outcome.status) {
      case 'success':
        if (outcome.record.complete) summary.success++;
        else summary.partial++;
        break;
      case 'skipped-no-section':
      case 'skipped-retrieval':
        summary.skipped++;
        summary.failures.push({ company: outcome.company, status: outcome.status, reason: outcome.reason });
        break;
      case 'failed-malformed':
      case 'failed-error':
        summary.failed++;
        summary.failures.push({ company: outcome.company, status: outcome.status, reason: outcome.reason });
        break;
    }
  }

  return summary;
}
