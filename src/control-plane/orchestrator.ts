import {
  MalformedDocumentError,
  RetrievalFailureError,
  SectionNotFoundError,
  errorMessage,
} from '../core/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { StageTimer } from '../utils/timer.js';
import { buildPipeline } from './workflow.js';
import type {
  CompanyOutcome,
  CompanyRequest,
  PipelineContext,
  PipelineDeps,
  PipelineOptions,
  StageResult,
} from './types.js';

/**
 * Drives one company/year-pair through the pipeline. Never rejects: every
 * failure, including cancellation, becomes a typed outcome.
 */
export async function runCompany(
  request: CompanyRequest,
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<CompanyOutcome> {
  const log = (deps.logger ?? createChildLogger('orchestrator')).child({
    company: request.company,
    priorYear: request.priorYear,
    currentYear: request.currentYear,
  });

  const ctx: PipelineContext = {
    request,
    deps,
    options,
    log,
    prior: { fiscalYear: request.priorYear },
    current: { fiscalYear: request.currentYear },
    activeYear: null,
  };

  const stages: StageResult[] = [];
  const total = new StageTimer();
  const timer = new StageTimer();
  let failure: unknown = null;

  for (const stage of buildPipeline()) {
    if (failure !== null) {
      stages.push({ name: stage.name, status: 'skipped', durationMs: 0 });
      continue;
    }

    timer.begin();
    try {
      options.signal?.throwIfAborted();
      const status = await stage.execute(ctx);
      const durationMs = timer.elapsedMs();
      stages.push({ name: stage.name, status, durationMs });
      log.debug({ stage: stage.name, status, durationMs }, 'stage finished');
    } catch (err) {
      failure = err;
      const durationMs = timer.elapsedMs();
      stages.push({ name: stage.name, status: 'failed', durationMs, error: errorMessage(err) });
      log.warn({ stage: stage.name, durationMs, err: errorMessage(err) }, 'stage failed');
    }
  }

  const base = {
    company: request.company,
    priorYear: request.priorYear,
    currentYear: request.currentYear,
    stages,
    durationMs: total.elapsedMs(),
  };

  if (failure === null) {
    if (ctx.record) {
      log.info(
        { severityDelta: ctx.record.severityDelta, status: ctx.record.status, durationMs: base.durationMs },
        'comparison complete'
      );
      return { ...base, status: 'success', record: ctx.record };
    }
    return { ...base, status: 'failed-error', reason: 'Pipeline finished without a change record' };
  }

  const fiscalYear = ctx.activeYear ?? request.currentYear;
  const reason = errorMessage(failure);

  if (failure instanceof SectionNotFoundError) {
    return { ...base, status: 'skipped-no-section', reason, fiscalYear };
  }
  if (failure instanceof RetrievalFailureError) {
    return { ...base, status: 'skipped-retrieval', reason, retryable: failure.retryable };
  }
  if (failure instanceof MalformedDocumentError) {
    return { ...base, status: 'failed-malformed', reason, fiscalYear };
  }
  log.error({ err: failure }, 'unexpected pipeline failure');
  return { ...base, status: 'failed-error', reason };
}
