import type { BatchOutcome, BatchResult } from '../control-plane/batch.js';
import type { StageName } from '../control-plane/types.js';
import type { LedgerEntry, LedgerStage, RunLedger, RunSettings } from './types.js';

export const PIPELINE_STAGES: StageName[] = ['retrieve', 'normalize', 'locate', 'chunk', 'score'];

function ledgerEntry(outcome: BatchOutcome): LedgerEntry {
  const stages: Partial<Record<StageName, LedgerStage>> = {};
  for (const result of outcome.stages) {
    stages[result.name] = {
      status: result.status,
      durationMs: result.durationMs,
      ...(result.error ? { error: result.error } : {}),
    };
  }

  const entry: LedgerEntry = {
    company: outcome.company,
    priorYear: outcome.priorYear,
    currentYear: outcome.currentYear,
    status: outcome.status,
    attempts: outcome.attempts,
    durationMs: outcome.durationMs,
    stages,
  };
  if (outcome.status === 'success') entry.recordStatus = outcome.record.status;
  else entry.reason = outcome.reason;
  return entry;
}

export function buildLedger(result: BatchResult, settings: RunSettings): RunLedger {
  const { total, success, partial, skipped, failed } = result.summary;
  return {
    runId: result.runId,
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    pipeline: PIPELINE_STAGES,
    settings,
    entries: result.outcomes.map(ledgerEntry),
    summary: { total, success, partial, skipped, failed },
  };
}
