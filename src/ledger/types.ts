import type { OutcomeStatus, StageName, StageStatus } from '../control-plane/types.js';
import type { AggregationRule } from '../core/types.js';

export interface LedgerStage {
  status: StageStatus;
  durationMs: number;
  error?: string;
}

export interface LedgerEntry {
  company: string;
  priorYear: number;
  currentYear: number;
  status: OutcomeStatus;
  attempts: number;
  durationMs: number;
  stages: Partial<Record<StageName, LedgerStage>>;
  reason?: string;
  recordStatus?: 'complete' | 'partial';
}

export interface RunSettings {
  provider: string;
  aggregation: AggregationRule;
  maxChars: number;
  overlapChars: number;
  analysisConcurrency: number;
  batchConcurrency: number;
  cache: boolean;
}

export interface RunLedger {
  runId: string;
  startedAt: string;
  finishedAt: string;
  pipeline: StageName[];
  settings: RunSettings;
  entries: LedgerEntry[];
  summary: {
    total: number;
    success: number;
    partial: number;
    skipped: number;
    failed: number;
  };
}
