import type { BatchSummary } from '../control-plane/batch.js';
import type { OutcomeStatus } from '../control-plane/types.js';
import type { ChangeRecord } from '../core/types.js';
import type { RunLedger } from '../ledger/types.js';

export type OutputFormat = 'json' | 'md';

export interface OutcomeLine {
  company: string;
  priorYear: number;
  currentYear: number;
  status: OutcomeStatus;
  reason?: string;
}

export interface RunReport {
  runId: string;
  generatedAt: string;
  summary: BatchSummary;
  outcomes: OutcomeLine[];
  records: ChangeRecord[];
  ledger: RunLedger;
}

/** Receives the finished run; ranking and formatting are its concern. */
export interface ReportConsumer {
  consume(report: RunReport): Promise<string[]>;
}
