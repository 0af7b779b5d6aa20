import type { Logger } from 'pino';
import type { ChunkOptions } from '../analysis/chunker.js';
import type { AnalysisProvider } from '../analysis/provider.js';
import type { Rubric } from '../analysis/rubric.js';
import type {
  AggregationRule,
  ChangeRecord,
  Chunk,
  NormalizedDocument,
  RawFiling,
  RiskSection,
} from '../core/types.js';
import type { StageCache } from '../tools/cache.js';
import type { FilingRetriever } from '../tools/fetcher.js';

export type StageName = 'retrieve' | 'normalize' | 'locate' | 'chunk' | 'score';

export type StageStatus = 'passed' | 'cached' | 'failed' | 'skipped';

export interface StageResult {
  name: StageName;
  status: StageStatus;
  durationMs: number;
  error?: string;
}

export interface CompanyRequest {
  company: string;
  priorYear: number;
  currentYear: number;
}

export interface PipelineDeps {
  retriever: FilingRetriever;
  provider: AnalysisProvider;
  cache?: StageCache;
  logger?: Logger;
}

export interface PipelineOptions {
  chunk: ChunkOptions;
  aggregation: AggregationRule;
  /** Ceiling on concurrent analysis calls within one company. */
  analysisConcurrency: number;
  rubric?: Rubric;
  signal?: AbortSignal;
}

/** Per-year intermediate state. Absent fields have not been produced yet. */
export interface YearState {
  fiscalYear: number;
  raw?: RawFiling;
  document?: NormalizedDocument;
  section?: RiskSection;
  chunks?: Chunk[];
}

export interface PipelineContext {
  request: CompanyRequest;
  deps: PipelineDeps;
  options: PipelineOptions;
  log: Logger;
  prior: YearState;
  current: YearState;
  /** Year being processed when a stage fails; used to attribute the outcome. */
  activeYear: number | null;
  record?: ChangeRecord;
}

export interface PipelineStage {
  name: StageName;
  /** Resolves to `cached` when every year's output came from the cache. */
  execute: (ctx: PipelineContext) => Promise<'passed' | 'cached'>;
}

interface OutcomeBase {
  company: string;
  priorYear: number;
  currentYear: number;
  stages: StageResult[];
  durationMs: number;
}

export type CompanyOutcome =
  | (OutcomeBase & { status: 'success'; record: ChangeRecord })
  | (OutcomeBase & { status: 'skipped-no-section'; reason: string; fiscalYear: number })
  | (OutcomeBase & { status: 'skipped-retrieval'; reason: string; retryable: boolean })
  | (OutcomeBase & { status: 'failed-malformed'; reason: string; fiscalYear: number })
  | (OutcomeBase & { status: 'failed-error'; reason: string });

export type OutcomeStatus = CompanyOutcome['status'];
