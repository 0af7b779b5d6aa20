export * from './core/types.js';
export * from './core/errors.js';
export { parseDocument, parseSection, serializeDocument, serializeSection } from './core/serialize.js';
export { normalizeFiling, normalizeText, PARAGRAPH_SEPARATOR } from './tools/normalizer.js';
export { findItemHeadings, locateRiskSection, parseItemHeading, type ItemHeading } from './analysis/locator.js';
export { chunkSection, chunkText, reconstructSection, type ChunkOptions } from './analysis/chunker.js';
export { alignChunks, wordJaccard, type AlignedPair } from './analysis/aligner.js';
export { aggregateSeverity, scoreChanges, scoreChunks, type ScoreOptions } from './analysis/scorer.js';
export {
  FACTOR_MATCH_THRESHOLD,
  firstSentence,
  matchRiskFactors,
  segmentRiskFactors,
  summarizeFactorChanges,
} from './analysis/segmenter.js';
export { DEFAULT_RUBRIC, RISK_THEMES, parseJudgment, type Rubric, type SeverityScale } from './analysis/rubric.js';
export type { AnalysisProvider, AnalysisRequest } from './analysis/provider.js';
export { LexicalAnalysisProvider } from './providers/lexical.js';
export { OpenAIAnalysisProvider, OpenAICompletionClient, type CompletionClient } from './providers/openai.js';
export { EdgarRetriever, type EdgarOptions, type FilingRetriever } from './tools/fetcher.js';
export { FileStageCache, MemoryStageCache, type StageCache, type StageKey } from './tools/cache.js';
export { runCompany } from './control-plane/orchestrator.js';
export { runBatch, summarizeOutcomes, type BatchOptions, type BatchResult, type BatchSummary } from './control-plane/batch.js';
export type { CompanyOutcome, CompanyRequest, PipelineDeps, PipelineOptions } from './control-plane/types.js';
export { buildLedger } from './ledger/ledger.js';
export type { RunLedger } from './ledger/types.js';
export { FileReportWriter } from './report/writer.js';
export { rankRecords, renderMarkdown } from './report/markdown.js';
export type { ReportConsumer, RunReport } from './report/types.js';
export { loadConfig, type AppConfig } from './config/config.js';
