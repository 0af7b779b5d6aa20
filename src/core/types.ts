export type ContentType = 'html' | 'text';

export interface FilingId {
  /** Identifier the caller asked for: a ticker or a CIK. */
  company: string;
  cik: string;
  fiscalYear: number;
  filingDate: string;
  accessionNumber?: string;
}

export interface RawFiling {
  readonly id: FilingId;
  readonly content: string | Uint8Array;
  readonly encoding: string;
  readonly contentType: ContentType;
  readonly sourceUrl: string;
}

export interface ParagraphSpan {
  start: number;
  end: number;
}

export interface NormalizedDocument {
  readonly id: FilingId;
  readonly text: string;
  readonly paragraphs: readonly ParagraphSpan[];
}

export interface RiskSection {
  readonly id: FilingId;
  readonly fiscalYear: number;
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly heading: string;
  /** Item code of the heading that closed the section, or null at document end. */
  readonly endHeading: string | null;
  readonly confidence: number;
}

export interface Chunk {
  readonly fiscalYear: number;
  readonly index: number;
  /** Offsets into the section text; `start` includes the overlap prefix. */
  readonly start: number;
  readonly end: number;
  readonly text: string;
  /** Length of the prefix repeated from the previous chunk. */
  readonly overlap: number;
}

export interface RiskJudgment {
  severityDelta: number;
  addedThemes: string[];
  removedThemes: string[];
  intensifiedThemes: string[];
  rationale: string;
}

export type PairStatus = 'judged' | 'unchanged' | 'unknown';

export interface PairResult {
  index: number;
  priorChunk: number | null;
  currentChunk: number | null;
  similarity: number;
  weight: number;
  status: PairStatus;
  judgment?: RiskJudgment;
  error?: string;
}

export type AggregationRule = 'weighted-mean' | 'max-severity';

export interface SectionRef {
  fiscalYear: number;
  filingDate: string;
  accessionNumber?: string;
  start: number;
  end: number;
  lengthChars: number;
}

/** One risk factor inside Item 1A: a sub-heading and the paragraphs under it. */
export interface RiskFactor {
  index: number;
  /** Offsets into the section text. */
  start: number;
  end: number;
  title: string;
  /** First sentence of the factor's body. */
  summary: string;
  wordCount: number;
  text: string;
}

export type RiskFactorChangeType = 'added' | 'removed' | 'modified' | 'unchanged';

export interface RiskFactorChange {
  type: RiskFactorChangeType;
  priorIndex: number | null;
  currentIndex: number | null;
  /** Current-year title, or the prior-year title for a removed factor. */
  title: string;
  similarity: number;
  wordCountChange: number;
}

export interface RiskFactorStats {
  prior: number;
  current: number;
  change: number;
  priorAvgWords: number;
  currentAvgWords: number;
  added: number;
  removed: number;
  modified: number;
  unchanged: number;
}

export interface ComparisonStats {
  similarity: number;
  priorWordCount: number;
  currentWordCount: number;
  wordCountChange: number;
  priorChunks: number;
  currentChunks: number;
  unknownPairs: number;
  riskFactors: RiskFactorStats;
}

export interface ChangeRecord {
  company: string;
  cik: string;
  priorYear: number;
  currentYear: number;
  prior: SectionRef;
  current: SectionRef;
  severityDelta: number | null;
  baseline: number;
  aggregation: AggregationRule;
  complete: boolean;
  status: 'complete' | 'partial';
  additions: string[];
  removals: string[];
  intensified: string[];
  rationale: string;
  pairs: PairResult[];
  factorChanges: RiskFactorChange[];
  stats: ComparisonStats;
}
