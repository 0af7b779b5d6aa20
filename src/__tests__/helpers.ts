import type { AnalysisProvider, AnalysisRequest } from '../analysis/provider.js';
import { RetrievalFailureError } from '../core/errors.js';
import type { ChangeRecord, Chunk, FilingId, RawFiling, RiskJudgment, RiskSection } from '../core/types.js';
import type { FilingRetriever } from '../tools/fetcher.js';

export function filingId(company: string, fiscalYear: number): FilingId {
  return { company, cik: '0000000001', fiscalYear, filingDate: `${fiscalYear + 1}-02-01` };
}

export function makeSection(company: string, fiscalYear: number, text: string): RiskSection {
  return {
    id: filingId(company, fiscalYear),
    fiscalYear,
    start: 100,
    end: 100 + text.length,
    text,
    heading: 'Item 1A. Risk Factors',
    endHeading: '1B',
    confidence: 0.95,
  };
}

/** Chunks laid end to end without overlap. */
export function makeChunks(fiscalYear: number, texts: string[]): Chunk[] {
  let offset = 0;
  return texts.map((text, index) => {
    const chunk = { fiscalYear, index, start: offset, end: offset + text.length, text, overlap: 0 };
    offset += text.length;
    return chunk;
  });
}

type Judge = (request: AnalysisRequest) => RiskJudgment | Promise<RiskJudgment>;

export class StubProvider implements AnalysisProvider {
  readonly name = 'stub';
  readonly calls: AnalysisRequest[] = [];

  constructor(private readonly respond: Judge = () => judgment(1, 'Stub change.')) {}

  async judge(request: AnalysisRequest): Promise<RiskJudgment> {
    this.calls.push(request);
    return this.respond(request);
  }
}

export function judgment(severityDelta: number, rationale = '', addedThemes: string[] = []): RiskJudgment {
  return { severityDelta, addedThemes, removedThemes: [], intensifiedThemes: [], rationale };
}

/** Serves filings from an in-memory table keyed by `COMPANY:year`. */
export class StubRetriever implements FilingRetriever {
  readonly calls: string[] = [];
  private readonly failures = new Map<string, RetrievalFailureError[]>();

  constructor(private readonly filings: Record<string, string>) {}

  failNext(company: string, fiscalYear: number, ...errors: RetrievalFailureError[]): void {
    this.failures.set(`${company}:${fiscalYear}`, errors);
  }

  async retrieve(company: string, fiscalYear: number): Promise<RawFiling> {
    const key = `${company}:${fiscalYear}`;
    this.calls.push(key);

    const pending = this.failures.get(key);
    const failure = pending?.shift();
    if (failure) throw failure;

    const content = this.filings[key];
    if (content === undefined) {
      throw new RetrievalFailureError('not_found', `No filing for ${key}`);
    }
    return {
      id: filingId(company, fiscalYear),
      content,
      encoding: 'utf-8',
      contentType: 'html',
      sourceUrl: `https://example.test/${company}/${fiscalYear}.htm`,
    };
  }
}

export function riskFiling(paragraphs: string[]): string {
  return [
    '<html><body>',
    '<p>Item 1. Business</p>',
    '<p>We design, manufacture and sell widgets to industrial customers around the world.</p>',
    '<p>Item 1A. Risk Factors</p>',
    ...paragraphs.map((p) => `<p>${p}</p>`),
    '<p>Item 1B. Unresolved Staff Comments</p>',
    '<p>None.</p>',
    '</body></html>',
  ].join('\n');
}

export function makeRecord(company: string, severityDelta: number | null, overrides: Partial<ChangeRecord> = {}): ChangeRecord {
  const ref = (fiscalYear: number) => ({
    fiscalYear,
    filingDate: `${fiscalYear + 1}-02-01`,
    start: 100,
    end: 1100,
    lengthChars: 1000,
  });
  return {
    company,
    cik: '0000000001',
    priorYear: 2022,
    currentYear: 2023,
    prior: ref(2022),
    current: ref(2023),
    severityDelta,
    baseline: 0,
    aggregation: 'weighted-mean',
    complete: true,
    status: 'complete',
    additions: [],
    removals: [],
    intensified: [],
    rationale: 'No material change between the two risk factor sections.',
    pairs: [],
    factorChanges: [],
    stats: {
      similarity: 0.9,
      priorWordCount: 150,
      currentWordCount: 160,
      wordCountChange: 10,
      priorChunks: 1,
      currentChunks: 1,
      unknownPairs: 0,
      riskFactors: {
        prior: 4,
        current: 5,
        change: 1,
        priorAvgWords: 37.5,
        currentAvgWords: 32,
        added: 1,
        removed: 0,
        modified: 2,
        unchanged: 2,
      },
    },
    ...overrides,
  };
}
