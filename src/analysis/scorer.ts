import pLimit from 'p-limit';
import type { Logger } from 'pino';
import { AnalysisUnavailableError, errorMessage } from '../core/errors.js';
import type {
  AggregationRule,
  ChangeRecord,
  Chunk,
  PairResult,
  RiskJudgment,
  RiskSection,
  SectionRef,
} from '../core/types.js';
import { createChildLogger } from '../utils/logger.js';
import { alignChunks, wordJaccard, type AlignedPair } from './aligner.js';
import { chunkSection, type ChunkOptions } from './chunker.js';
import type { AnalysisProvider } from './provider.js';
import { DEFAULT_RUBRIC, normalizeThemes, parseJudgment, type Rubric } from './rubric.js';
import { matchRiskFactors, segmentRiskFactors, summarizeFactorChanges } from './segmenter.js';

export interface ScoreOptions {
  provider: AnalysisProvider;
  chunk: ChunkOptions;
  rubric?: Rubric;
  aggregation?: AggregationRule;
  /** Ceiling on concurrent provider calls for one company. */
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

const DEFAULT_CONCURRENCY = 4;
const MAX_RATIONALES = 3;

export async function scoreChanges(
  prior: RiskSection,
  current: RiskSection,
  options: ScoreOptions
): Promise<ChangeRecord> {
  const priorChunks = [...chunkSection(prior, options.chunk)];
  const currentChunks = [...chunkSection(current, options.chunk)];
  return scoreChunks(prior, current, priorChunks, currentChunks, options);
}

/** Scores sections whose chunks were already produced by the chunker. */
export async function scoreChunks(
  prior: RiskSection,
  current: RiskSection,
  priorChunks: readonly Chunk[],
  currentChunks: readonly Chunk[],
  options: ScoreOptions
): Promise<ChangeRecord> {
  const rubric = options.rubric ?? DEFAULT_RUBRIC;
  const aggregation = options.aggregation ?? 'weighted-mean';
  const log = options.logger ?? createChildLogger('scorer');
  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);

  const aligned = alignChunks(priorChunks, currentChunks);
  log.debug(
    { company: current.id.company, pairs: aligned.length, prior: priorChunks.length, current: currentChunks.length },
    'aligned chunks'
  );

  const pairs = await Promise.all(
    aligned.map((pair, index) => limit(() => judgePair(pair, index, prior, current, rubric, options, log)))
  );

  const known = pairs.filter((p) => p.status !== 'unknown');
  const judged = known.flatMap((p) => (p.judgment ? [p.judgment] : []));
  const unknownPairs = pairs.length - known.length;
  const complete = unknownPairs === 0;

  const priorWords = countWords(prior.text);
  const currentWords = countWords(current.text);

  const priorFactors = segmentRiskFactors(prior);
  const currentFactors = segmentRiskFactors(current);
  const factorChanges = matchRiskFactors(priorFactors, currentFactors);
  log.debug(
    { company: current.id.company, prior: priorFactors.length, current: currentFactors.length },
    'matched risk factors'
  );

  return {
    company: current.id.company,
    cik: current.id.cik,
    priorYear: prior.fiscalYear,
    currentYear: current.fiscalYear,
    prior: sectionRef(prior),
    current: sectionRef(current),
    severityDelta: aggregateSeverity(pairs, aggregation, rubric),
    baseline: rubric.scale.baseline,
    aggregation,
    complete,
    status: complete ? 'complete' : 'partial',
    additions: normalizeThemes(judged.flatMap((j) => j.addedThemes)),
    removals: normalizeThemes(judged.flatMap((j) => j.removedThemes)),
    intensified: normalizeThemes(judged.flatMap((j) => j.intensifiedThemes)),
    rationale: buildRationale(pairs, rubric),
    pairs,
    factorChanges,
    stats: {
      similarity: round(wordJaccard(prior.text, current.text), 4),
      priorWordCount: priorWords,
      currentWordCount: currentWords,
      wordCountChange: currentWords - priorWords,
      priorChunks: priorChunks.length,
      currentChunks: currentChunks.length,
      unknownPairs,
      riskFactors: summarizeFactorChanges(priorFactors, currentFactors, factorChanges),
    },
  };
}

async function judgePair(
  pair: AlignedPair,
  index: number,
  prior: RiskSection,
  current: RiskSection,
  rubric: Rubric,
  options: ScoreOptions,
  log: Logger
): Promise<PairResult> {
  const base = {
    index,
    priorChunk: pair.prior ? pair.prior.index : null,
    currentChunk: pair.current ? pair.current.index : null,
    similarity: round(pair.similarity, 4),
    weight: pair.current ? pair.current.text.length : pair.prior ? pair.prior.text.length : 0,
  };

  if (pair.prior && pair.current && pair.prior.text === pair.current.text) {
    return { ...base, status: 'unchanged' };
  }

  try {
    options.signal?.throwIfAborted();
    const response = await options.provider.judge(
      {
        company: current.id.company,
        priorYear: prior.fiscalYear,
        currentYear: current.fiscalYear,
        priorText: pair.prior ? pair.prior.text : '',
        currentText: pair.current ? pair.current.text : '',
        rubric,
      },
      options.signal
    );
    return { ...base, status: 'judged', judgment: parseJudgment(response, rubric) };
  } catch (err) {
    const failure =
      err instanceof AnalysisUnavailableError
        ? err
        : new AnalysisUnavailableError(
            `${options.provider.name} analysis failed: ${errorMessage(err)}`,
            { pair: index },
            err
          );
    log.warn({ company: current.id.company, pair: index, err: failure.message }, 'pair marked unknown');
    return { ...base, status: 'unknown', error: failure.message };
  }
}

function pairDelta(pair: PairResult, rubric: Rubric): number {
  return pair.judgment ? pair.judgment.severityDelta : rubric.scale.baseline;
}

/**
 * Combines pair scores into one section score. Unknown pairs are left out;
 * with no known pair at all the result is null rather than the baseline.
 *
 * - `weighted-mean`: mean of pair deltas weighted by chunk length.
 * - `max-severity`: the delta furthest from the baseline; on a tie the higher
 *   delta wins, then the earlier pair.
 */
export function aggregateSeverity(
  pairs: readonly PairResult[],
  rule: AggregationRule,
  rubric: Rubric = DEFAULT_RUBRIC
): number | null {
  const known = pairs.filter((p) => p.status !== 'unknown');
  if (known.length === 0) return null;

  const { baseline } = rubric.scale;
  let value: number;

  if (rule === 'max-severity') {
    value = pairDelta(known[0], rubric);
    for (const p of known.slice(1)) {
      const d = pairDelta(p, rubric);
      const distance = Math.abs(d - baseline);
      const best = Math.abs(value - baseline);
      if (distance > best || (distance === best && d > value)) value = d;
    }
  } else {
    const totalWeight = known.reduce((n, p) => n + p.weight, 0);
    value =
      totalWeight > 0
        ? known.reduce((n, p) => n + p.weight * pairDelta(p, rubric), 0) / totalWeight
        : known.reduce((n, p) => n + pairDelta(p, rubric), 0) / known.length;
  }

  return round(Math.min(rubric.scale.max, Math.max(rubric.scale.min, value)), 2);
}

function buildRationale(pairs: readonly PairResult[], rubric: Rubric): string {
  const judged = pairs
    .filter((p): p is PairResult & { judgment: RiskJudgment } => p.judgment !== undefined)
    .filter((p) => p.judgment.rationale.trim().length > 0)
    .sort(
      (a, b) =>
        Math.abs(b.judgment.severityDelta - rubric.scale.baseline) -
          Math.abs(a.judgment.severityDelta - rubric.scale.baseline) || a.index - b.index
    );

  if (judged.length > 0) {
    return judged
      .slice(0, MAX_RATIONALES)
      .map((p) => p.judgment.rationale.trim())
      .join(' ');
  }
  if (pairs.some((p) => p.status === 'unknown')) {
    return 'Analysis was unavailable for the changed passages.';
  }
  return 'No material change between the two risk factor sections.';
}

function sectionRef(section: RiskSection): SectionRef {
  return {
    fiscalYear: section.fiscalYear,
    filingDate: section.id.filingDate,
    accessionNumber: section.id.accessionNumber,
    start: section.start,
    end: section.end,
    lengthChars: section.text.length,
  };
}

function countWords(text: string): number {
  return text.match(/\S+/g)?.length ?? 0;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  const r = Math.round(value * factor) / factor;
  return r === 0 ? 0 : r;
}
