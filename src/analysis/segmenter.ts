import type { RiskFactor, RiskFactorChange, RiskFactorStats, RiskSection } from '../core/types.js';
import { PARAGRAPH_SEPARATOR } from '../tools/normalizer.js';
import { jaccard, wordSet } from './aligner.js';
import { parseItemHeading } from './locator.js';

/** Factors whose word overlap is above this are the same risk in both years. */
export const FACTOR_MATCH_THRESHOLD = 0.7;

const MAX_TITLE_CHARS = 300;
const MIN_BODY_CHARS = 200;
const MAX_SUMMARY_CHARS = 240;
const SECTION_TITLE = /^risk\s+factors[.:]?$/i;
const SENTENCE_END = /[.!?;:]["'”’)]*$/;
const FIRST_SENTENCE = /^[\s\S]*?[.!?]["'”’)]*(?=\s|$)/;

interface Paragraph {
  start: number;
  end: number;
  text: string;
}

function splitParagraphs(text: string): Paragraph[] {
  const out: Paragraph[] = [];
  let pos = 0;
  while (pos <= text.length) {
    const next = text.indexOf(PARAGRAPH_SEPARATOR, pos);
    const end = next === -1 ? text.length : next;
    const raw = text.slice(pos, end);
    const trimmed = raw.trim();
    if (trimmed) {
      const start = pos + raw.indexOf(trimmed);
      out.push({ start, end: start + trimmed.length, text: trimmed });
    }
    if (next === -1) break;
    pos = next + PARAGRAPH_SEPARATOR.length;
  }
  return out;
}

function countWords(text: string): number {
  return text.match(/\S+/g)?.length ?? 0;
}

export function firstSentence(text: string): string {
  const m = FIRST_SENTENCE.exec(text);
  const sentence = (m ? m[0] : text).trim();
  const chars = [...sentence];
  if (chars.length <= MAX_SUMMARY_CHARS) return sentence;
  return `${chars.slice(0, MAX_SUMMARY_CHARS - 1).join('').trimEnd()}…`;
}

/** A short paragraph directly above a much longer one reads as a risk factor sub-heading. */
function isTitle(p: Paragraph, next: Paragraph | undefined): boolean {
  return (
    p.text.length <= MAX_TITLE_CHARS &&
    next !== undefined &&
    next.text.length >= MIN_BODY_CHARS &&
    next.text.length >= 2 * p.text.length
  );
}

function makeFactor(section: RiskSection, index: number, title: string, first: Paragraph, body: Paragraph[]): RiskFactor {
  const start = first.start;
  const end = body.length > 0 ? body[body.length - 1].end : first.end;
  const text = section.text.slice(start, end);
  return {
    index,
    start,
    end,
    title,
    summary: firstSentence(body.length > 0 ? body[0].text : first.text),
    wordCount: countWords(text),
    text,
  };
}

/**
 * Splits an Item 1A section into individual risk factors. Sub-headings open a
 * factor that runs to the next sub-heading; short unpunctuated lines at the end
 * of a factor are group headings ("Risks Related to Our Business") and are left
 * out. Sections without sub-headings yield one factor per paragraph.
 */
export function segmentRiskFactors(section: RiskSection): RiskFactor[] {
  const paragraphs = splitParagraphs(section.text).filter(
    (p) => !parseItemHeading(p.text) && !SECTION_TITLE.test(p.text)
  );

  const titles: number[] = [];
  for (let i = 0; i < paragraphs.length; i++) {
    if (isTitle(paragraphs[i], paragraphs[i + 1])) titles.push(i);
  }

  if (titles.length === 0) {
    return paragraphs.map((p, index) => makeFactor(section, index, firstSentence(p.text), p, []));
  }

  return titles.map((t, index) => {
    const stop = index + 1 < titles.length ? titles[index + 1] : paragraphs.length;
    const body = paragraphs.slice(t + 1, stop);
    while (body.length > 1) {
      const last = body[body.length - 1];
      if (last.text.length > MAX_TITLE_CHARS || SENTENCE_END.test(last.text)) break;
      body.pop();
    }
    return makeFactor(section, index, paragraphs[t].text, paragraphs[t], body);
  });
}

/**
 * Pairs current-year factors with prior-year ones. Each current factor takes
 * the most similar unused prior factor above the threshold (the earlier one on
 * a tie); prior factors left over are removals, listed after the current ones.
 */
export function matchRiskFactors(
  prior: readonly RiskFactor[],
  current: readonly RiskFactor[],
  threshold: number = FACTOR_MATCH_THRESHOLD
): RiskFactorChange[] {
  const priorWords = prior.map((f) => wordSet(f.text));
  const used = new Set<number>();
  const changes: RiskFactorChange[] = [];

  for (const factor of current) {
    const words = wordSet(factor.text);
    let best = -1;
    let bestScore = threshold;
    for (let i = 0; i < prior.length; i++) {
      if (used.has(i)) continue;
      const score = jaccard(words, priorWords[i]);
      if (score > bestScore) {
        best = i;
        bestScore = score;
      }
    }

    if (best === -1) {
      changes.push({
        type: 'added',
        priorIndex: null,
        currentIndex: factor.index,
        title: factor.title,
        similarity: 0,
        wordCountChange: factor.wordCount,
      });
      continue;
    }

    used.add(best);
    const match = prior[best];
    changes.push({
      type: match.text === factor.text ? 'unchanged' : 'modified',
      priorIndex: match.index,
      currentIndex: factor.index,
      title: factor.title,
      similarity: Math.round(bestScore * 10_000) / 10_000,
      wordCountChange: factor.wordCount - match.wordCount,
    });
  }

  prior.forEach((factor, i) => {
    if (used.has(i)) return;
    changes.push({
      type: 'removed',
      priorIndex: factor.index,
      currentIndex: null,
      title: factor.title,
      similarity: 0,
      wordCountChange: -factor.wordCount,
    });
  });

  return changes;
}

function averageWords(factors: readonly RiskFactor[]): number {
  if (factors.length === 0) return 0;
  const total = factors.reduce((n, f) => n + f.wordCount, 0);
  return Math.round((total / factors.length) * 10) / 10;
}

export function summarizeFactorChanges(
  prior: readonly RiskFactor[],
  current: readonly RiskFactor[],
  changes: readonly RiskFactorChange[]
): RiskFactorStats {
  const count = (type: RiskFactorChange['type']): number => changes.filter((c) => c.type === type).length;
  return {
    prior: prior.length,
    current: current.length,
    change: current.length - prior.length,
    priorAvgWords: averageWords(prior),
    currentAvgWords: averageWords(current),
    added: count('added'),
    removed: count('removed'),
    modified: count('modified'),
    unchanged: count('unchanged'),
  };
}
