import type { Chunk } from '../core/types.js';

export interface AlignedPair {
  prior: Chunk | null;
  current: Chunk | null;
  similarity: number;
}

const MIN_SIMILARITY = 0.1;
const POSITION_WEIGHT = 0.25;
const WORD = /[a-z0-9][a-z0-9'-]*/g;

export function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().match(WORD) ?? []);
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const w of a) if (b.has(w)) shared++;
  return shared / (a.size + b.size - shared);
}

/** Jaccard similarity of the two texts' lower-cased word sets. */
export function wordJaccard(a: string, b: string): number {
  return jaccard(wordSet(a), wordSet(b));
}

function relativePosition(index: number, count: number): number {
  return count <= 1 ? 0 : index / (count - 1);
}

/**
 * Pairs prior-year and current-year chunks. Matches are chosen greedily by
 * word overlap plus a bonus for sitting at the same relative position; chunks
 * left without a partner become one-sided pairs (added or removed content).
 */
export function alignChunks(prior: readonly Chunk[], current: readonly Chunk[]): AlignedPair[] {
  const priorWords = prior.map((c) => wordSet(c.text));
  const currentWords = current.map((c) => wordSet(c.text));

  const candidates: Array<{ i: number; j: number; similarity: number; score: number }> = [];
  for (let i = 0; i < prior.length; i++) {
    for (let j = 0; j < current.length; j++) {
      const similarity = jaccard(priorWords[i], currentWords[j]);
      if (similarity < MIN_SIMILARITY) continue;
      const proximity =
        1 - Math.abs(relativePosition(i, prior.length) - relativePosition(j, current.length));
      candidates.push({ i, j, similarity, score: similarity + POSITION_WEIGHT * proximity });
    }
  }

  candidates.sort((a, b) => b.score - a.score || a.i - b.i || a.j - b.j);

  const usedPrior = new Set<number>();
  const usedCurrent = new Set<number>();
  const pairs: AlignedPair[] = [];

  for (const c of candidates) {
    if (usedPrior.has(c.i) || usedCurrent.has(c.j)) continue;
    usedPrior.add(c.i);
    usedCurrent.add(c.j);
    pairs.push({ prior: prior[c.i], current: current[c.j], similarity: c.similarity });
  }

  for (let j = 0; j < current.length; j++) {
    if (!usedCurrent.has(j)) pairs.push({ prior: null, current: current[j], similarity: 0 });
  }
  for (let i = 0; i < prior.length; i++) {
    if (!usedPrior.has(i)) pairs.push({ prior: prior[i], current: null, similarity: 0 });
  }

  // Current-year order first; removed passages trail in prior-year order.
  return pairs.sort(
    (a, b) =>
      (a.current?.index ?? Infinity) - (b.current?.index ?? Infinity) ||
      (a.prior?.index ?? Infinity) - (b.prior?.index ?? Infinity)
  );
}
