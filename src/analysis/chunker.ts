import { PARAGRAPH_SEPARATOR } from '../tools/normalizer.js';
import type { Chunk, RiskSection } from '../core/types.js';

export interface ChunkOptions {
  /**
   * Upper bound on `chunk.text.length`, overlap included. Surrogate pairs are
   * never split, so a limit of 1 can still yield a two-unit chunk.
   */
  maxChars: number;
  overlapChars: number;
  /** How far before the limit a paragraph or sentence break may move the cut. Defaults to 20% of maxChars. */
  toleranceChars?: number;
}

type ResolvedChunkOptions = Required<ChunkOptions>;

export function resolveChunkOptions(options: ChunkOptions): ResolvedChunkOptions {
  const { maxChars, overlapChars } = options;
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
  }
  if (!Number.isInteger(overlapChars) || overlapChars < 0 || overlapChars >= maxChars) {
    throw new RangeError(`overlapChars must be an integer in [0, ${maxChars}), got ${overlapChars}`);
  }
  const toleranceChars = options.toleranceChars ?? Math.floor(maxChars * 0.2);
  if (!Number.isInteger(toleranceChars) || toleranceChars < 0) {
    throw new RangeError(`toleranceChars must be a non-negative integer, got ${toleranceChars}`);
  }
  return { maxChars, overlapChars, toleranceChars };
}

/**
 * Lazily splits text into chunks. Each iteration restarts from the first
 * chunk, and no chunk is computed before the consumer asks for it.
 */
export function chunkText(text: string, options: ChunkOptions, fiscalYear = 0): Iterable<Chunk> {
  const resolved = resolveChunkOptions(options);
  return {
    [Symbol.iterator]: () => generateChunks(text, resolved, fiscalYear),
  };
}

export function chunkSection(section: RiskSection, options: ChunkOptions): Iterable<Chunk> {
  return chunkText(section.text, options, section.fiscalYear);
}

/** Inverse of chunking: drops each overlap prefix and concatenates. */
export function reconstructSection(chunks: Iterable<Chunk>): string {
  let out = '';
  for (const chunk of chunks) out += chunk.text.slice(chunk.overlap);
  return out;
}

function* generateChunks(
  text: string,
  options: ResolvedChunkOptions,
  fiscalYear: number
): Generator<Chunk, void, undefined> {
  let uniqueStart = 0;
  let previousUnique = 0;
  let index = 0;

  while (uniqueStart < text.length) {
    let overlap = index === 0 ? 0 : Math.min(options.overlapChars, previousUnique);
    // Give back overlap rather than start inside a surrogate pair or leave no
    // room for the pair that opens the unique part.
    while (
      overlap > 0 &&
      (splitsPair(text, uniqueStart - overlap) ||
        (options.maxChars - overlap < 2 && splitsPair(text, uniqueStart + 1)))
    ) {
      overlap--;
    }
    const uniqueEnd = findSplit(text, uniqueStart, options.maxChars - overlap, options.toleranceChars);
    const start = uniqueStart - overlap;

    yield {
      fiscalYear,
      index,
      start,
      end: uniqueEnd,
      text: text.slice(start, uniqueEnd),
      overlap,
    };

    previousUnique = uniqueEnd - uniqueStart;
    uniqueStart = uniqueEnd;
    index++;
  }
}

function findSplit(text: string, from: number, budget: number, tolerance: number): number {
  const limit = from + budget;
  if (limit >= text.length) return text.length;

  const floor = Math.max(from + 1, limit - tolerance);

  const separator =
    limit >= PARAGRAPH_SEPARATOR.length
      ? text.lastIndexOf(PARAGRAPH_SEPARATOR, limit - PARAGRAPH_SEPARATOR.length)
      : -1;
  if (separator >= 0 && separator + PARAGRAPH_SEPARATOR.length >= floor) {
    return separator + PARAGRAPH_SEPARATOR.length;
  }

  for (let p = limit; p >= floor; p--) {
    if (isSentenceBoundary(text, p)) return p;
  }

  if (splitsPair(text, limit)) return limit - 1 > from ? limit - 1 : limit + 1;
  return limit;
}

/** True when `index` falls between the two halves of a surrogate pair. */
function splitsPair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const high = text.charCodeAt(index - 1);
  const low = text.charCodeAt(index);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

function isSentenceBoundary(text: string, p: number): boolean {
  return p >= 2 && /\s/.test(text[p - 1]) && /[.!?]/.test(text[p - 2]);
}
