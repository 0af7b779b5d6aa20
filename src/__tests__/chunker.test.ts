import { describe, it, expect } from 'vitest';
import { chunkSection, chunkText, reconstructSection } from '../analysis/chunker.js';
import type { RiskSection } from '../core/types.js';

function texts(iterable: Iterable<{ text: string }>): string[] {
  return [...iterable].map((c) => c.text);
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const LONG = Array.from(
  { length: 30 },
  (_, i) =>
    `Risk ${i}: changes in demand, pricing and supply could hurt results. Some quarters may be weaker than others!`
).join('\n\n');

describe('chunkText', () => {
  it('yields nothing for empty text', () => {
    expect([...chunkText('', { maxChars: 100, overlapChars: 10 })]).toEqual([]);
  });

  it('returns a single chunk when the text fits', () => {
    expect([...chunkText('Short section.', { maxChars: 100, overlapChars: 10 }, 2023)]).toEqual([
      { fiscalYear: 2023, index: 0, start: 0, end: 14, text: 'Short section.', overlap: 0 },
    ]);
  });

  it('prefers a paragraph boundary inside the tolerance window', () => {
    const chunks = [...chunkText('aaaa bbbb.\n\ncccc dddd.', { maxChars: 15, overlapChars: 0 })];
    expect(chunks.map((c) => c.text)).toEqual(['aaaa bbbb.\n\n', 'cccc dddd.']);
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 12],
      [12, 22],
    ]);
  });

  it('falls back to a sentence boundary, then a hard cut', () => {
    const options = { maxChars: 12, overlapChars: 0, toleranceChars: 5 };
    expect(texts(chunkText('One two. Three four five six.', options))).toEqual([
      'One two. ',
      'Three four f',
      'ive six.',
    ]);
  });

  it('repeats the tail of the previous chunk as overlap', () => {
    const chunks = [...chunkText('abcdefghij', { maxChars: 4, overlapChars: 2, toleranceChars: 0 })];
    expect(chunks.map((c) => c.text)).toEqual(['abcd', 'cdef', 'efgh', 'ghij']);
    expect(chunks.map((c) => c.overlap)).toEqual([0, 2, 2, 2]);
    expect(chunks.map((c) => c.start)).toEqual([0, 2, 4, 6]);
    expect(reconstructSection(chunks)).toBe('abcdefghij');
  });

  it('round-trips a long section and respects the size limit', () => {
    const chunks = [...chunkText(LONG, { maxChars: 500, overlapChars: 80 })];
    expect(chunks.length).toBeGreaterThan(1);
    expect(reconstructSection(chunks)).toBe(LONG);
    for (const [i, chunk] of chunks.entries()) {
      expect(chunk.index).toBe(i);
      expect(chunk.text.length).toBeLessThanOrEqual(500);
      expect(chunk.text).toBe(LONG.slice(chunk.start, chunk.end));
    }
    expect(chunks[0].overlap).toBe(0);
    expect(chunks.slice(1).every((c) => c.overlap === 80)).toBe(true);
  });

  it('restarts on every iteration', () => {
    const iterable = chunkText(LONG, { maxChars: 300, overlapChars: 0 });
    const first = texts(iterable);
    expect(texts(iterable)).toEqual(first);

    const iterator = iterable[Symbol.iterator]();
    expect(iterator.next().value).toMatchObject({ index: 0, text: first[0] });
  });

  it('never splits a surrogate pair at a cut or an overlap start', () => {
    const text = 'ab😀cd😀ef';
    const chunks = [...chunkText(text, { maxChars: 3, overlapChars: 1, toleranceChars: 0 })];

    expect(chunks.map((c) => c.text)).toEqual(['ab', 'b😀', 'cd', 'd😀', 'ef']);
    expect(chunks.map((c) => c.overlap)).toEqual([0, 1, 0, 1, 0]);
    expect(chunks.every((c) => !LONE_SURROGATE.test(c.text))).toBe(true);
    expect(reconstructSection(chunks)).toBe(text);
  });

  it('keeps a surrogate pair whole even when the limit is one unit', () => {
    expect(texts(chunkText('a😀b', { maxChars: 1, overlapChars: 0, toleranceChars: 0 }))).toEqual(['a', '😀', 'b']);
  });

  it('rejects invalid options', () => {
    expect(() => chunkText('x', { maxChars: 0, overlapChars: 0 })).toThrow(RangeError);
    expect(() => chunkText('x', { maxChars: 10, overlapChars: 10 })).toThrow(RangeError);
    expect(() => chunkText('x', { maxChars: 10, overlapChars: -1 })).toThrow(RangeError);
    expect(() => chunkText('x', { maxChars: 10, overlapChars: 2, toleranceChars: 1.5 })).toThrow(RangeError);
  });
});

describe('chunkSection', () => {
  it('tags chunks with the section fiscal year', () => {
    const section: RiskSection = {
      id: { company: 'ACME', cik: '0000000001', fiscalYear: 2022, filingDate: '2023-02-01' },
      fiscalYear: 2022,
      start: 0,
      end: LONG.length,
      text: LONG,
      heading: 'Item 1A. Risk Factors',
      endHeading: null,
      confidence: 0.8,
    };
    const chunks = [...chunkSection(section, { maxChars: 1000, overlapChars: 100 })];
    expect(chunks.every((c) => c.fiscalYear === 2022)).toBe(true);
    expect(reconstructSection(chunks)).toBe(LONG);
  });
});
