import { SectionNotFoundError } from '../core/errors.js';
import type { NormalizedDocument, RiskSection } from '../core/types.js';

export interface ItemHeading {
  paragraph: number;
  start: number;
  /** Normalized item code, e.g. `1A`, `2`, `7A`. */
  code: string;
  order: number;
  title: string;
  text: string;
  tableOfContents: boolean;
}

const MAX_HEADING_LENGTH = 150;
const MAX_ITEM_NUMBER = 16;
const RISK_FACTORS_ORDER = itemOrder(1, 'A');

const ITEM_HEADING = /^items?\s*(\d{1,2})\s*([a-z])?(?![a-z\d])\s*[.:\-—–)]*\s*(.*)$/i;
// "Item 7 of ...", "Item 7, “Management's Discussion ...,” describes ..."
const CROSS_REFERENCE = /^(?:,|(?:of|in|to|and|or|above|below|herein|hereof|under|for|as|is|was)\b)/i;
const CONTINUED = /\bcontinued\b/i;
const RISK_FACTORS_TITLE = /risk\s+factors/i;

// Table-of-contents heuristics
const TOC_MAX_GAP_PARAGRAPHS = 3;
const TOC_MAX_GAP_CHARS = 200;
const PAGE_TOKEN = /^(?:page\s*)?(?:\d{1,3}|[ivx]{1,5})(?:\s*[-–]\s*\d{1,3})?$/i;
const TRAILING_PAGE_TOKEN = /\s(?:\d{1,3}|[ivx]{1,4})(?:\s*[-–]\s*\d{1,3})?$/i;

const MIN_BODY_PARAGRAPH_LENGTH = 60;

function itemOrder(num: number, letter: string): number {
  return num * 100 + (letter ? letter.toUpperCase().charCodeAt(0) - 64 : 0);
}

export function parseItemHeading(
  text: string
): { code: string; order: number; title: string } | null {
  if (text.length > MAX_HEADING_LENGTH) return null;

  const m = ITEM_HEADING.exec(text.trim());
  if (!m) return null;

  const num = parseInt(m[1], 10);
  const letter = (m[2] ?? '').toUpperCase();
  const title = m[3].trim();

  if (num < 1 || num > MAX_ITEM_NUMBER) return null;
  if (CROSS_REFERENCE.test(title) || CONTINUED.test(title)) return null;

  return { code: `${num}${letter}`, order: itemOrder(num, letter), title };
}

function paragraphText(doc: NormalizedDocument, index: number): string {
  const span = doc.paragraphs[index];
  return doc.text.slice(span.start, span.end);
}

/**
 * Every paragraph that reads as a top-level item heading, in document order,
 * flagged when it looks like a table-of-contents entry.
 */
export function findItemHeadings(doc: NormalizedDocument): ItemHeading[] {
  const headings: ItemHeading[] = [];

  for (let i = 0; i < doc.paragraphs.length; i++) {
    const text = paragraphText(doc, i);
    const parsed = parseItemHeading(text);
    if (!parsed) continue;
    headings.push({
      paragraph: i,
      start: doc.paragraphs[i].start,
      ...parsed,
      text,
      tableOfContents: false,
    });
  }

  for (let i = 0; i < headings.length; i++) {
    headings[i].tableOfContents = isTableOfContentsEntry(doc, headings[i], headings[i + 1]);
  }

  return headings;
}

/**
 * A heading is a contents entry when the next heading follows almost at once
 * and a page number sits on the heading line or in the gap.
 */
function isTableOfContentsEntry(
  doc: NormalizedDocument,
  heading: ItemHeading,
  next: ItemHeading | undefined
): boolean {
  if (!next) return false;

  const gap: string[] = [];
  for (let p = heading.paragraph + 1; p < next.paragraph; p++) {
    gap.push(paragraphText(doc, p));
  }
  if (gap.length > TOC_MAX_GAP_PARAGRAPHS) return false;
  if (gap.reduce((n, t) => n + t.length, 0) > TOC_MAX_GAP_CHARS) return false;

  return TRAILING_PAGE_TOKEN.test(heading.text) || gap.some((t) => PAGE_TOKEN.test(t));
}

function hasBody(doc: NormalizedDocument, from: number, to: number): boolean {
  for (let p = from + 1; p < to; p++) {
    const text = paragraphText(doc, p);
    if (text.length >= MIN_BODY_PARAGRAPH_LENGTH && !parseItemHeading(text)) return true;
  }
  return false;
}

export function locateRiskSection(doc: NormalizedDocument): RiskSection {
  const headings = findItemHeadings(doc).filter((h) => !h.tableOfContents);
  const candidates = headings.filter((h) => h.code === '1A');

  if (candidates.length === 0) {
    throw new SectionNotFoundError('No Item 1A heading found', {
      company: doc.id.company,
      fiscalYear: doc.id.fiscalYear,
    });
  }

  const endFor = (c: ItemHeading): ItemHeading | null =>
    headings.find((h) => h.paragraph > c.paragraph && h.order > RISK_FACTORS_ORDER) ?? null;

  // Candidates sharing an end heading form a group; the last one in a group is
  // the body heading, the earlier ones are index or cover references.
  let i = 0;
  while (i < candidates.length) {
    const end = endFor(candidates[i]);
    let last = i;
    while (last + 1 < candidates.length && endFor(candidates[last + 1]) === end) last++;

    const chosen = candidates[last];
    const endParagraph = end ? end.paragraph : doc.paragraphs.length;
    if (hasBody(doc, chosen.paragraph, endParagraph)) {
      return buildSection(doc, chosen, end);
    }
    i = last + 1;
  }

  throw new SectionNotFoundError('Item 1A heading found but the section has no body text', {
    company: doc.id.company,
    fiscalYear: doc.id.fiscalYear,
    candidates: candidates.length,
  });
}

function buildSection(
  doc: NormalizedDocument,
  heading: ItemHeading,
  end: ItemHeading | null
): RiskSection {
  const start = heading.start;
  const endOffset = end ? end.start : doc.text.length;

  const nextParagraph =
    heading.paragraph + 1 < doc.paragraphs.length ? paragraphText(doc, heading.paragraph + 1) : '';
  const namesRiskFactors =
    RISK_FACTORS_TITLE.test(heading.title) || RISK_FACTORS_TITLE.test(nextParagraph);

  let confidence = namesRiskFactors ? 0.95 : 0.85;
  if (!end) confidence -= 0.15;

  return {
    id: doc.id,
    fiscalYear: doc.id.fiscalYear,
    start,
    end: endOffset,
    text: doc.text.slice(start, endOffset),
    heading: heading.text,
    endHeading: end ? end.code : null,
    confidence: Math.round(confidence * 100) / 100,
  };
}
