import { describe, it, expect } from 'vitest';
import { findItemHeadings, locateRiskSection, parseItemHeading } from '../analysis/locator.js';
import { SectionNotFoundError } from '../core/errors.js';
import type { FilingId } from '../core/types.js';
import { buildDocument } from '../tools/normalizer.js';

const ID: FilingId = { company: 'ACME', cik: '0000000001', fiscalYear: 2023, filingDate: '2024-02-01' };

const RISK_1 =
  'The company faces significant risk from market volatility and regulatory changes that could affect results.';
const RISK_2 =
  'Supply chain disruptions could materially impact our ability to deliver products on time and within budget.';

const FILING = [
  'Table of Contents',
  'Item 1. Business 3',
  'Item 1A. Risk Factors 12',
  'Item 1B. Unresolved Staff Comments 25',
  'Item 2. Properties 26',
  'Item 1. Business',
  'We design and sell consumer electronics and related services to customers worldwide.',
  'Item 1A. Risk Factors',
  RISK_1,
  RISK_2,
  'Item 1B. Unresolved Staff Comments',
  'None.',
  'Item 2. Properties',
  'Our headquarters are located in a leased office building.',
];

describe('parseItemHeading', () => {
  it.each([
    ['ITEM 1A. RISK FACTORS', '1A', 'RISK FACTORS'],
    ['Item 1A: Risk Factors', '1A', 'Risk Factors'],
    ['Item 1A — Risk Factors', '1A', 'Risk Factors'],
    ['Item1A', '1A', ''],
    ['Item 1 A. Risk Factors', '1A', 'Risk Factors'],
    ['Item 7A. Quantitative and Qualitative Disclosures', '7A', 'Quantitative and Qualitative Disclosures'],
  ])('parses %s', (input, code, title) => {
    expect(parseItemHeading(input)).toMatchObject({ code, title });
  });

  it('orders items by number, then letter', () => {
    expect(parseItemHeading('Item 1A.')?.order).toBe(101);
    expect(parseItemHeading('Item 1B.')?.order).toBe(102);
    expect(parseItemHeading('Item 2.')?.order).toBe(200);
  });

  it.each([
    'Item 1A of this Annual Report on Form 10-K',
    'Item 7, “Management’s Discussion and Analysis,” describes our liquidity.',
    'Item 2, Properties, describes the facilities these risks may affect.',
    'Items 1 and 2. Business and Properties',
    'Item 1A. Risk Factors (continued)',
    'Item 17. Exhibits',
    'Itemized list of risks',
    `Item 1A. ${'Risk '.repeat(40)}`,
  ])('rejects %s', (input) => {
    expect(parseItemHeading(input)).toBeNull();
  });
});

describe('findItemHeadings', () => {
  it('flags table-of-contents entries', () => {
    const headings = findItemHeadings(buildDocument(ID, FILING));
    expect(headings.map((h) => h.paragraph)).toEqual([1, 2, 3, 4, 5, 7, 10, 12]);
    expect(headings.filter((h) => h.tableOfContents).map((h) => h.paragraph)).toEqual([1, 2, 3, 4]);
  });

  it('treats a bare page number between headings as a contents marker', () => {
    const doc = buildDocument(ID, ['Item 1A. Risk Factors', 'Page 12', 'Item 1B. Unresolved Staff Comments', 'None.']);
    expect(findItemHeadings(doc).map((h) => h.tableOfContents)).toEqual([true, false]);
  });
});

describe('locateRiskSection', () => {
  it('skips the table of contents and ends at Item 1B', () => {
    const doc = buildDocument(ID, FILING);
    const section = locateRiskSection(doc);

    expect(section.start).toBe(doc.paragraphs[7].start);
    expect(section.end).toBe(doc.paragraphs[10].start);
    expect(section.text).toBe(`Item 1A. Risk Factors\n\n${RISK_1}\n\n${RISK_2}\n\n`);
    expect(section.text).toBe(doc.text.slice(section.start, section.end));
    expect(section.heading).toBe('Item 1A. Risk Factors');
    expect(section.endHeading).toBe('1B');
    expect(section.confidence).toBe(0.95);
    expect(section.fiscalYear).toBe(2023);
  });

  it('bounds the section by the next item heading paragraph', () => {
    const paragraphs = Array.from(
      { length: 50 },
      (_, i) => `Paragraph ${i} discusses general business matters in sufficient detail for testing.`
    );
    paragraphs[10] = 'Item 1A. Risk Factors';
    paragraphs[40] = 'Item 1B. Unresolved Staff Comments';
    const doc = buildDocument(ID, paragraphs);

    const section = locateRiskSection(doc);
    expect(section.start).toBe(doc.paragraphs[10].start);
    expect(section.end).toBe(doc.paragraphs[40].start);
    expect(section.text.startsWith('Item 1A. Risk Factors\n\nParagraph 11 ')).toBe(true);
    expect(section.text.endsWith('Paragraph 39 discusses general business matters in sufficient detail for testing.\n\n')).toBe(
      true
    );
  });

  it('ends at a later item when 1B and 1C are absent', () => {
    const doc = buildDocument(ID, ['Item 1A. Risk Factors', RISK_1, 'Item 2. Properties', 'Leased offices.']);
    expect(locateRiskSection(doc).endHeading).toBe('2');
  });

  it('does not end the section at a cross-reference that follows an item number with a comma', () => {
    const doc = buildDocument(ID, [
      'Item 1A. Risk Factors',
      RISK_1,
      'Item 2, Properties, describes the facilities these risks may affect.',
      RISK_2,
      'Item 1B. Unresolved Staff Comments',
      'None.',
    ]);
    const section = locateRiskSection(doc);
    expect(section.endHeading).toBe('1B');
    expect(section.end).toBe(doc.paragraphs[4].start);
    expect(section.text.endsWith(`${RISK_2}\n\n`)).toBe(true);
  });

  it('finds the same boundaries when heading case and spacing vary', () => {
    const canonical = buildDocument(ID, ['Item 1A. Risk Factors', RISK_1, RISK_2, 'Item 1B. Unresolved Staff Comments', 'None.']);
    const variant = buildDocument(ID, ['ITEM 1A.RISK FACTORS', RISK_1, RISK_2, 'item  1b :', 'None.']);

    const a = locateRiskSection(canonical);
    const b = locateRiskSection(variant);
    expect(a.end).toBe(canonical.paragraphs[3].start);
    expect(b.end).toBe(variant.paragraphs[3].start);
    expect(b.endHeading).toBe('1B');
    expect(b.heading).toBe('ITEM 1A.RISK FACTORS');
    expect(b.confidence).toBe(0.95);
    expect(b.text.slice('ITEM 1A.RISK FACTORS'.length)).toBe(a.text.slice('Item 1A. Risk Factors'.length));
  });

  it('runs to the document end with lower confidence when no later item exists', () => {
    const doc = buildDocument(ID, ['Item 1A.', RISK_1]);
    const section = locateRiskSection(doc);
    expect(section.end).toBe(doc.text.length);
    expect(section.endHeading).toBeNull();
    expect(section.confidence).toBe(0.7);
  });

  it('throws SectionNotFoundError when no Item 1A heading exists', () => {
    const doc = buildDocument(ID, ['Item 1. Business', RISK_1, 'Item 2. Properties', RISK_2]);
    expect(() => locateRiskSection(doc)).toThrow(SectionNotFoundError);
    expect(() => locateRiskSection(doc)).toThrow('No Item 1A heading found');
  });

  it('throws when the only Item 1A heading has no body', () => {
    const doc = buildDocument(ID, ['Item 1A. Risk Factors', 'Item 1B. Unresolved Staff Comments', 'None.']);
    expect(() => locateRiskSection(doc)).toThrow('Item 1A heading found but the section has no body text');
  });
});
