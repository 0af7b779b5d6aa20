import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { RunLedger } from '../ledger/types.js';
import { formatSeverity, rankRecords, renderMarkdown } from '../report/markdown.js';
import type { RunReport } from '../report/types.js';
import { FileReportWriter } from '../report/writer.js';
import { makeRecord } from './helpers.js';

const LEDGER: RunLedger = {
  runId: 'run_test',
  startedAt: '2024-01-01T00:00:00.000Z',
  finishedAt: '2024-01-01T00:01:00.000Z',
  pipeline: ['retrieve', 'normalize', 'locate', 'chunk', 'score'],
  settings: {
    provider: 'stub',
    aggregation: 'weighted-mean',
    maxChars: 6000,
    overlapChars: 400,
    analysisConcurrency: 4,
    batchConcurrency: 2,
    cache: false,
  },
  entries: [],
  summary: { total: 3, success: 2, partial: 0, skipped: 1, failed: 0 },
};

function report(): RunReport {
  return {
    runId: 'run_test',
    generatedAt: '2024-01-01T00:01:00.000Z',
    summary: {
      total: 3,
      success: 2,
      partial: 0,
      skipped: 1,
      failed: 0,
      byStatus: {
        success: 2,
        'skipped-no-section': 1,
        'skipped-retrieval': 0,
        'failed-malformed': 0,
        'failed-error': 0,
      },
      failures: [{ company: 'GAMMA', status: 'skipped-no-section', reason: 'No Item 1A heading found' }],
    },
    outcomes: [
      { company: 'ACME', priorYear: 2022, currentYear: 2023, status: 'success' },
      { company: 'BETA', priorYear: 2022, currentYear: 2023, status: 'success' },
      {
        company: 'GAMMA',
        priorYear: 2022,
        currentYear: 2023,
        status: 'skipped-no-section',
        reason: 'No Item 1A heading found',
      },
    ],
    records: [
      makeRecord('ACME', -0.5),
      makeRecord('BETA', 2.25, {
        additions: ['cybersecurity', 'supply-chain'],
        rationale: 'New | risks.',
        factorChanges: [
          { type: 'added', priorIndex: null, currentIndex: 0, title: 'We face new tariffs.', similarity: 0, wordCountChange: 40 },
          { type: 'modified', priorIndex: 0, currentIndex: 1, title: 'Competition is intense.', similarity: 0.82, wordCountChange: 5 },
          { type: 'removed', priorIndex: 1, currentIndex: null, title: 'Our lease expires.', similarity: 0, wordCountChange: -30 },
        ],
      }),
    ],
    ledger: LEDGER,
  };
}

describe('rankRecords', () => {
  it('orders by severity with unscored records last', () => {
    const ranked = rankRecords([makeRecord('C', null), makeRecord('B', 1), makeRecord('A', 1), makeRecord('D', 3)]);
    expect(ranked.map((r) => r.company)).toEqual(['D', 'A', 'B', 'C']);
  });
});

describe('formatSeverity', () => {
  it('signs positive values and spells out missing ones', () => {
    expect(formatSeverity(2.5)).toBe('+2.50');
    expect(formatSeverity(-1)).toBe('-1.00');
    expect(formatSeverity(0)).toBe('0.00');
    expect(formatSeverity(null)).toBe('n/a');
  });
});

describe('renderMarkdown', () => {
  const lines = renderMarkdown(report()).split('\n');

  it('lists the ranking table highest severity first', () => {
    expect(lines).toContain(
      '| 1 | BETA | 2022→2023 | +2.25 | complete | cybersecurity, supply-chain | - | - |'
    );
    expect(lines).toContain('| 2 | ACME | 2022→2023 | -0.50 | complete | - | - | - |');
    expect(lines.indexOf('### BETA (2022→2023)')).toBeLessThan(lines.indexOf('### ACME (2022→2023)'));
  });

  it('includes summary counts and skipped companies', () => {
    expect(lines).toContain('- Skipped: 1');
    expect(lines).toContain('- **GAMMA** (2022→2023) skipped-no-section: No Item 1A heading found');
  });

  it('quotes the rationale and comparison stats', () => {
    expect(lines).toContain('> New | risks.');
    expect(lines).toContain('Similarity 0.9; words 150 → 160 (+10); chunks 1 → 1.');
  });

  it('tallies risk factor changes and names added and removed factors', () => {
    expect(lines).toContain(
      'Risk factors 4 → 5 (+1); added 1, removed 0, modified 2, unchanged 2; avg words 37.5 → 32.'
    );
    const beta = lines.indexOf('### BETA (2022→2023)');
    expect(lines.slice(beta, lines.indexOf('### ACME (2022→2023)'))).toEqual(
      expect.arrayContaining(['- Added: We face new tariffs.', '- Removed: Our lease expires.'])
    );
    expect(lines).not.toContain('- Added: Competition is intense.');
  });
});

describe('FileReportWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'riskdrift-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a ranked JSON report and the ledger', async () => {
    const paths = await new FileReportWriter(join(dir, 'out'), 'json').consume(report());
    expect(paths).toEqual([join(dir, 'out', 'run_test-report.json'), join(dir, 'out', 'run_test-ledger.json')]);

    const body: unknown = JSON.parse(await readFile(paths[0], 'utf-8'));
    expect(body).toMatchObject({ runId: 'run_test', records: [{ company: 'BETA' }, { company: 'ACME' }] });
    expect(body).not.toHaveProperty('ledger');

    expect(JSON.parse(await readFile(paths[1], 'utf-8'))).toEqual(LEDGER);
  });

  it('writes Markdown when asked', async () => {
    const [reportPath] = await new FileReportWriter(dir, 'md').consume(report());
    expect(reportPath).toBe(join(dir, 'run_test-report.md'));
    expect(await readFile(reportPath, 'utf-8')).toBe(renderMarkdown(report()));
  });
});
