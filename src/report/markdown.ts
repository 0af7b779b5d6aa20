import type { ChangeRecord } from '../core/types.js';
import type { RunReport } from './types.js';

/** Highest severity first; records without a score go last. */
export function rankRecords(records: readonly ChangeRecord[]): ChangeRecord[] {
  return [...records].sort((a, b) => {
    if (a.severityDelta === null && b.severityDelta === null) return a.company.localeCompare(b.company);
    if (a.severityDelta === null) return 1;
    if (b.severityDelta === null) return -1;
    return b.severityDelta - a.severityDelta || a.company.localeCompare(b.company);
  });
}

export function formatSeverity(value: number | null): string {
  if (value === null) return 'n/a';
  return value > 0 ? `+${value.toFixed(2)}` : value.toFixed(2);
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function signed(n: number): string {
  return n >= 0 ? `+${n}` : `${n}`;
}

function themes(list: readonly string[]): string {
  return list.length > 0 ? list.join(', ') : '-';
}

export function renderMarkdown(report: RunReport): string {
  const { summary } = report;
  const lines: string[] = [
    `# Risk Factor Drift Report`,
    '',
    `**Run ID:** ${report.runId}`,
    `**Generated:** ${report.generatedAt}`,
    '',
    '## Summary',
    '',
    `- Companies: ${summary.total}`,
    `- Complete: ${summary.success}`,
    `- Partial: ${summary.partial}`,
    `- Skipped: ${summary.skipped}`,
    `- Failed: ${summary.failed}`,
    '',
  ];

  const ranked = rankRecords(report.records);
  if (ranked.length > 0) {
    lines.push('## Ranking', '');
    lines.push('| Rank | Company | Years | Severity | Status | Added | Removed | Intensified |');
    lines.push('| --- | --- | --- | --- | --- | --- | --- | --- |');
    ranked.forEach((r, i) => {
      lines.push(
        `| ${i + 1} | ${cell(r.company)} | ${r.priorYear}→${r.currentYear} | ${formatSeverity(r.severityDelta)} | ${r.status} | ${cell(themes(r.additions))} | ${cell(themes(r.removals))} | ${cell(themes(r.intensified))} |`
      );
    });
    lines.push('');

    for (const r of ranked) {
      lines.push(`### ${r.company} (${r.priorYear}→${r.currentYear})`, '');
      lines.push(`> ${r.rationale}`, '');
      lines.push(
        `Similarity ${r.stats.similarity}; words ${r.stats.priorWordCount} → ${r.stats.currentWordCount} (${signed(r.stats.wordCountChange)}); chunks ${r.stats.priorChunks} → ${r.stats.currentChunks}.`
      );
      const f = r.stats.riskFactors;
      lines.push(
        `Risk factors ${f.prior} → ${f.current} (${signed(f.change)}); added ${f.added}, removed ${f.removed}, modified ${f.modified}, unchanged ${f.unchanged}; avg words ${f.priorAvgWords} → ${f.currentAvgWords}.`
      );
      for (const c of r.factorChanges) {
        if (c.type === 'added') lines.push(`- Added: ${c.title}`);
        else if (c.type === 'removed') lines.push(`- Removed: ${c.title}`);
      }
      if (r.stats.unknownPairs > 0) {
        lines.push(`Unknown pairs: ${r.stats.unknownPairs} of ${r.pairs.length}.`);
      }
      lines.push('');
    }
  }

  const problems = report.outcomes.filter((o) => o.status !== 'success');
  if (problems.length > 0) {
    lines.push('## Skipped and Failed', '');
    for (const o of problems) {
      lines.push(`- **${o.company}** (${o.priorYear}→${o.currentYear}) ${o.status}: ${o.reason ?? ''}`.trimEnd());
    }
    lines.push('');
  }

  return lines.join('\n');
}
