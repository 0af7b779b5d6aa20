import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { rankRecords, renderMarkdown } from './markdown.js';
import type { OutputFormat, ReportConsumer, RunReport } from './types.js';

/** Writes `<runId>-report.<ext>` and `<runId>-ledger.json` into a directory. */
export class FileReportWriter implements ReportConsumer {
  constructor(
    private readonly outDir: string,
    private readonly format: OutputFormat
  ) {}

  async consume(report: RunReport): Promise<string[]> {
    await mkdir(this.outDir, { recursive: true });

    const reportPath = join(this.outDir, `${report.runId}-report.${this.format}`);
    if (this.format === 'md') {
      await writeFile(reportPath, renderMarkdown(report));
    } else {
      const body = {
        runId: report.runId,
        generatedAt: report.generatedAt,
        summary: report.summary,
        outcomes: report.outcomes,
        records: rankRecords(report.records),
      };
      await writeFile(reportPath, JSON.stringify(body, null, 2));
    }

    const ledgerPath = join(this.outDir, `${report.runId}-ledger.json`);
    await writeFile(ledgerPath, JSON.stringify(report.ledger, null, 2));

    return [reportPath, ledgerPath];
  }
}
