import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { RetrievalFailureError, errorMessage } from '../core/errors.js';
import type { ContentType, RawFiling } from '../core/types.js';
import { createChildLogger } from '../utils/logger.js';

export interface FilingRetriever {
  retrieve(company: string, fiscalYear: number, signal?: AbortSignal): Promise<RawFiling>;
}

export interface EdgarOptions {
  userAgent: string;
  /** Minimum spacing between requests (SEC fair-access policy). */
  rateLimitMs: number;
  timeoutMs: number;
  wwwBase?: string;
  dataBase?: string;
}

const log = createChildLogger('edgar');

const TickerEntrySchema = z.object({
  cik_str: z.number(),
  ticker: z.string(),
  title: z.string(),
});

const SubmissionsSchema = z.object({
  filings: z.object({
    recent: z.object({
      form: z.array(z.string()),
      filingDate: z.array(z.string()),
      reportDate: z.array(z.string()).optional(),
      accessionNumber: z.array(z.string()),
      primaryDocument: z.array(z.string()),
    }),
  }),
});

interface FilingRef {
  form: string;
  accessionNumber: string;
  primaryDocument: string;
  filingDate: string;
}

export function detectContentType(head: string, url: string): ContentType {
  if (/\.html?$/i.test(url)) return 'html';
  if (/<html|<document>|<body|<div|<p[\s>]/i.test(head)) return 'html';
  return 'text';
}

function charsetOf(contentType: string | null): string | null {
  const m = contentType ? /charset=["']?([\w-]+)/i.exec(contentType) : null;
  return m ? m[1] : null;
}

export function buildDocUrl(wwwBase: string, cik: string, accession: string, primaryDoc: string): string {
  const accessionPath = accession.replace(/-/g, '');
  return `${wwwBase}/Archives/edgar/data/${parseInt(cik, 10)}/${accessionPath}/${primaryDoc}`;
}

/**
 * Picks the annual report for a fiscal year: an original 10-K whose period of
 * report falls in that year, else an amendment, else whichever 10-K was filed
 * the following calendar year.
 */
export function selectAnnualFiling(
  recent: z.infer<typeof SubmissionsSchema>['filings']['recent'],
  fiscalYear: number
): FilingRef | null {
  const rows: Array<FilingRef & { reportYear: number | null; filingYear: number }> = [];
  for (let i = 0; i < recent.form.length; i++) {
    const form = recent.form[i];
    if (form !== '10-K' && form !== '10-K/A') continue;
    const reportDate = recent.reportDate?.[i] ?? '';
    rows.push({
      form,
      accessionNumber: recent.accessionNumber[i],
      primaryDocument: recent.primaryDocument[i],
      filingDate: recent.filingDate[i],
      reportYear: reportDate ? parseInt(reportDate.slice(0, 4), 10) : null,
      filingYear: parseInt(recent.filingDate[i].slice(0, 4), 10),
    });
  }

  const byReport = rows.filter((r) => r.reportYear === fiscalYear);
  const pick =
    byReport.find((r) => r.form === '10-K') ??
    byReport[0] ??
    rows.find((r) => r.reportYear === null && r.filingYear === fiscalYear + 1 && r.form === '10-K') ??
    rows.find((r) => r.reportYear === null && r.filingYear === fiscalYear + 1);

  if (!pick) return null;
  return {
    form: pick.form,
    accessionNumber: pick.accessionNumber,
    primaryDocument: pick.primaryDocument,
    filingDate: pick.filingDate,
  };
}

/**
 * Filing retrieval against SEC EDGAR. Failures surface as
 * RetrievalFailureError; retrying is left to the caller.
 */
export class EdgarRetriever implements FilingRetriever {
  private readonly wwwBase: string;
  private readonly dataBase: string;
  private nextSlot = 0;
  private tickers: Promise<Map<string, string>> | null = null;

  constructor(private readonly options: EdgarOptions) {
    this.wwwBase = options.wwwBase ?? 'https://www.sec.gov';
    this.dataBase = options.dataBase ?? 'https://data.sec.gov';
  }

  async retrieve(company: string, fiscalYear: number, signal?: AbortSignal): Promise<RawFiling> {
    const cik = await this.resolveCik(company, signal);
    const filing = await this.findFiling(cik, fiscalYear, signal);
    const url = buildDocUrl(this.wwwBase, cik, filing.accessionNumber, filing.primaryDocument);

    log.info({ company, fiscalYear, accession: filing.accessionNumber, url }, 'downloading filing');
    const res = await this.request(url, signal);

    let content: Uint8Array;
    try {
      content = new Uint8Array(await res.arrayBuffer());
    } catch (err) {
      throw new RetrievalFailureError('transient', `Reading ${url} failed: ${errorMessage(err)}`, { url }, err);
    }

    const head = new TextDecoder('latin1').decode(content.subarray(0, 4096));
    return {
      id: {
        company,
        cik,
        fiscalYear,
        filingDate: filing.filingDate,
        accessionNumber: filing.accessionNumber,
      },
      content,
      encoding: charsetOf(res.headers.get('content-type')) ?? 'utf-8',
      contentType: detectContentType(head, url),
      sourceUrl: url,
    };
  }

  async resolveCik(company: string, signal?: AbortSignal): Promise<string> {
    if (/^\d{1,10}$/.test(company)) return company.padStart(10, '0');

    const map = await this.loadTickers(signal);
    const cik = map.get(company.toUpperCase());
    if (!cik) {
      throw new RetrievalFailureError('not_found', `Ticker "${company}" not found in SEC company tickers`, {
        company,
      });
    }
    return cik;
  }

  private loadTickers(signal?: AbortSignal): Promise<Map<string, string>> {
    if (!this.tickers) {
      this.tickers = this.fetchTickers(signal).catch((err: unknown) => {
        this.tickers = null;
        throw err;
      });
    }
    return this.tickers;
  }

  private async fetchTickers(signal?: AbortSignal): Promise<Map<string, string>> {
    const url = `${this.wwwBase}/files/company_tickers.json`;
    const data = await this.requestJson(url, z.record(TickerEntrySchema), signal);
    const map = new Map<string, string>();
    for (const entry of Object.values(data)) {
      map.set(entry.ticker.toUpperCase(), String(entry.cik_str).padStart(10, '0'));
    }
    return map;
  }

  private async findFiling(cik: string, fiscalYear: number, signal?: AbortSignal): Promise<FilingRef> {
    const url = `${this.dataBase}/submissions/CIK${cik}.json`;
    const data = await this.requestJson(url, SubmissionsSchema, signal);
    const filing = selectAnnualFiling(data.filings.recent, fiscalYear);
    if (!filing) {
      throw new RetrievalFailureError('not_found', `No 10-K filing found for CIK ${cik} for fiscal year ${fiscalYear}`, {
        cik,
        fiscalYear,
      });
    }
    return filing;
  }

  private async requestJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    const res = await this.request(url, signal);
    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new RetrievalFailureError('transient', `Invalid JSON from ${url}`, { url }, err);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new RetrievalFailureError('not_found', `Unexpected response shape from ${url}`, {
        url,
        issues: parsed.error.issues.length,
      });
    }
    return parsed.data;
  }

  private async throttle(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.options.rateLimitMs;
    if (slot > now) {
      await sleep(slot - now, undefined, { signal });
    }
  }

  private async request(url: string, signal?: AbortSignal): Promise<Response> {
    let res: Response;
    try {
      await this.throttle(signal);
      const timeout = AbortSignal.timeout(this.options.timeoutMs);
      res = await fetch(url, {
        headers: { 'User-Agent': this.options.userAgent, Accept: 'text/html,application/json' },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      throw new RetrievalFailureError('transient', `SEC request failed for ${url}: ${errorMessage(err)}`, { url }, err);
    }

    if (res.ok) return res;

    const context = { url, status: res.status };
    if (res.status === 404) {
      throw new RetrievalFailureError('not_found', `SEC returned 404 for ${url}`, context);
    }
    // EDGAR answers 403 when the request rate threshold is exceeded
    if (res.status === 429 || res.status === 403) {
      throw new RetrievalFailureError('rate_limited', `SEC rate limit hit (${res.status}) for ${url}`, context);
    }
    if (res.status >= 500) {
      throw new RetrievalFailureError('transient', `SEC server error ${res.status} for ${url}`, context);
    }
    throw new RetrievalFailureError('not_found', `SEC request failed: ${res.status} ${res.statusText} for ${url}`, context);
  }
}
